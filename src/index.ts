#!/usr/bin/env node

import { startServer } from './api/server.js';
import { RecordingManager } from './services/RecordingManager.js';
import { describeError } from './types/errors.js';
import { SessionSnapshot } from './types/index.js';

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === '--cli') {
    await startCLI();
  } else if (args[0] === '--help') {
    console.log('Usage:');
    console.log('  live-caption           - Start API server and recognition backend');
    console.log('  live-caption --cli     - Start CLI interface');
    return;
  } else {
    // Default: start server
    const manager = new RecordingManager();
    const server = await startServer(manager);
    process.once('SIGINT', () => {
      console.log('Shutting down...');
      manager.shutdown()
        .catch((error: unknown) => console.error('Shutdown failed:', describeError(error)))
        .finally(() => server.close());
    });
  }
}

function formatClock(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  return `${minutes.toString().padStart(2, '0')}:${(seconds % 60).toString().padStart(2, '0')}`;
}

function printSnapshot(snapshot: SessionSnapshot) {
  console.log(`State: ${snapshot.state}`);
  if (snapshot.sessionId) {
    console.log(`Session: ${snapshot.sessionId}`);
  }
  console.log(`Elapsed: ${formatClock(snapshot.elapsedSeconds)} (remaining ${formatClock(snapshot.remainingSeconds)})`);
  if (snapshot.error) {
    console.log(`Error: ${snapshot.error}`);
  }
  if (snapshot.transientIssue) {
    console.log(`Last chunk problem: ${snapshot.transientIssue}`);
  }
}

async function startCLI() {
  const manager = new RecordingManager();
  const controller = manager.controller;

  // The session talks to the recognition backend over HTTP, so the CLI hosts it too
  console.log('Initializing live caption CLI...');
  const server = await startServer(manager);

  // Captions arrive in the background; print each new segment once
  let printed = 0;
  controller.transcript.transcript$.subscribe((segments) => {
    if (segments.length < printed) {
      printed = 0;
    }
    for (const segment of segments.slice(printed)) {
      console.log(`[${formatClock(Math.floor(segment.offsetSeconds))}] ${segment.displayLabel}: ${segment.text}`);
    }
    printed = segments.length;
  });

  console.log('Live caption CLI ready!');
  console.log('Commands:');
  console.log('  start    - Start a captioning session');
  console.log('  pause    - Pause captioning');
  console.log('  resume   - Resume captioning');
  console.log('  stop     - Stop and save the session');
  console.log('  status   - Show session status');
  console.log('  sessions - List saved sessions');
  console.log('  quit     - Exit CLI');

  const { createInterface } = await import('readline');
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout
  });

  const prompt = () => {
    rl.question('captions> ', async (input: string) => {
      const command = input.trim().toLowerCase();

      try {
        switch (command) {
          case 'start':
            printSnapshot(await controller.start());
            break;

          case 'pause':
            printSnapshot(await controller.pause());
            break;

          case 'resume':
            printSnapshot(await controller.resume());
            break;

          case 'stop': {
            printSnapshot(await controller.stop('user'));
            const summary = controller.lastSummary;
            if (summary) {
              console.log(`Session ${summary.id}: ${summary.segments.length} segments, ${summary.speakerCount} speaker(s)`);
            }
            break;
          }

          case 'status': {
            printSnapshot(controller.snapshot());
            const level = controller.levels.latest;
            if (level) {
              console.log(`Input level: ${level.classification} (rms ${level.rms.toFixed(3)})`);
            }
            break;
          }

          case 'sessions': {
            const sessions = manager.getAllSessions();
            console.log(`Total sessions: ${sessions.length}`);
            sessions.forEach(session => {
              console.log(`  ${session.id} - ${session.stopReason} - ${session.startTime} - ${session.segments.length} segments`);
              if (session.segments.length > 0) {
                console.log(`    "${session.segments[0].text.substring(0, 50)}..."`);
              }
            });
            break;
          }

          case 'quit':
          case 'exit':
            rl.close();
            await manager.shutdown();
            server.close();
            return;

          default:
            console.log('Unknown command. Available: start, pause, resume, stop, status, sessions, quit');
        }
      } catch (error) {
        console.error('Error:', describeError(error));
      }

      prompt();
    });
  };

  prompt();
}

// Always run main function
main().catch(console.error);
