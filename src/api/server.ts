import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { Subscription } from 'rxjs';
import { SessionSnapshot } from '../types/index.js';
import { CaptionError, InvalidTransitionError, describeError } from '../types/errors.js';
import { RecordingManager } from '../services/RecordingManager.js';
import { createLiveRouter } from './liveRoutes.js';

type SessionCommand = () => Promise<SessionSnapshot>;

function commandHandler(command: SessionCommand) {
  return async (req: Request, res: Response) => {
    try {
      res.json(await command());
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        res.status(409).json({ error: error.message });
        return;
      }
      res.status(500).json({
        error: describeError(error),
        code: error instanceof CaptionError ? error.code : 'internal',
        retriable: error instanceof CaptionError ? error.retriable : false
      });
    }
  };
}

/**
 * Control API, event stream and recognition backend on one express app
 */
export function createApp(manager: RecordingManager): Express {
  const app = express();
  const controller = manager.controller;

  // Middleware
  app.use(cors());

  // Mounted ahead of the global JSON parser, /live/save sets its own body limit
  app.use('/live', createLiveRouter({
    historyStore: manager,
    speechKey: manager.config.speechKey,
    speechRegion: manager.config.speechRegion
  }));

  app.use(express.json());

  /**
   * Health check endpoint
   */
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.post('/api/session/start', commandHandler(() => controller.start()));
  app.post('/api/session/pause', commandHandler(() => controller.pause()));
  app.post('/api/session/resume', commandHandler(() => controller.resume()));
  app.post('/api/session/stop', commandHandler(() => controller.stop('user')));

  /**
   * Current session state
   */
  app.get('/api/session', (req: Request, res: Response) => {
    res.json({ ...controller.snapshot(), mockMode: controller.isMockMode });
  });

  /**
   * Ordered transcript of the current (or last) session
   */
  app.get('/api/session/transcript', (req: Request, res: Response) => {
    res.json({
      segments: controller.transcript.segments(),
      speakers: controller.transcript.speakers()
    });
  });

  app.get('/api/session/level', (req: Request, res: Response) => {
    res.json({ level: controller.levels.latest });
  });

  /**
   * Server-sent events: `state`, `transcript` and `level`
   */
  app.get('/api/session/events', (req: Request, res: Response) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });

    const send = (event: string, data: unknown) => {
      res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    };

    const subscription = new Subscription();
    subscription.add(controller.snapshot$.subscribe((snapshot) => send('state', snapshot)));
    subscription.add(controller.transcript.transcript$.subscribe((segments) => send('transcript', segments)));
    subscription.add(controller.levels.level$.subscribe((level) => send('level', level)));

    req.on('close', () => {
      subscription.unsubscribe();
    });
  });

  /**
   * Get all sessions
   */
  app.get('/api/sessions', (req: Request, res: Response) => {
    res.json(manager.getAllSessions());
  });

  /**
   * Get session by ID
   */
  app.get('/api/sessions/:sessionId', async (req: Request, res: Response) => {
    const session = await manager.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json(session);
  });

  return app;
}

/**
 * Start server
 */
export function startServer(manager: RecordingManager = new RecordingManager()): Promise<Server> {
  const app = createApp(manager);
  const port = manager.config.port;

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`Live caption server running on port ${port}`);
      console.log(`Health check: http://localhost:${port}/health`);
      console.log(`Session events: http://localhost:${port}/api/session/events`);

      // Load history in background
      manager.initialize().catch((error: unknown) => console.error('Failed to initialize:', describeError(error)));
      resolve(server);
    });
    server.once('error', reject);
  });
}
