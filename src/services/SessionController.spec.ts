import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RecognizedSegment, TokenResponse } from '../types/index.js';
import { CredentialError, InvalidTransitionError, PermissionError } from '../types/errors.js';
import {
  constantPcm,
  FakeMicrophone,
  MemoryHistoryStore,
  ScriptedRecognizer,
  StaticTokenProvider,
  TEST_CREDENTIAL_RESPONSE
} from '../testing/fakes.js';
import { AudioCaptureController } from './AudioCaptureController.js';
import { SessionController, SessionSettings } from './SessionController.js';
import { hashSpeakerIndex } from './SpeakerAssigner.js';

// 1 s of 16 kHz mono PCM16
const ONE_SECOND = 32000;

describe('SessionController', () => {
  let microphone: FakeMicrophone;
  let capture: AudioCaptureController;
  let history: MemoryHistoryStore;
  let recognizer: ScriptedRecognizer;
  let tokenProvider: StaticTokenProvider;
  let controller: SessionController;
  const clock = () => Date.now();

  function createController(
    settings: Partial<SessionSettings> = {},
    tokenResponses: TokenResponse[] = [TEST_CREDENTIAL_RESPONSE]
  ): SessionController {
    tokenProvider = new StaticTokenProvider(tokenResponses);
    controller = new SessionController({
      capture,
      tokenProvider,
      recognizer,
      historyStore: history,
      settings: { chunkIntervalMs: 1000, ...settings },
      clock,
      createSessionId: () => 'session_test'
    });
    return controller;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    microphone = new FakeMicrophone();
    capture = new AudioCaptureController(microphone, { clock });
    history = new MemoryHistoryStore();
    recognizer = new ScriptedRecognizer(async (_chunk, _options, call): Promise<RecognizedSegment[]> => [
      { speakerId: 'spk-A', text: `chunk ${call}`, offsetSeconds: 0, durationSeconds: 0.5 }
    ]);
  });

  afterEach(() => {
    controller.dispose();
    vi.useRealTimers();
  });

  describe('start', () => {
    it('should open the microphone once and start recording', async () => {
      createController();

      const snapshot = await controller.start();

      expect(snapshot.state).toBe('recording');
      expect(snapshot.sessionId).toBe('session_test');
      expect(microphone.openCount).toBe(1);
      // Recognition and level metering share the device
      expect(capture.leaseCount).toBe(2);
    });

    it('should move to error and release the microphone when access is denied', async () => {
      createController();
      microphone.failWith = new PermissionError();

      await expect(controller.start()).rejects.toBeInstanceOf(PermissionError);

      expect(controller.state).toBe('error');
      expect(controller.snapshot().error).toBe('Microphone access was denied');
      expect(capture.leaseCount).toBe(0);
      expect(history.saved).toHaveLength(0);
    });

    it('should allow starting again after an error', async () => {
      createController();
      microphone.failWith = new PermissionError();
      await expect(controller.start()).rejects.toThrow();

      microphone.failWith = null;
      const snapshot = await controller.start();

      expect(snapshot.state).toBe('recording');
      expect(snapshot.error).toBeNull();
    });

    it('should fail with a credential error when mock fallback is disabled', async () => {
      createController({ allowMockFallback: false }, [
        { success: false, authMethod: 'none', error: 'No speech service credentials configured', mockMode: true }
      ]);

      await expect(controller.start()).rejects.toThrow(
        new CredentialError('Could not obtain a recognition credential: No speech service credentials configured')
      );

      expect(controller.state).toBe('error');
      expect(capture.leaseCount).toBe(0);
      expect(microphone.stream.closed).toBe(true);
    });

    it('should fall back to mock mode with hashed speakers', async () => {
      createController({}, [{ success: false, authMethod: 'none', error: 'No speech service credentials configured', mockMode: true }]);

      await controller.start();
      microphone.stream.emit(Buffer.alloc(ONE_SECOND, 7));
      await controller.drain();

      expect(controller.isMockMode).toBe(true);
      expect(recognizer.calls[0].options.credential).toBeNull();
      const [segment] = controller.transcript.segments();
      expect(segment.speakerId).toBe(`mock-${hashSpeakerIndex(recognizer.calls[0].chunk.payload)}`);
    });

    it('should reject start while recording', async () => {
      createController();
      await controller.start();

      await expect(controller.start()).rejects.toThrow(new InvalidTransitionError('start', 'recording'));
    });
  });

  describe('recognition', () => {
    it('should dispatch chunks with the session credential and order the transcript', async () => {
      recognizer = new ScriptedRecognizer(async (_chunk, _options, call) => [
        { speakerId: call === 1 ? 'spk-A' : 'spk-B', text: ' hello there ', offsetSeconds: 0.25, durationSeconds: 1 }
      ]);
      createController();
      await controller.start();

      microphone.stream.emit(Buffer.alloc(ONE_SECOND));
      microphone.stream.emit(Buffer.alloc(ONE_SECOND));
      await controller.drain();

      expect(recognizer.calls).toHaveLength(2);
      expect(recognizer.calls[0].options.credential).toMatchObject({ authMethod: 'subscription_key', secret: 'test-secret' });

      const segments = controller.transcript.segments();
      expect(segments.map((segment) => segment.offsetSeconds)).toEqual([0.25, 1.25]);
      expect(segments.map((segment) => segment.text)).toEqual(['hello there', 'hello there']);
      expect(segments.map((segment) => segment.displayLabel)).toEqual(['Speaker 1', 'Speaker 2']);
      expect(segments.map((segment) => segment.colorToken)).toEqual(['blue', 'green']);
    });

    it('should keep recording when a chunk fails', async () => {
      recognizer = new ScriptedRecognizer(async () => {
        throw new Error('Server responded with 503');
      });
      createController();
      await controller.start();

      microphone.stream.emit(Buffer.alloc(ONE_SECOND));
      await controller.drain();

      const snapshot = controller.snapshot();
      expect(snapshot.state).toBe('recording');
      expect(snapshot.chunksDispatched).toBe(1);
      expect(snapshot.chunksFailed).toBe(1);
      expect(snapshot.transientIssue).toBe('Server responded with 503');
    });
  });

  describe('pause and resume', () => {
    it('should exclude paused time from elapsed time', async () => {
      createController();
      await controller.start();

      await vi.advanceTimersByTimeAsync(5000);
      expect(controller.snapshot().elapsedSeconds).toBe(5);

      await controller.pause();
      await vi.advanceTimersByTimeAsync(10000);
      expect(controller.snapshot().elapsedSeconds).toBe(5);

      await controller.resume();
      await vi.advanceTimersByTimeAsync(3000);
      expect(controller.snapshot().elapsedSeconds).toBe(8);
      expect(controller.snapshot().remainingSeconds).toBe(3592);
    });

    it('should flush buffered audio on pause and ignore audio while paused', async () => {
      createController();
      await controller.start();

      microphone.stream.emit(Buffer.alloc(ONE_SECOND / 2));
      await controller.pause();
      microphone.stream.emit(Buffer.alloc(ONE_SECOND));

      expect(recognizer.calls).toHaveLength(1);
      expect(recognizer.calls[0].chunk.durationSeconds).toBe(0.5);
      expect(controller.state).toBe('paused');
    });

    it('should continue the timeline and speaker identity in a new epoch after resume', async () => {
      createController();
      await controller.start();

      microphone.stream.emit(Buffer.alloc(ONE_SECOND / 2));
      await controller.pause();
      await controller.resume();
      microphone.stream.emit(Buffer.alloc(ONE_SECOND));
      await controller.drain();

      expect(recognizer.calls[1].chunk.sequence).toBe(2);
      expect(recognizer.calls[1].chunk.offsetSeconds).toBe(0.5);

      const segments = controller.transcript.segments();
      expect(segments.map((segment) => segment.text)).toEqual(['chunk 1', 'chunk 2']);
      expect(segments.map((segment) => segment.offsetSeconds)).toEqual([0, 0.5]);
      expect(segments.map((segment) => segment.source)).toEqual([
        { epoch: 1, sequence: 1 },
        { epoch: 2, sequence: 2 }
      ]);
      expect(segments.map((segment) => segment.displayLabel)).toEqual(['Speaker 1', 'Speaker 1']);
    });

    it('should reuse a credential that has not expired', async () => {
      createController();
      await controller.start();
      await controller.pause();
      await controller.resume();

      expect(tokenProvider.calls).toBe(1);
    });

    it('should finalize the session and move to error when an expired credential cannot be renewed', async () => {
      createController({}, [
        { ...TEST_CREDENTIAL_RESPONSE, expiry: Date.now() + 60000 },
        { success: false, authMethod: 'none', error: 'Token service unavailable' }
      ]);
      await controller.start();
      await vi.advanceTimersByTimeAsync(1000);
      await controller.pause();
      await vi.advanceTimersByTimeAsync(40000);

      await expect(controller.resume()).rejects.toBeInstanceOf(CredentialError);

      expect(tokenProvider.calls).toBe(2);
      expect(controller.state).toBe('error');
      expect(controller.snapshot().error).toBe('Could not obtain a recognition credential: Token service unavailable');
      expect(history.saved).toHaveLength(1);
      expect(history.saved[0].stopReason).toBe('error');
      expect(history.saved[0].durationSeconds).toBe(1);
    });

    it('should accumulate every pause interval across several cycles', async () => {
      createController();
      await controller.start();

      const pauses = [5000, 7000, 11000];
      for (const pauseMs of pauses) {
        await vi.advanceTimersByTimeAsync(2500);
        await controller.pause();
        await vi.advanceTimersByTimeAsync(pauseMs);
        await controller.resume();
      }
      await vi.advanceTimersByTimeAsync(2500);
      expect(controller.snapshot().elapsedSeconds).toBe(10);

      await controller.stop();

      const [summary] = history.saved;
      const wallClockMs = Date.parse(summary.endTime) - Date.parse(summary.startTime);
      expect(summary.durationSeconds).toBe(10);
      expect(wallClockMs - summary.durationSeconds * 1000).toBe(5000 + 7000 + 11000);
    });

    it('should keep metering the microphone level while paused', async () => {
      createController();
      await controller.start();
      await controller.pause();

      microphone.stream.emit(constantPcm(16384, 4800));
      await vi.advanceTimersByTimeAsync(100);

      expect(controller.state).toBe('paused');
      expect(controller.levels.latest).toMatchObject({ rms: 0.5, classification: 'Optimal' });
      expect(recognizer.calls).toHaveLength(0);
    });

    it('should reject pause while idle and resume while recording', async () => {
      createController();

      await expect(controller.pause()).rejects.toThrow('Cannot pause while idle');
      await controller.start();
      await expect(controller.resume()).rejects.toThrow('Cannot resume while recording');
    });
  });

  describe('time limit', () => {
    it('should stop exactly once when the limit is reached', async () => {
      createController({ timeLimitSeconds: 3600 });
      await controller.start();

      await vi.advanceTimersByTimeAsync(3661 * 1000);
      // Joins the automatic stop if it is still finishing
      await controller.stop();

      expect(controller.state).toBe('stopped');
      expect(history.saved).toHaveLength(1);
      expect(history.saved[0].stopReason).toBe('time-limit');
      expect(history.saved[0].durationSeconds).toBe(3600);
      expect(controller.snapshot().elapsedSeconds).toBe(3600);
    });

    it('should save every segment received before the time limit stop', async () => {
      createController({ timeLimitSeconds: 3600 });
      await controller.start();

      microphone.stream.emit(Buffer.alloc(ONE_SECOND));
      microphone.stream.emit(Buffer.alloc(ONE_SECOND));
      await controller.drain();
      microphone.stream.emit(Buffer.alloc(ONE_SECOND / 2));

      await vi.advanceTimersByTimeAsync(3661 * 1000);
      await controller.stop();

      const [summary] = history.saved;
      expect(summary.stopReason).toBe('time-limit');
      expect(summary.segments.map((segment) => segment.text)).toEqual(['chunk 1', 'chunk 2', 'chunk 3']);
      expect(summary.segments.map((segment) => segment.offsetSeconds)).toEqual([0, 1, 2]);
    });

    it('should not count paused time toward the limit', async () => {
      createController({ timeLimitSeconds: 10 });
      await controller.start();

      await vi.advanceTimersByTimeAsync(6000);
      await controller.pause();
      await vi.advanceTimersByTimeAsync(100000);
      await controller.resume();
      await vi.advanceTimersByTimeAsync(3500);
      expect(controller.state).toBe('recording');

      await vi.advanceTimersByTimeAsync(1000);
      await controller.stop();
      expect(controller.state).toBe('stopped');
      expect(history.saved).toHaveLength(1);
      expect(history.saved[0].stopReason).toBe('time-limit');
      expect(history.saved[0].durationSeconds).toBe(10);
    });
  });

  describe('stop', () => {
    it('should share one finalization between concurrent stops', async () => {
      createController();
      await controller.start();

      const first = controller.stop();
      const second = controller.stop();
      expect(second).toBe(first);
      await first;
      await controller.stop();

      expect(controller.state).toBe('stopped');
      expect(history.saved).toHaveLength(1);
      expect(capture.isActive()).toBe(false);
    });

    it('should be a no-op while idle', async () => {
      createController();

      const snapshot = await controller.stop();

      expect(snapshot.state).toBe('idle');
      expect(history.saved).toHaveLength(0);
    });

    it('should send the buffered audio before finishing and keep the summary', async () => {
      createController();
      await controller.start();
      microphone.stream.emit(Buffer.alloc(ONE_SECOND / 2));

      await controller.stop();

      const summary = controller.lastSummary;
      expect(summary?.id).toBe('session_test');
      expect(summary?.stopReason).toBe('user');
      expect(summary?.segments.map((segment) => segment.text)).toEqual(['chunk 1']);
      expect(summary?.speakerCount).toBe(1);
      expect(history.saved[0]).toBe(summary);
      // Transcript stays visible until the next start
      expect(controller.transcript.size).toBe(1);
    });

    it('should keep the summary when saving fails', async () => {
      createController();
      const failing = vi.spyOn(history, 'save').mockRejectedValue(new Error('disk full'));
      await controller.start();

      await controller.stop();
      await vi.advanceTimersByTimeAsync(0);

      expect(failing).toHaveBeenCalledTimes(1);
      expect(controller.lastSummary?.id).toBe('session_test');
      expect(controller.state).toBe('stopped');
    });

    it('should stop with device-lost when the microphone goes away', async () => {
      createController();
      await controller.start();

      microphone.stream.fail(new Error('Microphone disconnected'));
      await controller.stop();

      expect(controller.state).toBe('stopped');
      expect(history.saved[0].stopReason).toBe('device-lost');
    });
  });
});
