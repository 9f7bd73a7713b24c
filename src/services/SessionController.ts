import { BehaviorSubject, Observable, Subscription } from 'rxjs';
import {
  AudioFrame,
  Credential,
  Session,
  SessionSnapshot,
  SessionState,
  SessionSummary,
  StopReason
} from '../types/index.js';
import { CredentialError, InvalidTransitionError, describeError } from '../types/errors.js';
import { DEFAULT_CONFIG, EngineConfig } from '../config.js';
import { AudioCaptureController, CaptureLease } from './AudioCaptureController.js';
import { AudioLevelMonitor } from './AudioLevelMonitor.js';
import { ChunkAccumulator } from './ChunkAccumulator.js';
import { HistoryStore } from './HistoryStore.js';
import { SpeechRecognitionService } from './HttpRecognitionClient.js';
import { RecognitionPipeline } from './RecognitionPipeline.js';
import { createSpeakerAssigner } from './SpeakerAssigner.js';
import { SessionEventType, SessionStateMachine } from './sessionMachine.js';
import { TokenProvider, isExpired, toCredential } from './TokenProvider.js';
import { TranscriptAggregator } from './TranscriptAggregator.js';

export type SessionSettings = Pick<
  EngineConfig,
  | 'timeLimitSeconds'
  | 'tickIntervalMs'
  | 'chunkIntervalMs'
  | 'maxBufferedFrames'
  | 'dispatchTimeoutMs'
  | 'speakerAssignment'
  | 'allowMockFallback'
>;

export interface SessionControllerOptions {
  capture: AudioCaptureController;
  tokenProvider: TokenProvider;
  recognizer: SpeechRecognitionService;
  historyStore: HistoryStore;
  levelMonitor?: AudioLevelMonitor;
  aggregator?: TranscriptAggregator;
  settings?: Partial<SessionSettings>;
  clock?: () => number;
  createSessionId?: () => string;
}

interface AcquiredCredential {
  credential: Credential | null;
  mockMode: boolean;
}

function generateSessionId(): string {
  return `session_${Date.now()}_${Math.random().toString(36).substring(2, 15)}`;
}

async function releaseQuietly(lease: CaptureLease | null): Promise<void> {
  if (!lease) {
    return;
  }
  try {
    await lease.release();
  } catch (error) {
    console.error('Failed to release microphone lease:', describeError(error));
  }
}

/**
 * Orchestrates one live captioning session at a time: owns the state
 * machine and the session clock, and drives capture, recognition and the
 * transcript.
 *
 * Only device and credential acquisition can move the session to `error`.
 * Chunk failures surface through `transientIssue` and recording goes on.
 */
export class SessionController {
  private readonly capture: AudioCaptureController;
  private readonly tokenProvider: TokenProvider;
  private readonly recognizer: SpeechRecognitionService;
  private readonly historyStore: HistoryStore;
  private readonly levelMonitor: AudioLevelMonitor;
  private readonly aggregator: TranscriptAggregator;
  private readonly settings: SessionSettings;
  private readonly clock: () => number;
  private readonly createSessionId: () => string;
  private readonly machine = new SessionStateMachine();

  private session: Session | null = null;
  private pauseStartedAt: number | null = null;
  private finalElapsedMs = 0;
  private credential: Credential | null = null;
  private mockMode = false;
  private lease: CaptureLease | null = null;
  private leaseSubscriptions: Array<() => void> = [];
  private accumulator: ChunkAccumulator | null = null;
  private pipeline: RecognitionPipeline | null = null;
  private issueSubscription: Subscription | null = null;
  private ticker: NodeJS.Timeout | null = null;
  private errorMessage: string | null = null;
  private stopping: Promise<SessionSnapshot> | null = null;
  private summary: SessionSummary | null = null;

  private readonly _snapshot$: BehaviorSubject<SessionSnapshot>;
  readonly snapshot$: Observable<SessionSnapshot>;

  constructor(options: SessionControllerOptions) {
    this.capture = options.capture;
    this.tokenProvider = options.tokenProvider;
    this.recognizer = options.recognizer;
    this.historyStore = options.historyStore;
    this.clock = options.clock ?? Date.now;
    this.levelMonitor = options.levelMonitor ?? new AudioLevelMonitor({ clock: this.clock });
    this.aggregator = options.aggregator ?? new TranscriptAggregator();
    this.createSessionId = options.createSessionId ?? generateSessionId;
    this.settings = {
      timeLimitSeconds: options.settings?.timeLimitSeconds ?? DEFAULT_CONFIG.timeLimitSeconds,
      tickIntervalMs: options.settings?.tickIntervalMs ?? DEFAULT_CONFIG.tickIntervalMs,
      chunkIntervalMs: options.settings?.chunkIntervalMs ?? DEFAULT_CONFIG.chunkIntervalMs,
      maxBufferedFrames: options.settings?.maxBufferedFrames ?? DEFAULT_CONFIG.maxBufferedFrames,
      dispatchTimeoutMs: options.settings?.dispatchTimeoutMs ?? DEFAULT_CONFIG.dispatchTimeoutMs,
      speakerAssignment: options.settings?.speakerAssignment ?? DEFAULT_CONFIG.speakerAssignment,
      allowMockFallback: options.settings?.allowMockFallback ?? DEFAULT_CONFIG.allowMockFallback
    };

    this._snapshot$ = new BehaviorSubject<SessionSnapshot>(this.snapshot());
    this.snapshot$ = this._snapshot$.asObservable();
  }

  get state(): SessionState {
    return this.machine.state;
  }

  get transcript(): TranscriptAggregator {
    return this.aggregator;
  }

  get levels(): AudioLevelMonitor {
    return this.levelMonitor;
  }

  /**
   * Summary of the last finished session, kept even if saving it failed
   */
  get lastSummary(): SessionSummary | null {
    return this.summary;
  }

  get isMockMode(): boolean {
    return this.mockMode;
  }

  /**
   * Recorded time excluding pauses
   */
  elapsedMs(): number {
    const session = this.session;
    if (!session) {
      return this.finalElapsedMs;
    }
    const now = this.clock();
    const openPause = this.pauseStartedAt !== null ? now - this.pauseStartedAt : 0;
    return Math.max(0, now - session.startTime - session.accumulatedPauseDuration - openPause);
  }

  snapshot(): SessionSnapshot {
    const elapsedSeconds = Math.floor(this.elapsedMs() / 1000);
    const stats = this.pipeline?.getStats();
    return {
      sessionId: this.session?.id ?? null,
      state: this.machine.state,
      elapsedSeconds,
      remainingSeconds: Math.max(0, this.settings.timeLimitSeconds - elapsedSeconds),
      timeLimitSeconds: this.settings.timeLimitSeconds,
      error: this.machine.state === 'error' ? this.errorMessage : null,
      transientIssue: this.pipeline?.issue ?? null,
      chunksDispatched: stats?.dispatched ?? 0,
      chunksFailed: stats?.failed ?? 0
    };
  }

  /**
   * Acquire the microphone and a credential, then start recording
   */
  async start(): Promise<SessionSnapshot> {
    this.require('START', 'start');
    this.errorMessage = null;
    this.send('START');

    const sessionId = this.createSessionId();
    console.log(`Starting session ${sessionId}`);

    let lease: CaptureLease | null = null;
    let monitorLease: CaptureLease | null = null;
    try {
      lease = await this.capture.acquire();
      monitorLease = await this.capture.acquire();
      const acquired = await this.acquireCredential();

      if (this.state !== 'connecting') {
        console.log(`Session ${sessionId} was stopped while connecting`);
        await releaseQuietly(monitorLease);
        await releaseQuietly(lease);
        return this.snapshot();
      }

      this.beginSession(sessionId, lease, monitorLease, acquired);
      return this.snapshot();
    } catch (error) {
      await releaseQuietly(monitorLease);
      await releaseQuietly(lease);
      if (this.state !== 'connecting') {
        return this.snapshot();
      }
      await this.fail(error);
      throw error;
    }
  }

  /**
   * Close the recognition channel; capture and level metering keep running
   */
  async pause(): Promise<SessionSnapshot> {
    this.require('PAUSE', 'pause');
    this.stopTicker();
    this.flushToChannel();
    this.pipeline?.closeChannel();
    this.pauseStartedAt = this.clock();
    this.send('PAUSE');
    console.log(`Session ${this.session?.id} paused at ${Math.floor(this.elapsedMs() / 1000)}s`);
    return this.snapshot();
  }

  /**
   * Open a fresh recognition channel under the same session
   */
  async resume(): Promise<SessionSnapshot> {
    this.require('RESUME', 'resume');
    const session = this.session;
    if (session && this.pauseStartedAt !== null) {
      session.accumulatedPauseDuration += this.clock() - this.pauseStartedAt;
      this.pauseStartedAt = null;
    }
    this.send('RESUME');

    try {
      const credential = await this.refreshCredential();
      if (this.state !== 'connecting' || !this.pipeline) {
        return this.snapshot();
      }

      this.pipeline.openChannel(credential);
      this.send('CONNECTED');
      this.startTicker();
      console.log(`Session ${session?.id} resumed`);
      return this.snapshot();
    } catch (error) {
      if (this.state !== 'connecting') {
        return this.snapshot();
      }
      await this.fail(error);
      throw error;
    }
  }

  /**
   * Flush, tear down and hand the transcript to history. Safe from any
   * state; concurrent and repeated calls share one finalization.
   */
  stop(reason: StopReason = 'user'): Promise<SessionSnapshot> {
    if (this.stopping) {
      return this.stopping;
    }
    if (!this.machine.can('STOP')) {
      return Promise.resolve(this.snapshot());
    }

    this.stopping = this.runStop(reason).finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  /**
   * Wait for chunk requests still in flight
   */
  async drain(): Promise<void> {
    await this.pipeline?.drain();
  }

  dispose(): void {
    this.stopTicker();
    this.issueSubscription?.unsubscribe();
    this.issueSubscription = null;
    this.machine.stop();
    this._snapshot$.complete();
  }

  private async runStop(reason: StopReason): Promise<SessionSnapshot> {
    console.log(`Stopping session (${reason})`);
    this.send('STOP');
    try {
      await this.finishSession(reason);
    } finally {
      this.send('STOPPED');
    }
    return this.snapshot();
  }

  private beginSession(
    sessionId: string,
    lease: CaptureLease,
    monitorLease: CaptureLease,
    acquired: AcquiredCredential
  ): void {
    const now = this.clock();
    this.session = {
      id: sessionId,
      state: 'connecting',
      startTime: now,
      accumulatedPauseDuration: 0,
      timeLimitSeconds: this.settings.timeLimitSeconds,
      lastActivityTime: now
    };
    this.pauseStartedAt = null;
    this.finalElapsedMs = 0;
    this.summary = null;
    this.credential = acquired.credential;
    this.mockMode = acquired.mockMode;

    this.aggregator.clear();
    this.accumulator = new ChunkAccumulator({
      sessionId,
      format: lease.format,
      chunkIntervalMs: this.settings.chunkIntervalMs,
      maxBufferedFrames: this.settings.maxBufferedFrames
    });
    this.pipeline = new RecognitionPipeline({
      recognizer: this.recognizer,
      aggregator: this.aggregator,
      speakerAssigner: createSpeakerAssigner(acquired.mockMode ? 'hash' : this.settings.speakerAssignment),
      dispatchTimeoutMs: this.settings.dispatchTimeoutMs,
      clock: this.clock
    });
    this.issueSubscription?.unsubscribe();
    this.issueSubscription = this.pipeline.issue$.subscribe(() => this.publish());

    this.lease = lease;
    this.leaseSubscriptions = [
      lease.onFrame((frame) => this.handleFrame(frame)),
      lease.onError((error) => this.handleDeviceError(error))
    ];
    this.levelMonitor.start(monitorLease);

    this.pipeline.openChannel(acquired.credential);
    this.send('CONNECTED');
    this.startTicker();
    console.log(`Session ${sessionId} recording${acquired.mockMode ? ' (mock mode)' : ''}`);
  }

  private async finishSession(reason: StopReason): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }

    this.finalElapsedMs = this.elapsedMs();
    this.session = null;
    this.pauseStartedAt = null;
    this.stopTicker();

    const pipeline = this.pipeline;
    const finalChunk = this.accumulator?.flush() ?? null;
    if (finalChunk && pipeline) {
      await pipeline.dispatchFinal(finalChunk);
    }
    // In-flight best-effort dispatches are not awaited
    pipeline?.closeChannel();
    await this.releaseCapture();

    const summary: SessionSummary = {
      id: session.id,
      startTime: new Date(session.startTime).toISOString(),
      endTime: new Date(this.clock()).toISOString(),
      durationSeconds: Math.floor(this.finalElapsedMs / 1000),
      speakerCount: this.aggregator.speakerCount,
      stopReason: reason,
      segments: this.aggregator.segments()
    };
    this.summary = summary;
    this.handOff(summary);
    console.log(`Session ${session.id} finished (${reason}): ${summary.segments.length} segments, ${summary.durationSeconds}s`);
  }

  private handOff(summary: SessionSummary): void {
    const report = (error: unknown) => {
      console.error(`Failed to save session ${summary.id} to history:`, describeError(error));
    };
    try {
      this.historyStore.save(summary).catch(report);
    } catch (error) {
      report(error);
    }
  }

  private async releaseCapture(): Promise<void> {
    for (const unsubscribe of this.leaseSubscriptions) {
      unsubscribe();
    }
    this.leaseSubscriptions = [];

    await this.levelMonitor.stop();
    const lease = this.lease;
    this.lease = null;
    await releaseQuietly(lease);
  }

  private async fail(error: unknown): Promise<void> {
    this.errorMessage = describeError(error);
    console.error('Session failed:', this.errorMessage);
    this.stopTicker();
    await this.finishSession('error');
    this.send('FAIL');
  }

  private async acquireCredential(): Promise<AcquiredCredential> {
    let response;
    try {
      response = await this.tokenProvider.getToken();
    } catch (error) {
      throw new CredentialError(`Could not obtain a recognition credential: ${describeError(error)}`, { cause: error });
    }

    if (response.success) {
      return { credential: toCredential(response), mockMode: false };
    }
    if (response.mockMode && this.settings.allowMockFallback) {
      console.warn(`Recognition credentials unavailable (${response.error ?? 'no reason given'}), continuing in mock mode`);
      return { credential: null, mockMode: true };
    }
    throw new CredentialError(`Could not obtain a recognition credential: ${response.error ?? 'token request was rejected'}`);
  }

  private async refreshCredential(): Promise<Credential | null> {
    if (this.mockMode) {
      return null;
    }
    if (this.credential && !isExpired(this.credential, this.clock())) {
      return this.credential;
    }
    const acquired = await this.acquireCredential();
    this.credential = acquired.credential;
    return acquired.credential;
  }

  private handleFrame(frame: AudioFrame): void {
    if (this.state !== 'recording' || !this.session || !this.accumulator || !this.pipeline) {
      return;
    }
    this.session.lastActivityTime = frame.capturedAt;
    const chunk = this.accumulator.push(frame);
    if (chunk) {
      this.pipeline.dispatch(chunk);
    }
  }

  private handleDeviceError(error: Error): void {
    if (!this.session) {
      return;
    }
    console.error('Microphone lost during session:', error.message);
    this.stop('device-lost').catch((stopError: unknown) => {
      console.error('Failed to stop after losing the microphone:', describeError(stopError));
    });
  }

  private flushToChannel(): void {
    const chunk = this.accumulator?.flush();
    if (chunk && this.pipeline) {
      this.pipeline.dispatch(chunk);
    }
  }

  private startTicker(): void {
    this.stopTicker();
    this.ticker = setInterval(() => this.tick(), this.settings.tickIntervalMs);
  }

  private stopTicker(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
  }

  private tick(): void {
    if (this.state !== 'recording') {
      return;
    }
    const elapsedSeconds = Math.floor(this.elapsedMs() / 1000);
    this.publish();

    if (elapsedSeconds >= this.settings.timeLimitSeconds) {
      console.log('Time limit reached, stopping recording');
      this.stop('time-limit').catch((error: unknown) => {
        console.error('Automatic stop failed:', describeError(error));
      });
    }
  }

  private require(type: SessionEventType, command: string): void {
    if (!this.machine.can(type)) {
      throw new InvalidTransitionError(command, this.machine.state);
    }
  }

  private send(type: SessionEventType): void {
    this.machine.send(type);
    if (this.session) {
      this.session.state = this.machine.state;
    }
    this.publish();
  }

  private publish(): void {
    if (!this._snapshot$.closed) {
      this._snapshot$.next(this.snapshot());
    }
  }
}
