import fs from 'fs';
import { SessionSummary } from '../types/index.js';
import { EngineConfig, loadConfig } from '../config.js';
import { AudioCaptureController, MicrophoneDevice } from './AudioCaptureController.js';
import { AudioLevelMonitor } from './AudioLevelMonitor.js';
import { FfmpegMicrophone } from './FfmpegMicrophone.js';
import { FileHistoryStore, HistoryStore } from './HistoryStore.js';
import { HttpRecognitionClient, SpeechRecognitionService } from './HttpRecognitionClient.js';
import { SessionController } from './SessionController.js';
import { HttpTokenProvider, TokenProvider } from './TokenProvider.js';

export interface RecordingManagerOptions {
  config?: EngineConfig;
  microphone?: MicrophoneDevice;
  tokenProvider?: TokenProvider;
  recognizer?: SpeechRecognitionService;
  historyStore?: FileHistoryStore;
  clock?: () => number;
}

/**
 * Wires a session controller from configuration and keeps the finished
 * sessions for the API and the CLI
 */
export class RecordingManager implements HistoryStore {
  readonly config: EngineConfig;
  readonly controller: SessionController;
  private readonly capture: AudioCaptureController;
  private readonly historyStore: FileHistoryStore;
  private sessions: Map<string, SessionSummary> = new Map();

  constructor(options: RecordingManagerOptions = {}) {
    this.config = options.config ?? loadConfig();
    const clock = options.clock ?? Date.now;

    this.historyStore = options.historyStore ?? new FileHistoryStore(this.config.dataDir);
    this.capture = new AudioCaptureController(
      options.microphone ?? new FfmpegMicrophone({ device: this.config.audioDevice }),
      { clock }
    );
    this.controller = new SessionController({
      capture: this.capture,
      tokenProvider: options.tokenProvider ?? new HttpTokenProvider(this.config.baseUrl),
      recognizer: options.recognizer ?? new HttpRecognitionClient(this.config.baseUrl),
      historyStore: this,
      levelMonitor: new AudioLevelMonitor({
        windowMs: this.config.levelWindowMs,
        refreshMs: this.config.levelRefreshMs,
        thresholds: this.config.levelThresholds,
        clock
      }),
      settings: this.config,
      clock
    });
  }

  private ensureDataDir(): void {
    if (!fs.existsSync(this.config.dataDir)) {
      fs.mkdirSync(this.config.dataDir, { recursive: true });
    }
  }

  /**
   * Initialize the recording manager
   */
  async initialize(): Promise<void> {
    this.ensureDataDir();
    await this.loadAllSessions();
    console.log(`Recording manager initialized with ${this.sessions.size} saved session(s)`);
  }

  /**
   * Load all sessions from disk
   */
  async loadAllSessions(): Promise<void> {
    for (const summary of await this.historyStore.list()) {
      this.sessions.set(summary.id, summary);
    }
  }

  /**
   * Remember a finished session and persist it
   */
  async save(summary: SessionSummary): Promise<void> {
    this.sessions.set(summary.id, summary);
    await this.historyStore.save(summary);
  }

  /**
   * Get session by ID
   */
  async getSession(sessionId: string): Promise<SessionSummary | null> {
    return this.sessions.get(sessionId) ?? this.historyStore.load(sessionId);
  }

  /**
   * All finished sessions, newest first
   */
  getAllSessions(): SessionSummary[] {
    return Array.from(this.sessions.values()).sort((a, b) => b.startTime.localeCompare(a.startTime));
  }

  /**
   * Stop any running session and close the microphone
   */
  async shutdown(): Promise<void> {
    await this.controller.stop();
    this.controller.dispose();
    await this.capture.releaseAll();
    console.log('Recording manager shut down');
  }
}
