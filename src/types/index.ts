export interface AudioFormat {
  sampleRate: number;
  channels: number;
  bitDepth: 16;
}

export const DEFAULT_AUDIO_FORMAT: AudioFormat = {
  sampleRate: 16000,
  channels: 1,
  bitDepth: 16
};

/** Raw little-endian PCM as read from the capture device */
export interface AudioFrame {
  data: Buffer;
  capturedAt: number;
}

export interface AudioChunk {
  sessionId: string;
  sequence: number;
  payload: Uint8Array;
  capturedAt: number;
  encoding: 'audio/wav';
  offsetSeconds: number;
  durationSeconds: number;
}

export const SESSION_STATES = [
  'idle',
  'connecting',
  'recording',
  'paused',
  'stopping',
  'stopped',
  'error'
] as const;

export type SessionState = typeof SESSION_STATES[number];

export type StopReason = 'user' | 'time-limit' | 'device-lost' | 'error';

export interface Session {
  id: string;
  state: SessionState;
  startTime: number;
  accumulatedPauseDuration: number;
  timeLimitSeconds: number;
  lastActivityTime: number;
}

/** A segment as returned by the recognizer, relative to its chunk */
export interface RecognizedSegment {
  speakerId?: string;
  text: string;
  offsetSeconds: number;
  durationSeconds: number;
  confidence?: number;
}

export interface SegmentSource {
  epoch: number;
  sequence: number;
}

export interface IncomingSegment {
  speakerId: string;
  text: string;
  offsetSeconds: number;
  durationSeconds: number;
  confidence?: number;
  clientTimestamp: number;
  source: SegmentSource;
}

export interface TranscriptSegment {
  readonly speakerId: string;
  readonly displayLabel: string;
  readonly colorToken: string;
  readonly text: string;
  readonly offsetSeconds: number;
  readonly durationSeconds: number;
  readonly confidence?: number;
  readonly clientTimestamp: number;
  readonly arrivalIndex: number;
  readonly source: SegmentSource;
}

export interface SpeakerEntry {
  speakerId: string;
  displayLabel: string;
  colorToken: string;
}

export type LevelClassification = 'TooLow' | 'Optimal' | 'TooHigh';

export interface AudioLevelSample {
  rms: number;
  peak: number;
  classification: LevelClassification;
  timestamp: number;
}

export type AuthMethod = 'subscription_key' | 'token' | 'none';

export interface TokenResponse {
  success: boolean;
  token?: string;
  key?: string;
  region?: string;
  expiry?: number;
  authMethod: AuthMethod;
  mockMode?: boolean;
  error?: string;
}

export interface Credential {
  authMethod: AuthMethod;
  secret?: string;
  region?: string;
  expiry?: number;
}

export interface SessionSummary {
  id: string;
  startTime: string;
  endTime: string;
  durationSeconds: number;
  speakerCount: number;
  stopReason: StopReason;
  segments: TranscriptSegment[];
}

export interface SessionSnapshot {
  sessionId: string | null;
  state: SessionState;
  elapsedSeconds: number;
  remainingSeconds: number;
  timeLimitSeconds: number;
  error: string | null;
  transientIssue: string | null;
  chunksDispatched: number;
  chunksFailed: number;
}
