import path from 'path';

export type SpeakerAssignmentMode = 'diarization' | 'hash';

export interface LevelThresholds {
  tooLow: number;
  tooHigh: number;
}

export interface EngineConfig {
  port: number;
  baseUrl: string;
  dataDir: string;
  timeLimitSeconds: number;
  tickIntervalMs: number;
  chunkIntervalMs: number;
  maxBufferedFrames: number;
  dispatchTimeoutMs: number;
  speakerAssignment: SpeakerAssignmentMode;
  allowMockFallback: boolean;
  audioDevice: string;
  levelWindowMs: number;
  levelRefreshMs: number;
  levelThresholds: LevelThresholds;
  speechKey?: string;
  speechRegion: string;
}

// One dispatch per 8 s of captured audio; captions trail speech by about that much.
export const DEFAULT_CONFIG: EngineConfig = {
  port: 3001,
  baseUrl: 'http://localhost:3001',
  dataDir: './data',
  timeLimitSeconds: 3600,
  tickIntervalMs: 1000,
  chunkIntervalMs: 8000,
  maxBufferedFrames: 200,
  dispatchTimeoutMs: 15000,
  speakerAssignment: 'diarization',
  allowMockFallback: true,
  audioDevice: 'default',
  levelWindowMs: 300,
  levelRefreshMs: 100,
  levelThresholds: {
    tooLow: 0.05,
    tooHigh: 0.85
  },
  speechRegion: 'westeurope'
};

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`${name} must be a boolean, got "${raw}"`);
}

function readSpeakerAssignment(env: NodeJS.ProcessEnv): SpeakerAssignmentMode {
  const raw = env.CAPTION_SPEAKER_ASSIGNMENT?.trim();
  if (!raw) {
    return DEFAULT_CONFIG.speakerAssignment;
  }
  if (raw === 'diarization' || raw === 'hash') {
    return raw;
  }
  throw new Error(`CAPTION_SPEAKER_ASSIGNMENT must be "diarization" or "hash", got "${raw}"`);
}

/**
 * Build the engine configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const port = readNumber(env, 'PORT', DEFAULT_CONFIG.port);

  return {
    ...DEFAULT_CONFIG,
    port,
    baseUrl: env.CAPTION_BASE_URL?.trim() || `http://localhost:${port}`,
    dataDir: path.resolve(env.CAPTION_DATA_DIR?.trim() || DEFAULT_CONFIG.dataDir),
    timeLimitSeconds: readNumber(env, 'CAPTION_TIME_LIMIT_SECONDS', DEFAULT_CONFIG.timeLimitSeconds),
    chunkIntervalMs: readNumber(env, 'CAPTION_CHUNK_INTERVAL_MS', DEFAULT_CONFIG.chunkIntervalMs),
    maxBufferedFrames: readNumber(env, 'CAPTION_MAX_BUFFERED_FRAMES', DEFAULT_CONFIG.maxBufferedFrames),
    dispatchTimeoutMs: readNumber(env, 'CAPTION_DISPATCH_TIMEOUT_MS', DEFAULT_CONFIG.dispatchTimeoutMs),
    speakerAssignment: readSpeakerAssignment(env),
    allowMockFallback: readBoolean(env, 'CAPTION_ALLOW_MOCK', DEFAULT_CONFIG.allowMockFallback),
    audioDevice: env.CAPTION_AUDIO_DEVICE?.trim() || DEFAULT_CONFIG.audioDevice,
    speechKey: env.SPEECH_KEY?.trim() || undefined,
    speechRegion: env.SPEECH_REGION?.trim() || DEFAULT_CONFIG.speechRegion
  };
}
