import fs from 'fs';
import path from 'path';
import { SessionSummary, StopReason, TranscriptSegment } from '../types/index.js';
import { describeError } from '../types/errors.js';
import { JsonRecord, isRecord, readNumber, readString } from '../utils/json.js';

/**
 * Receives finished sessions. Callers do not wait on it.
 */
export interface HistoryStore {
  save(summary: SessionSummary): Promise<void>;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const STOP_REASONS: readonly StopReason[] = ['user', 'time-limit', 'device-lost', 'error'];

function parseSegment(value: unknown, index: number): TranscriptSegment {
  if (!isRecord(value)) {
    throw new Error(`Segment ${index} is not an object`);
  }
  const rawSource = value.source;
  const source: JsonRecord = isRecord(rawSource) ? rawSource : {};
  const speakerId = readString(value, 'speakerId');
  const text = readString(value, 'text');
  const offsetSeconds = readNumber(value, 'offsetSeconds');
  if (speakerId === undefined || text === undefined || offsetSeconds === undefined) {
    throw new Error(`Segment ${index} is missing speakerId, text or offsetSeconds`);
  }
  return {
    speakerId,
    displayLabel: readString(value, 'displayLabel') ?? speakerId,
    colorToken: readString(value, 'colorToken') ?? 'gray',
    text,
    offsetSeconds,
    durationSeconds: readNumber(value, 'durationSeconds') ?? 0,
    confidence: readNumber(value, 'confidence'),
    clientTimestamp: readNumber(value, 'clientTimestamp') ?? 0,
    arrivalIndex: readNumber(value, 'arrivalIndex') ?? index,
    source: {
      epoch: readNumber(source, 'epoch') ?? 0,
      sequence: readNumber(source, 'sequence') ?? 0
    }
  };
}

function readStopReason(record: JsonRecord): StopReason {
  const raw = readString(record, 'stopReason');
  return STOP_REASONS.find((reason) => reason === raw) ?? 'user';
}

/**
 * Validate a stored session summary
 */
export function parseSessionSummary(value: unknown): SessionSummary {
  if (!isRecord(value)) {
    throw new Error('Session summary is not an object');
  }
  const id = readString(value, 'id');
  const startTime = readString(value, 'startTime');
  const endTime = readString(value, 'endTime');
  const rawSegments = value.segments;
  if (!id || !startTime || !endTime || !Array.isArray(rawSegments)) {
    throw new Error('Session summary is missing id, startTime, endTime or segments');
  }
  const segments = rawSegments.map((segment: unknown, index: number) => parseSegment(segment, index));
  return {
    id,
    startTime,
    endTime,
    durationSeconds: readNumber(value, 'durationSeconds') ?? 0,
    speakerCount: readNumber(value, 'speakerCount') ?? new Set(segments.map((segment) => segment.speakerId)).size,
    stopReason: readStopReason(value),
    segments
  };
}

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}

/**
 * Session summaries as JSON files under `<dataDir>/sessions`
 */
export class FileHistoryStore implements HistoryStore {
  private readonly sessionsDir: string;

  constructor(dataDir: string = './data') {
    this.sessionsDir = path.join(dataDir, 'sessions');
  }

  private ensureSessionsDir(): void {
    if (!fs.existsSync(this.sessionsDir)) {
      fs.mkdirSync(this.sessionsDir, { recursive: true });
    }
  }

  private sessionFile(sessionId: string): string {
    if (!isValidSessionId(sessionId)) {
      throw new Error(`Invalid session id: ${sessionId}`);
    }
    return path.join(this.sessionsDir, `${sessionId}.json`);
  }

  /**
   * Save session summary to JSON file
   */
  async save(summary: SessionSummary): Promise<void> {
    const sessionFile = this.sessionFile(summary.id);
    this.ensureSessionsDir();
    fs.writeFileSync(sessionFile, JSON.stringify(summary, null, 2));
    console.log(`Saved session ${summary.id} (${summary.segments.length} segments) to ${sessionFile}`);
  }

  /**
   * Load session summary from JSON file
   */
  async load(sessionId: string): Promise<SessionSummary | null> {
    if (!isValidSessionId(sessionId)) {
      return null;
    }
    const sessionFile = this.sessionFile(sessionId);
    if (!fs.existsSync(sessionFile)) {
      return null;
    }

    try {
      const data: unknown = JSON.parse(fs.readFileSync(sessionFile, 'utf-8'));
      return parseSessionSummary(data);
    } catch (error) {
      console.error(`Failed to load session ${sessionId}:`, describeError(error));
      return null;
    }
  }

  /**
   * All stored sessions, newest first
   */
  async list(): Promise<SessionSummary[]> {
    if (!fs.existsSync(this.sessionsDir)) {
      return [];
    }

    const summaries: SessionSummary[] = [];
    for (const file of fs.readdirSync(this.sessionsDir)) {
      if (!file.endsWith('.json')) {
        continue;
      }
      const summary = await this.load(path.basename(file, '.json'));
      if (summary) {
        summaries.push(summary);
      }
    }
    return summaries.sort((a, b) => b.startTime.localeCompare(a.startTime));
  }
}
