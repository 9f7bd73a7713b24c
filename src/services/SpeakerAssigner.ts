import { createHash } from 'crypto';
import { AudioChunk, RecognizedSegment } from '../types/index.js';
import { SpeakerAssignmentMode } from '../config.js';

export const UNKNOWN_SPEAKER_ID = 'unknown';
export const MOCK_SPEAKER_COUNT = 3;

/**
 * Resolves which anonymous speaker a recognized segment belongs to
 */
export interface SpeakerAssigner {
  readonly mode: SpeakerAssignmentMode;
  assign(segment: RecognizedSegment, chunk: AudioChunk): string;
}

/**
 * Deterministic 1-based bucket for a byte sequence
 */
export function hashSpeakerIndex(bytes: Uint8Array, speakerCount: number = MOCK_SPEAKER_COUNT): number {
  const digest = createHash('sha1').update(bytes).digest();
  return (digest.readUInt32BE(0) % speakerCount) + 1;
}

/**
 * Trusts the speaker ids produced by the recognition engine
 */
export class DiarizationSpeakerAssigner implements SpeakerAssigner {
  readonly mode = 'diarization' as const;

  assign(segment: RecognizedSegment): string {
    const speakerId = segment.speakerId?.trim();
    return speakerId ? speakerId : UNKNOWN_SPEAKER_ID;
  }
}

/**
 * Stand-in for a diarization engine: every segment of a chunk goes to the
 * speaker picked by hashing the chunk payload.
 */
export class HashSpeakerAssigner implements SpeakerAssigner {
  readonly mode = 'hash' as const;

  constructor(private readonly speakerCount: number = MOCK_SPEAKER_COUNT) {
    if (!Number.isInteger(speakerCount) || speakerCount < 1) {
      throw new Error(`speakerCount must be a positive integer, got ${speakerCount}`);
    }
  }

  assign(_segment: RecognizedSegment, chunk: AudioChunk): string {
    return `mock-${hashSpeakerIndex(chunk.payload, this.speakerCount)}`;
  }
}

export function createSpeakerAssigner(mode: SpeakerAssignmentMode): SpeakerAssigner {
  switch (mode) {
    case 'hash':
      return new HashSpeakerAssigner();
    case 'diarization':
      return new DiarizationSpeakerAssigner();
  }
}
