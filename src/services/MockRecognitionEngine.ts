import { hashSpeakerIndex, MOCK_SPEAKER_COUNT } from './SpeakerAssigner.js';

/** One result row of POST /live/transcribe */
export interface LiveTranscriptionResult {
  speaker: string;
  text: string;
  offset: number;
  duration: number;
  timestamp: number;
  confidence: number;
}

export interface LiveTranscriptionResponse {
  results: LiveTranscriptionResult[];
  chunk_info: {
    size_bytes: number;
    processed_at: number;
    segments_generated: number;
    service: string;
  };
}

/**
 * Server-side recognizer behind the /live routes
 */
export interface RecognitionEngine {
  readonly name: string;
  transcribe(audio: Uint8Array, sessionId: string): Promise<LiveTranscriptionResponse>;
}

const SPEAKER_SAMPLE_BYTES = 100;
const SEGMENT_SECONDS = 2.0;
const TWO_SEGMENT_THRESHOLD_BYTES = 50000;

/**
 * Deterministic recognizer used when no speech service is configured.
 * The same payload always yields the same speaker and text.
 */
export class MockRecognitionEngine implements RecognitionEngine {
  readonly name = 'Mock Service (Fallback)';

  constructor(private readonly clock: () => number = Date.now) {}

  async transcribe(audio: Uint8Array, sessionId: string): Promise<LiveTranscriptionResponse> {
    const size = audio.byteLength;
    const speakerIndex = hashSpeakerIndex(audio.subarray(0, SPEAKER_SAMPLE_BYTES), MOCK_SPEAKER_COUNT);
    const segmentCount = size < TWO_SEGMENT_THRESHOLD_BYTES ? 1 : 2;
    const now = this.clock() / 1000;

    const results: LiveTranscriptionResult[] = [];
    for (let i = 0; i < segmentCount; i++) {
      results.push({
        speaker: `speaker-${speakerIndex}`,
        text: `[MOCK] Simulated transcript of audio segment ${i + 1}. Size: ${size} bytes.`,
        offset: i * SEGMENT_SECONDS,
        duration: SEGMENT_SECONDS,
        timestamp: now + i * SEGMENT_SECONDS,
        confidence: 0.85 + (size % 100) / 1000
      });
    }

    console.log(`Generated mock transcription for ${sessionId}: ${results.length} segments`);

    return {
      results,
      chunk_info: {
        size_bytes: size,
        processed_at: now,
        segments_generated: results.length,
        service: this.name
      }
    };
  }
}
