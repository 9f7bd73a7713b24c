import { AudioChunk, Credential, RecognizedSegment } from '../types/index.js';
import { isRecord, readNumber, readString } from '../utils/json.js';

export interface RecognizeOptions {
  signal: AbortSignal;
  credential: Credential | null;
}

/**
 * Remote recognizer taking one chunk per request
 */
export interface SpeechRecognitionService {
  recognize(chunk: AudioChunk, options: RecognizeOptions): Promise<RecognizedSegment[]>;
}

/**
 * Parse the `{ results, chunk_info }` body of POST /live/transcribe
 */
export function parseRecognitionResponse(body: unknown): RecognizedSegment[] {
  const results = isRecord(body) ? body.results : undefined;
  if (!Array.isArray(results)) {
    throw new Error('Malformed recognition response: missing results');
  }

  return results.map((item: unknown, index: number): RecognizedSegment => {
    if (!isRecord(item)) {
      throw new Error(`Malformed recognition result at index ${index}`);
    }
    const text = readString(item, 'text');
    const offset = readNumber(item, 'offset');
    if (text === undefined || offset === undefined) {
      throw new Error(`Recognition result ${index} is missing text or offset`);
    }
    return {
      speakerId: readString(item, 'speaker'),
      text,
      offsetSeconds: offset,
      durationSeconds: readNumber(item, 'duration') ?? 0,
      confidence: readNumber(item, 'confidence')
    };
  });
}

export class HttpRecognitionClient implements SpeechRecognitionService {
  constructor(private readonly baseUrl: string) {}

  async recognize(chunk: AudioChunk, options: RecognizeOptions): Promise<RecognizedSegment[]> {
    const form = new FormData();
    form.append('audio_file', new Blob([chunk.payload], { type: chunk.encoding }), `chunk-${chunk.sequence}.wav`);
    form.append('session_id', chunk.sessionId);
    form.append('sequence', chunk.sequence.toString());
    form.append('offset', chunk.offsetSeconds.toString());

    const headers: Record<string, string> = {};
    if (options.credential?.secret) {
      headers.Authorization = `Bearer ${options.credential.secret}`;
    }
    if (options.credential?.region) {
      headers['X-Speech-Region'] = options.credential.region;
    }

    const response = await fetch(`${this.baseUrl}/live/transcribe`, {
      method: 'POST',
      body: form,
      headers,
      signal: options.signal
    });

    if (!response.ok) {
      throw new Error(`Server responded with ${response.status}`);
    }

    const body: unknown = await response.json();
    return parseRecognitionResponse(body);
  }
}
