import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AudioChunk, RecognizedSegment } from '../types/index.js';
import { ScriptedRecognizer } from '../testing/fakes.js';
import { RecognitionPipeline } from './RecognitionPipeline.js';
import { DiarizationSpeakerAssigner } from './SpeakerAssigner.js';
import { TranscriptAggregator } from './TranscriptAggregator.js';

function chunk(sequence: number, offsetSeconds: number): AudioChunk {
  return {
    sessionId: 'session_a',
    sequence,
    payload: new Uint8Array([sequence]),
    capturedAt: 0,
    encoding: 'audio/wav',
    offsetSeconds,
    durationSeconds: 8
  };
}

const credential = { authMethod: 'subscription_key' as const, secret: 'test-secret' };

describe('RecognitionPipeline', () => {
  let aggregator: TranscriptAggregator;

  function createPipeline(recognizer: ScriptedRecognizer, dispatchTimeoutMs = 15000): RecognitionPipeline {
    return new RecognitionPipeline({
      recognizer,
      aggregator,
      speakerAssigner: new DiarizationSpeakerAssigner(),
      dispatchTimeoutMs,
      clock: () => 1700000000000
    });
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    aggregator = new TranscriptAggregator();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should rebase segment offsets onto the session timeline', async () => {
    const recognizer = new ScriptedRecognizer(async (): Promise<RecognizedSegment[]> => [
      { speakerId: 'spk-1', text: 'good morning', offsetSeconds: 1.5, durationSeconds: 2 },
      { speakerId: 'spk-1', text: '   ', offsetSeconds: 4, durationSeconds: 1 }
    ]);
    const pipeline = createPipeline(recognizer);
    pipeline.openChannel(credential);

    pipeline.dispatch(chunk(3, 16));
    await pipeline.drain();

    expect(aggregator.segments()).toEqual([
      {
        speakerId: 'spk-1',
        displayLabel: 'Speaker 1',
        colorToken: 'blue',
        text: 'good morning',
        offsetSeconds: 17.5,
        durationSeconds: 2,
        confidence: undefined,
        clientTimestamp: 1700000000000,
        arrivalIndex: 0,
        source: { epoch: 1, sequence: 3 }
      }
    ]);
    expect(recognizer.calls[0].options.credential).toBe(credential);
  });

  it('should drop chunks while the channel is closed', () => {
    const recognizer = new ScriptedRecognizer();
    const pipeline = createPipeline(recognizer);

    pipeline.dispatch(chunk(1, 0));

    expect(recognizer.calls).toHaveLength(0);
    expect(pipeline.getStats().dispatched).toBe(0);
  });

  it('should start a new epoch on every open', () => {
    const pipeline = createPipeline(new ScriptedRecognizer());

    expect(pipeline.openChannel(null)).toBe(1);
    pipeline.closeChannel();
    expect(pipeline.isOpen()).toBe(false);
    expect(pipeline.openChannel(null)).toBe(2);
    expect(pipeline.currentEpoch).toBe(2);
  });

  it('should keep results of requests that finish after the channel closed', async () => {
    let finish: (segments: RecognizedSegment[]) => void = () => {};
    const recognizer = new ScriptedRecognizer(() => new Promise((resolve) => {
      finish = resolve;
    }));
    const pipeline = createPipeline(recognizer);
    pipeline.openChannel(null);

    pipeline.dispatch(chunk(1, 0));
    pipeline.closeChannel();
    finish([{ speakerId: 'spk-1', text: 'late result', offsetSeconds: 0, durationSeconds: 1 }]);
    await pipeline.drain();

    expect(aggregator.segments().map((segment) => segment.text)).toEqual(['late result']);
  });

  it('should time out a slow chunk without holding up the next one', async () => {
    vi.useFakeTimers();
    const recognizer = new ScriptedRecognizer((_chunk, _options, call) => call === 1
      ? new Promise<RecognizedSegment[]>(() => {})
      : Promise.resolve([{ speakerId: 'spk-1', text: 'second chunk', offsetSeconds: 0, durationSeconds: 1 }]));
    const pipeline = createPipeline(recognizer, 5000);
    pipeline.openChannel(null);

    pipeline.dispatch(chunk(1, 0));
    pipeline.dispatch(chunk(2, 8));
    await vi.advanceTimersByTimeAsync(0);

    expect(aggregator.segments().map((segment) => segment.text)).toEqual(['second chunk']);
    expect(pipeline.getStats()).toEqual({ dispatched: 2, succeeded: 1, failed: 0, inFlight: 1 });

    await vi.advanceTimersByTimeAsync(5000);

    expect(pipeline.getStats()).toEqual({ dispatched: 2, succeeded: 1, failed: 1, inFlight: 0 });
    expect(pipeline.issue).toBe('Chunk 1 timed out after 5000 ms');
    expect(recognizer.calls[0].options.signal.aborted).toBe(true);
  });

  it('should report a failure and clear it on the next success', async () => {
    const recognizer = new ScriptedRecognizer(async (_chunk, _options, call) => {
      if (call === 1) {
        throw new Error('Server responded with 500');
      }
      return [];
    });
    const pipeline = createPipeline(recognizer);
    const issues: Array<string | null> = [];
    pipeline.issue$.subscribe((issue) => issues.push(issue));
    pipeline.openChannel(null);

    await pipeline.dispatchFinal(chunk(1, 0));
    await pipeline.dispatchFinal(chunk(2, 8));

    expect(issues).toEqual([null, 'Server responded with 500', null]);
    expect(pipeline.getStats().failed).toBe(1);
  });

  it('should send the final chunk even when the channel is closed', async () => {
    const recognizer = new ScriptedRecognizer(async () => [
      { speakerId: 'spk-1', text: 'last words', offsetSeconds: 0, durationSeconds: 1 }
    ]);
    const pipeline = createPipeline(recognizer);

    await pipeline.dispatchFinal(chunk(4, 24));

    expect(aggregator.segments()[0].offsetSeconds).toBe(24);
  });

  it('should skip a result redelivered for the same chunk', async () => {
    const recognizer = new ScriptedRecognizer(async () => [
      { speakerId: 'spk-1', text: 'once', offsetSeconds: 0, durationSeconds: 1 }
    ]);
    const pipeline = createPipeline(recognizer);
    pipeline.openChannel(null);

    await pipeline.dispatchFinal(chunk(1, 0));
    await pipeline.dispatchFinal(chunk(1, 0));

    expect(aggregator.size).toBe(1);
  });
});
