import { BehaviorSubject, Observable } from 'rxjs';
import { AudioChunk, Credential, RecognizedSegment } from '../types/index.js';
import { TransientDispatchError, describeError } from '../types/errors.js';
import { DEFAULT_CONFIG } from '../config.js';
import { SpeechRecognitionService } from './HttpRecognitionClient.js';
import { SpeakerAssigner } from './SpeakerAssigner.js';
import { TranscriptAggregator } from './TranscriptAggregator.js';

export interface RecognitionPipelineOptions {
  recognizer: SpeechRecognitionService;
  aggregator: TranscriptAggregator;
  speakerAssigner: SpeakerAssigner;
  dispatchTimeoutMs?: number;
  clock?: () => number;
}

export interface DispatchStats {
  dispatched: number;
  succeeded: number;
  failed: number;
  inFlight: number;
}

function roundSeconds(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Sends chunks to the recognizer and feeds final results to the aggregator.
 * A failed or timed-out chunk is logged and counted; it never holds up the
 * chunks after it.
 *
 * Each open/close of the channel is one epoch. Results of requests still in
 * flight when the channel closes are kept.
 */
export class RecognitionPipeline {
  private readonly recognizer: SpeechRecognitionService;
  private readonly aggregator: TranscriptAggregator;
  private readonly speakerAssigner: SpeakerAssigner;
  private readonly dispatchTimeoutMs: number;
  private readonly clock: () => number;

  private epoch = 0;
  private channelOpen = false;
  private credential: Credential | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly stats: DispatchStats = { dispatched: 0, succeeded: 0, failed: 0, inFlight: 0 };

  private readonly _issue$ = new BehaviorSubject<string | null>(null);
  /** Transient dispatch problem, cleared by the next successful chunk */
  readonly issue$: Observable<string | null> = this._issue$.asObservable();

  constructor(options: RecognitionPipelineOptions) {
    this.recognizer = options.recognizer;
    this.aggregator = options.aggregator;
    this.speakerAssigner = options.speakerAssigner;
    this.dispatchTimeoutMs = options.dispatchTimeoutMs ?? DEFAULT_CONFIG.dispatchTimeoutMs;
    this.clock = options.clock ?? Date.now;
  }

  get currentEpoch(): number {
    return this.epoch;
  }

  isOpen(): boolean {
    return this.channelOpen;
  }

  get issue(): string | null {
    return this._issue$.value;
  }

  getStats(): DispatchStats {
    return { ...this.stats, inFlight: this.inFlight.size };
  }

  openChannel(credential: Credential | null): number {
    if (this.channelOpen) {
      this.closeChannel();
    }
    this.epoch += 1;
    this.credential = credential;
    this.channelOpen = true;
    console.log(`Recognition channel ${this.epoch} opened (${this.speakerAssigner.mode} speakers)`);
    return this.epoch;
  }

  closeChannel(): void {
    if (!this.channelOpen) {
      return;
    }
    this.channelOpen = false;
    console.log(`Recognition channel ${this.epoch} closed with ${this.inFlight.size} request(s) in flight`);
  }

  /**
   * Fire-and-forget dispatch on the open channel
   */
  dispatch(chunk: AudioChunk): void {
    if (!this.channelOpen) {
      console.warn(`Dropping chunk ${chunk.sequence}: recognition channel is closed`);
      return;
    }
    this.track(chunk);
  }

  /**
   * Dispatch and wait for the result, bounded by the dispatch timeout. Used
   * for the last chunk of a session, whether or not the channel is open.
   */
  async dispatchFinal(chunk: AudioChunk): Promise<void> {
    await this.track(chunk);
  }

  /**
   * Wait for every request currently in flight
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.inFlight));
  }

  private track(chunk: AudioChunk): Promise<void> {
    const task = this.run(chunk, this.epoch, this.credential).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
    return task;
  }

  private async run(chunk: AudioChunk, epoch: number, credential: Credential | null): Promise<void> {
    this.stats.dispatched += 1;
    try {
      const segments = await this.recognizeWithTimeout(chunk, credential);
      const appended = this.appendResults(chunk, epoch, segments);
      this.stats.succeeded += 1;
      this._issue$.next(null);
      console.log(`Chunk ${chunk.sequence}: ${appended} segment(s) from ${segments.length} result(s)`);
    } catch (error) {
      this.stats.failed += 1;
      const message = describeError(error);
      this._issue$.next(message);
      console.error(`Failed to process chunk ${chunk.sequence}:`, message);
      console.log('Continuing recording despite chunk processing error');
    }
  }

  private async recognizeWithTimeout(chunk: AudioChunk, credential: Credential | null): Promise<RecognizedSegment[]> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TransientDispatchError(chunk.sequence, `Chunk ${chunk.sequence} timed out after ${this.dispatchTimeoutMs} ms`));
      }, this.dispatchTimeoutMs);
    });

    try {
      return await Promise.race([
        this.recognizer.recognize(chunk, { signal: controller.signal, credential }),
        timeout
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private appendResults(chunk: AudioChunk, epoch: number, segments: RecognizedSegment[]): number {
    let appended = 0;
    for (const segment of segments) {
      const text = segment.text.trim();
      if (!text) {
        continue;
      }

      const result = this.aggregator.append({
        speakerId: this.speakerAssigner.assign(segment, chunk),
        text,
        offsetSeconds: roundSeconds(chunk.offsetSeconds + segment.offsetSeconds),
        durationSeconds: roundSeconds(segment.durationSeconds),
        confidence: segment.confidence,
        clientTimestamp: this.clock(),
        source: { epoch, sequence: chunk.sequence }
      });
      if (result) {
        appended += 1;
      }
    }
    return appended;
  }
}
