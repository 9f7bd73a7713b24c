import { Observable, Subject, map, startWith } from 'rxjs';
import { IncomingSegment, SpeakerEntry, TranscriptSegment } from '../types/index.js';
import { SpeakerRegistry } from './SpeakerRegistry.js';

function segmentIdentity(segment: IncomingSegment): string {
  const { epoch, sequence } = segment.source;
  return `${epoch}:${sequence}:${segment.offsetSeconds.toFixed(3)}:${segment.durationSeconds.toFixed(3)}`;
}

/**
 * Owns the ordered transcript of the current session. Segments are kept
 * sorted by speech offset, ties broken by arrival order.
 */
export class TranscriptAggregator {
  private readonly registry: SpeakerRegistry;
  private readonly seen = new Set<string>();
  private ordered: TranscriptSegment[] = [];
  private arrivals = 0;

  private readonly _changed$ = new Subject<void>();

  /**
   * Current transcript on subscribe, then after every change. The copy is
   * taken per subscriber, so appending with nobody listening stays O(1).
   */
  readonly transcript$: Observable<TranscriptSegment[]> = this._changed$.pipe(
    startWith(undefined),
    map(() => this.segments())
  );

  constructor(registry: SpeakerRegistry = new SpeakerRegistry()) {
    this.registry = registry;
  }

  /**
   * Append a final result. Returns null when the same result was already
   * appended (redelivery of a chunk response).
   */
  append(segment: IncomingSegment): TranscriptSegment | null {
    const identity = segmentIdentity(segment);
    if (this.seen.has(identity)) {
      console.log(`Skipping duplicate segment ${identity}`);
      return null;
    }
    this.seen.add(identity);

    const speaker = this.registry.getOrCreate(segment.speakerId);
    const finalized: TranscriptSegment = Object.freeze({
      speakerId: speaker.speakerId,
      displayLabel: speaker.displayLabel,
      colorToken: speaker.colorToken,
      text: segment.text,
      offsetSeconds: segment.offsetSeconds,
      durationSeconds: segment.durationSeconds,
      confidence: segment.confidence,
      clientTimestamp: segment.clientTimestamp,
      arrivalIndex: this.arrivals++,
      source: Object.freeze({ ...segment.source })
    });

    // In-order arrival lands at the end without scanning
    let index = this.ordered.length;
    while (index > 0 && this.ordered[index - 1].offsetSeconds > finalized.offsetSeconds) {
      index--;
    }
    this.ordered.splice(index, 0, finalized);

    this._changed$.next();
    return finalized;
  }

  segments(): TranscriptSegment[] {
    return this.ordered.slice();
  }

  get size(): number {
    return this.ordered.length;
  }

  get speakerCount(): number {
    return this.registry.speakerCount;
  }

  speakers(): SpeakerEntry[] {
    return this.registry.list();
  }

  clear(): void {
    this.seen.clear();
    this.ordered = [];
    this.arrivals = 0;
    this.registry.clear();
    this._changed$.next();
  }
}
