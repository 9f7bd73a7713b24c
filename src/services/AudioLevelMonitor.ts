import { BehaviorSubject, Observable } from 'rxjs';
import { AudioFormat, AudioFrame, AudioLevelSample, LevelClassification } from '../types/index.js';
import { DEFAULT_CONFIG, LevelThresholds } from '../config.js';
import { CaptureLease } from './AudioCaptureController.js';

export interface AudioLevelMonitorOptions {
  windowMs?: number;
  refreshMs?: number;
  thresholds?: LevelThresholds;
  clock?: () => number;
}

interface FrameStats {
  sumSquares: number;
  peak: number;
  samples: number;
}

export function classifyLevel(rms: number, thresholds: LevelThresholds = DEFAULT_CONFIG.levelThresholds): LevelClassification {
  if (rms < thresholds.tooLow) return 'TooLow';
  if (rms > thresholds.tooHigh) return 'TooHigh';
  return 'Optimal';
}

/**
 * Sum of squares and peak of a PCM16 buffer, normalized to [-1, 1]
 */
export function measureFrame(data: Buffer): FrameStats {
  const samples = Math.floor(data.length / 2);
  let sumSquares = 0;
  let peak = 0;

  for (let i = 0; i < samples; i++) {
    const normalized = data.readInt16LE(i * 2) / 32768;
    sumSquares += normalized * normalized;
    peak = Math.max(peak, Math.abs(normalized));
  }

  return { sumSquares, peak, samples };
}

/**
 * Sliding-window loudness meter. Runs on its own capture lease, so it keeps
 * reporting while the session is paused.
 */
export class AudioLevelMonitor {
  private readonly windowMs: number;
  private readonly refreshMs: number;
  private readonly thresholds: LevelThresholds;
  private readonly clock: () => number;

  private readonly window: FrameStats[] = [];
  private windowSamples = 0;
  private windowCapacity = 0;
  private lease: CaptureLease | null = null;
  private unsubscribe: (() => void) | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  // Trailing byte of a sample split across device reads
  private carry: Buffer | null = null;

  private readonly _level$ = new BehaviorSubject<AudioLevelSample | null>(null);
  readonly level$: Observable<AudioLevelSample | null> = this._level$.asObservable();

  constructor(options: AudioLevelMonitorOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_CONFIG.levelWindowMs;
    this.refreshMs = options.refreshMs ?? DEFAULT_CONFIG.levelRefreshMs;
    this.thresholds = options.thresholds ?? DEFAULT_CONFIG.levelThresholds;
    this.clock = options.clock ?? Date.now;
  }

  isRunning(): boolean {
    return this.lease !== null;
  }

  get latest(): AudioLevelSample | null {
    return this._level$.value;
  }

  /**
   * Start metering frames from the given lease. The monitor owns the lease
   * from here on and releases it on stop.
   */
  start(lease: CaptureLease): void {
    if (this.lease) {
      console.warn('Audio level monitor is already running');
      return;
    }

    this.lease = lease;
    this.windowCapacity = this.capacityFor(lease.format);
    this.unsubscribe = lease.onFrame((frame) => this.ingest(frame));
    this.refreshTimer = setInterval(() => this.refresh(), this.refreshMs);
    console.log('Audio level monitoring started');
  }

  async stop(): Promise<void> {
    if (!this.lease) {
      return;
    }

    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.window.length = 0;
    this.windowSamples = 0;
    this.carry = null;
    this._level$.next(null);

    const lease = this.lease;
    this.lease = null;
    await lease.release();
    console.log('Audio level monitoring stopped');
  }

  /**
   * Current level over the window, or null before any audio arrived
   */
  sample(): AudioLevelSample | null {
    if (this.windowSamples === 0) {
      return null;
    }

    let sumSquares = 0;
    let peak = 0;
    for (const stats of this.window) {
      sumSquares += stats.sumSquares;
      peak = Math.max(peak, stats.peak);
    }

    const rms = Math.min(1, Math.sqrt(sumSquares / this.windowSamples));
    return {
      rms,
      peak: Math.min(1, peak),
      classification: classifyLevel(rms, this.thresholds),
      timestamp: this.clock()
    };
  }

  private ingest(frame: AudioFrame): void {
    const data = this.carry ? Buffer.concat([this.carry, frame.data]) : frame.data;
    const usable = data.length - (data.length % 2);
    this.carry = usable < data.length ? Buffer.from(data.subarray(usable)) : null;

    const stats = measureFrame(data.subarray(0, usable));
    if (stats.samples === 0) {
      return;
    }

    this.window.push(stats);
    this.windowSamples += stats.samples;

    // Drop whole frames from the front while the rest still fills the window
    while (this.window.length > 1 && this.windowSamples - this.window[0].samples >= this.windowCapacity) {
      const dropped = this.window.shift();
      if (dropped) {
        this.windowSamples -= dropped.samples;
      }
    }
  }

  private refresh(): void {
    const sample = this.sample();
    if (sample) {
      this._level$.next(sample);
    }
  }

  private capacityFor(format: AudioFormat): number {
    return Math.max(1, Math.round((this.windowMs / 1000) * format.sampleRate * format.channels));
  }
}
