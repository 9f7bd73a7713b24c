import { AudioFormat, AudioFrame, DEFAULT_AUDIO_FORMAT } from '../types/index.js';
import { describeError } from '../types/errors.js';

export type FrameListener = (frame: AudioFrame) => void;
export type DeviceErrorListener = (error: Error) => void;

/**
 * An open microphone producing raw PCM. Chunks are buffered until a data
 * listener is attached.
 */
export interface DeviceStream {
  onData(listener: (chunk: Buffer) => void): void;
  onError(listener: DeviceErrorListener): void;
  close(): Promise<void>;
}

export interface MicrophoneDevice {
  open(format: AudioFormat): Promise<DeviceStream>;
}

export interface CaptureLease {
  readonly format: AudioFormat;
  readonly released: boolean;
  onFrame(listener: FrameListener): () => void;
  onError(listener: DeviceErrorListener): () => void;
  release(): Promise<void>;
}

export interface AudioCaptureOptions {
  format?: AudioFormat;
  clock?: () => number;
}

class Lease implements CaptureLease {
  private readonly frameListeners = new Set<FrameListener>();
  private readonly errorListeners = new Set<DeviceErrorListener>();
  private isReleased = false;

  constructor(
    private readonly owner: AudioCaptureController,
    readonly format: AudioFormat
  ) {}

  get released(): boolean {
    return this.isReleased;
  }

  onFrame(listener: FrameListener): () => void {
    this.frameListeners.add(listener);
    return () => {
      this.frameListeners.delete(listener);
    };
  }

  onError(listener: DeviceErrorListener): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  deliver(frame: AudioFrame): void {
    for (const listener of this.frameListeners) {
      listener(frame);
    }
  }

  fail(error: Error): void {
    for (const listener of this.errorListeners) {
      listener(error);
    }
  }

  async release(): Promise<void> {
    if (this.isReleased) {
      return;
    }
    this.isReleased = true;
    this.frameListeners.clear();
    this.errorListeners.clear();
    await this.owner.detach(this);
  }
}

/**
 * Single owner of the microphone. Every reader gets a lease on the same open
 * stream; frames are fanned out by reference, never copied. The device is
 * closed when the last lease is released.
 */
export class AudioCaptureController {
  private readonly format: AudioFormat;
  private readonly clock: () => number;
  private readonly leases = new Set<Lease>();
  private stream: DeviceStream | null = null;
  private opening: Promise<DeviceStream> | null = null;

  constructor(private readonly device: MicrophoneDevice, options: AudioCaptureOptions = {}) {
    this.format = options.format ?? DEFAULT_AUDIO_FORMAT;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Whether the device stream is currently open
   */
  isActive(): boolean {
    return this.stream !== null;
  }

  get leaseCount(): number {
    return this.leases.size;
  }

  /**
   * Take a lease on the microphone, opening it if nobody holds it yet
   */
  async acquire(): Promise<CaptureLease> {
    await this.ensureOpen();
    const lease = new Lease(this, this.format);
    this.leases.add(lease);
    return lease;
  }

  /**
   * Run `fn` with a lease that is released however `fn` exits
   */
  async use<T>(fn: (lease: CaptureLease) => Promise<T>): Promise<T> {
    const lease = await this.acquire();
    try {
      return await fn(lease);
    } finally {
      await lease.release();
    }
  }

  /**
   * Release every outstanding lease and close the device
   */
  async releaseAll(): Promise<void> {
    const leases = Array.from(this.leases);
    for (const lease of leases) {
      await lease.release();
    }
  }

  /** @internal called by a lease on release */
  async detach(lease: Lease): Promise<void> {
    this.leases.delete(lease);
    if (this.leases.size > 0 || !this.stream) {
      return;
    }

    const stream = this.stream;
    this.stream = null;
    try {
      await stream.close();
      console.log('Microphone released');
    } catch (error) {
      console.error('Failed to close microphone stream:', describeError(error));
    }
  }

  private async ensureOpen(): Promise<DeviceStream> {
    if (this.stream) {
      return this.stream;
    }
    if (!this.opening) {
      this.opening = this.open().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async open(): Promise<DeviceStream> {
    console.log(`Opening microphone (${this.format.sampleRate} Hz, ${this.format.channels} ch)`);
    const stream = await this.device.open(this.format);

    stream.onData((chunk) => {
      const frame: AudioFrame = { data: chunk, capturedAt: this.clock() };
      for (const lease of this.leases) {
        lease.deliver(frame);
      }
    });

    stream.onError((error) => {
      console.error('Microphone stream error:', error.message);
      for (const lease of this.leases) {
        lease.fail(error);
      }
    });

    this.stream = stream;
    return stream;
  }
}
