import pkg from 'wavefile';
const { WaveFile } = pkg;
import { AudioChunk, AudioFormat, AudioFrame, DEFAULT_AUDIO_FORMAT } from '../types/index.js';
import { DEFAULT_CONFIG } from '../config.js';

export interface ChunkAccumulatorOptions {
  sessionId: string;
  format?: AudioFormat;
  chunkIntervalMs?: number;
  maxBufferedFrames?: number;
}

/**
 * Wrap little-endian PCM16 in a WAV container
 */
export function encodeWav(pcm: Buffer, format: AudioFormat): Uint8Array {
  const samples = new Int16Array(Math.floor(pcm.length / 2));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = pcm.readInt16LE(i * 2);
  }

  const wav = new WaveFile();
  wav.fromScratch(format.channels, format.sampleRate, '16', samples);
  return wav.toBuffer();
}

/**
 * Batches captured frames into sequence-numbered WAV chunks. A chunk is cut
 * once the buffered audio reaches the interval or the frame count reaches
 * the maximum, whichever comes first.
 *
 * Sequence numbers and the timeline offset belong to the session, so they
 * keep counting across pause/resume.
 */
export class ChunkAccumulator {
  readonly sessionId: string;
  private readonly format: AudioFormat;
  private readonly chunkIntervalMs: number;
  private readonly maxBufferedFrames: number;
  private readonly bytesPerSecond: number;
  private readonly blockAlign: number;

  private frames: AudioFrame[] = [];
  private bufferedBytes = 0;
  private lastSequence = 0;
  private timelineSeconds = 0;

  constructor(options: ChunkAccumulatorOptions) {
    this.sessionId = options.sessionId;
    this.format = options.format ?? DEFAULT_AUDIO_FORMAT;
    this.chunkIntervalMs = options.chunkIntervalMs ?? DEFAULT_CONFIG.chunkIntervalMs;
    this.maxBufferedFrames = options.maxBufferedFrames ?? DEFAULT_CONFIG.maxBufferedFrames;
    this.blockAlign = this.format.channels * (this.format.bitDepth / 8);
    this.bytesPerSecond = this.format.sampleRate * this.blockAlign;
  }

  get pendingFrames(): number {
    return this.frames.length;
  }

  get bufferedDurationMs(): number {
    return (this.bufferedBytes / this.bytesPerSecond) * 1000;
  }

  get sequence(): number {
    return this.lastSequence;
  }

  /**
   * Seconds of audio already cut into chunks
   */
  get timelineOffsetSeconds(): number {
    return this.timelineSeconds;
  }

  /**
   * Buffer a frame; returns a chunk when a flush threshold was crossed
   */
  push(frame: AudioFrame): AudioChunk | null {
    if (frame.data.length === 0) {
      return null;
    }

    this.frames.push(frame);
    this.bufferedBytes += frame.data.length;

    if (this.bufferedDurationMs >= this.chunkIntervalMs || this.frames.length >= this.maxBufferedFrames) {
      return this.flush();
    }
    return null;
  }

  /**
   * Cut whatever is buffered into a chunk. Returns null when there is not a
   * whole sample to send.
   */
  flush(): AudioChunk | null {
    if (this.frames.length === 0) {
      return null;
    }

    const capturedAt = this.frames[0].capturedAt;
    const pcm = Buffer.concat(this.frames.map((frame) => frame.data), this.bufferedBytes);
    const usable = pcm.length - (pcm.length % this.blockAlign);
    const lastCapturedAt = this.frames[this.frames.length - 1].capturedAt;

    this.frames = [];
    this.bufferedBytes = 0;

    // Keep a split sample for the next chunk
    if (usable < pcm.length) {
      const remainder = Buffer.from(pcm.subarray(usable));
      this.frames.push({ data: remainder, capturedAt: lastCapturedAt });
      this.bufferedBytes = remainder.length;
    }
    if (usable === 0) {
      return null;
    }

    const durationSeconds = usable / this.bytesPerSecond;
    const chunk: AudioChunk = {
      sessionId: this.sessionId,
      sequence: ++this.lastSequence,
      payload: encodeWav(pcm.subarray(0, usable), this.format),
      capturedAt,
      encoding: 'audio/wav',
      offsetSeconds: this.timelineSeconds,
      durationSeconds
    };
    this.timelineSeconds += durationSeconds;
    return chunk;
  }
}
