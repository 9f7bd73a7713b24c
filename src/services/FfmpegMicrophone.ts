import { spawn, ChildProcess } from 'child_process';
import { AudioFormat } from '../types/index.js';
import { DeviceUnavailableError, PermissionError } from '../types/errors.js';
import { DeviceErrorListener, DeviceStream, MicrophoneDevice } from './AudioCaptureController.js';

export interface FfmpegMicrophoneOptions {
  device?: string;
  ffmpegPath?: string;
  platform?: NodeJS.Platform;
  openTimeoutMs?: number;
  stopTimeoutMs?: number;
}

const PERMISSION_PATTERN = /permission denied|not authori[sz]ed|access denied|operation not permitted/i;

/**
 * Build the ffmpeg arguments that read the platform microphone and write raw
 * s16le PCM to stdout
 */
export function buildFfmpegArgs(platform: NodeJS.Platform, device: string, format: AudioFormat): string[] {
  let input: string[];
  switch (platform) {
    case 'darwin':
      input = ['-f', 'avfoundation', '-i', `:${device === 'default' ? '0' : device}`];
      break;
    case 'win32':
      input = ['-f', 'dshow', '-i', `audio=${device}`];
      break;
    default:
      input = ['-f', 'pulse', '-i', device];
  }

  return [
    '-hide_banner',
    '-loglevel', 'error',
    ...input,
    '-ac', format.channels.toString(),
    '-ar', format.sampleRate.toString(),
    '-c:a', 'pcm_s16le',
    '-f', 's16le',
    'pipe:1'
  ];
}

/**
 * Map what ffmpeg printed before exiting to a capture error
 */
export function classifyFfmpegFailure(stderr: string, exitCode: number | null): Error {
  const lastLine = stderr.trim().split('\n').pop()?.trim() ?? '';
  if (PERMISSION_PATTERN.test(stderr)) {
    return new PermissionError(`Microphone access was denied: ${lastLine}`);
  }
  const detail = lastLine ? `: ${lastLine}` : '';
  return new DeviceUnavailableError(`ffmpeg exited with code ${exitCode}${detail}`);
}

export function classifySpawnError(error: Error): Error {
  const code = 'code' in error ? error.code : undefined;
  if (code === 'ENOENT') {
    return new DeviceUnavailableError('ffmpeg was not found on PATH', { cause: error });
  }
  return new DeviceUnavailableError(`Failed to start ffmpeg: ${error.message}`, { cause: error });
}

class FfmpegDeviceStream implements DeviceStream {
  private dataListener: ((chunk: Buffer) => void) | null = null;
  private errorListener: DeviceErrorListener | null = null;
  private pending: Buffer[] = [];
  private closing: Promise<void> | null = null;

  constructor(private readonly process: ChildProcess, private readonly stopTimeoutMs: number) {
    process.stdout?.on('data', (chunk: Buffer) => {
      if (this.dataListener) {
        this.dataListener(chunk);
      } else {
        this.pending.push(chunk);
      }
    });

    process.on('exit', (code, signal) => {
      if (!this.closing && this.errorListener) {
        this.errorListener(new DeviceUnavailableError(`ffmpeg exited unexpectedly (code ${code}, signal ${signal})`));
      }
    });
  }

  onData(listener: (chunk: Buffer) => void): void {
    this.dataListener = listener;
    const pending = this.pending;
    this.pending = [];
    for (const chunk of pending) {
      listener(chunk);
    }
  }

  onError(listener: DeviceErrorListener): void {
    this.errorListener = listener;
  }

  close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }

    const process = this.process;
    this.closing = new Promise<void>((resolve) => {
      if (process.exitCode !== null || process.signalCode !== null) {
        resolve();
        return;
      }

      const timeout = setTimeout(() => {
        console.warn(`ffmpeg did not exit within ${this.stopTimeoutMs} ms, sending SIGKILL`);
        process.kill('SIGKILL');
      }, this.stopTimeoutMs);

      process.once('exit', () => {
        clearTimeout(timeout);
        resolve();
      });

      // SIGINT lets ffmpeg flush and exit cleanly
      process.kill('SIGINT');
    });
    return this.closing;
  }
}

/**
 * Microphone read through an ffmpeg child process
 */
export class FfmpegMicrophone implements MicrophoneDevice {
  private readonly device: string;
  private readonly ffmpegPath: string;
  private readonly platform: NodeJS.Platform;
  private readonly openTimeoutMs: number;
  private readonly stopTimeoutMs: number;

  constructor(options: FfmpegMicrophoneOptions = {}) {
    this.device = options.device ?? 'default';
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.platform = options.platform ?? process.platform;
    this.openTimeoutMs = options.openTimeoutMs ?? 5000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 3000;
  }

  open(format: AudioFormat): Promise<DeviceStream> {
    const args = buildFfmpegArgs(this.platform, this.device, format);
    console.log('Starting ffmpeg with args:', args);

    const child = spawn(this.ffmpegPath, args, {
      stdio: ['ignore', 'pipe', 'pipe']
    });
    const stream = new FfmpegDeviceStream(child, this.stopTimeoutMs);

    return new Promise<DeviceStream>((resolve, reject) => {
      let stderr = '';
      let settled = false;

      const settle = (error: Error | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        if (error) {
          child.kill('SIGKILL');
          reject(error);
        } else {
          resolve(stream);
        }
      };

      const timeout = setTimeout(() => {
        settle(new DeviceUnavailableError(`Microphone produced no audio within ${this.openTimeoutMs} ms`));
      }, this.openTimeoutMs);

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
      child.once('error', (error) => settle(classifySpawnError(error)));
      child.once('exit', (code) => settle(classifyFfmpegFailure(stderr, code)));
      child.stdout?.once('data', () => settle(null));
    });
  }
}
