import { spawn, type ChildProcess } from 'node:child_process';
import { once } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { CHANNELS, CHUNK_SIZE, RECEIVE_SAMPLE_RATE, SAMPLE_WIDTH_BYTES, SEND_SAMPLE_RATE } from '../constants';
import { DeviceError, describeError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('audio');

export interface CaptureSource {
  /** Resolves with the next fixed-size PCM frame from the microphone. */
  read(signal: AbortSignal): Promise<Uint8Array>;
  close(): void;
}

export interface PlaybackSink {
  /** Resolves once the device has accepted the buffer. */
  write(data: Uint8Array, signal: AbortSignal): Promise<void>;
  close(): void;
}

export interface AudioDevice {
  openCapture(): Promise<CaptureSource>;
  openPlayback(): Promise<PlaybackSink>;
}

export function readFrame(stream: Readable, frameBytes: number, signal: AbortSignal): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    if (stream.readableEnded) {
      reject(new DeviceError('Audio capture stream ended'));
      return;
    }

    const cleanup = () => {
      stream.off('readable', tryRead);
      stream.off('end', onEnd);
      stream.off('error', onError);
      signal.removeEventListener('abort', onAbort);
    };
    const tryRead = () => {
      const frame: Buffer | null = stream.read(frameBytes);
      if (frame === null) return;
      cleanup();
      resolve(new Uint8Array(frame));
    };
    const onEnd = () => {
      cleanup();
      reject(new DeviceError('Audio capture stream ended'));
    };
    const onError = (error: Error) => {
      cleanup();
      reject(new DeviceError(`Audio capture failed: ${error.message}`, { cause: error }));
    };
    const onAbort = () => {
      cleanup();
      reject(signal.reason);
    };

    stream.on('readable', tryRead);
    stream.on('end', onEnd);
    stream.on('error', onError);
    signal.addEventListener('abort', onAbort, { once: true });
    tryRead();
  });
}

export function buildCaptureArgs(sampleRate: number = SEND_SAMPLE_RATE): string[] {
  return ['-q', '-d', '-t', 'raw', '-r', String(sampleRate), '-e', 'signed-integer', '-b', String(SAMPLE_WIDTH_BYTES * 8), '-c', String(CHANNELS), '-'];
}

export function buildPlaybackArgs(sampleRate: number = RECEIVE_SAMPLE_RATE): string[] {
  return ['-q', '-t', 'raw', '-r', String(sampleRate), '-e', 'signed-integer', '-b', String(SAMPLE_WIDTH_BYTES * 8), '-c', String(CHANNELS), '-', '-d'];
}

async function waitForSpawn(child: ChildProcess, role: string): Promise<void> {
  try {
    await once(child, 'spawn');
  } catch (error) {
    throw new DeviceError(`Failed to start audio ${role} process: ${describeError(error)}`, { cause: error });
  }
}

function logStderr(stream: Readable, role: string): void {
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => {
    const trimmed = chunk.trim();
    if (trimmed) logger.debug(`${role} stderr: ${trimmed}`);
  });
}

class ProcessCaptureSource implements CaptureSource {
  constructor(
    private readonly child: ChildProcess,
    private readonly stdout: Readable,
    private readonly frameBytes: number
  ) {}

  read(signal: AbortSignal): Promise<Uint8Array> {
    return readFrame(this.stdout, this.frameBytes, signal);
  }

  close(): void {
    this.stdout.destroy();
    this.child.kill();
  }
}

/** The parts of a playback child process the sink relies on. */
export interface PlaybackProcess {
  once(event: 'exit', listener: (code: number | null) => void): unknown;
  kill(): boolean;
}

export class ProcessPlaybackSink implements PlaybackSink {
  private failure: DeviceError | null = null;

  constructor(
    private readonly child: PlaybackProcess,
    private readonly stdin: Writable
  ) {
    stdin.on('error', error => {
      this.failure = new DeviceError(`Audio playback failed: ${error.message}`, { cause: error });
    });
    child.once('exit', code => {
      this.failure ??= new DeviceError(`Audio playback process exited with code ${code}`);
    });
  }

  async write(data: Uint8Array, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    if (this.failure) throw this.failure;
    if (!this.stdin.write(data)) {
      try {
        await once(this.stdin, 'drain', { signal });
      } catch (error) {
        if (signal.aborted) throw error;
        throw this.failure ?? new DeviceError(`Audio playback failed: ${describeError(error)}`, { cause: error });
      }
    }
  }

  close(): void {
    this.stdin.end();
    this.child.kill();
  }
}

export interface SoxAudioDeviceOptions {
  command?: string;
  captureDevice?: string;
  frameSize?: number;
}

/**
 * Audio I/O through `sox` child processes: raw s16le mono PCM is read from the
 * capture process's stdout and written to the playback process's stdin, so
 * device calls never block the event loop.
 */
export class SoxAudioDevice implements AudioDevice {
  private readonly command: string;
  private readonly captureDevice?: string;
  private readonly frameBytes: number;

  constructor({ command = 'sox', captureDevice, frameSize = CHUNK_SIZE }: SoxAudioDeviceOptions = {}) {
    this.command = command;
    this.captureDevice = captureDevice;
    this.frameBytes = frameSize * SAMPLE_WIDTH_BYTES * CHANNELS;
  }

  async openCapture(): Promise<CaptureSource> {
    const env = this.captureDevice ? { ...process.env, AUDIODEV: this.captureDevice } : process.env;
    logger.debug('Starting mic capture', { command: this.command, args: buildCaptureArgs() });
    const child = spawn(this.command, buildCaptureArgs(), { stdio: ['ignore', 'pipe', 'pipe'], env });
    await waitForSpawn(child, 'capture');
    logStderr(child.stderr, 'capture');
    return new ProcessCaptureSource(child, child.stdout, this.frameBytes);
  }

  async openPlayback(): Promise<PlaybackSink> {
    logger.debug('Starting audio playback', { command: this.command, args: buildPlaybackArgs() });
    const child = spawn(this.command, buildPlaybackArgs(), { stdio: ['pipe', 'ignore', 'pipe'] });
    await waitForSpawn(child, 'playback');
    logStderr(child.stderr, 'playback');
    return new ProcessPlaybackSink(child, child.stdin);
  }
}
