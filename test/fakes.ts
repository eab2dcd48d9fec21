import { AsyncQueue } from '../services/asyncQueue';
import type { AudioDevice, CaptureSource, PlaybackSink } from '../services/audioDevice';
import { ConnectionError } from '../services/errors';
import type { LiveConnection, LiveConnector } from '../services/liveConnection';
import type { InboundEvent, OutboundMessage, SessionConfig } from '../types';

export class FakeLiveConnection implements LiveConnection {
  readonly sent: OutboundMessage[] = [];
  private readonly events = new AsyncQueue<InboundEvent>();
  private readonly lifetime = new AbortController();
  /** When set, every send suspends until the connection closes. */
  blockSends = false;

  constructor(
    readonly credential: string,
    readonly config: Readonly<SessionConfig>
  ) {}

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  emit(event: InboundEvent): void {
    this.events.putNowait(event);
  }

  async send(message: OutboundMessage): Promise<void> {
    this.lifetime.signal.throwIfAborted();
    if (this.blockSends) {
      await new Promise<never>((_, reject) => {
        this.lifetime.signal.addEventListener('abort', () => reject(this.lifetime.signal.reason), { once: true });
      });
    }
    this.sent.push(message);
  }

  async *receive(): AsyncIterable<InboundEvent> {
    for (;;) {
      const event = await this.events.get(this.lifetime.signal);
      yield event;
      if (event.type === 'turnComplete') return;
    }
  }

  close(): void {
    if (!this.closed) this.lifetime.abort(new ConnectionError('closed'));
  }
}

export class FakeLiveConnector implements LiveConnector {
  readonly connections: FakeLiveConnection[] = [];
  readonly attempts: Array<{ credential: string; config: Readonly<SessionConfig> }> = [];
  private readonly failures: Error[] = [];
  blockSends = false;

  /** Queue errors for the next open calls. */
  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async open(credential: string, config: Readonly<SessionConfig>): Promise<FakeLiveConnection> {
    this.attempts.push({ credential, config });
    const failure = this.failures.shift();
    if (failure) throw failure;
    const connection = new FakeLiveConnection(credential, config);
    connection.blockSends = this.blockSends;
    this.connections.push(connection);
    return connection;
  }

  get latest(): FakeLiveConnection {
    const connection = this.connections.at(-1);
    if (!connection) throw new Error('No connection opened yet');
    return connection;
  }
}

class FakeCaptureSource implements CaptureSource {
  framesRead = 0;
  closed = false;

  constructor(private readonly frames: AsyncQueue<Uint8Array>) {}

  async read(signal: AbortSignal): Promise<Uint8Array> {
    const frame = await this.frames.get(signal);
    this.framesRead++;
    return frame;
  }

  close(): void {
    this.closed = true;
  }
}

class FakePlaybackSink implements PlaybackSink {
  readonly written: Uint8Array[] = [];
  closed = false;

  async write(data: Uint8Array, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    this.written.push(data);
  }

  close(): void {
    this.closed = true;
  }
}

export class FakeAudioDevice implements AudioDevice {
  readonly frames = new AsyncQueue<Uint8Array>();
  readonly captures: FakeCaptureSource[] = [];
  readonly sinks: FakePlaybackSink[] = [];
  captureError: Error | null = null;
  /** Until released, playback never opens, so received audio stays queued. */
  private playbackGate: Promise<void> = Promise.resolve();
  private releaseGate: () => void = () => {};

  holdPlayback(): void {
    this.playbackGate = new Promise(resolve => {
      this.releaseGate = resolve;
    });
  }

  releasePlayback(): void {
    this.releaseGate();
  }

  pushFrames(count: number): void {
    for (let i = 0; i < count; i++) this.frames.putNowait(Uint8Array.of(i));
  }

  async openCapture(): Promise<FakeCaptureSource> {
    if (this.captureError) throw this.captureError;
    const source = new FakeCaptureSource(this.frames);
    this.captures.push(source);
    return source;
  }

  async openPlayback(): Promise<FakePlaybackSink> {
    await this.playbackGate;
    const sink = new FakePlaybackSink();
    this.sinks.push(sink);
    return sink;
  }

  get written(): Uint8Array[] {
    return this.sinks.flatMap(sink => sink.written);
  }
}
