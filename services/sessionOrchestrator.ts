import { setTimeout as sleep } from 'node:timers/promises';
import {
  MAX_CONSECUTIVE_DEVICE_FAILURES,
  MAX_RETRIES,
  OUTBOUND_QUEUE_CAPACITY,
  QUIT_TOKEN,
  RETRY_DELAY_MS
} from '../constants';
import {
  SessionState,
  type AudioChunk,
  type SessionConfig,
  type SessionConfigUpdate,
  type SessionEvent
} from '../types';
import { AsyncQueue } from './asyncQueue';
import type { AudioDevice } from './audioDevice';
import { connectWithRetry } from './connectWithRetry';
import type { CredentialRotator } from './credentialRotator';
import { DeviceError, describeError, isAbortError, toError } from './errors';
import type { LiveConnection, LiveConnector } from './liveConnection';
import { createLogger } from './logger';
import { SessionConfigStore, parseConfigUpdate } from './sessionConfig';
import { TaskGroup } from './taskGroup';

const logger = createLogger('session');

export type SessionListener = (event: SessionEvent) => void;

export interface SessionOrchestratorOptions {
  connector: LiveConnector;
  rotator: CredentialRotator;
  audio: AudioDevice;
  config?: SessionConfig;
  maxAttempts?: number;
  retryDelayMs?: number;
  /** Reconnect after the quit token instead of terminating. Defaults to true. */
  reconnectOnQuit?: boolean;
  /** Consecutive device failures tolerated before the session terminates. */
  maxDeviceFailures?: number;
}

type GroupOutcome = 'quit' | 'failed';

/**
 * Runs a live conversation: five supervised pipelines per connection
 * (outbound audio, capture, receive, playback, text injection) plus a
 * config-apply task that lives as long as the session. Any pipeline failure
 * tears down the whole group and its connection, and the session reconnects
 * with a new credential.
 */
export class SessionOrchestrator {
  private readonly connector: LiveConnector;
  private readonly rotator: CredentialRotator;
  private readonly audio: AudioDevice;
  private readonly configStore: SessionConfigStore;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly reconnectOnQuit: boolean;
  private readonly maxDeviceFailures: number;
  private readonly listeners = new Set<SessionListener>();

  private outboundAudio = new AsyncQueue<AudioChunk>(OUTBOUND_QUEUE_CAPACITY);
  private inboundAudio = new AsyncQueue<Uint8Array>();
  private textQueue = new AsyncQueue<string>();
  private configQueue = new AsyncQueue<SessionConfigUpdate>();

  private currentState = SessionState.IDLE;
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(options: SessionOrchestratorOptions) {
    this.connector = options.connector;
    this.rotator = options.rotator;
    this.audio = options.audio;
    this.configStore = new SessionConfigStore(options.config);
    this.maxAttempts = options.maxAttempts ?? MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
    this.reconnectOnQuit = options.reconnectOnQuit ?? true;
    this.maxDeviceFailures = options.maxDeviceFailures ?? MAX_CONSECUTIVE_DEVICE_FAILURES;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  get config(): Readonly<SessionConfig> {
    return this.configStore.snapshot();
  }

  /** Audio chunks received but not yet handed to the playback device. */
  get pendingPlaybackChunks(): number {
    return this.inboundAudio.size;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Starts a session, stopping the current one first. Resolves once the
   * previous session has fully settled and the new one is under way.
   */
  async start(config: SessionConfigUpdate = {}): Promise<void> {
    const update = parseConfigUpdate(config);
    const previous = this.running;
    this.controller?.abort();

    const controller = new AbortController();
    this.controller = controller;
    const ready = this.prepare(previous, update);
    this.running = ready.then(() => this.run(controller));
    await ready;
  }

  /** Cancels every pipeline and releases the connection and devices. Safe to call at any time. */
  async stop(): Promise<void> {
    const running = this.running;
    if (!running) return;
    this.controller?.abort();
    await running;
  }

  /** Resolves when the current session, if any, has fully terminated. */
  async whenStopped(): Promise<void> {
    await this.running;
  }

  sendText(text: string): boolean {
    if (!this.running) {
      logger.warn('Ignoring text, no active session');
      return false;
    }
    this.textQueue.putNowait(text);
    return true;
  }

  /** Takes effect on the next connection, never on the current one. */
  updateConfig(config: SessionConfigUpdate): void {
    const update = parseConfigUpdate(config);
    if (this.running) {
      this.configQueue.putNowait(update);
    } else {
      this.configStore.apply(update);
    }
  }

  private async prepare(previous: Promise<void> | null, update: SessionConfigUpdate): Promise<void> {
    await previous;
    this.configStore.apply(update);
    this.outboundAudio = new AsyncQueue<AudioChunk>(OUTBOUND_QUEUE_CAPACITY);
    this.inboundAudio = new AsyncQueue<Uint8Array>();
    this.textQueue = new AsyncQueue<string>();
    this.configQueue = new AsyncQueue<SessionConfigUpdate>();
  }

  private async run(controller: AbortController): Promise<void> {
    const { signal } = controller;
    const configTask = new AbortController();
    const applying = this.applyConfigUpdates(configTask.signal);

    try {
      let connection = await this.connect(signal);
      let deviceFailures = 0;

      for (;;) {
        this.setState(SessionState.ACTIVE);
        let outcome: GroupOutcome;
        try {
          outcome = await this.runPipelines(connection, signal);
          deviceFailures = 0;
        } catch (error) {
          if (signal.aborted) throw error;
          if (error instanceof DeviceError) {
            deviceFailures++;
            if (deviceFailures >= this.maxDeviceFailures) {
              throw error;
            }
          } else {
            deviceFailures = 0;
          }
          logger.error(`Session error: ${describeError(error)}`);
          outcome = 'failed';
        }

        if (outcome === 'quit' && !this.reconnectOnQuit) break;

        this.setState(SessionState.RECOVERING);
        logger.info('Attempting to reconnect with a new credential...');
        connection = await this.connect(signal);
        try {
          await sleep(this.retryDelayMs, undefined, { signal });
        } catch (error) {
          connection.close();
          throw error;
        }
      }
      this.setState(SessionState.TERMINATED);
    } catch (error) {
      if (signal.aborted) {
        logger.info('Session stopped');
      } else {
        logger.error(`Session terminated: ${describeError(error)}`);
        this.emit({ type: 'error', error: toError(error) });
      }
      this.setState(SessionState.TERMINATED);
    } finally {
      configTask.abort();
      await applying;
      this.inboundAudio.drain();
      // A newer start() may already own the session
      if (this.controller === controller) {
        this.controller = null;
        this.running = null;
      }
    }
  }

  private async connect(signal: AbortSignal): Promise<LiveConnection> {
    this.setState(SessionState.CONNECTING);
    const connection = await connectWithRetry(this.connector, this.rotator, () => this.configStore.snapshot(), {
      maxAttempts: this.maxAttempts,
      delayMs: this.retryDelayMs,
      signal
    });
    if (signal.aborted) {
      connection.close();
      signal.throwIfAborted();
    }
    return connection;
  }

  private async runPipelines(connection: LiveConnection, signal: AbortSignal): Promise<GroupOutcome> {
    const group = new TaskGroup(signal);
    group.signal.addEventListener('abort', () => connection.close(), { once: true });

    group.spawn('send-realtime', s => this.sendRealtime(connection, s));
    group.spawn('capture', s => this.captureAudio(s));
    group.spawn('receive', s => this.receiveEvents(connection, s));
    group.spawn('playback', s => this.playAudio(s));
    group.spawn('send-text', s => this.sendTextInput(connection, s), { endsGroup: true });

    try {
      await group.join();
      return 'quit';
    } finally {
      connection.close();
      // Audio from a dead connection must not play on the next one
      this.inboundAudio.drain();
    }
  }

  private async sendRealtime(connection: LiveConnection, signal: AbortSignal): Promise<void> {
    for (;;) {
      const chunk = await this.outboundAudio.get(signal);
      await connection.send({ type: 'audio', chunk });
    }
  }

  private async captureAudio(signal: AbortSignal): Promise<void> {
    const source = await this.audio.openCapture();
    try {
      for (;;) {
        const data = await source.read(signal);
        await this.outboundAudio.put({ data, mimeType: 'audio/pcm' }, signal);
      }
    } finally {
      source.close();
    }
  }

  private async receiveEvents(connection: LiveConnection, signal: AbortSignal): Promise<void> {
    for (;;) {
      signal.throwIfAborted();
      for await (const event of connection.receive()) {
        switch (event.type) {
          case 'audio':
            this.inboundAudio.putNowait(event.data);
            break;
          case 'text':
            this.emit({ type: 'text', text: event.text });
            break;
          case 'transcript':
            this.emit({ type: 'transcript', role: event.role, text: event.text });
            break;
          case 'turnComplete': {
            // The model may have queued far more audio than has played; drop it
            const discarded = this.inboundAudio.drain();
            this.emit({ type: 'turnComplete', discardedChunks: discarded.length });
            break;
          }
        }
      }
    }
  }

  private async playAudio(signal: AbortSignal): Promise<void> {
    const sink = await this.audio.openPlayback();
    try {
      for (;;) {
        const data = await this.inboundAudio.get(signal);
        await sink.write(data, signal);
      }
    } finally {
      sink.close();
    }
  }

  private async sendTextInput(connection: LiveConnection, signal: AbortSignal): Promise<void> {
    for (;;) {
      const text = await this.textQueue.get(signal);
      if (text.trim().toLowerCase() === QUIT_TOKEN) {
        logger.info('Quit token received, ending turn group');
        return;
      }
      await connection.send({ type: 'text', text: text || '.' });
    }
  }

  private async applyConfigUpdates(signal: AbortSignal): Promise<void> {
    try {
      for (;;) {
        const update = await this.configQueue.get(signal);
        const config = this.configStore.apply(update);
        logger.info(`Updated config: voice=${config.voiceName}, mode=${config.responseModality}`);
      }
    } catch (error) {
      if (!signal.aborted && !isAbortError(error)) {
        logger.error(`Configuration update error: ${describeError(error)}`);
      }
    }
  }

  private setState(state: SessionState): void {
    if (this.currentState === state) return;
    this.currentState = state;
    logger.debug(`State: ${state}`);
    this.emit({ type: 'state', state });
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.warn('Session listener failed', error);
      }
    }
  }
}
