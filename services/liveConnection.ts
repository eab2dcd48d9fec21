import { GoogleGenAI, Modality, type LiveConnectConfig, type LiveServerMessage, type Session } from '@google/genai';
import { MODEL_NAME } from '../constants';
import { ResponseModality, type InboundEvent, type OutboundMessage, type SessionConfig } from '../types';
import { AsyncQueue } from './asyncQueue';
import { createPcmBlob, decode } from './audioUtils';
import { ConnectionError, describeError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('live');

/** One upstream duplex session. */
export interface LiveConnection {
  send(message: OutboundMessage): Promise<void>;
  /** Events of the current turn; the sequence ends right after `turnComplete`. */
  receive(): AsyncIterable<InboundEvent>;
  close(): void;
}

export interface LiveConnector {
  open(credential: string, config: Readonly<SessionConfig>): Promise<LiveConnection>;
}

export function buildLiveConfig(config: Readonly<SessionConfig>): LiveConnectConfig {
  const liveConfig: LiveConnectConfig = {
    responseModalities: [config.responseModality === ResponseModality.TEXT ? Modality.TEXT : Modality.AUDIO],
    systemInstruction: { parts: [{ text: config.systemInstruction }] }
  };
  if (config.responseModality === ResponseModality.AUDIO) {
    liveConfig.speechConfig = {
      voiceConfig: { prebuiltVoiceConfig: { voiceName: config.voiceName } }
    };
    liveConfig.inputAudioTranscription = {};
    liveConfig.outputAudioTranscription = {};
  }
  return liveConfig;
}

export function toInboundEvents(message: Pick<LiveServerMessage, 'serverContent'>): InboundEvent[] {
  const content = message.serverContent;
  if (!content) return [];

  const events: InboundEvent[] = [];
  for (const part of content.modelTurn?.parts ?? []) {
    if (part.inlineData?.data) {
      events.push({ type: 'audio', data: decode(part.inlineData.data) });
    } else if (part.text && !part.thought) {
      events.push({ type: 'text', text: part.text });
    }
  }
  if (content.inputTranscription?.text) {
    events.push({ type: 'transcript', role: 'user', text: content.inputTranscription.text });
  }
  if (content.outputTranscription?.text) {
    events.push({ type: 'transcript', role: 'assistant', text: content.outputTranscription.text });
  }
  // An interruption ends the turn the same way as an explicit completion
  if (content.turnComplete || content.interrupted) {
    events.push({ type: 'turnComplete' });
  }
  return events;
}

class GeminiLiveConnection implements LiveConnection {
  constructor(
    private readonly session: Session,
    private readonly inbox: AsyncQueue<InboundEvent>,
    private readonly lifetime: AbortController
  ) {}

  async send(message: OutboundMessage): Promise<void> {
    this.lifetime.signal.throwIfAborted();
    switch (message.type) {
      case 'audio':
        this.session.sendRealtimeInput({ media: createPcmBlob(message.chunk) });
        break;
      case 'text':
        this.session.sendClientContent({ turns: message.text || '.', turnComplete: true });
        break;
    }
  }

  async *receive(): AsyncIterable<InboundEvent> {
    for (;;) {
      const event = await this.inbox.get(this.lifetime.signal);
      yield event;
      if (event.type === 'turnComplete') return;
    }
  }

  close(): void {
    if (this.lifetime.signal.aborted) return;
    this.lifetime.abort(new ConnectionError('Live connection closed'));
    try {
      this.session.close();
    } catch (e) {
      logger.warn('Error closing session', e);
    }
  }
}

export class GeminiLiveConnector implements LiveConnector {
  constructor(private readonly model: string = MODEL_NAME) {}

  async open(credential: string, config: Readonly<SessionConfig>): Promise<LiveConnection> {
    const ai = new GoogleGenAI({ apiKey: credential, httpOptions: { apiVersion: 'v1alpha' } });
    const inbox = new AsyncQueue<InboundEvent>();
    const lifetime = new AbortController();

    try {
      const session = await ai.live.connect({
        model: this.model,
        config: buildLiveConfig(config),
        callbacks: {
          onopen: () => logger.info(`Live session opened (voice=${config.voiceName}, mode=${config.responseModality})`),
          onmessage: (message: LiveServerMessage) => {
            for (const event of toInboundEvents(message)) inbox.putNowait(event);
          },
          onerror: e => {
            lifetime.abort(new ConnectionError(`Live connection error: ${describeError(e)}`));
          },
          onclose: () => {
            if (!lifetime.signal.aborted) {
              lifetime.abort(new ConnectionError('Live connection closed by remote'));
            }
          }
        }
      });
      return new GeminiLiveConnection(session, inbox, lifetime);
    } catch (error) {
      throw new ConnectionError(`Failed to open live connection: ${describeError(error)}`, { cause: error });
    }
  }
}
