export interface Message {
  id: string;
  role: 'user' | 'assistant';
  text: string;
  timestamp: number;
}

export enum SessionState {
  IDLE = 'idle',
  CONNECTING = 'connecting',
  ACTIVE = 'active',
  RECOVERING = 'recovering',
  TERMINATED = 'terminated'
}

export enum ResponseModality {
  AUDIO = 'AUDIO',
  TEXT = 'TEXT'
}

export type VoiceName = 'Aoede' | 'Charon' | 'Fenrir' | 'Kore' | 'Puck' | 'Zephyr';

export interface SessionConfig {
  voiceName: VoiceName;
  systemInstruction: string;
  responseModality: ResponseModality;
}

export type SessionConfigUpdate = Partial<SessionConfig>;

export interface AudioChunk {
  data: Uint8Array;
  mimeType: 'audio/pcm';
}

export type InboundEvent =
  | { type: 'audio'; data: Uint8Array }
  | { type: 'text'; text: string }
  | { type: 'transcript'; role: Message['role']; text: string }
  | { type: 'turnComplete' };

export type OutboundMessage =
  | { type: 'audio'; chunk: AudioChunk }
  | { type: 'text'; text: string };

export type SessionEvent =
  | { type: 'state'; state: SessionState }
  | { type: 'text'; text: string }
  | { type: 'transcript'; role: Message['role']; text: string }
  | { type: 'turnComplete'; discardedChunks: number }
  | { type: 'error'; error: Error };
