import { ResponseModality, type SessionConfig, type VoiceName } from './types';

export const MODEL_NAME = 'gemini-live-2.5-flash-preview';

export const DEFAULT_SYSTEM_INSTRUCTION = 'You are a helpful assistant and answer in a friendly tone.';

export const DEFAULT_CONFIG: SessionConfig = {
  voiceName: 'Puck',
  systemInstruction: DEFAULT_SYSTEM_INSTRUCTION,
  responseModality: ResponseModality.AUDIO
};

export const VOICE_OPTIONS = ['Aoede', 'Charon', 'Fenrir', 'Kore', 'Puck', 'Zephyr'] as const satisfies readonly VoiceName[];

// PCM s16le mono on both directions
export const SEND_SAMPLE_RATE = 16000;
export const RECEIVE_SAMPLE_RATE = 24000;
export const CHANNELS = 1;
export const SAMPLE_WIDTH_BYTES = 2;
export const CHUNK_SIZE = 1024;

export const MAX_RETRIES = 3;
export const RETRY_DELAY_MS = 2000;
export const OUTBOUND_QUEUE_CAPACITY = 5;
export const MAX_CONSECUTIVE_DEVICE_FAILURES = 3;

export const QUIT_TOKEN = 'q';
export const MAX_MESSAGES = 20;
