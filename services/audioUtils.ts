import type { Blob } from '@google/genai';
import { SEND_SAMPLE_RATE } from '../constants';
import type { AudioChunk } from '../types';

export function encode(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

export function decode(base64: string): Uint8Array {
  return new Uint8Array(Buffer.from(base64, 'base64'));
}

export function createPcmBlob(chunk: AudioChunk, sampleRate: number = SEND_SAMPLE_RATE): Blob {
  return {
    data: encode(chunk.data),
    mimeType: `${chunk.mimeType};rate=${sampleRate}`
  };
}
