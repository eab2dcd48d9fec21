import { Modality } from '@google/genai';
import { describe, expect, it } from 'vitest';
import { ResponseModality } from '../types';
import { buildLiveConfig, toInboundEvents } from './liveConnection';

describe('buildLiveConfig', () => {
  it('requests speech with the configured voice in audio mode', () => {
    const config = buildLiveConfig({
      voiceName: 'Kore',
      systemInstruction: 'Be brief.',
      responseModality: ResponseModality.AUDIO
    });

    expect(config).toEqual({
      responseModalities: [Modality.AUDIO],
      systemInstruction: { parts: [{ text: 'Be brief.' }] },
      speechConfig: { voiceConfig: { prebuiltVoiceConfig: { voiceName: 'Kore' } } },
      inputAudioTranscription: {},
      outputAudioTranscription: {}
    });
  });

  it('leaves out speech settings in text mode', () => {
    const config = buildLiveConfig({
      voiceName: 'Kore',
      systemInstruction: 'Be brief.',
      responseModality: ResponseModality.TEXT
    });

    expect(config).toEqual({
      responseModalities: [Modality.TEXT],
      systemInstruction: { parts: [{ text: 'Be brief.' }] }
    });
  });
});

describe('toInboundEvents', () => {
  it('decodes inline audio and passes text through', () => {
    const events = toInboundEvents({
      serverContent: {
        modelTurn: {
          parts: [{ inlineData: { data: 'AQID', mimeType: 'audio/pcm;rate=24000' } }, { text: 'hi' }]
        }
      }
    });

    expect(events).toEqual([
      { type: 'audio', data: new Uint8Array([1, 2, 3]) },
      { type: 'text', text: 'hi' }
    ]);
  });

  it('skips thought parts', () => {
    expect(toInboundEvents({ serverContent: { modelTurn: { parts: [{ text: 'planning', thought: true }] } } })).toEqual([]);
  });

  it('emits transcriptions with their speaker', () => {
    const events = toInboundEvents({
      serverContent: {
        inputTranscription: { text: 'what time is it' },
        outputTranscription: { text: 'noon' }
      }
    });

    expect(events).toEqual([
      { type: 'transcript', role: 'user', text: 'what time is it' },
      { type: 'transcript', role: 'assistant', text: 'noon' }
    ]);
  });

  it('puts turn completion after the content of the same message', () => {
    const events = toInboundEvents({
      serverContent: { modelTurn: { parts: [{ text: 'bye' }] }, turnComplete: true }
    });

    expect(events).toEqual([{ type: 'text', text: 'bye' }, { type: 'turnComplete' }]);
  });

  it('treats an interruption as the end of the turn', () => {
    expect(toInboundEvents({ serverContent: { interrupted: true } })).toEqual([{ type: 'turnComplete' }]);
  });

  it('ignores messages without server content', () => {
    expect(toInboundEvents({})).toEqual([]);
  });
});
