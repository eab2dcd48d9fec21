import { describe, expect, it } from 'vitest';
import { SessionState } from '../types';
import { initialTranscript, transcriptReducer, type TranscriptAction, type TranscriptState } from './transcript';

function reduce(actions: TranscriptAction[], state: TranscriptState = initialTranscript): TranscriptState {
  return actions.reduce(transcriptReducer, state);
}

describe('transcriptReducer', () => {
  it('collects streamed text and commits it when the turn completes', () => {
    const streaming = reduce([
      { type: 'session', event: { type: 'text', text: 'Hel' }, at: 1000 },
      { type: 'session', event: { type: 'text', text: 'lo' }, at: 1001 }
    ]);
    expect(streaming.pendingAssistant).toBe('Hello');
    expect(streaming.messages).toEqual([]);

    const done = reduce([{ type: 'session', event: { type: 'turnComplete', discardedChunks: 0 }, at: 1002 }], streaming);

    expect(done.messages).toEqual([{ id: '1002-0', role: 'assistant', text: 'Hello', timestamp: 1002 }]);
    expect(done.pendingAssistant).toBe('');
  });

  it('commits the user transcript before the reply', () => {
    const state = reduce([
      { type: 'session', event: { type: 'transcript', role: 'assistant', text: ' It is noon. ' }, at: 1 },
      { type: 'session', event: { type: 'transcript', role: 'user', text: 'What time is it?' }, at: 2 },
      { type: 'session', event: { type: 'turnComplete', discardedChunks: 3 }, at: 3 }
    ]);

    expect(state.messages).toEqual([
      { id: '3-0', role: 'user', text: 'What time is it?', timestamp: 3 },
      { id: '3-1', role: 'assistant', text: 'It is noon.', timestamp: 3 }
    ]);
  });

  it('adds typed text immediately', () => {
    const state = reduce([{ type: 'userText', text: 'hi', at: 5 }]);

    expect(state.messages).toEqual([{ id: '5-0', role: 'user', text: 'hi', timestamp: 5 }]);
  });

  it('keeps only the most recent messages', () => {
    const actions: TranscriptAction[] = Array.from({ length: 25 }, (_, i) => ({ type: 'userText', text: `m${i}`, at: i }));

    const state = reduce(actions);

    expect(state.messages).toHaveLength(20);
    expect(state.messages[0].text).toBe('m5');
    expect(state.messages[19].id).toBe('24-24');
  });

  it('ignores state changes', () => {
    const state = reduce([{ type: 'session', event: { type: 'state', state: SessionState.ACTIVE }, at: 1 }]);
    expect(state).toBe(initialTranscript);
  });
});
