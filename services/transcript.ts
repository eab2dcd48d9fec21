import { MAX_MESSAGES } from '../constants';
import type { Message, SessionEvent } from '../types';

export interface TranscriptState {
  messages: Message[];
  pendingUser: string;
  pendingAssistant: string;
  nextId: number;
}

export type TranscriptAction =
  | { type: 'session'; event: SessionEvent; at: number }
  | { type: 'userText'; text: string; at: number };

export const initialTranscript: TranscriptState = {
  messages: [],
  pendingUser: '',
  pendingAssistant: '',
  nextId: 0
};

function append(state: TranscriptState, entries: Array<Pick<Message, 'role' | 'text'>>, at: number): TranscriptState {
  const added = entries.map((entry, index) => ({
    id: `${at}-${state.nextId + index}`,
    role: entry.role,
    text: entry.text,
    timestamp: at
  }));
  return {
    ...state,
    messages: [...state.messages, ...added].slice(-MAX_MESSAGES),
    nextId: state.nextId + added.length
  };
}

/** In-memory display buffer: streamed text is collected per turn and committed on turn completion. */
export function transcriptReducer(state: TranscriptState, action: TranscriptAction): TranscriptState {
  if (action.type === 'userText') {
    return append(state, [{ role: 'user', text: action.text }], action.at);
  }

  const { event } = action;
  switch (event.type) {
    case 'text':
      return { ...state, pendingAssistant: state.pendingAssistant + event.text };
    case 'transcript':
      return event.role === 'user'
        ? { ...state, pendingUser: state.pendingUser + event.text }
        : { ...state, pendingAssistant: state.pendingAssistant + event.text };
    case 'turnComplete': {
      const userText = state.pendingUser.trim();
      const assistantText = state.pendingAssistant.trim();
      const flushed = append(
        state,
        [
          ...(userText ? [{ role: 'user' as const, text: userText }] : []),
          ...(assistantText ? [{ role: 'assistant' as const, text: assistantText }] : [])
        ],
        action.at
      );
      return { ...flushed, pendingUser: '', pendingAssistant: '' };
    }
    default:
      return state;
  }
}
