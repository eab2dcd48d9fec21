import { VOICE_OPTIONS } from '../constants';
import { ResponseModality, type SessionConfigUpdate, type VoiceName } from '../types';

export type Command =
  | { type: 'start' }
  | { type: 'stop' }
  | { type: 'reconnect' }
  | { type: 'exit' }
  | { type: 'help' }
  | { type: 'config'; update: SessionConfigUpdate }
  | { type: 'text'; text: string }
  | { type: 'invalid'; reason: string };

export const COMMAND_HELP = '/start  /stop  /voice <name>  /mode <audio|text>  /system <text>  /reconnect  /exit';

function findVoice(name: string): VoiceName | undefined {
  return VOICE_OPTIONS.find(voice => voice.toLowerCase() === name.toLowerCase());
}

function findModality(name: string): ResponseModality | undefined {
  return Object.values(ResponseModality).find(mode => mode === name.toUpperCase());
}

/** Maps one line of console input to a control-surface action. */
export function parseCommand(input: string): Command {
  const line = input.trim();
  if (!line.startsWith('/')) return { type: 'text', text: line };

  const [name, ...rest] = line.slice(1).split(/\s+/);
  const argument = rest.join(' ');

  switch (name.toLowerCase()) {
    case 'start':
      return { type: 'start' };
    case 'stop':
      return { type: 'stop' };
    case 'reconnect':
      return { type: 'reconnect' };
    case 'exit':
    case 'quit':
      return { type: 'exit' };
    case 'help':
      return { type: 'help' };
    case 'voice': {
      const voiceName = findVoice(argument);
      if (!voiceName) return { type: 'invalid', reason: `Unknown voice "${argument}". Choose one of: ${VOICE_OPTIONS.join(', ')}` };
      return { type: 'config', update: { voiceName } };
    }
    case 'mode': {
      const responseModality = findModality(argument);
      if (!responseModality) return { type: 'invalid', reason: 'Mode must be audio or text' };
      return { type: 'config', update: { responseModality } };
    }
    case 'system':
      if (!argument) return { type: 'invalid', reason: 'System instruction cannot be empty' };
      return { type: 'config', update: { systemInstruction: argument } };
    default:
      return { type: 'invalid', reason: `Unknown command "/${name}"` };
  }
}
