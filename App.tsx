import React, { useState, useEffect, useReducer, useCallback } from 'react';
import { Box, Text, useApp } from 'ink';
import TextInput from 'ink-text-input';
import { SessionState, type SessionConfig } from './types';
import { QUIT_TOKEN } from './constants';
import { COMMAND_HELP, parseCommand, type Command } from './services/commands';
import { describeError } from './services/errors';
import { createLogger } from './services/logger';
import { mergeConfig } from './services/sessionConfig';
import type { SessionOrchestrator } from './services/sessionOrchestrator';
import { initialTranscript, transcriptReducer } from './services/transcript';
import MessageList from './components/MessageList';
import StatusIndicator from './components/StatusIndicator';

const logger = createLogger('app');

interface AppProps {
  orchestrator: SessionOrchestrator;
  /** Accept keyboard input. Off when rendered without a TTY. */
  interactive?: boolean;
}

const App: React.FC<AppProps> = ({ orchestrator, interactive = true }) => {
  const { exit } = useApp();
  const [status, setStatus] = useState<SessionState>(orchestrator.state);
  const [config, setConfig] = useState<SessionConfig>(orchestrator.config);
  const [transcript, dispatch] = useReducer(transcriptReducer, initialTranscript);
  const [draft, setDraft] = useState('');
  const [error, setError] = useState<string | null>(null);
  const [failed, setFailed] = useState(false);
  const [notice, setNotice] = useState<string | null>(null);

  useEffect(() => {
    setStatus(orchestrator.state);
    return orchestrator.subscribe(event => {
      if (event.type === 'state') {
        setStatus(event.state);
        if (event.state === SessionState.CONNECTING) setFailed(false);
      }
      if (event.type === 'error') {
        setError(event.error.message);
        setFailed(true);
      }
      dispatch({ type: 'session', event, at: Date.now() });
    });
  }, [orchestrator]);

  const cleanup = useCallback(() => {
    orchestrator.stop().catch(err => logger.error('Failed to stop session', err));
  }, [orchestrator]);

  useEffect(() => {
    return () => cleanup();
  }, [cleanup]);

  const runCommand = async (command: Command) => {
    setNotice(null);
    switch (command.type) {
      case 'start':
        setError(null);
        await orchestrator.start();
        setNotice('Session started - use headphones!');
        break;
      case 'stop':
        await orchestrator.stop();
        setNotice('Session stopped');
        break;
      case 'reconnect':
        if (!orchestrator.sendText(QUIT_TOKEN)) setError('No active session to reconnect.');
        break;
      case 'exit':
        await orchestrator.stop();
        exit();
        break;
      case 'help':
        setNotice(COMMAND_HELP);
        break;
      case 'config':
        orchestrator.updateConfig(command.update);
        setConfig(prev => mergeConfig(prev, command.update));
        setNotice(orchestrator.isRunning ? 'Config saved, applies on the next reconnect' : 'Config saved');
        break;
      case 'text':
        if (!command.text) return;
        if (orchestrator.sendText(command.text)) {
          dispatch({ type: 'userText', text: command.text, at: Date.now() });
        } else {
          setError('Start a session before sending messages.');
        }
        break;
      case 'invalid':
        setError(command.reason);
        break;
    }
  };

  const handleSubmit = (value: string) => {
    setDraft('');
    runCommand(parseCommand(value)).catch(err => {
      logger.error('Command failed', err);
      setError(describeError(err));
    });
  };

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box justifyContent="space-between">
        <Text bold color="cyan">
          Live Voice Console
        </Text>
        <StatusIndicator status={status} failed={failed} />
      </Box>
      <Text dimColor>{`Voice: ${config.voiceName} | Mode: ${config.responseModality}`}</Text>

      <MessageList
        messages={transcript.messages}
        pendingUser={transcript.pendingUser}
        pendingAssistant={transcript.pendingAssistant}
      />

      {error && <Text color="red">{error}</Text>}
      {notice && <Text color="green">{notice}</Text>}

      <Box borderStyle="round" borderColor={status === SessionState.ACTIVE ? 'green' : 'gray'} paddingX={1}>
        <Text color="gray">{'> '}</Text>
        <TextInput
          value={draft}
          onChange={setDraft}
          onSubmit={handleSubmit}
          focus={interactive}
          placeholder="Type a message or /help"
        />
      </Box>
      <Text dimColor>{COMMAND_HELP}</Text>
    </Box>
  );
};

export default App;
