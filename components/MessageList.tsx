import React from 'react';
import { Box, Text } from 'ink';
import type { Message } from '../types';

interface MessageListProps {
  messages: Message[];
  pendingUser: string;
  pendingAssistant: string;
}

const label = (role: Message['role']) => (role === 'user' ? 'You' : 'Assistant');

const MessageList: React.FC<MessageListProps> = ({ messages, pendingUser, pendingAssistant }) => {
  if (messages.length === 0 && !pendingUser && !pendingAssistant) {
    return (
      <Box flexDirection="column" paddingY={1}>
        <Text dimColor>No messages yet.</Text>
        <Text dimColor>Start talking or type a message to see it here!</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" paddingY={1}>
      {messages.map(m => (
        <Text key={m.id} color={m.role === 'user' ? 'magenta' : 'white'}>
          {`${label(m.role)}: ${m.text}`}
        </Text>
      ))}
      {pendingUser && <Text dimColor>{`${label('user')}: ${pendingUser}`}</Text>}
      {pendingAssistant && <Text dimColor>{`${label('assistant')}: ${pendingAssistant}`}</Text>}
    </Box>
  );
};

export default MessageList;
