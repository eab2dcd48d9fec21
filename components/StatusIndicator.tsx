import React from 'react';
import { Text } from 'ink';
import { SessionState } from '../types';

const STATUS_COLORS: Record<SessionState, string> = {
  [SessionState.IDLE]: 'gray',
  [SessionState.CONNECTING]: 'yellow',
  [SessionState.ACTIVE]: 'green',
  [SessionState.RECOVERING]: 'yellow',
  [SessionState.TERMINATED]: 'red'
};

interface StatusIndicatorProps {
  status: SessionState;
  /** Whether the session ended on an error rather than a stop. */
  failed?: boolean;
}

const StatusIndicator: React.FC<StatusIndicatorProps> = ({ status, failed = false }) => {
  // A session that ended without an error was stopped, not lost
  if (status === SessionState.TERMINATED && !failed) {
    return <Text color="gray">● STOPPED</Text>;
  }
  return <Text color={STATUS_COLORS[status]}>{`● ${status.toUpperCase()}`}</Text>;
};

export default StatusIndicator;
