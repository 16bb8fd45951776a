import React from 'react';
import { Box, Text } from 'ink';
import { flog } from '../utils/log.js';

interface ErrorBoundaryProps {
  children: React.ReactNode;
  /** Told about a render crash after it has been logged */
  onError?: (error: Error) => void;
}

interface State { error: Error | null }

/** Replaces a crashed view with its error message and logs the crash */
export class ErrorBoundary extends React.Component<ErrorBoundaryProps, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, info: React.ErrorInfo): void {
    const where = info.componentStack?.trim().split('\n')[0]?.trim() ?? 'unknown component';
    flog.error('SYSTEM', `Session view crashed in ${where}: ${error.message}`);
    this.props.onError?.(error);
  }

  render() {
    if (this.state.error) {
      return (
        <Box flexDirection="column" paddingX={2}>
          <Text color="red">The session view crashed: {this.state.error.message}</Text>
          <Text dimColor>^C quits. Details are in ~/.peerloop/logs/</Text>
        </Box>
      );
    }
    return this.props.children;
  }
}
