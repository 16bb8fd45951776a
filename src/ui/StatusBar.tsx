import React from 'react';
import { Box, Text } from 'ink';
import type { TerminalState } from '../orchestrator/types.js';
import { stateHex, stateLabel } from '../config/theme.js';

interface StatusBarProps {
  sessionId: string;
  progress: string;
  toolCount: number;
  state: TerminalState | null;
}

function dot(state: TerminalState | null): { d: string; c: string } {
  if (!state) return { d: '●', c: 'green' };
  return { d: '○', c: stateHex(state) };
}

export function StatusBar({ sessionId, progress, toolCount, state }: StatusBarProps) {
  const s = dot(state);

  return (
    <Box paddingX={1} justifyContent="space-between">
      <Box gap={2}>
        <Text><Text color={s.c}>{s.d}</Text><Text dimColor> {sessionId.slice(0, 8)}</Text></Text>
        <Text dimColor>{state ? stateLabel(state) : progress}</Text>
        <Text dimColor>{toolCount} tools</Text>
      </Box>
      <Text dimColor>{state ? '' : 'Esc stop · ^C quit'}</Text>
    </Box>
  );
}
