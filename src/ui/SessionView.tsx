import React, { useEffect, useReducer } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import Spinner from 'ink-spinner';
import type { SessionManager } from '../orchestrator/session-manager.js';
import { StatusBar } from './StatusBar.js';
import {
  applySessionEvent,
  INITIAL_VIEW_STATE,
  type ToolLineStatus,
  type ViewLine,
} from './session-view-state.js';
import { THEME, stateHex, stateLabel } from '../config/theme.js';
import { flog } from '../utils/log.js';

interface SessionViewProps {
  manager: SessionManager;
  sessionId: string;
  query: string;
}

const TOOL_ICON: Record<ToolLineStatus, { icon: string; color: string }> = {
  running: { icon: '▸', color: THEME.info },
  ok: { icon: '✓', color: THEME.ok },
  error: { icon: '✗', color: THEME.error },
  aborted: { icon: '■', color: THEME.muted },
};

function Line({ line }: { line: ViewLine }) {
  switch (line.kind) {
    case 'status':
      return <Text color={THEME.muted}>  {line.text}</Text>;
    case 'text':
      return <Text color={THEME.text}>{line.text}</Text>;
    case 'error':
      return <Text color={THEME.error}>  ! {line.text}</Text>;
    case 'tool': {
      const st = TOOL_ICON[line.status];
      const where = line.peer ? ` (${line.peer})` : '';
      const took = line.durationMs !== undefined ? ` ${line.durationMs}ms` : '';
      return (
        <Box flexDirection="column">
          <Text>
            <Text color={THEME.actionIcon}>  │ </Text>
            <Text color={st.color}>{st.icon} </Text>
            <Text color={THEME.actionValue}>{line.tool}</Text>
            <Text color={THEME.actionText}>{where}{took}</Text>
          </Text>
          {line.detail ? <Text color={THEME.actionText}>  │   {line.detail}</Text> : null}
        </Box>
      );
    }
  }
}

/** Live view of one session: tool activity, assistant text, then the final state */
export function SessionView({ manager, sessionId, query }: SessionViewProps) {
  const { exit } = useApp();
  const [view, dispatch] = useReducer(applySessionEvent, INITIAL_VIEW_STATE);

  useEffect(() => {
    const sink = manager.events(sessionId);
    if (!sink) {
      exit(new Error(`Unknown session: ${sessionId}`));
      return;
    }
    let unmounted = false;
    const pump = async () => {
      for await (const event of sink) {
        if (unmounted) break;
        dispatch(event);
      }
    };
    pump()
      .then(() => {
        if (!unmounted) exit();
      })
      .catch((err: unknown) => {
        flog.error('SYSTEM', `Session view stopped reading events: ${err}`);
        if (!unmounted) exit(err instanceof Error ? err : new Error(String(err)));
      });
    return () => {
      unmounted = true;
    };
  }, [manager, sessionId, exit]);

  useInput((_input, key) => {
    if (key.escape && !view.complete) {
      manager.abort(sessionId);
    }
  });

  return (
    <Box flexDirection="column">
      <Text>
        <Text color={THEME.accent} bold>› </Text>
        <Text color={THEME.text}>{query}</Text>
      </Text>
      <Text color={THEME.separator}>{'─'.repeat(60)}</Text>
      {view.lines.map((line, i) => (
        <Line key={i} line={line} />
      ))}
      {view.complete ? (
        <Text color={stateHex(view.complete.state)}>
          {'  '}{stateLabel(view.complete.state)} after {view.complete.iterations} turns
        </Text>
      ) : (
        <Text>
          <Text color={THEME.accent}><Spinner type="dots" /></Text>
          <Text color={THEME.muted}> {view.progress.message}</Text>
        </Text>
      )}
      <StatusBar
        sessionId={sessionId}
        progress={`${view.progress.value}%`}
        toolCount={view.toolCount}
        state={view.complete?.state ?? null}
      />
    </Box>
  );
}
