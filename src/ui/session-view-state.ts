import type { LoopEvent, TerminalState } from '../orchestrator/types.js';

export type ToolLineStatus = 'running' | 'ok' | 'error' | 'aborted';

export type ViewLine =
  | { kind: 'status'; text: string }
  | { kind: 'text'; text: string }
  | { kind: 'error'; text: string }
  | {
      kind: 'tool';
      callId: string;
      tool: string;
      peer: string;
      status: ToolLineStatus;
      detail: string;
      durationMs?: number;
    };

export interface SessionViewState {
  lines: ViewLine[];
  progress: { value: number; message: string };
  /** Tool calls that reached a result (ok or error) */
  toolCount: number;
  complete: { state: TerminalState; iterations: number; finalText: string } | null;
}

export const MAX_VIEW_LINES = 300;

export const INITIAL_VIEW_STATE: SessionViewState = {
  lines: [],
  progress: { value: 0, message: 'Starting' },
  toolCount: 0,
  complete: null,
};

function append(lines: ViewLine[], line: ViewLine): ViewLine[] {
  const next = [...lines, line];
  return next.length > MAX_VIEW_LINES ? next.slice(next.length - MAX_VIEW_LINES) : next;
}

/** Index of the most recent running line for `callId`, or -1 */
function runningIndex(lines: ViewLine[], callId: string): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (line.kind === 'tool' && line.callId === callId && line.status === 'running') return i;
  }
  return -1;
}

function settle(
  lines: ViewLine[],
  callId: string,
  fallback: { tool: string; peer: string },
  patch: { status: ToolLineStatus; detail: string; durationMs?: number },
): ViewLine[] {
  const index = runningIndex(lines, callId);
  if (index === -1) {
    return append(lines, { kind: 'tool', callId, ...fallback, ...patch });
  }
  return lines.map((line, i) => (i === index && line.kind === 'tool' ? { ...line, ...patch } : line));
}

/** Fold one session event into what the terminal shows */
export function applySessionEvent(state: SessionViewState, event: LoopEvent): SessionViewState {
  switch (event.type) {
    case 'status':
      return { ...state, lines: append(state.lines, { kind: 'status', text: event.message }) };
    case 'tool-start':
      return {
        ...state,
        lines: append(state.lines, {
          kind: 'tool',
          callId: event.callId,
          tool: event.tool,
          peer: event.peer,
          status: 'running',
          detail: '',
        }),
      };
    case 'tool-complete':
      return {
        ...state,
        toolCount: state.toolCount + 1,
        lines: settle(state.lines, event.callId, { tool: event.tool, peer: event.peer }, {
          status: 'ok',
          detail: event.preview,
          durationMs: event.durationMs,
        }),
      };
    case 'tool-error':
      return {
        ...state,
        toolCount: state.toolCount + 1,
        lines: settle(state.lines, event.callId, { tool: event.tool, peer: event.peer }, {
          status: 'error',
          detail: event.error,
          durationMs: event.durationMs,
        }),
      };
    case 'tool-abort':
      return {
        ...state,
        lines: settle(state.lines, event.callId, { tool: event.tool, peer: '' }, {
          status: 'aborted',
          detail: event.reason,
        }),
      };
    case 'content-chunk':
      return { ...state, lines: append(state.lines, { kind: 'text', text: event.content }) };
    case 'progress':
      return { ...state, progress: { value: event.value, message: event.message } };
    case 'complete':
      return {
        ...state,
        complete: { state: event.state, iterations: event.iterations, finalText: event.finalText },
      };
    case 'error':
      return { ...state, lines: append(state.lines, { kind: 'error', text: event.message }) };
  }
}
