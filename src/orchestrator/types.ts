import type { ToolCall, ToolEvent, ToolResult } from '../tools/types.js';

// ── Transcript ──────────────────────────────────────────────────────────────

export type TranscriptTurn =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls: ToolCall[]; aborted?: true }
  | { role: 'tool'; toolCallId: string; toolName: string; result: ToolResult };

export type Transcript = readonly TranscriptTurn[];

export const ABORT_MARKER = '[aborted] Session cancelled by request.';

// ── Loop outcome ────────────────────────────────────────────────────────────

export type TerminalState = 'ended-normally' | 'ended-by-ceiling' | 'aborted';

export interface LoopOutcome {
  sessionId: string;
  state: TerminalState;
  /** Decision turns taken */
  iterations: number;
  toolCalls: number;
  /** Text of the last assistant turn, empty if none */
  finalText: string;
  transcript: Transcript;
}

// ── Events ──────────────────────────────────────────────────────────────────

export type LoopEvent =
  | { type: 'status'; message: string }
  | ToolEvent
  | { type: 'tool-abort'; tool: string; callId: string; reason: string }
  | { type: 'content-chunk'; content: string }
  | { type: 'progress'; value: number; message: string }
  | { type: 'complete'; state: TerminalState; iterations: number; finalText: string }
  | { type: 'error'; message: string };

export type SessionEvent = LoopEvent & {
  sessionId: string;
  seq: number;
  timestamp: number;
};
