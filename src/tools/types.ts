// ── Tool calls ──────────────────────────────────────────────────────────────

/** One tool invocation proposed by the decision-maker */
export interface ToolCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

// ── Tool results ────────────────────────────────────────────────────────────

/**
 * `flagged` is text the peer returned as a success but which reads like a
 * failure: the decision-maker sees it as an error and may retry.
 */
export type ToolResult =
  | { status: 'ok'; text: string }
  | { status: 'flagged'; text: string }
  | { status: 'error'; error: string };

/** Text form of a result as it goes back into the transcript */
export function renderToolResult(result: ToolResult): string {
  switch (result.status) {
    case 'ok':
      return result.text;
    case 'flagged':
      return `[tool error] ${result.text}`;
    case 'error':
      return `[tool error] ${result.error}`;
  }
}

// ── Tool events ─────────────────────────────────────────────────────────────

export type ToolEvent =
  | { type: 'tool-start'; tool: string; peer: string; callId: string }
  | { type: 'tool-complete'; tool: string; peer: string; callId: string; preview: string; durationMs: number }
  | { type: 'tool-error'; tool: string; peer: string; callId: string; error: string; durationMs: number };

export type ToolEventListener = (event: ToolEvent) => void;

/** Shorten tool output for progress events */
export function previewText(text: string, max = 200): string {
  return text.length > max ? text.slice(0, max) + '...' : text;
}
