import { randomUUID } from 'node:crypto';
import type { PeerSupervisor } from '../peers/supervisor.js';
import { describeRpcError } from '../peers/errors.js';
import { looksLikeFailure } from './failure-heuristic.js';
import { previewText, type ToolEventListener, type ToolResult } from './types.js';
import { flog } from '../utils/log.js';

function labelled(text: string, forceFlag = false): ToolResult {
  return forceFlag || looksLikeFailure(text) ? { status: 'flagged', text } : { status: 'ok', text };
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}

/**
 * Normalize a `tools/call` result. Peers signal failure either with an
 * `error` member or only in the text they return, so text is scanned too.
 */
export function normalizeToolReply(reply: unknown): ToolResult {
  if (!reply || typeof reply !== 'object' || Array.isArray(reply)) {
    return labelled(stringify(reply));
  }

  if ('error' in reply && reply.error !== undefined && reply.error !== null) {
    return { status: 'error', error: describeRpcError(reply.error) };
  }

  const isError = 'isError' in reply && reply.isError === true;

  if ('content' in reply) {
    const content = reply.content;
    if (Array.isArray(content) && content.length > 0) {
      const first: unknown = content[0];
      const text = first && typeof first === 'object' && 'text' in first && typeof first.text === 'string'
        ? first.text
        : stringify(content);
      return labelled(text, isError);
    }
    return labelled(stringify(content), isError);
  }

  return labelled(stringify(reply), isError);
}

export interface InvokeOptions {
  callId?: string;
  onEvent?: ToolEventListener;
}

/** Uniform tool call against any peer: never throws */
export class ToolInvoker {
  constructor(private readonly supervisor: PeerSupervisor) {}

  async invoke(
    peerName: string,
    toolName: string,
    args: Record<string, unknown>,
    options: InvokeOptions = {},
  ): Promise<ToolResult> {
    const callId = options.callId ?? randomUUID().slice(0, 8);
    const emit = options.onEvent ?? (() => {});
    const startedAt = Date.now();
    const base = { tool: toolName, peer: peerName, callId };

    emit({ type: 'tool-start', ...base });
    flog.info('TOOL', `Invoking ${peerName}.${toolName}`, { callId });

    const result = await this.call(peerName, toolName, args);
    const durationMs = Date.now() - startedAt;

    switch (result.status) {
      case 'ok':
        flog.info('TOOL', `${peerName}.${toolName} succeeded (${durationMs}ms): ${previewText(result.text, 100)}`);
        emit({ type: 'tool-complete', ...base, preview: previewText(result.text), durationMs });
        break;
      case 'flagged':
        flog.warn('TOOL', `${peerName}.${toolName} returned failure text (${durationMs}ms): ${previewText(result.text, 200)}`);
        emit({ type: 'tool-error', ...base, error: previewText(result.text), durationMs });
        break;
      case 'error':
        flog.error('TOOL', `${peerName}.${toolName} failed (${durationMs}ms): ${result.error}`);
        emit({ type: 'tool-error', ...base, error: result.error, durationMs });
        break;
    }
    return result;
  }

  private async call(peerName: string, toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
    const started = await this.supervisor.start(peerName);
    if (!started.ok) {
      return { status: 'error', error: `Peer "${peerName}" could not be started: ${started.error.message}` };
    }
    const reply = await this.supervisor.callTool(peerName, toolName, args);
    if (!reply.ok) {
      return { status: 'error', error: reply.error.message };
    }
    return normalizeToolReply(reply.value);
  }
}
