import OpenAI from 'openai';
import type { ToolDescriptor } from '../peers/types.js';
import { renderToolResult, type ToolCall } from '../tools/types.js';
import type { Transcript } from '../orchestrator/types.js';
import { getDecisionSystemPrompt } from '../orchestrator/prompts.js';
import type { Decision, DecisionMaker, DecisionRequest } from './types.js';
import { flog } from '../utils/log.js';

export interface OpenAIDecisionOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/** The part of a chat-completion message the loop reads */
export interface CompletionMessage {
  content: string | null;
  tool_calls?: ReadonlyArray<{ id: string; function: { name: string; arguments: string } }>;
}

// ── Request mapping ─────────────────────────────────────────────────────────

export function toChatMessages(transcript: Transcript, systemPrompt: string): OpenAI.ChatCompletionMessageParam[] {
  const messages: OpenAI.ChatCompletionMessageParam[] = [{ role: 'system', content: systemPrompt }];
  for (const turn of transcript) {
    switch (turn.role) {
      case 'user':
        messages.push({ role: 'user', content: turn.content });
        break;
      case 'assistant':
        if (turn.toolCalls.length > 0) {
          messages.push({
            role: 'assistant',
            content: turn.content || null,
            tool_calls: turn.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: JSON.stringify(call.args) },
            })),
          });
        } else {
          messages.push({ role: 'assistant', content: turn.content });
        }
        break;
      case 'tool':
        messages.push({ role: 'tool', tool_call_id: turn.toolCallId, content: renderToolResult(turn.result) });
        break;
    }
  }
  return messages;
}

export function toChatTools(tools: readonly ToolDescriptor[]): OpenAI.ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: 'type' in tool.rawSchema ? tool.rawSchema : { type: 'object', properties: {}, ...tool.rawSchema },
    },
  }));
}

// ── Response mapping ────────────────────────────────────────────────────────

function parseArguments(raw: string, toolName: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    flog.warn('DECISION', `Arguments for ${toolName} are not an object: using {}`);
  } catch (err) {
    flog.warn('DECISION', `Unparseable arguments for ${toolName}: using {}: ${err}`);
  }
  return {};
}

export function parseCompletionMessage(message: CompletionMessage): Decision {
  const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((call) => ({
    id: call.id,
    name: call.function.name,
    args: parseArguments(call.function.arguments, call.function.name),
  }));
  return { text: message.content ?? '', toolCalls };
}

// ── Decision-maker ──────────────────────────────────────────────────────────

/** Chat-completions decision-maker for any OpenAI-compatible endpoint (OpenRouter by default) */
export class OpenAIDecisionMaker implements DecisionMaker {
  readonly name: string;
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIDecisionOptions) {
    this.name = `openai:${options.model}`;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      defaultHeaders: { 'X-Title': 'peerloop' },
    });
  }

  async decide(request: DecisionRequest): Promise<Decision> {
    const messages = toChatMessages(request.transcript, getDecisionSystemPrompt(request.tools.map((t) => t.name)));
    const tools = toChatTools(request.tools);
    const startedAt = Date.now();

    const completion = await this.client.chat.completions.create(
      {
        model: this.options.model,
        messages,
        ...(tools.length > 0 ? { tools } : {}),
        temperature: this.options.temperature ?? 0.7,
        max_tokens: this.options.maxTokens ?? 4000,
      },
      { signal: request.signal },
    );

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new Error(`${this.name} returned no choices`);
    }
    const decision = parseCompletionMessage(message);
    flog.info('DECISION', `${this.name} answered in ${Date.now() - startedAt}ms`, {
      toolCalls: decision.toolCalls.length,
      textLength: decision.text.length,
      tokens: completion.usage?.total_tokens,
    });
    return decision;
  }
}

/** API key from the environment: LLM_API_KEY, then OPENAI_API_KEY */
export function resolveApiKey(env: NodeJS.ProcessEnv = process.env): string | null {
  return env.LLM_API_KEY || env.OPENAI_API_KEY || null;
}
