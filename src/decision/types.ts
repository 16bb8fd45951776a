import type { ToolDescriptor } from '../peers/types.js';
import type { ToolCall } from '../tools/types.js';
import type { Transcript } from '../orchestrator/types.js';

export interface Decision {
  text: string;
  /** Empty when the decision-maker answered with text only */
  toolCalls: ToolCall[];
}

export interface DecisionRequest {
  transcript: Transcript;
  tools: readonly ToolDescriptor[];
  signal: AbortSignal;
}

/** Reads the transcript and proposes the next action: text or tool calls */
export interface DecisionMaker {
  readonly name: string;
  decide(request: DecisionRequest): Promise<Decision>;
}
