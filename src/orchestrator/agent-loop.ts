import type { ToolDescriptor } from '../peers/types.js';
import type { BoundTool } from '../tools/tool-catalog.js';
import { previewText, type ToolCall, type ToolResult } from '../tools/types.js';
import type { Decision, DecisionMaker } from '../decision/types.js';
import { CancellationError } from '../peers/errors.js';
import { judgeDecision, type TerminationPolicy } from './termination.js';
import {
  ABORT_MARKER,
  type LoopEvent,
  type LoopOutcome,
  type TerminalState,
  type TranscriptTurn,
} from './types.js';
import { flog } from '../utils/log.js';

export interface LoopPolicy extends TerminationPolicy {
  /** Hard ceiling: decision turn maxTurns + 1 is never started */
  maxTurns: number;
}

/** What the loop needs from the tool catalog */
export interface ToolSource {
  get(name: string): BoundTool | undefined;
  descriptors(): ToolDescriptor[];
}

export interface AgentLoopOptions {
  sessionId: string;
  query: string;
  tools: ToolSource;
  decisionMaker: DecisionMaker;
  policy: LoopPolicy;
  signal: AbortSignal;
  emit?: (event: LoopEvent) => void;
}

/** Result of one turn: keep going, or how the session ended. Cancellation is thrown. */
export type StepResult = 'continue' | Exclude<TerminalState, 'aborted'>;

/**
 * Give every call in a batch a usable id. Missing or repeated ids are
 * replaced with `call_<index>` so tool turns can be matched to their call.
 */
export function normalizeToolCalls(calls: readonly ToolCall[]): ToolCall[] {
  const seen = new Set<string>();
  return calls.map((call, index) => {
    let id = call.id;
    if (!id || seen.has(id)) {
      id = `call_${index}`;
      let suffix = 1;
      while (seen.has(id)) id = `call_${index}_${suffix++}`;
    }
    seen.add(id);
    return { id, name: call.name, args: call.args };
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * One session's control loop. A turn is a decision call plus the tool batch
 * it asks for. Cancellation is read from the signal before and after every
 * decision call and around every tool call; `run()` never throws.
 */
export class AgentLoop {
  private readonly transcript: TranscriptTurn[] = [];
  private readonly emit: (event: LoopEvent) => void;
  private iterations = 0;
  private toolCallCount = 0;
  private lastText = '';
  private outcome: LoopOutcome | null = null;

  constructor(private readonly options: AgentLoopOptions) {
    this.emit = options.emit ?? (() => {});
    this.transcript.push({ role: 'user', content: options.query });
  }

  get turns(): number {
    return this.iterations;
  }

  get history(): readonly TranscriptTurn[] {
    return this.transcript;
  }

  private get aborted(): boolean {
    return this.options.signal.aborted;
  }

  private checkpoint(where: string): void {
    if (this.aborted) throw new CancellationError(`Cancelled ${where}`);
  }

  private checkpointTool(call: ToolCall, where: string): void {
    if (!this.aborted) return;
    this.emit({ type: 'tool-abort', tool: call.name, callId: call.id, reason: `Cancelled ${where}` });
    throw new CancellationError(`Cancelled ${where} (${call.name})`);
  }

  async run(): Promise<LoopOutcome> {
    if (this.outcome) return this.outcome;
    const { sessionId, policy } = this.options;
    flog.info('LOOP', `Session ${sessionId} started`, { maxTurns: policy.maxTurns, maxIterations: policy.maxIterations });
    this.emit({ type: 'status', message: 'Session started' });

    let state: TerminalState;
    try {
      state = await this.drive();
    } catch (err) {
      if (err instanceof CancellationError) {
        flog.info('LOOP', `Session ${sessionId}: ${err.message}`);
      } else {
        const message = errorMessage(err);
        flog.error('LOOP', `Session ${sessionId} failed: ${message}`);
        this.emit({ type: 'error', message });
      }
      state = 'aborted';
    }
    return this.finish(state);
  }

  private async drive(): Promise<TerminalState> {
    for (;;) {
      this.checkpoint('between turns');
      if (this.iterations >= this.options.policy.maxTurns) {
        flog.warn('LOOP', `Hard ceiling reached after ${this.iterations} turns`);
        return 'ended-by-ceiling';
      }
      const result = await this.step();
      if (result !== 'continue') return result;
    }
  }

  /** Run one decision turn and the tool batch it asks for; throws CancellationError once cancelled */
  async step(): Promise<StepResult> {
    this.checkpoint('before the decision turn');

    this.iterations++;
    const { policy, decisionMaker } = this.options;
    this.emit({
      type: 'progress',
      value: Math.round((this.iterations / policy.maxTurns) * 100),
      message: `Turn ${this.iterations}/${policy.maxTurns}`,
    });

    const decision = await this.decide(decisionMaker);
    this.checkpoint(`during decision turn ${this.iterations}`);

    const toolCalls = normalizeToolCalls(decision.toolCalls);
    this.transcript.push({ role: 'assistant', content: decision.text, toolCalls });
    this.lastText = decision.text;
    if (decision.text) this.emit({ type: 'content-chunk', content: decision.text });

    const verdict = judgeDecision({ text: decision.text, toolCalls }, this.iterations, policy);
    flog.debug('LOOP', `Turn ${this.iterations}: ${verdict}`, { toolCalls: toolCalls.length, textLength: decision.text.length });

    switch (verdict) {
      case 'tools':
        return this.runTools(toolCalls);
      case 'continue':
        return 'continue';
      case 'end':
        return 'ended-normally';
      case 'ceiling':
        return 'ended-by-ceiling';
    }
  }

  private async decide(decisionMaker: DecisionMaker): Promise<Decision> {
    try {
      return await decisionMaker.decide({
        transcript: [...this.transcript],
        tools: this.options.tools.descriptors(),
        signal: this.options.signal,
      });
    } catch (err) {
      const message = errorMessage(err);
      if (!this.aborted) flog.error('DECISION', `${decisionMaker.name} failed: ${message}`);
      return { text: `Decision call failed: ${message}`, toolCalls: [] };
    }
  }

  private async runTools(calls: readonly ToolCall[]): Promise<StepResult> {
    for (const call of calls) {
      this.checkpointTool(call, 'before the call started');
      const result = await this.invoke(call);
      // An in-flight result that lands after cancellation is discarded
      this.checkpointTool(call, 'while the call was in flight');

      this.transcript.push({ role: 'tool', toolCallId: call.id, toolName: call.name, result });
      this.toolCallCount++;
    }
    return 'continue';
  }

  private invoke(call: ToolCall): Promise<ToolResult> {
    const tool = this.options.tools.get(call.name);
    if (!tool) {
      const error = `Tool "${call.name}" is not available`;
      flog.warn('TOOL', error, { callId: call.id });
      this.emit({ type: 'tool-error', tool: call.name, peer: '', callId: call.id, error, durationMs: 0 });
      return Promise.resolve({ status: 'error', error });
    }
    flog.debug('LOOP', `Calling ${tool.peer}.${call.name}`, { callId: call.id, args: previewText(JSON.stringify(call.args), 120) });
    return tool.invoke(call.args, { callId: call.id, onEvent: this.emit });
  }

  private finish(state: TerminalState): LoopOutcome {
    if (state === 'aborted') {
      this.transcript.push({ role: 'assistant', content: ABORT_MARKER, toolCalls: [], aborted: true });
    }
    const outcome: LoopOutcome = {
      sessionId: this.options.sessionId,
      state,
      iterations: this.iterations,
      toolCalls: this.toolCallCount,
      finalText: this.lastText,
      transcript: this.transcript,
    };
    this.outcome = outcome;
    this.emit({ type: 'progress', value: 100, message: state });
    this.emit({ type: 'complete', state, iterations: this.iterations, finalText: this.lastText });
    flog.info('LOOP', `Session ${outcome.sessionId} ${state}`, { iterations: this.iterations, toolCalls: this.toolCallCount });
    return outcome;
  }
}
