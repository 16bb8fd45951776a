import type { Decision, DecisionMaker, DecisionRequest } from '../decision/types.js';
import type { ToolSource } from '../orchestrator/agent-loop.js';
import type { BoundTool } from '../tools/tool-catalog.js';
import type { InvokeOptions } from '../tools/tool-facade.js';
import type { ToolCall, ToolResult } from '../tools/types.js';
import type { ToolDescriptor } from '../peers/types.js';

export type ScriptStep = Decision | ((request: DecisionRequest, turn: number) => Decision | Promise<Decision>);

export function textDecision(text: string): Decision {
  return { text, toolCalls: [] };
}

export function toolDecision(...calls: Array<Omit<ToolCall, 'args'> & { args?: Record<string, unknown> }>): Decision {
  return { text: '', toolCalls: calls.map((c) => ({ id: c.id, name: c.name, args: c.args ?? {} })) };
}

/**
 * DecisionMaker that plays back a fixed script, then repeats `fallback`
 * (or throws) once the script runs out. Keeps every request it saw.
 */
export class ScriptedDecisionMaker implements DecisionMaker {
  readonly name = 'scripted';
  readonly requests: DecisionRequest[] = [];

  constructor(
    private readonly script: ScriptStep[],
    private readonly fallback?: ScriptStep,
  ) {}

  get calls(): number {
    return this.requests.length;
  }

  async decide(request: DecisionRequest): Promise<Decision> {
    this.requests.push(request);
    const turn = this.requests.length;
    const step = this.script[turn - 1] ?? this.fallback;
    if (!step) throw new Error(`script exhausted at turn ${turn}`);
    return typeof step === 'function' ? step(request, turn) : step;
  }
}

export type StubTool = (args: Record<string, unknown>) => ToolResult | Promise<ToolResult>;

/** In-memory ToolSource; records invocations in order */
export class StubToolSource implements ToolSource {
  readonly invocations: Array<{ name: string; args: Record<string, unknown>; callId: string | undefined }> = [];
  private readonly tools = new Map<string, BoundTool>();

  add(name: string, impl: StubTool, peer = 'stub'): this {
    const descriptor: ToolDescriptor = {
      name,
      description: `Tool ${name}`,
      inputSchema: {},
      rawSchema: { type: 'object', properties: {} },
    };
    this.tools.set(name, {
      name,
      peer,
      descriptor,
      invoke: async (args: Record<string, unknown>, options?: InvokeOptions) => {
        this.invocations.push({ name, args, callId: options?.callId });
        return impl(args);
      },
    });
    return this;
  }

  get(name: string): BoundTool | undefined {
    return this.tools.get(name);
  }

  descriptors(): ToolDescriptor[] {
    return [...this.tools.values()].map((t) => t.descriptor);
  }
}
