import type { PeerSupervisor } from '../peers/supervisor.js';
import type { ToolDescriptor } from '../peers/types.js';
import type { ToolInvoker, InvokeOptions } from './tool-facade.js';
import type { ToolResult } from './types.js';
import { flog } from '../utils/log.js';

/** A discovered tool, bound to the peer that serves it */
export interface BoundTool {
  readonly name: string;
  readonly peer: string;
  readonly descriptor: ToolDescriptor;
  invoke(args: Record<string, unknown>, options?: InvokeOptions): Promise<ToolResult>;
}

/**
 * Tool name → bound tool, filled once from every registered peer.
 * The control loop dispatches through this map only.
 */
export class ToolCatalog {
  private readonly tools = new Map<string, BoundTool>();

  constructor(
    private readonly supervisor: PeerSupervisor,
    private readonly invoker: ToolInvoker,
  ) {}

  /** Start every registered peer and index its tools; unreachable peers are skipped */
  async discover(): Promise<number> {
    this.tools.clear();
    for (const peer of this.supervisor.names()) {
      flog.info('TOOL', `Discovering tools on "${peer}"...`);
      const listed = await this.supervisor.listTools(peer);
      if (!listed.ok) {
        flog.warn('TOOL', `Peer "${peer}" unavailable: ${listed.error.message}`);
        continue;
      }
      for (const descriptor of listed.value) {
        this.add(peer, descriptor);
      }
    }
    flog.info('TOOL', `Discovered ${this.tools.size} tools`);
    return this.tools.size;
  }

  add(peer: string, descriptor: ToolDescriptor): boolean {
    const existing = this.tools.get(descriptor.name);
    if (existing) {
      flog.warn('TOOL', `Tool "${descriptor.name}" from "${peer}" shadowed by "${existing.peer}"`);
      return false;
    }
    const invoker = this.invoker;
    this.tools.set(descriptor.name, {
      name: descriptor.name,
      peer,
      descriptor,
      invoke: (args, options) => invoker.invoke(peer, descriptor.name, args, options),
    });
    return true;
  }

  get(name: string): BoundTool | undefined {
    return this.tools.get(name);
  }

  descriptors(): ToolDescriptor[] {
    return [...this.tools.values()].map((t) => t.descriptor);
  }

  list(): BoundTool[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }
}
