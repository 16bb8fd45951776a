import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

const flows = new AsyncLocalStorage<string>();

/** Create a short flow ID for log correlation */
export function newFlowId(): string {
  return randomUUID().slice(0, 8);
}

/** Run `fn` inside a flow: every log line written from it carries `flowId` */
export function runInFlow<T>(flowId: string, fn: () => T): T {
  return flows.run(flowId, fn);
}

/** Get the current flow ID, or null outside any flow */
export function getFlowId(): string | null {
  return flows.getStore() ?? null;
}
