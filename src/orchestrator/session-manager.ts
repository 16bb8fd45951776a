import { AgentLoop, type LoopPolicy, type ToolSource } from './agent-loop.js';
import { EventSink } from './event-sink.js';
import type { LoopOutcome } from './types.js';
import type { DecisionMaker } from '../decision/types.js';
import { newFlowId, runInFlow } from '../utils/flow.js';
import { flog } from '../utils/log.js';

export interface SessionManagerOptions {
  tools: ToolSource;
  decisionMaker: DecisionMaker;
  policy: LoopPolicy;
}

export interface ActiveSession {
  sessionId: string;
  startedAt: number;
  query: string;
}

interface SessionEntry extends ActiveSession {
  controller: AbortController;
  sink: EventSink;
  done: Promise<LoopOutcome>;
  finished: boolean;
}

/**
 * Owns every session: its cancellation flag, its event sink and the promise
 * of its outcome. Sessions share peers but never a transcript.
 */
export class SessionManager {
  private readonly sessions = new Map<string, SessionEntry>();

  constructor(private readonly options: SessionManagerOptions) {}

  start(query: string): string {
    const sessionId = newFlowId();
    const controller = new AbortController();
    const sink = new EventSink(sessionId);

    const loop = new AgentLoop({
      sessionId,
      query,
      tools: this.options.tools,
      decisionMaker: this.options.decisionMaker,
      policy: this.options.policy,
      signal: controller.signal,
      emit: (event) => sink.push(event),
    });

    const entry: SessionEntry = {
      sessionId,
      startedAt: Date.now(),
      query,
      controller,
      sink,
      finished: false,
      done: runInFlow(sessionId, () => loop.run()).finally(() => {
        entry.finished = true;
        sink.close();
        flog.info('SESSION', `Session ${sessionId} finished`);
      }),
    };
    this.sessions.set(sessionId, entry);
    flog.info('SESSION', `Session ${sessionId} started`, { query: query.slice(0, 120) });
    return sessionId;
  }

  /** Set the session's cancellation flag; false when unknown or already finished */
  abort(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry || entry.finished || entry.controller.signal.aborted) return false;
    entry.controller.abort();
    flog.info('SESSION', `Abort requested for ${sessionId}`);
    return true;
  }

  listActiveSessions(): ActiveSession[] {
    return [...this.sessions.values()]
      .filter((entry) => !entry.finished)
      .map(({ sessionId, startedAt, query }) => ({ sessionId, startedAt, query }));
  }

  events(sessionId: string): EventSink | undefined {
    return this.sessions.get(sessionId)?.sink;
  }

  wait(sessionId: string): Promise<LoopOutcome> {
    const entry = this.sessions.get(sessionId);
    if (!entry) return Promise.reject(new Error(`Unknown session: ${sessionId}`));
    return entry.done;
  }

  /**
   * Forget a finished session: its sink, transcript and outcome are dropped.
   * False when unknown or still running; `wait` rejects afterwards.
   */
  release(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry || !entry.finished) return false;
    entry.sink.close();
    this.sessions.delete(sessionId);
    flog.debug('SESSION', `Session ${sessionId} released`);
    return true;
  }

  /** Sessions held, running or finished but not yet released */
  get size(): number {
    return this.sessions.size;
  }

  /** Abort every running session and wait for all of them to end */
  async shutdown(): Promise<void> {
    const running = [...this.sessions.values()].filter((entry) => !entry.finished);
    for (const entry of running) entry.controller.abort();
    await Promise.allSettled(running.map((entry) => entry.done));
    flog.info('SESSION', `Session manager shut down (${running.length} aborted)`);
  }
}
