import type { LoopEvent, SessionEvent } from './types.js';
import { flog } from '../utils/log.js';

/**
 * Ordered, append-only event channel for one session, read by exactly one
 * consumer. Events are buffered until read; `close()` ends iteration once
 * the buffer is drained.
 */
export class EventSink implements AsyncIterable<SessionEvent> {
  private buffer: SessionEvent[] = [];
  /** Unsettled `next()` calls, oldest first */
  private waiting: Array<(result: IteratorResult<SessionEvent>) => void> = [];
  private closed = false;
  private consumed = false;
  private seq = 0;

  constructor(readonly sessionId: string) {}

  push(event: LoopEvent): void {
    if (this.closed) {
      flog.debug('SESSION', `Event ${event.type} dropped: sink closed`, { sessionId: this.sessionId });
      return;
    }
    const body: LoopEvent = event.type === 'progress'
      ? { ...event, value: Math.min(100, Math.max(0, event.value)) }
      : event;
    const stamped: SessionEvent = {
      ...body,
      sessionId: this.sessionId,
      seq: this.seq++,
      timestamp: Date.now(),
    };
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter({ value: stamped, done: false });
    } else {
      this.buffer.push(stamped);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiting;
    this.waiting = [];
    for (const waiter of waiters) {
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Events pushed but not yet read */
  get pending(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<SessionEvent> {
    if (this.consumed) {
      throw new Error(`Event sink for session ${this.sessionId} already has a consumer`);
    }
    this.consumed = true;

    return {
      next: (): Promise<IteratorResult<SessionEvent>> => {
        const next = this.buffer.shift();
        if (next) return Promise.resolve({ value: next, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => {
          this.waiting.push(resolve);
        });
      },
      return: (): Promise<IteratorResult<SessionEvent>> => {
        this.close();
        this.buffer = [];
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
