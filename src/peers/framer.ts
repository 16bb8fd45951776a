import { once } from 'node:events';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { RpcEnvelopeSchema, type RpcEnvelope } from './types.js';
import { PeerError, ProtocolError, TimeoutError } from './errors.js';
import { flog } from '../utils/log.js';

/** Serialize one envelope to a single line (no trailing newline) */
export function encodeEnvelope(envelope: RpcEnvelope): string {
  return JSON.stringify(envelope);
}

/** Parse one line into an envelope, throwing ProtocolError on anything else */
export function decodeEnvelope(line: string): RpcEnvelope {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new ProtocolError(`Malformed JSON from peer: ${line.slice(0, 120)}`, line);
  }
  const parsed = RpcEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError(`Not a JSON-RPC 2.0 envelope: ${line.slice(0, 120)}`, line);
  }
  return parsed.data;
}

/** Lines held while nobody is receiving; older ones are dropped beyond this */
export const MAX_QUEUED_LINES = 256;

/** True for a well-formed envelope with a method and no id */
function isNotificationLine(line: string): boolean {
  try {
    const envelope = decodeEnvelope(line);
    return envelope.method !== undefined && (envelope.id === undefined || envelope.id === null);
  } catch {
    return false;
  }
}

interface Waiter {
  deliver(line: string): void;
  fail(err: Error): void;
}

/**
 * Line framing over one child's pipe pair.
 *
 * Incoming lines are queued as they arrive so nothing is lost between two
 * `receive()` calls; a malformed line fails only the receive that reads it.
 * Notifications that arrive while nobody is receiving are dropped, and the
 * queue holds at most MAX_QUEUED_LINES lines.
 */
export class MessageFramer {
  private lines: string[] = [];
  private waiters: Waiter[] = [];
  private closedReason: string | null = null;
  private rl: Interface;
  private readonly drains = new Set<AbortController>();

  constructor(
    private readonly input: Writable,
    output: Readable,
    private readonly tag: string,
  ) {
    this.rl = createInterface({ input: output });
    this.rl.on('line', (line) => {
      if (!line.trim()) return;
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.deliver(line);
        return;
      }
      if (isNotificationLine(line)) {
        flog.debug('RPC', `${this.tag}: notification dropped (no receive pending)`);
        return;
      }
      this.lines.push(line);
      if (this.lines.length > MAX_QUEUED_LINES) {
        this.lines.shift();
        flog.warn('RPC', `${this.tag}: receive queue full, oldest line dropped`);
      }
    });
    this.rl.on('close', () => this.close('peer output closed'));
    this.input.on('error', (err) => {
      flog.warn('RPC', `${this.tag}: stdin error: ${err.message}`);
    });
  }

  get isClosed(): boolean {
    return this.closedReason !== null;
  }

  get queued(): number {
    return this.lines.length;
  }

  /**
   * Write one envelope. When the pipe is full, wait for it to drain for at
   * most `timeoutMs` (TimeoutError); `close()` fails the wait with ProtocolError.
   */
  async send(envelope: RpcEnvelope, timeoutMs?: number): Promise<void> {
    if (this.closedReason !== null || !this.input.writable) {
      throw new ProtocolError(`${this.tag}: cannot write (${this.closedReason ?? 'peer input closed'})`);
    }
    const ok = this.input.write(encodeEnvelope(envelope) + '\n');
    if (ok) return;

    const controller = new AbortController();
    this.drains.add(controller);
    const timer = timeoutMs === undefined
      ? null
      : setTimeout(() => {
          controller.abort(new TimeoutError(`${this.tag}: peer input not drained within ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs);
    try {
      await once(this.input, 'drain', { signal: controller.signal });
    } catch (err) {
      const reason: unknown = controller.signal.reason;
      throw reason instanceof PeerError ? reason : err;
    } finally {
      if (timer) clearTimeout(timer);
      this.drains.delete(controller);
    }
  }

  receive(timeoutMs: number): Promise<RpcEnvelope> {
    const queued = this.lines.shift();
    if (queued !== undefined) {
      return new Promise((resolve) => resolve(decodeEnvelope(queued)));
    }
    if (this.closedReason !== null) {
      return Promise.reject(new ProtocolError(`${this.tag}: ${this.closedReason}`));
    }

    return new Promise<RpcEnvelope>((resolve, reject) => {
      const waiter: Waiter = {
        deliver: (line) => {
          clearTimeout(timer);
          try {
            resolve(decodeEnvelope(line));
          } catch (err) {
            reject(err);
          }
        },
        fail: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new TimeoutError(`${this.tag}: no response within ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  /** Stop reading; pending and future receives and sends fail with ProtocolError */
  close(reason = 'framer closed'): void {
    if (this.closedReason !== null) return;
    this.closedReason = reason;
    this.rl.close();
    const pending = this.waiters;
    this.waiters = [];
    for (const waiter of pending) {
      waiter.fail(new ProtocolError(`${this.tag}: ${reason}`));
    }
    for (const drain of this.drains) {
      drain.abort(new ProtocolError(`${this.tag}: ${reason}`));
    }
    this.drains.clear();
  }
}
