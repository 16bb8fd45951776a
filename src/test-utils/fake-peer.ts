import { PassThrough } from 'node:stream';
import { createInterface } from 'node:readline';
import type { PeerChild, PeerLauncher } from '../peers/launcher.js';
import { RpcEnvelopeSchema, type PeerConfig, type RpcEnvelope } from '../peers/types.js';

/**
 * What the fake peer does with one request:
 *   result / error: answer with that member
 *   raw: write this line verbatim instead of an answer
 *   silent: never answer
 *   exit: exit with this code instead of answering
 * `delayMs` postpones the answer.
 */
export type FakeReply =
  | { result: unknown; delayMs?: number }
  | { error: unknown; delayMs?: number }
  | { raw: string; delayMs?: number }
  | { silent: true }
  | { exit: number };

export type FakeHandler = (params: unknown, request: RpcEnvelope) => FakeReply | Promise<FakeReply>;
export type FakeToolHandler = (args: Record<string, unknown>) => FakeReply | Promise<FakeReply>;

export interface FakeTool {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
  handler: FakeToolHandler;
}

export interface FakePeerOptions {
  tools?: FakeTool[];
  /** Replace the built-in handling of a method */
  handlers?: Record<string, FakeHandler>;
  /** SIGTERM is recorded but does not end the process */
  ignoreSigterm?: boolean;
}

let nextPid = 40_000;

function asRecord(value: unknown): Record<string, unknown> {
  return value && typeof value === 'object' && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

/** Text content reply, as a tool would send it */
export function textContent(text: string): FakeReply {
  return { result: { content: [{ type: 'text', text }] } };
}

/**
 * A peer that lives in the test process: the client writes to `stdin`, the
 * fake answers on `stdout`. Records everything it receives.
 */
export class FakePeer implements PeerChild {
  readonly pid = nextPid++;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();

  /** Every envelope received, in arrival order */
  readonly received: RpcEnvelope[] = [];
  /** Lines that were not JSON */
  readonly garbage: string[] = [];
  readonly signals: NodeJS.Signals[] = [];
  inFlight = 0;
  maxInFlight = 0;

  private alive = true;
  private readonly exitListeners: Array<(code: number | null, signal: NodeJS.Signals | null) => void> = [];
  private readonly errorListeners: Array<(err: Error) => void> = [];
  private readonly tools: FakeTool[];

  constructor(private readonly options: FakePeerOptions = {}) {
    this.tools = options.tools ?? [];
    const rl = createInterface({ input: this.stdin });
    rl.on('line', (line) => {
      void this.handleLine(line);
    });
  }

  get requests(): RpcEnvelope[] {
    return this.received.filter((e) => e.id !== undefined && e.id !== null);
  }

  get notifications(): string[] {
    return this.received.filter((e) => e.id === undefined || e.id === null).map((e) => e.method ?? '');
  }

  /** Requests for one method, in order */
  requestsFor(method: string): RpcEnvelope[] {
    return this.requests.filter((e) => e.method === method);
  }

  // ── PeerChild ─────────────────────────────────────────────────────────

  kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    if (!this.alive) return false;
    if (signal === 'SIGTERM' && this.options.ignoreSigterm) return true;
    this.exit(null, signal);
    return true;
  }

  isAlive(): boolean {
    return this.alive;
  }

  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    this.exitListeners.push(listener);
  }

  onError(listener: (err: Error) => void): void {
    this.errorListeners.push(listener);
  }

  // ── Test control ──────────────────────────────────────────────────────

  /** Write a line to stdout as if the peer printed it */
  writeLine(line: string): void {
    if (this.alive) this.stdout.write(line + '\n');
  }

  writeStderr(line: string): void {
    if (this.alive) this.stderr.write(line + '\n');
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (!this.alive) return;
    this.alive = false;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => {
      for (const listener of this.exitListeners) listener(code, signal);
    });
  }

  emitError(err: Error): void {
    for (const listener of this.errorListeners) listener(err);
  }

  // ── Request handling ──────────────────────────────────────────────────

  private async handleLine(line: string): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      this.garbage.push(line);
      return;
    }
    const parsed = RpcEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.garbage.push(line);
      return;
    }
    const envelope = parsed.data;
    this.received.push(envelope);
    if (envelope.id === undefined || envelope.id === null || envelope.method === undefined) return;

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    let reply: FakeReply;
    try {
      reply = await this.replyFor(envelope.method, envelope);
    } catch (err) {
      reply = { error: { code: -32603, message: err instanceof Error ? err.message : String(err) } };
    }
    await this.send(envelope, reply);
  }

  private replyFor(method: string, request: RpcEnvelope): FakeReply | Promise<FakeReply> {
    const override = this.options.handlers?.[method];
    if (override) return override(request.params, request);

    switch (method) {
      case 'initialize':
        return {
          result: {
            protocolVersion: '2024-11-05',
            capabilities: { tools: {} },
            serverInfo: { name: 'fake-peer', version: '1.0.0' },
          },
        };
      case 'tools/list':
        return {
          result: {
            tools: this.tools.map((t) => ({
              name: t.name,
              description: t.description ?? '',
              inputSchema: t.inputSchema ?? { type: 'object', properties: {} },
            })),
          },
        };
      case 'tools/call': {
        const params = asRecord(request.params);
        const tool = this.tools.find((t) => t.name === params.name);
        if (!tool) return { error: { code: -32602, message: `Unknown tool: ${String(params.name)}` } };
        return tool.handler(asRecord(params.arguments));
      }
      default:
        return { error: { code: -32601, message: `Method not found: ${method}` } };
    }
  }

  /** A request counts as in flight until its answer is written */
  private async send(request: RpcEnvelope, reply: FakeReply): Promise<void> {
    if ('delayMs' in reply && reply.delayMs) {
      const delayMs = reply.delayMs;
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
    this.inFlight--;
    if ('silent' in reply) return;
    if ('exit' in reply) {
      this.exit(reply.exit);
      return;
    }
    if ('raw' in reply) {
      this.writeLine(reply.raw);
    } else if ('error' in reply) {
      this.writeLine(JSON.stringify({ jsonrpc: '2.0', id: request.id, error: reply.error }));
    } else {
      this.writeLine(JSON.stringify({ jsonrpc: '2.0', id: request.id, result: reply.result }));
    }
  }
}

/** Launcher that builds fake peers and remembers every spawn */
export class FakeLauncher {
  readonly spawned: Array<{ config: PeerConfig; peer: FakePeer }> = [];

  constructor(private readonly factory: (config: PeerConfig) => FakePeer) {}

  readonly launch: PeerLauncher = (config) => {
    const peer = this.factory(config);
    this.spawned.push({ config, peer });
    return peer;
  };

  spawnCount(name: string): number {
    return this.spawned.filter((s) => s.config.name === name).length;
  }

  /** Most recent fake spawned for a peer */
  last(name: string): FakePeer | undefined {
    return this.spawned.filter((s) => s.config.name === name).at(-1)?.peer;
  }
}
