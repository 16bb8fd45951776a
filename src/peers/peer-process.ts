import { existsSync } from 'node:fs';
import { isAbsolute, resolve, sep } from 'node:path';
import { createInterface } from 'node:readline';
import PQueue from 'p-queue';
import type { PeerChild, PeerLauncher } from './launcher.js';
import { MessageFramer } from './framer.js';
import {
  CLIENT_INFO,
  PROTOCOL_VERSION,
  type PeerConfig,
  type PeerOutcome,
  type PeerStatus,
  type RpcEnvelope,
  type RpcId,
  type ToolDescriptor,
} from './types.js';
import {
  HandshakeError,
  LaunchError,
  PeerError,
  ProtocolError,
  TimeoutError,
  toRemoteError,
} from './errors.js';
import { flog } from '../utils/log.js';

export interface PendingCall {
  id: number;
  method: string;
  issuedAt: number;
  deadline: number;
}

export interface PeerProcessOptions {
  launcher: PeerLauncher;
  rpcTimeoutMs: number;
  /** Called once when the child exits for any reason */
  onExit?: (peer: PeerProcess) => void;
}

function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** Resolve to true if `promise` settles within `ms`, false otherwise */
function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolveWait) => {
    const timer = setTimeout(() => resolveWait(false), ms);
    void promise.then(() => {
      clearTimeout(timer);
      resolveWait(true);
    });
  });
}

/** Reasons a config cannot be launched at all: checked before spawning */
export function checkLaunchable(config: PeerConfig): string | null {
  if (config.cwd && !existsSync(config.cwd)) {
    return `working directory does not exist: ${config.cwd}`;
  }
  if (config.command.includes(sep) || config.command.includes('/')) {
    const commandPath = isAbsolute(config.command)
      ? config.command
      : resolve(config.cwd ?? process.cwd(), config.command);
    if (!existsSync(commandPath)) return `command not found: ${commandPath}`;
  }
  return null;
}

/**
 * One running peer: owns the child, its framer and its call gate.
 *
 * Lifecycle:
 *   start() → spawn, `initialize` request, `notifications/initialized`
 *   call()  → one request/response through the gate (at most one in flight)
 *   stop()  → close stdin, SIGTERM, SIGKILL after the grace period
 */
export class PeerProcess {
  status: PeerStatus = 'stopped';
  capabilities: Record<string, unknown> = {};
  serverInfo: Record<string, unknown> = {};
  startedAt: number | null = null;
  /** Cleared whenever the peer restarts */
  tools: ToolDescriptor[] | null = null;

  private child: PeerChild | null = null;
  private framer: MessageFramer | null = null;
  private readonly gate = new PQueue({ concurrency: 1 });
  private nextId = 1;
  private pending: PendingCall | null = null;
  private launchFailure: string | null = null;
  private exited: Promise<void> = Promise.resolve();

  constructor(
    readonly config: PeerConfig,
    private readonly options: PeerProcessOptions,
  ) {}

  private get logTag(): string {
    return `peer:${this.config.name}`;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  /** The request currently on the wire, if any */
  get pendingCall(): PendingCall | null {
    return this.pending;
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────

  async start(): Promise<PeerOutcome<void, LaunchError | HandshakeError>> {
    this.status = 'starting';
    this.launchFailure = null;
    this.tools = null;

    const unlaunchable = checkLaunchable(this.config);
    if (unlaunchable) {
      this.status = 'stopped';
      flog.error('PEER', `${this.logTag}: ${unlaunchable}`);
      return fail(new LaunchError(`${this.config.name}: ${unlaunchable}`));
    }

    flog.info('PEER', `${this.logTag}: Spawning: ${this.config.command} ${this.config.args.join(' ')}`);
    let child: PeerChild;
    try {
      child = this.options.launcher(this.config);
    } catch (err) {
      this.status = 'stopped';
      const message = err instanceof Error ? err.message : String(err);
      flog.error('PEER', `${this.logTag}: Spawn failed: ${message}`);
      return fail(err instanceof LaunchError ? err : new LaunchError(`${this.config.name}: ${message}`));
    }

    this.attach(child);

    const init = await this.call('initialize', {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: { tools: {} },
      clientInfo: CLIENT_INFO,
    });

    if (!init.ok) {
      if (this.launchFailure === null && init.error instanceof ProtocolError) {
        // Output closed first: give the exit event a moment to tell us why
        await settlesWithin(this.exited, 100);
      }
      const error = this.launchFailure !== null
        ? new LaunchError(`${this.config.name}: ${this.launchFailure}`)
        : new HandshakeError(`${this.config.name}: initialize failed: ${init.error.message}`);
      return this.abortStart(error);
    }

    const result = init.value;
    if (!result || typeof result !== 'object' || Array.isArray(result)) {
      return this.abortStart(new HandshakeError(`${this.config.name}: initialize returned no result object`));
    }
    if ('capabilities' in result && result.capabilities && typeof result.capabilities === 'object') {
      this.capabilities = { ...result.capabilities };
    }
    if ('serverInfo' in result && result.serverInfo && typeof result.serverInfo === 'object') {
      this.serverInfo = { ...result.serverInfo };
    }

    const notified = await this.notify('notifications/initialized', {});
    if (!notified.ok) {
      return this.abortStart(new HandshakeError(`${this.config.name}: initialized notification failed: ${notified.error.message}`));
    }

    this.status = 'running';
    this.startedAt = Date.now();
    flog.info('PEER', `${this.logTag}: Handshake complete`, { pid: child.pid });
    return ok(undefined);
  }

  async stop(graceMs: number): Promise<void> {
    const child = this.child;
    if (!child) {
      this.status = 'stopped';
      return;
    }

    this.status = 'terminating';
    flog.info('PEER', `${this.logTag}: Stopping process...`);
    child.stdin.end();

    if (child.isAlive()) {
      child.kill('SIGTERM');
      const exited = await settlesWithin(this.exited, graceMs);
      if (!exited) {
        child.kill('SIGKILL');
        flog.warn('PEER', `${this.logTag}: Force killed after ${graceMs}ms`);
      }
    }

    this.detach('peer stopped');
  }

  private attach(child: PeerChild): void {
    this.child = child;
    this.framer = new MessageFramer(child.stdin, child.stdout, this.logTag);

    if (child.stderr) {
      const stderrRl = createInterface({ input: child.stderr });
      stderrRl.on('line', (line) => {
        if (!line.trim()) return;
        flog.debug('PEER', `${this.logTag} stderr: ${line}`);
      });
    }

    let markExited: () => void = () => {};
    this.exited = new Promise<void>((resolveExit) => {
      markExited = resolveExit;
    });

    child.onError((err) => {
      flog.error('PEER', `${this.logTag}: Process error: ${err.message}`);
      if (this.status === 'starting') this.launchFailure = err.message;
      this.framer?.close(`process error: ${err.message}`);
    });

    child.onExit((code, signal) => {
      flog.info('PEER', `${this.logTag}: Process exited (code=${code}, signal=${signal})`);
      if (this.status === 'starting' && this.launchFailure === null) {
        this.launchFailure = `exited during startup (code=${code}, signal=${signal})`;
      }
      markExited();
      if (this.child === child) {
        this.detach(`process exited (code=${code})`);
      }
    });
  }

  private detach(reason: string): void {
    const wasAttached = this.child !== null;
    this.framer?.close(reason);
    this.framer = null;
    this.child = null;
    this.tools = null;
    this.status = 'stopped';
    this.startedAt = null;
    if (wasAttached) this.options.onExit?.(this);
  }

  private async abortStart<E extends LaunchError | HandshakeError>(error: E): Promise<PeerOutcome<void, E>> {
    flog.error('PEER', `${this.logTag}: ${error.message}`);
    const child = this.child;
    if (child?.isAlive()) {
      child.kill('SIGKILL');
    }
    this.detach(error.message);
    return fail(error);
  }

  // ── JSON-RPC ──────────────────────────────────────────────────────────

  /**
   * Send one request and wait for the response carrying its id.
   * Waits behind any call already in flight on this peer.
   */
  call(method: string, params?: Record<string, unknown>, timeoutMs = this.options.rpcTimeoutMs): Promise<PeerOutcome<unknown, PeerError>> {
    return this.gate.add(() => this.exchange(method, params, timeoutMs), { throwOnTimeout: true });
  }

  /** Send a notification: no id, no response */
  notify(method: string, params?: Record<string, unknown>): Promise<PeerOutcome<void, PeerError>> {
    return this.gate.add(async (): Promise<PeerOutcome<void, PeerError>> => {
      const framer = this.framer;
      if (!framer || framer.isClosed) return fail(new ProtocolError(`${this.logTag}: not connected`));
      try {
        await framer.send({ jsonrpc: '2.0', method, params }, this.options.rpcTimeoutMs);
        flog.debug('RPC', `${this.logTag}: notify ${method}`);
        return ok(undefined);
      } catch (err) {
        return fail(err instanceof PeerError ? err : new ProtocolError(String(err)));
      }
    }, { throwOnTimeout: true });
  }

  private async exchange(method: string, params: Record<string, unknown> | undefined, timeoutMs: number): Promise<PeerOutcome<unknown, PeerError>> {
    const framer = this.framer;
    if (!framer || framer.isClosed) {
      return fail(new ProtocolError(`${this.logTag}: not connected`));
    }

    const id = this.nextId++;
    const issuedAt = Date.now();
    const deadline = issuedAt + timeoutMs;
    this.pending = { id, method, issuedAt, deadline };

    try {
      flog.debug('RPC', `${this.logTag}: request #${id} ${method}`);
      await framer.send({ jsonrpc: '2.0', id, method, params }, timeoutMs);

      for (;;) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          return fail(new TimeoutError(`${this.logTag}: RPC timeout for ${method} (#${id})`, timeoutMs));
        }
        const envelope = await framer.receive(remaining);

        if (envelope.method !== undefined) {
          await this.handlePeerInitiated(framer, envelope, deadline - Date.now());
          continue;
        }
        if (envelope.id === null && envelope.error !== undefined) {
          // Peer could not parse our request: it cannot echo an id
          return fail(toRemoteError(envelope.error));
        }
        if (!this.matches(envelope.id, id)) {
          flog.debug('RPC', `${this.logTag}: discarding response #${String(envelope.id)} while awaiting #${id}`);
          continue;
        }
        if (envelope.error !== undefined) {
          return fail(toRemoteError(envelope.error));
        }
        flog.debug('RPC', `${this.logTag}: response #${id} ${method} (${Date.now() - issuedAt}ms)`);
        return ok(envelope.result ?? null);
      }
    } catch (err) {
      if (err instanceof TimeoutError) {
        flog.warn('RPC', `${this.logTag}: RPC timeout for ${method} (#${id})`);
        return fail(new TimeoutError(`${this.logTag}: RPC timeout for ${method} (#${id})`, timeoutMs));
      }
      if (err instanceof PeerError) {
        flog.warn('RPC', `${this.logTag}: ${method} (#${id}) failed: ${err.message}`);
        return fail(err);
      }
      return fail(new ProtocolError(`${this.logTag}: ${String(err)}`));
    } finally {
      this.pending = null;
    }
  }

  private matches(received: RpcId | null | undefined, expected: number): boolean {
    if (received === undefined || received === null) return false;
    return String(received) === String(expected);
  }

  /** Peers may send notifications or requests of their own; requests get method-not-found */
  private async handlePeerInitiated(framer: MessageFramer, envelope: RpcEnvelope, timeoutMs: number): Promise<void> {
    if (envelope.id === undefined || envelope.id === null) {
      flog.debug('RPC', `${this.logTag}: notification ${envelope.method ?? ''} (ignored)`);
      return;
    }
    flog.debug('RPC', `${this.logTag}: peer request ${envelope.method ?? ''} (#${envelope.id}): not supported`);
    await framer.send({
      jsonrpc: '2.0',
      id: envelope.id,
      error: { code: -32601, message: `Method not found: ${envelope.method ?? ''}` },
    }, Math.max(timeoutMs, 1));
  }
}
