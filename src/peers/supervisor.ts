import { existsSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { PeerProcess } from './peer-process.js';
import { spawnPeer, type PeerLauncher } from './launcher.js';
import {
  ToolsListResultSchema,
  toToolDescriptor,
  type PeerConfig,
  type PeerOutcome,
  type PeerStatus,
  type ToolDescriptor,
} from './types.js';
import { HandshakeError, LaunchError, PeerError, ProtocolError } from './errors.js';
import { flog } from '../utils/log.js';

export interface SupervisorOptions {
  rpcTimeoutMs: number;
  stopGraceMs: number;
  launcher?: PeerLauncher;
}

export interface PeerStatusReport {
  name: string;
  status: PeerStatus;
  pid: number | undefined;
  startedAt: number | null;
  description: string;
  capabilities: Record<string, unknown>;
}

export interface DiscoveryReport {
  path: string;
  command: string[];
  capabilities: Record<string, unknown>;
  tools: ToolDescriptor[];
}

/** Work out how to launch a peer from a file or directory path */
export function inferLaunchCommand(path: string): { command: string; args: string[]; cwd: string } {
  const ext = extname(path);
  if (ext === '.js' || ext === '.mjs' || ext === '.cjs') {
    return { command: 'node', args: [basename(path)], cwd: dirname(path) };
  }
  if (ext === '.py') {
    return { command: 'python', args: [basename(path)], cwd: dirname(path) };
  }
  if (existsSync(join(path, 'package.json'))) {
    return { command: 'node', args: ['dist/index.js'], cwd: path };
  }
  return { command: 'python', args: ['main.py'], cwd: path };
}

/**
 * Owns the peer catalog and every running peer process.
 * Nothing outside this class touches a peer's pipes.
 */
export class PeerSupervisor {
  private readonly configs = new Map<string, PeerConfig>();
  private readonly processes = new Map<string, PeerProcess>();
  private readonly starting = new Map<string, Promise<PeerOutcome<PeerProcess, LaunchError | HandshakeError>>>();
  private readonly stopping = new Map<string, Promise<void>>();
  private readonly launcher: PeerLauncher;

  constructor(private readonly options: SupervisorOptions) {
    this.launcher = options.launcher ?? spawnPeer;
  }

  // ── Registry ──────────────────────────────────────────────────────────

  register(config: PeerConfig): boolean {
    if (this.configs.has(config.name)) {
      flog.info('PEER', `Peer "${config.name}" already registered: keeping existing config`);
      return false;
    }
    this.configs.set(config.name, config);
    flog.info('PEER', `Registered peer "${config.name}"`, { command: config.command });
    return true;
  }

  /** Forget a peer's config; only allowed while it is not running */
  unregister(name: string): boolean {
    if (this.processes.has(name) || this.starting.has(name) || this.stopping.has(name)) {
      flog.warn('PEER', `Cannot unregister "${name}" while it is running`);
      return false;
    }
    return this.configs.delete(name);
  }

  names(): string[] {
    return [...this.configs.keys()];
  }

  getConfig(name: string): PeerConfig | undefined {
    return this.configs.get(name);
  }

  isRunning(name: string): boolean {
    return this.processes.get(name)?.status === 'running';
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────

  /**
   * Start a peer and complete its handshake. Idempotent: a running peer
   * returns at once and concurrent callers share the same attempt. A start
   * issued while the peer is stopping waits for the stop to finish.
   */
  start(name: string): Promise<PeerOutcome<PeerProcess, LaunchError | HandshakeError>> {
    const stopping = this.stopping.get(name);
    if (stopping) return stopping.then(() => this.start(name));

    const running = this.processes.get(name);
    if (running && running.status === 'running') {
      return Promise.resolve({ ok: true, value: running });
    }
    const inFlight = this.starting.get(name);
    if (inFlight) return inFlight;

    const config = this.configs.get(name);
    if (!config) {
      flog.error('PEER', `Unknown peer: ${name}`);
      return Promise.resolve({ ok: false, error: new LaunchError(`Unknown peer: ${name}`) });
    }

    const attempt = this.launch(config).finally(() => {
      this.starting.delete(name);
    });
    this.starting.set(name, attempt);
    return attempt;
  }

  private async launch(config: PeerConfig): Promise<PeerOutcome<PeerProcess, LaunchError | HandshakeError>> {
    const peer = new PeerProcess(config, {
      launcher: this.launcher,
      rpcTimeoutMs: this.options.rpcTimeoutMs,
      onExit: (exited) => {
        if (this.processes.get(config.name) === exited) {
          this.processes.delete(config.name);
          flog.info('PEER', `Peer "${config.name}" left the running set`);
        }
      },
    });

    const started = await peer.start();
    if (!started.ok) {
      return started;
    }
    this.processes.set(config.name, peer);
    flog.info('PEER', `Peer "${config.name}" started`);
    return { ok: true, value: peer };
  }

  /** Stop a peer; concurrent stops of the same peer share one attempt */
  stop(name: string): Promise<void> {
    const inProgress = this.stopping.get(name);
    if (inProgress) return inProgress;
    const attempt = this.terminate(name).finally(() => {
      this.stopping.delete(name);
    });
    this.stopping.set(name, attempt);
    return attempt;
  }

  private async terminate(name: string): Promise<void> {
    const pending = this.starting.get(name);
    if (pending) await pending;

    const peer = this.processes.get(name);
    if (!peer) return;
    try {
      await peer.stop(this.options.stopGraceMs);
      flog.info('PEER', `Peer "${name}" stopped`);
    } catch (err) {
      flog.error('PEER', `Stopping "${name}" failed: ${err}`);
    } finally {
      if (this.processes.get(name) === peer) this.processes.delete(name);
    }
  }

  /** Stop every running peer; one stuck peer cannot hold up the rest */
  async shutdownAll(): Promise<void> {
    const names = [...new Set([...this.processes.keys(), ...this.starting.keys(), ...this.stopping.keys()])];
    const results = await Promise.allSettled(names.map((name) => this.stop(name)));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        flog.error('PEER', `Shutdown of "${names[i]}" failed: ${result.reason}`);
      }
    });
    flog.info('PEER', `All peers shut down (${names.length})`);
  }

  // ── Tools ─────────────────────────────────────────────────────────────

  /** Fetch the peer's tool list, refreshing its cache */
  async listTools(name: string): Promise<PeerOutcome<ToolDescriptor[], PeerError>> {
    const started = await this.start(name);
    if (!started.ok) return started;
    const peer = started.value;

    const reply = await peer.call('tools/list', {});
    if (!reply.ok) return reply;

    const parsed = ToolsListResultSchema.safeParse(reply.value);
    if (!parsed.success) {
      return { ok: false, error: new ProtocolError(`${name}: tools/list reply has no tools array`) };
    }

    const tools: ToolDescriptor[] = [];
    for (const raw of parsed.data.tools) {
      const tool = toToolDescriptor(raw);
      if (tool) tools.push(tool);
      else flog.warn('TOOL', `${name}: skipping malformed tool entry ${JSON.stringify(raw).slice(0, 120)}`);
    }
    peer.tools = tools;
    flog.info('TOOL', `Peer "${name}" exposes ${tools.length} tools`);
    return { ok: true, value: tools };
  }

  cachedTools(name: string): ToolDescriptor[] | null {
    return this.processes.get(name)?.tools ?? null;
  }

  /** Raw `tools/call`: normalization is the tool facade's job */
  async callTool(name: string, tool: string, args: Record<string, unknown>): Promise<PeerOutcome<unknown, PeerError>> {
    const started = await this.start(name);
    if (!started.ok) return started;
    return started.value.call('tools/call', { name: tool, arguments: args });
  }

  // ── Introspection ─────────────────────────────────────────────────────

  status(): PeerStatusReport[] {
    return [...this.processes.values()].map((peer) => ({
      name: peer.config.name,
      status: peer.status,
      pid: peer.pid,
      startedAt: peer.startedAt,
      description: peer.config.description,
      capabilities: peer.capabilities,
    }));
  }

  /** Start a peer from a path just long enough to see what it offers */
  async discover(path: string): Promise<PeerOutcome<DiscoveryReport, PeerError>> {
    if (!existsSync(path)) {
      return { ok: false, error: new LaunchError(`Path does not exist: ${path}`) };
    }
    const launch = inferLaunchCommand(path);
    const name = `temp_${randomUUID().slice(0, 8)}`;
    this.register({
      name,
      command: launch.command,
      args: launch.args,
      cwd: launch.cwd,
      description: `Temporary peer: ${path}`,
    });

    try {
      const started = await this.start(name);
      if (!started.ok) return started;
      const tools = await this.listTools(name);
      if (!tools.ok) return tools;
      return {
        ok: true,
        value: {
          path,
          command: [launch.command, ...launch.args],
          capabilities: started.value.capabilities,
          tools: tools.value,
        },
      };
    } finally {
      await this.stop(name);
      this.unregister(name);
    }
  }
}
