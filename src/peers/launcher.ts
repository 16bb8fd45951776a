import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import type { PeerConfig } from './types.js';
import { LaunchError } from './errors.js';

/** The slice of a child process a PeerProcess needs: lets tests run peers in-process */
export interface PeerChild {
  readonly pid: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable | null;
  kill(signal: NodeJS.Signals): boolean;
  isAlive(): boolean;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (err: Error) => void): void;
}

export type PeerLauncher = (config: PeerConfig) => PeerChild;

/** Spawn the peer as a real child process with piped stdio */
export const spawnPeer: PeerLauncher = (config) => {
  const child = spawn(config.command, [...config.args], {
    cwd: config.cwd,
    env: { ...process.env, ...config.env },
    stdio: ['pipe', 'pipe', 'pipe'],
  });

  const { stdin, stdout } = child;
  if (!stdin || !stdout) {
    child.kill('SIGKILL');
    throw new LaunchError(`${config.name}: child has no stdio pipes`);
  }

  return {
    pid: child.pid,
    stdin,
    stdout,
    stderr: child.stderr,
    kill: (signal) => child.kill(signal),
    isAlive: () => child.exitCode === null && child.signalCode === null,
    onExit: (listener) => {
      child.once('exit', listener);
    },
    onError: (listener) => {
      child.on('error', listener);
    },
  };
};
