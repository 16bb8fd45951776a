import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { PeerConfig } from '../peers/types.js';
import { flog } from '../utils/log.js';

const PeerEntrySchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().min(1).optional(),
  description: z.string().default(''),
  env: z.record(z.string()).optional(),
});

const PeersFileSchema = z.object({
  peers: z.array(z.unknown()),
});

export const PEERS_FILE_NAME = 'peers.json';

/** peers.json in the working directory, else ~/.peerloop/peers.json */
export function findPeersFile(cwd = process.cwd(), home = homedir()): string | null {
  const candidates = [join(cwd, PEERS_FILE_NAME), join(home, '.peerloop', PEERS_FILE_NAME)];
  return candidates.find((path) => existsSync(path)) ?? null;
}

/**
 * Read peer declarations. A missing or unreadable file yields no peers;
 * invalid entries are skipped one by one. Relative `cwd` values resolve
 * against the file's own directory.
 */
export function loadPeersConfig(path: string): PeerConfig[] {
  if (!existsSync(path)) {
    flog.warn('CONFIG', `Peers file not found: ${path}`);
    return [];
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    flog.error('CONFIG', `Failed to read peers file ${path}: ${err}`);
    return [];
  }

  const file = PeersFileSchema.safeParse(raw);
  if (!file.success) {
    flog.error('CONFIG', `${path}: expected { "peers": [...] }`);
    return [];
  }

  const base = dirname(path);
  const peers: PeerConfig[] = [];
  file.data.peers.forEach((entry, index) => {
    const parsed = PeerEntrySchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      flog.warn('CONFIG', `${path}: peer #${index} skipped (${issue?.path.join('.') || 'entry'}: ${issue?.message})`);
      return;
    }
    const { cwd, ...rest } = parsed.data;
    peers.push({
      ...rest,
      ...(cwd !== undefined ? { cwd: isAbsolute(cwd) ? cwd : resolve(base, cwd) } : {}),
    });
  });

  flog.info('CONFIG', `Loaded ${peers.length} peers from ${path}`);
  return peers;
}
