import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { flog } from '../utils/log.js';

// ── User config schema ────────────────────────────────────────────────────

export interface UserConfig {
  /** Per-call deadline for a peer RPC (ms). Default: 30000 */
  rpcTimeoutMs: number;
  /** Time a stopping peer gets after SIGTERM before SIGKILL (ms). Default: 5000 */
  stopGraceMs: number;
  /** Soft ceiling: decision turns after which a text-only answer ends the session. Default: 50 */
  maxIterations: number;
  /** Hard ceiling: total turns the engine will ever run. Default: 100 */
  maxTurns: number;
  /** Text longer than this (without failure tokens) ends the session. Default: 50 */
  minFinalTextLength: number;
  /** Minimum length for a structured document answer to end the session. Default: 20 */
  documentMinLength: number;
  /** Max log runs to keep. Default: 20 */
  maxLogFiles: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  /** Chat-completion model used by the decision-maker */
  model: string;
  /** OpenAI-compatible API base URL */
  apiBaseUrl: string;
}

const UserConfigSchema = z.object({
  rpcTimeoutMs: z.number().int().min(100),
  stopGraceMs: z.number().int().min(0),
  maxIterations: z.number().int().min(1),
  maxTurns: z.number().int().min(1),
  minFinalTextLength: z.number().int().min(0),
  documentMinLength: z.number().int().min(0),
  maxLogFiles: z.number().int().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  model: z.string().min(1),
  apiBaseUrl: z.string().url(),
});

export const DEFAULT_CONFIG: UserConfig = {
  rpcTimeoutMs: 30_000,
  stopGraceMs: 5_000,
  maxIterations: 50,
  maxTurns: 100,
  minFinalTextLength: 50,
  documentMinLength: 20,
  maxLogFiles: 20,
  logLevel: 'debug',
  model: 'deepseek/deepseek-chat-v3-0324',
  apiBaseUrl: 'https://openrouter.ai/api/v1',
};

export function defaultConfigPath(): string {
  return join(homedir(), '.peerloop', 'config.json');
}

function isConfigKey(key: string): key is keyof UserConfig {
  return key in DEFAULT_CONFIG;
}

let cachedConfig: UserConfig | null = null;

/**
 * Load user configuration from ~/.peerloop/config.json.
 * Falls back to defaults for any missing or invalid values.
 * Config is cached after first load.
 */
export function loadUserConfig(configPath = defaultConfigPath()): UserConfig {
  if (cachedConfig) return cachedConfig;

  if (!existsSync(configPath)) {
    cachedConfig = { ...DEFAULT_CONFIG };
    return cachedConfig;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    // Parse tolerantly key-by-key: valid keys are kept, invalid ones fall back to defaults
    const merged: Partial<UserConfig> = {};
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (!isConfigKey(key)) {
          flog.warn('CONFIG', `Unknown config key "${key}" ignored`);
          continue;
        }
        const result = UserConfigSchema.shape[key].safeParse(value);
        if (result.success) {
          Object.assign(merged, { [key]: result.data });
        } else {
          flog.warn('CONFIG', `Config key "${key}" invalid (${result.error.issues[0]?.message}): using default`);
        }
      }
    }
    cachedConfig = { ...DEFAULT_CONFIG, ...merged };
    flog.info('CONFIG', `Loaded user config from ${configPath}`);
    return cachedConfig;
  } catch (err) {
    flog.warn('CONFIG', `Failed to load config from ${configPath}: ${err}`);
    cachedConfig = { ...DEFAULT_CONFIG };
    return cachedConfig;
  }
}

/** Reset cached config (useful for tests) */
export function resetConfigCache(): void {
  cachedConfig = null;
}
