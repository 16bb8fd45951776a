import { mkdirSync, readdirSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import winston from 'winston';
import { getFlowId } from './flow.js';
import { loadUserConfig } from '../config/user-config.js';

// ── Types ──────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogCategory =
  | 'PEER'
  | 'RPC'
  | 'TOOL'
  | 'LOOP'
  | 'SESSION'
  | 'DECISION'
  | 'CONFIG'
  | 'SYSTEM';

// ── State ──────────────────────────────────────────────────────────────────

let logger: winston.Logger | null = null;

// ── Init ───────────────────────────────────────────────────────────────────

function formatTimestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, '0');
  const m = String(d.getMinutes()).padStart(2, '0');
  const s = String(d.getSeconds()).padStart(2, '0');
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

const humanFormat = winston.format.printf(({ level, message, cat, flow, ...ctx }) => {
  const lvl = level.toUpperCase().padEnd(5);
  const category = `[${String(cat)}]`.padEnd(10);
  const flowStr = flow ? `flow=${String(flow)} ` : '';
  const entries = Object.entries(ctx).filter(([k]) => k !== 'timestamp');
  const ctxStr = entries.length ? ' ' + entries.map(([k, v]) => `${k}=${String(v)}`).join(' ') : '';
  return `${formatTimestamp()} ${lvl} ${category} ${flowStr}${String(message)}${ctxStr}`;
});

/**
 * Initialize the unified log system.
 * Each run writes a JSON-lines file and a human-readable file to
 * ~/.peerloop/logs/ (or `options.dir`).
 */
export function initLog(options?: { level?: LogLevel; dir?: string }): void {
  if (logger) return;

  const logDir = options?.dir ?? join(homedir(), '.peerloop', 'logs');
  mkdirSync(logDir, { recursive: true });

  rotateLogFiles(logDir);

  const ts = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);

  logger = winston.createLogger({
    level: options?.level ?? loadUserConfig().logLevel,
    transports: [
      new winston.transports.File({
        filename: join(logDir, `peerloop-${ts}.jsonl`),
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      }),
      new winston.transports.File({
        filename: join(logDir, `peerloop-${ts}.log`),
        format: humanFormat,
      }),
    ],
  });

  // Disk errors must never take the CLI down
  logger.on('error', (err) => {
    process.stderr.write(`peerloop: log write failed: ${String(err)}\n`);
  });
}

/** Flush pending writes and detach: safe to call when never initialized */
export async function closeLog(): Promise<void> {
  const current = logger;
  if (!current) return;
  logger = null;
  await new Promise<void>((resolve) => {
    current.on('finish', () => resolve());
    current.end();
  });
}

// ── Core write ─────────────────────────────────────────────────────────────

function write(level: LogLevel, cat: LogCategory, msg: string, ctx?: Record<string, unknown>): void {
  if (!logger) return;
  const flow = getFlowId();
  logger.log({
    ...ctx,
    level,
    message: msg,
    cat,
    ...(flow ? { flow } : {}),
  });
}

// ── Log rotation ──────────────────────────────────────────────────────

/** Remove old log files, keeping only the most recent N runs */
function rotateLogFiles(logDir: string): void {
  try {
    const maxFiles = loadUserConfig().maxLogFiles;
    const files = readdirSync(logDir)
      .filter((f) => f.startsWith('peerloop-') && (f.endsWith('.log') || f.endsWith('.jsonl')))
      .sort()
      .reverse(); // newest first

    // Each run creates 2 files (.log + .jsonl)
    const limit = maxFiles * 2;
    if (files.length <= limit) return;

    for (const file of files.slice(limit)) {
      try {
        unlinkSync(join(logDir, file));
      } catch (err) {
        process.stderr.write(`peerloop: could not remove old log ${file}: ${String(err)}\n`);
      }
    }
  } catch (err) {
    process.stderr.write(`peerloop: log rotation skipped: ${String(err)}\n`);
  }
}

// ── Public API ─────────────────────────────────────────────────────────────

export const flog = {
  debug(cat: LogCategory, msg: string, ctx?: Record<string, unknown>): void {
    write('debug', cat, msg, ctx);
  },
  info(cat: LogCategory, msg: string, ctx?: Record<string, unknown>): void {
    write('info', cat, msg, ctx);
  },
  warn(cat: LogCategory, msg: string, ctx?: Record<string, unknown>): void {
    write('warn', cat, msg, ctx);
  },
  error(cat: LogCategory, msg: string, ctx?: Record<string, unknown>): void {
    write('error', cat, msg, ctx);
  },
};
