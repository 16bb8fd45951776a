#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import chalk from 'chalk';
import { initLog, closeLog, flog } from './utils/log.js';
import { loadUserConfig, type UserConfig } from './config/user-config.js';
import { findPeersFile, loadPeersConfig } from './config/peers-config.js';
import { PeerSupervisor } from './peers/supervisor.js';
import { ToolInvoker } from './tools/tool-facade.js';
import { ToolCatalog } from './tools/tool-catalog.js';
import { SessionManager } from './orchestrator/session-manager.js';
import { OpenAIDecisionMaker, resolveApiKey } from './decision/openai-decision-maker.js';
import { SessionView } from './ui/SessionView.js';
import { ErrorBoundary } from './ui/ErrorBoundary.js';
import { THEME, stateHex, stateLabel } from './config/theme.js';

const USAGE = [
  'Usage:',
  '  peerloop "<query>"           run one session against the configured peers',
  '  peerloop --peers             list configured peers',
  '  peerloop --tools             start every peer and list its tools',
  '  peerloop --discover <path>   inspect one peer and list what it offers',
  '',
  'Options:',
  '  --peers-file <path>          read peers from this file instead of ./peers.json',
];

interface CliArgs {
  mode: 'run' | 'peers' | 'tools' | 'discover' | 'help';
  query: string;
  discoverPath?: string;
  peersFile?: string;
}

function parseArgs(argv: string[]): CliArgs | string {
  const args: CliArgs = { mode: 'run', query: '' };
  const words: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        args.mode = 'help';
        break;
      case '--peers':
        args.mode = 'peers';
        break;
      case '--tools':
        args.mode = 'tools';
        break;
      case '--discover':
        args.mode = 'discover';
        args.discoverPath = argv[++i];
        if (!args.discoverPath) return 'Usage: peerloop --discover <path>';
        break;
      case '--peers-file':
        args.peersFile = argv[++i];
        if (!args.peersFile) return 'Usage: peerloop --peers-file <path> ...';
        break;
      default:
        if (arg.startsWith('--')) return `Unknown option: ${arg}`;
        words.push(arg);
    }
  }
  args.query = words.join(' ').trim();
  if (args.mode === 'run' && !args.query) args.mode = 'help';
  return args;
}

function buildSupervisor(config: UserConfig, peersFile: string | undefined): PeerSupervisor {
  const supervisor = new PeerSupervisor({ rpcTimeoutMs: config.rpcTimeoutMs, stopGraceMs: config.stopGraceMs });
  const path = peersFile ?? findPeersFile();
  if (!path) {
    flog.warn('CONFIG', 'No peers file found');
    return supervisor;
  }
  for (const peer of loadPeersConfig(path)) {
    supervisor.register(peer);
  }
  flog.info('CONFIG', `Registered ${supervisor.names().length} peers from ${path}`);
  return supervisor;
}

function printPeers(supervisor: PeerSupervisor) {
  const names = supervisor.names();
  if (names.length === 0) {
    console.log(chalk.dim('  No peers configured. Add them to ./peers.json or ~/.peerloop/peers.json'));
    return;
  }
  console.log('');
  console.log(chalk.hex(THEME.text).bold('  Configured peers'));
  console.log(chalk.dim('  ' + '─'.repeat(60)));
  for (const name of names) {
    const peer = supervisor.getConfig(name);
    if (!peer) continue;
    console.log(`  ${chalk.hex(THEME.accent)(name)}  ${chalk.dim([peer.command, ...peer.args].join(' '))}`);
    if (peer.description) console.log(`    ${chalk.hex(THEME.muted)(peer.description)}`);
  }
  console.log('');
}

async function printTools(supervisor: PeerSupervisor, catalog: ToolCatalog) {
  const count = await catalog.discover();
  console.log('');
  console.log(chalk.hex(THEME.text).bold(`  ${count} tools from ${supervisor.names().length} peers`));
  console.log(chalk.dim('  ' + '─'.repeat(60)));
  for (const tool of catalog.list()) {
    console.log(`  ${chalk.hex(THEME.accent)(tool.name)} ${chalk.dim(`(${tool.peer})`)}`);
    if (tool.descriptor.description) {
      console.log(`    ${chalk.hex(THEME.muted)(tool.descriptor.description)}`);
    }
  }
  const down = supervisor.names().filter((name) => !supervisor.isRunning(name));
  if (down.length > 0) {
    console.log(chalk.hex(THEME.error)(`  Unreachable: ${down.join(', ')}`));
  }
  console.log('');
}

async function printDiscovery(supervisor: PeerSupervisor, path: string): Promise<boolean> {
  const report = await supervisor.discover(path);
  if (!report.ok) {
    console.error(chalk.red(`  Discovery failed: ${report.error.message}`));
    return false;
  }
  const { command, capabilities, tools } = report.value;
  console.log('');
  console.log(chalk.hex(THEME.text).bold(`  ${path}`));
  console.log(`  ${chalk.dim('Command:')} ${command.join(' ')}`);
  console.log(`  ${chalk.dim('Capabilities:')} ${Object.keys(capabilities).join(', ') || 'none'}`);
  console.log(chalk.dim('  ' + '─'.repeat(60)));
  for (const tool of tools) {
    console.log(`  ${chalk.hex(THEME.accent)(tool.name)}  ${chalk.hex(THEME.muted)(tool.description)}`);
  }
  console.log('');
  return true;
}

async function runSession(config: UserConfig, catalog: ToolCatalog, query: string): Promise<boolean> {
  const apiKey = resolveApiKey();
  if (!apiKey) {
    console.error(chalk.red('  No API key. Set LLM_API_KEY or OPENAI_API_KEY.'));
    return false;
  }

  await catalog.discover();
  const manager = new SessionManager({
    tools: catalog,
    decisionMaker: new OpenAIDecisionMaker({ apiKey, baseURL: config.apiBaseUrl, model: config.model }),
    policy: {
      maxTurns: config.maxTurns,
      maxIterations: config.maxIterations,
      minFinalTextLength: config.minFinalTextLength,
      documentMinLength: config.documentMinLength,
    },
  });

  const sessionId = manager.start(query);
  const { waitUntilExit } = render(
    <ErrorBoundary onError={() => manager.abort(sessionId)}>
      <SessionView manager={manager} sessionId={sessionId} query={query} />
    </ErrorBoundary>,
  );

  try {
    await waitUntilExit();
  } finally {
    // ^C leaves the session running; stop it before the peers go away
    await manager.shutdown();
  }

  const outcome = await manager.wait(sessionId);
  manager.release(sessionId);
  console.log(chalk.hex(stateHex(outcome.state))(`  ${stateLabel(outcome.state)}`) +
    chalk.dim(` · ${outcome.iterations} turns · ${outcome.toolCalls} tool calls`));
  return outcome.state !== 'aborted';
}

export async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  if (typeof parsed === 'string') {
    console.error(chalk.red(`  ${parsed}`));
    return 1;
  }
  if (parsed.mode === 'help') {
    console.log(USAGE.join('\n'));
    return 0;
  }

  // Unified logging: writes to ~/.peerloop/logs/
  initLog();
  flog.info('SYSTEM', `=== peerloop starting (${parsed.mode}) ===`);

  const config = loadUserConfig();
  const supervisor = buildSupervisor(config, parsed.peersFile);
  const catalog = new ToolCatalog(supervisor, new ToolInvoker(supervisor));

  try {
    if (parsed.mode === 'peers') {
      printPeers(supervisor);
      return 0;
    }
    if (parsed.mode === 'tools') {
      await printTools(supervisor, catalog);
      return 0;
    }
    if (parsed.mode === 'discover') {
      return (await printDiscovery(supervisor, parsed.discoverPath ?? '')) ? 0 : 1;
    }
    return (await runSession(config, catalog, parsed.query)) ? 0 : 1;
  } finally {
    await supervisor.shutdownAll();
    flog.info('SYSTEM', '=== peerloop exiting ===');
    await closeLog();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
