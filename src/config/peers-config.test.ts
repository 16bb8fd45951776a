import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findPeersFile, loadPeersConfig } from './peers-config.js';

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'peerloop-peers-'));
}

function peersFile(dir: string, contents: unknown): string {
  const path = join(dir, 'peers.json');
  writeFileSync(path, typeof contents === 'string' ? contents : JSON.stringify(contents));
  return path;
}

test('entries get defaults and relative cwd resolves against the file', () => {
  const dir = tempDir();
  const path = peersFile(dir, {
    peers: [
      { name: 'weather', command: 'node', args: ['dist/index.js'], cwd: 'servers/weather', description: 'Forecasts' },
      { name: 'files', command: '/usr/bin/files-peer', env: { ROOT: '/srv' } },
    ],
  });

  assert.deepEqual(loadPeersConfig(path), [
    {
      name: 'weather',
      command: 'node',
      args: ['dist/index.js'],
      cwd: join(dir, 'servers/weather'),
      description: 'Forecasts',
    },
    { name: 'files', command: '/usr/bin/files-peer', args: [], description: '', env: { ROOT: '/srv' } },
  ]);
});

test('absolute cwd is kept as written', () => {
  const dir = tempDir();
  const path = peersFile(dir, { peers: [{ name: 'a', command: 'node', cwd: '/opt/peers/a' }] });
  assert.equal(loadPeersConfig(path)[0].cwd, '/opt/peers/a');
});

test('invalid entries are skipped and the rest load', () => {
  const dir = tempDir();
  const path = peersFile(dir, {
    peers: [
      { name: 'no-command' },
      { name: 'bad-args', command: 'node', args: 'server.js' },
      'just a string',
      { name: 'good', command: 'python', args: ['main.py'] },
    ],
  });
  assert.deepEqual(loadPeersConfig(path).map((p) => p.name), ['good']);
});

test('a file without a peers array yields nothing', () => {
  const dir = tempDir();
  assert.deepEqual(loadPeersConfig(peersFile(dir, { servers: [] })), []);
});

test('missing and unparseable files yield nothing', () => {
  const dir = tempDir();
  assert.deepEqual(loadPeersConfig(join(dir, 'absent.json')), []);
  assert.deepEqual(loadPeersConfig(peersFile(dir, '{"peers": [')), []);
});

test('findPeersFile prefers the working directory, then the home directory', () => {
  const cwd = tempDir();
  const home = tempDir();
  assert.equal(findPeersFile(cwd, home), null);

  mkdirSync(join(home, '.peerloop'));
  writeFileSync(join(home, '.peerloop', 'peers.json'), '{"peers":[]}');
  assert.equal(findPeersFile(cwd, home), join(home, '.peerloop', 'peers.json'));

  writeFileSync(join(cwd, 'peers.json'), '{"peers":[]}');
  assert.equal(findPeersFile(cwd, home), join(cwd, 'peers.json'));
});
