import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, loadUserConfig, resetConfigCache } from './user-config.js';

function configFile(contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'peerloop-config-'));
  const path = join(dir, 'config.json');
  writeFileSync(path, contents);
  return path;
}

test('a missing file gives the defaults', () => {
  resetConfigCache();
  const config = loadUserConfig(join(tmpdir(), 'peerloop-no-such-dir', 'config.json'));
  assert.deepEqual(config, DEFAULT_CONFIG);
  assert.equal(config.rpcTimeoutMs, 30_000);
  assert.equal(config.maxTurns, 100);
});

test('valid keys override the defaults', () => {
  resetConfigCache();
  const config = loadUserConfig(configFile(JSON.stringify({ maxTurns: 10, model: 'local/test-model' })));
  assert.deepEqual(config, { ...DEFAULT_CONFIG, maxTurns: 10, model: 'local/test-model' });
});

test('invalid keys fall back one by one', () => {
  resetConfigCache();
  const config = loadUserConfig(configFile(JSON.stringify({
    rpcTimeoutMs: 'fast',
    logLevel: 'loud',
    apiBaseUrl: 'not a url',
    maxIterations: 5,
  })));
  assert.equal(config.rpcTimeoutMs, 30_000);
  assert.equal(config.logLevel, 'debug');
  assert.equal(config.apiBaseUrl, 'https://openrouter.ai/api/v1');
  assert.equal(config.maxIterations, 5);
});

test('unknown keys are ignored', () => {
  resetConfigCache();
  assert.deepEqual(loadUserConfig(configFile('{"colour":"blue"}')), DEFAULT_CONFIG);
});

test('unparseable JSON gives the defaults', () => {
  resetConfigCache();
  assert.deepEqual(loadUserConfig(configFile('{ maxTurns: 3')), DEFAULT_CONFIG);
});

test('the first load is cached until reset', () => {
  resetConfigCache();
  const first = loadUserConfig(configFile('{"stopGraceMs":100}'));
  const second = loadUserConfig(configFile('{"stopGraceMs":900}'));
  assert.equal(second, first);
  assert.equal(second.stopGraceMs, 100);

  resetConfigCache();
  assert.equal(loadUserConfig(configFile('{"stopGraceMs":900}')).stopGraceMs, 900);
  resetConfigCache();
});
