import test from 'node:test';
import assert from 'node:assert/strict';
import { PassThrough, Writable } from 'node:stream';
import { decodeEnvelope, encodeEnvelope, MAX_QUEUED_LINES, MessageFramer } from './framer.js';
import { ProtocolError, TimeoutError } from './errors.js';

function pipes() {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  input.on('data', (chunk: Buffer) => written.push(chunk.toString('utf-8')));
  return { input, output, written, framer: new MessageFramer(input, output, 'test') };
}

/** A stdin whose reader has stopped: writes never complete, so it never drains */
function stalledInput(): Writable {
  return new Writable({
    highWaterMark: 16,
    write() {
      // never calls back
    },
  });
}

const BIG_REQUEST = {
  jsonrpc: '2.0' as const,
  id: 1,
  method: 'tools/call',
  params: { html: 'x'.repeat(4096) },
};

test('encodeEnvelope writes a single JSON line', () => {
  const line = encodeEnvelope({ jsonrpc: '2.0', id: 1, method: 'ping', params: { a: 'x\ny' } });
  assert.equal(line, '{"jsonrpc":"2.0","id":1,"method":"ping","params":{"a":"x\\ny"}}');
  assert.equal(line.includes('\n'), false);
});

test('decodeEnvelope accepts a response envelope', () => {
  const envelope = decodeEnvelope('{"jsonrpc":"2.0","id":7,"result":{"ok":true}}');
  assert.equal(envelope.id, 7);
  assert.deepEqual(envelope.result, { ok: true });
});

test('decodeEnvelope rejects malformed JSON with ProtocolError', () => {
  assert.throws(
    () => decodeEnvelope('{"jsonrpc":"2.0","id":'),
    (err: unknown) => err instanceof ProtocolError && err.message === 'Malformed JSON from peer: {"jsonrpc":"2.0","id":' && err.line === '{"jsonrpc":"2.0","id":',
  );
});

test('decodeEnvelope rejects JSON that is not a 2.0 envelope', () => {
  assert.throws(
    () => decodeEnvelope('{"jsonrpc":"1.0","id":1}'),
    (err: unknown) => err instanceof ProtocolError && err.message === 'Not a JSON-RPC 2.0 envelope: {"jsonrpc":"1.0","id":1}',
  );
});

test('send writes one newline-terminated line', async () => {
  const { framer, written } = pipes();
  await framer.send({ jsonrpc: '2.0', id: 1, method: 'tools/list' });
  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(written, ['{"jsonrpc":"2.0","id":1,"method":"tools/list"}\n']);
});

test('receive returns lines in order and skips blank lines', async () => {
  const { framer, output } = pipes();
  output.write('{"jsonrpc":"2.0","id":1,"result":"a"}\n\n   \n{"jsonrpc":"2.0","id":2,"result":"b"}\n');

  const first = await framer.receive(500);
  const second = await framer.receive(500);
  assert.equal(first.result, 'a');
  assert.equal(second.result, 'b');
});

test('receive waits for a line written later', async () => {
  const { framer, output } = pipes();
  const pending = framer.receive(500);
  setTimeout(() => output.write('{"jsonrpc":"2.0","id":3,"result":null}\n'), 10);
  const envelope = await pending;
  assert.equal(envelope.id, 3);
});

test('receive times out with TimeoutError', async () => {
  const { framer } = pipes();
  await assert.rejects(
    framer.receive(20),
    (err: unknown) => err instanceof TimeoutError && err.message === 'test: no response within 20ms' && err.timeoutMs === 20,
  );
});

test('a truncated line fails one receive and the next line still decodes', async () => {
  const { framer, output } = pipes();
  output.write('{"jsonrpc":"2.0","id":1,"res\n');
  output.write('{"jsonrpc":"2.0","id":2,"result":"fine"}\n');

  await assert.rejects(framer.receive(500), ProtocolError);
  const next = await framer.receive(500);
  assert.equal(next.result, 'fine');
});

test('close fails pending receives and later sends', async () => {
  const { framer } = pipes();
  const pending = framer.receive(1000);
  framer.close('shutting down');

  await assert.rejects(pending, (err: unknown) => err instanceof ProtocolError && err.message === 'test: shutting down');
  assert.equal(framer.isClosed, true);
  await assert.rejects(
    framer.send({ jsonrpc: '2.0', id: 9, method: 'x' }),
    (err: unknown) => err instanceof ProtocolError && err.message === 'test: cannot write (shutting down)',
  );
});

test('end of peer output closes the framer', async () => {
  const { framer, output } = pipes();
  const pending = framer.receive(1000);
  output.end();
  await assert.rejects(pending, (err: unknown) => err instanceof ProtocolError && err.message === 'test: peer output closed');
});

test('a send the peer never drains times out with TimeoutError', async () => {
  const framer = new MessageFramer(stalledInput(), new PassThrough(), 'test');
  await assert.rejects(
    framer.send(BIG_REQUEST, 30),
    (err: unknown) =>
      err instanceof TimeoutError && err.message === 'test: peer input not drained within 30ms' && err.timeoutMs === 30,
  );
});

test('close fails a send still waiting for drain', async () => {
  const framer = new MessageFramer(stalledInput(), new PassThrough(), 'test');
  const pending = framer.send(BIG_REQUEST);
  framer.close('shutting down');
  await assert.rejects(pending, (err: unknown) => err instanceof ProtocolError && err.message === 'test: shutting down');
});

test('notifications that arrive with no receive pending are dropped', async () => {
  const { framer, output } = pipes();
  output.write('{"jsonrpc":"2.0","method":"notifications/progress","params":{"value":10}}\n');
  output.write('{"jsonrpc":"2.0","id":4,"result":"kept"}\n');
  await new Promise((resolve) => setTimeout(resolve, 20));

  assert.equal(framer.queued, 1);
  const envelope = await framer.receive(100);
  assert.equal(envelope.result, 'kept');
});

test('the receive queue keeps only the newest lines', async () => {
  const { framer, output } = pipes();
  const lines = Array.from({ length: MAX_QUEUED_LINES + 2 }, (_, i) => `{"jsonrpc":"2.0","id":${i + 1},"result":${i + 1}}`);
  output.write(lines.join('\n') + '\n');
  await new Promise((resolve) => setTimeout(resolve, 20));

  assert.equal(framer.queued, MAX_QUEUED_LINES);
  const oldest = await framer.receive(100);
  assert.equal(oldest.id, 3);
});
