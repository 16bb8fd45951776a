import test from 'node:test';
import assert from 'node:assert/strict';
import { AgentLoop, normalizeToolCalls, type LoopPolicy, type ToolSource } from './agent-loop.js';
import { ABORT_MARKER, type LoopEvent } from './types.js';
import type { DecisionMaker } from '../decision/types.js';
import {
  ScriptedDecisionMaker,
  StubToolSource,
  textDecision,
  toolDecision,
} from '../test-utils/scripted-decision-maker.js';

const POLICY: LoopPolicy = { maxTurns: 100, maxIterations: 50, minFinalTextLength: 50, documentMinLength: 20 };
const ANSWER = 'The echo peer answered the ping with pong, so it is reachable.'.padEnd(80, '.');

function runLoop(
  decisionMaker: DecisionMaker,
  tools: ToolSource,
  options: { policy?: Partial<LoopPolicy>; controller?: AbortController } = {},
) {
  const events: LoopEvent[] = [];
  const controller = options.controller ?? new AbortController();
  const loop = new AgentLoop({
    sessionId: 'test-session',
    query: 'Is the echo peer alive?',
    tools,
    decisionMaker,
    policy: { ...POLICY, ...options.policy },
    signal: controller.signal,
    emit: (event) => events.push(event),
  });
  return { loop, events, controller, outcome: loop.run() };
}

function pingTools(): StubToolSource {
  return new StubToolSource().add('ping', () => ({ status: 'ok', text: 'pong' }));
}

// ── Turn sequencing ─────────────────────────────────────────────────────────

test('one tool turn then a long answer ends normally after two decisions', async () => {
  assert.equal(ANSWER.length, 80);
  const tools = pingTools();
  const dm = new ScriptedDecisionMaker([toolDecision({ id: '1', name: 'ping' }), textDecision(ANSWER)]);

  const { outcome, events } = runLoop(dm, tools);
  const result = await outcome;

  assert.equal(result.state, 'ended-normally');
  assert.equal(result.iterations, 2);
  assert.equal(result.toolCalls, 1);
  assert.equal(result.finalText, ANSWER);
  assert.equal(dm.calls, 2);
  assert.deepEqual(tools.invocations, [{ name: 'ping', args: {}, callId: '1' }]);
  assert.deepEqual(result.transcript.map((t) => t.role), ['user', 'assistant', 'tool', 'assistant']);
  assert.deepEqual(result.transcript[2], {
    role: 'tool',
    toolCallId: '1',
    toolName: 'ping',
    result: { status: 'ok', text: 'pong' },
  });
  assert.equal(dm.requests[1].transcript.length, 3);
  assert.deepEqual(dm.requests[0].tools.map((t) => t.name), ['ping']);

  assert.deepEqual(events.map((e) => e.type), ['status', 'progress', 'progress', 'content-chunk', 'progress', 'complete']);
  assert.deepEqual(events.at(-1), { type: 'complete', state: 'ended-normally', iterations: 2, finalText: ANSWER });
});

test('a decision-maker that always calls tools stops at the hard ceiling', async () => {
  const tools = pingTools();
  const dm = new ScriptedDecisionMaker([], toolDecision({ id: 'x', name: 'ping' }));

  const result = await runLoop(dm, tools, { policy: { maxTurns: 5 } }).outcome;

  assert.equal(result.state, 'ended-by-ceiling');
  assert.equal(dm.calls, 5);
  assert.equal(result.iterations, 5);
  assert.equal(tools.invocations.length, 5);
});

test('endless failure text is bounded by the hard ceiling', async () => {
  const dm = new ScriptedDecisionMaker([], textDecision('That attempt failed, trying again with different settings.'));
  const result = await runLoop(dm, pingTools(), { policy: { maxTurns: 7 } }).outcome;

  assert.equal(result.state, 'ended-by-ceiling');
  assert.equal(dm.calls, 7);
});

test('short answers end at the soft ceiling', async () => {
  const dm = new ScriptedDecisionMaker([], textDecision('ok'));
  const result = await runLoop(dm, pingTools(), { policy: { maxIterations: 3 } }).outcome;

  assert.equal(result.state, 'ended-by-ceiling');
  assert.equal(result.iterations, 3);
  assert.equal(result.finalText, 'ok');
});

test('a short complete document ends the session', async () => {
  const dm = new ScriptedDecisionMaker([textDecision('<svg><circle r="4"/></svg>')]);
  const result = await runLoop(dm, pingTools()).outcome;
  assert.equal(result.state, 'ended-normally');
  assert.equal(result.iterations, 1);
});

// ── Tool handling ───────────────────────────────────────────────────────────

test('an unknown tool yields an error result for the decision-maker', async () => {
  const dm = new ScriptedDecisionMaker([toolDecision({ id: 'u1', name: 'nope' }), textDecision(ANSWER)]);
  const { outcome, events } = runLoop(dm, pingTools());
  const result = await outcome;

  assert.deepEqual(result.transcript[2], {
    role: 'tool',
    toolCallId: 'u1',
    toolName: 'nope',
    result: { status: 'error', error: 'Tool "nope" is not available' },
  });
  const toolError = events.find((e) => e.type === 'tool-error');
  assert.deepEqual(toolError, {
    type: 'tool-error',
    tool: 'nope',
    peer: '',
    callId: 'u1',
    error: 'Tool "nope" is not available',
    durationMs: 0,
  });
  assert.equal(result.state, 'ended-normally');
});

test('tool calls in a batch run in order', async () => {
  const tools = new StubToolSource()
    .add('first', () => ({ status: 'ok', text: '1' }))
    .add('second', () => ({ status: 'ok', text: '2' }));
  const dm = new ScriptedDecisionMaker([
    toolDecision({ id: 'b', name: 'second' }, { id: 'a', name: 'first', args: { n: 1 } }),
    textDecision(ANSWER),
  ]);

  const result = await runLoop(dm, tools).outcome;
  assert.deepEqual(tools.invocations.map((i) => [i.name, i.callId]), [['second', 'b'], ['first', 'a']]);
  assert.deepEqual(tools.invocations[1].args, { n: 1 });
  assert.equal(result.toolCalls, 2);
});

test('missing and repeated call ids are replaced by position', () => {
  const calls = normalizeToolCalls([
    { id: 'a', name: 'ping', args: {} },
    { id: 'a', name: 'ping', args: {} },
    { id: '', name: 'ping', args: {} },
    { id: 'call_3', name: 'ping', args: {} },
    { id: 'call_3', name: 'ping', args: {} },
  ]);
  assert.deepEqual(calls.map((c) => c.id), ['a', 'call_1', 'call_2', 'call_3', 'call_4']);
});

test('an explicit id already taken by a generated one is replaced as well', () => {
  const calls = normalizeToolCalls([
    { id: 'x', name: 'ping', args: {} },
    { id: 'x', name: 'ping', args: {} },
    { id: 'call_1', name: 'ping', args: {} },
  ]);
  assert.deepEqual(calls.map((c) => c.id), ['x', 'call_1', 'call_2']);
});

test('a failing decision call becomes retry text', async () => {
  const dm = new ScriptedDecisionMaker([
    () => {
      throw new Error('rate limited');
    },
    textDecision(ANSWER),
  ]);

  const result = await runLoop(dm, pingTools()).outcome;
  assert.equal(result.state, 'ended-normally');
  assert.equal(result.iterations, 2);
  const first = result.transcript[1];
  assert.ok(first.role === 'assistant' && first.content === 'Decision call failed: rate limited');
});

test('an exception inside a tool ends the session as aborted with an error event', async () => {
  const tools = new StubToolSource().add('explode', () => {
    throw new Error('tool exploded');
  });
  const dm = new ScriptedDecisionMaker([toolDecision({ id: 'e', name: 'explode' })]);

  const { outcome, events } = runLoop(dm, tools);
  const result = await outcome;

  assert.equal(result.state, 'aborted');
  assert.ok(events.some((e) => e.type === 'error' && e.message === 'tool exploded'));
  assert.equal(events.at(-1)?.type, 'complete');
});

// ── Cancellation ────────────────────────────────────────────────────────────

test('cancelling during a tool call discards its result and skips the rest of the batch', async () => {
  const controller = new AbortController();
  const tools = new StubToolSource().add('ping', () => {
    controller.abort();
    return { status: 'ok', text: 'pong' };
  });
  const dm = new ScriptedDecisionMaker([
    toolDecision({ id: '1', name: 'ping' }, { id: '2', name: 'ping' }, { id: '3', name: 'ping' }),
  ], textDecision(ANSWER));

  const { outcome, events } = runLoop(dm, tools, { controller });
  const result = await outcome;

  assert.equal(result.state, 'aborted');
  assert.equal(tools.invocations.length, 1);
  assert.equal(dm.calls, 1);
  assert.equal(result.toolCalls, 0);
  assert.deepEqual(result.transcript.map((t) => t.role), ['user', 'assistant', 'assistant']);
  assert.deepEqual(result.transcript.at(-1), { role: 'assistant', content: ABORT_MARKER, toolCalls: [], aborted: true });
  assert.deepEqual(events.find((e) => e.type === 'tool-abort'), {
    type: 'tool-abort',
    tool: 'ping',
    callId: '1',
    reason: 'Cancelled while the call was in flight',
  });
  assert.deepEqual(events.at(-1), { type: 'complete', state: 'aborted', iterations: 1, finalText: '' });
});

test('cancelling during a decision call commits nothing and runs no tools', async () => {
  const controller = new AbortController();
  const tools = pingTools();
  const dm = new ScriptedDecisionMaker([
    () => {
      controller.abort();
      return toolDecision({ id: '1', name: 'ping' });
    },
  ]);

  const result = await runLoop(dm, tools, { controller }).outcome;

  assert.equal(result.state, 'aborted');
  assert.equal(tools.invocations.length, 0);
  assert.deepEqual(result.transcript.map((t) => t.role), ['user', 'assistant']);
  const last = result.transcript[1];
  assert.ok(last.role === 'assistant' && last.aborted === true);
});

test('an already-cancelled session never calls the decision-maker', async () => {
  const controller = new AbortController();
  controller.abort();
  const dm = new ScriptedDecisionMaker([textDecision(ANSWER)]);

  const result = await runLoop(dm, pingTools(), { controller }).outcome;
  assert.equal(result.state, 'aborted');
  assert.equal(result.iterations, 0);
  assert.equal(dm.calls, 0);
});

test('run returns the same outcome when called again', async () => {
  const dm = new ScriptedDecisionMaker([textDecision(ANSWER)]);
  const { loop, outcome } = runLoop(dm, pingTools());
  const first = await outcome;
  const second = await loop.run();
  assert.equal(second, first);
  assert.equal(dm.calls, 1);
});
