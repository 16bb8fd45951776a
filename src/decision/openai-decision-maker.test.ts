import test from 'node:test';
import assert from 'node:assert/strict';
import {
  OpenAIDecisionMaker,
  parseCompletionMessage,
  resolveApiKey,
  toChatMessages,
  toChatTools,
} from './openai-decision-maker.js';
import { getDecisionSystemPrompt } from '../orchestrator/prompts.js';
import type { Transcript } from '../orchestrator/types.js';

test('transcript turns map to chat messages after the system prompt', () => {
  const transcript: Transcript = [
    { role: 'user', content: 'Find the open tickets' },
    { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'search', args: { status: 'open' } }] },
    { role: 'tool', toolCallId: 'c1', toolName: 'search', result: { status: 'flagged', text: 'search failed: index busy' } },
    { role: 'assistant', content: 'Retrying shortly.', toolCalls: [] },
  ];

  assert.deepEqual(toChatMessages(transcript, 'SYSTEM'), [
    { role: 'system', content: 'SYSTEM' },
    { role: 'user', content: 'Find the open tickets' },
    {
      role: 'assistant',
      content: null,
      tool_calls: [{ id: 'c1', type: 'function', function: { name: 'search', arguments: '{"status":"open"}' } }],
    },
    { role: 'tool', tool_call_id: 'c1', content: '[tool error] search failed: index busy' },
    { role: 'assistant', content: 'Retrying shortly.' },
  ]);
});

test('tool descriptors become function tools with an object schema', () => {
  const tools = toChatTools([
    { name: 'ping', description: 'Tool ping', inputSchema: {}, rawSchema: {} },
    {
      name: 'search',
      description: 'Search tickets',
      inputSchema: { q: { type: 'string', required: true } },
      rawSchema: { type: 'object', properties: { q: { type: 'string' } }, required: ['q'] },
    },
  ]);

  assert.deepEqual(tools, [
    { type: 'function', function: { name: 'ping', description: 'Tool ping', parameters: { type: 'object', properties: {} } } },
    {
      type: 'function',
      function: {
        name: 'search',
        description: 'Search tickets',
        parameters: { type: 'object', properties: { q: { type: 'string' } }, required: ['q'] },
      },
    },
  ]);
});

test('completion tool calls are parsed; unusable arguments become {}', () => {
  const decision = parseCompletionMessage({
    content: null,
    tool_calls: [
      { id: 't1', function: { name: 'search', arguments: '{"q":"printer"}' } },
      { id: 't2', function: { name: 'list', arguments: '' } },
      { id: 't3', function: { name: 'broken', arguments: '{oops' } },
      { id: 't4', function: { name: 'array', arguments: '[1,2]' } },
    ],
  });

  assert.equal(decision.text, '');
  assert.deepEqual(decision.toolCalls, [
    { id: 't1', name: 'search', args: { q: 'printer' } },
    { id: 't2', name: 'list', args: {} },
    { id: 't3', name: 'broken', args: {} },
    { id: 't4', name: 'array', args: {} },
  ]);
});

test('a plain text completion has no tool calls', () => {
  assert.deepEqual(parseCompletionMessage({ content: 'All done.' }), { text: 'All done.', toolCalls: [] });
});

test('the system prompt lists the available tools', () => {
  assert.ok(getDecisionSystemPrompt(['search', 'list']).includes('AVAILABLE TOOLS: search, list'));
  assert.ok(getDecisionSystemPrompt([]).includes('AVAILABLE TOOLS: (none)'));
});

test('the API key comes from LLM_API_KEY, then OPENAI_API_KEY', () => {
  assert.equal(resolveApiKey({ LLM_API_KEY: 'test-key-a', OPENAI_API_KEY: 'test-key-b' }), 'test-key-a');
  assert.equal(resolveApiKey({ LLM_API_KEY: '', OPENAI_API_KEY: 'test-key-b' }), 'test-key-b');
  assert.equal(resolveApiKey({}), null);
});

test('the decision-maker is named after its model', () => {
  const maker = new OpenAIDecisionMaker({ apiKey: 'test-key', baseURL: 'http://127.0.0.1:9/v1', model: 'test/model' });
  assert.equal(maker.name, 'openai:test/model');
});
