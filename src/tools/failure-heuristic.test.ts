import test from 'node:test';
import assert from 'node:assert/strict';
import { looksLikeFailure } from './failure-heuristic.js';

test('failure words match case-insensitively', () => {
  assert.equal(looksLikeFailure('Validation Error: "limit" must be a number'), true);
  assert.equal(looksLikeFailure('Request FAILED with status 500'), true);
  assert.equal(looksLikeFailure('Traceback (most recent call last):'), true);
  assert.equal(looksLikeFailure('Unhandled exception in worker'), true);
});

test('ordinary text does not match', () => {
  assert.equal(looksLikeFailure('Found 3 matching rows'), false);
  assert.equal(looksLikeFailure(''), false);
});

test('matching is by substring, not by meaning', () => {
  assert.equal(looksLikeFailure('no errors found'), true);
  assert.equal(looksLikeFailure('terrorism statistics'), true);
});
