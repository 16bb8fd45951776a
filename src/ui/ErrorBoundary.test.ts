import test from 'node:test';
import assert from 'node:assert/strict';
import { ErrorBoundary } from './ErrorBoundary.js';

test('a render error becomes boundary state', () => {
  const error = new Error('bad line');
  assert.deepEqual(ErrorBoundary.getDerivedStateFromError(error), { error });
});

test('a caught crash is reported to onError', () => {
  const seen: string[] = [];
  const boundary = new ErrorBoundary({ children: null, onError: (error) => seen.push(error.message) });

  boundary.componentDidCatch(new Error('view exploded'), { componentStack: '\n    at Line\n    at SessionView' });
  boundary.componentDidCatch(new Error('no stack'), {});

  assert.deepEqual(seen, ['view exploded', 'no stack']);
});
