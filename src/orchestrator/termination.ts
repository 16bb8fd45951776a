import { looksLikeFailure } from '../tools/failure-heuristic.js';
import type { Decision } from '../decision/types.js';

export interface TerminationPolicy {
  /** Soft ceiling on decision turns, applied to text-only answers */
  maxIterations: number;
  minFinalTextLength: number;
  documentMinLength: number;
}

/**
 * What happens after a decision turn:
 *   tools: run the tool calls, then decide again
 *   continue: decide again
 *   end: finished normally
 *   ceiling: finished because the soft ceiling was reached
 */
export type Verdict = 'tools' | 'continue' | 'end' | 'ceiling';

const STRUCTURE_MARKERS: ReadonlyArray<readonly [string, string]> = [
  ['<html', '</html>'],
  ['<body', '</body>'],
  ['<svg', '</svg>'],
];

/** True when the text carries a matching open/close pair of document markers */
export function looksLikeDocument(text: string): boolean {
  const lower = text.toLowerCase();
  return STRUCTURE_MARKERS.some(([open, close]) => {
    const start = lower.indexOf(open);
    return start !== -1 && lower.indexOf(close, start + open.length) !== -1;
  });
}

/**
 * Rules are checked in a fixed order, so text that contains a failure word
 * is always a retry, whatever its length.
 */
export function judgeDecision(decision: Decision, iteration: number, policy: TerminationPolicy): Verdict {
  if (decision.toolCalls.length > 0) return 'tools';

  const text = decision.text;
  if (looksLikeFailure(text)) return 'continue';
  if (text.length > policy.minFinalTextLength) return 'end';
  if (iteration >= policy.maxIterations) return 'ceiling';
  if (looksLikeDocument(text) && text.length > policy.documentMinLength) return 'end';
  return 'continue';
}
