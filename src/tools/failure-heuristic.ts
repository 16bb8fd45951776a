/**
 * Substring scan for failure-indicating words in free text.
 *
 * Peers report failures inconsistently (a JSON-RPC error, an `error` field,
 * or plain text saying something failed), and decision-makers write retry
 * notices the same way. This is a word match, not a parser: "no errors
 * found" counts as a failure. Replace it here when peers grow a structured
 * error channel.
 */
export const FAILURE_TOKENS = [
  'error',
  'failed',
  'failure',
  'validation error',
  'exception',
  'traceback',
] as const;

export function looksLikeFailure(text: string): boolean {
  const lower = text.toLowerCase();
  return FAILURE_TOKENS.some((token) => lower.includes(token));
}
