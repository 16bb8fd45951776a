import type { TerminalState } from '../orchestrator/types.js';

export const THEME = {
  text: '#F8FAFC',
  muted: '#94A3B8',
  border: '#64748B',
  separator: '#334155',
  info: '#FBBF24',
  accent: '#38BDF8',
  ok: '#22C55E',
  error: '#EF4444',
  // Tool activity
  actionIcon: '#64748B',
  actionText: '#94A3B8',
  actionValue: '#CBD5E1',
} as const;

const STATE_HEX: Record<TerminalState, string> = {
  'ended-normally': THEME.ok,
  'ended-by-ceiling': THEME.info,
  aborted: THEME.error,
};

const STATE_LABEL: Record<TerminalState, string> = {
  'ended-normally': 'done',
  'ended-by-ceiling': 'stopped at turn limit',
  aborted: 'aborted',
};

export function stateHex(state: TerminalState): string {
  return STATE_HEX[state];
}

export function stateLabel(state: TerminalState): string {
  return STATE_LABEL[state];
}
