import type { Decision, DecisionToken } from './model.js';

/**
 * Decision tokens typed by the operator, and their meaning.
 */
export type ParsedDecisionInput =
  | { kind: 'decision'; decision: Decision }
  | { kind: 'help' }
  | { kind: 'invalid' };

const TOKEN_TO_DECISION: Record<DecisionToken, Decision> = {
  y: 'accept',
  n: 'reject',
  a: 'accept-rest',
  d: 'abort-rest',
  q: 'quit',
};

const DECISION_INPUT_RE = /^ *([ynadq]) *$/i;
const HELP_INPUT_RE = /^ *[?h] *$/i;

export function isDecisionToken(value: string): value is DecisionToken {
  return value === 'y' || value === 'n' || value === 'a' || value === 'd' || value === 'q';
}

export function tokenToDecision(token: DecisionToken): Decision {
  return TOKEN_TO_DECISION[token];
}

/**
 * Parse one line of operator input.
 *
 * Accepts a single decision character (any case) with optional surrounding
 * spaces. `?` or `h` asks for help; everything else is invalid and the caller
 * asks again.
 */
export function parseDecisionInput(input: string): ParsedDecisionInput {
  const line = input.replace(/\r?\n$/, '');
  const match = line.match(DECISION_INPUT_RE);
  if (match) {
    const token = (match[1] ?? '').toLowerCase();
    if (isDecisionToken(token)) return { kind: 'decision', decision: tokenToDecision(token) };
  }
  if (HELP_INPUT_RE.test(line)) return { kind: 'help' };
  return { kind: 'invalid' };
}
