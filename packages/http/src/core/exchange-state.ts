import type { ExchangeState } from './types.js';

const transitions: Record<ExchangeState, readonly ExchangeState[]> = {
  built: ['body-writing', 'sent', 'failed'],
  'body-writing': ['sent', 'response-received', 'failed'],
  sent: ['response-received', 'failed'],
  'response-received': ['decoding', 'failed'],
  decoding: ['complete', 'failed'],
  complete: [],
  failed: [],
};

export const isTerminalState = (state: ExchangeState): boolean => state === 'complete' || state === 'failed';

export const canTransition = (from: ExchangeState, to: ExchangeState): boolean => transitions[from].includes(to);

/**
 * Returns the next state, or undefined when the move is not allowed.
 * Terminal states never move.
 */
export const nextState = (from: ExchangeState, to: ExchangeState): ExchangeState | undefined =>
  canTransition(from, to) ? to : undefined;
