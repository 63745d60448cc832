// Pure types for the functional core
// No classes, only data structures

/**
 * Exchange lifecycle. `failed` is absorbing and reachable from every
 * non-terminal state.
 */
export type ExchangeState =
  | 'built'
  | 'body-writing'
  | 'sent'
  | 'response-received'
  | 'decoding'
  | 'complete'
  | 'failed';

/**
 * Parsed media type. Type, subtype and parameter names are lower-cased;
 * parameter values keep their case except `charset`.
 */
export interface MediaType {
  readonly type: string;
  readonly subtype: string;
  readonly parameters: Readonly<Record<string, string>>;
}

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  now: () => number;
}
