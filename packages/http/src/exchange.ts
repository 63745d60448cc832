import type { Logger } from '@rivulet/logger';

import { isTerminalState, nextState } from './core/exchange-state.js';
import { sanitizeUrl } from './core/http-utils.js';
import type { ExchangeState, HttpEffects } from './core/types.js';
import { sanitizeEndpoint, type InstrumentationCollector } from './instrumentation.js';
import type { HttpEngineError, HttpEngineHooks, HttpMethod } from './types.js';

export type ExchangeOutcome = 'complete' | 'failed';

interface ExchangeDeps {
  effects: HttpEffects;
  hooks: HttpEngineHooks | undefined;
  instrumentation: InstrumentationCollector | undefined;
  logger: Logger;
}

/**
 * Lifecycle tracker for one request/response exchange. Owns the state
 * machine and guarantees a single terminal signal (complete or failed),
 * whichever path reaches it first.
 */
export class Exchange {
  private current: ExchangeState = 'built';
  private status: number | undefined;
  private readonly startTime: number;

  constructor(
    readonly id: number,
    readonly method: HttpMethod,
    readonly target: string,
    private readonly deps: ExchangeDeps
  ) {
    this.startTime = deps.effects.now();
    deps.hooks?.onRequestStart?.({ exchangeId: id, method, target, timestamp: this.startTime });
  }

  get state(): ExchangeState {
    return this.current;
  }

  get isTerminal(): boolean {
    return isTerminalState(this.current);
  }

  responseStatus(status: number): void {
    this.status = status;
  }

  /**
   * Move to `to` if the state machine allows it; ignored otherwise.
   */
  transition(to: ExchangeState): boolean {
    const from = this.current;
    const next = nextState(from, to);
    if (next === undefined) {
      return false;
    }
    this.current = next;
    this.deps.logger.debug(`Exchange #${this.id} ${this.method} ${sanitizeUrl(this.target)}: ${from} -> ${next}`);
    this.deps.hooks?.onStateChange?.({ exchangeId: this.id, from, to: next });
    return true;
  }

  complete(): void {
    if (this.isTerminal || !this.transition('complete')) {
      return;
    }
    const durationMs = this.deps.effects.now() - this.startTime;
    this.deps.hooks?.onRequestSuccess?.({
      durationMs,
      exchangeId: this.id,
      method: this.method,
      status: this.status ?? 0,
      target: this.target,
    });
    this.record('complete', durationMs);
  }

  fail(error: HttpEngineError): void {
    if (this.isTerminal) {
      return;
    }
    this.transition('failed');
    const durationMs = this.deps.effects.now() - this.startTime;
    this.deps.logger.warn(
      { exchangeId: this.id, method: this.method, status: this.status, error: error.name },
      `Exchange failed - Target: ${sanitizeUrl(this.target)}, Error: ${error.message}`
    );
    this.deps.hooks?.onRequestFailure?.({
      durationMs,
      error,
      exchangeId: this.id,
      method: this.method,
      status: this.status,
      target: this.target,
    });
    this.record('failed', durationMs, error.name);
  }

  private record(outcome: ExchangeOutcome, durationMs: number, error?: string): void {
    this.deps.instrumentation?.record({
      exchangeId: this.id,
      method: this.method,
      endpoint: sanitizeEndpoint(this.target),
      status: this.status ?? 0,
      outcome,
      durationMs,
      timestamp: this.deps.effects.now(),
      error,
    });
  }
}
