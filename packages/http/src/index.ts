// Pull-driven HTTP client engine with media-type codec negotiation
export * from './engine.js';
export * from './request-descriptor.js';
export * from './response-envelope.js';
export * from './http-headers.js';
export * from './types.js';

export * from './instrumentation.js';
export type { ExchangeOutcome } from './exchange.js';

export * from './codec/bytes.js';
export * from './codec/string.js';
export * from './codec/json.js';
export * from './codec/json-splitter.js';
export * from './codec/registry.js';
export * from './codec/types.js';
export * from './codec/value-type.js';

export * from './transport/types.js';
export * from './transport/pending-request.js';
export * from './transport/one-shot-flag.js';
export * from './transport/undici-transport.js';

export { collect, concatBytes, fromIterable } from './streams.js';

// Pure functional core
export * from './core/exchange-state.js';
export * from './core/http-utils.js';
export * from './core/media-type.js';
export type * from './core/types.js';
