import type { Decoder, Encoder } from './codec/types.js';
import type { ExchangeState } from './core/types.js';
import type { InstrumentationCollector } from './instrumentation.js';
import type { TransportPort } from './transport/types.js';

export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS', 'TRACE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface HttpEngineConfig {
  transport: TransportPort;
  /** Resolves descriptors whose target is a path ("/greeting") */
  baseUrl?: string | undefined;
  /** Applied under the descriptor's own headers; the descriptor wins on conflicts */
  defaultHeaders?: Record<string, string> | undefined;
  /**
   * Media type assumed when a response carries no Content-Type.
   * Defaults to application/octet-stream. `null` makes a missing Content-Type
   * an UnsupportedContentError.
   */
  defaultResponseMediaType?: string | null | undefined;
  /** Replaces the default encoders (bytes, string, JSON). Order is the tie-break. */
  encoders?: readonly Encoder[] | undefined;
  /** Replaces the default decoders (bytes, string, JSON). Order is the tie-break. */
  decoders?: readonly Decoder[] | undefined;
  hooks?: HttpEngineHooks | undefined;
  instrumentation?: InstrumentationCollector | undefined;
}

export interface HttpEngineHooks {
  /**
   * Called once per exchange, when the first consumer demand arrives.
   * Paired with exactly one terminal event (onRequestSuccess or onRequestFailure).
   */
  onRequestStart?: (event: { exchangeId: number; method: HttpMethod; target: string; timestamp: number }) => void;

  /**
   * Called when the consumer finished with the response: the body was drained,
   * the single value was taken, or the stream was abandoned early.
   */
  onRequestSuccess?: (event: {
    durationMs: number;
    exchangeId: number;
    method: HttpMethod;
    status: number;
    target: string;
  }) => void;

  onRequestFailure?: (event: {
    durationMs: number;
    error: HttpEngineError;
    exchangeId: number;
    method: HttpMethod;
    status?: number | undefined;
    target: string;
  }) => void;

  onStateChange?: (event: { exchangeId: number; from: ExchangeState; to: ExchangeState }) => void;
}

export type CodecDirection = 'encode' | 'decode';

// Engine error taxonomy. Every failure an exchange can end with is one of these.
export class HttpEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpEngineError';
  }
}

export class MalformedTargetError extends HttpEngineError {
  constructor(
    public readonly target: string,
    cause?: unknown
  ) {
    super(`Malformed request target: ${JSON.stringify(target)}`, { cause });
    this.name = 'MalformedTargetError';
  }
}

export class InvalidMediaTypeError extends HttpEngineError {
  constructor(
    public readonly value: string,
    reason: string
  ) {
    super(`Invalid media type ${JSON.stringify(value)}: ${reason}`);
    this.name = 'InvalidMediaTypeError';
  }
}

export class UnsupportedContentError extends HttpEngineError {
  constructor(
    public readonly direction: CodecDirection,
    public readonly valueType: string,
    public readonly mediaType: string | undefined
  ) {
    const subject = direction === 'encode' ? 'Request body' : 'Response body';
    super(`${subject} type '${valueType}' with content type '${mediaType ?? '<none>'}' not supported`);
    this.name = 'UnsupportedContentError';
  }
}

export class DoubleSendError extends HttpEngineError {
  constructor(public readonly target: string) {
    super(`Request already sent, refusing to send it again: ${target}`);
    this.name = 'DoubleSendError';
  }
}

export class EmptyBodyError extends HttpEngineError {
  constructor(
    public readonly method: HttpMethod,
    public readonly target: string,
    public readonly status: number
  ) {
    super(`Expected a value but ${method} ${target} (HTTP ${status}) produced an empty body`);
    this.name = 'EmptyBodyError';
  }
}

export class TransportError extends HttpEngineError {
  constructor(message: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${message}: ${detail}`, { cause });
    this.name = 'TransportError';
  }
}

export class EncodingError extends HttpEngineError {
  constructor(
    public readonly encoder: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Encoder '${encoder}' failed: ${detail}`, { cause });
    this.name = 'EncodingError';
  }
}

export class DecodingError extends HttpEngineError {
  constructor(
    public readonly decoder: string,
    message: string,
    cause?: unknown
  ) {
    super(`Decoder '${decoder}' failed: ${message}`, { cause });
    this.name = 'DecodingError';
  }
}

export class ResponseValidationError extends HttpEngineError {
  constructor(
    message: string,
    public readonly valueType: string,
    public readonly validationIssues: { message: string; path: string }[],
    public readonly truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}

/**
 * Normalizes anything thrown below the engine into the engine taxonomy.
 * Engine errors pass through untouched; everything else came from the transport.
 */
export function toEngineError(error: unknown, context: string): HttpEngineError {
  if (error instanceof HttpEngineError) {
    return error;
  }
  return new TransportError(context, error);
}
