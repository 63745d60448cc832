import type { ByteStream } from '../codec/types.js';
import type { HttpHeaders } from '../http-headers.js';
import type { HttpMethod } from '../types.js';

/**
 * Status line and headers of a response, plus its still-unread body.
 */
export interface ResponseHead {
  readonly status: number;
  readonly statusText?: string | undefined;
  /** Read-only */
  readonly headers: HttpHeaders;
  /** Single-pass; pulling drives the network read */
  readonly body: ByteStream;
  /**
   * Ask the transport to release the connection behind an unfinished body.
   * Courtesy signal: reclaim timing is up to the transport. Safe to call more than once.
   */
  cancel(reason?: unknown): void;
}

export type SentCallback = () => void;
export type SendFailureCallback = (error: unknown) => void;

/**
 * One in-flight send. `execute()` may succeed at most once per handle.
 */
export interface PendingRequestHandle {
  readonly method: HttpMethod;
  readonly url: URL;
  /** Writable until the request is sent, read-only afterwards */
  readonly headers: HttpHeaders;
  readonly isSent: boolean;
  /** Attach a lazy body. The engine calls this at most once per execution. */
  setBody(body: ByteStream): void;
  /** Declare that the request has no body, so no chunked framing is used */
  markNoBody(): void;
  /** Fired exactly once, when the body finished (or failed) going out */
  onSent(onSuccess: SentCallback, onFailure: SendFailureCallback): void;
  /**
   * Send the request and resolve once the response head arrived.
   * Rejects with DoubleSendError when the handle was already sent.
   */
  execute(): Promise<ResponseHead>;
}

/**
 * Boundary to the network I/O layer.
 */
export interface TransportPort {
  createRequest(method: HttpMethod, url: URL, headers: HttpHeaders): PendingRequestHandle;
}
