import { err, ok, type Result } from 'neverthrow';

import type { ValueType } from './codec/value-type.js';
import { typeOfValue } from './codec/value-type.js';
import { isPathTarget, parseAbsoluteTarget, resolveTarget } from './core/http-utils.js';
import type { MediaType } from './core/types.js';
import { HttpHeaders, type HttpHeadersInit } from './http-headers.js';
import type { PendingRequestHandle, TransportPort } from './transport/types.js';
import { MalformedTargetError, type HttpMethod } from './types.js';

/**
 * Outbound body: one value, or a lazy sequence of values sharing one type.
 */
export type RequestContent =
  | { readonly kind: 'single'; readonly value: unknown; readonly type: ValueType<unknown> }
  | { readonly kind: 'stream'; readonly values: AsyncIterable<unknown>; readonly type: ValueType<unknown> };

export interface BuildOptions {
  baseUrl?: string | undefined;
  /** Applied first; descriptor headers with the same name replace them */
  defaultHeaders?: HttpHeadersInit | undefined;
}

/**
 * Verb, target, headers and optional content of one request, assembled
 * before it is handed to the engine.
 */
export class RequestDescriptor {
  readonly target: string;
  private readonly requestHeaders: HttpHeaders;
  private body: RequestContent | undefined;

  /**
   * @throws MalformedTargetError when the target is neither an absolute
   * http(s) URL nor a path
   */
  constructor(
    readonly method: HttpMethod,
    target: string | URL
  ) {
    const text = typeof target === 'string' ? target : target.toString();
    if (!isPathTarget(text)) {
      const parsed = parseAbsoluteTarget(text);
      if (parsed.isErr()) {
        throw parsed.error;
      }
    }
    this.target = text;
    this.requestHeaders = new HttpHeaders();
  }

  header(name: string, ...values: string[]): this {
    this.requestHeaders.set(name, values);
    return this;
  }

  headers(init: HttpHeadersInit): this {
    const incoming = new HttpHeaders(init);
    for (const name of incoming.names()) {
      this.requestHeaders.set(name, incoming.getAll(name));
    }
    return this;
  }

  contentType(mediaType: MediaType | string): this {
    this.requestHeaders.setContentType(mediaType);
    return this;
  }

  accept(...mediaTypes: (MediaType | string)[]): this {
    this.requestHeaders.setAccept(mediaTypes);
    return this;
  }

  /**
   * Attach a single value. Its type is derived from the value unless given.
   */
  content(value: unknown, type: ValueType<unknown> = typeOfValue(value)): this {
    this.body = { kind: 'single', value, type };
    return this;
  }

  /**
   * Attach a lazy sequence of values, encoded as they are pulled.
   * The sequence is iterated once per exchange.
   */
  contentStream(values: AsyncIterable<unknown>, type: ValueType<unknown>): this {
    this.body = { kind: 'stream', values, type };
    return this;
  }

  /** Independent copy of the current headers */
  getHeaders(): HttpHeaders {
    return this.requestHeaders.copy();
  }

  getContent(): RequestContent | undefined {
    return this.body;
  }

  get hasContent(): boolean {
    return this.body !== undefined;
  }

  /**
   * Frozen copy; later changes to this descriptor do not reach it.
   */
  snapshot(): RequestDescriptor {
    const copy = new RequestDescriptor(this.method, this.target);
    copy.headers(this.requestHeaders);
    copy.body = this.body;
    return copy;
  }

  /**
   * Materialize a pending handle on the transport. No I/O happens here.
   */
  build(transport: TransportPort, options: BuildOptions = {}): Result<PendingRequestHandle, MalformedTargetError> {
    const url = resolveTarget(options.baseUrl, this.target);
    if (url.isErr()) {
      return err(url.error);
    }

    const merged = new HttpHeaders(options.defaultHeaders);
    for (const name of this.requestHeaders.names()) {
      merged.set(name, this.requestHeaders.getAll(name));
    }

    const handle = transport.createRequest(this.method, url.value, merged.copy());
    for (const name of merged.names()) {
      handle.headers.set(name, merged.getAll(name));
    }
    return ok(handle);
  }
}

const descriptor = (method: HttpMethod) => (target: string | URL) => new RequestDescriptor(method, target);

/**
 * Shorthand descriptor factories, one per common verb.
 */
export const Requests = {
  get: descriptor('GET'),
  head: descriptor('HEAD'),
  post: descriptor('POST'),
  put: descriptor('PUT'),
  patch: descriptor('PATCH'),
  delete: descriptor('DELETE'),
  options: descriptor('OPTIONS'),
} as const;
