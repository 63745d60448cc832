import { Readable } from 'node:stream';

import { getLogger } from '@rivulet/logger';
import { request, type Dispatcher } from 'undici';

import type { ByteStream } from '../codec/types.js';
import { sanitizeUrl } from '../core/http-utils.js';
import { HttpHeaders } from '../http-headers.js';
import { utf8 } from '../streams.js';
import type { HttpMethod } from '../types.js';

import { AbstractPendingRequest } from './pending-request.js';
import type { PendingRequestHandle, ResponseHead, TransportPort } from './types.js';

const logger = getLogger('UndiciTransport');

export interface UndiciTransportOptions {
  /** Defaults to undici's global dispatcher */
  dispatcher?: Dispatcher | undefined;
  /** Milliseconds to wait for the response head */
  headersTimeout?: number | undefined;
  /** Milliseconds allowed between two body chunks */
  bodyTimeout?: number | undefined;
}

/**
 * Transport Port backed by undici's request(). Connection reuse, TLS and
 * timeouts belong to the dispatcher; this adapter only maps handles onto requests.
 */
export class UndiciTransport implements TransportPort {
  constructor(private readonly options: UndiciTransportOptions = {}) {}

  createRequest(method: HttpMethod, url: URL, headers: HttpHeaders): PendingRequestHandle {
    return new UndiciPendingRequest(method, url, headers, this.options);
  }
}

class UndiciPendingRequest extends AbstractPendingRequest {
  constructor(
    method: HttpMethod,
    url: URL,
    headers: HttpHeaders,
    private readonly options: UndiciTransportOptions
  ) {
    super(method, url, headers);
  }

  protected async sendRequest(body: ByteStream | undefined): Promise<ResponseHead> {
    logger.debug(`Sending request - URL: ${sanitizeUrl(this.url.toString())}, Method: ${this.method}, Body: ${body ? 'streamed' : 'none'}`);

    const { dispatcher, headersTimeout, bodyTimeout } = this.options;
    const response = await request(this.url, {
      method: this.method,
      headers: this.headers.toRecord(),
      // eslint-disable-next-line unicorn/no-null -- undici requires null for an absent body
      body: body ? Readable.from(body, { objectMode: false }) : null,
      ...(dispatcher ? { dispatcher } : {}),
      ...(headersTimeout !== undefined ? { headersTimeout } : {}),
      ...(bodyTimeout !== undefined ? { bodyTimeout } : {}),
    });

    const responseBody = response.body;
    return {
      status: response.statusCode,
      headers: toHttpHeaders(response.headers).readOnly(),
      body: readChunks(responseBody),
      cancel: (reason?: unknown) => {
        if (responseBody.destroyed) {
          return;
        }
        const url = sanitizeUrl(this.url.toString());
        logger.debug(
          `Cancelling response body - URL: ${url}, Reason: ${reason instanceof Error ? reason.message : 'consumer done'}`
        );
        // undici reports an unfinished body as aborted once destroyed
        responseBody.once('error', (error: Error) => {
          logger.debug(`Response body closed - URL: ${url}, Error: ${error.message}`);
        });
        responseBody.destroy();
      },
    };
  }
}

function toHttpHeaders(raw: Record<string, string | string[] | undefined>): HttpHeaders {
  const headers = new HttpHeaders();
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) {
      headers.add(name, v);
    }
  }
  return headers;
}

async function* readChunks(readable: AsyncIterable<unknown>): ByteStream {
  for await (const chunk of readable) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    } else if (typeof chunk === 'string') {
      yield utf8(chunk);
    }
  }
}
