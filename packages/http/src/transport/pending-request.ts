import type { ByteStream } from '../codec/types.js';
import { HttpHeaders } from '../http-headers.js';
import { observeCompletion } from '../streams.js';
import { DoubleSendError, type HttpMethod } from '../types.js';

import { OneShotFlag } from './one-shot-flag.js';
import type { PendingRequestHandle, ResponseHead, SendFailureCallback, SentCallback } from './types.js';

const noop = (): void => undefined;

/**
 * Handle bookkeeping shared by every transport: the one-shot send guard,
 * header freezing, body attachment and sent notifications. Transports only
 * implement sendRequest().
 */
export abstract class AbstractPendingRequest implements PendingRequestHandle {
  private readonly sent = new OneShotFlag();
  private readonly sentNotified = new OneShotFlag();
  private readonly requestHeaders: HttpHeaders;
  private body: ByteStream | undefined;
  private bodyDeclared = false;
  private onSuccess: SentCallback = noop;
  private onFailure: SendFailureCallback = noop;

  constructor(
    readonly method: HttpMethod,
    readonly url: URL,
    headers?: HttpHeaders
  ) {
    this.requestHeaders = headers ? headers.copy() : new HttpHeaders();
  }

  get headers(): HttpHeaders {
    return this.sent.isSet ? this.requestHeaders.readOnly() : this.requestHeaders;
  }

  get isSent(): boolean {
    return this.sent.isSet;
  }

  /** False until setBody() is called, and after markNoBody() */
  get hasBody(): boolean {
    return this.body !== undefined;
  }

  setBody(body: ByteStream): void {
    this.assertNotSent();
    if (this.bodyDeclared) {
      throw new Error(`Request body already declared for ${this.method} ${this.url.toString()}`);
    }
    this.bodyDeclared = true;
    this.body = observeCompletion(body, {
      onComplete: () => this.notifySent(),
      onError: (error) => this.notifyFailure(error),
    });
  }

  markNoBody(): void {
    this.assertNotSent();
    if (this.bodyDeclared) {
      throw new Error(`Request body already declared for ${this.method} ${this.url.toString()}`);
    }
    this.bodyDeclared = true;
  }

  onSent(onSuccess: SentCallback, onFailure: SendFailureCallback): void {
    this.onSuccess = onSuccess;
    this.onFailure = onFailure;
  }

  async execute(): Promise<ResponseHead> {
    if (!this.sent.trySet()) {
      throw new DoubleSendError(this.url.toString());
    }

    const body = this.body;
    try {
      const head = await this.sendRequest(body);
      if (body === undefined) {
        this.notifySent();
      }
      return head;
    } catch (error) {
      this.notifyFailure(error);
      throw error;
    }
  }

  /**
   * Transmit headers (read them from `this.headers`, frozen by now) and the
   * body when present, then resolve with the response head. Called at most
   * once per handle. An undefined body means no body at all: no
   * Transfer-Encoding and no Content-Length.
   */
  protected abstract sendRequest(body: ByteStream | undefined): Promise<ResponseHead>;

  private assertNotSent(): void {
    if (this.sent.isSet) {
      throw new DoubleSendError(this.url.toString());
    }
  }

  private notifySent(): void {
    if (this.sentNotified.trySet()) {
      this.onSuccess();
    }
  }

  private notifyFailure(error: unknown): void {
    if (this.sentNotified.trySet()) {
      this.onFailure(error);
    }
  }
}
