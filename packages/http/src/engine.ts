import { getLogger, type Logger } from '@rivulet/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { CodecRegistry } from './codec/registry.js';
import { DEFAULT_DECODE_HINTS, type ByteStream, type Decoder, type Encoder } from './codec/types.js';
import type { ValueType } from './codec/value-type.js';
import { sanitizeUrl } from './core/http-utils.js';
import { formatMediaType, MediaTypes, tryParseMediaType } from './core/media-type.js';
import type { HttpEffects, MediaType } from './core/types.js';
import { Exchange } from './exchange.js';
import { HttpHeaders } from './http-headers.js';
import type { RequestContent, RequestDescriptor } from './request-descriptor.js';
import { ResponseEnvelope } from './response-envelope.js';
import { singleValue } from './streams.js';
import type { PendingRequestHandle, ResponseHead } from './transport/types.js';
import {
  DecodingError,
  EmptyBodyError,
  EncodingError,
  HttpEngineError,
  toEngineError,
  TransportError,
  UnsupportedContentError,
  type HttpEngineConfig,
} from './types.js';

const engineConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  defaultHeaders: z.record(z.string()).optional(),
  defaultResponseMediaType: z.string().min(1).nullable().optional(),
});

type OpenExchange = <T>(type: ValueType<T>, requireElement: boolean) => Promise<Result<ResponseEnvelope<T>, HttpEngineError>>;

/**
 * Executes request descriptors against a transport and decodes the responses
 * with the first matching codec.
 *
 * Nothing is sent by perform(); every consumption call on the returned
 * Execution drives its own exchange.
 */
export class HttpEngine {
  private readonly config: HttpEngineConfig;
  private readonly registry: CodecRegistry;
  private readonly effects: HttpEffects;
  private readonly logger: Logger;
  private readonly defaultHeaders: HttpHeaders;
  private readonly defaultResponseMediaType: MediaType | undefined;
  private nextExchangeId = 1;

  /**
   * @throws HttpEngineError when a scalar setting is invalid
   */
  constructor(config: HttpEngineConfig, effects?: Partial<HttpEffects>) {
    const parsed = engineConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
      throw new HttpEngineError(`HTTP engine configuration invalid:\n${issues}`);
    }

    this.config = config;
    this.registry = new CodecRegistry(config.encoders, config.decoders);
    this.logger = getLogger('HttpEngine');
    this.effects = {
      now: () => Date.now(),
      ...effects,
    };
    this.defaultHeaders = new HttpHeaders(config.defaultHeaders).readOnly();

    const responseDefault = config.defaultResponseMediaType;
    if (responseDefault === null) {
      this.defaultResponseMediaType = undefined;
    } else if (responseDefault === undefined) {
      this.defaultResponseMediaType = MediaTypes.APPLICATION_OCTET_STREAM;
    } else {
      const mediaType = tryParseMediaType(responseDefault);
      if (mediaType.isErr()) {
        throw mediaType.error;
      }
      this.defaultResponseMediaType = mediaType.value;
    }

    this.logger.debug(
      `HTTP engine initialized - BaseUrl: ${config.baseUrl ?? '<none>'}, Encoders: ${this.registry.encoders.map((e) => e.name).join(',')}, Decoders: ${this.registry.decoders.map((d) => d.name).join(',')}`
    );
  }

  get codecs(): CodecRegistry {
    return this.registry;
  }

  /** Same engine with a replaced encoder list */
  withEncoders(encoders: readonly Encoder[]): HttpEngine {
    return new HttpEngine({ ...this.config, encoders }, this.effects);
  }

  /** Same engine with a replaced decoder list */
  withDecoders(decoders: readonly Decoder[]): HttpEngine {
    return new HttpEngine({ ...this.config, decoders }, this.effects);
  }

  /**
   * Deferred execution of a snapshot of the descriptor. Side-effect free;
   * later changes to the descriptor do not reach the execution.
   */
  perform(descriptor: RequestDescriptor): Execution {
    const snapshot = descriptor.snapshot();
    return new Execution(snapshot, (type, requireElement) => this.openExchange(snapshot, type, requireElement));
  }

  private async openExchange<T>(
    descriptor: RequestDescriptor,
    type: ValueType<T>,
    requireElement: boolean
  ): Promise<Result<ResponseEnvelope<T>, HttpEngineError>> {
    const exchange = new Exchange(this.nextExchangeId++, descriptor.method, descriptor.target, {
      effects: this.effects,
      hooks: this.config.hooks,
      instrumentation: this.config.instrumentation,
      logger: this.logger,
    });
    const fail = (error: HttpEngineError): Result<never, HttpEngineError> => {
      exchange.fail(error);
      return err(error);
    };

    let handle: PendingRequestHandle;
    try {
      const built = descriptor.build(this.config.transport, {
        baseUrl: this.config.baseUrl,
        defaultHeaders: this.defaultHeaders,
      });
      if (built.isErr()) {
        return fail(built.error);
      }
      handle = built.value;
    } catch (error) {
      return fail(toEngineError(error, `Request creation failed for ${descriptor.method} ${sanitizeUrl(descriptor.target)}`));
    }
    const url = sanitizeUrl(handle.url.toString());
    const content = descriptor.getContent();

    try {
      if (content === undefined) {
        handle.markNoBody();
      } else {
        const attached = this.attachBody(handle, content);
        if (attached.isErr()) {
          return fail(attached.error);
        }
      }
    } catch (error) {
      return fail(toEngineError(error, `Request preparation failed for ${descriptor.method} ${url}`));
    }

    // The transport may answer before it has drained the request body, so a
    // body failure can arrive after execute() resolved. The first path that
    // observes it reports it.
    let bodyFailure: HttpEngineError | undefined;
    handle.onSent(
      () => {
        exchange.transition('sent');
      },
      (error) => {
        bodyFailure = toEngineError(error, `Request body failed for ${descriptor.method} ${url}`);
        this.logger.debug(`Request not sent - Exchange: #${exchange.id}, Error: ${bodyFailure.message}`);
      }
    );
    const pendingBodyFailure = (): HttpEngineError | undefined => bodyFailure;

    if (content !== undefined) {
      exchange.transition('body-writing');
    }
    this.logger.debug(`Sending request - Exchange: #${exchange.id}, Method: ${descriptor.method}, URL: ${url}`);

    let head: ResponseHead;
    try {
      head = await handle.execute();
    } catch (error) {
      return fail(toEngineError(error, `${descriptor.method} ${url} failed`));
    }

    exchange.responseStatus(head.status);
    const failedBody = pendingBodyFailure();
    if (failedBody) {
      head.cancel(failedBody);
      return fail(failedBody);
    }
    exchange.transition('response-received');

    const mediaType = this.responseMediaType(head, type);
    if (mediaType.isErr()) {
      head.cancel(mediaType.error);
      return fail(mediaType.error);
    }

    const decoder = this.registry.resolveDecoder(type, mediaType.value, DEFAULT_DECODE_HINTS);
    if (!decoder) {
      const error = new UnsupportedContentError('decode', type.name, formatMediaType(mediaType.value));
      head.cancel(error);
      return fail(error);
    }

    exchange.transition('decoding');
    const elements = this.decodeBody(exchange, head, decoder, type, mediaType.value, requireElement, pendingBodyFailure);
    return ok(
      new ResponseEnvelope(
        head.status,
        head.headers,
        elements,
        type,
        () => {
          head.cancel();
          const failure = pendingBodyFailure();
          if (failure) {
            exchange.fail(failure);
          } else {
            exchange.complete();
          }
        },
        head.statusText
      )
    );
  }

  private attachBody(handle: PendingRequestHandle, content: RequestContent): Result<Encoder, HttpEngineError> {
    const declared = handle.headers.get('Content-Type');
    let mediaType: MediaType | undefined;
    if (declared !== undefined) {
      const parsed = tryParseMediaType(declared);
      if (parsed.isErr()) {
        return err(new UnsupportedContentError('encode', content.type.name, declared));
      }
      mediaType = parsed.value;
    }

    const encoder = this.registry.resolveEncoder(content.type, mediaType);
    if (!encoder) {
      return err(new UnsupportedContentError('encode', content.type.name, declared));
    }
    if (mediaType === undefined) {
      handle.headers.setContentType(encoder.defaultMediaType);
    }

    const values = content.kind === 'single' ? singleValue(content.value) : content.values;
    handle.setBody(guardEncoding(encoder, encoder.encode(values, content.type, mediaType)));
    return ok(encoder);
  }

  /**
   * Content-Type of the response, or the configured default when absent.
   */
  private responseMediaType(head: ResponseHead, type: ValueType<unknown>): Result<MediaType, UnsupportedContentError> {
    const raw = head.headers.get('Content-Type');
    if (raw === undefined) {
      return this.defaultResponseMediaType
        ? ok(this.defaultResponseMediaType)
        : err(new UnsupportedContentError('decode', type.name, undefined));
    }
    const parsed = tryParseMediaType(raw);
    return parsed.isOk() ? ok(parsed.value) : err(new UnsupportedContentError('decode', type.name, raw));
  }

  private async *decodeBody<T>(
    exchange: Exchange,
    head: ResponseHead,
    decoder: Decoder,
    type: ValueType<T>,
    mediaType: MediaType,
    requireElement: boolean,
    bodyFailure: () => HttpEngineError | undefined
  ): AsyncGenerator<T> {
    let count = 0;
    let drained = false;
    const rethrowBodyFailure = (): void => {
      const failure = bodyFailure();
      if (failure) {
        throw failure;
      }
    };
    try {
      const bytes = guardTransport(head.body);
      for await (const element of decoder.decode(bytes, type, mediaType, DEFAULT_DECODE_HINTS)) {
        rethrowBodyFailure();
        const validated = type.validate(element);
        if (validated.isErr()) {
          throw validated.error;
        }
        count++;
        yield validated.value;
      }
      drained = true;
      rethrowBodyFailure();
      if (requireElement && count === 0) {
        throw new EmptyBodyError(exchange.method, exchange.target, head.status);
      }
    } catch (error) {
      const engineError =
        error instanceof HttpEngineError
          ? error
          : new DecodingError(decoder.name, error instanceof Error ? error.message : String(error), error);
      exchange.fail(engineError);
      throw engineError;
    } finally {
      if (!drained) {
        head.cancel();
      }
      const failure = bodyFailure();
      if (failure) {
        exchange.fail(failure);
      } else {
        exchange.complete();
      }
    }
  }
}

/**
 * Cold handle on a performed request. Each consumption call sends the
 * request anew.
 */
export class Execution {
  constructor(
    readonly descriptor: RequestDescriptor,
    private readonly open: OpenExchange
  ) {}

  /**
   * First decoded element; the rest of the body is cancelled.
   * Fails with EmptyBodyError when the body decodes to nothing.
   */
  async asSingle<T>(type: ValueType<T>): Promise<Result<T, HttpEngineError>> {
    const opened = await this.open(type, true);
    if (opened.isErr()) {
      return err(opened.error);
    }

    const envelope = opened.value;
    const iterator = envelope[Symbol.asyncIterator]();
    try {
      const first = await iterator.next();
      if (first.done) {
        return err(new EmptyBodyError(this.descriptor.method, this.descriptor.target, envelope.status));
      }
      return ok(first.value);
    } catch (error) {
      return err(toEngineError(error, 'Response body read failed'));
    } finally {
      await iterator.return?.();
    }
  }

  /**
   * Decoded elements, pulled one at a time. The request is sent on the first
   * next() call; failures are thrown from next().
   */
  async *asStream<T>(type: ValueType<T>): AsyncGenerator<T, void, undefined> {
    const opened = await this.open(type, false);
    if (opened.isErr()) {
      throw opened.error;
    }
    yield* opened.value;
  }

  /** Status and headers once the response head arrived, body still unread */
  asEnvelope<T>(type: ValueType<T>): Promise<Result<ResponseEnvelope<T>, HttpEngineError>> {
    return this.open(type, false);
  }
}

async function* guardEncoding(encoder: Encoder, bytes: ByteStream): ByteStream {
  try {
    yield* bytes;
  } catch (error) {
    throw error instanceof HttpEngineError ? error : new EncodingError(encoder.name, error);
  }
}

async function* guardTransport(bytes: ByteStream): ByteStream {
  try {
    yield* bytes;
  } catch (error) {
    throw error instanceof HttpEngineError ? error : new TransportError('Response body read failed', error);
  }
}
