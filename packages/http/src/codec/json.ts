import { equalsTypeAndSubtype, includes, MediaTypes } from '../core/media-type.js';
import type { MediaType } from '../core/types.js';
import { DecodingError, EncodingError } from '../types.js';
import { utf8 } from '../streams.js';

import { JsonValueSplitter } from './json-splitter.js';
import type { ByteStream, Decoder, Encoder } from './types.js';
import type { ValueType } from './value-type.js';

const JSON_MEDIA_TYPES: readonly MediaType[] = [
  MediaTypes.APPLICATION_JSON,
  MediaTypes.APPLICATION_JSON_SUFFIX,
  MediaTypes.APPLICATION_NDJSON,
];

const supportsMediaType = (mediaType: MediaType): boolean =>
  JSON_MEDIA_TYPES.some((supported) => includes(supported, mediaType));

const isNdjson = (mediaType: MediaType | undefined): boolean =>
  mediaType !== undefined && equalsTypeAndSubtype(mediaType, MediaTypes.APPLICATION_NDJSON);

/**
 * JSON for everything that is not raw bytes. Strings are only taken when the
 * request explicitly declares a JSON media type; otherwise the string encoder
 * owns them.
 */
export class JsonEncoder implements Encoder {
  readonly name = 'json';
  readonly mediaTypes = JSON_MEDIA_TYPES;
  readonly defaultMediaType = MediaTypes.APPLICATION_JSON;

  canEncode(type: ValueType<unknown>, mediaType: MediaType | undefined): boolean {
    if (mediaType === undefined) {
      return type.kind === 'json';
    }
    return type.kind !== 'bytes' && supportsMediaType(mediaType);
  }

  /**
   * One value is written as-is. Several values become a JSON array, or one
   * line per value for application/x-ndjson.
   */
  async *encode(values: AsyncIterable<unknown>, _type: ValueType<unknown>, mediaType: MediaType | undefined): ByteStream {
    const iterator = values[Symbol.asyncIterator]();

    if (isNdjson(mediaType)) {
      for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
        yield utf8(`${this.stringify(next.value)}\n`);
      }
      return;
    }

    const first = await iterator.next();
    if (first.done) {
      yield utf8('[]');
      return;
    }
    const second = await iterator.next();
    if (second.done) {
      yield utf8(this.stringify(first.value));
      return;
    }

    yield utf8(`[${this.stringify(first.value)}`);
    yield utf8(`,${this.stringify(second.value)}`);
    for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
      yield utf8(`,${this.stringify(next.value)}`);
    }
    yield utf8(']');
  }

  private stringify(value: unknown): string {
    let text: string | undefined;
    try {
      text = JSON.stringify(value);
    } catch (error) {
      throw new EncodingError(this.name, error);
    }
    if (text === undefined) {
      throw new EncodingError(this.name, new TypeError(`${typeof value} is not JSON-serializable`));
    }
    return text;
  }
}

/**
 * Decodes JSON bodies into a lazy sequence of values. For element types a
 * top-level array is streamed element by element; line-delimited and
 * concatenated documents yield one value each.
 */
export class JsonDecoder implements Decoder {
  readonly name = 'json';
  readonly mediaTypes = JSON_MEDIA_TYPES;

  canDecode(type: ValueType<unknown>, mediaType: MediaType): boolean {
    return type.kind === 'json' && supportsMediaType(mediaType);
  }

  async *decode(bytes: ByteStream, type: ValueType<unknown>): AsyncIterable<unknown> {
    const textDecoder = new TextDecoder('utf-8');
    const splitter = new JsonValueSplitter({ unwrapArray: type.elementwise });

    for await (const chunk of bytes) {
      const tokens = this.split(() => splitter.push(textDecoder.decode(chunk, { stream: true })));
      for (const token of tokens) {
        yield this.parse(token);
      }
    }

    const rest = this.split(() => [...splitter.push(textDecoder.decode()), ...splitter.end()]);
    for (const token of rest) {
      yield this.parse(token);
    }
  }

  private split(step: () => string[]): string[] {
    try {
      return step();
    } catch (error) {
      throw new DecodingError(this.name, error instanceof Error ? error.message : String(error), error);
    }
  }

  private parse(token: string): unknown {
    try {
      return JSON.parse(token) as unknown;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new DecodingError(this.name, `${detail} in ${JSON.stringify(token.slice(0, 100))}`, error);
    }
  }
}
