import { TextDecoder } from 'node:util';
import { charsetOf, includes, MediaTypes, parseMediaType } from '../core/media-type.js';
import type { MediaType } from '../core/types.js';
import { EncodingError } from '../types.js';

import type { ByteStream, DecodeHints, Decoder, Encoder } from './types.js';
import type { ValueType } from './value-type.js';

const UTF8_ALIASES = new Set(['utf-8', 'utf8', 'unicode-1-1-utf-8', 'us-ascii']);

const isUtf8Compatible = (mediaType: MediaType | undefined): boolean => {
  const charset = mediaType ? charsetOf(mediaType) : undefined;
  return charset === undefined || UTF8_ALIASES.has(charset);
};

const isSupportedCharset = (label: string): boolean => {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
};

/**
 * Strings as UTF-8, for text/* requests or requests without a declared content type.
 */
export class StringEncoder implements Encoder {
  readonly name = 'string';
  readonly mediaTypes: readonly MediaType[] = [MediaTypes.TEXT_ALL];
  readonly defaultMediaType = MediaTypes.TEXT_PLAIN_UTF8;
  private readonly encoder = new TextEncoder();

  canEncode(type: ValueType<unknown>, mediaType: MediaType | undefined): boolean {
    if (type.kind !== 'text') {
      return false;
    }
    if (mediaType === undefined) {
      return true;
    }
    return includes(MediaTypes.TEXT_ALL, mediaType) && isUtf8Compatible(mediaType);
  }

  async *encode(values: AsyncIterable<unknown>): ByteStream {
    for await (const value of values) {
      if (typeof value !== 'string') {
        throw new EncodingError(this.name, new TypeError(`expected string, got ${typeof value}`));
      }
      yield this.encoder.encode(value);
    }
  }
}

/**
 * How decoded text is cut into elements:
 * - `chunk`: one string per received chunk (multi-byte characters are never split)
 * - `line`: one string per line, without the line terminator
 * - `none`: the whole body as a single string
 */
export type StringSplit = 'chunk' | 'line' | 'none';

export interface StringDecoderOptions {
  split?: StringSplit | undefined;
  /** Media types this decoder accepts. Defaults to text/* */
  mediaTypes?: readonly (MediaType | string)[] | undefined;
}

export class StringDecoder implements Decoder {
  readonly name = 'string';
  readonly mediaTypes: readonly MediaType[];
  private readonly split: StringSplit;

  constructor(options: StringDecoderOptions = {}) {
    this.split = options.split ?? 'chunk';
    this.mediaTypes = (options.mediaTypes ?? [MediaTypes.TEXT_ALL]).map((mt) =>
      typeof mt === 'string' ? parseMediaType(mt) : mt
    );
  }

  /**
   * Decoder that reads any body as text, whatever its media type.
   */
  static allMediaTypes(split?: StringSplit): StringDecoder {
    return new StringDecoder({ split, mediaTypes: [MediaTypes.ALL] });
  }

  canDecode(type: ValueType<unknown>, mediaType: MediaType, hints: DecodeHints): boolean {
    if (type.kind !== 'text' || !this.mediaTypes.some((supported) => includes(supported, mediaType))) {
      return false;
    }
    return isSupportedCharset(charsetOf(mediaType) ?? hints.charset);
  }

  decode(bytes: ByteStream, _type: ValueType<unknown>, mediaType: MediaType, hints: DecodeHints): AsyncIterable<string> {
    const decoder = new TextDecoder(charsetOf(mediaType) ?? hints.charset);
    switch (this.split) {
      case 'chunk':
        return decodeChunks(bytes, decoder);
      case 'line':
        return decodeLines(bytes, decoder);
      case 'none':
        return decodeWhole(bytes, decoder);
    }
  }
}

async function* decodeChunks(bytes: ByteStream, decoder: TextDecoder): AsyncGenerator<string> {
  for await (const chunk of bytes) {
    const text = decoder.decode(chunk, { stream: true });
    if (text) {
      yield text;
    }
  }
  const rest = decoder.decode();
  if (rest) {
    yield rest;
  }
}

async function* decodeLines(bytes: ByteStream, decoder: TextDecoder): AsyncGenerator<string> {
  let pending = '';
  for await (const chunk of bytes) {
    pending += decoder.decode(chunk, { stream: true });
    const lines = pending.split(/\r?\n/);
    pending = lines.pop() ?? '';
    yield* lines;
  }
  pending += decoder.decode();
  if (pending) {
    yield pending;
  }
}

async function* decodeWhole(bytes: ByteStream, decoder: TextDecoder): AsyncGenerator<string> {
  let text = '';
  let sawBytes = false;
  for await (const chunk of bytes) {
    sawBytes = sawBytes || chunk.byteLength > 0;
    text += decoder.decode(chunk, { stream: true });
  }
  text += decoder.decode();
  if (sawBytes) {
    yield text;
  }
}
