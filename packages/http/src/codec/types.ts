import type { MediaType } from '../core/types.js';

import type { ValueType } from './value-type.js';

/**
 * Lazy byte sequence. Nothing is produced until the consumer pulls.
 */
export type ByteStream = AsyncIterable<Uint8Array>;

/**
 * Auxiliary decoding hints. The transmission charset is fixed to UTF-8;
 * it is an assumption, not a negotiated value.
 */
export interface DecodeHints {
  readonly charset: 'utf-8';
}

export const DEFAULT_DECODE_HINTS: DecodeHints = Object.freeze({ charset: 'utf-8' });

export interface Encoder {
  readonly name: string;
  readonly mediaTypes: readonly MediaType[];
  /** Written to Content-Type when the request declares none */
  readonly defaultMediaType: MediaType;
  canEncode(type: ValueType<unknown>, mediaType: MediaType | undefined): boolean;
  encode(values: AsyncIterable<unknown>, type: ValueType<unknown>, mediaType: MediaType | undefined): ByteStream;
}

export interface Decoder {
  readonly name: string;
  readonly mediaTypes: readonly MediaType[];
  canDecode(type: ValueType<unknown>, mediaType: MediaType, hints: DecodeHints): boolean;
  /**
   * Decoded elements are untyped here; the engine checks each one against the
   * expected ValueType before handing it to the consumer.
   */
  decode(bytes: ByteStream, type: ValueType<unknown>, mediaType: MediaType, hints: DecodeHints): AsyncIterable<unknown>;
}
