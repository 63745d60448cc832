import { getLogger } from '@rivulet/logger';

import { formatMediaType } from '../core/media-type.js';
import type { MediaType } from '../core/types.js';

import { BytesDecoder, BytesEncoder } from './bytes.js';
import { JsonDecoder, JsonEncoder } from './json.js';
import { StringDecoder, StringEncoder } from './string.js';
import { DEFAULT_DECODE_HINTS, type DecodeHints, type Decoder, type Encoder } from './types.js';
import type { ValueType } from './value-type.js';

const logger = getLogger('CodecRegistry');

/**
 * Most specific first: raw bytes, then text, then structured JSON.
 * A custom list must keep specific codecs ahead of general ones, since the
 * first match wins.
 */
export const defaultEncoders = (): Encoder[] => [new BytesEncoder(), new StringEncoder(), new JsonEncoder()];

export const defaultDecoders = (): Decoder[] => [new BytesDecoder(), new StringDecoder(), new JsonDecoder()];

/**
 * Ordered encoder and decoder lists. Resolution returns the first codec, in
 * registration order, whose predicate accepts the type and media type;
 * registration order is the only tie-break.
 *
 * Both lists are frozen at construction. The codec objects themselves must not
 * be mutated while exchanges are in flight; they are shared by every exchange
 * of the engine that owns the registry.
 */
export class CodecRegistry {
  readonly encoders: readonly Encoder[];
  readonly decoders: readonly Decoder[];

  constructor(encoders: readonly Encoder[] = defaultEncoders(), decoders: readonly Decoder[] = defaultDecoders()) {
    this.encoders = Object.freeze([...encoders]);
    this.decoders = Object.freeze([...decoders]);
  }

  resolveEncoder(type: ValueType<unknown>, mediaType: MediaType | undefined): Encoder | undefined {
    const encoder = this.encoders.find((candidate) => candidate.canEncode(type, mediaType));
    logger.trace(
      `Encoder resolution - Type: ${type.name}, MediaType: ${mediaType ? formatMediaType(mediaType) : '<none>'}, Encoder: ${encoder?.name ?? '<none>'}`
    );
    return encoder;
  }

  resolveDecoder(
    type: ValueType<unknown>,
    mediaType: MediaType,
    hints: DecodeHints = DEFAULT_DECODE_HINTS
  ): Decoder | undefined {
    const decoder = this.decoders.find((candidate) => candidate.canDecode(type, mediaType, hints));
    logger.trace(
      `Decoder resolution - Type: ${type.name}, MediaType: ${formatMediaType(mediaType)}, Decoder: ${decoder?.name ?? '<none>'}`
    );
    return decoder;
  }

  withEncoders(encoders: readonly Encoder[]): CodecRegistry {
    return new CodecRegistry(encoders, this.decoders);
  }

  withDecoders(decoders: readonly Decoder[]): CodecRegistry {
    return new CodecRegistry(this.encoders, decoders);
  }
}

export const defaultCodecRegistry = (): CodecRegistry => new CodecRegistry();
