import { MediaTypes } from '../core/media-type.js';
import type { MediaType } from '../core/types.js';
import { EncodingError } from '../types.js';

import type { ByteStream, Decoder, Encoder } from './types.js';
import type { ValueType } from './value-type.js';

/**
 * Raw byte arrays, for any media type. Registered first so binary content is
 * never routed through a text or JSON codec.
 */
export class BytesEncoder implements Encoder {
  readonly name = 'bytes';
  readonly mediaTypes: readonly MediaType[] = [MediaTypes.ALL];
  readonly defaultMediaType = MediaTypes.APPLICATION_OCTET_STREAM;

  canEncode(type: ValueType<unknown>): boolean {
    return type.kind === 'bytes';
  }

  async *encode(values: AsyncIterable<unknown>): ByteStream {
    for await (const value of values) {
      if (!(value instanceof Uint8Array)) {
        throw new EncodingError(this.name, new TypeError(`expected Uint8Array, got ${typeof value}`));
      }
      yield value;
    }
  }
}

export class BytesDecoder implements Decoder {
  readonly name = 'bytes';
  readonly mediaTypes: readonly MediaType[] = [MediaTypes.ALL];

  canDecode(type: ValueType<unknown>): boolean {
    return type.kind === 'bytes';
  }

  decode(bytes: ByteStream): AsyncIterable<Uint8Array> {
    return bytes;
  }
}
