import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { MediaTypes, parseMediaType } from '../../core/media-type.js';
import type { MediaType } from '../../core/types.js';
import { fromIterable } from '../../streams.js';
import { BytesDecoder, BytesEncoder } from '../bytes.js';
import { JsonDecoder, JsonEncoder } from '../json.js';
import { CodecRegistry, defaultCodecRegistry } from '../registry.js';
import { StringDecoder, StringEncoder } from '../string.js';
import type { Encoder } from '../types.js';
import { Types, type ValueType } from '../value-type.js';

const Pojo = z.object({ foo: z.string() });

const encoderName = (registry: CodecRegistry, type: ValueType<unknown>, mediaType?: MediaType) =>
  registry.resolveEncoder(type, mediaType)?.name;

const decoderName = (registry: CodecRegistry, type: ValueType<unknown>, mediaType: MediaType) =>
  registry.resolveDecoder(type, mediaType)?.name;

describe('CodecRegistry', () => {
  it('registers bytes, string and JSON in that order by default', () => {
    const registry = defaultCodecRegistry();

    expect(registry.encoders.map((encoder) => encoder.name)).toEqual(['bytes', 'string', 'json']);
    expect(registry.decoders.map((decoder) => decoder.name)).toEqual(['bytes', 'string', 'json']);
  });

  describe('resolveEncoder', () => {
    const registry = new CodecRegistry();

    it('picks the codec for the value type when no media type is declared', () => {
      expect(encoderName(registry, Types.bytes())).toBe('bytes');
      expect(encoderName(registry, Types.text())).toBe('string');
      expect(encoderName(registry, Types.json(Pojo))).toBe('json');
    });

    it('lets bytes win for any media type', () => {
      expect(encoderName(registry, Types.bytes(), MediaTypes.APPLICATION_JSON)).toBe('bytes');
    });

    it('routes strings to JSON when a JSON media type is declared', () => {
      expect(encoderName(registry, Types.text(), MediaTypes.TEXT_PLAIN)).toBe('string');
      expect(encoderName(registry, Types.text(), MediaTypes.APPLICATION_JSON)).toBe('json');
    });

    it('returns undefined when nothing matches', () => {
      expect(encoderName(registry, Types.json(), MediaTypes.APPLICATION_XML)).toBeUndefined();
      expect(encoderName(registry, Types.text(), parseMediaType('text/plain;charset=iso-8859-1'))).toBeUndefined();
    });
  });

  describe('resolveDecoder', () => {
    const registry = new CodecRegistry();

    it('resolves by type and media type', () => {
      expect(decoderName(registry, Types.bytes(), MediaTypes.APPLICATION_XML)).toBe('bytes');
      expect(decoderName(registry, Types.text(), MediaTypes.TEXT_PLAIN)).toBe('string');
      expect(decoderName(registry, Types.json(Pojo), parseMediaType('application/problem+json'))).toBe('json');
      expect(decoderName(registry, Types.json(Pojo), MediaTypes.APPLICATION_NDJSON)).toBe('json');
    });

    it('returns undefined when nothing matches', () => {
      expect(decoderName(registry, Types.json(Pojo), MediaTypes.APPLICATION_XML)).toBeUndefined();
      expect(decoderName(registry, Types.text(), MediaTypes.APPLICATION_JSON)).toBeUndefined();
      expect(decoderName(registry, Types.text(), parseMediaType('text/plain;charset=x-unknown'))).toBeUndefined();
    });

    it('is deterministic', () => {
      const first = registry.resolveDecoder(Types.text(), MediaTypes.TEXT_PLAIN);

      expect(registry.resolveDecoder(Types.text(), MediaTypes.TEXT_PLAIN)).toBe(first);
    });
  });

  describe('ordering', () => {
    it('lets registration order break ties', () => {
      const lines = new StringDecoder({ split: 'line' });
      const whole = new StringDecoder({ split: 'none' });

      expect(new CodecRegistry([], [lines, whole]).resolveDecoder(Types.text(), MediaTypes.TEXT_PLAIN)).toBe(lines);
      expect(new CodecRegistry([], [whole, lines]).resolveDecoder(Types.text(), MediaTypes.TEXT_PLAIN)).toBe(whole);
    });

    it('does not change a match that only one codec can make', () => {
      const forward = new CodecRegistry([new BytesEncoder(), new StringEncoder(), new JsonEncoder()], []);
      const reversed = new CodecRegistry([new JsonEncoder(), new StringEncoder(), new BytesEncoder()], []);

      expect(encoderName(forward, Types.bytes())).toBe('bytes');
      expect(encoderName(reversed, Types.bytes())).toBe('bytes');
      expect(encoderName(reversed, Types.json())).toBe('json');
    });
  });

  describe('immutability', () => {
    it('freezes its lists and derives new registries', () => {
      const encoders: Encoder[] = [new BytesEncoder()];
      const registry = new CodecRegistry(encoders, [new BytesDecoder()]);
      encoders.push(new JsonEncoder());

      expect(registry.encoders).toHaveLength(1);
      expect(Object.isFrozen(registry.encoders)).toBe(true);

      const derived = registry.withDecoders([new JsonDecoder()]);
      expect(derived.decoders.map((decoder) => decoder.name)).toEqual(['json']);
      expect(derived.encoders).toEqual(registry.encoders);
      expect(registry.decoders.map((decoder) => decoder.name)).toEqual(['bytes']);
      expect(registry.withEncoders([]).encoders).toEqual([]);
    });
  });

  it('encodes through the resolved encoder', async () => {
    const encoder = new CodecRegistry().resolveEncoder(Types.text(), undefined);
    const chunks: Uint8Array[] = [];
    for await (const chunk of encoder?.encode(fromIterable(['a', 'b']), Types.text(), undefined) ?? []) {
      chunks.push(chunk);
    }

    expect(chunks.map((chunk) => new TextDecoder().decode(chunk))).toEqual(['a', 'b']);
  });
});
