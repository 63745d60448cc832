import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { Types } from '../codec/value-type.js';
import { HttpEngine } from '../engine.js';
import { HttpHeaders } from '../http-headers.js';
import { Requests } from '../request-descriptor.js';
import { ResponseEnvelope } from '../response-envelope.js';
import { fromIterable } from '../streams.js';
import { HttpEngineError } from '../types.js';

import { StubTransport } from './fixtures/stub-transport.js';

const envelopeOf = (items: unknown[], status = 200): ResponseEnvelope<unknown> =>
  new ResponseEnvelope(status, new HttpHeaders().readOnly(), fromIterable(items), Types.json(), vi.fn());

describe('ResponseEnvelope', () => {
  it('exposes status and ok', () => {
    expect(envelopeOf([], 201).ok).toBe(true);
    expect(envelopeOf([], 302).ok).toBe(false);
    expect(envelopeOf([], 500).status).toBe(500);
  });

  it('collects once and yields nothing afterwards', async () => {
    const envelope = envelopeOf([1, 2, 3]);

    expect(await envelope.collect()).toEqual([1, 2, 3]);
    expect(await envelope.collect()).toEqual([]);
  });

  it('flattens text chunks into one string', async () => {
    const envelope = new ResponseEnvelope(200, new HttpHeaders(), fromIterable(['Hel', 'lo']), Types.text(), vi.fn());

    expect(await envelope.flatten()).toBe('Hello');
  });

  it('flattens byte chunks into one array', async () => {
    const envelope = new ResponseEnvelope(
      200,
      new HttpHeaders(),
      fromIterable([new Uint8Array([1]), new Uint8Array([2, 3])]),
      Types.bytes(),
      vi.fn()
    );

    const flattened = await envelope.flatten();

    expect(flattened ? [...flattened] : undefined).toEqual([1, 2, 3]);
  });

  it('returns undefined for an empty body and the element for a single one', async () => {
    expect(await envelopeOf([]).flatten()).toBeUndefined();
    expect(await envelopeOf([{ id: 1 }]).flatten()).toEqual({ id: 1 });
  });

  it('requires a reducer for several structured elements', async () => {
    await expect(envelopeOf([{ id: 1 }, { id: 2 }]).flatten()).rejects.toThrow(HttpEngineError);
  });

  it('folds elements with a reducer', async () => {
    const Count = z.number();
    const envelope = new ResponseEnvelope(200, new HttpHeaders(), fromIterable([1, 2, 3]), Types.json(Count), vi.fn());

    expect(await envelope.flatten((sum, next) => sum + next)).toBe(6);
  });

  it('forwards cancel', () => {
    const onCancel = vi.fn();
    const envelope = new ResponseEnvelope(200, new HttpHeaders(), fromIterable([]), Types.text(), onCancel);

    envelope.cancel();

    expect(onCancel).toHaveBeenCalledTimes(1);
  });

  describe('from the engine', () => {
    it('carries the response head and a read-only header view', async () => {
      const transport = new StubTransport(() => ({
        status: 201,
        headers: { 'Content-Type': 'text/plain', Location: '/items/9' },
        chunks: ['created'],
      }));
      const engine = new HttpEngine({ transport, baseUrl: 'http://localhost:8080' });

      const result = await engine.perform(Requests.post('/items').content('x')).asEnvelope(Types.text());

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        const envelope = result.value;
        expect(envelope.status).toBe(201);
        expect(envelope.headers.get('location')).toBe('/items/9');
        expect(envelope.headers.isReadOnly).toBe(true);
        expect(() => envelope.headers.set('X-Tag', 'a')).toThrow('Headers are read-only');
      }
    });

    it('never sends the request again while projecting the body', async () => {
      const transport = StubTransport.text('once');
      const engine = new HttpEngine({ transport, baseUrl: 'http://localhost:8080' });

      const result = await engine.perform(Requests.get('/once')).asEnvelope(Types.text());

      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(await result.value.flatten()).toBe('once');
        expect(await result.value.collect()).toEqual([]);
        expect(await result.value.flatten()).toBeUndefined();
      }
      expect(transport.sendCount).toBe(1);
    });

    it('cancels the transport when the body is dropped unread', async () => {
      const transport = StubTransport.text('unused');
      const onRequestSuccess = vi.fn();
      const engine = new HttpEngine({ transport, baseUrl: 'http://localhost:8080', hooks: { onRequestSuccess } });

      const result = await engine.perform(Requests.get('/skip')).asEnvelope(Types.text());
      if (result.isOk()) {
        result.value.cancel();
        result.value.cancel();
      }

      expect(transport.cancellations).toHaveLength(2);
      expect(transport.pulledChunks).toBe(0);
      expect(onRequestSuccess).toHaveBeenCalledTimes(1);
    });
  });
});
