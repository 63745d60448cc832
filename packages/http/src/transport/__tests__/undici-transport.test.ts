import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';

import { Types } from '../../codec/value-type.js';
import { HttpEngine } from '../../engine.js';
import { HttpHeaders } from '../../http-headers.js';
import { Requests } from '../../request-descriptor.js';
import { collect, concatBytes } from '../../streams.js';
import { DoubleSendError, TransportError } from '../../types.js';
import { UndiciTransport } from '../undici-transport.js';

const ORIGIN = 'http://localhost:3000';

describe('UndiciTransport', () => {
  let agent: MockAgent;
  let engine: HttpEngine;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    engine = new HttpEngine({ transport: new UndiciTransport({ dispatcher: agent }), baseUrl: ORIGIN });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('decodes a text response', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/greeting', method: 'GET' })
      .reply(200, 'Hello Rivulet!', { headers: { 'content-type': 'text/plain' } });

    const result = await engine.perform(Requests.get('/greeting').accept('text/plain')).asSingle(Types.text());

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toBe('Hello Rivulet!');
    }
  });

  it('exposes status, headers and the decoded body', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/items', method: 'GET' })
      .reply(201, '[{"id":1},{"id":2}]', { headers: { 'content-type': 'application/json' } });

    const result = await engine.perform(Requests.get('/items')).asEnvelope(Types.json(z.object({ id: z.number() })));

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.status).toBe(201);
      expect(result.value.headers.get('Content-Type')).toBe('application/json');
      expect(result.value.headers.isReadOnly).toBe(true);
      expect(await result.value.collect()).toEqual([{ id: 1 }, { id: 2 }]);
    }
  });

  it('wraps dispatcher failures in TransportError', async () => {
    const result = await engine.perform(Requests.get('/missing')).asSingle(Types.text());

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message.startsWith('GET http://localhost:3000/missing failed: ')).toBe(true);
      expect(result.error.cause).toBeInstanceOf(Error);
    }
  });

  it('sends a handle only once', async () => {
    agent.get(ORIGIN).intercept({ path: '/once', method: 'DELETE' }).reply(204, '');
    const handle = new UndiciTransport({ dispatcher: agent }).createRequest(
      'DELETE',
      new URL(`${ORIGIN}/once`),
      new HttpHeaders()
    );
    handle.markNoBody();

    const head = await handle.execute();

    expect(head.status).toBe(204);
    expect(concatBytes(await collect(head.body)).byteLength).toBe(0);
    await expect(handle.execute()).rejects.toThrow(DoubleSendError);
  });

  it('tolerates repeated cancellation of an unread body', async () => {
    agent.get(ORIGIN).intercept({ path: '/large', method: 'GET' }).reply(200, 'x'.repeat(1024));
    const handle = new UndiciTransport({ dispatcher: agent }).createRequest(
      'GET',
      new URL(`${ORIGIN}/large`),
      new HttpHeaders()
    );
    handle.markNoBody();

    const head = await handle.execute();

    expect(() => {
      head.cancel();
      head.cancel();
    }).not.toThrow();
  });
});
