import { AbortError } from 'node-fetch';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '../errors.js';
import { FakeGateway } from './__fixtures__/fakeGateway.js';
import { GatewayTransport, type FetchFn } from './transport.js';

const notification = { jsonrpc: '2.0' as const, method: 'notifications/initialized' };

describe('GatewayTransport', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('posts the JSON payload and returns status, session id and body', async () => {
    const gateway = new FakeGateway().reply({ body: { result: { ok: true } }, sessionId: 'sess-7' });
    const transport = new GatewayTransport('http://gateway.test/mcp/', gateway.fetch);

    const response = await transport.post(notification, {
      headers: { 'Content-Type': 'application/json' },
      timeoutSeconds: 10,
    });

    expect(response).toEqual({ status: 200, sessionId: 'sess-7', body: '{"result":{"ok":true}}' });
    expect(gateway.requests[0].url).toBe('http://gateway.test/mcp/');
    expect(gateway.requests[0].body).toEqual(notification);
    expect(gateway.requests[0].headers['content-type']).toBe('application/json');
  });

  it('leaves the session id undefined when the header is missing', async () => {
    const gateway = new FakeGateway().reply({ status: 500, rawBody: 'boom' });
    const transport = new GatewayTransport('http://gateway.test/mcp/', gateway.fetch);

    const response = await transport.post(notification, { headers: {}, timeoutSeconds: 10 });

    expect(response).toEqual({ status: 500, sessionId: undefined, body: 'boom' });
  });

  it('aborts the request when the deadline passes', async () => {
    vi.useFakeTimers();
    let aborted = false;
    const hangingFetch: FetchFn = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          aborted = true;
          reject(new AbortError('The operation was aborted.'));
        });
      });
    const transport = new GatewayTransport('http://gateway.test/mcp/', hangingFetch);

    const pending = transport.post(notification, { headers: {}, timeoutSeconds: 30 });
    const outcome = expect(pending).rejects.toThrow(TimeoutError);

    await vi.advanceTimersByTimeAsync(29_999);
    expect(aborted).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(aborted).toBe(true);
    await outcome;
    await expect(pending).rejects.toThrow('Request timeout after 30s');
  });

  it('passes other failures through unchanged', async () => {
    const gateway = new FakeGateway().reply(new Error('connect ECONNREFUSED'));
    const transport = new GatewayTransport('http://gateway.test/mcp/', gateway.fetch);

    await expect(transport.post(notification, { headers: {}, timeoutSeconds: 10 })).rejects.toThrow(
      'connect ECONNREFUSED'
    );
  });
});
