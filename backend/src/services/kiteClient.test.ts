import { describe, it, expect, vi, afterEach } from 'vitest';
import { KiteClient, sessionChecksum } from './kiteClient';
import { ExternalCallError } from '../lib/errors';
import type { KiteSession } from '../types/session';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function makeClient(respond: () => Response | Promise<Response>) {
  const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
  const client = new KiteClient({
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    baseUrl: 'https://kite.test/',
    loginUrl: 'https://login.test/connect/login',
    timeoutMs: 1000,
    fetchImpl,
    now: () => new Date('2024-03-11T04:00:00.000Z')
  });
  return { client, fetchImpl };
}

const session: KiteSession = {
  apiKey: 'test-key',
  accessToken: 'test-access',
  userId: 'AB1234',
  createdAt: '2024-03-11T04:00:00.000Z'
};

describe('KiteClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds the login URL', () => {
    const { client } = makeClient(() => jsonResponse({}));
    expect(client.loginUrl()).toBe('https://login.test/connect/login?v=3&api_key=test-key');
  });

  it('computes the session checksum as sha256 hex of key + token + secret', () => {
    expect(sessionChecksum('a', 'b', 'c')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('exchanges a request token for a session', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { client, fetchImpl } = makeClient(() =>
      jsonResponse({ status: 'success', data: { access_token: 'test-access', user_id: 'AB1234', user_name: 'Test' } })
    );
    const s = await client.generateSession('test-request');
    expect(s).toEqual(session);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://kite.test/session/token');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'X-Kite-Version': '3',
      'Content-Type': 'application/x-www-form-urlencoded'
    });
    const form = new URLSearchParams(String(init?.body));
    expect(form.get('api_key')).toBe('test-key');
    expect(form.get('request_token')).toBe('test-request');
    expect(form.get('checksum')).toBe(sessionChecksum('test-key', 'test-request', 'test-secret'));
  });

  it('surfaces Kite error messages', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { client } = makeClient(() =>
      jsonResponse({ status: 'error', message: 'Token is invalid or has expired.', error_type: 'TokenException' }, 403)
    );
    const err = await client.generateSession('stale').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalCallError);
    expect(err).toMatchObject({ source: 'session', statusCode: 502, message: 'Token is invalid or has expired.' });
  });

  it('fetches and maps historical candles', async () => {
    const { client, fetchImpl } = makeClient(() =>
      jsonResponse({
        status: 'success',
        data: {
          candles: [
            ['2024-03-11T09:30:00+0530', 100, 105, 100, 103, 1200],
            ['2024-03-11T09:45:00+0530', 103, 104, 101, 102, 800, 0]
          ]
        }
      })
    );
    const rows = await client.fetchCandles(session, {
      instrumentToken: '738561',
      from: '2024-03-11 09:30',
      to: '2024-03-11 09:45',
      interval: '15minute'
    });
    expect(rows).toEqual([
      { date: '2024-03-11T09:30:00+0530', open: 100, high: 105, low: 100, close: 103, volume: 1200 },
      { date: '2024-03-11T09:45:00+0530', open: 103, high: 104, low: 101, close: 102, volume: 800 }
    ]);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://kite.test/instruments/historical/738561/15minute?from=2024-03-11+09%3A30&to=2024-03-11+09%3A45');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      'X-Kite-Version': '3',
      Authorization: 'token test-key:test-access'
    });
  });

  it('returns an empty list when the window has no candles', async () => {
    const { client } = makeClient(() => jsonResponse({ status: 'success', data: { candles: [] } }));
    const rows = await client.fetchCandles(session, { instrumentToken: '1', from: 'a', to: 'b', interval: '15minute' });
    expect(rows).toEqual([]);
  });

  it('rejects malformed candle bodies', async () => {
    const { client } = makeClient(() => jsonResponse({ status: 'success', data: { candles: [['x', 'y']] } }));
    await expect(
      client.fetchCandles(session, { instrumentToken: '1', from: 'a', to: 'b', interval: '15minute' })
    ).rejects.toThrow('Unexpected candle response from Kite');
  });

  it('wraps network failures', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { client } = makeClient(() => {
      throw new TypeError('fetch failed');
    });
    await expect(
      client.fetchCandles(session, { instrumentToken: '1', from: 'a', to: 'b', interval: '15minute' })
    ).rejects.toMatchObject({ source: 'candles', message: 'Kite request failed: fetch failed' });
  });

  it('uses the status text when the error body is not JSON', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { client } = makeClient(() => new Response('bad gateway', { status: 502, statusText: 'Bad Gateway' }));
    await expect(
      client.fetchCandles(session, { instrumentToken: '1', from: 'a', to: 'b', interval: '15minute' })
    ).rejects.toThrow('Bad Gateway');
  });
});
