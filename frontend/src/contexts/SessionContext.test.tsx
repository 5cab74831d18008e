// @vitest-environment jsdom
import { StrictMode } from 'react';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { cleanup, render, screen, waitFor } from '@testing-library/react';
import { SessionProvider, useSession } from './SessionContext';
import { TOKEN_KEY } from '../utils/api';

function Probe() {
  const { token, userId, loading, error } = useSession();
  if (loading) return <p>loading</p>;
  return <p data-testid="state">{JSON.stringify({ token, userId, error })}</p>;
}

function stubFetch(handler: (url: string, init?: RequestInit) => { status: number; body: unknown }) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const { status, body } = handler(String(input), init);
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

async function readState() {
  const el = await screen.findByTestId('state');
  return JSON.parse(el.textContent ?? '{}');
}

describe('SessionProvider', () => {
  beforeEach(() => {
    localStorage.clear();
    window.history.replaceState({}, '', '/');
  });

  afterEach(() => {
    cleanup();
    vi.unstubAllGlobals();
  });

  it('exchanges the request token from the login redirect', async () => {
    window.history.replaceState({}, '', '/?action=login&status=success&request_token=req-1');
    const fetchMock = stubFetch(() => ({ status: 201, body: { token: 'test-token', userId: 'AB1234' } }));

    render(<SessionProvider><Probe /></SessionProvider>);

    expect(await readState()).toEqual({ token: 'test-token', userId: 'AB1234', error: null });
    expect(localStorage.getItem(TOKEN_KEY)).toBe('test-token');
    expect(window.location.search).toBe('');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('/api/auth/session');
    expect(JSON.parse(String(init?.body))).toEqual({ requestToken: 'req-1' });
  });

  it('exchanges the request token once under StrictMode and keeps the session', async () => {
    window.history.replaceState({}, '', '/?status=success&request_token=req-1');
    const fetchMock = stubFetch(() => ({ status: 201, body: { token: 'test-token', userId: 'AB1234' } }));

    render(
      <StrictMode>
        <SessionProvider>
          <Probe />
        </SessionProvider>
      </StrictMode>
    );

    expect(await readState()).toEqual({ token: 'test-token', userId: 'AB1234', error: null });
    expect(localStorage.getItem(TOKEN_KEY)).toBe('test-token');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports a failed exchange under StrictMode', async () => {
    window.history.replaceState({}, '', '/?status=success&request_token=req-1');
    const fetchMock = stubFetch(() => ({ status: 502, body: { error: 'Token is invalid or has expired.' } }));

    render(
      <StrictMode>
        <SessionProvider>
          <Probe />
        </SessionProvider>
      </StrictMode>
    );

    expect(await readState()).toEqual({ token: null, userId: null, error: 'Token is invalid or has expired.' });
    expect(localStorage.getItem(TOKEN_KEY)).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('restores a stored session', async () => {
    localStorage.setItem(TOKEN_KEY, 'test-token');
    stubFetch(() => ({ status: 200, body: { loggedIn: true, userId: 'AB1234' } }));

    render(<SessionProvider><Probe /></SessionProvider>);

    expect(await readState()).toEqual({ token: 'test-token', userId: 'AB1234', error: null });
  });

  it('drops a stored session the server no longer knows', async () => {
    localStorage.setItem(TOKEN_KEY, 'stale-token');
    stubFetch(() => ({ status: 401, body: { error: 'Not logged in' } }));

    render(<SessionProvider><Probe /></SessionProvider>);

    await waitFor(() => expect(localStorage.getItem(TOKEN_KEY)).toBeNull());
    expect(await readState()).toEqual({ token: null, userId: null, error: 'Not logged in' });
  });

  it('stays logged out without a token', async () => {
    const fetchMock = stubFetch(() => ({ status: 200, body: {} }));
    render(<SessionProvider><Probe /></SessionProvider>);
    expect(await readState()).toEqual({ token: null, userId: null, error: null });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
