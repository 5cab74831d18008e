import { createContext, useCallback, useContext, useEffect, useMemo, useRef, useState, type ReactNode } from 'react';
import { api, getToken, setApiUnauthorizedCallback, setToken } from '../utils/api';
import { readRequestToken, stripLoginParams } from '../utils/requestToken';

interface SessionState {
  token: string | null;
  userId: string | null;
  loading: boolean;
  error: string | null;
  logout: () => Promise<void>;
}

interface SessionCreated {
  token: string;
  userId: string;
}

const SessionContext = createContext<SessionState | null>(null);

/** Request tokens are single-use; the API token is stored as soon as the exchange succeeds. */
async function exchangeRequestToken(requestToken: string): Promise<SessionCreated> {
  const res = await api.post<SessionCreated>('/auth/session', { requestToken });
  setToken(res.token);
  return res;
}

export function SessionProvider({ children }: { children: ReactNode }) {
  const [token, setTokenState] = useState<string | null>(() => getToken());
  const [userId, setUserId] = useState<string | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const exchange = useRef<Promise<SessionCreated> | null>(null);

  const clear = useCallback(() => {
    setToken(null);
    setTokenState(null);
    setUserId(null);
  }, []);

  useEffect(() => {
    setApiUnauthorizedCallback(clear);
    return () => setApiUnauthorizedCallback(null);
  }, [clear]);

  useEffect(() => {
    let cancelled = false;
    const requestToken = readRequestToken(window.location.search);

    async function restore() {
      if (requestToken && !exchange.current) {
        window.history.replaceState({}, '', window.location.pathname + stripLoginParams(window.location.search));
        exchange.current = exchangeRequestToken(requestToken);
      }
      // A remounted effect (StrictMode) picks up the exchange already in flight.
      if (exchange.current) {
        const res = await exchange.current;
        if (cancelled) return;
        setTokenState(res.token);
        setUserId(res.userId);
        return;
      }
      if (!getToken()) return;
      const res = await api.get<{ loggedIn: boolean; userId: string }>('/auth/status');
      if (!cancelled) setUserId(res.userId);
    }

    restore()
      .catch((e: unknown) => {
        if (cancelled) return;
        clear();
        setError(e instanceof Error ? e.message : String(e));
      })
      .finally(() => {
        if (!cancelled) setLoading(false);
      });
    return () => {
      cancelled = true;
    };
  }, [clear]);

  const logout = useCallback(async () => {
    try {
      await api.post('/auth/logout');
      setError(null);
    } catch (e) {
      setError(e instanceof Error ? e.message : String(e));
    } finally {
      clear();
    }
  }, [clear]);

  const value = useMemo(() => ({ token, userId, loading, error, logout }), [token, userId, loading, error, logout]);
  return <SessionContext.Provider value={value}>{children}</SessionContext.Provider>;
}

export function useSession(): SessionState {
  const ctx = useContext(SessionContext);
  if (!ctx) throw new Error('useSession must be used inside SessionProvider');
  return ctx;
}
