/**
 * Centralized API client — consistent fetch, error handling, base URL.
 * On 401, optional onUnauthorized callback is invoked (e.g. logout).
 * Session token is auto-injected from localStorage when present.
 */

const API_BASE = '/api';
export const TOKEN_KEY = 'signal-recorder-token';

export interface ApiError {
  error: string;
  stack?: string;
}

export class ApiRequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
  }
}

let onUnauthorized: (() => void) | null = null;

export function setApiUnauthorizedCallback(cb: (() => void) | null): void {
  onUnauthorized = cb;
}

export function getToken(): string | null {
  try {
    return localStorage.getItem(TOKEN_KEY);
  } catch {
    return null;
  }
}

export function setToken(token: string | null): void {
  try {
    if (token) localStorage.setItem(TOKEN_KEY, token);
    else localStorage.removeItem(TOKEN_KEY);
  } catch {
    // storage disabled: session lasts for this page only
  }
}

function defaultHeaders(): Record<string, string> {
  const token = getToken();
  return {
    'Content-Type': 'application/json',
    ...(token ? { Authorization: `Bearer ${token}` } : {})
  };
}

function isApiError(v: unknown): v is ApiError {
  return typeof v === 'object' && v !== null && 'error' in v && typeof v.error === 'string';
}

async function handleResponse<T>(res: Response): Promise<T> {
  const data: unknown = await res.json().catch(() => ({}));
  if (res.status === 401) {
    onUnauthorized?.();
  }
  if (!res.ok) {
    const msg = isApiError(data) ? data.error : res.statusText || `HTTP ${res.status}`;
    throw new ApiRequestError(res.status, msg);
  }
  return data as T;
}

export const api = {
  async get<T>(path: string): Promise<T> {
    const res = await fetch(`${API_BASE}${path}`, { headers: defaultHeaders() });
    return handleResponse<T>(res);
  },

  async post<T>(path: string, body?: unknown): Promise<T> {
    const res = await fetch(`${API_BASE}${path}`, {
      method: 'POST',
      headers: defaultHeaders(),
      body: body != null ? JSON.stringify(body) : undefined
    });
    return handleResponse<T>(res);
  }
};
