/**
 * Explicit registry of logged-in broker sessions. The API hands out an opaque
 * bearer token per session; handlers receive the session object itself.
 * Kite access tokens expire daily, so entries older than `ttlMs` are dropped.
 */

import crypto from 'crypto';
import type { KiteSession } from '../types/session';

export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;

export interface SessionRegistryOptions {
  ttlMs?: number;
  now?: () => number;
}

interface Entry {
  session: KiteSession;
  issuedAt: number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly newToken: () => string = () => crypto.randomBytes(24).toString('hex'),
    options: SessionRegistryOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  create(session: KiteSession): string {
    this.prune();
    const token = this.newToken();
    this.sessions.set(token, { session, issuedAt: this.now() });
    return token;
  }

  get(token: string): KiteSession | null {
    const entry = this.sessions.get(token);
    if (!entry) return null;
    if (this.isExpired(entry)) {
      this.sessions.delete(token);
      return null;
    }
    return entry.session;
  }

  revoke(token: string): boolean {
    return this.sessions.delete(token);
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(entry: Entry): boolean {
    return this.now() - entry.issuedAt >= this.ttlMs;
  }

  private prune(): void {
    for (const [token, entry] of this.sessions) {
      if (this.isExpired(entry)) this.sessions.delete(token);
    }
  }
}
