import { describe, it, expect } from 'vitest';
import { SessionRegistry } from './sessionRegistry';
import type { KiteSession } from '../types/session';

const session: KiteSession = { apiKey: 'k', accessToken: 'a', userId: 'U1', createdAt: '2024-01-01T00:00:00.000Z' };

describe('SessionRegistry', () => {
  it('issues distinct random tokens', () => {
    const reg = new SessionRegistry();
    const t1 = reg.create(session);
    const t2 = reg.create(session);
    expect(t1).toMatch(/^[0-9a-f]{48}$/);
    expect(t1).not.toBe(t2);
    expect(reg.size).toBe(2);
  });

  it('returns the same session object by reference', () => {
    const reg = new SessionRegistry(() => 'tok');
    reg.create(session);
    expect(reg.get('tok')).toBe(session);
    expect(reg.get('other')).toBeNull();
  });

  it('revokes', () => {
    const reg = new SessionRegistry(() => 'tok');
    reg.create(session);
    expect(reg.revoke('tok')).toBe(true);
    expect(reg.revoke('tok')).toBe(false);
    expect(reg.get('tok')).toBeNull();
  });

  it('expires sessions after the ttl', () => {
    let now = 1_000;
    const reg = new SessionRegistry(() => 'tok', { ttlMs: 500, now: () => now });
    reg.create(session);
    now = 1_499;
    expect(reg.get('tok')).toBe(session);
    now = 1_500;
    expect(reg.get('tok')).toBeNull();
    expect(reg.size).toBe(0);
  });

  it('prunes expired sessions when a new one is created', () => {
    let now = 0;
    let n = 0;
    const reg = new SessionRegistry(() => `tok-${++n}`, { ttlMs: 100, now: () => now });
    reg.create(session);
    reg.create(session);
    now = 150;
    reg.create(session);
    expect(reg.size).toBe(1);
    expect(reg.get('tok-3')).toBe(session);
  });
});
