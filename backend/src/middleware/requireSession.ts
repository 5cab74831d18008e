import type { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '../lib/errors';
import type { SessionRegistry } from '../services/sessionRegistry';
import type { KiteSession } from '../types/session';

declare global {
  namespace Express {
    interface Locals {
      session?: KiteSession;
      sessionToken?: string;
    }
  }
}

export function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (typeof header !== 'string') return null;
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match ? match[1] : null;
}

/** Resolves the bearer token to a broker session; 401 otherwise. */
export function requireSession(sessions: SessionRegistry) {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    const session = token ? sessions.get(token) : null;
    if (!token || !session) {
      next(new UnauthorizedError());
      return;
    }
    res.locals.session = session;
    res.locals.sessionToken = token;
    next();
  };
}

/** Session resolved by `requireSession`. */
export function sessionOf(res: Response): KiteSession {
  const session = res.locals.session;
  if (!session) throw new UnauthorizedError();
  return session;
}
