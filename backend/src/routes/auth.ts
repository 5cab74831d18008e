/**
 * Broker login: login URL, request-token exchange, status, logout.
 */

import { Router } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { validateBody } from '../middleware/validate';
import { requireSession, sessionOf } from '../middleware/requireSession';
import { sessionCreateSchema, type SessionCreate } from '../schemas/auth';
import type { SessionExchanger } from '../services/kiteClient';
import type { SessionRegistry } from '../services/sessionRegistry';

export interface AuthRouterDeps {
  kite: SessionExchanger;
  sessions: SessionRegistry;
}

export function createAuthRouter({ kite, sessions }: AuthRouterDeps): Router {
  const router = Router();

  router.get('/login-url', (_req, res) => {
    res.json({ url: kite.loginUrl() });
  });

  router.post(
    '/session',
    validateBody(sessionCreateSchema),
    asyncHandler(async (_req, res) => {
      const body: SessionCreate = res.locals.validatedBody;
      const session = await kite.generateSession(body.requestToken);
      const token = sessions.create(session);
      res.status(201).json({ token, userId: session.userId });
    })
  );

  router.get('/status', requireSession(sessions), (_req, res) => {
    res.json({ loggedIn: true, userId: sessionOf(res).userId });
  });

  router.post('/logout', requireSession(sessions), (_req, res) => {
    const token = res.locals.sessionToken;
    if (token) sessions.revoke(token);
    res.json({ ok: true });
  });

  return router;
}
