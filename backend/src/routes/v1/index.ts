/**
 * API v1 — all routes under /api/v1 (and /api for backward compatibility).
 */

import { Router } from 'express';
import { createAuthRouter, type AuthRouterDeps } from '../auth';
import { createSignalsRouter, type SignalsRouterDeps } from '../signals';

export type V1Deps = AuthRouterDeps & SignalsRouterDeps;

export function createV1Router(deps: V1Deps): Router {
  const v1Router = Router();
  v1Router.use('/auth', createAuthRouter(deps));
  v1Router.use('/signals', createSignalsRouter(deps));
  return v1Router;
}
