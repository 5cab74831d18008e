import { Router } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { validateBody } from '../middleware/validate';
import { requireSession, sessionOf } from '../middleware/requireSession';
import { signalCheckSchema, type SignalCheck } from '../schemas/signals';
import { recordSignal, type RecorderDeps } from '../services/signalRecorder';
import { combineDateTime } from '../lib/time';
import type { SessionRegistry } from '../services/sessionRegistry';

export interface SignalsRouterDeps {
  recorder: RecorderDeps;
  sessions: SessionRegistry;
  defaultTime: string;
}

export function createSignalsRouter({ recorder, sessions, defaultTime }: SignalsRouterDeps): Router {
  const router = Router();
  router.use(requireSession(sessions));

  router.get('/', (_req, res) => {
    res.json(recorder.log.list());
  });

  router.post(
    '/check',
    validateBody(signalCheckSchema),
    asyncHandler(async (_req, res) => {
      const body: SignalCheck = res.locals.validatedBody;
      const at = combineDateTime(body.date, body.time ?? defaultTime);
      const result = await recordSignal(recorder, sessionOf(res), { instrumentToken: body.instrumentToken, at });
      res.status(201).json(result);
    })
  );

  return router;
}
