import path from 'path';
import fs from 'fs';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { logger } from './lib/logger';
import { errorHandler } from './middleware/errorHandler';
import { createV1Router, type V1Deps } from './routes/v1';

export interface AppOptions {
  corsOrigins?: string[];
  /** Directory with the built dashboard; omitted = no static serving. */
  frontendPath?: string | null;
}

export function createApp(deps: V1Deps, options: AppOptions = {}): express.Express {
  const app = express();

  // Security headers
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        connectSrc: ["'self'"],
      },
    },
  }));

  const corsOrigins = options.corsOrigins ?? [];
  app.use(cors(corsOrigins.length > 0 ? {
    origin: corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  } : undefined));
  app.use(express.json({ limit: '16kb' }));

  // Health (before /api mount so it's not swallowed by the v1 router)
  const healthHandler = (_req: express.Request, res: express.Response) => {
    res.json({
      status: 'ok',
      service: 'Signal Recorder API',
      kiteConfigured: config.kite.hasCredentials
    });
  };
  app.get('/api/health', healthHandler);
  app.get('/api/v1/health', healthHandler);

  const v1Router = createV1Router(deps);
  app.use('/api/v1', v1Router);
  app.use('/api', v1Router);

  const frontendPath = options.frontendPath;
  if (frontendPath) {
    logger.info('Server', `Frontend: ${frontendPath}`);
    app.use(express.static(frontendPath, { index: false }));
    app.get(/^\/(?!api\/).*/, (_req, res) => {
      res.sendFile(path.join(frontendPath, 'index.html'));
    });
  }

  app.use(errorHandler);
  return app;
}

export function findFrontendPath(): string | null {
  const candidates = [
    path.resolve(process.cwd(), 'frontend', 'dist'),
    path.resolve(__dirname, '../../frontend/dist')
  ];
  for (const dir of candidates) {
    if (fs.existsSync(path.join(dir, 'index.html'))) return dir;
  }
  return null;
}
