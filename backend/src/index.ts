import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

// .env from the working directory, or backend/.env when started from the repo root
const cwd = process.cwd();
const rootEnv = path.join(cwd, '.env');
const backendEnv = path.join(cwd, 'backend', '.env');
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
if (fs.existsSync(backendEnv)) dotenv.config({ path: backendEnv });

import { createServer } from 'http';
import { config } from './config';
import { logger } from './lib/logger';
import { validateEnvironment } from './lib/envValidator';
import { createApp, findFrontendPath } from './app';
import { SqliteSignalLog } from './db/signalLog';
import { createKiteClient } from './services/kiteClient';
import { SessionRegistry } from './services/sessionRegistry';

export async function startServer(port: number = config.port): Promise<void> {
  // Validate environment variables (fail fast in production)
  validateEnvironment();

  const kite = createKiteClient();
  const log = new SqliteSignalLog(config.signals.dbPath);
  const app = createApp(
    {
      kite,
      sessions: new SessionRegistry(),
      defaultTime: config.signals.defaultTime,
      recorder: {
        candles: kite,
        log,
        interval: config.signals.interval,
        windowMinutes: config.signals.windowMinutes,
        tolerance: config.signals.priceTolerance
      }
    },
    { corsOrigins: config.corsOrigins, frontendPath: findFrontendPath() }
  );
  logger.info('Server', `Signal log: ${log.path}`);
  if (config.signals.priceTolerance > 0) {
    logger.info('Server', `Price tolerance: ${config.signals.priceTolerance}`);
  }

  const server = createServer(app);
  return new Promise((resolve) => {
    server.listen(port, config.host, () => {
      logger.info('Server', `API: http://${config.host}:${port}`);
      resolve();
    });
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error('Server', `Unhandled rejection: ${String(reason)}`);
});

// Run standalone if executed directly (npm start)
if (require.main === module) {
  startServer().catch((err: unknown) => {
    logger.error('Server', `Startup failed: ${String(err)}`);
    process.exit(1);
  });
}
