/**
 * Startup environment validation — fail fast on missing required vars in production.
 */

import { logger } from './logger';

interface EnvRule {
  key: string;
  required: boolean;
  /** Only required in production */
  prodOnly?: boolean;
  description: string;
}

const ENV_RULES: EnvRule[] = [
  { key: 'KITE_API_KEY', required: true, prodOnly: true, description: 'Kite Connect app key used for login and candle requests' },
  { key: 'KITE_API_SECRET', required: true, prodOnly: true, description: 'Kite Connect app secret used to exchange the request token' },
];

export interface EnvReport {
  warnings: string[];
  errors: string[];
}

/**
 * Collects warnings and errors for the current environment.
 * In production, missing required vars are errors; in development, warnings.
 */
export function checkEnvironment(env: NodeJS.ProcessEnv = process.env): EnvReport {
  const isProd = env.NODE_ENV === 'production';
  const warnings: string[] = [];
  const errors: string[] = [];

  for (const rule of ENV_RULES) {
    const value = env[rule.key]?.trim();
    if (value || !rule.required) continue;
    if (rule.prodOnly && !isProd) {
      warnings.push(`${rule.key} not set (${rule.description}). Required in production.`);
    } else if (rule.prodOnly) {
      errors.push(`${rule.key} is required in production (${rule.description})`);
    } else {
      errors.push(`${rule.key} is required (${rule.description})`);
    }
  }

  if (!env.SIGNAL_DB_PATH?.trim()) {
    warnings.push('SIGNAL_DB_PATH not set, signal log goes to data/trade_signals.db under the working directory.');
  }

  return { warnings, errors };
}

/**
 * Validates environment variables on startup.
 * Logs the report; exits the process in production when errors were found.
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): EnvReport {
  const report = checkEnvironment(env);

  for (const w of report.warnings) {
    logger.warn('EnvValidator', w);
  }

  if (report.errors.length > 0) {
    for (const e of report.errors) {
      logger.error('EnvValidator', e);
    }
    if (env.NODE_ENV === 'production') {
      logger.error('EnvValidator', 'Fatal: missing required environment variables. Exiting.');
      process.exit(1);
    }
  }
  return report;
}
