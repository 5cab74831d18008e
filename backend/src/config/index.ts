/**
 * Centralized configuration for the signal recorder backend.
 * All env vars and constants in one place.
 */

import path from 'path';

function envStr(key: string, fallback = ''): string {
  return (process.env[key] ?? fallback).trim();
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

export const config = {
  port: envNum('PORT', 3000),
  host: envStr('HOST', '0.0.0.0'),

  corsOrigins: envStr('CORS_ORIGINS').split(',').map((s) => s.trim()).filter(Boolean),

  /** Kite Connect — login redirect, request-token exchange, historical candles. */
  kite: {
    apiKey: envStr('KITE_API_KEY'),
    apiSecret: envStr('KITE_API_SECRET'),
    baseUrl: envStr('KITE_API_BASE_URL', 'https://api.kite.trade'),
    loginUrl: envStr('KITE_LOGIN_URL', 'https://kite.zerodha.com/connect/login'),
    timeout: Math.max(1000, envNum('KITE_TIMEOUT_MS', 15000)),
    get hasCredentials(): boolean {
      return Boolean(this.apiKey && this.apiSecret);
    }
  },

  signals: {
    /** SQLite file of the append-only signal log. */
    dbPath: envStr('SIGNAL_DB_PATH') || path.join(process.cwd(), 'data', 'trade_signals.db'),
    interval: envStr('SIGNAL_INTERVAL', '15minute'),
    windowMinutes: Math.max(1, envNum('SIGNAL_WINDOW_MINUTES', 15)),
    /** Absolute price tolerance for the classifier. 0 = exact equality. */
    priceTolerance: Math.max(0, envNum('SIGNAL_PRICE_TOLERANCE', 0)),
    /** Default candle time when the check form omits one. */
    defaultTime: envStr('SIGNAL_DEFAULT_TIME', '09:30')
  }
};

export default config;
