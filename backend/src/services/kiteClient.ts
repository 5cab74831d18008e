/**
 * Kite Connect adapter: login URL, request-token exchange, historical candles.
 * Uses the native Node fetch; every call has a timeout and nothing is retried.
 */

import crypto from 'crypto';
import { z } from 'zod';
import { config } from '../config';
import { ExternalCallError, errMsg, type ExternalSource } from '../lib/errors';
import { logger } from '../lib/logger';
import type { CandleQuery, HistoricalCandle } from '../types/candle';
import type { KiteSession } from '../types/session';

export interface CandleSource {
  fetchCandles(session: KiteSession, query: CandleQuery): Promise<HistoricalCandle[]>;
}

export interface SessionExchanger {
  loginUrl(): string;
  generateSession(requestToken: string): Promise<KiteSession>;
}

export interface KiteClientOptions {
  apiKey: string;
  apiSecret: string;
  baseUrl?: string;
  loginUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

const KITE_VERSION = '3';

interface KiteRequestInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
}

const errorBodySchema = z.object({
  status: z.literal('error'),
  message: z.string(),
  error_type: z.string().optional()
});

const sessionBodySchema = z.object({
  status: z.literal('success'),
  data: z.object({
    access_token: z.string().min(1),
    user_id: z.string().default('')
  })
});

// [date, open, high, low, close, volume, oi?]
const candleRowSchema = z.tuple([z.string(), z.number(), z.number(), z.number(), z.number(), z.number()]).rest(z.number());

const candlesBodySchema = z.object({
  status: z.literal('success'),
  data: z.object({
    candles: z.array(candleRowSchema)
  })
});

export function sessionChecksum(apiKey: string, requestToken: string, apiSecret: string): string {
  return crypto.createHash('sha256').update(apiKey + requestToken + apiSecret).digest('hex');
}

export class KiteClient implements CandleSource, SessionExchanger {
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly baseUrl: string;
  private readonly loginBase: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(options: KiteClientOptions) {
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.baseUrl = (options.baseUrl ?? 'https://api.kite.trade').replace(/\/+$/, '');
    this.loginBase = options.loginUrl ?? 'https://kite.zerodha.com/connect/login';
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  loginUrl(): string {
    const params = new URLSearchParams({ v: KITE_VERSION, api_key: this.apiKey });
    return `${this.loginBase}?${params.toString()}`;
  }

  async generateSession(requestToken: string): Promise<KiteSession> {
    const form = new URLSearchParams({
      api_key: this.apiKey,
      request_token: requestToken,
      checksum: sessionChecksum(this.apiKey, requestToken, this.apiSecret)
    });
    const body = await this.request('session', '/session/token', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString()
    });
    const parsed = sessionBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalCallError('session', 'Unexpected session response from Kite');
    }
    logger.info('Kite', 'Session created', { userId: parsed.data.data.user_id });
    return {
      apiKey: this.apiKey,
      accessToken: parsed.data.data.access_token,
      userId: parsed.data.data.user_id,
      createdAt: this.now().toISOString()
    };
  }

  async fetchCandles(session: KiteSession, query: CandleQuery): Promise<HistoricalCandle[]> {
    const params = new URLSearchParams({ from: query.from, to: query.to });
    const p = `/instruments/historical/${encodeURIComponent(query.instrumentToken)}/${encodeURIComponent(query.interval)}?${params.toString()}`;
    const body = await this.request('candles', p, {
      method: 'GET',
      headers: { Authorization: `token ${session.apiKey}:${session.accessToken}` }
    });
    const parsed = candlesBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalCallError('candles', 'Unexpected candle response from Kite');
    }
    return parsed.data.data.candles.map(([date, open, high, low, close, volume]) => ({ date, open, high, low, close, volume }));
  }

  private async request(source: ExternalSource, p: string, init: KiteRequestInit): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${p}`, {
        method: init.method,
        headers: { 'X-Kite-Version': KITE_VERSION, ...init.headers },
        body: init.body,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (e) {
      logger.error('Kite', `Request failed: ${p}`, { error: errMsg(e) });
      throw new ExternalCallError(source, `Kite request failed: ${errMsg(e)}`, { cause: e });
    }
    const body: unknown = await res.json().catch(() => null);
    const err = errorBodySchema.safeParse(body);
    if (!res.ok || err.success) {
      const message = err.success ? err.data.message : res.statusText || `HTTP ${res.status}`;
      logger.warn('Kite', `Kite error ${res.status}: ${message}`, { path: p.split('?')[0] });
      throw new ExternalCallError(source, message);
    }
    return body;
  }
}

export function createKiteClient(): KiteClient {
  return new KiteClient({
    apiKey: config.kite.apiKey,
    apiSecret: config.kite.apiSecret,
    baseUrl: config.kite.baseUrl,
    loginUrl: config.kite.loginUrl,
    timeoutMs: config.kite.timeout
  });
}
