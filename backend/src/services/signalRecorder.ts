/**
 * Signal recorder: fetch one candle window → classify → append to the log.
 * If the fetch fails nothing is classified or appended.
 */

import { addMinutes, formatMinute, formatSecond } from '../lib/time';
import { logger } from '../lib/logger';
import { evaluateWindow, splitWindow } from './candleClassifier';
import type { CandleSource } from './kiteClient';
import type { SignalLog } from '../db/signalLog';
import type { Candle } from '../types/candle';
import type { ClassificationRule, SignalRecord } from '../types/signal';
import type { KiteSession } from '../types/session';

export interface RecorderDeps {
  candles: CandleSource;
  log: SignalLog;
  interval: string;
  windowMinutes: number;
  tolerance: number;
  now?: () => Date;
}

export interface CheckRequest {
  instrumentToken: string;
  /** Start of the candle window, local time. */
  at: Date;
}

export interface CheckResult {
  record: SignalRecord;
  rule: ClassificationRule;
  candle: Candle | null;
  prevClose: number | null;
}

export async function recordSignal(deps: RecorderDeps, session: KiteSession, req: CheckRequest): Promise<CheckResult> {
  const query = {
    instrumentToken: req.instrumentToken,
    from: formatMinute(req.at),
    to: formatMinute(addMinutes(req.at, deps.windowMinutes)),
    interval: deps.interval
  };
  const rows = await deps.candles.fetchCandles(session, query);

  const { label, rule } = evaluateWindow(rows, { tolerance: deps.tolerance });
  const parts = splitWindow(rows);
  const now = deps.now ? deps.now() : new Date();
  const record: SignalRecord = { timestamp: formatSecond(now), signal: label };

  deps.log.append(record);
  logger.info('Signals', `${query.instrumentToken} ${query.from} → ${label}`, { rule, rows: rows.length });

  return {
    record,
    rule,
    candle: parts ? { open: parts.candle.open, high: parts.candle.high, low: parts.candle.low, close: parts.candle.close } : null,
    prevClose: parts ? parts.prevClose : null
  };
}
