/**
 * Signal shapes returned by the backend API.
 */

export type SignalLabel = 'BUY' | 'SELL' | 'HOLD' | 'No Data';

export interface SignalRecord {
  /** Local time, `YYYY-MM-DD HH:mm:ss`. */
  timestamp: string;
  signal: SignalLabel;
}

export type ClassificationRule = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

export interface CandleSummary {
  open: number;
  high: number;
  low: number;
  close: number;
}

export interface CheckResult {
  record: SignalRecord;
  rule: ClassificationRule;
  candle: CandleSummary | null;
  prevClose: number | null;
}

export interface SignalCheckInput {
  instrumentToken: string;
  date: string;
  time: string;
}
