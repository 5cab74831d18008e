/** One OHLC bar for a fixed interval. */
export interface Candle {
  open: number;
  high: number;
  low: number;
  close: number;
}

/** Row returned by the historical data endpoint. */
export interface HistoricalCandle extends Candle {
  date: string;
  volume: number;
}

/** Ordered rows of one fetched window, oldest first. */
export type CandleWindow = readonly Candle[];

export interface CandleQuery {
  instrumentToken: string;
  /** Local time, `YYYY-MM-DD HH:mm`. */
  from: string;
  to: string;
  interval: string;
}
