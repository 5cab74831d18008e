import type { Candle, CandleWindow } from '../types/candle';
import type { ClassificationRule, SignalLabel } from '../types/signal';

/**
 * Candle classifier — maps one candle plus a "previous close" to a signal label.
 *
 * Rules are evaluated in a fixed order and the first match wins; several
 * conditions overlap, so the order is part of the contract.
 */

export interface ClassifyOptions {
  /** Absolute price tolerance. 0 means exact equality. */
  tolerance?: number;
}

export interface Classification {
  label: SignalLabel;
  rule: ClassificationRule;
}

const NO_DATA: Classification = { label: 'No Data', rule: 1 };

function priceEquals(a: number, b: number, tolerance: number): boolean {
  if (tolerance <= 0) return a === b;
  return Math.abs(a - b) <= tolerance;
}

/**
 * Evaluate rules 2–8 for a candle. `null` candle is rule 1 (no data).
 */
export function evaluateCandle(candle: Candle | null, prevClose: number, options: ClassifyOptions = {}): Classification {
  if (!candle) return NO_DATA;
  const tol = options.tolerance ?? 0;
  const eq = (a: number, b: number) => priceEquals(a, b, tol);
  const { open, high, low } = candle;

  if (eq(open, low) && eq(prevClose, open)) return { label: 'BUY', rule: 2 };
  if (eq(open, low)) return { label: 'BUY', rule: 3 };
  if (eq(prevClose, high)) return { label: 'SELL', rule: 4 };
  if (eq(open, high)) return { label: 'SELL', rule: 5 };
  // Unreachable: rule 5 matches whenever this holds.
  if (eq(prevClose, open) && eq(open, high)) return { label: 'SELL', rule: 6 };
  if (eq(low, prevClose)) return { label: 'BUY', rule: 7 };
  return { label: 'HOLD', rule: 8 };
}

export function classifyCandle(candle: Candle | null, prevClose: number, options?: ClassifyOptions): SignalLabel {
  return evaluateCandle(candle, prevClose, options).label;
}

/**
 * Reads open/high/low from the first row and "previous close" from the last
 * row of the same window.
 */
export function splitWindow(window: CandleWindow | null | undefined): { candle: Candle; prevClose: number } | null {
  if (!window || window.length === 0) return null;
  const first = window[0];
  const last = window[window.length - 1];
  return { candle: first, prevClose: last.close };
}

export function evaluateWindow(window: CandleWindow | null | undefined, options?: ClassifyOptions): Classification {
  const parts = splitWindow(window);
  if (!parts) return NO_DATA;
  return evaluateCandle(parts.candle, parts.prevClose, options);
}

export function classifyWindow(window: CandleWindow | null | undefined, options?: ClassifyOptions): SignalLabel {
  return evaluateWindow(window, options).label;
}
