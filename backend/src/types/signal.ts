/**
 * Signal labels and the persisted signal record.
 */

export const SIGNAL_LABELS = ['BUY', 'SELL', 'HOLD', 'No Data'] as const;

export type SignalLabel = (typeof SIGNAL_LABELS)[number];

export function isSignalLabel(v: unknown): v is SignalLabel {
  return SIGNAL_LABELS.some((label) => label === v);
}

/** One row of the signal log. Timestamp is local time, `YYYY-MM-DD HH:mm:ss`. */
export interface SignalRecord {
  timestamp: string;
  signal: SignalLabel;
}

/**
 * Number of the classification rule that produced a label, 1-based,
 * in evaluation order. Rule 1 is "no data", rule 8 is the HOLD fallback.
 */
export type ClassificationRule = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;
