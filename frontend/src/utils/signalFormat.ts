import type { BadgeVariant } from '../components/ui/Badge';
import type { ClassificationRule, SignalLabel } from '../types/signal';

export function labelVariant(label: SignalLabel): BadgeVariant {
  switch (label) {
    case 'BUY':
      return 'buy';
    case 'SELL':
      return 'sell';
    case 'HOLD':
      return 'hold';
    case 'No Data':
      return 'none';
  }
}

const RULE_TEXT: Record<ClassificationRule, string> = {
  1: 'No candle data for this window',
  2: 'Open = Low and previous close = Open',
  3: 'Open = Low',
  4: 'Previous close = High',
  5: 'Open = High',
  6: 'Previous close = Open = High',
  7: 'Low = previous close',
  8: 'No rule matched'
};

export function ruleDescription(rule: ClassificationRule): string {
  return RULE_TEXT[rule];
}

export function formatPrice(n: number | null | undefined): string {
  if (n == null || !Number.isFinite(n)) return '—';
  return n.toLocaleString('en-IN', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYY-MM-DD` for a date input, local time. */
export function toDateInput(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Count of each label, in label order. */
export function countLabels(records: { signal: SignalLabel }[]): Record<SignalLabel, number> {
  const out: Record<SignalLabel, number> = { BUY: 0, SELL: 0, HOLD: 0, 'No Data': 0 };
  for (const r of records) out[r.signal] += 1;
  return out;
}
