import { useState, type FormEvent } from 'react';
import { Card } from './ui/Card';
import { Button } from './ui/Button';
import { Badge } from './ui/Badge';
import { useCheckSignal } from '../hooks/queries/useSignals';
import { formatPrice, labelVariant, ruleDescription, toDateInput } from '../utils/signalFormat';

const inputStyle = {
  background: 'var(--bg-surface)',
  border: '1px solid var(--border)',
  color: 'var(--text-primary)',
};

export function SignalChecker() {
  const [instrumentToken, setInstrumentToken] = useState('');
  const [date, setDate] = useState(() => toDateInput(new Date()));
  const [time, setTime] = useState('09:30');
  const check = useCheckSignal();

  const onSubmit = (e: FormEvent) => {
    e.preventDefault();
    check.mutate({ instrumentToken: instrumentToken.trim(), date, time });
  };

  const result = check.data;

  return (
    <Card header={<h2 className="text-lg font-semibold">Trading Signals</h2>}>
      <form onSubmit={onSubmit} className="grid gap-3 sm:grid-cols-4 items-end">
        <label className="flex flex-col gap-1 text-sm">
          Instrument Token
          <input
            className="px-3 py-2 rounded-md"
            style={inputStyle}
            value={instrumentToken}
            onChange={(e) => setInstrumentToken(e.target.value)}
            required
          />
        </label>
        <label className="flex flex-col gap-1 text-sm">
          Date for Candle
          <input type="date" className="px-3 py-2 rounded-md" style={inputStyle} value={date} onChange={(e) => setDate(e.target.value)} required />
        </label>
        <label className="flex flex-col gap-1 text-sm">
          Time for Candle
          <input type="time" className="px-3 py-2 rounded-md" style={inputStyle} value={time} onChange={(e) => setTime(e.target.value)} required />
        </label>
        <Button type="submit" loading={check.isPending} disabled={!instrumentToken.trim()}>
          Check Signal
        </Button>
      </form>

      {check.error && (
        <p role="alert" className="mt-4 text-sm" style={{ color: 'var(--danger)' }}>
          {check.error.message}
        </p>
      )}

      {result && (
        <div className="mt-4 flex flex-wrap items-center gap-3" data-testid="signal-result">
          <span className="text-sm">Signal:</span>
          <Badge variant={labelVariant(result.record.signal)}>{result.record.signal}</Badge>
          <span className="text-sm" style={{ color: 'var(--text-muted)' }}>{ruleDescription(result.rule)}</span>
          {result.candle && (
            <span className="text-xs tabular-nums" style={{ color: 'var(--text-muted)' }}>
              O {formatPrice(result.candle.open)} · H {formatPrice(result.candle.high)} · L {formatPrice(result.candle.low)} · prev C {formatPrice(result.prevClose)}
            </span>
          )}
        </div>
      )}
    </Card>
  );
}
