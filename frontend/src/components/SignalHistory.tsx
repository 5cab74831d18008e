import { Card } from './ui/Card';
import { Badge } from './ui/Badge';
import { Table, type Column } from './ui/Table';
import { countLabels, labelVariant } from '../utils/signalFormat';
import type { SignalRecord } from '../types/signal';

const columns: Column<SignalRecord>[] = [
  { key: 'n', header: '#', render: (_r, i) => i + 1, align: 'right' },
  { key: 'timestamp', header: 'Timestamp', render: (r) => <span className="tabular-nums">{r.timestamp}</span> },
  { key: 'signal', header: 'Signal', render: (r) => <Badge variant={labelVariant(r.signal)}>{r.signal}</Badge> },
];

interface SignalHistoryProps {
  records: SignalRecord[];
  loading?: boolean;
  error?: string | null;
}

export function SignalHistory({ records, loading, error }: SignalHistoryProps) {
  const counts = countLabels(records);
  return (
    <Card
      header={
        <div className="flex flex-wrap items-center justify-between gap-2">
          <h2 className="text-lg font-semibold">Signal History</h2>
          <span className="text-xs" style={{ color: 'var(--text-muted)' }}>
            {records.length} total · BUY {counts.BUY} · SELL {counts.SELL} · HOLD {counts.HOLD} · No Data {counts['No Data']}
          </span>
        </div>
      }
    >
      {error ? (
        <p role="alert" style={{ color: 'var(--danger)' }}>{error}</p>
      ) : loading ? (
        <p style={{ color: 'var(--text-muted)' }}>Loading…</p>
      ) : (
        <Table columns={columns} data={records} keyFn={(_r, i) => i} emptyMessage="No signals recorded yet" />
      )}
    </Card>
  );
}
