import { LoginPanel } from '../components/LoginPanel';
import { SignalChecker } from '../components/SignalChecker';
import { SignalHistory } from '../components/SignalHistory';
import { useSession } from '../contexts/SessionContext';
import { useSignalHistory } from '../hooks/queries/useSignals';

export default function Dashboard() {
  const { token, loading, error } = useSession();
  const history = useSignalHistory(Boolean(token));

  if (loading) {
    return <p style={{ color: 'var(--text-muted)' }}>Loading…</p>;
  }
  if (!token) {
    return <LoginPanel error={error} />;
  }

  return (
    <div className="flex flex-col gap-6">
      <SignalChecker />
      <SignalHistory records={history.data ?? []} loading={history.isLoading} error={history.error?.message ?? null} />
    </div>
  );
}
