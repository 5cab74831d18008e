import { Card } from './ui/Card';
import { useLoginUrl } from '../hooks/queries/useLoginUrl';

export function LoginPanel({ error }: { error?: string | null }) {
  const { data: url, isLoading, error: urlError } = useLoginUrl(true);

  return (
    <Card variant="accent" header={<h2 className="text-lg font-semibold">Login to Kite</h2>}>
      <p className="text-sm mb-4" style={{ color: 'var(--text-secondary)' }}>
        Sign in with your broker account to check and record trading signals.
      </p>
      {error && (
        <p role="alert" className="text-sm mb-3" style={{ color: 'var(--danger)' }}>
          {error}
        </p>
      )}
      {isLoading && <p style={{ color: 'var(--text-muted)' }}>Loading…</p>}
      {urlError && (
        <p role="alert" className="text-sm" style={{ color: 'var(--danger)' }}>
          {urlError.message}
        </p>
      )}
      {url && (
        <a href={url} className="focus-ring inline-flex font-semibold px-4 py-2 rounded-md" style={{ background: 'var(--accent-gradient)', color: '#000' }}>
          Login
        </a>
      )}
    </Card>
  );
}
