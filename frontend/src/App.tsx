import Dashboard from './pages/Dashboard';
import { Button } from './components/ui/Button';
import { useSession } from './contexts/SessionContext';

export default function App() {
  const { token, userId, logout } = useSession();

  return (
    <div className="min-h-screen flex flex-col" style={{ background: 'var(--bg-base)', color: 'var(--text-primary)' }}>
      <header
        className="shrink-0 min-h-14 px-4 sm:px-6 flex items-center justify-between py-2 border-b"
        style={{ background: 'var(--bg-topbar)', borderColor: 'var(--border)' }}
      >
        <h1 className="text-base font-semibold tracking-tight">Signal Recorder</h1>
        {token && (
          <div className="flex items-center gap-3 text-sm">
            {userId && <span style={{ color: 'var(--success)' }}>Logged in as {userId}</span>}
            <Button variant="ghost" size="sm" onClick={() => void logout()}>
              Logout
            </Button>
          </div>
        )}
      </header>
      <main className="flex-1 w-full max-w-5xl mx-auto px-4 sm:px-6 py-6">
        <Dashboard />
      </main>
    </div>
  );
}
