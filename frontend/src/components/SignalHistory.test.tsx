// @vitest-environment jsdom
import { describe, it, expect, afterEach } from 'vitest';
import { cleanup, render, screen, within } from '@testing-library/react';
import { SignalHistory } from './SignalHistory';

describe('SignalHistory', () => {
  afterEach(() => {
    cleanup();
  });

  it('renders records in the order given', () => {
    render(
      <SignalHistory
        records={[
          { timestamp: '2024-03-11 09:45:01', signal: 'BUY' },
          { timestamp: '2024-03-11 09:50:12', signal: 'SELL' }
        ]}
      />
    );
    const rows = screen.getAllByRole('row');
    expect(rows).toHaveLength(3);
    expect(within(rows[1]).getByText('2024-03-11 09:45:01')).toBeTruthy();
    expect(within(rows[1]).getByText('BUY')).toBeTruthy();
    expect(within(rows[2]).getByText('SELL')).toBeTruthy();
    expect(screen.getByText('2 total · BUY 1 · SELL 1 · HOLD 0 · No Data 0')).toBeTruthy();
  });

  it('shows the empty message', () => {
    render(<SignalHistory records={[]} />);
    expect(screen.getByText('No signals recorded yet')).toBeTruthy();
  });

  it('shows errors instead of the table', () => {
    render(<SignalHistory records={[]} error="Signal store unavailable: disk I/O error" />);
    expect(screen.getByRole('alert').textContent).toBe('Signal store unavailable: disk I/O error');
    expect(screen.queryByRole('table')).toBeNull();
  });
});
