import type { ReactNode } from 'react';

export interface Column<T> {
  key: string;
  header: string;
  render: (row: T, index: number) => ReactNode;
  align?: 'left' | 'right';
}

interface TableProps<T> {
  columns: Column<T>[];
  data: T[];
  keyFn: (row: T, index: number) => string | number;
  emptyMessage?: string;
}

export function Table<T>({ columns, data, keyFn, emptyMessage = 'No data' }: TableProps<T>) {
  const alignClass = (a?: string) => (a === 'right' ? 'text-right' : 'text-left');
  return (
    <div className="overflow-x-auto">
      <table className="w-full text-sm table-panel">
        <thead>
          <tr>
            {columns.map((col) => (
              <th key={col.key} className={`px-3 py-2 sticky top-0 ${alignClass(col.align)}`} style={{ background: 'var(--bg-surface)' }}>
                {col.header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {data.length === 0 ? (
            <tr>
              <td colSpan={columns.length} className="text-center py-8" style={{ color: 'var(--text-muted)' }}>
                {emptyMessage}
              </td>
            </tr>
          ) : (
            data.map((row, i) => (
              <tr key={keyFn(row, i)}>
                {columns.map((col) => (
                  <td key={col.key} className={`px-3 py-2 ${alignClass(col.align)}`}>
                    {col.render(row, i)}
                  </td>
                ))}
              </tr>
            ))
          )}
        </tbody>
      </table>
    </div>
  );
}
