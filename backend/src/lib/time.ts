/**
 * Local-time formatting for candle windows and signal timestamps.
 */

const pad = (n: number) => String(n).padStart(2, '0');

export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** `YYYY-MM-DD HH:mm` — format of the historical data `from`/`to` params. */
export function formatMinute(d: Date): string {
  return `${formatDate(d)} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

/** `YYYY-MM-DD HH:mm:ss` — format of signal log timestamps. */
export function formatSecond(d: Date): string {
  return `${formatMinute(d)}:${pad(d.getSeconds())}`;
}

/** Combine a `YYYY-MM-DD` date and an `HH:mm` time into a local Date. */
export function combineDateTime(date: string, time: string): Date {
  const [y, m, d] = date.split('-').map(Number);
  const [hh, mm] = time.split(':').map(Number);
  return new Date(y, m - 1, d, hh, mm, 0, 0);
}

/** True when a `YYYY-MM-DD` string names a real day (no Feb 31 rolling into March). */
export function isCalendarDate(date: string): boolean {
  const [y, m, d] = date.split('-').map(Number);
  if (![y, m, d].every(Number.isInteger)) return false;
  const dt = new Date(y, m - 1, d);
  return dt.getFullYear() === y && dt.getMonth() === m - 1 && dt.getDate() === d;
}

export function addMinutes(d: Date, minutes: number): Date {
  return new Date(d.getTime() + minutes * 60_000);
}
