import { describe, it, expect } from 'vitest';
import { addMinutes, combineDateTime, formatDate, formatMinute, formatSecond, isCalendarDate } from './time';

describe('time', () => {
  const d = new Date(2024, 0, 5, 9, 7, 3);

  it('formats local date parts with padding', () => {
    expect(formatDate(d)).toBe('2024-01-05');
    expect(formatMinute(d)).toBe('2024-01-05 09:07');
    expect(formatSecond(d)).toBe('2024-01-05 09:07:03');
  });

  it('combines date and time in local time', () => {
    const at = combineDateTime('2024-03-11', '09:30');
    expect(formatSecond(at)).toBe('2024-03-11 09:30:00');
  });

  it('adds minutes across the hour', () => {
    expect(formatMinute(addMinutes(combineDateTime('2024-03-11', '09:50'), 15))).toBe('2024-03-11 10:05');
  });

  it('accepts only real calendar days', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-02-31')).toBe(false);
    expect(isCalendarDate('2024-04-31')).toBe(false);
    expect(isCalendarDate('2024-12-31')).toBe(true);
  });
});
