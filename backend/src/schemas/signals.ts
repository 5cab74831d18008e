import { z } from 'zod';
import { isCalendarDate } from '../lib/time';

const DATE_RE = /^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])$/;
const TIME_RE = /^([01]\d|2[0-3]):[0-5]\d$/;

export const signalCheckSchema = z.object({
  instrumentToken: z.string().trim().min(1, 'instrumentToken is required').max(32),
  date: z.string().regex(DATE_RE, 'expected YYYY-MM-DD').refine(isCalendarDate, 'invalid calendar date'),
  time: z.string().regex(TIME_RE, 'expected HH:mm').optional()
});

export type SignalCheck = z.infer<typeof signalCheckSchema>;
