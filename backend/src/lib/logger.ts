/**
 * Simple structured logger for backend.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(v: string): v is LogLevel {
  return v in LEVEL_ORDER;
}

const rawLevel = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';
const MIN_LEVEL_NUM = isLogLevel(rawLevel) ? LEVEL_ORDER[rawLevel] : LEVEL_ORDER.info;

export function formatLine(level: LogLevel, tag: string, message: string, meta?: Record<string, unknown>, ts = new Date().toISOString()): string {
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  return `[${ts}] [${level.toUpperCase()}] [${tag}] ${message}${metaStr}`;
}

function log(level: LogLevel, tag: string, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < MIN_LEVEL_NUM) return;
  const line = formatLine(level, tag, message, meta);
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export const logger = {
  debug(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('debug', tag, msg, meta);
  },
  info(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('info', tag, msg, meta);
  },
  warn(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('warn', tag, msg, meta);
  },
  error(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('error', tag, msg, meta);
  }
};
