import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function createLogger(name: string, level: string = defaultLevel()): Logger {
  return pino({ name, level });
}
