import { LogLevel } from '@nestjs/common';

const LEVELS: Record<string, LogLevel[]> = {
  debug: ['error', 'warn', 'log', 'debug'],
  info: ['error', 'warn', 'log'],
  warn: ['error', 'warn'],
  error: ['error'],
};

/** Nest logger levels for a LOG_LEVEL value; unknown values fall back to info. */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  return LEVELS[(level ?? 'info').toLowerCase()] ?? LEVELS.info;
}
