import pino from 'pino';

export type Logger = pino.Logger;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'fatal',
};

export function normalizeLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = (raw || '').trim().toLowerCase();
  if (!value) return fallback;
  const alias = LEVEL_ALIASES[value];
  if (alias) return alias;
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

export function createLogger(level: LogLevel): Logger {
  return pino({
    name: 'wake-cycle-tools',
    level,
  });
}
