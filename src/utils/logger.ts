/**
 * Logger - Scoped console logging
 *
 * Every line is prefixed with its scope, e.g. "[SessionStore] Created session".
 * Structured context goes in the optional meta object.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

function safeJson(meta?: LogMeta): string {
  if (!meta) return '';
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [unserializable meta]';
  }
}

export function createLogger(scope: string): Logger {
  const format = (message: string, meta?: LogMeta) =>
    `${new Date().toISOString()} [${scope}] ${message}${safeJson(meta)}`;

  return {
    debug(message, meta) {
      if (enabled('debug')) console.debug(format(message, meta));
    },
    info(message, meta) {
      if (enabled('info')) console.log(format(message, meta));
    },
    warn(message, meta) {
      if (enabled('warn')) console.warn(format(message, meta));
    },
    error(message, meta) {
      if (enabled('error')) console.error(format(message, meta));
    }
  };
}
