import type { LogLevel } from '../types';

export type LogPayload = Record<string, unknown>;

export interface Logger {
  debug(event: string, payload?: LogPayload): void;
  info(event: string, payload?: LogPayload): void;
  warn(event: string, payload?: LogPayload): void;
  error(event: string, payload?: LogPayload): void;
}

interface LoggerOptions {
  level?: LogLevel;
  /** Where finished lines go. Defaults to stderr so the bar on stdout is left alone. */
  sink?: (line: string) => void;
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const safeJson = (value: unknown): string => {
  try {
    return JSON.stringify(value);
  } catch {
    return JSON.stringify({ unserializable: String(value) });
  }
};

export const createLogger = ({
  level = 'warn',
  sink = (line) => console.error(line),
  now = () => new Date()
}: LoggerOptions = {}): Logger => {
  const threshold = LEVEL_ORDER[level];

  const emit = (lvl: LogLevel, event: string, payload: LogPayload = {}) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    try {
      const base = { ts: now().toISOString(), level: lvl.toUpperCase(), event, ...payload };
      sink(`[pacer] ${safeJson(base)}`);
    } catch {
      // never throw from logging
    }
  };

  return {
    debug: (event, payload) => emit('debug', event, payload),
    info: (event, payload) => emit('info', event, payload),
    warn: (event, payload) => emit('warn', event, payload),
    error: (event, payload) => emit('error', event, payload)
  };
};

export const silentLogger: Logger = createLogger({ sink: () => {} });
