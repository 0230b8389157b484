import { Logger as TsLogger } from 'tslog';

export interface Logger {
  debug(...a: unknown[]): void;
  info(...a: unknown[]): void;
  warn(...a: unknown[]): void;
  error(...a: unknown[]): void;
}

export type LogLevel = 'silly' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

// Key material must never reach a log sink.
const MASKED_KEYS = ['privateKey', 'private_key', 'mnemonic', 'authorization'];

export function createLogger(name: string, options?: { level?: LogLevel }): Logger {
  return new TsLogger<unknown>({
    name,
    type: 'pretty',
    minLevel: LOG_LEVELS[options?.level ?? 'info'],
    maskValuesOfKeys: MASKED_KEYS,
    maskPlaceholder: '[REDACTED]',
  });
}
