import { config, LogLevel } from '../config';

const REDACT_KEYS = [
  'raw_responses',
  'rawResponses',
  'rawResults',
  'raw_results',
  'response',
  'responses',
  'answers',
  'most_like_me',
  'least_like_me',
];

const LEVEL_RANK: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3 };

export type LogMeta = Record<string, unknown>;

function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value && typeof value === 'object') {
    const copy: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (REDACT_KEYS.includes(k)) {
        copy[k] = '[REDACTED]';
      } else {
        copy[k] = redact(v);
      }
    }
    return copy;
  }
  return value;
}

export type SafeLogger = {
  info(event: string, meta?: LogMeta): void;
  warn(event: string, meta?: LogMeta): void;
  error(event: string, meta?: LogMeta): void;
};

export function createSafeLogger(level: LogLevel): SafeLogger {
  const enabled = (wanted: LogLevel) => LEVEL_RANK[level] >= LEVEL_RANK[wanted];

  return {
    info(event, meta = {}) {
      if (!enabled('info')) return;
      // eslint-disable-next-line no-console
      console.info(event, redact(meta));
    },
    warn(event, meta = {}) {
      if (!enabled('warn')) return;
      // eslint-disable-next-line no-console
      console.warn(event, redact(meta));
    },
    error(event, meta = {}) {
      if (!enabled('error')) return;
      // eslint-disable-next-line no-console
      console.error(event, redact(meta));
    },
  };
}

export const safeLogger = createSafeLogger(config.logLevel);
