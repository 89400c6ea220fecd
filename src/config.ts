import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.string().trim().toLowerCase().optional(),
  JEST_WORKER_ID: z.string().optional(),
});

export type AppConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: LogLevel;
};

export class ConfigError extends Error {}

// Names other loggers use, mapped onto the levels this one has.
const LOG_LEVEL_ALIASES = new Map<string, LogLevel>([
  ['debug', 'info'],
  ['trace', 'info'],
  ['verbose', 'info'],
  ['warning', 'warn'],
  ['fatal', 'error'],
  ['none', 'silent'],
]);

function resolveLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) return fallback;
  const level = LOG_LEVELS.find((l) => l === value) ?? LOG_LEVEL_ALIASES.get(value);
  if (level) return level;
  // eslint-disable-next-line no-console
  console.warn(`Ignoring unrecognized LOG_LEVEL "${value}"; using "${fallback}"`);
  return fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigError(`Invalid environment configuration: ${fields}`);
  }

  // Jest runs stay quiet unless a level is asked for explicitly.
  const defaultLevel: LogLevel = parsed.data.JEST_WORKER_ID ? 'silent' : 'info';

  return Object.freeze({
    nodeEnv: parsed.data.NODE_ENV,
    logLevel: resolveLogLevel(parsed.data.LOG_LEVEL, defaultLevel),
  });
}

export const config = loadConfig();
