import pino from 'pino';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Level for the base logger. An unknown value falls back to info here;
 * config validation reports it as a ConfigError.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : 'info';
}

const baseLogger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  base: {
    service: 'npc-replay',
    version: '1.0.0',
  },
});

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return baseLogger.child({ module: name });
}
