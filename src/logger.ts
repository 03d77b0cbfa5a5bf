import pino from 'pino';
import { LogLevelSchema } from './config/env';

// An invalid LOG_LEVEL falls back to info here; loadConfig() rejects it at startup
const parsedLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL ?? 'info');
const level = parsedLevel.success ? parsedLevel.data : 'info';

export const logger =
  process.env.NODE_ENV === 'production' || process.env.VITEST
    ? pino({ level: process.env.VITEST ? 'silent' : level })
    : pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      });

export function componentLogger(component: string) {
  return logger.child({ component });
}
