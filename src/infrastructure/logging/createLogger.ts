import pino from 'pino';
import type { DestinationStream, LevelWithSilent, Logger } from 'pino';
import { z } from 'zod';

const levelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export interface CreateLoggerOptions {
  /** Minimum level. Default: `LOG_LEVEL` from the environment, else `'info'`. */
  readonly level?: LevelWithSilent;
  /** Logger name, added to every line. Default: `'chatset-gate'`. */
  readonly name?: string;
  /** Where JSON lines go. Default: stdout. */
  readonly destination?: DestinationStream;
}

/** Resolve a log level from an environment value, ignoring anything pino does not know. */
export function resolveLogLevel(value: string | undefined): LevelWithSilent | undefined {
  const parsed = levelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

/** Create a structured JSON logger. */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const config = {
    name: options?.name ?? 'chatset-gate',
    level: options?.level ?? resolveLogLevel(process.env['LOG_LEVEL']) ?? 'info',
    messageKey: 'message',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return options?.destination ? pino(config, options.destination) : pino(config);
}
