import dotenv from 'dotenv';
import pino, { type Logger as PinoLogger } from 'pino';

dotenv.config({ path: '.env.local' });
dotenv.config();

// Create logger with pretty printing in development
const baseLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

// Helper function to safely format error messages
export function formatErrorMessage(message: string, error?: unknown): string {
  if (error === undefined || error === null) {
    return message;
  }

  if (error instanceof Error) {
    return `${message} ${error.message}`;
  }

  if (typeof error === 'string') {
    return `${message} ${error}`;
  }

  return `${message} ${String(error)}`;
}

export interface Logger {
  trace: (message: string) => void;
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, error?: unknown) => void;
  error: (message: string, error?: unknown) => void;
  fatal: (message: string, error?: unknown) => void;
  /** Logger bound to a component scope, e.g. `section-crawler` */
  child: (scope: string) => Logger;
}

function wrap(base: PinoLogger): Logger {
  return {
    trace: (message) => base.trace(message),
    debug: (message, data) => {
      if (data) {
        base.debug(data, message);
      } else {
        base.debug(message);
      }
    },
    info: (message, data) => {
      if (data) {
        base.info(data, message);
      } else {
        base.info(message);
      }
    },
    warn: (message, error) => {
      base.warn(formatErrorMessage(message, error));
    },
    error: (message, error) => {
      base.error(formatErrorMessage(message, error));
    },
    fatal: (message, error) => {
      base.fatal(formatErrorMessage(message, error));
    },
    child: (scope) => wrap(base.child({ scope })),
  };
}

// Enhanced logger with safe error handling
const logger = wrap(baseLogger);

export { logger };
