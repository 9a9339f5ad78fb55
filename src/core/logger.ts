import pino, { type Logger } from 'pino';

// Determine environment
const isDev = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

// stdout is reserved for findings; every log line goes to stderr
const transport = isDev
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
        destination: 2,
      },
    }
  : undefined;

export const loggerOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL?.toLowerCase() || 'info',
  transport,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'chain-auditor',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

// Create base logger
export const logger: Logger = transport ? pino(loggerOptions) : pino(loggerOptions, pino.destination(2));

// Child logger factory for modules
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}
