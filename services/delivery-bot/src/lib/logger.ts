import pino, { type Logger, type LoggerOptions } from 'pino';

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: process.env.NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: { colorize: true },
  } : undefined,
};

export type AppLogger = Logger;

export const logger: AppLogger = pino(options).child({ service: 'delivery-bot' });

export function createLogger(context: Record<string, string>): AppLogger {
  return logger.child(context);
}
