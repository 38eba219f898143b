import pino from 'pino';
import type { LoggerOptions } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';
const logLevel = process.env.LOG_LEVEL ?? 'info';

// Shared between the standalone logger and Fastify's request logger
export const loggerOptions: LoggerOptions = {
  level: logLevel,
  transport:
    isProduction || isTest
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname,reqId,responseTime,req,res',
            colorize: true,
            singleLine: true,
            messageFormat: '{msg}',
          },
        },
  formatters: {
    level: (label: string) => {
      return { level: label.toUpperCase() };
    },
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  base: isProduction
    ? {
        env: process.env.NODE_ENV,
        revision: process.env.COMMIT_SHA ?? 'unknown',
      }
    : undefined,
};

export const logger = pino(loggerOptions);

// Create child loggers for specific modules
export const createLogger = (module: string) => {
  return logger.child({ module });
};
