import pino from 'pino';

/**
 * Structured JSON logger (pino)
 * - Human-readable output when LOG_PRETTY=true or in development
 * - Request-scoped child loggers carry the requestId
 *
 * Note: Reads directly from process.env so it can be imported before config
 */
const validLevels = ['debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
type LogLevel = (typeof validLevels)[number];

const isLogLevel = (value: string): value is LogLevel =>
  validLevels.some((candidate) => candidate === value);

const requestedLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
const level: LogLevel = isLogLevel(requestedLevel) ? requestedLevel : 'info';

const loggerConfig: pino.LoggerOptions = {
  level,
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie'],
    remove: true,
  },
};

const isPretty = process.env.LOG_PRETTY === 'true' || process.env.APP_ENV === 'development';

const baseLogger = isPretty
  ? pino({
      ...loggerConfig,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
  : pino(loggerConfig, pino.destination({ sync: false }));

export type Logger = pino.Logger;

export const logger = baseLogger;

/**
 * Create a child logger with request ID for request-scoped logging
 */
export const createRequestLogger = (requestId: string): Logger => {
  return baseLogger.child({ requestId });
};
