import winston from 'winston';

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const consoleFormat =
  process.env.LOG_FORMAT === 'pretty'
    ? combine(
        colorize(),
        timestamp(),
        printf(({ level, message, timestamp: ts, module, ...meta }) => {
          const scope = module ? ` [${String(module)}]` : '';
          const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `${String(ts)} ${level}${scope}: ${String(message)}${rest}`;
        })
      )
    : json();

const rootLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: combine(errors({ stack: true }), timestamp(), consoleFormat),
  defaultMeta: { service: 'budget-reconciliation' },
  transports: [
    new winston.transports.Console({
      // Jest sets NODE_ENV=test
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
});

export type Logger = winston.Logger;

export function createLogger(module?: string): Logger {
  return module ? rootLogger.child({ module }) : rootLogger;
}
