import winston from 'winston';
import { setLogger } from 'papaya';
import type { LogLevel } from 'papaya';

function createLogger(level: string): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ alias: '@timestamp' }),
      winston.format((info) => {
        delete info.timestamp;
        return info;
      })(),
      winston.format.json()
    ),
    defaultMeta: { service: 'papaya' },
    transports: [
      new winston.transports.Console({
        format: winston.format.json({
          space: process.env.NODE_ENV === 'production' ? 0 : 2,
        }),
        silent: process.env.NODE_ENV === 'test',
      }),
    ],
  });
}

const logger = createLogger(
  process.env.PAPAYA_LOG_LEVEL ??
    (process.env.NODE_ENV === 'production' ? 'info' : 'debug')
);

// The library logs through the same winston instance
setLogger(logger);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export default logger;
