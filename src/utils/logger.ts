import winston from 'winston';
import { LogLevel, configuredLogLevel, isDebug } from '../constants';

const upperLevel = winston.format(info => {
  info.level = info.level.toUpperCase();
  return info;
});

export const baseFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  upperLevel()
);

export const lineFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [mnist] ${level}: ${message}${metaStr}`;
});

export const logger = winston.createLogger({
  level: isDebug() ? 'debug' : configuredLogLevel(),
  format: baseFormat,
  transports: [
    new winston.transports.Console({
      // colorize looks colours up by the original level, so it works on the upper-cased one
      format: winston.format.combine(
        winston.format.colorize(),
        lineFormat
      )
    })
  ]
});

/** The level is process-wide: every reader and module shares this logger. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

// Export convenience methods
export const info = logger.info.bind(logger);
export const error = logger.error.bind(logger);
export const debug = logger.debug.bind(logger);
