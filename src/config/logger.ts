/**
 * Application logger. Call as logger.info('message', { meta }) so structured
 * fields end up in the JSON line rather than the message string.
 */
import winston from 'winston';
import { config } from './index';

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${rest}`;
  })
);

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.env === 'test',
  format:
    config.env === 'production'
      ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
      : devFormat,
  transports: [new winston.transports.Console()],
});
