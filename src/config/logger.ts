import winston from 'winston';
import { env } from './environment.js';

const { combine, timestamp, errors, json, simple, colorize } = winston.format;

// Every level goes to stderr: stdout carries the MCP stream in stdio mode
const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    errors({ stack: true }),
    env.NODE_ENV === 'production' ? json() : simple()
  ),
  defaultMeta: { service: 'clickstream-analytics' },
  silent: env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console({
      stderrLevels: ALL_LEVELS,
      format: env.NODE_ENV === 'development' ? combine(colorize(), simple()) : json(),
    }),
  ],
});

if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
    })
  );
}

export default logger;
