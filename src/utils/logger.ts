/**
 * Centralized Winston logger for the voice agent.
 * The file transport is only attached when LOG_FILE is set.
 */

import winston from 'winston';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const consoleTransport = new winston.transports.Console({
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
      let msg = `[${String(timestamp)}] ${level}: ${String(message)}`;
      if (Object.keys(meta).length > 0) {
        msg += ` ${JSON.stringify(meta)}`;
      }
      if (typeof stack === 'string') {
        msg += `\n${stack}`;
      }
      return msg;
    }),
  ),
});

const transports: winston.transport[] = [consoleTransport];

if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      maxsize: 10485760, // 10MB
      maxFiles: 5,
    }),
  );
}

export const logger = winston.createLogger({
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
  },
  level: LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
  ),
  transports,
});

/**
 * Normalize an unknown thrown value into a log-friendly message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
