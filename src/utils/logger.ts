import { createLogger, format, transports } from 'winston';

const isTest = process.env.NODE_ENV === 'test';

export const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: isTest,
  format: format.combine(
    format.timestamp(),
    format.printf(({ timestamp, level, message }) => {
      return `${timestamp} [${level}]: ${message}`;
    })
  ),
  transports: isTest
    ? [new transports.Console()]
    : [
      new transports.Console(),
      // Rotate error log by size, keep last 10 files of 5MB each
      new transports.File({ filename: 'error.log', level: 'error', maxsize: 5 * 1024 * 1024, maxFiles: 10, tailable: true }),
      // Rotate combined log by size, keep last 10 files of 10MB each
      new transports.File({ filename: 'combined.log', maxsize: 10 * 1024 * 1024, maxFiles: 10, tailable: true })
    ],
});

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
