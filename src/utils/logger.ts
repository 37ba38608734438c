/**
 * @file Shared logger.
 * Components prefix their messages with a bracketed tag, e.g. `[WeightLearner]`.
 */

import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';
const useJson = process.env.LOG_FORMAT === 'json';

const lineFormat = winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${lvl} ${String(message)}${extra}`;
});

export const logger = winston.createLogger({
  level,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    useJson ? winston.format.json() : lineFormat
  ),
  transports: [new winston.transports.Console()],
});

/**
 * Shorten an id for log output.
 */
export function shortId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}...` : id;
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
