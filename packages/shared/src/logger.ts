/**
 * @module: Logger
 * @risk: low
 * @scope: utility
 *
 * @description
 * Winston-based logging utility with console and file transports. Request paths
 * reach the logs verbatim, so every entry passes through a control-character scrub.
 *
 * @impact
 * Risk: Logging failures make debugging harder but never break asset delivery.
 */

import fs from 'fs';
import { createLogger, format, transports } from 'winston';
import { format as dateFnsFormat } from 'date-fns';

const { combine, timestamp, printf, colorize } = format;
const splatSymbol = Symbol.for('splat');

// --- Redaction rules ---
// C0 controls from raw request URLs would split one entry into several lines.
const CONTROL_CHAR_REGEX = /[\u0000-\u001f\u007f]/g;

/**
 * Recursively replace control characters in log data with `?`.
 */
export function sanitizeLogData(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(CONTROL_CHAR_REGEX, '?');
  }

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeLogData(entry));
  }

  if (value && typeof value === 'object' && !(value instanceof Error)) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = sanitizeLogData(val);
    }
    return sanitized;
  }

  return value;
}

// --- Winston formatters ---
const sanitizeFormat = format((info) => {
  info.message = sanitizeLogData(info.message);

  // Extra args passed to logger.info/debug/etc.
  const splat = info[splatSymbol];
  if (Array.isArray(splat)) {
    info[splatSymbol] = splat.map((item: unknown) => sanitizeLogData(item));
  }

  return info;
});

const logFormat = printf(({ level, message, timestamp, module }) => {
  const scope = typeof module === 'string' ? ` (${module})` : '';
  return `${String(timestamp)} [${level}]${scope}: ${String(message)}`;
});

// --- Logger output configuration ---
const logDirectory = process.env.LOG_DIR || 'logs';
fs.mkdirSync(logDirectory, { recursive: true });

const defaultLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';

/**
 * Winston logger instance with console and file transports
 */
export const logger = createLogger({
  level: (process.env.LOG_LEVEL || defaultLevel).toLowerCase(),
  format: combine(
    sanitizeFormat(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    colorize({ all: true }),
    logFormat
  ),
  transports: [
    new transports.Console(),
    new transports.File({
      filename: `${logDirectory}/${dateFnsFormat(new Date(), 'yyyy-MM-dd')}.log`,
      format: format.combine(
        format.uncolorize(),
        format.timestamp(),
        format.json()
      )
    })
  ],
  exitOnError: false
});

/**
 * Format an unknown thrown value for a single log line.
 */
export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
