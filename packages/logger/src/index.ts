/**
 * @hoist/logger - Run Logging with Winston
 *
 * One logger per process:
 * - Console: messages verbatim, warnings and errors prefixed
 * - File: append-only `[timestamp] LEVEL: message` trail (deploy.log)
 * - Secret masking on every message
 *
 * Winston writes through a single stream per transport, so lines coming from
 * the two output readers of a command and from the pipeline never interleave.
 */

import { appendFileSync } from 'node:fs';
import { createLogger as createWinstonLogger, format, transports } from 'winston';
import type { Logger } from 'winston';
import { DEFAULT_LOG_FILE, LogWriteError } from '@hoist/shared';
import { maskSecrets } from './sanitizer.js';

export { maskSecrets, maskValue, isSensitiveKey, SENSITIVE_KEYS } from './sanitizer.js';
export type { Logger } from 'winston';

// ============================================================================
// Logger Contract
// ============================================================================

/**
 * What services depend on. Pass `{ detail }` in meta to attach the underlying
 * error text to an entry.
 */
export interface LoggerLike {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Log file path, or false for console only. Defaults to deploy.log in cwd. */
  file?: string | false;
  level?: string;
  console?: boolean;
}

// ============================================================================
// Formats
// ============================================================================

const maskFormat = format((info) => {
  if (typeof info.message === 'string') {
    info.message = maskSecrets(info.message);
  }
  if (typeof info.detail === 'string') {
    info.detail = maskSecrets(info.detail);
  }
  return info;
});

function detailOf(info: Record<string, unknown>): string {
  return typeof info.detail === 'string' && info.detail !== '' ? info.detail : '';
}

export const consoleFormat = format.combine(
  maskFormat(),
  format.printf((info) => {
    const message = String(info.message);
    const detail = detailOf(info);
    switch (info.level) {
      case 'error':
        return detail ? `ERROR: ${message}\nError details: ${detail}` : `ERROR: ${message}`;
      case 'warn':
        return detail ? `WARN: ${message}\n${detail}` : `WARN: ${message}`;
      default:
        return message;
    }
  }),
);

export const fileFormat = format.combine(
  format.timestamp(),
  maskFormat(),
  format.printf((info) => {
    const line = `[${String(info.timestamp)}] ${info.level.toUpperCase()}: ${String(info.message)}`;
    const detail = detailOf(info);
    return detail ? `${line}\n${detail}` : line;
  }),
);

// ============================================================================
// Factory
// ============================================================================

/**
 * Create (or append to) the log file up front so an unwritable path fails the
 * run before any command executes.
 */
export function ensureWritable(path: string): void {
  try {
    appendFileSync(path, '');
  } catch (error) {
    throw new LogWriteError(path, error instanceof Error ? error.message : String(error));
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { file = DEFAULT_LOG_FILE, level = 'info', console: toConsole = true } = options;

  const logger = createWinstonLogger({
    level,
    silent: !toConsole && file === false,
  });

  if (toConsole) {
    logger.add(new transports.Console({ format: consoleFormat }));
  }

  if (file !== false) {
    ensureWritable(file);
    logger.add(new transports.File({ filename: file, format: fileFormat }));
  }

  return logger;
}

// ============================================================================
// Write Failures
// ============================================================================

/** The first transport failure seen so far, if any. */
export type LogFailureCheck = () => LogWriteError | undefined;

/**
 * Record transport errors the logger reports. Hand the returned check to the
 * executor so a failed write stops the next command from starting.
 */
export function watchWriteFailures(logger: Logger, file: string): LogFailureCheck {
  let failure: LogWriteError | undefined;
  logger.on('error', (error: unknown) => {
    if (!failure) {
      failure = new LogWriteError(file, error instanceof Error ? error.message : String(error));
    }
  });
  return () => failure;
}

/** End the logger and wait until every queued entry has been handed to the transports. */
export function closeLogger(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    logger.once('finish', () => resolve());
    logger.end();
  });
}
