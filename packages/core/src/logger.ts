import { appendFileSync, mkdirSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_LOG_DIR = resolve(__dirname, '../.logs');

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Reads the current log level from CIRCUIT_DEBUGGER_LOG_LEVEL.
 * Defaults to 'info' if not set or invalid.
 * @internal
 */
function currentLevel(): LogLevel {
  const env = (process.env.CIRCUIT_DEBUGGER_LOG_LEVEL || '').toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

/**
 * Checks if logging is enabled for a given level based on current configuration.
 * @param min - Minimum log level to check
 * @internal
 */
function enabled(min: LogLevel): boolean {
  return LEVELS[currentLevel()] >= LEVELS[min];
}

/**
 * Gets or generates a stable per-process run identifier for log correlation.
 * @internal
 */
function runId(): string {
  if (!process.env.CIRCUIT_DEBUGGER_RUN_ID) {
    process.env.CIRCUIT_DEBUGGER_RUN_ID = `${Date.now()}-${process.pid}`;
  }
  return process.env.CIRCUIT_DEBUGGER_RUN_ID;
}

/**
 * Directory receiving log files. CIRCUIT_DEBUGGER_LOG_DIR overrides the
 * package-local `.logs` directory.
 * @public
 */
export function getLogDirectory(): string {
  return process.env.CIRCUIT_DEBUGGER_LOG_DIR
    ? resolve(process.env.CIRCUIT_DEBUGGER_LOG_DIR)
    : DEFAULT_LOG_DIR;
}

/**
 * Path of the JSON Lines log file for the current run.
 * @public
 */
export function getLogFilePath(): string {
  return resolve(getLogDirectory(), `run-${runId()}.jsonl`);
}

/**
 * Writes a structured log event to the JSON Lines log file.
 *
 * Respects both the CIRCUIT_DEBUGGER_LOG enable flag and the
 * CIRCUIT_DEBUGGER_LOG_LEVEL threshold. Error-level events are always logged.
 * @param level - Log severity level
 * @param event - Event identifier for categorization
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  const loggingEnabled =
    process.env.CIRCUIT_DEBUGGER_LOG === '1' ||
    process.env.CIRCUIT_DEBUGGER_LOG === 'true' ||
    level === 'error';
  if (!loggingEnabled) return;

  if (level !== 'error' && !enabled(level)) return;

  const entry = {
    ts: new Date().toISOString(),
    pid: process.pid,
    level,
    event,
    data,
  };
  try {
    mkdirSync(getLogDirectory(), { recursive: true });
    appendFileSync(getLogFilePath(), JSON.stringify(entry, bigintReplacer) + '\n', {
      encoding: 'utf8',
    });
  } catch {
    // a failing log write must not surface to the caller
  }
}

/**
 * Logs an error event with rich context for debugging.
 *
 * Captures error details including message, stack trace, error code,
 * process arguments, and current working directory.
 * @param context - Contextual label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context to aid debugging
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: unknown,
): void {
  const details =
    rawError instanceof Error
      ? {
          message: rawError.message,
          stack: rawError.stack,
          code: 'code' in rawError ? rawError.code : undefined,
        }
      : { message: String(rawError) };
  logEvent('error', `error:${context}`, {
    ...details,
    extra,
    argv: process.argv,
    cwd: process.cwd(),
  });
}

// Field elements travel through log payloads as bigint.
function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
