/**
 * Structured Logger
 *
 * JSON-structured logging with level filtering, context enrichment and
 * child loggers. Every access-core component takes a {@link Logger} by
 * injection; the output sink is swappable so tests can capture entries.
 * Credential-bearing metadata keys are redacted before output.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  userId?: number;
  service?: string;
  /** Component or operation name, e.g. `credentialStore` or `grantStore`. */
  component?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  userId?: number;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

// ─── Log Level Ordering ──────────────────────────────────────────────────────

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Output sink for log entries. Defaults to stdout JSON.
 */
export type LogOutput = (entry: LogEntry) => void;

const defaultLogOutput: LogOutput = (entry: LogEntry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

// ─── Redaction ───────────────────────────────────────────────────────────────

/** Metadata keys whose values never reach the output: passwords, hashes, digests. */
const SECRET_KEY_PATTERN = /password|passwd|hash|digest|secret|token/i;

export const REDACTED = '[REDACTED]';

/**
 * Replace the value of every credential-bearing key, at any depth.
 * Returns a new object; the caller's metadata is left untouched.
 */
export function redactMetadata(metadata: LogMetadata): LogMetadata {
  const result: LogMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      result[key] = REDACTED;
    } else if (isPlainObject(value)) {
      result[key] = redactMetadata(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is LogMetadata {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Service name included in every log entry. Defaults to 'access-core'. */
  service?: string;
  /** Minimum log level to emit. Defaults to 'info'. */
  level?: LogLevel;
  /** Base context merged into every log entry. */
  context?: LogContext;
  /** Custom output sink. Defaults to JSON on stdout. */
  output?: LogOutput;
}

// ─── Implementation ──────────────────────────────────────────────────────────

interface ResolvedContext extends LogContext {
  correlationId: string;
  service: string;
}

function buildEntry(
  context: ResolvedContext,
  level: LogLevel,
  message: string,
  error: Error | undefined,
  metadata: LogMetadata | undefined,
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    service: context.service,
    correlationId: context.correlationId,
  };

  if (context.component) entry.component = context.component;
  if (context.userId !== undefined) entry.userId = context.userId;
  if (metadata && Object.keys(metadata).length > 0) entry.metadata = redactMetadata(metadata);
  if (error) entry.error = { name: error.name, message: error.message, stack: error.stack };

  return entry;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'info';
  const output = options.output ?? defaultLogOutput;
  const context: ResolvedContext = {
    ...options.context,
    correlationId: options.context?.correlationId || randomUUID(),
    service: options.context?.service || options.service || 'access-core',
  };

  const log = (level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void => {
    if (LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel]) {
      output(buildEntry(context, level, message, error, metadata));
    }
  };

  return {
    debug: (message, metadata) => log('debug', message, undefined, metadata),
    info: (message, metadata) => log('info', message, undefined, metadata),
    warn: (message, metadata) => log('warn', message, undefined, metadata),
    error: (message, error, metadata) => log('error', message, error, metadata),
    fatal: (message, error, metadata) => log('fatal', message, error, metadata),
    child: (childContext) =>
      createLogger({ level: minLevel, output, context: { ...context, ...childContext } }),
  };
}

/** Normalise an unknown thrown value for {@link Logger.error}. */
export function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
