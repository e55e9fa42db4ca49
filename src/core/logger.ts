/**
 * Structured JSON logging for docs-bridge.
 *
 * Provides component-scoped loggers with level filtering and injectable
 * sinks for testing. All log output is JSON-formatted with level, ts,
 * component, and msg fields. Correlation fields are promoted to top-level.
 *
 * @example
 * ```ts
 * const logger = createLogger('catalog-client');
 * logger.info('search', { query: 'fastapi' });
 * // → {"level":"info","ts":"...","component":"catalog-client","msg":"search","meta":{"query":"fastapi"}}
 * ```
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  correlation?: string;
  tool?: string;
  duration_ms?: number;
  ok?: boolean;
  error_code?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  correlation?: string;
  tool?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stdout JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

function defaultSink(entry: LogEntry): void {
  process.stdout.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// NEVER_LOG_FIELDS: deny-listed metadata keys
// ---------------------------------------------------------------------------

/** Metadata keys that must never appear in log output. */
export const NEVER_LOG_FIELDS = new Set([
  'apiKey',
  'api_key',
  'credential',
  'authorization',
  'Authorization',
  'encryption_key',
  'encryptionKey',
  'password',
  'secret',
  'token',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

/** Metadata keys lifted onto the entry itself rather than kept under `meta`. */
const PROMOTED_KEYS = new Set(['duration_ms', 'ok', 'error_code', 'correlation', 'tool']);

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> | undefined {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key) || PROMOTED_KEYS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

function promote(entry: LogEntry, meta: Record<string, unknown>): void {
  const { duration_ms, ok, error_code, correlation, tool } = meta;
  if (typeof duration_ms === 'number') entry.duration_ms = duration_ms;
  if (typeof ok === 'boolean') entry.ok = ok;
  if (typeof error_code === 'string') entry.error_code = error_code;
  if (typeof correlation === 'string') entry.correlation = correlation;
  if (typeof tool === 'string') entry.tool = tool;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'server'`, `'catalog-client'`).
 * @param boundContext - Optional context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext?.correlation) entry.correlation = boundContext.correlation;
    if (boundContext?.tool) entry.tool = boundContext.tool;

    if (meta) {
      promote(entry, meta);
      const sanitized = sanitizeMeta(meta);
      if (sanitized !== undefined) entry.meta = sanitized;
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => createLogger(component, { ...boundContext, ...ctx }),
  };
}
