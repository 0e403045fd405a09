/**
 * Structured JSON logging for Berth.
 *
 * Provides component-scoped loggers with level filtering, injectable
 * sinks for testing, and a container log router that maps a container's
 * log output to host-side structured logs.
 *
 * All log output is JSON-formatted with level, ts, component,
 * and msg fields. Correlation fields are promoted to top-level.
 *
 * @example
 * ```ts
 * const logger = createLogger('orchestrator');
 * logger.info('dependency started', { container: 'postgres-1' });
 * // → {"level":"info","ts":"...","component":"orchestrator","msg":"dependency started","container":"postgres-1"}
 * ```
 */

import type { Readable } from 'node:stream';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  container?: string;
  check?: string;
  strategy?: string;
  duration_ms?: number;
  ok?: boolean;
  error_code?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  container?: string;
  check?: string;
  strategy?: string;
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

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

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
  'password',
  'secret',
  'token',
  'credential',
  'authorization',
  'POSTGRES_PASSWORD',
  'REDIS_PASSWORD',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

/** Strip denied keys, truncate long strings, and serialize Errors in metadata. */
function sanitizeMeta(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!meta) return undefined;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key)) continue;

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

const PROMOTED_KEYS = new Set([
  'container',
  'check',
  'strategy',
  'duration_ms',
  'ok',
  'error_code',
]);

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'orchestrator'`, `'health:monitor'`).
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

    if (boundContext) {
      if (boundContext.container) entry.container = boundContext.container;
      if (boundContext.check) entry.check = boundContext.check;
      if (boundContext.strategy) entry.strategy = boundContext.strategy;
    }

    // Promote well-known fields from meta to top-level
    if (meta) {
      if (typeof meta.container === 'string') entry.container = meta.container;
      if (typeof meta.check === 'string') entry.check = meta.check;
      if (typeof meta.strategy === 'string') entry.strategy = meta.strategy;
      if (typeof meta.duration_ms === 'number') entry.duration_ms = meta.duration_ms;
      if (typeof meta.ok === 'boolean') entry.ok = meta.ok;
      if (typeof meta.error_code === 'string') entry.error_code = meta.error_code;
    }

    const sanitized = sanitizeMeta(meta);
    if (sanitized !== undefined) {
      const remaining: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(sanitized)) {
        if (!PROMOTED_KEYS.has(key)) {
          remaining[key] = value;
        }
      }
      if (Object.keys(remaining).length > 0) {
        entry.meta = remaining;
      }
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => {
      const merged: LogContext = { ...boundContext, ...ctx };
      return createLogger(component, merged);
    },
  };
}

// ---------------------------------------------------------------------------
// ContainerLogRouter
// ---------------------------------------------------------------------------

/**
 * Routes a container's log output to host-side structured logs.
 *
 * Each non-empty line becomes a separate entry tagged with the container
 * name and the stream it came from.
 */
export class ContainerLogRouter {
  private readonly logger: Logger;
  private readonly containerName: string;

  constructor(containerName: string, logger?: Logger) {
    this.containerName = containerName;
    this.logger = (logger ?? createLogger('container')).child(containerName);
  }

  /** Route container stdout data to info-level logs. */
  routeStdout(data: string): void {
    this.routeLines(data, 'stdout', 'info');
  }

  /** Route container stderr data to warn-level logs. */
  routeStderr(data: string): void {
    this.routeLines(data, 'stderr', 'warn');
  }

  /**
   * Drain a log stream, routing every complete line at `level`.
   * A trailing partial line is flushed when the stream ends.
   */
  async drain(stream: Readable, level: LogLevel = 'info'): Promise<number> {
    let buffered = '';
    let lines = 0;
    for await (const chunk of stream) {
      buffered += typeof chunk === 'string' ? chunk : String(chunk);
      const parts = buffered.split('\n');
      buffered = parts.pop() ?? '';
      lines += this.routeLines(parts.join('\n'), 'logs', level);
    }
    lines += this.routeLines(buffered, 'logs', level);
    return lines;
  }

  private routeLines(data: string, stream: string, level: LogLevel): number {
    const lines = data.split('\n').filter((line) => line.length > 0);
    for (const line of lines) {
      this.logger[level](line, {
        container: this.containerName,
        stream,
      });
    }
    return lines.length;
  }
}
