/*
 * Structured JSON logger with request/run correlation and stage timing.
 */
import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  requestId?: string;
  runId?: string;
  stage?: string;
  [key: string]: unknown;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

const resolveThreshold = (): number => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(envLevel) ? levelPriority[envLevel] : levelPriority.info;
};

const threshold = resolveThreshold();

const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
  if (levelPriority[level] < threshold) {
    return;
  }

  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...asyncLocalStorage.getStore(),
    ...meta
  };

  const line = JSON.stringify(payload);
  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

/**
 * Merge fields into the context of the current async execution.
 */
export const setRequestContext = (context: LogContext): void => {
  const store = asyncLocalStorage.getStore() ?? {};
  asyncLocalStorage.enterWith({ ...store, ...context });
};

export const getRequestContext = (): LogContext => asyncLocalStorage.getStore() ?? {};

/**
 * Run `fn` with `context` attached to every log line it emits, including
 * lines from awaited work.
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T =>
  asyncLocalStorage.run({ ...getRequestContext(), ...context }, fn);

export const generateRequestId = (): string => randomUUID();

/**
 * Start a timing span. `end` logs the duration at debug level, or at info
 * when `level` says so (pipeline stages use that).
 */
export const startSpan = (
  name: string,
  level: LogLevel = 'debug'
): { end: (meta?: Record<string, unknown>) => number } => {
  const startTime = Date.now();
  log('debug', `Span started: ${name}`, { span: name });

  return {
    end: (meta?: Record<string, unknown>) => {
      const durationMs = Date.now() - startTime;
      log(level, `Span ended: ${name}`, { span: name, durationMs, ...meta });
      return durationMs;
    }
  };
};

/**
 * Normalise an unknown thrown value into log metadata.
 */
export const errorMeta = (error: unknown): Record<string, unknown> =>
  error instanceof Error ? { error: error.message, errorName: error.name } : { error: String(error) };

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log('warn', message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log('error', message, meta)
};
