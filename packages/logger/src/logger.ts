/** Ordered from most to least verbose. */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: LogContext | undefined;
}

/**
 * Destination for log entries. `write` is synchronous so nothing is lost when
 * the CLI exits; `flush` releases whatever the sink holds open.
 */
export interface Sink {
  write(entry: LogEntry): void;
  flush?(): void;
}

export interface LogMethod {
  (msg: string): void;
  (context: LogContext, msg: string): void;
}

export type Logger = Record<LogLevel, LogMethod>;

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

interface LoggerState {
  threshold: number;
  sinks: readonly Sink[];
}

// Silent until initLogger installs sinks.
let state: LoggerState = { threshold: LOG_LEVELS.indexOf('info'), sinks: [] };

const loggers = new Map<string, Logger>();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function toPlain(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Error) return { name: value.name, message: value.message, stack: value.stack };
  if (value instanceof Date) return value.toISOString();
  if (typeof value !== 'object' || value === null) return value;

  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  if (Array.isArray(value)) return value.map((item) => toPlain(item, seen));
  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toPlain(item, seen)]));
}

/**
 * Plain-data copy of a context: errors become `{name, message, stack}`, bigints
 * strings, and any object met a second time `'[Circular]'`.
 */
export function serializeContext(context: LogContext): LogContext {
  const seen = new WeakSet<object>([context]);
  try {
    return Object.fromEntries(Object.entries(context).map(([key, value]) => [key, toPlain(value, seen)]));
  } catch {
    return { error: '[unserializable]' };
  }
}

function emit(level: LogLevel, category: string, first: string | LogContext, msg?: string): void {
  if (state.sinks.length === 0 || LOG_LEVELS.indexOf(level) < state.threshold) return;

  const entry: LogEntry =
    typeof first === 'string'
      ? { level, category, timestamp: new Date(), msg: first }
      : { level, category, timestamp: new Date(), msg: msg ?? '', context: serializeContext(first) };

  state.sinks.forEach((sink) => sink.write(entry));
}

function createLogger(category: string): Logger {
  const method =
    (level: LogLevel): LogMethod =>
    (first: string | LogContext, msg?: string) =>
      emit(level, category, first, msg);

  return {
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}

/**
 * Install the level and sinks for every logger, including ones handed out
 * earlier.
 */
export function initLogger(config: LoggerConfig): void {
  state = {
    threshold: LOG_LEVELS.indexOf(config.level ?? 'info'),
    sinks: [...(config.sinks ?? [])],
  };
}

export function getLogger(category: string): Logger {
  let logger = loggers.get(category);
  if (!logger) {
    logger = createLogger(category);
    loggers.set(category, logger);
  }
  return logger;
}

/** Called right before the process exits. */
export function flushLoggers(): void {
  state.sinks.forEach((sink) => sink.flush?.());
}
