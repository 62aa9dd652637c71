/**
 * Category loggers fanning structured entries out to pluggable sinks.
 * Nothing is written until initLogger() installs at least one sink.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: LogContext | undefined;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface LogMethod {
  (msg: string): void;
  (context: LogContext, msg: string): void;
}

export interface Logger {
  readonly category: string;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: readonly Sink[] | undefined;
}

const SEVERITY = { debug: 10, info: 20, warn: 30, error: 40 } as const satisfies Record<LogLevel, number>;

interface LoggingState {
  threshold: number;
  sinks: readonly Sink[];
}

let state: LoggingState = { threshold: SEVERITY.info, sinks: [] };

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

// Decimals and dates go through their toJSON, so a sink sees "10.5" rather than
// the decimal's internal digit array.
function loggableValue(value: unknown, ancestors: readonly object[]): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (ancestors.includes(value)) {
    return '[Circular]';
  }
  if (value instanceof Error) {
    const code = 'code' in value ? value.code : undefined;
    return { name: value.name, message: value.message, ...(typeof code === 'string' ? { code } : {}) };
  }
  if (hasToJSON(value)) {
    return value.toJSON();
  }

  const path = [...ancestors, value];
  if (Array.isArray(value)) {
    return value.map((item: unknown) => loggableValue(item, path));
  }
  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, loggableValue(item, path)]));
}

function toLoggable(context: LogContext): LogContext {
  return Object.fromEntries(Object.entries(context).map(([key, value]) => [key, loggableValue(value, [context])]));
}

function emit(level: LogLevel, category: string, first: string | LogContext, msg: string | undefined): void {
  if (SEVERITY[level] < state.threshold || state.sinks.length === 0) {
    return;
  }

  const entry: LogEntry =
    typeof first === 'string'
      ? { level, category, timestamp: new Date(), msg: first }
      : { level, category, timestamp: new Date(), msg: msg ?? '', context: toLoggable(first) };

  for (const sink of state.sinks) {
    sink.write(entry);
  }
}

export function initLogger(config: LoggerConfig): void {
  state = {
    threshold: SEVERITY[config.level ?? 'info'],
    sinks: [...(config.sinks ?? [])],
  };
}

/**
 * Loggers hold no state of their own: one created before initLogger() writes
 * to whatever sinks are installed when it is called.
 */
export function getLogger(category: string): Logger {
  const at =
    (level: LogLevel): LogMethod =>
    (first: string | LogContext, msg?: string) => {
      emit(level, category, first, msg);
    };

  return { category, debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}

export function flushLoggers(): void {
  for (const sink of state.sinks) {
    sink.flush();
  }
}
