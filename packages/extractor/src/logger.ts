/**
 * Structured JSON logger
 *
 * One JSON object per line, same shape as the API's request log entries,
 * so library and server output can be filtered together.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  type: 'log';
  level: LogLevel;
  timestamp: string;
  component: string;
  message: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  child(component: string, bindings?: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Entries below this level are dropped (default: info) */
  level?: LogLevel;
  /** Fields added to every entry */
  bindings?: Record<string, unknown>;
  /** Output sink (default: console) */
  write?: (entry: LogEntry) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function consoleSink(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

function serializeError(error: unknown): Record<string, unknown> | undefined {
  if (error === undefined) return undefined;
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined ? { code } : {}),
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const minLevel = LEVEL_ORDER[options.level ?? 'info'];
  const bindings = options.bindings ?? {};
  const write = options.write ?? consoleSink;

  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < minLevel) return;
    write({
      ...bindings,
      ...data,
      type: 'log',
      level,
      timestamp: new Date().toISOString(),
      component,
      message,
    });
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, error, data) => emit('error', message, { ...data, error: serializeError(error) }),
    child: (childComponent, childBindings) =>
      createLogger(`${component}:${childComponent}`, {
        ...options,
        bindings: { ...bindings, ...childBindings },
      }),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
