export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Receives one serialized JSON line per entry. */
export type LogSink = (level: EntryLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  const fn =
    level === 'error'
      ? console.error
      : level === 'warn'
        ? console.warn
        : level === 'debug' || level === 'trace'
          ? console.debug
          : console.log;
  fn(line);
};

export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}

export function createLogger(
  level: LogLevel = 'info',
  bindings: Record<string, unknown> = {},
  sink: LogSink = consoleSink
): Logger {
  const minLevel = LEVEL_ORDER[level];

  function log(
    lvl: EntryLevel,
    argsOrMsg: Record<string, unknown> | string,
    msg?: string
  ): void {
    if (LEVEL_ORDER[lvl] < minLevel) return;

    const entry: Record<string, unknown> = {
      level: lvl,
      time: new Date().toISOString(),
      ...bindings,
    };

    if (typeof argsOrMsg === 'string') {
      entry.msg = argsOrMsg;
    } else {
      Object.assign(entry, argsOrMsg);
      if (msg) entry.msg = msg;
    }

    sink(lvl, JSON.stringify(entry));
  }

  const at =
    (lvl: EntryLevel) =>
    (...args: [Record<string, unknown>, string] | [string]) => {
      if (args.length === 1) log(lvl, args[0]);
      else log(lvl, args[0], args[1]);
    };

  return {
    trace: at('trace'),
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    child(childBindings: Record<string, unknown>): Logger {
      return createLogger(level, { ...bindings, ...childBindings }, sink);
    },
  };
}
