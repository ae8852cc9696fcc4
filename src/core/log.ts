// Leveled logging over the console. Levels, lowest to highest verbosity:
//   silent < error < warn < info < debug

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export type LogSink = {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
};

export interface Logger {
  readonly level: LogLevel;
  error(msg: string, payload?: unknown): void;
  warn(msg: string, payload?: unknown): void;
  info(msg: string, payload?: unknown): void;
  debug(msg: string, payload?: unknown): void;
}

export type LoggerOptions = {
  name?: string;
  level?: LogLevel;
  /** Defaults to the console. */
  sink?: LogSink;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const name = opts.name ?? 'numen';
  const level = opts.level ?? 'warn';
  const sink = opts.sink ?? console;

  const emit = (at: Exclude<LogLevel, 'silent'>, msg: string, payload?: unknown) => {
    if (LEVEL_ORDER[at] > LEVEL_ORDER[level]) return;
    const line = payload === undefined ? `[${name}] ${msg}` : `[${name}] ${msg} ${JSON.stringify(payload)}`;
    sink[at](line);
  };

  return {
    level,
    error: (msg, payload) => emit('error', msg, payload),
    warn: (msg, payload) => emit('warn', msg, payload),
    info: (msg, payload) => emit('info', msg, payload),
    debug: (msg, payload) => emit('debug', msg, payload),
  };
}
