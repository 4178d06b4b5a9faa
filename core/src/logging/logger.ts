export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, v);
}

export function createLogger(opts: { level?: LogLevel; sink?: LogSink } = {}): Logger {
  const min = LEVELS[opts.level ?? 'info'];
  const sink = opts.sink ?? console;
  const enabled = (level: LogLevel) => LEVELS[level] >= min;

  return {
    debug: (...args: unknown[]) => {
      if (enabled('debug')) sink.debug(...args);
    },
    info: (...args: unknown[]) => {
      if (enabled('info')) sink.log(...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) sink.warn(...args);
    },
    error: (...args: unknown[]) => {
      if (enabled('error')) sink.error(...args);
    },
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
