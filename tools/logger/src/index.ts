type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

interface CreateLoggerOptions {
  /**
   * Minimum level that is emitted (default: 'info')
   */
  level?: LogLevel;

  /**
   * Sink receiving the emitted calls (default: console)
   */
  sink?: LoggerMethods;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }

  /**
   * Logger that drops everything, for callers that do not care about output.
   */
  static silent(): Logger {
    return new Logger({ debug: noop, info: noop, warn: noop, error: noop });
  }
}

/**
 * Build a Logger that forwards calls at or above `level` to `sink`.
 */
function createLogger(options: CreateLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? console;

  const gate = (level: Exclude<LogLevel, 'silent'>): LogFn =>
    LEVEL_ORDER[level] >= threshold
      ? (...args: unknown[]) => sink[level](...args)
      : noop;

  return new Logger({
    debug: gate('debug'),
    info: gate('info'),
    warn: gate('warn'),
    error: gate('error'),
  });
}

/**
 * Parse a level name from configuration, falling back to `fallback`.
 */
function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = 'info',
): LogLevel {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return normalized;
    default:
      return fallback;
  }
}

export { Logger, createLogger, parseLogLevel };
export type { CreateLoggerOptions, LoggerMethods, LogFn, LogLevel };
