type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
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
   * Wraps methods so that calls below `minLevel` are dropped.
   */
  static withMinLevel(methods: LoggerMethods, minLevel: LogLevel): Logger {
    const threshold = LOG_LEVEL_ORDER[minLevel];
    const pick = (level: LogLevel): LogFn =>
      LOG_LEVEL_ORDER[level] >= threshold ? methods[level] : noop;

    return new Logger({
      debug: pick('debug'),
      info: pick('info'),
      warn: pick('warn'),
      error: pick('error'),
    });
  }

  /**
   * Logger that discards everything
   */
  static silent(): Logger {
    return new Logger({ debug: noop, info: noop, warn: noop, error: noop });
  }
}

export { Logger, LOG_LEVEL_ORDER };
export type { LoggerMethods, LogFn, LogLevel };
