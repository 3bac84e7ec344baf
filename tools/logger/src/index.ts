type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

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
}

interface CreateLoggerOptions {
  /** Lowest level that is written (default: 'info') */
  level?: LogLevel;
  /** Destination for formatted lines (default: console) */
  sink?: LoggerMethods;
  /** Timestamp source, overridable in tests */
  now?: () => Date;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Builds a Logger that drops messages below `level` and prefixes each
 * line with an ISO timestamp and the level name.
 */
function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { level = 'info', sink = console, now = () => new Date() } = options;
  const threshold = LOG_LEVELS.indexOf(level);

  const methodFor = (method: LogLevel): LogFn => {
    if (LOG_LEVELS.indexOf(method) < threshold) {
      return () => {};
    }
    return (...args: unknown[]) => {
      const message = args.map(formatArg).join(' ');
      sink[method](
        `${now().toISOString()} ${method.toUpperCase().padEnd(5)} ${message}`,
      );
    };
  };

  return new Logger({
    debug: methodFor('debug'),
    info: methodFor('info'),
    warn: methodFor('warn'),
    error: methodFor('error'),
  });
}

export { Logger, createLogger, isLogLevel, LOG_LEVELS };
export type { CreateLoggerOptions, LoggerMethods, LogFn, LogLevel };
