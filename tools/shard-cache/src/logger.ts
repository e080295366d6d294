export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export type Logger = Record<LogLevel, (message: string, context?: LogContext) => void>;

export interface LoggerOptions {
  /** Show debug lines. */
  verbose?: boolean;
  /** Tag written after the level, e.g. "shard-cache". */
  prefix?: string;
}

/**
 * Injectable dependencies for createLogger.
 * Defaults to real implementations; tests can override.
 */
export interface LoggerDeps {
  writeStderr: (data: string) => void;
  now: () => Date;
}

const defaultDeps: LoggerDeps = {
  writeStderr: (data) => {
    process.stderr.write(data);
  },
  now: () => new Date(),
};

/** `[2026-01-01T00:00:00.000Z] [WARN] [prefix] message {"key":"value"}` */
export function formatLogLine(
  timestamp: Date,
  level: LogLevel,
  message: string,
  context?: LogContext,
  prefix?: string,
): string {
  const parts = [`[${timestamp.toISOString()}]`, `[${level.toUpperCase()}]`];
  if (prefix) parts.push(`[${prefix}]`);
  parts.push(message);
  if (context !== undefined && Object.keys(context).length > 0) {
    parts.push(JSON.stringify(context));
  }
  return parts.join(' ') + '\n';
}

/**
 * Logger writing one line per call to stderr; stdout stays free for command
 * output. Debug lines are dropped unless `verbose` is set.
 */
export function createLogger(options: LoggerOptions = {}, deps: Partial<LoggerDeps> = {}): Logger {
  const { writeStderr, now } = { ...defaultDeps, ...deps };
  const { verbose = false, prefix } = options;

  const emit = (level: LogLevel) => (message: string, context?: LogContext): void => {
    if (level === 'debug' && !verbose) return;
    writeStderr(formatLogLine(now(), level, message, context, prefix));
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

/** Logger that drops everything; the default for library components. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
