/**
 * Structured JSON-lines logger.
 *
 * Every entry goes to stderr: stdout belongs to the stdio JSON-RPC stream.
 */

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogContext = Record<string, unknown>;

interface LogEntry {
  '@timestamp': string;
  level: LogLevel;
  service: string;
  message: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Reduce an unknown thrown value to something JSON.stringify keeps.
 */
export function serializeError(err: unknown): { message: string; name?: string } {
  if (err instanceof Error) {
    return { message: err.message, name: err.name };
  }
  return { message: String(err) };
}

function normalizeContext(context: LogContext | undefined): LogContext {
  if (!context) {return {};}
  const normalized: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    normalized[key] = value instanceof Error ? serializeError(value) : value;
  }
  return normalized;
}

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const minLevel = LOG_LEVELS[level];
  const write = options.write ?? ((line: string) => { process.stderr.write(`${line}\n`); });

  function log(entryLevel: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[entryLevel] < minLevel) {return;}

    const entry: LogEntry = {
      '@timestamp': new Date().toISOString(),
      level: entryLevel,
      service,
      message,
      ...normalizeContext(context),
    };

    write(JSON.stringify(entry));
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (scope) => createLogger(`${service}:${scope}`, { level, write }),
  };
}

/** Logger that drops everything; for tests and embedding. */
export const silentLogger: Logger = createLogger('silent', { write: () => undefined });
