/**
 * Structured JSON logger for diagnostics
 *
 * Log format:
 * { timestamp, level, event, template, pattern, ... }
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  template?: string;
  pattern?: string;
  path?: string;
  attempt?: number;
  count?: number;
  message?: string;
  error?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  info(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  warn(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  error(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a structured JSON logger
 * @param output Write function (default: stderr, so stdout stays clean for tables)
 * @param minLevel Minimum log level to output
 */
export function createLogger(
  output: (line: string) => void = (line) => process.stderr.write(line + '\n'),
  minLevel: LogLevel = 'info'
): Logger {
  const log = (level: LogLevel, entry: Omit<LogEntry, 'timestamp' | 'level'>) => {
    if (LEVELS[level] < LEVELS[minLevel]) return;

    const fullEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...entry,
    };

    output(JSON.stringify(fullEntry));
  };

  return {
    debug: (entry) => log('debug', entry),
    info: (entry) => log('info', entry),
    warn: (entry) => log('warn', entry),
    error: (entry) => log('error', entry),
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVELS, value);
}
