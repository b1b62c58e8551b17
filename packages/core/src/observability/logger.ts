/**
 * Structured JSON logger.
 *
 * Every log line is valid JSON with consistent fields for filtering.
 * By default errors go to stderr and everything else to stdout; command-line
 * tools that print their result on stdout switch the whole stream to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogDestination = 'split' | 'stderr';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  segment?: string;
  configPath?: string;
  durationMs?: number;
  field?: string;
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

const envLevel = process.env.LOG_LEVEL;
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
let destination: LogDestination = 'split';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function setLogDestination(next: LogDestination): void {
  destination = next;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

function emit(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'error' || destination === 'stderr') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function log(level: LogLevel, message: string, fields?: Partial<LogEntry>): void {
  if (!shouldLog(level)) return;
  emit({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...fields,
  });
}

/** Error fields for a log entry, keeping the `code` of AppError-like errors. */
export function errorFields(err: unknown): NonNullable<LogEntry['error']> {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { code, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}

export const logger = {
  debug: (message: string, fields?: Partial<LogEntry>) => log('debug', message, fields),
  info: (message: string, fields?: Partial<LogEntry>) => log('info', message, fields),
  warn: (message: string, fields?: Partial<LogEntry>) => log('warn', message, fields),
  error: (message: string, fields?: Partial<LogEntry>) => log('error', message, fields),
};
