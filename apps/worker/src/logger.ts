export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export type LogEntry = {
  level: LogLevel;
  scope: string;
  message: string;
  fields: LogFields;
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === 'string') {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  return String(value);
}

// `retention: pruned kept=12 dropped=3 cutoff=...`
export function formatLogLine(scope: string, message: string, fields: LogFields = {}): string {
  const parts = [scope ? `${scope}: ${message}` : message];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(' ');
}

type Sink = (entry: LogEntry) => void;

function createLogger(scope: string, minLevel: LogLevel, sink: Sink): Logger {
  const emit = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
    sink({ level, scope, message, fields: fields ?? {} });
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    child: (childScope) =>
      createLogger(scope ? `${scope}.${childScope}` : childScope, minLevel, sink),
  };
}

export function createConsoleLogger(opts: { scope?: string; level?: LogLevel } = {}): Logger {
  return createLogger(opts.scope ?? '', opts.level ?? 'info', (entry) => {
    const line = formatLogLine(entry.scope, entry.message, entry.fields);
    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  });
}

/** Collects entries in memory; used by tests to assert on what a component reported. */
export function createMemoryLogger(opts: { scope?: string; level?: LogLevel } = {}): {
  logger: Logger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = createLogger(opts.scope ?? '', opts.level ?? 'debug', (entry) => {
    entries.push(entry);
  });
  return { logger, entries };
}
