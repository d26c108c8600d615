// Logging for mutations and queries

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogData = Record<string, unknown>;

/**
 * Where the access manager reports rejected and applied mutations, cascade
 * summaries and, when enabled, query answers.
 */
export type AccessLogger = {
  [Level in LogLevel]: (message: string, data?: LogData) => void;
};

const consoleWriters: { [Level in LogLevel]: (...args: unknown[]) => void } = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function toConsole(level: LogLevel) {
  const tag = `[${level.toUpperCase()}]`;
  return (message: string, data?: LogData) => consoleWriters[level](`${tag} ${message}`, data ?? '');
}

/**
 * Writes each line to the console method of its level, tagged `[LEVEL]`.
 */
export const consoleLogger: AccessLogger = {
  debug: toConsole('debug'),
  info: toConsole('info'),
  warn: toConsole('warn'),
  error: toConsole('error'),
};

// Used when the manager is built without a logger.
export const silentLogger: AccessLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
  timestamp: string;
};

/**
 * Keeps every line in `entries`, oldest first. Tests assert on it in place
 * of console output.
 */
export function createCapturingLogger(): AccessLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, data?: LogData) => {
    entries.push({ level, message, data, timestamp: new Date().toISOString() });
  };

  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}
