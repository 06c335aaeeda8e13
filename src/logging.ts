export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

export type Logger = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Default logger of a document: drops every entry. */
export const silentLogger: Logger = () => {};

/**
 * Logger writing `[timestamp] [level] event` lines to the console, skipping
 * entries below `minLevel`.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  return (entry: LogEntry) => {
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minLevel]) return;
    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
    console.log(`${prefix} ${entry.event}`, entry.data ?? '');
  };
}

export function log(logger: Logger, level: LogLevel, event: string, data?: Record<string, unknown>): void {
  logger({ timestamp: Date.now(), level, event, data });
}
