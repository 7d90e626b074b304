import { CFG } from '../config.js';

interface LogLevel {
  ERROR: 0;
  WARN: 1;
  INFO: 2;
  DEBUG: 3;
}

export type LogLevelName = keyof LogLevel;
export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  message: string;
  meta?: LogMeta;
}

const LOG_LEVELS: LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3
};

const CONSOLE_METHOD: Record<LogLevelName, 'error' | 'warn' | 'log'> = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'log',
  DEBUG: 'log'
};

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function formatEntry(entry: LogEntry): string {
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}`;
}

export class Logger {
  private level: number;

  constructor(level: LogLevelName = 'INFO') {
    this.level = LOG_LEVELS[level];
  }

  setLevel(level: LogLevelName) {
    this.level = LOG_LEVELS[level];
  }

  isEnabled(level: LogLevelName): boolean {
    return LOG_LEVELS[level] <= this.level;
  }

  private log(level: LogLevelName, message: string, meta?: LogMeta) {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, meta };
    // looked up per call so console can be swapped out
    console[CONSOLE_METHOD[level]](formatEntry(entry), entry.meta ?? '');
  }

  error(message: string, meta?: LogMeta) {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    this.log('DEBUG', message, meta);
  }
}

const envLevel = CFG.logLevel.toUpperCase();

export const logger = new Logger(isLogLevelName(envLevel) ? envLevel : 'INFO');
