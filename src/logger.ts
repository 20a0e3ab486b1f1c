/**
 * Module logger
 *
 *   const log = Logger.create('TrailBuffer');
 *   log.debug('Trail capacity clamped');
 *   log.warn('hueMax out of range, using default');
 *
 * Every entry lands in an in-memory ring; console output is gated by the
 * level threshold, and DEBUG only prints for modules passed to
 * `Logger.enable`. Initial settings come from WAVEFIELD_LOG_LEVEL and
 * WAVEFIELD_DEBUG (comma-separated module names, or '*').
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
  stack?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 };

const BUFFER_SIZE = 500;

const CONSOLE_METHOD: Record<LogLevel, 'debug' | 'info' | 'warn' | 'error'> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
};

const buffer: LogEntry[] = [];
let threshold: LogLevel = 'WARN';
let debugModules: string[] = [];

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function parseModules(list: string): string[] {
  return list.split(',').map(m => m.trim()).filter(m => m.length > 0);
}

if (typeof process !== 'undefined' && process.env) {
  const level = process.env.WAVEFIELD_LOG_LEVEL?.toUpperCase();
  if (level && isLogLevel(level)) threshold = level;
  if (process.env.WAVEFIELD_DEBUG) debugModules = parseModules(process.env.WAVEFIELD_DEBUG);
}

function debugEnabled(module: string): boolean {
  const name = module.toLowerCase();
  return debugModules.some(pattern => pattern === '*' || name.includes(pattern.toLowerCase()));
}

export class ModuleLogger {
  constructor(private readonly module: string) {}

  debug(message: string, data?: unknown): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown): void {
    this.log('ERROR', message, error);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: this.module,
      message,
    };
    if (data instanceof Error) {
      entry.data = { name: data.name, message: data.message };
      entry.stack = data.stack;
    } else if (data !== undefined) {
      entry.data = data;
    }

    buffer.push(entry);
    if (buffer.length > BUFFER_SIZE) buffer.shift();

    const visible = level === 'DEBUG'
      ? debugEnabled(this.module)
      : level === 'ERROR' || LEVEL_RANK[level] >= LEVEL_RANK[threshold];
    if (!visible) return;

    const prefix = `[${this.module}]`;
    if (data === undefined) console[CONSOLE_METHOD[level]](prefix, message);
    else console[CONSOLE_METHOD[level]](prefix, message, data);
  }
}

export const Logger = {
  create(module: string): ModuleLogger {
    return new ModuleLogger(module);
  },

  /** Print DEBUG output for comma-separated modules, or '*' for all */
  enable(modules: string = '*'): void {
    debugModules = parseModules(modules);
  },

  disable(): void {
    debugModules = [];
  },

  setLevel(level: LogLevel): void {
    threshold = level;
  },

  getLevel(): LogLevel {
    return threshold;
  },

  /** Buffered entries, optionally only those at or above a level */
  getBuffer(minLevel?: LogLevel): LogEntry[] {
    if (!minLevel) return [...buffer];
    return buffer.filter(e => LEVEL_RANK[e.level] >= LEVEL_RANK[minLevel]);
  },

  clear(): void {
    buffer.length = 0;
  },
};
