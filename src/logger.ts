import { sanitizeForLog } from './validation.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogMeta = Record<string, unknown>;
export type LogSink = (line: string, level: LogLevel) => void;

export type LoggingOptions = {
  json?: boolean;
  level?: LogLevel;
  sink?: LogSink;
};

const levelPriority: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

const consoleSink: LogSink = (line, level) => {
  if (level === 'error' || level === 'warn') console.error(line);
  else console.log(line);
};

type Settings = { json: boolean; level: LogLevel; sink: LogSink };

export class Logger {
  constructor(
    readonly name: string,
    private readonly settings: () => Settings,
  ) {}

  private shouldLog(l: LogLevel) {
    return levelPriority[l] <= levelPriority[this.settings().level];
  }

  log(l: LogLevel, message: string, meta?: LogMeta) {
    if (!this.shouldLog(l)) return;
    const { json, sink } = this.settings();
    if (json) {
      const out = { ts: new Date().toISOString(), level: l, logger: this.name, message, ...meta };
      sink(JSON.stringify(out), l);
    } else {
      const metaStr = meta && Object.keys(meta).length ? ` ${sanitizeForLog(JSON.stringify(meta))}` : '';
      sink(`[${l.toUpperCase()}] [${this.name}] ${message}${metaStr}`, l);
    }
  }

  error(msg: string, meta?: LogMeta) { this.log('error', msg, meta); }
  warn(msg: string, meta?: LogMeta) { this.log('warn', msg, meta); }
  info(msg: string, meta?: LogMeta) { this.log('info', msg, meta); }
  debug(msg: string, meta?: LogMeta) { this.log('debug', msg, meta); }

  child(suffix: string): Logger {
    return new Logger(`${this.name}.${suffix}`, this.settings);
  }
}

let current: Settings = { json: false, level: 'info', sink: consoleSink };
let initialized = false;
const named = new Map<string, Logger>();

/**
 * Configures every logger handed out by {@link getLogger}. Entry points call
 * this once; later calls are ignored unless `force` is set.
 */
export function initLogging(opts: LoggingOptions = {}, force = false): void {
  if (initialized && !force) return;
  current = {
    json: !!opts.json,
    level: opts.level ?? 'info',
    sink: opts.sink ?? consoleSink,
  };
  initialized = true;
}

export function getLogger(name: string): Logger {
  let l = named.get(name);
  if (!l) {
    l = new Logger(name, () => current);
    named.set(name, l);
  }
  return l;
}

/** Standalone logger with its own settings, not affected by {@link initLogging}. */
export function createLogger(name: string, opts: LoggingOptions = {}): Logger {
  const settings: Settings = { json: !!opts.json, level: opts.level ?? 'info', sink: opts.sink ?? consoleSink };
  return new Logger(name, () => settings);
}

export function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelPriority, v);
}
