// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Logger
// Log lines travel as `robot:log` events; the console only sees them in debug
// ═══════════════════════════════════════════════════════════════════════════════

import { eventBus, EventBus } from './event-bus/EventBus';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  source: string;
  level: LogLevel;
  message: string;
  timestamp: number;
}

export interface Logger {
  readonly source: string;
  /** Bus the entries go to; domain events from the same owner go there too */
  readonly bus: EventBus;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(suffix: string): Logger;
}

export interface LoggerOptions {
  debug?: boolean;
  bus?: EventBus;
}

export function createLogger(source: string, options: LoggerOptions = {}): Logger {
  const debug = options.debug ?? false;
  const bus = options.bus ?? eventBus;

  const log = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !debug) return;

    const entry: LogEntry = { source, level, message, timestamp: Date.now() };
    bus.emit('robot:log', entry, source);

    if (debug) {
      console.log(`[${source}] ${level.toUpperCase()}: ${message}`);
    }
  };

  return {
    source,
    bus,
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
    child: (suffix) => createLogger(`${source}:${suffix}`, { debug, bus }),
  };
}
