// ============================================================================
// @odlkit/core - Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels for odlkit. `silent` suppresses everything.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Current log level (controlled by ODLKIT_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Initialize log level from environment.
 */
function initLevel(): void {
  const setting = process.env.ODLKIT_DEBUG;
  if (setting === '1' || setting === 'true') {
    currentLevel = 'debug';
  } else if (setting === 'warn' || setting === 'error' || setting === 'silent') {
    currentLevel = setting;
  } else {
    currentLevel = 'info';
  }
}

initLevel();

function shouldLog(level: LogEntry['level']): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
}

function log(level: LogEntry['level'], message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[odlkit] ${level.toUpperCase()}: ${message}${dataStr}`;

  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
      console.info(msg);
      break;
    case 'warn':
      console.warn(msg);
      break;
    case 'error':
      console.error(msg);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[odlkit] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging (most verbose).
 * Only logs when ODLKIT_DEBUG=1 is set or the level was lowered.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Measures how long an operation took and reports it at debug level.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /**
   * End the timer and log the result.
   */
  end(): number {
    return this.endWith({});
  }

  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Event Callbacks
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns the unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => {
    callbacks.delete(callback);
  };
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log an encode call that stopped at a failing statement.
 */
export function logEncodeFailure(dialect: string, err: unknown): void {
  debug(`encode (${dialect}) aborted`, {
    dialect,
    error: err instanceof Error ? `${err.name}: ${err.message}` : String(err),
  });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
