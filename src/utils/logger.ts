/**
 * Lightweight component logger
 *
 * Every module creates its own logger with `createLogger('Component')`.
 * Output is gated by a single global level (default: warn). Debug mode
 * opens every level and can be switched on with NALU_DEBUG=1.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A single log record handed to the active sink
 */
export interface LogEntry {
  level: LogLevel;
  component: string;
  message: string;
  context?: Record<string, unknown>;
  /** Milliseconds since epoch */
  timestamp: number;
}

export type LogSink = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const envDebug = process.env.NALU_DEBUG;
let debugMode = envDebug === '1' || envDebug === 'true';
let minLevel: LogLevel = 'warn';

const consoleSink: LogSink = (entry) => {
  const line = `[nalu:${entry.component}] ${entry.message}`;
  const write = console[entry.level];
  if (entry.context) {
    write(line, entry.context);
  } else {
    write(line);
  }
};

let sink: LogSink = consoleSink;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export function isDebugMode(): boolean {
  return debugMode;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/**
 * Replace the output sink. Pass null to restore console output.
 */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

export class Logger {
  constructor(readonly component: string) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Whether an entry at this level would currently be emitted
   */
  isEnabled(level: LogLevel): boolean {
    return debugMode || LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    sink({
      level,
      component: this.component,
      message,
      context,
      timestamp: Date.now(),
    });
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
