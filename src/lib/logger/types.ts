/**
 * Log level enum for filtering logs by severity
 * Lower numbers = more important/higher priority
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2, // Normal but significant condition
  INFO = 3,
  DEBUG = 4,
  RAW = 99,
}

export type LogType =
  | 'error'
  | 'info'
  | 'warn'
  | 'success'
  | 'notice'
  | 'debug'
  | 'raw';

/**
 * Maps a LogType to its corresponding LogLevel
 */
export function getLogLevel(type: LogType): LogLevel {
  switch (type) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'notice':
      return LogLevel.NOTICE;
    case 'success':
    case 'info':
      // success is routine operational info
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    case 'raw':
      return LogLevel.RAW;
  }
}

/**
 * Options for log methods
 */
export interface LogOptions {
  params?: Record<string, unknown>;
  tags?: string[];
  redactedKeys?: string[];
}

/**
 * Complete log entry that gets passed to sinks
 */
export interface LogEntry {
  timestamp: number;
  type: LogType;
  serviceName?: string; // Service name (if using service logger)
  entityName?: string; // Unit the entry belongs to, e.g. 'keystone-0'
  template: string; // Original template: "Paused {{count}} services"
  message: string; // Computed: "Paused 2 services"
  params?: Record<string, unknown>; // Raw params
  redactedParams?: Record<string, unknown>; // Params with redactedKeys masked
  redactedKeys?: string[];
  error?: unknown; // Original error object from errorObject() calls
  tags?: string[];
}

/**
 * Sink interface - all sinks must implement this
 */
export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

export type RedactFunction = (keyName: string, value: unknown) => unknown;

/**
 * Receives a log entry and returns either a transformed entry or false to keep the original.
 */
export type ArrayLogTransformer = (entry: LogEntry) => LogEntry | false;

export type SinkErrorHandler = (
  error: unknown,
  context: 'write' | 'close',
  sink: LogSink,
) => void;

export interface LoggerOptions {
  sinks?: LogSink[];
  redactFunction?: RedactFunction;
  onSinkError?: SinkErrorHandler;

  /** Stamped on every entry, e.g. the unit name */
  entityName?: string;
}

export interface LoggerEventMap {
  log: {
    logType: LogType;
    message: string;
    timestamp: number;
  };
  close: undefined;
}
