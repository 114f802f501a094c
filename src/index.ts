// module entry point

// Units - Full export from unit module
export * from './lib/unit/index';

// Logging
export {
  Logger,
  LogLevel,
  ArraySink,
  ConsoleSink,
  type LoggerService,
  type LogEntry,
  type LogSink,
  type LogType,
  type LogOptions,
  type LoggerOptions,
} from './lib/logger/index';

// ID Helpers
export { generateEventID, isEventID } from './lib/id-helpers';

// Event handling
export { EventEmitter, EventEmitterProtected } from './lib/event-emitter';

// Utility functions
export { isPromise } from './lib/is-promise';
export { errorToString } from './lib/error-to-string';
