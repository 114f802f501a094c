import { EventEmitterProtected } from '../event-emitter';
import { isPromise } from '../is-promise';
import type {
  LogEntry,
  LogSink,
  LogType,
  LoggerEventMap,
  LoggerOptions,
  LogOptions,
  RedactFunction,
  SinkErrorHandler,
} from './types';
import type { HandleLogOptions } from './internal-types';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import { applyRedaction } from './utils/redaction';
import { prepareErrorObjectLog } from './utils/error-object';
import { formatTemplate } from './utils/template';
import { LoggerService } from './logger-service';

/**
 * Main Logger class with sink-based architecture
 *
 * Every entry is fanned out to all sinks. A failing sink never breaks the
 * caller: the failure goes to `onSinkError`, or to `console.error` when no
 * handler was given.
 */
export class Logger extends EventEmitterProtected<LoggerEventMap> {
  private sinks: LogSink[];
  private redactFunction?: RedactFunction;
  private onSinkError?: SinkErrorHandler;
  private entityName?: string;
  private _closed = false;

  constructor(options: LoggerOptions = {}) {
    super();

    this.sinks = options.sinks ?? [];
    this.redactFunction = options.redactFunction;
    this.onSinkError = options.onSinkError;
    this.entityName = options.entityName?.trim() || undefined;
  }

  public get closed(): boolean {
    return this._closed;
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  /**
   * Log an error object with optional prefix
   */
  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    const message = prepareErrorObjectLog(prefix, error);

    this.handleLog('error', message, { ...options, error });
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Log a raw message without any formatting
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  /**
   * Create a scoped logger with a service name
   */
  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * Returns true if the sink was found and removed
   */
  public removeSink(sink: LogSink): boolean {
    const index = this.sinks.indexOf(sink);
    if (index !== -1) {
      this.sinks.splice(index, 1);
      return true;
    }
    return false;
  }

  public getSinks(): readonly LogSink[] {
    return [...this.sinks];
  }

  /**
   * Close all sinks. After closing, further log calls are dropped.
   */
  public async close(): Promise<void> {
    this._closed = true;

    await Promise.all(
      this.sinks.map(async (sink) => {
        if (sink.close) {
          try {
            await sink.close();
          } catch (error) {
            this.handleSinkError(error, 'close', sink);
          }
        }
      }),
    );

    this.sinks = [];

    this.emit('close', undefined);
  }

  /**
   * Create a logger optimized for testing, with an ArraySink for inspecting
   * entries and an optional (muted by default) ConsoleSink.
   */
  public static createTestOptimizedLogger(options?: {
    sinks?: LogSink[];
    entityName?: string;
    includeConsoleSink?: boolean;
    muteConsole?: boolean;
  }): { logger: Logger; arraySink: ArraySink; consoleSink?: ConsoleSink } {
    const arraySink = new ArraySink();

    const consoleSink = options?.includeConsoleSink
      ? new ConsoleSink({ muted: options.muteConsole ?? true })
      : undefined;

    const sinks: LogSink[] = [arraySink];

    if (consoleSink) {
      sinks.push(consoleSink);
    }

    sinks.push(...(options?.sinks ?? []));

    return {
      logger: new Logger({ sinks, entityName: options?.entityName }),
      arraySink,
      consoleSink,
    };
  }

  protected handleLog(
    type: LogType,
    template: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const timestamp = Date.now();
    const params = options?.params;
    const redactedKeys = options?.redactedKeys;
    const tags = options?.tags;

    // Messages are rendered from the redacted params so secrets never reach a sink
    const redactedParams = params
      ? applyRedaction(params, redactedKeys, this.redactFunction)
      : undefined;
    const message = redactedParams
      ? formatTemplate(template, redactedParams)
      : template;

    const entry: LogEntry = {
      timestamp,
      type,
      serviceName: options?.serviceName?.trim() || undefined,
      entityName: this.entityName,
      template,
      message,
      params,
      redactedParams,
      redactedKeys:
        params && redactedKeys && redactedKeys.length > 0
          ? redactedKeys
          : undefined,
      error: options?.error,
      tags: tags && tags.length > 0 ? tags : undefined,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);
        if (isPromise(result)) {
          result.catch((error: unknown) => {
            this.handleSinkError(error, 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(error, 'write', sink);
      }
    }

    this.emit('log', { logType: type, message, timestamp });
  }

  private handleSinkError(
    error: unknown,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    const description = error instanceof Error ? error.message : String(error);

    if (this.onSinkError) {
      try {
        this.onSinkError(error, context, sink);
      } catch {
        // The handler itself failed; report once and stop here to avoid loops
        // eslint-disable-next-line no-console
        console.error(`Error in onSinkError handler: ${description}`);
      }
    } else {
      // eslint-disable-next-line no-console
      console.error(
        `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${description}`,
      );
    }
  }
}

export * from './types';
export * from './sinks';
export type { LoggerService } from './logger-service';
