import type { LogType, LogOptions } from './types';
import type { HandleLog } from './internal-types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * LoggerService for scoped logging with service names
 */
export class LoggerService {
  private handleLog: HandleLog;
  private serviceName: string;

  constructor(handleLog: HandleLog, serviceName: string) {
    this.handleLog = handleLog;
    this.serviceName = serviceName;
  }

  public get name(): string {
    return this.serviceName;
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
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

    this.handleLog('error', message, {
      ...options,
      serviceName: this.serviceName,
      error,
    });
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  /**
   * Create a nested scope, e.g. `unit:keystone` -> `unit:keystone:driver`
   */
  public child(name: string): LoggerService {
    return new LoggerService(this.handleLog, `${this.serviceName}:${name}`);
  }

  private log(type: LogType, message: string, options?: LogOptions): void {
    this.handleLog(type, message, {
      ...options,
      serviceName: this.serviceName,
    });
  }
}
