/**
 * Internal types used by Logger and LoggerService
 * These are not part of the public API
 */

import type { LogOptions, LogType } from './types';

export interface HandleLogOptions extends LogOptions {
  serviceName?: string;
  error?: unknown;
}

export type HandleLog = (
  type: LogType,
  template: string,
  options?: HandleLogOptions,
) => void;
