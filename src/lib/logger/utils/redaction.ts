import datamask from 'datamask';
import type { RedactFunction } from '../types';

export const REDACTED_VALUE = '***REDACTED***';

/**
 * Default redaction: strings are masked with datamask, anything else is
 * replaced by REDACTED_VALUE
 */
export const defaultRedactFunction: RedactFunction = (
  _keyName: string,
  value: unknown,
): unknown => {
  if (typeof value === 'string') {
    return datamask.string(value, '*', 60);
  }

  return REDACTED_VALUE;
};

function redactPath(
  target: Record<string, unknown>,
  parts: string[],
  fullKey: string,
  redact: RedactFunction,
): void {
  const [head, ...rest] = parts;

  if (head === undefined || !(head in target)) {
    return;
  }

  if (rest.length === 0) {
    target[head] = redact(fullKey, target[head]);
    return;
  }

  const next = target[head];
  if (typeof next === 'object' && next !== null && !Array.isArray(next)) {
    // Copy each level we descend into so the caller's params stay untouched
    const copy: Record<string, unknown> = { ...next };
    target[head] = copy;
    redactPath(copy, rest, fullKey, redact);
  }
}

/**
 * Apply redaction to params based on redacted keys.
 * Supports top-level keys and dot paths (e.g. `source.key`).
 *
 * @returns A new object; `params` is not mutated
 */
export function applyRedaction(
  params: Record<string, unknown>,
  redactedKeys?: string[],
  redactFunction?: RedactFunction,
): Record<string, unknown> {
  if (!redactedKeys || redactedKeys.length === 0) {
    return params;
  }

  const redact = redactFunction ?? defaultRedactFunction;
  const redacted = { ...params };

  for (const key of redactedKeys) {
    redactPath(redacted, key.split('.'), key, redact);
  }

  return redacted;
}
