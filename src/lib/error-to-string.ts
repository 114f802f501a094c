import { EOL, INDENT } from './constants';

function safeStringify(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'function':
      return '[Function]';
    case 'symbol':
      return value.toString();
    default:
      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Render an error as `Key: value` lines.
 *
 * Understands the `errPrefix` / `errType` / `errCode` / `additionalInfo`
 * convention used by this package's errors, masks `sensitiveFieldNames`, and
 * follows `cause` chains (indented).
 */
export function errorToString(error: unknown): string {
  return errorToLines(error, '').join(EOL);
}

function errorToLines(error: unknown, indent: string): string[] {
  if (!isRecord(error)) {
    return [`${indent}Value: ${safeStringify(error)}`];
  }

  const lines: string[] = [];
  const add = (key: string, value: unknown): void => {
    if (value !== undefined && value !== null && value !== '') {
      lines.push(`${indent}${key}: ${safeStringify(value)}`);
    }
  };

  add('Message', error['message']);
  add('Name', error['name']);
  add('Code', error['code']);
  add('Prefix', error['errPrefix']);
  add('errType', error['errType']);
  add('errCode', error['errCode']);

  const additionalInfo = error['additionalInfo'];
  if (isRecord(additionalInfo)) {
    const sensitive = error['sensitiveFieldNames'];
    const sensitiveFieldNames = Array.isArray(sensitive) ? sensitive : [];

    for (const [key, value] of Object.entries(additionalInfo)) {
      add(
        `AdditionalInfo.${key}`,
        sensitiveFieldNames.includes(key) ? '***' : value,
      );
    }
  }

  const cause = error['cause'];
  if (cause !== undefined) {
    lines.push(`${indent}Cause:`);
    lines.push(...errorToLines(cause, indent + INDENT));
  }

  add('Stack', error['stack']);

  return lines;
}
