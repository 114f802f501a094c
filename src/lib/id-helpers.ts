import { ulid } from 'ulid';

// Crockford base32, 26 characters
const ULID_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/i;

/**
 * Generate an event ID (ULID). IDs sort by creation time, so dispatch order
 * can be read straight off a log.
 *
 * @param seedTime - Optional timestamp in milliseconds to seed the ID with
 * @throws {TypeError} If `seedTime` is not a non-negative finite number
 */
export function generateEventID(seedTime?: number): string {
  if (seedTime !== undefined && (!Number.isFinite(seedTime) || seedTime < 0)) {
    throw new TypeError(
      `seedTime must be a non-negative finite number (milliseconds), got: ${seedTime}`,
    );
  }

  return seedTime !== undefined ? ulid(seedTime) : ulid();
}

export function isEventID(id: unknown): id is string {
  return typeof id === 'string' && ULID_REGEX.test(id);
}
