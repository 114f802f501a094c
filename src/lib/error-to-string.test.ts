import { describe, expect, test } from 'vitest';
import { errorToString } from './error-to-string';

class TokenLookupError extends Error {
  public errPrefix = 'TestErr';
  public errType = 'Lookup';
  public errCode = 'TokenMissing';
  public additionalInfo: Record<string, unknown>;
  public sensitiveFieldNames = ['token'];

  constructor(additionalInfo: { token: string; relation: string }) {
    super('Token not found');
    this.name = 'TokenLookupError';
    this.additionalInfo = additionalInfo;
  }
}

describe('errorToString', () => {
  test('should list the conventional error fields in order', () => {
    const error = new TokenLookupError({
      token: 'test-secret',
      relation: 'shared-db',
    });
    error.stack = undefined;

    expect(errorToString(error)).toBe(
      [
        'Message: Token not found',
        'Name: TokenLookupError',
        'Prefix: TestErr',
        'errType: Lookup',
        'errCode: TokenMissing',
        'AdditionalInfo.token: ***',
        'AdditionalInfo.relation: shared-db',
      ].join('\n'),
    );
  });

  test('should indent the cause chain', () => {
    const cause = new Error('exit status 100');
    cause.stack = undefined;
    const error = new Error('apt-get install failed', { cause });
    error.stack = undefined;

    expect(errorToString(error)).toBe(
      [
        'Message: apt-get install failed',
        'Name: Error',
        'Cause:',
        '    Message: exit status 100',
        '    Name: Error',
      ].join('\n'),
    );
  });

  test('should render non-object values', () => {
    expect(errorToString('plain failure')).toBe('Value: plain failure');
    expect(errorToString(undefined)).toBe('Value: undefined');
  });

  test('should stringify structured additional info', () => {
    const error = {
      message: 'Services failed',
      additionalInfo: { failed: ['apache2', 'ks-api'] },
    };

    expect(errorToString(error)).toBe(
      [
        'Message: Services failed',
        'AdditionalInfo.failed: ["apache2","ks-api"]',
      ].join('\n'),
    );
  });
});
