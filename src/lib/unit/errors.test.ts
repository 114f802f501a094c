import { describe, expect, test } from 'vitest';
import {
  PackageInstallError,
  StateStoreError,
  UnknownEventError,
  unitErrCodes,
  unitErrPrefix,
  unitErrTypes,
} from './errors';
import { errorToString } from '../error-to-string';

describe('unit errors', () => {
  test('should carry prefix, type and code', () => {
    const error = new UnknownEventError({ event: 'reboot' });

    expect(error.errPrefix).toBe(unitErrPrefix);
    expect(error.errType).toBe(unitErrTypes.Event);
    expect(error.errCode).toBe(unitErrCodes.Unknown);
    expect(error.name).toBe('UnknownEventError');
  });

  test('should include the cause message in PackageInstallError', () => {
    const cause = new Error('apt-get exited with 100');
    const error = new PackageInstallError(
      { step: 'install', packages: ['keystone-common'] },
      cause,
    );

    expect(error.message).toBe('Package install step failed: apt-get exited with 100');
    expect(error.cause).toBe(cause);
  });

  test('should describe StateStoreError by operation', () => {
    const error = new StateStoreError('SaveFailed', { location: '/var/lib/unit/state.json' });

    expect(error.message).toBe(
      'Failed to save lifecycle state at "/var/lib/unit/state.json"',
    );
    expect(error.cause).toBeUndefined();
  });

  test('should render through errorToString with its details', () => {
    const rendered = errorToString(new UnknownEventError({ event: 'reboot' }));

    expect(rendered.split('\n').slice(0, 6)).toEqual([
      'Message: Unknown unit event: "reboot"',
      'Name: UnknownEventError',
      'Prefix: UnitErr',
      'errType: Event',
      'errCode: Unknown',
      'AdditionalInfo.event: reboot',
    ]);
  });
});
