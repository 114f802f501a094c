import { describe, expect, test, beforeEach } from 'vitest';
import { createTestUnit } from './test-units';
import type { TestUnitHarness } from './test-units';
import { PackageInstallError, StateStoreError } from './errors';
import { defaultRedactFunction } from '../logger/utils/redaction';

describe('UnitLifecycle', () => {
  let harness: TestUnitHarness;

  beforeEach(async () => {
    harness = createTestUnit({ relations: { 'shared-db': 1 } });
    await harness.unit.begin();
  });

  describe('install', () => {
    test('should update, install the declared packages and mark the unit started', async () => {
      const result = await harness.unit.lifecycle.install();

      expect(harness.packageInstaller.calls).toEqual([
        'update',
        'install:keystone-common',
      ]);
      expect(result).toEqual({
        transition: 'install',
        success: true,
        skipped: undefined,
        succeededServices: [],
        failedServices: [],
        flags: { isStarted: true, isPaused: false, seriesUpgrade: false },
      });
      expect(harness.stateStore.saveCount).toBe(1);
    });

    test('should add the configured source with its key first', async () => {
      harness.config.update({ source: 'cloud:test-pocket', key: 'test-secret' });

      await harness.unit.lifecycle.install();

      expect(harness.packageInstaller.calls).toEqual([
        'addSource:cloud:test-pocket:test-secret',
        'update',
        'install:keystone-common',
      ]);
    });

    test('should never log the source key in clear', async () => {
      harness.config.update({ source: 'cloud:test-pocket', key: 'test-secret' });

      await harness.unit.lifecycle.install();

      expect(harness.arraySink.getSnapshotFriendlyLogs()).toEqual([
        `info: Adding package source cloud:test-pocket (key: ${String(
          defaultRedactFunction('key', 'test-secret'),
        )})`,
        'info: Installing packages: keystone-common',
        'success: Install complete',
      ]);
      expect(harness.arraySink.logs[0]?.serviceName).toBe(
        'unit:test-api:lifecycle',
      );
    });

    test('should skip every installer step when already started', async () => {
      await harness.unit.lifecycle.install();
      harness.packageInstaller.calls.length = 0;

      const result = await harness.unit.lifecycle.install();

      expect(harness.packageInstaller.calls).toEqual([]);
      expect(result.skipped).toBe('already-started');
      expect(result.flags.isStarted).toBe(true);
      expect(harness.stateStore.saveCount).toBe(1);
    });

    test('should throw PackageInstallError and stay not started when a step fails', async () => {
      harness.packageInstaller.failOn = 'install';

      const error = await harness.unit.lifecycle.install().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PackageInstallError);
      if (!(error instanceof PackageInstallError)) {
        return;
      }
      expect(error.message).toBe('Package install step failed: install failed');
      expect(error.additionalInfo).toEqual({
        step: 'install',
        packages: ['keystone-common'],
      });
      expect(harness.unit.state.isStarted).toBe(false);
      expect(harness.stateStore.saveCount).toBe(0);
    });

    test('should report the update step when the index refresh fails', async () => {
      harness.packageInstaller.failOn = 'update';

      await expect(harness.unit.lifecycle.install()).rejects.toThrow(
        'Package update step failed: update failed',
      );
      expect(harness.packageInstaller.calls).toEqual(['update']);
    });

    test('should reject an invalid source before calling the installer', async () => {
      harness.config.update({ source: 42 });

      await expect(harness.unit.lifecycle.install()).rejects.toThrow(
        'Package add-source step failed: source: Expected string, received number',
      );
      expect(harness.packageInstaller.calls).toEqual([]);
    });

    test('should retry from the beginning after a failed install', async () => {
      harness.packageInstaller.failOn = 'install';
      await expect(harness.unit.lifecycle.install()).rejects.toThrow(
        PackageInstallError,
      );

      harness.packageInstaller.failOn = null;
      const result = await harness.unit.lifecycle.install();

      expect(result.flags.isStarted).toBe(true);
      expect(harness.packageInstaller.calls).toEqual([
        'update',
        'install:keystone-common',
        'update',
        'install:keystone-common',
      ]);
    });
  });

  describe('pause and resume', () => {
    test('should stop every managed service and set isPaused', async () => {
      const result = await harness.unit.lifecycle.pause();

      expect(harness.serviceController.calls).toEqual([
        { action: 'pause', services: ['apache2', 'ks-api'] },
      ]);
      expect(result).toEqual({
        transition: 'pause',
        success: true,
        skipped: undefined,
        succeededServices: ['apache2', 'ks-api'],
        failedServices: [],
        flags: { isStarted: false, isPaused: true, seriesUpgrade: false },
      });
    });

    test('should set isPaused even when a service fails to stop', async () => {
      harness.serviceController.failing.add('ks-api');

      const result = await harness.unit.lifecycle.pause();

      expect(result.success).toBe(false);
      expect(result.succeededServices).toEqual(['apache2']);
      expect(result.failedServices).toEqual(['ks-api']);
      expect(harness.unit.state.isPaused).toBe(true);
      expect(harness.arraySink.getSnapshotFriendlyLogs()).toEqual([
        'warn: Failed to pause services: ks-api',
      ]);
    });

    test('should start every managed service and clear isPaused', async () => {
      await harness.unit.lifecycle.pause();

      const result = await harness.unit.lifecycle.resume();

      expect(harness.serviceController.calls[1]).toEqual({
        action: 'resume',
        services: ['apache2', 'ks-api'],
      });
      expect(result.flags.isPaused).toBe(false);
      expect(harness.arraySink.getSnapshotFriendlyLogs()).toEqual([
        'info: Paused: 2 services',
        'info: Resumed: 2 services',
      ]);
    });

    test('should clear isPaused even when every service fails to start', async () => {
      await harness.unit.lifecycle.pause();
      harness.serviceController.failing.add('apache2').add('ks-api');

      const result = await harness.unit.lifecycle.resume();

      expect(result.failedServices).toEqual(['apache2', 'ks-api']);
      expect(harness.unit.state.isPaused).toBe(false);
    });

    test('should save the flags once per transition', async () => {
      await harness.unit.lifecycle.pause();
      await harness.unit.lifecycle.resume();

      expect(harness.stateStore.saveCount).toBe(2);
    });
  });

  describe('state save failures', () => {
    test('should log the service outcome before rejecting', async () => {
      harness.serviceController.failing.add('ks-api');
      harness.stateStore.failSaves = true;

      await expect(harness.unit.lifecycle.pause()).rejects.toThrow(StateStoreError);

      expect(harness.arraySink.getSnapshotFriendlyLogs()).toEqual([
        'warn: Failed to pause services: ks-api',
        'error: Lifecycle state not saved after pause; succeeded: apache2; failed: ks-api',
      ]);
      expect(harness.unit.state.isPaused).toBe(false);
    });

    test('should report when no service failed', async () => {
      harness.stateStore.failSaves = true;

      await expect(harness.unit.lifecycle.beginUpgrade()).rejects.toThrow(
        'Failed to save lifecycle state at "memory"',
      );

      expect(harness.arraySink.getSnapshotFriendlyLogs().at(-1)).toBe(
        'error: Lifecycle state not saved after begin-upgrade; succeeded: apache2, ks-api; failed: none',
      );
    });
  });

  describe('upgrade window', () => {
    test('should stop services and set both flags when the window opens', async () => {
      const result = await harness.unit.lifecycle.beginUpgrade();

      expect(harness.serviceController.calls).toEqual([
        { action: 'pause', services: ['apache2', 'ks-api'] },
      ]);
      expect(result.transition).toBe('begin-upgrade');
      expect(result.skipped).toBeUndefined();
      expect(result.flags).toEqual({
        isStarted: false,
        isPaused: true,
        seriesUpgrade: true,
      });
    });

    test('should not stop services twice when already paused', async () => {
      await harness.unit.lifecycle.pause();

      const result = await harness.unit.lifecycle.beginUpgrade();

      expect(harness.serviceController.calls).toHaveLength(1);
      expect(result.skipped).toBe('already-paused');
      expect(result.succeededServices).toEqual([]);
      expect(result.flags.seriesUpgrade).toBe(true);
    });

    test('should clear both flags without resuming services when the window closes', async () => {
      await harness.unit.lifecycle.beginUpgrade();

      const result = await harness.unit.lifecycle.endUpgrade();

      expect(harness.serviceController.calls).toHaveLength(1);
      expect(result.flags).toEqual({
        isStarted: false,
        isPaused: false,
        seriesUpgrade: false,
      });
      expect(harness.arraySink.getSnapshotFriendlyLogs()).toEqual([
        'info: Paused: 2 services',
        'notice: Upgrade window opened',
        'notice: Upgrade window closed',
      ]);
    });

    test('should resume services when resumeServicesAfterUpgrade is set', async () => {
      const resuming = createTestUnit({
        unitOptions: { resumeServicesAfterUpgrade: true },
      });
      await resuming.unit.begin();
      await resuming.unit.lifecycle.beginUpgrade();

      const result = await resuming.unit.lifecycle.endUpgrade();

      expect(resuming.serviceController.calls).toEqual([
        { action: 'pause', services: ['apache2', 'ks-api'] },
        { action: 'resume', services: ['apache2', 'ks-api'] },
      ]);
      expect(result.succeededServices).toEqual(['apache2', 'ks-api']);
    });
  });
});
