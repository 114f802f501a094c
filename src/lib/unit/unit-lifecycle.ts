import type { LoggerService } from '../logger/logger-service';
import type {
  LifecycleFlags,
  ServiceAction,
  ServiceActionResult,
  TransitionName,
  TransitionResult,
  TransitionSkipReason,
} from './types';
import type { LifecycleState } from './lifecycle-state';
import type { ServiceRegistry } from './service-registry';
import type { ServiceController } from './service-controller';
import type { PackageInstaller } from './package-installer';
import type { UnitConfig } from './config';
import { readInstallSource } from './config';
import { PackageInstallError } from './errors';

export interface UnitLifecycleOptions {
  state: LifecycleState;
  registry: ServiceRegistry;
  serviceController: ServiceController;
  packageInstaller: PackageInstaller;
  config: UnitConfig;
  packages: readonly string[];
  logger: LoggerService;
  resumeServicesAfterUpgrade?: boolean;
}

const NO_SERVICES: ServiceActionResult = { succeeded: [], failed: [] };

/**
 * Lifecycle transitions of a unit.
 *
 * Each transition runs its side effect first and then saves the flags once.
 * Transitions must not overlap; ReconciliationDriver serializes them.
 */
export class UnitLifecycle {
  private readonly state: LifecycleState;
  private readonly registry: ServiceRegistry;
  private readonly serviceController: ServiceController;
  private readonly packageInstaller: PackageInstaller;
  private readonly config: UnitConfig;
  private readonly packages: readonly string[];
  private readonly logger: LoggerService;
  private readonly resumeServicesAfterUpgrade: boolean;

  constructor(options: UnitLifecycleOptions) {
    this.state = options.state;
    this.registry = options.registry;
    this.serviceController = options.serviceController;
    this.packageInstaller = options.packageInstaller;
    this.config = options.config;
    this.packages = [...options.packages];
    this.logger = options.logger;
    this.resumeServicesAfterUpgrade = options.resumeServicesAfterUpgrade ?? false;
  }

  /**
   * Install the declared packages and mark the unit started.
   *
   * Runs at most once per unit: when already started nothing is installed
   * again, so a redelivered install event is harmless.
   *
   * @throws {PackageInstallError} If a package step fails; `isStarted` stays false
   */
  public async install(): Promise<TransitionResult> {
    if (this.state.isStarted) {
      this.logger.info('Install skipped, unit already started');
      return this.result('install', NO_SERVICES, this.state.snapshot(), 'already-started');
    }

    const source = readInstallSource(this.config);

    if (source.state === 'invalid') {
      throw new PackageInstallError(
        { step: 'add-source', packages: [...this.packages] },
        new Error(source.reason),
      );
    }

    if (source.state === 'valid') {
      this.logger.info('Adding package source {{source}} (key: {{key}})', {
        params: { source: source.value.source, key: source.value.key ?? 'none' },
        redactedKeys: source.value.key ? ['key'] : [],
      });
      await this.installStep('add-source', () =>
        this.packageInstaller.addSource(source.value.source, source.value.key),
      );
    }

    await this.installStep('update', () => this.packageInstaller.update());

    this.logger.info('Installing packages: {{packages}}', {
      params: { packages: this.packages.length > 0 ? this.packages : 'none' },
    });
    await this.installStep('install', () =>
      this.packageInstaller.install(this.packages),
    );

    const flags = await this.state.update({ isStarted: true });
    this.logger.success('Install complete');

    return this.result('install', NO_SERVICES, flags);
  }

  /**
   * Stop the payload services and mark the unit paused.
   *
   * Best effort: the unit is marked paused even when some services failed to
   * stop; they are reported in `failedServices`.
   */
  public async pause(): Promise<TransitionResult> {
    const services = await this.applyToServices('pause');
    const flags = await this.saveAfterServices('pause', services, { isPaused: true });

    return this.result('pause', services, flags);
  }

  /**
   * Start the payload services and clear the paused flag, whatever failed
   */
  public async resume(): Promise<TransitionResult> {
    const services = await this.applyToServices('resume');
    const flags = await this.saveAfterServices('resume', services, {
      isPaused: false,
    });

    return this.result('resume', services, flags);
  }

  /**
   * Open the upgrade window. Services are stopped through the pause
   * machinery unless the unit is already paused.
   */
  public async beginUpgrade(): Promise<TransitionResult> {
    const alreadyPaused = this.state.isPaused;
    const services = alreadyPaused
      ? NO_SERVICES
      : await this.applyToServices('pause');

    const flags = await this.saveAfterServices('begin-upgrade', services, {
      isPaused: true,
      seriesUpgrade: true,
    });
    this.logger.notice('Upgrade window opened');

    return this.result(
      'begin-upgrade',
      services,
      flags,
      alreadyPaused ? 'already-paused' : undefined,
    );
  }

  /**
   * Close the upgrade window and clear the paused flag.
   *
   * Services are left stopped unless `resumeServicesAfterUpgrade` is set; an
   * operator resumes them once the unit is ready for the new release.
   */
  public async endUpgrade(): Promise<TransitionResult> {
    const services = this.resumeServicesAfterUpgrade
      ? await this.applyToServices('resume')
      : NO_SERVICES;

    const flags = await this.saveAfterServices('end-upgrade', services, {
      isPaused: false,
      seriesUpgrade: false,
    });
    this.logger.notice('Upgrade window closed');

    return this.result('end-upgrade', services, flags);
  }

  private async applyToServices(
    action: ServiceAction,
  ): Promise<ServiceActionResult> {
    const services = this.registry.services();
    const result = await this.serviceController.apply(action, services);

    if (result.failed.length > 0) {
      this.logger.warn('Failed to {{action}} services: {{failed}}', {
        params: { action, failed: result.failed },
      });
    } else {
      this.logger.info('{{action}}: {{count}} services', {
        params: {
          action: action === 'pause' ? 'Paused' : 'Resumed',
          count: result.succeeded.length,
        },
      });
    }

    return result;
  }

  /**
   * Persist flags after services were touched. On failure the service
   * outcome is logged before the error propagates.
   */
  private async saveAfterServices(
    transition: TransitionName,
    services: ServiceActionResult,
    patch: Partial<LifecycleFlags>,
  ): Promise<Readonly<LifecycleFlags>> {
    try {
      return await this.state.update(patch);
    } catch (error) {
      this.logger.error(
        'Lifecycle state not saved after {{transition}}; succeeded: {{succeeded}}; failed: {{failed}}',
        {
          params: {
            transition,
            succeeded: services.succeeded.length > 0 ? services.succeeded : 'none',
            failed: services.failed.length > 0 ? services.failed : 'none',
          },
        },
      );
      throw error;
    }
  }

  private async installStep(
    step: 'add-source' | 'update' | 'install',
    run: () => Promise<void>,
  ): Promise<void> {
    try {
      await run();
    } catch (error) {
      throw new PackageInstallError(
        { step, packages: [...this.packages] },
        error,
      );
    }
  }

  private result(
    transition: TransitionName,
    services: ServiceActionResult,
    flags: Readonly<LifecycleFlags>,
    skipped?: TransitionSkipReason,
  ): TransitionResult {
    return {
      transition,
      success: services.failed.length === 0,
      skipped,
      succeededServices: [...services.succeeded],
      failedServices: [...services.failed],
      flags: { ...flags },
    };
  }
}
