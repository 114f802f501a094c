/**
 * Test units and in-process collaborators for unit, lifecycle and driver tests
 *
 * Nothing here touches the OS: services, packages, relations, state and the
 * published status are all simulated in memory.
 */

import { Logger } from '../logger';
import type { ArraySink } from '../logger/sinks';
import type {
  CheckResult,
  LifecycleFlags,
  ServiceAction,
  ServiceActionResult,
  UnitOptions,
} from './types';
import type { UnitCollaborators, UnitPlugin, UnitPluginContext } from './base-unit';
import { BaseUnit } from './base-unit';
import type { ServiceController } from './service-controller';
import type { PackageInstaller } from './package-installer';
import type { CommandResult, CommandRunner } from './command-runner';
import { describeCommand } from './command-runner';
import { StaticRelationView } from './relations';
import { MemoryStateStore } from './state-store';
import { StateStoreError } from './errors';
import { MemoryStatusPublisher } from './status-publisher';
import { UnitConfig } from './config';
import type { ConfigValues } from './config';
import { ReconciliationDriver } from './reconciliation-driver';
import { blockedStatus, maintenanceStatus } from './status';

/**
 * Records every call; services listed in `failing` fail to transition
 */
export class FakeServiceController implements ServiceController {
  public readonly calls: { action: ServiceAction; services: string[] }[] = [];
  public readonly failing = new Set<string>();

  public apply(
    action: ServiceAction,
    services: readonly string[],
  ): Promise<ServiceActionResult> {
    this.calls.push({ action, services: [...services] });

    return Promise.resolve({
      succeeded: services.filter((service) => !this.failing.has(service)),
      failed: services.filter((service) => this.failing.has(service)),
    });
  }
}

export type FakeInstallerStep = 'addSource' | 'update' | 'install';

/**
 * Records calls as readable strings, e.g. `install:keystone-common`
 */
export class FakePackageInstaller implements PackageInstaller {
  public readonly calls: string[] = [];
  public failOn: FakeInstallerStep | null = null;

  public addSource(source: string, key?: string): Promise<void> {
    return this.record('addSource', `addSource:${source}:${key ?? ''}`);
  }

  public update(): Promise<void> {
    return this.record('update', 'update');
  }

  public install(packages: readonly string[]): Promise<void> {
    return this.record('install', `install:${packages.join(',')}`);
  }

  private record(step: FakeInstallerStep, call: string): Promise<void> {
    this.calls.push(call);

    if (this.failOn === step) {
      return Promise.reject(new Error(`${step} failed`));
    }

    return Promise.resolve();
  }
}

/**
 * CommandRunner answering from a script keyed by the full command line.
 * Unscripted commands exit 0 with empty output.
 */
export class ScriptedCommandRunner implements CommandRunner {
  public readonly calls: string[] = [];
  private readonly script = new Map<string, CommandResult | Error>();

  public respond(commandLine: string, response: Partial<CommandResult> | Error): this {
    this.script.set(
      commandLine,
      response instanceof Error
        ? response
        : { exitCode: 0, stdout: '', stderr: '', ...response },
    );
    return this;
  }

  public run(command: string, args: readonly string[]): Promise<CommandResult> {
    const commandLine = describeCommand(command, args);
    this.calls.push(commandLine);

    const response = this.script.get(commandLine);

    if (response instanceof Error) {
      return Promise.reject(response);
    }

    return Promise.resolve(response ?? { exitCode: 0, stdout: '', stderr: '' });
  }
}

/**
 * MemoryStateStore whose saves can be made to fail
 */
export class FlakyStateStore extends MemoryStateStore {
  public failSaves = false;

  public save(flags: LifecycleFlags): Promise<void> {
    if (this.failSaves) {
      return Promise.reject(
        new StateStoreError('SaveFailed', { location: 'memory' }),
      );
    }

    return super.save(flags);
  }
}

export const TEST_RESTART_MAP: Record<string, string[]> = {
  f1: ['apache2'],
  f2: ['apache2', 'ks-api'],
  f3: [],
};

export const TEST_CONFIG_OPTIONS = [
  'source',
  'key',
  'custom-check-fail',
  'plugin-check-fail',
];

/**
 * Unit with an API-service shape: one package, a database relation and two
 * services. `custom-check-fail` makes its own check report maintenance.
 */
export class TestApiUnit extends BaseUnit {
  public customCheckRuns = 0;

  constructor(
    logger: Logger,
    collaborators: UnitCollaborators,
    options: Partial<UnitOptions> = {},
  ) {
    super(
      logger,
      {
        name: 'test-api',
        packages: ['keystone-common'],
        requiredRelations: ['shared-db'],
        restartMap: TEST_RESTART_MAP,
        ...options,
      },
      collaborators,
    );

    this.registerStatusCheck('custom-check', () => this.customCheck());
  }

  private customCheck(): CheckResult {
    this.customCheckRuns++;

    return this.config.get('custom-check-fail') === true
      ? maintenanceStatus('Custom check failed')
      : null;
  }
}

/**
 * Plugin whose check blocks when `plugin-check-fail` is set
 */
export class TestPlugin implements UnitPlugin {
  public readonly name = 'test-plugin';

  public setup(context: UnitPluginContext): void {
    context.registerStatusCheck('plugin-check', () =>
      context.config.get('plugin-check-fail') === true
        ? blockedStatus('Plugin Custom check failed')
        : null,
    );
  }
}

export interface TestUnitHarness {
  logger: Logger;
  arraySink: ArraySink;
  unit: TestApiUnit;
  config: UnitConfig;
  relations: StaticRelationView;
  stateStore: FlakyStateStore;
  serviceController: FakeServiceController;
  packageInstaller: FakePackageInstaller;
  publisher: MemoryStatusPublisher;
  driver: ReconciliationDriver;
}

/**
 * Wire a TestApiUnit (with TestPlugin) to in-memory collaborators and a driver
 */
export function createTestUnit(
  options: {
    config?: ConfigValues;
    relations?: Record<string, number>;
    unitOptions?: Partial<UnitOptions>;
  } = {},
): TestUnitHarness {
  const { logger, arraySink } = Logger.createTestOptimizedLogger();

  const config = new UnitConfig(options.config ?? {}, TEST_CONFIG_OPTIONS);
  const relations = new StaticRelationView(options.relations ?? {});
  const stateStore = new FlakyStateStore();
  const serviceController = new FakeServiceController();
  const packageInstaller = new FakePackageInstaller();
  const publisher = new MemoryStatusPublisher();

  const unit = new TestApiUnit(
    logger,
    { serviceController, packageInstaller, relations, stateStore, config },
    options.unitOptions,
  ).use(new TestPlugin());

  const driver = new ReconciliationDriver(unit, publisher, { logger });

  return {
    logger,
    arraySink,
    unit,
    config,
    relations,
    stateStore,
    serviceController,
    packageInstaller,
    publisher,
    driver,
  };
}
