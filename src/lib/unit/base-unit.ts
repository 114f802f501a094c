import { z } from 'zod';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { KEBAB_CASE_REGEX } from '../constants';
import type {
  CheckLayer,
  LifecycleFlags,
  StatusCheck,
  UnitOptions,
} from './types';
import type { ChainVerdict } from './check-chain';
import { CheckChain } from './check-chain';
import type { RelationView } from './relations';
import type { StateStore } from './state-store';
import type { ServiceController } from './service-controller';
import type { PackageInstaller } from './package-installer';
import { UnitConfig } from './config';
import { LifecycleState } from './lifecycle-state';
import { ServiceRegistry } from './service-registry';
import { UnitLifecycle } from './unit-lifecycle';
import { InvalidUnitNameError, InvalidUnitOptionsError } from './errors';

const unitOptionsSchema = z.object({
  name: z.string(),
  packages: z.array(z.string().min(1)).default([]),
  requiredRelations: z.array(z.string().min(1)).default([]),
  restartMap: z.record(z.array(z.string().min(1))).default({}),
  resumeServicesAfterUpgrade: z.boolean().default(false),
});

/**
 * Services the unit talks to. All of them are injected so a unit can run
 * against in-process fakes.
 */
export interface UnitCollaborators {
  serviceController: ServiceController;
  packageInstaller: PackageInstaller;
  relations: RelationView;
  stateStore: StateStore;

  /** Runtime configuration (default: empty) */
  config?: UnitConfig;
}

/**
 * What a plugin sees while it sets itself up
 */
export interface UnitPluginContext {
  unitName: string;
  config: UnitConfig;
  logger: LoggerService;

  /** Register a check on the plugin layer */
  registerStatusCheck(name: string, check: StatusCheck): void;
}

/**
 * Reusable bundle of status checks, added with `unit.use(plugin)`
 */
export interface UnitPlugin {
  readonly name: string;
  setup(context: UnitPluginContext): void;
}

/**
 * Base class for managed units
 *
 * A concrete unit declares its packages, required relations and restart map
 * and registers its own status checks. Everything else (flags, transitions,
 * status priority) is inherited unchanged.
 *
 * @example
 * ```typescript
 * class KeystoneUnit extends BaseUnit {
 *   constructor(logger: Logger, collaborators: UnitCollaborators) {
 *     super(
 *       logger,
 *       {
 *         name: 'keystone',
 *         packages: ['keystone-common'],
 *         requiredRelations: ['shared-db'],
 *         restartMap: { '/etc/keystone/keystone.conf': ['apache2'] },
 *       },
 *       collaborators,
 *     );
 *
 *     this.registerStatusCheck('token-provider', () => this.checkTokenProvider());
 *   }
 *
 *   private checkTokenProvider(): CheckResult {
 *     const provider = this.config.read('token-provider', z.enum(['fernet']));
 *     return provider.state === 'invalid'
 *       ? blockedStatus(`Invalid configuration: ${provider.reason}`)
 *       : null;
 *   }
 * }
 * ```
 */
export abstract class BaseUnit {
  public readonly name: string;
  public readonly packages: readonly string[];
  public readonly requiredRelations: readonly string[];

  public readonly registry: ServiceRegistry;
  public readonly state: LifecycleState;
  public readonly lifecycle: UnitLifecycle;
  public readonly chain: CheckChain;

  /** Unit logger (scoped to `unit:<name>`) */
  protected readonly logger: LoggerService;
  protected readonly config: UnitConfig;

  private readonly pluginNames: string[] = [];

  /**
   * @throws {InvalidUnitNameError} If name is not kebab-case
   * @throws {InvalidUnitOptionsError} If the declaration is malformed
   */
  constructor(
    rootLogger: Logger,
    options: UnitOptions,
    collaborators: UnitCollaborators,
  ) {
    if (!KEBAB_CASE_REGEX.test(options.name)) {
      throw new InvalidUnitNameError({ name: options.name });
    }

    const parsed = unitOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new InvalidUnitOptionsError({
        name: options.name,
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`,
        ),
      });
    }

    const declaration = parsed.data;

    this.name = declaration.name;
    this.packages = declaration.packages;
    this.requiredRelations = declaration.requiredRelations;
    this.logger = rootLogger.service(`unit:${this.name}`);
    this.config = collaborators.config ?? new UnitConfig();

    this.registry = new ServiceRegistry(declaration.restartMap);
    this.state = new LifecycleState(collaborators.stateStore);
    this.chain = new CheckChain({
      requiredRelations: declaration.requiredRelations,
      relations: collaborators.relations,
    });
    this.lifecycle = new UnitLifecycle({
      state: this.state,
      registry: this.registry,
      serviceController: collaborators.serviceController,
      packageInstaller: collaborators.packageInstaller,
      config: this.config,
      packages: declaration.packages,
      logger: this.logger.child('lifecycle'),
      resumeServicesAfterUpgrade: declaration.resumeServicesAfterUpgrade,
    });
  }

  /**
   * Load durable state. Must run before the first transition; the driver
   * calls it on its first dispatch.
   */
  public async begin(): Promise<Readonly<LifecycleFlags>> {
    return this.state.load();
  }

  /**
   * Managed services, in restart-map order
   */
  public services(): string[] {
    return this.registry.services();
  }

  public getConfig(): UnitConfig {
    return this.config;
  }

  /**
   * Add a plugin; its checks run after the unit's own checks
   */
  public use(plugin: UnitPlugin): this {
    plugin.setup({
      unitName: this.name,
      config: this.config,
      logger: this.logger.child(plugin.name),
      registerStatusCheck: (name, check) => {
        this.chain.register(name, check, { layer: 'plugin' });
      },
    });

    this.pluginNames.push(plugin.name);
    return this;
  }

  public getPluginNames(): string[] {
    return [...this.pluginNames];
  }

  public evaluateStatus(): Promise<ChainVerdict> {
    return this.chain.resolve(this.state.snapshot());
  }

  /**
   * Register a custom check. Subclasses call this from their constructor;
   * intermediate base classes shared by several units pass `'framework'`.
   */
  protected registerStatusCheck(
    name: string,
    check: StatusCheck,
    layer: Exclude<CheckLayer, 'plugin'> = 'unit',
  ): void {
    this.chain.register(name, check, { layer });
  }
}
