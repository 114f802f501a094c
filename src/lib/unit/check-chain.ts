import { KEBAB_CASE_REGEX } from '../constants';
import type {
  CheckLayer,
  LifecycleFlags,
  RegisterCheckOptions,
  RegisteredCheck,
  StatusCheck,
  UnitStatus,
} from './types';
import type { RelationView } from './relations';
import { missingRelations } from './relations';
import { DuplicateCheckError, InvalidCheckNameError } from './errors';
import {
  MISSING_RELATIONS_PREFIX,
  NOT_STARTED_MESSAGE,
  PAUSED_MESSAGE,
  READY_MESSAGE,
  UPGRADE_IN_PROGRESS_MESSAGE,
  activeStatus,
  blockedStatus,
  maintenanceStatus,
  waitingStatus,
} from './status';

const LAYER_ORDER: readonly CheckLayer[] = ['framework', 'unit', 'plugin'];

/**
 * Names of the built-in steps, reported as `decidedBy`
 */
export type BuiltInCheckName =
  | 'series-upgrade'
  | 'paused'
  | 'required-relations'
  | 'not-started'
  | 'ready';

export interface ChainVerdict {
  status: UnitStatus;

  /** Built-in step or custom check name that produced the status */
  decidedBy: BuiltInCheckName | string;
}

export interface CheckChainOptions {
  requiredRelations: readonly string[];
  relations: RelationView;
}

/**
 * Resolves the unit status from lifecycle flags, relations and custom checks.
 *
 * Evaluated top to bottom, first match wins:
 * 1. upgrade in progress -> blocked
 * 2. paused -> maintenance
 * 3. required relations without remote units -> blocked, listing them
 * 4. not started -> waiting
 * 5. custom checks by layer (framework, unit, plugin), then registration
 *    order; the first non-active verdict wins
 * 6. active, "Unit is ready"
 *
 * Errors thrown by a custom check are not caught here; they reject
 * `evaluate()`. Checks own their failure handling.
 */
export class CheckChain {
  private readonly requiredRelations: readonly string[];
  private readonly relations: RelationView;
  private registrations: RegisteredCheck[] = [];

  constructor(options: CheckChainOptions) {
    this.requiredRelations = [...options.requiredRelations];
    this.relations = options.relations;
  }

  /**
   * Append a custom check to its layer
   *
   * @throws {InvalidCheckNameError} If name is not kebab-case
   * @throws {DuplicateCheckError} If a check with that name is registered
   */
  public register(
    name: string,
    check: StatusCheck,
    options: RegisterCheckOptions = {},
  ): void {
    if (!KEBAB_CASE_REGEX.test(name)) {
      throw new InvalidCheckNameError({ name });
    }

    if (this.registrations.some((registration) => registration.name === name)) {
      throw new DuplicateCheckError({ name });
    }

    this.registrations.push({ name, check, layer: options.layer ?? 'unit' });
  }

  /**
   * @returns true if a check was removed
   */
  public unregister(name: string): boolean {
    const before = this.registrations.length;
    this.registrations = this.registrations.filter(
      (registration) => registration.name !== name,
    );
    return this.registrations.length !== before;
  }

  /**
   * Registered checks in evaluation order
   */
  public checks(): RegisteredCheck[] {
    return LAYER_ORDER.flatMap((layer) =>
      this.registrations.filter((registration) => registration.layer === layer),
    );
  }

  public async evaluate(state: Readonly<LifecycleFlags>): Promise<UnitStatus> {
    const verdict = await this.resolve(state);
    return verdict.status;
  }

  /**
   * Like evaluate(), but also reports which step decided
   */
  public async resolve(state: Readonly<LifecycleFlags>): Promise<ChainVerdict> {
    if (state.seriesUpgrade) {
      return {
        status: blockedStatus(UPGRADE_IN_PROGRESS_MESSAGE),
        decidedBy: 'series-upgrade',
      };
    }

    if (state.isPaused) {
      return { status: maintenanceStatus(PAUSED_MESSAGE), decidedBy: 'paused' };
    }

    const missing = missingRelations(this.requiredRelations, this.relations);
    if (missing.length > 0) {
      return {
        status: blockedStatus(MISSING_RELATIONS_PREFIX + missing.join(', ')),
        decidedBy: 'required-relations',
      };
    }

    if (!state.isStarted) {
      return {
        status: waitingStatus(NOT_STARTED_MESSAGE),
        decidedBy: 'not-started',
      };
    }

    for (const { name, check } of this.checks()) {
      const result = await check();

      if (result && result.severity !== 'active') {
        return { status: { ...result }, decidedBy: name };
      }
    }

    return { status: activeStatus(READY_MESSAGE), decidedBy: 'ready' };
  }
}
