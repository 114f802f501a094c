import type { Logger } from '../logger';

/**
 * Externally visible severity of a unit, least to most severe:
 * active < waiting < maintenance < blocked
 */
export type UnitSeverity = 'active' | 'waiting' | 'maintenance' | 'blocked';

/**
 * A verdict: what the unit reports to the outside world
 */
export interface UnitStatus {
  severity: UnitSeverity;
  message: string;
}

/**
 * Result of a status check. `null` means "no opinion".
 */
export type CheckResult = UnitStatus | null;

/**
 * A zero-argument status check.
 *
 * Contract:
 * - return `null` (no opinion) or a verdict; an `active` verdict lets the
 *   chain move on to the next check
 * - convert domain failures (e.g. invalid configuration) into a `blocked`
 *   verdict instead of throwing; a thrown error is not caught by the chain
 * - never mutate lifecycle state
 */
export type StatusCheck = () => CheckResult | Promise<CheckResult>;

/**
 * Where a check was registered. Layers are evaluated in this order:
 * framework checks, then the concrete unit's checks, then plugin checks.
 */
export type CheckLayer = 'framework' | 'unit' | 'plugin';

export interface RegisteredCheck {
  name: string;
  layer: CheckLayer;
  check: StatusCheck;
}

export interface RegisterCheckOptions {
  /** default: 'unit' */
  layer?: CheckLayer;
}

/**
 * Durable lifecycle flags, all false at unit genesis
 */
export interface LifecycleFlags {
  /** Install-time setup has completed */
  isStarted: boolean;

  /** Payload services are administratively paused */
  isPaused: boolean;

  /** An OS-release upgrade window is open */
  seriesUpgrade: boolean;
}

/**
 * Config file path -> services restarted when that file changes
 */
export type RestartMap = Readonly<Record<string, readonly string[]>>;

export type ServiceAction = 'pause' | 'resume';

export interface ServiceActionResult {
  succeeded: string[];
  failed: string[];
}

export type TransitionName =
  | 'install'
  | 'pause'
  | 'resume'
  | 'begin-upgrade'
  | 'end-upgrade';

export type TransitionSkipReason = 'already-started' | 'already-paused';

/**
 * Outcome of a lifecycle transition
 */
export interface TransitionResult {
  transition: TransitionName;

  /** False when any service failed to pause/resume */
  success: boolean;

  /** Set when the side effect was not run (the flags may still change) */
  skipped?: TransitionSkipReason;

  succeededServices: string[];
  failedServices: string[];

  /** Flags after the transition was saved */
  flags: LifecycleFlags;
}

/**
 * Inbound events delivered by the hosting runtime, one at a time
 */
export type UnitEventName =
  | 'install'
  | 'update_status'
  | 'pre_series_upgrade'
  | 'post_series_upgrade'
  | 'pause_action'
  | 'resume_action';

export type ActionEventName = Extract<
  UnitEventName,
  'pause_action' | 'resume_action'
>;

/**
 * Operator-facing result of an action, separate from the unit status
 */
export interface ActionResult {
  success: boolean;
  message: string;
  failedServices: string[];
}

export interface DispatchResult {
  eventID: string;
  event: UnitEventName;
  transition: TransitionResult | null;
  status: UnitStatus;

  /** Only set for action events */
  action: ActionResult | null;
}

/**
 * Three-way result of reading an optional setting
 */
export type OptionalValue<T> =
  | { state: 'absent' }
  | { state: 'valid'; value: T }
  | { state: 'invalid'; reason: string };

/**
 * Static declaration of a unit, passed to BaseUnit
 */
export interface UnitOptions {
  /** Unit name (kebab-case), used for logging */
  name: string;

  /** Packages installed by the install transition (default: []) */
  packages?: string[];

  /** Relations that need at least one remote unit (default: []) */
  requiredRelations?: string[];

  /** Config file -> services map (default: {}) */
  restartMap?: Record<string, string[]>;

  /**
   * Resume payload services when the upgrade window closes (default: false).
   * Off by default because a unit may need extra steps before its services
   * can run on the new release.
   */
  resumeServicesAfterUpgrade?: boolean;
}

export interface ReconciliationDriverOptions {
  logger: Logger;

  /** Service name for the driver's logger (default: 'reconciliation-driver') */
  name?: string;
}
