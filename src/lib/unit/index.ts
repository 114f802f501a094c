/**
 * Unit lifecycle and status reconciliation
 *
 * A unit declares its packages, services and required relations; the
 * framework keeps its lifecycle flags durable, drives pause/resume and
 * upgrade transitions, and reduces everything to one published status:
 * - Fixed status priority (upgrade, paused, relations, not started, checks, ready)
 * - Layered custom status checks and plugins
 * - Serialized event handling with a ULID per event
 *
 * @module unit
 */

// Core classes
export { BaseUnit } from './base-unit';
export type {
  UnitCollaborators,
  UnitPlugin,
  UnitPluginContext,
} from './base-unit';
export { ReconciliationDriver, isUnitEventName, toActionResult, UNIT_EVENT_NAMES } from './reconciliation-driver';
export {
  ReconciliationDriverEvents,
  type ReconciliationDriverEventMap,
  type ReconciliationDriverEventName,
  type ReconciliationDriverEmit,
} from './events';
export { CheckChain, type ChainVerdict, type BuiltInCheckName, type CheckChainOptions } from './check-chain';
export { UnitLifecycle, type UnitLifecycleOptions } from './unit-lifecycle';
export { LifecycleState, GENESIS_FLAGS } from './lifecycle-state';
export { ServiceRegistry } from './service-registry';
export { UnitConfig, readInstallSource, describeZodError } from './config';
export type { ConfigValues, InstallSource } from './config';

// Status
export {
  UPGRADE_IN_PROGRESS_MESSAGE,
  PAUSED_MESSAGE,
  MISSING_RELATIONS_PREFIX,
  NOT_STARTED_MESSAGE,
  READY_MESSAGE,
  activeStatus,
  waitingStatus,
  maintenanceStatus,
  blockedStatus,
  compareSeverity,
  mostSevere,
  isUnitSeverity,
  formatStatus,
} from './status';

// Adapters
export {
  SystemctlServiceController,
  type ServiceController,
} from './service-controller';
export {
  AptPackageInstaller,
  DEFAULT_KEYSERVER,
  type PackageInstaller,
} from './package-installer';
export {
  StaticRelationView,
  missingRelations,
  type RelationView,
} from './relations';
export {
  MemoryStatusPublisher,
  CommandStatusPublisher,
  type StatusPublisher,
} from './status-publisher';
export {
  MemoryStateStore,
  JsonFileStateStore,
  STATE_DOCUMENT_VERSION,
  type StateStore,
  type StoredState,
} from './state-store';
export {
  ExecFileCommandRunner,
  describeCommand,
  type CommandRunner,
  type CommandResult,
} from './command-runner';

// Types
export type {
  UnitSeverity,
  UnitStatus,
  CheckResult,
  StatusCheck,
  CheckLayer,
  RegisteredCheck,
  RegisterCheckOptions,
  LifecycleFlags,
  RestartMap,
  ServiceAction,
  ServiceActionResult,
  TransitionName,
  TransitionSkipReason,
  TransitionResult,
  UnitEventName,
  ActionEventName,
  ActionResult,
  DispatchResult,
  OptionalValue,
  UnitOptions,
  ReconciliationDriverOptions,
} from './types';

// Errors
export {
  InvalidUnitNameError,
  InvalidUnitOptionsError,
  InvalidCheckNameError,
  DuplicateCheckError,
  PackageInstallError,
  StateStoreError,
  UnknownEventError,
  unitErrPrefix,
  unitErrTypes,
  unitErrCodes,
} from './errors';
