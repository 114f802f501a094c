import type { UnitSeverity, UnitStatus } from './types';

export const UPGRADE_IN_PROGRESS_MESSAGE =
  'Ready for do-release-upgrade and reboot. Set complete when finished.';
export const PAUSED_MESSAGE =
  "Paused. Use 'resume' action to resume normal service.";
export const MISSING_RELATIONS_PREFIX = 'Missing relations: ';
export const NOT_STARTED_MESSAGE = 'Unit configuration in progress';
export const READY_MESSAGE = 'Unit is ready';

const SEVERITY_ORDER: readonly UnitSeverity[] = [
  'active',
  'waiting',
  'maintenance',
  'blocked',
];

export function isUnitSeverity(value: unknown): value is UnitSeverity {
  return SEVERITY_ORDER.some((severity) => severity === value);
}

/**
 * Negative when `a` is less severe than `b`, zero when equal, positive otherwise
 */
export function compareSeverity(a: UnitSeverity, b: UnitSeverity): number {
  return SEVERITY_ORDER.indexOf(a) - SEVERITY_ORDER.indexOf(b);
}

/**
 * The most severe of the given statuses; the first one wins a tie.
 * Returns null for an empty list.
 */
export function mostSevere(statuses: readonly UnitStatus[]): UnitStatus | null {
  let worst: UnitStatus | null = null;

  for (const status of statuses) {
    if (!worst || compareSeverity(status.severity, worst.severity) > 0) {
      worst = status;
    }
  }

  return worst;
}

export const activeStatus = (message: string = ''): UnitStatus => ({
  severity: 'active',
  message,
});

export const waitingStatus = (message: string): UnitStatus => ({
  severity: 'waiting',
  message,
});

export const maintenanceStatus = (message: string): UnitStatus => ({
  severity: 'maintenance',
  message,
});

export const blockedStatus = (message: string): UnitStatus => ({
  severity: 'blocked',
  message,
});

export function formatStatus(status: UnitStatus): string {
  return status.message.length > 0
    ? `${status.severity}: ${status.message}`
    : status.severity;
}
