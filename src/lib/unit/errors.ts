/**
 * Error thrown when a unit name doesn't match kebab-case validation
 *
 * Valid names: 'keystone', 'ceph-client', 'api-gateway-v2'
 */
export class InvalidUnitNameError extends Error {
  public errPrefix = 'UnitErr';
  public errType = 'Unit';
  public errCode = 'InvalidName';
  public additionalInfo: { name: string };

  constructor(additionalInfo: { name: string }) {
    super(
      `Invalid unit name: "${additionalInfo.name}". Unit names must be kebab-case (lowercase letters, numbers, and hyphens only).`,
    );
    this.name = 'InvalidUnitNameError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when the static unit declaration fails validation
 */
export class InvalidUnitOptionsError extends Error {
  public errPrefix = 'UnitErr';
  public errType = 'Unit';
  public errCode = 'InvalidOptions';
  public additionalInfo: { name: string; issues: string[] };

  constructor(additionalInfo: { name: string; issues: string[] }) {
    super(
      `Invalid options for unit "${additionalInfo.name}": ${additionalInfo.issues.join('; ')}`,
    );
    this.name = 'InvalidUnitOptionsError';
    this.additionalInfo = additionalInfo;
  }
}

export class InvalidCheckNameError extends Error {
  public errPrefix = 'UnitErr';
  public errType = 'Check';
  public errCode = 'InvalidName';
  public additionalInfo: { name: string };

  constructor(additionalInfo: { name: string }) {
    super(
      `Invalid status check name: "${additionalInfo.name}". Check names must be kebab-case.`,
    );
    this.name = 'InvalidCheckNameError';
    this.additionalInfo = additionalInfo;
  }
}

export class DuplicateCheckError extends Error {
  public errPrefix = 'UnitErr';
  public errType = 'Check';
  public errCode = 'Duplicate';
  public additionalInfo: { name: string };

  constructor(additionalInfo: { name: string }) {
    super(`Status check "${additionalInfo.name}" is already registered`);
    this.name = 'DuplicateCheckError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a package installer step fails
 *
 * The install transition leaves `isStarted` false so the next install event
 * retries from the beginning.
 */
export class PackageInstallError extends Error {
  public errPrefix = 'UnitErr';
  public errType = 'Install';
  public errCode = 'InstallFailed';
  public additionalInfo: {
    step: 'add-source' | 'update' | 'install';
    packages: string[];
  };
  public cause?: unknown;

  constructor(
    additionalInfo: {
      step: 'add-source' | 'update' | 'install';
      packages: string[];
    },
    cause?: unknown,
  ) {
    const causeMessage = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Package ${additionalInfo.step} step failed${causeMessage}`);
    this.name = 'PackageInstallError';
    this.additionalInfo = additionalInfo;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class StateStoreError extends Error {
  public errPrefix = 'UnitErr';
  public errType = 'State';
  public errCode: 'LoadFailed' | 'SaveFailed';
  public additionalInfo: { location: string };
  public cause?: unknown;

  constructor(
    errCode: 'LoadFailed' | 'SaveFailed',
    additionalInfo: { location: string },
    cause?: unknown,
  ) {
    const verb = errCode === 'LoadFailed' ? 'load' : 'save';
    const causeMessage = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Failed to ${verb} lifecycle state at "${additionalInfo.location}"${causeMessage}`,
    );
    this.name = 'StateStoreError';
    this.errCode = errCode;
    this.additionalInfo = additionalInfo;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class UnknownEventError extends Error {
  public errPrefix = 'UnitErr';
  public errType = 'Event';
  public errCode = 'Unknown';
  public additionalInfo: { event: string };

  constructor(additionalInfo: { event: string }) {
    super(`Unknown unit event: "${additionalInfo.event}"`);
    this.name = 'UnknownEventError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error prefix constant for all unit errors
 */
export const unitErrPrefix = 'UnitErr';

export const unitErrTypes = {
  Unit: 'Unit',
  Check: 'Check',
  Install: 'Install',
  State: 'State',
  Event: 'Event',
} as const;

export const unitErrCodes = {
  InvalidName: 'InvalidName',
  InvalidOptions: 'InvalidOptions',
  Duplicate: 'Duplicate',
  InstallFailed: 'InstallFailed',
  LoadFailed: 'LoadFailed',
  SaveFailed: 'SaveFailed',
  Unknown: 'Unknown',
} as const;
