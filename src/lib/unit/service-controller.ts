import type { LoggerService } from '../logger/logger-service';
import type { ServiceAction, ServiceActionResult } from './types';
import type { CommandRunner } from './command-runner';
import { describeCommand } from './command-runner';

/**
 * Pauses or resumes OS-level services.
 *
 * Contract: never throws because of an individual service. Services that
 * could not be transitioned are reported in `failed`; the others are left in
 * their new state (no rollback).
 */
export interface ServiceController {
  apply(
    action: ServiceAction,
    services: readonly string[],
  ): Promise<ServiceActionResult>;
}

const SYSTEMCTL_STEPS: Record<ServiceAction, readonly string[]> = {
  // Disable as well so a reboot during the pause keeps the service down
  pause: ['stop', 'disable'],
  resume: ['enable', 'start'],
};

/**
 * ServiceController driving systemd through `systemctl`
 */
export class SystemctlServiceController implements ServiceController {
  private readonly runner: CommandRunner;
  private readonly logger: LoggerService;
  private readonly systemctl: string;

  constructor(options: {
    runner: CommandRunner;
    logger: LoggerService;
    systemctlPath?: string;
  }) {
    this.runner = options.runner;
    this.logger = options.logger;
    this.systemctl = options.systemctlPath ?? 'systemctl';
  }

  public async apply(
    action: ServiceAction,
    services: readonly string[],
  ): Promise<ServiceActionResult> {
    const succeeded: string[] = [];
    const failed: string[] = [];

    // One at a time, in registry order
    for (const service of services) {
      if (await this.applyToService(action, service)) {
        succeeded.push(service);
      } else {
        failed.push(service);
      }
    }

    return { succeeded, failed };
  }

  private async applyToService(
    action: ServiceAction,
    service: string,
  ): Promise<boolean> {
    for (const step of SYSTEMCTL_STEPS[action]) {
      const args = [step, service];

      try {
        const result = await this.runner.run(this.systemctl, args);

        if (result.exitCode !== 0) {
          this.logger.warn('{{command}} exited with {{exitCode}}: {{stderr}}', {
            params: {
              command: describeCommand(this.systemctl, args),
              exitCode: result.exitCode,
              stderr: result.stderr.trim(),
            },
          });
          return false;
        }
      } catch (error) {
        this.logger.errorObject(
          `Could not run ${describeCommand(this.systemctl, args)}`,
          error,
        );
        return false;
      }
    }

    return true;
  }
}
