import type { LoggerService } from '../logger/logger-service';
import type { CommandRunner } from './command-runner';
import { describeCommand } from './command-runner';

/**
 * Fetches and installs OS packages. Every method rejects on failure.
 */
export interface PackageInstaller {
  /** Configure an extra package source, with an optional signing key */
  addSource(source: string, key?: string): Promise<void>;
  update(): Promise<void>;
  install(packages: readonly string[]): Promise<void>;
}

export const DEFAULT_KEYSERVER = 'hkp://keyserver.ubuntu.com:80';

/**
 * PackageInstaller shelling out to the apt tool chain
 */
export class AptPackageInstaller implements PackageInstaller {
  private readonly runner: CommandRunner;
  private readonly logger: LoggerService;
  private readonly keyserver: string;

  constructor(options: {
    runner: CommandRunner;
    logger: LoggerService;
    keyserver?: string;
  }) {
    this.runner = options.runner;
    this.logger = options.logger;
    this.keyserver = options.keyserver ?? DEFAULT_KEYSERVER;
  }

  public async addSource(source: string, key?: string): Promise<void> {
    if (key) {
      await this.exec('apt-key', [
        'adv',
        '--keyserver',
        this.keyserver,
        '--recv-keys',
        key,
      ]);
    }

    await this.exec('add-apt-repository', ['--yes', source]);
  }

  public async update(): Promise<void> {
    await this.exec('apt-get', ['update']);
  }

  public async install(packages: readonly string[]): Promise<void> {
    if (packages.length === 0) {
      return;
    }

    await this.exec('apt-get', [
      '--assume-yes',
      '--option=Dpkg::Options::=--force-confold',
      'install',
      ...packages,
    ]);
  }

  private async exec(command: string, args: string[]): Promise<void> {
    const description = describeCommand(command, args);
    this.logger.debug('Running {{command}}', { params: { command: description } });

    const result = await this.runner.run(command, args);

    if (result.exitCode !== 0) {
      throw new Error(
        `${command} exited with ${result.exitCode}: ${result.stderr.trim()}`,
      );
    }
  }
}
