import type { UnitStatus } from './types';
import type { CommandRunner } from './command-runner';
import { formatStatus } from './status';

/**
 * Makes the unit status visible to the hosting runtime
 */
export interface StatusPublisher {
  publish(status: UnitStatus): Promise<void>;
}

/**
 * Keeps every published status in memory
 */
export class MemoryStatusPublisher implements StatusPublisher {
  public readonly history: UnitStatus[] = [];

  public get current(): UnitStatus | null {
    return this.history[this.history.length - 1] ?? null;
  }

  public publish(status: UnitStatus): Promise<void> {
    this.history.push({ ...status });
    return Promise.resolve();
  }

  /**
   * `severity: message` lines, handy for exact assertions in tests
   */
  public getSnapshotFriendlyHistory(): string[] {
    return this.history.map(formatStatus);
  }
}

/**
 * Publishes through the runtime's `status-set` tool
 */
export class CommandStatusPublisher implements StatusPublisher {
  private readonly runner: CommandRunner;
  private readonly command: string;

  constructor(options: { runner: CommandRunner; command?: string }) {
    this.runner = options.runner;
    this.command = options.command ?? 'status-set';
  }

  public async publish(status: UnitStatus): Promise<void> {
    const result = await this.runner.run(this.command, [
      status.severity,
      status.message,
    ]);

    if (result.exitCode !== 0) {
      throw new Error(
        `${this.command} exited with ${result.exitCode}: ${result.stderr.trim()}`,
      );
    }
  }
}
