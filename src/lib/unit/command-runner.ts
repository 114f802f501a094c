import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an OS command. A non-zero exit is a result, not an error; only a
 * failure to run the command at all (e.g. binary missing) rejects.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

interface ExecFailure {
  code: number;
  stdout?: string;
  stderr?: string;
}

function isExitFailure(error: unknown): error is ExecFailure {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'number'
  );
}

export class ExecFileCommandRunner implements CommandRunner {
  private readonly env?: NodeJS.ProcessEnv;

  constructor(options: { env?: NodeJS.ProcessEnv } = {}) {
    this.env = options.env;
  }

  public async run(
    command: string,
    args: readonly string[],
  ): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, [...args], {
        env: this.env ?? process.env,
        encoding: 'utf-8',
      });

      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      if (isExitFailure(error)) {
        return {
          exitCode: error.code,
          stdout: error.stdout ?? '',
          stderr: error.stderr ?? '',
        };
      }

      throw error;
    }
  }
}

export function describeCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}
