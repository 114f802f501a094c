import { promises as fs } from 'fs';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import type { LifecycleFlags } from './types';
import { StateStoreError } from './errors';

/**
 * Persistence adapter for lifecycle flags.
 *
 * `load()` returns null when nothing was saved yet (unit genesis).
 */
export interface StateStore {
  load(): Promise<LifecycleFlags | null>;
  save(flags: LifecycleFlags): Promise<void>;
}

export const STATE_DOCUMENT_VERSION = 1;

const storedStateSchema = z.object({
  version: z.literal(STATE_DOCUMENT_VERSION),
  flags: z.object({
    isStarted: z.boolean(),
    isPaused: z.boolean(),
    seriesUpgrade: z.boolean(),
  }),
});

export type StoredState = z.infer<typeof storedStateSchema>;

/**
 * In-memory store; state survives for the lifetime of the instance only
 */
export class MemoryStateStore implements StateStore {
  private stored: LifecycleFlags | null;
  public saveCount = 0;

  constructor(initial: LifecycleFlags | null = null) {
    this.stored = initial ? { ...initial } : null;
  }

  public load(): Promise<LifecycleFlags | null> {
    return Promise.resolve(this.stored ? { ...this.stored } : null);
  }

  public save(flags: LifecycleFlags): Promise<void> {
    this.stored = { ...flags };
    this.saveCount++;
    return Promise.resolve();
  }
}

/**
 * Stores flags as a versioned JSON document.
 *
 * Writes go to a temporary file in the same directory which is then renamed
 * over the target, so a crash mid-write never leaves a truncated document.
 */
export class JsonFileStateStore implements StateStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  public get location(): string {
    return this.filePath;
  }

  /**
   * @throws {StateStoreError} If the file exists but cannot be read or parsed
   */
  public async load(): Promise<LifecycleFlags | null> {
    let raw: string;

    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw new StateStoreError('LoadFailed', { location: this.filePath }, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StateStoreError('LoadFailed', { location: this.filePath }, error);
    }

    const result = storedStateSchema.safeParse(parsed);
    if (!result.success) {
      throw new StateStoreError(
        'LoadFailed',
        { location: this.filePath },
        result.error,
      );
    }

    return result.data.flags;
  }

  /**
   * @throws {StateStoreError} If the document cannot be written
   */
  public async save(flags: LifecycleFlags): Promise<void> {
    const document: StoredState = {
      version: STATE_DOCUMENT_VERSION,
      flags: { ...flags },
    };
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true }).catch(() => undefined);
      throw new StateStoreError('SaveFailed', { location: this.filePath }, error);
    }
  }
}

function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
