import type { LifecycleFlags } from './types';
import type { StateStore } from './state-store';

export const GENESIS_FLAGS: Readonly<LifecycleFlags> = Object.freeze({
  isStarted: false,
  isPaused: false,
  seriesUpgrade: false,
});

/**
 * Durable lifecycle flags of a unit.
 *
 * Loaded once from the store, saved after every mutation. Only the
 * transitions in UnitLifecycle call `update()`; status checks read through
 * `snapshot()` or the getters.
 */
export class LifecycleState {
  private readonly store: StateStore;
  private flags: LifecycleFlags = { ...GENESIS_FLAGS };
  private loaded = false;

  constructor(store: StateStore) {
    this.store = store;
  }

  public get isLoaded(): boolean {
    return this.loaded;
  }

  public get isStarted(): boolean {
    return this.flags.isStarted;
  }

  public get isPaused(): boolean {
    return this.flags.isPaused;
  }

  public get seriesUpgrade(): boolean {
    return this.flags.seriesUpgrade;
  }

  /**
   * Load flags from the store. Missing state means genesis (all false).
   * Loading twice is a no-op.
   */
  public async load(): Promise<Readonly<LifecycleFlags>> {
    if (!this.loaded) {
      const stored = await this.store.load();
      this.flags = { ...GENESIS_FLAGS, ...stored };
      this.loaded = true;
    }

    return this.snapshot();
  }

  public snapshot(): Readonly<LifecycleFlags> {
    return Object.freeze({ ...this.flags });
  }

  /**
   * Apply a patch and persist the result. The in-memory flags only change
   * once the store accepted them.
   */
  public async update(
    patch: Partial<LifecycleFlags>,
  ): Promise<Readonly<LifecycleFlags>> {
    const next: LifecycleFlags = { ...this.flags, ...patch };

    await this.store.save(next);
    this.flags = next;

    return this.snapshot();
  }
}
