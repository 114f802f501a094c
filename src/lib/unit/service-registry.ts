import type { RestartMap } from './types';

function pushUnique(target: string[], seen: Set<string>, values: Iterable<string>): void {
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      target.push(value);
    }
  }
}

/**
 * Derives the managed services from a static restart map.
 *
 * Pure: the map is copied at construction and every call returns a fresh array.
 *
 * @example
 * ```typescript
 * const registry = new ServiceRegistry({
 *   '/etc/f1.conf': ['apache2'],
 *   '/etc/f2.conf': ['apache2', 'ks-api'],
 *   '/etc/f3.conf': [],
 * });
 *
 * registry.services(); // ['apache2', 'ks-api']
 * ```
 */
export class ServiceRegistry {
  private readonly entries: ReadonlyArray<readonly [string, readonly string[]]>;

  constructor(restartMap: RestartMap) {
    this.entries = Object.entries(restartMap).map(
      ([file, services]) => [file, [...services]] as const,
    );
  }

  /**
   * Every service across all files, in order of first appearance, de-duplicated
   */
  public services(): string[] {
    const result: string[] = [];
    const seen = new Set<string>();

    for (const [, services] of this.entries) {
      pushUnique(result, seen, services);
    }

    return result;
  }

  /**
   * Services to restart when the given files changed. Unknown paths are ignored.
   */
  public servicesForFiles(paths: Iterable<string>): string[] {
    const changed = new Set(paths);
    const result: string[] = [];
    const seen = new Set<string>();

    for (const [file, services] of this.entries) {
      if (changed.has(file)) {
        pushUnique(result, seen, services);
      }
    }

    return result;
  }

  public files(): string[] {
    return this.entries.map(([file]) => file);
  }
}
