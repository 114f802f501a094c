/**
 * Read-only view of the unit's relations, provided by the hosting runtime
 */
export interface RelationView {
  /** Number of remote units on `relation`, summed over all its relation ids */
  remoteUnitCount(relation: string): number;
}

/**
 * RelationView backed by a mutable in-memory map
 */
export class StaticRelationView implements RelationView {
  private readonly counts = new Map<string, number>();

  constructor(initial: Record<string, number> = {}) {
    for (const [relation, count] of Object.entries(initial)) {
      this.set(relation, count);
    }
  }

  public remoteUnitCount(relation: string): number {
    return this.counts.get(relation) ?? 0;
  }

  public set(relation: string, count: number): void {
    this.counts.set(
      relation,
      Number.isFinite(count) ? Math.max(0, Math.floor(count)) : 0,
    );
  }

  /**
   * Add one remote unit, e.g. when a relation-joined event arrives
   */
  public join(relation: string): void {
    this.set(relation, this.remoteUnitCount(relation) + 1);
  }

  public depart(relation: string): void {
    this.set(relation, this.remoteUnitCount(relation) - 1);
  }
}

/**
 * Required relations that have no remote units, in declared order
 */
export function missingRelations(
  required: readonly string[],
  relations: RelationView,
): string[] {
  return required.filter((relation) => relations.remoteUnitCount(relation) === 0);
}
