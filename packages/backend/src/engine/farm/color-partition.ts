import { InvariantViolationError } from '../../lib/errors.js';
import type { Animal, AnimalId, Barn, BarnId, BarnOccupancy, Color } from '../../types/index.js';

// ─── Ordering ────────────────────────────────────────────────────────────────

export type OccupancyComparator = (a: BarnOccupancy, b: BarnOccupancy) => number;

export const byOccupancy: OccupancyComparator = (a, b) => a.animals.length - b.animals.length;

/** First entry that no later entry beats; earlier entries win ties. */
function pick(
  entries: Iterable<BarnOccupancy>,
  better: (candidate: BarnOccupancy, current: BarnOccupancy) => boolean
): BarnOccupancy | undefined {
  let best: BarnOccupancy | undefined;
  for (const entry of entries) {
    if (best === undefined || better(entry, best)) {
      best = entry;
    }
  }
  return best;
}

// ─── ColorPartition ──────────────────────────────────────────────────────────

/**
 * Barn → members grouping for one color, built fresh for a single farm
 * operation and discarded afterwards.
 *
 * Moves replace the moved animal with a copy pointing at its new barn, so
 * the animals handed to `fromAnimals` are never mutated. The copies returned
 * by `rebalance` and `retire` are what the caller persists.
 */
export class ColorPartition {
  private readonly entries = new Map<BarnId, BarnOccupancy>();

  constructor(
    readonly color: Color,
    private readonly compare: OccupancyComparator = byOccupancy
  ) {}

  /**
   * Group `animals` by barn. `knownBarns` are tracked even with no members,
   * e.g. a barn whose last animal was just removed.
   */
  static fromAnimals(color: Color, animals: readonly Animal[], knownBarns: readonly Barn[] = []): ColorPartition {
    const partition = new ColorPartition(color);
    for (const barn of knownBarns) {
      partition.addBarn(barn);
    }
    for (const animal of animals) {
      partition.addBarn(animal.barn).animals.push(animal);
    }
    return partition;
  }

  /** Track `barn`, returning its entry. Adding a tracked barn again is a no-op. */
  addBarn(barn: Barn, animals: readonly Animal[] = []): BarnOccupancy {
    if (barn.color !== this.color) {
      throw new InvariantViolationError(
        `Barn '${barn.name}' is ${barn.color}, not ${this.color}`
      );
    }
    let entry = this.entries.get(barn.id);
    if (!entry) {
      entry = { barn, animals: [] };
      this.entries.set(barn.id, entry);
    }
    for (const animal of animals) {
      entry.animals.push(animal);
    }
    return entry;
  }

  get size(): number {
    return this.entries.size;
  }

  get totalAnimals(): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += entry.animals.length;
    }
    return total;
  }

  get(barnId: BarnId): BarnOccupancy | undefined {
    return this.entries.get(barnId);
  }

  barns(): BarnOccupancy[] {
    return [...this.entries.values()];
  }

  leastPopulated(): BarnOccupancy | undefined {
    return pick(this.entries.values(), (candidate, current) => this.compare(candidate, current) < 0);
  }

  mostPopulated(): BarnOccupancy | undefined {
    return pick(this.entries.values(), (candidate, current) => this.compare(candidate, current) > 0);
  }

  /** Max occupancy minus min occupancy; 0 for an empty partition. */
  spread(): number {
    const most = this.mostPopulated();
    const least = this.leastPopulated();
    if (!most || !least) return 0;
    return most.animals.length - least.animals.length;
  }

  /**
   * Move one animal at a time from the fullest to the emptiest barn until
   * occupancies differ by at most one. Returns the moved animals.
   */
  rebalance(): Animal[] {
    const moved = new Map<AnimalId, Animal>();

    while (this.spread() > 1) {
      const most = this.mostPopulated();
      const least = this.leastPopulated();
      if (!most || !least) {
        throw new InvariantViolationError(`Partition for ${this.color} emptied during rebalance`);
      }

      const animal = most.animals.shift();
      if (!animal) {
        throw new InvariantViolationError(`Barn '${most.barn.name}' has no animal to move`);
      }
      const relocated: Animal = { ...animal, barn: least.barn };
      least.animals.push(relocated);
      moved.set(relocated.id, relocated);
    }

    return [...moved.values()];
  }

  /**
   * Drop `barnId` from the partition and hand each of its animals to the
   * emptiest remaining barn. Returns the retired barn and the reassigned
   * animals; the caller deletes the barn only after persisting them.
   */
  retire(barnId: BarnId): { barn: Barn; reassigned: Animal[] } {
    const entry = this.entries.get(barnId);
    if (!entry) {
      throw new InvariantViolationError(`Barn '${barnId}' is not part of the ${this.color} partition`);
    }
    this.entries.delete(barnId);

    const reassigned: Animal[] = [];
    for (const animal of entry.animals) {
      const target = this.leastPopulated();
      if (!target) {
        throw new InvariantViolationError(
          `No ${this.color} barn left to take animals from retired barn '${entry.barn.name}'`
        );
      }
      const relocated: Animal = { ...animal, barn: target.barn };
      target.animals.push(relocated);
      reassigned.push(relocated);
    }

    return { barn: entry.barn, reassigned };
  }
}
