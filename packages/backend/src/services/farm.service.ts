import type { FastifyBaseLogger } from 'fastify';
import { ColorPartition } from '../engine/farm/index.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { barnName as defaultBarnName } from '../lib/farm-utils.js';
import type { FarmStore } from '../storage/interfaces.js';
import type {
  Animal,
  AnimalDraft,
  Barn,
  BarnSummary,
  Color,
  InvariantViolation,
} from '../types/index.js';

export type FarmLogger = Pick<FastifyBaseLogger, 'info' | 'debug'>;

export interface FarmServiceOptions {
  store: FarmStore;
  /** Uniform capacity of every barn. */
  barnCapacity: number;
  /** Name for a new barn, given the number of barns its color already has. */
  barnName?: (index: number) => string;
  logger?: FarmLogger;
}

/**
 * Places animals into barns of their favorite color and keeps every color
 * balanced: no barn empty, none over capacity, and occupancies within a
 * color at most one apart.
 *
 * Each call reads the color's animals fresh from the store and writes its
 * changes back before returning. Callers must not run two mutating calls for
 * the same color at once.
 */
export class FarmService {
  private readonly store: FarmStore;
  private readonly barnCapacity: number;
  private readonly barnName: (index: number) => string;
  private readonly logger?: FarmLogger;

  constructor(options: FarmServiceOptions) {
    if (!Number.isInteger(options.barnCapacity) || options.barnCapacity < 1) {
      throw new ValidationError('Barn capacity must be a positive integer', {
        barnCapacity: options.barnCapacity,
      });
    }
    this.store = options.store;
    this.barnCapacity = options.barnCapacity;
    this.barnName = options.barnName ?? defaultBarnName;
    this.logger = options.logger;
  }

  get capacity(): number {
    return this.barnCapacity;
  }

  async findAll(): Promise<Animal[]> {
    return this.store.animals.findAll();
  }

  async findByColor(color: Color): Promise<Animal[]> {
    return this.store.animals.findByColor(color);
  }

  async getById(id: Animal['id']): Promise<Animal> {
    const animal = await this.store.animals.findById(id);
    if (!animal) {
      throw new NotFoundError('Animal', id);
    }
    return animal;
  }

  /**
   * Remove every animal, then every barn. Barns go too, since an
   * animal-only wipe would leave them empty.
   */
  async deleteAll(): Promise<void> {
    await this.store.animals.deleteAll();
    await this.store.barns.deleteAll();
  }

  async addToFarm(draft: AnimalDraft): Promise<Animal> {
    if (draft.id != null) {
      throw new ValidationError('The animal must not have an ID.', { id: draft.id });
    }
    if (draft.barn != null) {
      throw new ValidationError('The animal must not be in a barn already.', { barnId: draft.barn.id });
    }

    const color = draft.favoriteColor;
    const partition = await this.loadPartition(color);
    const least = partition.leastPopulated();

    if (least && least.animals.length < least.barn.capacity) {
      return this.store.animals.save({
        name: draft.name,
        favoriteColor: color,
        barn: least.barn,
      });
    }

    // Every barn of this color is full (or there is none): open a new one
    const barn = await this.store.barns.save({
      name: this.barnName(partition.size),
      color,
      capacity: this.barnCapacity,
    });
    this.logger?.info({ color, barn: barn.name, barns: partition.size + 1 }, 'Opened barn');

    const animal = await this.store.animals.save({ name: draft.name, favoriteColor: color, barn });
    partition.addBarn(barn, [animal]);

    const moved = await this.persistMoves(partition.rebalance(), color);
    return moved.find((candidate) => candidate.id === animal.id) ?? animal;
  }

  async addAllToFarm(drafts: readonly AnimalDraft[]): Promise<Animal[]> {
    const added: Animal[] = [];
    for (const draft of drafts) {
      added.push(await this.addToFarm(draft));
    }
    return added;
  }

  async removeFromFarm(animal: AnimalDraft): Promise<void> {
    if (animal.id == null) {
      throw new ValidationError('The animal must have an ID.');
    }
    if (animal.barn == null) {
      throw new ValidationError('The animal must be in a barn.', { id: animal.id });
    }

    const found = await this.store.animals.findById(animal.id);
    if (!found) {
      throw new NotFoundError('Animal', animal.id);
    }

    await this.store.animals.delete(found);

    const color = found.favoriteColor;
    const partition = await this.loadPartition(color, [found.barn]);

    if (partition.totalAnimals % this.barnCapacity === 0) {
      await this.retireBarn(partition, found.barn);
    } else {
      await this.persistMoves(partition.rebalance(), color);
    }
  }

  /**
   * Remove each animal in turn. Animals are re-read first, since earlier
   * removals in the batch may have moved them to another barn.
   */
  async removeAllFromFarm(animals: readonly Pick<Animal, 'id'>[]): Promise<void> {
    for (const { id } of animals) {
      await this.removeFromFarm(await this.getById(id));
    }
  }

  async listBarns(color?: Color): Promise<BarnSummary[]> {
    const [barns, animals] = await Promise.all([
      this.store.barns.findAll(),
      color ? this.store.animals.findByColor(color) : this.store.animals.findAll(),
    ]);
    return summarize(color ? barns.filter((barn) => barn.color === color) : barns, animals);
  }

  /**
   * Recompute the farm invariants from the store. Returns every violation
   * found; an empty list means the farm is healthy.
   */
  async checkInvariants(): Promise<InvariantViolation[]> {
    const [allBarns, animals] = await Promise.all([
      this.store.barns.findAll(),
      this.store.animals.findAll(),
    ]);
    const barns = summarize(allBarns, animals);
    const violations: InvariantViolation[] = [];

    for (const animal of animals) {
      if (animal.favoriteColor !== animal.barn.color) {
        violations.push({
          kind: 'color-mismatch',
          color: animal.favoriteColor,
          barnId: animal.barn.id,
          message: `Animal '${animal.name}' (${animal.favoriteColor}) is in ${animal.barn.color} barn '${animal.barn.name}'`,
        });
      }
    }

    const byColor = new Map<Color, BarnSummary[]>();
    for (const barn of barns) {
      if (barn.occupancy === 0) {
        violations.push({
          kind: 'empty-barn',
          color: barn.color,
          barnId: barn.id,
          message: `Barn '${barn.name}' is empty`,
        });
      }
      if (barn.occupancy > barn.capacity) {
        violations.push({
          kind: 'over-capacity',
          color: barn.color,
          barnId: barn.id,
          message: `Barn '${barn.name}' holds ${barn.occupancy} animals, capacity is ${barn.capacity}`,
        });
      }
      byColor.set(barn.color, [...(byColor.get(barn.color) ?? []), barn]);
    }

    for (const [color, colorBarns] of byColor) {
      const occupancies = colorBarns.map((barn) => barn.occupancy);
      const spread = Math.max(...occupancies) - Math.min(...occupancies);
      if (spread > 1) {
        violations.push({
          kind: 'unbalanced',
          color,
          message: `${color} barns differ by ${spread} animals`,
        });
      }

      // fewest barns: the free places of a color must not add up to a whole barn
      const free = colorBarns.reduce((sum, barn) => sum + barn.capacity - barn.occupancy, 0);
      const capacity = Math.min(...colorBarns.map((barn) => barn.capacity));
      if (free >= capacity) {
        violations.push({
          kind: 'excess-barns',
          color,
          message: `${color} barns have ${free} free places, one barn fewer would fit every animal`,
        });
      }
    }

    return violations;
  }

  private async loadPartition(color: Color, knownBarns: readonly Barn[] = []): Promise<ColorPartition> {
    const animals = await this.store.animals.findByColor(color);
    return ColorPartition.fromAnimals(color, animals, knownBarns);
  }

  private async persistMoves(moved: Animal[], color: Color): Promise<Animal[]> {
    if (moved.length === 0) {
      return [];
    }
    this.logger?.debug({ color, moved: moved.length }, 'Rebalanced barns');
    return this.store.animals.saveAll(moved);
  }

  /**
   * Animals must be persisted in their new barns before the barn is deleted,
   * otherwise the store still sees them referencing it.
   */
  private async retireBarn(partition: ColorPartition, barn: Barn): Promise<void> {
    const { reassigned } = partition.retire(barn.id);
    if (reassigned.length > 0) {
      await this.store.animals.saveAll(reassigned);
    }
    await this.store.barns.delete(barn);
    this.logger?.info(
      { color: barn.color, barn: barn.name, reassigned: reassigned.length },
      'Retired barn'
    );
  }
}

function summarize(barns: readonly Barn[], animals: readonly Animal[]): BarnSummary[] {
  const occupancy = new Map<string, number>();
  for (const animal of animals) {
    occupancy.set(animal.barn.id, (occupancy.get(animal.barn.id) ?? 0) + 1);
  }

  return barns
    .map((barn) => ({ ...barn, occupancy: occupancy.get(barn.id) ?? 0 }))
    .sort(
      (a, b) =>
        a.color.localeCompare(b.color) || a.name.localeCompare(b.name, undefined, { numeric: true })
    );
}
