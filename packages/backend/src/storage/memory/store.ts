import { randomUUID } from 'node:crypto';
import { ConflictError, NotFoundError } from '../../lib/errors.js';
import { animalId, barnId } from '../../types/index.js';
import type {
  Animal,
  AnimalId,
  Barn,
  BarnId,
  Color,
  NewBarn,
  PlacedAnimal,
} from '../../types/index.js';
import type { AnimalRepository, BarnRepository, FarmStore } from '../interfaces.js';

interface AnimalRow {
  id: AnimalId;
  name: string;
  favoriteColor: Color;
  barnId: BarnId;
}

/**
 * Shared tables behind the two repositories. Animals reference barns by id,
 * and the foreign key is checked on every write in either direction.
 */
class FarmTables {
  readonly animals = new Map<AnimalId, AnimalRow>();
  readonly barns = new Map<BarnId, Barn>();

  hydrate(row: AnimalRow): Animal {
    const barn = this.barns.get(row.barnId);
    if (!barn) {
      throw new ConflictError(`Animal '${row.id}' references missing barn '${row.barnId}'`);
    }
    return { id: row.id, name: row.name, favoriteColor: row.favoriteColor, barn: { ...barn } };
  }

  toRow(animal: PlacedAnimal, id: AnimalId): AnimalRow {
    const barn = this.barns.get(animal.barn.id);
    if (!barn) {
      throw new ConflictError(`Barn '${animal.barn.id}' does not exist`);
    }
    if (barn.color !== animal.favoriteColor) {
      throw new ConflictError(
        `Animal color ${animal.favoriteColor} does not match barn '${barn.name}' color ${barn.color}`
      );
    }
    return { id, name: animal.name, favoriteColor: animal.favoriteColor, barnId: barn.id };
  }
}

export class InMemoryAnimalRepository implements AnimalRepository {
  constructor(private tables: FarmTables) {}

  async findAll(): Promise<Animal[]> {
    return [...this.tables.animals.values()].map((row) => this.tables.hydrate(row));
  }

  async findByColor(color: Color): Promise<Animal[]> {
    return [...this.tables.animals.values()]
      .filter((row) => row.favoriteColor === color)
      .map((row) => this.tables.hydrate(row));
  }

  async findById(id: AnimalId): Promise<Animal | null> {
    const row = this.tables.animals.get(id);
    return row ? this.tables.hydrate(row) : null;
  }

  async save(animal: PlacedAnimal): Promise<Animal> {
    const row = this.prepare(animal);
    this.tables.animals.set(row.id, row);
    return this.tables.hydrate(row);
  }

  async saveAll(animals: readonly PlacedAnimal[]): Promise<Animal[]> {
    // Validate the whole batch before writing any of it
    const rows = animals.map((animal) => this.prepare(animal));
    for (const row of rows) {
      this.tables.animals.set(row.id, row);
    }
    return rows.map((row) => this.tables.hydrate(row));
  }

  async delete(animal: Animal): Promise<void> {
    if (!this.tables.animals.delete(animal.id)) {
      throw new NotFoundError('Animal', animal.id);
    }
  }

  async deleteAll(): Promise<void> {
    this.tables.animals.clear();
  }

  private prepare(animal: PlacedAnimal): AnimalRow {
    if (animal.id !== undefined && !this.tables.animals.has(animal.id)) {
      throw new NotFoundError('Animal', animal.id);
    }
    return this.tables.toRow(animal, animal.id ?? animalId(randomUUID()));
  }
}

export class InMemoryBarnRepository implements BarnRepository {
  constructor(private tables: FarmTables) {}

  async findAll(): Promise<Barn[]> {
    return [...this.tables.barns.values()].map((barn) => ({ ...barn }));
  }

  async save(barn: NewBarn | Barn): Promise<Barn> {
    if ('id' in barn) {
      const existing = this.tables.barns.get(barn.id);
      if (!existing) {
        throw new NotFoundError('Barn', barn.id);
      }
      if (existing.color !== barn.color && this.isReferenced(barn.id)) {
        throw new ConflictError(`Cannot change color of barn '${existing.name}' while it holds animals`);
      }
      const updated: Barn = { ...barn };
      this.tables.barns.set(updated.id, updated);
      return { ...updated };
    }

    const created: Barn = { ...barn, id: barnId(randomUUID()) };
    this.tables.barns.set(created.id, created);
    return { ...created };
  }

  async delete(barn: Barn): Promise<void> {
    if (this.isReferenced(barn.id)) {
      throw new ConflictError(`Barn '${barn.name}' still holds animals and cannot be deleted`);
    }
    if (!this.tables.barns.delete(barn.id)) {
      throw new NotFoundError('Barn', barn.id);
    }
  }

  async deleteAll(): Promise<void> {
    if (this.tables.animals.size > 0) {
      throw new ConflictError('Barns still hold animals and cannot be deleted');
    }
    this.tables.barns.clear();
  }

  async count(): Promise<number> {
    return this.tables.barns.size;
  }

  private isReferenced(id: BarnId): boolean {
    for (const row of this.tables.animals.values()) {
      if (row.barnId === id) return true;
    }
    return false;
  }
}

/**
 * Process-local farm store. Reads hand out copies; nothing reaches the
 * tables except through a save or delete.
 */
export class InMemoryFarmStore implements FarmStore {
  readonly animals: InMemoryAnimalRepository;
  readonly barns: InMemoryBarnRepository;

  constructor() {
    const tables = new FarmTables();
    this.animals = new InMemoryAnimalRepository(tables);
    this.barns = new InMemoryBarnRepository(tables);
  }
}
