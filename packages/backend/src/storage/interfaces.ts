import type { Animal, AnimalId, Barn, Color, NewBarn, PlacedAnimal } from '../types/index.js';

export interface AnimalRepository {
  findAll(): Promise<Animal[]>;
  findByColor(color: Color): Promise<Animal[]>;
  findById(id: AnimalId): Promise<Animal | null>;
  /** Inserts when `animal.id` is absent, otherwise replaces the stored record. */
  save(animal: PlacedAnimal): Promise<Animal>;
  saveAll(animals: readonly PlacedAnimal[]): Promise<Animal[]>;
  delete(animal: Animal): Promise<void>;
  deleteAll(): Promise<void>;
}

export interface BarnRepository {
  findAll(): Promise<Barn[]>;
  /** Inserts when `barn` has no id, otherwise replaces the stored record. */
  save(barn: NewBarn | Barn): Promise<Barn>;
  delete(barn: Barn): Promise<void>;
  deleteAll(): Promise<void>;
  count(): Promise<number>;
}

export interface FarmStore {
  animals: AnimalRepository;
  barns: BarnRepository;
}
