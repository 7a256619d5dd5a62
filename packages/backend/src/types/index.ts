// Branded IDs
export type { AnimalId, BarnId } from './branded.js';
export { animalId, barnId } from './branded.js';

// Farm model
export { COLORS } from './farm.js';
export type {
  Color,
  Barn,
  NewBarn,
  Animal,
  AnimalDraft,
  PlacedAnimal,
  BarnOccupancy,
  BarnSummary,
  InvariantKind,
  InvariantViolation,
} from './farm.js';
