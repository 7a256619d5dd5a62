/**
 * Farm domain model: animals housed in color-typed barns.
 */

import type { AnimalId, BarnId } from './branded.js';

export const COLORS = [
  'BLACK',
  'BLUE',
  'BROWN',
  'DARKER_THAN_BLACK',
  'GRAY',
  'GREEN',
  'ORANGE',
  'PINK',
  'PURPLE',
  'RED',
  'WHITE',
  'YELLOW',
] as const;

export type Color = (typeof COLORS)[number];

export interface Barn {
  readonly id: BarnId;
  readonly name: string;
  readonly color: Color;
  /** Maximum number of animals the barn may hold. */
  readonly capacity: number;
}

/** A barn that has not been persisted yet. */
export type NewBarn = Omit<Barn, 'id'>;

export interface Animal {
  readonly id: AnimalId;
  readonly name: string;
  readonly favoriteColor: Color;
  readonly barn: Barn;
}

/**
 * An animal as handed to the farm by a caller. A draft headed for placement
 * carries neither `id` nor `barn`; one headed for removal carries both.
 */
export interface AnimalDraft {
  readonly id?: AnimalId | null;
  readonly name: string;
  readonly favoriteColor: Color;
  readonly barn?: Barn | null;
}

/** An animal with a barn assigned but possibly no identity yet. */
export type PlacedAnimal = Omit<Animal, 'id'> & { readonly id?: AnimalId };

export interface BarnOccupancy {
  readonly barn: Barn;
  readonly animals: Animal[];
}

export interface BarnSummary extends Barn {
  occupancy: number;
}

export type InvariantKind =
  | 'empty-barn'
  | 'over-capacity'
  | 'unbalanced'
  | 'excess-barns'
  | 'color-mismatch';

export interface InvariantViolation {
  kind: InvariantKind;
  color: Color;
  barnId?: BarnId;
  message: string;
}
