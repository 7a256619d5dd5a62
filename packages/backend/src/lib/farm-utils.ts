import { COLORS, type Color } from '../types/index.js';

export function barnName(index: number): string {
  return `barn-${index}`;
}

export function animalName(index: number): string {
  return `animal-${index}`;
}

/**
 * Pick a color uniformly. `random` must return a value in [0, 1), like Math.random.
 */
export function randomColor(random: () => number = Math.random): Color {
  const index = Math.min(Math.floor(random() * COLORS.length), COLORS.length - 1);
  return COLORS[index];
}
