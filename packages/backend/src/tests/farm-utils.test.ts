import { describe, it, expect } from 'vitest';
import { animalName, barnName, randomColor } from '../lib/farm-utils.js';
import { COLORS } from '../types/index.js';

describe('farm utils', () => {
  it('names barns and animals by index', () => {
    expect(barnName(0)).toBe('barn-0');
    expect(barnName(12)).toBe('barn-12');
    expect(animalName(3)).toBe('animal-3');
  });

  it('maps the unit interval onto the color list', () => {
    expect(randomColor(() => 0)).toBe(COLORS[0]);
    expect(randomColor(() => 0.5)).toBe(COLORS[6]);
    expect(randomColor(() => 0.9999999)).toBe(COLORS[COLORS.length - 1]);
  });

  it('clamps a generator that returns 1', () => {
    expect(randomColor(() => 1)).toBe('YELLOW');
  });

  it('defaults to Math.random', () => {
    expect(COLORS).toContain(randomColor());
  });
});
