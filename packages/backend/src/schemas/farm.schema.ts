import { z } from 'zod';
import { COLORS, animalId } from '../types/index.js';

export const colorSchema = z.enum(COLORS);

export const createAnimalSchema = z.object({
  name: z.string().trim().min(1).max(100),
  favoriteColor: colorSchema,
});

export type CreateAnimalInput = z.infer<typeof createAnimalSchema>;

export const createAnimalsBatchSchema = z.object({
  animals: z.array(createAnimalSchema).min(1).max(1000),
});

export type CreateAnimalsBatchInput = z.infer<typeof createAnimalsBatchSchema>;

const animalIdSchema = z.string().uuid().transform((id) => animalId(id));

export const animalParamsSchema = z.object({
  id: animalIdSchema,
});

export const removeAnimalsBatchSchema = z.object({
  ids: z.array(animalIdSchema).min(1).max(1000),
});

export type RemoveAnimalsBatchInput = z.infer<typeof removeAnimalsBatchSchema>;

export const colorFiltersSchema = z.object({
  color: colorSchema.optional(),
});

export type ColorFiltersInput = z.infer<typeof colorFiltersSchema>;
