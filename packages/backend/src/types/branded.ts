/**
 * Branded types for store-assigned identities.
 * Prevents passing a barn id where an animal id is expected.
 */

declare const __brand: unique symbol;

type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type AnimalId = Brand<string, 'AnimalId'>;
export type BarnId = Brand<string, 'BarnId'>;

export const animalId = (s: string) => s as AnimalId;
export const barnId = (s: string) => s as BarnId;
