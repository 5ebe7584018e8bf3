import { Patch } from '../types/api.types';

/**
 * Merge a partial update into an entity. Only fields present with a non-null
 * value overwrite the target; the target itself is not mutated.
 */
export function applyPatch<T extends object>(target: T, patch: Patch<T>): T {
  const result = { ...target };

  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined && value !== null) {
      result[key] = value;
    }
  }

  return result;
}

/**
 * The fields of a partial update that carry a value, for writes that must
 * leave every other column as the database currently has it.
 */
export function presentFields<T extends object>(patch: Patch<T>): Partial<T> {
  const result: Partial<T> = {};

  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined && value !== null) {
      result[key] = value;
    }
  }

  return result;
}
