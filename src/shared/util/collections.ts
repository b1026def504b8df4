// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util/collections`
 * Purpose: Small array/object helpers shared by components and the theme engine.
 * Scope: Pure functions only.
 * Side-effects: none
 * @internal
 */

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

/** Normalizes `T | T[] | undefined` to an array. */
export function toArray<T>(value: T | readonly T[] | undefined | null): T[] {
  if (value === undefined || value === null) return [];
  return isList(value) ? [...value] : [value];
}

/** Drops keys whose value is `undefined` so spreads do not clobber defaults. */
export function omitUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (Object.hasOwn(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}
