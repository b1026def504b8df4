// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/select-utils`
 * Purpose: Option filtering, flattening and value bookkeeping shared by Select and AutoComplete.
 * Invariants:
 * - Groups whose options are all filtered out are dropped.
 * - Keyboard movement skips disabled options and wraps.
 * Side-effects: none
 * @public
 */

import type { ReactNode } from "react";

export type SelectValue = string | number;

export interface SelectOption<V extends SelectValue = SelectValue> {
  value: V;
  label?: ReactNode;
  disabled?: boolean;
  /** Native tooltip; also used for filtering when the label is not text. */
  title?: string;
  className?: string;
}

export interface SelectOptionGroup<V extends SelectValue = SelectValue> {
  label: ReactNode;
  title?: string;
  options: SelectOption<V>[];
}

export type SelectItem<V extends SelectValue = SelectValue> =
  | SelectOption<V>
  | SelectOptionGroup<V>;

export type FilterOption<V extends SelectValue = SelectValue> =
  | boolean
  | ((input: string, option: SelectOption<V>) => boolean);

export type FilterSort<V extends SelectValue = SelectValue> = (
  a: SelectOption<V>,
  b: SelectOption<V>,
  info: { searchValue: string }
) => number;

export type FlatEntry<V extends SelectValue = SelectValue> =
  | { type: "group"; key: string; label: ReactNode }
  | { type: "option"; key: string; option: SelectOption<V>; grouped: boolean };

export function isOptionGroup<V extends SelectValue>(
  item: SelectItem<V>
): item is SelectOptionGroup<V> {
  return "options" in item;
}

/** Text used for default filtering and tag labels. */
export function getOptionText<V extends SelectValue>(option: SelectOption<V>): string {
  if (typeof option.label === "string" || typeof option.label === "number") {
    return String(option.label);
  }
  return option.title ?? String(option.value);
}

export function defaultFilterOption<V extends SelectValue>(
  input: string,
  option: SelectOption<V>
): boolean {
  return getOptionText(option).toLowerCase().includes(input.toLowerCase());
}

export function filterSelectItems<V extends SelectValue>(
  items: readonly SelectItem<V>[],
  search: string,
  filterOption: FilterOption<V> = true,
  filterSort?: FilterSort<V>
): SelectItem<V>[] {
  const predicate: ((input: string, option: SelectOption<V>) => boolean) | null =
    filterOption === true ? defaultFilterOption : filterOption === false ? null : filterOption;
  const matches = (option: SelectOption<V>) =>
    search === "" || predicate === null || predicate(search, option);
  const sort = (options: SelectOption<V>[]) =>
    filterSort ? [...options].sort((a, b) => filterSort(a, b, { searchValue: search })) : options;

  const inOrder: SelectItem<V>[] = [];
  const loose: SelectOption<V>[] = [];
  const groups: SelectOptionGroup<V>[] = [];
  for (const item of items) {
    if (isOptionGroup(item)) {
      const options = sort(item.options.filter(matches));
      if (options.length === 0) continue;
      const group = { ...item, options };
      inOrder.push(group);
      groups.push(group);
    } else if (matches(item)) {
      inOrder.push(item);
      loose.push(item);
    }
  }
  // Sorted ungrouped options come first, then the groups
  return filterSort ? [...sort(loose), ...groups] : inOrder;
}

export function flattenSelectItems<V extends SelectValue>(
  items: readonly SelectItem<V>[]
): FlatEntry<V>[] {
  return items.flatMap((item, index): FlatEntry<V>[] => {
    if (!isOptionGroup(item)) {
      return [{ type: "option", key: String(item.value), option: item, grouped: false }];
    }
    return [
      { type: "group", key: `__group-${index}`, label: item.label },
      ...item.options.map(
        (option): FlatEntry<V> => ({
          type: "option",
          key: String(option.value),
          option,
          grouped: true,
        })
      ),
    ];
  });
}

export function collectOptions<V extends SelectValue>(
  items: readonly SelectItem<V>[]
): SelectOption<V>[] {
  return items.flatMap((item) => (isOptionGroup(item) ? item.options : [item]));
}

export function findOption<V extends SelectValue>(
  items: readonly SelectItem<V>[],
  value: V
): SelectOption<V> | undefined {
  return collectOptions(items).find((option) => option.value === value);
}

/**
 * Next enabled option value from `current` in direction `step`, wrapping at both ends.
 * With no current value, ArrowDown lands on the first enabled option and ArrowUp on the last.
 */
export function getNextActiveValue<V extends SelectValue>(
  options: readonly SelectOption<V>[],
  current: V | undefined,
  step: 1 | -1
): V | undefined {
  const count = options.length;
  if (count === 0) return undefined;
  const start = options.findIndex((option) => option.value === current);
  for (let offset = 1; offset <= count; offset += 1) {
    const index =
      start === -1
        ? step === 1
          ? offset - 1
          : count - offset
        : (start + step * offset + count * offset) % count;
    const option = options[index];
    if (option && !option.disabled) return option.value;
  }
  return undefined;
}

export function getFirstEnabledValue<V extends SelectValue>(
  options: readonly SelectOption<V>[]
): V | undefined {
  return options.find((option) => !option.disabled)?.value;
}

/**
 * Splits typed text on any of the separators. Returns null when no separator occurs,
 * so plain typing stays a search.
 */
export function splitBySeparators(
  text: string,
  separators: readonly string[]
): string[] | null {
  const used = separators.filter((separator) => separator !== "" && text.includes(separator));
  if (used.length === 0) return null;
  let parts = [text];
  for (const separator of used) {
    parts = parts.flatMap((part) => part.split(separator));
  }
  return parts.map((part) => part.trim()).filter((part) => part !== "");
}

export function truncateLabel(text: string, maxLength: number | undefined): string {
  if (maxLength === undefined || text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}...`;
}

/** Normalizes a single or multiple value prop to a list. */
export function toValueList<V extends SelectValue>(
  value: V | readonly V[] | null | undefined
): V[] {
  if (value === null || value === undefined) return [];
  if (isValueList(value)) return [...value];
  return [value];
}

function isValueList<V extends SelectValue>(value: V | readonly V[]): value is readonly V[] {
  return Array.isArray(value);
}
