// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/hooks/useControllableState`
 * Purpose: One value source per component - the `value` prop when controlled, internal state otherwise.
 * Scope: Generic over the value type. Does not debounce or compare deeply.
 * Invariants:
 * - Controlled iff `value !== undefined`; internal state is ignored while controlled.
 * - The setter calls `onChange` only when the next value differs (Object.is) from the current one.
 * Side-effects: none
 * @public
 */

"use client";

import { useCallback, useRef, useState } from "react";

export interface ControllableStateOptions<T> {
  value?: T | undefined;
  defaultValue: T;
  onChange?: ((next: T) => void) | undefined;
}

export type SetControllableState<T> = (next: T | ((prev: T) => T)) => void;

function isUpdater<T>(next: T | ((prev: T) => T)): next is (prev: T) => T {
  return typeof next === "function";
}

export function useControllableState<T>({
  value,
  defaultValue,
  onChange,
}: ControllableStateOptions<T>): [T, SetControllableState<T>] {
  const [inner, setInner] = useState<T>(defaultValue);
  const controlled = value !== undefined;
  const current = controlled ? value : inner;

  // Latest value/callback without re-creating the setter each render
  const currentRef = useRef(current);
  currentRef.current = current;
  const onChangeRef = useRef(onChange);
  onChangeRef.current = onChange;

  const setValue = useCallback<SetControllableState<T>>(
    (next) => {
      const prev = currentRef.current;
      const resolved = isUpdater(next) ? next(prev) : next;
      if (Object.is(prev, resolved)) return;
      if (!controlled) setInner(resolved);
      currentRef.current = resolved;
      onChangeRef.current?.(resolved);
    },
    [controlled]
  );

  return [current, setValue];
}
