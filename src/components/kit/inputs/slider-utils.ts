// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/slider-utils`
 * Purpose: Value/percent mapping and snapping for Slider.
 * Invariants:
 * - snapValue always returns a value within [min, max].
 * - With `step: null` only marks are valid positions.
 * Side-effects: none
 * @public
 */

import type { CSSProperties, ReactNode } from "react";

import { getPrecision, toFixedPrecision } from "./number-utils";

export type SliderMarkLabel =
  | ReactNode
  | { style?: CSSProperties; label?: ReactNode };

export type SliderMarks = Record<number, SliderMarkLabel>;

export function valueToPercent(value: number, min: number, max: number): number {
  if (max === min) return 0;
  return ((value - min) / (max - min)) * 100;
}

export function percentToValue(percent: number, min: number, max: number): number {
  return min + (percent / 100) * (max - min);
}

export function getMarkValues(marks: SliderMarks | undefined): number[] {
  if (!marks) return [];
  return Object.keys(marks)
    .map(Number)
    .filter((value) => Number.isFinite(value))
    .sort((a, b) => a - b);
}

export interface SnapOptions {
  min: number;
  max: number;
  step: number | null;
  marks?: SliderMarks | undefined;
}

export function snapValue(value: number, { min, max, step, marks }: SnapOptions): number {
  const clamped = Math.min(max, Math.max(min, value));
  const candidates = getMarkValues(marks).filter((mark) => mark >= min && mark <= max);
  if (step !== null && step > 0) {
    const digits = Math.max(getPrecision(step), getPrecision(min));
    const steps = Math.round((clamped - min) / step);
    const stepped = Number(toFixedPrecision(min + steps * step, digits));
    candidates.push(Math.min(max, stepped));
  }
  if (candidates.length === 0) return clamped;
  let best = clamped;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const candidate of candidates) {
    const distance = Math.abs(candidate - clamped);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}

/** Keyboard move: one step, or the neighbouring mark when `step` is null. */
export function offsetValue(
  value: number,
  direction: 1 | -1,
  { min, max, step, marks }: SnapOptions
): number {
  if (step !== null && step > 0) {
    const digits = Math.max(getPrecision(step), getPrecision(value));
    const next = Number(toFixedPrecision(value + direction * step, digits));
    return Math.min(max, Math.max(min, next));
  }
  const points = getMarkValues(marks).filter((mark) => mark >= min && mark <= max);
  const neighbour =
    direction === 1
      ? points.find((mark) => mark > value)
      : [...points].reverse().find((mark) => mark < value);
  return neighbour ?? value;
}

/** Positions the dots are drawn at: every step plus every mark. */
export function getDotValues(options: SnapOptions): number[] {
  const { min, max, step } = options;
  const values = new Set(getMarkValues(options.marks));
  if (step !== null && step > 0) {
    const digits = getPrecision(step);
    for (let index = 0; min + index * step <= max; index += 1) {
      values.add(Number(toFixedPrecision(min + index * step, digits)));
    }
  }
  return [...values].filter((value) => value >= min && value <= max).sort((a, b) => a - b);
}

/** Index of the handle closest to `value`; ties go to the later handle when moving right of it. */
export function closestHandle(values: readonly number[], value: number): number {
  let index = 0;
  let distance = Number.POSITIVE_INFINITY;
  values.forEach((handle, position) => {
    const next = Math.abs(handle - value);
    if (next < distance || (next === distance && value > handle)) {
      index = position;
      distance = next;
    }
  });
  return index;
}
