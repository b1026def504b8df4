// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/number-utils`
 * Purpose: Decimal-safe stepping, clamping and precision helpers for InputNumber.
 * Invariants:
 * - Rounding is half away from zero, done on the decimal string so 1.005 rounds to 1.01.
 * - A stepped value never leaves [min, max].
 * Side-effects: none
 * @public
 */

/** Number of decimals a value is written with (`1.25` -> 2, `1e-7` -> 7). */
export function getPrecision(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const text = String(value);
  const exponent = /e-(\d+)$/.exec(text);
  if (exponent?.[1] !== undefined) {
    const mantissa = text.slice(0, exponent.index);
    const mantissaDecimals = mantissa.split(".")[1]?.length ?? 0;
    return Number(exponent[1]) + mantissaDecimals;
  }
  return text.split(".")[1]?.length ?? 0;
}

export function toFixedPrecision(value: number, precision: number): string {
  const text = String(Math.abs(value));
  if (text.includes("e")) return value.toFixed(precision);
  const scaled = Math.round(Number(`${text}e${precision}`));
  const rounded = Math.sign(value) * Number(`${scaled}e-${precision}`);
  // -0 prints as "0"
  return (Object.is(rounded, -0) ? 0 : rounded).toFixed(precision);
}

export function clampValue(value: number, min?: number, max?: number): number {
  let next = value;
  if (min !== undefined && next < min) next = min;
  if (max !== undefined && next > max) next = max;
  return next;
}

export interface StepOptions {
  min?: number | undefined;
  max?: number | undefined;
  precision?: number | undefined;
}

/**
 * One step up (`1`) or down (`-1`) from `value`; an empty value steps from 0.
 * Without an explicit precision the result keeps the larger of value's and step's decimals.
 */
export function stepValue(
  value: number | null,
  step: number,
  direction: 1 | -1,
  { min, max, precision }: StepOptions = {}
): number {
  const base = value ?? 0;
  const digits = precision ?? Math.max(getPrecision(base), getPrecision(step));
  const next = Number(toFixedPrecision(base + direction * step, digits));
  return clampValue(next, min, max);
}

/** Parses user text; empty text is `null`, anything unparsable is `undefined`. */
export function parseNumber(text: string): number | null | undefined {
  const trimmed = text.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}
