// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/input-utils`
 * Purpose: Pure helpers behind Input: character count text, TextArea auto height, OTP cell filling.
 * Scope: Callers pass measured values in. `setNativeValue` is the one helper that touches the DOM.
 * Side-effects: none
 * @internal
 */

export interface AutoSizeOptions {
  minRows?: number | undefined;
  maxRows?: number | undefined;
}

export interface AutoSizeMetrics {
  scrollHeight: number;
  lineHeight: number;
  /** Vertical padding plus border, in px. */
  boxExtra: number;
}

/** Height for an auto-sized textarea: content height clamped into [minRows, maxRows] lines. */
export function getAutoSizeHeight(
  { scrollHeight, lineHeight, boxExtra }: AutoSizeMetrics,
  { minRows, maxRows }: AutoSizeOptions = {}
): number {
  let height = scrollHeight + boxExtra;
  if (minRows !== undefined) {
    height = Math.max(height, minRows * lineHeight + boxExtra);
  }
  if (maxRows !== undefined) {
    height = Math.min(height, maxRows * lineHeight + boxExtra);
  }
  return height;
}

/** Counts code points so emoji count once. */
export function countCharacters(value: string): number {
  return Array.from(value).length;
}

/** Cuts a value to `maxLength` code points. */
export function truncateToLength(value: string, maxLength?: number): string {
  if (maxLength === undefined) return value;
  const chars = Array.from(value);
  return chars.length > maxLength ? chars.slice(0, maxLength).join("") : value;
}

export function formatCount(count: number, maxLength?: number): string {
  return maxLength === undefined ? String(count) : `${count} / ${maxLength}`;
}

/** Splits a stored OTP string into `length` cells; missing cells are empty strings. */
export function toOtpCells(value: string, length: number): string[] {
  const chars = Array.from(value);
  return Array.from({ length }, (_, index) => chars[index] ?? "");
}

/** Runs `formatter` over each filled cell, keeping the first character it returns. */
export function formatOtpCells(
  cells: readonly string[],
  formatter: (value: string) => string
): string[] {
  return cells.map((cell) => (cell === "" ? "" : (Array.from(formatter(cell))[0] ?? "")));
}

/**
 * Writes `text` into the cells starting at `index`, one character per cell.
 * Returns the new cells and the index the caret should move to.
 */
export function fillOtpCells(
  cells: readonly string[],
  index: number,
  text: string
): { cells: string[]; nextIndex: number } {
  const next = [...cells];
  const chars = Array.from(text);
  let cursor = index;
  for (const char of chars) {
    if (cursor >= next.length) break;
    next[cursor] = char;
    cursor += 1;
  }
  if (chars.length === 0) next[index] = "";
  return { cells: next, nextIndex: Math.min(cursor, next.length - 1) };
}

/**
 * Sets a form control's value through the prototype setter and fires `input`,
 * so React's onChange runs for controlled and uncontrolled fields alike.
 */
export function setNativeValue(
  element: HTMLInputElement | HTMLTextAreaElement,
  value: string
): void {
  const prototype =
    element instanceof HTMLTextAreaElement
      ? HTMLTextAreaElement.prototype
      : HTMLInputElement.prototype;
  const setter = Object.getOwnPropertyDescriptor(prototype, "value")?.set;
  setter?.call(element, value);
  element.dispatchEvent(new Event("input", { bubbles: true }));
}
