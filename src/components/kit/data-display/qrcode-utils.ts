// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/qrcode-utils`
 * Purpose: Deterministic 21x21 module grid for QRCode, derived from a string hash.
 * Scope: The grid looks like a version-1 code (three finder squares) but is not a scannable encoding.
 * Invariants:
 * - Same text, same grid.
 * - Finder squares sit in the top-left, top-right and bottom-left corners.
 * - With an icon the centre 5x5 modules stay empty.
 * Side-effects: none
 * @public
 */

export const QR_GRID_SIZE = 21;

const FINDER_SIZE = 7;
const ICON_SPAN = 2;

/** 32-bit rolling hash (`h = 31 * h + code`), wrapping like a signed int. */
export function hashString(text: string): number {
  let hash = 0;
  for (let index = 0; index < text.length; index += 1) {
    hash = (Math.imul(31, hash) + text.charCodeAt(index)) | 0;
  }
  return hash;
}

export function toQrText(value: string | readonly string[]): string {
  return typeof value === "string" ? value : value.join("\n");
}

function finderModule(row: number, col: number): boolean | undefined {
  const origins: ReadonlyArray<readonly [number, number]> = [
    [0, 0],
    [0, QR_GRID_SIZE - FINDER_SIZE],
    [QR_GRID_SIZE - FINDER_SIZE, 0],
  ];
  for (const [top, left] of origins) {
    const r = row - top;
    const c = col - left;
    if (r < 0 || c < 0 || r >= FINDER_SIZE || c >= FINDER_SIZE) continue;
    const ring = Math.min(r, c, FINDER_SIZE - 1 - r, FINDER_SIZE - 1 - c);
    // ring 0: outer square, ring 1: gap, ring 2+: 3x3 centre
    return ring !== 1;
  }
  return undefined;
}

function inIconArea(row: number, col: number): boolean {
  const centre = Math.floor(QR_GRID_SIZE / 2);
  return Math.abs(row - centre) <= ICON_SPAN && Math.abs(col - centre) <= ICON_SPAN;
}

/** Rows of modules; `true` is a dark module. */
export function getQrMatrix(text: string, { withIcon = false } = {}): boolean[][] {
  const hash = hashString(text);
  return Array.from({ length: QR_GRID_SIZE }, (_, row) =>
    Array.from({ length: QR_GRID_SIZE }, (_, col) => {
      const finder = finderModule(row, col);
      if (finder !== undefined) return finder;
      if (withIcon && inIconArea(row, col)) return false;
      return ((row * QR_GRID_SIZE + col + hash) | 0) % 3 !== 0;
    })
  );
}

/** One SVG path covering every dark module, in module units. */
export function getQrPath(matrix: readonly (readonly boolean[])[]): string {
  const parts: string[] = [];
  matrix.forEach((cells, row) => {
    cells.forEach((dark, col) => {
      if (dark) parts.push(`M${col} ${row}h1v1h-1z`);
    });
  });
  return parts.join("");
}
