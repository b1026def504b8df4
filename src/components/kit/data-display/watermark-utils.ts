// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/watermark-utils`
 * Purpose: Builds the repeating SVG tile behind Watermark as a data URL.
 * Invariants:
 * - The tile is `width + gapX` by `height + gapY`; content is centred in the first `width` x `height` box.
 * - Text lines are stacked `fontSize + 8` px apart and XML-escaped.
 * Side-effects: none
 * @public
 */

export interface WatermarkFont {
  color?: string;
  fontSize?: number;
  fontWeight?: "normal" | "light" | "weight" | "bold" | number;
  fontStyle?: "none" | "normal" | "italic" | "oblique";
  fontFamily?: string;
  textAlign?: "start" | "center" | "end";
}

export interface WatermarkTileOptions {
  content?: string | readonly string[] | undefined;
  image?: string | undefined;
  width?: number | undefined;
  height?: number | undefined;
  rotate?: number | undefined;
  gap?: readonly [number, number] | undefined;
  font?: WatermarkFont | undefined;
}

export interface WatermarkTile {
  url: string;
  width: number;
  height: number;
}

const LINE_SPACING = 8;

const xmlEscapes: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => xmlEscapes[char] ?? char);
}

export function toWatermarkLines(content: WatermarkTileOptions["content"]): string[] {
  if (content === undefined) return [];
  return typeof content === "string" ? [content] : [...content];
}

const anchors = { start: "start", center: "middle", end: "end" } as const;

function fontWeightValue(weight: WatermarkFont["fontWeight"]): string {
  if (weight === "light") return "300";
  if (weight === "weight") return "500";
  return String(weight ?? "normal");
}

/** Inner SVG markup for the content, centred on the origin. */
export function renderWatermarkContent(
  lines: readonly string[],
  { width, height, image, font }: { width: number; height: number; image?: string | undefined; font: WatermarkFont }
): string {
  if (image !== undefined) {
    return `<image href="${escapeXml(image)}" x="${-width / 2}" y="${-height / 2}" width="${width}" height="${height}" preserveAspectRatio="xMidYMid meet"/>`;
  }
  const fontSize = font.fontSize ?? 16;
  const total = lines.length * fontSize + (lines.length - 1) * LINE_SPACING;
  const align = font.textAlign ?? "center";
  const x = align === "start" ? -width / 2 : align === "end" ? width / 2 : 0;
  const tspans = lines
    .map((line, index) => {
      const y = -total / 2 + fontSize / 2 + index * (fontSize + LINE_SPACING);
      return `<tspan x="${x}" y="${y}">${escapeXml(line)}</tspan>`;
    })
    .join("");
  const style = font.fontStyle === "none" ? "normal" : (font.fontStyle ?? "normal");
  return (
    `<text fill="${escapeXml(font.color ?? "rgba(0,0,0,0.15)")}" font-size="${fontSize}" ` +
    `font-weight="${fontWeightValue(font.fontWeight)}" font-style="${style}" ` +
    `font-family="${escapeXml(font.fontFamily ?? "sans-serif")}" ` +
    `text-anchor="${anchors[align]}" dominant-baseline="middle">${tspans}</text>`
  );
}

export function buildWatermarkTile({
  content,
  image,
  width = 120,
  height = 64,
  rotate = -22,
  gap = [100, 100],
  font = {},
}: WatermarkTileOptions): WatermarkTile | null {
  const lines = toWatermarkLines(content);
  if (image === undefined && lines.length === 0) return null;
  const [gapX, gapY] = gap;
  const tileWidth = width + gapX;
  const tileHeight = height + gapY;
  const body = renderWatermarkContent(lines, { width, height, image, font });
  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${tileWidth}" height="${tileHeight}">` +
    `<g transform="translate(${width / 2} ${height / 2}) rotate(${rotate})">${body}</g></svg>`;
  return {
    url: `data:image/svg+xml;charset=utf-8,${encodeURIComponent(svg)}`,
    width: tileWidth,
    height: tileHeight,
  };
}
