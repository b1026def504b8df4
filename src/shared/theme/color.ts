// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/theme/color`
 * Purpose: Color parsing, conversion and blending used to derive design tokens.
 * Scope: Pure functions over `#rgb`, `#rrggbb`, `#rrggbbaa` and `rgb()/rgba()` strings. No named colors.
 * Invariants: Channels are 0-255 integers after rounding; alpha is 0-1; output hex is lowercase.
 * Side-effects: none
 * Links: palette.ts, algorithms.ts
 * @public
 */

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface Hsl {
  h: number;
  s: number;
  l: number;
}

export interface Hsv {
  h: number;
  s: number;
  v: number;
}

const HEX_PATTERN = /^#?([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const RGB_PATTERN =
  /^rgba?\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*(?:,\s*([01]?(?:\.\d+)?)\s*)?\)$/i;

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

const round2 = (value: number): number => Math.round(value * 100) / 100;

export function isColor(input: string): boolean {
  return HEX_PATTERN.test(input.trim()) || RGB_PATTERN.test(input.trim());
}

/**
 * Parses a hex or rgb()/rgba() string.
 * @throws Error when the input is not a supported color
 */
export function parseColor(input: string): Rgba {
  const value = input.trim();
  const hex = HEX_PATTERN.exec(value);
  if (hex?.[1]) {
    let digits = hex[1];
    if (digits.length === 3) {
      digits = [...digits].map((d) => d + d).join("");
    }
    return {
      r: Number.parseInt(digits.slice(0, 2), 16),
      g: Number.parseInt(digits.slice(2, 4), 16),
      b: Number.parseInt(digits.slice(4, 6), 16),
      a:
        digits.length === 8
          ? round2(Number.parseInt(digits.slice(6, 8), 16) / 255)
          : 1,
    };
  }

  const rgb = RGB_PATTERN.exec(value);
  if (rgb) {
    return {
      r: clamp(Number(rgb[1]), 0, 255),
      g: clamp(Number(rgb[2]), 0, 255),
      b: clamp(Number(rgb[3]), 0, 255),
      a: rgb[4] === undefined ? 1 : clamp(Number(rgb[4]), 0, 1),
    };
  }

  throw new Error(`Unsupported color: ${input}`);
}

const channelHex = (channel: number): string =>
  Math.round(clamp(channel, 0, 255)).toString(16).padStart(2, "0");

/** `#rrggbb`; alpha is dropped. */
export function toHex(color: Rgba): string {
  return `#${channelHex(color.r)}${channelHex(color.g)}${channelHex(color.b)}`;
}

/** Hex when opaque, `rgba(r, g, b, a)` otherwise. */
export function toCssColor(color: Rgba): string {
  if (color.a >= 1) return toHex(color);
  const r = Math.round(color.r);
  const g = Math.round(color.g);
  const b = Math.round(color.b);
  return `rgba(${r}, ${g}, ${b}, ${round2(color.a)})`;
}

export function rgbToHsl({ r, g, b }: Rgba): Hsl {
  const rn = r / 255;
  const gn = g / 255;
  const bn = b / 255;
  const max = Math.max(rn, gn, bn);
  const min = Math.min(rn, gn, bn);
  const l = (max + min) / 2;
  if (max === min) return { h: 0, s: 0, l };

  const d = max - min;
  const s = l > 0.5 ? d / (2 - max - min) : d / (max + min);
  let h: number;
  if (max === rn) h = (gn - bn) / d + (gn < bn ? 6 : 0);
  else if (max === gn) h = (bn - rn) / d + 2;
  else h = (rn - gn) / d + 4;
  return { h: h * 60, s, l };
}

function hueToChannel(p: number, q: number, t: number): number {
  let tt = t;
  if (tt < 0) tt += 1;
  if (tt > 1) tt -= 1;
  if (tt < 1 / 6) return p + (q - p) * 6 * tt;
  if (tt < 1 / 2) return q;
  if (tt < 2 / 3) return p + (q - p) * (2 / 3 - tt) * 6;
  return p;
}

export function hslToRgb({ h, s, l }: Hsl, a = 1): Rgba {
  if (s === 0) {
    const gray = l * 255;
    return { r: gray, g: gray, b: gray, a };
  }
  const hn = (((h % 360) + 360) % 360) / 360;
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
  const p = 2 * l - q;
  return {
    r: hueToChannel(p, q, hn + 1 / 3) * 255,
    g: hueToChannel(p, q, hn) * 255,
    b: hueToChannel(p, q, hn - 1 / 3) * 255,
    a,
  };
}

export function rgbToHsv({ r, g, b }: Rgba): Hsv {
  const rn = r / 255;
  const gn = g / 255;
  const bn = b / 255;
  const max = Math.max(rn, gn, bn);
  const min = Math.min(rn, gn, bn);
  const d = max - min;
  const s = max === 0 ? 0 : d / max;
  if (d === 0) return { h: 0, s, v: max };

  let h: number;
  if (max === rn) h = (gn - bn) / d + (gn < bn ? 6 : 0);
  else if (max === gn) h = (bn - rn) / d + 2;
  else h = (rn - gn) / d + 4;
  return { h: h * 60, s, v: max };
}

export function hsvToRgb({ h, s, v }: Hsv, a = 1): Rgba {
  const hn = ((((h % 360) + 360) % 360) / 360) * 6;
  const i = Math.floor(hn);
  const f = hn - i;
  const p = v * (1 - s);
  const q = v * (1 - f * s);
  const t = v * (1 - (1 - f) * s);
  const sector = i % 6;
  const [r, g, b]: [number, number, number] =
    sector === 0
      ? [v, t, p]
      : sector === 1
        ? [q, v, p]
        : sector === 2
          ? [p, v, t]
          : sector === 3
            ? [p, q, v]
            : sector === 4
              ? [t, p, v]
              : [v, p, q];
  return { r: r * 255, g: g * 255, b: b * 255, a };
}

/** Linear blend; weight 0 returns `base`, 1 returns `other`. */
export function mix(base: string, other: string, weight: number): string {
  const a = parseColor(base);
  const b = parseColor(other);
  const w = clamp(weight, 0, 1);
  return toCssColor({
    r: a.r * (1 - w) + b.r * w,
    g: a.g * (1 - w) + b.g * w,
    b: a.b * (1 - w) + b.b * w,
    a: a.a * (1 - w) + b.a * w,
  });
}

/** Moves each channel `amount` of the way towards white. */
export function lighten(color: string, amount: number): string {
  const c = parseColor(color);
  const w = clamp(amount, 0, 1);
  return toCssColor({
    r: c.r + (255 - c.r) * w,
    g: c.g + (255 - c.g) * w,
    b: c.b + (255 - c.b) * w,
    a: c.a,
  });
}

/** Scales each channel by `1 - amount`. */
export function darken(color: string, amount: number): string {
  const c = parseColor(color);
  const w = clamp(amount, 0, 1);
  return toCssColor({
    r: c.r * (1 - w),
    g: c.g * (1 - w),
    b: c.b * (1 - w),
    a: c.a,
  });
}

export function setAlpha(color: string, alpha: number): string {
  return toCssColor({ ...parseColor(color), a: clamp(alpha, 0, 1) });
}
