// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/theme/palette`
 * Purpose: Ten-step color palettes derived from a seed color, plus the preset color seeds.
 * Scope: Pure HSV stepping. Does not know about tokens.
 * Invariants: Light palettes run lighter to darker with the seed at index 5; dark palettes blend towards the background.
 * Side-effects: none
 * @public
 */

import type { PresetColorKey } from "@/styles/theme";

import { hsvToRgb, mix, parseColor, rgbToHsv, toHex } from "./color";
import type { Hsv } from "./color";

const HUE_STEP = 2;
const SATURATION_STEP = 0.16;
const SATURATION_STEP_2 = 0.05;
const BRIGHTNESS_STEP_1 = 0.05;
const BRIGHTNESS_STEP_2 = 0.15;
const LIGHT_COLOR_COUNT = 5;
const DARK_COLOR_COUNT = 4;

// Dark palettes mix palette[index] over the background at the given weight
const DARK_COLOR_MAP: readonly { index: number; opacity: number }[] = [
  { index: 7, opacity: 0.15 },
  { index: 6, opacity: 0.25 },
  { index: 5, opacity: 0.3 },
  { index: 5, opacity: 0.45 },
  { index: 5, opacity: 0.65 },
  { index: 5, opacity: 0.85 },
  { index: 4, opacity: 0.9 },
  { index: 3, opacity: 0.95 },
  { index: 2, opacity: 0.97 },
  { index: 1, opacity: 0.98 },
];

const round2 = (value: number): number => Math.round(value * 100) / 100;

function getHue(hsv: Hsv, i: number, light: boolean): number {
  const h = Math.round(hsv.h);
  const towardsBlue = h >= 60 && h <= 240;
  let hue =
    towardsBlue === light ? h - HUE_STEP * i : h + HUE_STEP * i;
  if (hue < 0) hue += 360;
  else if (hue >= 360) hue -= 360;
  return hue;
}

function getSaturation(hsv: Hsv, i: number, light: boolean): number {
  // Grays stay gray
  if (hsv.h === 0 && hsv.s === 0) return hsv.s;

  let saturation: number;
  if (light) saturation = hsv.s - SATURATION_STEP * i;
  else if (i === DARK_COLOR_COUNT) saturation = hsv.s + SATURATION_STEP;
  else saturation = hsv.s + SATURATION_STEP_2 * i;

  if (saturation > 1) saturation = 1;
  if (light && i === LIGHT_COLOR_COUNT && saturation > 0.1) saturation = 0.1;
  if (saturation < 0.06) saturation = 0.06;
  return round2(saturation);
}

function getValue(hsv: Hsv, i: number, light: boolean): number {
  const value = light
    ? hsv.v + BRIGHTNESS_STEP_1 * i
    : hsv.v - BRIGHTNESS_STEP_2 * i;
  return round2(Math.min(1, value));
}

export interface PaletteOptions {
  dark?: boolean;
  /** Background the dark palette blends over; defaults to `#141414`. */
  backgroundColor?: string;
}

export function generateColorPalette(
  seed: string,
  options: PaletteOptions = {}
): string[] {
  const base = parseColor(seed);
  const hsv = rgbToHsv(base);
  const step = (i: number, light: boolean): string =>
    toHex(
      hsvToRgb({
        h: getHue(hsv, i, light),
        s: getSaturation(hsv, i, light),
        v: getValue(hsv, i, light),
      })
    );

  const patterns: string[] = [];
  for (let i = LIGHT_COLOR_COUNT; i > 0; i -= 1) {
    patterns.push(step(i, true));
  }
  patterns.push(toHex(base));
  for (let i = 1; i <= DARK_COLOR_COUNT; i += 1) {
    patterns.push(step(i, false));
  }

  if (!options.dark) return patterns;

  const background = options.backgroundColor ?? "#141414";
  return DARK_COLOR_MAP.map(({ index, opacity }) =>
    mix(background, patterns[index] ?? toHex(base), opacity)
  );
}

/** Sixth shade of each preset palette. */
export const PRESET_COLORS: Readonly<Record<PresetColorKey, string>> = {
  blue: "#1890ff",
  purple: "#722ed1",
  cyan: "#13c2c2",
  green: "#52c41a",
  magenta: "#eb2f96",
  pink: "#eb2f96",
  red: "#f5222d",
  orange: "#fa8c16",
  yellow: "#fadb14",
  volcano: "#fa541c",
  geekblue: "#2f54eb",
  lime: "#a0d911",
  gold: "#faad14",
};
