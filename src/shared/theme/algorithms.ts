// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/theme/algorithms`
 * Purpose: Seed -> map token derivation: default (light), dark and compact algorithms.
 * Scope: Pure functions. Color and size derivation are independent so algorithms compose.
 * Invariants:
 * - darkAlgorithm replaces colors only; compactAlgorithm replaces sizes only.
 * - Composition runs left to right; each algorithm receives the previous MapToken.
 * Side-effects: none
 * Links: palette.ts, resolve.ts
 * @public
 */

import { darken, mix, setAlpha } from "./color";
import { generateColorPalette } from "./palette";
import type {
  MapToken,
  NeutralColorTokens,
  SeedToken,
  SizeTokens,
  StatusColorTokens,
  ThemeAlgorithm,
} from "./tokens";

const DARK_TEXT_BASE = "#ffffff";
const DARK_BG_BASE = "#141414";
const DARK_SEED_DARKEN = 0.15;

const HEADING_RATIOS = [38, 30, 24, 20, 16] as const;

interface Shades {
  base: string;
  hover: string;
  active: string;
  bg: string;
  bgHover: string;
  border: string;
  borderHover: string;
  text: string;
}

function shadesOf(base: string, seed: SeedToken, dark: boolean): Shades {
  const palette = generateColorPalette(base, {
    dark,
    backgroundColor: seed.colorBgBase,
  });
  const at = (index: number): string => palette[index] ?? base;
  return {
    base,
    bg: at(0),
    bgHover: at(1),
    border: at(2),
    borderHover: at(3),
    hover: at(4),
    active: at(6),
    text: at(5),
  };
}

function genStatusColors(seed: SeedToken, dark: boolean): StatusColorTokens {
  const primary = shadesOf(seed.colorPrimary, seed, dark);
  const success = shadesOf(seed.colorSuccess, seed, dark);
  const warning = shadesOf(seed.colorWarning, seed, dark);
  const error = shadesOf(seed.colorError, seed, dark);
  const info = shadesOf(seed.colorInfo, seed, dark);
  return {
    colorPrimary: primary.base,
    colorPrimaryHover: primary.hover,
    colorPrimaryActive: primary.active,
    colorPrimaryBg: primary.bg,
    colorPrimaryBgHover: primary.bgHover,
    colorPrimaryBorder: primary.border,
    colorPrimaryBorderHover: primary.borderHover,
    colorPrimaryText: primary.text,
    colorSuccess: success.base,
    colorSuccessHover: success.hover,
    colorSuccessActive: success.active,
    colorSuccessBg: success.bg,
    colorSuccessBgHover: success.bgHover,
    colorSuccessBorder: success.border,
    colorSuccessBorderHover: success.borderHover,
    colorSuccessText: success.text,
    colorWarning: warning.base,
    colorWarningHover: warning.hover,
    colorWarningActive: warning.active,
    colorWarningBg: warning.bg,
    colorWarningBgHover: warning.bgHover,
    colorWarningBorder: warning.border,
    colorWarningBorderHover: warning.borderHover,
    colorWarningText: warning.text,
    colorError: error.base,
    colorErrorHover: error.hover,
    colorErrorActive: error.active,
    colorErrorBg: error.bg,
    colorErrorBgHover: error.bgHover,
    colorErrorBorder: error.border,
    colorErrorBorderHover: error.borderHover,
    colorErrorText: error.text,
    colorInfo: info.base,
    colorInfoHover: info.hover,
    colorInfoActive: info.active,
    colorInfoBg: info.bg,
    colorInfoBgHover: info.bgHover,
    colorInfoBorder: info.border,
    colorInfoBorderHover: info.borderHover,
    colorInfoText: info.text,
  };
}

function genNeutralColors(seed: SeedToken, dark: boolean): NeutralColorTokens {
  const text = seed.colorTextBase;
  const bg = seed.colorBgBase;
  return {
    colorText: setAlpha(text, 0.88),
    colorTextSecondary: setAlpha(text, 0.65),
    colorTextTertiary: setAlpha(text, 0.45),
    colorTextQuaternary: setAlpha(text, 0.25),
    colorTextLightSolid: "#ffffff",
    colorBgContainer: bg,
    colorBgElevated: dark ? mix(bg, text, 0.08) : bg,
    colorBgLayout: dark ? "#000000" : mix(bg, text, 0.04),
    colorBgSpotlight: dark ? mix(bg, text, 0.26) : setAlpha(text, 0.85),
    colorBgMask: setAlpha("#000000", 0.45),
    colorBorder: mix(bg, text, dark ? 0.26 : 0.15),
    colorBorderSecondary: mix(bg, text, dark ? 0.19 : 0.06),
    colorFill: setAlpha(text, dark ? 0.18 : 0.15),
    colorFillSecondary: setAlpha(text, dark ? 0.12 : 0.06),
    colorFillTertiary: setAlpha(text, dark ? 0.08 : 0.04),
    colorFillQuaternary: setAlpha(text, dark ? 0.04 : 0.02),
  };
}

/** Unitless line height giving an 8px leading. */
const lineHeightFor = (fontSize: number): number =>
  Math.round(((fontSize + 8) / fontSize) * 10000) / 10000;

export function genSizeTokens(seed: SeedToken): SizeTokens {
  const { fontSize, borderRadius, controlHeight, sizeUnit, sizeStep } = seed;
  const [h1, h2, h3, h4, h5] = HEADING_RATIOS.map((ratio) =>
    Math.round((fontSize * ratio) / 14)
  );
  const duration = (seconds: number): string =>
    seed.motion ? `${seconds}s` : "0s";

  return {
    fontSizeSM: fontSize - 2,
    fontSizeLG: fontSize + 2,
    fontSizeXL: fontSize + 6,
    fontSizeHeading1: h1 ?? fontSize,
    fontSizeHeading2: h2 ?? fontSize,
    fontSizeHeading3: h3 ?? fontSize,
    fontSizeHeading4: h4 ?? fontSize,
    fontSizeHeading5: h5 ?? fontSize,
    lineHeight: lineHeightFor(fontSize),
    lineHeightLG: lineHeightFor(fontSize + 2),
    lineHeightSM: lineHeightFor(fontSize - 2),
    borderRadiusXS: Math.min(2, borderRadius),
    borderRadiusSM: Math.round((borderRadius * 2) / 3),
    borderRadiusLG: Math.round((borderRadius * 4) / 3),
    controlHeightXS: Math.round(controlHeight / 2),
    controlHeightSM: Math.round(controlHeight * 0.75),
    controlHeightLG: Math.round(controlHeight * 1.25),
    size: sizeUnit * sizeStep,
    sizeXXS: sizeUnit * Math.max(1, sizeStep - 3),
    sizeXS: sizeUnit * Math.max(1, sizeStep - 2),
    sizeSM: sizeUnit * Math.max(1, sizeStep - 1),
    sizeMD: sizeUnit * (sizeStep + 1),
    sizeLG: sizeUnit * (sizeStep + 2),
    sizeXL: sizeUnit * (sizeStep + 4),
    sizeXXL: sizeUnit * (sizeStep + 8),
    motionDurationFast: duration(0.1),
    motionDurationMid: duration(0.2),
    motionDurationSlow: duration(0.3),
  };
}

export const defaultAlgorithm: ThemeAlgorithm = (seed) => ({
  ...seed,
  ...genStatusColors(seed, false),
  ...genNeutralColors(seed, false),
  ...genSizeTokens(seed),
});

export const darkAlgorithm: ThemeAlgorithm = (seed, mapToken) => {
  const base = mapToken ?? defaultAlgorithm(seed);
  const darkSeed: SeedToken = {
    ...seed,
    colorTextBase: DARK_TEXT_BASE,
    colorBgBase: DARK_BG_BASE,
    colorPrimary: darken(seed.colorPrimary, DARK_SEED_DARKEN),
    colorSuccess: darken(seed.colorSuccess, DARK_SEED_DARKEN),
    colorWarning: darken(seed.colorWarning, DARK_SEED_DARKEN),
    colorError: darken(seed.colorError, DARK_SEED_DARKEN),
    colorInfo: darken(seed.colorInfo, DARK_SEED_DARKEN),
  };
  return {
    ...base,
    colorTextBase: darkSeed.colorTextBase,
    colorBgBase: darkSeed.colorBgBase,
    ...genStatusColors(darkSeed, true),
    ...genNeutralColors(darkSeed, true),
  };
};

export const compactAlgorithm: ThemeAlgorithm = (seed, mapToken) => {
  const base = mapToken ?? defaultAlgorithm(seed);
  const compactSeed: SeedToken = {
    ...seed,
    fontSize: seed.fontSize - 2,
    controlHeight: seed.controlHeight - 4,
    sizeStep: Math.max(1, seed.sizeStep - 1),
  };
  return {
    ...base,
    fontSize: compactSeed.fontSize,
    controlHeight: compactSeed.controlHeight,
    sizeStep: compactSeed.sizeStep,
    ...genSizeTokens(compactSeed),
  };
};

/** Runs algorithms left to right; an empty list means the default algorithm. */
export function applyAlgorithms(
  seed: SeedToken,
  algorithms: readonly ThemeAlgorithm[]
): MapToken {
  const mapToken = algorithms.reduce<MapToken | undefined>(
    (previous, algorithm) => algorithm(seed, previous),
    undefined
  );
  return mapToken ?? defaultAlgorithm(seed);
}
