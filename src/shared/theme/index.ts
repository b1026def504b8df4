// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/theme`
 * Purpose: Design token engine - seed tokens, algorithms, palettes and CSS variable output.
 * Scope: Public entry point. React bindings live in components/kit/theme.
 * Side-effects: none
 * @public
 */

export {
  applyAlgorithms,
  compactAlgorithm,
  darkAlgorithm,
  defaultAlgorithm,
  genSizeTokens,
} from "./algorithms";
export type { Hsl, Hsv, Rgba } from "./color";
export {
  darken,
  hslToRgb,
  hsvToRgb,
  isColor,
  lighten,
  mix,
  parseColor,
  rgbToHsl,
  rgbToHsv,
  setAlpha,
  toCssColor,
  toHex,
} from "./color";
export type { CssVariables } from "./css-vars";
export {
  cssVarName,
  DEFAULT_PREFIX_CLS,
  toCssVariables,
  toKebabCase,
} from "./css-vars";
export type { PaletteOptions } from "./palette";
export { generateColorPalette, PRESET_COLORS } from "./palette";
export {
  mergeThemeConfig,
  resolveComponentToken,
  resolveToken,
} from "./resolve";
export { parseThemeConfig } from "./schema";
export type {
  AliasToken,
  ComponentName,
  ComponentTokenMap,
  MapToken,
  SeedToken,
  ThemeAlgorithm,
  ThemeConfig,
} from "./tokens";
export { componentNames, defaultSeed } from "./tokens";
