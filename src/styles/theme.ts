// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/theme`
 * Purpose: Design token keys and types for type-safe component styling. No values - the resolved token is the source of truth.
 * Scope: Provides typed token names for status colors, neutrals, radius, font sizes and control heights. Does not compute values.
 * Invariants: Keys match the CSS custom properties emitted by `toCssVariables` (prefix `--ant-`); maintains strict typing.
 * Side-effects: none
 * Notes: Single source of typed keys for tailwind.preset.ts and the CVA factories in styles/ui.
 * Links: src/shared/theme/css-vars.ts, src/styles/tailwind.css (defaults)
 * @public
 */

// Semantic status colors; each one carries the shades below
export const statusKeys = [
  "primary",
  "success",
  "warning",
  "error",
  "info",
] as const;

export const statusShadeKeys = [
  "hover",
  "active",
  "bg",
  "bg-hover",
  "border",
  "border-hover",
  "text",
] as const;

// Tailwind color name -> neutral token suffix (`--ant-color-<suffix>`)
export const neutralColorMap = {
  fg: "text",
  "fg-secondary": "text-secondary",
  "fg-tertiary": "text-tertiary",
  "fg-quaternary": "text-quaternary",
  "fg-inverse": "text-light-solid",
  container: "bg-container",
  elevated: "bg-elevated",
  layout: "bg-layout",
  spotlight: "bg-spotlight",
  mask: "bg-mask",
  line: "border",
  "line-secondary": "border-secondary",
  fill: "fill",
  "fill-secondary": "fill-secondary",
  "fill-tertiary": "fill-tertiary",
  "fill-quaternary": "fill-quaternary",
  link: "link",
} as const;

export const radiusKeys = ["xs", "sm", "lg"] as const;

export const fontSizeKeys = ["sm", "lg", "xl"] as const;

export const headingLevels = [1, 2, 3, 4, 5] as const;

export const controlHeightKeys = ["sm", "lg"] as const;

// Component size (Ant Design naming)
export const componentSizeKeys = ["small", "middle", "large"] as const;

// Preset palette names shared by Tag, Badge, Button and Timeline colors
export const presetColorKeys = [
  "blue",
  "purple",
  "cyan",
  "green",
  "magenta",
  "pink",
  "red",
  "orange",
  "yellow",
  "volcano",
  "geekblue",
  "lime",
  "gold",
] as const;

// Type definitions
export type StatusKey = (typeof statusKeys)[number];
export type StatusShadeKey = (typeof statusShadeKeys)[number];
export type NeutralColorName = keyof typeof neutralColorMap;
export type RadiusKey = (typeof radiusKeys)[number];
export type FontSizeKey = (typeof fontSizeKeys)[number];
export type HeadingLevel = (typeof headingLevels)[number];
export type ControlHeightKey = (typeof controlHeightKeys)[number];
export type SizeType = (typeof componentSizeKeys)[number];
export type PresetColorKey = (typeof presetColorKeys)[number];

export function isPresetColor(value: unknown): value is PresetColorKey {
  return (
    typeof value === "string" && presetColorKeys.some((key) => key === value)
  );
}
