// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/tailwind.preset`
 * Purpose: Maps typed design token keys onto the `--ant-*` CSS custom properties for Tailwind configuration.
 * Scope: Provides color, radius, font-size and height scales. Does not define actual values.
 * Invariants: Every entry references a CSS custom property written by ConfigProvider or tailwind.css defaults.
 * Side-effects: none
 * Notes: `bg-primary-bg`, `text-fg-secondary`, `border-line` etc. are the class names the CVA factories use.
 * Links: src/styles/theme.ts, tailwind.config.ts
 * @public
 */

import {
  controlHeightKeys,
  fontSizeKeys,
  headingLevels,
  neutralColorMap,
  radiusKeys,
  statusKeys,
  statusShadeKeys,
} from "./theme";

const cssVar = (name: string): string => `var(--ant-${name})`;

// Status colors and their shades: `primary`, `primary-hover`, `error-bg`, ...
export const colors: Record<string, string> = {
  ...Object.fromEntries(
    statusKeys.flatMap((status) => [
      [status, cssVar(`color-${status}`)],
      ...statusShadeKeys.map((shade) => [
        `${status}-${shade}`,
        cssVar(`color-${status}-${shade}`),
      ]),
    ])
  ),
  ...Object.fromEntries(
    Object.entries(neutralColorMap).map(([name, suffix]) => [
      name,
      cssVar(`color-${suffix}`),
    ])
  ),
};

export const borderRadius: Record<string, string> = {
  DEFAULT: cssVar("border-radius"),
  ...Object.fromEntries(
    radiusKeys.map((key) => [key, cssVar(`border-radius-${key}`)])
  ),
};

export const fontSize: Record<string, string> = {
  ant: cssVar("font-size"),
  ...Object.fromEntries(
    fontSizeKeys.map((key) => [`ant-${key}`, cssVar(`font-size-${key}`)])
  ),
  ...Object.fromEntries(
    headingLevels.map((level) => [
      `h${level}`,
      cssVar(`font-size-heading${level}`),
    ])
  ),
};

export const height: Record<string, string> = {
  control: cssVar("control-height"),
  ...Object.fromEntries(
    controlHeightKeys.map((key) => [
      `control-${key}`,
      cssVar(`control-height-${key}`),
    ])
  ),
};

