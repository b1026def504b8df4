// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/theme/css-vars`
 * Purpose: Serializes tokens into CSS custom properties (`--ant-color-primary: #1890ff`).
 * Scope: Pure. Boolean tokens are not emitted.
 * Invariants: Numeric tokens get `px` except unitless ones (line heights, weights, opacities, z-index).
 * Side-effects: none
 * Links: src/styles/tailwind.preset.ts reads the same names
 * @public
 */

export const DEFAULT_PREFIX_CLS = "ant";

const UNITLESS = /^(lineHeight|fontWeight|opacity|zIndex)/;

/** `colorPrimaryBgHover` -> `color-primary-bg-hover`, `borderRadiusXS` -> `border-radius-xs`. */
export function toKebabCase(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2")
    .replace(/([A-Z])([A-Z][a-z])/g, "$1-$2")
    .toLowerCase();
}

export type CssVariables = Record<`--${string}`, string>;

export function cssVarName(
  key: string,
  prefix = DEFAULT_PREFIX_CLS
): `--${string}` {
  return `--${prefix}-${toKebabCase(key)}`;
}

export function toCssVariables(
  token: object,
  prefix = DEFAULT_PREFIX_CLS
): CssVariables {
  const vars: CssVariables = {};
  for (const [key, value] of Object.entries(token)) {
    if (typeof value === "number") {
      vars[cssVarName(key, prefix)] = UNITLESS.test(key)
        ? String(value)
        : `${value}px`;
    } else if (typeof value === "string") {
      vars[cssVarName(key, prefix)] = value;
    }
  }
  return vars;
}
