// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/general/button-utils`
 * Purpose: Pure helpers behind Button: type -> color/variant mapping, CJK space insertion, color variables.
 * Scope: No React state. Palette math for preset colors is delegated to the theme engine.
 * Invariants: Explicit `color`/`variant` beat the `type` shorthand; `danger` beats the type's color.
 * Side-effects: none
 * @internal
 */

import type { CSSProperties } from "react";

import { generateColorPalette, PRESET_COLORS } from "@/shared/theme";
import { isPresetColor } from "@/styles/theme";
import type { PresetColorKey } from "@/styles/theme";
import type { ButtonVariant } from "@/styles/ui";

export type ButtonType = "default" | "primary" | "dashed" | "text" | "link";
export type ButtonColor = "default" | "primary" | "danger" | PresetColorKey;

const typeMap: Record<ButtonType, [ButtonColor, ButtonVariant]> = {
  default: ["default", "outlined"],
  primary: ["primary", "solid"],
  dashed: ["default", "dashed"],
  text: ["default", "text"],
  link: ["primary", "link"],
};

export interface ButtonAppearanceInput {
  type?: ButtonType | undefined;
  color?: ButtonColor | undefined;
  variant?: ButtonVariant | undefined;
  danger?: boolean | undefined;
}

export function resolveButtonAppearance({
  type = "default",
  color,
  variant,
  danger,
}: ButtonAppearanceInput): { color: ButtonColor; variant: ButtonVariant } {
  const [typeColor, typeVariant] = typeMap[type];
  return {
    color: color ?? (danger ? "danger" : typeColor),
    variant: variant ?? typeVariant,
  };
}

const TWO_CJK_CHARS = /^[\u4e00-\u9fa5]{2}$/;

export function isTwoCJKChars(text: string): boolean {
  return TWO_CJK_CHARS.test(text);
}

/** `"确定"` -> `"确 定"`; anything else is returned unchanged. */
export function insertSpace(text: string): string {
  return isTwoCJKChars(text) ? [...text].join(" ") : text;
}

const tokenColor = (name: string): string => `var(--ant-color-${name})`;

function statusVars(status: "primary" | "error"): CSSProperties {
  return {
    "--btn-main": tokenColor(status),
    "--btn-hover": tokenColor(`${status}-hover`),
    "--btn-active": tokenColor(`${status}-active`),
    "--btn-soft": tokenColor(`${status}-bg`),
    "--btn-soft-hover": tokenColor(`${status}-bg-hover`),
    "--btn-border": tokenColor(status),
    "--btn-text": tokenColor(status),
  };
}

/** `--btn-*` variables the button variants read. */
export function getButtonColorVars(
  color: ButtonColor,
  variant: ButtonVariant,
  ghost = false
): CSSProperties {
  if (color === "primary") return statusVars("primary");
  if (color === "danger") return statusVars("error");
  if (isPresetColor(color)) {
    const palette = generateColorPalette(PRESET_COLORS[color]);
    const shade = (index: number): string =>
      palette[index] ?? PRESET_COLORS[color];
    return {
      "--btn-main": shade(5),
      "--btn-hover": shade(4),
      "--btn-active": shade(6),
      "--btn-soft": shade(0),
      "--btn-soft-hover": shade(1),
      "--btn-border": shade(5),
      "--btn-text": shade(5),
    };
  }
  if (ghost) {
    return {
      "--btn-main": tokenColor("text-light-solid"),
      "--btn-hover": tokenColor("primary-hover"),
      "--btn-active": tokenColor("primary-active"),
      "--btn-soft": "transparent",
      "--btn-soft-hover": "transparent",
      "--btn-border": tokenColor("text-light-solid"),
      "--btn-text": tokenColor("text-light-solid"),
    };
  }
  return {
    "--btn-main": variant === "solid" ? tokenColor("text") : tokenColor("link"),
    "--btn-hover":
      variant === "solid" ? tokenColor("text-secondary") : tokenColor("primary-hover"),
    "--btn-active":
      variant === "solid" ? tokenColor("text") : tokenColor("primary-active"),
    "--btn-soft": tokenColor("fill-tertiary"),
    "--btn-soft-hover": tokenColor("fill-secondary"),
    "--btn-border": tokenColor("border"),
    "--btn-text": tokenColor("text"),
  };
}
