// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/theme/css-vars`
 * Purpose: Verifies token to CSS custom property serialization.
 * Side-effects: none
 * Links: src/shared/theme/css-vars.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { cssVarName, toCssVariables, toKebabCase } from "@/shared/theme/css-vars";

describe("toKebabCase", () => {
  it.each([
    ["colorPrimaryBgHover", "color-primary-bg-hover"],
    ["borderRadiusXS", "border-radius-xs"],
    ["fontSizeHeading1", "font-size-heading1"],
  ])("%s -> %s", (input, expected) => {
    expect(toKebabCase(input)).toBe(expected);
  });
});

describe("toCssVariables", () => {
  it("adds px to sizes only", () => {
    expect(
      toCssVariables({
        colorPrimary: "#1890ff",
        fontSize: 14,
        lineHeight: 1.5714,
        motion: true,
      })
    ).toEqual({
      "--ant-color-primary": "#1890ff",
      "--ant-font-size": "14px",
      "--ant-line-height": "1.5714",
    });
  });

  it("honours a custom prefix", () => {
    expect(cssVarName("colorText", "x")).toBe("--x-color-text");
    expect(toCssVariables({ zIndexPopup: 1050 }, "x")).toEqual({
      "--x-z-index-popup": "1050",
    });
  });
});
