// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/theme/palette`
 * Purpose: Verifies ten-step palette generation from a seed color.
 * Side-effects: none
 * Links: src/shared/theme/palette.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { generateColorPalette } from "@/shared/theme/palette";

describe("generateColorPalette", () => {
  it("keeps the seed at index 5", () => {
    const palette = generateColorPalette("#1890ff");
    expect(palette).toHaveLength(10);
    expect(palette[5]).toBe("#1890ff");
  });

  it("derives the lightest and darkest shades", () => {
    const palette = generateColorPalette("#1890ff");
    expect(palette[0]).toBe("#e6f7ff");
    expect(palette[9]).toBe("#002766");
  });

  it("keeps grays gray", () => {
    const palette = generateColorPalette("#808080");
    for (const shade of palette) {
      const channels = [shade.slice(1, 3), shade.slice(3, 5), shade.slice(5, 7)];
      expect(new Set(channels).size).toBe(1);
    }
  });

  it("dark palettes have ten shades over the background", () => {
    const palette = generateColorPalette("#1890ff", {
      dark: true,
      backgroundColor: "#141414",
    });
    expect(palette).toHaveLength(10);
    expect(palette[0]).not.toBe("#e6f7ff");
  });
});
