// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/theme/color`
 * Purpose: Verifies color parsing, conversion and blending.
 * Scope: Pure functions in shared/theme/color. Does NOT cover palettes.
 * Side-effects: none
 * Links: src/shared/theme/color.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
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
} from "@/shared/theme/color";

describe("parseColor", () => {
  it("parses six digit hex", () => {
    expect(parseColor("#1890ff")).toEqual({ r: 24, g: 144, b: 255, a: 1 });
  });

  it("expands three digit hex", () => {
    expect(parseColor("#abc")).toEqual({ r: 170, g: 187, b: 204, a: 1 });
  });

  it("reads alpha from eight digit hex", () => {
    expect(parseColor("#00000080").a).toBe(0.5);
  });

  it("parses rgba()", () => {
    expect(parseColor("rgba(10, 20, 30, 0.5)")).toEqual({
      r: 10,
      g: 20,
      b: 30,
      a: 0.5,
    });
  });

  it("rejects named colors", () => {
    expect(() => parseColor("red")).toThrow("Unsupported color: red");
  });
});

describe("isColor", () => {
  it("accepts hex and rgb()", () => {
    expect(isColor("#fff")).toBe(true);
    expect(isColor("rgb(1,2,3)")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isColor("blue")).toBe(false);
    expect(isColor("#12")).toBe(false);
  });
});

describe("serialization", () => {
  it("toHex drops alpha", () => {
    expect(toHex({ r: 24, g: 144, b: 255, a: 0.3 })).toBe("#1890ff");
  });

  it("toCssColor uses rgba() when translucent", () => {
    expect(toCssColor({ r: 0, g: 0, b: 0, a: 0.45 })).toBe(
      "rgba(0, 0, 0, 0.45)"
    );
    expect(toCssColor({ r: 255, g: 255, b: 255, a: 1 })).toBe("#ffffff");
  });
});

describe("conversions", () => {
  it("rgb to hsl and back", () => {
    expect(rgbToHsl({ r: 255, g: 0, b: 0, a: 1 })).toEqual({
      h: 0,
      s: 1,
      l: 0.5,
    });
    expect(hslToRgb({ h: 120, s: 1, l: 0.5 })).toEqual({
      r: 0,
      g: 255,
      b: 0,
      a: 1,
    });
  });

  it("rgb to hsv and back", () => {
    expect(rgbToHsv({ r: 255, g: 0, b: 0, a: 1 })).toEqual({
      h: 0,
      s: 1,
      v: 1,
    });
    expect(hsvToRgb({ h: 240, s: 1, v: 1 })).toEqual({
      r: 0,
      g: 0,
      b: 255,
      a: 1,
    });
  });

  it("gray has no hue", () => {
    expect(hslToRgb({ h: 200, s: 0, l: 0.5 })).toEqual({
      r: 127.5,
      g: 127.5,
      b: 127.5,
      a: 1,
    });
  });
});

describe("blending", () => {
  it("mix halfway between white and black", () => {
    expect(mix("#ffffff", "#000000", 0.5)).toBe("#808080");
  });

  it("mix clamps the weight", () => {
    expect(mix("#ffffff", "#000000", 2)).toBe("#000000");
  });

  it("lighten and darken", () => {
    expect(lighten("#000000", 0.5)).toBe("#808080");
    expect(darken("#ffffff", 0.5)).toBe("#808080");
  });

  it("setAlpha", () => {
    expect(setAlpha("#000000", 0.88)).toBe("rgba(0, 0, 0, 0.88)");
  });
});
