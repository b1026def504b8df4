// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/theme/schema`
 * Purpose: Verifies ThemeConfig validation and the ThemeConfigError it raises.
 * Side-effects: none
 * Links: src/shared/theme/schema.ts, src/shared/errors/index.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { isThemeConfigError, ThemeConfigError } from "@/shared/errors";
import { darkAlgorithm, parseThemeConfig } from "@/shared/theme";

function invalidPaths(input: unknown): string[] {
  try {
    parseThemeConfig(input);
  } catch (error) {
    if (isThemeConfigError(error)) return error.meta.invalid;
    throw error;
  }
  return [];
}

describe("parseThemeConfig", () => {
  it("accepts seed, alias and component tokens", () => {
    const config = parseThemeConfig({
      token: { colorPrimary: "#123456", colorText: "#111111" },
      algorithm: darkAlgorithm,
      components: { Button: { borderRadius: 2 } },
    });
    expect(config.token).toEqual({
      colorPrimary: "#123456",
      colorText: "#111111",
    });
    expect(config.algorithm).toBe(darkAlgorithm);
    expect(config.components?.Button).toEqual({ borderRadius: 2 });
  });

  it("rejects malformed colors", () => {
    expect(invalidPaths({ token: { colorPrimary: "nope" } })).toEqual([
      "token.colorPrimary",
    ]);
  });

  it("rejects out of range seeds", () => {
    expect(invalidPaths({ token: { fontSize: 4 } })).toEqual([
      "token.fontSize",
    ]);
  });

  it("rejects unknown tokens", () => {
    expect(invalidPaths({ token: { colorBanana: "#ffffff" } })).toEqual([
      "token.colorBanana",
    ]);
  });

  it("rejects overrides of the wrong type", () => {
    expect(invalidPaths({ token: { colorText: 5 } })).toEqual([
      "token.colorText",
    ]);
  });

  it("rejects unknown components and top-level keys", () => {
    expect(invalidPaths({ components: { Banana: {} } })).toEqual([
      "components",
    ]);
    expect(invalidPaths({ colors: {} })).toEqual(["(root)"]);
  });

  it("raises a ThemeConfigError with a readable message", () => {
    expect(() => parseThemeConfig({ token: { fontSize: 4 } })).toThrow(
      ThemeConfigError
    );
    expect(() => parseThemeConfig({ token: { fontSize: 4 } })).toThrow(
      "Invalid theme config: token.fontSize"
    );
  });
});
