// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/theme/resolve`
 * Purpose: Verifies seed derivation, algorithm composition and theme merging.
 * Scope: resolveToken, mergeThemeConfig, resolveComponentToken. Does NOT cover React bindings.
 * Invariants: Seed overrides feed derivation; other overrides win after it.
 * Side-effects: none
 * Links: src/shared/theme/resolve.ts, src/shared/theme/algorithms.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  compactAlgorithm,
  darkAlgorithm,
  mergeThemeConfig,
  resolveComponentToken,
  resolveToken,
} from "@/shared/theme";

describe("resolveToken", () => {
  it("derives the default light theme", () => {
    const token = resolveToken();
    expect(token.colorPrimary).toBe("#1890ff");
    expect(token.colorPrimaryBg).toBe("#e6f7ff");
    expect(token.colorText).toBe("rgba(0, 0, 0, 0.88)");
    expect(token.fontSizeSM).toBe(12);
    expect(token.fontSizeHeading1).toBe(38);
    expect(token.lineHeight).toBe(1.5714);
    expect(token.controlHeightLG).toBe(40);
    expect(token.borderRadiusLG).toBe(8);
    expect(token.size).toBe(16);
    expect(token.paddingXS).toBe(8);
  });

  it("re-derives sizes from seed overrides", () => {
    const token = resolveToken({ token: { borderRadius: 2 } });
    expect(token.borderRadius).toBe(2);
    expect(token.borderRadiusLG).toBe(3);
    expect(token.borderRadiusXS).toBe(2);
  });

  it("applies alias overrides after derivation", () => {
    const token = resolveToken({ token: { colorText: "#111111" } });
    expect(token.colorText).toBe("#111111");
    expect(token.colorTextSecondary).toBe("rgba(0, 0, 0, 0.65)");
  });

  it("dark algorithm swaps neutrals", () => {
    const token = resolveToken({ algorithm: darkAlgorithm });
    expect(token.colorBgContainer).toBe("#141414");
    expect(token.colorBgLayout).toBe("#000000");
    expect(token.colorText).toBe("rgba(255, 255, 255, 0.88)");
  });

  it("compact algorithm shrinks sizes", () => {
    const token = resolveToken({ algorithm: compactAlgorithm });
    expect(token.fontSize).toBe(12);
    expect(token.controlHeight).toBe(28);
    expect(token.size).toBe(12);
  });

  it("composes algorithms left to right", () => {
    const token = resolveToken({ algorithm: [darkAlgorithm, compactAlgorithm] });
    expect(token.colorBgContainer).toBe("#141414");
    expect(token.controlHeight).toBe(28);
  });

  it("zeroes durations when motion is off", () => {
    expect(resolveToken({ token: { motion: false } }).motionDurationMid).toBe(
      "0s"
    );
  });
});

describe("mergeThemeConfig", () => {
  it("merges tokens and component tokens key-wise", () => {
    const merged = mergeThemeConfig(
      {
        token: { colorPrimary: "#111111", borderRadius: 4 },
        components: { Button: { colorPrimary: "#222222" } },
      },
      {
        token: { borderRadius: 8 },
        components: {
          Button: { borderRadius: 2 },
          Tag: { colorText: "#333333" },
        },
      }
    );
    expect(merged.token).toEqual({ colorPrimary: "#111111", borderRadius: 8 });
    expect(merged.components?.Button).toEqual({
      colorPrimary: "#222222",
      borderRadius: 2,
    });
    expect(merged.components?.Tag).toEqual({ colorText: "#333333" });
  });

  it("the child algorithm wins", () => {
    const merged = mergeThemeConfig(
      { algorithm: darkAlgorithm },
      { algorithm: compactAlgorithm }
    );
    expect(merged.algorithm).toBe(compactAlgorithm);
  });

  it("returns the other side when one is missing", () => {
    const config = { token: { fontSize: 16 } };
    expect(mergeThemeConfig(undefined, config)).toBe(config);
    expect(mergeThemeConfig(config, undefined)).toBe(config);
  });
});

describe("resolveComponentToken", () => {
  it("returns only the defined component overrides", () => {
    expect(
      resolveComponentToken(
        { components: { Tag: { colorText: "#333333", fontSize: undefined } } },
        "Tag"
      )
    ).toEqual({ colorText: "#333333" });
    expect(resolveComponentToken({}, "Tag")).toEqual({});
  });
});
