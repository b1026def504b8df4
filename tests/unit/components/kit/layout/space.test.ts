// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/layout/space`
 * Purpose: Verifies Space size names resolve to token sizes.
 * Side-effects: none
 * Links: src/components/kit/layout/Space.tsx
 * @public
 */

import { describe, expect, it } from "vitest";

import { spaceSizeToPx } from "@/components/kit/layout/Space";
import { resolveToken } from "@/shared/theme";

describe("spaceSizeToPx", () => {
  const token = resolveToken();

  it("maps names to tokens", () => {
    expect(spaceSizeToPx("small", token)).toBe(8);
    expect(spaceSizeToPx("middle", token)).toBe(16);
    expect(spaceSizeToPx("large", token)).toBe(24);
  });

  it("passes numbers through", () => {
    expect(spaceSizeToPx(12, token)).toBe(12);
  });
});
