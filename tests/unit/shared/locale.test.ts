// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/locale`
 * Purpose: Verifies the bundled English locale and section-wise merging.
 * Side-effects: none
 * Links: src/shared/locale/index.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { enUS, mergeLocale } from "@/shared/locale";

describe("mergeLocale", () => {
  it("returns the base without overrides", () => {
    expect(mergeLocale(enUS)).toBe(enUS);
  });

  it("overrides single strings and keeps the rest of the section", () => {
    const merged = mergeLocale(enUS, {
      locale: "en-GB",
      Modal: { okText: "Confirm" },
    });
    expect(merged.locale).toBe("en-GB");
    expect(merged.Modal).toEqual({
      okText: "Confirm",
      cancelText: "Cancel",
      justOkText: "OK",
    });
    expect(merged.Pagination).toEqual(enUS.Pagination);
  });
});

describe("enUS", () => {
  it("has seven week days and twelve months", () => {
    expect(enUS.Calendar.shortWeekDays).toHaveLength(7);
    expect(enUS.Calendar.shortMonths).toHaveLength(12);
  });
});
