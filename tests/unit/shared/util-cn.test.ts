// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util`
 * Purpose: Verifies className merging and the small collection helpers.
 * Scope: cn, toArray, omitUndefined, isPromiseLike. Does NOT test styling output.
 * Side-effects: none
 * Links: src/shared/util/index.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { cn, isPromiseLike, omitUndefined, toArray } from "@/shared/util";

describe("cn", () => {
  it("joins conditional classes", () => {
    expect(cn("a", false, undefined, { b: true, c: false })).toBe("a b");
  });

  it("later tailwind utilities win", () => {
    expect(cn("px-2 text-fg", "px-4")).toBe("text-fg px-4");
  });
});

describe("toArray", () => {
  it("normalizes single values and nullish input", () => {
    expect(toArray(1)).toEqual([1]);
    expect(toArray([1, 2])).toEqual([1, 2]);
    expect(toArray(undefined)).toEqual([]);
    expect(toArray(null)).toEqual([]);
  });
});

describe("omitUndefined", () => {
  it("drops undefined keys only", () => {
    expect(omitUndefined({ a: 1, b: undefined, c: null, d: 0 })).toEqual({
      a: 1,
      c: null,
      d: 0,
    });
    expect(Object.keys(omitUndefined({ a: undefined }))).toEqual([]);
  });
});

describe("isPromiseLike", () => {
  it("detects thenables", () => {
    expect(isPromiseLike(Promise.resolve(1))).toBe(true);
    expect(isPromiseLike({ then: () => undefined })).toBe(true);
    expect(isPromiseLike({ then: 1 })).toBe(false);
    expect(isPromiseLike(null)).toBe(false);
    expect(isPromiseLike(undefined)).toBe(false);
  });
});
