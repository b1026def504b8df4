// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/errors`
 * Purpose: Verifies error messages and type guards of the library's error classes.
 * Side-effects: none
 * Links: src/shared/errors/index.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  isThemeConfigError,
  isUploadRequestError,
  ThemeConfigError,
  UploadRequestError,
} from "@/shared/errors";

describe("UploadRequestError", () => {
  it("formats HTTP failures", () => {
    const error = new UploadRequestError(500, "post", "/upload");
    expect(error.message).toBe("cannot post /upload 500");
    expect(error.name).toBe("UploadRequestError");
    expect(error.status).toBe(500);
    expect(isUploadRequestError(error)).toBe(true);
  });

  it("formats network failures", () => {
    expect(new UploadRequestError(0, "put", "/files").message).toBe(
      "cannot put /files: network error"
    );
  });
});

describe("ThemeConfigError", () => {
  it("lists invalid paths", () => {
    const error = new ThemeConfigError({
      code: "INVALID_THEME_CONFIG",
      invalid: ["token.colorPrimary", "components"],
    });
    expect(error.message).toBe(
      "Invalid theme config: token.colorPrimary, components"
    );
    expect(isThemeConfigError(error)).toBe(true);
    expect(isThemeConfigError(new Error("other"))).toBe(false);
  });
});
