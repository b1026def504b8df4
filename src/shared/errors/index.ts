// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/errors`
 * Purpose: Typed errors raised by the theme engine and the default upload request.
 * Scope: Exports error classes and guards. Does not log or report.
 * Invariants:
 * - ThemeConfigError.meta lists every invalid theme path, dot-joined.
 * - UploadRequestError.status is 0 when the request never reached the server.
 * Side-effects: none
 * Links: shared/theme/schema.ts, components/kit/inputs/upload-request.ts
 * @public
 */

export interface ThemeConfigErrorMeta {
  code: "INVALID_THEME_CONFIG";
  invalid: string[];
}

export class ThemeConfigError extends Error {
  readonly meta: ThemeConfigErrorMeta;

  constructor(meta: ThemeConfigErrorMeta) {
    super(`Invalid theme config: ${meta.invalid.join(", ")}`);
    this.name = "ThemeConfigError";
    this.meta = meta;
  }
}

export function isThemeConfigError(error: unknown): error is ThemeConfigError {
  return error instanceof ThemeConfigError;
}

export class UploadRequestError extends Error {
  public readonly status: number;
  public readonly method: string;
  public readonly action: string;

  constructor(status: number, method: string, action: string) {
    super(
      status === 0
        ? `cannot ${method} ${action}: network error`
        : `cannot ${method} ${action} ${status}`
    );
    this.name = "UploadRequestError";
    this.status = status;
    this.method = method;
    this.action = action;
  }
}

export function isUploadRequestError(
  error: unknown
): error is UploadRequestError {
  return error instanceof UploadRequestError;
}
