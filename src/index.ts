// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `antler-ui`
 * Purpose: Package entry point: components, theme engine, hooks, errors and locale.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export * from "@/components";
export type { SizeType } from "@/styles/theme";
export type { ThemeConfigErrorMeta } from "@/shared/errors";
export {
  isThemeConfigError,
  isUploadRequestError,
  ThemeConfigError,
  UploadRequestError,
} from "@/shared/errors";
export type { CountdownOptions, DelayedOpen, DelayedOpenOptions } from "@/shared/hooks";
export {
  remainingUntil,
  useControllableState,
  useCountdown,
  useDelayedOpen,
} from "@/shared/hooks";
export type { Locale, LocaleSection, PartialLocale } from "@/shared/locale";
export { enUS, mergeLocale } from "@/shared/locale";
export * from "@/shared/theme";
