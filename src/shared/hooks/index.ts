// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/hooks`
 * Purpose: State and timer hooks shared across components.
 * @public
 */

export type { CountdownOptions } from "./useCountdown";
export { remainingUntil, useCountdown } from "./useCountdown";
export type {
  ControllableStateOptions,
  SetControllableState,
} from "./useControllableState";
export { useControllableState } from "./useControllableState";
export type { DelayedOpen, DelayedOpenOptions } from "./useDelayedOpen";
export { useDelayedOpen } from "./useDelayedOpen";
