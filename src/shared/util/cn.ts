// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util/cn`
 * Purpose: Merges Tailwind class names with conflict resolution via clsx and tailwind-merge.
 * Scope: Combines CVA factory output with caller `className` overrides. Does not handle style objects.
 * Invariants: Later classes win on Tailwind conflicts; falsy inputs are dropped.
 * Side-effects: none
 * @internal
 */
import { type ClassValue, clsx } from "clsx";
import { twMerge } from "tailwind-merge";

export function cn(...inputs: ClassValue[]): string {
  return twMerge(clsx(inputs));
}
