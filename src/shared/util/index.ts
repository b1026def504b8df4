// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util`
 * Purpose: Public surface for shared utilities via re-exports.
 * Scope: Re-exports public utility functions. Does not export internal helpers or types.
 * Invariants: No circular dependencies; maintains clean public API.
 * Side-effects: none
 * Links: src/index.ts
 * @public
 */

export { cn } from "./cn";
export { toArray, omitUndefined } from "./collections";
export { isPromiseLike } from "./promise";
