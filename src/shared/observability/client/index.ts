// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/client`
 * Purpose: Browser-safe console logging for components.
 * Side-effects: IO (console)
 * @public
 */

export { debug, error, info, warn } from "./logger";
