// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for component logging - prevents ad-hoc strings.
 * Scope: Define valid event names as const registry. Does not define payload schemas.
 * Invariants: Every logger call site passes an EVENT_NAMES value.
 * Side-effects: none
 * Links: Used by client/logger.ts; consumed by ConfigProvider, Upload, Typography.
 * @public
 */

export const EVENT_NAMES = {
  // Configuration
  CONFIG_INVALID_THEME: "ui.config.invalid_theme",

  // Data entry
  UPLOAD_REQUEST_FAILED: "ui.upload.request_failed",

  // Typography
  TYPOGRAPHY_COPY_FAILED: "ui.typography.copy_failed",

  // Feedback
  MODAL_CONFIRM_REJECTED: "ui.modal.confirm_rejected",
  POPCONFIRM_CONFIRM_REJECTED: "ui.popconfirm.confirm_rejected",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
