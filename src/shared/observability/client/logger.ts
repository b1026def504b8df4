// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/client/logger`
 * Purpose: Console sink for component events: rejected theme configs, failed upload requests,
 * clipboard failures and rejected Modal/Popconfirm confirm handlers.
 * Scope: One line per event, `[UI] LEVEL <event>` followed by the scrubbed metadata as JSON.
 * Invariants:
 * - Event names come from EVENT_NAMES only.
 * - debug/info print only when NODE_ENV is "development"; warn/error always print.
 * - Forbidden keys never reach the console; long strings and arrays are cut with a marker.
 * Side-effects: IO (console)
 * Links: ../events/index.ts
 * @public
 */

import safeStringify from "fast-safe-stringify";
import type { EventName } from "../events";

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogMeta = Record<string, unknown>;

/** Compared lowercase */
const FORBIDDEN_KEYS = new Set([
  "password",
  "token",
  "apikey",
  "authorization",
  "cookie",
  "set-cookie",
]);

const MAX_STRING_LENGTH = 2048;
const MAX_ARRAY_ITEMS = 100;
const TRUNCATED = "[TRUNCATED]";

const DEV_ONLY: ReadonlySet<LogLevel> = new Set(["debug", "info"]);

function scrubValue(value: unknown): unknown {
  if (typeof value === "string" && value.length > MAX_STRING_LENGTH) {
    return `${value.slice(0, MAX_STRING_LENGTH)}${TRUNCATED}`;
  }
  if (Array.isArray(value) && value.length > MAX_ARRAY_ITEMS) {
    return [...value.slice(0, MAX_ARRAY_ITEMS), TRUNCATED];
  }
  return value;
}

/** Shallow scrub; nested objects are serialized as given. */
function formatMeta(meta: LogMeta | undefined): string {
  if (!meta) return "{}";
  const entries = Object.entries(meta)
    .filter(([key]) => !FORBIDDEN_KEYS.has(key.toLowerCase()))
    .map(([key, value]) => [key, scrubValue(value)] as const);
  try {
    return safeStringify(Object.fromEntries(entries));
  } catch {
    return '"SERIALIZATION_FAILED"';
  }
}

function emit(level: LogLevel, event: EventName, meta: LogMeta | undefined): void {
  // Read at call time so tests can stub NODE_ENV
  if (DEV_ONLY.has(level) && process.env.NODE_ENV !== "development") return;
  console[level](`[UI] ${level.toUpperCase()} ${event}`, formatMeta(meta));
}

export function debug(event: EventName, meta?: LogMeta): void {
  emit("debug", event, meta);
}

export function info(event: EventName, meta?: LogMeta): void {
  emit("info", event, meta);
}

/** Recoverable: the component fell back or kept its previous state. */
export function warn(event: EventName, meta?: LogMeta): void {
  emit("warn", event, meta);
}

/** A user callback or request failed and the caller was told through a status or rejection. */
export function error(event: EventName, meta?: LogMeta): void {
  emit("error", event, meta);
}
