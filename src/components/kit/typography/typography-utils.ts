// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/typography/typography-utils`
 * Purpose: Plain-text extraction for copyable typography and ellipsis option normalization.
 * Side-effects: none
 * @internal
 */

import type { ReactNode } from "react";
import { Children, isValidElement } from "react";

/** Concatenates the string and number leaves of a node tree. */
export function nodeToText(node: ReactNode): string {
  return Children.toArray(node)
    .map((child) => {
      if (typeof child === "string" || typeof child === "number") {
        return String(child);
      }
      if (isValidElement<{ children?: ReactNode }>(child)) {
        return nodeToText(child.props.children);
      }
      return "";
    })
    .join("");
}

export interface EllipsisConfig {
  rows?: number;
}

export type EllipsisMode = "none" | "single" | "multiple";

export function resolveEllipsis(ellipsis: boolean | EllipsisConfig | undefined): {
  mode: EllipsisMode;
  rows: number;
} {
  if (!ellipsis) return { mode: "none", rows: 0 };
  const rows = ellipsis === true ? 1 : Math.max(1, ellipsis.rows ?? 1);
  return { mode: rows > 1 ? "multiple" : "single", rows };
}
