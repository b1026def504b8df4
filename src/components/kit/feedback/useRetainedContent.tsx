// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/useRetainedContent`
 * Purpose: Keeps Modal and Drawer bodies mounted while closed, so their state survives a close/reopen.
 * Scope: Children render through a portal into a detached element that is moved into the open dialog's body.
 * Invariants:
 * - With destroyOnClose, children render in place and unmount on close.
 * - Otherwise children mount on first open (or immediately with forceRender) and stay mounted.
 * Side-effects: DOM (moves the holder element between the dialog body and a detached state)
 * @internal
 */

"use client";

import type { ReactNode } from "react";
import { useState } from "react";
import { createPortal } from "react-dom";

interface RetainedContentOptions {
  open: boolean;
  destroyOnClose: boolean;
  forceRender: boolean;
}

interface RetainedContent {
  /** Goes inside the dialog body. */
  slot: ReactNode;
  /** Goes anywhere outside the dialog primitive, e.g. beside its root. */
  keeper: ReactNode;
}

export function useRetainedContent(
  children: ReactNode,
  { open, destroyOnClose, forceRender }: RetainedContentOptions
): RetainedContent {
  const [holder] = useState<HTMLDivElement | null>(() => {
    if (typeof document === "undefined") return null;
    const node = document.createElement("div");
    node.style.display = "contents";
    return node;
  });
  const [opened, setOpened] = useState(open);
  if (open && !opened) setOpened(true);

  if (destroyOnClose || !holder) {
    return { slot: children, keeper: null };
  }

  return {
    slot: (
      <div
        style={{ display: "contents" }}
        ref={(node) => {
          if (node) node.appendChild(holder);
        }}
      />
    ),
    keeper: opened || forceRender ? createPortal(children, holder) : null,
  };
}
