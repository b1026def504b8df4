// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/hooks/useDelayedOpen`
 * Purpose: Open state with enter/leave delays for hover-driven overlays (Tooltip, Popover, Dropdown, Menu popups).
 * Scope: Timer bookkeeping only; callers wire the pointer and focus events.
 * Invariants:
 * - At most one pending timer; a new schedule cancels the pending one.
 * - Pending timers are cleared on unmount.
 * - A delay of 0 applies synchronously.
 * Side-effects: time (setTimeout)
 * @public
 */

"use client";

import { useCallback, useEffect, useRef } from "react";

import { useControllableState } from "./useControllableState";

export interface DelayedOpenOptions {
  open?: boolean | undefined;
  defaultOpen?: boolean | undefined;
  onOpenChange?: ((open: boolean) => void) | undefined;
  /** Milliseconds before opening. */
  enterDelay?: number | undefined;
  /** Milliseconds before closing. */
  leaveDelay?: number | undefined;
}

export interface DelayedOpen {
  open: boolean;
  scheduleOpen: () => void;
  scheduleClose: () => void;
  setOpen: (open: boolean) => void;
  cancel: () => void;
}

export function useDelayedOpen({
  open,
  defaultOpen = false,
  onOpenChange,
  enterDelay = 0,
  leaveDelay = 0,
}: DelayedOpenOptions): DelayedOpen {
  const [current, setCurrent] = useControllableState({
    value: open,
    defaultValue: defaultOpen,
    onChange: onOpenChange,
  });
  const timer = useRef<ReturnType<typeof setTimeout> | null>(null);

  const cancel = useCallback(() => {
    if (timer.current !== null) {
      clearTimeout(timer.current);
      timer.current = null;
    }
  }, []);

  const schedule = useCallback(
    (next: boolean, delay: number) => {
      cancel();
      if (delay <= 0) {
        setCurrent(next);
        return;
      }
      timer.current = setTimeout(() => {
        timer.current = null;
        setCurrent(next);
      }, delay);
    },
    [cancel, setCurrent]
  );

  useEffect(() => cancel, [cancel]);

  const scheduleOpen = useCallback(
    () => schedule(true, enterDelay),
    [schedule, enterDelay]
  );
  const scheduleClose = useCallback(
    () => schedule(false, leaveDelay),
    [schedule, leaveDelay]
  );
  const setOpen = useCallback(
    (next: boolean) => schedule(next, 0),
    [schedule]
  );

  return { open: current, scheduleOpen, scheduleClose, setOpen, cancel };
}
