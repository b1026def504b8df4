// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/hooks/useCountdown`
 * Purpose: Remaining milliseconds until a target epoch, re-evaluated on an interval.
 * Scope: Statistic.Countdown; reads Date.now(), never the target's timezone.
 * Invariants: Remaining time clamps at 0; `onFinish` fires once per target; the interval stops at 0 and on unmount.
 * Side-effects: time (setInterval)
 * @public
 */

"use client";

import { useEffect, useRef, useState } from "react";

export interface CountdownOptions {
  onChange?: ((remaining: number) => void) | undefined;
  onFinish?: (() => void) | undefined;
  /** Tick period in ms. */
  interval?: number | undefined;
}

export const remainingUntil = (target: number, now = Date.now()): number =>
  Math.max(0, target - now);

export function useCountdown(
  target: number,
  { onChange, onFinish, interval = 1000 / 30 }: CountdownOptions = {}
): number {
  const [remaining, setRemaining] = useState(() => remainingUntil(target));
  const onChangeRef = useRef(onChange);
  onChangeRef.current = onChange;
  const onFinishRef = useRef(onFinish);
  onFinishRef.current = onFinish;

  useEffect(() => {
    let finished = false;
    const tick = (): boolean => {
      const next = remainingUntil(target);
      setRemaining(next);
      onChangeRef.current?.(next);
      if (next === 0 && !finished) {
        finished = true;
        onFinishRef.current?.();
      }
      return next === 0;
    };

    if (tick()) return undefined;
    const id = setInterval(() => {
      if (tick()) clearInterval(id);
    }, interval);
    return () => clearInterval(id);
  }, [target, interval]);

  return remaining;
}
