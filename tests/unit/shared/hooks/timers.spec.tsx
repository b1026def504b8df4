// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/hooks/timers`
 * Purpose: Verifies the time-driven hooks: countdown ticking and delayed open/close.
 * Side-effects: time (fake timers)
 * Links: src/shared/hooks/useCountdown.ts, src/shared/hooks/useDelayedOpen.ts
 * @vitest-environment jsdom
 */

import { act, renderHook } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { remainingUntil, useCountdown, useDelayedOpen } from "@/shared/hooks";

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date("2025-01-01T00:00:00.000Z"));
});

afterEach(() => {
  vi.useRealTimers();
});

describe("remainingUntil", () => {
  it("never goes below zero", () => {
    expect(remainingUntil(1500, 1000)).toBe(500);
    expect(remainingUntil(1000, 1500)).toBe(0);
  });
});

describe("useCountdown", () => {
  it("ticks down and finishes once", () => {
    const onFinish = vi.fn();
    const target = Date.now() + 1000;
    const { result } = renderHook(() =>
      useCountdown(target, { onFinish, interval: 100 })
    );
    expect(result.current).toBe(1000);

    act(() => {
      vi.advanceTimersByTime(400);
    });
    expect(result.current).toBe(600);

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(result.current).toBe(0);
    expect(onFinish).toHaveBeenCalledTimes(1);
  });

  it("finishes immediately for a past target", () => {
    const onFinish = vi.fn();
    const { result } = renderHook(() =>
      useCountdown(Date.now() - 10, { onFinish })
    );
    expect(result.current).toBe(0);
    expect(onFinish).toHaveBeenCalledTimes(1);
  });
});

describe("useDelayedOpen", () => {
  it("opens after the enter delay", () => {
    const onOpenChange = vi.fn();
    const { result } = renderHook(() =>
      useDelayedOpen({ enterDelay: 100, onOpenChange })
    );

    act(() => result.current.scheduleOpen());
    expect(result.current.open).toBe(false);

    act(() => {
      vi.advanceTimersByTime(100);
    });
    expect(result.current.open).toBe(true);
    expect(onOpenChange).toHaveBeenCalledWith(true);
  });

  it("a pending open is cancelled by a close", () => {
    const { result } = renderHook(() =>
      useDelayedOpen({ enterDelay: 100, leaveDelay: 0 })
    );

    act(() => result.current.scheduleOpen());
    act(() => result.current.scheduleClose());
    act(() => {
      vi.advanceTimersByTime(200);
    });
    expect(result.current.open).toBe(false);
  });

  it("setOpen applies immediately", () => {
    const { result } = renderHook(() =>
      useDelayedOpen({ enterDelay: 500, defaultOpen: true })
    );

    act(() => result.current.setOpen(false));
    expect(result.current.open).toBe(false);
  });
});
