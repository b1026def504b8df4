// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/data-display/Statistic`
 * Purpose: Verifies Statistic value formatting and the Statistic.Countdown clock and finish callback.
 * Side-effects: time (fake timers)
 * Links: src/components/kit/data-display/Statistic.tsx
 * @public
 */

import { act, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";

import { Statistic } from "@/components/kit/data-display/Statistic";

afterEach(() => {
  vi.useRealTimers();
});

describe("Statistic", () => {
  it("groups the integer part and keeps the decimals apart", () => {
    const { container } = render(
      <Statistic title="Balance" value={1234567.891} precision={2} />
    );

    expect(screen.getByText("Balance")).toBeInTheDocument();
    expect(container.querySelector(".ant-statistic-content-value-int")).toHaveTextContent(
      "1,234,567"
    );
    expect(
      container.querySelector(".ant-statistic-content-value-decimal")
    ).toHaveTextContent(".89");
  });
});

describe("Statistic.Countdown", () => {
  it("counts down to the deadline and finishes once", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
    const onFinish = vi.fn();
    render(
      <Statistic.Countdown
        title="Ends in"
        value={Date.now() + 65_000}
        format="mm:ss"
        onFinish={onFinish}
      />
    );

    expect(screen.getByText("01:05")).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(5_000);
    });
    expect(screen.getByText("01:00")).toBeInTheDocument();
    expect(onFinish).not.toHaveBeenCalled();

    act(() => {
      vi.advanceTimersByTime(61_000);
    });
    expect(screen.getByText("00:00")).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(5_000);
    });
    expect(onFinish).toHaveBeenCalledTimes(1);
  });

  it("finishes immediately for a deadline in the past", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
    const onFinish = vi.fn();
    render(
      <Statistic.Countdown value={Date.now() - 1_000} format="HH:mm:ss" onFinish={onFinish} />
    );

    expect(screen.getByText("00:00:00")).toBeInTheDocument();
    expect(onFinish).toHaveBeenCalledTimes(1);
  });
});
