// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/hooks/useControllableState`
 * Purpose: Verifies controlled and uncontrolled state with change notification.
 * Invariants: onChange fires only when the value changes; controlled values are never overwritten internally.
 * Side-effects: none
 * Links: src/shared/hooks/useControllableState.ts
 * @vitest-environment jsdom
 */

import { act, renderHook } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { useControllableState } from "@/shared/hooks";

describe("useControllableState", () => {
  it("holds its own value when uncontrolled", () => {
    const onChange = vi.fn();
    const { result } = renderHook(() =>
      useControllableState({ defaultValue: 1, onChange })
    );

    act(() => result.current[1](2));
    expect(result.current[0]).toBe(2);
    expect(onChange).toHaveBeenCalledWith(2);

    act(() => result.current[1]((prev) => prev + 3));
    expect(result.current[0]).toBe(5);
  });

  it("skips onChange when the value is unchanged", () => {
    const onChange = vi.fn();
    const { result } = renderHook(() =>
      useControllableState({ defaultValue: "a", onChange })
    );

    act(() => result.current[1]("a"));
    expect(onChange).not.toHaveBeenCalled();
  });

  it("reports but does not apply changes when controlled", () => {
    const onChange = vi.fn();
    const { result } = renderHook(() =>
      useControllableState({ value: 1, defaultValue: 0, onChange })
    );

    act(() => result.current[1](7));
    expect(result.current[0]).toBe(1);
    expect(onChange).toHaveBeenCalledWith(7);
  });
});
