// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/Slider`
 * Purpose: Verifies keyboard stepping, range ordering, mark-only stepping and the value tooltip.
 * Side-effects: none
 * Links: src/components/kit/inputs/Slider.tsx, slider-utils.ts
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Slider } from "@/components/kit/inputs/Slider";
import { ConfigProvider } from "@/components/kit/theme";

describe("Slider", () => {
  it("steps with arrow keys and commits", () => {
    const onChange = vi.fn();
    const onChangeComplete = vi.fn();
    render(
      <Slider defaultValue={30} onChange={onChange} onChangeComplete={onChangeComplete} />
    );

    const handle = screen.getByRole("slider");
    fireEvent.keyDown(handle, { key: "ArrowRight" });

    expect(onChange).toHaveBeenCalledWith(31);
    expect(onChangeComplete).toHaveBeenCalledWith(31);
    expect(handle).toHaveAttribute("aria-valuenow", "31");
  });

  it("jumps to the bounds with Home and End", () => {
    const onChange = vi.fn();
    render(<Slider defaultValue={30} min={10} max={60} onChange={onChange} />);

    const handle = screen.getByRole("slider");
    fireEvent.keyDown(handle, { key: "End" });
    expect(onChange).toHaveBeenLastCalledWith(60);

    fireEvent.keyDown(handle, { key: "Home" });
    expect(onChange).toHaveBeenLastCalledWith(10);
  });

  it("reverses horizontal keys in rtl", () => {
    const onChange = vi.fn();
    render(
      <ConfigProvider direction="rtl">
        <Slider defaultValue={30} onChange={onChange} />
      </ConfigProvider>
    );

    fireEvent.keyDown(screen.getByRole("slider"), { key: "ArrowRight" });

    expect(onChange).toHaveBeenCalledWith(29);
  });

  it("moves between marks when step is null", () => {
    const onChange = vi.fn();
    render(
      <Slider
        step={null}
        defaultValue={0}
        marks={{ 0: "0°C", 26: "26°C", 100: "100°C" }}
        onChange={onChange}
      />
    );

    fireEvent.keyDown(screen.getByRole("slider"), { key: "ArrowUp" });

    expect(onChange).toHaveBeenCalledWith(26);
    expect(screen.getByText("26°C")).toBeInTheDocument();
  });

  it("keeps range values ordered when a handle passes the other", () => {
    const onChange = vi.fn();
    render(<Slider range defaultValue={[20, 40]} onChange={onChange} />);

    const [first] = screen.getAllByRole("slider");
    if (!first) throw new Error("missing handle");
    fireEvent.keyDown(first, { key: "End" });

    expect(onChange).toHaveBeenCalledWith([40, 100]);
    expect(
      screen.getAllByRole("slider").map((handle) => handle.getAttribute("aria-valuenow"))
    ).toEqual(["40", "100"]);
  });

  it("shows the formatted value while focused", () => {
    render(<Slider defaultValue={30} tooltip={{ formatter: (value) => `${value}%` }} />);

    fireEvent.focus(screen.getByRole("slider"));

    expect(screen.getByRole("tooltip")).toHaveTextContent("30%");
  });

  it("ignores keys when disabled", () => {
    const onChange = vi.fn();
    render(<Slider defaultValue={30} disabled onChange={onChange} />);

    fireEvent.keyDown(screen.getByRole("slider"), { key: "ArrowRight" });

    expect(onChange).not.toHaveBeenCalled();
  });
});
