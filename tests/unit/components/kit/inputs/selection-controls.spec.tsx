// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/selection-controls`
 * Purpose: Verifies Switch toggling, Rate selection and clearing, and Segmented selection.
 * Side-effects: none
 * Links: src/components/kit/inputs/Switch.tsx, Rate.tsx, Segmented.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Rate } from "@/components/kit/inputs/Rate";
import { Segmented } from "@/components/kit/inputs/Segmented";
import { Switch } from "@/components/kit/inputs/Switch";

describe("Switch", () => {
  it("toggles and reports the next state", () => {
    const onChange = vi.fn();
    render(<Switch aria-label="wifi" onChange={onChange} />);

    const control = screen.getByRole("switch", { name: "wifi" });
    fireEvent.click(control);

    expect(control).toHaveAttribute("aria-checked", "true");
    expect(onChange.mock.calls[0]?.[0]).toBe(true);
  });

  it("is disabled while loading", () => {
    const onChange = vi.fn();
    render(<Switch aria-label="wifi" loading onChange={onChange} />);

    const control = screen.getByRole("switch", { name: "wifi" });
    fireEvent.click(control);

    expect(control).toBeDisabled();
    expect(control).toHaveAttribute("aria-busy", "true");
    expect(onChange).not.toHaveBeenCalled();
  });

  it("shows the label for the current state", () => {
    render(
      <Switch aria-label="wifi" defaultChecked checkedChildren="On" unCheckedChildren="Off" />
    );

    expect(screen.getByRole("switch")).toHaveTextContent("On");

    fireEvent.click(screen.getByRole("switch"));

    expect(screen.getByRole("switch")).toHaveTextContent("Off");
  });
});

describe("Rate", () => {
  it("selects the clicked star", () => {
    const onChange = vi.fn();
    render(<Rate onChange={onChange} />);

    const stars = screen.getAllByRole("radio");
    const third = stars[2];
    if (!third) throw new Error("missing star");
    fireEvent.click(third);

    expect(onChange).toHaveBeenCalledWith(3);
    expect(third).toHaveAttribute("aria-checked", "true");
    expect(stars[3]).toHaveAttribute("aria-checked", "false");
  });

  it("clears when the current value is clicked again", () => {
    const onChange = vi.fn();
    render(<Rate defaultValue={2} onChange={onChange} />);

    const second = screen.getAllByRole("radio")[1];
    if (!second) throw new Error("missing star");
    fireEvent.click(second);

    expect(onChange).toHaveBeenCalledWith(0);
  });

  it("keeps the value when allowClear is off", () => {
    const onChange = vi.fn();
    render(<Rate defaultValue={2} allowClear={false} onChange={onChange} />);

    const second = screen.getAllByRole("radio")[1];
    if (!second) throw new Error("missing star");
    fireEvent.click(second);

    expect(onChange).not.toHaveBeenCalled();
  });

  it("steps by half with the keyboard when allowHalf is set", () => {
    const onChange = vi.fn();
    render(<Rate defaultValue={2} allowHalf onChange={onChange} />);

    fireEvent.keyDown(screen.getByRole("radiogroup"), { key: "ArrowRight" });
    expect(onChange).toHaveBeenLastCalledWith(2.5);

    fireEvent.keyDown(screen.getByRole("radiogroup"), { key: "ArrowLeft" });
    expect(onChange).toHaveBeenLastCalledWith(2);
  });

  it("snaps an off-grid value to whole stars when stepping with the keyboard", () => {
    const onChange = vi.fn();
    render(<Rate value={2.5} onChange={onChange} />);

    fireEvent.keyDown(screen.getByRole("radiogroup"), { key: "ArrowRight" });
    expect(onChange).toHaveBeenLastCalledWith(3);

    fireEvent.keyDown(screen.getByRole("radiogroup"), { key: "ArrowLeft" });
    expect(onChange).toHaveBeenLastCalledWith(2);
  });

  it("fills stars from the value", () => {
    render(<Rate defaultValue={2.5} allowHalf count={4} />);

    expect(
      screen.getAllByRole("radio").map((star) => star.getAttribute("data-fill"))
    ).toEqual(["full", "full", "half", "zero"]);
  });

  it("ignores input when disabled", () => {
    const onChange = vi.fn();
    render(<Rate disabled onChange={onChange} />);

    const first = screen.getAllByRole("radio")[0];
    if (!first) throw new Error("missing star");
    fireEvent.click(first);
    fireEvent.keyDown(screen.getByRole("radiogroup"), { key: "ArrowRight" });

    expect(onChange).not.toHaveBeenCalled();
  });
});

describe("Segmented", () => {
  it("selects the first option by default", () => {
    render(<Segmented options={["Daily", "Weekly", "Monthly"]} />);

    expect(screen.getByRole("radio", { name: "Daily" })).toBeChecked();
  });

  it("reports the picked value", () => {
    const onChange = vi.fn();
    render(
      <Segmented
        options={["Daily", { label: "Weekly", value: "w" }, { label: "Yearly", value: "y", disabled: true }]}
        onChange={onChange}
      />
    );

    fireEvent.click(screen.getByRole("radio", { name: "Weekly" }));

    expect(onChange).toHaveBeenCalledWith("w");
    expect(screen.getByRole("radio", { name: "Yearly" })).toBeDisabled();
  });
});
