// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/InputNumber`
 * Purpose: Verifies stepping, clamping on commit, precision and keyboard control.
 * Side-effects: none
 * Links: src/components/kit/inputs/InputNumber.tsx, number-utils.ts
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { InputNumber } from "@/components/kit/inputs/InputNumber";

describe("InputNumber", () => {
  it("steps with the handlers without float drift", () => {
    const onChange = vi.fn();
    const onStep = vi.fn();
    render(
      <InputNumber
        aria-label="amount"
        defaultValue={0.2}
        step={0.1}
        onChange={onChange}
        onStep={onStep}
      />
    );

    fireEvent.click(screen.getByRole("button", { name: "Increase Value" }));

    expect(onChange).toHaveBeenCalledWith(0.3);
    expect(onStep).toHaveBeenCalledWith(0.3, { offset: 0.1, type: "up" });
    expect(screen.getByRole("spinbutton")).toHaveValue("0.3");
  });

  it("disables the up handler at max", () => {
    render(<InputNumber aria-label="amount" defaultValue={3} max={3} />);

    expect(screen.getByRole("button", { name: "Increase Value" })).toBeDisabled();
    expect(screen.getByRole("button", { name: "Decrease Value" })).toBeEnabled();
  });

  it("clamps typed values on blur", () => {
    const onChange = vi.fn();
    render(
      <InputNumber aria-label="amount" defaultValue={5} max={10} onChange={onChange} />
    );

    const field = screen.getByRole("spinbutton");
    fireEvent.change(field, { target: { value: "12" } });
    expect(onChange).not.toHaveBeenCalled();

    fireEvent.blur(field);

    expect(onChange).toHaveBeenCalledWith(10);
    expect(field).toHaveValue("10");
  });

  it("restores the last value when the text is not a number", () => {
    const onChange = vi.fn();
    render(<InputNumber aria-label="amount" defaultValue={5} onChange={onChange} />);

    const field = screen.getByRole("spinbutton");
    fireEvent.change(field, { target: { value: "abc" } });
    fireEvent.blur(field);

    expect(onChange).not.toHaveBeenCalled();
    expect(field).toHaveValue("5");
  });

  it("empties to null", () => {
    const onChange = vi.fn();
    render(<InputNumber aria-label="amount" defaultValue={5} onChange={onChange} />);

    const field = screen.getByRole("spinbutton");
    fireEvent.change(field, { target: { value: "" } });
    fireEvent.keyDown(field, { key: "Enter" });

    expect(onChange).toHaveBeenCalledWith(null);
  });

  it("rounds to an explicit precision on Enter", () => {
    const onChange = vi.fn();
    render(<InputNumber aria-label="amount" precision={2} onChange={onChange} />);

    const field = screen.getByRole("spinbutton");
    fireEvent.change(field, { target: { value: "1.236" } });
    fireEvent.keyDown(field, { key: "Enter" });

    expect(onChange).toHaveBeenCalledWith(1.24);
    expect(field).toHaveValue("1.24");
  });

  it("steps ten times with shift and arrow keys", () => {
    const onChange = vi.fn();
    render(<InputNumber aria-label="amount" defaultValue={50} onChange={onChange} />);

    const field = screen.getByRole("spinbutton");
    fireEvent.keyDown(field, { key: "ArrowDown", shiftKey: true });
    expect(onChange).toHaveBeenLastCalledWith(40);

    fireEvent.keyDown(field, { key: "ArrowUp" });
    expect(onChange).toHaveBeenLastCalledWith(41);
  });

  it("ignores arrow keys when keyboard is off", () => {
    const onChange = vi.fn();
    render(
      <InputNumber aria-label="amount" defaultValue={1} keyboard={false} onChange={onChange} />
    );

    fireEvent.keyDown(screen.getByRole("spinbutton"), { key: "ArrowUp" });

    expect(onChange).not.toHaveBeenCalled();
  });

  it("shows formatted text and parses it back", () => {
    const onChange = vi.fn();
    render(
      <InputNumber
        aria-label="amount"
        defaultValue={1000}
        formatter={(value) => value.replace(/\B(?=(\d{3})+(?!\d))/g, ",")}
        parser={(text) => text.replace(/,/g, "")}
        onChange={onChange}
      />
    );

    const field = screen.getByRole("spinbutton");
    expect(field).toHaveValue("1,000");

    fireEvent.change(field, { target: { value: "2,500" } });
    fireEvent.keyDown(field, { key: "Enter" });

    expect(onChange).toHaveBeenCalledWith(2500);
    expect(field).toHaveValue("2,500");
  });
});
