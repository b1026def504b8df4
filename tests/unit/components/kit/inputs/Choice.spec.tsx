// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/Choice`
 * Purpose: Verifies Checkbox and Radio groups: ordering, disabled options and arrow-key roving.
 * Side-effects: none
 * Links: src/components/kit/inputs/Checkbox.tsx, src/components/kit/inputs/Radio.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Checkbox } from "@/components/kit/inputs/Checkbox";
import { ConfigProvider } from "@/components/kit/theme";
import { Radio } from "@/components/kit/inputs/Radio";

describe("Checkbox", () => {
  it("toggles uncontrolled", () => {
    const onChange = vi.fn();
    render(<Checkbox onChange={onChange}>Remember me</Checkbox>);

    const box = screen.getByRole("checkbox", { name: "Remember me" });
    fireEvent.click(box);

    expect(box).toBeChecked();
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it("reports mixed state when indeterminate", () => {
    render(<Checkbox indeterminate>All</Checkbox>);

    expect(screen.getByRole("checkbox", { name: "All" })).toHaveAttribute(
      "aria-checked",
      "mixed"
    );
  });

  it("keeps group values in option order", () => {
    const onChange = vi.fn();
    render(
      <Checkbox.Group
        options={["apple", "pear", "orange"]}
        defaultValue={["orange"]}
        onChange={onChange}
      />
    );

    fireEvent.click(screen.getByRole("checkbox", { name: "apple" }));

    expect(onChange).toHaveBeenLastCalledWith(["apple", "orange"]);
    expect(screen.getByRole("checkbox", { name: "apple" })).toBeChecked();
  });

  it("removes a value when unchecked", () => {
    const onChange = vi.fn();
    render(
      <Checkbox.Group
        options={["apple", "pear"]}
        defaultValue={["apple", "pear"]}
        onChange={onChange}
      />
    );

    fireEvent.click(screen.getByRole("checkbox", { name: "pear" }));

    expect(onChange).toHaveBeenLastCalledWith(["apple"]);
  });

  it("disables every option of a disabled group", () => {
    render(<Checkbox.Group options={["apple", "pear"]} disabled />);

    expect(screen.getByRole("checkbox", { name: "apple" })).toBeDisabled();
    expect(screen.getByRole("checkbox", { name: "pear" })).toBeDisabled();
  });
});

describe("Radio.Group", () => {
  const options = [
    { label: "A", value: "a" },
    { label: "B", value: "b", disabled: true },
    { label: "C", value: "c" },
  ];

  it("selects on click", () => {
    const onChange = vi.fn();
    render(<Radio.Group options={options} onChange={onChange} />);

    fireEvent.click(screen.getByRole("radio", { name: "C" }));

    expect(onChange).toHaveBeenCalledWith("c");
    expect(screen.getByRole("radio", { name: "C" })).toBeChecked();
  });

  it("moves past disabled options with arrow keys", () => {
    const onChange = vi.fn();
    render(<Radio.Group options={options} defaultValue="a" onChange={onChange} />);

    fireEvent.keyDown(screen.getByRole("radio", { name: "A" }), {
      key: "ArrowRight",
    });

    expect(onChange).toHaveBeenCalledWith("c");
    expect(screen.getByRole("radio", { name: "C" })).toHaveFocus();
  });

  it("wraps around backwards", () => {
    const onChange = vi.fn();
    render(<Radio.Group options={options} defaultValue="a" onChange={onChange} />);

    fireEvent.keyDown(screen.getByRole("radio", { name: "A" }), {
      key: "ArrowUp",
    });

    expect(onChange).toHaveBeenCalledWith("c");
  });

  it("flips horizontal arrows in rtl", () => {
    const onChange = vi.fn();
    render(
      <ConfigProvider direction="rtl">
        <Radio.Group options={["x", "y", "z"]} defaultValue="y" onChange={onChange} />
      </ConfigProvider>
    );

    fireEvent.keyDown(screen.getByRole("radio", { name: "y" }), {
      key: "ArrowRight",
    });

    expect(onChange).toHaveBeenCalledWith("x");
  });

  it("shares one generated name", () => {
    render(<Radio.Group options={["x", "y"]} />);

    const [first, second] = screen.getAllByRole("radio");
    expect(first?.getAttribute("name")).toBeTruthy();
    expect(first?.getAttribute("name")).toBe(second?.getAttribute("name"));
  });

  it("renders button options", () => {
    render(<Radio.Group options={["x", "y"]} optionType="button" defaultValue="y" />);

    expect(screen.getByRole("radio", { name: "y" })).toBeChecked();
    expect(screen.getByText("y").closest("label")).toHaveClass(
      "ant-radio-button-wrapper"
    );
  });
});
