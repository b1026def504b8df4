// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/Select`
 * Purpose: Verifies single and multiple picking, search, keyboard navigation, clearing, tag limits and tags mode.
 * Side-effects: none
 * Links: src/components/kit/inputs/Select.tsx, select-utils.ts
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Select } from "@/components/kit/inputs/Select";

const greek = [
  { value: "a", label: "Alpha" },
  { value: "b", label: "Beta" },
  { value: "g", label: "Gamma" },
];

describe("Select", () => {
  it("picks one option and closes", () => {
    const onChange = vi.fn();
    const onSelect = vi.fn();
    render(<Select options={greek} onChange={onChange} onSelect={onSelect} />);

    const field = screen.getByRole("combobox");
    fireEvent.mouseDown(field);
    expect(field).toHaveAttribute("aria-expanded", "true");

    fireEvent.click(screen.getByRole("option", { name: "Beta" }));

    expect(onChange).toHaveBeenCalledWith("b", { value: "b", label: "Beta" });
    expect(onSelect).toHaveBeenCalledWith("b", { value: "b", label: "Beta" });
    expect(screen.queryByRole("listbox")).toBeNull();
    expect(screen.getByText("Beta")).toBeInTheDocument();
  });

  it("shows the locale placeholder when empty", () => {
    render(<Select options={greek} />);

    expect(screen.getByText("Please select")).toBeInTheDocument();
  });

  it("toggles values in multiple mode", () => {
    const onChange = vi.fn();
    const onDeselect = vi.fn();
    render(
      <Select mode="multiple" defaultOpen options={greek} onChange={onChange} onDeselect={onDeselect} />
    );

    fireEvent.click(screen.getByRole("option", { name: "Alpha" }));
    expect(onChange).toHaveBeenLastCalledWith(["a"], [{ value: "a", label: "Alpha" }]);
    expect(screen.getByRole("option", { name: "Alpha" })).toHaveAttribute("aria-selected", "true");
    expect(screen.getByRole("button", { name: "Remove Alpha" })).toBeInTheDocument();

    fireEvent.click(screen.getByRole("option", { name: "Alpha" }));
    expect(onChange).toHaveBeenLastCalledWith([], []);
    expect(onDeselect).toHaveBeenCalledWith("a", { value: "a", label: "Alpha" });
  });

  it("removes a tag through its close button", () => {
    const onChange = vi.fn();
    render(<Select mode="multiple" defaultValue={["a", "b"]} options={greek} onChange={onChange} />);

    fireEvent.click(screen.getByRole("button", { name: "Remove Alpha" }));

    expect(onChange).toHaveBeenCalledWith(["b"], [{ value: "b", label: "Beta" }]);
  });

  it("removes the last tag on Backspace with an empty search", () => {
    const onChange = vi.fn();
    render(<Select mode="multiple" defaultValue={["a", "b"]} options={greek} onChange={onChange} />);

    fireEvent.keyDown(screen.getByRole("combobox"), { key: "Backspace" });

    expect(onChange).toHaveBeenCalledWith(["a"], [{ value: "a", label: "Alpha" }]);
  });

  it("filters options by the typed text", () => {
    const onSearch = vi.fn();
    render(<Select showSearch options={greek} onSearch={onSearch} />);

    fireEvent.change(screen.getByRole("combobox"), { target: { value: "ta" } });

    expect(onSearch).toHaveBeenCalledWith("ta");
    expect(screen.getAllByRole("option").map((option) => option.textContent)).toEqual([
      "Beta",
    ]);
  });

  it("renders group titles above grouped options", () => {
    render(
      <Select
        defaultOpen
        options={[
          { label: "Vowels", options: [{ value: "a", label: "Alpha" }] },
          { label: "Others", options: [{ value: "b", label: "Beta" }] },
        ]}
      />
    );

    const list = screen.getByRole("listbox");
    expect(
      Array.from(list.querySelectorAll("li")).map((item) => item.textContent)
    ).toEqual(["Vowels", "Alpha", "Others", "Beta"]);
  });

  it("moves the active option with the arrow keys and picks it on Enter", () => {
    const onChange = vi.fn();
    render(
      <Select
        options={[
          { value: "a", label: "Alpha" },
          { value: "b", label: "Beta", disabled: true },
          { value: "g", label: "Gamma" },
        ]}
        onChange={onChange}
      />
    );

    const field = screen.getByRole("combobox");
    fireEvent.keyDown(field, { key: "ArrowDown" });
    expect(field).toHaveAttribute(
      "aria-activedescendant",
      screen.getByRole("option", { name: "Alpha" }).id
    );

    fireEvent.keyDown(field, { key: "ArrowDown" });
    expect(field).toHaveAttribute(
      "aria-activedescendant",
      screen.getByRole("option", { name: "Gamma" }).id
    );

    fireEvent.keyDown(field, { key: "Enter" });
    expect(onChange).toHaveBeenCalledWith("g", { value: "g", label: "Gamma" });
  });

  it("closes on Escape", () => {
    render(<Select defaultOpen options={greek} />);

    fireEvent.keyDown(screen.getByRole("combobox"), { key: "Escape" });

    expect(screen.queryByRole("listbox")).toBeNull();
  });

  it("clears the value", () => {
    const onChange = vi.fn();
    const onClear = vi.fn();
    render(
      <Select allowClear defaultValue="a" options={greek} onChange={onChange} onClear={onClear} />
    );

    fireEvent.click(screen.getByRole("button", { name: "Clear" }));

    expect(onChange).toHaveBeenCalledWith(null, undefined);
    expect(onClear).toHaveBeenCalledTimes(1);
    expect(screen.getByText("Please select")).toBeInTheDocument();
  });

  it("refuses picks past maxCount", () => {
    const onChange = vi.fn();
    render(
      <Select
        mode="multiple"
        defaultOpen
        defaultValue={["a"]}
        maxCount={1}
        options={greek}
        onChange={onChange}
      />
    );

    fireEvent.click(screen.getByRole("option", { name: "Beta" }));

    expect(onChange).not.toHaveBeenCalled();
    expect(screen.getByRole("option", { name: "Beta" })).toHaveAttribute("aria-selected", "false");
  });

  it("collapses tags past maxTagCount", () => {
    render(
      <Select mode="multiple" defaultValue={["a", "b", "g"]} maxTagCount={1} options={greek} />
    );

    expect(screen.getByText("Alpha")).toBeInTheDocument();
    expect(screen.queryByText("Beta")).toBeNull();
    expect(screen.getByText("+ 2 ...")).toBeInTheDocument();
  });

  it("creates a tag from typed text on Enter", () => {
    const onChange = vi.fn();
    render(<Select mode="tags" onChange={onChange} />);

    const field = screen.getByRole("combobox");
    fireEvent.change(field, { target: { value: "red" } });
    fireEvent.keyDown(field, { key: "Enter" });

    expect(onChange).toHaveBeenCalledWith(["red"], [{ value: "red", label: "red" }]);
    expect(screen.getByRole("button", { name: "Remove red" })).toBeInTheDocument();
    expect(field).toHaveValue("");
  });

  it("splits typed text on token separators", () => {
    const onChange = vi.fn();
    render(<Select mode="tags" onChange={onChange} />);

    fireEvent.change(screen.getByRole("combobox"), { target: { value: "blue,green," } });

    expect(onChange).toHaveBeenCalledWith(
      ["blue", "green"],
      [
        { value: "blue", label: "blue" },
        { value: "green", label: "green" },
      ]
    );
  });

  it("shows the empty panel when nothing matches", () => {
    render(<Select showSearch options={greek} />);

    fireEvent.change(screen.getByRole("combobox"), { target: { value: "zzz" } });

    expect(screen.getByText("No data")).toBeInTheDocument();
  });

  it("keeps the popup closed for no matches when notFoundContent is null", () => {
    render(<Select showSearch notFoundContent={null} options={greek} />);

    const field = screen.getByRole("combobox");
    fireEvent.change(field, { target: { value: "zzz" } });

    expect(field).toHaveAttribute("aria-expanded", "false");
    expect(screen.queryByText("No data")).toBeNull();
  });
});
