// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/AutoComplete`
 * Purpose: Verifies suggestion filtering, picking by pointer and keyboard, backfill and clearing.
 * Side-effects: none
 * Links: src/components/kit/inputs/AutoComplete.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { AutoComplete } from "@/components/kit/inputs/AutoComplete";

const fruit = [{ value: "apple" }, { value: "apricot" }, { value: "banana" }];

describe("AutoComplete", () => {
  it("suggests options containing the typed text", () => {
    const onChange = vi.fn();
    const onSearch = vi.fn();
    render(<AutoComplete options={fruit} onChange={onChange} onSearch={onSearch} />);

    fireEvent.change(screen.getByRole("combobox"), { target: { value: "ap" } });

    expect(onChange).toHaveBeenCalledWith("ap");
    expect(onSearch).toHaveBeenCalledWith("ap");
    expect(screen.getAllByRole("option").map((option) => option.textContent)).toEqual([
      "apple",
      "apricot",
    ]);
  });

  it("replaces the text with a clicked suggestion", () => {
    const onChange = vi.fn();
    const onSelect = vi.fn();
    render(<AutoComplete options={fruit} onChange={onChange} onSelect={onSelect} />);

    const field = screen.getByRole("combobox");
    fireEvent.change(field, { target: { value: "ban" } });
    fireEvent.click(screen.getByRole("option", { name: "banana" }));

    expect(onChange).toHaveBeenLastCalledWith("banana");
    expect(onSelect).toHaveBeenCalledWith("banana", { value: "banana" });
    expect(field).toHaveValue("banana");
    expect(screen.queryByRole("listbox")).toBeNull();
  });

  it("picks the active suggestion with the keyboard", () => {
    const onSelect = vi.fn();
    render(<AutoComplete options={fruit} onSelect={onSelect} />);

    const field = screen.getByRole("combobox");
    fireEvent.change(field, { target: { value: "ap" } });
    fireEvent.keyDown(field, { key: "ArrowDown" });
    fireEvent.keyDown(field, { key: "Enter" });

    expect(onSelect).toHaveBeenCalledWith("apricot", { value: "apricot" });
    expect(field).toHaveValue("apricot");
  });

  it("shows the active suggestion in the input with backfill", () => {
    const onChange = vi.fn();
    render(<AutoComplete backfill options={fruit} onChange={onChange} />);

    const field = screen.getByRole("combobox");
    fireEvent.change(field, { target: { value: "ap" } });
    fireEvent.keyDown(field, { key: "ArrowDown" });

    expect(field).toHaveValue("apricot");
    expect(onChange).toHaveBeenLastCalledWith("ap");
  });

  it("keeps the popup closed when nothing matches", () => {
    render(<AutoComplete options={fruit} />);

    const field = screen.getByRole("combobox");
    fireEvent.change(field, { target: { value: "kiwi" } });

    expect(field).toHaveAttribute("aria-expanded", "false");
    expect(screen.queryByRole("listbox")).toBeNull();
  });

  it("shows notFoundContent when given", () => {
    render(<AutoComplete options={fruit} notFoundContent="Nothing here" />);

    fireEvent.change(screen.getByRole("combobox"), { target: { value: "kiwi" } });

    expect(screen.getByText("Nothing here")).toBeInTheDocument();
  });

  it("clears the text", () => {
    const onChange = vi.fn();
    const onClear = vi.fn();
    render(
      <AutoComplete allowClear defaultValue="pear" onChange={onChange} onClear={onClear} />
    );

    fireEvent.click(screen.getByRole("button", { name: "Clear" }));

    expect(onChange).toHaveBeenCalledWith("");
    expect(onClear).toHaveBeenCalledTimes(1);
    expect(screen.getByRole("combobox")).toHaveValue("");
  });
});
