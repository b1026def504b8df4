// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/OTP`
 * Purpose: Verifies Input.OTP focus movement, positional cells, paste spreading and when onChange fires.
 * Side-effects: none
 * Links: src/components/kit/inputs/OTP.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { OTP } from "@/components/kit/inputs/OTP";

function cellValues(length: number): string[] {
  return Array.from({ length }, (_, index) => {
    const cell = screen.getByRole("textbox", { name: `OTP ${index + 1}` });
    return cell instanceof HTMLInputElement ? cell.value : "";
  });
}

describe("Input.OTP", () => {
  it("moves focus forward as characters are typed", () => {
    render(<OTP length={4} />);

    fireEvent.change(screen.getByRole("textbox", { name: "OTP 1" }), {
      target: { value: "1" },
    });

    expect(screen.getByRole("textbox", { name: "OTP 2" })).toHaveFocus();
  });

  it("reports partial cells through onInput and the joined code once full", () => {
    const onChange = vi.fn();
    const onInput = vi.fn();
    render(<OTP length={4} onChange={onChange} onInput={onInput} />);

    ["1", "2", "3"].forEach((char, index) => {
      fireEvent.change(screen.getByRole("textbox", { name: `OTP ${index + 1}` }), {
        target: { value: char },
      });
    });
    expect(onInput).toHaveBeenLastCalledWith(["1", "2", "3", ""]);
    expect(onChange).not.toHaveBeenCalled();

    fireEvent.change(screen.getByRole("textbox", { name: "OTP 4" }), {
      target: { value: "4" },
    });
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onChange).toHaveBeenCalledWith("1234");
  });

  it("keeps the other cells in place when a middle cell is cleared", () => {
    const onInput = vi.fn();
    render(<OTP length={4} defaultValue="1234" onInput={onInput} />);

    fireEvent.change(screen.getByRole("textbox", { name: "OTP 2" }), {
      target: { value: "" },
    });

    expect(onInput).toHaveBeenLastCalledWith(["1", "", "3", "4"]);
    expect(cellValues(4)).toEqual(["1", "", "3", "4"]);
  });

  it("keeps a character typed into a later cell at that position", () => {
    const onInput = vi.fn();
    render(<OTP length={4} onInput={onInput} />);

    fireEvent.change(screen.getByRole("textbox", { name: "OTP 3" }), {
      target: { value: "7" },
    });

    expect(onInput).toHaveBeenLastCalledWith(["", "", "7", ""]);
    expect(cellValues(4)).toEqual(["", "", "7", ""]);
    expect(screen.getByRole("textbox", { name: "OTP 4" })).toHaveFocus();
  });

  it("clears the previous cell and focuses it on Backspace in an empty cell", () => {
    render(<OTP length={4} defaultValue="1" />);
    const second = screen.getByRole("textbox", { name: "OTP 2" });

    second.focus();
    fireEvent.keyDown(second, { key: "Backspace" });

    expect(cellValues(4)).toEqual(["", "", "", ""]);
    expect(screen.getByRole("textbox", { name: "OTP 1" })).toHaveFocus();
  });

  it("spreads pasted text across the cells from the focused one", () => {
    const onChange = vi.fn();
    render(<OTP length={4} onChange={onChange} />);

    fireEvent.paste(screen.getByRole("textbox", { name: "OTP 1" }), {
      clipboardData: { getData: () => " 5678 " },
    });

    expect(cellValues(4)).toEqual(["5", "6", "7", "8"]);
    expect(onChange).toHaveBeenCalledWith("5678");
    expect(screen.getByRole("textbox", { name: "OTP 4" })).toHaveFocus();
  });

  it("follows a controlled value cell by cell", () => {
    const { rerender } = render(<OTP length={4} value="12" />);
    expect(cellValues(4)).toEqual(["1", "2", "", ""]);

    rerender(<OTP length={4} value="9876" />);
    expect(cellValues(4)).toEqual(["9", "8", "7", "6"]);
  });
});
