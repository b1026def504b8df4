// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/DatePicker`
 * Purpose: Verifies day, week and month picking, panel navigation, typed input, disabled dates, presets and RangePicker.
 * Side-effects: none
 * Links: src/components/kit/inputs/DatePicker.tsx, DatePanel.tsx, date-utils.ts
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";

import { DatePicker } from "@/components/kit/inputs/DatePicker";

const october19 = new Date(2026, 9, 19);

afterEach(() => {
  vi.useRealTimers();
});

function freezeToday() {
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(new Date(2026, 9, 19, 12));
}

describe("DatePicker", () => {
  it("picks a day from the panel and closes", () => {
    const onChange = vi.fn();
    render(<DatePicker defaultOpen defaultValue={october19} onChange={onChange} />);

    expect(screen.getByTitle("2026-10-19")).toHaveAttribute("aria-pressed", "true");
    fireEvent.click(screen.getByTitle("2026-10-05"));

    expect(onChange).toHaveBeenCalledWith(new Date(2026, 9, 5), "2026-10-05");
    expect(screen.getByRole("combobox")).toHaveValue("2026-10-05");
    expect(screen.queryByTitle("2026-10-05")).toBeNull();
  });

  it("moves the panel by month and year", () => {
    render(<DatePicker defaultOpen defaultValue={october19} />);

    fireEvent.click(screen.getByRole("button", { name: "Next month" }));
    expect(screen.getByTitle("2026-11-15")).toBeInTheDocument();

    fireEvent.click(screen.getByRole("button", { name: "Previous year" }));
    expect(screen.getByTitle("2025-11-15")).toBeInTheDocument();
  });

  it("drills down from the year panel without committing", () => {
    const onChange = vi.fn();
    render(<DatePicker defaultOpen defaultValue={october19} onChange={onChange} />);

    fireEvent.click(screen.getByRole("button", { name: "2026" }));
    fireEvent.click(screen.getByTitle("2023"));
    fireEvent.click(screen.getByTitle("2023-03"));

    expect(screen.getByTitle("2023-03-15")).toBeInTheDocument();
    expect(onChange).not.toHaveBeenCalled();
  });

  it("commits typed text on Enter", () => {
    const onChange = vi.fn();
    render(<DatePicker onChange={onChange} />);

    const field = screen.getByRole("combobox");
    fireEvent.change(field, { target: { value: "2026-03-04" } });
    fireEvent.keyDown(field, { key: "Enter" });

    expect(onChange).toHaveBeenCalledWith(new Date(2026, 2, 4), "2026-03-04");
    expect(field).toHaveValue("2026-03-04");
  });

  it("drops typed text that names no real day", () => {
    const onChange = vi.fn();
    render(<DatePicker onChange={onChange} />);

    const field = screen.getByRole("combobox");
    fireEvent.change(field, { target: { value: "2026-13-01" } });
    fireEvent.keyDown(field, { key: "Enter" });

    expect(onChange).not.toHaveBeenCalled();
    expect(field).toHaveValue("");
  });

  it("blocks disabled dates in the panel and in typed text", () => {
    const onChange = vi.fn();
    render(
      <DatePicker
        defaultOpen
        defaultValue={october19}
        disabledDate={(date) => date.getDay() === 0}
        onChange={onChange}
      />
    );

    expect(screen.getByTitle("2026-10-18")).toBeDisabled();

    const field = screen.getByRole("combobox");
    fireEvent.change(field, { target: { value: "2026-10-18" } });
    fireEvent.keyDown(field, { key: "Enter" });
    expect(onChange).not.toHaveBeenCalled();
  });

  it("picks today from the footer", () => {
    freezeToday();
    const onChange = vi.fn();
    render(<DatePicker defaultOpen onChange={onChange} />);

    fireEvent.click(screen.getByRole("button", { name: "Today" }));

    expect(onChange).toHaveBeenCalledWith(october19, "2026-10-19");
  });

  it("clears the value", () => {
    const onChange = vi.fn();
    render(<DatePicker defaultValue={october19} onChange={onChange} />);

    fireEvent.click(screen.getByRole("button", { name: "Clear" }));

    expect(onChange).toHaveBeenCalledWith(null, "");
    expect(screen.getByRole("combobox")).toHaveValue("");
  });

  it("commits a preset", () => {
    const onChange = vi.fn();
    render(
      <DatePicker
        defaultOpen
        defaultValue={october19}
        presets={[{ label: "New year", value: () => new Date(2027, 0, 1) }]}
        onChange={onChange}
      />
    );

    fireEvent.click(screen.getByRole("button", { name: "New year" }));

    expect(onChange).toHaveBeenCalledWith(new Date(2027, 0, 1), "2027-01-01");
  });

  it("picks a month as its first day", () => {
    const onChange = vi.fn();
    render(
      <DatePicker picker="month" defaultOpen defaultValue={october19} onChange={onChange} />
    );

    expect(screen.getByRole("combobox")).toHaveValue("2026-10");
    fireEvent.click(screen.getByTitle("2026-03"));

    expect(onChange).toHaveBeenCalledWith(new Date(2026, 2, 1), "2026-03");
  });

  it("picks a week as its first day", () => {
    const onChange = vi.fn();
    render(<DatePicker picker="week" defaultOpen defaultValue={october19} onChange={onChange} />);

    expect(screen.getByRole("combobox")).toHaveValue("2026-W43");
    fireEvent.click(screen.getByTitle("2026-10-29"));

    expect(onChange).toHaveBeenCalledWith(new Date(2026, 9, 25), "2026-W44");
  });

  it.each([
    ["date", "Select date"],
    ["week", "Select week"],
    ["month", "Select month"],
    ["quarter", "Select quarter"],
    ["year", "Select year"],
  ] as const)("uses the %s placeholder", (picker, placeholder) => {
    render(<DatePicker picker={picker} />);

    expect(screen.getByPlaceholderText(placeholder)).toBeInTheDocument();
  });
});

describe("DatePicker.RangePicker", () => {
  it("orders the two picked ends", () => {
    freezeToday();
    const onChange = vi.fn();
    render(<DatePicker.RangePicker defaultOpen onChange={onChange} />);

    fireEvent.click(screen.getByTitle("2026-10-20"));
    expect(screen.getByPlaceholderText("Start date")).toHaveValue("2026-10-20");
    expect(onChange).not.toHaveBeenCalled();

    fireEvent.click(screen.getByTitle("2026-10-10"));

    expect(onChange).toHaveBeenCalledWith(
      [new Date(2026, 9, 10), new Date(2026, 9, 20)],
      ["2026-10-10", "2026-10-20"]
    );
  });

  it("clears both ends", () => {
    const onChange = vi.fn();
    render(
      <DatePicker.RangePicker
        defaultValue={[new Date(2026, 9, 1), new Date(2026, 9, 5)]}
        onChange={onChange}
      />
    );

    fireEvent.click(screen.getByRole("button", { name: "Clear" }));

    expect(onChange).toHaveBeenCalledWith(null, ["", ""]);
  });
});
