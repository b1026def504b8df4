// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/Input`
 * Purpose: Verifies clearing, character count, password visibility and search triggers.
 * Side-effects: none
 * Links: src/components/kit/inputs/Input.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Input } from "@/components/kit/inputs/Input";

describe("Input", () => {
  it("calls onPressEnter on Enter", () => {
    const onPressEnter = vi.fn();
    render(<Input aria-label="name" onPressEnter={onPressEnter} />);

    fireEvent.keyDown(screen.getByLabelText("name"), { key: "Enter" });

    expect(onPressEnter).toHaveBeenCalledTimes(1);
  });

  it("clears through onChange and onClear", () => {
    const onChange = vi.fn();
    const onClear = vi.fn();
    render(
      <Input
        aria-label="name"
        defaultValue="hello"
        allowClear
        onChange={onChange}
        onClear={onClear}
      />
    );

    fireEvent.click(screen.getByRole("button", { name: "Clear" }));

    expect(screen.getByLabelText("name")).toHaveValue("");
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onClear).toHaveBeenCalledTimes(1);
  });

  it("shows the count against maxLength", () => {
    render(<Input aria-label="name" defaultValue="hello" showCount maxLength={10} />);

    expect(screen.getByText("5 / 10")).toBeInTheDocument();

    fireEvent.change(screen.getByLabelText("name"), {
      target: { value: "hello!" },
    });

    expect(screen.getByText("6 / 10")).toBeInTheDocument();
  });

  it("marks the error status invalid", () => {
    render(<Input aria-label="name" status="error" />);

    expect(screen.getByLabelText("name")).toHaveAttribute("aria-invalid", "true");
  });

  it("renders addons around the field", () => {
    render(<Input aria-label="site" addonBefore="https://" addonAfter=".com" />);

    expect(screen.getByText("https://")).toBeInTheDocument();
    expect(screen.getByText(".com")).toBeInTheDocument();
  });
});

describe("Input.Password", () => {
  it("toggles visibility", () => {
    render(<Input.Password aria-label="secret" defaultValue="test-secret" />);

    const field = screen.getByLabelText("secret");
    expect(field).toHaveAttribute("type", "password");

    fireEvent.click(screen.getByRole("button", { name: "Show password" }));

    expect(field).toHaveAttribute("type", "text");
    expect(screen.getByRole("button", { name: "Hide password" })).toHaveAttribute(
      "aria-pressed",
      "true"
    );
  });
});

describe("Input.Search", () => {
  it("searches on Enter with the input source", () => {
    const onSearch = vi.fn();
    render(<Input.Search aria-label="query" defaultValue="ant" onSearch={onSearch} />);

    fireEvent.keyDown(screen.getByLabelText("query"), { key: "Enter" });

    expect(onSearch).toHaveBeenCalledTimes(1);
    expect(onSearch.mock.calls[0]?.[0]).toBe("ant");
    expect(onSearch.mock.calls[0]?.[2]).toEqual({ source: "input" });
  });

  it("does not search while composing", () => {
    const onSearch = vi.fn();
    render(<Input.Search aria-label="query" onSearch={onSearch} />);

    const field = screen.getByLabelText("query");
    fireEvent.compositionStart(field);
    fireEvent.keyDown(field, { key: "Enter" });

    expect(onSearch).not.toHaveBeenCalled();
  });

  it("reports clearing with the clear source", () => {
    const onSearch = vi.fn();
    render(
      <Input.Search aria-label="query" defaultValue="ant" allowClear onSearch={onSearch} />
    );

    fireEvent.click(screen.getByRole("button", { name: "Clear" }));

    expect(onSearch).toHaveBeenCalledWith("", undefined, { source: "clear" });
  });

  it("searches from the enter button", () => {
    const onSearch = vi.fn();
    render(
      <Input.Search aria-label="query" defaultValue="ant" enterButton onSearch={onSearch} />
    );

    fireEvent.click(screen.getByRole("button", { name: "search" }));

    expect(onSearch.mock.calls[0]?.[0]).toBe("ant");
  });
});
