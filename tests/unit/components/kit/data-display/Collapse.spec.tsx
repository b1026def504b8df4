// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/data-display/Collapse`
 * Purpose: Verifies panel toggling, accordion mode, collapsible modes and keyboard toggling.
 * Side-effects: none
 * Links: src/components/kit/data-display/Collapse.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Collapse } from "@/components/kit/data-display/Collapse";
import type { CollapseItem } from "@/components/kit/data-display/Collapse";

const items: CollapseItem[] = [
  { key: "a", label: "First", children: "First body" },
  { key: "b", label: "Second", children: "Second body" },
];

describe("Collapse", () => {
  it("opens several panels", () => {
    const onChange = vi.fn();
    render(<Collapse items={items} defaultActiveKey="a" onChange={onChange} />);

    fireEvent.click(screen.getByRole("button", { name: "Second" }));

    expect(onChange).toHaveBeenCalledWith(["a", "b"]);
    expect(screen.getByRole("button", { name: "First" })).toHaveAttribute(
      "aria-expanded",
      "true"
    );
    expect(screen.getByText("Second body")).toBeVisible();
  });

  it("keeps one panel open in accordion mode", () => {
    const onChange = vi.fn();
    render(<Collapse items={items} accordion defaultActiveKey="a" onChange={onChange} />);

    fireEvent.click(screen.getByRole("tab", { name: "Second" }));

    expect(onChange).toHaveBeenCalledWith(["b"]);
    expect(screen.getByText("First body")).not.toBeVisible();
  });

  it("toggles with Enter", () => {
    const onChange = vi.fn();
    render(<Collapse items={items} onChange={onChange} />);

    fireEvent.keyDown(screen.getByRole("button", { name: "First" }), { key: "Enter" });

    expect(onChange).toHaveBeenCalledWith(["a"]);
  });

  it("does not toggle disabled panels", () => {
    const onChange = vi.fn();
    render(
      <Collapse
        items={[{ key: "a", label: "Locked", children: "Hidden", collapsible: "disabled" }]}
        onChange={onChange}
      />
    );

    fireEvent.click(screen.getByRole("button", { name: "Locked" }));

    expect(onChange).not.toHaveBeenCalled();
    expect(screen.queryByText("Hidden")).toBeNull();
  });

  it("limits the trigger to the header text", () => {
    const onChange = vi.fn();
    const { container } = render(
      <Collapse
        items={[{ key: "a", label: "Text only", children: "Body", collapsible: "header" }]}
        onChange={onChange}
      />
    );

    const header = container.querySelector(".ant-collapse-header");
    if (!header) throw new Error("missing header");
    expect(header).not.toHaveAttribute("role");

    fireEvent.click(screen.getByRole("button", { name: "Text only" }));
    expect(onChange).toHaveBeenCalledWith(["a"]);
  });

  it("drops closed panels with destroyInactivePanel", () => {
    render(<Collapse items={items} defaultActiveKey="a" destroyInactivePanel />);

    fireEvent.click(screen.getByRole("button", { name: "First" }));

    expect(screen.queryByText("First body")).toBeNull();
  });
});
