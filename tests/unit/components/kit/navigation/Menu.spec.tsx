// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/navigation/Menu`
 * Purpose: Verifies inline submenu toggling, click key paths and the hover open/close delays of popup submenus.
 * Side-effects: none
 * Links: src/components/kit/navigation/Menu.tsx
 * @public
 */

import { act, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";

import { Menu } from "@/components/kit/navigation/Menu";
import type { MenuItem } from "@/components/kit/navigation/menu-utils";

const items: MenuItem[] = [
  { key: "mail", label: "Mail" },
  {
    key: "nav",
    label: "Navigation One",
    children: [
      { key: "opt1", label: "Option 1" },
      { key: "opt2", label: "Option 2" },
    ],
  },
];

afterEach(() => {
  vi.useRealTimers();
});

describe("Menu", () => {
  it("expands and collapses an inline submenu in place", () => {
    const onOpenChange = vi.fn();
    render(<Menu mode="inline" items={items} onOpenChange={onOpenChange} />);
    const title = screen.getByRole("menuitem", { name: "Navigation One" });

    expect(screen.queryByText("Option 1")).toBeNull();
    expect(title).toHaveAttribute("aria-expanded", "false");

    fireEvent.click(title);
    expect(onOpenChange).toHaveBeenLastCalledWith(["nav"]);
    expect(screen.getByRole("menuitem", { name: "Option 1" })).toBeInTheDocument();
    expect(title).toHaveAttribute("aria-expanded", "true");

    fireEvent.click(title);
    expect(onOpenChange).toHaveBeenLastCalledWith([]);
    expect(screen.queryByText("Option 1")).toBeNull();
  });

  it("reports the key path from the clicked item outward and selects it", () => {
    const onClick = vi.fn();
    const onSelect = vi.fn();
    render(
      <Menu
        mode="inline"
        items={items}
        defaultOpenKeys={["nav"]}
        onClick={onClick}
        onSelect={onSelect}
      />
    );

    fireEvent.click(screen.getByRole("menuitem", { name: "Option 2" }));

    expect(onClick).toHaveBeenCalledWith(
      expect.objectContaining({ key: "opt2", keyPath: ["opt2", "nav"] })
    );
    expect(onSelect).toHaveBeenCalledWith(
      expect.objectContaining({ key: "opt2", selectedKeys: ["opt2"] })
    );
    expect(screen.getByRole("menuitem", { name: "Option 2" })).toHaveAttribute(
      "aria-selected",
      "true"
    );
  });

  it("opens and closes a popup submenu after the hover delays", () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    render(
      <Menu
        items={items}
        subMenuOpenDelay={200}
        subMenuCloseDelay={300}
      />
    );
    const title = screen.getByRole("menuitem", { name: "Navigation One" });

    fireEvent.pointerEnter(title);
    act(() => {
      vi.advanceTimersByTime(199);
    });
    expect(screen.queryByText("Option 1")).toBeNull();

    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(screen.getByText("Option 1")).toBeInTheDocument();

    fireEvent.pointerLeave(title);
    act(() => {
      vi.advanceTimersByTime(299);
    });
    expect(screen.getByText("Option 1")).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(screen.queryByText("Option 1")).toBeNull();
  });
});
