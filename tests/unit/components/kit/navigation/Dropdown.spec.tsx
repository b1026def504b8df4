// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/navigation/Dropdown`
 * Purpose: Verifies the click-triggered menu popup, its open-change sources, the disabled state and Dropdown.Button.
 * Side-effects: none
 * Links: src/components/kit/navigation/Dropdown.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Dropdown } from "@/components/kit/navigation/Dropdown";
import type { MenuItem } from "@/components/kit/navigation/menu-utils";

const items: MenuItem[] = [
  { key: "edit", label: "Edit" },
  { key: "archive", label: "Archive" },
];

describe("Dropdown", () => {
  it("opens on click and closes when an item is chosen", () => {
    const onClick = vi.fn();
    const onOpenChange = vi.fn();
    render(
      <Dropdown
        trigger={["click"]}
        menu={{ items, onClick }}
        onOpenChange={onOpenChange}
      >
        <button type="button">Actions</button>
      </Dropdown>
    );
    expect(screen.queryByRole("menuitem", { name: "Edit" })).toBeNull();

    fireEvent.click(screen.getByRole("button", { name: "Actions" }));
    expect(onOpenChange).toHaveBeenLastCalledWith(true, { source: "trigger" });

    fireEvent.click(screen.getByRole("menuitem", { name: "Archive" }));
    expect(onClick).toHaveBeenCalledWith(
      expect.objectContaining({ key: "archive", keyPath: ["archive"] })
    );
    expect(onOpenChange).toHaveBeenLastCalledWith(false, { source: "menu" });
    expect(screen.queryByRole("menuitem", { name: "Archive" })).toBeNull();
  });

  it("toggles closed from the trigger", () => {
    render(
      <Dropdown trigger={["click"]} menu={{ items }}>
        <button type="button">Actions</button>
      </Dropdown>
    );
    const trigger = screen.getByRole("button", { name: "Actions" });

    fireEvent.click(trigger);
    expect(screen.getByRole("menuitem", { name: "Edit" })).toBeInTheDocument();

    fireEvent.click(trigger);
    expect(screen.queryByRole("menuitem", { name: "Edit" })).toBeNull();
  });

  it("renders only the trigger when disabled", () => {
    const onOpenChange = vi.fn();
    render(
      <Dropdown disabled trigger={["click"]} menu={{ items }} onOpenChange={onOpenChange}>
        <button type="button">Actions</button>
      </Dropdown>
    );

    fireEvent.click(screen.getByRole("button", { name: "Actions" }));

    expect(screen.queryByRole("menuitem", { name: "Edit" })).toBeNull();
    expect(onOpenChange).not.toHaveBeenCalled();
  });
});

describe("Dropdown.Button", () => {
  it("keeps the main action separate from the menu trigger", () => {
    const onClick = vi.fn();
    render(
      <Dropdown.Button trigger={["click"]} menu={{ items }} onClick={onClick}>
        Submit
      </Dropdown.Button>
    );

    fireEvent.click(screen.getByRole("button", { name: "Submit" }));
    expect(onClick).toHaveBeenCalledTimes(1);
    expect(screen.queryByRole("menuitem", { name: "Edit" })).toBeNull();

    fireEvent.click(screen.getByRole("button", { name: "More" }));
    expect(screen.getByRole("menuitem", { name: "Edit" })).toBeInTheDocument();
    expect(onClick).toHaveBeenCalledTimes(1);
  });
});
