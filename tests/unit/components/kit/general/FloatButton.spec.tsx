// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/general/FloatButton`
 * Purpose: Verifies the BackTop visibility threshold and scroll reset, and the click-triggered Group.
 * Side-effects: none
 * Links: src/components/kit/general/FloatButton.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { FloatButton } from "@/components/kit/general/FloatButton";

function scrollTo(element: HTMLElement, top: number) {
  Object.defineProperty(element, "scrollTop", {
    configurable: true,
    writable: true,
    value: top,
  });
  fireEvent.scroll(element);
}

function makeScroller(): HTMLDivElement {
  const scroller = document.createElement("div");
  scroller.scrollTo = vi.fn();
  document.body.appendChild(scroller);
  return scroller;
}

describe("FloatButton.BackTop", () => {
  it("appears once the target has scrolled past visibilityHeight", () => {
    const scroller = makeScroller();
    const getTarget = () => scroller;
    render(<FloatButton.BackTop visibilityHeight={200} getTarget={getTarget} />);

    expect(screen.queryByRole("button", { name: "Back to top" })).toBeNull();

    scrollTo(scroller, 199);
    expect(screen.queryByRole("button", { name: "Back to top" })).toBeNull();

    scrollTo(scroller, 200);
    expect(screen.getByRole("button", { name: "Back to top" })).toBeInTheDocument();

    scrollTo(scroller, 50);
    expect(screen.queryByRole("button", { name: "Back to top" })).toBeNull();
    scroller.remove();
  });

  it("scrolls the target back to the top and forwards the click", () => {
    const scroller = makeScroller();
    Object.defineProperty(scroller, "scrollTop", {
      configurable: true,
      writable: true,
      value: 500,
    });
    const getTarget = () => scroller;
    const onClick = vi.fn();
    render(<FloatButton.BackTop getTarget={getTarget} onClick={onClick} />);

    fireEvent.click(screen.getByRole("button", { name: "Back to top" }));

    expect(scroller.scrollTo).toHaveBeenCalledWith({ top: 0, behavior: "smooth" });
    expect(onClick).toHaveBeenCalledTimes(1);
    scroller.remove();
  });
});

describe("FloatButton.Group", () => {
  it("shows its buttons only while opened by click", () => {
    const onOpenChange = vi.fn();
    render(
      <FloatButton.Group trigger="click" onOpenChange={onOpenChange}>
        <FloatButton aria-label="Help" />
      </FloatButton.Group>
    );
    const toggle = screen.getByRole("button", { expanded: false });

    expect(screen.queryByRole("button", { name: "Help" })).toBeNull();

    fireEvent.click(toggle);
    expect(onOpenChange).toHaveBeenLastCalledWith(true);
    expect(screen.getByRole("button", { name: "Help" })).toBeInTheDocument();
    expect(toggle).toHaveAttribute("aria-expanded", "true");
  });
});
