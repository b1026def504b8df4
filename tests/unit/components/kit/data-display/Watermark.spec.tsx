// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/data-display/Watermark`
 * Purpose: Verifies the Watermark overlay layer, its tile sizing and that it stays out of the way of its children.
 * Side-effects: none
 * Links: src/components/kit/data-display/Watermark.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Watermark } from "@/components/kit/data-display/Watermark";

describe("Watermark", () => {
  it("layers a non-interactive tile over the children", () => {
    const onClick = vi.fn();
    const { container } = render(
      <Watermark content="Confidential" zIndex={20}>
        <button type="button" onClick={onClick}>
          Save
        </button>
      </Watermark>
    );

    const layer = container.querySelector(".ant-watermark");
    expect(layer).toHaveClass("pointer-events-none");
    expect(layer).toHaveAttribute("aria-hidden", "true");
    expect(layer).toHaveStyle({ zIndex: "20", backgroundSize: "220px 164px" });

    fireEvent.click(screen.getByRole("button", { name: "Save" }));
    expect(onClick).toHaveBeenCalledTimes(1);
  });

  it("sizes the tile from width, height and gap", () => {
    const { container } = render(
      <Watermark content="Draft" width={80} height={40} gap={[20, 30]} offset={[30, 15]}>
        <p>Body</p>
      </Watermark>
    );

    expect(container.querySelector(".ant-watermark")).toHaveStyle({
      backgroundSize: "100px 70px",
      backgroundPosition: "20px 0px",
    });
  });

  it("renders only the children without content or image", () => {
    const { container } = render(
      <Watermark>
        <p>Body</p>
      </Watermark>
    );

    expect(screen.getByText("Body")).toBeInTheDocument();
    expect(container.querySelector(".ant-watermark")).toBeNull();
  });
});
