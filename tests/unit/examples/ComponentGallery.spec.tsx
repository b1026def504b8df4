// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/examples/ComponentGallery`
 * Purpose: Smoke-tests the gallery: default screen, category switching and the direction toggle.
 * Side-effects: none
 * Links: src/examples/ComponentGallery.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it } from "vitest";

import { ComponentGallery } from "@/examples";

describe("ComponentGallery", () => {
  it("opens on the general screen", () => {
    render(<ComponentGallery />);

    expect(screen.getByRole("tab", { name: "General" })).toHaveAttribute("aria-selected", "true");
    expect(screen.getByRole("heading", { level: 2, name: "Introduction" })).toBeInTheDocument();
  });

  it("switches to another category", () => {
    render(<ComponentGallery />);

    fireEvent.click(screen.getByRole("tab", { name: "Feedback" }));

    expect(screen.getByRole("tab", { name: "Feedback" })).toHaveAttribute("aria-selected", "true");
    expect(screen.getByText("Quota almost used")).toBeInTheDocument();
  });

  it("flips the provider direction", () => {
    const { container } = render(<ComponentGallery />);
    const root = container.querySelector("[data-ant-root]");
    expect(root).toHaveAttribute("dir", "ltr");

    fireEvent.click(screen.getByRole("switch", { name: "Right to left" }));

    expect(root).toHaveAttribute("dir", "rtl");
  });
});
