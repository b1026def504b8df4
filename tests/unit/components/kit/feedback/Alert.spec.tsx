// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/feedback/Alert`
 * Purpose: Verifies Alert type defaults, banner mode and closing.
 * Side-effects: none
 * Links: src/components/kit/feedback/Alert.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Alert } from "@/components/kit/feedback/Alert";

describe("Alert", () => {
  it("defaults to info", () => {
    render(<Alert message="Heads up" />);

    expect(screen.getByRole("alert")).toHaveClass("ant-alert", "ant-alert-info");
  });

  it("defaults banners to warning with an icon", () => {
    const { container } = render(<Alert banner message="Maintenance tonight" />);

    expect(screen.getByRole("alert")).toHaveClass("ant-alert-warning", "ant-alert-banner");
    expect(container.querySelector(".ant-alert-icon")).not.toBeNull();
  });

  it("marks alerts with a description", () => {
    render(<Alert type="error" message="Failed" description="Try again later" />);

    expect(screen.getByRole("alert")).toHaveClass("ant-alert-error", "ant-alert-with-description");
    expect(screen.getByText("Try again later")).toHaveClass("ant-alert-description");
  });

  it("closes and then calls afterClose", () => {
    const onClose = vi.fn();
    const afterClose = vi.fn();
    render(<Alert message="Saved" closable onClose={onClose} afterClose={afterClose} />);

    fireEvent.click(screen.getByRole("button", { name: "Close" }));

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(afterClose).toHaveBeenCalledTimes(1);
    expect(screen.queryByRole("alert")).toBeNull();
  });

  it("stays open when onClose prevents default", () => {
    render(
      <Alert message="Saved" closable onClose={(event) => event.preventDefault()} />
    );

    fireEvent.click(screen.getByRole("button", { name: "Close" }));

    expect(screen.getByRole("alert")).toBeInTheDocument();
  });
});
