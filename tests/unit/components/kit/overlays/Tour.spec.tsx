// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/overlays/Tour`
 * Purpose: Verifies step navigation and the finish and close callbacks of centered tour steps.
 * Side-effects: DOM (portals into document.body)
 * Links: src/components/kit/overlays/Tour.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Tour } from "@/components/kit/overlays/Tour";
import type { TourStep } from "@/components/kit/overlays/Tour";

const steps: TourStep[] = [
  { title: "Upload files", description: "Drop files here." },
  { title: "Save changes", description: "Keep your work." },
];

describe("Tour", () => {
  it("renders nothing while closed", () => {
    render(<Tour steps={steps} />);

    expect(screen.queryByRole("dialog")).toBeNull();
  });

  it("walks forward and back through the steps", () => {
    const onChange = vi.fn();
    render(<Tour open steps={steps} onChange={onChange} />);

    expect(screen.getByText("Upload files")).toBeInTheDocument();
    expect(screen.queryByRole("button", { name: "Previous" })).toBeNull();

    fireEvent.click(screen.getByRole("button", { name: "Next" }));
    expect(onChange).toHaveBeenLastCalledWith(1);
    expect(screen.getByText("Save changes")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Finish" })).toBeInTheDocument();

    fireEvent.click(screen.getByRole("button", { name: "Previous" }));
    expect(onChange).toHaveBeenLastCalledWith(0);
    expect(screen.getByText("Upload files")).toBeInTheDocument();
  });

  it("calls onFinish and then onClose with the last step", () => {
    const onFinish = vi.fn();
    const onClose = vi.fn();
    render(
      <Tour
        open
        steps={steps}
        defaultCurrent={1}
        onFinish={onFinish}
        onClose={onClose}
      />
    );

    fireEvent.click(screen.getByRole("button", { name: "Finish" }));

    expect(onFinish).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith(1);
    const [finishOrder] = onFinish.mock.invocationCallOrder;
    const [closeOrder] = onClose.mock.invocationCallOrder;
    expect(finishOrder).toBeLessThan(closeOrder ?? 0);
  });

  it("closes from the close button without finishing", () => {
    const onFinish = vi.fn();
    const onClose = vi.fn();
    render(<Tour open steps={steps} onFinish={onFinish} onClose={onClose} />);

    fireEvent.click(screen.getByRole("button", { name: "Close" }));

    expect(onClose).toHaveBeenCalledWith(0);
    expect(onFinish).not.toHaveBeenCalled();
  });
});
