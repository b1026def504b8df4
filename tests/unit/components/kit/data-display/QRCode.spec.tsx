// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/data-display/QRCode`
 * Purpose: Verifies the SVG and canvas grids, the icon and the status masks of QRCode.
 * Side-effects: none
 * Links: src/components/kit/data-display/QRCode.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";

import { QRCode } from "@/components/kit/data-display/QRCode";
import { getQrMatrix, getQrPath } from "@/components/kit/data-display/qrcode-utils";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("QRCode", () => {
  it("draws the grid for the text as one SVG path", () => {
    const { container } = render(<QRCode type="svg" value="https://example.com" />);

    const svg = screen.getByRole("img", { name: "https://example.com" });
    expect(svg).toHaveAttribute("width", "136");
    expect(container.querySelector("path")).toHaveAttribute(
      "d",
      getQrPath(getQrMatrix("https://example.com"))
    );
  });

  it("joins a list value with newlines", () => {
    const { container } = render(<QRCode type="svg" value={["first", "second"]} />);

    expect(container.querySelector("svg")).toHaveAttribute("aria-label", "first\nsecond");
  });

  it("uses the full size without a border", () => {
    const { container } = render(<QRCode type="svg" value="x" size={200} bordered={false} />);

    expect(container.querySelector("svg")).toHaveAttribute("width", "200");
    expect(container.firstElementChild).toHaveStyle({ width: "200px", height: "200px" });
  });

  it("draws on a canvas by default", () => {
    vi.spyOn(HTMLCanvasElement.prototype, "getContext").mockReturnValue(null);
    render(<QRCode value="https://example.com" />);

    const canvas = screen.getByRole("img", { name: "https://example.com" });
    expect(canvas.tagName).toBe("CANVAS");
    expect(canvas).toHaveAttribute("width", "136");
  });

  it("clears the centre for an icon and shows it there", () => {
    const { container } = render(
      <QRCode type="svg" value="a" icon="/logo.png" iconSize={{ width: 30, height: 20 }} />
    );

    expect(container.querySelector("path")).toHaveAttribute(
      "d",
      getQrPath(getQrMatrix("a", { withIcon: true }))
    );
    const icon = container.querySelector("img");
    expect(icon).toHaveAttribute("src", "/logo.png");
    expect(icon).toHaveStyle({ width: "30px", height: "20px" });
  });

  it("covers an expired code with a refresh action", () => {
    const onRefresh = vi.fn();
    render(<QRCode type="svg" value="a" status="expired" onRefresh={onRefresh} />);

    expect(screen.getByText("QR code expired")).toBeInTheDocument();
    fireEvent.click(screen.getByRole("button", { name: "Refresh" }));
    expect(onRefresh).toHaveBeenCalledTimes(1);
  });

  it("omits the refresh action without onRefresh", () => {
    render(<QRCode type="svg" value="a" status="expired" />);

    expect(screen.queryByRole("button")).toBeNull();
  });

  it("shows the scanned and loading masks", () => {
    const { rerender, container } = render(
      <QRCode type="svg" value="a" status="scanned" />
    );
    expect(screen.getByText("Scanned")).toBeInTheDocument();

    rerender(<QRCode type="svg" value="a" status="loading" />);
    expect(container.querySelector('[aria-busy="true"]')).not.toBeNull();
  });

  it("lets statusRender replace the mask content", () => {
    render(
      <QRCode
        type="svg"
        value="a"
        status="expired"
        statusRender={({ status, locale }) => (
          <span>{`${status}: ${locale.refresh}`}</span>
        )}
      />
    );

    expect(screen.getByText("expired: Refresh")).toBeInTheDocument();
    expect(screen.queryByText("QR code expired")).toBeNull();
  });
});
