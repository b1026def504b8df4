// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/typography/Typography`
 * Purpose: Verifies Typography elements, decorations and the clipboard copy action.
 * Side-effects: global (navigator.clipboard is stubbed per test)
 * Links: src/components/kit/typography/Typography.tsx, TypographyBase.tsx
 * @public
 */

import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";

import { Typography } from "@/components/kit/typography/Typography";

function stubClipboard(writeText: (text: string) => Promise<void>) {
  Object.defineProperty(navigator, "clipboard", {
    value: { writeText },
    configurable: true,
  });
}

afterEach(() => {
  Reflect.deleteProperty(navigator, "clipboard");
});

describe("Typography", () => {
  it("renders titles at their heading level", () => {
    render(<Typography.Title level={3}>Release notes</Typography.Title>);

    expect(screen.getByRole("heading", { level: 3 })).toHaveTextContent("Release notes");
  });

  it("nests decorations in a fixed order", () => {
    const { container } = render(
      <Typography.Text strong code>
        npm test
      </Typography.Text>
    );

    expect(container.querySelector("strong > code")).toHaveTextContent("npm test");
  });

  it("applies the type class and disabled state", () => {
    render(
      <Typography.Text type="danger" disabled copyable>
        Expired
      </Typography.Text>
    );

    const text = screen.getByText("Expired");
    expect(text).toHaveClass("ant-typography", "ant-typography-danger", "ant-typography-disabled");
    expect(text).toHaveAttribute("aria-disabled", "true");
    expect(screen.queryByRole("button", { name: "Copy" })).toBeNull();
  });

  it("drops href from a disabled link", () => {
    render(
      <Typography.Link href="/docs" disabled>
        Docs
      </Typography.Link>
    );

    const link = screen.getByText("Docs");
    expect(link).not.toHaveAttribute("href");
    expect(link).toHaveAttribute("aria-disabled", "true");
  });
});

describe("Typography copyable", () => {
  it("copies the rendered text and flips to the copied label", async () => {
    const writeText = vi.fn((_text: string) => Promise.resolve());
    stubClipboard(writeText);
    const onCopy = vi.fn();
    render(<Typography.Text copyable={{ onCopy }}>Hello world</Typography.Text>);

    fireEvent.click(screen.getByRole("button", { name: "Copy" }));

    expect(await screen.findByRole("button", { name: "Copied" })).toHaveAttribute("data-copied", "true");
    expect(writeText).toHaveBeenCalledWith("Hello world");
    expect(onCopy).toHaveBeenCalledTimes(1);
  });

  it("copies the configured text instead of the content", async () => {
    const writeText = vi.fn((_text: string) => Promise.resolve());
    stubClipboard(writeText);
    render(
      <Typography.Paragraph copyable={{ text: "test-secret", tooltips: false }}>
        API key
      </Typography.Paragraph>
    );

    fireEvent.click(screen.getByRole("button", { name: "Copy" }));

    await waitFor(() => expect(writeText).toHaveBeenCalledWith("test-secret"));
  });

  it("warns and keeps the copy label when the clipboard rejects", async () => {
    stubClipboard(() => Promise.reject(new Error("denied")));
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const onCopy = vi.fn();
    render(<Typography.Text copyable={{ onCopy }}>Hello world</Typography.Text>);

    fireEvent.click(screen.getByRole("button", { name: "Copy" }));

    await waitFor(() =>
      expect(warnSpy).toHaveBeenCalledWith(
        "[UI] WARN ui.typography.copy_failed",
        '{"message":"denied"}'
      )
    );
    expect(screen.getByRole("button", { name: "Copy" })).toBeInTheDocument();
    expect(onCopy).not.toHaveBeenCalled();
  });
});
