// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/general/Button`
 * Purpose: Verifies Button click gating, link rendering, loading state and semantic classes.
 * Side-effects: none
 * Links: src/components/kit/general/Button.tsx
 * @public
 */

import { act, fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Button } from "@/components/kit/general/Button";
import { ConfigProvider } from "@/components/kit/theme";

describe("Button", () => {
  it("fires onClick", () => {
    const onClick = vi.fn();
    render(<Button onClick={onClick}>Save</Button>);

    fireEvent.click(screen.getByRole("button", { name: "Save" }));

    expect(onClick).toHaveBeenCalledTimes(1);
  });

  it("ignores clicks while disabled", () => {
    const onClick = vi.fn();
    render(
      <Button disabled onClick={onClick}>
        Save
      </Button>
    );

    const button = screen.getByRole("button", { name: "Save" });
    fireEvent.click(button);

    expect(button).toBeDisabled();
    expect(onClick).not.toHaveBeenCalled();
  });

  it("marks loading buttons busy and ignores clicks", () => {
    const onClick = vi.fn();
    render(
      <Button loading onClick={onClick}>
        Save
      </Button>
    );

    const button = screen.getByRole("button", { name: "Save" });
    fireEvent.click(button);

    expect(button).toHaveAttribute("aria-busy", "true");
    expect(button).toHaveClass("ant-btn-loading");
    expect(onClick).not.toHaveBeenCalled();
  });

  it("waits out a loading delay", () => {
    vi.useFakeTimers();
    try {
      render(<Button loading={{ delay: 200 }}>Save</Button>);
      const button = screen.getByRole("button", { name: "Save" });
      expect(button).not.toHaveAttribute("aria-busy");

      act(() => {
        vi.advanceTimersByTime(200);
      });

      expect(button).toHaveAttribute("aria-busy", "true");
    } finally {
      vi.useRealTimers();
    }
  });

  it("renders a link when href is set", () => {
    render(<Button href="/docs">Docs</Button>);

    expect(screen.getByRole("link", { name: "Docs" })).toHaveAttribute(
      "href",
      "/docs"
    );
  });

  it("drops href from disabled links", () => {
    render(
      <Button href="/docs" disabled>
        Docs
      </Button>
    );

    const anchor = screen.getByText("Docs").closest("a");
    expect(anchor).not.toBeNull();
    expect(anchor).not.toHaveAttribute("href");
    expect(anchor).toHaveAttribute("aria-disabled", "true");
  });

  it("spaces two CJK characters", () => {
    render(<Button>确定</Button>);

    expect(screen.getByRole("button")).toHaveTextContent("确 定");
  });

  it("keeps CJK text intact when autoInsertSpace is off", () => {
    render(<Button autoInsertSpace={false}>确定</Button>);

    expect(screen.getByRole("button")).toHaveTextContent("确定");
  });

  it("maps type and danger to semantic classes", () => {
    render(
      <>
        <Button type="primary">Primary</Button>
        <Button danger>Danger</Button>
        <Button color="primary" variant="dashed">
          Dashed
        </Button>
      </>
    );

    const primary = screen.getByRole("button", { name: "Primary" });
    expect(primary).toHaveClass("ant-btn", "ant-btn-color-primary", "ant-btn-variant-solid");

    const danger = screen.getByRole("button", { name: "Danger" });
    expect(danger).toHaveClass("ant-btn-color-danger", "ant-btn-variant-outlined");

    const dashed = screen.getByRole("button", { name: "Dashed" });
    expect(dashed).toHaveClass("ant-btn-color-primary", "ant-btn-variant-dashed");
  });

  it("uses htmlType for the native type", () => {
    render(<Button htmlType="submit">Send</Button>);

    expect(screen.getByRole("button", { name: "Send" })).toHaveAttribute(
      "type",
      "submit"
    );
  });

  it("follows the provider prefix", () => {
    render(
      <ConfigProvider prefixCls="acme">
        <Button>Save</Button>
      </ConfigProvider>
    );

    expect(screen.getByRole("button", { name: "Save" })).toHaveClass("acme-btn");
  });

  it("renders its child element with asChild", () => {
    render(
      <Button asChild>
        <a href="/home">Home</a>
      </Button>
    );

    const link = screen.getByRole("link", { name: "Home" });
    expect(link).toHaveAttribute("data-slot", "button");
    expect(link).toHaveClass("ant-btn");
  });
});
