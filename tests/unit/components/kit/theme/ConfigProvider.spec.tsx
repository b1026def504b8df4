// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/theme/ConfigProvider`
 * Purpose: Verifies token CSS variables, nesting, direction and invalid theme fallback.
 * Side-effects: none (console.warn is spied)
 * Links: src/components/kit/theme/ConfigProvider.tsx
 * @public
 */

import { render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import {
  ConfigProvider,
  useComponentSize,
  useConfig,
  useLocale,
} from "@/components/kit/theme";

function Probe() {
  const { direction, token } = useConfig();
  const size = useComponentSize();
  const { cancelText } = useLocale("Modal");
  return (
    <span data-testid="probe">
      {[direction, token.colorPrimary, size, cancelText].join("|")}
    </span>
  );
}

describe("ConfigProvider", () => {
  it("exposes tokens as CSS variables on its root", () => {
    const { container } = render(
      <ConfigProvider theme={{ token: { colorPrimary: "#123456" } }}>
        <Probe />
      </ConfigProvider>
    );

    const root = container.querySelector("[data-ant-root]");
    expect(root).toHaveClass("ant-config-provider");
    expect(root).toHaveAttribute("dir", "ltr");
    expect(
      root instanceof HTMLElement && root.style.getPropertyValue("--ant-color-primary")
    ).toBe("#123456");
  });

  it("falls back to defaults outside a provider", () => {
    render(<Probe />);

    expect(screen.getByTestId("probe")).toHaveTextContent("ltr|#1890ff|middle|Cancel");
  });

  it("merges nested providers", () => {
    render(
      <ConfigProvider
        theme={{ token: { colorPrimary: "#123456" } }}
        componentSize="large"
      >
        <ConfigProvider direction="rtl" locale={{ Modal: { cancelText: "Nope" } }}>
          <Probe />
        </ConfigProvider>
      </ConfigProvider>
    );

    expect(screen.getByTestId("probe")).toHaveTextContent("rtl|#123456|large|Nope");
  });

  it("warns and keeps the inherited theme when the config is invalid", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    render(
      <ConfigProvider theme={{ token: { colorPrimary: "nope" } }}>
        <Probe />
      </ConfigProvider>
    );

    expect(screen.getByTestId("probe")).toHaveTextContent("ltr|#1890ff|middle|Cancel");
    expect(warnSpy).toHaveBeenCalledWith(
      "[UI] WARN ui.config.invalid_theme",
      '{"invalid":["token.colorPrimary"]}'
    );
  });
});
