// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/layout/Layout`
 * Purpose: Verifies Sider registration with its Layout and collapsing through the trigger.
 * Side-effects: none
 * Links: src/components/kit/layout/Layout.tsx
 * @public
 */

import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";

import { Layout } from "@/components/kit/layout/Layout";

describe("Layout", () => {
  it("lays out horizontally once a Sider is inside", () => {
    const { container } = render(
      <Layout>
        <Layout.Sider>Menu</Layout.Sider>
        <Layout.Content>Body</Layout.Content>
      </Layout>
    );

    expect(container.querySelector("section")).toHaveClass("ant-layout-has-sider");
  });

  it("stays vertical without a Sider", () => {
    const { container } = render(
      <Layout>
        <Layout.Header>Top</Layout.Header>
        <Layout.Content>Body</Layout.Content>
      </Layout>
    );

    expect(container.querySelector("section")).not.toHaveClass("ant-layout-has-sider");
  });
});

describe("Layout.Sider", () => {
  it("collapses and expands through its trigger", () => {
    const onCollapse = vi.fn();
    const { container } = render(
      <Layout>
        <Layout.Sider collapsible onCollapse={onCollapse}>
          Menu
        </Layout.Sider>
      </Layout>
    );
    const sider = container.querySelector("aside");

    expect(sider).toHaveStyle({ width: "200px" });
    expect(sider).not.toHaveClass("ant-layout-sider-collapsed");

    fireEvent.click(screen.getByRole("button", { name: "Collapse sidebar" }));
    expect(onCollapse).toHaveBeenLastCalledWith(true, "clickTrigger");
    expect(sider).toHaveClass("ant-layout-sider-collapsed");
    expect(sider).toHaveStyle({ width: "80px" });

    const expand = screen.getByRole("button", { name: "Expand sidebar" });
    expect(expand).toHaveAttribute("aria-expanded", "false");
    fireEvent.click(expand);
    expect(onCollapse).toHaveBeenLastCalledWith(false, "clickTrigger");
    expect(sider).toHaveStyle({ width: "200px" });
  });

  it("uses the given widths and hides the trigger when it is null", () => {
    const { container } = render(
      <Layout.Sider collapsible defaultCollapsed collapsedWidth={0} trigger={null}>
        Menu
      </Layout.Sider>
    );

    expect(container.querySelector("aside")).toHaveStyle({ width: "0px" });
    expect(screen.queryByRole("button")).toBeNull();
  });
});
