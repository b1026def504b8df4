// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/data-display/Avatar`
 * Purpose: Verifies text avatars and the Avatar.Group overflow avatar and shared size.
 * Side-effects: none
 * Links: src/components/kit/data-display/Avatar.tsx
 * @public
 */

import { render, screen } from "@testing-library/react";
import { describe, expect, it } from "vitest";

import { Avatar } from "@/components/kit/data-display/Avatar";

describe("Avatar", () => {
  it("renders text with the shape class", () => {
    const { container } = render(<Avatar shape="square">U</Avatar>);

    expect(screen.getByText("U")).toBeInTheDocument();
    expect(container.firstElementChild).toHaveClass("ant-avatar", "ant-avatar-square");
  });
});

describe("Avatar.Group", () => {
  it("collapses avatars past max.count into a +N avatar", () => {
    const { container } = render(
      <Avatar.Group max={{ count: 2 }}>
        <Avatar>A</Avatar>
        <Avatar>B</Avatar>
        <Avatar>C</Avatar>
        <Avatar>D</Avatar>
      </Avatar.Group>
    );

    expect(screen.getByText("A")).toBeInTheDocument();
    expect(screen.getByText("B")).toBeInTheDocument();
    expect(screen.queryByText("C")).toBeNull();
    expect(screen.getByText("+2")).toBeInTheDocument();
    expect(container.querySelectorAll(".ant-avatar")).toHaveLength(3);
  });

  it("renders every avatar when the count is not exceeded", () => {
    render(
      <Avatar.Group max={{ count: 3 }}>
        <Avatar>A</Avatar>
        <Avatar>B</Avatar>
      </Avatar.Group>
    );

    expect(screen.queryByText(/^\+/)).toBeNull();
  });

  it("passes its size to every avatar including the overflow", () => {
    const { container } = render(
      <Avatar.Group size="large" max={{ count: 1 }}>
        <Avatar>A</Avatar>
        <Avatar>B</Avatar>
      </Avatar.Group>
    );

    const avatars = container.querySelectorAll(".ant-avatar");
    expect(avatars).toHaveLength(2);
    avatars.forEach((node) => {
      expect(node).toHaveClass("ant-avatar-lg");
    });
  });
});
