// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/data-display/display-helpers`
 * Purpose: Verifies the pure helpers exported by Badge, Collapse, Tag, Timeline, Tooltip and the placement map.
 * Scope: Color resolution, badge overflow, accordion toggling and side mapping. Does NOT render components.
 * Side-effects: none
 * Links: src/components/kit/data-display/
 * @public
 */

import { describe, expect, it } from "vitest";

import { formatBadgeCount, resolveMarkerColor } from "@/components/kit/data-display/Badge";
import { toggleActiveKey } from "@/components/kit/data-display/Collapse";
import { toSideAlign } from "@/components/kit/data-display/placement";
import { getTagColorStyle } from "@/components/kit/data-display/Tag";
import { getTimelineItemPosition } from "@/components/kit/data-display/Timeline";
import { resolvePopupColor } from "@/components/kit/data-display/Tooltip";

describe("formatBadgeCount", () => {
  it("caps at overflowCount", () => {
    expect(formatBadgeCount(100, 99)).toBe("99+");
    expect(formatBadgeCount(99, 99)).toBe("99");
  });
});

describe("preset color resolution", () => {
  it("maps preset names to their base shade", () => {
    expect(resolveMarkerColor("blue")).toBe("#1890ff");
    expect(resolvePopupColor("blue")).toBe("#1890ff");
  });

  it("passes custom colors through", () => {
    expect(resolveMarkerColor("#123456")).toBe("#123456");
    expect(resolvePopupColor("rgb(1, 2, 3)")).toBe("rgb(1, 2, 3)");
  });
});

describe("getTagColorStyle", () => {
  it("uses the light palette for presets", () => {
    expect(getTagColorStyle("blue", true)).toEqual({
      background: "#e6f7ff",
      color: "#096dd9",
      borderColor: "#91d5ff",
    });
    expect(getTagColorStyle("blue", false).borderColor).toBe("transparent");
  });

  it("leaves status colors to classes", () => {
    expect(getTagColorStyle("success", true)).toEqual({});
    expect(getTagColorStyle(undefined, true)).toEqual({});
  });

  it("fills custom colors with white text", () => {
    expect(getTagColorStyle("#87d068", true)).toEqual({
      background: "#87d068",
      color: "#fff",
      borderColor: "transparent",
    });
  });
});

describe("toggleActiveKey", () => {
  it("toggles independently", () => {
    expect(toggleActiveKey(["a"], "b", false)).toEqual(["a", "b"]);
    expect(toggleActiveKey(["a", "b"], "a", false)).toEqual(["b"]);
  });

  it("keeps one panel open in accordion mode", () => {
    expect(toggleActiveKey(["a"], "b", true)).toEqual(["b"]);
    expect(toggleActiveKey(["b"], "b", true)).toEqual([]);
  });
});

describe("getTimelineItemPosition", () => {
  it("alternates starting on the left", () => {
    expect(getTimelineItemPosition(0, "alternate")).toBe("left");
    expect(getTimelineItemPosition(1, "alternate")).toBe("right");
    expect(getTimelineItemPosition(0, "alternate", "right")).toBe("right");
  });

  it("follows the mode otherwise", () => {
    expect(getTimelineItemPosition(3, "right", "left")).toBe("right");
    expect(getTimelineItemPosition(3, "left")).toBe("left");
  });
});

describe("toSideAlign", () => {
  it.each([
    ["top", "top", "center"],
    ["bottomLeft", "bottom", "start"],
    ["rightBottom", "right", "end"],
    ["leftTop", "left", "start"],
  ] as const)("%s -> %s/%s", (placement, side, align) => {
    expect(toSideAlign(placement)).toEqual({ side, align });
  });
});
