// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/feedback/feedback-helpers`
 * Purpose: Verifies the pure helpers behind Progress, Result, Skeleton, Spin, Drawer and notification placement.
 * Side-effects: none
 * Links: src/components/kit/feedback/
 * @public
 */

import { describe, expect, it } from "vitest";

import { getPushTransform } from "@/components/kit/feedback/Drawer";
import type { Notice } from "@/components/kit/feedback/notice-store";
import { groupByPlacement, type NotificationArgs } from "@/components/kit/feedback/Notification";
import {
  clampPercent,
  getFilledSteps,
  getProgressStatus,
} from "@/components/kit/feedback/Progress";
import { isHttpResultStatus } from "@/components/kit/feedback/Result";
import { getParagraphRowWidth, getSkeletonLayout } from "@/components/kit/feedback/Skeleton";
import { shouldDelay } from "@/components/kit/feedback/Spin";

describe("Progress helpers", () => {
  it("clampPercent bounds and defaults", () => {
    expect(clampPercent(120)).toBe(100);
    expect(clampPercent(-5)).toBe(0);
    expect(clampPercent(undefined)).toBe(0);
    expect(clampPercent(Number.NaN)).toBe(0);
  });

  it("getProgressStatus turns success at 100", () => {
    expect(getProgressStatus(100)).toBe("success");
    expect(getProgressStatus(99)).toBe("normal");
    expect(getProgressStatus(100, "exception")).toBe("exception");
    expect(getProgressStatus(60, undefined, 100)).toBe("success");
  });

  it("getFilledSteps rounds to the nearest step", () => {
    expect(getFilledSteps(5, 50)).toBe(3);
    expect(getFilledSteps(5, 30)).toBe(2);
    expect(getFilledSteps(5, 150)).toBe(5);
  });
});

describe("isHttpResultStatus", () => {
  it("recognizes 403, 404 and 500", () => {
    expect(isHttpResultStatus("404")).toBe(true);
    expect(isHttpResultStatus("success")).toBe(false);
  });
});

describe("getSkeletonLayout", () => {
  it("defaults to title plus three rows", () => {
    expect(getSkeletonLayout({})).toEqual({
      avatar: null,
      title: { width: "38%" },
      paragraph: { rows: 3, width: "61%" },
    });
  });

  it("shrinks title and rows next to an avatar", () => {
    expect(getSkeletonLayout({ avatar: true })).toEqual({
      avatar: { size: "large", shape: "circle" },
      title: { width: "50%" },
      paragraph: { rows: 2, width: undefined },
    });
  });

  it("squares the avatar without a paragraph", () => {
    expect(getSkeletonLayout({ avatar: true, paragraph: false })).toEqual({
      avatar: { size: "large", shape: "square" },
      title: { width: undefined },
      paragraph: null,
    });
  });

  it("honours explicit options", () => {
    expect(getSkeletonLayout({ title: false, paragraph: { rows: 5 } })).toEqual({
      avatar: null,
      title: null,
      paragraph: { rows: 5, width: "61%" },
    });
  });

  it("applies a single width to the last row", () => {
    expect(getParagraphRowWidth(2, 3, "61%")).toBe("61%");
    expect(getParagraphRowWidth(0, 3, "61%")).toBeUndefined();
    expect(getParagraphRowWidth(1, 3, ["40%", "80%"])).toBe("80%");
  });
});

describe("shouldDelay", () => {
  it("delays only a starting spin with a positive delay", () => {
    expect(shouldDelay(true, 500)).toBe(true);
    expect(shouldDelay(true, 0)).toBe(false);
    expect(shouldDelay(true, undefined)).toBe(false);
    expect(shouldDelay(false, 500)).toBe(false);
  });
});

describe("getPushTransform", () => {
  it("moves the parent away from the child drawer", () => {
    expect(getPushTransform("right", 180)).toBe("translateX(-180px)");
    expect(getPushTransform("left", 180)).toBe("translateX(180px)");
    expect(getPushTransform("top", 100)).toBe("translateY(100px)");
    expect(getPushTransform("bottom", 100)).toBe("translateY(-100px)");
  });
});

describe("groupByPlacement", () => {
  const notice = (key: string, config: NotificationArgs): Notice<NotificationArgs> => ({
    key,
    config,
    duration: 4.5,
    paused: false,
  });

  it("groups in arrival order with a fallback placement", () => {
    const groups = groupByPlacement(
      [
        notice("a", { title: "A" }),
        notice("b", { title: "B", placement: "bottomLeft" }),
        notice("c", { title: "C" }),
      ],
      "topRight"
    );
    expect(groups.get("topRight")?.map((item) => item.key)).toEqual(["a", "c"]);
    expect(groups.get("bottomLeft")?.map((item) => item.key)).toEqual(["b"]);
  });
});
