// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/placement`
 * Purpose: Maps the twelve popup placements onto Radix `side` + `align`.
 * Side-effects: none
 * @public
 */

export const placements = [
  "top",
  "topLeft",
  "topRight",
  "bottom",
  "bottomLeft",
  "bottomRight",
  "left",
  "leftTop",
  "leftBottom",
  "right",
  "rightTop",
  "rightBottom",
] as const;

export type Placement = (typeof placements)[number];

export type PopupSide = "top" | "bottom" | "left" | "right";
export type PopupAlign = "start" | "center" | "end";

const alignBySuffix: Record<string, PopupAlign> = {
  "": "center",
  Left: "start",
  Top: "start",
  Right: "end",
  Bottom: "end",
};

export function toSideAlign(placement: Placement): {
  side: PopupSide;
  align: PopupAlign;
} {
  const match = /^(top|bottom|left|right)(.*)$/.exec(placement);
  const side = match?.[1];
  const suffix = match?.[2] ?? "";
  return {
    side:
      side === "bottom" || side === "left" || side === "right" ? side : "top",
    align: alignBySuffix[suffix] ?? "center",
  };
}
