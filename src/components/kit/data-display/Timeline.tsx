// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Timeline`
 * Purpose: Vertical list of events with dots, optional labels and a pending tail.
 * Scope: left, right and alternate modes; labels switch to the centered layout.
 * Invariants: The pending item closes the list, or opens it when `reverse` flips the order.
 * Side-effects: none
 * @public
 */

import { Loader2 } from "lucide-react";
import type { CSSProperties, ReactNode } from "react";

import { cn } from "@/shared/util";
import {
  timeline,
  timelineContent,
  timelineHead,
  timelineItem,
  timelineLabel,
  timelineTail,
} from "@/styles/ui";

import { useComponentConfig } from "../theme";

export type TimelineMode = "left" | "right" | "alternate";
export type TimelineSide = "left" | "right";

export interface TimelineItem {
  key?: string | number;
  /** `blue`, `red`, `green`, `gray` or a CSS color. */
  color?: string;
  dot?: ReactNode;
  label?: ReactNode;
  children?: ReactNode;
  position?: TimelineSide;
}

export interface TimelineProps {
  className?: string;
  style?: CSSProperties;
  items: TimelineItem[];
  mode?: TimelineMode;
  pending?: ReactNode;
  pendingDot?: ReactNode;
  reverse?: boolean;
}

/** Side an item's content sits on. Alternate mode starts on the left. */
export function getTimelineItemPosition(
  index: number,
  mode: TimelineMode,
  itemPosition?: TimelineSide
): TimelineSide {
  if (mode === "alternate") {
    return itemPosition ?? (index % 2 === 0 ? "left" : "right");
  }
  if (mode === "right") return "right";
  return itemPosition ?? "left";
}

const dotColorClass: Record<string, string> = {
  blue: "border-primary text-primary",
  red: "border-error text-error",
  green: "border-success text-success",
  gray: "border-fg-quaternary text-fg-quaternary",
};

export function Timeline({
  items,
  mode = "left",
  pending,
  pendingDot,
  reverse = false,
  className,
  style,
}: TimelineProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Timeline",
    "timeline"
  );
  const hasPending =
    pending !== undefined && pending !== null && pending !== false;
  const ordered: Array<TimelineItem & { pending?: boolean }> = reverse
    ? [...items].reverse()
    : [...items];
  if (hasPending) {
    const pendingItem = {
      key: "pending",
      pending: true,
      children: typeof pending === "boolean" ? null : pending,
      dot: pendingDot ?? (
        <Loader2 className="size-3 animate-spin" aria-hidden />
      ),
    };
    if (reverse) ordered.unshift(pendingItem);
    else ordered.push(pendingItem);
  }
  const all = ordered;
  const labelled = items.some((item) => item.label !== undefined);
  const centered = mode === "alternate" || labelled;

  return (
    <ol
      className={cn(
        prefixCls,
        `${prefixCls}-${mode}`,
        labelled && `${prefixCls}-label`,
        hasPending && `${prefixCls}-pending`,
        timeline(),
        className
      )}
      style={{ ...tokenStyle, ...style }}
    >
      {all.map((item, index) => {
        const side = getTimelineItemPosition(index, mode, item.position);
        const last = index === all.length - 1;
        const lineMode = centered ? "center" : side;
        const custom = item.dot !== undefined;
        const colorClass = dotColorClass[item.color ?? "blue"];
        const colorStyle: CSSProperties | undefined =
          item.color && !dotColorClass[item.color]
            ? { borderColor: item.color, color: item.color }
            : undefined;

        return (
          <li
            key={item.key ?? index}
            className={cn(
              `${prefixCls}-item`,
              `${prefixCls}-item-${side}`,
              item.pending && `${prefixCls}-item-pending`,
              last && `${prefixCls}-item-last`,
              timelineItem({ pending: item.pending === true })
            )}
          >
            {centered && item.label !== undefined && (
              <div
                className={cn(
                  `${prefixCls}-item-label`,
                  timelineLabel({ side: side === "left" ? "start" : "end" })
                )}
              >
                {item.label}
              </div>
            )}
            <div
              className={cn(
                `${prefixCls}-item-tail`,
                timelineTail({ mode: lineMode, hidden: last })
              )}
            />
            <div
              className={cn(
                `${prefixCls}-item-head`,
                custom && `${prefixCls}-item-head-custom`,
                timelineHead({ mode: lineMode, custom }),
                colorClass
              )}
              style={colorStyle}
            >
              {item.dot}
            </div>
            <div
              className={cn(
                `${prefixCls}-item-content`,
                timelineContent({
                  position: centered ? `center-${side}` : side,
                })
              )}
            >
              {item.children}
            </div>
          </li>
        );
      })}
    </ol>
  );
}
