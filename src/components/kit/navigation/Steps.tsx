// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/navigation/Steps`
 * Purpose: Progress through a sequence of steps, horizontal or vertical.
 * Scope: Status per step, dot and progress-ring styles, navigation and inline types; onChange makes steps clickable.
 * Invariants: Steps before `current` finish, `current` takes `status`, later steps wait; an item's own status wins.
 * Side-effects: none
 * @public
 */

"use client";

import { Check, X } from "lucide-react";
import type { CSSProperties, ReactNode } from "react";

import { cn } from "@/shared/util";
import {
  steps,
  stepsDescription,
  stepsDot,
  stepsIcon,
  stepsItem,
  stepsSubTitle,
  stepsTitle,
  stepsVerticalTail,
} from "@/styles/ui";

import { useComponentConfig } from "../theme";

export type StepStatus = "wait" | "process" | "finish" | "error";

export interface StepItem {
  title?: ReactNode;
  subTitle?: ReactNode;
  description?: ReactNode;
  status?: StepStatus;
  icon?: ReactNode;
  disabled?: boolean;
}

export interface ProgressDotInfo {
  index: number;
  status: StepStatus;
  title: ReactNode;
  description: ReactNode;
}

export interface StepsProps {
  className?: string;
  style?: CSSProperties;
  items: StepItem[];
  current?: number;
  initial?: number;
  status?: StepStatus;
  direction?: "horizontal" | "vertical";
  size?: "default" | "small";
  type?: "default" | "navigation" | "inline";
  progressDot?: boolean | ((dot: ReactNode, info: ProgressDotInfo) => ReactNode);
  /** Progress of the current step, 0-100. */
  percent?: number;
  labelPlacement?: "horizontal" | "vertical";
  onChange?: (current: number) => void;
}

export function getStepStatus(
  index: number,
  current: number,
  status: StepStatus = "process",
  itemStatus?: StepStatus
): StepStatus {
  if (itemStatus) return itemStatus;
  if (index < current) return "finish";
  if (index === current) return status;
  return "wait";
}

function ProgressRing({ percent }: { percent: number }) {
  const radius = 19;
  const circumference = 2 * Math.PI * radius;
  const clamped = Math.max(0, Math.min(100, percent));
  return (
    <svg
      aria-hidden
      viewBox="0 0 40 40"
      className="pointer-events-none absolute -inset-1 size-10 -rotate-90"
    >
      <circle
        cx="20"
        cy="20"
        r={radius}
        fill="none"
        strokeWidth="2"
        stroke="var(--ant-color-split)"
      />
      <circle
        cx="20"
        cy="20"
        r={radius}
        fill="none"
        strokeWidth="2"
        stroke="var(--ant-color-primary)"
        strokeLinecap="round"
        strokeDasharray={`${(circumference * clamped) / 100} ${circumference}`}
      />
    </svg>
  );
}

export function Steps({
  items,
  current = 0,
  initial = 0,
  status = "process",
  direction = "horizontal",
  size = "default",
  type = "default",
  progressDot = false,
  percent,
  labelPlacement = "horizontal",
  onChange,
  className,
  style,
}: StepsProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Steps", "steps");
  const inline = type === "inline";
  const dotted = progressDot !== false || inline;
  const mergedDirection = inline ? "horizontal" : direction;
  const labelVertical =
    mergedDirection === "horizontal" && (dotted || labelPlacement === "vertical");
  const small = size === "small" || inline;

  return (
    <div
      role="list"
      className={cn(
        prefixCls,
        `${prefixCls}-${mergedDirection}`,
        `${prefixCls}-${type}`,
        labelVertical && `${prefixCls}-label-vertical`,
        dotted && `${prefixCls}-dot`,
        small && `${prefixCls}-small`,
        steps({ direction: mergedDirection, type }),
        className
      )}
      style={{ ...tokenStyle, ...style }}
    >
      {items.map((item, position) => {
        const index = initial + position;
        const stepStatus = getStepStatus(index, current, status, item.status);
        const last = position === items.length - 1;
        const clickable =
          onChange !== undefined && !item.disabled && index !== current;
        const nextDone = stepStatus === "finish";

        const dot = <span className={stepsDot({ status: stepStatus })} />;
        let iconNode: ReactNode;
        if (dotted) {
          iconNode =
            typeof progressDot === "function"
              ? progressDot(dot, {
                  index,
                  status: stepStatus,
                  title: item.title,
                  description: item.description,
                })
              : dot;
        } else if (item.icon !== undefined) {
          iconNode = (
            <span className={stepsIcon({ status: stepStatus, custom: true })}>
              {item.icon}
            </span>
          );
        } else {
          iconNode = (
            <span
              className={cn(
                "relative",
                stepsIcon({ status: stepStatus, size: small ? "small" : "default" })
              )}
            >
              {stepStatus === "finish" ? (
                <Check className="size-4" aria-hidden />
              ) : stepStatus === "error" ? (
                <X className="size-4" aria-hidden />
              ) : (
                index + 1
              )}
              {percent !== undefined && stepStatus === "process" && !small && (
                <ProgressRing percent={percent} />
              )}
            </span>
          );
        }

        return (
          <div
            key={index}
            role="listitem"
            aria-current={index === current ? "step" : undefined}
            tabIndex={clickable ? 0 : undefined}
            className={cn(
              `${prefixCls}-item`,
              `${prefixCls}-item-${stepStatus}`,
              item.disabled && `${prefixCls}-item-disabled`,
              stepsItem({ direction: mergedDirection, clickable, labelVertical }),
              type === "navigation" &&
                index === current &&
                "after:absolute after:inset-x-0 after:bottom-0 after:h-0.5 after:bg-primary after:content-['']",
              type === "navigation" && "pb-3"
            )}
            onClick={clickable ? () => onChange?.(index) : undefined}
            onKeyDown={
              clickable
                ? (event) => {
                    if (event.key === "Enter" || event.key === " ") {
                      event.preventDefault();
                      onChange?.(index);
                    }
                  }
                : undefined
            }
          >
            {mergedDirection === "vertical" && !last && (
              <div
                className={cn(
                  `${prefixCls}-item-tail`,
                  stepsVerticalTail({ done: nextDone, small })
                )}
              />
            )}
            <div
              className={cn(
                `${prefixCls}-item-container`,
                labelVertical ? "flex flex-col items-center gap-2" : "flex items-start"
              )}
            >
              <div className={cn(`${prefixCls}-item-icon`, "flex-none")}>{iconNode}</div>
              <div className={cn(`${prefixCls}-item-content`, "min-w-0")}>
                <div
                  className={cn(
                    `${prefixCls}-item-title`,
                    stepsTitle({
                      status: stepStatus,
                      size: small ? "small" : "default",
                      tail:
                        mergedDirection === "horizontal" &&
                        !labelVertical &&
                        type === "default" &&
                        !last,
                      tailDone: nextDone,
                    })
                  )}
                >
                  {item.title}
                  {item.subTitle !== undefined && (
                    <span className={cn(`${prefixCls}-item-subtitle`, stepsSubTitle())}>
                      {item.subTitle}
                    </span>
                  )}
                </div>
                {item.description !== undefined && !inline && (
                  <div
                    className={cn(
                      `${prefixCls}-item-description`,
                      stepsDescription({ status: stepStatus })
                    )}
                  >
                    {item.description}
                  </div>
                )}
              </div>
            </div>
          </div>
        );
      })}
    </div>
  );
}
