// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Progress`
 * Purpose: Line, stepped, circle and dashboard progress indicators with status colors and an info label.
 * Scope: Wraps the Radix Progress root for progressbar semantics. Does not animate percent changes beyond CSS transitions.
 * Invariants:
 * - Forwards ref; percent and success.percent are clamped to 0-100.
 * - Without an explicit status, reaching 100 (or success.percent 100) reads as success.
 * Side-effects: none
 * Links: getProgressStatus
 * @public
 */

"use client";

import * as ProgressPrimitive from "@radix-ui/react-progress";
import { Check, CheckCircle2, X, XCircle } from "lucide-react";
import type { CSSProperties, ReactNode } from "react";
import { forwardRef, useId } from "react";

import { cn } from "@/shared/util";
import {
  progressActive,
  progressBar,
  progressCircle,
  progressCircleText,
  progressLine,
  progressStep,
  progressSteps,
  progressSuccessBar,
  progressText,
  progressTrail,
} from "@/styles/ui";
import type { ProgressStatus } from "@/styles/ui";

import { useComponentConfig } from "../theme";

export type ProgressType = "line" | "circle" | "dashboard";

export type StrokeColor = string | { from: string; to: string };

export interface ProgressProps {
  type?: ProgressType;
  percent?: number;
  success?: { percent?: number; strokeColor?: string };
  status?: ProgressStatus;
  showInfo?: boolean;
  format?: (percent: number, successPercent?: number) => ReactNode;
  /** A list colors each step in stepped mode. */
  strokeColor?: StrokeColor | string[];
  trailColor?: string;
  strokeLinecap?: "round" | "butt" | "square";
  /** Line height in px, or ring width as a share of the 100-unit viewBox. */
  strokeWidth?: number;
  steps?: number | { count: number; gap?: number };
  /** Line: width or [width, height]; circle: diameter. */
  size?: "small" | "default" | number | [number, number];
  gapDegree?: number;
  className?: string;
  style?: CSSProperties;
  "aria-label"?: string;
}

export function clampPercent(percent: number | undefined): number {
  if (percent === undefined || Number.isNaN(percent)) return 0;
  return Math.min(100, Math.max(0, percent));
}

export function getProgressStatus(
  percent: number | undefined,
  status?: ProgressStatus,
  successPercent?: number
): ProgressStatus {
  if (status) return status;
  return clampPercent(successPercent ?? percent) >= 100 ? "success" : "normal";
}

/** Number of filled steps; partial steps round to the nearest. */
export function getFilledSteps(count: number, percent: number): number {
  return Math.round(count * (clampPercent(percent) / 100));
}

function toBackground(color: StrokeColor | undefined): string | undefined {
  if (color === undefined || typeof color === "string") return color;
  return `linear-gradient(to right, ${color.from}, ${color.to})`;
}

function resolveWidth(size: ProgressProps["size"]): number | undefined {
  if (typeof size === "number") return size;
  return Array.isArray(size) ? size[0] : undefined;
}

function resolveHeight(size: ProgressProps["size"]): number {
  if (Array.isArray(size)) return size[1];
  return size === "small" ? 6 : 8;
}

function singleColor(
  color: ProgressProps["strokeColor"]
): StrokeColor | undefined {
  return Array.isArray(color) ? color[0] : color;
}

interface ArcProps {
  percent: number;
  strokeWidth: number;
  gapDegree: number;
  linecap: "round" | "butt" | "square";
  stroke: string;
  className?: string;
}

function Arc({
  percent,
  strokeWidth,
  gapDegree,
  linecap,
  stroke,
  className,
}: ArcProps) {
  const radius = 50 - strokeWidth / 2;
  const perimeter = 2 * Math.PI * radius;
  const visible = perimeter * ((360 - gapDegree) / 360);
  const rotation = gapDegree > 0 ? 90 + gapDegree / 2 : -90;
  const length = (percent / 100) * visible;
  return (
    <circle
      cx={50}
      cy={50}
      r={radius}
      fill="none"
      strokeWidth={strokeWidth}
      strokeLinecap={percent === 0 ? "butt" : linecap}
      stroke={stroke}
      strokeDasharray={`${length} ${perimeter}`}
      transform={`rotate(${rotation} 50 50)`}
      className={cn("transition-[stroke-dasharray] duration-300", className)}
    />
  );
}

const statusStroke = {
  normal: "var(--ant-color-info)",
  active: "var(--ant-color-info)",
  success: "var(--ant-color-success)",
  exception: "var(--ant-color-error)",
} satisfies Record<ProgressStatus, string>;

export const Progress = forwardRef<HTMLDivElement, ProgressProps>(
  (
    {
      type = "line",
      percent: percentProp,
      success,
      status: statusProp,
      showInfo = true,
      format,
      strokeColor,
      trailColor,
      strokeLinecap = "round",
      strokeWidth,
      steps,
      size = "default",
      gapDegree,
      className,
      style,
      "aria-label": ariaLabel,
    },
    ref
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig("Progress", "progress");
    const gradientId = useId();
    const percent = clampPercent(percentProp);
    const successPercent =
      success?.percent !== undefined ? clampPercent(success.percent) : undefined;
    const status = getProgressStatus(percent, statusProp, successPercent);
    const circular = type !== "line";
    const small = size === "small";

    let info: ReactNode = null;
    if (showInfo) {
      if (format || (status !== "success" && status !== "exception")) {
        info = format ? format(percent, successPercent) : `${percent}%`;
      } else if (status === "success") {
        info = circular ? (
          <Check className="size-[1.2em]" aria-hidden />
        ) : (
          <CheckCircle2 className="size-[1em]" aria-hidden />
        );
      } else {
        info = circular ? (
          <X className="size-[1.2em]" aria-hidden />
        ) : (
          <XCircle className="size-[1em]" aria-hidden />
        );
      }
    }

    const infoNode = showInfo ? (
      <span
        className={cn(
          `${prefixCls}-text`,
          circular ? progressCircleText() : progressText({ status }),
          !circular && "inline-flex items-center",
          circular && status === "success" && "text-success",
          circular && status === "exception" && "text-error"
        )}
      >
        {info}
      </span>
    ) : null;

    const color = singleColor(strokeColor);
    let body: ReactNode;

    if (circular) {
      const diameter = resolveWidth(size) ?? (small ? 80 : 120);
      const width = strokeWidth ?? 6;
      const gap = gapDegree ?? (type === "dashboard" ? 75 : 0);
      const gradient = typeof color === "object" ? color : undefined;
      const mainStroke = gradient
        ? `url(#${gradientId})`
        : (color ?? statusStroke[status]);
      body = (
        <div
          className={cn(`${prefixCls}-inner`, progressCircle())}
          style={{
            width: diameter,
            height: diameter,
            fontSize: diameter * 0.15 + 6,
          }}
        >
          <svg viewBox="0 0 100 100" className="size-full" aria-hidden>
            {gradient && (
              <defs>
                <linearGradient id={gradientId} x1="100%" y1="0%" x2="0%" y2="0%">
                  <stop offset="0%" stopColor={gradient.from} />
                  <stop offset="100%" stopColor={gradient.to} />
                </linearGradient>
              </defs>
            )}
            <Arc
              percent={100}
              strokeWidth={width}
              gapDegree={gap}
              linecap={strokeLinecap}
              stroke={trailColor ?? "var(--ant-color-fill-secondary)"}
              className={`${prefixCls}-circle-trail`}
            />
            <Arc
              percent={percent}
              strokeWidth={width}
              gapDegree={gap}
              linecap={strokeLinecap}
              stroke={mainStroke}
              className={`${prefixCls}-circle-path`}
            />
            {successPercent !== undefined && successPercent > 0 && (
              <Arc
                percent={successPercent}
                strokeWidth={width}
                gapDegree={gap}
                linecap={strokeLinecap}
                stroke={success?.strokeColor ?? statusStroke.success}
              />
            )}
          </svg>
          {infoNode}
        </div>
      );
    } else if (steps !== undefined) {
      const count = typeof steps === "number" ? steps : steps.count;
      const gap = typeof steps === "number" ? 2 : (steps.gap ?? 2);
      const filled = getFilledSteps(count, percent);
      const stepWidth = resolveWidth(size) ?? (small ? 2 : 14);
      const stepHeight = strokeWidth ?? resolveHeight(size);
      body = (
        <div className={cn(`${prefixCls}-steps-outer`, progressLine())}>
          <div className={progressSteps()} style={{ gap }}>
            {Array.from({ length: count }, (_, index) => {
              const stepColor = Array.isArray(strokeColor)
                ? strokeColor[index]
                : typeof color === "string"
                  ? color
                  : undefined;
              const active = index < filled;
              return (
                <div
                  // biome-ignore lint/suspicious/noArrayIndexKey: steps are positional
                  key={index}
                  className={cn(
                    `${prefixCls}-steps-item`,
                    active && `${prefixCls}-steps-item-active`,
                    progressStep({ filled: active }),
                    active &&
                      stepColor === undefined &&
                      progressBar({ status, round: false }),
                    "relative"
                  )}
                  style={{
                    width: stepWidth,
                    height: stepHeight,
                    backgroundColor: active ? stepColor : trailColor,
                  }}
                />
              );
            })}
          </div>
          {infoNode}
        </div>
      );
    } else {
      const height = strokeWidth ?? resolveHeight(size);
      const width = resolveWidth(size);
      const round = strokeLinecap !== "butt";
      body = (
        <div className={cn(`${prefixCls}-outer`, progressLine())} style={{ width }}>
          <div
            className={cn(`${prefixCls}-inner`, progressTrail({ round }))}
            style={{ height, backgroundColor: trailColor }}
          >
            <div
              className={cn(`${prefixCls}-bg`, progressBar({ status, round }))}
              style={{ width: `${percent}%`, background: toBackground(color) }}
            >
              {status === "active" && <span className={progressActive()} />}
            </div>
            {successPercent !== undefined && (
              <div
                className={cn(
                  `${prefixCls}-success-bg`,
                  progressSuccessBar(),
                  round && "rounded-full"
                )}
                style={{
                  width: `${successPercent}%`,
                  background: success?.strokeColor,
                }}
              />
            )}
          </div>
          {infoNode}
        </div>
      );
    }

    return (
      <ProgressPrimitive.Root
        ref={ref}
        value={percent}
        max={100}
        aria-label={ariaLabel}
        className={cn(
          prefixCls,
          `${prefixCls}-${type === "dashboard" ? "circle" : type}`,
          `${prefixCls}-status-${status}`,
          steps !== undefined && `${prefixCls}-steps`,
          small && `${prefixCls}-small`,
          showInfo && `${prefixCls}-show-info`,
          circular ? "inline-block" : "w-full",
          className
        )}
        style={{ ...tokenStyle, ...style }}
      >
        {body}
      </ProgressPrimitive.Root>
    );
  }
);
Progress.displayName = "Progress";
