// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Spin`
 * Purpose: Loading indicator, standalone, fullscreen, or layered over wrapped content.
 * Scope: Renders the default dot indicator, a custom `indicator`, or a progress ring for `percent`.
 * Invariants:
 * - With `delay`, the indicator appears only once `spinning` has stayed true for that long; turning off is immediate.
 * - Wrapped children stay mounted and are dimmed while spinning.
 * Side-effects: time (delay timer)
 * @public
 */

"use client";

import type { CSSProperties, ReactNode } from "react";
import { useEffect, useState } from "react";

import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import {
  spin,
  spinContainer,
  spinDot,
  spinNested,
  spinNestedMask,
} from "@/styles/ui";

import { useComponentConfig, useComponentSize } from "../theme";

export interface SpinProps {
  spinning?: boolean;
  size?: SizeType;
  tip?: ReactNode;
  /** Milliseconds before the indicator shows. */
  delay?: number;
  indicator?: ReactNode;
  fullscreen?: boolean;
  /** 0-100; renders a progress ring instead of the dots. */
  percent?: number;
  className?: string;
  style?: CSSProperties;
  wrapperClassName?: string;
  children?: ReactNode;
}

export function shouldDelay(spinning: boolean, delay: number | undefined): boolean {
  return spinning && delay !== undefined && delay > 0;
}

function useDelayedSpinning(spinning: boolean, delay: number | undefined): boolean {
  const [visible, setVisible] = useState(() => spinning && !shouldDelay(spinning, delay));

  useEffect(() => {
    if (!shouldDelay(spinning, delay)) {
      setVisible(spinning);
      return undefined;
    }
    const id = setTimeout(() => setVisible(true), delay);
    return () => clearTimeout(id);
  }, [spinning, delay]);

  return visible;
}

const dotPositions = [
  "start-0 top-0",
  "end-0 top-0 [animation-delay:0.4s]",
  "bottom-0 end-0 [animation-delay:0.8s]",
  "bottom-0 start-0 [animation-delay:1.2s]",
];

function Dots({ prefixCls, size }: { prefixCls: string; size: SizeType }) {
  return (
    <span
      className={cn(`${prefixCls}-dot`, `${prefixCls}-dot-spin`, spinDot({ size }))}
    >
      {dotPositions.map((position) => (
        <i
          key={position}
          className={cn(
            `${prefixCls}-dot-item`,
            "absolute block size-[45%] animate-pulse rounded-full bg-current",
            position
          )}
        />
      ))}
    </span>
  );
}

function PercentRing({ percent, size }: { percent: number; size: SizeType }) {
  const clamped = Math.min(100, Math.max(0, percent));
  const circumference = 2 * Math.PI * 40;
  return (
    <svg
      viewBox="0 0 100 100"
      className={cn(spinDot({ size }), "animate-none")}
      aria-hidden
    >
      <circle
        cx={50}
        cy={50}
        r={40}
        fill="none"
        strokeWidth={20}
        className="stroke-fill-secondary"
      />
      <circle
        cx={50}
        cy={50}
        r={40}
        fill="none"
        strokeWidth={20}
        stroke="currentColor"
        strokeDasharray={`${(clamped / 100) * circumference} ${circumference}`}
        transform="rotate(-90 50 50)"
      />
    </svg>
  );
}

export function Spin({
  spinning = true,
  size: sizeProp,
  tip,
  delay,
  indicator,
  fullscreen = false,
  percent,
  className,
  style,
  wrapperClassName,
  children,
}: SpinProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Spin", "spin");
  const size = useComponentSize(sizeProp);
  const visible = useDelayedSpinning(spinning, delay);
  const nested = children !== undefined && children !== null;

  const icon =
    indicator ??
    (percent !== undefined ? (
      <PercentRing percent={percent} size={size} />
    ) : (
      <Dots prefixCls={prefixCls} size={size} />
    ));

  const showTip = (nested || fullscreen) && tip !== undefined && tip !== null;

  const spinElement = (
    <div
      aria-live="polite"
      aria-busy={visible}
      className={cn(
        prefixCls,
        `${prefixCls}-${size}`,
        visible && `${prefixCls}-spinning`,
        fullscreen && `${prefixCls}-fullscreen`,
        spin({ size, fullscreen }),
        !visible && "hidden",
        className
      )}
      style={{ ...tokenStyle, ...style }}
    >
      {icon}
      {showTip && <div className={`${prefixCls}-text`}>{tip}</div>}
    </div>
  );

  if (!nested) return spinElement;

  return (
    <div className={cn(`${prefixCls}-nested-loading`, spinNested(), wrapperClassName)}>
      {visible && <div className={spinNestedMask()}>{spinElement}</div>}
      <div
        className={cn(
          `${prefixCls}-container`,
          visible && `${prefixCls}-blur`,
          spinContainer({ blurred: visible })
        )}
      >
        {children}
      </div>
    </div>
  );
}
