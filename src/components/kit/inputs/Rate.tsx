// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/Rate`
 * Purpose: Star rating with half stars, hover preview, clear-on-repeat and keyboard control.
 * Invariants:
 * - Each star is full, half or empty per getStarFill against the shown (hover or committed) value.
 * - With allowClear, clicking the current value resets to 0.
 * Side-effects: none
 * @public
 */

"use client";

import { Star } from "lucide-react";
import type {
  CSSProperties,
  KeyboardEvent,
  MouseEvent,
  ReactNode,
} from "react";
import { forwardRef, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import { rate, rateStar, rateStarLayer } from "@/styles/ui";

import { Tooltip } from "../data-display/Tooltip";
import { useComponentConfig } from "../theme";

export type StarFill = "full" | "half" | "zero";

/** Fill for the star at zero-based `index` given a rating `value`. */
export function getStarFill(index: number, value: number): StarFill {
  if (value >= index + 1) return "full";
  if (value >= index + 0.5) return "half";
  return "zero";
}

/** Rating a pointer at `ratio` (0-1 across the star, reading direction) would pick. */
export function getPointerValue(
  index: number,
  ratio: number,
  allowHalf: boolean
): number {
  return allowHalf && ratio < 0.5 ? index + 0.5 : index + 1;
}

/** Next rating one keyboard step away, snapped onto the `unit` grid first. */
export function getKeyboardValue(
  current: number,
  unit: number,
  step: 1 | -1,
  count: number
): number {
  const next =
    step === 1
      ? Math.floor(current / unit) * unit + unit
      : Math.ceil(current / unit) * unit - unit;
  return Math.min(count, Math.max(0, next));
}

export interface RateProps {
  className?: string;
  style?: CSSProperties;
  count?: number;
  value?: number;
  defaultValue?: number;
  onChange?: (value: number) => void;
  onHoverChange?: (value: number | undefined) => void;
  allowHalf?: boolean;
  allowClear?: boolean;
  character?: ReactNode | ((info: { index: number }) => ReactNode);
  tooltips?: string[];
  disabled?: boolean;
  autoFocus?: boolean;
  keyboard?: boolean;
  onFocus?: () => void;
  onBlur?: () => void;
}

export const Rate = forwardRef<HTMLUListElement, RateProps>(function Rate(
  {
    className,
    style,
    count = 5,
    value,
    defaultValue = 0,
    onChange,
    onHoverChange,
    allowHalf = false,
    allowClear = true,
    character,
    tooltips,
    disabled = false,
    autoFocus = false,
    keyboard = true,
    onFocus,
    onBlur,
  },
  ref
) {
  const { prefixCls, direction, style: tokenStyle } = useComponentConfig("Rate", "rate");
  const [current, setCurrent] = useControllableState({
    value,
    defaultValue,
    onChange,
  });
  const [hover, setHover] = useState<number>();
  const shown = hover ?? current;
  const unit = allowHalf ? 0.5 : 1;

  const updateHover = (next: number | undefined) => {
    if (next === hover) return;
    setHover(next);
    onHoverChange?.(next);
  };

  const pointerValue = (index: number, event: MouseEvent<HTMLElement>) => {
    const rect = event.currentTarget.getBoundingClientRect();
    const offset =
      direction === "rtl" ? rect.right - event.clientX : event.clientX - rect.left;
    const ratio = rect.width > 0 ? offset / rect.width : 1;
    return getPointerValue(index, ratio, allowHalf);
  };

  const select = (next: number) => {
    setCurrent(allowClear && next === current ? 0 : next);
  };

  const handleKeyDown = (event: KeyboardEvent<HTMLUListElement>) => {
    if (disabled || !keyboard) return;
    const forward = direction === "rtl" ? "ArrowLeft" : "ArrowRight";
    const backward = direction === "rtl" ? "ArrowRight" : "ArrowLeft";
    if (event.key === forward && current < count) {
      event.preventDefault();
      setCurrent(getKeyboardValue(current, unit, 1, count));
    } else if (event.key === backward && current > 0) {
      event.preventDefault();
      setCurrent(getKeyboardValue(current, unit, -1, count));
    }
  };

  const renderCharacter = (index: number) => {
    if (typeof character === "function") return character({ index });
    return character ?? <Star aria-hidden className="size-[1em]" fill="currentColor" strokeWidth={0} />;
  };

  return (
    <ul
      ref={ref}
      role="radiogroup"
      tabIndex={disabled ? -1 : 0}
      // biome-ignore lint/a11y/noAutofocus: opt-in prop
      autoFocus={autoFocus}
      aria-disabled={disabled || undefined}
      className={cn(prefixCls, rate({ disabled }), className)}
      style={{ ...tokenStyle, ...style }}
      onKeyDown={handleKeyDown}
      onFocus={onFocus}
      onBlur={onBlur}
      onMouseLeave={() => updateHover(undefined)}
    >
      {Array.from({ length: count }, (_, index) => {
        const fill = getStarFill(index, shown);
        const star = (
          <li
            // biome-ignore lint/suspicious/noArrayIndexKey: stars are positional
            key={index}
            role="radio"
            aria-checked={current > index}
            aria-posinset={index + 1}
            aria-setsize={count}
            data-fill={fill}
            className={cn(`${prefixCls}-star`, rateStar({ disabled }))}
            onMouseMove={
              disabled ? undefined : (event) => updateHover(pointerValue(index, event))
            }
            onClick={disabled ? undefined : (event) => select(pointerValue(index, event))}
          >
            <div className={rateStarLayer({ layer: "first", lit: fill !== "zero" })}>
              {renderCharacter(index)}
            </div>
            <div className={rateStarLayer({ layer: "second", lit: fill === "full" })}>
              {renderCharacter(index)}
            </div>
          </li>
        );
        const tip = tooltips?.[index];
        return tip ? (
          <Tooltip
            // biome-ignore lint/suspicious/noArrayIndexKey: stars are positional
            key={index}
            title={tip}
          >
            {star}
          </Tooltip>
        ) : (
          star
        );
      })}
    </ul>
  );
});

Rate.displayName = "Rate";
