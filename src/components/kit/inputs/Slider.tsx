// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/Slider`
 * Purpose: Single or range slider with marks, dots, value tooltip, pointer dragging and keyboard control.
 * Scope: Values are snapped through slider-utils; range values stay sorted.
 * Invariants:
 * - `onChange` fires while dragging or stepping; `onChangeComplete` once per pointer release or key press.
 * - Horizontal position flips when exactly one of `reverse` and RTL direction is set.
 * Side-effects: none
 * Links: src/components/kit/inputs/slider-utils.ts
 * @public
 */

"use client";

import type {
  CSSProperties,
  KeyboardEvent,
  PointerEvent,
  ReactNode,
} from "react";
import { forwardRef, isValidElement, useRef, useState } from "react";

import { cn } from "@/shared/util";
import {
  slider,
  sliderDot,
  sliderHandle,
  sliderMark,
  sliderRail,
  sliderTooltip,
  sliderTrack,
} from "@/styles/ui";

import { useComponentConfig } from "../theme";
import type { SliderMarkLabel, SliderMarks } from "./slider-utils";
import {
  closestHandle,
  getDotValues,
  getMarkValues,
  offsetValue,
  percentToValue,
  snapValue,
  valueToPercent,
} from "./slider-utils";

export interface SliderTooltipConfig {
  open?: boolean;
  formatter?: ((value: number) => ReactNode) | null;
}

interface SliderBaseProps {
  className?: string;
  style?: CSSProperties;
  min?: number;
  max?: number;
  step?: number | null;
  marks?: SliderMarks;
  dots?: boolean;
  included?: boolean;
  vertical?: boolean;
  reverse?: boolean;
  disabled?: boolean;
  keyboard?: boolean;
  tooltip?: SliderTooltipConfig;
}

export interface SliderSingleProps extends SliderBaseProps {
  range?: false;
  value?: number;
  defaultValue?: number;
  onChange?: (value: number) => void;
  onChangeComplete?: (value: number) => void;
}

export interface SliderRangeProps extends SliderBaseProps {
  range: true;
  value?: [number, number];
  defaultValue?: [number, number];
  onChange?: (value: [number, number]) => void;
  onChangeComplete?: (value: [number, number]) => void;
}

export type SliderProps = SliderSingleProps | SliderRangeProps;

function isMarkObject(
  mark: SliderMarkLabel
): mark is { style?: CSSProperties; label?: ReactNode } {
  return (
    typeof mark === "object" &&
    mark !== null &&
    !Array.isArray(mark) &&
    !isValidElement(mark) &&
    ("label" in mark || "style" in mark)
  );
}

/** +1/-1 for an arrow key given the slider's axis and whether it is flipped. */
export function arrowOffset(
  key: string,
  vertical: boolean,
  flipped: boolean
): 1 | -1 | undefined {
  const topToBottom = vertical && flipped;
  const rightToLeft = !vertical && flipped;
  switch (key) {
    case "ArrowUp":
      return topToBottom ? -1 : 1;
    case "ArrowDown":
      return topToBottom ? 1 : -1;
    case "ArrowRight":
      return rightToLeft ? -1 : 1;
    case "ArrowLeft":
      return rightToLeft ? 1 : -1;
    default:
      return undefined;
  }
}

function readValues(props: SliderProps): number[] | undefined {
  if (props.range) return props.value ? [...props.value] : undefined;
  return props.value === undefined ? undefined : [props.value];
}

function readDefaults(props: SliderProps, min: number): number[] {
  if (props.range) return props.defaultValue ? [...props.defaultValue] : [min, min];
  return [props.defaultValue ?? min];
}

export const Slider = forwardRef<HTMLDivElement, SliderProps>(function Slider(
  props,
  ref
) {
  const {
    className,
    style,
    min = 0,
    max = 100,
    step = 1,
    marks,
    dots = false,
    included = true,
    vertical = false,
    reverse = false,
    disabled = false,
    keyboard = true,
    tooltip = {},
  } = props;
  const { prefixCls, direction, style: tokenStyle } = useComponentConfig("Slider", "slider");
  const [innerValues, setInnerValues] = useState<number[]>(() =>
    readDefaults(props, min).map((value) => snapValue(value, { min, max, step, marks }))
  );
  const controlled = readValues(props);
  const values = controlled ?? innerValues;
  const [active, setActive] = useState<number | null>(null);
  const [dragging, setDragging] = useState(false);
  const railRef = useRef<HTMLDivElement>(null);
  const handleRefs = useRef<(HTMLDivElement | null)[]>([]);

  const snap = { min, max, step, marks };
  const flipped = vertical ? reverse : reverse !== (direction === "rtl");

  const emit = (next: number[], complete = false) => {
    if (props.range) {
      const tuple: [number, number] = [next[0] ?? min, next[1] ?? next[0] ?? min];
      if (complete) props.onChangeComplete?.(tuple);
      else props.onChange?.(tuple);
    } else {
      const single = next[0] ?? min;
      if (complete) props.onChangeComplete?.(single);
      else props.onChange?.(single);
    }
  };

  const update = (index: number, raw: number): number => {
    const nextValue = snapValue(raw, snap);
    const next = [...values];
    next[index] = nextValue;
    const sorted = [...next].sort((a, b) => a - b);
    const nextIndex = sorted.indexOf(nextValue);
    const changed = sorted.some((value, position) => value !== values[position]);
    if (changed) {
      if (controlled === undefined) setInnerValues(sorted);
      emit(sorted);
    }
    return nextIndex;
  };

  const valueFromPointer = (event: PointerEvent<HTMLDivElement>): number => {
    const rect = (railRef.current ?? event.currentTarget).getBoundingClientRect();
    const size = vertical ? rect.height : rect.width;
    if (size === 0) return min;
    const offset = vertical ? rect.bottom - event.clientY : event.clientX - rect.left;
    const ratio = offset / size;
    const percent = (flipped ? 1 - ratio : ratio) * 100;
    return percentToValue(percent, min, max);
  };

  const handlePointerDown = (event: PointerEvent<HTMLDivElement>) => {
    if (disabled || event.button > 0) return;
    event.preventDefault();
    const raw = valueFromPointer(event);
    const index = closestHandle(values, raw);
    const nextIndex = update(index, raw);
    setActive(nextIndex);
    setDragging(true);
    event.currentTarget.setPointerCapture?.(event.pointerId);
    handleRefs.current[nextIndex]?.focus();
  };

  const handlePointerMove = (event: PointerEvent<HTMLDivElement>) => {
    if (!dragging || active === null) return;
    setActive(update(active, valueFromPointer(event)));
  };

  const handlePointerUp = (event: PointerEvent<HTMLDivElement>) => {
    if (!dragging) return;
    setDragging(false);
    event.currentTarget.releasePointerCapture?.(event.pointerId);
    emit(values, true);
  };

  const handleKeyDown = (index: number, event: KeyboardEvent<HTMLDivElement>) => {
    if (disabled || !keyboard) return;
    const current = values[index] ?? min;
    let next: number | undefined;
    const arrow = arrowOffset(event.key, vertical, flipped);
    if (arrow !== undefined) next = offsetValue(current, arrow, snap);
    else if (event.key === "Home") next = min;
    else if (event.key === "End") next = max;
    if (next === undefined) return;
    event.preventDefault();
    const nextIndex = update(index, next);
    setActive(nextIndex);
    handleRefs.current[nextIndex]?.focus();
    const committed = [...values];
    committed[index] = snapValue(next, snap);
    emit([...committed].sort((a, b) => a - b), true);
  };

  const position = (value: number): CSSProperties => {
    const percent = `${valueToPercent(value, min, max)}%`;
    if (vertical) return flipped ? { top: percent } : { bottom: percent };
    return flipped ? { right: percent } : { left: percent };
  };

  const trackStart = props.range ? (values[0] ?? min) : min;
  const trackEnd = props.range ? (values[values.length - 1] ?? min) : (values[0] ?? min);
  const trackStyle = (): CSSProperties => {
    const start = valueToPercent(trackStart, min, max);
    const length = valueToPercent(trackEnd, min, max) - start;
    if (vertical) {
      return flipped
        ? { top: `${start}%`, height: `${length}%` }
        : { bottom: `${start}%`, height: `${length}%` };
    }
    return flipped
      ? { right: `${start}%`, width: `${length}%` }
      : { left: `${start}%`, width: `${length}%` };
  };

  const isActivePoint = (point: number) =>
    included && point >= trackStart && point <= trackEnd;

  const markValues = getMarkValues(marks).filter((value) => value >= min && value <= max);
  const dotValues = dots ? getDotValues(snap) : markValues;
  const formatter =
    tooltip.formatter === undefined ? (value: number) => String(value) : tooltip.formatter;

  return (
    <div
      ref={ref}
      className={cn(
        prefixCls,
        "group",
        slider({ vertical, disabled, withMarks: markValues.length > 0 }),
        className
      )}
      style={{ ...tokenStyle, ...style }}
      onPointerDown={handlePointerDown}
      onPointerMove={handlePointerMove}
      onPointerUp={handlePointerUp}
      onPointerCancel={handlePointerUp}
    >
      <div ref={railRef} className={sliderRail({ vertical })} />
      {included ? (
        <div className={sliderTrack({ vertical, disabled })} style={trackStyle()} />
      ) : null}
      <div className="absolute inset-0">
        {dotValues.map((point) => (
          <span
            key={point}
            className={sliderDot({ active: isActivePoint(point), vertical })}
            style={position(point)}
          />
        ))}
      </div>
      {markValues.length > 0 ? (
        <div className="absolute inset-0">
          {markValues.map((point) => {
            const mark = marks?.[point];
            const label = mark !== undefined && isMarkObject(mark) ? mark.label : mark;
            const markStyle = mark !== undefined && isMarkObject(mark) ? mark.style : undefined;
            return (
              <span
                key={point}
                className={sliderMark({ active: isActivePoint(point), vertical })}
                style={{ ...position(point), ...markStyle }}
              >
                {label}
              </span>
            );
          })}
        </div>
      ) : null}
      {values.map((value, index) => {
        const showTip =
          formatter !== null &&
          (tooltip.open ?? active === index);
        return (
          <div
            // biome-ignore lint/suspicious/noArrayIndexKey: handles are positional
            key={index}
            ref={(element) => {
              handleRefs.current[index] = element;
            }}
            role="slider"
            tabIndex={disabled ? undefined : 0}
            aria-valuemin={min}
            aria-valuemax={max}
            aria-valuenow={value}
            aria-disabled={disabled || undefined}
            aria-orientation={vertical ? "vertical" : "horizontal"}
            className={cn(`${prefixCls}-handle`, sliderHandle({ vertical, disabled }))}
            style={position(value)}
            onFocus={() => setActive(index)}
            onBlur={() => {
              if (!dragging) setActive(null);
            }}
            onMouseEnter={() => setActive(index)}
            onMouseLeave={() => {
              if (!dragging) setActive(null);
            }}
            onKeyDown={(event) => handleKeyDown(index, event)}
          >
            {showTip ? (
              <span role="tooltip" className={sliderTooltip({ vertical })}>
                {formatter(value)}
              </span>
            ) : null}
          </div>
        );
      })}
    </div>
  );
});

Slider.displayName = "Slider";
