// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/Segmented`
 * Purpose: Single choice among inline segments, rendered as a radio group.
 * Invariants: The value defaults to the first option; disabled options cannot be selected.
 * Side-effects: none
 * @public
 */

"use client";

import type { CSSProperties, ReactNode } from "react";
import { forwardRef, useId } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import { segmented, segmentedGroup, segmentedItem } from "@/styles/ui";

import { useComponentConfig, useComponentSize } from "../theme";

export type SegmentedValue = string | number;

export interface SegmentedLabeledOption {
  label?: ReactNode;
  value: SegmentedValue;
  icon?: ReactNode;
  disabled?: boolean;
  title?: string;
  className?: string;
}

export type SegmentedOption = SegmentedValue | SegmentedLabeledOption;

export function normalizeSegmentedOptions(
  options: readonly SegmentedOption[]
): SegmentedLabeledOption[] {
  return options.map((option) =>
    typeof option === "object"
      ? {
          ...option,
          title:
            option.title ??
            (typeof option.label === "string" ? option.label : undefined),
        }
      : { label: String(option), value: option, title: String(option) }
  );
}

export interface SegmentedProps {
  className?: string;
  style?: CSSProperties;
  options: SegmentedOption[];
  value?: SegmentedValue;
  defaultValue?: SegmentedValue;
  onChange?: (value: SegmentedValue) => void;
  block?: boolean;
  size?: SizeType;
  disabled?: boolean;
  vertical?: boolean;
  name?: string;
}

export const Segmented = forwardRef<HTMLDivElement, SegmentedProps>(
  function Segmented(
    {
      className,
      style,
      options,
      value,
      defaultValue,
      onChange,
      block = false,
      size: sizeProp,
      disabled = false,
      vertical = false,
      name,
    },
    ref
  ) {
    const { prefixCls, style: tokenStyle } = useComponentConfig("Segmented", "segmented");
    const size = useComponentSize(sizeProp);
    const generatedName = useId();
    const items = normalizeSegmentedOptions(options);
    const [selected, setSelected] = useControllableState<SegmentedValue | undefined>({
      value,
      defaultValue: defaultValue ?? items[0]?.value,
      onChange: (next) => {
        if (next !== undefined) onChange?.(next);
      },
    });

    return (
      <div
        ref={ref}
        role="radiogroup"
        aria-disabled={disabled || undefined}
        className={cn(prefixCls, segmented({ block, disabled }), className)}
        style={{ ...tokenStyle, ...style }}
      >
        <div className={segmentedGroup({ vertical })}>
          {items.map((item) => {
            const itemDisabled = disabled || Boolean(item.disabled);
            const checked = item.value === selected;
            return (
              <label
                key={String(item.value)}
                title={item.title}
                className={cn(
                  `${prefixCls}-item`,
                  segmentedItem({
                    size,
                    selected: checked,
                    disabled: itemDisabled,
                    block,
                  }),
                  "focus-within:outline focus-within:outline-4 focus-within:outline-primary-border",
                  item.className
                )}
              >
                <input
                  type="radio"
                  className="absolute inset-0 m-0 cursor-[inherit] opacity-0"
                  name={name ?? generatedName}
                  value={String(item.value)}
                  checked={checked}
                  disabled={itemDisabled}
                  onChange={() => setSelected(item.value)}
                />
                {item.icon !== undefined ? (
                  <span className="inline-flex" aria-hidden>
                    {item.icon}
                  </span>
                ) : null}
                {item.label !== undefined ? (
                  <span className="truncate">{item.label}</span>
                ) : null}
              </label>
            );
          })}
        </div>
      </div>
    );
  }
);

Segmented.displayName = "Segmented";
