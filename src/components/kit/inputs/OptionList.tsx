// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/OptionList`
 * Purpose: Listbox of options and group titles rendered inside the Select and AutoComplete popups.
 * Scope: Presentational; the owner keeps the active and selected values and handles picks.
 * Invariants:
 * - Option ids are `${listId}-${index}` over the flattened options, for aria-activedescendant.
 * - Pointer down never moves focus out of the owner's input.
 * Side-effects: DOM (scrolls the active option into view)
 * @public
 */

"use client";

import { Check } from "lucide-react";
import type { ReactNode } from "react";
import { useEffect, useRef } from "react";

import { cn } from "@/shared/util";
import { selectGroupTitle, selectList, selectOption } from "@/styles/ui";

import type { SelectItem, SelectOption, SelectValue } from "./select-utils";
import { flattenSelectItems } from "./select-utils";

export interface OptionListProps<V extends SelectValue> {
  id: string;
  prefixCls: string;
  items: readonly SelectItem<V>[];
  activeValue: V | undefined;
  selectedValues: readonly V[];
  multiple?: boolean;
  onPick: (option: SelectOption<V>) => void;
  onActivate: (value: V) => void;
  optionRender?: ((option: SelectOption<V>, info: { index: number }) => ReactNode) | undefined;
  menuItemSelectedIcon?: ReactNode;
}

export function getOptionId(listId: string, index: number): string {
  return `${listId}-${index}`;
}

export function OptionList<V extends SelectValue>({
  id,
  prefixCls,
  items,
  activeValue,
  selectedValues,
  multiple = false,
  onPick,
  onActivate,
  optionRender,
  menuItemSelectedIcon,
}: OptionListProps<V>) {
  const listRef = useRef<HTMLUListElement>(null);
  const entries = flattenSelectItems(items);

  useEffect(() => {
    listRef.current
      ?.querySelector<HTMLElement>('[data-active="true"]')
      ?.scrollIntoView({ block: "nearest" });
  }, [activeValue]);

  let optionIndex = -1;
  return (
    <ul
      ref={listRef}
      id={id}
      role="listbox"
      aria-multiselectable={multiple || undefined}
      className={cn(`${prefixCls}-item-list`, selectList())}
    >
      {entries.map((entry) => {
        if (entry.type === "group") {
          return (
            <li
              key={entry.key}
              role="presentation"
              className={cn(`${prefixCls}-item-group`, selectGroupTitle())}
            >
              {entry.label}
            </li>
          );
        }
        optionIndex += 1;
        const { option } = entry;
        const index = optionIndex;
        const selected = selectedValues.includes(option.value);
        const active = option.value === activeValue;
        const disabled = option.disabled ?? false;
        return (
          <li
            key={entry.key}
            id={getOptionId(id, index)}
            role="option"
            aria-selected={selected}
            aria-disabled={disabled || undefined}
            data-active={active || undefined}
            title={option.title}
            className={cn(
              `${prefixCls}-item`,
              `${prefixCls}-item-option`,
              active && `${prefixCls}-item-option-active`,
              selected && `${prefixCls}-item-option-selected`,
              selectOption({ active, selected, disabled, grouped: entry.grouped }),
              option.className
            )}
            onMouseDown={(event) => event.preventDefault()}
            onMouseEnter={() => {
              if (!disabled) onActivate(option.value);
            }}
            onClick={() => {
              if (!disabled) onPick(option);
            }}
          >
            <span className="min-w-0 flex-1 truncate">
              {optionRender ? optionRender(option, { index }) : (option.label ?? option.value)}
            </span>
            {multiple && selected ? (
              <span className="inline-flex flex-none text-primary" aria-hidden>
                {menuItemSelectedIcon ?? <Check className="size-3.5" />}
              </span>
            ) : null}
          </li>
        );
      })}
    </ul>
  );
}

/** Index of `value` among the flattened options, or -1. */
export function getOptionIndex<V extends SelectValue>(
  items: readonly SelectItem<V>[],
  value: V | undefined
): number {
  if (value === undefined) return -1;
  return flattenSelectItems(items)
    .flatMap((entry) => (entry.type === "option" ? [entry.option.value] : []))
    .indexOf(value);
}
