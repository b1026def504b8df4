// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/AutoComplete`
 * Purpose: Text input with a list of suggestions; the value is the typed text, picking a suggestion replaces it.
 * Scope: Suggestions are plain-string options, optionally grouped. Shares the option list and filtering with Select.
 * Invariants:
 * - `onChange(text)` fires for typing, picks and clearing; `onSearch` only for typing.
 * - The popup stays closed while no suggestion matches, unless `notFoundContent` is given.
 * - With `backfill`, keyboard movement shows the active suggestion in the input without changing the value.
 * Side-effects: none
 * Links: src/components/kit/inputs/select-utils.ts, src/components/kit/inputs/OptionList.tsx
 * @public
 */

"use client";

import * as RadixPopover from "@radix-ui/react-popover";
import { XCircle } from "lucide-react";
import type { ChangeEvent, CSSProperties, KeyboardEvent, ReactNode } from "react";
import { forwardRef, useId, useRef, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import type { InputVariant } from "@/styles/ui";
import { inputAffix, inputAffixWrapper, inputClear, inputElement, selectPopup } from "@/styles/ui";

import { useComponentConfig, useComponentSize, useConfig, useLocale } from "../theme";
import { getOptionId, getOptionIndex, OptionList } from "./OptionList";
import type { FilterOption, SelectItem, SelectOption } from "./select-utils";
import {
  collectOptions,
  filterSelectItems,
  getFirstEnabledValue,
  getNextActiveValue,
} from "./select-utils";

export type AutoCompleteOption = SelectOption<string>;

export interface AutoCompleteProps {
  className?: string;
  style?: CSSProperties;
  id?: string;
  value?: string;
  defaultValue?: string;
  onChange?: (value: string) => void;
  onSearch?: (value: string) => void;
  onSelect?: (value: string, option: AutoCompleteOption) => void;
  options?: SelectItem<string>[];
  /** Defaults to true: suggestions containing the text, ignoring case. */
  filterOption?: FilterOption<string>;
  placeholder?: string;
  allowClear?: boolean;
  onClear?: () => void;
  backfill?: boolean;
  defaultActiveFirstOption?: boolean;
  notFoundContent?: ReactNode;
  open?: boolean;
  defaultOpen?: boolean;
  onOpenChange?: (open: boolean) => void;
  disabled?: boolean;
  size?: SizeType;
  variant?: InputVariant;
  status?: "" | "error" | "warning";
  popupClassName?: string;
  popupMatchSelectWidth?: boolean;
  optionRender?: (option: AutoCompleteOption, info: { index: number }) => ReactNode;
  onFocus?: () => void;
  onBlur?: () => void;
  autoFocus?: boolean;
}

export const AutoComplete = forwardRef<HTMLInputElement, AutoCompleteProps>(
  function AutoComplete(
    {
      className,
      style,
      id,
      value,
      defaultValue = "",
      onChange,
      onSearch,
      onSelect,
      options = [],
      filterOption = true,
      placeholder,
      allowClear = false,
      onClear,
      backfill = false,
      defaultActiveFirstOption = true,
      notFoundContent,
      open: openProp,
      defaultOpen = false,
      onOpenChange,
      disabled = false,
      size: sizeProp,
      variant = "outlined",
      status = "",
      popupClassName,
      popupMatchSelectWidth = true,
      optionRender,
      onFocus,
      onBlur,
      autoFocus,
    },
    ref
  ) {
    const { prefixCls, style: tokenStyle } = useComponentConfig("AutoComplete", "select");
    const { popupContainer } = useConfig();
    const locale = useLocale("Select");
    const size = useComponentSize(sizeProp);
    const listId = useId();
    const anchorRef = useRef<HTMLSpanElement>(null);

    const [text, setText] = useControllableState({ value, defaultValue, onChange });
    const [open, setOpen] = useControllableState({
      value: openProp,
      defaultValue: defaultOpen,
      onChange: onOpenChange,
    });
    const [activeValue, setActiveValue] = useState<string | undefined>(undefined);
    const [backfillText, setBackfillText] = useState<string | null>(null);

    const visibleItems = filterSelectItems(options, text, filterOption);
    const visibleOptions = collectOptions(visibleItems);
    const empty = visibleOptions.length === 0;
    const currentActive = visibleOptions.some(
      (option) => option.value === activeValue && !option.disabled
    )
      ? activeValue
      : defaultActiveFirstOption
        ? getFirstEnabledValue(visibleOptions)
        : undefined;
    const activeIndex = getOptionIndex(visibleItems, currentActive);
    const popupVisible = open && !disabled && !(empty && notFoundContent === undefined);

    const changeOpen = (next: boolean) => {
      if (next && disabled) return;
      if (!next) {
        setActiveValue(undefined);
        setBackfillText(null);
      }
      setOpen(next);
    };

    const pick = (option: AutoCompleteOption) => {
      if (option.disabled) return;
      setText(option.value);
      onSelect?.(option.value, option);
      changeOpen(false);
    };

    const handleInput = (event: ChangeEvent<HTMLInputElement>) => {
      const next = event.target.value;
      setText(next);
      onSearch?.(next);
      setActiveValue(undefined);
      setBackfillText(null);
      if (!open) changeOpen(true);
    };

    const handleKeyDown = (event: KeyboardEvent<HTMLInputElement>) => {
      switch (event.key) {
        case "ArrowDown":
        case "ArrowUp": {
          event.preventDefault();
          if (!open) {
            changeOpen(true);
            return;
          }
          const next = getNextActiveValue(
            visibleOptions,
            currentActive,
            event.key === "ArrowDown" ? 1 : -1
          );
          setActiveValue(next);
          if (backfill && next !== undefined) setBackfillText(next);
          return;
        }
        case "Enter": {
          if (!popupVisible) return;
          const option = visibleOptions.find((item) => item.value === currentActive);
          if (option) {
            event.preventDefault();
            pick(option);
          }
          return;
        }
        case "Escape":
          if (open) {
            event.preventDefault();
            changeOpen(false);
          }
          return;
      }
    };

    const clear = () => {
      setText("");
      setBackfillText(null);
      onClear?.();
    };

    return (
      <RadixPopover.Root open={popupVisible} onOpenChange={changeOpen}>
        <RadixPopover.Anchor asChild>
          <span
            ref={anchorRef}
            className={cn(
              prefixCls,
              `${prefixCls}-auto-complete`,
              inputAffixWrapper({
                size,
                variant,
                status: status === "" ? "none" : status,
                disabled,
              }),
              className
            )}
            style={{ ...tokenStyle, ...style }}
          >
            <input
              ref={ref}
              id={id}
              role="combobox"
              aria-expanded={popupVisible}
              aria-haspopup="listbox"
              aria-controls={popupVisible && !empty ? listId : undefined}
              aria-activedescendant={
                popupVisible && activeIndex >= 0 ? getOptionId(listId, activeIndex) : undefined
              }
              aria-autocomplete="list"
              autoComplete="off"
              // biome-ignore lint/a11y/noAutofocus: opt-in prop
              autoFocus={autoFocus}
              className={inputElement()}
              value={backfillText ?? text}
              placeholder={placeholder}
              disabled={disabled}
              onChange={handleInput}
              onKeyDown={handleKeyDown}
              onFocus={onFocus}
              onBlur={onBlur}
              onClick={() => changeOpen(true)}
            />
            {allowClear && !disabled && text !== "" ? (
              <span className={inputAffix({ muted: true })}>
                <button
                  type="button"
                  aria-label={locale.clear}
                  className={inputClear()}
                  onMouseDown={(event) => event.preventDefault()}
                  onClick={clear}
                >
                  <XCircle aria-hidden className="size-3.5" />
                </button>
              </span>
            ) : null}
          </span>
        </RadixPopover.Anchor>
        <RadixPopover.Portal container={popupContainer ?? undefined}>
          <RadixPopover.Content
            align="start"
            sideOffset={4}
            className={cn(
              `${prefixCls}-dropdown`,
              selectPopup({ matchWidth: popupMatchSelectWidth }),
              popupClassName
            )}
            onOpenAutoFocus={(event) => event.preventDefault()}
            onCloseAutoFocus={(event) => event.preventDefault()}
            onInteractOutside={(event) => {
              const target = event.target;
              if (target instanceof Node && anchorRef.current?.contains(target)) {
                event.preventDefault();
              }
            }}
          >
            {empty ? (
              notFoundContent
            ) : (
              <OptionList
                id={listId}
                prefixCls={prefixCls}
                items={visibleItems}
                activeValue={currentActive}
                selectedValues={[text]}
                onPick={pick}
                onActivate={setActiveValue}
                optionRender={optionRender}
              />
            )}
          </RadixPopover.Content>
        </RadixPopover.Portal>
      </RadixPopover.Root>
    );
  }
);

AutoComplete.displayName = "AutoComplete";
