// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/Select`
 * Purpose: Dropdown selector for one value, several values (`multiple`) or free-form tags (`tags`), with search.
 * Scope: The selector is a combobox input inside an input-styled anchor; the option list lives in a Radix Popover.
 * Invariants:
 * - Single `onChange(value, option)`; multiple/tags `onChange(values, options)`. Both fire only when the selection changes.
 * - `onSelect` fires for every pick; `onDeselect` when a value leaves a multiple selection.
 * - `maxCount` blocks adding values past the limit; removing always works.
 * - Typed text containing a token separator is split into values in multiple/tags mode.
 * - `notFoundContent={null}` keeps the popup closed while nothing matches.
 * Side-effects: none
 * Links: src/components/kit/inputs/select-utils.ts, src/components/kit/inputs/OptionList.tsx
 * @public
 */

"use client";

import { useComposedRefs } from "@radix-ui/react-compose-refs";
import * as RadixPopover from "@radix-ui/react-popover";
import { ChevronDown, Loader2, Search, X, XCircle } from "lucide-react";
import type {
  ChangeEvent,
  CSSProperties,
  KeyboardEvent,
  MouseEvent,
  ReactNode,
} from "react";
import { forwardRef, useId, useRef, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import type { InputVariant } from "@/styles/ui";
import {
  inputAffix,
  inputAffixWrapper,
  inputClear,
  inputElement,
  selectItem,
  selectPopup,
  selectSelection,
  selectTag,
  selectTagRemove,
} from "@/styles/ui";

import { Empty } from "../data-display/Empty";
import { useComponentConfig, useComponentSize, useConfig, useLocale } from "../theme";
import { getOptionId, getOptionIndex, OptionList } from "./OptionList";
import type {
  FilterOption,
  FilterSort,
  SelectItem,
  SelectOption,
  SelectValue,
} from "./select-utils";
import {
  collectOptions,
  filterSelectItems,
  findOption,
  getFirstEnabledValue,
  getNextActiveValue,
  getOptionText,
  splitBySeparators,
  toValueList,
  truncateLabel,
} from "./select-utils";

export type SelectMode = "multiple" | "tags";

interface SelectBaseProps {
  className?: string;
  style?: CSSProperties;
  id?: string;
  options?: SelectItem[];
  placeholder?: ReactNode;
  allowClear?: boolean;
  /** Defaults to true in multiple/tags mode. */
  showSearch?: boolean;
  searchValue?: string;
  onSearch?: (value: string) => void;
  filterOption?: FilterOption;
  filterSort?: FilterSort;
  open?: boolean;
  defaultOpen?: boolean;
  onOpenChange?: (open: boolean) => void;
  onSelect?: (value: SelectValue, option: SelectOption) => void;
  onClear?: () => void;
  onFocus?: () => void;
  onBlur?: () => void;
  disabled?: boolean;
  loading?: boolean;
  size?: SizeType;
  variant?: InputVariant;
  status?: "" | "error" | "warning";
  /** `null` hides the popup while nothing matches. */
  notFoundContent?: ReactNode;
  defaultActiveFirstOption?: boolean;
  popupMatchSelectWidth?: boolean;
  popupClassName?: string;
  prefix?: ReactNode;
  suffixIcon?: ReactNode;
  optionRender?: (option: SelectOption, info: { index: number }) => ReactNode;
  autoFocus?: boolean;
}

export interface SingleSelectProps extends SelectBaseProps {
  mode?: undefined;
  value?: SelectValue | null;
  defaultValue?: SelectValue | null;
  onChange?: (value: SelectValue | null, option: SelectOption | undefined) => void;
}

export interface MultipleSelectProps extends SelectBaseProps {
  mode: SelectMode;
  value?: SelectValue[];
  defaultValue?: SelectValue[];
  onChange?: (value: SelectValue[], options: SelectOption[]) => void;
  onDeselect?: (value: SelectValue, option: SelectOption) => void;
  maxCount?: number;
  maxTagCount?: number;
  maxTagTextLength?: number;
  maxTagPlaceholder?: (omitted: SelectOption[]) => ReactNode;
  /** Defaults to `[","]`. */
  tokenSeparators?: string[];
  /** Keep the search text after a pick. */
  autoClearSearchValue?: boolean;
  removeIcon?: ReactNode;
  menuItemSelectedIcon?: ReactNode;
}

export type SelectProps = SingleSelectProps | MultipleSelectProps;

const DEFAULT_SEPARATORS = [","];

export const Select = forwardRef<HTMLInputElement, SelectProps>(function Select(props, ref) {
  const {
    className,
    style,
    id,
    options = [],
    placeholder,
    allowClear = false,
    showSearch: showSearchProp,
    searchValue,
    onSearch,
    filterOption = true,
    filterSort,
    open: openProp,
    defaultOpen = false,
    onOpenChange,
    onSelect,
    onClear,
    onFocus,
    onBlur,
    disabled = false,
    loading = false,
    size: sizeProp,
    variant = "outlined",
    status = "",
    notFoundContent,
    defaultActiveFirstOption = true,
    popupMatchSelectWidth = true,
    popupClassName,
    prefix,
    suffixIcon,
    optionRender,
    autoFocus,
  } = props;
  const multi = props.mode !== undefined ? props : undefined;
  const multiple = multi !== undefined;
  const tags = props.mode === "tags";
  const showSearch = showSearchProp ?? multiple;

  const { prefixCls, style: tokenStyle } = useComponentConfig("Select", "select");
  const { popupContainer } = useConfig();
  const locale = useLocale("Select");
  const size = useComponentSize(sizeProp);
  const listId = useId();
  const inputRef = useRef<HTMLInputElement>(null);
  const composedRef = useComposedRefs(ref, inputRef);
  const anchorRef = useRef<HTMLSpanElement>(null);

  const [values, setValues] = useControllableState<SelectValue[]>({
    value: props.value === undefined ? undefined : toValueList(props.value),
    defaultValue: toValueList(props.defaultValue),
  });
  const [search, setSearch] = useControllableState({
    value: searchValue,
    defaultValue: "",
  });
  const [open, setOpen] = useControllableState({
    value: openProp,
    defaultValue: defaultOpen,
    onChange: onOpenChange,
  });
  const [activeValue, setActiveValue] = useState<SelectValue | undefined>(undefined);

  // Tag values without a matching option still need an entry.
  const extraTags: SelectOption[] = tags
    ? values
        .filter((value) => findOption(options, value) === undefined)
        .map((value) => ({ value, label: String(value) }))
    : [];
  const knownItems: SelectItem[] = [...options, ...extraTags];
  const typed = search.trim();
  const typedCandidate: SelectOption[] =
    tags &&
    typed !== "" &&
    !collectOptions(knownItems).some((option) => String(option.value) === typed)
      ? [{ value: typed, label: typed }]
      : [];
  const visibleItems = filterSelectItems(
    [...typedCandidate, ...knownItems],
    showSearch ? search : "",
    filterOption,
    filterSort
  );
  const visibleOptions = collectOptions(visibleItems);
  const empty = visibleOptions.length === 0;

  const enabledActive = visibleOptions.some(
    (option) => option.value === activeValue && !option.disabled
  )
    ? activeValue
    : undefined;
  const firstSelected = visibleOptions.find(
    (option) => values.includes(option.value) && !option.disabled
  )?.value;
  const currentActive =
    enabledActive ??
    (defaultActiveFirstOption || firstSelected !== undefined
      ? (firstSelected ?? getFirstEnabledValue(visibleOptions))
      : undefined);

  const resolveOption = (value: SelectValue): SelectOption =>
    findOption([...typedCandidate, ...knownItems], value) ?? { value, label: String(value) };

  const emitChange = (next: SelectValue[]) => {
    setValues(next);
    if (props.mode === undefined) {
      const first = next[0];
      props.onChange?.(first ?? null, first === undefined ? undefined : resolveOption(first));
    } else {
      props.onChange?.(next, next.map(resolveOption));
    }
  };

  const updateSearch = (text: string) => {
    setSearch(text);
    setActiveValue(undefined);
  };

  const changeOpen = (next: boolean) => {
    if (next && disabled) return;
    if (!next) {
      setActiveValue(undefined);
      if (!multi || multi.autoClearSearchValue !== false) setSearch("");
    }
    setOpen(next);
  };

  const removeValue = (value: SelectValue) => {
    if (!multi) return;
    const option = resolveOption(value);
    emitChange(values.filter((item) => item !== value));
    multi.onDeselect?.(value, option);
  };

  const addValues = (added: readonly SelectValue[]) => {
    if (!multi) return;
    const next = [...values];
    const picked: SelectValue[] = [];
    for (const value of added) {
      if (next.includes(value)) continue;
      if (multi.maxCount !== undefined && next.length >= multi.maxCount) break;
      next.push(value);
      picked.push(value);
    }
    if (picked.length === 0) return;
    emitChange(next);
    for (const value of picked) onSelect?.(value, resolveOption(value));
  };

  const pick = (option: SelectOption) => {
    if (option.disabled) return;
    if (!multi) {
      if (values[0] !== option.value || values.length !== 1) emitChange([option.value]);
      onSelect?.(option.value, option);
      changeOpen(false);
      return;
    }
    if (values.includes(option.value)) {
      removeValue(option.value);
    } else {
      addValues([option.value]);
    }
    setActiveValue(option.value);
    if (multi.autoClearSearchValue !== false) setSearch("");
  };

  const handleInput = (event: ChangeEvent<HTMLInputElement>) => {
    const text = event.target.value;
    if (multi) {
      const tokens = splitBySeparators(text, multi.tokenSeparators ?? DEFAULT_SEPARATORS);
      if (tokens) {
        const matched = tags
          ? tokens
          : tokens.flatMap((token) => {
              const found = collectOptions(options).find(
                (option) =>
                  !option.disabled &&
                  (getOptionText(option) === token || String(option.value) === token)
              );
              return found ? [found.value] : [];
            });
        addValues(matched);
        updateSearch("");
        onSearch?.("");
        return;
      }
    }
    updateSearch(text);
    onSearch?.(text);
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
        setActiveValue(
          getNextActiveValue(visibleOptions, currentActive, event.key === "ArrowDown" ? 1 : -1)
        );
        return;
      }
      case "Enter": {
        event.preventDefault();
        if (!open) {
          changeOpen(true);
          return;
        }
        const option = visibleOptions.find((item) => item.value === currentActive);
        if (option) pick(option);
        else if (tags && typed !== "") addValues([typed]);
        return;
      }
      case "Escape":
        if (open) {
          event.preventDefault();
          changeOpen(false);
        }
        return;
      case "Backspace": {
        const last = values[values.length - 1];
        if (multi && search === "" && last !== undefined) {
          event.preventDefault();
          removeValue(last);
        }
        return;
      }
    }
  };

  const handleSelectorMouseDown = (event: MouseEvent<HTMLSpanElement>) => {
    if (disabled) return;
    if (event.target !== inputRef.current) event.preventDefault();
    inputRef.current?.focus();
    changeOpen(showSearch && open ? true : !open);
  };

  const clear = () => {
    if (values.length > 0) {
      if (multi) {
        for (const value of values) multi.onDeselect?.(value, resolveOption(value));
      }
      emitChange([]);
    }
    updateSearch("");
    onClear?.();
  };

  const labelOf = (value: SelectValue): ReactNode => {
    const option = resolveOption(value);
    return option.label ?? option.value;
  };

  const renderTags = () => {
    if (!multi) return null;
    const limit = multi.maxTagCount;
    const shown = limit === undefined ? values : values.slice(0, limit);
    const omitted = values.slice(shown.length).map(resolveOption);
    return (
      <>
        {shown.map((value) => {
          const option = resolveOption(value);
          const label = labelOf(value);
          const text = getOptionText(option);
          const locked = disabled || (option.disabled ?? false);
          return (
            <span
              key={String(value)}
              title={text}
              className={cn(`${prefixCls}-selection-item`, selectTag({ disabled: locked }))}
            >
              <span className="truncate">
                {typeof label === "string" ? truncateLabel(label, multi.maxTagTextLength) : label}
              </span>
              {locked ? null : (
                <button
                  type="button"
                  aria-label={`${locale.remove} ${text}`}
                  className={cn(`${prefixCls}-selection-item-remove`, selectTagRemove())}
                  onMouseDown={(event) => {
                    event.preventDefault();
                    event.stopPropagation();
                  }}
                  onClick={() => removeValue(value)}
                >
                  {multi.removeIcon ?? <X aria-hidden className="size-3" />}
                </button>
              )}
            </span>
          );
        })}
        {omitted.length > 0 ? (
          <span className={cn(`${prefixCls}-selection-item`, selectTag())}>
            {multi.maxTagPlaceholder
              ? multi.maxTagPlaceholder(omitted)
              : `+ ${omitted.length} ...`}
          </span>
        ) : null}
      </>
    );
  };

  const firstValue = values[0];
  const selectedLabel = !multiple && firstValue !== undefined ? labelOf(firstValue) : null;
  const showPlaceholder = values.length === 0 && search === "";
  const activeIndex = getOptionIndex(visibleItems, currentActive);
  const popupVisible = open && !disabled && !(empty && notFoundContent === null);
  const showClear = allowClear && !disabled && (values.length > 0 || search !== "");

  const suffix = loading ? (
    <Loader2 aria-hidden className="size-3.5 animate-spin" />
  ) : (
    (suffixIcon ??
    (showSearch && open ? (
      <Search aria-hidden className="size-3.5" />
    ) : (
      <ChevronDown aria-hidden className="size-3.5" />
    )))
  );

  return (
    <RadixPopover.Root open={popupVisible} onOpenChange={changeOpen}>
      <RadixPopover.Anchor asChild>
        <span
          ref={anchorRef}
          className={cn(
            prefixCls,
            multiple && `${prefixCls}-multiple`,
            open && `${prefixCls}-open`,
            disabled && `${prefixCls}-disabled`,
            inputAffixWrapper({
              size,
              variant,
              status: status === "" ? "none" : status,
              disabled,
            }),
            multiple ? "h-auto min-h-[var(--ant-control-height)] py-0.5" : "",
            showSearch ? "cursor-text" : "cursor-pointer",
            className
          )}
          style={{ ...tokenStyle, ...style }}
          onMouseDown={handleSelectorMouseDown}
        >
          {prefix !== undefined ? <span className={inputAffix()}>{prefix}</span> : null}
          <span className={cn(`${prefixCls}-selector`, selectSelection({ multiple }))}>
            {renderTags()}
            <span className="relative flex min-w-[4px] flex-1 items-center">
              {!multiple && selectedLabel !== null && search === "" ? (
                <span
                  className={cn(
                    `${prefixCls}-selection-item`,
                    selectItem(),
                    "pointer-events-none absolute inset-x-0",
                    open && showSearch && "text-fg-quaternary"
                  )}
                >
                  {selectedLabel}
                </span>
              ) : null}
              {showPlaceholder ? (
                <span
                  className={cn(
                    `${prefixCls}-selection-placeholder`,
                    selectItem({ placeholder: true }),
                    "pointer-events-none absolute inset-x-0"
                  )}
                >
                  {placeholder ?? locale.placeholder}
                </span>
              ) : null}
              <input
                ref={composedRef}
                id={id}
                role="combobox"
                aria-expanded={popupVisible}
                aria-haspopup="listbox"
                aria-controls={popupVisible ? listId : undefined}
                aria-activedescendant={
                  popupVisible && activeIndex >= 0 ? getOptionId(listId, activeIndex) : undefined
                }
                aria-autocomplete="list"
                autoComplete="off"
                // biome-ignore lint/a11y/noAutofocus: opt-in prop
                autoFocus={autoFocus}
                readOnly={!showSearch}
                disabled={disabled}
                value={search}
                className={cn(inputElement(), !showSearch && "cursor-[inherit] caret-transparent")}
                onChange={handleInput}
                onKeyDown={handleKeyDown}
                onFocus={onFocus}
                onBlur={onBlur}
              />
            </span>
          </span>
          <span className={inputAffix({ muted: true })}>
            {showClear ? (
              <button
                type="button"
                aria-label={locale.clear}
                className={inputClear()}
                onMouseDown={(event) => {
                  event.preventDefault();
                  event.stopPropagation();
                }}
                onClick={clear}
              >
                <XCircle aria-hidden className="size-3.5" />
              </button>
            ) : (
              suffix
            )}
          </span>
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
            loading ? (
              <div className="px-3 py-[5px] text-fg-tertiary">{locale.loading}</div>
            ) : (
              (notFoundContent ?? (
                <Empty image={Empty.PRESENTED_IMAGE_SIMPLE} description={locale.notFound} />
              ))
            )
          ) : (
            <OptionList
              id={listId}
              prefixCls={prefixCls}
              items={visibleItems}
              activeValue={currentActive}
              selectedValues={values}
              multiple={multiple}
              onPick={pick}
              onActivate={setActiveValue}
              optionRender={optionRender}
              menuItemSelectedIcon={multi?.menuItemSelectedIcon}
            />
          )}
        </RadixPopover.Content>
      </RadixPopover.Portal>
    </RadixPopover.Root>
  );
});

Select.displayName = "Select";
