// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/DatePicker`
 * Purpose: Date, week, month, quarter and year inputs with a calendar panel, plus `DatePicker.RangePicker` for two ends.
 * Scope: Values are local `Date`s normalized to the first day of the picked period. Typed text commits on Enter or blur when it parses.
 * Invariants:
 * - `onChange(date, text)` fires only when the committed period changes; clearing reports `(null, "")`.
 * - Disabled dates cannot be picked from the panel, typed, or chosen through Today.
 * - RangePicker commits once both ends are picked, swapping them when the end precedes the start.
 * Side-effects: time (Today and the initial panel read the clock)
 * Links: src/components/kit/inputs/DatePanel.tsx, src/components/kit/inputs/date-utils.ts
 * @public
 */

"use client";

import { useComposedRefs } from "@radix-ui/react-compose-refs";
import * as RadixPopover from "@radix-ui/react-popover";
import { CalendarDays, MoveRight, XCircle } from "lucide-react";
import type { ChangeEvent, CSSProperties, KeyboardEvent, ReactNode } from "react";
import { forwardRef, useRef, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import type { Locale } from "@/shared/locale";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import type { InputVariant } from "@/styles/ui";
import {
  datePickerPresets,
  inputAffix,
  inputAffixWrapper,
  inputClear,
  inputElement,
  timePickerFooter,
  timePickerPanel,
} from "@/styles/ui";

import { Button } from "../general/Button";
import { useComponentConfig, useComponentSize, useConfig, useLocale } from "../theme";
import { DatePanel } from "./DatePanel";
import type { PickerMode } from "./date-utils";
import {
  DEFAULT_DATE_FORMATS,
  formatDate,
  getPeriodStart,
  isPeriodBetween,
  isSamePeriod,
  orderRange,
  parseDate,
} from "./date-utils";

export interface DatePreset<T> {
  label: ReactNode;
  /** A function is read when the preset is clicked. */
  value: T | (() => T);
}

interface PickerBaseProps {
  className?: string;
  style?: CSSProperties;
  picker?: PickerMode;
  format?: string;
  disabledDate?: (date: Date) => boolean;
  /** Defaults to true. */
  allowClear?: boolean;
  open?: boolean;
  defaultOpen?: boolean;
  onOpenChange?: (open: boolean) => void;
  disabled?: boolean;
  size?: SizeType;
  variant?: InputVariant;
  status?: "" | "error" | "warning";
  popupClassName?: string;
  suffixIcon?: ReactNode;
  id?: string;
}

export interface DatePickerProps extends PickerBaseProps {
  value?: Date | null;
  defaultValue?: Date | null;
  onChange?: (date: Date | null, text: string) => void;
  placeholder?: string;
  /** Shows the Today button on the date picker. Defaults to true. */
  showToday?: boolean;
  presets?: DatePreset<Date>[];
  name?: string;
}

export type DateRangeValue = [Date, Date];

export interface RangePickerProps extends PickerBaseProps {
  value?: DateRangeValue | null;
  defaultValue?: DateRangeValue | null;
  onChange?: (dates: DateRangeValue | null, texts: [string, string]) => void;
  placeholder?: [string, string];
  presets?: DatePreset<DateRangeValue>[];
  separator?: ReactNode;
}

function resolveDatePreset({ value }: DatePreset<Date>): Date {
  return value instanceof Date ? value : value();
}

function resolveRangePreset({ value }: DatePreset<DateRangeValue>): DateRangeValue {
  return Array.isArray(value) ? value : value();
}

export function getPickerPlaceholder(picker: PickerMode, locale: Locale["DatePicker"]): string {
  switch (picker) {
    case "week":
      return locale.weekPlaceholder;
    case "month":
      return locale.monthPlaceholder;
    case "quarter":
      return locale.quarterPlaceholder;
    case "year":
      return locale.yearPlaceholder;
    default:
      return locale.placeholder;
  }
}

function PresetList<T>({
  prefixCls,
  presets,
  onPick,
}: {
  prefixCls: string;
  presets: DatePreset<T>[];
  onPick: (preset: DatePreset<T>) => void;
}) {
  return (
    <ul className={cn(`${prefixCls}-presets`, "m-0 list-none", datePickerPresets())}>
      {presets.map((preset, index) => (
        // biome-ignore lint/suspicious/noArrayIndexKey: presets have no ids
        <li key={index}>
          <Button
            type="text"
            size="small"
            block
            className="justify-start"
            onMouseDown={(event) => event.preventDefault()}
            onClick={() => onPick(preset)}
          >
            {preset.label}
          </Button>
        </li>
      ))}
    </ul>
  );
}

const DatePickerRoot = forwardRef<HTMLInputElement, DatePickerProps>(function DatePicker(
  {
    className,
    style,
    picker = "date",
    format: formatProp,
    value: valueProp,
    defaultValue = null,
    onChange,
    disabledDate,
    allowClear = true,
    showToday = true,
    presets,
    open: openProp,
    defaultOpen = false,
    onOpenChange,
    placeholder,
    disabled = false,
    size: sizeProp,
    variant = "outlined",
    status = "",
    popupClassName,
    suffixIcon,
    id,
    name,
  },
  ref
) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("DatePicker", "picker");
  const { popupContainer } = useConfig();
  const locale = useLocale("DatePicker");
  const calendarLocale = useLocale("Calendar");
  const size = useComponentSize(sizeProp);
  const { weekStart } = calendarLocale;
  const format = formatProp ?? DEFAULT_DATE_FORMATS[picker];

  const [value, setValue] = useControllableState<Date | null>({
    value: valueProp,
    defaultValue,
  });
  const [open, setOpen] = useControllableState({
    value: openProp,
    defaultValue: defaultOpen,
    onChange: onOpenChange,
  });
  const [typed, setTyped] = useState<string | null>(null);
  const [viewDate, setViewDate] = useState<Date>(() => value ?? new Date());
  const anchorRef = useRef<HTMLSpanElement>(null);

  const isDisabled = (date: Date) =>
    disabledDate?.(getPeriodStart(date, picker, weekStart)) ?? false;
  const parseTyped = (text: string) => {
    const parsed = parseDate(text, format, weekStart);
    return parsed && !isDisabled(parsed) ? parsed : null;
  };
  const typedDate = typed === null ? null : parseTyped(typed);
  const shown = typedDate ?? value;
  const text = typed ?? (value ? formatDate(value, format, weekStart) : "");

  const commit = (next: Date | null) => {
    setTyped(null);
    const normalized = next && getPeriodStart(next, picker, weekStart);
    if (isSamePeriod(normalized, value, picker, weekStart)) return;
    setValue(normalized);
    onChange?.(normalized, normalized ? formatDate(normalized, format, weekStart) : "");
  };

  const changeOpen = (next: boolean) => {
    if (next && disabled) return;
    if (next && !open) setViewDate(value ?? new Date());
    if (!next) setTyped(null);
    setOpen(next);
  };

  const pick = (date: Date) => {
    if (isDisabled(date)) return;
    commit(date);
    changeOpen(false);
  };

  const handleInput = (event: ChangeEvent<HTMLInputElement>) => {
    if (!open) changeOpen(true);
    setTyped(event.target.value);
    const parsed = parseTyped(event.target.value);
    if (parsed) setViewDate(parsed);
  };

  const handleKeyDown = (event: KeyboardEvent<HTMLInputElement>) => {
    if (event.key === "Enter") {
      event.preventDefault();
      if (typed !== null) {
        if (typedDate) commit(typedDate);
        else setTyped(null);
      }
      changeOpen(false);
    } else if (event.key === "Escape") {
      changeOpen(false);
    }
  };

  const handleBlur = () => {
    if (typed === null) return;
    if (typedDate) commit(typedDate);
    else setTyped(null);
  };

  const today = new Date();

  return (
    <RadixPopover.Root open={open && !disabled} onOpenChange={changeOpen}>
      <RadixPopover.Anchor asChild>
        <span
          ref={anchorRef}
          className={cn(
            prefixCls,
            inputAffixWrapper({
              size,
              variant,
              status: status === "" ? "none" : status,
              disabled,
            }),
            "w-auto",
            className
          )}
          style={{ ...tokenStyle, ...style }}
        >
          <input
            ref={ref}
            id={id}
            name={name}
            role="combobox"
            aria-expanded={open && !disabled}
            aria-haspopup="dialog"
            autoComplete="off"
            size={Math.max(format.length, 12)}
            className={inputElement()}
            value={text}
            placeholder={placeholder ?? getPickerPlaceholder(picker, locale)}
            disabled={disabled}
            onChange={handleInput}
            onKeyDown={handleKeyDown}
            onBlur={handleBlur}
            onClick={() => changeOpen(true)}
            onFocus={() => changeOpen(true)}
          />
          <span className={inputAffix({ muted: true })}>
            {allowClear && value !== null && !disabled ? (
              <button
                type="button"
                aria-label={locale.clear}
                className={inputClear()}
                onMouseDown={(event) => event.preventDefault()}
                onClick={() => commit(null)}
              >
                <XCircle aria-hidden className="size-3.5" />
              </button>
            ) : (
              (suffixIcon ?? <CalendarDays aria-hidden className="size-3.5" />)
            )}
          </span>
        </span>
      </RadixPopover.Anchor>
      <RadixPopover.Portal container={popupContainer ?? undefined}>
        <RadixPopover.Content
          align="start"
          sideOffset={4}
          className={cn(`${prefixCls}-dropdown`, timePickerPanel(), popupClassName)}
          onOpenAutoFocus={(event) => event.preventDefault()}
          onInteractOutside={(event) => {
            const target = event.target;
            if (target instanceof Node && anchorRef.current?.contains(target)) {
              event.preventDefault();
            }
          }}
        >
          <div className="flex">
            {presets && presets.length > 0 ? (
              <PresetList
                prefixCls={prefixCls}
                presets={presets}
                onPick={(preset) => pick(resolveDatePreset(preset))}
              />
            ) : null}
            <div>
              <DatePanel
                prefixCls={prefixCls}
                picker={picker}
                viewDate={viewDate}
                onViewDateChange={setViewDate}
                onPick={pick}
                isSelected={(date) => isSamePeriod(date, shown, picker, weekStart)}
                disabledDate={disabledDate}
                calendarLocale={calendarLocale}
                locale={locale}
              />
              {picker === "date" && showToday ? (
                <div className={cn(timePickerFooter(), "justify-center")}>
                  <Button
                    type="link"
                    size="small"
                    disabled={isDisabled(today)}
                    onMouseDown={(event) => event.preventDefault()}
                    onClick={() => pick(today)}
                  >
                    {locale.today}
                  </Button>
                </div>
              ) : null}
            </div>
          </div>
        </RadixPopover.Content>
      </RadixPopover.Portal>
    </RadixPopover.Root>
  );
});

DatePickerRoot.displayName = "DatePicker";

type RangeDraft = [Date | null, Date | null];

export const RangePicker = forwardRef<HTMLInputElement, RangePickerProps>(function RangePicker(
  {
    className,
    style,
    picker = "date",
    format: formatProp,
    value: valueProp,
    defaultValue = null,
    onChange,
    disabledDate,
    allowClear = true,
    presets,
    open: openProp,
    defaultOpen = false,
    onOpenChange,
    placeholder,
    disabled = false,
    size: sizeProp,
    variant = "outlined",
    status = "",
    popupClassName,
    suffixIcon,
    separator,
    id,
  },
  ref
) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("DatePicker", "picker");
  const { popupContainer } = useConfig();
  const locale = useLocale("DatePicker");
  const calendarLocale = useLocale("Calendar");
  const size = useComponentSize(sizeProp);
  const { weekStart } = calendarLocale;
  const format = formatProp ?? DEFAULT_DATE_FORMATS[picker];

  const [value, setValue] = useControllableState<DateRangeValue | null>({
    value: valueProp,
    defaultValue,
  });
  const [open, setOpen] = useControllableState({
    value: openProp,
    defaultValue: defaultOpen,
    onChange: onOpenChange,
  });
  const [draft, setDraft] = useState<RangeDraft | null>(null);
  const [active, setActive] = useState<0 | 1>(0);
  const [typed, setTyped] = useState<[string | null, string | null]>([null, null]);
  const [viewDate, setViewDate] = useState<Date>(() => value?.[0] ?? new Date());
  const anchorRef = useRef<HTMLSpanElement>(null);
  const startRef = useRef<HTMLInputElement>(null);
  const endRef = useRef<HTMLInputElement>(null);
  const composedStartRef = useComposedRefs(ref, startRef);

  const shown: RangeDraft = draft ?? value ?? [null, null];
  const isDisabled = (date: Date) =>
    disabledDate?.(getPeriodStart(date, picker, weekStart)) ?? false;
  const textOf = (date: Date | null) => (date ? formatDate(date, format, weekStart) : "");

  const commit = (next: DateRangeValue | null) => {
    setDraft(null);
    setTyped([null, null]);
    const normalized: DateRangeValue | null = next
      ? orderRange(
          getPeriodStart(next[0], picker, weekStart),
          getPeriodStart(next[1], picker, weekStart)
        )
      : null;
    const unchanged =
      normalized === null
        ? value === null
        : value !== null &&
          isSamePeriod(normalized[0], value[0], picker, weekStart) &&
          isSamePeriod(normalized[1], value[1], picker, weekStart);
    if (unchanged) return;
    setValue(normalized);
    onChange?.(
      normalized,
      normalized ? [textOf(normalized[0]), textOf(normalized[1])] : ["", ""]
    );
  };

  const changeOpen = (next: boolean) => {
    if (next && disabled) return;
    if (next && !open) setViewDate(shown[active] ?? value?.[0] ?? new Date());
    if (!next) {
      setDraft(null);
      setTyped([null, null]);
    }
    setOpen(next);
  };

  const focusSide = (side: 0 | 1) => {
    setActive(side);
    (side === 0 ? startRef : endRef).current?.focus();
  };

  const pick = (date: Date) => {
    if (isDisabled(date)) return;
    const [start, end]: RangeDraft =
      active === 0 ? [date, draft?.[1] ?? null] : [draft?.[0] ?? value?.[0] ?? null, date];
    if (start && end) {
      commit([start, end]);
      changeOpen(false);
      return;
    }
    setDraft([start, end]);
    setTyped([null, null]);
    focusSide(active === 0 ? 1 : 0);
  };

  const handleInput = (side: 0 | 1) => (event: ChangeEvent<HTMLInputElement>) => {
    const textValue = event.target.value;
    if (!open) changeOpen(true);
    setTyped(side === 0 ? [textValue, typed[1]] : [typed[0], textValue]);
    const parsed = parseDate(textValue, format, weekStart);
    if (parsed && !isDisabled(parsed)) setViewDate(parsed);
  };

  const handleKeyDown = (side: 0 | 1) => (event: KeyboardEvent<HTMLInputElement>) => {
    if (event.key === "Enter") {
      event.preventDefault();
      const entered = typed[side];
      if (entered === null) return;
      const parsed = parseDate(entered, format, weekStart);
      if (parsed && !isDisabled(parsed)) pick(parsed);
      else setTyped(side === 0 ? [null, typed[1]] : [typed[0], null]);
    } else if (event.key === "Escape") {
      changeOpen(false);
    }
  };

  const sideInput = (side: 0 | 1) => {
    const typedText = typed[side];
    return (
      <input
        ref={side === 0 ? composedStartRef : endRef}
        id={side === 0 ? id : undefined}
        autoComplete="off"
        size={Math.max(format.length, 12)}
        className={cn(
          inputElement(),
          open && active === side && `${prefixCls}-input-active`
        )}
        value={typedText ?? textOf(shown[side])}
        placeholder={placeholder?.[side] ?? (side === 0 ? locale.rangeStart : locale.rangeEnd)}
        disabled={disabled}
        onChange={handleInput(side)}
        onKeyDown={handleKeyDown(side)}
        onFocus={() => {
          setActive(side);
          changeOpen(true);
        }}
        onClick={() => {
          setActive(side);
          changeOpen(true);
        }}
      />
    );
  };

  const rangeStart = shown[0];
  const rangeEnd = shown[1];

  return (
    <RadixPopover.Root open={open && !disabled} onOpenChange={changeOpen}>
      <RadixPopover.Anchor asChild>
        <span
          ref={anchorRef}
          className={cn(
            prefixCls,
            `${prefixCls}-range`,
            inputAffixWrapper({
              size,
              variant,
              status: status === "" ? "none" : status,
              disabled,
            }),
            "w-auto",
            className
          )}
          style={{ ...tokenStyle, ...style }}
        >
          {sideInput(0)}
          <span className={inputAffix({ muted: true })}>
            {separator ?? <MoveRight aria-hidden className="size-3.5" />}
          </span>
          {sideInput(1)}
          <span className={inputAffix({ muted: true })}>
            {allowClear && value !== null && !disabled ? (
              <button
                type="button"
                aria-label={locale.clear}
                className={inputClear()}
                onMouseDown={(event) => event.preventDefault()}
                onClick={() => commit(null)}
              >
                <XCircle aria-hidden className="size-3.5" />
              </button>
            ) : (
              (suffixIcon ?? <CalendarDays aria-hidden className="size-3.5" />)
            )}
          </span>
        </span>
      </RadixPopover.Anchor>
      <RadixPopover.Portal container={popupContainer ?? undefined}>
        <RadixPopover.Content
          align="start"
          sideOffset={4}
          className={cn(`${prefixCls}-dropdown`, timePickerPanel(), popupClassName)}
          onOpenAutoFocus={(event) => event.preventDefault()}
          onInteractOutside={(event) => {
            const target = event.target;
            if (target instanceof Node && anchorRef.current?.contains(target)) {
              event.preventDefault();
            }
          }}
        >
          <div className="flex">
            {presets && presets.length > 0 ? (
              <PresetList
                prefixCls={prefixCls}
                presets={presets}
                onPick={(preset) => {
                  commit(resolveRangePreset(preset));
                  changeOpen(false);
                }}
              />
            ) : null}
            <DatePanel
              prefixCls={prefixCls}
              picker={picker}
              viewDate={viewDate}
              onViewDateChange={setViewDate}
              onPick={pick}
              isSelected={(date) =>
                isSamePeriod(date, rangeStart, picker, weekStart) ||
                isSamePeriod(date, rangeEnd, picker, weekStart)
              }
              isInRange={(date) =>
                rangeStart !== null &&
                rangeEnd !== null &&
                isPeriodBetween(date, rangeStart, rangeEnd, picker, weekStart)
              }
              disabledDate={disabledDate}
              calendarLocale={calendarLocale}
              locale={locale}
            />
          </div>
        </RadixPopover.Content>
      </RadixPopover.Portal>
    </RadixPopover.Root>
  );
});

RangePicker.displayName = "RangePicker";

export const DatePicker = Object.assign(DatePickerRoot, { RangePicker });
