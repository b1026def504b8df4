// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/TimePicker`
 * Purpose: Time input with a scrolling column panel (hours, minutes, seconds, meridiem).
 * Scope: Panel is a Radix Popover anchored to the input. Typed text commits on Enter or blur when it parses.
 * Invariants:
 * - With `needConfirm` (default), cell picks change a draft; OK commits it and closing without OK discards it.
 * - `onChange(value, text)` fires only when the committed value changes; clearing reports `(null, "")`.
 * - The selected cell of every column is scrolled to the top of its column.
 * Side-effects: time (Now reads the clock)
 * Links: src/components/kit/inputs/time-utils.ts
 * @public
 */

"use client";

import * as RadixPopover from "@radix-ui/react-popover";
import { Clock, XCircle } from "lucide-react";
import type { ChangeEvent, CSSProperties, KeyboardEvent } from "react";
import { forwardRef, useLayoutEffect, useRef, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import type { InputVariant } from "@/styles/ui";
import {
  inputAffix,
  inputAffixWrapper,
  inputClear,
  inputElement,
  timePickerCell,
  timePickerColumn,
  timePickerColumns,
  timePickerFooter,
  timePickerPanel,
} from "@/styles/ui";

import { Button } from "../general/Button";
import { useComponentConfig, useComponentSize, useConfig, useLocale } from "../theme";
import type { TimeColumn, TimeUnit, TimeValue } from "./time-utils";
import {
  formatTime,
  getTimeColumns,
  getTimeUnits,
  isSameTime,
  parseTime,
  timeFromDate,
} from "./time-utils";

export interface DisabledTimes {
  disabledHours?: () => number[];
  disabledMinutes?: (hour: number) => number[];
  disabledSeconds?: (hour: number, minute: number) => number[];
}

export interface TimePickerProps {
  className?: string;
  style?: CSSProperties;
  value?: TimeValue | null;
  defaultValue?: TimeValue | null;
  onChange?: (value: TimeValue | null, text: string) => void;
  format?: string;
  use12Hours?: boolean;
  hourStep?: number;
  minuteStep?: number;
  secondStep?: number;
  disabledTime?: (value: TimeValue | null) => DisabledTimes;
  hideDisabledOptions?: boolean;
  allowClear?: boolean;
  showNow?: boolean;
  needConfirm?: boolean;
  open?: boolean;
  defaultOpen?: boolean;
  onOpenChange?: (open: boolean) => void;
  placeholder?: string;
  disabled?: boolean;
  size?: SizeType;
  variant?: InputVariant;
  status?: "" | "error" | "warning";
  popupClassName?: string;
  id?: string;
  name?: string;
}

const ZERO: TimeValue = { hour: 0, minute: 0, second: 0 };

interface ColumnCell extends TimeUnit {
  selected: boolean;
}

/** Cells for one panel column, given the value the panel shows. */
export function buildColumn(
  column: TimeColumn,
  shown: TimeValue | null,
  {
    use12Hours,
    hourStep,
    minuteStep,
    secondStep,
    disabled,
  }: {
    use12Hours: boolean;
    hourStep: number;
    minuteStep: number;
    secondStep: number;
    disabled: DisabledTimes;
  }
): ColumnCell[] {
  const current = shown ?? ZERO;
  const pm = current.hour >= 12;
  switch (column) {
    case "hour": {
      const disabledHours = disabled.disabledHours?.() ?? [];
      if (!use12Hours) {
        return getTimeUnits(24, hourStep, disabledHours).map((unit) => ({
          ...unit,
          selected: shown !== null && unit.value === current.hour,
        }));
      }
      return getTimeUnits(12, hourStep).map((unit) => {
        const hour = unit.value + (pm ? 12 : 0);
        return {
          value: hour,
          label: unit.value === 0 ? "12" : String(unit.value).padStart(2, "0"),
          disabled: disabledHours.includes(hour),
          selected: shown !== null && hour === current.hour,
        };
      });
    }
    case "minute":
      return getTimeUnits(60, minuteStep, disabled.disabledMinutes?.(current.hour)).map(
        (unit) => ({ ...unit, selected: shown !== null && unit.value === current.minute })
      );
    case "second":
      return getTimeUnits(
        60,
        secondStep,
        disabled.disabledSeconds?.(current.hour, current.minute)
      ).map((unit) => ({ ...unit, selected: shown !== null && unit.value === current.second }));
    case "meridiem":
      return [
        { value: 0, label: "AM", disabled: false, selected: shown !== null && !pm },
        { value: 12, label: "PM", disabled: false, selected: shown !== null && pm },
      ];
  }
}

/** Applies a cell pick to the shown value. */
export function applyCell(
  shown: TimeValue | null,
  column: TimeColumn,
  cellValue: number
): TimeValue {
  const base = shown ?? ZERO;
  switch (column) {
    case "hour":
      return { ...base, hour: cellValue };
    case "minute":
      return { ...base, minute: cellValue };
    case "second":
      return { ...base, second: cellValue };
    case "meridiem":
      return { ...base, hour: (base.hour % 12) + cellValue };
  }
}

export const TimePicker = forwardRef<HTMLInputElement, TimePickerProps>(
  function TimePicker(
    {
      className,
      style,
      value: valueProp,
      defaultValue = null,
      onChange,
      format: formatProp,
      use12Hours = false,
      hourStep = 1,
      minuteStep = 1,
      secondStep = 1,
      disabledTime,
      hideDisabledOptions = false,
      allowClear = true,
      showNow = true,
      needConfirm = true,
      open: openProp,
      defaultOpen = false,
      onOpenChange,
      placeholder,
      disabled = false,
      size: sizeProp,
      variant = "outlined",
      status = "",
      popupClassName,
      id,
      name,
    },
    ref
  ) {
    const { prefixCls, style: tokenStyle } = useComponentConfig("TimePicker", "picker");
    const { popupContainer } = useConfig();
    const locale = useLocale("TimePicker");
    const size = useComponentSize(sizeProp);
    const format = formatProp ?? (use12Hours ? "h:mm:ss a" : "HH:mm:ss");
    const columns = getTimeColumns(format);

    const [value, setValue] = useControllableState<TimeValue | null>({
      value: valueProp,
      defaultValue,
    });
    const [open, setOpen] = useControllableState({
      value: openProp,
      defaultValue: defaultOpen,
      onChange: onOpenChange,
    });
    const [draft, setDraft] = useState<TimeValue | null>(null);
    const [typed, setTyped] = useState<string | null>(null);
    const anchorRef = useRef<HTMLSpanElement>(null);
    const columnRefs = useRef<Partial<Record<TimeColumn, HTMLUListElement | null>>>({});

    const shown = draft ?? value;
    const text = typed ?? (shown ? formatTime(shown, format) : "");

    const commit = (next: TimeValue | null) => {
      setDraft(null);
      setTyped(null);
      if (isSameTime(next, value)) return;
      setValue(next);
      onChange?.(next, next ? formatTime(next, format) : "");
    };

    const changeOpen = (next: boolean) => {
      if (!next) {
        setDraft(null);
        setTyped(null);
      }
      setOpen(next);
    };

    const pick = (column: TimeColumn, cellValue: number) => {
      const next = applyCell(shown, column, cellValue);
      if (needConfirm) setDraft(next);
      else commit(next);
    };

    const handleInput = (event: ChangeEvent<HTMLInputElement>) => {
      setTyped(event.target.value);
      const parsed = parseTime(event.target.value, format);
      if (parsed) setDraft(parsed);
      if (!open) setOpen(true);
    };

    const handleKeyDown = (event: KeyboardEvent<HTMLInputElement>) => {
      if (event.key === "Enter") {
        event.preventDefault();
        if (typed !== null) {
          const parsed = parseTime(typed, format);
          if (parsed) commit(parsed);
          else setTyped(null);
        } else if (draft) {
          commit(draft);
        }
        changeOpen(false);
      } else if (event.key === "Escape") {
        changeOpen(false);
      }
    };

    const handleBlur = () => {
      if (typed === null) return;
      const parsed = parseTime(typed, format);
      if (parsed) commit(parsed);
      else setTyped(null);
    };

    const disabledTimes = disabledTime?.(shown) ?? {};

    useLayoutEffect(() => {
      if (!open) return;
      for (const column of columns) {
        const list = columnRefs.current[column];
        const selected = list?.querySelector<HTMLElement>('[aria-selected="true"]');
        if (list && selected) list.scrollTop = selected.offsetTop - list.offsetTop;
      }
    });

    const nowDisabled = (() => {
      const now = timeFromDate(new Date());
      const disabledNow = disabledTime?.(now) ?? {};
      return (
        (disabledNow.disabledHours?.() ?? []).includes(now.hour) ||
        (disabledNow.disabledMinutes?.(now.hour) ?? []).includes(now.minute) ||
        (disabledNow.disabledSeconds?.(now.hour, now.minute) ?? []).includes(now.second)
      );
    })();

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
              aria-expanded={open}
              aria-haspopup="dialog"
              autoComplete="off"
              size={Math.max(format.length, 8)}
              className={inputElement()}
              value={text}
              placeholder={placeholder ?? locale.placeholder}
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
                <Clock aria-hidden className="size-3.5" />
              )}
            </span>
          </span>
        </RadixPopover.Anchor>
        <RadixPopover.Portal container={popupContainer ?? undefined}>
          <RadixPopover.Content
            align="start"
            sideOffset={4}
            className={cn(`${prefixCls}-panel`, timePickerPanel(), popupClassName)}
            onOpenAutoFocus={(event) => event.preventDefault()}
            onInteractOutside={(event) => {
              const target = event.target;
              if (target instanceof Node && anchorRef.current?.contains(target)) {
                event.preventDefault();
              }
            }}
          >
            <div className={timePickerColumns()}>
              {columns.map((column) => {
                const cells = buildColumn(column, shown, {
                  use12Hours,
                  hourStep,
                  minuteStep,
                  secondStep,
                  disabled: disabledTimes,
                }).filter((cell) => !(hideDisabledOptions && cell.disabled));
                return (
                  <ul
                    key={column}
                    ref={(element) => {
                      columnRefs.current[column] = element;
                    }}
                    role="listbox"
                    aria-label={column}
                    className={cn("relative", timePickerColumn())}
                  >
                    {cells.map((cell) => (
                      <li
                        key={cell.value}
                        role="option"
                        aria-selected={cell.selected}
                        aria-disabled={cell.disabled || undefined}
                      >
                        <button
                          type="button"
                          tabIndex={-1}
                          disabled={cell.disabled}
                          className={timePickerCell({
                            selected: cell.selected,
                            disabled: cell.disabled,
                          })}
                          onMouseDown={(event) => event.preventDefault()}
                          onClick={() => pick(column, cell.value)}
                        >
                          {cell.label}
                        </button>
                      </li>
                    ))}
                  </ul>
                );
              })}
            </div>
            {showNow || needConfirm ? (
              <div className={timePickerFooter()}>
                {showNow ? (
                  <Button
                    type="link"
                    size="small"
                    disabled={nowDisabled}
                    onMouseDown={(event) => event.preventDefault()}
                    onClick={() => {
                      commit(timeFromDate(new Date()));
                      changeOpen(false);
                    }}
                  >
                    {locale.now}
                  </Button>
                ) : (
                  <span />
                )}
                {needConfirm ? (
                  <Button
                    type="primary"
                    size="small"
                    disabled={shown === null}
                    onMouseDown={(event) => event.preventDefault()}
                    onClick={() => {
                      if (draft) commit(draft);
                      changeOpen(false);
                    }}
                  >
                    {locale.ok}
                  </Button>
                ) : null}
              </div>
            ) : null}
          </RadixPopover.Content>
        </RadixPopover.Portal>
      </RadixPopover.Root>
    );
  }
);

TimePicker.displayName = "TimePicker";
