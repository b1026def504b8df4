// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Calendar`
 * Purpose: Month grid or year-of-months panel with year/month selects and a mode switch.
 * Scope: Dates are local-time `Date` objects. Week start and labels come from the Calendar locale.
 * Invariants:
 * - `onSelect(date, { source })` fires for every pick, including header changes; `onChange` only when the value changes.
 * - `onPanelChange(date, mode)` fires when the shown month/year or the mode changes.
 * - Dates outside `validRange` or matched by `disabledDate` cannot be selected.
 * Side-effects: none
 * Links: src/components/kit/data-display/calendar-utils.ts
 * @public
 */

"use client";

import type { CSSProperties, ReactNode } from "react";
import { useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import {
  calendar,
  calendarCell,
  calendarCellInner,
  calendarHeader,
  calendarSelect,
  calendarTable,
} from "@/styles/ui";

import { Radio } from "../inputs/Radio";
import { useComponentConfig, useLocale } from "../theme";
import type { DateRange } from "./calendar-utils";
import {
  getMonthMatrix,
  isInRange,
  isMonthInRange,
  isSameDay,
  isSameMonth,
  rotateWeekDays,
  setYearMonth,
} from "./calendar-utils";

export type CalendarMode = "month" | "year";
export type SelectSource = "date" | "month" | "year" | "customize";

export interface CalendarCellInfo {
  type: "date" | "month";
  today: Date;
  originNode: ReactNode;
}

export interface CalendarHeaderInfo {
  value: Date;
  type: CalendarMode;
  onChange: (date: Date) => void;
  onTypeChange: (type: CalendarMode) => void;
}

export interface CalendarProps {
  className?: string;
  style?: CSSProperties;
  value?: Date;
  defaultValue?: Date;
  mode?: CalendarMode;
  fullscreen?: boolean;
  onChange?: (date: Date) => void;
  onSelect?: (date: Date, info: { source: SelectSource }) => void;
  onPanelChange?: (date: Date, mode: CalendarMode) => void;
  disabledDate?: (date: Date) => boolean;
  validRange?: DateRange;
  cellRender?: (date: Date, info: CalendarCellInfo) => ReactNode;
  headerRender?: (info: CalendarHeaderInfo) => ReactNode;
}

const YEAR_SPAN = 10;

export function getYearOptions(current: number, range: DateRange | undefined): number[] {
  const start = range ? range[0].getFullYear() : current - YEAR_SPAN;
  const end = range ? range[1].getFullYear() : current + YEAR_SPAN;
  return Array.from({ length: end - start + 1 }, (_, index) => start + index);
}

export function Calendar({
  className,
  style,
  value,
  defaultValue,
  mode: modeProp,
  fullscreen = true,
  onChange,
  onSelect,
  onPanelChange,
  disabledDate,
  validRange,
  cellRender,
  headerRender,
}: CalendarProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Calendar", "picker-calendar");
  const locale = useLocale("Calendar");
  const [today] = useState(() => new Date());
  const [current, setCurrent] = useControllableState<Date>({
    value,
    defaultValue: defaultValue ?? today,
  });
  const [mode, setMode] = useControllableState<CalendarMode>({
    value: modeProp,
    defaultValue: "month",
  });

  const isDisabled = (date: Date) =>
    !isInRange(date, validRange) || (disabledDate?.(date) ?? false);

  const triggerChange = (date: Date, source: SelectSource) => {
    const panelMoved =
      mode === "month" ? !isSameMonth(date, current) : date.getFullYear() !== current.getFullYear();
    setCurrent(date);
    onSelect?.(date, { source });
    if (!isSameDay(date, current)) onChange?.(date);
    if (panelMoved) onPanelChange?.(date, mode);
  };

  const changeMode = (next: CalendarMode) => {
    if (next === mode) return;
    setMode(next);
    onPanelChange?.(current, next);
  };

  const clampToRange = (date: Date): Date => {
    if (!validRange) return date;
    if (date < validRange[0]) return new Date(validRange[0]);
    if (date > validRange[1]) return new Date(validRange[1]);
    return date;
  };

  const header = headerRender ? (
    headerRender({
      value: current,
      type: mode,
      onChange: (date) => triggerChange(date, "customize"),
      onTypeChange: changeMode,
    })
  ) : (
    <div className={calendarHeader()}>
      <select
        aria-label={locale.year}
        className={calendarSelect({ fullscreen })}
        value={current.getFullYear()}
        onChange={(event) =>
          triggerChange(
            clampToRange(setYearMonth(current, Number(event.target.value), current.getMonth())),
            "year"
          )
        }
      >
        {getYearOptions(current.getFullYear(), validRange).map((year) => (
          <option key={year} value={year}>
            {year}
          </option>
        ))}
      </select>
      {mode === "month" ? (
        <select
          aria-label={locale.month}
          className={calendarSelect({ fullscreen })}
          value={current.getMonth()}
          onChange={(event) =>
            triggerChange(
              clampToRange(setYearMonth(current, current.getFullYear(), Number(event.target.value))),
              "month"
            )
          }
        >
          {locale.shortMonths.map((label, month) => (
            <option
              key={label}
              value={month}
              disabled={!isMonthInRange(current.getFullYear(), month, validRange)}
            >
              {label}
            </option>
          ))}
        </select>
      ) : null}
      <Radio.Group
        optionType="button"
        size={fullscreen ? "middle" : "small"}
        value={mode}
        onChange={(next) => changeMode(next === "year" ? "year" : "month")}
        options={[
          { label: locale.month, value: "month" },
          { label: locale.year, value: "year" },
        ]}
      />
    </div>
  );

  const renderCell = (date: Date, type: "date" | "month", label: ReactNode) =>
    cellRender ? cellRender(date, { type, today, originNode: label }) : null;

  const monthBody = () => {
    const weeks = getMonthMatrix(current.getFullYear(), current.getMonth(), locale.weekStart);
    return (
      <table className={calendarTable()}>
        <thead>
          <tr>
            {rotateWeekDays(locale.shortWeekDays, locale.weekStart).map((day) => (
              <th key={day} scope="col" className="pb-1 font-normal text-fg-secondary">
                {day}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {weeks.map((week) => (
            <tr key={week[0]?.getTime()}>
              {week.map((date) => {
                const disabled = isDisabled(date);
                const selected = isSameDay(date, current);
                return (
                  <td
                    key={date.getTime()}
                    aria-selected={selected}
                    aria-disabled={disabled || undefined}
                    title={date.toDateString()}
                    className={calendarCell({
                      inView: isSameMonth(date, current),
                      disabled,
                    })}
                    onClick={disabled ? undefined : () => triggerChange(date, "date")}
                  >
                    <div
                      className={calendarCellInner({
                        fullscreen,
                        selected,
                        today: isSameDay(date, today),
                      })}
                    >
                      <div>{String(date.getDate()).padStart(fullscreen ? 2 : 1, "0")}</div>
                      {fullscreen ? (
                        <div className="h-[60px] overflow-y-auto text-start">
                          {renderCell(date, "date", date.getDate())}
                        </div>
                      ) : null}
                    </div>
                  </td>
                );
              })}
            </tr>
          ))}
        </tbody>
      </table>
    );
  };

  const yearBody = () => {
    const rows = [0, 1, 2, 3].map((row) => [0, 1, 2].map((column) => row * 3 + column));
    return (
      <table className={calendarTable()}>
        <tbody>
          {rows.map((row) => (
            <tr key={row[0]}>
              {row.map((month) => {
                const date = setYearMonth(current, current.getFullYear(), month);
                const disabled = !isMonthInRange(current.getFullYear(), month, validRange);
                const selected = month === current.getMonth();
                const label = locale.shortMonths[month];
                return (
                  <td
                    key={month}
                    aria-selected={selected}
                    aria-disabled={disabled || undefined}
                    className={calendarCell({ disabled })}
                    onClick={
                      disabled ? undefined : () => triggerChange(clampToRange(date), "month")
                    }
                  >
                    <div
                      className={calendarCellInner({
                        fullscreen,
                        selected,
                        today: isSameMonth(date, today),
                      })}
                    >
                      <div>{label}</div>
                      {fullscreen ? (
                        <div className="h-[60px] overflow-y-auto text-start">
                          {renderCell(date, "month", label)}
                        </div>
                      ) : null}
                    </div>
                  </td>
                );
              })}
            </tr>
          ))}
        </tbody>
      </table>
    );
  };

  return (
    <div
      className={cn(prefixCls, calendar({ fullscreen }), className)}
      style={{ ...tokenStyle, ...style }}
    >
      {header}
      <div className={fullscreen ? "px-0" : "px-2 pb-2"}>
        {mode === "month" ? monthBody() : yearBody()}
      </div>
    </div>
  );
}

Calendar.displayName = "Calendar";
