// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/DatePanel`
 * Purpose: Day, month, quarter and year grids with header navigation, shared by DatePicker and RangePicker.
 * Scope: Presentational apart from the panel mode; the owner keeps the view date, selection and range.
 * Invariants:
 * - Picking in a coarser panel than the picker's drills down (year -> month -> date) instead of committing.
 * - Every cell carries its date as `title` (2026-10-19, 2026-10, 2026-Q4 or 2026).
 * - `disabledDate` is asked with the first day of each cell's period.
 * Side-effects: none
 * Links: src/components/kit/inputs/date-utils.ts, src/components/kit/data-display/calendar-utils.ts
 * @public
 */

"use client";

import { ChevronLeft, ChevronRight, ChevronsLeft, ChevronsRight } from "lucide-react";
import type { ReactNode } from "react";
import { useState } from "react";

import type { Locale } from "@/shared/locale";
import { cn } from "@/shared/util";
import {
  datePickerBody,
  datePickerCell,
  datePickerHeader,
  datePickerHeaderButton,
  datePickerPanel,
  datePickerTable,
  datePickerWeekRow,
} from "@/styles/ui";

import {
  addMonths,
  getMonthMatrix,
  rotateWeekDays,
  setYearMonth,
} from "../data-display/calendar-utils";
import type { PanelMode, PickerMode } from "./date-utils";
import {
  formatDate,
  getDecadeStart,
  getPeriodStart,
  getPickerPanel,
  getWeekOfYear,
  isSamePeriod,
} from "./date-utils";

export interface DatePanelProps {
  prefixCls: string;
  picker: PickerMode;
  viewDate: Date;
  onViewDateChange: (date: Date) => void;
  onPick: (date: Date) => void;
  isSelected: (date: Date) => boolean;
  isInRange?: (date: Date) => boolean;
  disabledDate?: ((date: Date) => boolean) | undefined;
  calendarLocale: Locale["Calendar"];
  locale: Locale["DatePicker"];
}

interface Cell {
  date: Date;
  label: ReactNode;
  title: string;
  inView: boolean;
}

const chunk = <T,>(items: readonly T[], size: number): T[][] =>
  Array.from({ length: Math.ceil(items.length / size) }, (_, row) =>
    items.slice(row * size, row * size + size)
  );

export function DatePanel({
  prefixCls,
  picker,
  viewDate,
  onViewDateChange,
  onPick,
  isSelected,
  isInRange,
  disabledDate,
  calendarLocale,
  locale,
}: DatePanelProps) {
  const [mode, setMode] = useState<PanelMode>(getPickerPanel(picker));
  const [today] = useState(() => new Date());
  const { weekStart } = calendarLocale;
  const year = viewDate.getFullYear();
  const month = viewDate.getMonth();
  const decade = getDecadeStart(year);
  const cellPicker: PickerMode = mode;

  const pickCell = (date: Date) => {
    if (mode === "year" && picker !== "year") {
      onViewDateChange(setYearMonth(viewDate, date.getFullYear(), month));
      setMode(picker === "quarter" ? "quarter" : "month");
      return;
    }
    if (mode === "month" && picker !== "month") {
      onViewDateChange(setYearMonth(viewDate, year, date.getMonth()));
      setMode("date");
      return;
    }
    onPick(date);
  };

  const navButton = (label: string, icon: ReactNode, months: number) => (
    <button
      type="button"
      aria-label={label}
      className={datePickerHeaderButton()}
      onMouseDown={(event) => event.preventDefault()}
      onClick={() => onViewDateChange(addMonths(viewDate, months))}
    >
      {icon}
    </button>
  );

  const labelButton = (label: ReactNode, next: PanelMode) => (
    <button
      type="button"
      className={datePickerHeaderButton({ label: true })}
      onMouseDown={(event) => event.preventDefault()}
      onClick={() => setMode(next)}
    >
      {label}
    </button>
  );

  const renderHeader = () => {
    const big = mode === "year" ? 120 : 12;
    return (
      <div className={cn(`${prefixCls}-header`, datePickerHeader())}>
        {navButton(
          mode === "year" ? locale.previousDecade : locale.previousYear,
          <ChevronsLeft aria-hidden className="size-3.5" />,
          -big
        )}
        {mode === "date"
          ? navButton(locale.previousMonth, <ChevronLeft aria-hidden className="size-3.5" />, -1)
          : null}
        <div className="flex flex-1 items-center justify-center gap-1">
          {mode === "date" ? labelButton(calendarLocale.shortMonths[month], "month") : null}
          {mode === "year" ? (
            <span className="font-semibold">{`${decade}-${decade + 9}`}</span>
          ) : (
            labelButton(year, "year")
          )}
        </div>
        {mode === "date"
          ? navButton(locale.nextMonth, <ChevronRight aria-hidden className="size-3.5" />, 1)
          : null}
        {navButton(
          mode === "year" ? locale.nextDecade : locale.nextYear,
          <ChevronsRight aria-hidden className="size-3.5" />,
          big
        )}
      </div>
    );
  };

  const renderCell = (cell: Cell) => {
    const disabled = disabledDate?.(getPeriodStart(cell.date, cellPicker, weekStart)) ?? false;
    const selected = picker !== "week" && isSelected(cell.date);
    return (
      <td key={cell.title} className={`${prefixCls}-cell`}>
        <button
          type="button"
          title={cell.title}
          disabled={disabled}
          aria-pressed={selected}
          className={cn(
            `${prefixCls}-cell-inner`,
            datePickerCell({
              inView: cell.inView,
              selected,
              inRange: !selected && cell.inView && (isInRange?.(cell.date) ?? false),
              today: isSamePeriod(cell.date, today, cellPicker, weekStart),
              disabled,
              wide: mode !== "date",
            })
          )}
          onMouseDown={(event) => event.preventDefault()}
          onClick={() => pickCell(cell.date)}
        >
          {cell.label}
        </button>
      </td>
    );
  };

  const renderDays = () => {
    const weeks = getMonthMatrix(year, month, weekStart);
    const showWeek = picker === "week";
    return (
      <table className={datePickerTable()}>
        <thead>
          <tr>
            {showWeek ? <th className="h-7 font-normal">{locale.week}</th> : null}
            {rotateWeekDays(calendarLocale.shortWeekDays, weekStart).map((day) => (
              <th key={day} className="h-7 font-normal">
                {day}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {weeks.map((week) => {
            const first = week[0] ?? viewDate;
            const rowSelected = showWeek && isSelected(first);
            return (
              <tr
                key={first.getTime()}
                className={cn(showWeek && datePickerWeekRow({ selected: rowSelected }))}
              >
                {showWeek ? (
                  <td className="text-fg-tertiary">{getWeekOfYear(first, weekStart).week}</td>
                ) : null}
                {week.map((date) =>
                  renderCell({
                    date,
                    label: date.getDate(),
                    title: formatDate(date, "YYYY-MM-DD"),
                    inView: date.getMonth() === month,
                  })
                )}
              </tr>
            );
          })}
        </tbody>
      </table>
    );
  };

  const renderGrid = (cells: Cell[], columns: number) => (
    <table className={datePickerTable()}>
      <tbody>
        {chunk(cells, columns).map((row) => (
          <tr key={row[0]?.title} className="h-12">
            {row.map(renderCell)}
          </tr>
        ))}
      </tbody>
    </table>
  );

  const renderBody = () => {
    switch (mode) {
      case "date":
        return renderDays();
      case "month":
        return renderGrid(
          calendarLocale.shortMonths.map((label, index) => ({
            date: new Date(year, index, 1),
            label,
            title: formatDate(new Date(year, index, 1), "YYYY-MM"),
            inView: true,
          })),
          3
        );
      case "quarter":
        return renderGrid(
          [0, 1, 2, 3].map((index) => ({
            date: new Date(year, index * 3, 1),
            label: `Q${index + 1}`,
            title: `${year}-Q${index + 1}`,
            inView: true,
          })),
          4
        );
      case "year":
        return renderGrid(
          Array.from({ length: 12 }, (_, index) => {
            const cellYear = decade - 1 + index;
            return {
              date: new Date(cellYear, 0, 1),
              label: cellYear,
              title: String(cellYear),
              inView: index > 0 && index < 11,
            };
          }),
          3
        );
    }
  };

  return (
    <div className={cn(`${prefixCls}-panel`, `${prefixCls}-${mode}-panel`, datePickerPanel())}>
      {renderHeader()}
      <div className={cn(`${prefixCls}-body`, datePickerBody())}>{renderBody()}</div>
    </div>
  );
}
