// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/navigation/Pagination`
 * Purpose: Page navigation with jumpers, page size changer, quick jumper and total text.
 * Scope: Page math lives in pagination-utils; this module wires state, locale and rendering.
 * Invariants:
 * - `onChange(page, pageSize)` fires only when the page or the size changes.
 * - Changing the page size clamps the current page into the new page count.
 * - The size changer shows by default once `total` exceeds totalBoundaryShowSizeChanger.
 * Side-effects: none
 * Links: src/components/kit/navigation/pagination-utils.ts
 * @public
 */

"use client";

import {
  ChevronLeft,
  ChevronRight,
  ChevronsLeft,
  ChevronsRight,
  Ellipsis,
} from "lucide-react";
import type { CSSProperties, KeyboardEvent, ReactNode } from "react";
import { useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import {
  pagination,
  paginationItem,
  paginationJumperInput,
  paginationOptions,
  paginationSelect,
  paginationTotal,
} from "@/styles/ui";

import { useComponentConfig, useComponentSize, useLocale } from "../theme";
import {
  clampPage,
  getItemRange,
  getJumpTarget,
  getPageCount,
  getPageItems,
} from "./pagination-utils";

export type PaginationItemType =
  | "page"
  | "prev"
  | "next"
  | "jump-prev"
  | "jump-next";

export interface PaginationProps {
  className?: string;
  style?: CSSProperties;
  current?: number;
  defaultCurrent?: number;
  pageSize?: number;
  defaultPageSize?: number;
  total?: number;
  onChange?: (page: number, pageSize: number) => void;
  onShowSizeChange?: (current: number, size: number) => void;
  disabled?: boolean;
  hideOnSinglePage?: boolean;
  showSizeChanger?: boolean;
  totalBoundaryShowSizeChanger?: number;
  pageSizeOptions?: number[];
  showQuickJumper?: boolean;
  showTotal?: (total: number, range: [number, number]) => ReactNode;
  simple?: boolean;
  size?: SizeType;
  showLessItems?: boolean;
  showTitle?: boolean;
  align?: "start" | "center" | "end";
  itemRender?: (
    page: number,
    type: PaginationItemType,
    element: ReactNode
  ) => ReactNode;
}

const jumpIcon = "hidden size-3.5 group-hover:block rtl:rotate-180";

function parsePage(text: string): number | null {
  const value = Number.parseInt(text, 10);
  return Number.isNaN(value) ? null : value;
}

export function Pagination({
  current: currentProp,
  defaultCurrent = 1,
  pageSize: pageSizeProp,
  defaultPageSize = 10,
  total = 0,
  onChange,
  onShowSizeChange,
  disabled = false,
  hideOnSinglePage = false,
  showSizeChanger,
  totalBoundaryShowSizeChanger = 50,
  pageSizeOptions = [10, 20, 50, 100],
  showQuickJumper = false,
  showTotal,
  simple = false,
  size: sizeProp,
  showLessItems = false,
  showTitle = true,
  align = "start",
  itemRender = (_page, _type, element) => element,
  className,
  style,
}: PaginationProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Pagination",
    "pagination"
  );
  const locale = useLocale("Pagination");
  const size = useComponentSize(sizeProp);
  const [current, setCurrent] = useControllableState({
    value: currentProp,
    defaultValue: defaultCurrent,
  });
  const [pageSize, setPageSize] = useControllableState({
    value: pageSizeProp,
    defaultValue: defaultPageSize,
  });
  const [jumpText, setJumpText] = useState("");
  const [simpleText, setSimpleText] = useState<string | null>(null);

  const pageCount = getPageCount(total, pageSize);
  if (hideOnSinglePage && pageCount <= 1) return null;

  const go = (page: number) => {
    if (disabled) return;
    const next = Math.max(1, Math.min(page, Math.max(pageCount, 1)));
    if (next === current) return;
    setCurrent(next);
    onChange?.(next, pageSize);
  };

  const changeSize = (nextSize: number) => {
    const nextCurrent = clampPage(current, total, nextSize);
    setPageSize(nextSize);
    onShowSizeChange?.(nextCurrent, nextSize);
    if (nextCurrent !== current) setCurrent(nextCurrent);
    onChange?.(nextCurrent, nextSize);
  };

  const hasPrev = current > 1;
  const hasNext = current < pageCount;
  const itemClass = (active: boolean, itemDisabled: boolean) =>
    paginationItem({ size, active, disabled: disabled || itemDisabled });

  const renderNav = (
    type: "prev" | "next",
    enabled: boolean,
    icon: ReactNode,
    title: string
  ) => (
    <li
      key={type}
      title={showTitle ? title : undefined}
      aria-disabled={!enabled || disabled}
      className={cn(`${prefixCls}-${type}`, !enabled && `${prefixCls}-disabled`)}
    >
      <button
        type="button"
        aria-label={title}
        disabled={!enabled || disabled}
        className={itemClass(false, !enabled)}
        onClick={() => go(type === "prev" ? current - 1 : current + 1)}
      >
        {itemRender(type === "prev" ? current - 1 : current + 1, type, icon)}
      </button>
    </li>
  );

  const prev = renderNav(
    "prev",
    hasPrev,
    <ChevronLeft className="size-3.5 rtl:rotate-180" aria-hidden />,
    locale.prev_page
  );
  const next = renderNav(
    "next",
    hasNext,
    <ChevronRight className="size-3.5 rtl:rotate-180" aria-hidden />,
    locale.next_page
  );

  if (simple) {
    const commitSimple = () => {
      if (simpleText === null) return;
      const page = parsePage(simpleText);
      setSimpleText(null);
      if (page !== null) go(page);
    };
    return (
      <ul
        className={cn(prefixCls, `${prefixCls}-simple`, pagination({ align }), className)}
        style={{ ...tokenStyle, ...style }}
      >
        {prev}
        <li className={cn(`${prefixCls}-simple-pager`, "inline-flex items-center gap-2")}>
          <input
            type="text"
            aria-label={locale.page}
            disabled={disabled}
            value={simpleText ?? String(current)}
            size={3}
            className={paginationJumperInput({ size })}
            onChange={(event) => setSimpleText(event.target.value)}
            onKeyDown={(event) => {
              if (event.key === "Enter") commitSimple();
            }}
            onBlur={commitSimple}
          />
          <span className={`${prefixCls}-slash`}>/</span>
          {pageCount}
        </li>
        {next}
      </ul>
    );
  }

  const pages = getPageItems(current, pageCount, showLessItems).map((item) => {
    if (typeof item === "number") {
      const active = item === current;
      return (
        <li
          key={item}
          title={showTitle ? String(item) : undefined}
          className={cn(
            `${prefixCls}-item`,
            `${prefixCls}-item-${item}`,
            active && `${prefixCls}-item-active`
          )}
        >
          <button
            type="button"
            aria-current={active ? "page" : undefined}
            disabled={disabled}
            className={itemClass(active, false)}
            onClick={() => go(item)}
          >
            {itemRender(item, "page", item)}
          </button>
        </li>
      );
    }
    const direction = item === "jump-prev" ? "prev" : "next";
    const target = getJumpTarget(current, pageCount, direction, showLessItems);
    const title =
      direction === "prev"
        ? showLessItems
          ? locale.prev_3
          : locale.prev_5
        : showLessItems
          ? locale.next_3
          : locale.next_5;
    return (
      <li
        key={item}
        title={showTitle ? title : undefined}
        className={cn(`${prefixCls}-${item}`, "group")}
      >
        <button
          type="button"
          aria-label={title}
          disabled={disabled}
          className={cn(itemClass(false, false), "text-fg-quaternary hover:text-primary")}
          onClick={() => go(target)}
        >
          {itemRender(
            target,
            item,
            <>
              <Ellipsis className="size-3.5 group-hover:hidden" aria-hidden />
              {direction === "prev" ? (
                <ChevronsLeft className={jumpIcon} aria-hidden />
              ) : (
                <ChevronsRight className={jumpIcon} aria-hidden />
              )}
            </>
          )}
        </button>
      </li>
    );
  });

  const sizeChangerVisible = showSizeChanger ?? total > totalBoundaryShowSizeChanger;
  const sizeOptions = pageSizeOptions.includes(pageSize)
    ? pageSizeOptions
    : [...pageSizeOptions, pageSize].sort((a, b) => a - b);

  const commitJump = (event: KeyboardEvent<HTMLInputElement> | null) => {
    if (event && event.key !== "Enter") return;
    const page = parsePage(jumpText);
    setJumpText("");
    if (page !== null) go(page);
  };

  return (
    <ul
      className={cn(
        prefixCls,
        disabled && `${prefixCls}-disabled`,
        size === "small" && `${prefixCls}-mini`,
        pagination({ align }),
        className
      )}
      style={{ ...tokenStyle, ...style }}
    >
      {showTotal && (
        <li className={cn(`${prefixCls}-total-text`, paginationTotal())}>
          {showTotal(total, getItemRange(current, pageSize, total))}
        </li>
      )}
      {prev}
      {pages}
      {next}
      {(sizeChangerVisible || showQuickJumper) && (
        <li className={cn(`${prefixCls}-options`, paginationOptions())}>
          {sizeChangerVisible && (
            <select
              aria-label={locale.items_per_page}
              disabled={disabled}
              value={pageSize}
              className={paginationSelect({ size })}
              onChange={(event) => changeSize(Number(event.target.value))}
            >
              {sizeOptions.map((option) => (
                <option key={option} value={option}>
                  {`${option} ${locale.items_per_page}`}
                </option>
              ))}
            </select>
          )}
          {showQuickJumper && (
            <span className={`${prefixCls}-options-quick-jumper`}>
              {locale.jump_to}{" "}
              <input
                type="text"
                aria-label={locale.jump_to}
                disabled={disabled}
                value={jumpText}
                className={paginationJumperInput({ size })}
                onChange={(event) => setJumpText(event.target.value)}
                onKeyDown={commitJump}
                onBlur={() => commitJump(null)}
              />{" "}
              {locale.page}
            </span>
          )}
        </li>
      )}
    </ul>
  );
}
