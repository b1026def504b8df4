// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/navigation/Tabs`
 * Purpose: Tab bar with panels in line, card and editable-card styles on any side.
 * Scope: ARIA tabs pattern with roving focus, ink bar for line tabs, add and remove buttons for editable cards.
 * Invariants:
 * - Arrow keys move to the next enabled tab and activate it, wrapping at the ends.
 * - A panel mounts on first activation and stays mounted unless destroyInactiveTabPane.
 * Side-effects: none
 * @public
 */

"use client";

import { Plus, X } from "lucide-react";
import type {
  CSSProperties,
  KeyboardEvent,
  MouseEvent,
  ReactNode,
} from "react";
import { useId, useLayoutEffect, useRef, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import {
  tab,
  tabs,
  tabsAdd,
  tabsExtra,
  tabsInkBar,
  tabsList,
  tabsNav,
  tabsPanel,
  tabsRemove,
} from "@/styles/ui";

import { useComponentConfig, useComponentSize, useLocale } from "../theme";

export interface TabItem {
  key: string;
  label: ReactNode;
  children?: ReactNode;
  disabled?: boolean;
  closable?: boolean;
  closeIcon?: ReactNode;
  icon?: ReactNode;
  forceRender?: boolean;
}

export type TabPosition = "top" | "right" | "bottom" | "left";

export interface TabsProps {
  className?: string;
  style?: CSSProperties;
  items: TabItem[];
  activeKey?: string;
  defaultActiveKey?: string;
  onChange?: (key: string) => void;
  onTabClick?: (key: string, event: MouseEvent | KeyboardEvent) => void;
  type?: "line" | "card" | "editable-card";
  onEdit?: (target: string | MouseEvent, action: "add" | "remove") => void;
  hideAdd?: boolean;
  addIcon?: ReactNode;
  centered?: boolean;
  size?: SizeType;
  tabPosition?: TabPosition;
  tabBarExtraContent?: ReactNode | { left?: ReactNode; right?: ReactNode };
  tabBarGutter?: number;
  destroyInactiveTabPane?: boolean;
  /** Animates the ink bar. */
  animated?: boolean;
}

function isExtraPair(
  extra: TabsProps["tabBarExtraContent"]
): extra is { left?: ReactNode; right?: ReactNode } {
  return (
    typeof extra === "object" &&
    extra !== null &&
    !Array.isArray(extra) &&
    !("$$typeof" in extra) &&
    ("left" in extra || "right" in extra)
  );
}

/** Next enabled index from `from`, stepping by `step` and wrapping; -1 when none. */
export function findEnabledTab(
  items: readonly TabItem[],
  from: number,
  step: 1 | -1
): number {
  for (let offset = 1; offset <= items.length; offset += 1) {
    const index = (from + step * offset + items.length) % items.length;
    if (!items[index]?.disabled) return index;
  }
  return -1;
}

export function Tabs({
  items,
  activeKey,
  defaultActiveKey,
  onChange,
  onTabClick,
  type = "line",
  onEdit,
  hideAdd = false,
  addIcon,
  centered = false,
  size: sizeProp,
  tabPosition = "top",
  tabBarExtraContent,
  tabBarGutter,
  destroyInactiveTabPane = false,
  animated = true,
  className,
  style,
}: TabsProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Tabs", "tabs");
  const locale = useLocale("Tabs");
  const size = useComponentSize(sizeProp);
  const baseId = useId();
  const firstEnabled = items.find((item) => !item.disabled)?.key ?? "";
  const [active, setActive] = useControllableState({
    value: activeKey,
    defaultValue: defaultActiveKey ?? firstEnabled,
    onChange,
  });
  const [visited, setVisited] = useState<ReadonlySet<string>>(() => new Set());
  const tabRefs = useRef(new Map<string, HTMLElement>());
  const [ink, setInk] = useState<CSSProperties>({});

  const vertical = tabPosition === "left" || tabPosition === "right";
  const card = type !== "line";
  const editable = type === "editable-card";

  useLayoutEffect(() => {
    if (!visited.has(active)) {
      setVisited((prev) => new Set(prev).add(active));
    }
  }, [active, visited]);

  useLayoutEffect(() => {
    const node = tabRefs.current.get(active);
    if (!node || card) return;
    setInk(
      vertical
        ? { top: node.offsetTop, height: node.offsetHeight }
        : { left: node.offsetLeft, width: node.offsetWidth }
    );
  }, [active, card, vertical, items]);

  const select = (key: string, event: MouseEvent | KeyboardEvent) => {
    onTabClick?.(key, event);
    if (key !== active) setActive(key);
  };

  const onKeyDown = (event: KeyboardEvent, index: number) => {
    const forward = vertical ? "ArrowDown" : "ArrowRight";
    const backward = vertical ? "ArrowUp" : "ArrowLeft";
    let target = -1;
    if (event.key === forward) target = findEnabledTab(items, index, 1);
    else if (event.key === backward) target = findEnabledTab(items, index, -1);
    else if (event.key === "Home") target = findEnabledTab(items, -1, 1);
    else if (event.key === "End") target = findEnabledTab(items, items.length, -1);
    else if (editable && (event.key === "Delete" || event.key === "Backspace")) {
      const item = items[index];
      if (item && item.closable !== false) onEdit?.(item.key, "remove");
      return;
    } else return;

    event.preventDefault();
    const next = items[target];
    if (!next) return;
    tabRefs.current.get(next.key)?.focus();
    select(next.key, event);
  };

  const extraLeft = isExtraPair(tabBarExtraContent) ? tabBarExtraContent.left : undefined;
  const extraRight = isExtraPair(tabBarExtraContent)
    ? tabBarExtraContent.right
    : tabBarExtraContent;

  return (
    <div
      className={cn(
        prefixCls,
        `${prefixCls}-${tabPosition}`,
        `${prefixCls}-${size}`,
        card && `${prefixCls}-card`,
        editable && `${prefixCls}-editable-card`,
        centered && `${prefixCls}-centered`,
        tabs({ position: tabPosition }),
        className
      )}
      style={{ ...tokenStyle, ...style }}
    >
      <div
        className={cn(`${prefixCls}-nav`, tabsNav({ position: tabPosition, centered }))}
      >
        {extraLeft !== undefined && (
          <div className={cn(`${prefixCls}-extra-content`, "me-4 flex-none")}>
            {extraLeft}
          </div>
        )}
        <div
          role="tablist"
          aria-orientation={vertical ? "vertical" : "horizontal"}
          className={cn(`${prefixCls}-nav-list`, tabsList({ vertical, card }))}
          style={tabBarGutter !== undefined ? { gap: tabBarGutter } : undefined}
        >
          {items.map((item, index) => {
            const selected = item.key === active;
            const disabled = item.disabled === true;
            const closable = editable && item.closable !== false && !disabled;
            return (
              <div
                key={item.key}
                ref={(node) => {
                  if (node) tabRefs.current.set(item.key, node);
                  else tabRefs.current.delete(item.key);
                }}
                role="tab"
                id={`${baseId}-tab-${item.key}`}
                aria-selected={selected}
                aria-controls={`${baseId}-panel-${item.key}`}
                aria-disabled={disabled || undefined}
                tabIndex={selected ? 0 : -1}
                className={cn(
                  `${prefixCls}-tab`,
                  selected && `${prefixCls}-tab-active`,
                  disabled && `${prefixCls}-tab-disabled`,
                  tab({ size, active: selected, disabled, card, vertical })
                )}
                onClick={(event) => {
                  if (!disabled) select(item.key, event);
                }}
                onKeyDown={(event) => onKeyDown(event, index)}
              >
                {item.icon !== undefined && (
                  <span className={cn(`${prefixCls}-tab-icon`, "inline-flex")}>
                    {item.icon}
                  </span>
                )}
                <span className={`${prefixCls}-tab-btn`}>{item.label}</span>
                {closable && (
                  <button
                    type="button"
                    tabIndex={-1}
                    aria-label={locale.remove}
                    className={cn(`${prefixCls}-tab-remove`, tabsRemove())}
                    onClick={(event) => {
                      event.stopPropagation();
                      onEdit?.(item.key, "remove");
                    }}
                  >
                    {item.closeIcon ?? <X className="size-3" aria-hidden />}
                  </button>
                )}
              </div>
            );
          })}
          {editable && !hideAdd && (
            <button
              type="button"
              aria-label={locale.add}
              className={cn(`${prefixCls}-nav-add`, tabsAdd())}
              onClick={(event) => onEdit?.(event, "add")}
            >
              {addIcon ?? <Plus className="size-3.5" aria-hidden />}
            </button>
          )}
          {!card && (
            <div
              aria-hidden
              className={cn(
                `${prefixCls}-ink-bar`,
                animated && `${prefixCls}-ink-bar-animated`,
                tabsInkBar({ position: tabPosition }),
                !animated && "transition-none"
              )}
              style={ink}
            />
          )}
        </div>
        {extraRight !== undefined && extraRight !== null && (
          <div className={cn(`${prefixCls}-extra-content`, tabsExtra())}>
            {extraRight}
          </div>
        )}
      </div>
      <div className={`${prefixCls}-content-holder`}>
        {items.map((item) => {
          const selected = item.key === active;
          const render =
            selected ||
            item.forceRender === true ||
            (!destroyInactiveTabPane && visited.has(item.key));
          if (!render) return null;
          return (
            <div
              key={item.key}
              role="tabpanel"
              id={`${baseId}-panel-${item.key}`}
              aria-labelledby={`${baseId}-tab-${item.key}`}
              tabIndex={selected ? 0 : -1}
              hidden={!selected}
              className={cn(
                `${prefixCls}-tabpane`,
                selected && `${prefixCls}-tabpane-active`,
                tabsPanel({ hidden: !selected })
              )}
            >
              {item.children}
            </div>
          );
        })}
      </div>
    </div>
  );
}
