// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Collapse`
 * Purpose: Expandable panels; accordion mode keeps at most one open.
 * Scope: Controlled or uncontrolled active keys, per-item collapsible area, lazy panel mounting.
 * Invariants:
 * - A panel mounts on first open and stays mounted unless destroyInactivePanel.
 * - `collapsible: "disabled"` items never toggle.
 * Side-effects: none
 * @public
 */

"use client";

import { ChevronRight } from "lucide-react";
import type { CSSProperties, KeyboardEvent, ReactNode } from "react";
import { useId, useRef } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn, toArray } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import {
  collapse,
  collapseArrow,
  collapseContent,
  collapseHeader,
  collapseItem,
} from "@/styles/ui";

import { useComponentConfig, useComponentSize } from "../theme";

export type CollapsibleType = "header" | "icon" | "disabled";

export interface CollapseItem {
  key: string;
  label: ReactNode;
  children?: ReactNode;
  extra?: ReactNode;
  showArrow?: boolean;
  collapsible?: CollapsibleType;
  forceRender?: boolean;
  className?: string;
  style?: CSSProperties;
}

export interface CollapseProps {
  className?: string;
  style?: CSSProperties;
  items: CollapseItem[];
  activeKey?: string | string[];
  defaultActiveKey?: string | string[];
  accordion?: boolean;
  onChange?: (keys: string[]) => void;
  bordered?: boolean;
  ghost?: boolean;
  expandIconPosition?: "start" | "end";
  expandIcon?: (panel: { isActive: boolean }) => ReactNode;
  size?: SizeType;
  collapsible?: CollapsibleType;
  destroyInactivePanel?: boolean;
}

/** Next active keys after toggling `key`. */
export function toggleActiveKey(
  active: readonly string[],
  key: string,
  accordion: boolean
): string[] {
  const isActive = active.includes(key);
  if (accordion) return isActive ? [] : [key];
  return isActive ? active.filter((k) => k !== key) : [...active, key];
}

export function Collapse({
  items,
  activeKey,
  defaultActiveKey,
  accordion = false,
  onChange,
  bordered = true,
  ghost = false,
  expandIconPosition = "start",
  expandIcon,
  size: sizeProp,
  collapsible,
  destroyInactivePanel = false,
  className,
  style,
}: CollapseProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Collapse",
    "collapse"
  );
  const size = useComponentSize(sizeProp);
  const baseId = useId();
  const [active, setActive] = useControllableState<string[]>({
    value: activeKey === undefined ? undefined : toArray(activeKey),
    defaultValue: toArray(defaultActiveKey),
    onChange,
  });
  const mounted = useRef(new Set<string>());
  const mergedBordered = bordered && !ghost;

  return (
    <div
      className={cn(
        prefixCls,
        !mergedBordered && `${prefixCls}-borderless`,
        ghost && `${prefixCls}-ghost`,
        `${prefixCls}-icon-position-${expandIconPosition}`,
        collapse({ bordered: mergedBordered, ghost }),
        className
      )}
      style={{ ...tokenStyle, ...style }}
      role={accordion ? "tablist" : undefined}
    >
      {items.map((item) => {
        const isActive = active.includes(item.key);
        if (isActive) mounted.current.add(item.key);
        const mode = item.collapsible ?? collapsible;
        const disabled = mode === "disabled";
        const showArrow = item.showArrow ?? true;
        const panelId = `${baseId}-panel-${item.key}`;
        const toggle = () => {
          if (!disabled) setActive(toggleActiveKey(active, item.key, accordion));
        };
        const onKeyDown = (event: KeyboardEvent) => {
          if (event.key === "Enter" || event.key === " ") {
            event.preventDefault();
            toggle();
          }
        };
        const triggerProps = {
          role: accordion ? "tab" : "button",
          tabIndex: disabled ? -1 : 0,
          "aria-expanded": isActive,
          "aria-controls": panelId,
          "aria-disabled": disabled || undefined,
          onClick: toggle,
          onKeyDown,
        };
        const wholeHeader = mode !== "header" && mode !== "icon";

        const icon = showArrow ? (
          <span
            className={cn(`${prefixCls}-expand-icon`, "inline-flex")}
            {...(mode === "icon" ? triggerProps : {})}
          >
            {expandIcon ? (
              expandIcon({ isActive })
            ) : (
              <ChevronRight
                aria-hidden
                className={collapseArrow({ open: isActive })}
              />
            )}
          </span>
        ) : null;
        const shouldRender =
          isActive ||
          item.forceRender === true ||
          (!destroyInactivePanel && mounted.current.has(item.key));

        return (
          <div
            key={item.key}
            className={cn(
              `${prefixCls}-item`,
              isActive && `${prefixCls}-item-active`,
              disabled && `${prefixCls}-item-disabled`,
              collapseItem({ bordered: mergedBordered }),
              item.className
            )}
            style={item.style}
          >
            <div
              className={cn(
                `${prefixCls}-header`,
                collapseHeader({ size, disabled, headerOnly: !wholeHeader })
              )}
              {...(wholeHeader ? triggerProps : {})}
            >
              {expandIconPosition === "start" && icon}
              <span
                className={cn(`${prefixCls}-header-text`, "flex-auto")}
                {...(mode === "header" ? triggerProps : {})}
              >
                {item.label}
              </span>
              {item.extra !== undefined && (
                <span className={`${prefixCls}-extra`}>{item.extra}</span>
              )}
              {expandIconPosition === "end" && icon}
            </div>
            {shouldRender && (
              <div
                id={panelId}
                role={accordion ? "tabpanel" : "region"}
                hidden={!isActive}
                className={cn(
                  `${prefixCls}-content`,
                  isActive
                    ? `${prefixCls}-content-active`
                    : `${prefixCls}-content-inactive`,
                  collapseContent({ size, bordered: mergedBordered, ghost })
                )}
              >
                {item.children}
              </div>
            )}
          </div>
        );
      })}
    </div>
  );
}
