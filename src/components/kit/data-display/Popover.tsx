// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Popover`
 * Purpose: Floating card with a title and arbitrary content.
 * Scope: Same trigger and placement surface as Tooltip.
 * Invariants: With neither title nor content the child renders alone.
 * Side-effects: none
 * @public
 */

"use client";

import type { CSSProperties, ReactElement, ReactNode } from "react";

import { cn } from "@/shared/util";
import { popoverArrow, popoverContent, popoverTitle } from "@/styles/ui";

import { useComponentConfig } from "../theme";
import type { PopupOptions } from "./Popup";
import { Popup } from "./Popup";
import { resolvePopupColor } from "./Tooltip";

export interface PopoverProps extends PopupOptions {
  title?: ReactNode | (() => ReactNode);
  content?: ReactNode | (() => ReactNode);
  color?: string;
  overlayClassName?: string;
  overlayStyle?: CSSProperties;
  children: ReactElement;
}

const render = (node: ReactNode | (() => ReactNode)): ReactNode =>
  typeof node === "function" ? node() : node;

const isEmpty = (node: ReactNode): boolean =>
  node === undefined || node === null || node === false || node === "";

export function Popover({
  title,
  content,
  color,
  overlayClassName,
  overlayStyle,
  children,
  ...popup
}: PopoverProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Popover",
    "popover"
  );
  const titleNode = render(title);
  const contentNode = render(content);
  if (isEmpty(titleNode) && isEmpty(contentNode)) return children;

  const background = color ? resolvePopupColor(color) : undefined;

  return (
    <Popup
      {...popup}
      role="dialog"
      content={
        <div className={`${prefixCls}-inner`}>
          {!isEmpty(titleNode) && (
            <div className={cn(`${prefixCls}-title`, popoverTitle())}>
              {titleNode}
            </div>
          )}
          <div className={`${prefixCls}-inner-content`}>{contentNode}</div>
        </div>
      }
      className={cn(prefixCls, popoverContent(), overlayClassName)}
      style={{
        ...tokenStyle,
        ...(background ? { background } : {}),
        ...overlayStyle,
      }}
      arrowClassName={popoverArrow()}
      arrowStyle={background ? { fill: background } : undefined}
    >
      {children}
    </Popup>
  );
}
