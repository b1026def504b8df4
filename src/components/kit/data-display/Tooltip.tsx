// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Tooltip`
 * Purpose: Short hint shown next to a trigger element.
 * Scope: `title` content, twelve placements, hover/focus/click triggers with enter/leave delays, preset or custom color.
 * Invariants: Without a title the child renders alone; content carries `role="tooltip"`.
 * Side-effects: none
 * Links: src/components/kit/data-display/Popup.tsx
 * @public
 */

"use client";

import type { CSSProperties, ReactElement, ReactNode } from "react";

import { generateColorPalette, PRESET_COLORS } from "@/shared/theme";
import { cn } from "@/shared/util";
import { isPresetColor } from "@/styles/theme";
import { tooltipArrow, tooltipContent } from "@/styles/ui";

import { useComponentConfig } from "../theme";
import type { PopupOptions } from "./Popup";
import { Popup } from "./Popup";

export interface TooltipProps extends PopupOptions {
  title?: ReactNode | (() => ReactNode);
  /** Preset name (`blue`, `volcano`, ...) or any CSS color. */
  color?: string;
  overlayClassName?: string;
  overlayStyle?: CSSProperties;
  children: ReactElement;
}

export function resolvePopupColor(color: string): string {
  if (!isPresetColor(color)) return color;
  return generateColorPalette(PRESET_COLORS[color])[5] ?? color;
}

export function Tooltip({
  title,
  color,
  overlayClassName,
  overlayStyle,
  children,
  ...popup
}: TooltipProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Tooltip",
    "tooltip"
  );
  const content = typeof title === "function" ? title() : title;
  if (content === undefined || content === null || content === "") {
    return children;
  }

  const background = color ? resolvePopupColor(color) : undefined;
  const colored = background !== undefined;

  return (
    <Popup
      {...popup}
      role="tooltip"
      content={<div className={`${prefixCls}-inner`}>{content}</div>}
      className={cn(prefixCls, tooltipContent({ colored }), overlayClassName)}
      style={{
        ...tokenStyle,
        ...(background ? { background } : {}),
        ...overlayStyle,
      }}
      arrowClassName={tooltipArrow({ colored })}
      arrowStyle={background ? { fill: background } : undefined}
    >
      {children}
    </Popup>
  );
}
