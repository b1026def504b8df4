// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Badge`
 * Purpose: Count, dot or status marker attached to a child; Badge.Ribbon corner label.
 * Scope: Count overflow formatting, zero hiding, status dot with text, preset or custom colors, offset.
 * Invariants:
 * - A numeric count above overflowCount renders `${overflowCount}+`.
 * - A zero count is hidden unless showZero; a dot is never shown for zero.
 * - Without children a status or color renders a standalone dot with text.
 * Side-effects: none
 * @public
 */

import type { CSSProperties, HTMLAttributes, ReactNode } from "react";
import { forwardRef } from "react";

import { generateColorPalette, PRESET_COLORS } from "@/shared/theme";
import { cn } from "@/shared/util";
import { isPresetColor } from "@/styles/theme";
import {
  badge,
  badgeCount,
  badgeCustomCount,
  badgeRibbon,
  badgeRibbonCorner,
  badgeRibbonWrapper,
  badgeStatusDot,
  badgeStatusText,
} from "@/styles/ui";
import type { StatusColor } from "@/styles/ui";

import { useComponentConfig } from "../theme";

export function formatBadgeCount(count: number, overflowCount: number): string {
  return count > overflowCount ? `${overflowCount}+` : String(count);
}

/** Preset names resolve to their base shade; anything else is used as given. */
export function resolveMarkerColor(color: string): string {
  if (!isPresetColor(color)) return color;
  return generateColorPalette(PRESET_COLORS[color])[5] ?? color;
}

export interface BadgeProps
  extends Omit<HTMLAttributes<HTMLSpanElement>, "className" | "title"> {
  className?: string;
  count?: ReactNode;
  overflowCount?: number;
  dot?: boolean;
  showZero?: boolean;
  status?: StatusColor;
  text?: ReactNode;
  color?: string;
  size?: "default" | "small";
  /** `[x, y]` shift of the indicator from the top-end corner. */
  offset?: [number | string, number | string];
  title?: string;
}

const BadgeRoot = forwardRef<HTMLSpanElement, BadgeProps>(
  (
    {
      count,
      overflowCount = 99,
      dot = false,
      showZero = false,
      status,
      text,
      color,
      size = "default",
      offset,
      title,
      className,
      style,
      children,
      ...props
    },
    ref
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig(
      "Badge",
      "badge"
    );
    const displayCount =
      typeof count === "number" ? formatBadgeCount(count, overflowCount) : count;
    const isZero = displayCount === "0" || displayCount === 0;
    const ignoreCount =
      displayCount === undefined || displayCount === null || (isZero && !showZero);
    const hasChildren = children !== undefined && children !== null;
    const markerColor = color ? resolveMarkerColor(color) : undefined;

    if (!hasChildren && (status || color) && ignoreCount) {
      return (
        <span
          ref={ref}
          className={cn(
            prefixCls,
            `${prefixCls}-status`,
            badge({ standalone: true }),
            className
          )}
          style={{ ...tokenStyle, ...style }}
          {...props}
        >
          <span
            className={cn(
              `${prefixCls}-status-dot`,
              status && `${prefixCls}-status-${status}`,
              badgeStatusDot({ status: status ?? "default" })
            )}
            style={markerColor ? { background: markerColor } : undefined}
          />
          {text !== undefined && (
            <span className={cn(`${prefixCls}-status-text`, badgeStatusText())}>
              {text}
            </span>
          )}
        </span>
      );
    }

    const showAsDot = dot && !isZero;
    const hidden =
      !showAsDot &&
      (displayCount === undefined ||
        displayCount === null ||
        displayCount === "" ||
        (isZero && !showZero));
    const isCustomNode =
      displayCount !== undefined &&
      displayCount !== null &&
      typeof displayCount === "object";
    const indicatorTitle =
      title ??
      (typeof count === "number" || typeof count === "string"
        ? String(count)
        : undefined);

    const offsetStyle: CSSProperties = offset
      ? { insetInlineEnd: negate(offset[0]), marginTop: offset[1] }
      : {};

    const indicator = hidden ? null : isCustomNode && !showAsDot ? (
      <span
        className={cn(
          `${prefixCls}-count-custom`,
          badgeCustomCount({ floating: hasChildren })
        )}
        style={offsetStyle}
      >
        {displayCount}
      </span>
    ) : (
      <sup
        title={showAsDot ? undefined : indicatorTitle}
        className={cn(
          showAsDot ? `${prefixCls}-dot` : `${prefixCls}-count`,
          size === "small" && `${prefixCls}-count-sm`,
          badgeCount({ size, dot: showAsDot, floating: hasChildren })
        )}
        style={{
          ...offsetStyle,
          ...(markerColor ? { background: markerColor } : {}),
        }}
      >
        {showAsDot ? null : displayCount}
      </sup>
    );

    return (
      <span
        ref={ref}
        className={cn(
          prefixCls,
          !hasChildren && `${prefixCls}-not-a-wrapper`,
          badge({ standalone: !hasChildren }),
          className
        )}
        style={{ ...tokenStyle, ...style }}
        {...props}
      >
        {children}
        {indicator}
      </span>
    );
  }
);
BadgeRoot.displayName = "Badge";

function negate(value: number | string): number | string {
  return typeof value === "number" ? -value : `calc(-1 * ${value})`;
}

export interface RibbonProps {
  className?: string;
  style?: CSSProperties;
  text?: ReactNode;
  color?: string;
  placement?: "start" | "end";
  children?: ReactNode;
}

function Ribbon({
  text,
  color,
  placement = "end",
  className,
  style,
  children,
}: RibbonProps) {
  const { prefixCls } = useComponentConfig("Badge", "ribbon");
  const background = color ? resolveMarkerColor(color) : undefined;

  return (
    <div className={cn(`${prefixCls}-wrapper`, badgeRibbonWrapper())}>
      {children}
      <div
        className={cn(
          prefixCls,
          `${prefixCls}-placement-${placement}`,
          badgeRibbon({ placement }),
          className
        )}
        style={{ ...(background ? { background } : {}), ...style }}
      >
        <span className={`${prefixCls}-text`}>{text}</span>
        <div
          className={cn(`${prefixCls}-corner`, badgeRibbonCorner({ placement }))}
          style={background ? { color: background } : undefined}
        />
      </div>
    </div>
  );
}
Ribbon.displayName = "Badge.Ribbon";

export const Badge = Object.assign(BadgeRoot, { Ribbon });
