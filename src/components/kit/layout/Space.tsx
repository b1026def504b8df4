// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/layout/Space`
 * Purpose: Even spacing between inline children, optional split node; Space.Compact joins controls edge to edge.
 * Scope: Gap sizes come from the size tokens (small = sizeXS, middle = size, large = sizeLG).
 * Invariants: null, undefined and boolean children render no item and no split.
 * Side-effects: none
 * @public
 */

import type { HTMLAttributes, ReactNode } from "react";
import { Children, Fragment, useMemo } from "react";

import type { AliasToken } from "@/shared/theme";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import { space, spaceCompact, spaceItem } from "@/styles/ui";

import { CompactContext, useComponentConfig } from "../theme";

export type SpaceSize = SizeType | number;

export interface SpaceProps
  extends Omit<HTMLAttributes<HTMLDivElement>, "className"> {
  className?: string;
  direction?: "horizontal" | "vertical";
  size?: SpaceSize | [SpaceSize, SpaceSize];
  align?: "start" | "end" | "center" | "baseline";
  wrap?: boolean;
  split?: ReactNode;
}

export function spaceSizeToPx(size: SpaceSize, token: AliasToken): number {
  if (typeof size === "number") return size;
  if (size === "small") return token.sizeXS;
  if (size === "large") return token.sizeLG;
  return token.size;
}

function SpaceRoot({
  direction = "horizontal",
  size = "small",
  align,
  wrap = false,
  split,
  className,
  style,
  children,
  ...props
}: SpaceProps) {
  const { prefixCls, style: tokenStyle, token } = useComponentConfig(
    "Space",
    "space"
  );
  const [horizontal, vertical] = Array.isArray(size) ? size : [size, size];
  const columnGap = spaceSizeToPx(horizontal, token);
  const rowGap = spaceSizeToPx(vertical, token);
  const items = Children.toArray(children);
  const mergedAlign = align ?? (direction === "horizontal" ? "center" : undefined);

  return (
    <div
      className={cn(
        prefixCls,
        `${prefixCls}-${direction}`,
        space({ direction, align: mergedAlign ?? "none", wrap }),
        className
      )}
      style={{ ...tokenStyle, columnGap, rowGap, ...style }}
      {...props}
    >
      {items.map((child, index) => (
        // biome-ignore lint/suspicious/noArrayIndexKey: children carry their own keys through toArray
        <Fragment key={index}>
          {split !== undefined && index > 0 && (
            <span className={`${prefixCls}-item-split`}>{split}</span>
          )}
          <div className={cn(`${prefixCls}-item`, spaceItem())}>{child}</div>
        </Fragment>
      ))}
    </div>
  );
}
SpaceRoot.displayName = "Space";

export interface SpaceCompactProps
  extends Omit<HTMLAttributes<HTMLDivElement>, "className"> {
  className?: string;
  direction?: "horizontal" | "vertical";
  block?: boolean;
  size?: SizeType;
}

function SpaceCompact({
  direction = "horizontal",
  block = false,
  size,
  className,
  children,
  ...props
}: SpaceCompactProps) {
  const { prefixCls } = useComponentConfig("Space", "space-compact");
  const compact = useMemo(() => ({ size }), [size]);

  return (
    <CompactContext.Provider value={compact}>
      <div
        className={cn(prefixCls, spaceCompact({ direction, block }), className)}
        {...props}
      >
        {children}
      </div>
    </CompactContext.Provider>
  );
}
SpaceCompact.displayName = "Space.Compact";

export const Space = Object.assign(SpaceRoot, { Compact: SpaceCompact });
