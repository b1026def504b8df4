// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/layout/Grid`
 * Purpose: Row and Col for a 24-column grid with gutters.
 * Scope: Row shares its gutter with Cols through context; math lives in grid-utils.
 * Invariants: Gutter becomes half padding on each Col and a negative margin on the Row.
 * Side-effects: none
 * Links: src/components/kit/layout/grid-utils.ts
 * @public
 */

import type { HTMLAttributes } from "react";
import { createContext, forwardRef, useContext, useMemo } from "react";

import { cn } from "@/shared/util";
import { col, row } from "@/styles/ui";

import { useComponentConfig } from "../theme";
import type { ColLayout, Gutter } from "./grid-utils";
import { getColStyle, getRowStyle, normalizeGutter } from "./grid-utils";

const RowContext = createContext<{ gutter: [number, number] }>({
  gutter: [0, 0],
});

export interface RowProps
  extends Omit<HTMLAttributes<HTMLDivElement>, "className"> {
  className?: string;
  gutter?: Gutter;
  justify?:
    | "start"
    | "end"
    | "center"
    | "space-around"
    | "space-between"
    | "space-evenly";
  align?: "top" | "middle" | "bottom" | "stretch";
  wrap?: boolean;
}

export const Row = forwardRef<HTMLDivElement, RowProps>(
  (
    { gutter, justify, align, wrap = true, className, style, ...props },
    ref
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig("Grid", "row");
    const normalized = normalizeGutter(gutter);
    const [horizontal, vertical] = normalized;
    const context = useMemo(
      () => ({ gutter: [horizontal, vertical] satisfies [number, number] }),
      [horizontal, vertical]
    );

    return (
      <RowContext.Provider value={context}>
        <div
          ref={ref}
          className={cn(prefixCls, row({ wrap, justify, align }), className)}
          style={{ ...tokenStyle, ...getRowStyle(normalized), ...style }}
          {...props}
        />
      </RowContext.Provider>
    );
  }
);
Row.displayName = "Row";

export interface ColProps
  extends Omit<HTMLAttributes<HTMLDivElement>, "className">,
    ColLayout {
  className?: string;
}

export const Col = forwardRef<HTMLDivElement, ColProps>(
  (
    { span, offset, order, push, pull, flex, className, style, ...props },
    ref
  ) => {
    const { prefixCls } = useComponentConfig("Grid", "col");
    const { gutter } = useContext(RowContext);

    return (
      <div
        ref={ref}
        className={cn(
          prefixCls,
          span !== undefined && `${prefixCls}-${span}`,
          col({ hidden: span === 0 }),
          className
        )}
        style={{
          ...getColStyle({ span, offset, order, push, pull, flex }, gutter),
          ...style,
        }}
        {...props}
      />
    );
  }
);
Col.displayName = "Col";
