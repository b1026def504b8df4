// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/layout/Divider`
 * Purpose: Horizontal or vertical separator with optional inline text.
 * Scope: Text is only rendered for horizontal dividers.
 * Invariants: Renders `role="separator"` with aria-orientation.
 * Side-effects: none
 * @public
 */

import type { HTMLAttributes } from "react";
import { forwardRef } from "react";

import { cn } from "@/shared/util";
import { divider, dividerText } from "@/styles/ui";

import { useComponentConfig } from "../theme";

export interface DividerProps
  extends Omit<HTMLAttributes<HTMLDivElement>, "className"> {
  className?: string;
  type?: "horizontal" | "vertical";
  orientation?: "left" | "right" | "center";
  dashed?: boolean;
  plain?: boolean;
}

export const Divider = forwardRef<HTMLDivElement, DividerProps>(
  (
    {
      type = "horizontal",
      orientation = "center",
      dashed = false,
      plain = false,
      className,
      style,
      children,
      ...props
    },
    ref
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig(
      "Divider",
      "divider"
    );
    const withText = type === "horizontal" && children !== undefined && children !== null;

    return (
      <div
        ref={ref}
        role="separator"
        aria-orientation={type}
        className={cn(
          prefixCls,
          `${prefixCls}-${type}`,
          withText && `${prefixCls}-with-text-${orientation}`,
          divider({ type, dashed, withText, orientation, plain: withText && plain }),
          className
        )}
        style={{ ...tokenStyle, ...style }}
        {...props}
      >
        {withText && (
          <span className={cn(`${prefixCls}-inner-text`, dividerText())}>
            {children}
          </span>
        )}
      </div>
    );
  }
);
Divider.displayName = "Divider";
