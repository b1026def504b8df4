// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/layout/Flex`
 * Purpose: Flexbox container with Ant Design's vertical/wrap/justify/align/gap props.
 * Scope: Preset gaps map to size tokens; numeric and string gaps are inline styles.
 * Side-effects: none
 * @public
 */

import type { CSSProperties, ElementType, HTMLAttributes } from "react";

import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import { flex } from "@/styles/ui";

import { useComponentConfig } from "../theme";

type FlexJustify = NonNullable<Parameters<typeof flex>[0]>["justify"];
type FlexAlign = NonNullable<Parameters<typeof flex>[0]>["align"];

export interface FlexProps extends Omit<HTMLAttributes<HTMLElement>, "className"> {
  className?: string;
  vertical?: boolean;
  wrap?: boolean | "wrap" | "nowrap" | "wrap-reverse";
  justify?: NonNullable<FlexJustify>;
  align?: NonNullable<FlexAlign>;
  gap?: SizeType | number | string;
  flex?: CSSProperties["flex"];
  component?: ElementType;
}

const isPresetGap = (gap: FlexProps["gap"]): gap is SizeType =>
  gap === "small" || gap === "middle" || gap === "large";

function resolveWrap(wrap: FlexProps["wrap"]): boolean | "reverse" {
  if (wrap === "wrap-reverse") return "reverse";
  return wrap === true || wrap === "wrap";
}

export function Flex({
  vertical = false,
  wrap = false,
  justify,
  align,
  gap,
  flex: flexValue,
  component: Component = "div",
  className,
  style,
  ...props
}: FlexProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Flex", "flex");
  const presetGap = isPresetGap(gap) ? gap : "none";
  const inlineGap = gap !== undefined && !isPresetGap(gap) ? { gap } : {};

  return (
    <Component
      className={cn(
        prefixCls,
        vertical && `${prefixCls}-vertical`,
        flex({ vertical, wrap: resolveWrap(wrap), gap: presetGap, justify, align }),
        className
      )}
      style={{ ...tokenStyle, ...inlineGap, flex: flexValue, ...style }}
      {...props}
    />
  );
}
Flex.displayName = "Flex";
