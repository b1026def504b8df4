// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/general/Button`
 * Purpose: Ant Design button: type/color/variant styling, loading with optional delay, icon placement, link rendering and click wave.
 * Scope: Renders a `button`, an `a` when `href` is set, or the child element with `asChild`. Does not submit forms itself.
 * Invariants:
 * - Forwards ref; accepts aria-* and data-* unchanged.
 * - Disabled or loading suppresses onClick; a disabled link renders without href.
 * - Two CJK characters get a space inserted unless autoInsertSpace is false or an icon is present.
 * Side-effects: time (loading delay timer)
 * Notes: Uses CVA factory from \@/styles/ui; colors flow through `--btn-*` variables.
 * Links: button-utils.ts, Wave.tsx
 * @public
 */

"use client";

import { useComposedRefs } from "@radix-ui/react-compose-refs";
import { Slot } from "@radix-ui/react-slot";
import { Loader2 } from "lucide-react";
import type {
  ButtonHTMLAttributes,
  MouseEvent,
  ReactNode,
} from "react";
import { forwardRef, isValidElement, useEffect, useMemo, useState } from "react";

import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import { button, buttonIcon } from "@/styles/ui";
import type { ButtonVariant } from "@/styles/ui";

import { useComponentConfig, useComponentSize } from "../theme";
import type { ButtonColor, ButtonType } from "./button-utils";
import {
  getButtonColorVars,
  insertSpace,
  resolveButtonAppearance,
} from "./button-utils";
import { Wave } from "./Wave";

export type ButtonElement = HTMLButtonElement | HTMLAnchorElement;

export interface ButtonProps
  extends Omit<
    ButtonHTMLAttributes<HTMLElement>,
    "type" | "color" | "className"
  > {
  /** Layout overrides only; colors stay variant-driven. */
  className?: string;
  type?: ButtonType;
  color?: ButtonColor;
  variant?: ButtonVariant;
  danger?: boolean;
  ghost?: boolean;
  block?: boolean;
  shape?: "default" | "circle" | "round";
  size?: SizeType;
  icon?: ReactNode;
  iconPosition?: "start" | "end";
  loading?: boolean | { delay?: number };
  href?: string;
  target?: string;
  rel?: string;
  htmlType?: "button" | "submit" | "reset";
  /** Inserts a space between two CJK characters. */
  autoInsertSpace?: boolean;
  asChild?: boolean;
}

function useDelayedLoading(loading: ButtonProps["loading"]): boolean {
  const enabled = Boolean(loading);
  const delay = typeof loading === "object" ? (loading.delay ?? 0) : 0;
  const [visible, setVisible] = useState(enabled && delay <= 0);

  useEffect(() => {
    if (!enabled || delay <= 0) {
      setVisible(enabled);
      return undefined;
    }
    const id = setTimeout(() => setVisible(true), delay);
    return () => clearTimeout(id);
  }, [enabled, delay]);

  return visible;
}

export const Button = forwardRef<ButtonElement, ButtonProps>(
  (
    {
      type,
      color: colorProp,
      variant: variantProp,
      danger,
      ghost = false,
      block = false,
      shape = "default",
      size: sizeProp,
      icon,
      iconPosition = "start",
      loading = false,
      disabled = false,
      href,
      htmlType = "button",
      autoInsertSpace = true,
      asChild = false,
      onClick,
      children,
      className,
      style,
      ...props
    },
    forwardedRef
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig("Button", "btn");
    const size = useComponentSize(sizeProp);
    const innerLoading = useDelayedLoading(loading);
    const ref = useComposedRefs<ButtonElement>(forwardedRef);
    const { color, variant } = resolveButtonAppearance({
      type,
      color: colorProp,
      variant: variantProp,
      danger,
    });

    const colorStyle = useMemo(
      () => getButtonColorVars(color, variant, ghost),
      [color, variant, ghost]
    );

    const handleClick = (event: MouseEvent<HTMLElement>) => {
      if (innerLoading || disabled) {
        event.preventDefault();
        return;
      }
      onClick?.(event);
    };

    const iconNode = innerLoading ? (
      <span className={buttonIcon({ spin: true })} aria-hidden="true">
        <Loader2 className="h-[1em] w-[1em]" />
      </span>
    ) : icon ? (
      <span className={buttonIcon()} aria-hidden="true">
        {icon}
      </span>
    ) : null;

    const hasChildren = children !== undefined && children !== null && children !== false;
    const content =
      typeof children === "string" && autoInsertSpace && !icon
        ? insertSpace(children)
        : children;

    const classes = cn(
      prefixCls,
      `${prefixCls}-color-${color}`,
      `${prefixCls}-variant-${variant}`,
      innerLoading && `${prefixCls}-loading`,
      button({
        variant,
        size,
        shape,
        iconOnly: !hasChildren && iconNode !== null && shape === "default",
        block,
        ghost,
        disabled,
        loading: innerLoading,
      }),
      className
    );
    const mergedStyle = { ...tokenStyle, ...colorStyle, ...style };

    if (asChild) {
      if (!isValidElement(children)) {
        throw new Error(
          "Button with `asChild` expects a single React element child."
        );
      }
      return (
        <Slot
          data-slot="button"
          ref={ref}
          className={classes}
          style={mergedStyle}
          aria-disabled={disabled || undefined}
          onClick={handleClick}
          {...props}
        >
          {children}
        </Slot>
      );
    }

    const inner = (
      <>
        {iconPosition === "start" && iconNode}
        {hasChildren &&
          (typeof content === "string" || typeof content === "number" ? (
            <span>{content}</span>
          ) : (
            content
          ))}
        {iconPosition === "end" && iconNode}
      </>
    );

    const waveDisabled =
      disabled || innerLoading || variant === "text" || variant === "link";

    if (href !== undefined) {
      return (
        <Wave disabled={waveDisabled}>
          <a
            data-slot="button"
            ref={ref}
            href={disabled ? undefined : href}
            aria-disabled={disabled || undefined}
            aria-busy={innerLoading || undefined}
            className={classes}
            style={mergedStyle}
            onClick={handleClick}
            {...props}
          >
            {inner}
          </a>
        </Wave>
      );
    }

    return (
      <Wave disabled={waveDisabled}>
        <button
          data-slot="button"
          ref={ref}
          type={htmlType}
          disabled={disabled}
          aria-busy={innerLoading || undefined}
          className={classes}
          style={mergedStyle}
          onClick={handleClick}
          {...props}
        >
          {inner}
        </button>
      </Wave>
    );
  }
);
Button.displayName = "Button";
