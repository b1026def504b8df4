// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/general/FloatButton`
 * Purpose: Floating action button with optional tooltip, badge and description; Group and BackTop variants.
 * Scope: Fixed-position buttons. BackTop listens to window (or a target) scroll.
 * Invariants:
 * - BackTop renders only while the scroll offset is >= visibilityHeight.
 * - A controlled Group ignores its internal open state.
 * Side-effects: IO (scroll listener, window.scrollTo)
 * @public
 */

"use client";

import { ChevronUp, Plus, X } from "lucide-react";
import type {
  ButtonHTMLAttributes,
  CSSProperties,
  MouseEvent,
  ReactNode,
} from "react";
import { createContext, forwardRef, useContext, useEffect, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import { floatButton, floatButtonDescription, floatButtonGroup } from "@/styles/ui";

import { Badge } from "../data-display/Badge";
import type { BadgeProps } from "../data-display/Badge";
import { Tooltip } from "../data-display/Tooltip";
import { useComponentConfig, useLocale } from "../theme";

export interface FloatButtonProps
  extends Omit<ButtonHTMLAttributes<HTMLButtonElement>, "type" | "className"> {
  className?: string;
  icon?: ReactNode;
  description?: ReactNode;
  tooltip?: ReactNode;
  type?: "default" | "primary";
  shape?: "circle" | "square";
  badge?: Pick<BadgeProps, "count" | "dot" | "overflowCount" | "showZero" | "color">;
  href?: string;
  target?: string;
}

const defaultPosition: CSSProperties = { insetInlineEnd: 24, bottom: 48 };

// Buttons inside a Group are laid out by the group instead of fixed
const InGroupContext = createContext(false);

const FloatButtonBase = forwardRef<HTMLButtonElement, FloatButtonProps>(
  (
    {
      icon,
      description,
      tooltip,
      type = "default",
      shape = "circle",
      badge,
      href,
      target,
      className,
      style,
      onClick,
      ...props
    },
    ref
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig(
      "FloatButton",
      "float-btn"
    );
    const inGroup = useContext(InGroupContext);

    const body = (
      <>
        <span className="inline-flex text-ant-lg" aria-hidden={description ? true : undefined}>
          {icon ?? (description ? null : <Plus className="h-[1em] w-[1em]" />)}
        </span>
        {description && shape === "square" && (
          <span className={floatButtonDescription()}>{description}</span>
        )}
      </>
    );
    const badged = badge ? <Badge {...badge}>{body}</Badge> : body;

    const handleClick = (event: MouseEvent<HTMLButtonElement>) => {
      if (href) window.open(href, target ?? "_self");
      onClick?.(event);
    };

    const node = (
      <button
        ref={ref}
        type="button"
        className={cn(
          prefixCls,
          `${prefixCls}-${type}`,
          floatButton({ type, shape }),
          inGroup && "static",
          className
        )}
        style={{ ...(inGroup ? {} : defaultPosition), ...tokenStyle, ...style }}
        onClick={handleClick}
        {...props}
      >
        {badged}
      </button>
    );

    return tooltip ? (
      <Tooltip title={tooltip} placement="left">
        {node}
      </Tooltip>
    ) : (
      node
    );
  }
);
FloatButtonBase.displayName = "FloatButton";

export interface FloatButtonGroupProps {
  children?: ReactNode;
  className?: string;
  style?: CSSProperties;
  shape?: "circle" | "square";
  type?: "default" | "primary";
  /** Without a trigger the group is always expanded. */
  trigger?: "click" | "hover";
  open?: boolean;
  defaultOpen?: boolean;
  onOpenChange?: (open: boolean) => void;
  icon?: ReactNode;
  closeIcon?: ReactNode;
  placement?: "top" | "bottom" | "left" | "right";
}

function FloatButtonGroup({
  children,
  className,
  style,
  shape = "circle",
  type = "default",
  trigger,
  open,
  defaultOpen = false,
  onOpenChange,
  icon,
  closeIcon,
  placement = "top",
}: FloatButtonGroupProps) {
  const { prefixCls } = useComponentConfig("FloatButton", "float-btn");
  const [isOpen, setOpen] = useControllableState({
    value: open,
    defaultValue: defaultOpen,
    onChange: onOpenChange,
  });
  const expanded = trigger === undefined || isOpen;

  return (
    <div
      className={cn(`${prefixCls}-group`, floatButtonGroup({ placement }), className)}
      style={{ ...defaultPosition, ...style }}
      onMouseEnter={trigger === "hover" ? () => setOpen(true) : undefined}
      onMouseLeave={trigger === "hover" ? () => setOpen(false) : undefined}
    >
      <InGroupContext.Provider value>
        {expanded && (
          <div
            className={cn(
              `${prefixCls}-group-list`,
              floatButtonGroup({ placement }),
              "static"
            )}
          >
            {children}
          </div>
        )}
        {trigger !== undefined && (
          <FloatButtonBase
            shape={shape}
            type={type}
            aria-expanded={isOpen}
            icon={
              isOpen
                ? (closeIcon ?? <X className="h-[1em] w-[1em]" />)
                : (icon ?? <Plus className="h-[1em] w-[1em]" />)
            }
            onClick={trigger === "click" ? () => setOpen(!isOpen) : undefined}
          />
        )}
      </InGroupContext.Provider>
    </div>
  );
}

export interface BackTopProps extends Omit<FloatButtonProps, "onClick"> {
  /** Scroll offset in px at which the button appears. */
  visibilityHeight?: number;
  getTarget?: () => HTMLElement | Window;
  onClick?: (event: MouseEvent<HTMLButtonElement>) => void;
}

function scrollOffset(target: HTMLElement | Window): number {
  return target instanceof Window ? target.scrollY : target.scrollTop;
}

function BackTop({
  visibilityHeight = 400,
  getTarget,
  onClick,
  icon,
  ...props
}: BackTopProps) {
  const locale = useLocale("FloatButton");
  const [visible, setVisible] = useState(false);

  useEffect(() => {
    const target = getTarget?.() ?? window;
    const handleScroll = () => {
      setVisible(scrollOffset(target) >= visibilityHeight);
    };
    handleScroll();
    target.addEventListener("scroll", handleScroll, { passive: true });
    return () => target.removeEventListener("scroll", handleScroll);
  }, [getTarget, visibilityHeight]);

  if (!visible) return null;

  return (
    <FloatButtonBase
      aria-label={locale.backTop}
      icon={icon ?? <ChevronUp className="h-[1em] w-[1em]" />}
      onClick={(event) => {
        const target = getTarget?.() ?? window;
        target.scrollTo({ top: 0, behavior: "smooth" });
        onClick?.(event);
      }}
      {...props}
    />
  );
}
BackTop.displayName = "FloatButton.BackTop";

export const FloatButton = Object.assign(FloatButtonBase, {
  Group: FloatButtonGroup,
  BackTop,
});
