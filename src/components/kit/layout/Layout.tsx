// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/layout/Layout`
 * Purpose: Page skeleton: Layout with Header, Content, Footer and a collapsible Sider.
 * Scope: A Sider registers itself with the nearest Layout, which then lays out horizontally.
 * Invariants: Sider width is `width` when expanded and `collapsedWidth` when collapsed; `trigger={null}` hides the trigger.
 * Side-effects: none
 * @public
 */

"use client";

import { ChevronLeft, ChevronRight } from "lucide-react";
import type { HTMLAttributes, ReactNode } from "react";
import {
  createContext,
  forwardRef,
  useContext,
  useEffect,
  useMemo,
  useState,
} from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import {
  layout,
  layoutContent,
  layoutFooter,
  layoutHeader,
  layoutSider,
  layoutSiderTrigger,
} from "@/styles/ui";

import { useComponentConfig, useLocale } from "../theme";

interface LayoutContextValue {
  addSider: (id: string) => void;
  removeSider: (id: string) => void;
}

const LayoutContext = createContext<LayoutContextValue | null>(null);

export type LayoutTheme = "light" | "dark";

export interface LayoutProps
  extends Omit<HTMLAttributes<HTMLElement>, "className"> {
  className?: string;
  /** Forces horizontal flow without waiting for a Sider to register. */
  hasSider?: boolean;
}

const LayoutRoot = forwardRef<HTMLElement, LayoutProps>(
  ({ hasSider, className, style, ...props }, ref) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig(
      "Layout",
      "layout"
    );
    const [siders, setSiders] = useState<readonly string[]>([]);
    const context = useMemo<LayoutContextValue>(
      () => ({
        addSider: (id) => setSiders((prev) => [...prev, id]),
        removeSider: (id) => setSiders((prev) => prev.filter((s) => s !== id)),
      }),
      []
    );
    const horizontal = hasSider ?? siders.length > 0;

    return (
      <LayoutContext.Provider value={context}>
        <section
          ref={ref}
          className={cn(
            prefixCls,
            horizontal && `${prefixCls}-has-sider`,
            layout({ hasSider: horizontal }),
            className
          )}
          style={{ ...tokenStyle, ...style }}
          {...props}
        />
      </LayoutContext.Provider>
    );
  }
);
LayoutRoot.displayName = "Layout";

interface SectionProps extends Omit<HTMLAttributes<HTMLElement>, "className"> {
  className?: string;
}

export interface HeaderProps extends SectionProps {
  theme?: LayoutTheme;
}

const Header = forwardRef<HTMLElement, HeaderProps>(
  ({ theme = "dark", className, ...props }, ref) => {
    const { prefixCls } = useComponentConfig("Layout", "layout-header");
    return (
      <header
        ref={ref}
        className={cn(prefixCls, layoutHeader({ theme }), className)}
        {...props}
      />
    );
  }
);
Header.displayName = "Layout.Header";

const Content = forwardRef<HTMLElement, SectionProps>(
  ({ className, ...props }, ref) => {
    const { prefixCls } = useComponentConfig("Layout", "layout-content");
    return (
      <main
        ref={ref}
        className={cn(prefixCls, layoutContent(), className)}
        {...props}
      />
    );
  }
);
Content.displayName = "Layout.Content";

const Footer = forwardRef<HTMLElement, SectionProps>(
  ({ className, ...props }, ref) => {
    const { prefixCls } = useComponentConfig("Layout", "layout-footer");
    return (
      <footer
        ref={ref}
        className={cn(prefixCls, layoutFooter(), className)}
        {...props}
      />
    );
  }
);
Footer.displayName = "Layout.Footer";

export type CollapseType = "clickTrigger";

export interface SiderProps extends SectionProps {
  collapsible?: boolean;
  collapsed?: boolean;
  defaultCollapsed?: boolean;
  onCollapse?: (collapsed: boolean, type: CollapseType) => void;
  width?: number | string;
  collapsedWidth?: number | string;
  /** Custom trigger node; `null` hides it. */
  trigger?: ReactNode;
  reverseArrow?: boolean;
  theme?: LayoutTheme;
}

let siderSeed = 0;

const Sider = forwardRef<HTMLElement, SiderProps>(
  (
    {
      collapsible = false,
      collapsed: collapsedProp,
      defaultCollapsed = false,
      onCollapse,
      width = 200,
      collapsedWidth = 80,
      trigger,
      reverseArrow = false,
      theme = "dark",
      className,
      style,
      children,
      ...props
    },
    ref
  ) => {
    const { prefixCls } = useComponentConfig("Layout", "layout-sider");
    const locale = useLocale("Layout");
    const layoutContext = useContext(LayoutContext);
    const [id] = useState(() => {
      siderSeed += 1;
      return `sider-${siderSeed}`;
    });
    const [collapsed, setCollapsed] = useControllableState({
      value: collapsedProp,
      defaultValue: defaultCollapsed,
    });

    useEffect(() => {
      if (!layoutContext) return undefined;
      layoutContext.addSider(id);
      return () => layoutContext.removeSider(id);
    }, [layoutContext, id]);

    const toggle = () => {
      const next = !collapsed;
      setCollapsed(next);
      onCollapse?.(next, "clickTrigger");
    };

    const rawWidth = collapsed ? collapsedWidth : width;
    const siderWidth = typeof rawWidth === "number" ? `${rawWidth}px` : rawWidth;
    const showTrigger = collapsible && trigger !== null;
    const pointsLeft = reverseArrow ? collapsed : !collapsed;
    const defaultTrigger = pointsLeft ? (
      <ChevronLeft className="size-4" aria-hidden />
    ) : (
      <ChevronRight className="size-4" aria-hidden />
    );

    return (
      <aside
        ref={ref}
        className={cn(
          prefixCls,
          `${prefixCls}-${theme}`,
          collapsed && `${prefixCls}-collapsed`,
          layoutSider({ theme, hasTrigger: showTrigger }),
          className
        )}
        style={{
          flex: `0 0 ${siderWidth}`,
          maxWidth: siderWidth,
          minWidth: siderWidth,
          width: siderWidth,
          ...style,
        }}
        {...props}
      >
        <div className={`${prefixCls}-children`}>{children}</div>
        {showTrigger && (
          <button
            type="button"
            aria-label={collapsed ? locale.expand : locale.collapse}
            aria-expanded={!collapsed}
            className={cn(
              `${prefixCls}-trigger`,
              layoutSiderTrigger({ theme })
            )}
            style={{ width: siderWidth }}
            onClick={toggle}
          >
            {trigger ?? defaultTrigger}
          </button>
        )}
      </aside>
    );
  }
);
Sider.displayName = "Layout.Sider";

export const Layout = Object.assign(LayoutRoot, {
  Header,
  Content,
  Footer,
  Sider,
});
