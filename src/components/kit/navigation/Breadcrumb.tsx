// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/navigation/Breadcrumb`
 * Purpose: Trail of links to the current page.
 * Scope: Items may carry an href, an onClick or a dropdown menu; itemRender replaces the default link.
 * Invariants: The last item is plain text with `aria-current="page"`.
 * Side-effects: none
 * @public
 */

"use client";

import { ChevronDown } from "lucide-react";
import type { CSSProperties, MouseEvent, ReactNode } from "react";
import { Fragment } from "react";

import { cn } from "@/shared/util";
import {
  breadcrumb,
  breadcrumbItem,
  breadcrumbLink,
  breadcrumbSeparator,
} from "@/styles/ui";

import { useComponentConfig, useLocale } from "../theme";
import type { DropdownMenuProps } from "./Dropdown";
import { Dropdown } from "./Dropdown";

export interface BreadcrumbItem {
  key?: string;
  title?: ReactNode;
  href?: string;
  /** Path segment; joined with the segments before it into the `paths` passed to itemRender. */
  path?: string;
  onClick?: (event: MouseEvent<HTMLElement>) => void;
  menu?: DropdownMenuProps;
  className?: string;
}

export interface BreadcrumbProps {
  className?: string;
  style?: CSSProperties;
  items: BreadcrumbItem[];
  separator?: ReactNode;
  itemRender?: (
    item: BreadcrumbItem,
    items: BreadcrumbItem[],
    paths: string[]
  ) => ReactNode;
}

/** Cumulative paths for items that declare a `path`: `["a", "a/b"]`. */
export function getBreadcrumbPaths(items: readonly BreadcrumbItem[]): string[] {
  const paths: string[] = [];
  for (const item of items) {
    if (item.path === undefined) continue;
    const segment = item.path.replace(/^\//, "");
    const previous = paths[paths.length - 1];
    paths.push(previous ? `${previous}/${segment}` : segment);
  }
  return paths;
}

export function Breadcrumb({
  items,
  separator = "/",
  itemRender,
  className,
  style,
}: BreadcrumbProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Breadcrumb",
    "breadcrumb"
  );
  const locale = useLocale("Breadcrumb");

  return (
    <nav
      aria-label={locale.label}
      className={cn(prefixCls, className)}
      style={{ ...tokenStyle, ...style }}
    >
      <ol className={breadcrumb()}>
        {items.map((item, index) => {
          const last = index === items.length - 1;
          const paths = getBreadcrumbPaths(items.slice(0, index + 1));
          const interactive = !last && (item.href !== undefined || item.onClick !== undefined);
          let content: ReactNode;

          if (itemRender) {
            content = itemRender(item, items, paths);
          } else if (!last && item.href !== undefined) {
            content = (
              <a
                href={item.href}
                onClick={item.onClick}
                className={cn(`${prefixCls}-link`, breadcrumbLink({ interactive }))}
              >
                {item.title}
              </a>
            );
          } else {
            content = (
              <span
                aria-current={last ? "page" : undefined}
                onClick={last ? undefined : item.onClick}
                className={cn(`${prefixCls}-link`, breadcrumbLink({ interactive }))}
              >
                {item.title}
              </span>
            );
          }

          if (item.menu) {
            content = (
              <Dropdown menu={item.menu} placement="bottomLeft">
                <span
                  className={cn(
                    `${prefixCls}-overlay-link`,
                    breadcrumbLink({ interactive: true })
                  )}
                >
                  {content}
                  <ChevronDown className="size-3" aria-hidden />
                </span>
              </Dropdown>
            );
          }

          return (
            <Fragment key={item.key ?? index}>
              <li
                className={cn(
                  breadcrumbItem({ current: last }),
                  item.className
                )}
              >
                {content}
              </li>
              {!last && (
                <li
                  aria-hidden
                  className={cn(`${prefixCls}-separator`, breadcrumbSeparator())}
                >
                  {separator}
                </li>
              )}
            </Fragment>
          );
        })}
      </ol>
    </nav>
  );
}
