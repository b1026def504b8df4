// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Card`
 * Purpose: Bordered container with head, cover, body and action bar; Card.Meta and Card.Grid helpers.
 * Scope: Optional tab bar in the head (tabList), skeleton while loading, inner and small variants.
 * Invariants: The head renders only when a title, extra or tabList is given.
 * Side-effects: none
 * @public
 */

"use client";

import type { CSSProperties, HTMLAttributes, ReactNode } from "react";
import { forwardRef } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import {
  card,
  cardActions,
  cardBody,
  cardCover,
  cardGrid,
  cardHead,
  cardHeadWrapper,
  cardMeta,
  cardMetaDescription,
  cardMetaTitle,
} from "@/styles/ui";

import { Skeleton } from "../feedback/Skeleton";
import { Tabs } from "../navigation/Tabs";
import { useComponentConfig } from "../theme";

export interface CardTab {
  key: string;
  label: ReactNode;
  disabled?: boolean;
}

export interface CardProps
  extends Omit<HTMLAttributes<HTMLDivElement>, "className" | "title"> {
  className?: string;
  title?: ReactNode;
  extra?: ReactNode;
  cover?: ReactNode;
  actions?: ReactNode[];
  bordered?: boolean;
  hoverable?: boolean;
  loading?: boolean;
  size?: "default" | "small";
  type?: "inner";
  tabList?: CardTab[];
  activeTabKey?: string;
  defaultActiveTabKey?: string;
  onTabChange?: (key: string) => void;
  tabBarExtraContent?: ReactNode;
  headStyle?: CSSProperties;
  bodyStyle?: CSSProperties;
}

const CardRoot = forwardRef<HTMLDivElement, CardProps>(
  (
    {
      title,
      extra,
      cover,
      actions,
      bordered = true,
      hoverable = false,
      loading = false,
      size = "default",
      type,
      tabList,
      activeTabKey,
      defaultActiveTabKey,
      onTabChange,
      tabBarExtraContent,
      headStyle,
      bodyStyle,
      className,
      style,
      children,
      ...props
    },
    ref
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig("Card", "card");
    const [activeTab, setActiveTab] = useControllableState({
      value: activeTabKey,
      defaultValue: defaultActiveTabKey ?? tabList?.[0]?.key ?? "",
      onChange: onTabChange,
    });
    const hasTabs = tabList !== undefined && tabList.length > 0;
    const hasHead =
      title !== undefined || extra !== undefined || hasTabs;

    return (
      <div
        ref={ref}
        className={cn(
          prefixCls,
          bordered && `${prefixCls}-bordered`,
          hoverable && `${prefixCls}-hoverable`,
          loading && `${prefixCls}-loading`,
          size === "small" && `${prefixCls}-small`,
          type === "inner" && `${prefixCls}-type-inner`,
          card({ bordered, hoverable }),
          className
        )}
        style={{ ...tokenStyle, ...style }}
        {...props}
      >
        {hasHead && (
          <div
            className={cn(
              `${prefixCls}-head`,
              cardHead({ size }),
              type === "inner" && "bg-fill-quaternary"
            )}
            style={headStyle}
          >
            <div className={cn(`${prefixCls}-head-wrapper`, cardHeadWrapper())}>
              {title !== undefined && (
                <div
                  className={cn(
                    `${prefixCls}-head-title`,
                    "flex-1 truncate py-3"
                  )}
                >
                  {title}
                </div>
              )}
              {extra !== undefined && (
                <div className={cn(`${prefixCls}-extra`, "ms-auto font-normal")}>
                  {extra}
                </div>
              )}
            </div>
            {hasTabs && (
              <Tabs
                className={`${prefixCls}-head-tabs`}
                size={size === "small" ? "small" : "large"}
                activeKey={activeTab}
                onChange={setActiveTab}
                tabBarExtraContent={tabBarExtraContent}
                items={tabList.map((tab) => ({
                  key: tab.key,
                  label: tab.label,
                  disabled: tab.disabled,
                }))}
              />
            )}
          </div>
        )}
        {cover !== undefined && (
          <div className={cn(`${prefixCls}-cover`, cardCover())}>{cover}</div>
        )}
        <div
          className={cn(`${prefixCls}-body`, cardBody({ size }))}
          style={bodyStyle}
        >
          {loading ? (
            <Skeleton active title={false} paragraph={{ rows: 4 }} />
          ) : (
            children
          )}
        </div>
        {actions !== undefined && actions.length > 0 && (
          <ul className={cn(`${prefixCls}-actions`, cardActions())}>
            {actions.map((action, index) => (
              // biome-ignore lint/suspicious/noArrayIndexKey: actions are positional
              <li key={index} style={{ width: `${100 / actions.length}%` }}>
                <span>{action}</span>
              </li>
            ))}
          </ul>
        )}
      </div>
    );
  }
);
CardRoot.displayName = "Card";

export interface CardMetaProps {
  className?: string;
  style?: CSSProperties;
  avatar?: ReactNode;
  title?: ReactNode;
  description?: ReactNode;
}

function CardMeta({ avatar, title, description, className, style }: CardMetaProps) {
  const { prefixCls } = useComponentConfig("Card", "card-meta");
  return (
    <div className={cn(prefixCls, cardMeta(), className)} style={style}>
      {avatar !== undefined && (
        <div className={`${prefixCls}-avatar`}>{avatar}</div>
      )}
      <div className={cn(`${prefixCls}-detail`, "min-w-0 flex-1")}>
        {title !== undefined && (
          <div className={cn(`${prefixCls}-title`, cardMetaTitle())}>{title}</div>
        )}
        {description !== undefined && (
          <div className={cn(`${prefixCls}-description`, cardMetaDescription())}>
            {description}
          </div>
        )}
      </div>
    </div>
  );
}
CardMeta.displayName = "Card.Meta";

export interface CardGridProps extends HTMLAttributes<HTMLDivElement> {
  hoverable?: boolean;
}

function CardGrid({ hoverable = true, className, ...props }: CardGridProps) {
  const { prefixCls } = useComponentConfig("Card", "card-grid");
  return (
    <div
      className={cn(
        prefixCls,
        hoverable && `${prefixCls}-hoverable`,
        cardGrid({ hoverable }),
        className
      )}
      {...props}
    />
  );
}
CardGrid.displayName = "Card.Grid";

export const Card = Object.assign(CardRoot, { Meta: CardMeta, Grid: CardGrid });
