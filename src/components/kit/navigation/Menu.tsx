// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/navigation/Menu`
 * Purpose: Item-driven navigation menu with submenus, groups and dividers in vertical, horizontal and inline modes.
 * Scope: Selection and open state are controllable; inline submenus expand in place, other modes open popups.
 * Invariants:
 * - `onClick` receives the key path from the clicked item outward.
 * - Single selection replaces the selection; `multiple` toggles keys and fires onDeselect.
 * - Clicking an item in a popup mode closes every popup.
 * - Popups honor subMenuOpenDelay and subMenuCloseDelay on hover.
 * Side-effects: none
 * Links: src/components/kit/navigation/menu-utils.ts, src/components/kit/data-display/Popup.tsx
 * @public
 */

"use client";

import { ChevronDown } from "lucide-react";
import type {
  CSSProperties,
  KeyboardEvent,
  MouseEvent,
  ReactNode,
} from "react";
import { createContext, useContext } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import {
  menu,
  menuDivider,
  menuGroupTitle,
  menuItem,
  menuPopup,
  menuSubList,
  menuSubTitleArrow,
} from "@/styles/ui";

import { Popup } from "../data-display/Popup";
import { Tooltip } from "../data-display/Tooltip";
import { useComponentConfig } from "../theme";
import type {
  MenuItem,
  MenuItemGroupType,
  MenuItemType,
  SubMenuType,
} from "./menu-utils";
import {
  findKeyPath,
  findParentKeys,
  isMenuDivider,
  isMenuGroup,
  isSubMenu,
} from "./menu-utils";

export type MenuMode = "vertical" | "horizontal" | "inline";
export type MenuTheme = "light" | "dark";

export interface MenuInfo {
  key: string;
  keyPath: string[];
  domEvent: MouseEvent<HTMLElement> | KeyboardEvent<HTMLElement>;
}

export interface SelectInfo extends MenuInfo {
  selectedKeys: string[];
}

export interface MenuProps {
  className?: string;
  style?: CSSProperties;
  items: MenuItem[];
  mode?: MenuMode;
  theme?: MenuTheme;
  selectedKeys?: string[];
  defaultSelectedKeys?: string[];
  openKeys?: string[];
  defaultOpenKeys?: string[];
  onClick?: (info: MenuInfo) => void;
  onSelect?: (info: SelectInfo) => void;
  onDeselect?: (info: SelectInfo) => void;
  onOpenChange?: (openKeys: string[]) => void;
  multiple?: boolean;
  selectable?: boolean;
  inlineCollapsed?: boolean;
  /** Indent per inline level, px. */
  inlineIndent?: number;
  triggerSubMenuAction?: "hover" | "click";
  /** Milliseconds. */
  subMenuOpenDelay?: number;
  /** Milliseconds. */
  subMenuCloseDelay?: number;
  /** Tighter item metrics used inside Dropdown. */
  dense?: boolean;
}

interface MenuContextValue {
  prefixCls: string;
  mode: MenuMode;
  theme: MenuTheme;
  collapsed: boolean;
  inlineIndent: number;
  dense: boolean;
  selectedKeys: string[];
  openKeys: string[];
  triggerSubMenuAction: "hover" | "click";
  subMenuOpenDelay: number;
  subMenuCloseDelay: number;
  activate: (
    key: string,
    event: MouseEvent<HTMLElement> | KeyboardEvent<HTMLElement>
  ) => void;
  setSubMenuOpen: (key: string, open: boolean) => void;
}

const MenuContext = createContext<MenuContextValue | null>(null);

function useMenuContext(): MenuContextValue {
  const context = useContext(MenuContext);
  if (!context) throw new Error("Menu parts must render inside <Menu>.");
  return context;
}

// Level 0 is the root list; popups restart at level 0 in vertical mode
interface LevelProps {
  level: number;
  inPopup: boolean;
}

function moveFocus(event: KeyboardEvent<HTMLElement>, step: 1 | -1) {
  const list = event.currentTarget.closest('[role="menu"]');
  if (!list) return;
  const items = Array.from(
    list.querySelectorAll<HTMLElement>(
      '[role="menuitem"]:not([aria-disabled="true"])'
    )
  ).filter((node) => node.closest('[role="menu"]') === list);
  const index = items.indexOf(event.currentTarget);
  const next = items[(index + step + items.length) % items.length];
  next?.focus();
}

function MenuLeaf({ item, level, inPopup }: LevelProps & { item: MenuItemType }) {
  const ctx = useMenuContext();
  const selected = ctx.selectedKeys.includes(item.key);
  const disabled = item.disabled === true;
  const inline = ctx.mode === "inline" && !ctx.collapsed && !inPopup;
  const iconOnly = ctx.collapsed && level === 0 && !inPopup;

  const onKeyDown = (event: KeyboardEvent<HTMLElement>) => {
    if (event.key === "ArrowDown") {
      event.preventDefault();
      moveFocus(event, 1);
    } else if (event.key === "ArrowUp") {
      event.preventDefault();
      moveFocus(event, -1);
    } else if ((event.key === "Enter" || event.key === " ") && !disabled) {
      event.preventDefault();
      ctx.activate(item.key, event);
    }
  };

  const node = (
    <li
      role="menuitem"
      tabIndex={disabled ? -1 : 0}
      aria-disabled={disabled || undefined}
      aria-selected={selected}
      data-menu-id={item.key}
      className={cn(
        `${ctx.prefixCls}-item`,
        selected && `${ctx.prefixCls}-item-selected`,
        disabled && `${ctx.prefixCls}-item-disabled`,
        item.danger && `${ctx.prefixCls}-item-danger`,
        menuItem({
          mode: inPopup ? "vertical" : ctx.mode,
          theme: ctx.theme,
          selected,
          disabled,
          danger: item.danger === true,
          dense: ctx.dense,
        }),
        iconOnly && "justify-center px-0"
      )}
      style={
        inline ? { paddingInlineStart: ctx.inlineIndent * (level + 1) } : undefined
      }
      onClick={(event) => {
        if (!disabled) ctx.activate(item.key, event);
      }}
      onKeyDown={onKeyDown}
    >
      {item.icon !== undefined && (
        <span className={cn(`${ctx.prefixCls}-item-icon`, "inline-flex")}>{item.icon}</span>
      )}
      {!iconOnly && (
        <span className={cn(`${ctx.prefixCls}-title-content`, "flex-auto truncate")}>
          {item.label}
        </span>
      )}
      {!iconOnly && item.extra !== undefined && (
        <span className={cn(`${ctx.prefixCls}-item-extra`, "ms-auto text-fg-tertiary")}>
          {item.extra}
        </span>
      )}
    </li>
  );

  if (iconOnly) {
    const title = item.title ?? (typeof item.label === "string" ? item.label : undefined);
    return (
      <Tooltip title={title} placement="right">
        {node}
      </Tooltip>
    );
  }
  return node;
}

function SubMenu({ item, level, inPopup }: LevelProps & { item: SubMenuType }) {
  const ctx = useMenuContext();
  const open = ctx.openKeys.includes(item.key);
  const disabled = item.disabled === true;
  const inline = ctx.mode === "inline" && !ctx.collapsed && !inPopup;
  const iconOnly = ctx.collapsed && level === 0 && !inPopup;
  const horizontalRoot = ctx.mode === "horizontal" && !inPopup;
  const childSelected = ctx.selectedKeys.some((key) =>
    findKeyPath(item.children, key).length > 0
  );

  const toggle = () => {
    if (!disabled) ctx.setSubMenuOpen(item.key, !open);
  };

  const title = (
    <div
      role="menuitem"
      tabIndex={disabled ? -1 : 0}
      aria-haspopup={inline ? undefined : "menu"}
      aria-expanded={open}
      aria-disabled={disabled || undefined}
      className={cn(
        `${ctx.prefixCls}-submenu-title`,
        menuItem({
          mode: inPopup ? "vertical" : ctx.mode,
          theme: ctx.theme,
          selected: false,
          disabled,
          dense: ctx.dense,
        }),
        childSelected && (ctx.theme === "dark" ? "text-white" : "text-primary"),
        iconOnly && "justify-center px-0"
      )}
      style={
        inline ? { paddingInlineStart: ctx.inlineIndent * (level + 1) } : undefined
      }
      onClick={inline ? toggle : undefined}
      onKeyDown={(event) => {
        if (event.key === "ArrowDown") {
          event.preventDefault();
          moveFocus(event, 1);
        } else if (event.key === "ArrowUp") {
          event.preventDefault();
          moveFocus(event, -1);
        } else if (event.key === "Enter" || event.key === " ") {
          event.preventDefault();
          toggle();
        }
      }}
    >
      {item.icon !== undefined && (
        <span className={cn(`${ctx.prefixCls}-item-icon`, "inline-flex")}>{item.icon}</span>
      )}
      {!iconOnly && (
        <span className={cn(`${ctx.prefixCls}-title-content`, "flex-auto truncate")}>
          {item.label}
        </span>
      )}
      {!iconOnly && !horizontalRoot && (
        <ChevronDown
          aria-hidden
          className={menuSubTitleArrow({
            open: inline && open,
            popup: !inline,
          })}
        />
      )}
    </div>
  );

  if (inline) {
    return (
      <li
        role="none"
        className={cn(
          `${ctx.prefixCls}-submenu`,
          `${ctx.prefixCls}-submenu-inline`,
          open && `${ctx.prefixCls}-submenu-open`
        )}
      >
        {title}
        {open && (
          <ul role="menu" className={cn(`${ctx.prefixCls}-sub`, menuSubList({ theme: ctx.theme }))}>
            <MenuItems items={item.children} level={level + 1} inPopup={false} />
          </ul>
        )}
      </li>
    );
  }

  return (
    <li
      role="none"
      className={cn(
        `${ctx.prefixCls}-submenu`,
        `${ctx.prefixCls}-submenu-${horizontalRoot ? "horizontal" : "vertical"}`,
        open && `${ctx.prefixCls}-submenu-open`,
        horizontalRoot && "h-full"
      )}
    >
      <Popup
        open={open && !disabled}
        onOpenChange={(next) => ctx.setSubMenuOpen(item.key, next)}
        trigger={ctx.triggerSubMenuAction}
        placement={horizontalRoot ? "bottomLeft" : "rightTop"}
        mouseEnterDelay={ctx.subMenuOpenDelay}
        mouseLeaveDelay={ctx.subMenuCloseDelay}
        arrow={false}
        className={cn(`${ctx.prefixCls}-submenu-popup`, menuPopup({ theme: ctx.theme }), item.popupClassName)}
        content={
          <ul role="menu" className={cn(`${ctx.prefixCls}-sub`, "m-0 list-none p-0")}>
            <MenuItems items={item.children} level={0} inPopup />
          </ul>
        }
      >
        {title}
      </Popup>
    </li>
  );
}

function MenuGroup({ item, level, inPopup }: LevelProps & { item: MenuItemGroupType }) {
  const ctx = useMenuContext();
  const inline = ctx.mode === "inline" && !ctx.collapsed && !inPopup;
  return (
    <li role="none" className={`${ctx.prefixCls}-item-group`}>
      <div
        role="presentation"
        className={cn(`${ctx.prefixCls}-item-group-title`, menuGroupTitle())}
        style={inline ? { paddingInlineStart: ctx.inlineIndent * (level + 1) } : undefined}
      >
        {item.label}
      </div>
      <ul role="group" className="m-0 list-none p-0">
        <MenuItems items={item.children ?? []} level={level} inPopup={inPopup} />
      </ul>
    </li>
  );
}

function MenuItems({ items, level, inPopup }: LevelProps & { items: MenuItem[] }) {
  const ctx = useMenuContext();
  return (
    <>
      {items.map((item, index) => {
        if (isMenuDivider(item)) {
          return (
            <li
              key={item.key ?? `divider-${index}`}
              role="separator"
              className={cn(
                `${ctx.prefixCls}-item-divider`,
                menuDivider(),
                item.dashed && "border-dashed"
              )}
            />
          );
        }
        if (isMenuGroup(item)) {
          return (
            <MenuGroup
              key={item.key ?? `group-${index}`}
              item={item}
              level={level}
              inPopup={inPopup}
            />
          );
        }
        if (isSubMenu(item)) {
          return <SubMenu key={item.key} item={item} level={level} inPopup={inPopup} />;
        }
        return <MenuLeaf key={item.key} item={item} level={level} inPopup={inPopup} />;
      })}
    </>
  );
}

export function Menu({
  items,
  mode = "vertical",
  theme = "light",
  selectedKeys: selectedKeysProp,
  defaultSelectedKeys = [],
  openKeys: openKeysProp,
  defaultOpenKeys = [],
  onClick,
  onSelect,
  onDeselect,
  onOpenChange,
  multiple = false,
  selectable = true,
  inlineCollapsed = false,
  inlineIndent = 24,
  triggerSubMenuAction = "hover",
  subMenuOpenDelay = 0,
  subMenuCloseDelay = 100,
  dense = false,
  className,
  style,
}: MenuProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Menu", "menu");
  const [selectedKeys, setSelectedKeys] = useControllableState({
    value: selectedKeysProp,
    defaultValue: defaultSelectedKeys,
  });
  const [openKeys, setOpenKeys] = useControllableState({
    value: openKeysProp,
    defaultValue: defaultOpenKeys,
    onChange: onOpenChange,
  });
  const collapsed = mode === "inline" && inlineCollapsed;
  const popupMode = mode !== "inline" || collapsed;

  const activate: MenuContextValue["activate"] = (key, domEvent) => {
    const keyPath = findKeyPath(items, key);
    onClick?.({ key, keyPath, domEvent });

    if (selectable) {
      const isSelected = selectedKeys.includes(key);
      if (multiple && isSelected) {
        const next = selectedKeys.filter((k) => k !== key);
        setSelectedKeys(next);
        onDeselect?.({ key, keyPath, domEvent, selectedKeys: next });
      } else {
        const next = multiple ? [...selectedKeys, key] : [key];
        setSelectedKeys(next);
        onSelect?.({ key, keyPath, domEvent, selectedKeys: next });
      }
    }

    if (popupMode && openKeys.length > 0) setOpenKeys([]);
  };

  const setSubMenuOpen = (key: string, open: boolean) => {
    if (open) {
      if (openKeys.includes(key)) return;
      // Popups keep only the chain leading to the opened submenu
      setOpenKeys(
        popupMode ? [...findParentKeys(items, key).reverse(), key] : [...openKeys, key]
      );
    } else if (openKeys.includes(key)) {
      setOpenKeys(openKeys.filter((k) => k !== key));
    }
  };

  const context: MenuContextValue = {
    prefixCls,
    mode,
    theme,
    collapsed,
    inlineIndent,
    dense,
    selectedKeys,
    openKeys,
    triggerSubMenuAction,
    subMenuOpenDelay,
    subMenuCloseDelay,
    activate,
    setSubMenuOpen,
  };

  return (
    <MenuContext.Provider value={context}>
      <ul
        role="menu"
        aria-orientation={mode === "horizontal" ? "horizontal" : "vertical"}
        className={cn(
          prefixCls,
          `${prefixCls}-root`,
          `${prefixCls}-${mode}`,
          `${prefixCls}-${theme}`,
          collapsed && `${prefixCls}-inline-collapsed`,
          menu({ mode, theme, collapsed }),
          className
        )}
        style={{ ...tokenStyle, ...style }}
      >
        <MenuItems items={items} level={0} inPopup={false} />
      </ul>
    </MenuContext.Provider>
  );
}
