// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/navigation/Dropdown`
 * Purpose: Menu popup attached to a trigger element; Dropdown.Button renders a split button.
 * Scope: Hover, click and contextMenu triggers; the popup body is a dense vertical Menu.
 * Invariants:
 * - Clicking a menu item closes the popup before `menu.onClick` runs.
 * - A disabled dropdown renders its child without a popup.
 * Side-effects: none
 * @public
 */

"use client";

import { Ellipsis } from "lucide-react";
import type { CSSProperties, MouseEvent, ReactElement, ReactNode } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import { dropdownMenu } from "@/styles/ui";

import { Popup } from "../data-display/Popup";
import type { Placement } from "../data-display/placement";
import { Button } from "../general/Button";
import type { ButtonType } from "../general/button-utils";
import { Space } from "../layout/Space";
import { useComponentConfig, useLocale } from "../theme";
import type { MenuProps } from "./Menu";
import { Menu } from "./Menu";

export type DropdownTrigger = "hover" | "click" | "contextMenu";

export interface DropdownOpenInfo {
  source: "trigger" | "menu";
}

export type DropdownMenuProps = Omit<
  MenuProps,
  "mode" | "inlineCollapsed" | "inlineIndent" | "dense"
>;

export interface DropdownProps {
  menu: DropdownMenuProps;
  trigger?: DropdownTrigger[];
  open?: boolean;
  defaultOpen?: boolean;
  onOpenChange?: (open: boolean, info: DropdownOpenInfo) => void;
  disabled?: boolean;
  placement?: Placement;
  arrow?: boolean;
  /** Milliseconds. */
  mouseEnterDelay?: number;
  /** Milliseconds. */
  mouseLeaveDelay?: number;
  dropdownRender?: (menu: ReactNode) => ReactNode;
  overlayClassName?: string;
  overlayStyle?: CSSProperties;
  children: ReactElement;
}

function DropdownRoot({
  menu,
  trigger = ["hover"],
  open: openProp,
  defaultOpen = false,
  onOpenChange,
  disabled = false,
  placement = "bottomLeft",
  arrow = false,
  mouseEnterDelay = 150,
  mouseLeaveDelay = 100,
  dropdownRender,
  overlayClassName,
  overlayStyle,
  children,
}: DropdownProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Dropdown",
    "dropdown"
  );
  const [open, setOpen] = useControllableState({
    value: openProp,
    defaultValue: defaultOpen,
  });

  const change = (next: boolean, source: DropdownOpenInfo["source"]) => {
    if (next === open) return;
    setOpen(next);
    onOpenChange?.(next, { source });
  };

  if (disabled) return children;

  const menuNode = (
    <Menu
      {...menu}
      dense
      mode="vertical"
      selectable={menu.selectable ?? false}
      className={cn(`${prefixCls}-menu`, "border-0 bg-transparent p-0", menu.className)}
      onClick={(info) => {
        change(false, "menu");
        menu.onClick?.(info);
      }}
    />
  );

  return (
    <Popup
      open={open}
      onOpenChange={(next) => change(next, "trigger")}
      trigger={trigger}
      placement={placement}
      arrow={arrow}
      mouseEnterDelay={mouseEnterDelay}
      mouseLeaveDelay={mouseLeaveDelay}
      className={cn(prefixCls, dropdownMenu(), overlayClassName)}
      style={{ ...tokenStyle, ...overlayStyle }}
      arrowClassName="fill-elevated"
      content={dropdownRender ? dropdownRender(menuNode) : menuNode}
    >
      {children}
    </Popup>
  );
}
DropdownRoot.displayName = "Dropdown";

export interface DropdownButtonProps
  extends Omit<DropdownProps, "children" | "arrow"> {
  className?: string;
  style?: CSSProperties;
  type?: ButtonType;
  danger?: boolean;
  size?: SizeType;
  loading?: boolean;
  icon?: ReactNode;
  onClick?: (event: MouseEvent<HTMLElement>) => void;
  buttonsRender?: (buttons: [ReactNode, ReactElement]) => [ReactNode, ReactElement];
  children?: ReactNode;
}

function DropdownButton({
  type = "default",
  danger,
  size,
  loading,
  icon,
  onClick,
  buttonsRender = (buttons) => buttons,
  disabled,
  className,
  style,
  children,
  ...dropdown
}: DropdownButtonProps) {
  const { prefixCls } = useComponentConfig("Dropdown", "dropdown-button");
  const locale = useLocale("Dropdown");
  const [left, right] = buttonsRender([
    <Button
      key="left"
      type={type}
      danger={danger}
      loading={loading}
      disabled={disabled}
      onClick={onClick}
    >
      {children}
    </Button>,
    <Button
      key="right"
      type={type}
      danger={danger}
      disabled={disabled}
      icon={icon ?? <Ellipsis className="size-4" aria-hidden />}
      aria-label={locale.more}
    />,
  ]);

  return (
    <Space.Compact size={size} className={cn(prefixCls, className)} style={style}>
      {left}
      <DropdownRoot {...dropdown} disabled={disabled}>
        {right}
      </DropdownRoot>
    </Space.Compact>
  );
}
DropdownButton.displayName = "Dropdown.Button";

export const Dropdown = Object.assign(DropdownRoot, { Button: DropdownButton });
