// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Popconfirm`
 * Purpose: Click-triggered confirmation bubble anchored to its child.
 * Scope: Popover surface with a warning icon, title, description and OK/Cancel buttons.
 * Invariants:
 * - OK and Cancel close the bubble; an onConfirm promise keeps it open with a loading OK button until it resolves.
 * - A rejected onConfirm is logged and leaves the bubble open.
 * - `disabled` renders the child alone.
 * Side-effects: none
 * Links: data-display/Popup.tsx
 * @public
 */

"use client";

import { TriangleAlert } from "lucide-react";
import type {
  CSSProperties,
  MouseEvent,
  ReactElement,
  ReactNode,
} from "react";
import { useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { error as logError } from "@/shared/observability/client";
import { EVENT_NAMES } from "@/shared/observability/events";
import { cn, isPromiseLike } from "@/shared/util";
import {
  popconfirmButtons,
  popconfirmDescription,
  popconfirmInner,
  popconfirmMessage,
  popconfirmTitle,
  popoverArrow,
  popoverContent,
} from "@/styles/ui";

import type { PopupOptions } from "../data-display/Popup";
import { Popup } from "../data-display/Popup";
import { Button } from "../general/Button";
import type { ButtonProps } from "../general/Button";
import type { ButtonType } from "../general/button-utils";
import { useComponentConfig, useLocale } from "../theme";

export interface PopconfirmProps extends PopupOptions {
  title: ReactNode | (() => ReactNode);
  description?: ReactNode | (() => ReactNode);
  onConfirm?: (event: MouseEvent<HTMLElement>) => void | PromiseLike<unknown>;
  onCancel?: (event: MouseEvent<HTMLElement>) => void;
  okText?: ReactNode;
  cancelText?: ReactNode;
  okType?: ButtonType;
  okButtonProps?: ButtonProps;
  cancelButtonProps?: ButtonProps;
  showCancel?: boolean;
  icon?: ReactNode;
  disabled?: boolean;
  overlayClassName?: string;
  overlayStyle?: CSSProperties;
  children: ReactElement;
}

const render = (node: ReactNode | (() => ReactNode)): ReactNode =>
  typeof node === "function" ? node() : node;


export function Popconfirm({
  title,
  description,
  onConfirm,
  onCancel,
  okText,
  cancelText,
  okType = "primary",
  okButtonProps,
  cancelButtonProps,
  showCancel = true,
  icon,
  disabled = false,
  overlayClassName,
  overlayStyle,
  open: openProp,
  defaultOpen = false,
  onOpenChange,
  trigger = "click",
  placement = "top",
  children,
  ...popup
}: PopconfirmProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Popconfirm",
    "popconfirm"
  );
  const locale = useLocale("Popconfirm");
  const [open, setOpen] = useControllableState({
    value: openProp,
    defaultValue: defaultOpen,
    onChange: onOpenChange,
  });
  const [loading, setLoading] = useState(false);

  if (disabled) return children;

  const confirm = (event: MouseEvent<HTMLElement>) => {
    const result = onConfirm?.(event);
    if (!isPromiseLike(result)) {
      setOpen(false);
      return;
    }
    setLoading(true);
    void result.then(
      () => {
        setLoading(false);
        setOpen(false);
      },
      (reason: unknown) => {
        setLoading(false);
        logError(EVENT_NAMES.POPCONFIRM_CONFIRM_REJECTED, {
          message: reason instanceof Error ? reason.message : String(reason),
        });
      }
    );
  };

  const cancel = (event: MouseEvent<HTMLElement>) => {
    onCancel?.(event);
    setOpen(false);
  };

  const descriptionNode =
    description !== undefined ? render(description) : undefined;

  return (
    <Popup
      {...popup}
      open={open}
      onOpenChange={setOpen}
      trigger={trigger}
      placement={placement}
      role="dialog"
      autoFocus
      content={
        <div className={cn(`${prefixCls}-inner-content`, popconfirmInner())}>
          <div className={cn(`${prefixCls}-message`, popconfirmMessage())}>
            <span
              className={cn(
                `${prefixCls}-message-icon`,
                "mt-0.5 inline-flex flex-none text-warning"
              )}
            >
              {icon ?? <TriangleAlert className="size-3.5" aria-hidden />}
            </span>
            <div>
              <div className={cn(`${prefixCls}-title`, popconfirmTitle())}>
                {render(title)}
              </div>
              {descriptionNode !== undefined && descriptionNode !== null && (
                <div
                  className={cn(
                    `${prefixCls}-description`,
                    popconfirmDescription()
                  )}
                >
                  {descriptionNode}
                </div>
              )}
            </div>
          </div>
          <div className={cn(`${prefixCls}-buttons`, popconfirmButtons())}>
            {showCancel && (
              <Button size="small" {...cancelButtonProps} onClick={cancel}>
                {cancelText ?? locale.cancelText}
              </Button>
            )}
            <Button
              type={okType}
              size="small"
              loading={loading}
              {...okButtonProps}
              onClick={confirm}
            >
              {okText ?? locale.okText}
            </Button>
          </div>
        </div>
      }
      className={cn(prefixCls, popoverContent(), overlayClassName)}
      style={{ ...tokenStyle, ...overlayStyle }}
      arrowClassName={popoverArrow()}
    >
      {children}
    </Popup>
  );
}
