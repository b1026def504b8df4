// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Alert`
 * Purpose: Inline status message with optional icon, description, action and close button.
 * Scope: Owns its closed state; once closed it renders nothing and calls afterClose.
 * Invariants:
 * - Forwards ref; accepts aria-* and data-* unchanged.
 * - `banner` defaults type to warning and showIcon to true.
 * - onClose runs once per close click; `preventDefault()` in it keeps the alert open.
 * Side-effects: none
 * @public
 */

"use client";

import { CheckCircle2, Info, TriangleAlert, X, XCircle } from "lucide-react";
import type { HTMLAttributes, MouseEvent, ReactNode } from "react";
import { forwardRef, useEffect, useRef, useState } from "react";

import { cn } from "@/shared/util";
import {
  alert,
  alertAction,
  alertClose,
  alertContent,
  alertDescription,
  alertIcon,
  alertMessage,
} from "@/styles/ui";
import type { AlertType } from "@/styles/ui";

import { useComponentConfig, useLocale } from "../theme";

const defaultIcons = {
  success: CheckCircle2,
  info: Info,
  warning: TriangleAlert,
  error: XCircle,
} as const;

export interface AlertProps
  extends Omit<HTMLAttributes<HTMLDivElement>, "title"> {
  type?: AlertType;
  message?: ReactNode;
  description?: ReactNode;
  showIcon?: boolean;
  icon?: ReactNode;
  closable?: boolean | { closeIcon?: ReactNode; "aria-label"?: string };
  onClose?: (event: MouseEvent<HTMLButtonElement>) => void;
  afterClose?: () => void;
  banner?: boolean;
  action?: ReactNode;
}

export const Alert = forwardRef<HTMLDivElement, AlertProps>(
  (
    {
      type: typeProp,
      message,
      description,
      showIcon: showIconProp,
      icon,
      closable = false,
      onClose,
      afterClose,
      banner = false,
      action,
      className,
      style,
      role = "alert",
      ...props
    },
    ref
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig("Alert", "alert");
    const { close: closeLabel } = useLocale("global");
    const [closed, setClosed] = useState(false);
    const afterCloseRef = useRef(afterClose);
    afterCloseRef.current = afterClose;

    useEffect(() => {
      if (closed) afterCloseRef.current?.();
    }, [closed]);

    if (closed) return null;

    const type = typeProp ?? (banner ? "warning" : "info");
    const showIcon = showIconProp ?? banner;
    const withDescription = description !== undefined && description !== null;
    const closeOptions = typeof closable === "object" ? closable : {};
    const DefaultIcon = defaultIcons[type];

    const handleClose = (event: MouseEvent<HTMLButtonElement>) => {
      onClose?.(event);
      if (!event.defaultPrevented) setClosed(true);
    };

    return (
      <div
        ref={ref}
        role={role}
        data-show={!closed}
        className={cn(
          prefixCls,
          `${prefixCls}-${type}`,
          withDescription && `${prefixCls}-with-description`,
          banner && `${prefixCls}-banner`,
          alert({ type, banner, withDescription }),
          className
        )}
        style={{ ...tokenStyle, ...style }}
        {...props}
      >
        {showIcon && (
          <span
            className={cn(
              `${prefixCls}-icon`,
              alertIcon({ type, large: withDescription }),
              "inline-flex items-center justify-center"
            )}
          >
            {icon ?? <DefaultIcon className="size-full" aria-hidden />}
          </span>
        )}
        <div className={cn(`${prefixCls}-content`, alertContent())}>
          {message !== undefined && message !== null && (
            <div
              className={cn(`${prefixCls}-message`, alertMessage({ withDescription }))}
            >
              {message}
            </div>
          )}
          {withDescription && (
            <div className={cn(`${prefixCls}-description`, alertDescription())}>
              {description}
            </div>
          )}
        </div>
        {action !== undefined && action !== null && (
          <div className={cn(`${prefixCls}-action`, alertAction())}>{action}</div>
        )}
        {closable !== false && (
          <button
            type="button"
            aria-label={closeOptions["aria-label"] ?? closeLabel}
            className={cn(`${prefixCls}-close-icon`, alertClose())}
            onClick={handleClose}
          >
            {closeOptions.closeIcon ?? <X className="size-3" aria-hidden />}
          </button>
        )}
      </div>
    );
  }
);
Alert.displayName = "Alert";
