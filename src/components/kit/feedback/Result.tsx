// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Result`
 * Purpose: Full-width outcome screen: status icon, title, subtitle, actions and optional detail content.
 * Scope: Presentational only.
 * Invariants: HTTP statuses (403, 404, 500) render an illustration in place of the status icon.
 * Side-effects: none
 * @public
 */

import {
  CheckCircle2,
  FileQuestion,
  Info,
  ServerCrash,
  ShieldOff,
  TriangleAlert,
  XCircle,
} from "lucide-react";
import type { CSSProperties, ReactNode } from "react";

import { cn } from "@/shared/util";
import {
  result,
  resultContent,
  resultExtra,
  resultIcon,
  resultSubtitle,
  resultTitle,
} from "@/styles/ui";

import { useComponentConfig } from "../theme";

export type ResultStatus =
  | "success"
  | "error"
  | "info"
  | "warning"
  | "403"
  | "404"
  | "500";

const statusIcons = {
  success: CheckCircle2,
  error: XCircle,
  info: Info,
  warning: TriangleAlert,
  "403": ShieldOff,
  "404": FileQuestion,
  "500": ServerCrash,
} as const;

export function isHttpResultStatus(
  status: ResultStatus
): status is "403" | "404" | "500" {
  return status === "403" || status === "404" || status === "500";
}

export interface ResultProps {
  status?: ResultStatus | 403 | 404 | 500;
  title?: ReactNode;
  subTitle?: ReactNode;
  icon?: ReactNode;
  extra?: ReactNode;
  children?: ReactNode;
  className?: string;
  style?: CSSProperties;
}

export function Result({
  status: statusProp = "info",
  title,
  subTitle,
  icon,
  extra,
  children,
  className,
  style,
}: ResultProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Result", "result");
  const status: ResultStatus =
    typeof statusProp === "number" ? `${statusProp}` : statusProp;
  const illustration = isHttpResultStatus(status);
  const StatusIcon = statusIcons[status];

  return (
    <div
      className={cn(prefixCls, `${prefixCls}-${status}`, result(), className)}
      style={{ ...tokenStyle, ...style }}
    >
      <div
        className={cn(
          illustration ? `${prefixCls}-image` : `${prefixCls}-icon`,
          resultIcon({ status: illustration ? "image" : status })
        )}
      >
        {icon ?? (
          <StatusIcon
            aria-hidden
            className={illustration ? "size-40 text-fg-quaternary" : "size-[72px]"}
            strokeWidth={illustration ? 1 : 2}
          />
        )}
      </div>
      {title !== undefined && (
        <div className={cn(`${prefixCls}-title`, resultTitle())}>{title}</div>
      )}
      {subTitle !== undefined && (
        <div className={cn(`${prefixCls}-subtitle`, resultSubtitle())}>
          {subTitle}
        </div>
      )}
      {extra !== undefined && (
        <div className={cn(`${prefixCls}-extra`, resultExtra())}>{extra}</div>
      )}
      {children !== undefined && (
        <div className={cn(`${prefixCls}-content`, resultContent())}>{children}</div>
      )}
    </div>
  );
}
