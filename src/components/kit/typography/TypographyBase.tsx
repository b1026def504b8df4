// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/typography/TypographyBase`
 * Purpose: Shared renderer for Title, Text and Paragraph: text decorations, ellipsis and the copy action.
 * Scope: Internal; the public components pick the element and defaults.
 * Invariants:
 * - Decorations nest in a fixed order: mark, code, keyboard, underline, delete, strong, italic.
 * - The copied state lasts 3 s; a rejected clipboard write logs `ui.typography.copy_failed` and leaves the state unchanged.
 * Side-effects: IO (clipboard), time (copied reset timer)
 * Links: Typography.tsx, typography-utils.ts
 * @internal
 */

"use client";

import { Check, Copy } from "lucide-react";
import type { CSSProperties, HTMLAttributes, MouseEvent, ReactNode } from "react";
import { useEffect, useRef, useState } from "react";

import { EVENT_NAMES } from "@/shared/observability/events";
import { warn } from "@/shared/observability/client";
import { cn } from "@/shared/util";
import {
  typography,
  typographyAction,
  typographyCode,
  typographyKeyboard,
  typographyMark,
} from "@/styles/ui";
import type { TypographyType } from "@/styles/ui";

import { Tooltip } from "../data-display/Tooltip";
import { useComponentConfig, useLocale } from "../theme";
import type { EllipsisConfig } from "./typography-utils";
import { nodeToText, resolveEllipsis } from "./typography-utils";

export const COPIED_RESET_MS = 3000;

export interface CopyConfig {
  /** Text to copy; defaults to the rendered text. */
  text?: string;
  onCopy?: (event: MouseEvent<HTMLButtonElement>) => void;
  /** `[copy, copied]` tooltip titles; `false` hides the tooltip. */
  tooltips?: false | [ReactNode, ReactNode];
  icon?: [ReactNode, ReactNode];
}

export interface TypographyDecorations {
  type?: TypographyType;
  disabled?: boolean;
  mark?: boolean;
  code?: boolean;
  keyboard?: boolean;
  underline?: boolean;
  delete?: boolean;
  strong?: boolean;
  italic?: boolean;
  copyable?: boolean | CopyConfig;
  ellipsis?: boolean | EllipsisConfig;
}

export interface TypographyBaseProps
  extends TypographyDecorations,
    Omit<HTMLAttributes<HTMLElement>, "className"> {
  component: "span" | "div" | "h1" | "h2" | "h3" | "h4" | "h5";
  className?: string;
}

function decorate(content: ReactNode, d: TypographyDecorations): ReactNode {
  let node = content;
  if (d.mark) node = <mark className={typographyMark()}>{node}</mark>;
  if (d.code) node = <code className={typographyCode()}>{node}</code>;
  if (d.keyboard) node = <kbd className={typographyKeyboard()}>{node}</kbd>;
  if (d.underline) node = <u>{node}</u>;
  if (d.delete) node = <del>{node}</del>;
  if (d.strong) node = <strong>{node}</strong>;
  if (d.italic) node = <i>{node}</i>;
  return node;
}

function CopyAction({
  config,
  content,
}: {
  config: CopyConfig;
  content: ReactNode;
}) {
  const locale = useLocale("Text");
  const [copied, setCopied] = useState(false);
  const timer = useRef<ReturnType<typeof setTimeout> | null>(null);

  useEffect(
    () => () => {
      if (timer.current !== null) clearTimeout(timer.current);
    },
    []
  );

  const copy = async (event: MouseEvent<HTMLButtonElement>) => {
    event.preventDefault();
    event.stopPropagation();
    const text = config.text ?? nodeToText(content);
    try {
      await navigator.clipboard.writeText(text);
    } catch (error) {
      warn(EVENT_NAMES.TYPOGRAPHY_COPY_FAILED, {
        message: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    setCopied(true);
    config.onCopy?.(event);
    if (timer.current !== null) clearTimeout(timer.current);
    timer.current = setTimeout(() => {
      timer.current = null;
      setCopied(false);
    }, COPIED_RESET_MS);
  };

  const [copyIcon, copiedIcon] = config.icon ?? [
    <Copy key="copy" className="h-[1em] w-[1em]" />,
    <Check key="copied" className="h-[1em] w-[1em]" />,
  ];
  const [copyTip, copiedTip] =
    config.tooltips === false
      ? [null, null]
      : (config.tooltips ?? [locale.copy, locale.copied]);
  const label = copied ? locale.copied : locale.copy;

  const action = (
    <button
      type="button"
      aria-label={label}
      data-copied={copied || undefined}
      className={typographyAction({ copied })}
      onClick={(event) => {
        void copy(event);
      }}
    >
      {copied ? copiedIcon : copyIcon}
    </button>
  );

  if (config.tooltips === false) return action;
  return <Tooltip title={copied ? copiedTip : copyTip}>{action}</Tooltip>;
}

export function TypographyBase({
  component: Component,
  type,
  disabled,
  mark,
  code,
  keyboard,
  underline,
  delete: deleted,
  strong,
  italic,
  copyable,
  ellipsis,
  className,
  style,
  children,
  ...props
}: TypographyBaseProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Typography",
    "typography"
  );
  const { mode, rows } = resolveEllipsis(ellipsis);
  const clampStyle: CSSProperties =
    mode === "multiple" ? { WebkitLineClamp: rows } : {};
  const copyConfig: CopyConfig | null =
    copyable === true ? {} : copyable ? copyable : null;

  return (
    <Component
      className={cn(
        prefixCls,
        type && `${prefixCls}-${type}`,
        disabled && `${prefixCls}-disabled`,
        mode !== "none" && `${prefixCls}-ellipsis`,
        typography({ type, disabled, ellipsis: mode }),
        className
      )}
      style={{ ...tokenStyle, ...clampStyle, ...style }}
      aria-disabled={disabled || undefined}
      {...props}
    >
      {decorate(children, { mark, code, keyboard, underline, delete: deleted, strong, italic })}
      {copyConfig && !disabled && (
        <CopyAction config={copyConfig} content={children} />
      )}
    </Component>
  );
}
