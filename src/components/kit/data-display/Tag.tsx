// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Tag`
 * Purpose: Compact label with preset, status or custom color, optional close button; Tag.CheckableTag toggles.
 * Scope: Preset colors use palette shades (bg 1, border 3, text 7); a custom color fills the tag with white text.
 * Invariants: Calling `preventDefault()` in onClose keeps the tag visible.
 * Side-effects: none
 * @public
 */

"use client";

import { X } from "lucide-react";
import type {
  CSSProperties,
  HTMLAttributes,
  MouseEvent,
  ReactNode,
} from "react";
import { forwardRef, useState } from "react";

import { generateColorPalette, PRESET_COLORS } from "@/shared/theme";
import { cn } from "@/shared/util";
import { isPresetColor } from "@/styles/theme";
import { checkableTag, tag, tagClose } from "@/styles/ui";
import type { TagStatus } from "@/styles/ui";

import { useComponentConfig, useLocale } from "../theme";

const statusColors = [
  "success",
  "processing",
  "error",
  "warning",
  "default",
] as const;

function isStatusColor(color: string): color is Exclude<TagStatus, "none"> {
  return statusColors.some((status) => status === color);
}

/** Inline colors for a preset or custom tag color; status colors come from classes. */
export function getTagColorStyle(
  color: string | undefined,
  bordered: boolean
): CSSProperties {
  if (color === undefined || isStatusColor(color)) return {};
  if (isPresetColor(color)) {
    const palette = generateColorPalette(PRESET_COLORS[color]);
    return {
      background: palette[0],
      color: palette[6],
      borderColor: bordered ? palette[2] : "transparent",
    };
  }
  return { background: color, color: "#fff", borderColor: "transparent" };
}

export interface TagProps
  extends Omit<HTMLAttributes<HTMLSpanElement>, "className"> {
  className?: string;
  /** Preset name, status (`success`, `processing`, `error`, `warning`, `default`) or a CSS color. */
  color?: string;
  bordered?: boolean;
  closable?: boolean;
  closeIcon?: ReactNode;
  onClose?: (event: MouseEvent<HTMLButtonElement>) => void;
  icon?: ReactNode;
}

const TagRoot = forwardRef<HTMLSpanElement, TagProps>(
  (
    {
      color,
      bordered = true,
      closable = false,
      closeIcon,
      onClose,
      icon,
      className,
      style,
      children,
      ...props
    },
    ref
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig("Tag", "tag");
    const { close: closeLabel } = useLocale("global");
    const [visible, setVisible] = useState(true);
    if (!visible) return null;

    const status: TagStatus =
      color === undefined ? "default" : isStatusColor(color) ? color : "none";
    const colorCls =
      color === undefined
        ? undefined
        : isStatusColor(color) || isPresetColor(color)
          ? `${prefixCls}-${color}`
          : `${prefixCls}-has-color`;
    const showClose = closable || (closeIcon !== undefined && closeIcon !== null);

    const handleClose = (event: MouseEvent<HTMLButtonElement>) => {
      event.stopPropagation();
      onClose?.(event);
      if (!event.defaultPrevented) setVisible(false);
    };

    return (
      <span
        ref={ref}
        className={cn(
          prefixCls,
          colorCls,
          !bordered && `${prefixCls}-borderless`,
          tag({ status, bordered }),
          className
        )}
        style={{ ...tokenStyle, ...getTagColorStyle(color, bordered), ...style }}
        {...props}
      >
        {icon}
        {children !== undefined && <span>{children}</span>}
        {showClose && (
          <button
            type="button"
            aria-label={closeLabel}
            className={cn(`${prefixCls}-close-icon`, tagClose())}
            onClick={handleClose}
          >
            {closeIcon ?? <X className="size-2.5" aria-hidden />}
          </button>
        )}
      </span>
    );
  }
);
TagRoot.displayName = "Tag";

export interface CheckableTagProps
  extends Omit<HTMLAttributes<HTMLSpanElement>, "className" | "onChange"> {
  className?: string;
  checked: boolean;
  onChange?: (checked: boolean) => void;
}

function CheckableTag({
  checked,
  onChange,
  onClick,
  className,
  ...props
}: CheckableTagProps) {
  const { prefixCls } = useComponentConfig("Tag", "tag-checkable");
  return (
    <span
      role="checkbox"
      aria-checked={checked}
      tabIndex={0}
      className={cn(
        prefixCls,
        checked && `${prefixCls}-checked`,
        checkableTag({ checked }),
        className
      )}
      onClick={(event) => {
        onChange?.(!checked);
        onClick?.(event);
      }}
      onKeyDown={(event) => {
        if (event.key === " " || event.key === "Enter") {
          event.preventDefault();
          onChange?.(!checked);
        }
      }}
      {...props}
    />
  );
}
CheckableTag.displayName = "Tag.CheckableTag";

export const Tag = Object.assign(TagRoot, { CheckableTag });
