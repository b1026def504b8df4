// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/Switch`
 * Purpose: Two-state toggle rendered as `button[role=switch]`.
 * Invariants: Loading implies disabled; `onChange(checked, event)` fires only on a user toggle.
 * Side-effects: none
 * @public
 */

"use client";

import { Loader2 } from "lucide-react";
import type { ButtonHTMLAttributes, MouseEvent, ReactNode } from "react";
import { forwardRef } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import { switchHandle, switchInner, switchRoot } from "@/styles/ui";

import { useComponentConfig } from "../theme";

export type SwitchSize = "default" | "small";

export interface SwitchProps
  extends Omit<
    ButtonHTMLAttributes<HTMLButtonElement>,
    "onChange" | "onClick" | "type"
  > {
  checked?: boolean;
  defaultChecked?: boolean;
  onChange?: (checked: boolean, event: MouseEvent<HTMLButtonElement>) => void;
  onClick?: (checked: boolean, event: MouseEvent<HTMLButtonElement>) => void;
  loading?: boolean;
  size?: SwitchSize;
  checkedChildren?: ReactNode;
  unCheckedChildren?: ReactNode;
}

export const Switch = forwardRef<HTMLButtonElement, SwitchProps>(
  function Switch(
    {
      checked: checkedProp,
      defaultChecked = false,
      onChange,
      onClick,
      loading = false,
      disabled: disabledProp = false,
      size = "default",
      checkedChildren,
      unCheckedChildren,
      className,
      style,
      ...props
    },
    ref
  ) {
    const { prefixCls, style: tokenStyle } = useComponentConfig("Switch", "switch");
    const [checked, setChecked] = useControllableState({
      value: checkedProp,
      defaultValue: defaultChecked,
    });
    const disabled = disabledProp || loading;

    const handleClick = (event: MouseEvent<HTMLButtonElement>) => {
      if (disabled) return;
      const next = !checked;
      setChecked(next);
      onChange?.(next, event);
      onClick?.(next, event);
    };

    const inner = checked ? checkedChildren : unCheckedChildren;

    return (
      <button
        {...props}
        ref={ref}
        type="button"
        role="switch"
        aria-checked={checked}
        aria-busy={loading || undefined}
        disabled={disabled}
        className={cn(prefixCls, switchRoot({ size, checked, disabled }), className)}
        style={{ ...tokenStyle, ...style }}
        onClick={handleClick}
      >
        <span className={switchHandle({ size, checked })}>
          {loading ? (
            <Loader2
              aria-hidden
              className={cn("animate-spin", size === "small" ? "size-2" : "size-3")}
            />
          ) : null}
        </span>
        <span className={switchInner({ size, checked })}>{inner}</span>
      </button>
    );
  }
);
