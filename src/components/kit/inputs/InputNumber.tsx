// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/InputNumber`
 * Purpose: Numeric input with step controls, keyboard stepping, precision, formatter and parser.
 * Scope: Typed text is a draft until blur or Enter commits it. Stepping commits immediately.
 * Invariants:
 * - Commit: empty text -> null; unparsable text reverts; parsed values are clamped and rounded to precision.
 * - Without `precision`, stepping keeps the larger of the value's and the step's decimals; typed values are not rounded.
 * - `onChange` fires only when the committed number changes.
 * Side-effects: none
 * Links: src/components/kit/inputs/number-utils.ts
 * @public
 */

"use client";

import { ChevronDown, ChevronUp } from "lucide-react";
import type {
  ChangeEvent,
  FocusEvent,
  InputHTMLAttributes,
  KeyboardEvent,
  ReactNode,
} from "react";
import { forwardRef, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import type { InputVariant } from "@/styles/ui";
import {
  inputAddon,
  inputAffix,
  inputAffixWrapper,
  inputElement,
  inputGroup,
  inputNumberHandler,
  inputNumberHandlers,
} from "@/styles/ui";

import { useComponentConfig, useComponentSize, useLocale } from "../theme";
import {
  clampValue,
  parseNumber,
  stepValue,
  toFixedPrecision,
} from "./number-utils";

export interface StepInfo {
  offset: number;
  type: "up" | "down";
}

export interface InputNumberProps
  extends Omit<
    InputHTMLAttributes<HTMLInputElement>,
    | "value"
    | "defaultValue"
    | "onChange"
    | "size"
    | "prefix"
    | "min"
    | "max"
    | "step"
  > {
  value?: number | null;
  defaultValue?: number | null;
  onChange?: (value: number | null) => void;
  min?: number;
  max?: number;
  step?: number;
  precision?: number;
  formatter?: (value: string, info: { userTyping: boolean; input: string }) => string;
  parser?: (displayValue: string) => string;
  controls?: boolean | { upIcon?: ReactNode; downIcon?: ReactNode };
  keyboard?: boolean;
  onStep?: (value: number, info: StepInfo) => void;
  onPressEnter?: (event: KeyboardEvent<HTMLInputElement>) => void;
  addonBefore?: ReactNode;
  addonAfter?: ReactNode;
  prefix?: ReactNode;
  size?: SizeType;
  variant?: InputVariant;
  status?: "" | "error" | "warning";
}

export const InputNumber = forwardRef<HTMLInputElement, InputNumberProps>(
  function InputNumber(
    {
      value: valueProp,
      defaultValue = null,
      onChange,
      min,
      max,
      step = 1,
      precision: precisionProp,
      formatter,
      parser,
      controls = true,
      keyboard = true,
      onStep,
      onPressEnter,
      onKeyDown,
      onBlur,
      onFocus,
      addonBefore,
      addonAfter,
      prefix,
      size: sizeProp,
      variant = "outlined",
      status = "",
      disabled = false,
      readOnly = false,
      className,
      style,
      ...props
    },
    ref
  ) {
    const { prefixCls, style: tokenStyle } = useComponentConfig("InputNumber", "input-number");
    const locale = useLocale("InputNumber");
    const size = useComponentSize(sizeProp);
    const [value, setValue] = useControllableState<number | null>({
      value: valueProp,
      defaultValue,
      onChange,
    });
    const [draft, setDraft] = useState<string | null>(null);

    const toText = (next: number | null, userTyping = false, input = "") => {
      const raw =
        next === null
          ? ""
          : precisionProp !== undefined
            ? toFixedPrecision(next, precisionProp)
            : String(next);
      return formatter ? formatter(raw, { userTyping, input }) : raw;
    };

    const text = draft ?? toText(value);

    const commit = (raw: string) => {
      setDraft(null);
      const parsed = parseNumber(parser ? parser(raw) : raw);
      if (parsed === undefined) return;
      if (parsed === null) {
        setValue(null);
        return;
      }
      const clamped = clampValue(parsed, min, max);
      setValue(
        precisionProp === undefined
          ? clamped
          : Number(toFixedPrecision(clamped, precisionProp))
      );
    };

    const doStep = (direction: 1 | -1, multiplier = 1) => {
      if (disabled || readOnly) return;
      const offset = step * multiplier;
      const typed = draft === null ? undefined : parseNumber(parser ? parser(draft) : draft);
      const base = typed ?? value;
      const next = stepValue(base, offset, direction, {
        min,
        max,
        precision: precisionProp,
      });
      setDraft(null);
      setValue(next);
      onStep?.(next, { offset, type: direction === 1 ? "up" : "down" });
    };

    const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
      setDraft(event.target.value);
    };

    const handleKeyDown = (event: KeyboardEvent<HTMLInputElement>) => {
      if (event.key === "Enter") {
        commit(event.currentTarget.value);
        onPressEnter?.(event);
      } else if (keyboard && (event.key === "ArrowUp" || event.key === "ArrowDown")) {
        event.preventDefault();
        doStep(event.key === "ArrowUp" ? 1 : -1, event.shiftKey ? 10 : 1);
      }
      onKeyDown?.(event);
    };

    const handleBlur = (event: FocusEvent<HTMLInputElement>) => {
      if (draft !== null) commit(draft);
      onBlur?.(event);
    };

    const upDisabled = disabled || (max !== undefined && value !== null && value >= max);
    const downDisabled = disabled || (min !== undefined && value !== null && value <= min);
    const controlConfig = typeof controls === "object" ? controls : {};

    const field = (
      <span
        className={cn(
          prefixCls,
          "group",
          inputAffixWrapper({
            size,
            variant,
            status: status === "" ? "none" : status,
            disabled,
          }),
          "w-[90px] pe-0",
          addonBefore === undefined && addonAfter === undefined && className
        )}
        style={
          addonBefore === undefined && addonAfter === undefined
            ? { ...tokenStyle, ...style }
            : undefined
        }
      >
        {prefix !== undefined ? (
          <span className={cn(`${prefixCls}-prefix`, inputAffix())}>{prefix}</span>
        ) : null}
        <input
          {...props}
          ref={ref}
          role="spinbutton"
          inputMode="decimal"
          autoComplete="off"
          aria-valuemin={min}
          aria-valuemax={max}
          aria-valuenow={value ?? undefined}
          className={cn(`${prefixCls}-input`, inputElement(), "pe-[11px]")}
          value={text}
          disabled={disabled}
          readOnly={readOnly}
          onChange={handleChange}
          onKeyDown={handleKeyDown}
          onFocus={(event) => {
            if (formatter) setDraft(toText(value, true, event.currentTarget.value));
            onFocus?.(event);
          }}
          onBlur={handleBlur}
        />
        {controls && !readOnly ? (
          <span className={inputNumberHandlers()}>
            <button
              type="button"
              tabIndex={-1}
              aria-label={locale.increase}
              disabled={upDisabled}
              className={inputNumberHandler({ disabled: upDisabled })}
              onMouseDown={(event) => event.preventDefault()}
              onClick={() => doStep(1)}
            >
              {controlConfig.upIcon ?? <ChevronUp aria-hidden className="size-3" />}
            </button>
            <button
              type="button"
              tabIndex={-1}
              aria-label={locale.decrease}
              disabled={downDisabled}
              className={inputNumberHandler({ disabled: downDisabled })}
              onMouseDown={(event) => event.preventDefault()}
              onClick={() => doStep(-1)}
            >
              {controlConfig.downIcon ?? <ChevronDown aria-hidden className="size-3" />}
            </button>
          </span>
        ) : null}
      </span>
    );

    if (addonBefore === undefined && addonAfter === undefined) return field;

    return (
      <span
        className={cn(`${prefixCls}-group-wrapper`, inputGroup(), "w-auto", className)}
        style={{ ...tokenStyle, ...style }}
      >
        {addonBefore !== undefined ? (
          <span className={inputAddon({ size })}>{addonBefore}</span>
        ) : null}
        {field}
        {addonAfter !== undefined ? (
          <span className={inputAddon({ size })}>{addonAfter}</span>
        ) : null}
      </span>
    );
  }
);

InputNumber.displayName = "InputNumber";
