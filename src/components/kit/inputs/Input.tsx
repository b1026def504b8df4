// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/Input`
 * Purpose: Text input with affixes, addons, clear button and character count; Password and Search variants.
 * Scope: Input.TextArea and Input.OTP live in their own modules and are attached as statics here.
 * Invariants:
 * - The ref points at the native `<input>`; `className`/`style` go to the outermost element.
 * - Clearing goes through the native value setter so `onChange` receives a real change event.
 * - `onPressEnter` fires on Enter keydown before `onKeyDown`.
 * Side-effects: none
 * Links: src/components/kit/inputs/input-utils.ts
 * @public
 */

"use client";

import { Eye, EyeOff, Loader2, Search as SearchIcon, XCircle } from "lucide-react";
import type {
  ChangeEvent,
  InputHTMLAttributes,
  KeyboardEvent,
  MouseEvent,
  ReactNode,
} from "react";
import { forwardRef, useImperativeHandle, useRef, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import type { InputVariant } from "@/styles/ui";
import {
  inputAddon,
  inputAffix,
  inputAffixWrapper,
  inputClear,
  inputCount,
  inputElement,
  inputGroup,
} from "@/styles/ui";

import { Button } from "../general/Button";
import { useComponentConfig, useComponentSize, useLocale } from "../theme";
import { countCharacters, formatCount, setNativeValue } from "./input-utils";
import { OTP } from "./OTP";
import { TextArea } from "./TextArea";

export type InputStatus = "" | "error" | "warning";

export interface CountConfig {
  max?: number;
  formatter?: (info: {
    value: string;
    count: number;
    maxLength?: number | undefined;
  }) => ReactNode;
}

export interface InputProps
  extends Omit<
    InputHTMLAttributes<HTMLInputElement>,
    "size" | "prefix" | "value" | "defaultValue"
  > {
  value?: string;
  defaultValue?: string;
  size?: SizeType;
  variant?: InputVariant;
  status?: InputStatus;
  prefix?: ReactNode;
  suffix?: ReactNode;
  addonBefore?: ReactNode;
  addonAfter?: ReactNode;
  allowClear?: boolean | { clearIcon?: ReactNode };
  showCount?: boolean | CountConfig;
  onPressEnter?: (event: KeyboardEvent<HTMLInputElement>) => void;
  onClear?: () => void;
  rootClassName?: string;
}

export function renderCount(
  showCount: InputProps["showCount"],
  value: string,
  maxLength: number | undefined
): ReactNode {
  if (!showCount) return null;
  const config = typeof showCount === "object" ? showCount : {};
  const limit = config.max ?? maxLength;
  const count = countCharacters(value);
  const text = config.formatter
    ? config.formatter({ value, count, maxLength: limit })
    : formatCount(count, limit);
  return (
    <span className={inputCount({ exceeded: limit !== undefined && count > limit })}>
      {text}
    </span>
  );
}

const InputRoot = forwardRef<HTMLInputElement, InputProps>(function Input(
  {
    value: valueProp,
    defaultValue = "",
    size: sizeProp,
    variant = "outlined",
    status = "",
    prefix,
    suffix,
    addonBefore,
    addonAfter,
    allowClear = false,
    showCount = false,
    onPressEnter,
    onKeyDown,
    onChange,
    onClear,
    disabled = false,
    maxLength,
    className,
    rootClassName,
    style,
    type = "text",
    ...props
  },
  ref
) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Input", "input");
  const locale = useLocale("Input");
  const size = useComponentSize(sizeProp);
  const [value, setValue] = useControllableState({
    value: valueProp,
    defaultValue,
  });
  const inputRef = useRef<HTMLInputElement>(null);
  useImperativeHandle<HTMLInputElement | null, HTMLInputElement | null>(
    ref,
    () => inputRef.current
  );

  const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
    setValue(event.target.value);
    onChange?.(event);
  };

  const handleKeyDown = (event: KeyboardEvent<HTMLInputElement>) => {
    if (event.key === "Enter") onPressEnter?.(event);
    onKeyDown?.(event);
  };

  const handleClear = (event: MouseEvent<HTMLButtonElement>) => {
    event.preventDefault();
    const element = inputRef.current;
    if (!element) return;
    setNativeValue(element, "");
    element.focus();
    onClear?.();
  };

  const clearIcon =
    typeof allowClear === "object" && allowClear.clearIcon !== undefined
      ? allowClear.clearIcon
      : <XCircle aria-hidden className="size-3.5" />;
  const count = renderCount(showCount, value, maxLength);
  const hasSuffix = Boolean(allowClear) || count !== null || suffix !== undefined;

  const field = (
    <span
      className={cn(
        `${prefixCls}-affix-wrapper`,
        inputAffixWrapper({
          size,
          variant,
          status: status === "" ? "none" : status,
          disabled,
        }),
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
        ref={inputRef}
        type={type}
        className={cn(prefixCls, inputElement())}
        value={value}
        disabled={disabled}
        maxLength={maxLength}
        aria-invalid={status === "error" || undefined}
        onChange={handleChange}
        onKeyDown={handleKeyDown}
      />
      {hasSuffix ? (
        <span className={cn(`${prefixCls}-suffix`, inputAffix({ muted: true }))}>
          {allowClear ? (
            <button
              type="button"
              tabIndex={-1}
              aria-label={locale.clear}
              className={inputClear({ hidden: value === "" || disabled })}
              onClick={handleClear}
            >
              {clearIcon}
            </button>
          ) : null}
          {count}
          {suffix}
        </span>
      ) : null}
    </span>
  );

  if (addonBefore === undefined && addonAfter === undefined) return field;

  return (
    <span
      className={cn(`${prefixCls}-group-wrapper`, inputGroup(), rootClassName, className)}
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
});

export interface PasswordProps extends Omit<InputProps, "type"> {
  visibilityToggle?:
    | boolean
    | { visible?: boolean; onVisibleChange?: (visible: boolean) => void };
  iconRender?: (visible: boolean) => ReactNode;
}

const Password = forwardRef<HTMLInputElement, PasswordProps>(function Password(
  { visibilityToggle = true, iconRender, suffix, disabled, ...props },
  ref
) {
  const locale = useLocale("Input");
  const toggleConfig =
    typeof visibilityToggle === "object" ? visibilityToggle : {};
  const [visible, setVisible] = useControllableState({
    value: toggleConfig.visible,
    defaultValue: false,
    onChange: toggleConfig.onVisibleChange,
  });

  const icon = iconRender ? (
    iconRender(visible)
  ) : visible ? (
    <Eye aria-hidden className="size-3.5" />
  ) : (
    <EyeOff aria-hidden className="size-3.5" />
  );

  const toggle =
    visibilityToggle === false ? null : (
      <button
        type="button"
        aria-label={visible ? locale.hidePassword : locale.showPassword}
        aria-pressed={visible}
        disabled={disabled}
        className={inputClear()}
        onMouseDown={(event) => event.preventDefault()}
        onClick={() => setVisible((prev) => !prev)}
      >
        {icon}
      </button>
    );

  return (
    <InputRoot
      {...props}
      ref={ref}
      disabled={disabled}
      type={visible ? "text" : "password"}
      suffix={
        <>
          {suffix}
          {toggle}
        </>
      }
    />
  );
});

export type SearchSource = "input" | "clear";

export interface SearchProps extends InputProps {
  enterButton?: boolean | ReactNode;
  loading?: boolean;
  onSearch?: (
    value: string,
    event: KeyboardEvent<HTMLInputElement> | MouseEvent<HTMLElement> | undefined,
    info: { source: SearchSource }
  ) => void;
}

const Search = forwardRef<HTMLInputElement, SearchProps>(function Search(
  {
    enterButton = false,
    loading = false,
    onSearch,
    onPressEnter,
    onChange,
    onClear,
    value: valueProp,
    defaultValue = "",
    disabled = false,
    size,
    addonAfter,
    suffix,
    ...props
  },
  ref
) {
  const [value, setValue] = useControllableState({
    value: valueProp,
    defaultValue,
  });
  // Composition text is not committed until the IME finishes.
  const [composing, setComposing] = useState(false);

  const search = (
    event: KeyboardEvent<HTMLInputElement> | MouseEvent<HTMLElement> | undefined,
    source: SearchSource = "input"
  ) => {
    if (loading) return;
    onSearch?.(value, event, { source });
  };

  const icon = loading ? (
    <Loader2 aria-hidden className="size-3.5 animate-spin" />
  ) : (
    <SearchIcon aria-hidden className="size-3.5" />
  );

  const button =
    enterButton === false ? null : (
      <Button
        type="primary"
        size={size}
        disabled={disabled}
        aria-label="search"
        className="rounded-s-none"
        icon={enterButton === true ? icon : undefined}
        loading={enterButton !== true && loading}
        onClick={(event) => search(event)}
      >
        {enterButton === true ? null : enterButton}
      </Button>
    );

  return (
    <InputRoot
      {...props}
      ref={ref}
      size={size}
      disabled={disabled}
      value={value}
      onChange={(event) => {
        setValue(event.target.value);
        onChange?.(event);
      }}
      onCompositionStart={() => setComposing(true)}
      onCompositionEnd={() => setComposing(false)}
      onPressEnter={(event) => {
        if (!composing) search(event);
        onPressEnter?.(event);
      }}
      onClear={() => {
        onSearch?.("", undefined, { source: "clear" });
        onClear?.();
      }}
      suffix={
        button === null ? (
          <>
            {suffix}
            <button
              type="button"
              aria-label="search"
              disabled={disabled}
              className={inputClear()}
              onClick={(event) => search(event)}
            >
              {icon}
            </button>
          </>
        ) : (
          suffix
        )
      }
      addonAfter={button ?? addonAfter}
    />
  );
});

InputRoot.displayName = "Input";
Password.displayName = "Input.Password";
Search.displayName = "Input.Search";

export const Input = Object.assign(InputRoot, {
  TextArea,
  Password,
  Search,
  OTP,
});

