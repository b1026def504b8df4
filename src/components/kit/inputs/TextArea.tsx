// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/TextArea`
 * Purpose: Multi-line input with auto height, clear button and character count (Input.TextArea).
 * Invariants: With `autoSize`, height is recomputed after every value change and clamped to min/max rows.
 * Side-effects: none
 * @public
 */

"use client";

import { XCircle } from "lucide-react";
import type {
  ChangeEvent,
  KeyboardEvent,
  ReactNode,
  TextareaHTMLAttributes,
} from "react";
import {
  forwardRef,
  useImperativeHandle,
  useLayoutEffect,
  useRef,
  useState,
} from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import type { InputVariant } from "@/styles/ui";
import {
  inputAffixWrapper,
  inputClear,
  inputCount,
  inputElement,
  textarea,
} from "@/styles/ui";

import { useComponentConfig, useComponentSize, useLocale } from "../theme";
import type { AutoSizeOptions } from "./input-utils";
import {
  countCharacters,
  formatCount,
  getAutoSizeHeight,
  setNativeValue,
} from "./input-utils";

export interface TextAreaProps
  extends Omit<
    TextareaHTMLAttributes<HTMLTextAreaElement>,
    "value" | "defaultValue"
  > {
  value?: string;
  defaultValue?: string;
  size?: SizeType;
  variant?: InputVariant;
  status?: "" | "error" | "warning";
  autoSize?: boolean | AutoSizeOptions;
  allowClear?: boolean | { clearIcon?: ReactNode };
  showCount?: boolean;
  onPressEnter?: (event: KeyboardEvent<HTMLTextAreaElement>) => void;
  onClear?: () => void;
}

function readMetrics(element: HTMLTextAreaElement) {
  const computed = window.getComputedStyle(element);
  const px = (value: string) => Number.parseFloat(value) || 0;
  const lineHeight =
    px(computed.lineHeight) || px(computed.fontSize) * 1.5714 || 22;
  const boxExtra =
    px(computed.paddingTop) +
    px(computed.paddingBottom) +
    px(computed.borderTopWidth) +
    px(computed.borderBottomWidth);
  return { lineHeight, boxExtra };
}

export const TextArea = forwardRef<HTMLTextAreaElement, TextAreaProps>(
  function TextArea(
    {
      value: valueProp,
      defaultValue = "",
      size: sizeProp,
      variant = "outlined",
      status = "",
      autoSize = false,
      allowClear = false,
      showCount = false,
      maxLength,
      onPressEnter,
      onKeyDown,
      onChange,
      onClear,
      disabled = false,
      className,
      style,
      ...props
    },
    ref
  ) {
    const { prefixCls, style: tokenStyle } = useComponentConfig(
      "Input",
      "textarea"
    );
    const locale = useLocale("Input");
    const size = useComponentSize(sizeProp);
    const [value, setValue] = useControllableState({
      value: valueProp,
      defaultValue,
    });
    const [height, setHeight] = useState<number>();
    const textareaRef = useRef<HTMLTextAreaElement>(null);
    useImperativeHandle<HTMLTextAreaElement | null, HTMLTextAreaElement | null>(
      ref,
      () => textareaRef.current
    );

    const autoSizeOptions =
      typeof autoSize === "object" ? autoSize : autoSize ? {} : null;
    const minRows = autoSizeOptions?.minRows;
    const maxRows = autoSizeOptions?.maxRows;
    const autoSizing = autoSizeOptions !== null;

    // biome-ignore lint/correctness/useExhaustiveDependencies: re-measure when the text changes
    useLayoutEffect(() => {
      const element = textareaRef.current;
      if (!autoSizing || !element) return;
      const { lineHeight, boxExtra } = readMetrics(element);
      const previous = element.style.height;
      element.style.height = "auto";
      const next = getAutoSizeHeight(
        { scrollHeight: element.scrollHeight, lineHeight, boxExtra },
        { minRows, maxRows }
      );
      element.style.height = previous;
      setHeight(next);
    }, [value, autoSizing, minRows, maxRows]);

    const handleChange = (event: ChangeEvent<HTMLTextAreaElement>) => {
      setValue(event.target.value);
      onChange?.(event);
    };

    const handleKeyDown = (event: KeyboardEvent<HTMLTextAreaElement>) => {
      if (event.key === "Enter") onPressEnter?.(event);
      onKeyDown?.(event);
    };

    const handleClear = () => {
      const element = textareaRef.current;
      if (!element) return;
      setNativeValue(element, "");
      element.focus();
      onClear?.();
    };

    const count = countCharacters(value);
    const wrapped = Boolean(allowClear) || showCount;

    const field = (
      <textarea
        {...props}
        ref={textareaRef}
        className={cn(
          prefixCls,
          wrapped
            ? inputElement()
            : inputAffixWrapper({
                size,
                variant,
                status: status === "" ? "none" : status,
                disabled,
              }),
          textarea({ autoSize: autoSizing }),
          !wrapped && className
        )}
        style={
          wrapped
            ? { height, overflowY: autoSizing ? "hidden" : undefined }
            : {
                ...tokenStyle,
                ...style,
                height: height ?? style?.height,
                overflowY: autoSizing ? "hidden" : undefined,
              }
        }
        value={value}
        maxLength={maxLength}
        disabled={disabled}
        aria-invalid={status === "error" || undefined}
        onChange={handleChange}
        onKeyDown={handleKeyDown}
      />
    );

    if (!wrapped) return field;

    const clearIcon =
      typeof allowClear === "object" && allowClear.clearIcon !== undefined
        ? allowClear.clearIcon
        : <XCircle aria-hidden className="size-3.5" />;

    return (
      <span
        className={cn(
          `${prefixCls}-affix-wrapper`,
          inputAffixWrapper({
            size,
            variant,
            status: status === "" ? "none" : status,
            disabled,
          }),
          "items-start",
          showCount && "mb-5",
          className
        )}
        style={{ ...tokenStyle, ...style }}
      >
        {field}
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
        {showCount ? (
          <span
            className={cn(
              "absolute bottom-0 end-0 translate-y-full",
              inputCount({
                exceeded: maxLength !== undefined && count > maxLength,
              })
            )}
          >
            {formatCount(count, maxLength)}
          </span>
        ) : null}
      </span>
    );
  }
);

TextArea.displayName = "Input.TextArea";
