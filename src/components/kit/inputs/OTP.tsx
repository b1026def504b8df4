// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/OTP`
 * Purpose: One-time-code input split into single-character cells (Input.OTP).
 * Scope: Typing advances focus, Backspace on an empty cell moves back, paste fills from the focused cell.
 * Invariants:
 * - `onChange(value)` fires only when every cell holds a character.
 * - Cells are positional: clearing one leaves the others where they are.
 * - `formatter` runs per cell, so a formatted character stays in its cell.
 * Side-effects: none
 * @public
 */

"use client";

import type {
  ClipboardEvent,
  CSSProperties,
  KeyboardEvent,
} from "react";
import { forwardRef, useRef } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import type { InputVariant } from "@/styles/ui";
import { inputAffixWrapper, otp, otpCell } from "@/styles/ui";

import { useComponentConfig, useComponentSize } from "../theme";
import { fillOtpCells, formatOtpCells, toOtpCells } from "./input-utils";

export interface OTPProps {
  className?: string;
  style?: CSSProperties;
  length?: number;
  value?: string;
  defaultValue?: string;
  onChange?: (value: string) => void;
  onInput?: (cells: string[]) => void;
  formatter?: (value: string) => string;
  mask?: boolean | string;
  size?: SizeType;
  variant?: InputVariant;
  status?: "" | "error" | "warning";
  disabled?: boolean;
  autoFocus?: boolean;
}

export const OTP = forwardRef<HTMLDivElement, OTPProps>(function OTP(
  {
    className,
    style,
    length = 6,
    value,
    defaultValue = "",
    onChange,
    onInput,
    formatter,
    mask = false,
    size: sizeProp,
    variant = "outlined",
    status = "",
    disabled = false,
    autoFocus = false,
  },
  ref
) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Input", "otp");
  const size = useComponentSize(sizeProp);
  const [cells, setCells] = useControllableState<string[]>({
    value: value === undefined ? undefined : toOtpCells(value, length),
    defaultValue: toOtpCells(defaultValue, length),
  });
  const inputsRef = useRef<(HTMLInputElement | null)[]>([]);

  const focusCell = (index: number) => {
    const target = inputsRef.current[Math.max(0, Math.min(index, length - 1))];
    target?.focus();
    target?.select();
  };

  const commit = (nextCells: string[]) => {
    const normalized = formatter ? formatOtpCells(nextCells, formatter) : nextCells;
    onInput?.(normalized);
    setCells(normalized);
    if (normalized.every((cell) => cell !== "")) {
      onChange?.(normalized.join(""));
    }
  };

  const write = (index: number, input: string) => {
    const { cells: nextCells, nextIndex } = fillOtpCells(cells, index, input);
    commit(nextCells);
    if (input !== "") focusCell(nextIndex);
  };

  const handleKeyDown = (index: number, event: KeyboardEvent<HTMLInputElement>) => {
    if (event.key === "Backspace" && cells[index] === "") {
      event.preventDefault();
      write(Math.max(0, index - 1), "");
      focusCell(index - 1);
    } else if (event.key === "ArrowLeft") {
      event.preventDefault();
      focusCell(index - 1);
    } else if (event.key === "ArrowRight") {
      event.preventDefault();
      focusCell(index + 1);
    }
  };

  const handlePaste = (index: number, event: ClipboardEvent<HTMLInputElement>) => {
    event.preventDefault();
    write(index, event.clipboardData.getData("text").trim());
  };

  const display = (cell: string) =>
    cell !== "" && mask !== false ? (mask === true ? "•" : mask) : cell;

  return (
    <div
      ref={ref}
      role="group"
      className={cn(prefixCls, otp(), className)}
      style={{ ...tokenStyle, ...style }}
    >
      {cells.map((cell, index) => (
        <input
          // biome-ignore lint/suspicious/noArrayIndexKey: cells are positional
          key={index}
          ref={(element) => {
            inputsRef.current[index] = element;
          }}
          aria-label={`OTP ${index + 1}`}
          inputMode="text"
          autoComplete={index === 0 ? "one-time-code" : "off"}
          // biome-ignore lint/a11y/noAutofocus: opt-in prop
          autoFocus={autoFocus && index === 0}
          disabled={disabled}
          className={cn(
            inputAffixWrapper({
              size,
              variant,
              status: status === "" ? "none" : status,
              disabled,
            }),
            otpCell({ size }),
            "px-0 text-center outline-none"
          )}
          value={display(cell)}
          onFocus={(event) => event.currentTarget.select()}
          onChange={(event) => {
            const raw = event.target.value;
            const previous = display(cell);
            // Keep only the freshly typed text when the cell already held a character.
            const typed =
              previous !== "" && raw.length > 1 && raw.startsWith(previous)
                ? raw.slice(previous.length)
                : raw;
            write(index, typed);
          }}
          onKeyDown={(event) => handleKeyDown(index, event)}
          onPaste={(event) => handlePaste(index, event)}
        />
      ))}
    </div>
  );
});

OTP.displayName = "Input.OTP";
