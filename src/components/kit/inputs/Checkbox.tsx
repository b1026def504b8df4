// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/Checkbox`
 * Purpose: Checkbox with indeterminate state; Checkbox.Group manages a list of checked values.
 * Scope: Native `<input type="checkbox">` kept for form and a11y semantics, drawn box on top.
 * Invariants:
 * - Group `onChange(values)` lists checked values in option order, not click order.
 * - Inside a group, a Checkbox's `checked` comes from the group value.
 * Side-effects: none
 * @public
 */

"use client";

import { Check } from "lucide-react";
import type {
  ChangeEvent,
  CSSProperties,
  InputHTMLAttributes,
  ReactNode,
} from "react";
import {
  createContext,
  forwardRef,
  useContext,
  useEffect,
  useImperativeHandle,
  useRef,
} from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import {
  checkboxBox,
  checkboxGroup,
  checkboxIndeterminate,
  checkboxWrapper,
} from "@/styles/ui";

import { useComponentConfig } from "../theme";

export type CheckboxValue = string | number;

export interface CheckboxOption {
  label: ReactNode;
  value: CheckboxValue;
  disabled?: boolean;
}

interface CheckboxGroupContextValue {
  value: CheckboxValue[];
  disabled: boolean;
  name?: string | undefined;
  toggle: (value: CheckboxValue) => void;
}

const CheckboxGroupContext = createContext<CheckboxGroupContextValue | null>(
  null
);

export interface CheckboxProps
  extends Omit<
    InputHTMLAttributes<HTMLInputElement>,
    "type" | "value" | "onChange" | "checked" | "defaultChecked"
  > {
  checked?: boolean;
  defaultChecked?: boolean;
  indeterminate?: boolean;
  value?: CheckboxValue;
  onChange?: (event: ChangeEvent<HTMLInputElement>) => void;
  children?: ReactNode;
}

const CheckboxRoot = forwardRef<HTMLInputElement, CheckboxProps>(
  function Checkbox(
    {
      checked: checkedProp,
      defaultChecked = false,
      indeterminate = false,
      value,
      onChange,
      disabled: disabledProp,
      className,
      style,
      children,
      name,
      ...props
    },
    ref
  ) {
    const { prefixCls, style: tokenStyle } = useComponentConfig("Checkbox", "checkbox");
    const group = useContext(CheckboxGroupContext);
    const [innerChecked, setInnerChecked] = useControllableState({
      value: checkedProp,
      defaultValue: defaultChecked,
    });
    const inputRef = useRef<HTMLInputElement>(null);
    useImperativeHandle<HTMLInputElement | null, HTMLInputElement | null>(
      ref,
      () => inputRef.current
    );

    const inGroup = group !== null && value !== undefined;
    const checked = inGroup ? group.value.includes(value) : innerChecked;
    const disabled = Boolean(disabledProp) || (group?.disabled ?? false);

    useEffect(() => {
      if (inputRef.current) inputRef.current.indeterminate = indeterminate;
    }, [indeterminate]);

    const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
      if (disabled) return;
      if (inGroup) group.toggle(value);
      else setInnerChecked(event.target.checked);
      onChange?.(event);
    };

    const state = indeterminate ? "indeterminate" : checked ? "checked" : "unchecked";

    return (
      <label
        className={cn(prefixCls, "group", checkboxWrapper({ disabled }), className)}
        style={{ ...tokenStyle, ...style }}
      >
        <span className={checkboxBox({ state, disabled })}>
          <input
            {...props}
            ref={inputRef}
            type="checkbox"
            className="absolute inset-0 m-0 cursor-[inherit] opacity-0"
            checked={checked}
            disabled={disabled}
            name={name ?? group?.name}
            value={value}
            aria-checked={indeterminate ? "mixed" : checked}
            onChange={handleChange}
          />
          {state === "checked" ? (
            <Check aria-hidden className="size-3" strokeWidth={3} />
          ) : null}
          {state === "indeterminate" ? (
            <span aria-hidden className={checkboxIndeterminate({ disabled })} />
          ) : null}
        </span>
        {children !== undefined && children !== null ? (
          <span>{children}</span>
        ) : null}
      </label>
    );
  }
);

export interface CheckboxGroupProps {
  className?: string;
  style?: CSSProperties;
  options?: (CheckboxValue | CheckboxOption)[];
  value?: CheckboxValue[];
  defaultValue?: CheckboxValue[];
  onChange?: (values: CheckboxValue[]) => void;
  disabled?: boolean;
  name?: string;
  children?: ReactNode;
}

export function normalizeCheckboxOptions(
  options: readonly (CheckboxValue | CheckboxOption)[]
): CheckboxOption[] {
  return options.map((option) =>
    typeof option === "object" ? option : { label: option, value: option }
  );
}

/** Toggles `value` and returns the checked list ordered like `order`; unknown values go last. */
export function toggleGroupValue(
  current: readonly CheckboxValue[],
  value: CheckboxValue,
  order: readonly CheckboxValue[]
): CheckboxValue[] {
  const next = current.includes(value)
    ? current.filter((item) => item !== value)
    : [...current, value];
  const rank = (item: CheckboxValue) => {
    const index = order.indexOf(item);
    return index === -1 ? order.length : index;
  };
  return [...next].sort((a, b) => rank(a) - rank(b));
}

function CheckboxGroup({
  className,
  style,
  options,
  value,
  defaultValue = [],
  onChange,
  disabled = false,
  name,
  children,
}: CheckboxGroupProps) {
  const { prefixCls } = useComponentConfig("Checkbox", "checkbox-group");
  const [checkedValues, setCheckedValues] = useControllableState({
    value,
    defaultValue,
    onChange,
  });
  const normalized = normalizeCheckboxOptions(options ?? []);
  const order = normalized.map((option) => option.value);

  const context: CheckboxGroupContextValue = {
    value: checkedValues,
    disabled,
    name,
    toggle: (item) =>
      setCheckedValues((prev) => toggleGroupValue(prev, item, order)),
  };

  return (
    <CheckboxGroupContext.Provider value={context}>
      <div
        role="group"
        className={cn(prefixCls, checkboxGroup(), className)}
        style={style}
      >
        {options
          ? normalized.map((option) => (
              <CheckboxRoot
                key={String(option.value)}
                value={option.value}
                disabled={option.disabled}
              >
                {option.label}
              </CheckboxRoot>
            ))
          : children}
      </div>
    </CheckboxGroupContext.Provider>
  );
}

CheckboxRoot.displayName = "Checkbox";
CheckboxGroup.displayName = "Checkbox.Group";

export const Checkbox = Object.assign(CheckboxRoot, { Group: CheckboxGroup });
