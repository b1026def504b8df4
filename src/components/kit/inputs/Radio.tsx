// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/Radio`
 * Purpose: Radio, Radio.Group and Radio.Button (segmented button look).
 * Scope: Native radio inputs sharing one generated `name` per group.
 * Invariants:
 * - Arrow keys move selection to the next/previous enabled radio in the group, wrapping.
 * - A group's `optionType="button"` renders options as Radio.Button.
 * Side-effects: none
 * @public
 */

"use client";

import type {
  ChangeEvent,
  CSSProperties,
  InputHTMLAttributes,
  KeyboardEvent,
  ReactNode,
} from "react";
import { createContext, forwardRef, useContext, useId } from "react";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import {
  checkboxWrapper,
  radioButton,
  radioDot,
  radioGroup,
} from "@/styles/ui";

import { useComponentConfig, useComponentSize } from "../theme";

export type RadioValue = string | number;
export type RadioButtonStyle = "outline" | "solid";

export interface RadioOption {
  label: ReactNode;
  value: RadioValue;
  disabled?: boolean;
}

interface RadioGroupContextValue {
  value: RadioValue | undefined;
  name: string;
  disabled: boolean;
  size: SizeType;
  buttonStyle: RadioButtonStyle;
  select: (value: RadioValue) => void;
}

const RadioGroupContext = createContext<RadioGroupContextValue | null>(null);

export interface RadioProps
  extends Omit<
    InputHTMLAttributes<HTMLInputElement>,
    "type" | "value" | "onChange" | "size"
  > {
  value?: RadioValue;
  onChange?: (event: ChangeEvent<HTMLInputElement>) => void;
  children?: ReactNode;
}

interface RadioStateInput {
  value: RadioValue | undefined;
  checked: boolean | undefined;
  defaultChecked: boolean | undefined;
  disabled: boolean | undefined;
  onChange: RadioProps["onChange"];
}

function useRadioState(
  {
    value,
    checked: checkedProp,
    defaultChecked = false,
    disabled: disabledProp,
    onChange,
  }: RadioStateInput,
  group: RadioGroupContextValue | null
) {
  const [ownChecked, setOwnChecked] = useControllableState({
    value: checkedProp,
    defaultValue: defaultChecked,
  });
  const inGroup = group !== null && value !== undefined;
  const checked = inGroup ? group.value === value : ownChecked;
  const disabled = Boolean(disabledProp) || (group?.disabled ?? false);
  const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
    if (disabled) return;
    if (inGroup) group.select(value);
    else setOwnChecked(true);
    onChange?.(event);
  };
  return { checked, disabled, handleChange };
}

const RadioRoot = forwardRef<HTMLInputElement, RadioProps>(function Radio(
  {
    className,
    style,
    children,
    value,
    name,
    checked: checkedProp,
    defaultChecked,
    disabled: disabledProp,
    onChange,
    ...inputProps
  },
  ref
) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Radio", "radio");
  const group = useContext(RadioGroupContext);
  const { checked, disabled, handleChange } = useRadioState(
    {
      value,
      checked: checkedProp,
      defaultChecked,
      disabled: disabledProp,
      onChange,
    },
    group
  );

  return (
    <label
      className={cn(prefixCls, "group", checkboxWrapper({ disabled }), className)}
      style={{ ...tokenStyle, ...style }}
    >
      <span className={radioDot({ checked, disabled })}>
        <input
          {...inputProps}
          ref={ref}
          type="radio"
          className="absolute inset-0 m-0 cursor-[inherit] opacity-0"
          name={name ?? group?.name}
          value={value}
          checked={checked}
          disabled={disabled}
          onChange={handleChange}
        />
      </span>
      {children !== undefined && children !== null ? (
        <span>{children}</span>
      ) : null}
    </label>
  );
});

const RadioButton = forwardRef<HTMLInputElement, RadioProps>(
  function RadioButton(
    {
      className,
      style,
      children,
      value,
      name,
      checked: checkedProp,
      defaultChecked,
      disabled: disabledProp,
      onChange,
      ...inputProps
    },
    ref
  ) {
    const { prefixCls } = useComponentConfig("Radio", "radio-button-wrapper");
    const group = useContext(RadioGroupContext);
    const size = useComponentSize(group?.size);
    const { checked, disabled, handleChange } = useRadioState(
      {
        value,
        checked: checkedProp,
        defaultChecked,
        disabled: disabledProp,
        onChange,
      },
      group
    );

    return (
      <label
        className={cn(
          prefixCls,
          radioButton({
            size,
            checked,
            disabled,
            buttonStyle: group?.buttonStyle ?? "outline",
          }),
          "focus-within:z-[2] focus-within:outline focus-within:outline-4 focus-within:outline-primary-border",
          className
        )}
        style={style}
      >
        <input
          {...inputProps}
          ref={ref}
          type="radio"
          className="absolute inset-0 m-0 cursor-[inherit] opacity-0"
          name={name ?? group?.name}
          value={value}
          checked={checked}
          disabled={disabled}
          onChange={handleChange}
        />
        <span>{children}</span>
      </label>
    );
  }
);

export interface RadioGroupProps {
  className?: string;
  style?: CSSProperties;
  options?: (RadioValue | RadioOption)[];
  value?: RadioValue;
  defaultValue?: RadioValue;
  onChange?: (value: RadioValue) => void;
  optionType?: "default" | "button";
  buttonStyle?: RadioButtonStyle;
  size?: SizeType;
  disabled?: boolean;
  block?: boolean;
  name?: string;
  children?: ReactNode;
}

const nextKeys: Record<string, 1 | -1> = {
  ArrowRight: 1,
  ArrowDown: 1,
  ArrowLeft: -1,
  ArrowUp: -1,
};

function RadioGroup({
  className,
  style,
  options,
  value,
  defaultValue,
  onChange,
  optionType = "default",
  buttonStyle = "outline",
  size: sizeProp,
  disabled = false,
  block = false,
  name,
  children,
}: RadioGroupProps) {
  const { prefixCls, direction } = useComponentConfig("Radio", "radio-group");
  const size = useComponentSize(sizeProp);
  const generatedName = useId();
  const [selected, setSelected] = useControllableState<RadioValue | undefined>({
    value,
    defaultValue,
    onChange: (next) => {
      if (next !== undefined) onChange?.(next);
    },
  });

  const handleKeyDown = (event: KeyboardEvent<HTMLDivElement>) => {
    const step = nextKeys[event.key];
    if (step === undefined) return;
    const radios = Array.from(
      event.currentTarget.querySelectorAll<HTMLInputElement>(
        'input[type="radio"]:not(:disabled)'
      )
    );
    const index = radios.findIndex((radio) => radio === event.target);
    if (index === -1 || radios.length === 0) return;
    event.preventDefault();
    const horizontal = event.key === "ArrowLeft" || event.key === "ArrowRight";
    const signed = horizontal && direction === "rtl" ? -step : step;
    const target = radios[(index + signed + radios.length) % radios.length];
    if (!target) return;
    target.focus();
    target.click();
  };

  const context: RadioGroupContextValue = {
    value: selected,
    name: name ?? generatedName,
    disabled,
    size,
    buttonStyle,
    select: setSelected,
  };

  const Item = optionType === "button" ? RadioButton : RadioRoot;

  return (
    <RadioGroupContext.Provider value={context}>
      <div
        role="radiogroup"
        className={cn(
          prefixCls,
          radioGroup({ button: optionType === "button", block }),
          className
        )}
        style={style}
        onKeyDown={handleKeyDown}
      >
        {options
          ? options.map((option) => {
              const item =
                typeof option === "object"
                  ? option
                  : { label: option, value: option };
              return (
                <Item
                  key={String(item.value)}
                  value={item.value}
                  disabled={item.disabled}
                  className={block ? "flex-1 justify-center" : undefined}
                >
                  {item.label}
                </Item>
              );
            })
          : children}
      </div>
    </RadioGroupContext.Provider>
  );
}

RadioRoot.displayName = "Radio";
RadioButton.displayName = "Radio.Button";
RadioGroup.displayName = "Radio.Group";

export const Radio = Object.assign(RadioRoot, {
  Group: RadioGroup,
  Button: RadioButton,
});
