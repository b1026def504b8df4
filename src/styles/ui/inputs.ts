// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/ui/inputs`
 * Purpose: Data entry styling factories (checkbox, radio, switch, input, input number, rate, segmented, select, slider, date picker, time picker, upload).
 * Scope: Provides CVA factories for data entry components. Does not handle component logic.
 * Invariants: All variants use design tokens; factories return valid Tailwind class strings.
 * Side-effects: none
 * Links: src/components/kit/inputs
 * @public
 */

import { cva, type VariantProps } from "class-variance-authority";

import type { SizeType } from "@/styles/theme";

const focusRing =
  "focus-visible:outline focus-visible:outline-4 focus-visible:outline-offset-1 focus-visible:outline-primary-border";

export const checkboxWrapper = cva(
  "inline-flex cursor-pointer items-baseline gap-2 text-ant text-fg",
  {
    variants: {
      disabled: { true: "cursor-not-allowed text-fg-quaternary", false: "" },
    },
    defaultVariants: { disabled: false },
  }
);

export const checkboxBox = cva(
  `relative inline-flex size-4 flex-none translate-y-[3px] items-center justify-center rounded-sm border border-solid transition-colors ${focusRing}`,
  {
    variants: {
      state: {
        unchecked: "border-line bg-container",
        checked: "border-primary bg-primary text-fg-inverse",
        indeterminate: "border-line bg-container",
      },
      disabled: {
        true: "border-line bg-fill-tertiary text-fg-quaternary",
        false: "group-hover:border-primary",
      },
    },
    defaultVariants: { state: "unchecked", disabled: false },
  }
);

export const checkboxIndeterminate = cva("size-2 bg-primary", {
  variants: {
    disabled: { true: "bg-fg-quaternary", false: "" },
  },
  defaultVariants: { disabled: false },
});

export const checkboxGroup = cva("inline-flex flex-wrap gap-x-2 gap-y-2");

export const radioDot = cva(
  `relative inline-flex size-4 flex-none translate-y-[3px] items-center justify-center rounded-full border border-solid transition-colors ${focusRing}`,
  {
    variants: {
      checked: {
        true: "border-primary bg-primary after:size-1.5 after:rounded-full after:bg-container after:content-['']",
        false: "border-line bg-container",
      },
      disabled: {
        true: "border-line bg-fill-tertiary after:bg-fg-quaternary",
        false: "group-hover:border-primary",
      },
    },
    defaultVariants: { checked: false, disabled: false },
  }
);

export const radioGroup = cva("inline-flex", {
  variants: {
    button: { true: "", false: "flex-wrap gap-x-2 gap-y-2" },
    block: { true: "flex w-full", false: "" },
  },
  defaultVariants: { button: false, block: false },
});

const radioButtonSize = {
  small: "h-control-sm px-[7px] leading-[calc(var(--ant-control-height-sm)-2px)]",
  middle: "h-control px-[15px] leading-[calc(var(--ant-control-height)-2px)]",
  large: "h-control-lg px-[15px] text-ant-lg leading-[calc(var(--ant-control-height-lg)-2px)]",
} satisfies Record<SizeType, string>;

export const radioButton = cva(
  `relative inline-flex cursor-pointer items-center border border-solid border-line bg-container text-fg transition-colors first:rounded-s last:rounded-e [&:not(:first-child)]:-ms-px ${focusRing} focus-visible:z-[2]`,
  {
    variants: {
      size: radioButtonSize,
      checked: { true: "z-[1]", false: "hover:text-primary" },
      buttonStyle: { outline: "", solid: "" },
      disabled: {
        true: "cursor-not-allowed bg-fill-tertiary text-fg-quaternary hover:text-fg-quaternary",
        false: "",
      },
    },
    compoundVariants: [
      {
        checked: true,
        buttonStyle: "outline",
        disabled: false,
        class: "border-primary text-primary",
      },
      {
        checked: true,
        buttonStyle: "solid",
        disabled: false,
        class: "border-primary bg-primary text-fg-inverse hover:bg-primary-hover",
      },
      { checked: true, disabled: true, class: "bg-fill text-fg-quaternary" },
    ],
    defaultVariants: {
      size: "middle",
      checked: false,
      buttonStyle: "outline",
      disabled: false,
    },
  }
);

export const switchRoot = cva(
  `relative inline-flex flex-none cursor-pointer items-center rounded-full border-0 p-0 align-middle transition-colors ${focusRing}`,
  {
    variants: {
      size: {
        default: "h-[22px] min-w-[44px]",
        small: "h-4 min-w-7",
      },
      checked: {
        true: "bg-primary hover:bg-primary-hover",
        false: "bg-[rgba(0,0,0,0.25)] hover:bg-[rgba(0,0,0,0.45)]",
      },
      disabled: { true: "cursor-not-allowed opacity-65", false: "" },
    },
    defaultVariants: { size: "default", checked: false, disabled: false },
  }
);

export const switchHandle = cva(
  "absolute top-0.5 inline-flex items-center justify-center rounded-full bg-fg-inverse text-primary shadow-[0_2px_4px_0_rgba(0,35,11,0.2)] transition-all duration-200",
  {
    variants: {
      size: { default: "size-[18px]", small: "size-3" },
      checked: { true: "", false: "start-0.5" },
    },
    compoundVariants: [
      { size: "default", checked: true, class: "start-[calc(100%-20px)]" },
      { size: "small", checked: true, class: "start-[calc(100%-14px)]" },
    ],
    defaultVariants: { size: "default", checked: false },
  }
);

export const switchInner = cva("block overflow-hidden text-fg-inverse", {
  variants: {
    size: {
      default: "text-ant-sm leading-[22px]",
      small: "text-ant-sm leading-4",
    },
    checked: { true: "", false: "" },
  },
  compoundVariants: [
    { size: "default", checked: true, class: "pe-6 ps-[9px]" },
    { size: "default", checked: false, class: "pe-[9px] ps-6" },
    { size: "small", checked: true, class: "pe-[18px] ps-1.5" },
    { size: "small", checked: false, class: "pe-1.5 ps-[18px]" },
  ],
  defaultVariants: { size: "default", checked: false },
});

const inputSize = {
  small: "rounded-sm px-[7px] py-0 text-ant",
  middle: "rounded px-[11px] py-1 text-ant",
  large: "rounded-lg px-[11px] py-[7px] text-ant-lg",
} satisfies Record<SizeType, string>;

const inputVariant = {
  outlined: "border-line bg-container hover:border-primary-hover focus-within:border-primary focus-within:shadow-[0_0_0_2px_rgba(5,145,255,0.1)]",
  filled: "border-transparent bg-fill-tertiary hover:bg-fill-secondary focus-within:border-primary focus-within:bg-container",
  borderless: "border-transparent bg-transparent",
} as const;

export type InputVariant = keyof typeof inputVariant;

/**
 * Wrapper that draws the input border; prefix, input and suffix sit inside.
 */
export const inputAffixWrapper = cva(
  "relative inline-flex w-full min-w-0 items-center gap-1 border border-solid leading-[var(--ant-line-height)] text-fg transition-all",
  {
    variants: {
      size: inputSize,
      variant: inputVariant,
      status: {
        none: "",
        error: "border-error hover:border-error-hover focus-within:border-error",
        warning: "border-warning hover:border-warning-hover focus-within:border-warning",
      },
      disabled: {
        true: "cursor-not-allowed border-line bg-fill-tertiary text-fg-quaternary hover:border-line",
        false: "",
      },
    },
    compoundVariants: [
      { variant: "filled", status: "error", class: "border-transparent bg-error-bg" },
      { variant: "filled", status: "warning", class: "border-transparent bg-warning-bg" },
    ],
    defaultVariants: {
      size: "middle",
      variant: "outlined",
      status: "none",
      disabled: false,
    },
  }
);

export const inputElement = cva(
  "m-0 w-full min-w-0 flex-1 border-none bg-transparent p-0 text-inherit outline-none placeholder:text-fg-quaternary disabled:cursor-not-allowed"
);

export const inputAffix = cva("inline-flex flex-none items-center text-fg", {
  variants: {
    muted: { true: "text-fg-tertiary", false: "" },
  },
  defaultVariants: { muted: false },
});

export const inputClear = cva(
  "inline-flex cursor-pointer items-center border-none bg-transparent p-0 text-fg-quaternary transition-colors hover:text-fg-tertiary",
  {
    variants: {
      hidden: { true: "invisible", false: "" },
    },
    defaultVariants: { hidden: false },
  }
);

export const inputGroup = cva(
  "inline-flex w-full items-stretch [&>*:not(:first-child):not(:last-child)]:rounded-none [&>*:first-child:not(:last-child)]:rounded-e-none [&>*:last-child:not(:first-child)]:rounded-s-none"
);

export const inputAddon = cva(
  "inline-flex flex-none items-center border border-solid border-line bg-fill-quaternary px-[11px] text-fg first:-me-px first:rounded-s last:-ms-px last:rounded-e",
  {
    variants: {
      size: {
        small: "text-ant",
        middle: "text-ant",
        large: "text-ant-lg",
      },
    },
    defaultVariants: { size: "middle" },
  }
);

export const inputCount = cva("whitespace-nowrap text-fg-tertiary", {
  variants: {
    exceeded: { true: "text-error", false: "" },
  },
  defaultVariants: { exceeded: false },
});

export const textarea = cva("min-h-[calc(var(--ant-control-height)-2px)] resize-y", {
  variants: {
    autoSize: { true: "resize-none", false: "" },
  },
  defaultVariants: { autoSize: false },
});

export const otp = cva("inline-flex items-center gap-2");

export const otpCell = cva("w-9 text-center", {
  variants: {
    size: {
      small: "w-6",
      middle: "w-9",
      large: "w-11",
    },
  },
  defaultVariants: { size: "middle" },
});

export const inputNumberHandlers = cva(
  "absolute inset-y-0 end-0 flex w-[22px] flex-col overflow-hidden rounded-e border-0 border-s border-solid border-line opacity-0 transition-opacity group-hover:opacity-100 group-focus-within:opacity-100"
);

export const inputNumberHandler = cva(
  "flex flex-1 cursor-pointer items-center justify-center border-none bg-transparent p-0 text-fg-tertiary transition-all hover:flex-[1.4] hover:text-primary [&:not(:first-child)]:border-0 [&:not(:first-child)]:border-t [&:not(:first-child)]:border-solid [&:not(:first-child)]:border-line",
  {
    variants: {
      disabled: {
        true: "cursor-not-allowed text-fg-quaternary hover:flex-1 hover:text-fg-quaternary",
        false: "",
      },
    },
    defaultVariants: { disabled: false },
  }
);

export const rate = cva("m-0 inline-flex list-none p-0 text-xl text-[#fadb14] outline-none", {
  variants: {
    disabled: { true: "cursor-default", false: "" },
  },
  defaultVariants: { disabled: false },
});

export const rateStar = cva("relative inline-block cursor-pointer transition-transform [&:not(:last-child)]:me-2", {
  variants: {
    disabled: { true: "cursor-default", false: "hover:scale-110" },
  },
  defaultVariants: { disabled: false },
});

export const rateStarLayer = cva("transition-colors", {
  variants: {
    layer: {
      first: "absolute start-0 top-0 h-full w-1/2 overflow-hidden",
      second: "",
    },
    lit: { true: "text-inherit", false: "text-fill-secondary" },
  },
  defaultVariants: { layer: "second", lit: false },
});

export const segmented = cva(
  "inline-block rounded bg-fill-secondary p-0.5 text-fg-secondary transition-all",
  {
    variants: {
      block: { true: "flex w-full", false: "" },
      disabled: { true: "cursor-not-allowed", false: "" },
    },
    defaultVariants: { block: false, disabled: false },
  }
);

export const segmentedGroup = cva("relative flex w-full items-stretch justify-start", {
  variants: {
    vertical: { true: "flex-col", false: "flex-row" },
  },
  defaultVariants: { vertical: false },
});

export const segmentedItem = cva(
  `relative inline-flex cursor-pointer items-center justify-center gap-1.5 rounded-sm text-center transition-colors ${focusRing}`,
  {
    variants: {
      size: {
        small: "min-h-[calc(var(--ant-control-height-sm)-4px)] px-[7px] text-ant",
        middle: "min-h-[calc(var(--ant-control-height)-4px)] px-[11px] text-ant",
        large: "min-h-[calc(var(--ant-control-height-lg)-4px)] px-[11px] text-ant-lg",
      },
      selected: {
        true: "bg-container text-fg shadow-[0_1px_2px_0_rgba(0,0,0,0.03),0_1px_6px_-1px_rgba(0,0,0,0.02),0_2px_4px_0_rgba(0,0,0,0.02)]",
        false: "hover:bg-fill-secondary hover:text-fg",
      },
      disabled: {
        true: "cursor-not-allowed text-fg-quaternary hover:bg-transparent hover:text-fg-quaternary",
        false: "",
      },
      block: { true: "min-w-0 flex-1", false: "" },
    },
    defaultVariants: {
      size: "middle",
      selected: false,
      disabled: false,
      block: false,
    },
  }
);

export const slider = cva("relative m-[10px_5px] cursor-pointer touch-none select-none", {
  variants: {
    vertical: { true: "mx-[10px] my-[5px] inline-block h-full min-h-24 w-3 px-1", false: "h-3 py-1" },
    disabled: { true: "cursor-not-allowed", false: "" },
    withMarks: { true: "", false: "" },
  },
  compoundVariants: [{ vertical: false, withMarks: true, class: "mb-7" }],
  defaultVariants: { vertical: false, disabled: false, withMarks: false },
});

export const sliderRail = cva("absolute rounded-sm bg-fill-secondary transition-colors", {
  variants: {
    vertical: { true: "inset-y-0 w-1", false: "inset-x-0 h-1" },
  },
  defaultVariants: { vertical: false },
});

export const sliderTrack = cva("absolute rounded-sm transition-colors", {
  variants: {
    vertical: { true: "w-1", false: "h-1" },
    disabled: { true: "bg-fg-quaternary", false: "bg-primary-border-hover group-hover:bg-primary-hover" },
  },
  defaultVariants: { vertical: false, disabled: false },
});

export const sliderHandle = cva(
  "absolute z-[1] size-2.5 rounded-full bg-container outline-none shadow-[0_0_0_2px_var(--ant-color-primary-border-hover)] transition-shadow hover:shadow-[0_0_0_4px_var(--ant-color-primary)] focus-visible:shadow-[0_0_0_4px_var(--ant-color-primary)]",
  {
    variants: {
      vertical: { true: "-translate-x-[3px] translate-y-1/2", false: "-translate-x-1/2 -translate-y-[3px] rtl:translate-x-1/2" },
      disabled: { true: "cursor-not-allowed shadow-[0_0_0_2px_var(--ant-color-border)] hover:shadow-[0_0_0_2px_var(--ant-color-border)]", false: "" },
    },
    defaultVariants: { vertical: false, disabled: false },
  }
);

export const sliderDot = cva("absolute size-2 rounded-full border-2 border-solid bg-container", {
  variants: {
    active: { true: "border-primary-border", false: "border-line-secondary" },
    vertical: { true: "-translate-x-0.5 translate-y-1/2", false: "-translate-x-1/2 -translate-y-0.5" },
  },
  defaultVariants: { active: false, vertical: false },
});

export const sliderMark = cva("absolute whitespace-nowrap text-center text-ant text-fg-tertiary", {
  variants: {
    active: { true: "text-fg", false: "" },
    vertical: { true: "ms-4 translate-y-1/2", false: "top-4 -translate-x-1/2" },
  },
  defaultVariants: { active: false, vertical: false },
});

export const sliderTooltip = cva(
  "pointer-events-none absolute z-[2] whitespace-nowrap rounded bg-spotlight px-2 py-1 text-ant text-fg-inverse",
  {
    variants: {
      vertical: { true: "start-4 translate-y-1/2", false: "bottom-4 -translate-x-1/2" },
    },
    defaultVariants: { vertical: false },
  }
);

export const selectPopup = cva(
  "z-[1050] overflow-hidden rounded-lg bg-elevated p-1 text-ant text-fg shadow-[var(--ant-box-shadow-secondary)] outline-none",
  {
    variants: {
      matchWidth: {
        true: "w-[var(--radix-popover-trigger-width)]",
        false: "min-w-[var(--radix-popover-trigger-width)]",
      },
    },
    defaultVariants: { matchWidth: true },
  }
);

export const selectList = cva("m-0 max-h-64 list-none overflow-y-auto p-0");

export const selectOption = cva(
  "flex min-h-8 cursor-pointer items-center justify-between gap-2 rounded px-3 py-[5px] leading-[22px] text-fg transition-colors",
  {
    variants: {
      active: { true: "bg-fill-tertiary", false: "" },
      selected: { true: "bg-primary-bg font-semibold", false: "" },
      disabled: { true: "cursor-not-allowed text-fg-quaternary", false: "" },
      grouped: { true: "ps-6", false: "" },
    },
    defaultVariants: { active: false, selected: false, disabled: false, grouped: false },
  }
);

export const selectGroupTitle = cva(
  "cursor-default px-3 py-[5px] text-ant-sm leading-[22px] text-fg-tertiary"
);

export const selectSelection = cva("flex min-w-0 flex-1 flex-wrap items-center gap-1", {
  variants: {
    multiple: { true: "py-px", false: "flex-nowrap" },
  },
  defaultVariants: { multiple: false },
});

export const selectItem = cva("min-w-0 truncate", {
  variants: {
    placeholder: { true: "text-fg-quaternary", false: "" },
  },
  defaultVariants: { placeholder: false },
});

export const selectTag = cva(
  "inline-flex h-6 max-w-full items-center gap-1 rounded border border-solid border-line-secondary bg-fill-secondary pe-1 ps-2 text-ant leading-[22px]",
  {
    variants: {
      disabled: { true: "text-fg-quaternary", false: "" },
    },
    defaultVariants: { disabled: false },
  }
);

export const selectTagRemove = cva(
  "inline-flex cursor-pointer items-center border-none bg-transparent p-0 text-fg-tertiary transition-colors hover:text-fg"
);

export const datePickerPanel = cva("w-[280px]");

export const datePickerHeader = cva(
  "flex items-center gap-1 border-0 border-b border-solid border-line-secondary px-2 py-1"
);

export const datePickerHeaderButton = cva(
  "inline-flex h-7 min-w-7 cursor-pointer items-center justify-center rounded border-none bg-transparent p-0 text-fg-tertiary transition-colors hover:text-fg",
  {
    variants: {
      label: { true: "px-1 font-semibold text-fg hover:text-primary", false: "" },
    },
    defaultVariants: { label: false },
  }
);

export const datePickerBody = cva("px-3 py-2");

export const datePickerTable = cva("w-full table-fixed border-collapse text-center");

export const datePickerCell = cva(
  "mx-auto inline-flex h-6 min-w-6 cursor-pointer items-center justify-center rounded border-none bg-transparent px-1 text-ant leading-6 transition-colors",
  {
    variants: {
      inView: { true: "text-fg", false: "text-fg-quaternary" },
      selected: { true: "bg-primary text-fg-inverse", false: "hover:bg-fill-tertiary" },
      inRange: { true: "bg-primary-bg", false: "" },
      today: { true: "ring-1 ring-inset ring-primary", false: "" },
      disabled: { true: "cursor-not-allowed bg-fill-tertiary text-fg-quaternary", false: "" },
      wide: { true: "w-full max-w-16 h-7", false: "" },
    },
    compoundVariants: [{ selected: true, today: true, class: "ring-0" }],
    defaultVariants: {
      inView: true,
      selected: false,
      inRange: false,
      today: false,
      disabled: false,
      wide: false,
    },
  }
);

export const datePickerWeekRow = cva("", {
  variants: {
    selected: { true: "[&_button]:bg-primary [&_button]:text-fg-inverse", false: "hover:bg-fill-tertiary" },
  },
  defaultVariants: { selected: false },
});

export const datePickerPresets = cva(
  "flex min-w-[120px] flex-col gap-1 border-0 border-e border-solid border-line-secondary p-2"
);

export const timePickerPanel = cva(
  "z-[1050] overflow-hidden rounded-lg bg-elevated text-ant text-fg shadow-[var(--ant-box-shadow-secondary)] outline-none"
);

export const timePickerColumns = cva("flex h-56");

export const timePickerColumn = cva(
  "m-0 w-14 list-none overflow-y-auto p-1 [scrollbar-width:thin] [&:not(:first-child)]:border-0 [&:not(:first-child)]:border-s [&:not(:first-child)]:border-solid [&:not(:first-child)]:border-line-secondary after:block after:h-48 after:content-['']"
);

export const timePickerCell = cva(
  "mx-0 my-0.5 block w-full cursor-pointer rounded border-none bg-transparent py-0.5 text-center leading-6 text-fg",
  {
    variants: {
      selected: { true: "bg-primary-bg", false: "hover:bg-fill-tertiary" },
      disabled: { true: "cursor-not-allowed text-fg-quaternary hover:bg-transparent", false: "" },
    },
    defaultVariants: { selected: false, disabled: false },
  }
);

export const timePickerFooter = cva(
  "flex items-center justify-between border-0 border-t border-solid border-line-secondary px-2 py-1"
);

export const upload = cva("text-ant text-fg");

export const uploadSelect = cva("inline-block outline-none", {
  variants: {
    disabled: { true: "cursor-not-allowed", false: "cursor-pointer" },
    card: {
      true: "inline-flex size-[102px] items-center justify-center rounded-lg border border-dashed border-line bg-fill-quaternary text-center transition-colors hover:border-primary",
      false: "",
    },
    circle: { true: "rounded-full", false: "" },
  },
  defaultVariants: { disabled: false, card: false, circle: false },
});

export const uploadDragger = cva(
  `relative w-full cursor-pointer rounded-lg border border-dashed bg-fill-quaternary p-4 text-center transition-colors ${focusRing}`,
  {
    variants: {
      hover: { true: "border-primary", false: "border-line hover:border-primary-hover" },
      disabled: { true: "cursor-not-allowed hover:border-line", false: "" },
    },
    defaultVariants: { hover: false, disabled: false },
  }
);

export const uploadList = cva("m-0 list-none p-0", {
  variants: {
    listType: {
      text: "",
      picture: "",
      "picture-card": "flex flex-wrap gap-2",
      "picture-circle": "flex flex-wrap gap-2",
    },
  },
  defaultVariants: { listType: "text" },
});

export type UploadListType = NonNullable<VariantProps<typeof uploadList>["listType"]>;

export const uploadItem = cva("group relative flex items-center gap-2 transition-colors", {
  variants: {
    listType: {
      text: "mt-2 h-[22px] rounded px-1 hover:bg-fill-tertiary",
      picture: "mt-2 h-[66px] rounded-lg border border-solid border-line p-2",
      "picture-card": "size-[102px] justify-center rounded-lg border border-solid border-line p-2",
      "picture-circle": "size-[102px] justify-center rounded-full border border-solid border-line p-2",
    },
    status: {
      uploading: "",
      done: "",
      error: "border-error text-error",
      removed: "",
    },
  },
  defaultVariants: { listType: "text", status: "done" },
});

export const uploadItemName = cva("min-w-0 flex-1 truncate", {
  variants: {
    link: { true: "text-link hover:text-primary-hover", false: "" },
  },
  defaultVariants: { link: false },
});

export const uploadItemActions = cva(
  "inline-flex flex-none items-center gap-1 opacity-0 transition-opacity focus-within:opacity-100 group-hover:opacity-100"
);

export const uploadItemAction = cva(
  "inline-flex cursor-pointer items-center border-none bg-transparent p-0.5 text-fg-tertiary transition-colors hover:text-fg"
);

export const uploadItemProgress = cva("absolute inset-x-1 bottom-0 text-ant-sm leading-none");
