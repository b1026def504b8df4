// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/ui/general`
 * Purpose: Styling factories for Button, Wave, FloatButton and Typography.
 * Scope: CVA factories only. Button colors come from `--btn-*` variables set by the component.
 * Invariants: Classes reference `--ant-*` tokens through the Tailwind preset; no hard-coded palette values.
 * Side-effects: none
 * Links: src/components/kit/general, src/components/kit/typography
 * @public
 */

import { cva, type VariantProps } from "class-variance-authority";

import type { SizeType } from "@/styles/theme";

const buttonBase =
  "relative inline-flex shrink-0 cursor-pointer select-none items-center justify-center gap-2 whitespace-nowrap border border-solid font-normal outline-none transition-all duration-200 focus-visible:outline focus-visible:outline-4 focus-visible:outline-offset-1 focus-visible:outline-primary-border disabled:cursor-not-allowed aria-disabled:cursor-not-allowed";

const buttonVariantVariants = {
  solid:
    "border-transparent bg-[var(--btn-main)] text-fg-inverse shadow-sm enabled:hover:bg-[var(--btn-hover)] enabled:active:bg-[var(--btn-active)]",
  outlined:
    "border-[var(--btn-border)] bg-container text-[var(--btn-text)] shadow-sm enabled:hover:border-[var(--btn-hover)] enabled:hover:text-[var(--btn-hover)] enabled:active:border-[var(--btn-active)] enabled:active:text-[var(--btn-active)]",
  dashed:
    "border-dashed border-[var(--btn-border)] bg-container text-[var(--btn-text)] enabled:hover:border-[var(--btn-hover)] enabled:hover:text-[var(--btn-hover)] enabled:active:border-[var(--btn-active)] enabled:active:text-[var(--btn-active)]",
  filled:
    "border-transparent bg-[var(--btn-soft)] text-[var(--btn-text)] enabled:hover:bg-[var(--btn-soft-hover)]",
  text: "border-transparent bg-transparent text-[var(--btn-text)] enabled:hover:bg-fill-tertiary enabled:active:bg-fill-secondary",
  link: "border-transparent bg-transparent text-[var(--btn-main)] hover:text-[var(--btn-hover)] active:text-[var(--btn-active)]",
} as const;

const buttonSizeVariants = {
  small: "h-control-sm min-w-control-sm rounded-sm px-[7px] text-ant",
  middle: "h-control min-w-control rounded px-[15px] text-ant",
  large: "h-control-lg min-w-control-lg rounded-lg px-[15px] text-ant-lg",
} satisfies Record<SizeType, string>;

export const button = cva(buttonBase, {
  variants: {
    variant: buttonVariantVariants,
    size: buttonSizeVariants,
    shape: {
      default: "",
      circle: "rounded-full px-0",
      round: "rounded-full",
    },
    iconOnly: { true: "px-0", false: "" },
    block: { true: "w-full", false: "" },
    ghost: {
      true: "bg-transparent enabled:hover:bg-transparent",
      false: "",
    },
    disabled: {
      true: "border-line bg-fill-tertiary text-fg-quaternary shadow-none",
      false: "",
    },
    loading: { true: "cursor-default opacity-65", false: "" },
  },
  compoundVariants: [
    { iconOnly: true, size: "small", className: "w-control-sm" },
    { iconOnly: true, size: "middle", className: "w-control" },
    { iconOnly: true, size: "large", className: "w-control-lg" },
    { shape: "circle", size: "small", className: "w-control-sm" },
    { shape: "circle", size: "middle", className: "w-control" },
    { shape: "circle", size: "large", className: "w-control-lg" },
    {
      disabled: true,
      variant: ["text", "link"],
      className: "border-transparent bg-transparent",
    },
  ],
  defaultVariants: {
    variant: "outlined",
    size: "middle",
    shape: "default",
    iconOnly: false,
    block: false,
    ghost: false,
    disabled: false,
    loading: false,
  },
});

export const buttonIcon = cva("inline-flex items-center leading-none", {
  variants: {
    spin: { true: "animate-spin", false: "" },
  },
  defaultVariants: { spin: false },
});

export const waveRing = cva(
  "pointer-events-none absolute -inset-px rounded-[inherit] border border-solid border-[var(--btn-main,var(--ant-color-primary))]"
);

export const floatButton = cva(
  "fixed z-[99] flex cursor-pointer flex-col items-center justify-center gap-0.5 overflow-visible border-none shadow-[var(--ant-box-shadow-secondary)] outline-none transition-colors duration-200",
  {
    variants: {
      type: {
        default: "bg-elevated text-fg hover:bg-fill-secondary",
        primary: "bg-primary text-fg-inverse hover:bg-primary-hover",
      },
      shape: {
        circle: "h-[40px] w-[40px] rounded-full",
        square: "min-h-[40px] w-[40px] rounded-lg py-1",
      },
    },
    defaultVariants: { type: "default", shape: "circle" },
  }
);

export const floatButtonDescription = cva(
  "max-w-full overflow-hidden text-ellipsis text-center text-ant-sm leading-tight"
);

export const floatButtonGroup = cva("fixed z-[99] flex gap-4", {
  variants: {
    placement: {
      top: "flex-col-reverse",
      bottom: "flex-col",
      left: "flex-row-reverse",
      right: "flex-row",
    },
  },
  defaultVariants: { placement: "top" },
});

export const typography = cva("m-0 break-words text-ant text-fg", {
  variants: {
    type: {
      default: "",
      secondary: "text-fg-secondary",
      success: "text-success",
      warning: "text-warning",
      danger: "text-error",
    },
    disabled: { true: "cursor-not-allowed select-none text-fg-quaternary", false: "" },
    strong: { true: "font-semibold", false: "" },
    italic: { true: "italic", false: "" },
    underline: { true: "underline", false: "" },
    delete: { true: "line-through", false: "" },
    ellipsis: {
      none: "",
      single: "block overflow-hidden text-ellipsis whitespace-nowrap",
      multiple: "overflow-hidden [display:-webkit-box] [-webkit-box-orient:vertical]",
    },
  },
  compoundVariants: [
    { underline: true, delete: true, className: "[text-decoration:underline_line-through]" },
  ],
  defaultVariants: {
    type: "default",
    disabled: false,
    strong: false,
    italic: false,
    underline: false,
    delete: false,
    ellipsis: "none",
  },
});

const headingLevelVariants = {
  1: "text-h1 leading-[1.2105]",
  2: "text-h2 leading-[1.2667]",
  3: "text-h3 leading-[1.3333]",
  4: "text-h4 leading-[1.4]",
  5: "text-h5 leading-[1.5]",
} as const;

export const typographyTitle = cva("mb-[0.5em] mt-0 font-semibold", {
  variants: { level: headingLevelVariants },
  defaultVariants: { level: 1 },
});

export const typographyParagraph = cva("mb-[1em] mt-0 leading-[var(--ant-line-height)]");

export const typographyMark = cva("bg-warning-border p-0");

export const typographyCode = cva(
  "mx-[0.2em] rounded-sm border border-solid border-fill bg-fill-quaternary px-[0.4em] pb-[0.1em] pt-[0.2em] font-mono text-[85%]"
);

export const typographyKeyboard = cva(
  "mx-[0.2em] rounded-sm border border-b-2 border-solid border-fill bg-fill-quaternary px-[0.4em] pb-[0.1em] pt-[0.15em] font-mono text-[90%]"
);

export const typographyLink = cva(
  "cursor-pointer text-link no-underline transition-colors hover:text-primary-hover active:text-primary-active",
  {
    variants: {
      disabled: { true: "pointer-events-none cursor-not-allowed text-fg-quaternary", false: "" },
    },
    defaultVariants: { disabled: false },
  }
);

export const typographyAction = cva(
  "ms-1 inline-flex cursor-pointer items-center border-none bg-transparent p-0 align-middle text-link outline-none hover:text-primary-hover",
  {
    variants: {
      copied: { true: "text-success hover:text-success", false: "" },
    },
    defaultVariants: { copied: false },
  }
);

export type ButtonVariant = NonNullable<VariantProps<typeof button>["variant"]>;
export type TypographyType = NonNullable<VariantProps<typeof typography>["type"]>;
