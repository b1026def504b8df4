// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/ui/navigation`
 * Purpose: Navigation styling factories (breadcrumb, menu, pagination, steps, tabs).
 * Scope: Provides CVA factories for navigation components. Does not handle routing or key bookkeeping.
 * Invariants: All variants use design tokens; factories return valid Tailwind class strings.
 * Side-effects: none
 * @public
 */

import { cva } from "class-variance-authority";

import type { SizeType } from "@/styles/theme";

export const breadcrumb = cva(
  "m-0 flex list-none flex-wrap items-center p-0 text-ant text-fg-tertiary"
);

export const breadcrumbItem = cva("inline-flex items-center", {
  variants: {
    current: { true: "text-fg", false: "" },
  },
  defaultVariants: { current: false },
});

export const breadcrumbLink = cva(
  "-mx-1 inline-flex h-[22px] items-center gap-1 rounded-sm px-1 text-inherit no-underline transition-colors",
  {
    variants: {
      interactive: {
        true: "cursor-pointer hover:bg-fill-secondary hover:text-fg",
        false: "",
      },
    },
    defaultVariants: { interactive: false },
  }
);

export const breadcrumbSeparator = cva("mx-2 text-fg-tertiary");

const menuThemes = {
  light: "bg-container text-fg",
  dark: "bg-[#001529] text-[rgba(255,255,255,0.65)]",
} as const;

export const menu = cva("m-0 list-none p-0 text-ant outline-none", {
  variants: {
    mode: {
      vertical: "border-0 border-e border-solid border-line-secondary py-1",
      inline: "border-0 border-e border-solid border-line-secondary py-1",
      horizontal:
        "flex h-[46px] items-center border-0 border-b border-solid border-line-secondary leading-[46px]",
    },
    theme: menuThemes,
    collapsed: { true: "w-20", false: "" },
  },
  compoundVariants: [
    { theme: "dark", class: "border-transparent" },
  ],
  defaultVariants: { mode: "vertical", theme: "light", collapsed: false },
});

export const menuItem = cva(
  "relative flex cursor-pointer items-center gap-2.5 whitespace-nowrap outline-none transition-colors focus-visible:outline focus-visible:outline-2 focus-visible:outline-primary-border",
  {
    variants: {
      mode: {
        vertical: "mx-1 my-1 h-10 rounded-lg px-4 leading-10",
        inline: "mx-1 my-1 h-10 rounded-lg leading-10",
        horizontal:
          "h-full px-5 after:absolute after:inset-x-5 after:bottom-0 after:border-0 after:border-b-2 after:border-solid after:border-transparent after:content-['']",
      },
      theme: { light: "", dark: "" },
      selected: { true: "", false: "" },
      disabled: { true: "cursor-not-allowed", false: "" },
      danger: { true: "", false: "" },
      dense: { true: "mx-0 my-0 h-auto rounded px-3 py-[5px] leading-[22px]", false: "" },
    },
    compoundVariants: [
      { theme: "light", selected: false, disabled: false, class: "hover:bg-fill-secondary" },
      { theme: "light", mode: "horizontal", selected: false, disabled: false, class: "hover:bg-transparent hover:text-primary hover:after:border-primary" },
      { theme: "light", selected: true, class: "bg-primary-bg text-primary" },
      { theme: "light", mode: "horizontal", selected: true, class: "bg-transparent after:border-primary" },
      { theme: "dark", selected: false, disabled: false, class: "hover:text-white" },
      { theme: "dark", selected: true, class: "bg-primary text-white" },
      { disabled: true, class: "text-fg-quaternary" },
      { theme: "dark", disabled: true, class: "text-[rgba(255,255,255,0.25)]" },
      { danger: true, disabled: false, class: "text-error" },
      { danger: true, selected: true, theme: "light", class: "bg-error-bg" },
    ],
    defaultVariants: {
      mode: "vertical",
      theme: "light",
      selected: false,
      disabled: false,
      danger: false,
      dense: false,
    },
  }
);

export const menuSubTitleArrow = cva("ms-auto size-3.5 transition-transform", {
  variants: {
    open: { true: "rotate-180", false: "" },
    popup: { true: "-rotate-90 rtl:rotate-90", false: "" },
  },
  defaultVariants: { open: false, popup: false },
});

export const menuSubList = cva("m-0 list-none p-0", {
  variants: {
    theme: {
      light: "bg-fill-quaternary",
      dark: "bg-[#000c17]",
    },
  },
  defaultVariants: { theme: "light" },
});

export const menuPopup = cva(
  "z-[1050] min-w-40 rounded-lg p-1 text-ant shadow-[var(--ant-box-shadow-secondary)] outline-none",
  {
    variants: { theme: menuThemes },
    defaultVariants: { theme: "light" },
  }
);

export const menuGroupTitle = cva("px-4 py-2 text-ant leading-[var(--ant-line-height)] text-fg-tertiary");

export const menuDivider = cva("my-1 h-0 border-0 border-t border-solid border-line-secondary");

const paginationSizes = {
  small: "h-6 min-w-6 text-ant leading-[22px]",
  middle: "h-8 min-w-8 leading-[30px]",
  large: "h-10 min-w-10 leading-[38px] text-ant-lg",
} satisfies Record<SizeType, string>;

export const pagination = cva(
  "m-0 flex list-none flex-wrap items-center gap-2 p-0 text-ant text-fg",
  {
    variants: {
      align: {
        start: "justify-start",
        center: "justify-center",
        end: "justify-end",
      },
    },
    defaultVariants: { align: "start" },
  }
);

export const paginationItem = cva(
  "inline-flex cursor-pointer select-none items-center justify-center rounded border border-solid px-1.5 text-center outline-none transition-colors focus-visible:outline focus-visible:outline-2 focus-visible:outline-primary-border",
  {
    variants: {
      size: paginationSizes,
      active: {
        true: "border-primary bg-container font-semibold text-primary",
        false: "border-transparent bg-transparent hover:bg-fill-secondary",
      },
      disabled: {
        true: "cursor-not-allowed text-fg-quaternary hover:bg-transparent",
        false: "",
      },
    },
    compoundVariants: [
      { active: true, disabled: true, class: "border-line bg-fill-tertiary text-fg-quaternary" },
    ],
    defaultVariants: { size: "middle", active: false, disabled: false },
  }
);

export const paginationTotal = cva("me-2");

export const paginationOptions = cva("ms-2 inline-flex items-center gap-2");

export const paginationSelect = cva(
  "rounded border border-solid border-line bg-container px-2 text-ant text-fg outline-none focus:border-primary",
  {
    variants: { size: paginationSizes },
    defaultVariants: { size: "middle" },
  }
);

export const paginationJumperInput = cva(
  "w-12 rounded border border-solid border-line bg-container px-2 text-ant text-fg outline-none focus:border-primary",
  {
    variants: { size: paginationSizes },
    defaultVariants: { size: "middle" },
  }
);

export const steps = cva("flex w-full text-ant", {
  variants: {
    direction: {
      horizontal: "flex-row",
      vertical: "flex-col",
    },
    type: {
      default: "",
      navigation: "",
      inline: "inline-flex w-auto",
    },
  },
  defaultVariants: { direction: "horizontal", type: "default" },
});

export const stepsItem = cva("relative flex-1 overflow-hidden outline-none", {
  variants: {
    direction: {
      horizontal: "me-4 last:me-0 last:flex-none",
      vertical: "flex min-h-12 overflow-visible pb-2",
    },
    clickable: { true: "cursor-pointer", false: "" },
    labelVertical: { true: "text-center", false: "" },
  },
  defaultVariants: { direction: "horizontal", clickable: false, labelVertical: false },
});

export const stepsIcon = cva(
  "me-2 inline-flex flex-none items-center justify-center rounded-full border border-solid text-center transition-colors",
  {
    variants: {
      status: {
        wait: "border-line bg-fill-quaternary text-fg-tertiary",
        process: "border-primary bg-primary text-fg-inverse",
        finish: "border-primary-bg bg-primary-bg text-primary",
        error: "border-error-bg bg-error-bg text-error",
      },
      size: {
        default: "size-8 text-ant-lg",
        small: "size-6 text-xs",
      },
      custom: { true: "border-none bg-transparent", false: "" },
    },
    compoundVariants: [
      { custom: true, status: "process", class: "text-primary" },
    ],
    defaultVariants: { status: "wait", size: "default", custom: false },
  }
);

export const stepsDot = cva("inline-block size-2 rounded-full", {
  variants: {
    status: {
      wait: "bg-fill",
      process: "bg-primary",
      finish: "bg-primary",
      error: "bg-error",
    },
  },
  defaultVariants: { status: "wait" },
});

export const stepsTitle = cva(
  "relative inline-block pe-4 text-ant-lg leading-8",
  {
    variants: {
      status: {
        wait: "text-fg-tertiary",
        process: "font-medium text-fg",
        finish: "text-fg",
        error: "text-error",
      },
      size: { default: "", small: "text-ant leading-6" },
      tail: {
        true: "after:absolute after:start-full after:top-4 after:block after:h-px after:w-[9999px] after:content-['']",
        false: "",
      },
      tailDone: { true: "after:bg-primary", false: "after:bg-line-secondary" },
    },
    defaultVariants: { status: "wait", size: "default", tail: false, tailDone: false },
  }
);

export const stepsSubTitle = cva("ms-2 inline font-normal text-fg-tertiary");

export const stepsDescription = cva("text-ant", {
  variants: {
    status: {
      wait: "text-fg-tertiary",
      process: "text-fg",
      finish: "text-fg-tertiary",
      error: "text-error",
    },
  },
  defaultVariants: { status: "wait" },
});

export const stepsVerticalTail = cva(
  "absolute start-4 top-0 h-full px-0 pb-1.5 pt-[38px] after:inline-block after:h-full after:w-px after:content-['']",
  {
    variants: {
      done: { true: "after:bg-primary", false: "after:bg-line-secondary" },
      small: { true: "start-3 pt-[30px]", false: "" },
    },
    defaultVariants: { done: false, small: false },
  }
);

export const tabs = cva("flex text-ant text-fg", {
  variants: {
    position: {
      top: "flex-col",
      bottom: "flex-col-reverse",
      left: "flex-row",
      right: "flex-row-reverse",
    },
  },
  defaultVariants: { position: "top" },
});

export const tabsNav = cva("relative flex flex-none items-center", {
  variants: {
    position: {
      top: "mb-4 border-0 border-b border-solid border-line-secondary",
      bottom: "mt-4 border-0 border-t border-solid border-line-secondary",
      left: "me-6 flex-col items-stretch border-0 border-e border-solid border-line-secondary",
      right: "ms-6 flex-col items-stretch border-0 border-s border-solid border-line-secondary",
    },
    centered: { true: "justify-center", false: "" },
  },
  defaultVariants: { position: "top", centered: false },
});

export const tabsList = cva("relative flex", {
  variants: {
    vertical: { true: "flex-col", false: "flex-row" },
    card: { true: "gap-0.5", false: "gap-8" },
  },
  compoundVariants: [{ vertical: true, card: false, class: "gap-0" }],
  defaultVariants: { vertical: false, card: false },
});

export const tab = cva(
  "relative inline-flex cursor-pointer items-center gap-2 border-none bg-transparent outline-none transition-colors focus-visible:outline focus-visible:outline-2 focus-visible:outline-primary-border",
  {
    variants: {
      size: {
        small: "py-2 text-ant",
        middle: "py-3 text-ant",
        large: "py-4 text-ant-lg",
      },
      active: { true: "text-primary", false: "text-fg hover:text-primary-hover" },
      disabled: { true: "cursor-not-allowed text-fg-quaternary hover:text-fg-quaternary", false: "" },
      card: {
        true: "rounded-t-lg border border-b-0 border-solid border-line-secondary bg-fill-quaternary px-4",
        false: "",
      },
      vertical: { true: "px-6 py-2 text-start", false: "" },
    },
    compoundVariants: [
      { card: true, active: true, class: "bg-container" },
      { card: true, vertical: false, size: "small", class: "py-1.5" },
      { disabled: true, active: true, class: "text-fg-quaternary" },
    ],
    defaultVariants: {
      size: "middle",
      active: false,
      disabled: false,
      card: false,
      vertical: false,
    },
  }
);

export const tabsInkBar = cva(
  "pointer-events-none absolute bg-primary transition-all duration-300",
  {
    variants: {
      position: {
        top: "bottom-0 h-0.5",
        bottom: "top-0 h-0.5",
        left: "end-0 w-0.5",
        right: "start-0 w-0.5",
      },
    },
    defaultVariants: { position: "top" },
  }
);

export const tabsRemove = cva(
  "-me-1 ms-1 inline-flex items-center border-none bg-transparent p-0.5 text-fg-tertiary transition-colors hover:text-fg"
);

export const tabsAdd = cva(
  "ms-0.5 inline-flex min-w-10 cursor-pointer items-center justify-center rounded-t-lg border border-b-0 border-solid border-line-secondary bg-fill-quaternary px-2 text-fg-secondary hover:text-primary"
);

export const tabsPanel = cva("flex-auto outline-none", {
  variants: {
    hidden: { true: "hidden", false: "" },
  },
  defaultVariants: { hidden: false },
});

export const tabsExtra = cva("ms-auto flex-none");
