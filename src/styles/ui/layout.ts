// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/ui/layout`
 * Purpose: Styling factories for Divider, Flex, Space, Grid and Layout.
 * Scope: CVA factories only. Numeric gaps and gutters are applied as inline styles by the components.
 * Invariants: Factories return valid Tailwind class strings; spacing keys map to the size tokens.
 * Side-effects: none
 * @public
 */

import { cva } from "class-variance-authority";

import type { SizeType } from "@/styles/theme";

export const divider = cva("box-border border-solid border-line-secondary text-fg", {
  variants: {
    type: {
      horizontal: "my-6 flex w-full min-w-full clear-both border-0 border-t",
      vertical:
        "relative top-[-0.06em] mx-2 inline-block h-[0.9em] border-0 border-s align-middle",
    },
    dashed: { true: "border-dashed", false: "" },
    withText: {
      true: "items-center whitespace-nowrap border-t-0 text-ant-lg font-medium before:border-0 before:border-t before:border-solid before:border-inherit before:content-[''] after:border-0 after:border-t after:border-solid after:border-inherit after:content-['']",
      false: "",
    },
    orientation: {
      left: "before:w-[5%] after:w-[95%]",
      right: "before:w-[95%] after:w-[5%]",
      center: "before:w-1/2 after:w-1/2",
    },
    plain: { true: "text-ant font-normal", false: "" },
  },
  defaultVariants: {
    type: "horizontal",
    dashed: false,
    withText: false,
    orientation: "center",
    plain: false,
  },
});

export const dividerText = cva("inline-block px-[1em]");

const gapVariants = {
  small: "gap-2",
  middle: "gap-4",
  large: "gap-6",
  none: "",
} satisfies Record<SizeType | "none", string>;

export const flex = cva("flex", {
  variants: {
    vertical: { true: "flex-col", false: "flex-row" },
    wrap: { true: "flex-wrap", false: "flex-nowrap", reverse: "flex-wrap-reverse" },
    gap: gapVariants,
    justify: {
      normal: "",
      start: "justify-start",
      end: "justify-end",
      center: "justify-center",
      "space-between": "justify-between",
      "space-around": "justify-around",
      "space-evenly": "justify-evenly",
      "flex-start": "justify-start",
      "flex-end": "justify-end",
    },
    align: {
      normal: "",
      start: "items-start",
      end: "items-end",
      center: "items-center",
      baseline: "items-baseline",
      stretch: "items-stretch",
      "flex-start": "items-start",
      "flex-end": "items-end",
    },
  },
  defaultVariants: {
    vertical: false,
    wrap: false,
    gap: "none",
    justify: "normal",
    align: "normal",
  },
});

export const space = cva("inline-flex", {
  variants: {
    direction: {
      horizontal: "flex-row",
      vertical: "flex-col",
    },
    align: {
      none: "",
      start: "items-start",
      end: "items-end",
      center: "items-center",
      baseline: "items-baseline",
    },
    wrap: { true: "flex-wrap", false: "" },
  },
  defaultVariants: { direction: "horizontal", align: "none", wrap: false },
});

export const spaceItem = cva("", {
  variants: {
    empty: { true: "hidden", false: "" },
  },
  defaultVariants: { empty: false },
});

export const spaceCompact = cva(
  "inline-flex [&>*:not(:first-child)]:-ms-px [&>*:not(:first-child):not(:last-child)]:rounded-none [&>*:first-child:not(:last-child)]:rounded-e-none [&>*:last-child:not(:first-child)]:rounded-s-none [&>*:hover]:z-[1] [&>*:focus-visible]:z-[2]",
  {
    variants: {
      direction: {
        horizontal: "flex-row",
        vertical:
          "flex-col [&>*:not(:first-child)]:-mt-px [&>*:not(:first-child)]:ms-0 [&>*:first-child:not(:last-child)]:rounded-b-none [&>*:first-child:not(:last-child)]:rounded-e [&>*:last-child:not(:first-child)]:rounded-t-none [&>*:last-child:not(:first-child)]:rounded-s",
      },
      block: { true: "flex w-full", false: "" },
    },
    defaultVariants: { direction: "horizontal", block: false },
  }
);

export const row = cva("flex flex-row", {
  variants: {
    wrap: { true: "flex-wrap", false: "flex-nowrap" },
    justify: {
      start: "justify-start",
      end: "justify-end",
      center: "justify-center",
      "space-around": "justify-around",
      "space-between": "justify-between",
      "space-evenly": "justify-evenly",
    },
    align: {
      top: "items-start",
      middle: "items-center",
      bottom: "items-end",
      stretch: "items-stretch",
    },
  },
  defaultVariants: { wrap: true, justify: "start", align: "top" },
});

export const col = cva("relative box-border min-h-px max-w-full", {
  variants: {
    hidden: { true: "hidden", false: "" },
  },
  defaultVariants: { hidden: false },
});

export const layout = cva("box-border flex min-h-0 flex-auto bg-layout", {
  variants: {
    hasSider: { true: "flex-row", false: "flex-col" },
  },
  defaultVariants: { hasSider: false },
});

export const layoutHeader = cva(
  "h-16 flex-none px-[50px] leading-[64px] text-fg",
  {
    variants: {
      theme: {
        dark: "bg-[#001529] text-fg-inverse",
        light: "bg-container",
      },
    },
    defaultVariants: { theme: "dark" },
  }
);

export const layoutContent = cva("min-h-0 flex-auto");

export const layoutFooter = cva("flex-none bg-layout px-[50px] py-6 text-ant text-fg");

export const layoutSider = cva(
  "relative min-w-0 flex-none transition-all duration-200",
  {
    variants: {
      theme: {
        dark: "bg-[#001529] text-fg-inverse",
        light: "bg-container text-fg",
      },
      hasTrigger: { true: "pb-12", false: "" },
    },
    defaultVariants: { theme: "dark", hasTrigger: false },
  }
);

export const layoutSiderTrigger = cva(
  "fixed bottom-0 z-[1] flex h-12 cursor-pointer items-center justify-center border-none transition-all duration-200",
  {
    variants: {
      theme: {
        dark: "bg-[#002140] text-fg-inverse",
        light: "border-t border-solid border-line-secondary bg-container text-fg",
      },
    },
    defaultVariants: { theme: "dark" },
  }
);
