// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/ui/data`
 * Purpose: Data display styling factories (avatar, badge, calendar, card, collapse, empty, qrcode, statistic, tag, timeline, watermark).
 * Scope: Provides CVA factories for data display components. Does not handle data formatting.
 * Invariants: All variants use design tokens; factories return valid Tailwind class strings.
 * Side-effects: none
 * Links: src/components/kit/data-display
 * @public
 */

import { cva, type VariantProps } from "class-variance-authority";

import type { SizeType } from "@/styles/theme";

const avatarSizeVariants = {
  small: "size-6 text-ant",
  middle: "size-8 text-ant-lg",
  large: "size-10 text-ant-xl",
} satisfies Record<SizeType, string>;

/**
 * Avatar root; numeric sizes are applied inline.
 */
export const avatar = cva(
  "relative inline-flex shrink-0 items-center justify-center overflow-hidden whitespace-nowrap bg-[rgba(0,0,0,0.25)] text-center align-middle text-fg-inverse",
  {
    variants: {
      size: avatarSizeVariants,
      shape: {
        circle: "rounded-full",
        square: "rounded",
      },
      bordered: { true: "border border-solid border-container", false: "" },
    },
    defaultVariants: {
      size: "middle",
      shape: "circle",
      bordered: false,
    },
  }
);

export const avatarImage = cva("block size-full object-cover");

export const avatarFallback = cva(
  "absolute start-1/2 origin-center whitespace-nowrap"
);

export const avatarGroup = cva(
  "inline-flex [&>*:not(:first-child)]:-ms-2 [&>*]:border [&>*]:border-solid [&>*]:border-container"
);

export const badge = cva("relative inline-block w-fit leading-none", {
  variants: {
    standalone: { true: "align-middle", false: "" },
  },
  defaultVariants: { standalone: false },
});

export const badgeCount = cva(
  "z-auto inline-flex items-center justify-center whitespace-nowrap rounded-full bg-error text-center font-normal text-fg-inverse shadow-[0_0_0_1px_var(--ant-color-bg-container)]",
  {
    variants: {
      size: {
        default: "h-5 min-w-5 px-1.5 text-xs leading-5",
        small: "h-3.5 min-w-3.5 px-1 text-xs leading-[14px]",
      },
      dot: { true: "size-1.5 min-w-0 p-0", false: "" },
      floating: {
        true: "absolute end-0 top-0 z-[1] translate-x-1/2 -translate-y-1/2 rtl:-translate-x-1/2",
        false: "",
      },
    },
    defaultVariants: { size: "default", dot: false, floating: false },
  }
);

export const badgeCustomCount = cva("inline-flex", {
  variants: {
    floating: {
      true: "absolute end-0 top-0 z-[1] translate-x-1/2 -translate-y-1/2 rtl:-translate-x-1/2",
      false: "",
    },
  },
  defaultVariants: { floating: false },
});

export const badgeStatusDot = cva(
  "relative inline-block size-1.5 rounded-full align-middle",
  {
    variants: {
      status: {
        success: "bg-success",
        processing:
          "bg-info after:absolute after:inset-0 after:animate-ant-processing after:rounded-full after:border after:border-solid after:border-info after:content-['']",
        default: "bg-[rgba(0,0,0,0.25)]",
        error: "bg-error",
        warning: "bg-warning",
      },
    },
    defaultVariants: { status: "default" },
  }
);

export const badgeStatusText = cva("ms-2 text-ant text-fg");

export const badgeRibbonWrapper = cva("relative");

export const badgeRibbon = cva(
  "absolute top-2 h-[22px] whitespace-nowrap rounded-sm bg-primary px-2 text-ant leading-[22px] text-fg-inverse",
  {
    variants: {
      placement: {
        start: "-start-2 rounded-es-none",
        end: "-end-2 rounded-ee-none",
      },
    },
    defaultVariants: { placement: "end" },
  }
);

export const badgeRibbonCorner = cva(
  "absolute top-full size-2 border-4 border-solid border-current text-primary brightness-75",
  {
    variants: {
      placement: {
        start: "start-0 border-b-transparent border-s-transparent",
        end: "end-0 border-b-transparent border-e-transparent",
      },
    },
    defaultVariants: { placement: "end" },
  }
);

export const calendar = cva("bg-container text-ant text-fg", {
  variants: {
    fullscreen: { true: "", false: "rounded-lg border border-solid border-line" },
  },
  defaultVariants: { fullscreen: true },
});

export const calendarHeader = cva("flex justify-end gap-2 px-3 py-3");

export const calendarSelect = cva(
  "rounded border border-solid border-line bg-container px-2 text-ant text-fg outline-none focus:border-primary",
  {
    variants: {
      fullscreen: { true: "h-control", false: "h-control-sm" },
    },
    defaultVariants: { fullscreen: true },
  }
);

export const calendarTable = cva("w-full table-fixed border-collapse");

export const calendarCell = cva(
  "cursor-pointer p-0 text-center align-top transition-colors",
  {
    variants: {
      inView: { true: "text-fg", false: "text-fg-quaternary" },
      disabled: { true: "cursor-not-allowed text-fg-quaternary", false: "" },
    },
    defaultVariants: { inView: true, disabled: false },
  }
);

export const calendarCellInner = cva("", {
  variants: {
    fullscreen: {
      true: "mx-1 block h-[86px] border-0 border-t-2 border-solid border-line-secondary px-2 py-1 text-end",
      false: "inline-block h-6 min-w-6 rounded px-1 leading-6",
    },
    selected: { true: "", false: "" },
    today: { true: "", false: "" },
  },
  compoundVariants: [
    { fullscreen: false, selected: true, class: "bg-primary text-fg-inverse" },
    {
      fullscreen: false,
      selected: false,
      today: true,
      class: "outline outline-1 outline-primary",
    },
    { fullscreen: true, selected: true, class: "bg-primary-bg text-primary" },
    { fullscreen: true, today: true, class: "border-primary" },
    {
      fullscreen: false,
      selected: false,
      class: "hover:bg-fill-tertiary",
    },
    { fullscreen: true, selected: false, class: "hover:bg-fill-tertiary" },
  ],
  defaultVariants: { fullscreen: true, selected: false, today: false },
});

export const card = cva(
  "relative flex flex-col rounded-lg bg-container text-ant text-fg",
  {
    variants: {
      bordered: { true: "border border-solid border-line-secondary", false: "" },
      hoverable: {
        true: "cursor-pointer transition-shadow hover:shadow-[var(--ant-box-shadow-secondary)]",
        false: "",
      },
      inner: { true: "bg-fill-quaternary", false: "" },
    },
    defaultVariants: { bordered: true, hoverable: false, inner: false },
  }
);

export const cardHead = cva(
  "flex flex-col justify-center border-0 border-b border-solid border-line-secondary font-semibold",
  {
    variants: {
      size: {
        default: "min-h-14 px-6 text-ant-lg",
        small: "min-h-[38px] px-3 text-ant",
      },
    },
    defaultVariants: { size: "default" },
  }
);

export const cardHeadWrapper = cva("flex w-full items-center");

export const cardBody = cva("", {
  variants: {
    size: { default: "p-6", small: "p-3" },
  },
  defaultVariants: { size: "default" },
});

export const cardActions = cva(
  "m-0 flex list-none border-0 border-t border-solid border-line-secondary p-0 [&>li]:my-3 [&>li]:flex-1 [&>li]:text-center [&>li]:text-fg-secondary [&>li:not(:last-child)]:border-0 [&>li:not(:last-child)]:border-e [&>li:not(:last-child)]:border-solid [&>li:not(:last-child)]:border-line-secondary"
);

export const cardCover = cva(
  "[&>*]:block [&>*]:w-full [&_img]:rounded-t-lg"
);

export const cardMeta = cva("flex gap-4");

export const cardMetaTitle = cva(
  "mb-2 overflow-hidden text-ellipsis whitespace-nowrap text-ant-lg font-semibold"
);

export const cardMetaDescription = cva("text-fg-secondary");

export const cardGrid = cva(
  "w-1/3 p-6 shadow-[1px_0_0_0_var(--ant-color-border-secondary),0_1px_0_0_var(--ant-color-border-secondary),1px_1px_0_0_var(--ant-color-border-secondary),1px_0_0_0_var(--ant-color-border-secondary)_inset,0_1px_0_0_var(--ant-color-border-secondary)_inset]",
  {
    variants: {
      hoverable: {
        true: "transition-shadow hover:relative hover:z-[1] hover:shadow-[var(--ant-box-shadow-secondary)]",
        false: "",
      },
    },
    defaultVariants: { hoverable: true },
  }
);

export const collapse = cva("text-ant text-fg", {
  variants: {
    bordered: {
      true: "rounded-lg border border-b-0 border-solid border-line bg-fill-quaternary",
      false: "bg-fill-quaternary",
    },
    ghost: { true: "border-0 bg-transparent", false: "" },
  },
  defaultVariants: { bordered: true, ghost: false },
});

export const collapseItem = cva("", {
  variants: {
    bordered: {
      true: "border-0 border-b border-solid border-line last:rounded-b-lg",
      false: "",
    },
  },
  defaultVariants: { bordered: true },
});

export const collapseHeader = cva(
  "flex w-full items-start gap-3 border-none bg-transparent text-start text-fg",
  {
    variants: {
      size: {
        small: "px-3 py-2",
        middle: "px-4 py-3",
        large: "px-6 py-4 text-ant-lg",
      },
      disabled: { true: "cursor-not-allowed text-fg-quaternary", false: "cursor-pointer" },
      headerOnly: { true: "cursor-default", false: "" },
    },
    defaultVariants: { size: "middle", disabled: false, headerOnly: false },
  }
);

export const collapseArrow = cva(
  "mt-[5px] size-3 flex-none transition-transform duration-200",
  {
    variants: {
      open: { true: "rotate-90", false: "" },
    },
    defaultVariants: { open: false },
  }
);

export const collapseContent = cva("bg-container", {
  variants: {
    size: {
      small: "px-3 py-2",
      middle: "p-4",
      large: "p-6",
    },
    bordered: { true: "border-0 border-t border-solid border-line", false: "" },
    ghost: { true: "bg-transparent pt-1", false: "" },
  },
  defaultVariants: { size: "middle", bordered: true, ghost: false },
});

export const empty = cva("mx-2 text-center text-ant leading-[var(--ant-line-height)]", {
  variants: {
    simple: { true: "my-8 text-fg-quaternary", false: "text-fg-secondary" },
  },
  defaultVariants: { simple: false },
});

export const emptyImage = cva("mb-2 flex justify-center", {
  variants: {
    simple: { true: "h-10", false: "h-[100px]" },
  },
  defaultVariants: { simple: false },
});

export const emptyFooter = cva("mt-4");

export const qrcode = cva(
  "relative inline-flex items-center justify-center overflow-hidden rounded-lg",
  {
    variants: {
      bordered: { true: "border border-solid border-line p-3", false: "" },
    },
    defaultVariants: { bordered: true },
  }
);

export const qrcodeMask = cva(
  "absolute inset-0 z-10 flex flex-col items-center justify-center gap-2 bg-[rgba(255,255,255,0.96)] text-center text-ant text-fg"
);

export const qrcodeIcon = cva(
  "pointer-events-none absolute left-1/2 top-1/2 -translate-x-1/2 -translate-y-1/2 object-contain"
);

export const watermark = cva("relative");

export const watermarkLayer = cva(
  "pointer-events-none absolute inset-0 bg-repeat"
);

export const statistic = cva("text-ant text-fg");

export const statisticTitle = cva("mb-1 text-ant text-fg-secondary");

export const statisticContent = cva(
  "font-[var(--ant-font-family)] text-[24px] text-fg [&_*]:inline-block"
);

export const statisticAffix = cva("", {
  variants: {
    side: { prefix: "me-1", suffix: "ms-1" },
  },
});

export type StatusColor = "success" | "processing" | "error" | "warning" | "default";

export const tag = cva(
  "me-2 inline-flex h-auto items-center gap-1 whitespace-nowrap rounded-sm px-[7px] text-xs leading-5 transition-all",
  {
    variants: {
      status: {
        none: "",
        success: "bg-success-bg text-success",
        processing: "bg-info-bg text-info",
        error: "bg-error-bg text-error",
        warning: "bg-warning-bg text-warning",
        default: "bg-fill-quaternary text-fg",
      },
      bordered: { true: "border border-solid", false: "border border-solid border-transparent" },
    },
    compoundVariants: [
      { status: "success", bordered: true, class: "border-success-border" },
      { status: "processing", bordered: true, class: "border-info-border" },
      { status: "error", bordered: true, class: "border-error-border" },
      { status: "warning", bordered: true, class: "border-warning-border" },
      { status: "default", bordered: true, class: "border-line" },
    ],
    defaultVariants: { status: "default", bordered: true },
  }
);

export const tagClose = cva(
  "ms-0.5 inline-flex cursor-pointer items-center border-none bg-transparent p-0 text-[10px] text-inherit opacity-45 transition-opacity hover:opacity-100"
);

export const checkableTag = cva(
  "me-2 inline-flex cursor-pointer items-center rounded-sm border border-solid border-transparent px-[7px] text-xs leading-5 transition-colors",
  {
    variants: {
      checked: {
        true: "bg-primary text-fg-inverse hover:bg-primary-hover",
        false: "bg-transparent text-fg hover:text-primary",
      },
    },
    defaultVariants: { checked: false },
  }
);

export const timeline = cva("m-0 list-none p-0 text-ant text-fg");

export const timelineItem = cva("relative m-0 pb-5 text-ant last:pb-0", {
  variants: {
    pending: { true: "", false: "" },
  },
  defaultVariants: { pending: false },
});

export const timelineTail = cva(
  "absolute top-2.5 h-[calc(100%-10px)] border-0 border-s-2 border-solid border-line-secondary",
  {
    variants: {
      mode: {
        left: "start-1",
        right: "end-1",
        center: "start-1/2 -translate-x-px",
      },
      hidden: { true: "hidden", false: "" },
    },
    defaultVariants: { mode: "left", hidden: false },
  }
);

export const timelineHead = cva(
  "absolute top-[5.5px] flex items-center justify-center",
  {
    variants: {
      mode: {
        left: "start-[5px] -translate-x-1/2 rtl:translate-x-1/2",
        right: "end-[5px] translate-x-1/2 rtl:-translate-x-1/2",
        center: "start-1/2 -translate-x-1/2",
      },
      custom: {
        true: "top-[5.5px] -translate-y-1/2 bg-container p-0.5 leading-none",
        false: "size-2.5 rounded-full border-[3px] border-solid bg-container",
      },
    },
    defaultVariants: { mode: "left", custom: false },
  }
);

export const timelineContent = cva("relative break-words", {
  variants: {
    position: {
      left: "ms-[26px]",
      right: "me-[26px] text-end",
      "center-left": "start-[calc(50%+14px)] w-[calc(50%-14px)] text-start",
      "center-right": "end-[calc(50%+14px)] w-[calc(50%-14px)] text-end",
    },
  },
  defaultVariants: { position: "left" },
});

export const timelineLabel = cva("absolute top-[-7px] w-[calc(50%-12px)]", {
  variants: {
    side: {
      start: "start-0 text-end",
      end: "end-0 text-start",
    },
  },
  defaultVariants: { side: "start" },
});

export type TagStatus = NonNullable<VariantProps<typeof tag>["status"]>;
