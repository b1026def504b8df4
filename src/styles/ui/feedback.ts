// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/ui/feedback`
 * Purpose: Feedback styling factories (alert, message, notification, progress, result, skeleton, spin).
 * Scope: Provides CVA factories for feedback components. Does not schedule or animate anything itself.
 * Invariants: All variants use design tokens; factories return valid Tailwind class strings.
 * Side-effects: none
 * Links: src/components/kit/feedback
 * @public
 */

import { cva, type VariantProps } from "class-variance-authority";

const alertTypeVariants = {
  success: "border-success-border bg-success-bg",
  info: "border-info-border bg-info-bg",
  warning: "border-warning-border bg-warning-bg",
  error: "border-error-border bg-error-bg",
} as const;

export type AlertType = keyof typeof alertTypeVariants;

export const alert = cva(
  "relative flex items-center break-words rounded-lg border border-solid text-ant text-fg",
  {
    variants: {
      type: alertTypeVariants,
      banner: { true: "rounded-none border-0", false: "" },
      withDescription: { true: "items-start px-6 py-5", false: "px-3 py-2" },
    },
    defaultVariants: { type: "info", banner: false, withDescription: false },
  }
);

export const alertIcon = cva("flex-none leading-none", {
  variants: {
    type: {
      success: "text-success",
      info: "text-info",
      warning: "text-warning",
      error: "text-error",
    },
    large: { true: "me-3 size-6", false: "me-2 size-3.5" },
  },
  defaultVariants: { type: "info", large: false },
});

export const alertContent = cva("min-w-0 flex-1");

export const alertMessage = cva("text-fg", {
  variants: {
    withDescription: { true: "mb-1 text-ant-lg", false: "" },
  },
  defaultVariants: { withDescription: false },
});

export const alertDescription = cva("text-ant");

export const alertAction = cva("ms-2");

export const alertClose = cva(
  "ms-2 inline-flex cursor-pointer items-center border-none bg-transparent p-0 text-fg-tertiary transition-colors hover:text-fg"
);

export const messageHolder = cva(
  "pointer-events-none fixed inset-x-0 z-[1010] flex flex-col items-center gap-2 text-ant text-fg"
);

export const messageNotice = cva(
  "pointer-events-auto inline-flex items-center gap-2 rounded-lg bg-elevated px-3 py-2 shadow-[var(--ant-box-shadow)]"
);

export const noticeIcon = cva("size-4 flex-none", {
  variants: {
    type: {
      success: "text-success",
      info: "text-info",
      warning: "text-warning",
      error: "text-error",
      loading: "animate-spin text-info",
    },
  },
});

export type NoticeType = NonNullable<VariantProps<typeof noticeIcon>["type"]>;

export const notificationHolder = cva(
  "pointer-events-none fixed z-[1010] flex w-[384px] max-w-[calc(100vw-48px)] flex-col gap-4 text-ant text-fg",
  {
    variants: {
      placement: {
        top: "left-1/2 top-6 -translate-x-1/2",
        topLeft: "start-6 top-6",
        topRight: "end-6 top-6",
        bottom: "bottom-6 left-1/2 -translate-x-1/2 flex-col-reverse",
        bottomLeft: "bottom-6 start-6 flex-col-reverse",
        bottomRight: "bottom-6 end-6 flex-col-reverse",
      },
    },
    defaultVariants: { placement: "topRight" },
  }
);

export type NotificationPlacement = NonNullable<
  VariantProps<typeof notificationHolder>["placement"]
>;

export const notificationNotice = cva(
  "pointer-events-auto relative overflow-hidden rounded-lg bg-elevated px-6 py-5 shadow-[var(--ant-box-shadow)]"
);

export const notificationTitle = cva("mb-2 pe-6 text-ant-lg text-fg");

export const notificationDescription = cva("text-ant");

export const notificationBtn = cva("mt-3 flex justify-end");

export const notificationProgress = cva(
  "absolute inset-x-0 bottom-0 h-0.5 origin-left animate-ant-notice-progress bg-primary rtl:origin-right"
);

export const progressLine = cva("inline-flex w-full items-center gap-2 text-ant");

export const progressTrail = cva(
  "relative flex-1 overflow-hidden bg-fill-secondary",
  {
    variants: {
      round: { true: "rounded-full", false: "" },
    },
    defaultVariants: { round: true },
  }
);

export const progressBar = cva("absolute inset-y-0 start-0 transition-[width] duration-300", {
  variants: {
    status: {
      normal: "bg-info",
      active: "bg-info",
      success: "bg-success",
      exception: "bg-error",
    },
    round: { true: "rounded-full", false: "" },
  },
  defaultVariants: { status: "normal", round: true },
});

export type ProgressStatus = NonNullable<
  VariantProps<typeof progressBar>["status"]
>;

export const progressActive = cva(
  "absolute inset-0 animate-pulse rounded-[inherit] bg-container opacity-30"
);

export const progressSuccessBar = cva("absolute inset-y-0 start-0 bg-success");

export const progressText = cva("min-w-[2em] flex-none whitespace-nowrap text-start text-fg", {
  variants: {
    status: {
      normal: "",
      active: "",
      success: "text-success",
      exception: "text-error",
    },
  },
  defaultVariants: { status: "normal" },
});

export const progressSteps = cva("inline-flex items-center gap-0.5");

export const progressStep = cva("inline-block flex-none transition-colors", {
  variants: {
    filled: { true: "", false: "bg-fill-secondary" },
  },
  defaultVariants: { filled: false },
});

export const progressCircle = cva("relative inline-block leading-none");

export const progressCircleText = cva(
  "absolute inset-0 flex items-center justify-center text-center text-fg"
);

export const result = cva("px-8 py-12 text-center text-ant text-fg");

export const resultIcon = cva("mb-6 flex justify-center", {
  variants: {
    status: {
      success: "text-success",
      error: "text-error",
      info: "text-info",
      warning: "text-warning",
      image: "",
    },
  },
  defaultVariants: { status: "info" },
});

export const resultTitle = cva("my-2 text-h3 leading-[1.4] text-fg");

export const resultSubtitle = cva("text-ant text-fg-secondary");

export const resultExtra = cva("mt-6 flex flex-wrap justify-center gap-2");

export const resultContent = cva("mt-6 rounded-sm bg-fill-quaternary px-10 py-6 text-start");

const skeletonBlock = "bg-fill-secondary";

const skeletonActive =
  "bg-[linear-gradient(90deg,var(--ant-color-fill-secondary)_25%,var(--ant-color-fill)_37%,var(--ant-color-fill-secondary)_63%)] bg-[length:400%_100%] animate-ant-skeleton";

export const skeleton = cva("flex w-full gap-4", {
  variants: {
    active: { true: "", false: "" },
  },
  defaultVariants: { active: false },
});

export const skeletonBar = cva(skeletonBlock, {
  variants: {
    active: { true: skeletonActive, false: "" },
    round: { true: "rounded-full", false: "rounded-sm" },
  },
  defaultVariants: { active: false, round: false },
});

export const skeletonTitle = cva("h-4");

export const skeletonParagraph = cva("m-0 flex list-none flex-col gap-4 p-0");

export const skeletonElement = cva(`inline-block align-top ${skeletonBlock}`, {
  variants: {
    active: { true: skeletonActive, false: "" },
    shape: {
      default: "rounded",
      round: "rounded-full",
      circle: "rounded-full",
      square: "rounded",
    },
    size: {
      small: "h-control-sm",
      middle: "h-control",
      large: "h-control-lg",
    },
    block: { true: "w-full", false: "" },
  },
  defaultVariants: {
    active: false,
    shape: "default",
    size: "middle",
    block: false,
  },
});

export const skeletonImage = cva(
  "inline-flex size-24 items-center justify-center rounded bg-fill-secondary text-fg-quaternary",
  {
    variants: {
      active: { true: skeletonActive, false: "" },
    },
    defaultVariants: { active: false },
  }
);

export const spin = cva("inline-flex flex-col items-center justify-center gap-2 text-primary", {
  variants: {
    size: {
      small: "text-ant-sm",
      middle: "text-ant",
      large: "text-ant-lg",
    },
    fullscreen: {
      true: "fixed inset-0 z-[1000] bg-mask text-fg-inverse",
      false: "",
    },
  },
  defaultVariants: { size: "middle", fullscreen: false },
});

export const spinDot = cva("relative inline-block animate-spin", {
  variants: {
    size: {
      small: "size-3.5",
      middle: "size-5",
      large: "size-8",
    },
  },
  defaultVariants: { size: "middle" },
});

export const spinNested = cva("relative");

export const spinNestedMask = cva(
  "absolute inset-0 z-[4] flex items-center justify-center"
);

export const spinContainer = cva("relative transition-opacity", {
  variants: {
    blurred: {
      true: "pointer-events-none select-none opacity-50",
      false: "",
    },
  },
  defaultVariants: { blurred: false },
});
