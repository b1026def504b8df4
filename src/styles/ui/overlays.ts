// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/ui/overlays`
 * Purpose: Overlay styling factories (tooltip, popover, dropdown, modal, drawer, popconfirm, tour).
 * Scope: Provides CVA factories for floating and modal surfaces. Does not handle positioning logic.
 * Invariants: All variants use design tokens; z-index follows the 1000-based popup stack.
 * Side-effects: none
 * @public
 */

import { cva } from "class-variance-authority";

const popupBase = "outline-none";

export const tooltipContent = cva(
  `${popupBase} z-[1070] min-h-control-sm min-w-8 max-w-[250px] break-words rounded px-2 py-1.5 text-start text-ant shadow-[var(--ant-box-shadow-secondary)]`,
  {
    variants: {
      colored: {
        true: "text-fg-inverse",
        false: "bg-spotlight text-fg-inverse",
      },
    },
    defaultVariants: { colored: false },
  }
);

export const tooltipArrow = cva("", {
  variants: {
    colored: { true: "", false: "fill-spotlight" },
  },
  defaultVariants: { colored: false },
});

export const popoverContent = cva(
  `${popupBase} z-[1030] rounded-lg bg-elevated p-3 text-ant text-fg shadow-[var(--ant-box-shadow-secondary)]`
);

export const popoverTitle = cva("mb-2 min-w-[177px] font-semibold text-fg");

export const popoverArrow = cva("fill-elevated");

export const dropdownMenu = cva(
  `${popupBase} z-[1050] min-w-[120px] rounded-lg bg-elevated p-1 text-ant shadow-[var(--ant-box-shadow-secondary)]`
);

export const modalMask = cva(
  `${popupBase} fixed inset-0 z-[1000] bg-mask`
);

export const modalContent = cva(
  `${popupBase} fixed left-1/2 z-[1000] w-[calc(100vw-32px)] -translate-x-1/2 rounded-lg bg-container px-6 py-5 text-ant text-fg shadow-[var(--ant-box-shadow)]`,
  {
    variants: {
      centered: {
        true: "top-1/2 -translate-y-1/2",
        false: "top-[100px]",
      },
    },
    defaultVariants: { centered: false },
  }
);

export const modalHeader = cva("mb-2");

export const modalTitle = cva("m-0 text-ant-lg font-semibold leading-normal text-fg");

export const modalBody = cva("text-ant leading-[var(--ant-line-height)]");

export const modalFooter = cva("mt-3 flex justify-end gap-2");

export const modalClose = cva(
  "absolute end-4 top-4 inline-flex size-[22px] cursor-pointer items-center justify-center rounded border-none bg-transparent text-fg-tertiary transition-colors hover:bg-fill-secondary hover:text-fg"
);

export const confirmBody = cva("flex flex-nowrap items-start gap-3");

export const confirmIcon = cva("mt-0.5 size-[22px] flex-none", {
  variants: {
    type: {
      confirm: "text-warning",
      info: "text-info",
      success: "text-success",
      error: "text-error",
      warning: "text-warning",
    },
  },
  defaultVariants: { type: "confirm" },
});

export const drawerContent = cva(
  `${popupBase} fixed z-[1000] flex flex-col bg-elevated text-ant text-fg shadow-[var(--ant-box-shadow)] transition-transform`,
  {
    variants: {
      placement: {
        right: "inset-y-0 end-0",
        left: "inset-y-0 start-0",
        top: "inset-x-0 top-0",
        bottom: "inset-x-0 bottom-0",
      },
    },
    defaultVariants: { placement: "right" },
  }
);

export const drawerHeader = cva(
  "flex flex-none items-center gap-3 border-0 border-b border-solid border-line-secondary px-6 py-4"
);

export const drawerTitle = cva("m-0 flex-1 text-ant-lg font-semibold leading-normal");

export const drawerBody = cva("min-h-0 min-w-0 flex-1 overflow-auto p-6");

export const drawerFooter = cva(
  "flex-none border-0 border-t border-solid border-line-secondary px-4 py-2"
);

export const popconfirmInner = cva("flex flex-col gap-2");

export const popconfirmMessage = cva("flex flex-nowrap items-start gap-2");

export const popconfirmTitle = cva("font-semibold text-fg");

export const popconfirmDescription = cva("mt-1 text-fg");

export const popconfirmButtons = cva("flex justify-end gap-2");

export const tourMask = cva("pointer-events-none fixed inset-0 z-[1001]");

export const tourPanel = cva(
  `${popupBase} z-[1001] w-[520px] max-w-[calc(100vw-32px)] rounded-lg p-4 text-ant shadow-[var(--ant-box-shadow-secondary)]`,
  {
    variants: {
      type: {
        default: "bg-elevated text-fg",
        primary: "bg-primary text-fg-inverse",
      },
    },
    defaultVariants: { type: "default" },
  }
);

export const tourFooter = cva("mt-4 flex items-center justify-between");

export const tourIndicator = cva("inline-block size-1.5 rounded-full", {
  variants: {
    active: { true: "", false: "" },
    type: { default: "", primary: "" },
  },
  compoundVariants: [
    { active: true, type: "default", class: "bg-primary" },
    { active: false, type: "default", class: "bg-fill" },
    { active: true, type: "primary", class: "bg-fg-inverse" },
    { active: false, type: "primary", class: "bg-[rgba(255,255,255,0.15)]" },
  ],
  defaultVariants: { active: false, type: "default" },
});
