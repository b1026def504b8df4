// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Popup`
 * Purpose: Trigger + floating panel shared by Tooltip, Popover and Popconfirm.
 * Scope: Wires hover/focus/click/contextMenu triggers to useDelayedOpen and renders a Radix Popover portal into the provider root.
 * Invariants:
 * - Hover triggers keep the panel open while the pointer is over it.
 * - Escape and outside press close through Radix; a press on the trigger is left to the trigger.
 * Side-effects: time (hover delays)
 * @internal
 */

"use client";

import * as RadixPopover from "@radix-ui/react-popover";
import { Slot } from "@radix-ui/react-slot";
import type { CSSProperties, ReactElement, ReactNode } from "react";
import { useRef } from "react";

import { useDelayedOpen } from "@/shared/hooks";
import { toArray } from "@/shared/util";

import { useConfig } from "../theme";
import type { Placement } from "./placement";
import { toSideAlign } from "./placement";

export type PopupTrigger = "hover" | "focus" | "click" | "contextMenu";

export interface PopupOptions {
  open?: boolean | undefined;
  defaultOpen?: boolean | undefined;
  onOpenChange?: ((open: boolean) => void) | undefined;
  trigger?: PopupTrigger | PopupTrigger[] | undefined;
  placement?: Placement | undefined;
  /** Milliseconds. */
  mouseEnterDelay?: number | undefined;
  /** Milliseconds. */
  mouseLeaveDelay?: number | undefined;
  arrow?: boolean | undefined;
}

interface PopupProps extends PopupOptions {
  children: ReactElement;
  content: ReactNode;
  className?: string | undefined;
  style?: CSSProperties | undefined;
  arrowClassName?: string | undefined;
  arrowStyle?: CSSProperties | undefined;
  role?: string | undefined;
  /** Moves focus into the panel on open (click-driven confirm panels). */
  autoFocus?: boolean | undefined;
}

export function Popup({
  children,
  content,
  open: openProp,
  defaultOpen,
  onOpenChange,
  trigger = "hover",
  placement = "top",
  mouseEnterDelay = 100,
  mouseLeaveDelay = 100,
  arrow = true,
  className,
  style,
  arrowClassName,
  arrowStyle,
  role,
  autoFocus = false,
}: PopupProps) {
  const { popupContainer } = useConfig();
  const { open, scheduleOpen, scheduleClose, setOpen, cancel } =
    useDelayedOpen({
      open: openProp,
      defaultOpen,
      onOpenChange,
      enterDelay: mouseEnterDelay,
      leaveDelay: mouseLeaveDelay,
    });
  const anchorRef = useRef<HTMLElement>(null);
  const triggers = new Set(toArray(trigger));
  const hover = triggers.has("hover");
  const { side, align } = toSideAlign(placement);

  const handlers = {
    onPointerEnter: hover ? scheduleOpen : undefined,
    onPointerLeave: hover ? scheduleClose : undefined,
    onFocus: triggers.has("focus") ? () => setOpen(true) : undefined,
    onBlur: triggers.has("focus") ? () => setOpen(false) : undefined,
    onClick: triggers.has("click") ? () => setOpen(!open) : undefined,
    onContextMenu: triggers.has("contextMenu")
      ? (event: { preventDefault: () => void }) => {
          event.preventDefault();
          setOpen(true);
        }
      : undefined,
  };

  return (
    <RadixPopover.Root
      open={open}
      onOpenChange={(next) => {
        if (!next) setOpen(false);
      }}
    >
      <RadixPopover.Anchor asChild>
        <Slot ref={anchorRef} {...handlers}>
          {children}
        </Slot>
      </RadixPopover.Anchor>
      <RadixPopover.Portal container={popupContainer ?? undefined}>
        <RadixPopover.Content
          side={side}
          align={align}
          sideOffset={arrow ? 6 : 4}
          role={role}
          className={className}
          style={style}
          onOpenAutoFocus={(event) => {
            if (!autoFocus) event.preventDefault();
          }}
          onInteractOutside={(event) => {
            // The trigger toggles itself; a press on it is not an outside press
            const target = event.target;
            if (target instanceof Node && anchorRef.current?.contains(target)) {
              event.preventDefault();
            }
          }}
          onPointerEnter={hover ? cancel : undefined}
          onPointerLeave={hover ? scheduleClose : undefined}
        >
          {content}
          {arrow && (
            <RadixPopover.Arrow
              width={12}
              height={6}
              className={arrowClassName}
              style={arrowStyle}
            />
          )}
        </RadixPopover.Content>
      </RadixPopover.Portal>
    </RadixPopover.Root>
  );
}
