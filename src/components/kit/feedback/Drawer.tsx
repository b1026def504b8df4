// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Drawer`
 * Purpose: Edge-anchored panel with header, extra actions, body and footer.
 * Scope: Built on Radix Dialog. Nested drawers push their parent aside by `push.distance`.
 * Invariants:
 * - Escape, mask press and the close icon route to onClose; the parent owns `open`.
 * - Width applies to left/right placements, height to top/bottom; `size="large"` defaults either to 736.
 * Side-effects: none
 * Links: useRetainedContent.tsx
 * @public
 */

"use client";

import * as RadixDialog from "@radix-ui/react-dialog";
import { X } from "lucide-react";
import type { CSSProperties, ReactNode } from "react";
import {
  createContext,
  useContext,
  useEffect,
  useMemo,
  useRef,
  useState,
} from "react";

import { cn } from "@/shared/util";
import {
  drawerBody,
  drawerContent,
  drawerFooter,
  drawerHeader,
  drawerTitle,
  modalClose,
  modalMask,
} from "@/styles/ui";

import { useComponentConfig, useLocale } from "../theme";
import { useRetainedContent } from "./useRetainedContent";

export type DrawerPlacement = "right" | "left" | "top" | "bottom";

export interface DrawerProps {
  open?: boolean;
  placement?: DrawerPlacement;
  width?: number | string;
  height?: number | string;
  size?: "default" | "large";
  title?: ReactNode;
  extra?: ReactNode;
  footer?: ReactNode;
  closable?: boolean | { closeIcon?: ReactNode };
  closeIcon?: ReactNode;
  mask?: boolean;
  maskClosable?: boolean;
  keyboard?: boolean;
  onClose?: () => void;
  destroyOnClose?: boolean;
  forceRender?: boolean;
  afterOpenChange?: (open: boolean) => void;
  /** How far this drawer moves aside while a nested drawer is open. */
  push?: boolean | { distance: number };
  zIndex?: number;
  className?: string;
  rootClassName?: string;
  style?: CSSProperties;
  children?: ReactNode;
}

interface DrawerParent {
  push: () => void;
  pull: () => void;
}

const DrawerContext = createContext<DrawerParent | null>(null);

const DEFAULT_PUSH = 180;

export function getPushTransform(
  placement: DrawerPlacement,
  distance: number
): string {
  switch (placement) {
    case "right":
      return `translateX(-${distance}px)`;
    case "left":
      return `translateX(${distance}px)`;
    case "top":
      return `translateY(${distance}px)`;
    case "bottom":
      return `translateY(-${distance}px)`;
  }
}

export function Drawer({
  open = false,
  placement = "right",
  width,
  height,
  size = "default",
  title,
  extra,
  footer,
  closable = true,
  closeIcon,
  mask = true,
  maskClosable = true,
  keyboard = true,
  onClose,
  destroyOnClose = false,
  forceRender = false,
  afterOpenChange,
  push = { distance: DEFAULT_PUSH },
  zIndex,
  className,
  rootClassName,
  style,
  children,
}: DrawerProps) {
  const { prefixCls, style: tokenStyle, popupContainer } = useComponentConfig(
    "Drawer",
    "drawer"
  );
  const { close: closeLabel } = useLocale("global");
  const parent = useContext(DrawerContext);
  const [pushedBy, setPushedBy] = useState(0);
  const body = useRetainedContent(children, {
    open,
    destroyOnClose,
    forceRender,
  });

  const context = useMemo<DrawerParent>(
    () => ({
      push: () => setPushedBy((count) => count + 1),
      pull: () => setPushedBy((count) => Math.max(0, count - 1)),
    }),
    []
  );

  useEffect(() => {
    if (!open || !parent) return undefined;
    parent.push();
    return () => parent.pull();
  }, [open, parent]);

  const previousOpen = useRef(open);
  const afterOpenChangeRef = useRef(afterOpenChange);
  afterOpenChangeRef.current = afterOpenChange;
  useEffect(() => {
    if (previousOpen.current === open) return;
    previousOpen.current = open;
    afterOpenChangeRef.current?.(open);
  }, [open]);

  const horizontal = placement === "left" || placement === "right";
  const defaultExtent = size === "large" ? 736 : 378;
  const extent = horizontal
    ? { width: width ?? defaultExtent }
    : { height: height ?? defaultExtent };
  const pushDistance =
    push === false ? 0 : push === true ? DEFAULT_PUSH : push.distance;
  const pushStyle: CSSProperties =
    pushedBy > 0 && pushDistance > 0
      ? { transform: getPushTransform(placement, pushDistance) }
      : {};

  const resolvedCloseIcon =
    typeof closable === "object"
      ? (closable.closeIcon ?? closeIcon)
      : closeIcon;
  const showClose = closable !== false && resolvedCloseIcon !== null;
  const hasHeader =
    showClose || (title !== undefined && title !== null) || extra !== undefined;

  return (
    <DrawerContext.Provider value={context}>
      {body.keeper}
      <RadixDialog.Root
        open={open}
        onOpenChange={(next) => {
          if (!next) onClose?.();
        }}
      >
        <RadixDialog.Portal container={popupContainer ?? undefined}>
          <div
            className={cn(`${prefixCls}-root`, rootClassName)}
            style={tokenStyle}
          >
            {mask && (
              <RadixDialog.Overlay
                className={cn(`${prefixCls}-mask`, modalMask())}
                style={zIndex !== undefined ? { zIndex } : undefined}
              />
            )}
            <RadixDialog.Content
              aria-describedby={undefined}
              className={cn(
                prefixCls,
                `${prefixCls}-${placement}`,
                drawerContent({ placement }),
                className
              )}
              style={{
                ...extent,
                ...(zIndex !== undefined ? { zIndex } : {}),
                ...pushStyle,
                ...style,
              }}
              onEscapeKeyDown={(event) => {
                if (!keyboard) event.preventDefault();
              }}
              onPointerDownOutside={(event) => {
                if (!maskClosable || !mask) event.preventDefault();
              }}
              onInteractOutside={(event) => {
                if (!maskClosable || !mask) event.preventDefault();
              }}
            >
              {hasHeader && (
                <div className={cn(`${prefixCls}-header`, drawerHeader())}>
                  {showClose && (
                    <RadixDialog.Close
                      aria-label={closeLabel}
                      className={cn(
                        `${prefixCls}-close`,
                        modalClose(),
                        "static"
                      )}
                    >
                      {resolvedCloseIcon ?? <X className="size-4" aria-hidden />}
                    </RadixDialog.Close>
                  )}
                  <RadixDialog.Title
                    className={cn(`${prefixCls}-title`, drawerTitle())}
                  >
                    {title}
                  </RadixDialog.Title>
                  {extra !== undefined && (
                    <div className={`${prefixCls}-extra`}>{extra}</div>
                  )}
                </div>
              )}
              <div className={cn(`${prefixCls}-body`, drawerBody())}>
                {body.slot}
              </div>
              {footer !== undefined && footer !== null && (
                <div className={cn(`${prefixCls}-footer`, drawerFooter())}>
                  {footer}
                </div>
              )}
            </RadixDialog.Content>
          </div>
        </RadixDialog.Portal>
      </RadixDialog.Root>
    </DrawerContext.Provider>
  );
}
