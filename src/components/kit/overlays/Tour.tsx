// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/overlays/Tour`
 * Purpose: Step-by-step guide that spotlights page elements with a panel beside each one.
 * Scope: Measures the current step's target, cuts it out of an SVG mask and anchors a Radix Popover to it. Steps without a target show a centered panel.
 * Invariants:
 * - Finish calls onFinish, then onClose with the current step.
 * - The spotlight follows the target on resize and scroll.
 * Side-effects: DOM (scrolls the target into view on step change)
 * Links: data-display/placement.ts
 * @public
 */

"use client";

import * as RadixPopover from "@radix-ui/react-popover";
import { X } from "lucide-react";
import type { CSSProperties, ReactNode } from "react";
import { useId, useLayoutEffect, useMemo, useState } from "react";
import { createPortal } from "react-dom";

import { useControllableState } from "@/shared/hooks";
import { cn } from "@/shared/util";
import {
  modalClose,
  tourFooter,
  tourIndicator,
  tourMask,
  tourPanel,
} from "@/styles/ui";

import type { Placement } from "../data-display/placement";
import { toSideAlign } from "../data-display/placement";
import { Button } from "../general/Button";
import type { ButtonProps } from "../general/Button";
import { useComponentConfig, useLocale } from "../theme";

export type TourType = "default" | "primary";

type StepButtonProps = Pick<
  ButtonProps,
  "children" | "disabled" | "className"
> & {
  onClick?: () => void;
};

export interface TourStep {
  title?: ReactNode;
  description?: ReactNode;
  cover?: ReactNode;
  target?: HTMLElement | null | (() => HTMLElement | null);
  placement?: Placement;
  arrow?: boolean;
  mask?: boolean;
  type?: TourType;
  nextButtonProps?: StepButtonProps;
  prevButtonProps?: StepButtonProps;
  className?: string;
  style?: CSSProperties;
}

export interface TourGap {
  /** px around the target. */
  offset?: number;
  radius?: number;
}

export interface TourProps {
  steps: TourStep[];
  open?: boolean;
  current?: number;
  defaultCurrent?: number;
  onChange?: (current: number) => void;
  onClose?: (current: number) => void;
  onFinish?: () => void;
  type?: TourType;
  mask?: boolean | { color?: string };
  arrow?: boolean;
  placement?: Placement;
  gap?: TourGap;
  indicatorsRender?: (current: number, total: number) => ReactNode;
  closeIcon?: ReactNode;
  scrollIntoViewOptions?: boolean | ScrollIntoViewOptions;
  zIndex?: number;
  className?: string;
}

export interface SpotRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function resolveTarget(target: TourStep["target"]): HTMLElement | null {
  if (typeof target === "function") return target();
  return target ?? null;
}

/** Target rect grown by `offset` on every side. */
export function getSpotRect(rect: SpotRect, offset: number): SpotRect {
  return {
    x: rect.x - offset,
    y: rect.y - offset,
    width: rect.width + offset * 2,
    height: rect.height + offset * 2,
  };
}

function useTargetRect(
  target: HTMLElement | null,
  active: boolean,
  scrollOptions: TourProps["scrollIntoViewOptions"]
): DOMRect | null {
  const [rect, setRect] = useState<DOMRect | null>(null);

  useLayoutEffect(() => {
    if (!active || !target) {
      setRect(null);
      return undefined;
    }
    if (scrollOptions !== false) {
      target.scrollIntoView(
        scrollOptions === true || scrollOptions === undefined
          ? { block: "center", inline: "nearest" }
          : scrollOptions
      );
    }
    const measure = () => setRect(target.getBoundingClientRect());
    measure();
    window.addEventListener("resize", measure);
    window.addEventListener("scroll", measure, true);
    return () => {
      window.removeEventListener("resize", measure);
      window.removeEventListener("scroll", measure, true);
    };
  }, [target, active, scrollOptions]);

  return rect;
}

export function Tour({
  steps,
  open = false,
  current: currentProp,
  defaultCurrent = 0,
  onChange,
  onClose,
  onFinish,
  type: tourType = "default",
  mask = true,
  arrow = true,
  placement = "bottom",
  gap,
  indicatorsRender,
  closeIcon,
  scrollIntoViewOptions,
  zIndex = 1001,
  className,
}: TourProps) {
  const { prefixCls, style: tokenStyle, popupContainer } = useComponentConfig(
    "Tour",
    "tour"
  );
  const locale = useLocale("Tour");
  const { close: closeLabel } = useLocale("global");
  const maskId = useId();
  const [current, setCurrent] = useControllableState({
    value: currentProp,
    defaultValue: defaultCurrent,
    onChange,
  });

  const step = steps[current];
  const target = open && step ? resolveTarget(step.target) : null;
  const rect = useTargetRect(target, open, scrollIntoViewOptions);
  const virtualRef = useMemo(
    () => ({
      current: {
        getBoundingClientRect: () =>
          target?.getBoundingClientRect() ?? new DOMRect(),
      },
    }),
    [target]
  );

  if (!open || !step || typeof document === "undefined") return null;

  const total = steps.length;
  const isLast = current === total - 1;
  const type = step.type ?? tourType;
  const showMask = step.mask ?? mask !== false;
  const maskColor = typeof mask === "object" ? mask.color : undefined;
  const offset = gap?.offset ?? 6;
  const radius = gap?.radius ?? 2;
  const spot = rect ? getSpotRect(rect, offset) : null;
  const { side, align } = toSideAlign(step.placement ?? placement);
  const showArrow = (step.arrow ?? arrow) && target !== null;
  const primary = type === "primary";

  const close = () => onClose?.(current);
  const prev = () => {
    step.prevButtonProps?.onClick?.();
    setCurrent(current - 1);
  };
  const next = () => {
    step.nextButtonProps?.onClick?.();
    if (isLast) {
      onFinish?.();
      close();
      return;
    }
    setCurrent(current + 1);
  };

  const panel = (
    <>
      {closeIcon !== null && (
        <button
          type="button"
          aria-label={closeLabel}
          className={cn(
            `${prefixCls}-close`,
            modalClose(),
            "end-3 top-3",
            primary && "text-fg-inverse hover:text-fg-inverse"
          )}
          onClick={close}
        >
          {closeIcon ?? <X className="size-4" aria-hidden />}
        </button>
      )}
      {step.cover !== undefined && (
        <div className={cn(`${prefixCls}-cover`, "mb-3 text-center")}>
          {step.cover}
        </div>
      )}
      {step.title !== undefined && (
        <div className={cn(`${prefixCls}-title`, "mb-2 pe-6 font-semibold")}>
          {step.title}
        </div>
      )}
      {step.description !== undefined && (
        <div className={`${prefixCls}-description`}>{step.description}</div>
      )}
      <div className={cn(`${prefixCls}-footer`, tourFooter())}>
        <div className={`${prefixCls}-indicators`}>
          {indicatorsRender ? (
            indicatorsRender(current, total)
          ) : total > 1 ? (
            <span className="inline-flex gap-1.5">
              {steps.map((_, index) => (
                <span
                  // biome-ignore lint/suspicious/noArrayIndexKey: one dot per step position
                  key={index}
                  className={cn(
                    `${prefixCls}-indicator`,
                    index === current && `${prefixCls}-indicator-active`,
                    tourIndicator({ active: index === current, type })
                  )}
                />
              ))}
            </span>
          ) : null}
        </div>
        <div className={cn(`${prefixCls}-buttons`, "flex gap-2")}>
          {current > 0 && (
            <Button
              size="small"
              ghost={primary}
              disabled={step.prevButtonProps?.disabled}
              className={step.prevButtonProps?.className}
              onClick={prev}
            >
              {step.prevButtonProps?.children ?? locale.Previous}
            </Button>
          )}
          <Button
            size="small"
            type={primary ? "default" : "primary"}
            disabled={step.nextButtonProps?.disabled}
            className={step.nextButtonProps?.className}
            onClick={next}
          >
            {step.nextButtonProps?.children ??
              (isLast ? locale.Finish : locale.Next)}
          </Button>
        </div>
      </div>
    </>
  );

  const panelClass = cn(
    prefixCls,
    primary && `${prefixCls}-primary`,
    tourPanel({ type }),
    "relative",
    className,
    step.className
  );
  const container = popupContainer ?? document.body;

  return (
    <>
      {showMask &&
        createPortal(
          <svg
            aria-hidden
            className={cn(`${prefixCls}-mask`, tourMask())}
            style={{ ...tokenStyle, width: "100%", height: "100%", zIndex }}
          >
            <defs>
              <mask id={maskId}>
                <rect x={0} y={0} width="100%" height="100%" fill="white" />
                {spot && (
                  <rect
                    x={spot.x}
                    y={spot.y}
                    width={spot.width}
                    height={spot.height}
                    rx={radius}
                    fill="black"
                  />
                )}
              </mask>
            </defs>
            <rect
              x={0}
              y={0}
              width="100%"
              height="100%"
              fill={maskColor ?? "var(--ant-color-bg-mask)"}
              mask={`url(#${maskId})`}
            />
          </svg>,
          container
        )}
      {target ? (
        <RadixPopover.Root open>
          <RadixPopover.Anchor virtualRef={virtualRef} />
          <RadixPopover.Portal container={container}>
            <RadixPopover.Content
              role="dialog"
              side={side}
              align={align}
              sideOffset={offset + (showArrow ? 6 : 4)}
              className={panelClass}
              style={{ ...tokenStyle, zIndex, ...step.style }}
              onInteractOutside={(event) => event.preventDefault()}
              onEscapeKeyDown={close}
            >
              {panel}
              {showArrow && (
                <RadixPopover.Arrow
                  width={12}
                  height={6}
                  className={primary ? "fill-primary" : "fill-elevated"}
                />
              )}
            </RadixPopover.Content>
          </RadixPopover.Portal>
        </RadixPopover.Root>
      ) : (
        createPortal(
          <div
            role="dialog"
            className={cn(
              panelClass,
              "fixed left-1/2 top-1/2 -translate-x-1/2 -translate-y-1/2"
            )}
            style={{ ...tokenStyle, zIndex, ...step.style }}
          >
            {panel}
          </div>,
          container
        )
      )}
    </>
  );
}
