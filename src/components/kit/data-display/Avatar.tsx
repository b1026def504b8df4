// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Avatar`
 * Purpose: Image, icon or text avatar; Avatar.Group stacks avatars and collapses the overflow into `+N`.
 * Scope: Radix Avatar handles image loading and fallback; text children scale down to fit within `gap`.
 * Invariants: Group with `max.count` renders at most `count` avatars plus one `+N` avatar.
 * Side-effects: none
 * @public
 */

"use client";

import * as AvatarPrimitive from "@radix-ui/react-avatar";
import { useComposedRefs } from "@radix-ui/react-compose-refs";
import type { CSSProperties, ReactNode } from "react";
import {
  Children,
  createContext,
  forwardRef,
  useContext,
  useLayoutEffect,
  useRef,
  useState,
} from "react";

import { cn } from "@/shared/util";
import { avatar, avatarFallback, avatarGroup, avatarImage } from "@/styles/ui";

import { useComponentConfig } from "../theme";

export type AvatarSize = "small" | "default" | "large" | number;
export type AvatarShape = "circle" | "square";

interface GroupContextValue {
  size?: AvatarSize | undefined;
  shape?: AvatarShape | undefined;
}

const AvatarGroupContext = createContext<GroupContextValue>({});

export interface AvatarProps {
  className?: string;
  style?: CSSProperties;
  src?: string;
  srcSet?: string;
  alt?: string;
  icon?: ReactNode;
  shape?: AvatarShape;
  size?: AvatarSize;
  /** Horizontal inset, in px, kept free around text children. */
  gap?: number;
  children?: ReactNode;
}

const AvatarRoot = forwardRef<HTMLSpanElement, AvatarProps>(
  (
    { src, srcSet, alt, icon, shape, size, gap = 4, className, style, children },
    ref
  ) => {
    const { prefixCls, style: tokenStyle } = useComponentConfig(
      "Avatar",
      "avatar"
    );
    const group = useContext(AvatarGroupContext);
    const mergedShape = shape ?? group.shape ?? "circle";
    const mergedSize = size ?? group.size ?? "default";
    const numeric = typeof mergedSize === "number";

    const nodeRef = useRef<HTMLSpanElement>(null);
    const composedRef = useComposedRefs(ref, nodeRef);
    const textRef = useRef<HTMLSpanElement>(null);
    const [scale, setScale] = useState(1);

    useLayoutEffect(() => {
      const node = nodeRef.current;
      const text = textRef.current;
      if (!node || !text) return;
      const textWidth = text.offsetWidth;
      const nodeWidth = node.offsetWidth;
      if (textWidth === 0 || nodeWidth === 0) return;
      setScale(
        nodeWidth - gap * 2 < textWidth ? (nodeWidth - gap * 2) / textWidth : 1
      );
    }, [children, gap, mergedSize]);

    const sizeStyle: CSSProperties = numeric
      ? {
          width: mergedSize,
          height: mergedSize,
          lineHeight: `${mergedSize}px`,
          fontSize: icon ? mergedSize / 2 : 18,
        }
      : {};

    return (
      <AvatarPrimitive.Root
        ref={composedRef}
        className={cn(
          prefixCls,
          `${prefixCls}-${mergedShape}`,
          mergedSize === "small" && `${prefixCls}-sm`,
          mergedSize === "large" && `${prefixCls}-lg`,
          icon !== undefined && `${prefixCls}-icon`,
          avatar({
            shape: mergedShape,
            size: numeric || mergedSize === "default" ? "middle" : mergedSize,
          }),
          className
        )}
        style={{ ...tokenStyle, ...sizeStyle, ...style }}
      >
        {src !== undefined && (
          <AvatarPrimitive.Image
            src={src}
            srcSet={srcSet}
            alt={alt}
            className={avatarImage()}
          />
        )}
        <AvatarPrimitive.Fallback asChild>
          {icon !== undefined ? (
            <span className="inline-flex items-center">{icon}</span>
          ) : (
            <span
              ref={textRef}
              className={cn(`${prefixCls}-string`, avatarFallback())}
              style={{
                transform: `scale(${scale}) translateX(-50%)`,
              }}
            >
              {children}
            </span>
          )}
        </AvatarPrimitive.Fallback>
      </AvatarPrimitive.Root>
    );
  }
);
AvatarRoot.displayName = "Avatar";

export interface AvatarGroupProps extends GroupContextValue {
  className?: string;
  style?: CSSProperties;
  max?: { count?: number; style?: CSSProperties };
  children?: ReactNode;
}

function AvatarGroup({
  max,
  size,
  shape,
  className,
  style,
  children,
}: AvatarGroupProps) {
  const { prefixCls } = useComponentConfig("Avatar", "avatar-group");
  const items = Children.toArray(children);
  const limit = max?.count;
  const visible =
    limit !== undefined && limit < items.length ? items.slice(0, limit) : items;
  const overflow = items.length - visible.length;

  return (
    <AvatarGroupContext.Provider value={{ size, shape }}>
      <div className={cn(prefixCls, avatarGroup(), className)} style={style}>
        {visible}
        {overflow > 0 && (
          <AvatarRoot style={max?.style}>{`+${overflow}`}</AvatarRoot>
        )}
      </div>
    </AvatarGroupContext.Provider>
  );
}
AvatarGroup.displayName = "Avatar.Group";

export const Avatar = Object.assign(AvatarRoot, { Group: AvatarGroup });
