// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Skeleton`
 * Purpose: Placeholder blocks shown while content loads, plus standalone Button/Avatar/Input/Image shapes.
 * Scope: Presentational only. `loading={false}` renders children unchanged.
 * Invariants:
 * - Default layout: title on, paragraph on (3 rows, or 2 with an avatar beside a title), avatar off.
 * - A single paragraph width applies to the last row only; an array sets each row.
 * Side-effects: none
 * @public
 */

import { ImageIcon } from "lucide-react";
import type { CSSProperties, ReactNode } from "react";

import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";
import {
  skeleton,
  skeletonBar,
  skeletonElement,
  skeletonImage,
  skeletonParagraph,
  skeletonTitle,
} from "@/styles/ui";

import { useComponentConfig, useComponentSize } from "../theme";

type Width = number | string;

export interface SkeletonAvatarProps {
  active?: boolean;
  size?: SizeType | number;
  shape?: "circle" | "square";
  className?: string;
  style?: CSSProperties;
}

export interface SkeletonTitleProps {
  width?: Width;
}

export interface SkeletonParagraphProps {
  rows?: number;
  width?: Width | Width[];
}

export interface SkeletonProps {
  active?: boolean;
  loading?: boolean;
  avatar?: boolean | Omit<SkeletonAvatarProps, "active">;
  title?: boolean | SkeletonTitleProps;
  paragraph?: boolean | SkeletonParagraphProps;
  round?: boolean;
  className?: string;
  style?: CSSProperties;
  children?: ReactNode;
}

export interface SkeletonLayout {
  avatar: { size: SizeType | number; shape: "circle" | "square" } | null;
  title: SkeletonTitleProps | null;
  paragraph: { rows: number; width?: Width | Width[] | undefined } | null;
}

function pick<T extends object>(
  value: boolean | T | undefined,
  enabledByDefault: boolean
): { enabled: boolean; options: Partial<T> } {
  if (typeof value === "object") return { enabled: true, options: value };
  return { enabled: value ?? enabledByDefault, options: {} };
}

/** Resolves which blocks render and their default sizes. */
export function getSkeletonLayout({
  avatar,
  title,
  paragraph,
}: Pick<SkeletonProps, "avatar" | "title" | "paragraph">): SkeletonLayout {
  const a = pick(avatar, false);
  const t = pick(title, true);
  const p = pick(paragraph, true);

  return {
    avatar: a.enabled
      ? {
          size: a.options.size ?? "large",
          shape: a.options.shape ?? (t.enabled && !p.enabled ? "square" : "circle"),
        }
      : null,
    title: t.enabled
      ? {
          width:
            t.options.width ??
            (p.enabled ? (a.enabled ? "50%" : "38%") : undefined),
        }
      : null,
    paragraph: p.enabled
      ? {
          rows: p.options.rows ?? (!a.enabled && t.enabled ? 3 : 2),
          width: p.options.width ?? (!a.enabled || !t.enabled ? "61%" : undefined),
        }
      : null,
  };
}

export function getParagraphRowWidth(
  index: number,
  rows: number,
  width: Width | Width[] | undefined
): Width | undefined {
  if (Array.isArray(width)) return width[index];
  return index === rows - 1 ? width : undefined;
}

const avatarPx = { small: 24, middle: 32, large: 40 } satisfies Record<SizeType, number>;

function avatarDimension(size: SizeType | number): number {
  return typeof size === "number" ? size : avatarPx[size];
}

function SkeletonAvatar({
  active = false,
  size: sizeProp,
  shape = "circle",
  className,
  style,
}: SkeletonAvatarProps) {
  const { prefixCls } = useComponentConfig("Skeleton", "skeleton");
  const contextSize = useComponentSize(typeof sizeProp === "number" ? undefined : sizeProp);
  const px = avatarDimension(typeof sizeProp === "number" ? sizeProp : contextSize);
  return (
    <span
      className={cn(
        `${prefixCls}-avatar`,
        skeletonElement({ active, shape }),
        className
      )}
      style={{ width: px, height: px, ...style }}
    />
  );
}

export interface SkeletonButtonProps {
  active?: boolean;
  block?: boolean;
  size?: SizeType;
  shape?: "default" | "circle" | "round" | "square";
  className?: string;
  style?: CSSProperties;
}

function SkeletonButton({
  active = false,
  block = false,
  size: sizeProp,
  shape = "default",
  className,
  style,
}: SkeletonButtonProps) {
  const { prefixCls } = useComponentConfig("Skeleton", "skeleton");
  const size = useComponentSize(sizeProp);
  const square = shape === "circle" || shape === "square";
  return (
    <span
      className={cn(
        `${prefixCls}-button`,
        skeletonElement({ active, shape, size, block }),
        !block && (square ? "aspect-square" : "w-16"),
        className
      )}
      style={style}
    />
  );
}

export interface SkeletonInputProps {
  active?: boolean;
  block?: boolean;
  size?: SizeType;
  className?: string;
  style?: CSSProperties;
}

function SkeletonInput({
  active = false,
  block = false,
  size: sizeProp,
  className,
  style,
}: SkeletonInputProps) {
  const { prefixCls } = useComponentConfig("Skeleton", "skeleton");
  const size = useComponentSize(sizeProp);
  return (
    <span
      className={cn(
        `${prefixCls}-input`,
        skeletonElement({ active, size, block }),
        !block && "w-40",
        className
      )}
      style={style}
    />
  );
}

export interface SkeletonImageProps {
  active?: boolean;
  className?: string;
  style?: CSSProperties;
}

function SkeletonImage({ active = false, className, style }: SkeletonImageProps) {
  const { prefixCls } = useComponentConfig("Skeleton", "skeleton");
  return (
    <span
      className={cn(`${prefixCls}-image`, skeletonImage({ active }), className)}
      style={style}
    >
      <ImageIcon className="size-12" aria-hidden />
    </span>
  );
}

function SkeletonRoot({
  active = false,
  loading,
  avatar,
  title,
  paragraph,
  round = false,
  className,
  style,
  children,
}: SkeletonProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Skeleton", "skeleton");

  if (loading === false) return <>{children}</>;

  const layout = getSkeletonLayout({ avatar, title, paragraph });
  const rows = layout.paragraph?.rows ?? 0;

  return (
    <div
      aria-busy
      className={cn(
        prefixCls,
        layout.avatar && `${prefixCls}-with-avatar`,
        active && `${prefixCls}-active`,
        round && `${prefixCls}-round`,
        skeleton({ active }),
        className
      )}
      style={{ ...tokenStyle, ...style }}
    >
      {layout.avatar && (
        <div className={`${prefixCls}-header`}>
          <SkeletonAvatar active={active} {...layout.avatar} />
        </div>
      )}
      {(layout.title || layout.paragraph) && (
        <div className={cn(`${prefixCls}-content`, "flex-1")}>
          {layout.title && (
            <h3
              className={cn(
                `${prefixCls}-title`,
                "m-0",
                skeletonTitle(),
                skeletonBar({ active, round })
              )}
              style={{ width: layout.title.width ?? "100%" }}
            />
          )}
          {layout.paragraph && (
            <ul
              className={cn(
                `${prefixCls}-paragraph`,
                skeletonParagraph(),
                layout.title && "mt-6"
              )}
            >
              {Array.from({ length: rows }, (_, index) => (
                <li
                  // biome-ignore lint/suspicious/noArrayIndexKey: rows are positional placeholders
                  key={index}
                  className={cn("h-4", skeletonBar({ active, round }))}
                  style={{
                    width:
                      getParagraphRowWidth(index, rows, layout.paragraph?.width) ??
                      "100%",
                  }}
                />
              ))}
            </ul>
          )}
        </div>
      )}
    </div>
  );
}

export const Skeleton = Object.assign(SkeletonRoot, {
  Avatar: SkeletonAvatar,
  Button: SkeletonButton,
  Input: SkeletonInput,
  Image: SkeletonImage,
});
