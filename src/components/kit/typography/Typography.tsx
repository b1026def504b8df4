// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/typography/Typography`
 * Purpose: Typography namespace: Title (h1-h5), Text, Paragraph and Link.
 * Scope: Thin wrappers over TypographyBase that choose the element and spacing.
 * Invariants: Title level outside 1-5 falls back to 1; a disabled Link renders without href.
 * Side-effects: none
 * @public
 */

"use client";

import type {
  AnchorHTMLAttributes,
  HTMLAttributes,
  ReactNode,
} from "react";

import { cn } from "@/shared/util";
import { typographyLink, typographyParagraph, typographyTitle } from "@/styles/ui";

import { useComponentConfig } from "../theme";
import type { TypographyDecorations } from "./TypographyBase";
import { TypographyBase } from "./TypographyBase";

type BaseAttributes = Omit<HTMLAttributes<HTMLElement>, "className">;

export interface TextProps extends TypographyDecorations, BaseAttributes {
  className?: string;
  children?: ReactNode;
}

export function Text({ className, ...props }: TextProps) {
  return <TypographyBase component="span" className={className} {...props} />;
}
Text.displayName = "Typography.Text";

export interface TitleProps extends Omit<TextProps, "code" | "keyboard"> {
  level?: 1 | 2 | 3 | 4 | 5;
}

const headingTags = {
  1: "h1",
  2: "h2",
  3: "h3",
  4: "h4",
  5: "h5",
} as const;

export function Title({ level = 1, className, ...props }: TitleProps) {
  const safeLevel = level in headingTags ? level : 1;
  return (
    <TypographyBase
      component={headingTags[safeLevel]}
      className={cn(typographyTitle({ level: safeLevel }), className)}
      {...props}
    />
  );
}
Title.displayName = "Typography.Title";

export type ParagraphProps = TextProps;

export function Paragraph({ className, ...props }: ParagraphProps) {
  return (
    <TypographyBase
      component="div"
      className={cn(typographyParagraph(), className)}
      {...props}
    />
  );
}
Paragraph.displayName = "Typography.Paragraph";

export interface LinkProps
  extends Omit<AnchorHTMLAttributes<HTMLAnchorElement>, "className" | "type"> {
  className?: string;
  disabled?: boolean;
  strong?: boolean;
  underline?: boolean;
}

export function Link({
  disabled = false,
  strong,
  underline,
  href,
  className,
  style,
  children,
  ...props
}: LinkProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Typography",
    "typography"
  );
  let content: ReactNode = children;
  if (underline) content = <u>{content}</u>;
  if (strong) content = <strong>{content}</strong>;

  return (
    <a
      href={disabled ? undefined : href}
      aria-disabled={disabled || undefined}
      className={cn(prefixCls, `${prefixCls}-link`, typographyLink({ disabled }), className)}
      style={{ ...tokenStyle, ...style }}
      {...props}
    >
      {content}
    </a>
  );
}
Link.displayName = "Typography.Link";

export interface TypographyProps extends BaseAttributes {
  className?: string;
  children?: ReactNode;
}

function TypographyRoot({ className, ...props }: TypographyProps) {
  const { prefixCls } = useComponentConfig("Typography", "typography");
  return <article className={cn(prefixCls, "text-fg", className)} {...props} />;
}
TypographyRoot.displayName = "Typography";

export const Typography = Object.assign(TypographyRoot, {
  Title,
  Text,
  Paragraph,
  Link,
});
