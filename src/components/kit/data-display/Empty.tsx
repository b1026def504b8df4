// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Empty`
 * Purpose: Placeholder for empty data with an illustration, a description and an optional footer.
 * Invariants: `description={false}` hides the text; children render as the footer.
 * Side-effects: none
 * @public
 */

import type { CSSProperties, ReactNode } from "react";

import { cn } from "@/shared/util";
import { empty, emptyFooter, emptyImage } from "@/styles/ui";

import { useComponentConfig, useLocale } from "../theme";

const PRESENTED_IMAGE_DEFAULT = (
  <svg width="184" height="100" viewBox="0 0 184 100" aria-hidden>
    <g fill="none" fillRule="evenodd">
      <ellipse cx="92" cy="88" rx="68" ry="10" fill="var(--ant-color-fill-tertiary)" />
      <path
        d="M56 30h72l14 22v30a4 4 0 0 1-4 4H46a4 4 0 0 1-4-4V52z"
        fill="var(--ant-color-fill-quaternary)"
        stroke="var(--ant-color-border)"
      />
      <path
        d="M42 52h32a6 6 0 0 0 6 6h24a6 6 0 0 0 6-6h32"
        stroke="var(--ant-color-border)"
      />
    </g>
  </svg>
);

const PRESENTED_IMAGE_SIMPLE = (
  <svg width="64" height="41" viewBox="0 0 64 41" aria-hidden>
    <g transform="translate(0 1)" fill="none" fillRule="evenodd">
      <ellipse cx="32" cy="33" rx="32" ry="7" fill="var(--ant-color-fill-tertiary)" />
      <path
        d="M55 12.8 44.9 1.3A2.5 2.5 0 0 0 43 .5H21a2.5 2.5 0 0 0-1.9.8L9 12.8V22h46z"
        stroke="var(--ant-color-border)"
        fill="var(--ant-color-fill-quaternary)"
      />
    </g>
  </svg>
);

export interface EmptyProps {
  className?: string;
  style?: CSSProperties;
  /** `Empty.PRESENTED_IMAGE_SIMPLE`, `Empty.PRESENTED_IMAGE_DEFAULT`, a URL or any node. */
  image?: ReactNode;
  imageStyle?: CSSProperties;
  description?: ReactNode | false;
  children?: ReactNode;
}

function EmptyRoot({
  image = PRESENTED_IMAGE_DEFAULT,
  imageStyle,
  description,
  className,
  style,
  children,
}: EmptyProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Empty", "empty");
  const locale = useLocale("Empty");
  const simple = image === PRESENTED_IMAGE_SIMPLE;
  const text = description ?? locale.description;
  const imageNode =
    typeof image === "string" ? (
      <img src={image} alt={typeof text === "string" ? text : "empty"} className="h-full" />
    ) : (
      image
    );

  return (
    <div
      className={cn(
        prefixCls,
        simple && `${prefixCls}-normal`,
        empty({ simple }),
        className
      )}
      style={{ ...tokenStyle, ...style }}
    >
      <div
        className={cn(`${prefixCls}-image`, emptyImage({ simple }))}
        style={imageStyle}
      >
        {imageNode}
      </div>
      {text !== false && (
        <div className={`${prefixCls}-description`}>{text}</div>
      )}
      {children !== undefined && (
        <div className={cn(`${prefixCls}-footer`, emptyFooter())}>{children}</div>
      )}
    </div>
  );
}
EmptyRoot.displayName = "Empty";

export const Empty = Object.assign(EmptyRoot, {
  PRESENTED_IMAGE_DEFAULT,
  PRESENTED_IMAGE_SIMPLE,
});
