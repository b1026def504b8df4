// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Watermark`
 * Purpose: Repeats rotated text or an image over its children.
 * Scope: The tile is an SVG data URL from watermark-utils, used as the background of an overlay layer.
 * Invariants: The layer never takes pointer events; without content or image no layer is rendered.
 * Side-effects: none
 * Links: src/components/kit/data-display/watermark-utils.ts
 * @public
 */

"use client";

import type { CSSProperties, ReactNode } from "react";

import { cn } from "@/shared/util";
import { watermark, watermarkLayer } from "@/styles/ui";

import { useComponentConfig } from "../theme";
import type { WatermarkFont } from "./watermark-utils";
import { buildWatermarkTile } from "./watermark-utils";

export interface WatermarkProps {
  content?: string | readonly string[];
  image?: string;
  width?: number;
  height?: number;
  rotate?: number;
  zIndex?: number;
  /** Space between tiles, [x, y]. */
  gap?: [number, number];
  /** Tile origin, [x, y]; defaults to half the gap. */
  offset?: [number, number];
  font?: WatermarkFont;
  className?: string;
  rootClassName?: string;
  style?: CSSProperties;
  children?: ReactNode;
}

export function Watermark({
  content,
  image,
  width = 120,
  height = 64,
  rotate = -22,
  zIndex = 9,
  gap = [100, 100],
  offset,
  font,
  className,
  rootClassName,
  style,
  children,
}: WatermarkProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Watermark", "watermark");
  const [gapX, gapY] = gap;
  const tile = buildWatermarkTile({
    content,
    image,
    width,
    height,
    rotate,
    gap: [gapX, gapY],
    font,
  });

  const [offsetX, offsetY] = offset ?? [gapX / 2, gapY / 2];

  return (
    <div
      className={cn(`${prefixCls}-wrapper`, watermark(), rootClassName, className)}
      style={{ ...tokenStyle, ...style }}
    >
      {children}
      {tile ? (
        <div
          aria-hidden
          className={cn(prefixCls, watermarkLayer())}
          style={{
            zIndex,
            backgroundImage: `url("${tile.url}")`,
            backgroundSize: `${tile.width}px ${tile.height}px`,
            backgroundPosition: `${offsetX - gapX / 2}px ${offsetY - gapY / 2}px`,
          }}
        />
      ) : null}
    </div>
  );
}

Watermark.displayName = "Watermark";
