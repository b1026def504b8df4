// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/QRCode`
 * Purpose: QR-code-style module grid for a text, drawn on a canvas or as SVG, with an optional centre icon and status overlay.
 * Scope: The grid comes from qrcode-utils; it is decorative, not a scannable encoding.
 * Invariants:
 * - The grid is drawn inside `size` minus the border padding.
 * - Non-active statuses keep the grid and cover it with a mask; `statusRender` replaces the mask content.
 * Side-effects: DOM (canvas drawing)
 * Links: src/components/kit/data-display/qrcode-utils.ts
 * @public
 */

"use client";

import { CheckCircle2, RotateCcw } from "lucide-react";
import type { CSSProperties, ReactNode } from "react";
import { useEffect, useMemo, useRef } from "react";

import { cn } from "@/shared/util";
import { qrcode, qrcodeIcon, qrcodeMask } from "@/styles/ui";

import { Spin } from "../feedback/Spin";
import { Button } from "../general/Button";
import { useComponentConfig, useLocale } from "../theme";
import { getQrMatrix, getQrPath, QR_GRID_SIZE, toQrText } from "./qrcode-utils";

export type QRCodeStatus = "active" | "expired" | "loading" | "scanned";
export type QRCodeType = "canvas" | "svg";

export interface QRStatusRenderInfo {
  status: Exclude<QRCodeStatus, "active">;
  locale: { expired: string; refresh: string; scanned: string };
  onRefresh?: (() => void) | undefined;
}

export interface QRCodeProps {
  value: string | readonly string[];
  type?: QRCodeType;
  icon?: string;
  size?: number;
  iconSize?: number | { width: number; height: number };
  color?: string;
  bgColor?: string;
  bordered?: boolean;
  status?: QRCodeStatus;
  onRefresh?: () => void;
  statusRender?: (info: QRStatusRenderInfo) => ReactNode;
  className?: string;
  style?: CSSProperties;
}

const BORDER_PADDING = 12;

function QRCanvas({
  matrix,
  size,
  color,
  bgColor,
  label,
}: {
  matrix: boolean[][];
  size: number;
  color: string;
  bgColor: string;
  label: string;
}) {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const context = canvasRef.current?.getContext("2d");
    if (!context) return;
    const cell = size / QR_GRID_SIZE;
    context.clearRect(0, 0, size, size);
    context.fillStyle = bgColor;
    context.fillRect(0, 0, size, size);
    context.fillStyle = color;
    matrix.forEach((cells, row) => {
      cells.forEach((dark, col) => {
        if (dark) context.fillRect(col * cell, row * cell, cell, cell);
      });
    });
  }, [matrix, size, color, bgColor]);

  return (
    <canvas ref={canvasRef} role="img" aria-label={label} width={size} height={size} />
  );
}

export function QRCode({
  value,
  type = "canvas",
  icon,
  size = 160,
  iconSize = 40,
  color = "#000000",
  bgColor = "transparent",
  bordered = true,
  status = "active",
  onRefresh,
  statusRender,
  className,
  style,
}: QRCodeProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("QRCode", "qrcode");
  const locale = useLocale("QRCode");
  const text = toQrText(value);
  const withIcon = icon !== undefined;
  const matrix = useMemo(() => getQrMatrix(text, { withIcon }), [text, withIcon]);
  const inner = Math.max(0, size - (bordered ? BORDER_PADDING * 2 : 0));
  const iconBox =
    typeof iconSize === "number" ? { width: iconSize, height: iconSize } : iconSize;

  const defaultStatus = (current: Exclude<QRCodeStatus, "active">): ReactNode => {
    switch (current) {
      case "loading":
        return <Spin />;
      case "expired":
        return (
          <>
            <p className="m-0 text-fg-secondary">{locale.expired}</p>
            {onRefresh ? (
              <Button
                type="link"
                icon={<RotateCcw className="size-3.5" aria-hidden />}
                onClick={onRefresh}
              >
                {locale.refresh}
              </Button>
            ) : null}
          </>
        );
      case "scanned":
        return (
          <p className="m-0 inline-flex items-center gap-1.5 text-success">
            <CheckCircle2 className="size-4" aria-hidden />
            {locale.scanned}
          </p>
        );
    }
  };

  return (
    <div
      className={cn(prefixCls, qrcode({ bordered }), className)}
      style={{
        ...tokenStyle,
        width: size,
        height: size,
        backgroundColor: bgColor,
        ...style,
      }}
    >
      {type === "svg" ? (
        <svg
          role="img"
          aria-label={text}
          width={inner}
          height={inner}
          viewBox={`0 0 ${QR_GRID_SIZE} ${QR_GRID_SIZE}`}
          shapeRendering="crispEdges"
        >
          <rect width={QR_GRID_SIZE} height={QR_GRID_SIZE} fill={bgColor} />
          <path d={getQrPath(matrix)} fill={color} />
        </svg>
      ) : (
        <QRCanvas matrix={matrix} size={inner} color={color} bgColor={bgColor} label={text} />
      )}
      {withIcon ? (
        <img
          src={icon}
          alt=""
          className={qrcodeIcon()}
          style={{ width: iconBox.width, height: iconBox.height }}
        />
      ) : null}
      {status !== "active" ? (
        <div className={cn(`${prefixCls}-mask`, qrcodeMask())}>
          {statusRender
            ? statusRender({ status, locale, onRefresh })
            : defaultStatus(status)}
        </div>
      ) : null}
    </div>
  );
}

QRCode.displayName = "QRCode";
