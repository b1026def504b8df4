// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/data-display/Statistic`
 * Purpose: Titled numeric value with grouping, precision, prefix and suffix; Statistic.Countdown ticks toward a deadline.
 * Scope: Formatting lives in statistic-utils; the countdown clock in useCountdown.
 * Invariants: Countdown `onFinish` fires once per deadline.
 * Side-effects: time (Countdown interval)
 * Links: src/components/kit/data-display/statistic-utils.ts, src/shared/hooks/useCountdown.ts
 * @public
 */

"use client";

import type { CSSProperties, ReactNode } from "react";

import { useCountdown } from "@/shared/hooks";
import { cn } from "@/shared/util";
import {
  statistic,
  statisticAffix,
  statisticContent,
  statisticTitle,
} from "@/styles/ui";

import { Skeleton } from "../feedback/Skeleton";
import { useComponentConfig } from "../theme";
import type { StatisticFormatOptions } from "./statistic-utils";
import { formatCountdown, formatStatisticValue } from "./statistic-utils";

export interface StatisticProps extends StatisticFormatOptions {
  className?: string;
  style?: CSSProperties;
  title?: ReactNode;
  value?: number | string;
  prefix?: ReactNode;
  suffix?: ReactNode;
  formatter?: (value: number | string) => ReactNode;
  loading?: boolean;
  valueStyle?: CSSProperties;
}

function StatisticRoot({
  title,
  value = 0,
  prefix,
  suffix,
  formatter,
  loading = false,
  valueStyle,
  precision,
  groupSeparator,
  decimalSeparator,
  className,
  style,
}: StatisticProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig(
    "Statistic",
    "statistic"
  );

  let valueNode: ReactNode;
  if (formatter) {
    valueNode = formatter(value);
  } else {
    const { int, decimal } = formatStatisticValue(value, {
      precision,
      groupSeparator,
      decimalSeparator,
    });
    valueNode = (
      <>
        <span className={`${prefixCls}-content-value-int`}>{int}</span>
        {decimal && (
          <span className={`${prefixCls}-content-value-decimal`}>{decimal}</span>
        )}
      </>
    );
  }

  return (
    <div
      className={cn(prefixCls, statistic(), className)}
      style={{ ...tokenStyle, ...style }}
    >
      {title !== undefined && (
        <div className={cn(`${prefixCls}-title`, statisticTitle())}>{title}</div>
      )}
      {loading ? (
        <Skeleton active paragraph={false} />
      ) : (
        <div
          className={cn(`${prefixCls}-content`, statisticContent())}
          style={valueStyle}
        >
          {prefix !== undefined && (
            <span
              className={cn(
                `${prefixCls}-content-prefix`,
                statisticAffix({ side: "prefix" })
              )}
            >
              {prefix}
            </span>
          )}
          <span className={`${prefixCls}-content-value`}>{valueNode}</span>
          {suffix !== undefined && (
            <span
              className={cn(
                `${prefixCls}-content-suffix`,
                statisticAffix({ side: "suffix" })
              )}
            >
              {suffix}
            </span>
          )}
        </div>
      )}
    </div>
  );
}
StatisticRoot.displayName = "Statistic";

export interface CountdownProps
  extends Omit<StatisticProps, "value" | "formatter" | keyof StatisticFormatOptions> {
  /** Deadline as epoch milliseconds. */
  value: number;
  /** `Y M D H m s S` tokens; `[text]` is kept verbatim. */
  format?: string;
  onFinish?: () => void;
  onChange?: (remaining: number) => void;
}

function Countdown({
  value,
  format = "HH:mm:ss",
  onFinish,
  onChange,
  ...props
}: CountdownProps) {
  const remaining = useCountdown(value, { onChange, onFinish });
  return (
    <StatisticRoot
      {...props}
      value={remaining}
      formatter={(left) => formatCountdown(Number(left), format)}
    />
  );
}
Countdown.displayName = "Statistic.Countdown";

export const Statistic = Object.assign(StatisticRoot, { Countdown });
