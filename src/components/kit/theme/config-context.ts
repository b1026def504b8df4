// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/theme/config-context`
 * Purpose: React context carrying the resolved theme, prefix, size, direction and locale, plus the hooks components read it with.
 * Scope: Context and hooks only; ConfigProvider.tsx writes it.
 * Invariants: The default value is the resolved default theme with English strings, so components work without a provider.
 * Side-effects: none
 * Links: ConfigProvider.tsx, src/shared/theme
 * @public
 */

"use client";

import type { CSSProperties } from "react";
import { createContext, useContext, useMemo } from "react";

import { enUS } from "@/shared/locale";
import type { Locale, LocaleSection } from "@/shared/locale";
import {
  DEFAULT_PREFIX_CLS,
  resolveComponentToken,
  resolveToken,
  toCssVariables,
} from "@/shared/theme";
import type { AliasToken, ComponentName, ThemeConfig } from "@/shared/theme";
import type { SizeType } from "@/styles/theme";

export type Direction = "ltr" | "rtl";

export interface WaveConfig {
  disabled?: boolean;
}

export interface ConfigContextValue {
  prefixCls: string;
  theme: ThemeConfig;
  token: AliasToken;
  componentSize: SizeType | undefined;
  direction: Direction;
  locale: Locale;
  wave: WaveConfig;
  /** Element overlays portal into so they inherit the provider's CSS variables. */
  popupContainer: HTMLElement | null;
}

export const defaultConfig: ConfigContextValue = {
  prefixCls: DEFAULT_PREFIX_CLS,
  theme: {},
  token: resolveToken(),
  componentSize: undefined,
  direction: "ltr",
  locale: enUS,
  wave: {},
  popupContainer: null,
};

export const ConfigContext = createContext<ConfigContextValue>(defaultConfig);

/** Set by Space.Compact so joined controls share one size. */
export const CompactContext = createContext<{ size?: SizeType | undefined } | null>(
  null
);

export function useConfig(): ConfigContextValue {
  return useContext(ConfigContext);
}

export function useToken(): { token: AliasToken; theme: ThemeConfig } {
  const { token, theme } = useConfig();
  return { token, theme };
}

/** Explicit size first, then Space.Compact, then the provider's componentSize, then `middle`. */
export function useComponentSize(size?: SizeType): SizeType {
  const { componentSize } = useConfig();
  const compact = useContext(CompactContext);
  return size ?? compact?.size ?? componentSize ?? "middle";
}

export function useLocale<K extends LocaleSection>(section: K): Locale[K] {
  return useConfig().locale[section];
}

export function getPrefixCls(prefixCls: string, suffix?: string): string {
  return suffix ? `${prefixCls}-${suffix}` : prefixCls;
}

export interface ComponentConfig {
  /** Semantic root class, e.g. `ant-btn`. */
  prefixCls: string;
  direction: Direction;
  /** Component token overrides as CSS variables, scoped to the component root. */
  style: CSSProperties;
  token: AliasToken;
  popupContainer: HTMLElement | null;
}

export function useComponentConfig(
  component: ComponentName,
  suffix: string
): ComponentConfig {
  const config = useConfig();
  const { theme, token, direction, popupContainer } = config;

  const overrides = useMemo(
    () => resolveComponentToken(theme, component),
    [theme, component]
  );
  const style = useMemo<CSSProperties>(
    () => toCssVariables(overrides),
    [overrides]
  );
  const componentToken = useMemo(
    () => ({ ...token, ...overrides }),
    [token, overrides]
  );

  return {
    prefixCls: getPrefixCls(config.prefixCls, suffix),
    direction,
    style,
    token: componentToken,
    popupContainer,
  };
}
