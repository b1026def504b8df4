// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/theme/ConfigProvider`
 * Purpose: Scopes a theme, component size, direction, prefix and locale to a subtree.
 * Scope: Validates and resolves the theme, writes `--ant-*` CSS variables on a `display: contents` wrapper. Does not inject global CSS.
 * Invariants:
 * - Nested providers merge with the parent: tokens key-wise, the child's algorithm when given.
 * - An invalid theme logs `ui.config.invalid_theme` and falls back to the parent theme.
 * - Overlays inside the subtree portal into the wrapper so they see the same variables.
 * Side-effects: IO (console on invalid theme)
 * Links: config-context.ts, src/shared/theme/schema.ts
 * @public
 */

"use client";

import type { ReactNode } from "react";
import { useEffect, useMemo, useState } from "react";

import { isThemeConfigError } from "@/shared/errors";
import { mergeLocale } from "@/shared/locale";
import type { PartialLocale } from "@/shared/locale";
import { EVENT_NAMES } from "@/shared/observability/events";
import { warn } from "@/shared/observability/client";
import {
  mergeThemeConfig,
  parseThemeConfig,
  resolveToken,
  toCssVariables,
} from "@/shared/theme";
import type { ThemeConfig } from "@/shared/theme";
import { cn } from "@/shared/util";
import type { SizeType } from "@/styles/theme";

import { ConfigContext, getPrefixCls, useConfig } from "./config-context";
import type { ConfigContextValue, Direction, WaveConfig } from "./config-context";

export interface ConfigProviderProps {
  children?: ReactNode;
  theme?: ThemeConfig;
  componentSize?: SizeType;
  direction?: Direction;
  prefixCls?: string;
  locale?: PartialLocale;
  wave?: WaveConfig;
  className?: string;
}

type ValidatedTheme =
  | { ok: true; theme: ThemeConfig | undefined }
  | { ok: false; invalid: string[] };

function validateTheme(theme: ThemeConfig | undefined): ValidatedTheme {
  if (theme === undefined) return { ok: true, theme };
  try {
    return { ok: true, theme: parseThemeConfig(theme) };
  } catch (error) {
    if (isThemeConfigError(error)) {
      return { ok: false, invalid: error.meta.invalid };
    }
    throw error;
  }
}

export function ConfigProvider({
  children,
  theme,
  componentSize,
  direction,
  prefixCls,
  locale,
  wave,
  className,
}: ConfigProviderProps) {
  const parent = useConfig();
  const [root, setRoot] = useState<HTMLDivElement | null>(null);

  const validated = useMemo(() => validateTheme(theme), [theme]);

  useEffect(() => {
    if (!validated.ok) {
      warn(EVENT_NAMES.CONFIG_INVALID_THEME, { invalid: validated.invalid });
    }
  }, [validated]);

  const mergedTheme = useMemo(
    () =>
      validated.ok
        ? mergeThemeConfig(parent.theme, validated.theme)
        : parent.theme,
    [parent.theme, validated]
  );
  const token = useMemo(() => resolveToken(mergedTheme), [mergedTheme]);
  const mergedLocale = useMemo(
    () => mergeLocale(parent.locale, locale),
    [parent.locale, locale]
  );

  const resolvedPrefix = prefixCls ?? parent.prefixCls;
  const resolvedDirection = direction ?? parent.direction;

  const value = useMemo<ConfigContextValue>(
    () => ({
      prefixCls: resolvedPrefix,
      theme: mergedTheme,
      token,
      componentSize: componentSize ?? parent.componentSize,
      direction: resolvedDirection,
      locale: mergedLocale,
      wave: { ...parent.wave, ...wave },
      popupContainer: root ?? parent.popupContainer,
    }),
    [
      resolvedPrefix,
      mergedTheme,
      token,
      componentSize,
      parent.componentSize,
      resolvedDirection,
      mergedLocale,
      parent.wave,
      wave,
      root,
      parent.popupContainer,
    ]
  );

  const style = useMemo(
    () => ({ display: "contents", ...toCssVariables(token) }),
    [token]
  );

  return (
    <ConfigContext.Provider value={value}>
      <div
        ref={setRoot}
        dir={resolvedDirection}
        data-ant-root=""
        className={cn(getPrefixCls(resolvedPrefix, "config-provider"), className)}
        style={style}
      >
        {children}
      </div>
    </ConfigContext.Provider>
  );
}

ConfigProvider.displayName = "ConfigProvider";
