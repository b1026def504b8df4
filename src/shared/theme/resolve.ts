// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/theme/resolve`
 * Purpose: Turns a ThemeConfig into the full AliasToken and merges nested configs.
 * Scope: Pure. Validation happens earlier in schema.ts.
 * Invariants:
 * - Seed overrides feed the algorithms; every other override is applied after derivation.
 * - mergeThemeConfig merges tokens and component tokens key-wise; the child's algorithm wins when given.
 * Side-effects: none
 * Links: algorithms.ts, css-vars.ts, components/kit/theme/ConfigProvider.tsx
 * @public
 */

import { omitUndefined, toArray } from "@/shared/util";

import { applyAlgorithms } from "./algorithms";
import { componentNames, defaultSeed } from "./tokens";
import type {
  AliasToken,
  ComponentName,
  ComponentTokenMap,
  MapToken,
  SeedToken,
  ThemeConfig,
} from "./tokens";

const seedKeys = [
  "colorPrimary",
  "colorSuccess",
  "colorWarning",
  "colorError",
  "colorInfo",
  "colorTextBase",
  "colorBgBase",
  "fontFamily",
  "fontFamilyCode",
  "fontSize",
  "borderRadius",
  "controlHeight",
  "lineWidth",
  "sizeUnit",
  "sizeStep",
  "motion",
] as const satisfies readonly (keyof SeedToken)[];

function copySeedKey<K extends keyof SeedToken>(
  target: Partial<SeedToken>,
  source: Partial<SeedToken>,
  key: K
): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

function pickSeed(overrides: Partial<AliasToken>): Partial<SeedToken> {
  const seed: Partial<SeedToken> = {};
  for (const key of seedKeys) copySeedKey(seed, overrides, key);
  return seed;
}

function deriveAlias(map: MapToken): AliasToken {
  return {
    ...map,
    colorLink: map.colorInfo,
    colorLinkHover: map.colorInfoHover,
    colorLinkActive: map.colorInfoActive,
    colorTextDisabled: map.colorTextQuaternary,
    colorTextPlaceholder: map.colorTextQuaternary,
    colorIcon: map.colorTextTertiary,
    colorIconHover: map.colorText,
    colorBgContainerDisabled: map.colorFillTertiary,
    colorSplit: map.colorBorderSecondary,
    controlOutline: map.colorPrimaryBg,
    padding: map.size,
    paddingXS: map.sizeXS,
    paddingSM: map.sizeSM,
    paddingLG: map.sizeLG,
    paddingXL: map.sizeXL,
    margin: map.size,
    marginXS: map.sizeXS,
    marginSM: map.sizeSM,
    marginLG: map.sizeLG,
    marginXL: map.sizeXL,
    boxShadow:
      "0 6px 16px 0 rgba(0, 0, 0, 0.08), 0 3px 6px -4px rgba(0, 0, 0, 0.12), 0 9px 28px 8px rgba(0, 0, 0, 0.05)",
    boxShadowSecondary:
      "0 6px 16px 0 rgba(0, 0, 0, 0.08), 0 3px 6px -4px rgba(0, 0, 0, 0.12), 0 9px 28px 8px rgba(0, 0, 0, 0.05)",
  };
}

export function resolveToken(config: ThemeConfig = {}): AliasToken {
  const overrides = omitUndefined(config.token ?? {});
  const seed: SeedToken = { ...defaultSeed, ...pickSeed(overrides) };
  const map = applyAlgorithms(seed, toArray(config.algorithm));
  return { ...deriveAlias(map), ...overrides };
}

/** Component-level overrides that differ from the global token. */
export function resolveComponentToken(
  config: ThemeConfig,
  component: ComponentName
): Partial<AliasToken> {
  return omitUndefined(config.components?.[component] ?? {});
}

function mergeComponents(
  parent: ComponentTokenMap | undefined,
  child: ComponentTokenMap | undefined
): ComponentTokenMap | undefined {
  if (!parent) return child;
  if (!child) return parent;
  const merged: ComponentTokenMap = { ...parent };
  for (const name of componentNames) {
    const tokens = child[name];
    if (tokens) merged[name] = { ...parent[name], ...tokens };
  }
  return merged;
}

export function mergeThemeConfig(
  parent: ThemeConfig | undefined,
  child: ThemeConfig | undefined
): ThemeConfig {
  if (!parent) return child ?? {};
  if (!child) return parent;
  return {
    token: { ...parent.token, ...child.token },
    algorithm: child.algorithm ?? parent.algorithm,
    components: mergeComponents(parent.components, child.components),
  };
}
