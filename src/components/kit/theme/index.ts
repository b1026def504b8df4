// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/theme`
 * Purpose: ConfigProvider and the hooks that read it.
 * @public
 */

export type {
  ComponentConfig,
  ConfigContextValue,
  Direction,
  WaveConfig,
} from "./config-context";
export {
  CompactContext,
  ConfigContext,
  getPrefixCls,
  useComponentConfig,
  useComponentSize,
  useConfig,
  useLocale,
  useToken,
} from "./config-context";
export type { ConfigProviderProps } from "./ConfigProvider";
export { ConfigProvider } from "./ConfigProvider";
