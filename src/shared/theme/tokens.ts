// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/theme/tokens`
 * Purpose: Seed, map and alias token shapes plus the default seed values.
 * Scope: Types and constants only.
 * Invariants: Seed colors are opaque `#rrggbb`; size tokens are unitless pixel numbers.
 * Side-effects: none
 * Links: algorithms.ts (seed -> map), resolve.ts (map -> alias)
 * @public
 */

import type { StatusKey } from "@/styles/theme";

export interface SeedToken {
  colorPrimary: string;
  colorSuccess: string;
  colorWarning: string;
  colorError: string;
  colorInfo: string;
  colorTextBase: string;
  colorBgBase: string;
  fontFamily: string;
  fontFamilyCode: string;
  fontSize: number;
  borderRadius: number;
  controlHeight: number;
  lineWidth: number;
  sizeUnit: number;
  sizeStep: number;
  /** `false` zeroes every motion duration. */
  motion: boolean;
}

type Capitalized<K extends string> = K extends `${infer F}${infer R}`
  ? `${Uppercase<F>}${R}`
  : K;

type StatusName = Capitalized<StatusKey>;

type StatusShadeSuffix =
  | ""
  | "Hover"
  | "Active"
  | "Bg"
  | "BgHover"
  | "Border"
  | "BorderHover"
  | "Text";

export type StatusColorTokens = {
  [K in `color${StatusName}${StatusShadeSuffix}`]: string;
};

export interface NeutralColorTokens {
  colorText: string;
  colorTextSecondary: string;
  colorTextTertiary: string;
  colorTextQuaternary: string;
  colorTextLightSolid: string;
  colorBgContainer: string;
  colorBgElevated: string;
  colorBgLayout: string;
  colorBgSpotlight: string;
  colorBgMask: string;
  colorBorder: string;
  colorBorderSecondary: string;
  colorFill: string;
  colorFillSecondary: string;
  colorFillTertiary: string;
  colorFillQuaternary: string;
}

export interface SizeTokens {
  fontSizeSM: number;
  fontSizeLG: number;
  fontSizeXL: number;
  fontSizeHeading1: number;
  fontSizeHeading2: number;
  fontSizeHeading3: number;
  fontSizeHeading4: number;
  fontSizeHeading5: number;
  lineHeight: number;
  lineHeightLG: number;
  lineHeightSM: number;
  borderRadiusXS: number;
  borderRadiusSM: number;
  borderRadiusLG: number;
  controlHeightXS: number;
  controlHeightSM: number;
  controlHeightLG: number;
  size: number;
  sizeXXS: number;
  sizeXS: number;
  sizeSM: number;
  sizeMD: number;
  sizeLG: number;
  sizeXL: number;
  sizeXXL: number;
  motionDurationFast: string;
  motionDurationMid: string;
  motionDurationSlow: string;
}

export type MapToken = SeedToken &
  StatusColorTokens &
  NeutralColorTokens &
  SizeTokens;

export interface AliasToken extends MapToken {
  colorLink: string;
  colorLinkHover: string;
  colorLinkActive: string;
  colorTextDisabled: string;
  colorTextPlaceholder: string;
  colorIcon: string;
  colorIconHover: string;
  colorBgContainerDisabled: string;
  colorSplit: string;
  controlOutline: string;
  padding: number;
  paddingXS: number;
  paddingSM: number;
  paddingLG: number;
  paddingXL: number;
  margin: number;
  marginXS: number;
  marginSM: number;
  marginLG: number;
  marginXL: number;
  boxShadow: string;
  boxShadowSecondary: string;
}

/**
 * Algorithms receive the seed and, when composed, the previous algorithm's output.
 */
export type ThemeAlgorithm = (seed: SeedToken, mapToken?: MapToken) => MapToken;

export const componentNames = [
  "Alert",
  "AutoComplete",
  "Avatar",
  "Badge",
  "Breadcrumb",
  "Button",
  "Calendar",
  "Card",
  "Checkbox",
  "Collapse",
  "DatePicker",
  "Divider",
  "Drawer",
  "Dropdown",
  "Empty",
  "Flex",
  "FloatButton",
  "Grid",
  "Input",
  "InputNumber",
  "Layout",
  "Menu",
  "Message",
  "Modal",
  "Notification",
  "Pagination",
  "Popconfirm",
  "Popover",
  "Progress",
  "QRCode",
  "Radio",
  "Rate",
  "Result",
  "Segmented",
  "Select",
  "Skeleton",
  "Slider",
  "Space",
  "Spin",
  "Statistic",
  "Steps",
  "Switch",
  "Tabs",
  "Tag",
  "TimePicker",
  "Timeline",
  "Tooltip",
  "Tour",
  "Typography",
  "Upload",
  "Watermark",
] as const;

export type ComponentName = (typeof componentNames)[number];

export type ComponentTokenMap = Partial<
  Record<ComponentName, Partial<AliasToken>>
>;

export interface ThemeConfig {
  token?: Partial<AliasToken>;
  algorithm?: ThemeAlgorithm | ThemeAlgorithm[];
  components?: ComponentTokenMap;
}

export const defaultSeed: Readonly<SeedToken> = {
  colorPrimary: "#1890ff",
  colorSuccess: "#52c41a",
  colorWarning: "#faad14",
  colorError: "#ff4d4f",
  colorInfo: "#1890ff",
  colorTextBase: "#000000",
  colorBgBase: "#ffffff",
  fontFamily:
    "-apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, 'Noto Sans', sans-serif",
  fontFamilyCode:
    "'SFMono-Regular', Consolas, 'Liberation Mono', Menlo, Courier, monospace",
  fontSize: 14,
  borderRadius: 6,
  controlHeight: 32,
  lineWidth: 1,
  sizeUnit: 4,
  sizeStep: 4,
  motion: true,
};
