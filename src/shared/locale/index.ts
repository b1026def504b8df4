// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/locale`
 * Purpose: Locale shape for component strings and the bundled English locale.
 * Scope: Data only; ConfigProvider merges partial locales over `enUS`.
 * Side-effects: none
 * Links: en-US.json
 * @public
 */

import enUSData from "./en-US.json";

export interface Locale {
  locale: string;
  global: { placeholder: string; close: string };
  Pagination: {
    items_per_page: string;
    jump_to: string;
    page: string;
    prev_page: string;
    next_page: string;
    prev_5: string;
    next_5: string;
    prev_3: string;
    next_3: string;
  };
  Modal: { okText: string; cancelText: string; justOkText: string };
  Popconfirm: { okText: string; cancelText: string };
  Tour: { Next: string; Previous: string; Finish: string };
  Upload: {
    uploading: string;
    removeFile: string;
    uploadError: string;
    previewFile: string;
    downloadFile: string;
    upload: string;
    dragger: string;
  };
  Empty: { description: string };
  Text: { copy: string; copied: string; expand: string; collapse: string };
  Input: { showPassword: string; hidePassword: string; clear: string };
  TimePicker: { placeholder: string; now: string; ok: string; clear: string };
  Calendar: {
    today: string;
    month: string;
    year: string;
    shortWeekDays: string[];
    shortMonths: string[];
    /** 0 = Sunday */
    weekStart: number;
  };
  Layout: { expand: string; collapse: string };
  Tabs: { add: string; remove: string };
  Breadcrumb: { label: string };
  InputNumber: { increase: string; decrease: string };
  Dropdown: { more: string };
  FloatButton: { backTop: string };
  Select: {
    placeholder: string;
    notFound: string;
    clear: string;
    remove: string;
    loading: string;
  };
  DatePicker: {
    placeholder: string;
    weekPlaceholder: string;
    monthPlaceholder: string;
    quarterPlaceholder: string;
    yearPlaceholder: string;
    rangeStart: string;
    rangeEnd: string;
    today: string;
    clear: string;
    previousMonth: string;
    nextMonth: string;
    previousYear: string;
    nextYear: string;
    previousDecade: string;
    nextDecade: string;
    /** Header of the week-number column. */
    week: string;
  };
  QRCode: { expired: string; refresh: string; scanned: string };
}

export type LocaleSection = Exclude<keyof Locale, "locale">;

export type PartialLocale = { locale?: string } & {
  [K in LocaleSection]?: Partial<Locale[K]>;
};

export const enUS: Locale = enUSData;

export function mergeLocale(base: Locale, override?: PartialLocale): Locale {
  if (!override) return base;
  return {
    locale: override.locale ?? base.locale,
    global: { ...base.global, ...override.global },
    Pagination: { ...base.Pagination, ...override.Pagination },
    Modal: { ...base.Modal, ...override.Modal },
    Popconfirm: { ...base.Popconfirm, ...override.Popconfirm },
    Tour: { ...base.Tour, ...override.Tour },
    Upload: { ...base.Upload, ...override.Upload },
    Empty: { ...base.Empty, ...override.Empty },
    Text: { ...base.Text, ...override.Text },
    Input: { ...base.Input, ...override.Input },
    TimePicker: { ...base.TimePicker, ...override.TimePicker },
    Calendar: { ...base.Calendar, ...override.Calendar },
    Layout: { ...base.Layout, ...override.Layout },
    Tabs: { ...base.Tabs, ...override.Tabs },
    Breadcrumb: { ...base.Breadcrumb, ...override.Breadcrumb },
    InputNumber: { ...base.InputNumber, ...override.InputNumber },
    Dropdown: { ...base.Dropdown, ...override.Dropdown },
    FloatButton: { ...base.FloatButton, ...override.FloatButton },
    Select: { ...base.Select, ...override.Select },
    DatePicker: { ...base.DatePicker, ...override.DatePicker },
    QRCode: { ...base.QRCode, ...override.QRCode },
  };
}
