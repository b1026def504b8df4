// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components`
 * Purpose: Public surface for the component catalog via re-exports, grouped by category.
 * Scope: Re-exports components, their prop types and the pure helpers tests and consumers use. Does not export internal wiring.
 * Invariants: Only re-exports from component files; no circular dependencies.
 * Side-effects: none
 * Links: src/index.ts
 * @public
 */

// General
export type { ButtonProps } from "./kit/general/Button";
export { Button } from "./kit/general/Button";
export type { ButtonColor, ButtonType } from "./kit/general/button-utils";
export type {
  BackTopProps,
  FloatButtonGroupProps,
  FloatButtonProps,
} from "./kit/general/FloatButton";
export { FloatButton } from "./kit/general/FloatButton";
export type { WaveProps } from "./kit/general/Wave";
export { Wave } from "./kit/general/Wave";
export type {
  LinkProps,
  ParagraphProps,
  TextProps,
  TitleProps,
  TypographyProps,
} from "./kit/typography/Typography";
export { Typography } from "./kit/typography/Typography";

// Layout
export type { DividerProps } from "./kit/layout/Divider";
export { Divider } from "./kit/layout/Divider";
export type { FlexProps } from "./kit/layout/Flex";
export { Flex } from "./kit/layout/Flex";
export type { ColProps, RowProps } from "./kit/layout/Grid";
export { Col, Row } from "./kit/layout/Grid";
export type { Gutter } from "./kit/layout/grid-utils";
export type { LayoutProps, SiderProps } from "./kit/layout/Layout";
export { Layout } from "./kit/layout/Layout";
export type { SpaceCompactProps, SpaceProps, SpaceSize } from "./kit/layout/Space";
export { Space } from "./kit/layout/Space";

// Navigation
export type { BreadcrumbItem, BreadcrumbProps } from "./kit/navigation/Breadcrumb";
export { Breadcrumb } from "./kit/navigation/Breadcrumb";
export type {
  DropdownButtonProps,
  DropdownMenuProps,
  DropdownProps,
  DropdownTrigger,
} from "./kit/navigation/Dropdown";
export { Dropdown } from "./kit/navigation/Dropdown";
export type { MenuInfo, MenuMode, MenuProps, MenuTheme, SelectInfo } from "./kit/navigation/Menu";
export { Menu } from "./kit/navigation/Menu";
export type { MenuItem } from "./kit/navigation/menu-utils";
export { findKeyPath, flattenMenuKeys } from "./kit/navigation/menu-utils";
export type { PaginationProps } from "./kit/navigation/Pagination";
export { Pagination } from "./kit/navigation/Pagination";
export type { PageItem } from "./kit/navigation/pagination-utils";
export { getPageCount, getPageItems } from "./kit/navigation/pagination-utils";
export type { StepItem, StepStatus, StepsProps } from "./kit/navigation/Steps";
export { getStepStatus, Steps } from "./kit/navigation/Steps";
export type { TabItem, TabPosition, TabsProps } from "./kit/navigation/Tabs";
export { Tabs } from "./kit/navigation/Tabs";

// Data entry
export type { AutoCompleteOption, AutoCompleteProps } from "./kit/inputs/AutoComplete";
export { AutoComplete } from "./kit/inputs/AutoComplete";
export type {
  CheckboxGroupProps,
  CheckboxOption,
  CheckboxProps,
  CheckboxValue,
} from "./kit/inputs/Checkbox";
export { Checkbox } from "./kit/inputs/Checkbox";
export type {
  DatePickerProps,
  DatePreset,
  DateRangeValue,
  RangePickerProps,
} from "./kit/inputs/DatePicker";
export { DatePicker, RangePicker } from "./kit/inputs/DatePicker";
export type { PickerMode } from "./kit/inputs/date-utils";
export { formatDate, getWeekOfYear, parseDate } from "./kit/inputs/date-utils";
export type { InputProps, PasswordProps, SearchProps } from "./kit/inputs/Input";
export { Input } from "./kit/inputs/Input";
export type { InputNumberProps } from "./kit/inputs/InputNumber";
export { InputNumber } from "./kit/inputs/InputNumber";
export { clampValue, getPrecision, stepValue, toFixedPrecision } from "./kit/inputs/number-utils";
export type { OTPProps } from "./kit/inputs/OTP";
export type { RadioGroupProps, RadioOption, RadioProps, RadioValue } from "./kit/inputs/Radio";
export { Radio } from "./kit/inputs/Radio";
export type { RateProps, StarFill } from "./kit/inputs/Rate";
export { getStarFill, Rate } from "./kit/inputs/Rate";
export type { SegmentedOption, SegmentedProps, SegmentedValue } from "./kit/inputs/Segmented";
export { Segmented } from "./kit/inputs/Segmented";
export type {
  MultipleSelectProps,
  SelectMode,
  SelectProps,
  SingleSelectProps,
} from "./kit/inputs/Select";
export { Select } from "./kit/inputs/Select";
export type {
  FilterOption,
  FilterSort,
  SelectItem,
  SelectOption,
  SelectOptionGroup,
  SelectValue,
} from "./kit/inputs/select-utils";
export type { SliderProps, SliderRangeProps, SliderSingleProps } from "./kit/inputs/Slider";
export { Slider } from "./kit/inputs/Slider";
export type { SliderMarks } from "./kit/inputs/slider-utils";
export { percentToValue, snapValue, valueToPercent } from "./kit/inputs/slider-utils";
export type { SwitchProps } from "./kit/inputs/Switch";
export { Switch } from "./kit/inputs/Switch";
export type { TextAreaProps } from "./kit/inputs/TextArea";
export type { DisabledTimes, TimePickerProps } from "./kit/inputs/TimePicker";
export { TimePicker } from "./kit/inputs/TimePicker";
export type { TimeValue } from "./kit/inputs/time-utils";
export { formatTime, getTimeUnits, parseTime } from "./kit/inputs/time-utils";
export type { UploadChangeInfo, UploadProps } from "./kit/inputs/Upload";
export { Upload } from "./kit/inputs/Upload";
export type { UploadRequest, UploadRequestOptions } from "./kit/inputs/upload-request";
export type { UploadFile, UploadFileStatus } from "./kit/inputs/upload-utils";
export {
  applyMaxCount,
  fileToUploadFile,
  removeFileItem,
  updateFileList,
} from "./kit/inputs/upload-utils";

// Data display
export type { AvatarGroupProps, AvatarProps } from "./kit/data-display/Avatar";
export { Avatar } from "./kit/data-display/Avatar";
export type { BadgeProps, RibbonProps } from "./kit/data-display/Badge";
export { Badge, formatBadgeCount } from "./kit/data-display/Badge";
export type { CalendarMode, CalendarProps } from "./kit/data-display/Calendar";
export { Calendar } from "./kit/data-display/Calendar";
export { addMonths, getMonthMatrix, isSameDay } from "./kit/data-display/calendar-utils";
export type { CardProps } from "./kit/data-display/Card";
export { Card } from "./kit/data-display/Card";
export type { CollapseItem, CollapseProps } from "./kit/data-display/Collapse";
export { Collapse } from "./kit/data-display/Collapse";
export type { EmptyProps } from "./kit/data-display/Empty";
export { Empty } from "./kit/data-display/Empty";
export type { Placement } from "./kit/data-display/placement";
export type { PopoverProps } from "./kit/data-display/Popover";
export { Popover } from "./kit/data-display/Popover";
export type { QRCodeProps, QRCodeStatus } from "./kit/data-display/QRCode";
export { QRCode } from "./kit/data-display/QRCode";
export { getQrMatrix, hashString } from "./kit/data-display/qrcode-utils";
export type { CountdownProps, StatisticProps } from "./kit/data-display/Statistic";
export { Statistic } from "./kit/data-display/Statistic";
export { formatCountdown, formatStatisticValue } from "./kit/data-display/statistic-utils";
export type { CheckableTagProps, TagProps } from "./kit/data-display/Tag";
export { Tag } from "./kit/data-display/Tag";
export type { TimelineItem, TimelineMode, TimelineProps } from "./kit/data-display/Timeline";
export { getTimelineItemPosition, Timeline } from "./kit/data-display/Timeline";
export type { TooltipProps } from "./kit/data-display/Tooltip";
export { Tooltip } from "./kit/data-display/Tooltip";
export type { WatermarkProps } from "./kit/data-display/Watermark";
export { Watermark } from "./kit/data-display/Watermark";

// Feedback
export type { AlertProps } from "./kit/feedback/Alert";
export { Alert } from "./kit/feedback/Alert";
export type { ModalFuncProps } from "./kit/feedback/confirm-store";
export type { DrawerPlacement, DrawerProps } from "./kit/feedback/Drawer";
export { Drawer } from "./kit/feedback/Drawer";
export type { MessageApi, MessageArgs } from "./kit/feedback/Message";
export { message, MessageHolder, useMessage } from "./kit/feedback/Message";
export type { ModalApi, ModalProps } from "./kit/feedback/Modal";
export { Modal, ModalHolder } from "./kit/feedback/Modal";
export type { NoticeHandle } from "./kit/feedback/notice-store";
export { NoticeStore } from "./kit/feedback/notice-store";
export type { NotificationApi, NotificationArgs } from "./kit/feedback/Notification";
export {
  notification,
  NotificationHolder,
  useNotification,
} from "./kit/feedback/Notification";
export type { PopconfirmProps } from "./kit/feedback/Popconfirm";
export { Popconfirm } from "./kit/feedback/Popconfirm";
export type { ProgressProps, ProgressType } from "./kit/feedback/Progress";
export { getProgressStatus, Progress } from "./kit/feedback/Progress";
export type { ResultProps, ResultStatus } from "./kit/feedback/Result";
export { Result } from "./kit/feedback/Result";
export type { SkeletonProps } from "./kit/feedback/Skeleton";
export { Skeleton } from "./kit/feedback/Skeleton";
export type { SpinProps } from "./kit/feedback/Spin";
export { Spin } from "./kit/feedback/Spin";

// Other
export type { TourProps, TourStep } from "./kit/overlays/Tour";
export { Tour } from "./kit/overlays/Tour";

// Config
export type { ConfigProviderProps, Direction } from "./kit/theme";
export {
  ConfigProvider,
  useComponentSize,
  useConfig,
  useLocale,
  useToken,
} from "./kit/theme";
