// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@styles/ui`
 * Purpose: Barrel exports for the styling factories, split by component category.
 * Scope: Re-exports CVA factories and their variant types. Does not contain factory definitions.
 * Invariants: Explicit exports only (no export *).
 * Side-effects: none
 * @public
 */

export type { VariantProps } from "class-variance-authority";

// General: Button, Wave, FloatButton, Typography
export type { ButtonVariant, TypographyType } from "./general";
export {
  button,
  buttonIcon,
  floatButton,
  floatButtonDescription,
  floatButtonGroup,
  typography,
  typographyAction,
  typographyCode,
  typographyKeyboard,
  typographyLink,
  typographyMark,
  typographyParagraph,
  typographyTitle,
  waveRing,
} from "./general";

// Layout
export {
  col,
  divider,
  dividerText,
  flex,
  layout,
  layoutContent,
  layoutFooter,
  layoutHeader,
  layoutSider,
  layoutSiderTrigger,
  row,
  space,
  spaceCompact,
  spaceItem,
} from "./layout";

// Navigation
export {
  breadcrumb,
  breadcrumbItem,
  breadcrumbLink,
  breadcrumbSeparator,
  menu,
  menuDivider,
  menuGroupTitle,
  menuItem,
  menuPopup,
  menuSubList,
  menuSubTitleArrow,
  pagination,
  paginationItem,
  paginationJumperInput,
  paginationOptions,
  paginationSelect,
  paginationTotal,
  steps,
  stepsDescription,
  stepsDot,
  stepsIcon,
  stepsItem,
  stepsSubTitle,
  stepsTitle,
  stepsVerticalTail,
  tab,
  tabs,
  tabsAdd,
  tabsExtra,
  tabsInkBar,
  tabsList,
  tabsNav,
  tabsPanel,
  tabsRemove,
} from "./navigation";

// Data entry
export type { InputVariant, UploadListType } from "./inputs";
export {
  checkboxBox,
  checkboxGroup,
  checkboxIndeterminate,
  checkboxWrapper,
  datePickerBody,
  datePickerCell,
  datePickerHeader,
  datePickerHeaderButton,
  datePickerPanel,
  datePickerPresets,
  datePickerTable,
  datePickerWeekRow,
  inputAddon,
  inputAffix,
  inputAffixWrapper,
  inputClear,
  inputCount,
  inputElement,
  inputGroup,
  inputNumberHandler,
  inputNumberHandlers,
  otp,
  otpCell,
  radioButton,
  radioDot,
  radioGroup,
  rate,
  rateStar,
  rateStarLayer,
  segmented,
  segmentedGroup,
  segmentedItem,
  selectGroupTitle,
  selectItem,
  selectList,
  selectOption,
  selectPopup,
  selectSelection,
  selectTag,
  selectTagRemove,
  slider,
  sliderDot,
  sliderHandle,
  sliderMark,
  sliderRail,
  sliderTooltip,
  sliderTrack,
  switchHandle,
  switchInner,
  switchRoot,
  textarea,
  timePickerCell,
  timePickerColumn,
  timePickerColumns,
  timePickerFooter,
  timePickerPanel,
  upload,
  uploadDragger,
  uploadItem,
  uploadItemAction,
  uploadItemActions,
  uploadItemName,
  uploadItemProgress,
  uploadList,
  uploadSelect,
} from "./inputs";

// Data display
export type { StatusColor, TagStatus } from "./data";
export {
  avatar,
  avatarFallback,
  avatarGroup,
  avatarImage,
  badge,
  badgeCount,
  badgeCustomCount,
  badgeRibbon,
  badgeRibbonCorner,
  badgeRibbonWrapper,
  badgeStatusDot,
  badgeStatusText,
  calendar,
  calendarCell,
  calendarCellInner,
  calendarHeader,
  calendarSelect,
  calendarTable,
  card,
  cardActions,
  cardBody,
  cardCover,
  cardGrid,
  cardHead,
  cardHeadWrapper,
  cardMeta,
  cardMetaDescription,
  cardMetaTitle,
  checkableTag,
  collapse,
  collapseArrow,
  collapseContent,
  collapseHeader,
  collapseItem,
  empty,
  emptyFooter,
  emptyImage,
  qrcode,
  qrcodeIcon,
  qrcodeMask,
  statistic,
  statisticAffix,
  statisticContent,
  statisticTitle,
  tag,
  tagClose,
  timeline,
  timelineContent,
  timelineHead,
  timelineItem,
  timelineLabel,
  timelineTail,
  watermark,
  watermarkLayer,
} from "./data";

// Feedback
export type { AlertType, NoticeType, NotificationPlacement, ProgressStatus } from "./feedback";
export {
  alert,
  alertAction,
  alertClose,
  alertContent,
  alertDescription,
  alertIcon,
  alertMessage,
  messageHolder,
  messageNotice,
  noticeIcon,
  notificationBtn,
  notificationDescription,
  notificationHolder,
  notificationNotice,
  notificationProgress,
  notificationTitle,
  progressActive,
  progressBar,
  progressCircle,
  progressCircleText,
  progressLine,
  progressStep,
  progressSteps,
  progressSuccessBar,
  progressText,
  progressTrail,
  result,
  resultContent,
  resultExtra,
  resultIcon,
  resultSubtitle,
  resultTitle,
  skeleton,
  skeletonBar,
  skeletonElement,
  skeletonImage,
  skeletonParagraph,
  skeletonTitle,
  spin,
  spinContainer,
  spinDot,
  spinNested,
  spinNestedMask,
} from "./feedback";

// Overlays
export {
  confirmBody,
  confirmIcon,
  drawerBody,
  drawerContent,
  drawerFooter,
  drawerHeader,
  drawerTitle,
  dropdownMenu,
  modalBody,
  modalClose,
  modalContent,
  modalFooter,
  modalHeader,
  modalMask,
  modalTitle,
  popconfirmButtons,
  popconfirmDescription,
  popconfirmInner,
  popconfirmMessage,
  popconfirmTitle,
  popoverArrow,
  popoverContent,
  popoverTitle,
  tooltipArrow,
  tooltipContent,
  tourFooter,
  tourIndicator,
  tourMask,
  tourPanel,
} from "./overlays";
