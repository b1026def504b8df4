// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Notification`
 * Purpose: Corner notification cards with title, description, action button and optional countdown bar.
 * Scope: NotificationStore (keyed, timed queue), NotificationHolder (one stack per placement), global `notification` API and `useNotification`.
 * Invariants:
 * - Default duration 4.5 s and placement topRight; per-notice values win over store options.
 * - With pauseOnHover (default) the countdown and its progress bar freeze while hovered.
 * Side-effects: time (auto-close), global (`notification` singleton store)
 * Links: notice-store.ts, Message.tsx
 * @public
 */

"use client";

import {
  CheckCircle2,
  Info,
  TriangleAlert,
  X,
  XCircle,
} from "lucide-react";
import { AnimatePresence, motion } from "motion/react";
import type { CSSProperties, ReactElement, ReactNode } from "react";
import { useMemo, useState, useSyncExternalStore } from "react";
import { createPortal } from "react-dom";

import { cn } from "@/shared/util";
import {
  noticeIcon,
  notificationBtn,
  notificationDescription,
  notificationHolder,
  notificationNotice,
  notificationProgress,
  notificationTitle,
} from "@/styles/ui";
import type { NotificationPlacement } from "@/styles/ui";

import { useComponentConfig, useLocale } from "../theme";
import type {
  Notice,
  NoticeConfigBase,
  NoticeHandle,
  NoticeStoreOptions,
} from "./notice-store";
import { NoticeStore } from "./notice-store";

export type NotificationType = "success" | "info" | "warning" | "error";

export interface NotificationArgs extends NoticeConfigBase {
  title?: ReactNode;
  description?: ReactNode;
  btn?: ReactNode;
  icon?: ReactNode;
  type?: NotificationType;
  placement?: NotificationPlacement;
  showProgress?: boolean;
  pauseOnHover?: boolean;
  /** `null` hides the close button. */
  closeIcon?: ReactNode;
  onClick?: () => void;
  className?: string;
  style?: CSSProperties;
  role?: "alert" | "status";
}

export interface NotificationOptions extends NoticeStoreOptions {
  placement: NotificationPlacement;
  /** px from the top edge for top placements. */
  top: number;
  /** px from the bottom edge for bottom placements. */
  bottom: number;
  showProgress: boolean;
  pauseOnHover: boolean;
}

export type NotificationTypeOpen = (args: NotificationArgs) => NoticeHandle;

export class NotificationStore extends NoticeStore<
  NotificationArgs,
  NotificationOptions
> {
  constructor(options: Partial<NotificationOptions> = {}) {
    super({
      duration: 4.5,
      placement: "topRight",
      top: 24,
      bottom: 24,
      showProgress: false,
      pauseOnHover: true,
      ...options,
    });
  }
}

export interface NotificationApi {
  open: NotificationTypeOpen;
  success: NotificationTypeOpen;
  error: NotificationTypeOpen;
  info: NotificationTypeOpen;
  warning: NotificationTypeOpen;
  destroy: (key?: string | number) => void;
}

export function createNotificationApi(
  store: NotificationStore
): NotificationApi {
  return {
    open: (args) => store.open(args),
    success: (args) => store.open({ ...args, type: "success" }),
    error: (args) => store.open({ ...args, type: "error" }),
    info: (args) => store.open({ ...args, type: "info" }),
    warning: (args) => store.open({ ...args, type: "warning" }),
    destroy: (key) => store.destroy(key),
  };
}

/** Groups notices by their resolved placement, keeping arrival order. */
export function groupByPlacement(
  notices: readonly Notice<NotificationArgs>[],
  fallback: NotificationPlacement
): Map<NotificationPlacement, Notice<NotificationArgs>[]> {
  const groups = new Map<NotificationPlacement, Notice<NotificationArgs>[]>();
  for (const notice of notices) {
    const placement = notice.config.placement ?? fallback;
    const group = groups.get(placement) ?? [];
    group.push(notice);
    groups.set(placement, group);
  }
  return groups;
}

const typeIcons = {
  success: CheckCircle2,
  error: XCircle,
  info: Info,
  warning: TriangleAlert,
} as const;

export const globalNotificationStore = new NotificationStore();

export const notification: NotificationApi & {
  config: (options: Partial<NotificationOptions>) => void;
} = {
  ...createNotificationApi(globalNotificationStore),
  config: (options) => globalNotificationStore.config(options),
};

interface NoticeCardProps {
  notice: Notice<NotificationArgs>;
  store: NotificationStore;
  prefixCls: string;
  closeLabel: string;
  fromBottom: boolean;
}

function NoticeCard({
  notice,
  store,
  prefixCls,
  closeLabel,
  fromBottom,
}: NoticeCardProps) {
  const { key, config, duration, paused } = notice;
  const options = store.getOptions();
  const pauseOnHover = config.pauseOnHover ?? options.pauseOnHover;
  const showProgress =
    (config.showProgress ?? options.showProgress) && duration > 0;
  const Icon = config.type ? typeIcons[config.type] : undefined;
  const icon =
    config.icon ??
    (Icon && config.type ? (
      <Icon
        className={cn(noticeIcon({ type: config.type }), "size-6")}
        aria-hidden
      />
    ) : null);

  return (
    <motion.div
      layout
      initial={{ opacity: 0, x: 64 }}
      animate={{ opacity: 1, x: 0 }}
      exit={{ opacity: 0, y: fromBottom ? 16 : -16 }}
      transition={{ duration: 0.2 }}
      role={config.role ?? "alert"}
      className={cn(
        `${prefixCls}-notice`,
        config.type && `${prefixCls}-notice-${config.type}`,
        notificationNotice(),
        config.className
      )}
      style={config.style}
      onMouseEnter={pauseOnHover ? () => store.pause(key) : undefined}
      onMouseLeave={pauseOnHover ? () => store.resume(key) : undefined}
      onClick={config.onClick}
    >
      <div className="flex gap-3">
        {icon !== null && (
          <span className={cn(`${prefixCls}-notice-icon`, "flex-none")}>
            {icon}
          </span>
        )}
        <div className="min-w-0 flex-1">
          <div className={cn(`${prefixCls}-notice-message`, notificationTitle())}>
            {config.title}
          </div>
          {config.description !== undefined && (
            <div
              className={cn(
                `${prefixCls}-notice-description`,
                notificationDescription()
              )}
            >
              {config.description}
            </div>
          )}
          {config.btn !== undefined && (
            <div className={cn(`${prefixCls}-notice-btn`, notificationBtn())}>
              {config.btn}
            </div>
          )}
        </div>
      </div>
      {config.closeIcon !== null && (
        <button
          type="button"
          aria-label={closeLabel}
          className="absolute end-5 top-5 inline-flex size-[22px] cursor-pointer items-center justify-center rounded border-none bg-transparent text-fg-tertiary transition-colors hover:bg-fill-secondary hover:text-fg"
          onClick={(event) => {
            event.stopPropagation();
            store.close(key);
          }}
        >
          {config.closeIcon ?? <X className="size-4" aria-hidden />}
        </button>
      )}
      {showProgress && (
        <div
          aria-hidden
          className={cn(`${prefixCls}-notice-progress`, notificationProgress())}
          style={{
            animationDuration: `${duration}s`,
            animationPlayState: paused ? "paused" : "running",
          }}
        />
      )}
    </motion.div>
  );
}

export interface NotificationHolderProps {
  store?: NotificationStore;
}

export function NotificationHolder({
  store = globalNotificationStore,
}: NotificationHolderProps) {
  const { prefixCls, style: tokenStyle, popupContainer } = useComponentConfig(
    "Notification",
    "notification"
  );
  const { close: closeLabel } = useLocale("global");
  const notices = useSyncExternalStore(
    store.subscribe,
    store.getSnapshot,
    store.getSnapshot
  );
  const options = store.getOptions();

  if (typeof document === "undefined") return null;

  const groups = groupByPlacement(notices, options.placement);

  return createPortal(
    <>
      {[...groups].map(([placement, group]) => {
        const fromBottom = placement.startsWith("bottom");
        return (
          <div
            key={placement}
            className={cn(
              prefixCls,
              `${prefixCls}-${placement}`,
              notificationHolder({ placement })
            )}
            style={{
              ...tokenStyle,
              ...(fromBottom ? { bottom: options.bottom } : { top: options.top }),
            }}
          >
            <AnimatePresence initial={false}>
              {group.map((notice) => (
                <NoticeCard
                  key={notice.key}
                  notice={notice}
                  store={store}
                  prefixCls={prefixCls}
                  closeLabel={closeLabel}
                  fromBottom={fromBottom}
                />
              ))}
            </AnimatePresence>
          </div>
        );
      })}
    </>,
    popupContainer ?? document.body
  );
}

export function useNotification(
  options?: Partial<NotificationOptions>
): [NotificationApi, ReactElement] {
  const [store] = useState(() => new NotificationStore(options));
  const api = useMemo(() => createNotificationApi(store), [store]);
  return [api, <NotificationHolder key="notification-holder" store={store} />];
}
