// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Message`
 * Purpose: Top-centered transient messages: a store, a holder that renders it, a global `message` API and `useMessage`.
 * Scope: MessageStore queues and times notices; MessageHolder portals them into the provider root.
 * Invariants:
 * - Default duration 3 s; `loading` messages stay until closed unless a duration is given.
 * - Hovering a message pauses its timer.
 * - The global API needs one mounted `<MessageHolder />`; `useMessage` returns its own holder that inherits context.
 * Side-effects: time (auto-close), global (`message` singleton store)
 * Links: notice-store.ts
 * @public
 */

"use client";

import {
  CheckCircle2,
  Info,
  Loader2,
  TriangleAlert,
  XCircle,
} from "lucide-react";
import { AnimatePresence, motion } from "motion/react";
import type { CSSProperties, ReactElement, ReactNode } from "react";
import { isValidElement, useMemo, useState, useSyncExternalStore } from "react";
import { createPortal } from "react-dom";

import { cn } from "@/shared/util";
import { messageHolder, messageNotice, noticeIcon } from "@/styles/ui";
import type { NoticeType } from "@/styles/ui";

import { useComponentConfig } from "../theme";
import type {
  NoticeConfigBase,
  NoticeHandle,
  NoticeStoreOptions,
} from "./notice-store";
import { NoticeStore } from "./notice-store";

export interface MessageArgs extends NoticeConfigBase {
  content: ReactNode;
  type?: NoticeType;
  icon?: ReactNode;
  onClick?: () => void;
  className?: string;
  style?: CSSProperties;
}

export interface MessageOptions extends NoticeStoreOptions {
  /** Distance from the top of the viewport, px. */
  top: number;
}

export type MessageContent = ReactNode | MessageArgs;

export type TypeOpen = (
  content: MessageContent,
  duration?: number | (() => void),
  onClose?: () => void
) => NoticeHandle;

function isMessageArgs(content: MessageContent): content is MessageArgs {
  return (
    typeof content === "object" &&
    content !== null &&
    !isValidElement(content) &&
    !Array.isArray(content) &&
    "content" in content
  );
}

export class MessageStore extends NoticeStore<MessageArgs, MessageOptions> {
  constructor(options: Partial<MessageOptions> = {}) {
    super({ duration: 3, top: 8, ...options });
  }

  typeOpen(
    type: NoticeType,
    content: MessageContent,
    duration?: number | (() => void),
    onClose?: () => void
  ): NoticeHandle {
    const args: MessageArgs = isMessageArgs(content) ? content : { content };
    const closeCallback = typeof duration === "function" ? duration : onClose;
    const seconds = typeof duration === "number" ? duration : undefined;
    return this.open({
      ...args,
      type,
      duration: seconds ?? args.duration ?? (type === "loading" ? 0 : undefined),
      onClose: closeCallback ?? args.onClose,
    });
  }
}

export interface MessageApi {
  open: (args: MessageArgs) => NoticeHandle;
  success: TypeOpen;
  error: TypeOpen;
  info: TypeOpen;
  warning: TypeOpen;
  loading: TypeOpen;
  destroy: (key?: string | number) => void;
}

export function createMessageApi(store: MessageStore): MessageApi {
  return {
    open: (args) => store.open(args),
    success: (...rest) => store.typeOpen("success", ...rest),
    error: (...rest) => store.typeOpen("error", ...rest),
    info: (...rest) => store.typeOpen("info", ...rest),
    warning: (...rest) => store.typeOpen("warning", ...rest),
    loading: (...rest) => store.typeOpen("loading", ...rest),
    destroy: (key) => store.destroy(key),
  };
}

const typeIcons = {
  success: CheckCircle2,
  error: XCircle,
  info: Info,
  warning: TriangleAlert,
  loading: Loader2,
} as const;

export const globalMessageStore = new MessageStore();

export const message: MessageApi & {
  config: (options: Partial<MessageOptions>) => void;
} = {
  ...createMessageApi(globalMessageStore),
  config: (options) => globalMessageStore.config(options),
};

export interface MessageHolderProps {
  store?: MessageStore;
}

export function MessageHolder({
  store = globalMessageStore,
}: MessageHolderProps) {
  const { prefixCls, style: tokenStyle, popupContainer } = useComponentConfig(
    "Message",
    "message"
  );
  const notices = useSyncExternalStore(
    store.subscribe,
    store.getSnapshot,
    store.getSnapshot
  );
  const { top } = store.getOptions();

  if (typeof document === "undefined") return null;

  return createPortal(
    <div
      aria-live="polite"
      className={cn(prefixCls, messageHolder())}
      style={{ ...tokenStyle, top }}
    >
      <AnimatePresence initial={false}>
        {notices.map(({ key, config }) => {
          const type = config.type ?? "info";
          const Icon = typeIcons[type];
          return (
            <motion.div
              key={key}
              layout
              initial={{ opacity: 0, y: -16 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0, y: -16 }}
              transition={{ duration: 0.2 }}
              className={cn(`${prefixCls}-notice`, config.className)}
              style={config.style}
              onMouseEnter={() => store.pause(key)}
              onMouseLeave={() => store.resume(key)}
              onClick={config.onClick}
            >
              <div
                role="status"
                className={cn(
                  `${prefixCls}-notice-content`,
                  `${prefixCls}-${type}`,
                  messageNotice()
                )}
              >
                {config.icon ?? (
                  <Icon className={noticeIcon({ type })} aria-hidden />
                )}
                <span>{config.content}</span>
              </div>
            </motion.div>
          );
        })}
      </AnimatePresence>
    </div>,
    popupContainer ?? document.body
  );
}

export function useMessage(
  options?: Partial<MessageOptions>
): [MessageApi, ReactElement] {
  const [store] = useState(() => new MessageStore(options));
  const api = useMemo(() => createMessageApi(store), [store]);
  return [api, <MessageHolder key="message-holder" store={store} />];
}
