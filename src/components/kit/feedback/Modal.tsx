// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/Modal`
 * Purpose: Modal dialog with OK/Cancel footer, plus imperative confirm/info/success/error/warning dialogs.
 * Scope: Built on Radix Dialog (focus trap, scroll lock, Escape, outside press). Static `Modal.confirm` renders through `<ModalHolder />`; `Modal.useModal` returns a holder that inherits context.
 * Invariants:
 * - Escape, mask press, close icon and Cancel all route to onCancel; the parent owns `open`.
 * - Content stays mounted after close unless destroyOnClose.
 * - A confirm `onOk` returning a promise shows a loading OK button and closes once it resolves; a rejection is logged and keeps the dialog open.
 * Side-effects: global (static confirm store)
 * Links: confirm-store.ts, useRetainedContent.tsx
 * @public
 */

"use client";

import * as RadixDialog from "@radix-ui/react-dialog";
import {
  CheckCircle2,
  CircleAlert,
  Info,
  TriangleAlert,
  X,
  XCircle,
} from "lucide-react";
import type { CSSProperties, MouseEvent, ReactElement, ReactNode } from "react";
import {
  useEffect,
  useMemo,
  useRef,
  useState,
  useSyncExternalStore,
} from "react";

import { error as logError } from "@/shared/observability/client";
import { EVENT_NAMES } from "@/shared/observability/events";
import { cn, isPromiseLike } from "@/shared/util";
import {
  confirmBody,
  confirmIcon,
  modalBody,
  modalClose,
  modalContent,
  modalFooter,
  modalHeader,
  modalMask,
  modalTitle,
} from "@/styles/ui";

import { Button } from "../general/Button";
import type { ButtonProps } from "../general/Button";
import type { ButtonType } from "../general/button-utils";
import { useComponentConfig, useLocale } from "../theme";
import type {
  ConfirmAction,
  ConfirmEntry,
  ConfirmHandle,
  ConfirmType,
  ModalFuncProps,
} from "./confirm-store";
import { ConfirmStore } from "./confirm-store";
import { useRetainedContent } from "./useRetainedContent";

export interface ModalFooterParts {
  OkBtn: () => ReactElement;
  CancelBtn: () => ReactElement;
}

export interface ModalProps {
  open?: boolean;
  title?: ReactNode;
  /** `null` removes the footer; a function receives the default buttons. */
  footer?:
    | ReactNode
    | ((origin: ReactNode, parts: ModalFooterParts) => ReactNode);
  onOk?: (event: MouseEvent<HTMLElement>) => void;
  onCancel?: () => void;
  okText?: ReactNode;
  cancelText?: ReactNode;
  okType?: ButtonType;
  okButtonProps?: ButtonProps;
  cancelButtonProps?: ButtonProps;
  confirmLoading?: boolean;
  closable?: boolean | { closeIcon?: ReactNode };
  closeIcon?: ReactNode;
  mask?: boolean;
  maskClosable?: boolean;
  keyboard?: boolean;
  centered?: boolean;
  width?: number | string;
  zIndex?: number;
  destroyOnClose?: boolean;
  forceRender?: boolean;
  afterClose?: () => void;
  afterOpenChange?: (open: boolean) => void;
  className?: string;
  rootClassName?: string;
  style?: CSSProperties;
  children?: ReactNode;
}

function useOpenTransitions(
  open: boolean,
  afterOpenChange: ((open: boolean) => void) | undefined,
  afterClose: (() => void) | undefined
): void {
  const previous = useRef(open);
  const callbacks = useRef({ afterOpenChange, afterClose });
  callbacks.current = { afterOpenChange, afterClose };

  useEffect(() => {
    if (previous.current === open) return;
    previous.current = open;
    callbacks.current.afterOpenChange?.(open);
    if (!open) callbacks.current.afterClose?.();
  }, [open]);
}

function ModalRoot({
  open = false,
  title,
  footer,
  onOk,
  onCancel,
  okText,
  cancelText,
  okType = "primary",
  okButtonProps,
  cancelButtonProps,
  confirmLoading = false,
  closable = true,
  closeIcon,
  mask = true,
  maskClosable = true,
  keyboard = true,
  centered = false,
  width = 520,
  zIndex,
  destroyOnClose = false,
  forceRender = false,
  afterClose,
  afterOpenChange,
  className,
  rootClassName,
  style,
  children,
}: ModalProps) {
  const { prefixCls, style: tokenStyle, popupContainer } = useComponentConfig(
    "Modal",
    "modal"
  );
  const locale = useLocale("Modal");
  const { close: closeLabel } = useLocale("global");
  const body = useRetainedContent(children, {
    open,
    destroyOnClose,
    forceRender,
  });
  useOpenTransitions(open, afterOpenChange, afterClose);

  const okButton = (
    <Button
      type={okType}
      loading={confirmLoading}
      {...okButtonProps}
      onClick={(event) => onOk?.(event)}
    >
      {okText ?? locale.okText}
    </Button>
  );
  const cancelButton = (
    <Button {...cancelButtonProps} onClick={() => onCancel?.()}>
      {cancelText ?? locale.cancelText}
    </Button>
  );
  const defaultFooter = (
    <>
      {cancelButton}
      {okButton}
    </>
  );
  const footerNode =
    typeof footer === "function"
      ? footer(defaultFooter, {
          OkBtn: () => okButton,
          CancelBtn: () => cancelButton,
        })
      : footer === undefined
        ? defaultFooter
        : footer;

  const resolvedCloseIcon =
    typeof closable === "object"
      ? (closable.closeIcon ?? closeIcon)
      : closeIcon;
  const showClose = closable !== false && resolvedCloseIcon !== null;

  return (
    <>
      {body.keeper}
      <RadixDialog.Root
        open={open}
        onOpenChange={(next) => {
          if (!next) onCancel?.();
        }}
      >
        <RadixDialog.Portal container={popupContainer ?? undefined}>
          <div
            className={cn(`${prefixCls}-root`, rootClassName)}
            style={tokenStyle}
          >
            {mask && (
              <RadixDialog.Overlay
                className={cn(`${prefixCls}-mask`, modalMask())}
                style={zIndex !== undefined ? { zIndex } : undefined}
              />
            )}
            <RadixDialog.Content
              aria-describedby={undefined}
              className={cn(prefixCls, modalContent({ centered }), className)}
              style={{
                width,
                maxWidth: "calc(100vw - 32px)",
                ...(zIndex !== undefined ? { zIndex } : {}),
                ...style,
              }}
              onEscapeKeyDown={(event) => {
                if (!keyboard) event.preventDefault();
              }}
              onPointerDownOutside={(event) => {
                if (!maskClosable) event.preventDefault();
              }}
              onInteractOutside={(event) => {
                if (!maskClosable) event.preventDefault();
              }}
            >
              {showClose && (
                <RadixDialog.Close
                  aria-label={closeLabel}
                  className={cn(`${prefixCls}-close`, modalClose())}
                >
                  {resolvedCloseIcon ?? <X className="size-4" aria-hidden />}
                </RadixDialog.Close>
              )}
              {title !== undefined && title !== null && (
                <div className={cn(`${prefixCls}-header`, modalHeader())}>
                  <RadixDialog.Title
                    className={cn(`${prefixCls}-title`, modalTitle())}
                  >
                    {title}
                  </RadixDialog.Title>
                </div>
              )}
              <div className={cn(`${prefixCls}-body`, modalBody())}>
                {body.slot}
              </div>
              {footerNode !== null && footerNode !== undefined && (
                <div className={cn(`${prefixCls}-footer`, modalFooter())}>
                  {footerNode}
                </div>
              )}
            </RadixDialog.Content>
          </div>
        </RadixDialog.Portal>
      </RadixDialog.Root>
    </>
  );
}

const confirmIcons = {
  confirm: CircleAlert,
  info: Info,
  success: CheckCircle2,
  error: XCircle,
  warning: TriangleAlert,
} as const;


interface ConfirmDialogProps {
  entry: ConfirmEntry;
  store: ConfirmStore;
}

function ConfirmDialog({ entry, store }: ConfirmDialogProps) {
  const { key, type, config, open } = entry;
  const { prefixCls } = useComponentConfig("Modal", "modal");
  const locale = useLocale("Modal");
  const [okLoading, setOkLoading] = useState(false);
  const [cancelLoading, setCancelLoading] = useState(false);
  const okCancel = config.okCancel ?? type === "confirm";
  const close = () => store.close(key);

  const run = (
    action: ConfirmAction | undefined,
    setLoading: (loading: boolean) => void
  ) => {
    if (!action) {
      close();
      return;
    }
    // A handler that takes `close` decides when to close
    const result = action(close);
    if (isPromiseLike(result)) {
      setLoading(true);
      void result.then(
        () => {
          setLoading(false);
          close();
        },
        (reason: unknown) => {
          setLoading(false);
          logError(EVENT_NAMES.MODAL_CONFIRM_REJECTED, {
            message: reason instanceof Error ? reason.message : String(reason),
          });
        }
      );
      return;
    }
    if (action.length === 0) close();
  };

  const Icon = confirmIcons[type];
  const autoFocus =
    config.autoFocusButton === undefined ? "ok" : config.autoFocusButton;

  return (
    <ModalRoot
      open={open}
      title={null}
      footer={null}
      closable={config.closable ?? false}
      maskClosable={config.maskClosable ?? false}
      keyboard={config.keyboard ?? true}
      centered={config.centered ?? false}
      width={config.width ?? 416}
      destroyOnClose
      className={cn(
        `${prefixCls}-confirm`,
        `${prefixCls}-confirm-${type}`,
        config.className
      )}
      style={config.style}
      onCancel={() => run(config.onCancel, setCancelLoading)}
      afterClose={() => {
        store.remove(key);
        config.afterClose?.();
      }}
    >
      <div className={cn(`${prefixCls}-confirm-body`, confirmBody())}>
        <span className={confirmIcon({ type })}>
          {config.icon ?? <Icon className="size-full" aria-hidden />}
        </span>
        <div className="min-w-0 flex-1">
          {config.title !== undefined && (
            <RadixDialog.Title
              className={cn(`${prefixCls}-confirm-title`, modalTitle())}
            >
              {config.title}
            </RadixDialog.Title>
          )}
          {config.content !== undefined && (
            <div className={cn(`${prefixCls}-confirm-content`, "mt-2")}>
              {config.content}
            </div>
          )}
        </div>
      </div>
      <div className={cn(`${prefixCls}-confirm-btns`, modalFooter(), "mt-6")}>
        {okCancel && (
          <Button
            loading={cancelLoading}
            autoFocus={autoFocus === "cancel"}
            onClick={() => run(config.onCancel, setCancelLoading)}
          >
            {config.cancelText ?? locale.cancelText}
          </Button>
        )}
        <Button
          type={config.okType ?? "primary"}
          loading={okLoading}
          autoFocus={autoFocus === "ok"}
          onClick={() => run(config.onOk, setOkLoading)}
        >
          {config.okText ?? (okCancel ? locale.okText : locale.justOkText)}
        </Button>
      </div>
    </ModalRoot>
  );
}

export interface ModalHolderProps {
  store?: ConfirmStore;
}

export const globalConfirmStore = new ConfirmStore();

export function ModalHolder({ store = globalConfirmStore }: ModalHolderProps) {
  const entries = useSyncExternalStore(
    store.subscribe,
    store.getSnapshot,
    store.getSnapshot
  );
  return (
    <>
      {entries.map((entry) => (
        <ConfirmDialog key={entry.key} entry={entry} store={store} />
      ))}
    </>
  );
}

export type ModalFunc = (config: ModalFuncProps) => ConfirmHandle;

export interface ModalApi {
  confirm: ModalFunc;
  info: ModalFunc;
  success: ModalFunc;
  error: ModalFunc;
  warning: ModalFunc;
}

export function createModalApi(store: ConfirmStore): ModalApi {
  const open =
    (type: ConfirmType): ModalFunc =>
    (config) =>
      store.add(type, config);
  return {
    confirm: open("confirm"),
    info: open("info"),
    success: open("success"),
    error: open("error"),
    warning: open("warning"),
  };
}

function useModal(): [ModalApi, ReactElement] {
  const [store] = useState(() => new ConfirmStore());
  const api = useMemo(() => createModalApi(store), [store]);
  return [api, <ModalHolder key="modal-holder" store={store} />];
}

export const Modal = Object.assign(ModalRoot, {
  ...createModalApi(globalConfirmStore),
  destroyAll: () => globalConfirmStore.destroyAll(),
  useModal,
});
