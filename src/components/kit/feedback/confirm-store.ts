// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/confirm-store`
 * Purpose: Queue of imperative confirm dialogs opened through `Modal.confirm` and `useModal`.
 * Scope: State only; ModalHolder renders the entries.
 * Invariants:
 * - Closing flips `open` first; the entry is removed once its dialog reports afterClose.
 * - Updating a handle merges into the entry's config.
 * Side-effects: none
 * @internal
 */

import type { CSSProperties, ReactNode } from "react";

import type { ButtonType } from "../general/button-utils";

export type ConfirmType = "confirm" | "info" | "success" | "error" | "warning";

/** Returning a promise keeps the dialog open, with a loading button, until it settles. */
export type ConfirmAction = (close: () => void) => void | PromiseLike<unknown>;

export interface ModalFuncProps {
  title?: ReactNode;
  content?: ReactNode;
  icon?: ReactNode;
  okText?: ReactNode;
  cancelText?: ReactNode;
  okType?: ButtonType;
  okCancel?: boolean;
  /** A handler that declares `close` is trusted to call it. */
  onOk?: ConfirmAction;
  onCancel?: ConfirmAction;
  afterClose?: () => void;
  closable?: boolean;
  maskClosable?: boolean;
  keyboard?: boolean;
  centered?: boolean;
  width?: number | string;
  autoFocusButton?: "ok" | "cancel" | null;
  className?: string;
  style?: CSSProperties;
}

export interface ConfirmEntry {
  key: string;
  type: ConfirmType;
  config: ModalFuncProps;
  open: boolean;
}

export interface ConfirmHandle {
  destroy: () => void;
  update: (
    config: ModalFuncProps | ((prev: ModalFuncProps) => ModalFuncProps)
  ) => void;
}

type Listener = () => void;

export class ConfirmStore {
  private entries: readonly ConfirmEntry[] = [];
  private readonly listeners = new Set<Listener>();
  private seq = 0;

  getSnapshot = (): readonly ConfirmEntry[] => this.entries;

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  add(type: ConfirmType, config: ModalFuncProps): ConfirmHandle {
    this.seq += 1;
    const key = `confirm-${this.seq}`;
    this.entries = [...this.entries, { key, type, config, open: true }];
    this.emit();
    return {
      destroy: () => this.close(key),
      update: (next) =>
        this.patch(key, (entry) => ({
          ...entry,
          config:
            typeof next === "function"
              ? next(entry.config)
              : { ...entry.config, ...next },
        })),
    };
  }

  close(key: string): void {
    this.patch(key, (entry) => ({ ...entry, open: false }));
  }

  remove(key: string): void {
    const next = this.entries.filter((entry) => entry.key !== key);
    if (next.length === this.entries.length) return;
    this.entries = next;
    this.emit();
  }

  destroyAll(): void {
    for (const entry of this.entries) this.close(entry.key);
  }

  private patch(key: string, update: (entry: ConfirmEntry) => ConfirmEntry): void {
    let changed = false;
    this.entries = this.entries.map((entry) => {
      if (entry.key !== key) return entry;
      changed = true;
      return update(entry);
    });
    if (changed) this.emit();
  }

  private emit(): void {
    for (const listener of this.listeners) listener();
  }
}
