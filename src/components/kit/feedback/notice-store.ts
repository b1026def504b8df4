// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/feedback/notice-store`
 * Purpose: Framework-free queue of transient notices with keyed updates, auto-close timers and a max count.
 * Scope: Owns notice state and timers; Message and Notification holders subscribe to it. Does not render.
 * Invariants:
 * - Opening with an existing key replaces that notice in place and restarts its timer.
 * - Past maxCount the oldest notices close first.
 * - duration is in seconds; 0 keeps the notice until closed.
 * - Every handle's promise resolves exactly once, when its notice closes.
 * Side-effects: time (auto-close timers)
 * @public
 */

export interface NoticeConfigBase {
  key?: string | number;
  /** Seconds; 0 never auto-closes. */
  duration?: number;
  onClose?: () => void;
}

export interface Notice<C extends NoticeConfigBase> {
  key: string;
  config: C;
  /** Seconds resolved from config or store default. */
  duration: number;
  paused: boolean;
}

export interface NoticeHandle extends PromiseLike<boolean> {
  key: string;
  close: () => void;
}

export interface NoticeStoreOptions {
  duration: number;
  maxCount?: number | undefined;
}

type Listener = () => void;

interface Timer {
  id: ReturnType<typeof setTimeout> | undefined;
  startedAt: number;
  remaining: number;
}

export class NoticeStore<
  C extends NoticeConfigBase,
  O extends NoticeStoreOptions = NoticeStoreOptions,
> {
  private notices: readonly Notice<C>[] = [];
  private readonly listeners = new Set<Listener>();
  private readonly timers = new Map<string, Timer>();
  private readonly resolvers = new Map<
    string,
    Array<(closed: boolean) => void>
  >();
  private seq = 0;
  protected options: O;

  constructor(options: O) {
    this.options = options;
  }

  /** Stable between changes, for useSyncExternalStore. */
  getSnapshot = (): readonly Notice<C>[] => this.notices;

  getOptions(): O {
    return this.options;
  }

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  config(options: Partial<O>): void {
    this.options = { ...this.options, ...options };
    // New snapshot so holders re-read options
    this.notices = [...this.notices];
    this.emit();
  }

  open(config: C): NoticeHandle {
    const key = config.key !== undefined ? String(config.key) : this.nextKey();
    const duration = config.duration ?? this.options.duration;
    const notice: Notice<C> = { key, config, duration, paused: false };

    const index = this.notices.findIndex((item) => item.key === key);
    if (index >= 0) {
      this.notices = this.notices.map((item, i) => (i === index ? notice : item));
    } else {
      this.notices = [...this.notices, notice];
      this.trimToMaxCount();
    }

    this.startTimer(key, duration);
    this.emit();

    const closed = new Promise<boolean>((resolve) => {
      const list = this.resolvers.get(key) ?? [];
      list.push(resolve);
      this.resolvers.set(key, list);
    });

    return {
      key,
      close: () => this.close(key),
      then: closed.then.bind(closed),
    };
  }

  close(key: string | number): void {
    const id = String(key);
    const notice = this.notices.find((item) => item.key === id);
    if (!notice) return;
    this.notices = this.notices.filter((item) => item.key !== id);
    this.finish(notice);
    this.emit();
  }

  /** Closes one notice, or all when no key is given. */
  destroy(key?: string | number): void {
    if (key !== undefined) {
      this.close(key);
      return;
    }
    const closing = this.notices;
    this.notices = [];
    for (const notice of closing) this.finish(notice);
    this.emit();
  }

  /** Freezes the auto-close countdown, e.g. while hovered. */
  pause(key: string): void {
    const timer = this.timers.get(key);
    if (!timer || timer.id === undefined) return;
    clearTimeout(timer.id);
    timer.remaining -= Date.now() - timer.startedAt;
    timer.id = undefined;
    this.setPaused(key, true);
  }

  resume(key: string): void {
    const timer = this.timers.get(key);
    if (!timer || timer.id !== undefined) return;
    this.schedule(key, timer, Math.max(0, timer.remaining));
    this.setPaused(key, false);
  }

  private nextKey(): string {
    this.seq += 1;
    return `notice-${this.seq}`;
  }

  private trimToMaxCount(): void {
    const { maxCount } = this.options;
    if (maxCount === undefined || maxCount <= 0) return;
    const overflow = this.notices.length - maxCount;
    if (overflow <= 0) return;
    const dropped = this.notices.slice(0, overflow);
    this.notices = this.notices.slice(overflow);
    for (const notice of dropped) this.finish(notice);
  }

  private startTimer(key: string, duration: number): void {
    this.clearTimer(key);
    if (duration <= 0) return;
    const timer: Timer = {
      id: undefined,
      startedAt: 0,
      remaining: duration * 1000,
    };
    this.timers.set(key, timer);
    this.schedule(key, timer, timer.remaining);
  }

  private schedule(key: string, timer: Timer, ms: number): void {
    timer.startedAt = Date.now();
    timer.remaining = ms;
    timer.id = setTimeout(() => this.close(key), ms);
  }

  private clearTimer(key: string): void {
    const timer = this.timers.get(key);
    if (timer?.id !== undefined) clearTimeout(timer.id);
    this.timers.delete(key);
  }

  private setPaused(key: string, paused: boolean): void {
    this.notices = this.notices.map((item) =>
      item.key === key ? { ...item, paused } : item
    );
    this.emit();
  }

  private finish(notice: Notice<C>): void {
    this.clearTimer(notice.key);
    const resolvers = this.resolvers.get(notice.key) ?? [];
    this.resolvers.delete(notice.key);
    notice.config.onClose?.();
    for (const resolve of resolvers) resolve(true);
  }

  private emit(): void {
    for (const listener of this.listeners) listener();
  }
}
