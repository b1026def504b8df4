// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/feedback/confirm-store`
 * Purpose: Verifies the queue behind Modal.confirm: add, update, close then remove.
 * Invariants: close keeps the entry for its exit animation; remove drops it.
 * Side-effects: none
 * Links: src/components/kit/feedback/confirm-store.ts
 * @public
 */

import { describe, expect, it, vi } from "vitest";

import { ConfirmStore } from "@/components/kit/feedback/confirm-store";

describe("ConfirmStore", () => {
  it("adds open entries with sequential keys", () => {
    const store = new ConfirmStore();
    const listener = vi.fn();
    store.subscribe(listener);

    store.add("confirm", { title: "Delete?" });
    store.add("info", { title: "Heads up" });

    expect(store.getSnapshot().map((entry) => [entry.key, entry.type, entry.open])).toEqual([
      ["confirm-1", "confirm", true],
      ["confirm-2", "info", true],
    ]);
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it("update merges objects and applies updaters", () => {
    const store = new ConfirmStore();
    const handle = store.add("confirm", { title: "A", content: "x" });

    handle.update({ title: "B" });
    expect(store.getSnapshot()[0]?.config).toEqual({ title: "B", content: "x" });

    handle.update((prev) => ({ ...prev, content: "y" }));
    expect(store.getSnapshot()[0]?.config).toEqual({ title: "B", content: "y" });
  });

  it("destroy closes, remove drops", () => {
    const store = new ConfirmStore();
    const handle = store.add("warning", {});

    handle.destroy();
    expect(store.getSnapshot()[0]?.open).toBe(false);

    store.remove("confirm-1");
    expect(store.getSnapshot()).toEqual([]);
  });

  it("destroyAll closes every entry", () => {
    const store = new ConfirmStore();
    store.add("confirm", {});
    store.add("error", {});

    store.destroyAll();

    expect(store.getSnapshot().every((entry) => !entry.open)).toBe(true);
  });

  it("ignores unknown keys", () => {
    const store = new ConfirmStore();
    const listener = vi.fn();
    store.subscribe(listener);

    store.close("nope");
    store.remove("nope");

    expect(listener).not.toHaveBeenCalled();
  });
});
