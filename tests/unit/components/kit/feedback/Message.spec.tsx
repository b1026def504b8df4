// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/feedback/Message`
 * Purpose: Verifies that useMessage renders notices through its holder and removes them on destroy.
 * Side-effects: none
 * Links: src/components/kit/feedback/Message.tsx
 * @public
 */

import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import { describe, expect, it } from "vitest";

import { useMessage } from "@/components/kit/feedback/Message";

function Launcher() {
  const [api, holder] = useMessage();
  return (
    <>
      <button type="button" onClick={() => api.success("Saved", 0)}>
        Save
      </button>
      <button type="button" onClick={() => api.open({ key: "sync", content: "Syncing", type: "loading" })}>
        Sync
      </button>
      <button type="button" onClick={() => api.open({ key: "sync", content: "Synced", type: "success", duration: 0 })}>
        Finish
      </button>
      <button type="button" onClick={() => api.destroy()}>
        Clear
      </button>
      {holder}
    </>
  );
}

describe("useMessage", () => {
  it("shows a typed notice", async () => {
    render(<Launcher />);

    fireEvent.click(screen.getByRole("button", { name: "Save" }));

    const notice = await screen.findByRole("status");
    expect(notice).toHaveTextContent("Saved");
    expect(notice).toHaveClass("ant-message-notice-content", "ant-message-success");
  });

  it("updates a notice in place by key", async () => {
    render(<Launcher />);

    fireEvent.click(screen.getByRole("button", { name: "Sync" }));
    expect(await screen.findByRole("status")).toHaveTextContent("Syncing");

    fireEvent.click(screen.getByRole("button", { name: "Finish" }));

    await waitFor(() => expect(screen.getByRole("status")).toHaveTextContent("Synced"));
    expect(screen.getAllByRole("status")).toHaveLength(1);
  });

  it("removes every notice on destroy", async () => {
    render(<Launcher />);

    fireEvent.click(screen.getByRole("button", { name: "Save" }));
    fireEvent.click(screen.getByRole("button", { name: "Sync" }));
    expect(await screen.findAllByRole("status")).toHaveLength(2);

    fireEvent.click(screen.getByRole("button", { name: "Clear" }));

    await waitFor(() => expect(screen.queryAllByRole("status")).toHaveLength(0));
  });
});
