// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * @vitest-environment jsdom
 * Module: `@tests/unit/components/kit/inputs/Upload`
 * Purpose: Verifies the upload lifecycle through an injected request, beforeUpload outcomes and removal.
 * Side-effects: none (requests are faked in process)
 * Links: src/components/kit/inputs/Upload.tsx, upload-request.ts
 * @public
 */

import { act, fireEvent, render, screen, waitFor } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";
import type { Mock } from "vitest";

import { Upload } from "@/components/kit/inputs/Upload";
import type { UploadChangeInfo } from "@/components/kit/inputs/Upload";
import type { UploadRequest, UploadRequestOptions } from "@/components/kit/inputs/upload-request";

function makeRequest() {
  const abort = vi.fn();
  const request = vi.fn<UploadRequest>(() => ({ abort }));
  const lastOptions = (): UploadRequestOptions => {
    const options = request.mock.lastCall?.[0];
    if (!options) throw new Error("no request was made");
    return options;
  };
  return { request, abort, lastOptions };
}

function selectFiles(container: HTMLElement, files: File[]) {
  const input = container.querySelector<HTMLInputElement>('input[type="file"]');
  if (!input) throw new Error("missing file input");
  fireEvent.change(input, { target: { files } });
}

function lastInfo(onChange: Mock<(info: UploadChangeInfo) => void>) {
  const info = onChange.mock.lastCall?.[0];
  if (!info) throw new Error("onChange was not called");
  return info;
}

const textFile = () => new File(["hello"], "notes.txt", { type: "text/plain" });

describe("Upload", () => {
  it("drives an item from uploading to done", async () => {
    const { request, lastOptions } = makeRequest();
    const onChange = vi.fn<(info: UploadChangeInfo) => void>();
    const { container } = render(
      <Upload action="/upload" data={{ folder: "docs" }} customRequest={request} onChange={onChange}>
        Pick
      </Upload>
    );

    selectFiles(container, [textFile()]);
    await waitFor(() => expect(request).toHaveBeenCalledTimes(1));

    const options = lastOptions();
    expect(options.action).toBe("/upload");
    expect(options.method).toBe("post");
    expect(options.filename).toBe("file");
    expect(options.data).toEqual({ folder: "docs" });
    expect(lastInfo(onChange).file.status).toBe("uploading");

    act(() => options.onProgress({ percent: 40 }));
    expect(lastInfo(onChange).file.percent).toBe(40);

    act(() => options.onSuccess({ id: 7 }));
    const done = lastInfo(onChange);
    expect(done.file.status).toBe("done");
    expect(done.file.percent).toBe(100);
    expect(done.file.response).toEqual({ id: 7 });
    expect(done.fileList).toHaveLength(1);
    expect(screen.getByText("notes.txt")).toBeInTheDocument();
  });

  it("marks failed requests", async () => {
    const { request, lastOptions } = makeRequest();
    const onChange = vi.fn<(info: UploadChangeInfo) => void>();
    const { container } = render(
      <Upload action="/upload" customRequest={request} onChange={onChange}>
        Pick
      </Upload>
    );

    selectFiles(container, [textFile()]);
    await waitFor(() => expect(request).toHaveBeenCalledTimes(1));
    const failure = new Error("boom");
    act(() => lastOptions().onError(failure));

    expect(lastInfo(onChange).file.status).toBe("error");
    expect(lastInfo(onChange).file.error).toBe(failure);
    expect(screen.getByText("notes.txt").closest("li")).toHaveAttribute(
      "title",
      "Upload error"
    );
  });

  it("lists without uploading when beforeUpload returns false", async () => {
    const { request } = makeRequest();
    const { container } = render(
      <Upload customRequest={request} beforeUpload={() => false}>
        Pick
      </Upload>
    );

    selectFiles(container, [textFile()]);

    expect(await screen.findByText("notes.txt")).toBeInTheDocument();
    expect(request).not.toHaveBeenCalled();
  });

  it("skips the list for LIST_IGNORE and rejections", async () => {
    const { request } = makeRequest();
    const onChange = vi.fn<(info: UploadChangeInfo) => void>();
    const beforeUpload = vi
      .fn<(file: File) => Promise<typeof Upload.LIST_IGNORE>>()
      .mockResolvedValueOnce(Upload.LIST_IGNORE)
      .mockRejectedValueOnce(new Error("too large"));
    const { container } = render(
      <Upload customRequest={request} beforeUpload={beforeUpload} onChange={onChange}>
        Pick
      </Upload>
    );

    selectFiles(container, [textFile()]);
    selectFiles(container, [textFile()]);

    await waitFor(() => expect(beforeUpload).toHaveBeenCalledTimes(2));
    await act(async () => {
      await Promise.resolve();
    });
    expect(onChange).not.toHaveBeenCalled();
    expect(request).not.toHaveBeenCalled();
    expect(screen.queryByText("notes.txt")).toBeNull();
  });

  it("keeps only the newest files under maxCount", async () => {
    const { request } = makeRequest();
    const onChange = vi.fn<(info: UploadChangeInfo) => void>();
    const { container } = render(
      <Upload
        customRequest={request}
        maxCount={1}
        defaultFileList={[{ uid: "old", name: "old.txt", status: "done" }]}
        onChange={onChange}
      >
        Pick
      </Upload>
    );

    selectFiles(container, [textFile()]);

    await waitFor(() =>
      expect(lastInfo(onChange).fileList.map((file) => file.name)).toEqual(["notes.txt"])
    );
    expect(screen.queryByText("old.txt")).toBeNull();
  });

  it("removes items and aborts their request", async () => {
    const { request, abort } = makeRequest();
    const onChange = vi.fn<(info: UploadChangeInfo) => void>();
    const { container } = render(
      <Upload customRequest={request} onChange={onChange}>
        Pick
      </Upload>
    );

    selectFiles(container, [textFile()]);
    await waitFor(() => expect(request).toHaveBeenCalledTimes(1));

    fireEvent.click(screen.getByRole("button", { name: "Remove file" }));

    await waitFor(() => expect(lastInfo(onChange).fileList).toEqual([]));
    expect(lastInfo(onChange).file.status).toBe("removed");
    expect(abort).toHaveBeenCalledTimes(1);
  });

  it("keeps an item when onRemove resolves false", async () => {
    const onChange = vi.fn<(info: UploadChangeInfo) => void>();
    const onRemove = vi.fn(() => Promise.resolve(false));
    render(
      <Upload
        defaultFileList={[{ uid: "1", name: "keep.txt", status: "done" }]}
        onRemove={onRemove}
        onChange={onChange}
      />
    );

    fireEvent.click(screen.getByRole("button", { name: "Remove file" }));

    await waitFor(() => expect(onRemove).toHaveBeenCalledTimes(1));
    await act(async () => {
      await Promise.resolve();
    });
    expect(onChange).not.toHaveBeenCalled();
    expect(screen.getByText("keep.txt")).toBeInTheDocument();
  });

  it("hides remove actions when disabled", () => {
    render(
      <Upload disabled defaultFileList={[{ uid: "1", name: "a.txt", status: "done" }]}>
        Pick
      </Upload>
    );

    expect(screen.queryByRole("button", { name: "Remove file" })).toBeNull();
    expect(screen.getByRole("button", { name: "Pick" })).toHaveAttribute(
      "aria-disabled",
      "true"
    );
  });
});
