// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/upload-request`
 * Purpose: Default Upload transport: multipart form POST over XMLHttpRequest with progress events.
 * Scope: One request per file. Callers swap it out through Upload's `customRequest`.
 * Invariants:
 * - Non-2xx responses and network errors reach `onError` as UploadRequestError and are logged.
 * - `data` fields are appended before the file part.
 * Side-effects: IO (network)
 * @internal
 */

import { UploadRequestError } from "@/shared/errors";
import { error as logError } from "@/shared/observability/client";
import { EVENT_NAMES } from "@/shared/observability/events";

export interface UploadProgressEvent {
  percent: number;
}

export interface UploadRequestOptions {
  action: string;
  method: string;
  filename: string;
  file: File;
  data: Record<string, string | Blob>;
  headers: Record<string, string>;
  withCredentials: boolean;
  onProgress: (event: UploadProgressEvent) => void;
  onSuccess: (body: unknown) => void;
  onError: (error: Error, body?: unknown) => void;
}

export interface UploadRequestHandle {
  abort: () => void;
}

export type UploadRequest = (options: UploadRequestOptions) => UploadRequestHandle;

function readBody(xhr: XMLHttpRequest): unknown {
  const text = xhr.responseText;
  if (!text) return text;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export const xhrUploadRequest: UploadRequest = ({
  action,
  method,
  filename,
  file,
  data,
  headers,
  withCredentials,
  onProgress,
  onSuccess,
  onError,
}) => {
  const xhr = new XMLHttpRequest();

  const fail = (status: number, body?: unknown) => {
    const failure = new UploadRequestError(status, method, action);
    logError(EVENT_NAMES.UPLOAD_REQUEST_FAILED, {
      status,
      method,
      action,
      file: file.name,
    });
    onError(failure, body);
  };

  xhr.upload.onprogress = (event) => {
    if (event.total > 0) onProgress({ percent: (event.loaded / event.total) * 100 });
  };
  xhr.onerror = () => fail(0);
  xhr.onload = () => {
    const body = readBody(xhr);
    if (xhr.status < 200 || xhr.status >= 300) {
      fail(xhr.status, body);
      return;
    }
    onSuccess(body);
  };

  const form = new FormData();
  for (const [key, value] of Object.entries(data)) form.append(key, value);
  form.append(filename, file, file.name);

  xhr.open(method.toUpperCase(), action, true);
  xhr.withCredentials = withCredentials;
  if (!Object.hasOwn(headers, "X-Requested-With")) {
    xhr.setRequestHeader("X-Requested-With", "XMLHttpRequest");
  }
  for (const [key, value] of Object.entries(headers)) {
    xhr.setRequestHeader(key, value);
  }
  xhr.send(form);

  return { abort: () => xhr.abort() };
};
