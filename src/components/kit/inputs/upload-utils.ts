// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/upload-utils`
 * Purpose: Immutable file list operations behind Upload.
 * Invariants:
 * - Lists are never mutated; every helper returns a new array.
 * - Items are matched by `uid`.
 * Side-effects: none
 * @public
 */

export type UploadFileStatus = "uploading" | "done" | "error" | "removed";

export interface UploadFile<T = unknown> {
  uid: string;
  name: string;
  status?: UploadFileStatus;
  percent?: number;
  url?: string;
  thumbUrl?: string;
  size?: number;
  type?: string;
  lastModified?: number;
  response?: T;
  error?: unknown;
  originFileObj?: File;
}

/** Returned from beforeUpload to keep a file out of the list entirely. */
export const LIST_IGNORE = "__LIST_IGNORE_UPLOAD__" as const;

let uidSeed = 0;

export function createUid(now: number = Date.now()): string {
  uidSeed += 1;
  return `upload-${now}-${uidSeed}`;
}

export function fileToUploadFile<T = unknown>(
  file: File,
  uid: string = createUid()
): UploadFile<T> {
  return {
    uid,
    name: file.name,
    size: file.size,
    type: file.type,
    lastModified: file.lastModified,
    percent: 0,
    originFileObj: file,
  };
}

/** Replaces the item with the same uid, or appends the file. */
export function updateFileList<T>(
  list: readonly UploadFile<T>[],
  file: UploadFile<T>
): UploadFile<T>[] {
  const index = list.findIndex((item) => item.uid === file.uid);
  if (index === -1) return [...list, file];
  return list.map((item, position) => (position === index ? file : item));
}

export function removeFileItem<T>(
  file: Pick<UploadFile<T>, "uid">,
  list: readonly UploadFile<T>[]
): UploadFile<T>[] {
  return list.filter((item) => item.uid !== file.uid);
}

/** Keeps the newest `maxCount` entries; with 1 the latest file replaces the old one. */
export function applyMaxCount<T>(
  list: readonly UploadFile<T>[],
  maxCount?: number
): UploadFile<T>[] {
  if (maxCount === undefined || maxCount <= 0) return [...list];
  if (maxCount === 1) return list.slice(-1);
  return list.slice(-maxCount);
}

const IMAGE_EXTENSION = /\.(webp|svg|png|gif|jpg|jpeg|jfif|bmp|dpg|ico|heic|heif)$/i;

export function isImageFile(file: UploadFile): boolean {
  if (file.type?.startsWith("image/")) return true;
  const url = file.thumbUrl ?? file.url ?? "";
  if (url.startsWith("data:image/")) return true;
  const path = url.split(/[?#]/)[0] ?? "";
  return IMAGE_EXTENSION.test(path) || IMAGE_EXTENSION.test(file.name);
}

/** Whether a dropped file matches an `accept` list such as `"image/*,.pdf"`. */
export function matchesAccept(file: Pick<File, "name" | "type">, accept?: string): boolean {
  if (!accept) return true;
  const name = file.name.toLowerCase();
  const type = file.type.toLowerCase();
  const baseType = type.replace(/\/.*$/, "");
  return accept
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean)
    .some((entry) => {
      if (entry.startsWith(".")) return name.endsWith(entry);
      if (entry.endsWith("/*")) return baseType === entry.replace(/\/.*$/, "");
      return type === entry;
    });
}
