// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/inputs/Upload`
 * Purpose: File picker and drop zone that uploads each file and renders the resulting file list.
 * Scope: Transport is `customRequest` or the default XHR request. List rendering covers text, picture and card layouts.
 * Invariants:
 * - `beforeUpload` returning false lists the file without uploading; returning LIST_IGNORE (or rejecting) drops it.
 * - Every list change reports `onChange({ file, fileList })` with the full next list.
 * - `onRemove` returning false (or resolving to false) keeps the file.
 * - Requests still running are aborted on removal and on unmount.
 * Side-effects: IO (network through the request function)
 * Links: src/components/kit/inputs/upload-utils.ts, src/components/kit/inputs/upload-request.ts
 * @public
 */

"use client";

import {
  Download,
  Eye,
  FileText,
  ImageIcon,
  Loader2,
  Paperclip,
  Trash2,
} from "lucide-react";
import type {
  ChangeEvent,
  CSSProperties,
  DragEvent,
  KeyboardEvent,
  ReactNode,
} from "react";
import { useEffect, useRef, useState } from "react";

import { useControllableState } from "@/shared/hooks";
import type { Locale } from "@/shared/locale";
import { cn, isPromiseLike } from "@/shared/util";
import type { UploadListType } from "@/styles/ui";
import {
  upload,
  uploadDragger,
  uploadItem,
  uploadItemAction,
  uploadItemActions,
  uploadItemName,
  uploadItemProgress,
  uploadList,
  uploadSelect,
} from "@/styles/ui";

import { Progress } from "../feedback/Progress";
import { useComponentConfig, useLocale } from "../theme";
import type { UploadRequest, UploadRequestHandle } from "./upload-request";
import { xhrUploadRequest } from "./upload-request";
import type { UploadFile } from "./upload-utils";
import {
  applyMaxCount,
  fileToUploadFile,
  isImageFile,
  LIST_IGNORE,
  matchesAccept,
  removeFileItem,
  updateFileList,
} from "./upload-utils";

type MaybePromise<T> = T | PromiseLike<T>;

export type BeforeUploadResult = boolean | typeof LIST_IGNORE | File | void;

export interface UploadChangeInfo {
  file: UploadFile;
  fileList: UploadFile[];
}

export interface ShowUploadListConfig {
  showRemoveIcon?: boolean;
  showPreviewIcon?: boolean;
  showDownloadIcon?: boolean;
}

export interface UploadProps {
  className?: string;
  style?: CSSProperties;
  action?: string | ((file: File) => MaybePromise<string>);
  method?: string;
  name?: string;
  data?: Record<string, string | Blob> | ((file: File) => Record<string, string | Blob>);
  headers?: Record<string, string>;
  withCredentials?: boolean;
  accept?: string;
  multiple?: boolean;
  maxCount?: number;
  fileList?: UploadFile[];
  defaultFileList?: UploadFile[];
  beforeUpload?: (file: File, fileList: File[]) => MaybePromise<BeforeUploadResult>;
  customRequest?: UploadRequest;
  onChange?: (info: UploadChangeInfo) => void;
  onRemove?: (file: UploadFile) => MaybePromise<boolean | void>;
  onPreview?: (file: UploadFile) => void;
  onDownload?: (file: UploadFile) => void;
  onDrop?: (event: DragEvent<HTMLDivElement>) => void;
  listType?: UploadListType;
  showUploadList?: boolean | ShowUploadListConfig;
  disabled?: boolean;
  openFileDialogOnClick?: boolean;
  iconRender?: (file: UploadFile, listType: UploadListType) => ReactNode;
  type?: "select" | "drag";
  children?: ReactNode;
}

async function resolveBeforeUpload(
  beforeUpload: UploadProps["beforeUpload"],
  file: File,
  batch: File[]
): Promise<{ keep: boolean; upload: File | null }> {
  if (!beforeUpload) return { keep: true, upload: file };
  try {
    const result = await beforeUpload(file, batch);
    if (result === LIST_IGNORE) return { keep: false, upload: null };
    if (result === false) return { keep: true, upload: null };
    if (result instanceof File) return { keep: true, upload: result };
    return { keep: true, upload: file };
  } catch {
    // Rejection cancels the file
    return { keep: false, upload: null };
  }
}

function Upload({
  className,
  style,
  action = "",
  method = "post",
  name = "file",
  data = {},
  headers = {},
  withCredentials = false,
  accept,
  multiple = false,
  maxCount,
  fileList,
  defaultFileList = [],
  beforeUpload,
  customRequest,
  onChange,
  onRemove,
  onPreview,
  onDownload,
  onDrop,
  listType = "text",
  showUploadList = true,
  disabled = false,
  openFileDialogOnClick = true,
  iconRender,
  type = "select",
  children,
}: UploadProps) {
  const { prefixCls, style: tokenStyle } = useComponentConfig("Upload", "upload");
  const locale = useLocale("Upload");
  const [list, setList] = useControllableState({
    value: fileList,
    defaultValue: defaultFileList,
  });
  const listRef = useRef(list);
  listRef.current = list;
  const requests = useRef(new Map<string, UploadRequestHandle>());
  const inputRef = useRef<HTMLInputElement>(null);
  const [dragOver, setDragOver] = useState(false);

  useEffect(() => {
    const running = requests.current;
    return () => {
      for (const handle of running.values()) handle.abort();
      running.clear();
    };
  }, []);

  const report = (file: UploadFile, next: UploadFile[]) => {
    listRef.current = next;
    setList(next);
    onChange?.({ file, fileList: next });
  };

  const patch = (uid: string, changes: Partial<UploadFile>) => {
    const current = listRef.current.find((item) => item.uid === uid);
    // Removed while uploading
    if (!current) return;
    const file = { ...current, ...changes };
    report(file, updateFileList(listRef.current, file));
  };

  const startUpload = async (item: UploadFile, file: File) => {
    const target = typeof action === "function" ? await action(file) : action;
    const request = customRequest ?? xhrUploadRequest;
    const handle = request({
      action: target,
      method,
      filename: name,
      file,
      data: typeof data === "function" ? data(file) : data,
      headers,
      withCredentials,
      onProgress: ({ percent }) => patch(item.uid, { percent, status: "uploading" }),
      onSuccess: (body) => {
        requests.current.delete(item.uid);
        patch(item.uid, { status: "done", percent: 100, response: body });
      },
      onError: (error, body) => {
        requests.current.delete(item.uid);
        patch(item.uid, { status: "error", error, response: body });
      },
    });
    requests.current.set(item.uid, handle);
  };

  const processFiles = async (files: File[]) => {
    const batch = multiple ? files : files.slice(0, 1);
    const decisions = await Promise.all(
      batch.map((file) => resolveBeforeUpload(beforeUpload, file, batch))
    );
    const accepted = batch.flatMap((file, index) => {
      const decision = decisions[index];
      if (!decision?.keep) return [];
      const item = fileToUploadFile(file);
      return [
        {
          item: decision.upload ? { ...item, status: "uploading" as const } : item,
          upload: decision.upload,
        },
      ];
    });
    for (const { item } of accepted) {
      report(item, applyMaxCount(updateFileList(listRef.current, item), maxCount));
    }
    await Promise.all(
      accepted.map(({ item, upload: file }) =>
        file && listRef.current.some((entry) => entry.uid === item.uid)
          ? startUpload(item, file)
          : undefined
      )
    );
  };

  const handleFiles = (files: File[]) => {
    if (disabled || files.length === 0) return;
    void processFiles(files).catch((reason: unknown) => {
      for (const file of files) {
        const failed = listRef.current.find((entry) => entry.originFileObj === file);
        if (failed) patch(failed.uid, { status: "error", error: reason });
      }
    });
  };

  const handleInputChange = (event: ChangeEvent<HTMLInputElement>) => {
    handleFiles(Array.from(event.target.files ?? []));
    // Selecting the same file twice must fire change again
    event.target.value = "";
  };

  const openDialog = () => {
    if (disabled || !openFileDialogOnClick) return;
    inputRef.current?.click();
  };

  const handleKeyDown = (event: KeyboardEvent<HTMLDivElement>) => {
    if (event.key === "Enter" || event.key === " ") {
      event.preventDefault();
      openDialog();
    }
  };

  const handleDrop = (event: DragEvent<HTMLDivElement>) => {
    event.preventDefault();
    setDragOver(false);
    onDrop?.(event);
    const files = Array.from(event.dataTransfer.files).filter((file) =>
      matchesAccept(file, accept)
    );
    handleFiles(files);
  };

  const handleRemove = async (file: UploadFile) => {
    const result = onRemove ? onRemove(file) : undefined;
    // A rejected onRemove keeps the file
    const keep = isPromiseLike(result)
      ? await Promise.resolve(result).then(
          (value) => value === false,
          () => true
        )
      : result === false;
    if (keep) return;
    requests.current.get(file.uid)?.abort();
    requests.current.delete(file.uid);
    report({ ...file, status: "removed" }, removeFileItem(file, listRef.current));
  };

  const input = (
    <input
      ref={inputRef}
      type="file"
      className="hidden"
      tabIndex={-1}
      accept={accept}
      multiple={multiple}
      disabled={disabled}
      onChange={handleInputChange}
      onClick={(event) => event.stopPropagation()}
    />
  );

  const card = listType === "picture-card" || listType === "picture-circle";
  const listConfig = typeof showUploadList === "object" ? showUploadList : {};

  const renderedList = showUploadList ? (
    <UploadList
      prefixCls={prefixCls}
      items={list}
      listType={listType}
      showRemoveIcon={!disabled && (listConfig.showRemoveIcon ?? true)}
      showPreviewIcon={listConfig.showPreviewIcon ?? true}
      showDownloadIcon={listConfig.showDownloadIcon ?? false}
      iconRender={iconRender}
      locale={locale}
      onRemove={(file) => {
        void handleRemove(file);
      }}
      onPreview={onPreview}
      onDownload={onDownload}
    />
  ) : null;

  if (type === "drag") {
    return (
      <span className={cn(prefixCls, upload(), className)} style={{ ...tokenStyle, ...style }}>
        <div
          role="button"
          tabIndex={disabled ? undefined : 0}
          aria-disabled={disabled || undefined}
          className={cn(`${prefixCls}-drag`, uploadDragger({ hover: dragOver, disabled }))}
          onClick={openDialog}
          onKeyDown={handleKeyDown}
          onDragOver={(event) => {
            event.preventDefault();
            if (!disabled) setDragOver(true);
          }}
          onDragLeave={() => setDragOver(false)}
          onDrop={handleDrop}
        >
          {input}
          {children ?? <p className="m-0 text-fg-secondary">{locale.dragger}</p>}
        </div>
        {renderedList}
      </span>
    );
  }

  const select =
    children === undefined || children === null ? null : (
      <div
        role="button"
        tabIndex={disabled ? undefined : 0}
        aria-disabled={disabled || undefined}
        className={cn(
          `${prefixCls}-select`,
          uploadSelect({ disabled, card, circle: listType === "picture-circle" })
        )}
        onClick={openDialog}
        onKeyDown={handleKeyDown}
      >
        {input}
        {children}
      </div>
    );

  return (
    <span className={cn(prefixCls, upload(), className)} style={{ ...tokenStyle, ...style }}>
      {card ? (
        <div className="flex flex-wrap gap-2">
          {renderedList}
          {select}
        </div>
      ) : (
        <>
          {select}
          {renderedList}
        </>
      )}
    </span>
  );
}

interface UploadListProps {
  prefixCls: string;
  items: UploadFile[];
  listType: UploadListType;
  showRemoveIcon: boolean;
  showPreviewIcon: boolean;
  showDownloadIcon: boolean;
  iconRender: UploadProps["iconRender"];
  locale: Locale["Upload"];
  onRemove: (file: UploadFile) => void;
  onPreview: ((file: UploadFile) => void) | undefined;
  onDownload: ((file: UploadFile) => void) | undefined;
}

function UploadList({
  prefixCls,
  items,
  listType,
  showRemoveIcon,
  showPreviewIcon,
  showDownloadIcon,
  iconRender,
  locale,
  onRemove,
  onPreview,
  onDownload,
}: UploadListProps) {
  const picture = listType !== "text";

  const renderIcon = (file: UploadFile) => {
    if (iconRender) return iconRender(file, listType);
    if (file.status === "uploading") {
      return <Loader2 aria-hidden className="size-3.5 animate-spin text-fg-tertiary" />;
    }
    if (!picture) return <Paperclip aria-hidden className="size-3.5 text-fg-tertiary" />;
    const source = file.thumbUrl ?? file.url;
    if (source && isImageFile(file)) {
      return <img src={source} alt={file.name} className="size-12 rounded object-cover" />;
    }
    return isImageFile(file) ? (
      <ImageIcon aria-hidden className="size-6 text-fg-tertiary" />
    ) : (
      <FileText aria-hidden className="size-6 text-fg-tertiary" />
    );
  };

  return (
    <ul className={cn(`${prefixCls}-list`, uploadList({ listType }))}>
      {items.map((file) => {
        const status = file.status ?? "done";
        const card = listType === "picture-card" || listType === "picture-circle";
        return (
          <li
            key={file.uid}
            className={uploadItem({ listType, status })}
            title={status === "error" ? locale.uploadError : undefined}
          >
            <span className="inline-flex flex-none items-center">{renderIcon(file)}</span>
            {card ? (
              status === "uploading" ? (
                <span className="text-ant-sm text-fg-tertiary">{locale.uploading}</span>
              ) : null
            ) : file.url && status !== "uploading" ? (
              <a
                href={file.url}
                target="_blank"
                rel="noopener noreferrer"
                className={uploadItemName({ link: true })}
                onClick={(event) => {
                  if (onPreview) {
                    event.preventDefault();
                    onPreview(file);
                  }
                }}
              >
                {file.name}
              </a>
            ) : onPreview ? (
              <button
                type="button"
                className={cn(uploadItemName(), "cursor-pointer border-none bg-transparent p-0 text-start text-inherit")}
                onClick={() => onPreview(file)}
              >
                {file.name}
              </button>
            ) : (
              <span className={uploadItemName()}>{file.name}</span>
            )}
            <span
              className={cn(
                uploadItemActions(),
                card && "absolute inset-0 justify-center bg-[rgba(0,0,0,0.45)] text-fg-inverse"
              )}
            >
              {card && showPreviewIcon && onPreview && status !== "uploading" ? (
                <button
                  type="button"
                  aria-label={locale.previewFile}
                  className={uploadItemAction()}
                  onClick={() => onPreview(file)}
                >
                  <Eye aria-hidden className="size-3.5" />
                </button>
              ) : null}
              {showDownloadIcon && status === "done" ? (
                <button
                  type="button"
                  aria-label={locale.downloadFile}
                  className={uploadItemAction()}
                  onClick={() => {
                    if (onDownload) onDownload(file);
                    else if (file.url) window.open(file.url, "_blank", "noopener");
                  }}
                >
                  <Download aria-hidden className="size-3.5" />
                </button>
              ) : null}
              {showRemoveIcon ? (
                <button
                  type="button"
                  aria-label={locale.removeFile}
                  className={uploadItemAction()}
                  onClick={() => onRemove(file)}
                >
                  <Trash2 aria-hidden className="size-3.5" />
                </button>
              ) : null}
            </span>
            {status === "uploading" ? (
              <div className={uploadItemProgress()}>
                <Progress
                  percent={file.percent ?? 0}
                  showInfo={false}
                  strokeWidth={2}
                  aria-label={locale.uploading}
                />
              </div>
            ) : null}
          </li>
        );
      })}
    </ul>
  );
}

function Dragger(props: Omit<UploadProps, "type">) {
  return <Upload {...props} type="drag" />;
}

Upload.displayName = "Upload";
Dragger.displayName = "Upload.Dragger";

const UploadWithStatics = Object.assign(Upload, {
  Dragger,
  LIST_IGNORE,
});

export { UploadWithStatics as Upload };
