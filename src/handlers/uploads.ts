/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { UploadedFile } from '../pipeline/context.js';
import {
  HttpHandler,
  pipe,
  setStatusCode,
  text,
} from '../pipeline/handlers.js';

/**
 * One line per file name, each preceded by a newline.
 */
export function listFileNames(files: readonly UploadedFile[]): string {
  return files.reduce((acc, file) => `${acc}\n${file.fileName}`, '');
}

export const smallFileUploadHandler: HttpHandler = async (next, ctx) => {
  if (!ctx.request.form.hasFormContentType) {
    return pipe(setStatusCode(400), text('Bad request'))(next, ctx);
  }

  const form = await ctx.request.form.readForm();
  ctx.log.debug('Buffered form read', { fileCount: form.files.length });
  return text(listFileNames(form.files))(next, ctx);
};

export const largeFileUploadHandler: HttpHandler = async (next, ctx) => {
  const form = await ctx.request.form.streamForm(ctx.request.signal);
  ctx.log.debug('Streamed form read', {
    fileCount: form.files.length,
    totalBytes: form.files.reduce((total, file) => total + file.size, 0),
  });
  return text(listFileNames(form.files))(next, ctx);
};
