/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { IncomingHttpHeaders } from 'node:http';
import type { Readable } from 'node:stream';
import busboy from 'busboy';
import express, { Request, RequestHandler, Response } from 'express';
import multer from 'multer';

import { AbortError, DetailedError } from '../lib/error.js';
import type {
  FormCollection,
  FormFeature,
  UploadedFile,
} from './context.js';

const FORM_MEDIA_TYPES = [
  'application/x-www-form-urlencoded',
  'multipart/form-data',
];

export function mediaType(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

export function isFormContentType(contentType: string | undefined): boolean {
  return FORM_MEDIA_TYPES.includes(mediaType(contentType));
}

export function runMiddleware(
  middleware: RequestHandler,
  req: Request,
  res: Response,
): Promise<void> {
  return new Promise((resolve, reject) => {
    middleware(req, res, (error?: unknown) => {
      if (error !== undefined && error !== null) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

/**
 * First value of each field. Repeated fields keep their first occurrence.
 */
export function toFields(body: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (typeof body !== 'object' || body === null) {
    return fields;
  }

  for (const [name, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      fields[name] = value;
    } else if (Array.isArray(value) && typeof value[0] === 'string') {
      fields[name] = value[0];
    }
  }
  return fields;
}

/**
 * Parses a form body as it arrives. File contents are counted and dropped.
 * Rejects with `AbortError` when `signal` fires, and with the parser's error
 * when the body is malformed or ends early. Either way the body is unpiped and
 * the parser destroyed.
 */
export function readFormStream(
  body: Readable,
  headers: IncomingHttpHeaders,
  signal: AbortSignal,
): Promise<FormCollection> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      throw new AbortError('Form read aborted before it started');
    }

    const parser = busboy({ headers });
    const fields: Record<string, string> = {};
    const files: UploadedFile[] = [];
    let settled = false;

    const fail = (error: unknown) => {
      if (settled) {
        return;
      }
      settled = true;
      signal.removeEventListener('abort', onAbort);
      body.unpipe(parser);
      parser.destroy();
      reject(error);
    };
    const onAbort = () =>
      fail(new AbortError('Form read aborted', { fileCount: files.length }));

    parser.on('field', (name, value) => {
      if (!(name in fields)) {
        fields[name] = value;
      }
    });
    parser.on('file', (fieldName, stream, info) => {
      const file: UploadedFile = {
        fieldName,
        fileName: info.filename,
        contentType: info.mimeType,
        size: 0,
      };
      files.push(file);
      stream.on('data', (chunk: Buffer) => {
        file.size += chunk.length;
      });
      // Truncated bodies and destroyed parsers end the file stream with an
      // error; the read fails with it
      stream.on('error', fail);
    });
    parser.on('close', () => {
      if (settled) {
        return;
      }
      settled = true;
      signal.removeEventListener('abort', onAbort);
      resolve({ fields, files });
    });
    parser.on('error', fail);

    signal.addEventListener('abort', onAbort, { once: true });
    body.pipe(parser);
  });
}

export interface FormReaderOptions {
  maxFileSize: number;
}

/**
 * Form access for an express request. Buffered reads go through multer
 * (multipart) and the express url-encoded parser; streaming reads feed the
 * request straight into busboy.
 */
export class ExpressFormFeature implements FormFeature {
  private req: Request;
  private res: Response;
  private upload: RequestHandler;
  private urlencoded: RequestHandler;
  private consumed: Promise<FormCollection> | undefined;

  constructor(
    req: Request,
    res: Response,
    { maxFileSize }: FormReaderOptions,
  ) {
    this.req = req;
    this.res = res;
    this.upload = multer({
      storage: multer.memoryStorage(),
      limits: { fileSize: maxFileSize },
    }).any();
    this.urlencoded = express.urlencoded({ extended: false });
  }

  get hasFormContentType(): boolean {
    return isFormContentType(this.req.headers['content-type']);
  }

  readForm(): Promise<FormCollection> {
    this.consumed ??= this.bufferForm();
    return this.consumed;
  }

  streamForm(signal: AbortSignal): Promise<FormCollection> {
    this.consumed ??= this.pipeForm(signal);
    return this.consumed;
  }

  private async bufferForm(): Promise<FormCollection> {
    this.assertFormContentType();

    await runMiddleware(this.urlencoded, this.req, this.res);
    await runMiddleware(this.upload, this.req, this.res);

    const files = Array.isArray(this.req.files) ? this.req.files : [];
    return {
      fields: toFields(this.req.body),
      files: files.map((file) => ({
        fieldName: file.fieldname,
        fileName: file.originalname,
        contentType: file.mimetype,
        size: file.size,
        content: file.buffer,
      })),
    };
  }

  private async pipeForm(signal: AbortSignal): Promise<FormCollection> {
    this.assertFormContentType();
    return readFormStream(this.req, this.req.headers, signal);
  }

  private assertFormContentType() {
    if (!this.hasFormContentType) {
      const contentType = this.req.headers['content-type'] ?? '';
      throw new DetailedError(`Incorrect Content-Type: ${contentType}`, {
        contentType,
      });
    }
  }
}
