/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import { PassThrough } from 'node:stream';

import { AbortError } from '../lib/error.js';
import {
  isFormContentType,
  mediaType,
  readFormStream,
  toFields,
} from './forms.js';

const headers = { 'content-type': 'multipart/form-data; boundary=XX' };

const fileHeader =
  '--XX\r\n' +
  'Content-Disposition: form-data; name="files"; filename="a.txt"\r\n' +
  'Content-Type: text/plain\r\n\r\n';

const nextTurn = () => new Promise((resolve) => setImmediate(resolve));

describe('form helpers', () => {
  it('should extract the media type', () => {
    assert.equal(
      mediaType('Multipart/Form-Data; boundary=XX'),
      'multipart/form-data',
    );
    assert.equal(mediaType(undefined), '');
  });

  it('should recognise form content types only', () => {
    assert.equal(isFormContentType('application/x-www-form-urlencoded'), true);
    assert.equal(isFormContentType('multipart/form-data; boundary=XX'), true);
    assert.equal(isFormContentType('application/json'), false);
    assert.equal(isFormContentType(undefined), false);
  });

  it('should keep the first value of repeated fields', () => {
    assert.deepEqual(toFields({ a: 'x', b: ['y', 'z'], c: 3 }), {
      a: 'x',
      b: 'y',
    });
  });
});

describe('readFormStream', () => {
  it('should read fields and count file bytes', async () => {
    const body = new PassThrough();
    const read = readFormStream(body, headers, new AbortController().signal);

    body.end(
      '--XX\r\n' +
        'Content-Disposition: form-data; name="description"\r\n\r\n' +
        'one file\r\n' +
        fileHeader +
        'hello\r\n' +
        '--XX--\r\n',
    );

    assert.deepEqual(await read, {
      fields: { description: 'one file' },
      files: [
        {
          fieldName: 'files',
          fileName: 'a.txt',
          contentType: 'text/plain',
          size: 5,
        },
      ],
    });
  });

  it('should reject without reading when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const body = new PassThrough();

    await assert.rejects(readFormStream(body, headers, controller.signal), {
      name: 'AbortError',
      message: 'Form read aborted before it started',
    });
    assert.equal(body.listenerCount('data'), 0);
  });

  it('should reject with AbortError when aborted mid-file', async () => {
    const controller = new AbortController();
    const body = new PassThrough();
    const read = readFormStream(body, headers, controller.signal);

    body.write(`${fileHeader}hel`);
    await nextTurn();
    controller.abort();

    await assert.rejects(read, (error: unknown) => {
      assert.ok(error instanceof AbortError);
      assert.equal(error.message, 'Form read aborted');
      assert.equal(error.fileCount, 1);
      return true;
    });
    assert.equal(body.listenerCount('data'), 0);
  });

  it('should reject when the body ends inside a file', async () => {
    const body = new PassThrough();
    const read = readFormStream(body, headers, new AbortController().signal);

    body.end(`${fileHeader}hello`);

    await assert.rejects(read, { message: 'Unexpected end of form' });
  });

  it('should reject a multipart body without a boundary', async () => {
    await assert.rejects(
      readFormStream(
        new PassThrough(),
        { 'content-type': 'multipart/form-data' },
        new AbortController().signal,
      ),
      { message: 'Multipart: Boundary not found' },
    );
  });
});
