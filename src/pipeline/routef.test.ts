/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { createTestContext } from '../../test/stubs.js';
import { finish, text } from './handlers.js';
import { compileRouteTemplate, routef } from './routef.js';

describe('compileRouteTemplate', () => {
  it('should parse an integer segment', () => {
    const template = compileRouteTemplate('/user/%i');

    assert.deepEqual(template.match('/user/42'), [42]);
    assert.deepEqual(template.match('/user/-7'), [-7]);
    assert.deepEqual(template.specifiers, ['i']);
  });

  it('should reject non-numeric and out of range integers', () => {
    const template = compileRouteTemplate('/user/%i');

    assert.equal(template.match('/user/abc'), undefined);
    assert.equal(template.match('/user/4.2'), undefined);
    assert.equal(template.match('/user/2147483648'), undefined);
    assert.deepEqual(template.match('/user/2147483647'), [2147483647]);
  });

  it('should require the whole path to match', () => {
    const template = compileRouteTemplate('/user/%i');

    assert.equal(template.match('/user/42/edit'), undefined);
    assert.equal(template.match('/api/user/42'), undefined);
  });

  it('should parse several typed segments', () => {
    const template = compileRouteTemplate('/cars/%s/%d/%f/%b/%c');

    assert.deepEqual(
      template.match('/cars/beetle/9007199254740993/1.5/TRUE/x'),
      ['beetle', 9007199254740993n, 1.5, true, 'x'],
    );
  });

  it('should decode escaped segments', () => {
    const template = compileRouteTemplate('/hello/%s');

    assert.deepEqual(template.match('/hello/John%20Doe'), ['John Doe']);
    assert.equal(template.match('/hello/%E0%A4%A'), undefined);
  });

  it('should not let a string segment span slashes', () => {
    const template = compileRouteTemplate('/hello/%s');

    assert.equal(template.match('/hello/a/b'), undefined);
  });

  it('should treat %% as a literal percent sign', () => {
    const template = compileRouteTemplate('/discount/%i%%');

    assert.deepEqual(template.match('/discount/15%'), [15]);
  });

  it('should escape regular expression characters in literals', () => {
    const template = compileRouteTemplate('/v1.0/%i');

    assert.deepEqual(template.match('/v1.0/3'), [3]);
    assert.equal(template.match('/v1x0/3'), undefined);
  });

  it('should throw on unknown specifiers', () => {
    assert.throws(() => compileRouteTemplate('/user/%x'), {
      message: "Invalid format specifier '%x' in route template '/user/%x'",
    });
  });
});

describe('routef', () => {
  it('should hand typed values to the handler factory', async () => {
    const handler = routef('/user/%i/%s', (id, name) =>
      text(`${id + 1}:${name.toUpperCase()}`),
    );

    const result = await handler(
      finish,
      createTestContext({ path: '/user/41/john' }),
    );

    assert.equal(result.kind === 'matched' && result.response.body, '42:JOHN');
  });

  it('should fall through when the path does not match', async () => {
    const handler = routef('/user/%i', (id) => text(`User ID: ${id}`));

    const result = await handler(
      finish,
      createTestContext({ path: '/user/john' }),
    );

    assert.equal(result.kind, 'unmatched');
  });
});
