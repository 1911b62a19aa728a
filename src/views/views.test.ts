/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { escapeHtml, html } from './html.js';
import { createViewEngine, personView } from './views.js';

describe('html', () => {
  it('should escape interpolated strings', () => {
    const name = '<script>alert("x")</script>';

    assert.equal(
      html`<p>${name}</p>`.value,
      '<p>&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;</p>',
    );
  });

  it('should embed nested templates and arrays as is', () => {
    const items = ['a', 'b&c'].map((item) => html`<li>${item}</li>`);

    assert.equal(
      html`<ul>${items}</ul>`.value,
      '<ul><li>a</li><li>b&amp;c</li></ul>',
    );
  });

  it('should render nothing for null, undefined and false', () => {
    assert.equal(html`[${null}${undefined}${false}]`.value, '[]');
  });

  it('should escape single quotes', () => {
    assert.equal(escapeHtml("O'Brien"), 'O&#39;Brien');
  });
});

describe('views', () => {
  it('should render the Person view with its model', async () => {
    const rendered = await createViewEngine().render('Person', {
      Name: 'Razor',
    });

    assert.ok(rendered.startsWith('<!DOCTYPE html><html>'));
    assert.ok(rendered.includes('<h3>Hello, Razor</h3>'));
  });

  it('should reject a model of the wrong shape', async () => {
    await assert.rejects(createViewEngine().render('Person', { Name: 42 }));
  });

  it('should reject unknown views', async () => {
    await assert.rejects(createViewEngine().render('Missing', ''), {
      message: "The view 'Missing' was not found.",
    });
  });

  it('should link the upload form to both upload endpoints', async () => {
    const rendered = await createViewEngine().render('FileUpload', '');

    assert.ok(rendered.includes('action="/small-upload"'));
    assert.ok(rendered.includes('action="/large-upload"'));
  });

  it('should escape the in-code person view', () => {
    assert.ok(
      personView({ Name: 'Tom & Jerry' }).includes(
        '<h3>Hello, Tom &amp; Jerry</h3>',
      ),
    );
  });
});
