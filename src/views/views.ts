/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { z } from 'zod';

import { Person, personSchema } from '../models.js';
import { HtmlValue, SafeHtml, html, renderDocument } from './html.js';
import { ViewRegistry } from './view-engine.js';

export function layout(title: string, content: HtmlValue): SafeHtml {
  return html`<html>
  <head>
    <meta charset="utf-8" />
    <title>${title}</title>
  </head>
  <body>
    ${content}
  </body>
</html>`;
}

const partial = () => html`<p>Some partial text.</p>`;

/**
 * Person page built in code rather than through the view engine.
 */
export function personView(model: Person): string {
  return renderDocument(
    layout(
      'Sample App',
      html`<div><h3>Hello, ${model.Name}</h3></div>
    <div>${partial()}</div>`,
    ),
  );
}

function uploadForm(action: string, label: string) {
  return html`<form action="${action}" method="post" enctype="multipart/form-data">
      <fieldset>
        <legend>${label}</legend>
        <input type="file" name="files" multiple />
        <button type="submit">Upload</button>
      </fieldset>
    </form>`;
}

export function createViewEngine(): ViewRegistry {
  return new ViewRegistry()
    .register('Person', personSchema, (model) =>
      layout('Person', html`<h3>Hello, ${model.Name}</h3>`),
    )
    .register('Hello', z.string(), () =>
      layout('Hello', html`<h1>Hello World</h1>`),
    )
    .register('FileUpload', z.string(), () =>
      layout('File upload', [
        html`<h1>File upload</h1>`,
        uploadForm('/small-upload', 'Small files (buffered)'),
        uploadForm('/large-upload', 'Large files (streamed)'),
      ]),
    );
}
