/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { z } from 'zod';

import { DetailedError } from '../lib/error.js';
import { SafeHtml, renderDocument } from './html.js';

export interface ViewEngine {
  render(viewName: string, model: unknown): Promise<string>;
}

interface RegisteredView {
  schema: z.ZodTypeAny;
  render: (model: unknown) => SafeHtml;
}

/**
 * Named views with a schema describing their model. Models are validated
 * before rendering, so a view never sees data of the wrong shape.
 */
export class ViewRegistry implements ViewEngine {
  private views = new Map<string, RegisteredView>();

  register<S extends z.ZodTypeAny>(
    viewName: string,
    schema: S,
    view: (model: z.output<S>) => SafeHtml,
  ): this {
    this.views.set(viewName, {
      schema,
      render: (model) => view(schema.parse(model)),
    });
    return this;
  }

  has(viewName: string): boolean {
    return this.views.has(viewName);
  }

  async render(viewName: string, model: unknown): Promise<string> {
    const view = this.views.get(viewName);
    if (view === undefined) {
      throw new DetailedError(`The view '${viewName}' was not found.`, {
        registeredViews: [...this.views.keys()],
      });
    }
    return renderDocument(view.render(model));
  }
}
