/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { z } from 'zod';

export const personSchema = z.object({
  Name: z.string(),
});

export type Person = z.infer<typeof personSchema>;

// Earliest representable date, used for a missing `Built` field
export const MIN_DATE = new Date('0001-01-01T00:00:00.000Z');

/**
 * Posted car. Missing fields bind to empty defaults instead of failing, values
 * that are present must parse.
 */
export const carSchema = z.object({
  Name: z.string().default(''),
  Make: z.string().default(''),
  Wheels: z.coerce.number().int().default(0),
  Built: z.coerce.date().default(MIN_DATE),
});

export type Car = z.infer<typeof carSchema>;
