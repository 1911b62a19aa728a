/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { z } from 'zod';

import { claimTypes, claimValueTypes } from '../constants.js';
import type { Claim, Principal } from './types.js';

export const claimSchema = z.object({
  type: z.string(),
  value: z.string(),
  valueType: z.string(),
  issuer: z.string(),
});

export function createClaim(
  type: string,
  value: string,
  issuer: string,
  valueType: string = claimValueTypes.string,
): Claim {
  return { type, value, valueType, issuer };
}

export function createPrincipal(
  claims: readonly Claim[],
  authenticationType: string,
): Principal {
  return {
    name: claims.find((claim) => claim.type === claimTypes.name)?.value,
    authenticationType,
    claims: [...claims],
    roles: new Set(
      claims
        .filter((claim) => claim.type === claimTypes.role)
        .map((claim) => claim.value),
    ),
  };
}

export function isInRole(principal: Principal, role: string): boolean {
  return principal.roles.has(role);
}
