/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

declare global {
  namespace Express {
    interface Request {
      // Set by the abort-signal middleware
      signal?: AbortSignal;
    }
  }
}

export {};
