/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Server } from 'node:http';

import * as config from './config.js';
import log from './log.js';
import { createServer } from './server.js';
import * as system from './system.js';

const app = createServer({
  log,
  routes: system.routes,
  authentication: system.authentication,
  views: system.views,
  maxUploadFileSize: config.MAX_UPLOAD_FILE_SIZE_BYTES,
  trustProxy: config.TRUST_PROXY,
});

const server: Server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`);
});

const shutdown = (signal: string) => {
  log.info('Shutting down', { signal });
  server.close((error) => {
    if (error !== undefined) {
      log.error('Error while closing server', { message: error.message });
      process.exitCode = 1;
    }
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

export { server };
