/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express, { ErrorRequestHandler } from 'express';
import * as winston from 'winston';

import { errorMessage } from './lib/error.js';
import { createHostRoutingMiddleware } from './middleware/host-routing.js';
import { createAdminRouter } from './routes/admin.js';
import { RoutingSystem } from './system.js';

function createErrorHandler(log: winston.Logger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    log.error('Unhandled request error', {
      host: req.headers.host,
      url: req.originalUrl,
      message: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    if (res.headersSent) {
      next(error);
      return;
    }
    res.status(500).type('text/plain').send('Internal server error.\n');
  };
}

export function createRoutingApp({
  log,
  system,
}: {
  log: winston.Logger;
  system: RoutingSystem;
}): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(createHostRoutingMiddleware({ router: system.router }));
  app.use(createErrorHandler(log));
  return app;
}

export function createAdminApp({
  log,
  system,
}: {
  log: winston.Logger;
  system: RoutingSystem;
}): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(
    createAdminRouter({
      store: system.store,
      authorizer: system.authorizer,
      lastRefreshError: () => system.refresher.lastRefreshError,
    }),
  );
  app.use(createErrorHandler(log));
  return app;
}
