/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Handler } from 'express';

import { HostRouter } from '../routing/host-router.js';

export const NOT_FOUND_BODY = 'Not found.\n';

/**
 * Dispatches each request on its Host header. The handler runs after routing
 * has returned, so a slow upstream or disk never holds up rule lookups.
 */
export const createHostRoutingMiddleware = ({
  router,
}: {
  router: HostRouter;
}): Handler => {
  return (req, res, next) => {
    const handler = router.route(req.headers.host);
    if (handler === undefined) {
      res.status(404).type('text/plain').send(NOT_FOUND_BODY);
      return;
    }

    handler.handle(req, res, next);
  };
};
