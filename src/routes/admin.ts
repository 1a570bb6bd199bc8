/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Request, Response, Router } from 'express';

import { RuleTableStore } from '../rules/rule-table-store.js';
import { HostAuthorizer } from '../routing/host-authorizer.js';

export function createAdminRouter({
  store,
  authorizer,
  lastRefreshError,
}: {
  store: RuleTableStore;
  authorizer: HostAuthorizer;
  lastRefreshError: () => string | undefined;
}): Router {
  const router = Router();

  router.get('/healthcheck', (_req: Request, res: Response) => {
    const table = store.current();
    res.json({
      status: 'ok',
      rules: table.size,
      inertRules: table.inertCount,
      modifiedAt: new Date(table.modifiedAtMs).toISOString(),
      lastLoadedAt: store.lastLoadedAt.toISOString(),
      lastRefreshError: lastRefreshError() ?? null,
    });
  });

  // Ask endpoint for on-demand certificate issuers
  router.get('/tls/authorize', (req: Request, res: Response) => {
    const domain = req.query.domain;
    if (typeof domain !== 'string' || domain === '') {
      res.status(400).json({ error: 'Missing domain query parameter' });
      return;
    }

    const authorization = authorizer.authorize(domain);
    res.status(authorization.allowed ? 200 : 403).json(authorization);
  });

  return router;
}
