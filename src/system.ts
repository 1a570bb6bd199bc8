/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { createHandlerFactories } from './handlers/index.js';
import { RuleLoader } from './rules/rule-loader.js';
import { RuleTableStore } from './rules/rule-table-store.js';
import { HostAuthorizer } from './routing/host-authorizer.js';
import { HostRouter } from './routing/host-router.js';
import { HandlerFactories } from './types.js';
import { RuleRefresher } from './workers/rule-refresher.js';

export interface RoutingSystem {
  store: RuleTableStore;
  refresher: RuleRefresher;
  router: HostRouter;
  authorizer: HostAuthorizer;
}

/**
 * Performs the initial rule load and wires the routing components around the
 * resulting table. Rejects when the first load fails; there is no valid state
 * to serve from without a table.
 */
export async function createRoutingSystem({
  log,
  rulesFile,
  pollIntervalMs,
  hostAliasPrefixes,
  factories = createHandlerFactories({ log }),
}: {
  log: winston.Logger;
  rulesFile: string;
  pollIntervalMs: number;
  hostAliasPrefixes?: readonly string[];
  factories?: HandlerFactories;
}): Promise<RoutingSystem> {
  const loader = new RuleLoader({ log, factories });

  const store = new RuleTableStore(await loader.load(rulesFile));
  const refresher = new RuleRefresher({
    log,
    loader,
    store,
    rulesFile,
    pollIntervalMs,
  });

  return {
    store,
    refresher,
    router: new HostRouter({ log, store }),
    authorizer: new HostAuthorizer({
      log,
      store,
      aliasPrefixes: hostAliasPrefixes,
    }),
  };
}
