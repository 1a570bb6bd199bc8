/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Server } from 'node:http';

import * as config from './config.js';
import { errorMessage } from './lib/error.js';
import log from './log.js';
import { createAdminApp, createRoutingApp } from './server.js';
import { RoutingSystem, createRoutingSystem } from './system.js';

const rulesFile = config.RULES_FILE;
if (rulesFile === undefined) {
  log.error('RULES_FILE must be set');
  process.exit(1);
}

let system: RoutingSystem;
try {
  system = await createRoutingSystem({
    log,
    rulesFile,
    pollIntervalMs: config.RULES_POLL_INTERVAL_MS,
    hostAliasPrefixes: config.HOST_ALIAS_PREFIXES,
  });
} catch (error) {
  log.error('Initial rule load failed, refusing to start', {
    message: errorMessage(error),
  });
  process.exit(1);
}

system.refresher.start();

const servers: Server[] = [];

servers.push(
  createRoutingApp({ log, system }).listen(config.PORT, () => {
    log.info(`Listening on port ${config.PORT}`);
  }),
);

if (config.ADMIN_PORT !== undefined) {
  const adminPort = config.ADMIN_PORT;
  servers.push(
    createAdminApp({ log, system }).listen(adminPort, () => {
      log.info(`Admin listening on port ${adminPort}`);
    }),
  );
}

const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });

const shutdown = async (signal: string): Promise<void> => {
  log.info(`Received ${signal}, shutting down`);
  await system.refresher.stop();
  await Promise.all(servers.map(closeServer));
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM']) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error('Shutdown failed', { message: errorMessage(error) });
      process.exit(1);
    });
  });
}
