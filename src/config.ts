/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';

//
// HTTP server
//

// Routing listener port
export const PORT = env.positiveIntOrDefault('PORT', 80);

// Admin listener port (healthcheck and certificate authorization). The admin
// listener is not started when unset.
export const ADMIN_PORT = env.positiveIntOrUndefined('ADMIN_PORT');

//
// Rules
//

// Path to the JSON rule file, required at startup
export const RULES_FILE = env.varOrUndefined('RULES_FILE');

// How often the rule file is checked for changes
export const RULES_POLL_INTERVAL_MS = env.positiveIntOrDefault(
  'RULES_POLL_INTERVAL_MS',
  10_000,
);

//
// Certificates
//

// Label prefixes under which a rule host is also authorized for certificate
// issuance (e.g. www.example.com for a rule on example.com)
export const HOST_ALIAS_PREFIXES = env.listOrDefault('HOST_ALIAS_PREFIXES', [
  'www.',
]);
