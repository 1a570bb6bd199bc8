/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { RuleTableStore } from '../rules/rule-table-store.js';
import { HostAuthorization } from '../types.js';

export const UNRECOGNIZED_HOST = 'unrecognized host';

/**
 * Decides whether a certificate may be obtained for a hostname. Only rule hosts
 * themselves and their alias forms (e.g. www.<host>) are allowed; subdomains
 * that route through suffix matching are not.
 */
export class HostAuthorizer {
  private log: winston.Logger;
  private store: RuleTableStore;
  private aliasPrefixes: readonly string[];

  constructor({
    log,
    store,
    aliasPrefixes = ['www.'],
  }: {
    log: winston.Logger;
    store: RuleTableStore;
    aliasPrefixes?: readonly string[];
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.store = store;
    this.aliasPrefixes = aliasPrefixes;
  }

  authorize(hostname: string): HostAuthorization {
    const table = this.store.current();

    if (table.hasHost(hostname)) {
      return { allowed: true };
    }

    for (const prefix of this.aliasPrefixes) {
      if (
        hostname.startsWith(prefix) &&
        table.hasHost(hostname.slice(prefix.length))
      ) {
        return { allowed: true };
      }
    }

    this.log.info('Denied certificate for unrecognized host', { hostname });
    return { allowed: false, reason: UNRECOGNIZED_HOST };
  }
}
