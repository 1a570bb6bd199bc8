/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { RuleTableStore } from '../rules/rule-table-store.js';
import { RuleHandler } from '../types.js';

export class HostRouter {
  private log: winston.Logger;
  private store: RuleTableStore;

  constructor({ log, store }: { log: winston.Logger; store: RuleTableStore }) {
    this.log = log.child({ class: this.constructor.name });
    this.store = store;
  }

  /**
   * Picks the handler for a Host header value. Undefined means not found:
   * either nothing matched or the first matching rule is inert.
   */
  route(hostHeader: string | undefined): RuleHandler | undefined {
    if (hostHeader === undefined || hostHeader === '') {
      this.log.debug('Request without host');
      return undefined;
    }

    const table = this.store.current();
    const rule = table.match(hostHeader);
    if (rule === undefined) {
      this.log.debug('No rule for host', { host: hostHeader });
      return undefined;
    }
    if (rule.handler === undefined) {
      this.log.debug('Host matched inert rule', {
        host: hostHeader,
        ruleHost: rule.host,
      });
    }
    return rule.handler;
  }
}
