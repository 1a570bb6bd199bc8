/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { setTimeout as sleep } from 'node:timers/promises';
import * as winston from 'winston';

import { errorMessage } from '../lib/error.js';
import { RuleLoader } from '../rules/rule-loader.js';
import { RuleTable } from '../rules/rule-table.js';
import { RuleTableStore } from '../rules/rule-table-store.js';

/** Polls the rule file and publishes a new table whenever it changes. */
export class RuleRefresher {
  // Dependencies
  private log: winston.Logger;
  private loader: RuleLoader;
  private store: RuleTableStore;

  private rulesFile: string;
  private pollIntervalMs: number;

  private abortController: AbortController | undefined;
  private running: Promise<void> | undefined;
  private lastError: string | undefined;

  constructor({
    log,
    loader,
    store,
    rulesFile,
    pollIntervalMs,
  }: {
    log: winston.Logger;
    loader: RuleLoader;
    store: RuleTableStore;
    rulesFile: string;
    pollIntervalMs: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.loader = loader;
    this.store = store;
    this.rulesFile = rulesFile;
    this.pollIntervalMs = pollIntervalMs;
  }

  get lastRefreshError(): string | undefined {
    return this.lastError;
  }

  /**
   * Runs one poll. Resolves to true when a new table was published. Errors
   * propagate; the store is left untouched when they do.
   */
  async refresh(): Promise<boolean> {
    let table: RuleTable | undefined;
    try {
      table = await this.loader.loadIfChanged(
        this.rulesFile,
        this.store.current(),
      );
    } catch (error) {
      this.lastError = errorMessage(error);
      throw error;
    }

    this.lastError = undefined;
    if (table === undefined) {
      return false;
    }

    this.store.publish(table);
    this.log.info('Published rule table', { rules: table.size });
    return true;
  }

  start(): void {
    if (this.running !== undefined) {
      return;
    }

    this.log.info('Starting rule refresher', {
      rulesFile: this.rulesFile,
      pollIntervalMs: this.pollIntervalMs,
    });
    const abortController = new AbortController();
    this.abortController = abortController;
    this.running = this.run(abortController.signal);
  }

  async stop(): Promise<void> {
    if (this.abortController === undefined || this.running === undefined) {
      return;
    }

    this.log.info('Stopping rule refresher');
    this.abortController.abort();
    await this.running;
    this.abortController = undefined;
    this.running = undefined;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await sleep(this.pollIntervalMs, undefined, { signal });
      } catch {
        // Aborted while sleeping
        return;
      }

      try {
        await this.refresh();
      } catch (error) {
        this.log.error('Failed to refresh rules, keeping previous table', {
          rulesFile: this.rulesFile,
          message: errorMessage(error),
        });
      }
    }
  }
}
