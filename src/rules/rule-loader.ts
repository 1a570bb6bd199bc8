/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import winston from 'winston';

import { RuleFileError, errorMessage } from '../lib/error.js';
import { HandlerFactories, Rule, RuleRecord } from '../types.js';
import { resolveRuleHandler } from './handler-resolution.js';
import { RuleTable } from './rule-table.js';

export class RuleLoader {
  private log: winston.Logger;
  private factories: HandlerFactories;

  constructor({
    log,
    factories,
  }: {
    log: winston.Logger;
    factories: HandlerFactories;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.factories = factories;
  }

  /**
   * Loads the rule file at path into a new table. Rejects with a RuleFileError
   * when the file cannot be read or decoded.
   */
  async load(path: string): Promise<RuleTable> {
    return this.parseTable(path, await this.modifiedAt(path));
  }

  /**
   * Like load, but resolves to undefined when the file has not been modified
   * after the previous table was loaded from it.
   */
  async loadIfChanged(
    path: string,
    previous: RuleTable,
  ): Promise<RuleTable | undefined> {
    const modifiedAtMs = await this.modifiedAt(path);
    if (modifiedAtMs <= previous.modifiedAtMs) {
      this.log.debug('Rule file unchanged, skipping reload', {
        path,
        modifiedAtMs,
      });
      return undefined;
    }
    return this.parseTable(path, modifiedAtMs);
  }

  private async modifiedAt(path: string): Promise<number> {
    try {
      const stats = await fs.promises.stat(path);
      return stats.mtimeMs;
    } catch (error) {
      throw new RuleFileError(path, errorMessage(error));
    }
  }

  private async parseTable(
    path: string,
    modifiedAtMs: number,
  ): Promise<RuleTable> {
    const log = this.log.child({ method: 'parseTable', path });

    let records: RuleRecord[];
    try {
      const raw = await fs.promises.readFile(path, 'utf-8');
      records = parseRuleRecords(JSON.parse(raw));
    } catch (error) {
      throw new RuleFileError(path, errorMessage(error));
    }

    const rules = records.map((record, index) =>
      this.buildRule(record, index, log),
    );
    const table = new RuleTable({ rules, modifiedAtMs });

    log.info('Loaded rules', {
      count: table.size,
      inertCount: table.inertCount,
      modifiedAt: new Date(modifiedAtMs).toISOString(),
    });

    return table;
  }

  private buildRule(
    record: RuleRecord,
    index: number,
    log: winston.Logger,
  ): Rule {
    const forward = record.Forward ?? '';
    const serve = record.Serve ?? '';

    if (forward !== '' && serve !== '') {
      log.warn('Rule sets both Forward and Serve, forwarding', {
        index,
        host: record.Host,
      });
    }

    const handler = resolveRuleHandler(record, this.factories);
    if (handler === undefined) {
      log.warn('Malformed rule has neither Forward nor Serve', {
        index,
        host: record.Host,
      });
    }

    return { host: record.Host, forward, serve, handler };
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(
  entry: Record<string, unknown>,
  field: 'Forward' | 'Serve',
  index: number,
): string | undefined {
  const value = entry[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`Rule ${index}: ${field} must be a string`);
  }
  return value;
}

/**
 * Validates decoded JSON as an ordered array of rule records. Fields other than
 * Host, Forward and Serve are ignored.
 */
export function parseRuleRecords(data: unknown): RuleRecord[] {
  if (!Array.isArray(data)) {
    throw new Error('Rule file must contain a JSON array');
  }

  return data.map((entry: unknown, index) => {
    if (!isObject(entry)) {
      throw new Error(`Rule ${index}: must be an object`);
    }

    const host = entry.Host;
    if (typeof host !== 'string' || host === '') {
      throw new Error(`Rule ${index}: Host must be a non-empty string`);
    }

    const record: RuleRecord = { Host: host };
    const forward = optionalString(entry, 'Forward', index);
    if (forward !== undefined) {
      record.Forward = forward;
    }
    const serve = optionalString(entry, 'Serve', index);
    if (serve !== undefined) {
      record.Serve = serve;
    }
    return record;
  });
}
