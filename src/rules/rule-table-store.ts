/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { RuleTable } from './rule-table.js';

/**
 * Holds the one current rule table. Publishing replaces the reference in a
 * single assignment, so a reader that took a snapshot with current() keeps
 * seeing that whole table for as long as it holds it.
 */
export class RuleTableStore {
  private table: RuleTable;
  private loadedAt: Date;

  constructor(initial: RuleTable, loadedAt: Date = new Date()) {
    this.table = initial;
    this.loadedAt = loadedAt;
  }

  current(): RuleTable {
    return this.table;
  }

  get lastLoadedAt(): Date {
    return this.loadedAt;
  }

  publish(table: RuleTable, loadedAt: Date = new Date()): void {
    this.table = table;
    this.loadedAt = loadedAt;
  }
}
