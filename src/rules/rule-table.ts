/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Rule } from '../types.js';

/**
 * Strips a port from a Host header value. Everything from the first ':' on is
 * dropped.
 */
export function normalizeHost(hostHeader: string): string {
  const index = hostHeader.indexOf(':');
  return index >= 0 ? hostHeader.slice(0, index) : hostHeader;
}

/**
 * True when host is the rule host itself or a dot-delimited subdomain of it.
 * 'evilexample.com' does not match 'example.com'.
 */
export function hostMatches(host: string, ruleHost: string): boolean {
  return host === ruleHost || host.endsWith('.' + ruleHost);
}

/**
 * Ordered, immutable snapshot of the resolved rules loaded from one version of
 * the rule file. A new table is built for every reload; tables are never
 * modified after construction.
 */
export class RuleTable {
  readonly rules: readonly Rule[];
  // mtime of the rule file this table was parsed from
  readonly modifiedAtMs: number;

  constructor({
    rules,
    modifiedAtMs,
  }: {
    rules: readonly Rule[];
    modifiedAtMs: number;
  }) {
    this.rules = Object.freeze(rules.map((rule) => Object.freeze({ ...rule })));
    this.modifiedAtMs = modifiedAtMs;
    Object.freeze(this);
  }

  get size(): number {
    return this.rules.length;
  }

  get inertCount(): number {
    return this.rules.filter((rule) => rule.handler === undefined).length;
  }

  /**
   * Returns the first rule whose host matches, inert or not. Callers must not
   * continue past an inert match.
   */
  match(host: string): Rule | undefined {
    const normalized = normalizeHost(host);
    return this.rules.find((rule) => hostMatches(normalized, rule.host));
  }

  /** Exact host lookup, no subdomain matching. */
  hasHost(host: string): boolean {
    return this.rules.some((rule) => rule.host === host);
  }
}
