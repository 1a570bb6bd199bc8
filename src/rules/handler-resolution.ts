/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { HandlerFactories, RuleHandler, RuleRecord } from '../types.js';

/**
 * Builds the handler for a rule. Forward is checked before Serve, so a rule
 * setting both forwards. Returns undefined for a rule with neither target.
 */
export function resolveRuleHandler(
  record: RuleRecord,
  factories: HandlerFactories,
): RuleHandler | undefined {
  const upstream = record.Forward ?? '';
  if (upstream !== '') {
    return {
      kind: 'forward',
      upstream,
      handle: factories.forward(upstream),
    };
  }

  const root = record.Serve ?? '';
  if (root !== '') {
    return {
      kind: 'serve',
      root,
      handle: factories.serve(root),
    };
  }

  return undefined;
}
