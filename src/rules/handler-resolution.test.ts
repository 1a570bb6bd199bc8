/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it, mock } from 'node:test';

import { HandlerFactories } from '../types.js';
import { resolveRuleHandler } from './handler-resolution.js';

describe('resolveRuleHandler', () => {
  const forwardHandle = () => undefined;
  const serveHandle = () => undefined;

  function createFactories() {
    return {
      forward: mock.fn<HandlerFactories['forward']>(() => forwardHandle),
      serve: mock.fn<HandlerFactories['serve']>(() => serveHandle),
    };
  }

  it('should build a forwarding handler', () => {
    const factories = createFactories();
    const handler = resolveRuleHandler(
      { Host: 'example.org', Forward: 'localhost:8080' },
      factories,
    );

    assert.deepEqual(handler, {
      kind: 'forward',
      upstream: 'localhost:8080',
      handle: forwardHandle,
    });
    assert.deepEqual(factories.forward.mock.calls[0].arguments, [
      'localhost:8080',
    ]);
    assert.equal(factories.serve.mock.callCount(), 0);
  });

  it('should build a static handler', () => {
    const factories = createFactories();
    const handler = resolveRuleHandler(
      { Host: 'example.com', Serve: '/var/www' },
      factories,
    );

    assert.deepEqual(handler, {
      kind: 'serve',
      root: '/var/www',
      handle: serveHandle,
    });
    assert.equal(factories.forward.mock.callCount(), 0);
  });

  it('should prefer Forward when both targets are set', () => {
    const factories = createFactories();
    const handler = resolveRuleHandler(
      { Host: 'example.com', Forward: 'localhost:8080', Serve: '/var/www' },
      factories,
    );

    assert.equal(handler?.kind, 'forward');
    assert.equal(factories.serve.mock.callCount(), 0);
  });

  it('should return undefined when neither target is set', () => {
    const factories = createFactories();

    assert.equal(resolveRuleHandler({ Host: 'example.com' }, factories), undefined);
    assert.equal(
      resolveRuleHandler({ Host: 'example.com', Forward: '', Serve: '' }, factories),
      undefined,
    );
    assert.equal(factories.forward.mock.callCount(), 0);
    assert.equal(factories.serve.mock.callCount(), 0);
  });
});
