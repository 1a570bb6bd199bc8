/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { HandlerFactories } from '../types.js';
import { createForwardHandler } from './forward-handler.js';
import { createStaticHandler } from './static-handler.js';

export function createHandlerFactories({
  log,
}: {
  log: winston.Logger;
}): HandlerFactories {
  return {
    forward: (upstream) => createForwardHandler({ log, upstream }),
    serve: (root) => createStaticHandler({ root }),
  };
}
