/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { RequestHandler } from 'express';

/** One entry of the rule file, as written on disk. */
export interface RuleRecord {
  Host: string;
  Forward?: string;
  Serve?: string;
}

export interface ForwardHandler {
  readonly kind: 'forward';
  // Upstream authority, e.g. localhost:8080
  readonly upstream: string;
  readonly handle: RequestHandler;
}

export interface StaticHandler {
  readonly kind: 'serve';
  readonly root: string;
  readonly handle: RequestHandler;
}

export type RuleHandler = ForwardHandler | StaticHandler;

export interface Rule {
  readonly host: string;
  readonly forward: string;
  readonly serve: string;
  // Undefined for inert rules
  readonly handler: RuleHandler | undefined;
}

export interface HandlerFactories {
  forward(upstream: string): RequestHandler;
  serve(root: string): RequestHandler;
}

export type HostAuthorization =
  | { allowed: true }
  | { allowed: false; reason: string };
