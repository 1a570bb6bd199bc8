/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express, { RequestHandler, Router } from 'express';
import serveIndex from 'serve-index';

export const STATIC_NOT_FOUND_BODY = '404 page not found\n';

/**
 * Serves files under root. Directories are answered with their index.html when
 * present and with a listing otherwise.
 */
export function createStaticHandler({ root }: { root: string }): RequestHandler {
  const router = Router();

  router.use(
    express.static(root, {
      dotfiles: 'ignore',
      index: 'index.html',
      setHeaders: (res) => {
        res.set('X-Content-Type-Options', 'nosniff');
      },
    }),
  );
  router.use(serveIndex(root, { icons: false, view: 'tiles' }));
  router.use((_req, res) => {
    res.status(404).type('text/plain').send(STATIC_NOT_FOUND_BODY);
  });

  return router;
}
