/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import axios, { AxiosResponse } from 'axios';
import { Request, RequestHandler, Response } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import { Readable, pipeline } from 'node:stream';
import winston from 'winston';

import { errorMessage } from '../lib/error.js';

// Connection-scoped headers that must not be passed through a proxy
const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

// A request carries a body when it is framed by a length or chunked encoding,
// whatever its method
export function hasRequestBody(req: Request): boolean {
  if (req.headers['transfer-encoding'] !== undefined) {
    return true;
  }
  const length = Number(req.headers['content-length'] ?? 0);
  return Number.isFinite(length) && length > 0;
}

// Origin-form targets pass through as they are. Absolute-form targets
// (GET http://example.com/page) keep only their path and query.
export function upstreamPath(target: string): string {
  if (target.startsWith('/') || !URL.canParse(target)) {
    return target;
  }
  const url = new URL(target);
  return `${url.pathname}${url.search}`;
}

export function buildUpstreamHeaders(
  req: Request,
): Record<string, string | string[]> {
  const headers: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined || HOP_BY_HOP_HEADERS.has(name)) {
      continue;
    }
    headers[name] = value;
  }
  // The inbound framing is dropped with the hop-by-hop headers above; a
  // chunked body is re-chunked to the upstream.
  if (req.headers['transfer-encoding'] !== undefined) {
    headers['transfer-encoding'] = 'chunked';
  }

  const clientIp = req.socket.remoteAddress;
  if (clientIp !== undefined) {
    const prior = req.headers['x-forwarded-for'];
    headers['x-forwarded-for'] =
      prior !== undefined ? `${prior}, ${clientIp}` : clientIp;
  }
  if (req.headers.host !== undefined) {
    headers['x-forwarded-host'] = req.headers.host;
  }

  return headers;
}

function copyResponseHeaders(headers: object, res: Response): void {
  for (const [name, value] of Object.entries(headers)) {
    if (HOP_BY_HOP_HEADERS.has(name.toLowerCase())) {
      continue;
    }
    if (Array.isArray(value)) {
      res.setHeader(name, value.map(String));
    } else if (typeof value === 'string' || typeof value === 'number') {
      res.setHeader(name, value);
    }
  }
}

/**
 * Forwards requests to an upstream HTTP authority (host:port), streaming the
 * request body up and the response back. The original Host header is kept.
 * Redirects and error statuses from the upstream are passed to the client
 * unchanged.
 */
export function createForwardHandler({
  log,
  upstream,
}: {
  log: winston.Logger;
  upstream: string;
}): RequestHandler {
  const handlerLog = log.child({ handler: 'forward', upstream });

  return asyncHandler(async (req: Request, res: Response) => {
    // Abandon the upstream request if the client goes away before it answers
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.headersSent) {
        controller.abort();
      }
    });

    let upstreamResponse: AxiosResponse<Readable>;
    try {
      upstreamResponse = await axios.request<Readable>({
        method: req.method,
        url: `http://${upstream}${upstreamPath(req.originalUrl)}`,
        headers: buildUpstreamHeaders(req),
        data: hasRequestBody(req) ? req : undefined,
        signal: controller.signal,
        responseType: 'stream',
        decompress: false,
        maxRedirects: 0,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        proxy: false,
        validateStatus: () => true,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        handlerLog.debug('Client disconnected before upstream response', {
          method: req.method,
          url: req.originalUrl,
        });
        return;
      }
      handlerLog.error('Upstream request failed', {
        method: req.method,
        url: req.originalUrl,
        message: errorMessage(error),
      });
      if (!res.headersSent) {
        res.sendStatus(502);
      }
      return;
    }

    res.status(upstreamResponse.status);
    copyResponseHeaders(upstreamResponse.headers, res);
    pipeline(upstreamResponse.data, res, (error) => {
      if (error) {
        handlerLog.warn('Upstream response stream failed', {
          url: req.originalUrl,
          message: error.message,
        });
      }
    });
  });
}
