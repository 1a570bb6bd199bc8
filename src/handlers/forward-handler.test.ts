/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { after, before, describe, it } from 'node:test';
import express from 'express';
import http, { IncomingHttpHeaders } from 'node:http';
import { default as request } from 'supertest';

import { createTestLogger } from '../../test/test-logger.js';
import {
  TestUpstream,
  startUpstream,
  unusedAuthority,
} from '../../test/upstream.js';
import { createForwardHandler, upstreamPath } from './forward-handler.js';

const log = createTestLogger({ suite: 'ForwardHandler' });

describe('upstreamPath', () => {
  it('should keep origin-form targets', () => {
    assert.equal(upstreamPath('/path?q=1'), '/path?q=1');
    assert.equal(upstreamPath('//double/slash'), '//double/slash');
  });

  it('should reduce absolute-form targets to path and query', () => {
    assert.equal(upstreamPath('http://example.com/page?x=1'), '/page?x=1');
    assert.equal(upstreamPath('http://example.com'), '/');
  });
});

describe('createForwardHandler', () => {
  let upstream: TestUpstream;
  let seen: { method?: string; url?: string; headers: IncomingHttpHeaders };
  let slowRequestReceived: () => void = () => undefined;
  let slowRequestClosed: () => void = () => undefined;

  before(async () => {
    upstream = await startUpstream((req, res) => {
      seen = { method: req.method, url: req.url, headers: req.headers };

      if (req.url === '/slow') {
        res.on('close', () => slowRequestClosed());
        slowRequestReceived();
        return;
      }

      if (req.url === '/redirect') {
        res.writeHead(302, { Location: 'https://elsewhere.example/' });
        res.end();
        return;
      }
      if (req.url === '/missing') {
        res.writeHead(404, { 'Content-Type': 'text/plain' });
        res.end('upstream missing');
        return;
      }

      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        res.writeHead(200, {
          'Content-Type': 'text/plain',
          'X-Upstream': 'yes',
        });
        res.end(chunks.length > 0 ? Buffer.concat(chunks) : 'OK');
      });
    });
  });

  after(async () => {
    await upstream.close();
  });

  function appFor(authority: string) {
    const app = express();
    app.use(createForwardHandler({ log, upstream: authority }));
    return app;
  }

  // Sends a raw request to the handler on a real listener, for targets and
  // framings supertest does not produce
  async function rawRequest(
    options: http.RequestOptions,
    body?: string,
  ): Promise<{ status?: number; text: string }> {
    const proxy = await startUpstream(appFor(upstream.authority));
    try {
      const [host, port] = proxy.authority.split(':');
      const res = await new Promise<http.IncomingMessage>((resolve, reject) => {
        const req = http.request(
          { ...options, host, port: Number(port) },
          resolve,
        );
        req.on('error', reject);
        req.end(body);
      });
      let text = '';
      res.setEncoding('utf8');
      for await (const chunk of res) {
        text += String(chunk);
      }
      return { status: res.statusCode, text };
    } finally {
      await proxy.close();
    }
  }

  it('should stream the upstream response back', async () => {
    const res = await request(appFor(upstream.authority))
      .get('/path?q=1')
      .set('Host', 'foo.example.com');

    assert.equal(res.status, 200);
    assert.equal(res.text, 'OK');
    assert.equal(res.headers['x-upstream'], 'yes');
    assert.equal(seen.method, 'GET');
    assert.equal(seen.url, '/path?q=1');
  });

  it('should keep the original Host and add forwarding headers', async () => {
    await request(appFor(upstream.authority))
      .get('/')
      .set('Host', 'foo.example.com:8080');

    assert.equal(seen.headers.host, 'foo.example.com:8080');
    assert.equal(seen.headers['x-forwarded-host'], 'foo.example.com:8080');
    assert.equal(typeof seen.headers['x-forwarded-for'], 'string');
  });

  it('should append to an existing X-Forwarded-For', async () => {
    await request(appFor(upstream.authority))
      .get('/')
      .set('Host', 'example.com')
      .set('X-Forwarded-For', '203.0.113.7');

    assert.match(
      String(seen.headers['x-forwarded-for']),
      /^203\.0\.113\.7, \S+$/,
    );
  });

  it('should forward request bodies', async () => {
    const res = await request(appFor(upstream.authority))
      .post('/echo')
      .set('Host', 'example.com')
      .set('Content-Type', 'text/plain')
      .send('hello upstream');

    assert.equal(res.status, 200);
    assert.equal(res.text, 'hello upstream');
    assert.equal(seen.method, 'POST');
  });

  it('should forward a body sent with a GET request', async () => {
    const res = await rawRequest(
      {
        method: 'GET',
        path: '/q',
        headers: { host: 'example.com', 'content-length': '5' },
      },
      'hello',
    );

    assert.equal(res.status, 200);
    assert.equal(res.text, 'hello');
    assert.equal(seen.method, 'GET');
    assert.equal(seen.headers['content-length'], '5');
  });

  it('should forward a chunked body', async () => {
    const res = await rawRequest(
      {
        method: 'PUT',
        path: '/chunked',
        headers: { host: 'example.com', 'transfer-encoding': 'chunked' },
      },
      'chunked body',
    );

    assert.equal(res.status, 200);
    assert.equal(res.text, 'chunked body');
    assert.equal(seen.headers['transfer-encoding'], 'chunked');
  });

  it('should forward absolute-form request targets by path', async () => {
    const res = await rawRequest({
      method: 'GET',
      path: 'http://example.com/page?x=1',
      headers: { host: 'example.com' },
    });

    assert.equal(res.status, 200);
    assert.equal(res.text, 'OK');
    assert.equal(seen.url, '/page?x=1');
    assert.equal(seen.headers.host, 'example.com');
  });

  it('should abort the upstream request when the client disconnects', async () => {
    const received = new Promise<void>((resolve) => {
      slowRequestReceived = resolve;
    });
    const closed = new Promise<void>((resolve) => {
      slowRequestClosed = resolve;
    });
    const proxy = await startUpstream(appFor(upstream.authority));
    try {
      const [host, port] = proxy.authority.split(':');
      const req = http.request({
        host,
        port: Number(port),
        path: '/slow',
        headers: { host: 'example.com' },
      });
      req.on('error', () => undefined);
      req.end();

      await received;
      req.destroy();
      await closed;
    } finally {
      await proxy.close();
    }
  });

  it('should pass redirects through without following them', async () => {
    const res = await request(appFor(upstream.authority))
      .get('/redirect')
      .set('Host', 'example.com');

    assert.equal(res.status, 302);
    assert.equal(res.headers.location, 'https://elsewhere.example/');
  });

  it('should pass upstream error statuses through', async () => {
    const res = await request(appFor(upstream.authority))
      .get('/missing')
      .set('Host', 'example.com');

    assert.equal(res.status, 404);
    assert.equal(res.text, 'upstream missing');
  });

  it('should answer 502 when the upstream is unreachable', async () => {
    const res = await request(appFor(await unusedAuthority()))
      .get('/')
      .set('Host', 'example.com');

    assert.equal(res.status, 502);
    assert.equal(res.text, 'Bad Gateway');
  });
});
