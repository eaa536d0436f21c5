import { test } from 'node:test';
import assert from 'node:assert/strict';
import http from 'node:http';
import { AddressInfo } from 'node:net';
import { FLUSH_PKT, encodeFetch, encodeLsRefs, encodePktLine } from '@packload/pkt-line';
import { GitUploadPackClient } from '../src/index';

type RecordedRequest = {
  method?: string;
  url?: string;
  headers: http.IncomingHttpHeaders;
  body: string;
};

const MAIN_OID = 'a'.repeat(40);

const closeServer = (server: http.Server) => {
  server.closeIdleConnections?.();
  server.closeAllConnections?.();
  return new Promise<void>((resolve, reject) =>
    server.close((error) => (error ? reject(error) : resolve())),
  );
};

const startStubProxy = async () => {
  const requests: RecordedRequest[] = [];
  let connections = 0;
  const stalled = new Set<http.ServerResponse>();

  const server = http.createServer(async (req, res) => {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    requests.push({
      method: req.method,
      url: req.url,
      headers: req.headers,
      body: Buffer.concat(chunks).toString('utf8'),
    });

    if (req.url === '/repo/ok/git-upload-pack') {
      res.writeHead(200, { 'x-served-by': 'cache-1' });
      res.end(encodePktLine(`${MAIN_OID} refs/heads/main\n`) + FLUSH_PKT);
      return;
    }
    if (req.url === '/repo/anonymous/git-upload-pack') {
      res.writeHead(200);
      res.end('0000');
      return;
    }
    if (req.url === '/repo/empty/git-upload-pack') {
      res.writeHead(200, { 'x-served-by': 'cache-2' });
      res.end();
      return;
    }
    if (req.url === '/repo/overloaded/git-upload-pack') {
      res.writeHead(503, { 'x-served-by': 'cache-3' });
      res.end('busy');
      return;
    }
    if (req.url === '/repo/slow/git-upload-pack') {
      stalled.add(res);
      return;
    }
    res.writeHead(404);
    res.end('not found');
  });
  server.on('connection', () => {
    connections += 1;
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const { port } = server.address() as AddressInfo;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    requests,
    connectionCount: () => connections,
    close: async () => {
      for (const res of stalled) {
        res.destroy();
      }
      await closeServer(server);
    },
  };
};

test('lsRefs posts the protocol v2 request and reports the serving node', async () => {
  const stub = await startStubProxy();
  const client = new GitUploadPackClient({ baseUrl: stub.baseUrl });
  try {
    const result = await client.lsRefs('repo/ok');

    assert.equal(result.success, true);
    assert.equal(result.servedBy, 'cache-1');
    assert.equal(result.error, '');
    assert.ok(result.durationMs >= 0);
    assert.deepEqual(result.refs, [{ oid: MAIN_OID, name: 'refs/heads/main' }]);

    const [recorded] = stub.requests;
    assert.equal(recorded.method, 'POST');
    assert.equal(recorded.url, '/repo/ok/git-upload-pack');
    assert.equal(recorded.headers['content-type'], 'application/x-git-upload-pack-request');
    assert.equal(recorded.headers['git-protocol'], 'version=2');
    assert.equal(recorded.headers.accept, 'application/x-git-upload-pack-result');
    assert.equal(recorded.body, encodeLsRefs());
  } finally {
    await client.close();
    await stub.close();
  }
});

test('fetch sends the want line for the given ref', async () => {
  const stub = await startStubProxy();
  const client = new GitUploadPackClient({ baseUrl: stub.baseUrl });
  try {
    const result = await client.fetch('repo/ok', MAIN_OID);
    assert.equal(result.success, true);
    assert.equal(stub.requests[0].body, encodeFetch(MAIN_OID));
  } finally {
    await client.close();
    await stub.close();
  }
});

test('a missing served-by header yields an empty string', async () => {
  const stub = await startStubProxy();
  const client = new GitUploadPackClient({ baseUrl: stub.baseUrl });
  try {
    const result = await client.lsRefs('repo/anonymous');
    assert.equal(result.success, true);
    assert.equal(result.servedBy, '');
    assert.deepEqual(result.refs, []);
  } finally {
    await client.close();
    await stub.close();
  }
});

test('non-200 responses fail with the status code', async () => {
  const stub = await startStubProxy();
  const client = new GitUploadPackClient({ baseUrl: stub.baseUrl });
  try {
    const result = await client.fetch('repo/unknown', MAIN_OID);
    assert.equal(result.success, false);
    assert.equal(result.error, 'HTTP 404');
    assert.ok(result.durationMs >= 0);
  } finally {
    await client.close();
    await stub.close();
  }
});

test('an error status drops the served-by header', async () => {
  const stub = await startStubProxy();
  const client = new GitUploadPackClient({ baseUrl: stub.baseUrl });
  try {
    const result = await client.lsRefs('repo/overloaded');
    assert.equal(result.success, false);
    assert.equal(result.error, 'HTTP 503');
    assert.equal(result.servedBy, '');
    assert.deepEqual(result.refs, []);
  } finally {
    await client.close();
    await stub.close();
  }
});

test('empty 200 responses fail without naming a backend', async () => {
  const stub = await startStubProxy();
  const client = new GitUploadPackClient({ baseUrl: stub.baseUrl });
  try {
    const lsRefs = await client.lsRefs('repo/empty');
    assert.equal(lsRefs.success, false);
    assert.equal(lsRefs.error, 'Empty response');
    assert.equal(lsRefs.servedBy, '');

    const fetched = await client.fetch('repo/empty', MAIN_OID);
    assert.equal(fetched.success, false);
    assert.equal(fetched.error, 'Empty response');
    assert.equal(fetched.servedBy, '');
  } finally {
    await client.close();
    await stub.close();
  }
});

test('a stalled response times out as a failed result', async () => {
  const stub = await startStubProxy();
  const client = new GitUploadPackClient({ baseUrl: stub.baseUrl, timeoutMs: 50 });
  try {
    const result = await client.lsRefs('repo/slow');
    assert.equal(result.success, false);
    assert.equal(result.error, 'Timeout after 50ms');
    assert.ok(result.durationMs >= 40);
  } finally {
    await client.close();
    await stub.close();
  }
});

test('connection failures are reported with the transport message', async () => {
  const stub = await startStubProxy();
  const baseUrl = stub.baseUrl;
  await stub.close();

  const client = new GitUploadPackClient({ baseUrl });
  try {
    const result = await client.lsRefs('repo/ok');
    assert.equal(result.success, false);
    assert.equal(result.servedBy, '');
    assert.match(result.error, /ECONNREFUSED/);
  } finally {
    await client.close();
  }
});

test('sequential requests reuse one pooled connection', async () => {
  const stub = await startStubProxy();
  const client = new GitUploadPackClient({ baseUrl: stub.baseUrl });
  try {
    await client.lsRefs('repo/ok');
    await client.fetch('repo/ok', MAIN_OID);
    await client.lsRefs('repo/ok');
    assert.equal(stub.requests.length, 3);
    assert.equal(stub.connectionCount(), 1);
  } finally {
    await client.close();
    await stub.close();
  }
});

test('buildUrl collapses slashes between base and repository path', async () => {
  const client = new GitUploadPackClient({ baseUrl: 'http://proxy.local:8080/' });
  assert.equal(
    client.buildUrl('/github.com/golang/go'),
    'http://proxy.local:8080/github.com/golang/go/git-upload-pack',
  );
  await client.close();
});
