import { readdir } from 'fs/promises';
import { Server, request } from 'http';
import { AddressInfo } from 'net';
import path from 'path';
import { loadConfig } from '../../src/config';
import { AppContext, createApp, createAppContext } from '../../src/server';
import { captureLogs, makeTempDir, removeDir, sha256, waitFor } from '../helpers';

const FAR_FUTURE = new Date('2100-01-01T00:00:00.000Z');

interface HttpResult {
  status: number;
  headers: Headers;
  body: unknown;
  text: string;
}

describe('Package API', () => {
  let root: string;
  let ctx: AppContext;
  let server: Server;
  let baseUrl: string;

  async function call(method: string, path: string, init: { body?: Buffer | string; headers?: Record<string, string> } = {}): Promise<HttpResult> {
    const res = await fetch(`${baseUrl}${path}`, { method, body: init.body, headers: init.headers });
    const text = await res.text();
    let body: unknown = undefined;
    if (res.headers.get('content-type')?.includes('application/json')) body = JSON.parse(text);
    return { status: res.status, headers: res.headers, body, text };
  }

  function put(name: string, version: string, content: string, headers: Record<string, string> = {}) {
    return call('PUT', `/api/v1/packages/${name}/${version}`, {
      body: Buffer.from(content),
      headers: { 'content-type': 'application/octet-stream', 'x-content-sha256': sha256(content), ...headers },
    });
  }

  beforeAll(async () => {
    root = await makeTempDir();
    ctx = await createAppContext(
      loadConfig({ REGISTRY_STORAGE_PATH: root, REGISTRY_DATABASE_PATH: ':memory:' }),
    );
    const app = createApp(ctx);
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address: AddressInfo | string | null = server.address();
    const port = address && typeof address === 'object' ? address.port : 0;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await ctx.registry.close();
    await removeDir(root);
  });

  test('GET /health', async () => {
    const res = await call('GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', version: '0.1.0' });
  });

  test('PUT publishes, repeating it is idempotent', async () => {
    const first = await put('widget', '1.0.0', 'widget v1', { 'x-uploaded-by': 'alice' });
    expect(first.status).toBe(201);
    expect(first.body).toMatchObject({
      accepted: true,
      name: 'widget',
      version: '1.0.0',
      contentHash: sha256('widget v1'),
      sizeBytes: 9,
      created: true,
    });

    const again = await put('widget', '1.0.0', 'widget v1');
    expect(again.status).toBe(200);
    expect(again.body).toMatchObject({ created: false });
  });

  test('a client that disconnects mid-PUT leaves no reservation or staging file', async () => {
    const logs = captureLogs();
    try {
      const body = Buffer.alloc(64 * 1024, 'z');
      const client = request(`${baseUrl}/api/v1/packages/dropped/1.0.0`, {
        method: 'PUT',
        headers: {
          'content-type': 'application/octet-stream',
          'content-length': String(body.length),
          'x-content-sha256': sha256(body),
        },
      });
      const clientErrors: Error[] = [];
      client.on('error', (err) => clientErrors.push(err));
      client.write(body.subarray(0, 1024));

      await waitFor(async () => (await ctx.catalog.listPending(FAR_FUTURE)).length === 1);
      client.destroy();
      await waitFor(() => logs.entries.some((entry) => entry.message === 'Request error'));

      const logged = logs.entries.find((entry) => entry.message === 'Request error');
      expect(logged?.context).toMatchObject({ code: 'REGISTRY.ABORTED', status: 499 });
      expect(await ctx.catalog.listPending(FAR_FUTURE)).toEqual([]);
      expect(await readdir(path.join(root, 'tmp'))).toEqual([]);
    } finally {
      logs.restore();
    }
  });

  test('PUT with different bytes for a published version is 409', async () => {
    await put('gadget', '1.0.0', 'gadget v1');
    const res = await put('gadget', '1.0.0', 'gadget v1 changed');
    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({
      error: { code: 'REGISTRY.CONFLICT', retryable: false, suggestedFixes: [{ type: 'BUMP_VERSION' }] },
    });
  });

  test('PUT with a wrong checksum is 422', async () => {
    const res = await put('broken', '1.0.0', 'real bytes', { 'x-content-sha256': sha256('other bytes') });
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ error: { code: 'REGISTRY.INTEGRITY' } });
  });

  test('PUT without a checksum header is 400', async () => {
    const res = await call('PUT', '/api/v1/packages/nohash/1.0.0', { body: Buffer.from('x') });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: { code: 'VALIDATION.SCHEMA', message: 'x-content-sha256 header is required' },
    });
  });

  test('PUT with an invalid version is 400', async () => {
    const res = await put('badversion', 'not-a-version', 'x');
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { message: 'Invalid version: "not-a-version"' } });
  });

  test('GET streams the artifact with integrity headers', async () => {
    await put('reader', '2.1.0', 'reader bytes');
    const res = await call('GET', '/api/v1/packages/reader/2.1.0');
    expect(res.status).toBe(200);
    expect(res.text).toBe('reader bytes');
    expect(res.headers.get('content-type')).toBe('application/octet-stream');
    expect(res.headers.get('content-length')).toBe('12');
    expect(res.headers.get('x-content-sha256')).toBe(sha256('reader bytes'));
    expect(res.headers.get('x-resolved-version')).toBe('2.1.0');
  });

  test('GET resolves URL-encoded ranges', async () => {
    await put('ranged', '1.0.0', 'r1');
    await put('ranged', '1.3.0', 'r13');
    await put('ranged', '2.0.0', 'r2');

    const res = await call('GET', `/api/v1/packages/ranged/${encodeURIComponent('>=1.0.0 <2.0.0')}`);
    expect(res.status).toBe(200);
    expect(res.headers.get('x-resolved-version')).toBe('1.3.0');
    expect(res.text).toBe('r13');
  });

  test('GET of an unknown version is 404', async () => {
    const res = await call('GET', '/api/v1/packages/nothing/1.0.0');
    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ error: { code: 'REGISTRY.NOT_FOUND' } });
  });

  test('GET versions lists published versions newest first', async () => {
    await put('Multi.Version', '0.9.0', 'a');
    await put('multi-version', '0.10.0', 'b');
    const res = await call('GET', '/api/v1/packages/multi_version/versions');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ name: 'multi-version', versions: ['0.10.0', '0.9.0'] });
  });

  test('DELETE hides the version and records the reason', async () => {
    await put('doomed', '1.0.0', 'doomed bytes');
    const res = await call('DELETE', '/api/v1/packages/doomed/1.0.0', {
      body: JSON.stringify({ reason: 'security issue' }),
      headers: { 'content-type': 'application/json' },
    });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });

    expect((await call('GET', '/api/v1/packages/doomed/1.0.0')).status).toBe(404);
    const detail = await call('GET', '/api/v1/packages/doomed');
    expect(detail.body).toMatchObject({
      name: 'doomed',
      versions: [{ version: '1.0.0', state: 'deleted', deletedReason: 'security issue' }],
    });
    expect((await call('DELETE', '/api/v1/packages/doomed/1.0.0')).status).toBe(404);
  });

  test('GET package detail counts downloads', async () => {
    await put('popular', '1.0.0', 'popular bytes');
    await call('GET', '/api/v1/packages/popular/1.0.0');
    await call('GET', '/api/v1/packages/popular/latest');

    const res = await call('GET', '/api/v1/packages/popular');
    expect(res.body).toMatchObject({
      name: 'popular',
      totalDownloads: 2,
      versions: [{ version: '1.0.0', state: 'published', downloadCount: 2 }],
    });
  });

  test('GET /packages lists package summaries', async () => {
    await put('listed', '3.0.0', 'listed bytes');
    const res = await call('GET', '/api/v1/packages');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      packages: expect.arrayContaining([
        { name: 'listed', latestVersion: '3.0.0', versionCount: 1, totalDownloads: 0 },
      ]),
    });
  });
});
