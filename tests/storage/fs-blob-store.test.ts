import fsPromises, { readdir, rm, utimes } from 'fs/promises';
import path from 'path';
import { isRegistryError } from '../../src/domain/errors';
import { FsBlobStore } from '../../src/storage/fs-blob-store';
import { brokenSource, makeTempDir, readAll, rejection, removeDir, sha256, source } from '../helpers';

describe('FsBlobStore', () => {
  let root: string;
  let store: FsBlobStore;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new FsBlobStore({ root });
    await store.init();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  test('put stores bytes under their digest', async () => {
    const hash = sha256('hello world');
    const record = await store.put(source('hello ', 'world'));

    expect(record).toEqual({
      contentHash: hash,
      sizeBytes: 11,
      storagePath: path.join(root, 'blobs', hash.slice(0, 2), hash.slice(2, 4), hash),
    });
    const { stream, sizeBytes } = await store.get(hash);
    expect(sizeBytes).toBe(11);
    expect((await readAll(stream)).toString()).toBe('hello world');
  });

  test('identical content is stored once', async () => {
    await store.put(source('same bytes'));
    await store.put(source('same bytes'));

    const blobs = [];
    for await (const blob of store.list()) blobs.push(blob.contentHash);
    expect(blobs).toEqual([sha256('same bytes')]);
    expect(await store.listStaged()).toEqual([]);
  });

  test('dedup refreshes the modification time of the existing blob', async () => {
    const { storagePath, contentHash } = await store.put(source('old bytes'));
    const past = new Date('2000-01-01T00:00:00Z');
    await utimes(storagePath, past, past);

    await store.put(source('old bytes'));

    const found = await store.stat(contentHash);
    expect(found?.modifiedAt.getTime()).toBeGreaterThan(past.getTime());
  });

  test('staged bytes are invisible until promoted', async () => {
    const staged = await store.stage(source('draft'));
    expect(staged.contentHash).toBe(sha256('draft'));
    expect(staged.sizeBytes).toBe(5);
    expect(await store.has(staged.contentHash)).toBe(false);
    expect(await store.listStaged()).toHaveLength(1);

    await staged.promote();
    expect(await store.has(staged.contentHash)).toBe(true);
    expect(await store.listStaged()).toEqual([]);
  });

  test('discard removes the staged file and promote afterwards fails', async () => {
    const staged = await store.stage(source('draft'));
    await staged.discard();
    await staged.discard();
    expect(await readdir(path.join(root, 'tmp'))).toEqual([]);

    const err = await rejection(staged.promote());
    expect(isRegistryError(err, 'TransientStorageError')).toBe(true);
  });

  test('exceeding maxBytes is an integrity error and leaves nothing behind', async () => {
    const err = await rejection(store.stage(source('12345', '6789'), { maxBytes: 6 }));
    expect(isRegistryError(err, 'IntegrityError')).toBe(true);
    expect(err instanceof Error && err.message).toBe('Artifact is larger than the allowed 6 bytes');
    expect(await readdir(path.join(root, 'tmp'))).toEqual([]);
  });

  test('a dropped connection surfaces as Aborted', async () => {
    const err = await rejection(store.stage(brokenSource('partial')));
    expect(isRegistryError(err, 'Aborted')).toBe(true);
    expect(await readdir(path.join(root, 'tmp'))).toEqual([]);
  });

  test('an aborted signal surfaces as Aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const err = await rejection(store.stage(source('never written'), { signal: controller.signal }));
    expect(isRegistryError(err, 'Aborted')).toBe(true);
    expect(await readdir(path.join(root, 'tmp'))).toEqual([]);
  });

  test('a failed oversize write removes its staging file before rejecting', async () => {
    const big = Buffer.alloc(256 * 1024, 'x');
    const err = await rejection(store.stage(source(big, big), { maxBytes: 1024 }));
    expect(isRegistryError(err, 'IntegrityError')).toBe(true);
    expect(await store.listStaged()).toEqual([]);
  });

  test('a filesystem failure while staging is a transient storage error', async () => {
    await rm(path.join(root, 'tmp'), { recursive: true });
    const err = await rejection(store.stage(source('nowhere to go')));
    expect(isRegistryError(err, 'TransientStorageError')).toBe(true);
  });

  test('promotion syncs the shard directories it renamed into', async () => {
    const open = jest.spyOn(fsPromises, 'open');
    try {
      const { contentHash } = await store.put(source('durable'));
      const shardDir = path.join(root, 'blobs', contentHash.slice(0, 2), contentHash.slice(2, 4));

      const opened = open.mock.calls.map(([target]) => String(target));
      expect(opened[0]).toMatch(/\.partial$/);
      expect(opened.slice(1)).toEqual([shardDir, path.dirname(shardDir), path.join(root, 'blobs')]);
    } finally {
      open.mockRestore();
    }
  });

  test('missing blobs', async () => {
    const hash = sha256('absent');
    expect(await store.stat(hash)).toBeNull();
    expect(await store.has(hash)).toBe(false);
    expect(await store.delete(hash)).toBe(false);
    expect(isRegistryError(await rejection(store.get(hash)), 'NotFound')).toBe(true);
  });

  test('hash arguments are validated', async () => {
    expect(isRegistryError(await rejection(store.get('../etc/passwd')), 'Validation')).toBe(true);
  });

  test('delete is idempotent', async () => {
    const { contentHash } = await store.put(source('bye'));
    expect(await store.delete(contentHash)).toBe(true);
    expect(await store.delete(contentHash)).toBe(false);
  });

  test('verify re-hashes bytes on disk', async () => {
    const { contentHash } = await store.put(source('verify me'));
    expect(await store.verify(contentHash)).toEqual({ contentHash, sizeBytes: 9 });
  });

  test('removeStaged only touches staging files', async () => {
    await store.stage(source('left over'));
    const [staged] = await store.listStaged();
    expect(await store.removeStaged('../blobs')).toBe(false);
    expect(await store.removeStaged(staged.name)).toBe(true);
    expect(await store.removeStaged(staged.name)).toBe(false);
  });
});
