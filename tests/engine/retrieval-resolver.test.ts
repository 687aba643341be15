import { writeFile } from 'fs/promises';
import { isRegistryError } from '../../src/domain/errors';
import { LogLevel } from '../../src/logger';
import { RetrievalResolver } from '../../src/engine/retrieval-resolver';
import { UploadCoordinator } from '../../src/engine/upload-coordinator';
import {
  ManualClock,
  StoreFixture,
  captureLogs,
  createStores,
  readAll,
  rejection,
  sha256,
  source,
} from '../helpers';

describe('RetrievalResolver', () => {
  let stores: StoreFixture;
  let clock: ManualClock;
  let coordinator: UploadCoordinator;
  let resolver: RetrievalResolver;

  async function publish(name: string, version: string, body: string) {
    return coordinator.publish({
      name,
      version,
      source: source(body),
      declaredHash: sha256(body),
      declaredSize: Buffer.byteLength(body),
    });
  }

  beforeEach(async () => {
    stores = await createStores();
    clock = new ManualClock();
    coordinator = new UploadCoordinator(stores.catalog, stores.blobs, { clock });
    resolver = new RetrievalResolver(stores.catalog, stores.blobs, { clock });
  });

  afterEach(async () => {
    await stores.cleanup();
  });

  test('streams the published bytes and records the download', async () => {
    await publish('pkg', '1.0.0', 'payload-1');

    const result = await resolver.fetch('PKG', '1.0.0', { userAgent: 'test-agent/1.0' });
    expect(result.contentHash).toBe(sha256('payload-1'));
    expect(result.sizeBytes).toBe(9);
    expect((await readAll(result.stream)).toString()).toBe('payload-1');

    const detail = await stores.catalog.getPackage('pkg');
    expect(detail?.totalDownloads).toBe(1);
  });

  test('resolves ranges to the highest published version', async () => {
    await publish('pkg', '1.0.0', 'one');
    await publish('pkg', '1.5.0', 'one-five');
    await publish('pkg', '2.0.0', 'two');

    const result = await resolver.fetch('pkg', '^1.0.0');
    expect(result.entry.version).toBe('1.5.0');
    expect((await readAll(result.stream)).toString()).toBe('one-five');
  });

  test('unknown packages and versions are NotFound', async () => {
    await publish('pkg', '1.0.0', 'one');
    expect(isRegistryError(await rejection(resolver.fetch('other', '1.0.0')), 'NotFound')).toBe(true);
    expect(isRegistryError(await rejection(resolver.fetch('pkg', '9.9.9')), 'NotFound')).toBe(true);
  });

  test('same-length corruption fails the stream and is logged', async () => {
    const published = await publish('pkg', '1.0.0', 'original');
    await writeFile(stores.blobs.blobPath(published.contentHash), 'tampered');
    const logs = captureLogs();

    try {
      const result = await resolver.fetch('pkg', '1.0.0');
      const err = await rejection(readAll(result.stream));
      expect(isRegistryError(err, 'IntegrityError')).toBe(true);
      expect(logs.entries.filter((e) => e.level === LogLevel.Error).map((e) => e.message)).toEqual([
        'Integrity check failed on read',
      ]);
    } finally {
      logs.restore();
    }
    expect((await stores.catalog.getPackage('pkg'))?.totalDownloads).toBe(0);
  });

  test('a size mismatch is detected before streaming', async () => {
    const published = await publish('pkg', '1.0.0', 'original');
    await writeFile(stores.blobs.blobPath(published.contentHash), 'short');

    const err = await rejection(resolver.fetch('pkg', '1.0.0'));
    expect(isRegistryError(err, 'IntegrityError')).toBe(true);
  });

  test('eager verification rejects corrupt blobs up front', async () => {
    const published = await publish('pkg', '1.0.0', 'original');
    await writeFile(stores.blobs.blobPath(published.contentHash), 'tampered');

    const err = await rejection(resolver.fetch('pkg', '1.0.0', { verify: 'eager' }));
    expect(isRegistryError(err, 'IntegrityError')).toBe(true);
  });

  test('eager verification serves intact blobs', async () => {
    await publish('pkg', '1.0.0', 'intact');
    const result = await resolver.fetch('pkg', '1.0.0', { verify: 'eager' });
    expect((await readAll(result.stream)).toString()).toBe('intact');
  });

  test('a published entry without its blob is an integrity error', async () => {
    const published = await publish('pkg', '1.0.0', 'gone');
    await stores.blobs.delete(published.contentHash);

    const err = await rejection(resolver.fetch('pkg', '1.0.0'));
    expect(isRegistryError(err, 'IntegrityError')).toBe(true);
  });
});
