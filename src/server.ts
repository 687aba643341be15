/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { RegistryConfig, loadConfig } from './config';
import { Clock, systemClock } from './clock';
import { setLogLevel } from './logger';
import { Registry } from './registry';
import { CachedCatalog } from './storage/cached-catalog';
import { FsBlobStore } from './storage/fs-blob-store';
import { SqliteCatalog } from './storage/sqlite-catalog';
import { errorHandler, requestLogger } from './api/middleware';
import { createPackageRoutes } from './api/packages';

const startTime = Date.now();
const SERVICE_VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  config: Readonly<RegistryConfig>;
  blobs: FsBlobStore;
  /** Process-wide catalog cache; every catalog mutation goes through it. */
  catalog: CachedCatalog;
  registry: Registry;
}

export interface AppContextOverrides {
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Create the application context. The blob store directories are created
 * here, so the context is ready to serve once this resolves.
 */
export async function createAppContext(
  config: Readonly<RegistryConfig> = loadConfig(),
  overrides: AppContextOverrides = {},
): Promise<AppContext> {
  setLogLevel(config.logLevel);

  const blobs = new FsBlobStore({ root: config.storagePath });
  await blobs.init();
  const catalog = new CachedCatalog(
    new SqliteCatalog({
      filename: config.databasePath,
      allowDeletedVersionReuse: config.allowDeletedVersionReuse,
    }),
  );
  const registry = new Registry(catalog, blobs, {
    maxArtifactBytes: config.maxArtifactBytes,
    pendingTimeoutMs: config.pendingTimeoutMs,
    gcGracePeriodMs: config.gcGracePeriodMs,
    deletedRetentionMs: config.deletedRetentionMs,
    maintenanceIntervalMs: config.maintenanceIntervalMs,
    retry: config.retry,
    verifyMode: config.verifyMode,
    clock: overrides.clock ?? systemClock,
    sleep: overrides.sleep,
  });

  return { config, blobs, catalog, registry };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogger());

  // Health check: includes uptime, version, and catalog cache counters
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: SERVICE_VERSION,
      uptimeMs: Date.now() - startTime,
      cache: ctx.catalog.stats(),
    });
  });

  // Versioned API routes: /api/v1 prefix
  const v1 = express.Router();
  v1.use('/', createPackageRoutes(ctx.registry));
  app.use('/api/v1', v1);

  // Error handler
  app.use(errorHandler);

  return app;
}
