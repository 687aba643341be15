/**
 * Package API routes.
 *
 * GET    /packages                     Package summaries
 * GET    /packages/:name               Package detail with download counts
 * GET    /packages/:name/versions      Published versions, newest first
 * PUT    /packages/:name/:version      Publish (raw body)
 * GET    /packages/:name/:spec         Download an exact version or a range
 * DELETE /packages/:name/:version      Soft-delete a version
 */

import express, { NextFunction, Request, Response, Router } from 'express';
import { pipeline } from 'stream';
import { assertPackageName } from '../domain/artifact';
import { validationError } from '../domain/errors';
import { logger } from '../logger';
import { Registry } from '../registry';

const log = logger.child({ component: 'http' });

type Handler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections to the error handler. */
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function declaredSize(req: Request): number {
  const raw = req.get('x-content-size') ?? req.get('content-length');
  if (raw === undefined) {
    throw validationError('x-content-size or content-length header is required');
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw validationError(`Invalid artifact size header: "${raw}"`, { size: raw });
  }
  return Number(trimmed);
}

function declaredHash(req: Request): string {
  const raw = req.get('x-content-sha256');
  if (!raw) throw validationError('x-content-sha256 header is required');
  return raw;
}

export function createPackageRoutes(registry: Registry): Router {
  const router = Router();

  router.get(
    '/packages',
    route(async (_req, res) => {
      res.json({ packages: await registry.listPackages() });
    }),
  );

  router.get(
    '/packages/:name',
    route(async (req, res) => {
      res.json(await registry.getPackage(req.params.name));
    }),
  );

  router.get(
    '/packages/:name/versions',
    route(async (req, res) => {
      const name = assertPackageName(req.params.name);
      res.json({ name, versions: await registry.listVersions(name) });
    }),
  );

  /**
   * PUT /packages/:name/:version
   * The body is streamed straight into the blob store.
   */
  router.put(
    '/packages/:name/:version',
    route(async (req, res) => {
      const controller = new AbortController();
      const onClose = () => {
        if (!res.writableEnded) controller.abort();
      };
      res.on('close', onClose);
      try {
        const result = await registry.publish({
          name: req.params.name,
          version: req.params.version,
          source: req,
          declaredHash: declaredHash(req),
          declaredSize: declaredSize(req),
          uploadedBy: req.get('x-uploaded-by') || undefined,
          signal: controller.signal,
        });
        res.status(result.created ? 201 : 200).json(result);
      } finally {
        res.off('close', onClose);
      }
    }),
  );

  router.get(
    '/packages/:name/:spec',
    route(async (req, res) => {
      const result = await registry.fetch(req.params.name, req.params.spec, {
        userAgent: req.get('user-agent'),
        clientAddress: req.ip,
      });
      res.status(200);
      res.setHeader('content-type', 'application/octet-stream');
      res.setHeader('content-length', String(result.sizeBytes));
      res.setHeader('x-content-sha256', result.contentHash);
      res.setHeader('x-resolved-version', result.entry.version);
      pipeline(result.stream, res, (err) => {
        if (err) {
          log.warn('Download interrupted', {
            name: result.entry.name,
            version: result.entry.version,
            error: err.message,
          });
        }
      });
    }),
  );

  router.delete(
    '/packages/:name/:version',
    express.json({ limit: '16kb' }),
    route(async (req, res) => {
      const body: unknown = req.body;
      let reason: string | undefined;
      if (body && typeof body === 'object' && 'reason' in body) {
        if (typeof body.reason !== 'string') throw validationError('"reason" must be a string');
        reason = body.reason;
      }
      res.json(await registry.delete(req.params.name, req.params.version, reason));
    }),
  );

  return router;
}
