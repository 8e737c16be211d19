import express, { type Express } from 'express';
import { pinoHttp } from 'pino-http';
import type { Logger } from 'pino';
import type { BuildInfo } from '../../config.js';
import type { Metrics } from '../metrics.js';
import { asyncHandler } from './middleware/asyncHandler.js';
import { createErrorHandler, type ErrorResponse } from './middleware/errorHandler.js';

export const READY_TIMEOUT_MS = 2000;

export interface HttpAppDeps {
  /** Resolves once the database answers a trivial query. */
  pingDatabase: () => Promise<unknown>;
  metrics: Metrics;
  build: BuildInfo;
  logger: Logger;
  readyTimeoutMs?: number;
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Health, readiness, metrics and version endpoints served beside the gRPC port.
 */
export function createHttpApp(deps: HttpAppDeps): Express {
  const { pingDatabase, metrics, build, logger, readyTimeoutMs = READY_TIMEOUT_MS } = deps;
  const app = express();

  app.use(pinoHttp({ logger, autoLogging: { ignore: (req) => req.url === '/health' } }));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'healthy' });
  });

  app.get(
    '/ready',
    asyncHandler(async (req, res) => {
      try {
        await withTimeout(pingDatabase(), readyTimeoutMs);
      } catch (err) {
        req.log.warn({ err }, 'Readiness check failed');
        const response: ErrorResponse = {
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        };
        res.status(503).json(response);
        return;
      }
      res.status(200).json({ status: 'ready' });
    })
  );

  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      const body = await metrics.registry.metrics();
      res.set('Content-Type', metrics.registry.contentType);
      res.send(body);
    })
  );

  app.get('/version', (_req, res) => {
    res.status(200).json({
      version: build.version,
      buildTime: build.buildTime,
      gitCommit: build.gitCommit,
    });
  });

  app.use(createErrorHandler(logger));

  return app;
}
