/**
 * Express server configuration.
 *
 * Assembles the status API around a running orchestrator. The engine is
 * embedded: the host process supplies the decision source, the edge client
 * of each account and the cache store.
 */

import { Server } from 'http';
import express from 'express';
import { SyncConfig } from './domain/config';
import { SyncEventPublisher } from './data-plane/publisher';
import { OrchestratorDeps, SyncOrchestrator } from './engine/orchestrator';
import { FileCacheStore } from './storage/cache-store';
import { errorHandler } from './api/middleware';
import { rateLimit, RateLimitOptions } from './api/rate-limit';
import { createStatusRoutes } from './api/status';
import { logger } from './logger';

const startTime = Date.now();

/** Application context containing all services. */
export interface SyncContext {
  config: Readonly<SyncConfig>;
  publisher: SyncEventPublisher;
  orchestrator: SyncOrchestrator;
}

/** Dependencies of the context; the cache defaults to a file at `config.cachePath`. */
export type SyncContextDeps = Omit<OrchestratorDeps, 'cache' | 'publisher'> & Partial<Pick<OrchestratorDeps, 'cache'>>;

/** Create the application context with all services. */
export function createSyncContext(config: Readonly<SyncConfig>, deps: SyncContextDeps): SyncContext {
  const publisher = new SyncEventPublisher();
  const orchestrator = new SyncOrchestrator(config, {
    ...deps,
    cache: deps.cache ?? new FileCacheStore(config.cachePath),
    publisher,
  });
  return { config, publisher, orchestrator };
}

/** Create and configure the Express application. */
export function createApp(ctx: SyncContext, options?: { rateLimit?: RateLimitOptions }): express.Application {
  const app = express();

  app.get('/health', (_req, res) => {
    const services = ctx.orchestrator.getStatus();
    res.json({
      status: services.some((s) => !s.available) ? 'degraded' : 'ok',
      uptimeMs: Date.now() - startTime,
      services: services.length,
      unavailable: services.filter((s) => !s.available).map((s) => s.serviceId),
    });
  });

  app.use('/api', rateLimit(options?.rateLimit));
  app.use('/api', createStatusRoutes(ctx.orchestrator, ctx.publisher));

  app.use(errorHandler);

  return app;
}

/** Serve the status API on `config.statusPort` (0 picks a free port). Resolves once listening. */
export function startStatusServer(ctx: SyncContext, options?: { rateLimit?: RateLimitOptions }): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createApp(ctx, options).listen(ctx.config.statusPort);
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      logger.info('Status API listening', {
        port: address !== null && typeof address !== 'string' ? address.port : ctx.config.statusPort,
      });
      resolve(server);
    });
  });
}
