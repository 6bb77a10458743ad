/**
 * Status API routes.
 *
 * GET /services: Status of every configured service
 * GET /services/:serviceId: Status of one service
 * GET /events: Recent engine events, newest last
 */

import { Router } from 'express';
import { SyncError, notFoundError, validationError } from '../domain/errors';
import { SyncEventPublisher } from '../data-plane/publisher';
import { ServiceStatus } from '../engine/orchestrator';

/** What the routes read from the orchestrator. */
export interface StatusProvider {
  getStatus(): ServiceStatus[];
  getServiceStatus(serviceId: string): ServiceStatus | undefined;
}

const DEFAULT_EVENT_LIMIT = 50;
const MAX_EVENT_LIMIT = 500;

export function createStatusRoutes(status: StatusProvider, publisher: SyncEventPublisher): Router {
  const router = Router();

  router.get('/services', (_req, res) => {
    const services = status.getStatus();
    res.json({ services, total: services.length });
  });

  router.get('/services/:serviceId', (req, res, next) => {
    const service = status.getServiceStatus(req.params.serviceId);
    if (!service) {
      next(new SyncError(notFoundError('Service', req.params.serviceId)));
      return;
    }
    res.json(service);
  });

  router.get('/events', (req, res, next) => {
    const rawLimit = typeof req.query.limit === 'string' ? req.query.limit : undefined;
    const limit = rawLimit === undefined ? DEFAULT_EVENT_LIMIT : Number(rawLimit);
    if (!Number.isInteger(limit) || limit < 1) {
      next(new SyncError(validationError('limit must be a positive integer', { limit: rawLimit })));
      return;
    }
    const serviceId = typeof req.query.serviceId === 'string' ? req.query.serviceId : undefined;
    const events = publisher.recent(Math.min(limit, MAX_EVENT_LIMIT), serviceId);
    res.json({ events, total: events.length });
  });

  return router;
}
