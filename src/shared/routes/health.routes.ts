/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Monitoring Endpoints
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health       - Quick health check (process is up)
 * - GET /health/live  - Liveness probe (pid, uptime)
 * - GET /health/ready - Readiness probe (trip store answers a ping)
 *
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { HTTP_STATUS } from '../../core/constants';
import type { TripStore } from '../../modules/trip/trip.types';

interface HealthDeps {
  store: Pick<TripStore, 'ping'>;
  now: () => Date;
  uptimeSec: () => number;
}

export interface ReadinessResponse {
  statusCode: number;
  body: {
    status: 'ready' | 'not_ready';
    timestamp: string;
    checks: { database: boolean };
  };
}

/**
 * Readiness is the trip store answering a ping
 */
export function buildReadinessResponse({ store, now }: Pick<HealthDeps, 'store' | 'now'>): ReadinessResponse {
  const database = store.ping();

  return {
    statusCode: database ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE,
    body: {
      status: database ? 'ready' : 'not_ready',
      timestamp: now().toISOString(),
      checks: { database }
    }
  };
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  /**
   * Basic health check - for load balancers
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'healthy',
      timestamp: deps.now().toISOString()
    });
  });

  /**
   * Liveness probe - is the process alive?
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor(deps.uptimeSec())
    });
  });

  /**
   * Readiness probe - can the service accept traffic?
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const response = buildReadinessResponse(deps);
    res.status(response.statusCode).json(response.body);
  });

  return router;
}
