/**
 * Health Check Endpoints
 *
 * Liveness, readiness and dependency health. The service is ready while the
 * listings backend circuit is not open.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { Router, type Request, type Response } from 'express';

import { CircuitState } from '@rentmatch/listings-client';

export const HealthStatus = {
  HEALTHY: 'healthy',
  UNHEALTHY: 'unhealthy',
  DEGRADED: 'degraded',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export interface DependencyHealth {
  name: string;
  status: HealthStatus;
  message?: string;
  lastChecked: string;
}

export interface HealthCheckResponse {
  status: HealthStatus;
  version: string;
  timestamp: string;
  uptime: number;
  dependencies: DependencyHealth[];
}

export interface ReadinessResponse {
  ready: boolean;
  timestamp: string;
  checks: {
    listingsApi: boolean;
  };
}

export interface HealthCheckConfig {
  version: string;
  startTime: Date;
  /** Circuit state of the listings backend, when the source exposes one */
  listingsCircuitState?: () => CircuitState | undefined;
}

export const defaultHealthConfig: HealthCheckConfig = {
  version: '1.0.0',
  startTime: new Date(),
};

/**
 * Maps the listings backend circuit to a dependency status
 */
export function listingsApiHealth(state: CircuitState | undefined): DependencyHealth {
  const lastChecked = new Date().toISOString();
  switch (state) {
    case CircuitState.OPEN:
      return { name: 'listingsApi', status: HealthStatus.UNHEALTHY, message: 'Circuit open', lastChecked };
    case CircuitState.HALF_OPEN:
      return { name: 'listingsApi', status: HealthStatus.DEGRADED, message: 'Circuit half-open', lastChecked };
    default:
      return { name: 'listingsApi', status: HealthStatus.HEALTHY, lastChecked };
  }
}

export class HealthCheckService {
  private readonly config: HealthCheckConfig;

  constructor(config: Partial<HealthCheckConfig> = {}) {
    this.config = { ...defaultHealthConfig, ...config };
  }

  getUptime(): number {
    return Math.floor((Date.now() - this.config.startTime.getTime()) / 1000);
  }

  checkDependencies(): DependencyHealth[] {
    return [listingsApiHealth(this.config.listingsCircuitState?.())];
  }

  checkReadiness(): ReadinessResponse {
    const listingsApi = this.checkDependencies().every((dep) => dep.status !== HealthStatus.UNHEALTHY);
    return {
      ready: listingsApi,
      timestamp: new Date().toISOString(),
      checks: { listingsApi },
    };
  }

  checkHealth(): HealthCheckResponse {
    const dependencies = this.checkDependencies();

    // A failing listings backend degrades search but the service still answers
    const status = dependencies.every((dep) => dep.status === HealthStatus.HEALTHY)
      ? HealthStatus.HEALTHY
      : HealthStatus.DEGRADED;

    return {
      status,
      version: this.config.version,
      timestamp: new Date().toISOString(),
      uptime: this.getUptime(),
      dependencies,
    };
  }
}

/**
 * GET /health, GET /live and GET /ready
 */
export function createHealthRouter(config: Partial<HealthCheckConfig> = {}): Router {
  const router = Router();
  const healthService = new HealthCheckService(config);

  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json(healthService.checkHealth());
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ alive: true, timestamp: new Date().toISOString() });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const readiness = healthService.checkReadiness();
    res.status(readiness.ready ? 200 : 503).json(readiness);
  });

  return router;
}
