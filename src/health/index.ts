/**
 * Health Module - Barrel Exports
 *
 * Usage:
 * ```typescript
 * import { HealthReporter, createHealthRouter } from '@/health/index.js';
 * ```
 */

export { HealthReporter } from './services/health-reporter.service.js';
export type { HealthReporterOptions } from './services/health-reporter.service.js';
export { runProbe, worstStatus, TIMEOUT_DETAIL } from './services/probe-runner.js';
export { createDatabaseProbe } from './probes/database.probe.js';
export { createCacheProbe } from './probes/cache.probe.js';
export { createEventLoopProbe } from './probes/event-loop.probe.js';
export { createHealthController } from './health.controller.js';
export { createHealthRouter } from './health.routes.js';
export type { HealthRouterOptions } from './health.routes.js';

export type {
  HealthState,
  HealthStatus,
  ComponentName,
  AggregateHealth,
  LivenessResponse,
  BasicHealthResponse,
  ReadinessResponse,
  DetailedHealthResponse,
  DependencyProbe,
  HealthReporterConfig
} from './types/health.types.js';
