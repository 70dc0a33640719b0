/**
 * Health state levels, ordered unavailable > degraded > ok
 * - ok: Dependency reachable within the latency threshold
 * - degraded: Dependency reachable but slower than the threshold
 * - unavailable: Dependency unreachable, failing, or timed out
 */
export type HealthState = 'ok' | 'degraded' | 'unavailable';

/**
 * Components a probe can report on
 */
export type ComponentName = 'database' | 'cache' | 'api';

/**
 * Result of a single dependency probe
 */
export interface HealthStatus {
  component: ComponentName;
  status: HealthState;
  /** Round-trip time in milliseconds, null when the check itself failed */
  latency: number | null;
  detail?: string;
  /** Whether this check gates readiness */
  required: boolean;
}

/**
 * Worst-case aggregate over an ordered list of checks
 */
export interface AggregateHealth {
  status: HealthState;
  checks: HealthStatus[];
}

export interface LivenessResponse extends AggregateHealth {
  uptime: number;
  timestamp: string;
}

export interface BasicHealthResponse extends AggregateHealth {
  version: string;
  environment: string;
  uptime: number;
  timestamp: string;
}

export interface ReadinessResponse extends AggregateHealth {
  ready: boolean;
  timestamp: string;
}

export type DetailedHealthResponse = BasicHealthResponse;

/**
 * A bounded reachability check against one dependency.
 *
 * check() resolves on success, optionally with a diagnostic string, and
 * rejects on failure. The signal is aborted once the probe's deadline passes.
 */
export interface DependencyProbe {
  readonly component: ComponentName;
  /** Required probes gate readiness; the rest are informational */
  readonly required: boolean;
  check(signal: AbortSignal): Promise<string | void>;
}

/**
 * Health reporter configuration
 */
export interface HealthReporterConfig {
  timeoutMs: number;
  degradedThresholdMs: number;
  version: string;
  environment: string;
}
