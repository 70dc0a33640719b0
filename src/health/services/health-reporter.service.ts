import type { Logger } from '@/logging/index.js';
import { runProbe, worstStatus } from './probe-runner.js';
import type {
  AggregateHealth,
  BasicHealthResponse,
  DependencyProbe,
  DetailedHealthResponse,
  HealthReporterConfig,
  HealthStatus,
  LivenessResponse,
  ReadinessResponse
} from '../types/health.types.js';

export interface HealthReporterOptions {
  logger?: Logger;
  /** Millisecond clock used for latency and uptime */
  clock?: () => number;
  /** Clock reading taken as process start, defaults to construction time */
  startedAt?: number;
}

/**
 * Health reporter answers liveness, readiness, basic and detailed queries
 *
 * - Liveness and basic health never touch a dependency
 * - Readiness runs the required probes and gates on `unavailable` only;
 *   a degraded dependency still admits traffic
 * - Detailed health runs every probe and is informational
 *
 * Probes run concurrently, each against its own deadline, so a check takes
 * as long as the slowest probe rather than the sum. Nothing is cached:
 * every call samples the dependencies afresh.
 */
export class HealthReporter {
  private readonly probes: readonly DependencyProbe[];
  private readonly config: Readonly<HealthReporterConfig>;
  private readonly logger?: Logger;
  private readonly clock: () => number;
  private readonly startedAt: number;

  constructor(
    probes: readonly DependencyProbe[],
    config: HealthReporterConfig,
    options: HealthReporterOptions = {}
  ) {
    this.probes = [...probes];
    this.config = Object.freeze({ ...config });
    this.logger = options.logger;
    this.clock = options.clock ?? (() => Date.now());
    this.startedAt = options.startedAt ?? this.clock();
  }

  liveness(): LivenessResponse {
    return {
      status: 'ok',
      checks: [],
      uptime: this.uptime(),
      timestamp: this.timestamp()
    };
  }

  basic(): BasicHealthResponse {
    return {
      status: 'ok',
      checks: [],
      version: this.config.version,
      environment: this.config.environment,
      uptime: this.uptime(),
      timestamp: this.timestamp()
    };
  }

  async readiness(): Promise<ReadinessResponse> {
    const health = await this.evaluate(this.probes.filter(probe => probe.required));
    const ready = health.status !== 'unavailable';

    if (!ready) {
      this.logger?.warn('Readiness check failed', {
        unavailable: health.checks
          .filter(check => check.status === 'unavailable')
          .map(check => check.component)
      });
    }

    return {
      ...health,
      ready,
      timestamp: this.timestamp()
    };
  }

  async detailed(): Promise<DetailedHealthResponse> {
    const health = await this.evaluate(this.probes);

    return {
      ...health,
      version: this.config.version,
      environment: this.config.environment,
      uptime: this.uptime(),
      timestamp: this.timestamp()
    };
  }

  /**
   * Run the given probes concurrently and aggregate by worst case.
   * Checks keep registration order.
   */
  async evaluate(probes: readonly DependencyProbe[]): Promise<AggregateHealth> {
    const checks: HealthStatus[] = await Promise.all(
      probes.map(probe =>
        runProbe(probe, {
          timeoutMs: this.config.timeoutMs,
          degradedThresholdMs: this.config.degradedThresholdMs,
          clock: this.clock,
          logger: this.logger
        })
      )
    );

    return {
      status: worstStatus(checks.map(check => check.status)),
      checks
    };
  }

  getConfig(): HealthReporterConfig {
    return { ...this.config };
  }

  private uptime(): number {
    return Math.max(0, (this.clock() - this.startedAt) / 1000);
  }

  private timestamp(): string {
    return new Date().toISOString();
  }
}
