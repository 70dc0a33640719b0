import type { Logger } from '@/logging/index.js';
import type { DependencyProbe, HealthState, HealthStatus } from '../types/health.types.js';

export interface ProbeRunOptions {
  timeoutMs: number;
  degradedThresholdMs: number;
  clock?: () => number;
  logger?: Logger;
}

type ProbeOutcome =
  | { kind: 'success'; latency: number; detail?: string }
  | { kind: 'failure'; reason: string }
  | { kind: 'timeout' };

export const TIMEOUT_DETAIL = 'timeout';

function describeError(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === 'string' && error) {
    return error;
  }
  return 'Check failed';
}

/**
 * Run one probe against its own deadline.
 *
 * Never rejects: errors and timeouts become an unavailable status. On timeout
 * the probe's signal is aborted and its late result is ignored.
 */
export async function runProbe(probe: DependencyProbe, options: ProbeRunOptions): Promise<HealthStatus> {
  const clock = options.clock ?? (() => Date.now());
  const controller = new AbortController();
  const startTime = clock();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<ProbeOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ kind: 'timeout' });
    }, options.timeoutMs);
  });

  // Promise.resolve().then() also catches probes that throw synchronously
  const attempt = Promise.resolve()
    .then(() => probe.check(controller.signal))
    .then(
      (detail): ProbeOutcome => ({
        kind: 'success',
        latency: clock() - startTime,
        ...(typeof detail === 'string' && detail ? { detail } : {})
      }),
      (error: unknown): ProbeOutcome => ({ kind: 'failure', reason: describeError(error) })
    );

  let outcome: ProbeOutcome;
  try {
    outcome = await Promise.race([attempt, deadline]);
  } finally {
    clearTimeout(timer);
  }

  const status = toHealthStatus(probe, outcome, options.degradedThresholdMs);

  if (status.status === 'unavailable') {
    options.logger?.warn('Dependency probe failed', {
      component: probe.component,
      detail: status.detail
    });
  } else {
    options.logger?.debug('Dependency probe completed', {
      component: probe.component,
      status: status.status,
      latency: status.latency
    });
  }

  return status;
}

function toHealthStatus(probe: DependencyProbe, outcome: ProbeOutcome, degradedThresholdMs: number): HealthStatus {
  const base = { component: probe.component, required: probe.required };

  switch (outcome.kind) {
    case 'timeout':
      return { ...base, status: 'unavailable', latency: null, detail: TIMEOUT_DETAIL };
    case 'failure':
      return { ...base, status: 'unavailable', latency: null, detail: outcome.reason };
    case 'success': {
      if (outcome.latency > degradedThresholdMs) {
        return {
          ...base,
          status: 'degraded',
          latency: outcome.latency,
          detail: `latency ${outcome.latency}ms exceeds ${degradedThresholdMs}ms threshold`
        };
      }
      return {
        ...base,
        status: 'ok',
        latency: outcome.latency,
        ...(outcome.detail ? { detail: outcome.detail } : {})
      };
    }
  }
}

const SEVERITY: Record<HealthState, number> = {
  ok: 0,
  degraded: 1,
  unavailable: 2
};

/**
 * Worst case of the given states; ok when empty
 */
export function worstStatus(states: Iterable<HealthState>): HealthState {
  let worst: HealthState = 'ok';
  for (const state of states) {
    if (SEVERITY[state] > SEVERITY[worst]) {
      worst = state;
    }
  }
  return worst;
}
