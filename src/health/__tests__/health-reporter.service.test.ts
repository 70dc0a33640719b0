import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { HealthReporter } from '../services/health-reporter.service.js';
import type { ComponentName, DependencyProbe, HealthReporterConfig, HealthState } from '../types/health.types.js';

type CheckFn = (signal: AbortSignal) => Promise<string | void>;

function createProbe(component: ComponentName, impl: CheckFn, required: boolean = true) {
  const check = jest.fn<CheckFn>(impl);
  const probe: DependencyProbe = { component, required, check };
  return { probe, check };
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function hang(): Promise<void> {
  return new Promise<void>(() => undefined);
}

const CONFIG: HealthReporterConfig = {
  timeoutMs: 200,
  degradedThresholdMs: 100,
  version: '2.0.0',
  environment: 'test'
};

describe('HealthReporter', () => {
  beforeEach(() => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('liveness', () => {
    it('should report ok without calling any probe', () => {
      const database = createProbe('database', async () => undefined);
      const cache = createProbe('cache', async () => undefined);
      const reporter = new HealthReporter([database.probe, cache.probe], CONFIG);

      const liveness = reporter.liveness();

      expect(liveness.status).toBe('ok');
      expect(liveness.checks).toEqual([]);
      expect(database.check).toHaveBeenCalledTimes(0);
      expect(cache.check).toHaveBeenCalledTimes(0);
    });

    it('should report uptime since start', () => {
      const reporter = new HealthReporter([], CONFIG);

      jest.advanceTimersByTime(2500);

      expect(reporter.liveness().uptime).toBe(2.5);
    });
  });

  describe('basic', () => {
    it('should return version metadata without calling any probe', () => {
      const database = createProbe('database', async () => undefined);
      const reporter = new HealthReporter([database.probe], CONFIG);

      const health = reporter.basic();

      expect(health.status).toBe('ok');
      expect(health.version).toBe('2.0.0');
      expect(health.environment).toBe('test');
      expect(health.checks).toEqual([]);
      expect(new Date(health.timestamp).toISOString()).toBe(health.timestamp);
      expect(database.check).not.toHaveBeenCalled();
    });
  });

  describe('detailed', () => {
    it('should report a timed out cache beside a healthy database', async () => {
      const database = createProbe('database', () => sleep(5));
      const cache = createProbe('cache', hang);
      const reporter = new HealthReporter([database.probe, cache.probe], CONFIG);

      const pending = reporter.detailed();
      await jest.advanceTimersByTimeAsync(200);
      const health = await pending;

      expect(health.status).toBe('unavailable');
      expect(health.checks).toEqual([
        { component: 'database', required: true, status: 'ok', latency: 5 },
        { component: 'cache', required: true, status: 'unavailable', latency: null, detail: 'timeout' }
      ]);
      expect(health.version).toBe('2.0.0');
    });

    it('should report a slow database as degraded', async () => {
      const database = createProbe('database', () => sleep(450));
      const cache = createProbe('cache', async () => undefined);
      const reporter = new HealthReporter(
        [database.probe, cache.probe],
        { ...CONFIG, timeoutMs: 1000, degradedThresholdMs: 200 }
      );

      const pending = reporter.detailed();
      await jest.advanceTimersByTimeAsync(450);
      const health = await pending;

      expect(health.status).toBe('degraded');
      expect(health.checks[0]).toEqual({
        component: 'database',
        required: true,
        status: 'degraded',
        latency: 450,
        detail: 'latency 450ms exceeds 200ms threshold'
      });
      expect(health.checks[1]).toEqual({ component: 'cache', required: true, status: 'ok', latency: 0 });
    });

    it('should include informational probes', async () => {
      const database = createProbe('database', async () => undefined);
      const api = createProbe('api', async () => undefined, false);
      const reporter = new HealthReporter([database.probe, api.probe], CONFIG);

      const health = await reporter.detailed();

      expect(health.checks.map(check => check.component)).toEqual(['database', 'api']);
      expect(health.checks[1].required).toBe(false);
      expect(api.check).toHaveBeenCalledTimes(1);
    });

    it('should keep a probe detail on success', async () => {
      const cache = createProbe('cache', async () => 'connection reused');
      const reporter = new HealthReporter([cache.probe], CONFIG);

      const health = await reporter.detailed();

      expect(health.checks[0]).toEqual({
        component: 'cache',
        required: true,
        status: 'ok',
        latency: 0,
        detail: 'connection reused'
      });
    });

    it('should turn a rejected probe into unavailable with the reason', async () => {
      const database = createProbe('database', async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
      });
      const reporter = new HealthReporter([database.probe], CONFIG);

      const health = await reporter.detailed();

      expect(health.checks[0]).toEqual({
        component: 'database',
        required: true,
        status: 'unavailable',
        latency: null,
        detail: 'connect ECONNREFUSED 127.0.0.1:5432'
      });
    });

    it('should contain a probe that throws synchronously', async () => {
      const probe: DependencyProbe = {
        component: 'cache',
        required: true,
        check: () => {
          throw new Error('client not initialised');
        }
      };
      const reporter = new HealthReporter([probe], CONFIG);

      const health = await reporter.detailed();

      expect(health.status).toBe('unavailable');
      expect(health.checks[0].detail).toBe('client not initialised');
    });

    it('should describe a non-Error rejection generically', async () => {
      const database = createProbe('database', () => Promise.reject(42));
      const reporter = new HealthReporter([database.probe], CONFIG);

      const health = await reporter.detailed();

      expect(health.checks[0].detail).toBe('Check failed');
    });

    it('should report ok with no probes registered', async () => {
      const reporter = new HealthReporter([], CONFIG);

      const health = await reporter.detailed();

      expect(health.status).toBe('ok');
      expect(health.checks).toEqual([]);
    });
  });

  describe('concurrency', () => {
    it('should bound the check by one timeout, not the sum', async () => {
      const database = createProbe('database', hang);
      const cache = createProbe('cache', hang);
      const reporter = new HealthReporter([database.probe, cache.probe], CONFIG);
      const startedAt = Date.now();

      let settled = false;
      const pending = reporter.readiness().then(result => {
        settled = true;
        return result;
      });

      await jest.advanceTimersByTimeAsync(200);

      expect(settled).toBe(true);
      const readiness = await pending;
      expect(Date.now() - startedAt).toBe(200);
      expect(readiness.checks.map(check => check.detail)).toEqual(['timeout', 'timeout']);
    });

    it('should abort only the probe that timed out', async () => {
      const database = createProbe('database', () => sleep(50));
      const cache = createProbe('cache', hang);
      const reporter = new HealthReporter([database.probe, cache.probe], CONFIG);

      const pending = reporter.detailed();
      await jest.advanceTimersByTimeAsync(200);
      await pending;

      const databaseSignal = database.check.mock.calls[0][0];
      const cacheSignal = cache.check.mock.calls[0][0];
      expect(databaseSignal.aborted).toBe(false);
      expect(cacheSignal.aborted).toBe(true);
    });

    it('should start every probe before any completes', async () => {
      const started: string[] = [];
      const database = createProbe('database', async () => {
        started.push('database');
        await sleep(10);
      });
      const cache = createProbe('cache', async () => {
        started.push('cache');
        await sleep(10);
      });
      const reporter = new HealthReporter([database.probe, cache.probe], CONFIG);

      const pending = reporter.detailed();
      await jest.advanceTimersByTimeAsync(0);
      expect(started).toEqual(['database', 'cache']);

      await jest.advanceTimersByTimeAsync(10);
      const health = await pending;
      expect(health.checks.map(check => check.latency)).toEqual([10, 10]);
    });
  });

  describe('readiness', () => {
    it('should run only required probes', async () => {
      const database = createProbe('database', async () => undefined);
      const api = createProbe('api', async () => undefined, false);
      const reporter = new HealthReporter([database.probe, api.probe], CONFIG);

      const readiness = await reporter.readiness();

      expect(readiness.ready).toBe(true);
      expect(readiness.checks.map(check => check.component)).toEqual(['database']);
      expect(api.check).not.toHaveBeenCalled();
    });

    it('should not be ready when a required dependency is unavailable', async () => {
      const database = createProbe('database', async () => undefined);
      const cache = createProbe('cache', async () => {
        throw new Error('connection refused');
      });
      const reporter = new HealthReporter([database.probe, cache.probe], CONFIG);

      const readiness = await reporter.readiness();

      expect(readiness.ready).toBe(false);
      expect(readiness.status).toBe('unavailable');
    });

    it('should stay ready when a dependency is only degraded', async () => {
      const database = createProbe('database', () => sleep(150));
      const reporter = new HealthReporter([database.probe], CONFIG);

      const pending = reporter.readiness();
      await jest.advanceTimersByTimeAsync(150);
      const readiness = await pending;

      expect(readiness.status).toBe('degraded');
      expect(readiness.ready).toBe(true);
    });

    it('should ignore a failing informational probe', async () => {
      const database = createProbe('database', async () => undefined);
      const api = createProbe('api', async () => {
        throw new Error('stalled');
      }, false);
      const reporter = new HealthReporter([database.probe, api.probe], CONFIG);

      const readiness = await reporter.readiness();

      expect(readiness.ready).toBe(true);
      expect(readiness.status).toBe('ok');
    });
  });

  describe('aggregate status', () => {
    const outcomes: HealthState[] = ['ok', 'degraded', 'unavailable'];
    const severity: Record<HealthState, number> = { ok: 0, degraded: 1, unavailable: 2 };

    function probeFor(component: ComponentName, outcome: HealthState): DependencyProbe {
      switch (outcome) {
        case 'ok':
          return createProbe(component, async () => undefined).probe;
        case 'degraded':
          return createProbe(component, () => sleep(150)).probe;
        case 'unavailable':
          return createProbe(component, async () => {
            throw new Error('down');
          }).probe;
      }
    }

    it('should equal the worst individual status for every combination', async () => {
      for (const databaseOutcome of outcomes) {
        for (const cacheOutcome of outcomes) {
          const reporter = new HealthReporter(
            [probeFor('database', databaseOutcome), probeFor('cache', cacheOutcome)],
            CONFIG
          );

          const pending = reporter.detailed();
          await jest.advanceTimersByTimeAsync(150);
          const health = await pending;

          const expected = severity[databaseOutcome] >= severity[cacheOutcome] ? databaseOutcome : cacheOutcome;
          expect(health.checks.map(check => check.status)).toEqual([databaseOutcome, cacheOutcome]);
          expect(health.status).toBe(expected);
        }
      }
    });
  });

  describe('getConfig', () => {
    it('should return a copy of the configuration', () => {
      const reporter = new HealthReporter([], CONFIG);

      const config = reporter.getConfig();

      expect(config).toEqual(CONFIG);
      expect(config).not.toBe(CONFIG);
    });
  });
});
