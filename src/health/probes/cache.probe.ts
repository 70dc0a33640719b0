import { randomUUID } from 'crypto';
import type { CacheClient } from '@/lib/cache/redis.client.js';
import type { DependencyProbe } from '../types/health.types.js';

export const CACHE_PROBE_KEY_PREFIX = 'health_check:';
export const CACHE_PROBE_VALUE = 'ok';
export const CACHE_PROBE_TTL_MS = 10000;

/**
 * Cache probe: PING, then a set/get/delete round trip on a short-lived key.
 *
 * Each probe uses its own key so concurrent probes do not read each
 * other's value. Stops issuing commands once the signal is aborted,
 * except the delete of a key that may have been written.
 */
export function createCacheProbe(
  client: CacheClient,
  generateKey: () => string = () => `${CACHE_PROBE_KEY_PREFIX}${randomUUID()}`
): DependencyProbe {
  return {
    component: 'cache',
    required: true,
    async check(signal: AbortSignal): Promise<void> {
      const key = generateKey();

      await client.ping();
      signal.throwIfAborted();

      let value: string | null = null;
      try {
        await client.set(key, CACHE_PROBE_VALUE, CACHE_PROBE_TTL_MS);
        signal.throwIfAborted();

        value = await client.get(key);
        signal.throwIfAborted();
      } finally {
        await client.del(key);
      }

      if (value !== CACHE_PROBE_VALUE) {
        throw new Error('Cache round trip returned an unexpected value');
      }
    }
  };
}
