import type { DatabaseClient } from '@/lib/database/postgres.client.js';
import type { DependencyProbe } from '../types/health.types.js';

/**
 * Database probe: a trivial query through the connection pool
 */
export function createDatabaseProbe(client: DatabaseClient): DependencyProbe {
  return {
    component: 'database',
    required: true,
    async check(signal: AbortSignal): Promise<void> {
      signal.throwIfAborted();
      await client.ping();
    }
  };
}
