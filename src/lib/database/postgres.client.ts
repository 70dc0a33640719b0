import { Pool } from 'pg';
import type { Logger } from '@/logging/index.js';

/**
 * Minimal database surface the service depends on
 */
export interface DatabaseClient {
  /** Issue a trivial query; rejects when the database cannot answer */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface PostgresClientOptions {
  connectionString: string;
  poolSize: number;
  connectionTimeoutMs: number;
  logger?: Logger;
}

/**
 * PostgreSQL client backed by a pg connection pool
 */
export class PostgresClient implements DatabaseClient {
  constructor(private readonly pool: Pool) {}

  static create(options: PostgresClientOptions): PostgresClient {
    const pool = new Pool({
      connectionString: options.connectionString,
      max: options.poolSize,
      connectionTimeoutMillis: options.connectionTimeoutMs,
      idleTimeoutMillis: 30000
    });

    // Idle client errors are emitted on the pool; unhandled they crash the process
    pool.on('error', (error) => {
      options.logger?.error('Idle database client error', { error });
    });

    return new PostgresClient(pool);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
