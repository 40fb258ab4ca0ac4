import type { PoolClient, QueryResult, QueryResultRow } from 'pg';
import { Pool } from 'pg';
import type { BackendRow } from './backend.js';
import { ConnectionError } from './errors.js';
import type { PostgresConfig } from './postgres-config.js';
import { DEFAULT_POSTGRES_CONFIG } from './postgres-config.js';
import { debug, describeError } from './runtime.js';

/**
 * The part of the data access layer the query backends rely on. Tests swap
 * in a recording implementation.
 */
export interface SqlExecutor {
  query(text: string, params?: unknown[], client?: PoolClient | null): Promise<QueryResult<BackendRow>>;
  transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T>;
}

/**
 * Connection management for PostgreSQL
 *
 * Owns the `pg` pool, times and logs every statement, and wraps callbacks in
 * BEGIN/COMMIT with rollback on failure.
 */
class DataAccessLayer implements SqlExecutor {
  config: PostgresConfig;
  pool: Pool | null;
  private _connected: boolean;

  constructor(config: Partial<PostgresConfig> = {}) {
    this.config = {
      ...DEFAULT_POSTGRES_CONFIG,
      ...config,
    };

    this.pool = null;
    this._connected = false;
  }

  /**
   * Initialize the connection pool and connect to PostgreSQL
   * @returns This instance for chaining
   */
  async connect(): Promise<this> {
    if (this._connected) {
      return this;
    }

    try {
      this.pool = new Pool(this.config);

      // Test the connection
      const client = await this.pool.connect();
      await client.query('SELECT NOW()');
      client.release();

      this._connected = true;
      debug.db('PostgreSQL connection pool established');

      this.pool.on('connect', () => {
        debug.db('New PostgreSQL client connected');
      });

      this.pool.on('error', (err: Error) => {
        debug.error(`PostgreSQL pool error: ${err.message}`);
        debug.error({ error: err });
      });

      return this;
    } catch (error) {
      const message = describeError(error);
      debug.error(`Failed to connect to PostgreSQL: ${message}`);
      debug.error({ error });
      throw new ConnectionError(`Failed to connect to PostgreSQL: ${message}`);
    }
  }

  /**
   * Close all connections and clean up
   */
  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this._connected = false;
      debug.db('PostgreSQL connection pool closed');
    }
  }

  /**
   * Get a connection from the pool
   * @returns PostgreSQL client connection
   */
  async getConnection(): Promise<PoolClient> {
    if (!this._connected || !this.pool) {
      throw new ConnectionError('DAL not connected. Call connect() first.');
    }
    return this.pool.connect();
  }

  /**
   * Execute a query with optional parameters
   * @param text - SQL query text
   * @param params - Query parameters
   * @param client - Optional client connection (for transactions)
   * @returns Query result
   */
  async query<TRow extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
    client: PoolClient | null = null
  ): Promise<QueryResult<TRow>> {
    const queryClient = client ?? this.pool;
    if (!queryClient) {
      throw new ConnectionError('DAL not connected. Call connect() first.');
    }

    try {
      const start = Date.now();
      const result = await queryClient.query<TRow>(text, params);
      const duration = Date.now() - start;

      debug.db(`Query executed in ${duration}ms: ${text.substring(0, 100)}...`);
      return result;
    } catch (error) {
      debug.error(`Query error: ${describeError(error)}`);
      debug.error(`Query text: ${text}`);
      debug.error(`Query params: ${JSON.stringify(params, bigintReplacer)}`);
      throw error;
    }
  }

  /**
   * Execute a transaction with automatic rollback on error
   * @param callback - Function to execute within transaction
   * @returns Result of the callback function
   */
  async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.getConnection();

    try {
      await client.query('BEGIN');
      debug.db('Transaction started');

      const result = await callback(client);

      await client.query('COMMIT');
      debug.db('Transaction committed');

      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      debug.db(`Transaction rolled back due to error: ${describeError(error)}`);
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Check if the DAL is connected
   */
  isConnected(): boolean {
    return Boolean(this._connected && this.pool && !this.pool.ended);
  }

  /**
   * Get pool statistics
   */
  getPoolStats(): { totalCount: number; idleCount: number; waitingCount: number } | null {
    if (!this.pool) {
      return null;
    }

    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }
}

const bigintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

export { DataAccessLayer };
export default DataAccessLayer;
