import type { PoolConfig } from 'pg';

/**
 * Connection settings accepted by {@link DataAccessLayer}. Any other
 * `pg.PoolConfig` option is passed straight to the pool.
 */
export interface PostgresConfig extends PoolConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export const DEFAULT_POSTGRES_CONFIG: Readonly<PostgresConfig> = Object.freeze({
  host: 'localhost',
  port: 5432,
  database: 'postgres',
  user: 'postgres',
  password: '',
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Read connection settings from the usual libpq variables. `DATABASE_URL`
 * wins over the individual `PG*` settings.
 */
export const resolvePostgresConfig = (env: Environment = process.env): Partial<PostgresConfig> => {
  const connectionString = env.DATABASE_URL;
  if (connectionString) {
    return { connectionString };
  }

  const config: Partial<PostgresConfig> = {};
  if (env.PGHOST) config.host = env.PGHOST;
  if (env.PGDATABASE) config.database = env.PGDATABASE;
  if (env.PGUSER) config.user = env.PGUSER;
  if (env.PGPASSWORD !== undefined) config.password = env.PGPASSWORD;

  const port = env.PGPORT ? Number.parseInt(env.PGPORT, 10) : Number.NaN;
  if (Number.isFinite(port)) {
    config.port = port;
  }

  return config;
};
