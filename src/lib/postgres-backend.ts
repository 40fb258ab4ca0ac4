import type { PoolClient } from 'pg';
import type {
  AggregateStatement,
  BackendRow,
  CountStatement,
  DeleteStatement,
  InsertStatement,
  QueryBackend,
  SelectStatement,
  UpdateStatement,
  WriteResult,
} from './backend.js';
import type { SqlExecutor } from './data-access-layer.js';
import { convertPostgreSQLError } from './errors.js';
import type { SqlStatement } from './sql-renderer.js';
import {
  renderAggregate,
  renderCount,
  renderDelete,
  renderInsert,
  renderSelect,
  renderUpdate,
} from './sql-renderer.js';

/**
 * {@link QueryBackend} over a PostgreSQL executor. Without a client each
 * statement runs on a pooled connection; a transaction-bound instance sends
 * every statement through its client.
 */
export class PostgresBackend implements QueryBackend {
  private executor: SqlExecutor;
  private client: PoolClient | null;

  constructor(executor: SqlExecutor, client: PoolClient | null = null) {
    this.executor = executor;
    this.client = client;
  }

  get inTransaction(): boolean {
    return this.client !== null;
  }

  private async run({ sql, params }: SqlStatement): Promise<{ rows: BackendRow[]; rowCount: number }> {
    try {
      const result = await this.executor.query(sql, params, this.client);
      return { rows: result.rows, rowCount: typeof result.rowCount === 'number' ? result.rowCount : 0 };
    } catch (error) {
      throw convertPostgreSQLError(error);
    }
  }

  async select(statement: SelectStatement): Promise<BackendRow[]> {
    const { rows } = await this.run(renderSelect(statement));
    return rows;
  }

  async insert(statement: InsertStatement): Promise<WriteResult> {
    const hasColumns = statement.rows.some(row => Object.keys(row).length > 0);
    if (!hasColumns && statement.rows.length > 1) {
      // DEFAULT VALUES inserts one row at a time
      const rows: BackendRow[] = [];
      for (const row of statement.rows) {
        const result = await this.run(renderInsert({ ...statement, rows: [row] }));
        rows.push(...result.rows);
      }
      return { rowCount: statement.rows.length, rows };
    }
    if (statement.rows.length === 0) {
      return { rowCount: 0, rows: [] };
    }
    return this.run(renderInsert(statement));
  }

  async update(statement: UpdateStatement): Promise<WriteResult> {
    return this.run(renderUpdate(statement));
  }

  async delete(statement: DeleteStatement): Promise<WriteResult> {
    return this.run(renderDelete(statement));
  }

  async count(statement: CountStatement): Promise<number> {
    const { rows } = await this.run(renderCount(statement));
    return Number.parseInt(String(rows[0]?.count ?? '0'), 10);
  }

  async aggregate(statement: AggregateStatement): Promise<BackendRow[]> {
    const { rows } = await this.run(renderAggregate(statement));
    return rows;
  }

  async transaction<T>(work: (backend: QueryBackend) => Promise<T>): Promise<T> {
    if (this.client) {
      return work(this);
    }
    try {
      return await this.executor.transaction(client => work(new PostgresBackend(this.executor, client)));
    } catch (error) {
      throw convertPostgreSQLError(error);
    }
  }

  async raw(sql: string, params: readonly unknown[] = []): Promise<BackendRow[]> {
    const { rows } = await this.run({ sql, params: [...params] });
    return rows;
  }
}

export default PostgresBackend;
