import type { Pool, PoolClient } from 'pg';
import { IStateDbAdapter } from '../interfaces/state-db-adapter.interface';
import {
  NewStateChange,
  StateChangeRecord,
  StatefulRow,
} from '../interfaces/state-records.interface';
import {
  assertValidTableName,
  stateChangesTableOf,
} from '../utils/validate-table-name';

interface PgStatefulRow {
  id: string;
  state: string;
  updated_at: Date | string;
}

interface PgStateChangeRow {
  id: string;
  record_id: string;
  from_state: string | null;
  to_state: string;
  event: string | null;
  occurred_at: Date | string;
}

interface PgIdRow {
  id: string;
}

interface PgCountRow {
  count: string | number;
}

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

/**
 * Expects `<table>(id, state, updated_at)` and
 * `<table>_state_changes(id, record_id, from_state, to_state, event, occurred_at)`
 * with generated change ids.
 */
export class PgStateAdapter implements IStateDbAdapter {
  constructor(
    private readonly pool: Pool,
    private readonly client?: PoolClient,
  ) {}

  async findOne(
    tableName: string,
    id: string,
    lock?: boolean,
  ): Promise<StatefulRow | null> {
    assertValidTableName(tableName);
    const lockClause = lock ? ' FOR UPDATE' : '';

    const result = await this.getConn().query<PgStatefulRow>(
      `SELECT id, state, updated_at
       FROM ${tableName}
       WHERE id = $1${lockClause}`,
      [id],
    );

    const [row] = result.rows;
    return row ? this.toStatefulRow(row) : null;
  }

  async insert(tableName: string, id: string, state: string): Promise<void> {
    assertValidTableName(tableName);
    await this.getConn().query(
      `INSERT INTO ${tableName} (id, state, updated_at)
       VALUES ($1, $2, CURRENT_TIMESTAMP)`,
      [id, state],
    );
  }

  async compareAndSetState(
    tableName: string,
    id: string,
    expectedState: string,
    nextState: string,
  ): Promise<boolean> {
    assertValidTableName(tableName);
    const result = await this.getConn().query<PgIdRow>(
      `UPDATE ${tableName}
       SET state = $3, updated_at = CURRENT_TIMESTAMP
       WHERE id = $1 AND state = $2
       RETURNING id`,
      [id, expectedState, nextState],
    );

    return result.rows.length === 1;
  }

  async insertStateChange(
    tableName: string,
    data: NewStateChange,
  ): Promise<void> {
    const changesTable = stateChangesTableOf(tableName);
    await this.getConn().query(
      `INSERT INTO ${changesTable}
       (record_id, from_state, to_state, event, occurred_at)
       VALUES ($1, $2, $3, $4, clock_timestamp())`,
      [data.recordId, data.fromState, data.toState, data.event],
    );
  }

  async findStateChanges(
    tableName: string,
    recordId: string,
  ): Promise<StateChangeRecord[]> {
    const changesTable = stateChangesTableOf(tableName);
    const result = await this.getConn().query<PgStateChangeRow>(
      `SELECT id, record_id, from_state, to_state, event, occurred_at
       FROM ${changesTable}
       WHERE record_id = $1
       ORDER BY occurred_at ASC, id ASC`,
      [recordId],
    );

    return result.rows.map((row) => this.toStateChange(row));
  }

  async hasStateChanges(tableName: string, recordId: string): Promise<boolean> {
    const changesTable = stateChangesTableOf(tableName);
    const result = await this.getConn().query<PgIdRow>(
      `SELECT id FROM ${changesTable} WHERE record_id = $1 LIMIT 1`,
      [recordId],
    );

    return result.rows.length > 0;
  }

  async findByState(
    tableName: string,
    states: string[],
  ): Promise<StatefulRow[]> {
    assertValidTableName(tableName);
    const result = await this.getConn().query<PgStatefulRow>(
      `SELECT id, state, updated_at
       FROM ${tableName}
       WHERE state = ANY($1::text[])`,
      [states],
    );

    return result.rows.map((row) => this.toStatefulRow(row));
  }

  async countByState(tableName: string, states: string[]): Promise<number> {
    assertValidTableName(tableName);
    const result = await this.getConn().query<PgCountRow>(
      `SELECT COUNT(*) AS count FROM ${tableName} WHERE state = ANY($1::text[])`,
      [states],
    );

    const [row] = result.rows;
    return row ? Number(row.count) : 0;
  }

  async transaction<T>(
    cb: (adapter: IStateDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txAdapter = new PgStateAdapter(this.pool, client);
      const result = await cb(txAdapter);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }

  private toStatefulRow(row: PgStatefulRow): StatefulRow {
    return {
      id: String(row.id),
      state: row.state,
      updatedAt: new Date(row.updated_at),
    };
  }

  private toStateChange(row: PgStateChangeRow): StateChangeRecord {
    return {
      id: String(row.id),
      recordId: String(row.record_id),
      fromState: row.from_state,
      toState: row.to_state,
      event: row.event,
      occurredAt: new Date(row.occurred_at),
    };
  }
}
