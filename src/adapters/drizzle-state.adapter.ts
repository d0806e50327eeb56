import { SQL, sql } from 'drizzle-orm';
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

/**
 * The part of a Drizzle Postgres database (or transaction) the adapter uses.
 */
export interface DrizzleDatabase {
  execute(query: SQL): Promise<unknown>;
  transaction<T>(cb: (tx: DrizzleDatabase) => Promise<T>): Promise<T>;
}

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null;
}

/**
 * Extracts row array from a Drizzle execute() result.
 * Different PG drivers return different shapes:
 * - postgres-js: returns the array directly
 * - node-postgres: returns { rows: [...] }
 */
function extractRows(result: unknown): Row[] {
  const rows: unknown =
    isRow(result) && !Array.isArray(result) && 'rows' in result
      ? result.rows
      : result;
  return Array.isArray(rows) ? rows.filter(isRow) : [];
}

function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  throw new Error(`Expected column "${column}" to hold a string`);
}

function readNullableString(row: Row, column: string): string | null {
  return row[column] === null || row[column] === undefined
    ? null
    : readString(row, column);
}

function readDate(row: Row, column: string): Date {
  const value = row[column];
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    return new Date(value);
  }
  throw new Error(`Expected column "${column}" to hold a timestamp`);
}

function toStatefulRow(row: Row): StatefulRow {
  return {
    id: readString(row, 'id'),
    state: readString(row, 'state'),
    updatedAt: readDate(row, 'updated_at'),
  };
}

function toStateChange(row: Row): StateChangeRecord {
  return {
    id: readString(row, 'id'),
    recordId: readString(row, 'record_id'),
    fromState: readNullableString(row, 'from_state'),
    toState: readString(row, 'to_state'),
    event: readNullableString(row, 'event'),
    occurredAt: readDate(row, 'occurred_at'),
  };
}

export class DrizzleStateAdapter implements IStateDbAdapter {
  constructor(private readonly db: DrizzleDatabase) {}

  async findOne(
    tableName: string,
    id: string,
    lock?: boolean,
  ): Promise<StatefulRow | null> {
    assertValidTableName(tableName);
    const lockClause = lock ? sql` FOR UPDATE` : sql``;
    const result = await this.db.execute(
      sql`SELECT id, state, updated_at FROM ${sql.raw(tableName)} WHERE id = ${id}${lockClause}`,
    );

    const [row] = extractRows(result);
    return row ? toStatefulRow(row) : null;
  }

  async insert(tableName: string, id: string, state: string): Promise<void> {
    assertValidTableName(tableName);
    await this.db.execute(
      sql`INSERT INTO ${sql.raw(tableName)} (id, state, updated_at)
          VALUES (${id}, ${state}, CURRENT_TIMESTAMP)`,
    );
  }

  async compareAndSetState(
    tableName: string,
    id: string,
    expectedState: string,
    nextState: string,
  ): Promise<boolean> {
    assertValidTableName(tableName);
    const result = await this.db.execute(
      sql`UPDATE ${sql.raw(tableName)}
          SET state = ${nextState}, updated_at = CURRENT_TIMESTAMP
          WHERE id = ${id} AND state = ${expectedState}
          RETURNING id`,
    );

    return extractRows(result).length === 1;
  }

  async insertStateChange(
    tableName: string,
    data: NewStateChange,
  ): Promise<void> {
    const changesTable = stateChangesTableOf(tableName);
    await this.db.execute(
      sql`INSERT INTO ${sql.raw(changesTable)} (record_id, from_state, to_state, event, occurred_at)
          VALUES (${data.recordId}, ${data.fromState}, ${data.toState}, ${data.event}, clock_timestamp())`,
    );
  }

  async findStateChanges(
    tableName: string,
    recordId: string,
  ): Promise<StateChangeRecord[]> {
    const changesTable = stateChangesTableOf(tableName);
    const result = await this.db.execute(
      sql`SELECT id, record_id, from_state, to_state, event, occurred_at
          FROM ${sql.raw(changesTable)}
          WHERE record_id = ${recordId}
          ORDER BY occurred_at ASC, id ASC`,
    );

    return extractRows(result).map(toStateChange);
  }

  async hasStateChanges(tableName: string, recordId: string): Promise<boolean> {
    const changesTable = stateChangesTableOf(tableName);
    const result = await this.db.execute(
      sql`SELECT id FROM ${sql.raw(changesTable)} WHERE record_id = ${recordId} LIMIT 1`,
    );

    return extractRows(result).length > 0;
  }

  async findByState(
    tableName: string,
    states: string[],
  ): Promise<StatefulRow[]> {
    assertValidTableName(tableName);
    if (states.length === 0) return [];

    const result = await this.db.execute(
      sql`SELECT id, state, updated_at FROM ${sql.raw(tableName)} WHERE ${this.stateIn(states)}`,
    );

    return extractRows(result).map(toStatefulRow);
  }

  async countByState(tableName: string, states: string[]): Promise<number> {
    assertValidTableName(tableName);
    if (states.length === 0) return 0;

    const result = await this.db.execute(
      sql`SELECT COUNT(*) AS count FROM ${sql.raw(tableName)} WHERE ${this.stateIn(states)}`,
    );

    const [row] = extractRows(result);
    return row ? Number(readString(row, 'count')) : 0;
  }

  async transaction<T>(
    cb: (adapter: IStateDbAdapter) => Promise<T>,
  ): Promise<T> {
    return this.db.transaction(async (tx) => {
      const txAdapter = new DrizzleStateAdapter(tx);
      return cb(txAdapter);
    });
  }

  private stateIn(states: string[]): SQL {
    return sql`state IN (${sql.join(
      states.map((state) => sql`${state}`),
      sql`, `,
    )})`;
  }
}
