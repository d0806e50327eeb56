import type { SQL } from 'drizzle-orm';
import { PgDialect } from 'drizzle-orm/pg-core';
import {
  DrizzleDatabase,
  DrizzleStateAdapter,
} from '../../src/adapters/drizzle-state.adapter';

interface ExecutedQuery {
  sql: string;
  params: unknown[];
}

const dialect = new PgDialect();

// Renders every executed query with the Postgres dialect and replies with the
// queued results, falling back to an empty node-postgres result.
function createMockDrizzleDb(results: unknown[] = []) {
  const executedQueries: ExecutedQuery[] = [];

  const execute = jest.fn((query: SQL) => {
    const rendered = dialect.sqlToQuery(query);
    executedQueries.push({
      sql: rendered.sql.replace(/\s+/g, ' ').trim(),
      params: rendered.params,
    });
    return Promise.resolve(results.length > 0 ? results.shift() : { rows: [] });
  });

  const db: DrizzleDatabase & { transaction: jest.Mock } = {
    execute,
    transaction: jest
      .fn()
      .mockImplementation(
        async (cb: (tx: DrizzleDatabase) => Promise<unknown>) => cb(db),
      ),
  };

  return { db, execute, executedQueries };
}

describe('DrizzleStateAdapter', () => {
  it('should reject invalid table names before executing', async () => {
    const { db, executedQueries } = createMockDrizzleDb();
    const adapter = new DrizzleStateAdapter(db);

    await expect(adapter.findOne("vehicles' OR 1=1", 'v1')).rejects.toThrow(
      'Invalid table name',
    );
    expect(executedQueries).toHaveLength(0);
  });

  describe('findOne', () => {
    it('should read node-postgres shaped results', async () => {
      const { db, executedQueries } = createMockDrizzleDb([
        {
          rows: [
            { id: 'v1', state: 'idling', updated_at: '2025-01-01T00:00:00.000Z' },
          ],
        },
      ]);
      const adapter = new DrizzleStateAdapter(db);

      const row = await adapter.findOne('vehicles', 'v1', true);

      expect(row).toEqual({
        id: 'v1',
        state: 'idling',
        updatedAt: new Date('2025-01-01T00:00:00.000Z'),
      });
      expect(executedQueries[0]).toEqual({
        sql: 'SELECT id, state, updated_at FROM vehicles WHERE id = $1 FOR UPDATE',
        params: ['v1'],
      });
    });

    it('should read postgres-js shaped results', async () => {
      const { db, executedQueries } = createMockDrizzleDb([
        [{ id: 'v1', state: 'parked', updated_at: new Date(0) }],
      ]);
      const adapter = new DrizzleStateAdapter(db);

      const row = await adapter.findOne('vehicles', 'v1');

      expect(row).toEqual({ id: 'v1', state: 'parked', updatedAt: new Date(0) });
      expect(executedQueries[0].sql).toBe(
        'SELECT id, state, updated_at FROM vehicles WHERE id = $1',
      );
    });

    it('should return null when nothing matches', async () => {
      const { db } = createMockDrizzleDb();
      const adapter = new DrizzleStateAdapter(db);

      await expect(adapter.findOne('vehicles', 'v1')).resolves.toBeNull();
    });
  });

  it('should insert a row with its initial state', async () => {
    const { db, executedQueries } = createMockDrizzleDb();
    const adapter = new DrizzleStateAdapter(db);

    await adapter.insert('vehicles', 'v1', 'parked');

    expect(executedQueries[0]).toEqual({
      sql: 'INSERT INTO vehicles (id, state, updated_at) VALUES ($1, $2, CURRENT_TIMESTAMP)',
      params: ['v1', 'parked'],
    });
  });

  describe('compareAndSetState', () => {
    it('should guard the update with the expected state', async () => {
      const { db, executedQueries } = createMockDrizzleDb([
        { rows: [{ id: 'v1' }] },
      ]);
      const adapter = new DrizzleStateAdapter(db);

      await expect(
        adapter.compareAndSetState('vehicles', 'v1', 'parked', 'idling'),
      ).resolves.toBe(true);
      expect(executedQueries[0]).toEqual({
        sql: 'UPDATE vehicles SET state = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2 AND state = $3 RETURNING id',
        params: ['idling', 'v1', 'parked'],
      });
    });

    it('should report false when no row was updated', async () => {
      const { db } = createMockDrizzleDb();
      const adapter = new DrizzleStateAdapter(db);

      await expect(
        adapter.compareAndSetState('vehicles', 'v1', 'parked', 'idling'),
      ).resolves.toBe(false);
    });
  });

  it('should append state changes to the _state_changes table', async () => {
    const { db, executedQueries } = createMockDrizzleDb();
    const adapter = new DrizzleStateAdapter(db);

    await adapter.insertStateChange('vehicles', {
      recordId: 'v1',
      fromState: null,
      toState: 'parked',
      event: null,
    });

    expect(executedQueries[0]).toEqual({
      sql: 'INSERT INTO vehicles_state_changes (record_id, from_state, to_state, event, occurred_at) VALUES ($1, $2, $3, $4, clock_timestamp())',
      params: ['v1', null, 'parked', null],
    });
  });

  it('should map state change rows', async () => {
    const { db } = createMockDrizzleDb([
      {
        rows: [
          {
            id: 5,
            record_id: 'v1',
            from_state: 'parked',
            to_state: 'idling',
            event: 'ignite',
            occurred_at: '2025-01-01T00:00:00.000Z',
          },
        ],
      },
    ]);
    const adapter = new DrizzleStateAdapter(db);

    await expect(adapter.findStateChanges('vehicles', 'v1')).resolves.toEqual([
      {
        id: '5',
        recordId: 'v1',
        fromState: 'parked',
        toState: 'idling',
        event: 'ignite',
        occurredAt: new Date('2025-01-01T00:00:00.000Z'),
      },
    ]);
  });

  it('should fail on rows missing required columns', async () => {
    const { db } = createMockDrizzleDb([{ rows: [{ id: 'v1' }] }]);
    const adapter = new DrizzleStateAdapter(db);

    await expect(adapter.findOne('vehicles', 'v1')).rejects.toThrow(
      'Expected column "state" to hold a string',
    );
  });

  it('should filter and count by a list of states', async () => {
    const { db, executedQueries } = createMockDrizzleDb([
      { rows: [] },
      { rows: [{ count: '4' }] },
    ]);
    const adapter = new DrizzleStateAdapter(db);

    await adapter.findByState('vehicles', ['parked', 'idling']);
    const count = await adapter.countByState('vehicles', ['parked', 'idling']);

    expect(count).toBe(4);
    expect(executedQueries).toEqual([
      {
        sql: 'SELECT id, state, updated_at FROM vehicles WHERE state IN ($1, $2)',
        params: ['parked', 'idling'],
      },
      {
        sql: 'SELECT COUNT(*) AS count FROM vehicles WHERE state IN ($1, $2)',
        params: ['parked', 'idling'],
      },
    ]);
  });

  it('should skip the query for an empty state list', async () => {
    const { db, executedQueries } = createMockDrizzleDb();
    const adapter = new DrizzleStateAdapter(db);

    await expect(adapter.findByState('vehicles', [])).resolves.toEqual([]);
    await expect(adapter.countByState('vehicles', [])).resolves.toBe(0);
    expect(executedQueries).toHaveLength(0);
  });

  it('should run the callback through db.transaction', async () => {
    const { db, executedQueries } = createMockDrizzleDb();
    const adapter = new DrizzleStateAdapter(db);

    const result = await adapter.transaction(async (tx) => {
      await tx.insert('vehicles', 'v1', 'parked');
      return 'done';
    });

    expect(result).toBe('done');
    expect(db.transaction).toHaveBeenCalledTimes(1);
    expect(executedQueries).toHaveLength(1);
  });
});
