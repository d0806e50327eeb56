import { randomUUID } from 'crypto';
import { ConcurrentTransitionConflictError } from '../errors/concurrent-transition-conflict.error';
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

export interface InMemoryStore {
  rowsByTable: Map<string, Map<string, StatefulRow>>;
  changesByTable: Map<string, StateChangeRecord[]>;
}

export interface StagedRow {
  /** State the live row must still hold at commit; `null` for an insert. */
  baseline: string | null;
  row: StatefulRow;
}

/** Writes of one open transaction, invisible to others until commit. */
export interface UnitOfWork {
  rows: Map<string, Map<string, StagedRow>>;
  changes: Map<string, StateChangeRecord[]>;
}

function cloneRow(row: StatefulRow): StatefulRow {
  return { id: row.id, state: row.state, updatedAt: new Date(row.updatedAt) };
}

function cloneChange(change: StateChangeRecord): StateChangeRecord {
  return { ...change, occurredAt: new Date(change.occurredAt) };
}

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  const existing = map.get(key);
  if (existing !== undefined) return existing;

  const next = create();
  map.set(key, next);
  return next;
}

/**
 * Process-local adapter. A transaction stages its writes and publishes them
 * in one step when the callback resolves, after checking that every row it
 * changed still holds the state it read. Transactions touching different
 * rows never overwrite each other.
 */
export class InMemoryStateAdapter implements IStateDbAdapter {
  private readonly store: InMemoryStore;

  constructor(
    store?: InMemoryStore,
    private readonly unit?: UnitOfWork,
  ) {
    this.store = store ?? {
      rowsByTable: new Map<string, Map<string, StatefulRow>>(),
      changesByTable: new Map<string, StateChangeRecord[]>(),
    };
  }

  async findOne(
    tableName: string,
    id: string,
    _lock?: boolean,
  ): Promise<StatefulRow | null> {
    assertValidTableName(tableName);
    const row = this.readRow(tableName, id);
    return row ? cloneRow(row) : null;
  }

  async insert(tableName: string, id: string, state: string): Promise<void> {
    assertValidTableName(tableName);
    if (this.readRow(tableName, id)) {
      throw new Error(`Row "${id}" already exists in ${tableName}`);
    }
    this.writeRow(tableName, null, { id, state, updatedAt: new Date() });
  }

  async compareAndSetState(
    tableName: string,
    id: string,
    expectedState: string,
    nextState: string,
  ): Promise<boolean> {
    assertValidTableName(tableName);
    const current = this.readRow(tableName, id);
    if (!current || current.state !== expectedState) {
      return false;
    }

    const staged = this.unit?.rows.get(tableName)?.get(id);
    this.writeRow(tableName, staged ? staged.baseline : current.state, {
      id,
      state: nextState,
      updatedAt: new Date(),
    });
    return true;
  }

  async insertStateChange(
    tableName: string,
    data: NewStateChange,
  ): Promise<void> {
    const changesTable = stateChangesTableOf(tableName);
    const target = this.unit ? this.unit.changes : this.store.changesByTable;

    getOrCreate(target, changesTable, () => []).push({
      id: randomUUID(),
      recordId: data.recordId,
      fromState: data.fromState,
      toState: data.toState,
      event: data.event,
      occurredAt: new Date(),
    });
  }

  async findStateChanges(
    tableName: string,
    recordId: string,
  ): Promise<StateChangeRecord[]> {
    return this.readChanges(tableName)
      .filter((change) => change.recordId === recordId)
      .map(cloneChange);
  }

  async hasStateChanges(tableName: string, recordId: string): Promise<boolean> {
    return this.readChanges(tableName).some(
      (change) => change.recordId === recordId,
    );
  }

  async findByState(
    tableName: string,
    states: string[],
  ): Promise<StatefulRow[]> {
    assertValidTableName(tableName);

    const visible = new Map<string, StatefulRow>(
      this.store.rowsByTable.get(tableName),
    );
    for (const [id, staged] of this.unit?.rows.get(tableName) ?? []) {
      visible.set(id, staged.row);
    }

    const matches: StatefulRow[] = [];
    for (const row of visible.values()) {
      if (states.includes(row.state)) {
        matches.push(cloneRow(row));
      }
    }
    return matches;
  }

  async countByState(tableName: string, states: string[]): Promise<number> {
    const rows = await this.findByState(tableName, states);
    return rows.length;
  }

  async transaction<T>(
    cb: (adapter: IStateDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.unit) {
      return cb(this);
    }

    const unit: UnitOfWork = { rows: new Map(), changes: new Map() };
    const txAdapter = new InMemoryStateAdapter(this.store, unit);

    const result = await cb(txAdapter);
    this.commit(unit);
    return result;
  }

  /** Validates and applies a unit synchronously, so no other unit interleaves. */
  private commit(unit: UnitOfWork): void {
    for (const [tableName, rows] of unit.rows) {
      const live = this.store.rowsByTable.get(tableName);
      for (const [id, staged] of rows) {
        const current = live?.get(id);
        if (staged.baseline === null) {
          if (current) {
            throw new Error(`Row "${id}" already exists in ${tableName}`);
          }
        } else if (!current || current.state !== staged.baseline) {
          throw new ConcurrentTransitionConflictError(
            tableName,
            id,
            staged.baseline,
            staged.row.state,
          );
        }
      }
    }

    for (const [tableName, rows] of unit.rows) {
      const live = getOrCreate(this.store.rowsByTable, tableName, () => new Map());
      for (const [id, staged] of rows) {
        live.set(id, cloneRow(staged.row));
      }
    }
    for (const [changesTable, changes] of unit.changes) {
      getOrCreate(this.store.changesByTable, changesTable, () => []).push(
        ...changes,
      );
    }
  }

  private readRow(tableName: string, id: string): StatefulRow | undefined {
    const staged = this.unit?.rows.get(tableName)?.get(id);
    return staged ? staged.row : this.store.rowsByTable.get(tableName)?.get(id);
  }

  private writeRow(
    tableName: string,
    baseline: string | null,
    row: StatefulRow,
  ): void {
    if (this.unit) {
      getOrCreate(this.unit.rows, tableName, () => new Map()).set(row.id, {
        baseline,
        row,
      });
      return;
    }
    getOrCreate(this.store.rowsByTable, tableName, () => new Map()).set(
      row.id,
      row,
    );
  }

  private readChanges(tableName: string): StateChangeRecord[] {
    const changesTable = stateChangesTableOf(tableName);
    return [
      ...(this.store.changesByTable.get(changesTable) ?? []),
      ...(this.unit?.changes.get(changesTable) ?? []),
    ];
  }
}
