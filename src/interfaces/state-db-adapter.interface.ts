import {
  NewStateChange,
  StateChangeRecord,
  StatefulRow,
} from './state-records.interface';

export interface IStateDbAdapter {
  /**
   * Find a stateful row by ID.
   * @param lock - If true, use SELECT ... FOR UPDATE
   */
  findOne(
    tableName: string,
    id: string,
    lock?: boolean,
  ): Promise<StatefulRow | null>;

  /**
   * Insert a new row already carrying its initial state.
   */
  insert(tableName: string, id: string, state: string): Promise<void>;

  /**
   * Write `nextState` only if the persisted state still equals
   * `expectedState`. Resolves false when no row was updated.
   */
  compareAndSetState(
    tableName: string,
    id: string,
    expectedState: string,
    nextState: string,
  ): Promise<boolean>;

  /**
   * Append an audit row to `<tableName>_state_changes`.
   */
  insertStateChange(tableName: string, data: NewStateChange): Promise<void>;

  /**
   * All state changes of a record, oldest first.
   */
  findStateChanges(
    tableName: string,
    recordId: string,
  ): Promise<StateChangeRecord[]>;

  hasStateChanges(tableName: string, recordId: string): Promise<boolean>;

  findByState(tableName: string, states: string[]): Promise<StatefulRow[]>;

  countByState(tableName: string, states: string[]): Promise<number>;

  /**
   * Execute a callback within a database transaction.
   * The callback receives an adapter instance bound to the transaction.
   */
  transaction<T>(cb: (adapter: IStateDbAdapter) => Promise<T>): Promise<T>;
}
