import type { IStateDbAdapter } from '../interfaces/state-db-adapter.interface';
import type { StateChangeRecord } from '../interfaces/state-records.interface';
import type { StatefulRecord } from '../interfaces/stateful-record.interface';

export interface StateChangeEntry {
  fromState: string | null;
  toState: string;
  event: string | null;
}

export interface IStateChangeRecorder {
  readonly enabled: boolean;
  /** Called only from inside a transition's atomic unit. */
  append(
    adapter: IStateDbAdapter,
    record: StatefulRecord,
    change: StateChangeEntry,
  ): Promise<void>;
  hasEntries(adapter: IStateDbAdapter, record: StatefulRecord): Promise<boolean>;
  historyOf(
    adapter: IStateDbAdapter,
    record: StatefulRecord,
  ): Promise<StateChangeRecord[]>;
}

class DisabledStateChangeRecorder implements IStateChangeRecorder {
  readonly enabled = false;

  append(): Promise<void> {
    return Promise.resolve();
  }

  hasEntries(): Promise<boolean> {
    return Promise.resolve(false);
  }

  historyOf(): Promise<StateChangeRecord[]> {
    return Promise.resolve([]);
  }
}

class AdapterStateChangeRecorder implements IStateChangeRecorder {
  readonly enabled = true;

  constructor(private readonly tableName: string) {}

  async append(
    adapter: IStateDbAdapter,
    record: StatefulRecord,
    change: StateChangeEntry,
  ): Promise<void> {
    await adapter.insertStateChange(this.tableName, {
      recordId: record.id,
      fromState: change.fromState,
      toState: change.toState,
      event: change.event,
    });
  }

  hasEntries(
    adapter: IStateDbAdapter,
    record: StatefulRecord,
  ): Promise<boolean> {
    return adapter.hasStateChanges(this.tableName, record.id);
  }

  historyOf(
    adapter: IStateDbAdapter,
    record: StatefulRecord,
  ): Promise<StateChangeRecord[]> {
    return adapter.findStateChanges(this.tableName, record.id);
  }
}

const DISABLED = new DisabledStateChangeRecorder();

export function createStateChangeRecorder(config: {
  tableName: string;
  recordChanges: boolean;
}): IStateChangeRecorder {
  return config.recordChanges
    ? new AdapterStateChangeRecorder(config.tableName)
    : DISABLED;
}
