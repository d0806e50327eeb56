import type { MachineBuilder } from '../definitions/machine-builder';
import type { StatefulRecord } from './stateful-record.interface';

export type InitialStateResolver<R> = {
  resolve(record: R): string;
}['resolve'];

/** A state name, or a function choosing one per record. */
export type InitialState<R> = string | InitialStateResolver<R>;

/**
 * Vocabulary an owner type may activate. Defining a state or event outside
 * of it fails, so a typo cannot create a state nothing ever reaches.
 */
export interface StateCatalog {
  states: readonly string[];
  events: readonly string[];
}

export interface StateMachineOptions<R extends StatefulRecord = StatefulRecord> {
  /** Storage table. Derived from the class name when omitted; subclasses inherit it. */
  tableName?: string;
  /** Required for base machines; subclasses inherit their parent's. */
  initial?: InitialState<R>;
  /** Append a state change row per realized transition. */
  recordChanges?: boolean;
  /** Subclass catalogs are merged with their parent's. */
  catalog?: Partial<StateCatalog>;
  define?(machine: MachineBuilder<R>): void;
}
