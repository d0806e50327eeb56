import { NO_STATE } from '../state-machine.constants';

export interface StatefulRecord {
  id: string;
  /** Current state name. `null`, `undefined` and `NO_STATE` mean unset. */
  state?: string | null;
}

/**
 * A class whose instances are stateful records. Typed through `prototype`
 * so both class literals and classes found at runtime fit.
 */
export type StatefulType<R extends StatefulRecord = StatefulRecord> =
  Function & { prototype: R };

export function hasState(
  record: StatefulRecord,
): record is StatefulRecord & { state: string } {
  return (
    record.state !== undefined &&
    record.state !== null &&
    record.state !== NO_STATE
  );
}
