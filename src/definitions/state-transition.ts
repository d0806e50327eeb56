import type { StatefulRecord } from '../interfaces/stateful-record.interface';
import { Condition, RecordCondition, toArray } from './conditional-callback';

export interface TransitionOptions<R extends StatefulRecord = StatefulRecord> {
  /** States the transition may start from. Omitted or empty means any state. */
  from?: string | string[];
  if?: Condition<R> | Condition<R>[];
  unless?: Condition<R> | Condition<R>[];
}

export class StateTransition {
  readonly from: ReadonlySet<string>;

  private constructor(
    readonly event: string,
    readonly to: string,
    from: Iterable<string>,
    private readonly guard: RecordCondition,
  ) {
    this.from = new Set(from);
  }

  static create<R extends StatefulRecord>(
    event: string,
    to: string,
    options: TransitionOptions<R> = {},
  ): StateTransition {
    return new StateTransition(
      event,
      to,
      toArray(options.from),
      RecordCondition.from(options.if, options.unless),
    );
  }

  isEligibleFrom(stateName: string): boolean {
    return this.from.size === 0 || this.from.has(stateName);
  }

  passesGuard(record: StatefulRecord, args: readonly unknown[]): boolean {
    return this.guard.evaluate(record, args);
  }

  matches(
    stateName: string,
    record: StatefulRecord,
    args: readonly unknown[],
  ): boolean {
    return this.isEligibleFrom(stateName) && this.passesGuard(record, args);
  }
}
