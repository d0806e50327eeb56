import { Injectable } from '@nestjs/common';
import type { ActiveEvent } from '../definitions/active-event';
import type { ActiveState } from '../definitions/active-state';
import type { TransitionInput } from '../definitions/conditional-callback';
import { ConcurrentTransitionConflictError } from '../errors/concurrent-transition-conflict.error';
import type { AppliedOutcome } from '../interfaces/fire-outcome.interface';
import type { IStateDbAdapter } from '../interfaces/state-db-adapter.interface';
import type { StatefulRecord } from '../interfaces/stateful-record.interface';
import type { RegisteredStateMachine } from './state-machine-registry.service';

export interface TransitionRequest {
  machine: RegisteredStateMachine;
  record: StatefulRecord;
  from: ActiveState;
  to: ActiveState;
  event: ActiveEvent;
  args: readonly unknown[];
}

/**
 * Runs a selected transition inside one atomic unit opened on the given
 * adapter. Order is fixed:
 *
 * 1. `beforeExit` of the old state
 * 2. `beforeEnter` of the new state
 * 3. `before` of the event
 * 4. compare-and-set write, then the audit row
 * 5. `afterExit` of the old state
 * 6. `afterEnter` of the new state
 * 7. `after` of the event
 *
 * Any failure rolls the unit back and puts the old state back on the record.
 */
@Injectable()
export class TransitionExecutor {
  async execute(
    adapter: IStateDbAdapter,
    request: TransitionRequest,
  ): Promise<AppliedOutcome> {
    const { machine, record, from, to, event, args } = request;

    try {
      return await adapter.transaction(async (unit) => {
        const input: TransitionInput = {
          record,
          fromState: from.name,
          toState: to.name,
          event: event.name,
          args,
          adapter: unit,
        };

        await from.run('beforeExit', input);
        await to.run('beforeEnter', input);
        await event.run('before', input);

        const written = await unit.compareAndSetState(
          machine.tableName,
          record.id,
          from.name,
          to.name,
        );
        if (!written) {
          throw new ConcurrentTransitionConflictError(
            machine.tableName,
            record.id,
            from.name,
            to.name,
          );
        }
        record.state = to.name;

        await machine.recorder.append(unit, record, {
          fromState: from.name,
          toState: to.name,
          event: event.name,
        });

        await from.run('afterExit', input);
        await to.run('afterEnter', input);
        await event.run('after', input);

        return {
          status: 'applied' as const,
          event: event.name,
          fromState: from.name,
          toState: to.name,
        };
      });
    } catch (error) {
      record.state = from.name;
      throw error;
    }
  }

  /**
   * Runs `afterEnter` of the initial state and appends the
   * `(null -> initial, null)` entry, unless the record already has history.
   * Resolves to whether anything ran.
   */
  async enterInitialState(
    adapter: IStateDbAdapter,
    machine: RegisteredStateMachine,
    record: StatefulRecord,
    initial: ActiveState,
  ): Promise<boolean> {
    return adapter.transaction(async (unit) => {
      if (await machine.recorder.hasEntries(unit, record)) {
        return false;
      }

      await initial.run('afterEnter', {
        record,
        fromState: null,
        toState: initial.name,
        event: null,
        args: [],
        adapter: unit,
      });

      await machine.recorder.append(unit, record, {
        fromState: null,
        toState: initial.name,
        event: null,
      });
      return true;
    });
  }
}
