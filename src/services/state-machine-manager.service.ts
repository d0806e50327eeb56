import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { ActiveState } from '../definitions/active-state';
import type { StateTransition } from '../definitions/state-transition';
import { EventNotActiveError } from '../errors/event-not-active.error';
import { StateNotActiveError } from '../errors/state-not-active.error';
import { StatefulRecordNotFoundError } from '../errors/stateful-record-not-found.error';
import { StateMachineEventType } from '../events/state-machine-event-type.enum';
import type {
  StateInitializedEvent,
  StateTransitionEvent,
} from '../events/state-machine-events';
import type {
  AppliedOutcome,
  FireOutcome,
  NoMatchOutcome,
} from '../interfaces/fire-outcome.interface';
import { IStateDbAdapter } from '../interfaces/state-db-adapter.interface';
import type {
  StateChangeRecord,
  StatefulRow,
} from '../interfaces/state-records.interface';
import {
  StatefulRecord,
  hasState,
} from '../interfaces/stateful-record.interface';
import {
  STATE_DB_ADAPTER,
  STATE_MACHINE_MODULE_OPTIONS,
} from '../state-machine.constants';
import {
  RegisteredStateMachine,
  StateMachineRegistry,
} from './state-machine-registry.service';
import { TransitionExecutor } from './transition-executor.service';

export interface StateMachineManagerOptions {
  emitEvents: boolean;
}

export type EnteredAt = 'first' | 'last' | 'all';

@Injectable()
export class StateMachineManager {
  private readonly logger = new Logger(StateMachineManager.name);
  private readonly executor: TransitionExecutor;

  constructor(
    private readonly registry: StateMachineRegistry,
    @Inject(STATE_DB_ADAPTER) private readonly adapter: IStateDbAdapter,
    private readonly eventEmitter: EventEmitter2,
    @Inject(STATE_MACHINE_MODULE_OPTIONS)
    private readonly options: StateMachineManagerOptions,
    @Optional() executor?: TransitionExecutor,
  ) {
    this.executor = executor ?? new TransitionExecutor();
  }

  /**
   * Fires `eventName` on the record. Resolves to `no_match` when no
   * transition applies from the current state, leaving the record and its
   * history untouched. Errors from lookups, callbacks and the conditional
   * write are thrown as-is after rollback.
   */
  async fire(
    record: StatefulRecord,
    eventName: string,
    ...args: unknown[]
  ): Promise<NoMatchOutcome | AppliedOutcome> {
    const machine = this.registry.resolve(record);
    const event = machine.events.get(eventName);
    if (!event) {
      throw new EventNotActiveError(machine.owner.name, eventName);
    }

    const from = this.currentStateOf(machine, record);
    const transition = event.findTransition(from.name, record, args);
    if (!transition) {
      this.logger.debug(
        `${machine.tableName}/${record.id}: ${eventName} has no transition from ${from.name}`,
      );
      return { status: 'no_match', event: eventName, state: from.name };
    }

    const to = this.activeState(machine, transition.to);
    let outcome: AppliedOutcome;
    try {
      outcome = await this.executor.execute(this.adapter, {
        machine,
        record,
        from,
        to,
        event,
        args,
      });
    } catch (error) {
      this.logger.warn(
        `${machine.tableName}/${record.id}: ${eventName} (${from.name} -> ${to.name}) rolled back: ` +
          (error instanceof Error ? error.message : String(error)),
      );
      throw error;
    }

    this.logger.log(
      `${machine.tableName}/${record.id}: ${outcome.fromState} -> ${outcome.toState} via ${eventName}`,
    );
    this.emitTransition(machine, record, outcome, args);
    return outcome;
  }

  /**
   * Like `fire`, but reports failures as a `rejected` outcome carrying the
   * original error instead of throwing.
   */
  async tryFire(
    record: StatefulRecord,
    eventName: string,
    ...args: unknown[]
  ): Promise<FireOutcome> {
    try {
      return await this.fire(record, eventName, ...args);
    } catch (error) {
      return {
        status: 'rejected',
        event: eventName,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  possibleTransitions(
    record: StatefulRecord,
    eventName: string,
    ...args: unknown[]
  ): StateTransition[] {
    const machine = this.registry.resolve(record);
    const event = machine.events.get(eventName);
    if (!event) {
      throw new EventNotActiveError(machine.owner.name, eventName);
    }
    const from = this.currentStateOf(machine, record);
    return event.possibleTransitionsFrom(from.name, record, args);
  }

  nextStateForEvent(
    record: StatefulRecord,
    eventName: string,
    ...args: unknown[]
  ): string | null {
    const [first] = this.possibleTransitions(record, eventName, ...args);
    return first?.to ?? null;
  }

  nextStatesForEvent(
    record: StatefulRecord,
    eventName: string,
    ...args: unknown[]
  ): string[] {
    return this.possibleTransitions(record, eventName, ...args).map(
      (transition) => transition.to,
    );
  }

  canFire(
    record: StatefulRecord,
    eventName: string,
    ...args: unknown[]
  ): boolean {
    return this.nextStateForEvent(record, eventName, ...args) !== null;
  }

  isActiveState(owner: Function, name: string): boolean {
    return this.registry.isActiveState(owner, name);
  }

  isActiveEvent(owner: Function, name: string): boolean {
    return this.registry.isActiveEvent(owner, name);
  }

  currentState(record: StatefulRecord): ActiveState {
    return this.currentStateOf(this.registry.resolve(record), record);
  }

  isInState(record: StatefulRecord, name: string): boolean {
    const machine = this.registry.resolve(record);
    this.activeState(machine, name);
    return record.state === name;
  }

  async countInStates(owner: Function, ...names: string[]): Promise<number> {
    const machine = this.machineFor(owner, names);
    return this.adapter.countByState(machine.tableName, names);
  }

  async findInStates(
    owner: Function,
    ...names: string[]
  ): Promise<StatefulRow[]> {
    const machine = this.machineFor(owner, names);
    return this.adapter.findByState(machine.tableName, names);
  }

  async historyOf(record: StatefulRecord): Promise<StateChangeRecord[]> {
    const machine = this.registry.resolve(record);
    return machine.recorder.historyOf(this.adapter, record);
  }

  /**
   * When the record entered `name`, read from its state change history.
   */
  stateEnteredAt(
    record: StatefulRecord,
    name: string,
    which?: 'first' | 'last',
  ): Promise<Date | null>;
  stateEnteredAt(
    record: StatefulRecord,
    name: string,
    which: 'all',
  ): Promise<Date[]>;
  async stateEnteredAt(
    record: StatefulRecord,
    name: string,
    which: EnteredAt = 'last',
  ): Promise<Date | Date[] | null> {
    const machine = this.registry.resolve(record);
    this.activeState(machine, name);

    const history = await machine.recorder.historyOf(this.adapter, record);
    const entered = history
      .filter((change) => change.toState === name)
      .map((change) => change.occurredAt);

    if (which === 'all') return entered;
    const picked = which === 'first' ? entered[0] : entered[entered.length - 1];
    return picked ?? null;
  }

  /**
   * Puts the record into its initial state unless it already has one. Call
   * before the record is first persisted so the first write carries a state.
   */
  assignInitialState(record: StatefulRecord): string {
    if (hasState(record)) {
      return record.state;
    }

    const machine = this.registry.resolve(record);
    const initial = this.activeState(
      machine,
      this.registry.initialStateName(machine, record),
    );
    record.state = initial.name;
    return initial.name;
  }

  /**
   * Call right after the record was first persisted. Runs `afterEnter` of
   * the initial state and records the `(null -> initial)` entry once.
   */
  async runInitialStateActions(
    record: StatefulRecord,
    adapter: IStateDbAdapter = this.adapter,
  ): Promise<boolean> {
    const machine = this.registry.resolve(record);
    const initial = this.activeState(
      machine,
      this.registry.initialStateName(machine, record),
    );

    const ran = await this.executor.enterInitialState(
      adapter,
      machine,
      record,
      initial,
    );
    if (ran && adapter === this.adapter) {
      this.emitInitialized(machine, record, initial.name);
    }
    return ran;
  }

  /**
   * Assigns the initial state, inserts the row and runs the initial state
   * actions in one transaction.
   */
  async create<R extends StatefulRecord>(record: R): Promise<R> {
    const machine = this.registry.resolve(record);
    const state = this.assignInitialState(record);

    const ran = await this.adapter.transaction(async (txAdapter) => {
      await txAdapter.insert(machine.tableName, record.id, state);
      return this.runInitialStateActions(record, txAdapter);
    });

    this.logger.log(
      `${machine.tableName}/${record.id}: created in state ${state}`,
    );
    if (ran) {
      this.emitInitialized(machine, record, state);
    }
    return record;
  }

  /**
   * Reloads the persisted state into the record, e.g. before retrying after
   * a ConcurrentTransitionConflictError.
   */
  async refresh<R extends StatefulRecord>(record: R): Promise<R> {
    const machine = this.registry.resolve(record);
    const row = await this.adapter.findOne(machine.tableName, record.id);
    if (!row) {
      throw new StatefulRecordNotFoundError(machine.tableName, record.id);
    }
    record.state = row.state;
    return record;
  }

  private currentStateOf(
    machine: RegisteredStateMachine,
    record: StatefulRecord,
  ): ActiveState {
    const current = hasState(record) ? record.state : null;
    const state = current === null ? undefined : machine.states.get(current);
    if (!state) {
      throw new StateNotActiveError(machine.owner.name, current);
    }
    return state;
  }

  private activeState(
    machine: RegisteredStateMachine,
    name: string,
  ): ActiveState {
    const state = machine.states.get(name);
    if (!state) {
      throw new StateNotActiveError(machine.owner.name, name);
    }
    return state;
  }

  private machineFor(
    owner: Function,
    names: string[],
  ): RegisteredStateMachine {
    const machine = this.registry.find(owner) ?? this.registry.getOrThrow(owner);
    for (const name of names) {
      this.activeState(machine, name);
    }
    return machine;
  }

  private emitTransition(
    machine: RegisteredStateMachine,
    record: StatefulRecord,
    outcome: AppliedOutcome,
    args: readonly unknown[],
  ): void {
    if (!this.options.emitEvents) return;

    this.eventEmitter.emit(StateMachineEventType.TRANSITION, {
      owner: record.constructor.name,
      tableName: machine.tableName,
      recordId: record.id,
      fromState: outcome.fromState,
      toState: outcome.toState,
      event: outcome.event,
      args,
      timestamp: new Date(),
    } satisfies StateTransitionEvent);
  }

  private emitInitialized(
    machine: RegisteredStateMachine,
    record: StatefulRecord,
    state: string,
  ): void {
    if (!this.options.emitEvents) return;

    this.eventEmitter.emit(StateMachineEventType.INITIALIZED, {
      owner: record.constructor.name,
      tableName: machine.tableName,
      recordId: record.id,
      state,
      timestamp: new Date(),
    } satisfies StateInitializedEvent);
  }
}
