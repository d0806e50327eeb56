import {
  Inject,
  Injectable,
  Logger,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { ActiveState, StateCallbackOptions } from '../definitions/active-state';
import {
  ActiveEvent,
  EventBuilder,
  EventCallbackOptions,
  TransitionSpec,
} from '../definitions/active-event';
import { toArray } from '../definitions/conditional-callback';
import { EventDefinition, MachineBuilder } from '../definitions/machine-builder';
import type { StatefulEntityMetadata } from '../decorators/stateful.decorator';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { EventAlreadyActiveError } from '../errors/event-already-active.error';
import { EventNotActiveError } from '../errors/event-not-active.error';
import { EventNotFoundError } from '../errors/event-not-found.error';
import { NoInitialStateError } from '../errors/no-initial-state.error';
import { StateAlreadyActiveError } from '../errors/state-already-active.error';
import { StateMachineNotRegisteredError } from '../errors/state-machine-not-registered.error';
import { StateNotActiveError } from '../errors/state-not-active.error';
import { StateNotFoundError } from '../errors/state-not-found.error';
import type { ResolvedStateMachineOptions } from '../interfaces/state-machine-module-options.interface';
import type {
  InitialState,
  StateMachineOptions,
} from '../interfaces/state-machine-options.interface';
import type {
  StatefulRecord,
  StatefulType,
} from '../interfaces/stateful-record.interface';
import {
  IStateChangeRecorder,
  createStateChangeRecorder,
} from '../recorders/state-change-recorder';
import {
  DEFAULT_RECORD_CHANGES,
  STATEFUL_ENTITY_METADATA,
  STATE_MACHINE_MODULE_OPTIONS,
} from '../state-machine.constants';
import { deriveTableName } from '../utils/derive-table-name';

export interface RegisteredStateMachine {
  owner: Function;
  parent: Function | null;
  tableName: string;
  initial: InitialState<StatefulRecord>;
  recordChanges: boolean;
  recorder: IStateChangeRecorder;
  catalog: {
    states: ReadonlySet<string>;
    events: ReadonlySet<string>;
  };
  states: ReadonlyMap<string, ActiveState>;
  events: ReadonlyMap<string, ActiveEvent>;
}

interface OwnedStateMachine extends RegisteredStateMachine {
  states: Map<string, ActiveState>;
  events: Map<string, ActiveEvent>;
}

export type StateMachineRegistryOptions = Pick<
  ResolvedStateMachineOptions,
  'entities' | 'recordChanges'
>;

function parentOf(owner: Function): Function | null {
  const parent: unknown = Object.getPrototypeOf(owner);
  return typeof parent === 'function' && parent !== Function.prototype
    ? parent
    : null;
}

@Injectable()
export class StateMachineRegistry implements OnModuleInit {
  private readonly logger = new Logger(StateMachineRegistry.name);
  private readonly machines = new Map<Function, OwnedStateMachine>();
  private readonly options: StateMachineRegistryOptions;

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
    @Optional()
    @Inject(STATE_MACHINE_MODULE_OPTIONS)
    options?: StateMachineRegistryOptions,
  ) {
    this.options = options ?? {
      entities: [],
      recordChanges: DEFAULT_RECORD_CHANGES,
    };
  }

  onModuleInit(): void {
    const candidates = new Set<Function>(this.options.entities);
    for (const wrapper of this.discoveryService.getProviders()) {
      if (wrapper.metatype && this.ownMetadata(wrapper.metatype)) {
        candidates.add(wrapper.metatype);
      }
    }

    for (const target of candidates) {
      this.registerEntity(target);
    }
  }

  register<R extends StatefulRecord>(
    owner: StatefulType<R>,
    options: StateMachineOptions<R> = {},
  ): RegisteredStateMachine {
    if (this.machines.has(owner)) {
      throw new DuplicateRegistrationError(owner.name);
    }
    if (!options.initial) {
      throw new NoInitialStateError(owner.name);
    }

    const tableName = options.tableName ?? deriveTableName(owner.name);
    const recordChanges = options.recordChanges ?? this.options.recordChanges;
    const machine: OwnedStateMachine = {
      owner,
      parent: null,
      tableName,
      initial: options.initial,
      recordChanges,
      recorder: createStateChangeRecorder({ tableName, recordChanges }),
      catalog: {
        states: new Set(options.catalog?.states ?? []),
        events: new Set(options.catalog?.events ?? []),
      },
      states: new Map(),
      events: new Map(),
    };

    this.assertInitialInCatalog(machine);
    this.machines.set(owner, machine);
    options.define?.(new MachineBuilder(this, owner));

    this.logger.log(
      `Registered state machine: ${owner.name} -> ${tableName} ` +
        `(${machine.states.size} states, ${machine.events.size} events)`,
    );
    return machine;
  }

  /**
   * Gives `subclass` its own copy of every state and event of `parent`.
   * Changes made afterwards on either side stay on that side.
   */
  inherit<P extends StatefulRecord, C extends P>(
    parent: StatefulType<P>,
    subclass: StatefulType<C>,
    options: StateMachineOptions<C> = {},
  ): RegisteredStateMachine {
    const base = this.getOrThrow(parent);
    if (this.machines.has(subclass)) {
      throw new DuplicateRegistrationError(subclass.name);
    }

    const tableName = options.tableName ?? base.tableName;
    const recordChanges = options.recordChanges ?? base.recordChanges;
    const machine: OwnedStateMachine = {
      owner: subclass,
      parent,
      tableName,
      initial: options.initial ?? base.initial,
      recordChanges,
      recorder: createStateChangeRecorder({ tableName, recordChanges }),
      catalog: {
        states: new Set([
          ...base.catalog.states,
          ...(options.catalog?.states ?? []),
        ]),
        events: new Set([
          ...base.catalog.events,
          ...(options.catalog?.events ?? []),
        ]),
      },
      states: new Map(
        Array.from(base.states, ([name, state]): [string, ActiveState] => [
          name,
          state.dup(subclass),
        ]),
      ),
      events: new Map(
        Array.from(base.events, ([name, event]): [string, ActiveEvent] => [
          name,
          event.dup(subclass),
        ]),
      ),
    };

    this.assertInitialInCatalog(machine);
    this.machines.set(subclass, machine);
    options.define?.(new MachineBuilder(this, subclass));

    this.logger.log(
      `Registered state machine: ${subclass.name} (inherits ${parent.name}) -> ${tableName}`,
    );
    return machine;
  }

  defineState<R extends StatefulRecord>(
    owner: StatefulType<R>,
    name: string,
    callbacks: StateCallbackOptions<R> = {},
  ): ActiveState {
    const machine = this.getOwned(owner);
    if (machine.states.has(name)) {
      throw new StateAlreadyActiveError(owner.name, name);
    }
    if (!machine.catalog.states.has(name)) {
      throw new StateNotFoundError(owner.name, name);
    }

    const state = ActiveState.define(owner, name, callbacks);
    machine.states.set(name, state);
    return state;
  }

  extendState<R extends StatefulRecord>(
    owner: StatefulType<R>,
    name: string,
    callbacks: StateCallbackOptions<R>,
  ): ActiveState {
    const machine = this.getOwned(owner);
    const existing = machine.states.get(name);
    if (!existing) {
      throw new StateNotActiveError(owner.name, name);
    }

    const state = existing.withCallbacks(callbacks);
    machine.states.set(name, state);
    return state;
  }

  defineEvent<R extends StatefulRecord>(
    owner: StatefulType<R>,
    name: string,
    callbacks: EventCallbackOptions<R> = {},
    build?: EventDefinition<R>,
  ): ActiveEvent {
    const machine = this.getOwned(owner);
    if (machine.events.has(name)) {
      throw new EventAlreadyActiveError(owner.name, name);
    }
    if (!machine.catalog.events.has(name)) {
      throw new EventNotFoundError(owner.name, name);
    }

    const transitions = this.collectTransitions(machine, build);
    const event = ActiveEvent.define(owner, name, callbacks, transitions);
    machine.events.set(name, event);
    return event;
  }

  /**
   * Appends callbacks and transitions to an active event. New transitions
   * rank after the existing ones.
   */
  extendEvent<R extends StatefulRecord>(
    owner: StatefulType<R>,
    name: string,
    callbacks: EventCallbackOptions<R>,
    build?: EventDefinition<R>,
  ): ActiveEvent {
    const machine = this.getOwned(owner);
    const existing = machine.events.get(name);
    if (!existing) {
      throw new EventNotActiveError(owner.name, name);
    }

    const transitions = this.collectTransitions(machine, build);
    const event = existing.extend(callbacks, transitions);
    machine.events.set(name, event);
    return event;
  }

  get(owner: Function): RegisteredStateMachine | undefined {
    return this.machines.get(owner);
  }

  getAll(): RegisteredStateMachine[] {
    return Array.from(this.machines.values());
  }

  getOrThrow(owner: Function): RegisteredStateMachine {
    return this.getOwned(owner);
  }

  /**
   * Machine for `owner` or, failing that, its nearest registered ancestor.
   */
  find(owner: Function): RegisteredStateMachine | undefined {
    for (
      let current: Function | null = owner;
      current;
      current = parentOf(current)
    ) {
      const machine = this.machines.get(current);
      if (machine) return machine;
    }
    return undefined;
  }

  resolve(record: StatefulRecord): RegisteredStateMachine {
    const machine = this.find(record.constructor);
    if (!machine) {
      throw new StateMachineNotRegisteredError(record.constructor.name);
    }
    return machine;
  }

  isActiveState(owner: Function, name: string): boolean {
    return this.find(owner)?.states.has(name) ?? false;
  }

  isActiveEvent(owner: Function, name: string): boolean {
    return this.find(owner)?.events.has(name) ?? false;
  }

  initialStateName(
    machine: RegisteredStateMachine,
    record: StatefulRecord,
  ): string {
    return typeof machine.initial === 'function'
      ? machine.initial(record)
      : machine.initial;
  }

  private getOwned(owner: Function): OwnedStateMachine {
    const machine = this.machines.get(owner);
    if (!machine) {
      throw new StateMachineNotRegisteredError(owner.name);
    }
    return machine;
  }

  private collectTransitions<R extends StatefulRecord>(
    machine: OwnedStateMachine,
    build?: EventDefinition<R>,
  ): readonly TransitionSpec<R>[] {
    if (!build) return [];

    const builder = new EventBuilder<R>();
    build(builder);

    for (const spec of builder.transitions) {
      for (const stateName of [spec.to, ...toArray(spec.options.from)]) {
        if (!machine.catalog.states.has(stateName)) {
          throw new StateNotFoundError(machine.owner.name, stateName);
        }
      }
    }
    return builder.transitions;
  }

  private assertInitialInCatalog(machine: OwnedStateMachine): void {
    if (
      typeof machine.initial === 'string' &&
      !machine.catalog.states.has(machine.initial)
    ) {
      throw new StateNotFoundError(machine.owner.name, machine.initial);
    }
  }

  private ownMetadata(target: Function): StatefulEntityMetadata | undefined {
    const metadata = this.reflector.get<StatefulEntityMetadata | undefined>(
      STATEFUL_ENTITY_METADATA,
      target,
    );
    return metadata?.target === target ? metadata : undefined;
  }

  private registerEntity(target: Function): void {
    if (this.machines.has(target)) return;

    const metadata = this.ownMetadata(target);
    const parent = this.statefulAncestorOf(target);

    if (parent) {
      this.registerEntity(parent);
    }

    if (metadata) {
      metadata.register(this, parent);
    } else if (parent) {
      this.inherit<StatefulRecord, StatefulRecord>(parent, target);
    } else {
      throw new StateMachineNotRegisteredError(target.name);
    }
  }

  private statefulAncestorOf(target: Function): Function | null {
    for (
      let current = parentOf(target);
      current;
      current = parentOf(current)
    ) {
      if (this.machines.has(current) || this.ownMetadata(current)) {
        return current;
      }
    }
    return null;
  }
}
