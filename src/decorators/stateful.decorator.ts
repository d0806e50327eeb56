import { SetMetadata } from '@nestjs/common';
import { STATEFUL_ENTITY_METADATA } from '../state-machine.constants';
import type { StateMachineOptions } from '../interfaces/state-machine-options.interface';
import type { StatefulRecord } from '../interfaces/stateful-record.interface';
import type {
  RegisteredStateMachine,
  StateMachineRegistry,
} from '../services/state-machine-registry.service';

export interface StatefulEntityMetadata {
  /** Class the decorator was applied to; metadata lookups also see ancestors. */
  target: Function;
  /**
   * Registers `target` with the options it was decorated with, as a copy of
   * `parent`'s machine when it has a stateful ancestor.
   */
  register(
    registry: StateMachineRegistry,
    parent: Function | null,
  ): RegisteredStateMachine;
}

/**
 * Marks a class as a stateful record type. A decorated subclass of another
 * stateful class inherits its machine and may pass only its additions.
 *
 * @example
 * @Stateful<Vehicle>({
 *   initial: 'parked',
 *   catalog: { states: ['parked', 'idling'], events: ['ignite'] },
 *   define: (machine) =>
 *     machine
 *       .state(['parked', 'idling'])
 *       .event('ignite', (event) => event.transitionTo('idling', { from: 'parked' })),
 * })
 * class Vehicle { ... }
 */
export function Stateful<R extends StatefulRecord = StatefulRecord>(
  options: StateMachineOptions<R> = {},
): ClassDecorator {
  return (target: Function) => {
    const metadata: StatefulEntityMetadata = {
      target,
      register: (registry, parent) =>
        parent
          ? registry.inherit<StatefulRecord, R>(parent, target, options)
          : registry.register<R>(target, options),
    };
    SetMetadata(STATEFUL_ENTITY_METADATA, metadata)(target);
  };
}
