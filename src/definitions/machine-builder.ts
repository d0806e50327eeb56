import type { StateMachineRegistry } from '../services/state-machine-registry.service';
import type {
  StatefulRecord,
  StatefulType,
} from '../interfaces/stateful-record.interface';
import type { StateCallbackOptions } from './active-state';
import type { EventBuilder, EventCallbackOptions } from './active-event';

export type EventDefinition<R extends StatefulRecord> = (
  event: EventBuilder<R>,
) => void;

/**
 * Registration API bound to one owner type.
 *
 * @example
 * machine
 *   .state(['parked', 'idling'])
 *   .state('first_gear', { beforeEnter: 'putOnSeatbelt' })
 *   .event('park', { after: 'releaseSeatbelt' }, (event) =>
 *     event.transitionTo('parked', { from: ['idling', 'first_gear'] }),
 *   );
 */
export class MachineBuilder<R extends StatefulRecord = StatefulRecord> {
  constructor(
    private readonly registry: StateMachineRegistry,
    readonly owner: StatefulType<R>,
  ) {}

  state(names: string | string[], callbacks?: StateCallbackOptions<R>): this {
    for (const name of Array.isArray(names) ? names : [names]) {
      this.registry.defineState(this.owner, name, callbacks);
    }
    return this;
  }

  event(name: string, build?: EventDefinition<R>): this;
  event(
    name: string,
    callbacks: EventCallbackOptions<R>,
    build?: EventDefinition<R>,
  ): this;
  event(
    name: string,
    callbacksOrBuild?: EventCallbackOptions<R> | EventDefinition<R>,
    build?: EventDefinition<R>,
  ): this {
    if (typeof callbacksOrBuild === 'function') {
      this.registry.defineEvent(this.owner, name, {}, callbacksOrBuild);
    } else {
      this.registry.defineEvent(this.owner, name, callbacksOrBuild, build);
    }
    return this;
  }

  extendState(name: string, callbacks: StateCallbackOptions<R>): this {
    this.registry.extendState(this.owner, name, callbacks);
    return this;
  }

  extendEvent(
    name: string,
    callbacks: EventCallbackOptions<R>,
    build?: EventDefinition<R>,
  ): this {
    this.registry.extendEvent(this.owner, name, callbacks, build);
    return this;
  }
}
