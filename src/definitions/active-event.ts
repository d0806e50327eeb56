import type { StatefulRecord } from '../interfaces/stateful-record.interface';
import {
  Callbacks,
  ConditionalCallback,
  TransitionInput,
  runCallbacks,
} from './conditional-callback';
import { StateTransition, TransitionOptions } from './state-transition';

export type EventPhase = 'before' | 'after';

export type EventCallbackOptions<R extends StatefulRecord = StatefulRecord> = {
  [P in EventPhase]?: Callbacks<R>;
};

export interface TransitionSpec<R extends StatefulRecord = StatefulRecord> {
  to: string;
  options: TransitionOptions<R>;
}

/**
 * Collects the transitions of an event in declaration order.
 *
 * @example
 * event.transitionTo('parked', { from: ['idling', 'first_gear'] });
 * event.transitionTo('first_gear', { from: 'idling', if: 'seatbeltOn' });
 */
export class EventBuilder<R extends StatefulRecord = StatefulRecord> {
  private readonly specs: TransitionSpec<R>[] = [];

  transitionTo(to: string, options: TransitionOptions<R> = {}): this {
    this.specs.push({ to, options });
    return this;
  }

  get transitions(): readonly TransitionSpec<R>[] {
    return this.specs;
  }
}

export class ActiveEvent {
  private constructor(
    readonly owner: Function,
    readonly name: string,
    readonly transitions: readonly StateTransition[],
    private readonly before: readonly ConditionalCallback[],
    private readonly after: readonly ConditionalCallback[],
  ) {}

  static define<R extends StatefulRecord>(
    owner: Function,
    name: string,
    options: EventCallbackOptions<R> = {},
    transitions: readonly TransitionSpec<R>[] = [],
  ): ActiveEvent {
    return new ActiveEvent(owner, name, [], [], []).extend(options, transitions);
  }

  extend<R extends StatefulRecord>(
    options: EventCallbackOptions<R>,
    transitions: readonly TransitionSpec<R>[] = [],
  ): ActiveEvent {
    return new ActiveEvent(
      this.owner,
      this.name,
      Object.freeze([
        ...this.transitions,
        ...transitions.map((spec) =>
          StateTransition.create(this.name, spec.to, spec.options),
        ),
      ]),
      Object.freeze([
        ...this.before,
        ...ConditionalCallback.compileAll(options.before),
      ]),
      Object.freeze([
        ...this.after,
        ...ConditionalCallback.compileAll(options.after),
      ]),
    );
  }

  dup(owner: Function): ActiveEvent {
    return new ActiveEvent(
      owner,
      this.name,
      this.transitions,
      this.before,
      this.after,
    );
  }

  /**
   * Transitions that could fire from `stateName` for this record, in
   * declaration order. The first entry is the one `fire` would take.
   */
  possibleTransitionsFrom(
    stateName: string,
    record: StatefulRecord,
    args: readonly unknown[] = [],
  ): StateTransition[] {
    return this.transitions.filter((transition) =>
      transition.matches(stateName, record, args),
    );
  }

  findTransition(
    stateName: string,
    record: StatefulRecord,
    args: readonly unknown[] = [],
  ): StateTransition | undefined {
    // Guards of later transitions must not run once one matches.
    return this.transitions.find((transition) =>
      transition.matches(stateName, record, args),
    );
  }

  callbacksFor(phase: EventPhase): readonly ConditionalCallback[] {
    return phase === 'before' ? this.before : this.after;
  }

  async run(phase: EventPhase, input: TransitionInput): Promise<void> {
    await runCallbacks(this.callbacksFor(phase), input);
  }
}
