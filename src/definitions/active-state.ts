import type { StatefulRecord } from '../interfaces/stateful-record.interface';
import {
  Callbacks,
  ConditionalCallback,
  TransitionInput,
  runCallbacks,
} from './conditional-callback';

export type StatePhase = 'beforeEnter' | 'afterEnter' | 'beforeExit' | 'afterExit';

export const STATE_PHASES: readonly StatePhase[] = [
  'beforeEnter',
  'afterEnter',
  'beforeExit',
  'afterExit',
];

export type StateCallbackOptions<R extends StatefulRecord = StatefulRecord> = {
  [P in StatePhase]?: Callbacks<R>;
};

type PhaseCallbacks = Readonly<Record<StatePhase, readonly ConditionalCallback[]>>;

function emptyPhases(): PhaseCallbacks {
  return { beforeEnter: [], afterEnter: [], beforeExit: [], afterExit: [] };
}

/**
 * A named state of one owner type. Instances never change: extending a state
 * or copying it to a subclass produces a new instance.
 */
export class ActiveState {
  private constructor(
    readonly owner: Function,
    readonly name: string,
    private readonly callbacks: PhaseCallbacks,
  ) {}

  static define<R extends StatefulRecord>(
    owner: Function,
    name: string,
    options: StateCallbackOptions<R> = {},
  ): ActiveState {
    return new ActiveState(owner, name, emptyPhases()).withCallbacks(options);
  }

  withCallbacks<R extends StatefulRecord>(
    options: StateCallbackOptions<R>,
  ): ActiveState {
    const next: Record<StatePhase, readonly ConditionalCallback[]> = {
      ...this.callbacks,
    };
    for (const phase of STATE_PHASES) {
      const added = ConditionalCallback.compileAll(options[phase]);
      if (added.length > 0) {
        next[phase] = Object.freeze([...this.callbacks[phase], ...added]);
      }
    }
    return new ActiveState(this.owner, this.name, next);
  }

  /** Copy rebound to another owner, sharing nothing mutable. */
  dup(owner: Function): ActiveState {
    return new ActiveState(owner, this.name, { ...this.callbacks });
  }

  callbacksFor(phase: StatePhase): readonly ConditionalCallback[] {
    return this.callbacks[phase];
  }

  async run(phase: StatePhase, input: TransitionInput): Promise<void> {
    await runCallbacks(this.callbacks[phase], input);
  }
}
