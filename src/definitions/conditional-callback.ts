import type { IStateDbAdapter } from '../interfaces/state-db-adapter.interface';
import type { StatefulRecord } from '../interfaces/stateful-record.interface';

export interface TransitionInput<R extends StatefulRecord = StatefulRecord> {
  record: R;
  /** `null` while a record is entering its initial state. */
  fromState: string | null;
  toState: string;
  /** `null` while a record is entering its initial state. */
  event: string | null;
  args: readonly unknown[];
  /** Adapter bound to the transition's atomic unit. */
  adapter: IStateDbAdapter;
}

export type MethodName<R> = Extract<
  {
    [K in keyof R]-?: R[K] extends (...args: never[]) => unknown ? K : never;
  }[keyof R],
  string
>;

// Method-signature form keeps these bivariant, so a callback written for a
// subclass can be stored next to one written for its base type.
export type RecordPredicate<R> = {
  check(record: R, ...args: unknown[]): boolean;
}['check'];

export type RecordAction<R extends StatefulRecord> = {
  run(input: TransitionInput<R>): void | Promise<void>;
}['run'];

/**
 * A method name of the record (called with the event arguments) or an inline
 * predicate receiving the record followed by the event arguments.
 */
export type Condition<R> = MethodName<R> | RecordPredicate<R>;

export interface ConditionalCallbackConfig<R extends StatefulRecord> {
  run: MethodName<R> | RecordAction<R>;
  if?: Condition<R> | Condition<R>[];
  unless?: Condition<R> | Condition<R>[];
}

export type CallbackInput<R extends StatefulRecord> =
  | MethodName<R>
  | RecordAction<R>
  | ConditionalCallbackConfig<R>;

export type Callbacks<R extends StatefulRecord> =
  | CallbackInput<R>
  | CallbackInput<R>[];

type CompiledPredicate =
  | { kind: 'method'; name: string }
  | { kind: 'inline'; fn: RecordPredicate<StatefulRecord> };

type CompiledAction =
  | { kind: 'method'; name: string }
  | { kind: 'inline'; fn: RecordAction<StatefulRecord> };

export function toArray<T>(value?: T | T[]): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function invokeMethod(
  record: object,
  name: string,
  args: readonly unknown[],
): unknown {
  const member: unknown = Reflect.get(record, name);
  if (typeof member !== 'function') {
    throw new Error(`${record.constructor.name} has no method "${name}"`);
  }
  return Reflect.apply(member, record, args);
}

function compilePredicate<R extends StatefulRecord>(
  condition: Condition<R>,
): CompiledPredicate {
  if (typeof condition === 'function') {
    return { kind: 'inline', fn: condition };
  }
  return { kind: 'method', name: String(condition) };
}

function checkPredicate(
  predicate: CompiledPredicate,
  record: StatefulRecord,
  args: readonly unknown[],
): boolean {
  const result: unknown =
    predicate.kind === 'method'
      ? invokeMethod(record, predicate.name, args)
      : predicate.fn(record, ...args);

  if (typeof result !== 'boolean') {
    const label =
      predicate.kind === 'method' ? `"${predicate.name}"` : 'inline condition';
    throw new Error(
      `Condition ${label} for ${record.constructor.name} must return a synchronous boolean value`,
    );
  }

  return result;
}

/**
 * Guard shared by transitions and callbacks: every `if` must pass and no
 * `unless` may pass. An empty condition always passes.
 */
export class RecordCondition {
  static readonly ALWAYS = new RecordCondition([], []);

  private constructor(
    private readonly ifs: readonly CompiledPredicate[],
    private readonly unlesses: readonly CompiledPredicate[],
  ) {}

  static from<R extends StatefulRecord>(
    ifs?: Condition<R> | Condition<R>[],
    unlesses?: Condition<R> | Condition<R>[],
  ): RecordCondition {
    const compiledIfs = toArray(ifs).map(compilePredicate);
    const compiledUnlesses = toArray(unlesses).map(compilePredicate);
    if (compiledIfs.length === 0 && compiledUnlesses.length === 0) {
      return RecordCondition.ALWAYS;
    }
    return new RecordCondition(compiledIfs, compiledUnlesses);
  }

  evaluate(record: StatefulRecord, args: readonly unknown[]): boolean {
    for (const predicate of this.ifs) {
      if (!checkPredicate(predicate, record, args)) return false;
    }
    for (const predicate of this.unlesses) {
      if (checkPredicate(predicate, record, args)) return false;
    }
    return true;
  }
}

export class ConditionalCallback {
  private constructor(
    private readonly action: CompiledAction,
    private readonly condition: RecordCondition,
  ) {}

  static compile<R extends StatefulRecord>(
    input: CallbackInput<R>,
  ): ConditionalCallback {
    if (typeof input === 'function') {
      return new ConditionalCallback(
        { kind: 'inline', fn: input },
        RecordCondition.ALWAYS,
      );
    }

    if (typeof input === 'object') {
      const action: CompiledAction =
        typeof input.run === 'function'
          ? { kind: 'inline', fn: input.run }
          : { kind: 'method', name: String(input.run) };
      return new ConditionalCallback(
        action,
        RecordCondition.from(input.if, input.unless),
      );
    }

    return new ConditionalCallback(
      { kind: 'method', name: String(input) },
      RecordCondition.ALWAYS,
    );
  }

  static compileAll<R extends StatefulRecord>(
    callbacks?: Callbacks<R>,
  ): ConditionalCallback[] {
    return toArray(callbacks).map((input) => ConditionalCallback.compile(input));
  }

  /**
   * Runs the action when the condition passes. Resolves to whether it ran.
   */
  async invoke(input: TransitionInput): Promise<boolean> {
    if (!this.condition.evaluate(input.record, input.args)) {
      return false;
    }

    if (this.action.kind === 'method') {
      await invokeMethod(input.record, this.action.name, [input]);
    } else {
      await this.action.fn(input);
    }
    return true;
  }
}

export async function runCallbacks(
  callbacks: readonly ConditionalCallback[],
  input: TransitionInput,
): Promise<void> {
  for (const callback of callbacks) {
    await callback.invoke(input);
  }
}
