import 'reflect-metadata';

// Module
export { StateMachineModule } from './state-machine.module';

// Services
export { StateMachineManager } from './services/state-machine-manager.service';
export type {
  EnteredAt,
  StateMachineManagerOptions,
} from './services/state-machine-manager.service';
export { StateMachineRegistry } from './services/state-machine-registry.service';
export type {
  RegisteredStateMachine,
  StateMachineRegistryOptions,
} from './services/state-machine-registry.service';
export { TransitionExecutor } from './services/transition-executor.service';
export type { TransitionRequest } from './services/transition-executor.service';

// Definitions
export { ActiveState, STATE_PHASES } from './definitions/active-state';
export type {
  StateCallbackOptions,
  StatePhase,
} from './definitions/active-state';
export { ActiveEvent, EventBuilder } from './definitions/active-event';
export type {
  EventCallbackOptions,
  EventPhase,
  TransitionSpec,
} from './definitions/active-event';
export { StateTransition } from './definitions/state-transition';
export type { TransitionOptions } from './definitions/state-transition';
export {
  ConditionalCallback,
  RecordCondition,
} from './definitions/conditional-callback';
export type {
  CallbackInput,
  Callbacks,
  Condition,
  ConditionalCallbackConfig,
  MethodName,
  RecordAction,
  RecordPredicate,
  TransitionInput,
} from './definitions/conditional-callback';
export { MachineBuilder } from './definitions/machine-builder';
export type { EventDefinition } from './definitions/machine-builder';

// Recorders
export { createStateChangeRecorder } from './recorders/state-change-recorder';
export type {
  IStateChangeRecorder,
  StateChangeEntry,
} from './recorders/state-change-recorder';

// Decorators
export { Stateful } from './decorators/stateful.decorator';
export type { StatefulEntityMetadata } from './decorators/stateful.decorator';

// Interfaces
export type { IStateDbAdapter } from './interfaces/state-db-adapter.interface';
export type {
  NewStateChange,
  StateChangeRecord,
  StatefulRow,
} from './interfaces/state-records.interface';
export { hasState } from './interfaces/stateful-record.interface';
export type {
  StatefulRecord,
  StatefulType,
} from './interfaces/stateful-record.interface';
export type {
  InitialState,
  InitialStateResolver,
  StateCatalog,
  StateMachineOptions,
} from './interfaces/state-machine-options.interface';
export type {
  AppliedOutcome,
  FireOutcome,
  NoMatchOutcome,
  RejectedOutcome,
} from './interfaces/fire-outcome.interface';
export type {
  ResolvedStateMachineOptions,
  StateMachineModuleAsyncOptions,
  StateMachineModuleOptions,
} from './interfaces/state-machine-module-options.interface';

// Adapters
export { DrizzleStateAdapter } from './adapters/drizzle-state.adapter';
export type { DrizzleDatabase } from './adapters/drizzle-state.adapter';
export { InMemoryStateAdapter } from './adapters/in-memory-state.adapter';
export { PgStateAdapter } from './adapters/pg-state.adapter';

// Errors
export { ConcurrentTransitionConflictError } from './errors/concurrent-transition-conflict.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';
export { EventAlreadyActiveError } from './errors/event-already-active.error';
export { EventNotActiveError } from './errors/event-not-active.error';
export { EventNotFoundError } from './errors/event-not-found.error';
export { NoInitialStateError } from './errors/no-initial-state.error';
export { StateAlreadyActiveError } from './errors/state-already-active.error';
export { StateMachineNotRegisteredError } from './errors/state-machine-not-registered.error';
export { StateNotActiveError } from './errors/state-not-active.error';
export { StateNotFoundError } from './errors/state-not-found.error';
export { StatefulRecordNotFoundError } from './errors/stateful-record-not-found.error';

// Events
export { StateMachineEventType } from './events/state-machine-event-type.enum';
export type {
  StateInitializedEvent,
  StateTransitionEvent,
} from './events/state-machine-events';

// Utils
export { deriveTableName } from './utils/derive-table-name';

// Constants
export {
  DEFAULT_EMIT_EVENTS,
  DEFAULT_RECORD_CHANGES,
  NO_STATE,
  STATEFUL_ENTITY_METADATA,
  STATE_CHANGES_TABLE_SUFFIX,
  STATE_DB_ADAPTER,
  STATE_MACHINE_MODULE_OPTIONS,
} from './state-machine.constants';
