export const STATE_MACHINE_MODULE_OPTIONS = 'STATE_MACHINE_MODULE_OPTIONS';
export const STATE_DB_ADAPTER = 'STATE_DB_ADAPTER';
export const STATEFUL_ENTITY_METADATA = 'stateful:entity';

/** Sentinel stored in a record's state slot before it has a state. */
export const NO_STATE = '';

export const DEFAULT_RECORD_CHANGES = true;
export const DEFAULT_EMIT_EVENTS = true;

export const STATE_CHANGES_TABLE_SUFFIX = '_state_changes';
