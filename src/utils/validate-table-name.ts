import { STATE_CHANGES_TABLE_SUFFIX } from '../state-machine.constants';

const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function assertValidTableName(tableName: string): void {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
}

/**
 * Name of the audit table kept beside `tableName`. Both names are validated
 * since they end up interpolated into SQL.
 */
export function stateChangesTableOf(tableName: string): string {
  assertValidTableName(tableName);
  const changesTable = `${tableName}${STATE_CHANGES_TABLE_SUFFIX}`;
  assertValidTableName(changesTable);
  return changesTable;
}
