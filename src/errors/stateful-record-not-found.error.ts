export class StatefulRecordNotFoundError extends Error {
  constructor(
    public readonly tableName: string,
    public readonly recordId: string,
  ) {
    super(`No row found in "${tableName}" for record ${recordId}.`);
    this.name = 'StatefulRecordNotFoundError';
  }
}
