export class ConcurrentTransitionConflictError extends Error {
  constructor(
    public readonly tableName: string,
    public readonly recordId: string,
    public readonly expectedState: string,
    public readonly targetState: string,
  ) {
    super(
      `Record ${tableName}/${recordId} is no longer in state "${expectedState}"; ` +
        `transition to "${targetState}" was not applied. Refresh the record and fire again.`,
    );
    this.name = 'ConcurrentTransitionConflictError';
  }
}
