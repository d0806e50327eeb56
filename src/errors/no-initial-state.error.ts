export class NoInitialStateError extends Error {
  constructor(public readonly owner: string) {
    super(`No initial state was specified for the ${owner} state machine.`);
    this.name = 'NoInitialStateError';
  }
}
