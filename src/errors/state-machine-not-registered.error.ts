export class StateMachineNotRegisteredError extends Error {
  constructor(public readonly owner: string) {
    super(`No state machine registered for "${owner}".`);
    this.name = 'StateMachineNotRegisteredError';
  }
}
