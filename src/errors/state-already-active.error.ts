export class StateAlreadyActiveError extends Error {
  constructor(
    public readonly owner: string,
    public readonly stateName: string,
  ) {
    super(`${owner} state with name="${stateName}" has already been defined`);
    this.name = 'StateAlreadyActiveError';
  }
}
