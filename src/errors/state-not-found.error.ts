export class StateNotFoundError extends Error {
  constructor(
    public readonly owner: string,
    public readonly stateName: string,
  ) {
    super(`Couldn't find ${owner} state with name="${stateName}"`);
    this.name = 'StateNotFoundError';
  }
}
