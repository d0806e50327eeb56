export class StateNotActiveError extends Error {
  constructor(
    public readonly owner: string,
    public readonly stateName: string | null,
  ) {
    super(
      `Couldn't find active ${owner} state with name=${JSON.stringify(stateName)}`,
    );
    this.name = 'StateNotActiveError';
  }
}
