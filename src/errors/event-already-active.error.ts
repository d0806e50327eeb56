export class EventAlreadyActiveError extends Error {
  constructor(
    public readonly owner: string,
    public readonly eventName: string,
  ) {
    super(`${owner} event with name="${eventName}" has already been defined`);
    this.name = 'EventAlreadyActiveError';
  }
}
