export class EventNotFoundError extends Error {
  constructor(
    public readonly owner: string,
    public readonly eventName: string,
  ) {
    super(`Couldn't find ${owner} event with name="${eventName}"`);
    this.name = 'EventNotFoundError';
  }
}
