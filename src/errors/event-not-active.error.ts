export class EventNotActiveError extends Error {
  constructor(
    public readonly owner: string,
    public readonly eventName: string,
  ) {
    super(`Couldn't find active ${owner} event with name="${eventName}"`);
    this.name = 'EventNotActiveError';
  }
}
