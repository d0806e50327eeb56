export class DuplicateRegistrationError extends Error {
  constructor(public readonly owner: string) {
    super(
      `Duplicate state machine for "${owner}". ` +
        `Use extendState/extendEvent to add to an existing machine.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
