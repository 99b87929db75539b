/**
 * Infrastructure-level errors raised through the application ports.
 * Unlike DomainError values these are thrown, never returned in an Outcome.
 */
export class ConcurrencyError extends Error {
  constructor(
    public readonly expectedVersion: number,
    public readonly actualVersion: number
  ) {
    super(
      `Concurrency conflict: expected version ${expectedVersion}, but actual version is ${actualVersion}`
    );
    this.name = 'ConcurrencyError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown by UserStore.create when the email is already taken.
 */
export class DuplicateEmailError extends Error {
  constructor(public readonly email: string) {
    super(`User with email ${email} already exists`);
    this.name = 'DuplicateEmailError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
