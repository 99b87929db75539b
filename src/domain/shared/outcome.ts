/**
 * A (code, description) pair naming why an operation failed.
 */
export interface DomainError {
  readonly code: string;
  readonly description: string;
}

/**
 * Distinguished "no failure" value. Carried by every successful outcome.
 */
export const ErrorNone: DomainError = Object.freeze({ code: '', description: '' });

/**
 * Raised when code breaks the outcome contract: building a failure from
 * ErrorNone, or reading the value of a failed outcome. Not a domain error;
 * callers are not expected to catch it.
 */
export class OutcomeContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutcomeContractError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function domainError(code: string, description: string): DomainError {
  if (code === '') {
    throw new OutcomeContractError('A domain error requires a non-empty code');
  }
  return Object.freeze({ code, description });
}

export function errorsEqual(a: DomainError, b: DomainError): boolean {
  return a.code === b.code && a.description === b.description;
}

export function isNone(error: DomainError): boolean {
  return errorsEqual(error, ErrorNone);
}

export class Success<T> {
  readonly isSuccess = true as const;
  readonly isFailure = false as const;
  readonly error: DomainError = ErrorNone;

  constructor(readonly value: T) {
    Object.freeze(this);
  }
}

export class Failure {
  readonly isSuccess = false as const;
  readonly isFailure = true as const;

  constructor(readonly error: DomainError) {
    if (error.code === '') {
      throw new OutcomeContractError('A failed outcome requires an error with a non-empty code');
    }
    Object.freeze(this);
  }

  get value(): never {
    throw new OutcomeContractError(
      `Cannot read the value of a failed outcome (${this.error.code})`
    );
  }
}

/**
 * Either a success carrying a value or a failure carrying exactly one error.
 * `Outcome<void>` stands in for an outcome without a payload.
 */
export type Outcome<T = void> = Success<T> | Failure;

export function success(): Outcome<void>;
export function success<T>(value: T): Outcome<T>;
export function success(value?: unknown): Outcome<unknown> {
  return new Success(value);
}

export function failure<T = never>(error: DomainError): Outcome<T> {
  return new Failure(error);
}

export function isSuccess<T>(outcome: Outcome<T>): outcome is Success<T> {
  return outcome.isSuccess;
}

export function isFailure<T>(outcome: Outcome<T>): outcome is Failure {
  return !outcome.isSuccess;
}

/**
 * Returns the success value. Throws OutcomeContractError on a failure.
 */
export function unwrap<T>(outcome: Outcome<T>): T {
  return outcome.value;
}

export function map<T, U>(outcome: Outcome<T>, fn: (value: T) => U): Outcome<U> {
  return outcome.isSuccess ? success(fn(outcome.value)) : outcome;
}

export function match<T, R>(
  outcome: Outcome<T>,
  handlers: { success: (value: T) => R; failure: (error: DomainError) => R }
): R {
  return outcome.isSuccess
    ? handlers.success(outcome.value)
    : handlers.failure(outcome.error);
}
