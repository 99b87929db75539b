import type { Response } from 'express';
import { UserErrors } from '../../domain/auth/errors.js';
import type { DomainError, Outcome } from '../../domain/shared/outcome.js';
import type { ErrorResponse } from './middleware/errorHandler.js';

const STATUS_BY_CODE: Readonly<Record<string, number>> = Object.freeze({
  [UserErrors.InvalidCredentials.code]: 401,
  [UserErrors.InvalidToken.code]: 401,
  [UserErrors.InvalidRefreshToken.code]: 401,
  [UserErrors.DuplicateEmail.code]: 409,
});

/**
 * Client-error status for a domain failure. Unlisted codes answer 400.
 */
export function statusForError(error: DomainError): number {
  return STATUS_BY_CODE[error.code] ?? 400;
}

export function toErrorResponse(error: DomainError): ErrorResponse {
  return { code: error.code, message: error.description };
}

/**
 * Answer a request from an Outcome: the payload on success, the error's
 * code and description with a 4xx status on failure. An `Outcome<void>`
 * success answers 204 with no body.
 */
export function sendOutcome<T>(res: Response, outcome: Outcome<T>, successStatus = 200): void {
  if (!outcome.isSuccess) {
    res.status(statusForError(outcome.error)).json(toErrorResponse(outcome.error));
    return;
  }
  if (outcome.value === undefined) {
    res.status(204).end();
    return;
  }
  res.status(successStatus).json(outcome.value);
}
