import { domainError } from '../shared/outcome.js';

/**
 * Domain errors returned by the auth flows. Frozen at load time.
 */
export const UserErrors = Object.freeze({
  InvalidCredentials: domainError('User.InvalidCredentials', 'Invalid Email or Password'),
  InvalidToken: domainError('User.InvalidToken', 'Invalid Token'),
  InvalidRefreshToken: domainError(
    'User.InvalidRefreshToken',
    'Invalid or Expired Refresh Token'
  ),
  DuplicateEmail: domainError('User.DuplicateEmail', 'Email is already registered'),
});

export type UserErrorName = keyof typeof UserErrors;
