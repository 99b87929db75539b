import { RefreshToken, isExpired } from './refreshToken.js';

/**
 * User entity as seen by the auth core.
 * `version` is the optimistic concurrency stamp checked on every update.
 */
export interface User {
  readonly id: string;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
  readonly version: number;
  readonly refreshTokens: readonly RefreshToken[];
}

export interface NewUser {
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly passwordHash: string;
}

export function withRefreshToken(user: User, refreshToken: RefreshToken): User {
  return { ...user, refreshTokens: [...user.refreshTokens, refreshToken] };
}

export function withoutRefreshToken(user: User, token: string): User {
  return {
    ...user,
    refreshTokens: user.refreshTokens.filter((t) => t.token !== token),
  };
}

/**
 * Find a refresh token on the user that has not expired yet.
 */
export function findActiveRefreshToken(
  user: User,
  token: string,
  now: Date
): RefreshToken | null {
  const found = user.refreshTokens.find((t) => t.token === token);
  if (!found || isExpired(found, now)) {
    return null;
  }
  return found;
}
