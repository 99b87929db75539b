import { randomBytes } from 'crypto';

export const REFRESH_TOKEN_LIFETIME_DAYS = 14;

const DAY_MS = 24 * 60 * 60 * 1000;
const TOKEN_BYTES = 64;

export interface RefreshToken {
  readonly token: string;
  readonly expiresOn: Date;
}

/**
 * Mint an opaque refresh token valid for REFRESH_TOKEN_LIFETIME_DAYS from `issuedAt`.
 */
export function createRefreshToken(issuedAt: Date): RefreshToken {
  return Object.freeze({
    token: randomBytes(TOKEN_BYTES).toString('base64url'),
    expiresOn: new Date(issuedAt.getTime() + REFRESH_TOKEN_LIFETIME_DAYS * DAY_MS),
  });
}

export function isExpired(refreshToken: RefreshToken, now: Date): boolean {
  return refreshToken.expiresOn.getTime() <= now.getTime();
}
