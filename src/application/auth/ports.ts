import type { NewUser, User } from '../../domain/auth/user.js';

/**
 * Looks users up by email and checks presented passwords.
 */
export interface CredentialVerifier {
  findByEmail(email: string, signal?: AbortSignal): Promise<User | null>;
  checkPassword(user: User, password: string, signal?: AbortSignal): Promise<boolean>;
}

export interface IssuedAccessToken {
  accessToken: string;
  /** Lifetime in seconds. */
  expiresIn: number;
}

export interface AccessTokenClaims {
  userId: string;
  email: string;
}

export interface TokenIssuer {
  generateToken(user: User): IssuedAccessToken;
  /** Claims of a valid, unexpired access token, or null. */
  verifyAccessToken(accessToken: string): AccessTokenClaims | null;
  /** Subject of a correctly signed access token, expired or not, or null. */
  readSubject(accessToken: string): string | null;
}

/**
 * Persistence for users and their refresh-token collections.
 */
export interface UserStore {
  findById(id: string, signal?: AbortSignal): Promise<User | null>;
  findByEmail(email: string, signal?: AbortSignal): Promise<User | null>;
  create(user: NewUser): Promise<User>;
  /**
   * Persist `user` if the stored version still equals `user.version`.
   * Returns the stored user with its incremented version.
   * Throws ConcurrencyError when another write got there first.
   */
  update(user: User): Promise<User>;
}
