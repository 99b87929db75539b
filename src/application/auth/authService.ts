import { UserErrors } from '../../domain/auth/errors.js';
import { RefreshToken, createRefreshToken } from '../../domain/auth/refreshToken.js';
import {
  User,
  findActiveRefreshToken,
  withRefreshToken,
  withoutRefreshToken,
} from '../../domain/auth/user.js';
import { Outcome, failure, success } from '../../domain/shared/outcome.js';
import { logger as defaultLogger, type Logger } from '../../infra/logging/logger.js';
import { ConcurrencyError, NotFoundError } from '../errors.js';
import type { CredentialVerifier, IssuedAccessToken, TokenIssuer, UserStore } from './ports.js';

export interface AuthResponse {
  readonly userId: string;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly accessToken: string;
  /** Seconds until the access token expires. */
  readonly accessTokenExpiresIn: number;
  readonly refreshToken: string;
  readonly refreshTokenExpiresOn: Date;
}

export interface AuthServiceOptions {
  clock?: () => Date;
  logger?: Logger;
  /** Upper bound on versioned writes per operation. Unbounded when omitted. */
  maxPersistAttempts?: number;
}

type UserMutation = (current: User) => Outcome<User>;

/**
 * Issues access tokens and rotates refresh tokens.
 *
 * Refresh-token collections are updated with optimistic concurrency: every
 * write carries the version the user was read at, and a conflicting write
 * reloads the user and re-applies the same mutation. A conflict means another
 * write for the same user committed, so the retries always make progress.
 *
 * The AbortSignal is checked before each lookup, verification and write.
 * Once a write has been issued the operation runs to completion.
 */
export class AuthService {
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly maxPersistAttempts: number;

  constructor(
    private readonly credentials: CredentialVerifier,
    private readonly tokenIssuer: TokenIssuer,
    private readonly users: UserStore,
    options: AuthServiceOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.maxPersistAttempts = options.maxPersistAttempts ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Log in with email and password.
   * Unknown email and wrong password fail with the same error.
   */
  async issueToken(
    email: string,
    password: string,
    signal?: AbortSignal
  ): Promise<Outcome<AuthResponse>> {
    signal?.throwIfAborted();
    const user = await this.credentials.findByEmail(email, signal);
    if (!user) {
      return failure(UserErrors.InvalidCredentials);
    }

    signal?.throwIfAborted();
    const passwordMatches = await this.credentials.checkPassword(user, password, signal);
    if (!passwordMatches) {
      return failure(UserErrors.InvalidCredentials);
    }

    const refreshToken = createRefreshToken(this.clock());

    const saved = await this.persist(
      user,
      (current) => success(withRefreshToken(current, refreshToken)),
      signal
    );
    if (!saved.isSuccess) {
      return saved;
    }

    const issued = this.tokenIssuer.generateToken(saved.value);
    this.logger.info('Issued token pair', { userId: saved.value.id });
    return success(toAuthResponse(saved.value, issued, refreshToken));
  }

  /**
   * Exchange a refresh token for a new token pair. The presented refresh
   * token is consumed; the access token may be expired but must be
   * correctly signed.
   */
  async renewToken(
    accessToken: string,
    refreshToken: string,
    signal?: AbortSignal
  ): Promise<Outcome<AuthResponse>> {
    const owner = await this.loadTokenOwner(accessToken, signal);
    if (!owner.isSuccess) {
      return owner;
    }

    const replacement = createRefreshToken(this.clock());
    const saved = await this.persist(
      owner.value,
      (current) => {
        if (!findActiveRefreshToken(current, refreshToken, this.clock())) {
          return failure(UserErrors.InvalidRefreshToken);
        }
        return success(
          withRefreshToken(withoutRefreshToken(current, refreshToken), replacement)
        );
      },
      signal
    );
    if (!saved.isSuccess) {
      return saved;
    }

    const issued = this.tokenIssuer.generateToken(saved.value);
    this.logger.info('Renewed token pair', { userId: saved.value.id });
    return success(toAuthResponse(saved.value, issued, replacement));
  }

  async revokeToken(
    accessToken: string,
    refreshToken: string,
    signal?: AbortSignal
  ): Promise<Outcome> {
    const owner = await this.loadTokenOwner(accessToken, signal);
    if (!owner.isSuccess) {
      return owner;
    }

    const saved = await this.persist(
      owner.value,
      (current) => {
        if (!findActiveRefreshToken(current, refreshToken, this.clock())) {
          return failure(UserErrors.InvalidRefreshToken);
        }
        return success(withoutRefreshToken(current, refreshToken));
      },
      signal
    );
    if (!saved.isSuccess) {
      return saved;
    }

    this.logger.info('Revoked refresh token', { userId: saved.value.id });
    return success();
  }

  private async loadTokenOwner(
    accessToken: string,
    signal?: AbortSignal
  ): Promise<Outcome<User>> {
    const userId = this.tokenIssuer.readSubject(accessToken);
    if (!userId) {
      return failure(UserErrors.InvalidToken);
    }

    signal?.throwIfAborted();
    const user = await this.users.findById(userId, signal);
    if (!user) {
      return failure(UserErrors.InvalidToken);
    }
    return success(user);
  }

  /**
   * Apply `mutate` to the user and write it back with a version check.
   * A domain failure from `mutate` is returned without writing.
   */
  private async persist(
    user: User,
    mutate: UserMutation,
    signal?: AbortSignal
  ): Promise<Outcome<User>> {
    let current = user;

    for (let attempt = 1; ; attempt++) {
      const next = mutate(current);
      if (!next.isSuccess) {
        return next;
      }

      signal?.throwIfAborted();
      try {
        return success(await this.users.update(next.value));
      } catch (error) {
        if (!(error instanceof ConcurrencyError) || attempt >= this.maxPersistAttempts) {
          throw error;
        }
        this.logger.warn('Concurrent user update, retrying', {
          userId: user.id,
          attempt,
          expectedVersion: error.expectedVersion,
          actualVersion: error.actualVersion,
        });
      }

      signal?.throwIfAborted();
      const reloaded = await this.users.findById(user.id, signal);
      if (!reloaded) {
        throw new NotFoundError(`User ${user.id} was removed during the update`);
      }
      current = reloaded;
    }
  }
}

function toAuthResponse(
  user: User,
  issued: IssuedAccessToken,
  refreshToken: RefreshToken
): AuthResponse {
  return Object.freeze({
    userId: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    accessToken: issued.accessToken,
    accessTokenExpiresIn: issued.expiresIn,
    refreshToken: refreshToken.token,
    refreshTokenExpiresOn: refreshToken.expiresOn,
  });
}
