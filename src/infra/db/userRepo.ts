import type { Pool, PoolClient } from 'pg';
import type { NewUser, User } from '../../domain/auth/user.js';
import type { RefreshToken } from '../../domain/auth/refreshToken.js';
import type { UserStore } from '../../application/auth/ports.js';
import { ConcurrencyError, DuplicateEmailError } from '../../application/errors.js';

interface UserRow {
  id: string;
  email: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  version: number;
  created_at: Date;
}

interface RefreshTokenRow {
  token: string;
  expires_on: Date;
}

const USER_COLUMNS =
  'id, email, first_name, last_name, password_hash, version, created_at';

function isUniqueViolation(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === '23505'
  );
}

export class UserRepo implements UserStore {
  constructor(private readonly db: Pool) {}

  async findByEmail(email: string, signal?: AbortSignal): Promise<User | null> {
    signal?.throwIfAborted();
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return await this.withRefreshTokens(result.rows[0], signal);
  }

  async findById(id: string, signal?: AbortSignal): Promise<User | null> {
    signal?.throwIfAborted();
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return await this.withRefreshTokens(result.rows[0], signal);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.db.query<UserRow>(
        `INSERT INTO users (email, first_name, last_name, password_hash)
         VALUES ($1, $2, $3, $4)
         RETURNING ${USER_COLUMNS}`,
        [user.email, user.firstName, user.lastName, user.passwordHash]
      );
      return toUser(result.rows[0], []);
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError(user.email);
      }
      throw error;
    }
  }

  /**
   * Write the user and synchronise its refresh tokens in one transaction.
   * The row is only updated while its version still equals `user.version`.
   */
  async update(user: User): Promise<User> {
    const client = await this.db.connect();

    try {
      await client.query('BEGIN');

      const result = await client.query<UserRow>(
        `UPDATE users
         SET email = $2, first_name = $3, last_name = $4, password_hash = $5,
             version = version + 1
         WHERE id = $1 AND version = $6
         RETURNING ${USER_COLUMNS}`,
        [user.id, user.email, user.firstName, user.lastName, user.passwordHash, user.version]
      );

      if (result.rows.length === 0) {
        const actualVersion = await this.getVersionWithClient(client, user.id);
        throw new ConcurrencyError(user.version, actualVersion);
      }

      await this.syncRefreshTokens(client, user);
      await client.query('COMMIT');

      return toUser(result.rows[0], user.refreshTokens);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private async syncRefreshTokens(client: PoolClient, user: User): Promise<void> {
    const existing = await client.query<{ token: string }>(
      'SELECT token FROM refresh_tokens WHERE user_id = $1',
      [user.id]
    );
    const stored = new Set(existing.rows.map((row) => row.token));
    const kept = new Set(user.refreshTokens.map((t) => t.token));

    for (const token of stored) {
      if (!kept.has(token)) {
        await client.query('DELETE FROM refresh_tokens WHERE token = $1', [token]);
      }
    }

    for (const refreshToken of user.refreshTokens) {
      if (stored.has(refreshToken.token)) {
        continue;
      }
      await client.query(
        'INSERT INTO refresh_tokens (token, user_id, expires_on) VALUES ($1, $2, $3)',
        [refreshToken.token, user.id, refreshToken.expiresOn]
      );
    }
  }

  /**
   * Current version of a user row, or -1 when it no longer exists.
   */
  private async getVersionWithClient(client: PoolClient, id: string): Promise<number> {
    const result = await client.query<{ version: number }>(
      'SELECT version FROM users WHERE id = $1',
      [id]
    );
    return result.rows[0]?.version ?? -1;
  }

  private async withRefreshTokens(row: UserRow, signal?: AbortSignal): Promise<User> {
    signal?.throwIfAborted();
    const result = await this.db.query<RefreshTokenRow>(
      `SELECT token, expires_on FROM refresh_tokens
       WHERE user_id = $1
       ORDER BY expires_on ASC, created_at ASC`,
      [row.id]
    );
    return toUser(
      row,
      result.rows.map((r) => ({ token: r.token, expiresOn: r.expires_on }))
    );
  }
}

function toUser(row: UserRow, refreshTokens: readonly RefreshToken[]): User {
  return {
    id: row.id,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
    version: row.version,
    refreshTokens,
  };
}
