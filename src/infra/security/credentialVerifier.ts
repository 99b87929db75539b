import { Password } from '../../domain/auth/password.js';
import type { User } from '../../domain/auth/user.js';
import type { CredentialVerifier, UserStore } from '../../application/auth/ports.js';

/**
 * Credential checks backed by the user store and Argon2 password hashes.
 */
export class PasswordCredentialVerifier implements CredentialVerifier {
  constructor(private readonly users: Pick<UserStore, 'findByEmail'>) {}

  async findByEmail(email: string, signal?: AbortSignal): Promise<User | null> {
    return await this.users.findByEmail(email, signal);
  }

  async checkPassword(user: User, password: string, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    return await Password.verify(password, user.passwordHash);
  }
}
