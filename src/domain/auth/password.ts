import { hash, verify } from 'argon2';

/**
 * Password hashing using Argon2.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a stored hash.
   * A malformed hash counts as a mismatch.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch (error) {
      if (error instanceof TypeError) {
        return false;
      }
      throw error;
    }
  }
}
