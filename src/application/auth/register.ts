import { Password } from '../../domain/auth/password.js';
import { UserErrors } from '../../domain/auth/errors.js';
import { Outcome, failure, success } from '../../domain/shared/outcome.js';
import { DuplicateEmailError } from '../errors.js';
import type { UserStore } from './ports.js';

export interface RegisterCommand {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
}

export interface RegisterResult {
  userId: string;
  email: string;
}

export class RegisterUseCase {
  constructor(private userStore: UserStore) {}

  async execute(command: RegisterCommand): Promise<Outcome<RegisterResult>> {
    const existing = await this.userStore.findByEmail(command.email);
    if (existing) {
      return failure(UserErrors.DuplicateEmail);
    }

    const passwordHash = await Password.hash(command.password);

    try {
      const user = await this.userStore.create({
        email: command.email,
        firstName: command.firstName,
        lastName: command.lastName,
        passwordHash,
      });
      return success({ userId: user.id, email: user.email });
    } catch (error) {
      // Lost a race with a concurrent registration for the same email
      if (error instanceof DuplicateEmailError) {
        return failure(UserErrors.DuplicateEmail);
      }
      throw error;
    }
  }
}
