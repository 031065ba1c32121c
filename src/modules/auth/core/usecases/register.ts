/**
 * Register Use Case
 *
 * Creates an account with a hashed password.
 */

import { err, type Result } from 'neverthrow';

import {
  createAuthProviderError,
  createInvalidInputError,
  createUserExistsError,
  type AuthError,
} from '../errors.js';
import { MIN_PASSWORD_LENGTH, type User } from '../types.js';

import type { PasswordHasher, UserRepository } from '../ports.js';

export interface RegisterDeps {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
}

export interface RegisterInput {
  email: string;
  password: string;
}

/**
 * Registers a user.
 *
 * Flow:
 * 1. Normalize the email (trim, lowercase) and check the password length
 * 2. Reject an email that is already registered
 * 3. Hash the password and insert; a concurrent duplicate still ends as UserExistsError
 */
export const register = async (
  deps: RegisterDeps,
  input: RegisterInput
): Promise<Result<User, AuthError>> => {
  const { userRepo, passwordHasher } = deps;
  const email = input.email.trim().toLowerCase();

  if (!email.includes('@')) {
    return err(createInvalidInputError('email', 'Invalid email format'));
  }
  if (input.password.length < MIN_PASSWORD_LENGTH) {
    return err(
      createInvalidInputError(
        'password',
        `Password must be at least ${String(MIN_PASSWORD_LENGTH)} characters`
      )
    );
  }

  const existingResult = await userRepo.getByEmail(email);
  if (existingResult.isErr()) {
    return err(existingResult.error);
  }
  if (existingResult.value !== null) {
    return err(createUserExistsError(email));
  }

  let passwordHash: string;
  try {
    passwordHash = await passwordHasher.hash(input.password);
  } catch (error) {
    return err(createAuthProviderError('Failed to hash password', error));
  }

  return userRepo.create({ email, passwordHash });
};
