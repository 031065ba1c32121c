/**
 * Login Use Case
 *
 * Exchanges email and password for a signed session token backed by a
 * session record.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createAccountDisabledError,
  createAuthProviderError,
  createInvalidCredentialsError,
  type AuthError,
} from '../errors.js';

import type { PasswordHasher, SessionRepository, TokenSigner, UserRepository } from '../ports.js';
import type { IssuedSession } from '../types.js';

export interface LoginDeps {
  userRepo: UserRepository;
  sessionRepo: SessionRepository;
  passwordHasher: PasswordHasher;
  tokenSigner: TokenSigner;
}

export interface LoginInput {
  email: string;
  password: string;
}

/**
 * Logs a user in.
 *
 * Flow:
 * 1. Find the user by email (unknown email: InvalidCredentialsError)
 * 2. Verify the password (mismatch or no password: InvalidCredentialsError)
 * 3. Reject disabled accounts (AccountDisabledError)
 * 4. Sign a token and store the session record
 */
export const login = async (
  deps: LoginDeps,
  input: LoginInput
): Promise<Result<IssuedSession, AuthError>> => {
  const { userRepo, sessionRepo, passwordHasher, tokenSigner } = deps;

  const userResult = await userRepo.getByEmail(input.email.trim().toLowerCase());
  if (userResult.isErr()) {
    return err(userResult.error);
  }
  const user = userResult.value;
  if (user === null || user.passwordHash === null) {
    return err(createInvalidCredentialsError());
  }

  let passwordMatches: boolean;
  try {
    passwordMatches = await passwordHasher.verify(input.password, user.passwordHash);
  } catch (error) {
    return err(createAuthProviderError('Failed to verify password', error));
  }
  if (!passwordMatches) {
    return err(createInvalidCredentialsError());
  }

  if (!user.isActive) {
    return err(createAccountDisabledError());
  }

  const signed = await tokenSigner.sign(user.id);
  if (signed.isErr()) {
    return err(signed.error);
  }

  const sessionResult = await sessionRepo.create({
    userId: user.id,
    token: signed.value.token,
    expiresAt: signed.value.expiresAt,
  });
  if (sessionResult.isErr()) {
    return err(sessionResult.error);
  }

  return ok({
    token: signed.value.token,
    userId: user.id,
    expiresAt: signed.value.expiresAt,
  });
};
