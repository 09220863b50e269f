/**
 * User Service
 * Account registration and credential checks for login application sessions.
 *
 * Only a few basic password rules are enforced: a leaked password gives
 * access to learning telemetry of one user, nothing more.
 */

import { z } from "zod";
import { USERS } from "../config/constants.js";
import type { DataStore } from "../lib/store.js";
import {
  InvalidCredentialsError,
  NotFoundError,
  RegistrationError,
  ValidationError,
} from "../lib/errors.js";
import { hashPassword, verifyPassword } from "../lib/password.js";
import type { RegisteredUser } from "../types/session.types.js";

export interface Credentials {
  username?: string;
  email?: string;
  password: string;
}

const emailSchema = z.string().email();

/**
 * Register a new user. Without a username, the email address becomes the
 * username.
 *
 * @throws ValidationError if neither username nor email is given
 * @throws RegistrationError if a rule rejects the account
 */
export async function registerUser(store: DataStore, input: Credentials): Promise<RegisteredUser> {
  const { username, email, password } = input;

  if (!username && !email) {
    throw new ValidationError("username or email is required");
  }

  if (email && !emailSchema.safeParse(email).success) {
    throw new RegistrationError("invalid_email", "The provided email address seems invalid.");
  }
  if (password.length < USERS.MIN_PASSWORD_LENGTH) {
    throw new RegistrationError(
      "pw_too_short",
      `Password must be at least ${USERS.MIN_PASSWORD_LENGTH} characters long.`
    );
  }
  if (password === username) {
    throw new RegistrationError("pw_same_as_user", "Password must be different from provided username.");
  }
  if (password === email) {
    throw new RegistrationError("pw_same_as_email", "Password must be different from provided email.");
  }

  const user = await store.createUser({
    username: username || email || "",
    email: email || null,
    passwordHash: hashPassword(password),
  });

  if (!user) {
    throw new RegistrationError("user_already_registered", "This account already exists.");
  }

  console.log(`[Session] Registered user ${user.id}`);
  return user;
}

/**
 * Look up a user by username and/or email and check the password.
 * When both are given they must belong to the same user.
 *
 * @throws NotFoundError if no such user exists
 * @throws InvalidCredentialsError if the password does not match
 */
export async function verifyCredentials(store: DataStore, input: Credentials): Promise<RegisteredUser> {
  const user = await store.findUser({
    username: input.username || undefined,
    email: input.email || undefined,
  });
  if (!user) {
    throw new NotFoundError("User not found");
  }

  if (!verifyPassword(input.password, user.passwordHash)) {
    console.warn(`[Session] Failed login for user ${user.id}`);
    throw new InvalidCredentialsError();
  }

  return user;
}
