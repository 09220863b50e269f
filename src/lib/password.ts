/**
 * Password Hashing
 * Salted PBKDF2 hashes in the `password-hash` format
 * (`<algorithm>$<salt>$<iterations>$<hash>`).
 *
 * Parameters can change at any time: stored hashes carry their own, so
 * older hashes keep verifying.
 */

import passwordHash from "password-hash";
import { USERS } from "../config/constants.js";

export function hashPassword(password: string): string {
  return passwordHash.generate(password, {
    algorithm: USERS.HASH_ALGORITHM,
    saltLength: USERS.HASH_SALT_LENGTH,
    iterations: USERS.HASH_ITERATIONS,
  });
}

/** Unparseable hashes never verify */
export function verifyPassword(password: string, stored: string): boolean {
  return passwordHash.isHashed(stored) && passwordHash.verify(password, stored);
}
