/**
 * Code & Token Generation
 */

import { randomBytes } from "node:crypto";
import { TOKENS } from "../config/constants.js";

/** Random hex string of `bytes` bytes (twice as many characters) */
export function generateHexCode(bytes: number): string {
  return randomBytes(bytes).toString("hex");
}

export function generateAccessToken(): string {
  return generateHexCode(TOKENS.ACCESS_TOKEN_BYTES);
}

export function generateUserAppSessionCode(): string {
  return generateHexCode(TOKENS.USER_APP_SESSION_CODE_BYTES);
}

export function generateAppSessionCode(): string {
  return generateHexCode(TOKENS.APP_SESSION_CODE_BYTES);
}

/**
 * Shorten a token for log output. Full tokens are credentials and never logged.
 *
 * @example
 * maskToken("3fa85f6457174562b3fc2c963f66afa6") // "3fa85f…"
 */
export function maskToken(token: string): string {
  return `${token.slice(0, TOKENS.LOG_PREFIX_LENGTH)}…`;
}

/** Identity key used for insert-if-absent of user application sessions */
export function userIdentityKey(userId: number): string {
  return `user:${userId}`;
}

export function anonymousIdentityKey(userAppSessionCode: string): string {
  return `anon:${userAppSessionCode}`;
}
