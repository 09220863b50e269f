/**
 * Session Registry Service
 * Resolves application sessions by their public code and creates or fetches
 * the per-user application session rows beneath them. Gates hand out the
 * sessions they bundle in turn.
 */

import type { DataStore } from "../lib/store.js";
import { NotFoundError, ValidationError } from "../lib/errors.js";
import {
  anonymousIdentityKey,
  generateUserAppSessionCode,
  userIdentityKey,
} from "../lib/codes.js";
import type { ResolvedApplicationSession, UserAppSession } from "../types/session.types.js";

/**
 * Resolve an application session with its config and application.
 *
 * @throws NotFoundError if the code is unknown or the session is disabled
 */
export async function getActiveApplicationSession(
  store: DataStore,
  code: string
): Promise<ResolvedApplicationSession> {
  const resolved = await store.getApplicationSession(code);
  if (!resolved || !resolved.session.isActive) {
    throw new NotFoundError(`Application session ${code} not found`);
  }
  return resolved;
}

/** `<application url>/?sess=<code>` */
export function buildSessionUrl(applicationUrl: string, appSessionCode: string): string {
  const base = applicationUrl.endsWith("/") ? applicationUrl : `${applicationUrl}/`;
  return `${base}?sess=${encodeURIComponent(appSessionCode)}`;
}

/**
 * Create or fetch the user application session of `userId` (or of a new
 * anonymous user when `userId` is null) under an application session.
 *
 * Registered users get exactly one row per application session. Anonymous
 * users are only known by the row's own code, so every call without a user
 * creates a fresh row.
 *
 * The config in effect now is snapshotted onto a newly created row.
 */
export async function findOrCreateUserAppSession(
  store: DataStore,
  resolved: ResolvedApplicationSession,
  userId: number | null
): Promise<{ row: UserAppSession; created: boolean }> {
  const code = generateUserAppSessionCode();
  const identityKey = userId === null ? anonymousIdentityKey(code) : userIdentityKey(userId);

  const result = await store.findOrCreateUserAppSession({
    code,
    applicationSessionCode: resolved.session.code,
    userId,
    identityKey,
    configSnapshot: resolved.config.config,
  });

  if (result.created) {
    console.log(
      `[Session] Created user application session ${result.row.id} in ${resolved.session.code}` +
        (userId === null ? " (anonymous)" : ` for user ${userId}`)
    );
  }

  return result;
}

/**
 * Find the default application session of the application served at
 * `referrer`. A trailing slash on the referrer is tolerated.
 *
 * @throws ValidationError if no application with a default session matches
 */
export async function findDefaultSessionCode(store: DataStore, referrer: string): Promise<string> {
  let application = await store.findApplicationByUrl(referrer);
  if (!application && referrer.endsWith("/")) {
    application = await store.findApplicationByUrl(referrer.slice(0, -1));
  }

  if (!application?.defaultAppSessionCode) {
    throw new ValidationError("No default application session for this referrer");
  }

  return application.defaultAppSessionCode;
}

/**
 * Forward a visitor of a gate to the next of its active member sessions.
 *
 * @throws NotFoundError if the gate is unknown or inactive, or has no
 *   active member session
 */
export async function enterGate(
  store: DataStore,
  gateCode: string
): Promise<{ appSessionCode: string; url: string }> {
  const appSessionCode = await store.nextGateSession(gateCode);
  if (!appSessionCode) {
    throw new NotFoundError(`Gate ${gateCode} not found`);
  }

  const resolved = await getActiveApplicationSession(store, appSessionCode);
  console.log(`[Session] Gate ${gateCode} forwarded to ${appSessionCode}`);
  return { appSessionCode, url: buildSessionUrl(resolved.application.url, appSessionCode) };
}
