/**
 * Identity Service
 * Issues and resolves bearer tokens. Every API call is attributed to exactly
 * one user application session through the token it carries.
 *
 * TOKEN KINDS:
 * ------------
 * - anonymous: bound to one user application session of an application
 *   session with auth mode "none"
 * - user: bound to a registered user; valid for every application session
 *   with auth mode "login"
 *
 * BOOTSTRAP FLOW (POST /session/):
 * --------------------------------
 *
 * ```
 *                ┌─────────────┐
 *  sess, token? ─► resolve sess ├── unknown/disabled ──► NotFound
 *                └──────┬──────┘
 *          no token     │      token
 *        ┌──────────────┴───────────────┐
 *        ▼                              ▼
 *  mode none: mint anon token     unknown ──► InvalidToken
 *  mode login: login_required     kind ≠ mode ──► AuthModeMismatch
 *                                 anon: same user app session
 *                                 user: find-or-create user app session
 * ```
 */

import type { DataStore } from "../lib/store.js";
import {
  AuthModeMismatchError,
  InvalidTokenError,
  UnauthorizedError,
  ValidationError,
} from "../lib/errors.js";
import { generateAccessToken, maskToken, userIdentityKey } from "../lib/codes.js";
import { getActiveApplicationSession, findOrCreateUserAppSession } from "./session-registry.service.js";
import { verifyCredentials, type Credentials } from "./user.service.js";
import type {
  Identity,
  ResolvedApplicationSession,
  SessionBootstrapResponse,
  UserAppSession,
} from "../types/session.types.js";

// ============================================
// Types
// ============================================

export type BootstrapResult =
  | { status: "login_required"; resolved: ResolvedApplicationSession }
  | {
      status: "resolved";
      resolved: ResolvedApplicationSession;
      token: string;
      identity: Identity;
      userAppSession: UserAppSession;
      /** True when a new identity was minted by this call */
      created: boolean;
    };

/** Identity attached to an authenticated request */
export interface RequestIdentity {
  identity: Identity;
  userAppSession: UserAppSession;
}

// ============================================
// Bootstrap
// ============================================

/**
 * Issue a fresh identity or resolve a presented token for an application
 * session. Idempotent for a given (token, application session): no second
 * user application session is ever created.
 *
 * @throws NotFoundError if the application session is unknown or disabled
 * @throws InvalidTokenError if the token is unknown or belongs to another
 *   application session
 * @throws AuthModeMismatchError if the token kind does not fit the auth mode
 */
export async function issueOrResolve(
  store: DataStore,
  input: { token?: string; appSessionCode: string }
): Promise<BootstrapResult> {
  const resolved = await getActiveApplicationSession(store, input.appSessionCode);
  const authMode = resolved.session.authMode;

  if (!input.token) {
    if (authMode === "login") {
      return { status: "login_required", resolved };
    }

    const { row } = await findOrCreateUserAppSession(store, resolved, null);
    const access = await store.createAnonymousToken(generateAccessToken(), row.id);
    console.log(`[Session] Issued anonymous token ${maskToken(access.token)} for ${resolved.session.code}`);

    return {
      status: "resolved",
      resolved,
      token: access.token,
      identity: { kind: "anonymous", userAppSessionId: row.id },
      userAppSession: row,
      created: true,
    };
  }

  const access = await store.findAccessToken(input.token);
  if (!access) {
    console.warn(`[Session] Unknown token ${maskToken(input.token)}`);
    throw new InvalidTokenError();
  }

  if (access.kind === "anonymous") {
    if (authMode !== "none") {
      throw new AuthModeMismatchError("Anonymous token presented to a login application session");
    }
    const row = await store.getUserAppSession(access.userAppSessionId);
    if (!row || row.applicationSessionCode !== resolved.session.code) {
      throw new InvalidTokenError("Token belongs to a different application session");
    }
    return {
      status: "resolved",
      resolved,
      token: access.token,
      identity: { kind: "anonymous", userAppSessionId: row.id },
      userAppSession: row,
      created: false,
    };
  }

  if (authMode !== "login") {
    throw new AuthModeMismatchError("User token presented to an anonymous application session");
  }

  const { row } = await findOrCreateUserAppSession(store, resolved, access.userId);
  return {
    status: "resolved",
    resolved,
    token: access.token,
    identity: { kind: "user", userId: access.userId },
    userAppSession: row,
    created: false,
  };
}

/**
 * Log a registered user into a login application session. The user's token
 * is created on first login and re-used afterwards.
 *
 * @throws AuthModeMismatchError if the application session needs no login
 */
export async function loginToApplicationSession(
  store: DataStore,
  appSessionCode: string,
  credentials: Credentials
): Promise<Extract<BootstrapResult, { status: "resolved" }>> {
  const resolved = await getActiveApplicationSession(store, appSessionCode);
  if (resolved.session.authMode !== "login") {
    throw new AuthModeMismatchError("This application session does not use login");
  }

  const user = await verifyCredentials(store, credentials);
  const access = await store.findOrCreateUserToken(generateAccessToken(), user.id);
  const { row, created } = await findOrCreateUserAppSession(store, resolved, user.id);

  console.log(`[Session] User ${user.id} logged into ${resolved.session.code}`);

  return {
    status: "resolved",
    resolved,
    token: access.token,
    identity: { kind: "user", userId: user.id },
    userAppSession: row,
    created,
  };
}

/**
 * Shape a bootstrap result as the response body of the session endpoints.
 */
export function toBootstrapResponse(result: BootstrapResult): SessionBootstrapResponse {
  const body: SessionBootstrapResponse = {
    sess_code: result.resolved.session.code,
    auth_mode: result.resolved.session.authMode,
  };
  if (result.status === "resolved") {
    body.token = result.token;
    body.user_code = result.userAppSession.code;
    body.config = result.resolved.config.config;
  }
  return body;
}

// ============================================
// Request Authentication
// ============================================

/**
 * Resolve the bearer token of a protected request to its user application
 * session. User tokens need the application session code to pick the row;
 * anonymous tokens identify their row on their own, and a given code must
 * match it.
 *
 * @throws UnauthorizedError if the token is unknown or does not fit `appSessionCode`
 * @throws ValidationError if a user token comes without an application session code
 */
export async function authenticateToken(
  store: DataStore,
  token: string,
  appSessionCode: string | undefined
): Promise<RequestIdentity> {
  const access = await store.findAccessToken(token);
  if (!access) {
    console.warn(`[Session] Rejected unknown token ${maskToken(token)}`);
    throw new UnauthorizedError("Invalid token");
  }

  if (access.kind === "anonymous") {
    const row = await store.getUserAppSession(access.userAppSessionId);
    if (!row || (appSessionCode !== undefined && row.applicationSessionCode !== appSessionCode)) {
      throw new UnauthorizedError("Token does not belong to this application session");
    }
    return { identity: { kind: "anonymous", userAppSessionId: row.id }, userAppSession: row };
  }

  if (appSessionCode === undefined) {
    throw new ValidationError("sess is required");
  }

  const row = await store.findUserAppSession(appSessionCode, userIdentityKey(access.userId));
  if (!row) {
    throw new UnauthorizedError("No user application session for this token");
  }
  return { identity: { kind: "user", userId: access.userId }, userAppSession: row };
}
