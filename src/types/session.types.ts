/**
 * Session & Identity Types
 * Single source of truth for applications, application sessions, users and tokens
 */

// ============================================
// Applications
// ============================================

export type AuthMode = "none" | "login";

/** Free-form application configuration passed to the client app */
export type AppConfigJson = Record<string, unknown>;

export interface Application {
  id: number;
  name: string;
  url: string;
  /** Session used when a client only knows its own URL (referrer lookup) */
  defaultAppSessionCode: string | null;
}

export interface ApplicationConfig {
  id: number;
  applicationId: number;
  label: string;
  config: AppConfigJson;
}

/**
 * A shareable, configured instantiation of an application.
 * `code` is the public handle distributed to end users.
 */
export interface ApplicationSession {
  code: string;
  configId: number;
  authMode: AuthMode;
  description: string;
  isActive: boolean;
}

/**
 * Bundles application sessions behind one shareable code. Each visitor is
 * forwarded to the next active member session in turn, ordered by code.
 */
export interface ApplicationSessionGate {
  code: string;
  label: string;
  description: string;
  isActive: boolean;
  appSessionCodes: string[];
  /** Position of the member session the next visitor is sent to */
  nextForwardIndex: number;
}

/** An application session joined with its config and application */
export interface ResolvedApplicationSession {
  session: ApplicationSession;
  config: ApplicationConfig;
  application: Application;
}

// ============================================
// Users & Tokens
// ============================================

export interface RegisteredUser {
  id: number;
  username: string;
  email: string | null;
  passwordHash: string;
}

/**
 * One user's run of an application session.
 * `userId` is null for anonymous users.
 */
export interface UserAppSession {
  id: number;
  code: string;
  applicationSessionCode: string;
  userId: number | null;
  /** Application config in effect when this row was created */
  configSnapshot: AppConfigJson;
  createdAt: Date;
}

/**
 * Opaque bearer credential, bound either to a registered user or to exactly
 * one anonymous user application session.
 */
export type AccessToken =
  | { token: string; kind: "user"; userId: number; createdAt: Date }
  | { token: string; kind: "anonymous"; userAppSessionId: number; createdAt: Date };

export type Identity =
  | { kind: "anonymous"; userAppSessionId: number }
  | { kind: "user"; userId: number };

// ============================================
// API Response Types
// ============================================

/**
 * Response of POST /session/ and POST /session_login/
 */
export interface SessionBootstrapResponse {
  sess_code: string;
  auth_mode: AuthMode;
  token?: string;
  user_code?: string;
  config?: AppConfigJson;
}
