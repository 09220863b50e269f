/**
 * Data Store Port
 * Every read and write the core performs against durable storage.
 *
 * Two implementations exist:
 * - `PgStore` (PostgreSQL via `pg`), used in deployments
 * - `MemoryStore`, used by tests and `STORAGE_DRIVER=memory` local runs
 *
 * Both must give the same guarantees:
 * - `findOrCreateUserAppSession` is insert-if-absent on
 *   (application session, identity key)
 * - `openTrackingSession` closes any open session of the same parent in the
 *   same atomic step, so at most one session per parent has no end time
 * - `appendTrackingEvent` is a single atomic insert
 * - events are listed by event time, ties broken by storage order
 * - `createUserFeedback` is insert-if-absent on (user application session,
 *   content section)
 * - `nextGateSession` reads and advances a gate's position atomically
 */

import type {
  AccessToken,
  AppConfigJson,
  RegisteredUser,
  ResolvedApplicationSession,
  UserAppSession,
  Application,
} from "../types/session.types.js";
import type {
  DeviceInfo,
  NewTrackingEvent,
  TrackingEvent,
  TrackingSession,
} from "../types/tracking.types.js";
import type { ExportFileKind, ExportFilter, ExportRowsByKind } from "../types/export.types.js";
import type { NewUserFeedback, UserFeedback } from "../types/feedback.types.js";

export interface NewUserAppSession {
  code: string;
  applicationSessionCode: string;
  userId: number | null;
  identityKey: string;
  configSnapshot: AppConfigJson;
}

export interface NewUser {
  username: string;
  email: string | null;
  passwordHash: string;
}

export interface DataStore {
  // Application sessions
  getApplicationSession(code: string): Promise<ResolvedApplicationSession | null>;
  findApplicationByUrl(url: string): Promise<Application | null>;
  /**
   * Code of the active member session the gate forwards to now, moving the
   * gate on to the next one.
   * @returns null for an unknown or inactive gate, or one without active members
   */
  nextGateSession(gateCode: string): Promise<string | null>;

  // Users
  findUser(ident: { username?: string; email?: string }): Promise<RegisteredUser | null>;
  /** @returns null when username or email is already taken */
  createUser(user: NewUser): Promise<RegisteredUser | null>;

  // Tokens
  findAccessToken(token: string): Promise<AccessToken | null>;
  createAnonymousToken(token: string, userAppSessionId: number): Promise<AccessToken>;
  /** Returns the user's token, creating it with `token` if the user has none */
  findOrCreateUserToken(token: string, userId: number): Promise<AccessToken>;

  // User application sessions
  findOrCreateUserAppSession(input: NewUserAppSession): Promise<{ row: UserAppSession; created: boolean }>;
  getUserAppSession(id: number): Promise<UserAppSession | null>;
  findUserAppSession(applicationSessionCode: string, identityKey: string): Promise<UserAppSession | null>;

  // Tracking
  openTrackingSession(input: {
    userAppSessionId: number;
    startTime: Date;
    deviceInfo: DeviceInfo;
    now: Date;
  }): Promise<{ session: TrackingSession; closedIds: number[] }>;
  /** @returns the closed session, or null when it was not open */
  closeTrackingSession(id: number, endTime: Date, now: Date): Promise<TrackingSession | null>;
  getTrackingSession(id: number): Promise<TrackingSession | null>;
  appendTrackingEvent(event: NewTrackingEvent): Promise<TrackingEvent>;
  listTrackingEvents(trackingSessionId: number): Promise<TrackingEvent[]>;

  // Feedback
  /** @returns null when feedback for this section was already given */
  createUserFeedback(feedback: NewUserFeedback): Promise<UserFeedback | null>;

  // Export
  iterateExportRows<K extends ExportFileKind>(
    kind: K,
    filter: ExportFilter,
    batchSize: number
  ): AsyncIterable<ExportRowsByKind[K][]>;

  close(): Promise<void>;
}
