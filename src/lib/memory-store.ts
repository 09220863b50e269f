/**
 * In-Memory Data Store
 *
 * Same contract as `PgStore`, kept in plain maps. Used by the test suite and
 * by `STORAGE_DRIVER=memory` local runs. JSON values are cloned on the way in
 * and out so callers can never mutate stored rows.
 *
 * Applications, configs and application sessions are administered outside
 * this service; the `add*` helpers below stand in for that administration.
 */

import type { DataStore, NewUser, NewUserAppSession } from "./store.js";
import { generateAppSessionCode } from "./codes.js";
import type {
  AccessToken,
  AppConfigJson,
  Application,
  ApplicationConfig,
  ApplicationSession,
  ApplicationSessionGate,
  AuthMode,
  RegisteredUser,
  ResolvedApplicationSession,
  UserAppSession,
} from "../types/session.types.js";
import type {
  DeviceInfo,
  NewTrackingEvent,
  TrackingEvent,
  TrackingSession,
} from "../types/tracking.types.js";
import type {
  AppSessionExportRow,
  ExportFileKind,
  ExportFilter,
  ExportRowsByKind,
  TrackingEventExportRow,
  TrackingSessionExportRow,
} from "../types/export.types.js";
import type { NewUserFeedback, UserFeedback } from "../types/feedback.types.js";

function clone<T>(value: T): T {
  return value === undefined ? value : structuredClone(value);
}

export class MemoryStore implements DataStore {
  private applications = new Map<number, Application>();
  private configs = new Map<number, ApplicationConfig>();
  private appSessions = new Map<string, ApplicationSession>();
  private users = new Map<number, RegisteredUser>();
  private tokens = new Map<string, AccessToken>();
  private userAppSessions = new Map<number, UserAppSession & { identityKey: string }>();
  private trackingSessions = new Map<number, TrackingSession>();
  private events: TrackingEvent[] = [];
  private gates = new Map<string, ApplicationSessionGate>();
  private feedback: UserFeedback[] = [];

  private nextId = {
    application: 1,
    config: 1,
    user: 1,
    userAppSession: 1,
    trackingSession: 1,
    event: 1,
    feedback: 1,
  };

  // ═══════════════════════════════════════════════════════════════════════════════
  // ADMINISTRATION HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  addApplication(input: { name: string; url: string }): Application {
    const application: Application = {
      id: this.nextId.application++,
      name: input.name,
      url: input.url,
      defaultAppSessionCode: null,
    };
    this.applications.set(application.id, application);
    return { ...application };
  }

  addConfig(input: { applicationId: number; label: string; config?: AppConfigJson }): ApplicationConfig {
    const config: ApplicationConfig = {
      id: this.nextId.config++,
      applicationId: input.applicationId,
      label: input.label,
      config: clone(input.config ?? {}),
    };
    this.configs.set(config.id, config);
    return clone(config);
  }

  /** Replace a config's JSON, as an administrator editing it would */
  updateConfig(configId: number, config: AppConfigJson): void {
    const existing = this.configs.get(configId);
    if (!existing) throw new Error(`Unknown config ${configId}`);
    existing.config = clone(config);
  }

  addApplicationSession(input: {
    configId: number;
    authMode: AuthMode;
    code?: string;
    isActive?: boolean;
    description?: string;
  }): ApplicationSession {
    const session: ApplicationSession = {
      code: input.code ?? generateAppSessionCode(),
      configId: input.configId,
      authMode: input.authMode,
      description: input.description ?? "",
      isActive: input.isActive ?? true,
    };
    this.appSessions.set(session.code, session);
    return { ...session };
  }

  setDefaultAppSession(applicationId: number, code: string | null): void {
    const application = this.applications.get(applicationId);
    if (!application) throw new Error(`Unknown application ${applicationId}`);
    application.defaultAppSessionCode = code;
  }

  addGate(input: {
    code: string;
    label: string;
    appSessionCodes: string[];
    isActive?: boolean;
  }): ApplicationSessionGate {
    const gate: ApplicationSessionGate = {
      code: input.code,
      label: input.label,
      description: "",
      isActive: input.isActive ?? true,
      appSessionCodes: [...input.appSessionCodes],
      nextForwardIndex: 0,
    };
    this.gates.set(gate.code, gate);
    return { ...gate, appSessionCodes: [...gate.appSessionCodes] };
  }

  /** Switch an application session on or off, as an administrator would */
  setApplicationSessionActive(code: string, isActive: boolean): void {
    const session = this.appSessions.get(code);
    if (!session) throw new Error(`Unknown application session ${code}`);
    session.isActive = isActive;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // APPLICATION SESSIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async getApplicationSession(code: string): Promise<ResolvedApplicationSession | null> {
    const session = this.appSessions.get(code);
    if (!session) return null;
    const config = this.configs.get(session.configId);
    const application = config ? this.applications.get(config.applicationId) : undefined;
    if (!config || !application) return null;
    return { session: { ...session }, config: clone(config), application: { ...application } };
  }

  async findApplicationByUrl(url: string): Promise<Application | null> {
    for (const application of this.applications.values()) {
      if (application.url === url) return { ...application };
    }
    return null;
  }

  async nextGateSession(gateCode: string): Promise<string | null> {
    const gate = this.gates.get(gateCode);
    if (!gate || !gate.isActive) return null;

    const members = gate.appSessionCodes
      .filter((code) => this.appSessions.get(code)?.isActive === true)
      .sort(compareStrings);
    if (members.length === 0) return null;

    const index = gate.nextForwardIndex % members.length;
    gate.nextForwardIndex = (index + 1) % members.length;
    return members[index];
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // USERS & TOKENS
  // ═══════════════════════════════════════════════════════════════════════════════

  async findUser(ident: { username?: string; email?: string }): Promise<RegisteredUser | null> {
    if (ident.username === undefined && ident.email === undefined) return null;
    for (const user of this.users.values()) {
      const usernameMatches = ident.username === undefined || user.username === ident.username;
      const emailMatches = ident.email === undefined || user.email === ident.email;
      if (usernameMatches && emailMatches) return { ...user };
    }
    return null;
  }

  async createUser(input: NewUser): Promise<RegisteredUser | null> {
    for (const user of this.users.values()) {
      if (user.username === input.username) return null;
      if (input.email !== null && user.email === input.email) return null;
    }
    const user: RegisteredUser = { id: this.nextId.user++, ...input };
    this.users.set(user.id, user);
    return { ...user };
  }

  async findAccessToken(token: string): Promise<AccessToken | null> {
    const found = this.tokens.get(token);
    return found ? { ...found } : null;
  }

  async createAnonymousToken(token: string, userAppSessionId: number): Promise<AccessToken> {
    const row: AccessToken = { token, kind: "anonymous", userAppSessionId, createdAt: new Date() };
    this.tokens.set(token, row);
    return { ...row };
  }

  async findOrCreateUserToken(token: string, userId: number): Promise<AccessToken> {
    for (const existing of this.tokens.values()) {
      if (existing.kind === "user" && existing.userId === userId) return { ...existing };
    }
    const row: AccessToken = { token, kind: "user", userId, createdAt: new Date() };
    this.tokens.set(token, row);
    return { ...row };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // USER APPLICATION SESSIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async findOrCreateUserAppSession(
    input: NewUserAppSession
  ): Promise<{ row: UserAppSession; created: boolean }> {
    // no await between the lookup and the insert
    const existing = this.lookupUserAppSession(input.applicationSessionCode, input.identityKey);
    if (existing) return { row: this.toUserAppSession(existing), created: false };

    const row = {
      id: this.nextId.userAppSession++,
      code: input.code,
      applicationSessionCode: input.applicationSessionCode,
      userId: input.userId,
      identityKey: input.identityKey,
      configSnapshot: clone(input.configSnapshot),
      createdAt: new Date(),
    };
    this.userAppSessions.set(row.id, row);
    return { row: this.toUserAppSession(row), created: true };
  }

  async getUserAppSession(id: number): Promise<UserAppSession | null> {
    const row = this.userAppSessions.get(id);
    return row ? this.toUserAppSession(row) : null;
  }

  async findUserAppSession(applicationSessionCode: string, identityKey: string): Promise<UserAppSession | null> {
    const row = this.lookupUserAppSession(applicationSessionCode, identityKey);
    return row ? this.toUserAppSession(row) : null;
  }

  private lookupUserAppSession(
    applicationSessionCode: string,
    identityKey: string
  ): (UserAppSession & { identityKey: string }) | undefined {
    for (const row of this.userAppSessions.values()) {
      if (row.applicationSessionCode === applicationSessionCode && row.identityKey === identityKey) return row;
    }
    return undefined;
  }

  private toUserAppSession(row: UserAppSession & { identityKey: string }): UserAppSession {
    const { identityKey: _identityKey, ...rest } = row;
    return { ...rest, configSnapshot: clone(rest.configSnapshot) };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TRACKING
  // ═══════════════════════════════════════════════════════════════════════════════

  async openTrackingSession(input: {
    userAppSessionId: number;
    startTime: Date;
    deviceInfo: DeviceInfo;
    now: Date;
  }): Promise<{ session: TrackingSession; closedIds: number[] }> {
    const closedIds: number[] = [];
    for (const existing of this.trackingSessions.values()) {
      if (existing.userAppSessionId === input.userAppSessionId && existing.endTime === null) {
        existing.endTime = input.now;
        existing.closedAt = input.now;
        closedIds.push(existing.id);
      }
    }

    const session: TrackingSession = {
      id: this.nextId.trackingSession++,
      userAppSessionId: input.userAppSessionId,
      startTime: input.startTime,
      endTime: null,
      deviceInfo: clone(input.deviceInfo),
      closedAt: null,
    };
    this.trackingSessions.set(session.id, session);
    return { session: clone(session), closedIds };
  }

  async closeTrackingSession(id: number, endTime: Date, now: Date): Promise<TrackingSession | null> {
    const session = this.trackingSessions.get(id);
    if (!session || session.endTime !== null) return null;
    session.endTime = endTime;
    session.closedAt = now;
    return clone(session);
  }

  async getTrackingSession(id: number): Promise<TrackingSession | null> {
    const session = this.trackingSessions.get(id);
    return session ? clone(session) : null;
  }

  async appendTrackingEvent(event: NewTrackingEvent): Promise<TrackingEvent> {
    const row: TrackingEvent = { id: this.nextId.event++, ...clone(event) };
    this.events.push(row);
    return clone(row);
  }

  async listTrackingEvents(trackingSessionId: number): Promise<TrackingEvent[]> {
    return this.events
      .filter((event) => event.trackingSessionId === trackingSessionId)
      .sort(compareEvents)
      .map((event) => clone(event));
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // FEEDBACK
  // ═══════════════════════════════════════════════════════════════════════════════

  async createUserFeedback(input: NewUserFeedback): Promise<UserFeedback | null> {
    const taken = this.feedback.some(
      (row) => row.userAppSessionId === input.userAppSessionId && row.contentSection === input.contentSection
    );
    if (taken) return null;

    const row: UserFeedback = { id: this.nextId.feedback++, ...input, createdAt: new Date() };
    this.feedback.push(row);
    return { ...row };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // EXPORT
  // ═══════════════════════════════════════════════════════════════════════════════

  async *iterateExportRows<K extends ExportFileKind>(
    kind: K,
    filter: ExportFilter,
    batchSize: number
  ): AsyncIterable<ExportRowsByKind[K][]> {
    const rows = this.selectExportRows(kind, filter);
    for (let offset = 0; offset < rows.length; offset += batchSize) {
      yield rows.slice(offset, offset + batchSize);
    }
  }

  private selectExportRows<K extends ExportFileKind>(kind: K, filter: ExportFilter): ExportRowsByKind[K][] {
    const rows: { [P in ExportFileKind]: () => ExportRowsByKind[P][] } = {
      app_sessions: () => this.selectAppSessionRows(filter),
      tracking_sessions: () => this.selectTrackingSessionRows(filter),
      tracking_events: () => this.selectTrackingEventRows(filter),
    };
    return rows[kind]();
  }

  private matchesAppSession(code: string, filter: ExportFilter): boolean {
    const session = this.appSessions.get(code);
    const config = session ? this.configs.get(session.configId) : undefined;
    if (!session || !config) return false;
    if (filter.appSessCode !== undefined && session.code !== filter.appSessCode) return false;
    if (filter.configId !== undefined && config.id !== filter.configId) return false;
    if (filter.applicationId !== undefined && config.applicationId !== filter.applicationId) return false;
    return true;
  }

  private matchesDateRange(session: TrackingSession | undefined, filter: ExportFilter): boolean {
    if (filter.from === undefined && filter.to === undefined) return true;
    if (!session) return false;
    if (filter.from !== undefined && session.startTime < filter.from) return false;
    if (filter.to !== undefined && session.startTime > filter.to) return false;
    return true;
  }

  private selectAppSessionRows(filter: ExportFilter): AppSessionExportRow[] {
    const rows: AppSessionExportRow[] = [];
    for (const session of this.appSessions.values()) {
      if (!this.matchesAppSession(session.code, filter)) continue;
      const config = this.configs.get(session.configId);
      const application = config ? this.applications.get(config.applicationId) : undefined;
      if (!config || !application) continue;
      rows.push({
        app_id: application.id,
        app_name: application.name,
        app_url: application.url,
        app_config_id: config.id,
        app_config_label: config.label,
        app_sess_code: session.code,
        app_sess_auth_mode: session.authMode,
      });
    }
    return rows.sort((a, b) => compareStrings(a.app_sess_code, b.app_sess_code));
  }

  private selectTrackingSessionRows(filter: ExportFilter): TrackingSessionExportRow[] {
    const rows: { row: TrackingSessionExportRow; uasId: number }[] = [];
    for (const uas of this.userAppSessions.values()) {
      if (!this.matchesAppSession(uas.applicationSessionCode, filter)) continue;

      const sessions = [...this.trackingSessions.values()].filter((t) => t.userAppSessionId === uas.id);
      const joined: (TrackingSession | undefined)[] = sessions.length > 0 ? sessions : [undefined];

      for (const tracking of joined) {
        if (!this.matchesDateRange(tracking, filter)) continue;
        rows.push({
          uasId: uas.id,
          row: {
            app_sess_code: uas.applicationSessionCode,
            user_app_sess_code: uas.code,
            user_app_sess_user_id: uas.userId,
            track_sess_id: tracking?.id ?? null,
            track_sess_start: tracking?.startTime ?? null,
            track_sess_end: tracking?.endTime ?? null,
            track_sess_device_info: tracking ? clone(tracking.deviceInfo) : null,
          },
        });
      }
    }

    return rows
      .sort(
        (a, b) =>
          compareStrings(a.row.app_sess_code, b.row.app_sess_code) ||
          a.uasId - b.uasId ||
          (a.row.track_sess_id ?? 0) - (b.row.track_sess_id ?? 0)
      )
      .map(({ row }) => row);
  }

  private selectTrackingEventRows(filter: ExportFilter): TrackingEventExportRow[] {
    const rows: TrackingEventExportRow[] = [];
    const events = [...this.events].sort((a, b) => a.trackingSessionId - b.trackingSessionId || compareEvents(a, b));

    for (const event of events) {
      const tracking = this.trackingSessions.get(event.trackingSessionId);
      const uas = tracking ? this.userAppSessions.get(tracking.userAppSessionId) : undefined;
      if (!tracking || !uas) continue;
      if (!this.matchesAppSession(uas.applicationSessionCode, filter) || !this.matchesDateRange(tracking, filter)) {
        continue;
      }
      rows.push({
        app_sess_code: uas.applicationSessionCode,
        user_app_sess_code: uas.code,
        track_sess_id: event.trackingSessionId,
        event_time: event.eventTime,
        event_type: event.eventType,
        event_value: clone(event.eventValue),
      });
    }
    return rows;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}

function compareEvents(a: TrackingEvent, b: TrackingEvent): number {
  return a.eventTime.getTime() - b.eventTime.getTime() || a.id - b.id;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
