/**
 * PostgreSQL Data Store
 * `DataStore` implementation over a `pg` pool with plain SQL.
 *
 * CONCURRENCY:
 * ------------
 * - User application sessions are inserted with `ON CONFLICT DO NOTHING` on
 *   (application_session_code, identity_key) and re-selected on conflict, so
 *   concurrent first-contact requests converge on one row.
 * - Opening a tracking session locks the parent user application session row
 *   (`FOR UPDATE`), closes any open session and inserts the new one in one
 *   transaction. The partial unique index `one_open_tracking_session` backs
 *   this up at the schema level.
 * - Events are single-row inserts; readers never see a partial event.
 * - Feedback is inserted with `ON CONFLICT DO NOTHING` on (user application
 *   session, content section).
 * - A gate row is locked (`FOR UPDATE`) while its next member is picked.
 * - An export reads all its pages from one REPEATABLE READ snapshot, so
 *   events ingested meanwhile cannot shift the OFFSET paging.
 *
 * JSON values are always sent as serialized text: `pg` would otherwise turn
 * JS arrays into Postgres arrays.
 *
 * Schema: db/schema.sql
 */

import type pg from "pg";
import { readInSnapshot, withTransaction } from "./db.js";
import type { DataStore, NewUser, NewUserAppSession } from "./store.js";
import type {
  AccessToken,
  AppConfigJson,
  Application,
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
  ExportFileKind,
  ExportFilter,
  ExportRowsByKind,
} from "../types/export.types.js";
import type { NewUserFeedback, UserFeedback } from "../types/feedback.types.js";

// ============================================
// Raw Row Types
// ============================================

interface ApplicationRow {
  id: number;
  name: string;
  url: string;
  default_app_session_code: string | null;
}

interface ResolvedSessionRow extends ApplicationRow {
  code: string;
  config_id: number;
  auth_mode: AuthMode;
  description: string;
  is_active: boolean;
  config_label: string;
  config: AppConfigJson;
}

interface UserRow {
  id: number;
  username: string;
  email: string | null;
  password_hash: string;
}

interface TokenRow {
  token: string;
  user_id: number | null;
  user_app_session_id: number | null;
  created_at: Date;
}

interface UserAppSessionRow {
  id: number;
  code: string;
  application_session_code: string;
  user_id: number | null;
  config_snapshot: AppConfigJson;
  created_at: Date;
}

interface TrackingSessionRow {
  id: number;
  user_app_session_id: number;
  start_time: Date;
  end_time: Date | null;
  device_info: DeviceInfo | null;
  closed_at: Date | null;
}

interface TrackingEventRow {
  id: string; // BIGSERIAL arrives as string
  tracking_session_id: number;
  event_time: Date;
  event_type: string;
  event_value: unknown;
}

interface UserFeedbackRow {
  id: number;
  user_app_session_id: number;
  tracking_session_id: number | null;
  content_section: string;
  score: number | null;
  text: string | null;
  created_at: Date;
}

// ============================================
// Row Mappers
// ============================================

function toApplication(row: ApplicationRow): Application {
  return {
    id: row.id,
    name: row.name,
    url: row.url,
    defaultAppSessionCode: row.default_app_session_code,
  };
}

function toUser(row: UserRow): RegisteredUser {
  return { id: row.id, username: row.username, email: row.email, passwordHash: row.password_hash };
}

function toAccessToken(row: TokenRow): AccessToken {
  if (row.user_id !== null) {
    return { token: row.token, kind: "user", userId: row.user_id, createdAt: row.created_at };
  }
  if (row.user_app_session_id !== null) {
    return {
      token: row.token,
      kind: "anonymous",
      userAppSessionId: row.user_app_session_id,
      createdAt: row.created_at,
    };
  }
  throw new Error(`Access token ${row.token.slice(0, 6)}… is bound to nothing`);
}

function toUserAppSession(row: UserAppSessionRow): UserAppSession {
  return {
    id: row.id,
    code: row.code,
    applicationSessionCode: row.application_session_code,
    userId: row.user_id,
    configSnapshot: row.config_snapshot,
    createdAt: row.created_at,
  };
}

function toTrackingSession(row: TrackingSessionRow): TrackingSession {
  return {
    id: row.id,
    userAppSessionId: row.user_app_session_id,
    startTime: row.start_time,
    endTime: row.end_time,
    deviceInfo: row.device_info ?? {},
    closedAt: row.closed_at,
  };
}

function toUserFeedback(row: UserFeedbackRow): UserFeedback {
  return {
    id: row.id,
    userAppSessionId: row.user_app_session_id,
    trackingSessionId: row.tracking_session_id,
    contentSection: row.content_section,
    score: row.score,
    text: row.text,
    createdAt: row.created_at,
  };
}

function toTrackingEvent(row: TrackingEventRow): TrackingEvent {
  return {
    id: Number(row.id),
    trackingSessionId: row.tracking_session_id,
    eventTime: row.event_time,
    eventType: row.event_type,
    eventValue: row.event_value,
  };
}

// ============================================
// Export Queries
// ============================================

const EXPORT_QUERIES: Record<ExportFileKind, { select: string; orderBy: string; dateFilter: boolean }> = {
  app_sessions: {
    select:
      "SELECT a.id AS app_id, a.name AS app_name, a.url AS app_url, " +
      "ac.id AS app_config_id, ac.label AS app_config_label, " +
      "asess.code AS app_sess_code, asess.auth_mode AS app_sess_auth_mode " +
      "FROM application_sessions asess " +
      "JOIN application_configs ac ON ac.id = asess.config_id " +
      "JOIN applications a ON a.id = ac.application_id",
    orderBy: "ORDER BY asess.code",
    dateFilter: false,
  },
  tracking_sessions: {
    select:
      "SELECT ua.application_session_code AS app_sess_code, ua.code AS user_app_sess_code, " +
      "ua.user_id AS user_app_sess_user_id, t.id AS track_sess_id, " +
      "t.start_time AS track_sess_start, t.end_time AS track_sess_end, " +
      "t.device_info AS track_sess_device_info " +
      "FROM user_app_sessions ua " +
      "JOIN application_sessions asess ON asess.code = ua.application_session_code " +
      "JOIN application_configs ac ON ac.id = asess.config_id " +
      "LEFT JOIN tracking_sessions t ON t.user_app_session_id = ua.id",
    orderBy: "ORDER BY ua.application_session_code, ua.id, t.id NULLS FIRST",
    dateFilter: true,
  },
  tracking_events: {
    select:
      "SELECT ua.application_session_code AS app_sess_code, ua.code AS user_app_sess_code, " +
      "e.tracking_session_id AS track_sess_id, e.event_time, e.event_type, e.event_value " +
      "FROM tracking_events e " +
      "JOIN tracking_sessions t ON t.id = e.tracking_session_id " +
      "JOIN user_app_sessions ua ON ua.id = t.user_app_session_id " +
      "JOIN application_sessions asess ON asess.code = ua.application_session_code " +
      "JOIN application_configs ac ON ac.id = asess.config_id",
    orderBy: "ORDER BY e.tracking_session_id, e.event_time, e.id",
    dateFilter: true,
  },
};

/**
 * Build the WHERE clause for an export filter.
 * Returns the clause (possibly empty) and its positional parameters.
 */
export function buildExportWhere(
  filter: ExportFilter,
  withDateFilter: boolean
): { clause: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];

  const add = (sql: string, value: unknown) => {
    params.push(value);
    conditions.push(sql.replace("?", `$${params.length}`));
  };

  if (filter.appSessCode !== undefined) add("asess.code = ?", filter.appSessCode);
  if (filter.configId !== undefined) add("ac.id = ?", filter.configId);
  if (filter.applicationId !== undefined) add("ac.application_id = ?", filter.applicationId);
  if (withDateFilter && filter.from !== undefined) add("t.start_time >= ?", filter.from);
  if (withDateFilter && filter.to !== undefined) add("t.start_time <= ?", filter.to);

  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

// ============================================
// Store
// ============================================

export class PgStore implements DataStore {
  constructor(private readonly db: pg.Pool) {}

  async getApplicationSession(code: string): Promise<ResolvedApplicationSession | null> {
    const result = await this.db.query<ResolvedSessionRow>(
      "SELECT asess.code, asess.config_id, asess.auth_mode, asess.description, asess.is_active, " +
        "ac.label AS config_label, ac.config, " +
        "a.id, a.name, a.url, a.default_app_session_code " +
        "FROM application_sessions asess " +
        "JOIN application_configs ac ON ac.id = asess.config_id " +
        "JOIN applications a ON a.id = ac.application_id " +
        "WHERE asess.code = $1",
      [code]
    );
    const row = result.rows[0];
    if (!row) return null;

    return {
      session: {
        code: row.code,
        configId: row.config_id,
        authMode: row.auth_mode,
        description: row.description,
        isActive: row.is_active,
      },
      config: { id: row.config_id, applicationId: row.id, label: row.config_label, config: row.config },
      application: toApplication(row),
    };
  }

  async findApplicationByUrl(url: string): Promise<Application | null> {
    const result = await this.db.query<ApplicationRow>(
      "SELECT id, name, url, default_app_session_code FROM applications WHERE url = $1",
      [url]
    );
    const row = result.rows[0];
    return row ? toApplication(row) : null;
  }

  async nextGateSession(gateCode: string): Promise<string | null> {
    return withTransaction(this.db, async (client) => {
      const gate = await client.query<{ next_forward_index: number }>(
        "SELECT next_forward_index FROM application_session_gates WHERE code = $1 AND is_active FOR UPDATE",
        [gateCode]
      );
      const row = gate.rows[0];
      if (!row) return null;

      const members = await client.query<{ code: string }>(
        "SELECT asess.code FROM application_session_gate_members m " +
          "JOIN application_sessions asess ON asess.code = m.application_session_code " +
          "WHERE m.gate_code = $1 AND asess.is_active ORDER BY asess.code",
        [gateCode]
      );
      if (members.rows.length === 0) return null;

      const index = row.next_forward_index % members.rows.length;
      await client.query("UPDATE application_session_gates SET next_forward_index = $2 WHERE code = $1", [
        gateCode,
        (index + 1) % members.rows.length,
      ]);
      return members.rows[index].code;
    });
  }

  async findUser(ident: { username?: string; email?: string }): Promise<RegisteredUser | null> {
    if (ident.username === undefined && ident.email === undefined) return null;
    const result = await this.db.query<UserRow>(
      "SELECT id, username, email, password_hash FROM users " +
        "WHERE ($1::text IS NULL OR username = $1) AND ($2::text IS NULL OR email = $2)",
      [ident.username ?? null, ident.email ?? null]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async createUser(user: NewUser): Promise<RegisteredUser | null> {
    const result = await this.db.query<UserRow>(
      "INSERT INTO users (username, email, password_hash) VALUES ($1, $2, $3) " +
        "ON CONFLICT DO NOTHING RETURNING id, username, email, password_hash",
      [user.username, user.email, user.passwordHash]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async findAccessToken(token: string): Promise<AccessToken | null> {
    const result = await this.db.query<TokenRow>(
      "SELECT token, user_id, user_app_session_id, created_at FROM access_tokens WHERE token = $1",
      [token]
    );
    const row = result.rows[0];
    return row ? toAccessToken(row) : null;
  }

  async createAnonymousToken(token: string, userAppSessionId: number): Promise<AccessToken> {
    const result = await this.db.query<TokenRow>(
      "INSERT INTO access_tokens (token, user_app_session_id) VALUES ($1, $2) " +
        "RETURNING token, user_id, user_app_session_id, created_at",
      [token, userAppSessionId]
    );
    return toAccessToken(result.rows[0]);
  }

  async findOrCreateUserToken(token: string, userId: number): Promise<AccessToken> {
    const inserted = await this.db.query<TokenRow>(
      "INSERT INTO access_tokens (token, user_id) VALUES ($1, $2) ON CONFLICT (user_id) DO NOTHING " +
        "RETURNING token, user_id, user_app_session_id, created_at",
      [token, userId]
    );
    if (inserted.rows[0]) return toAccessToken(inserted.rows[0]);

    const existing = await this.db.query<TokenRow>(
      "SELECT token, user_id, user_app_session_id, created_at FROM access_tokens WHERE user_id = $1",
      [userId]
    );
    return toAccessToken(existing.rows[0]);
  }

  async findOrCreateUserAppSession(
    input: NewUserAppSession
  ): Promise<{ row: UserAppSession; created: boolean }> {
    const inserted = await this.db.query<UserAppSessionRow>(
      "INSERT INTO user_app_sessions (code, application_session_code, user_id, identity_key, config_snapshot) " +
        "VALUES ($1, $2, $3, $4, $5) " +
        "ON CONFLICT (application_session_code, identity_key) DO NOTHING " +
        "RETURNING id, code, application_session_code, user_id, config_snapshot, created_at",
      [
        input.code,
        input.applicationSessionCode,
        input.userId,
        input.identityKey,
        JSON.stringify(input.configSnapshot),
      ]
    );
    if (inserted.rows[0]) return { row: toUserAppSession(inserted.rows[0]), created: true };

    const existing = await this.findUserAppSession(input.applicationSessionCode, input.identityKey);
    if (!existing) {
      throw new Error(`User application session for ${input.identityKey} vanished after conflict`);
    }
    return { row: existing, created: false };
  }

  async getUserAppSession(id: number): Promise<UserAppSession | null> {
    const result = await this.db.query<UserAppSessionRow>(
      "SELECT id, code, application_session_code, user_id, config_snapshot, created_at " +
        "FROM user_app_sessions WHERE id = $1",
      [id]
    );
    const row = result.rows[0];
    return row ? toUserAppSession(row) : null;
  }

  async findUserAppSession(applicationSessionCode: string, identityKey: string): Promise<UserAppSession | null> {
    const result = await this.db.query<UserAppSessionRow>(
      "SELECT id, code, application_session_code, user_id, config_snapshot, created_at " +
        "FROM user_app_sessions WHERE application_session_code = $1 AND identity_key = $2",
      [applicationSessionCode, identityKey]
    );
    const row = result.rows[0];
    return row ? toUserAppSession(row) : null;
  }

  async openTrackingSession(input: {
    userAppSessionId: number;
    startTime: Date;
    deviceInfo: DeviceInfo;
    now: Date;
  }): Promise<{ session: TrackingSession; closedIds: number[] }> {
    return withTransaction(this.db, async (client) => {
      await client.query("SELECT id FROM user_app_sessions WHERE id = $1 FOR UPDATE", [
        input.userAppSessionId,
      ]);

      const closed = await client.query<{ id: number }>(
        "UPDATE tracking_sessions SET end_time = $2, closed_at = $2 " +
          "WHERE user_app_session_id = $1 AND end_time IS NULL RETURNING id",
        [input.userAppSessionId, input.now]
      );

      const opened = await client.query<TrackingSessionRow>(
        "INSERT INTO tracking_sessions (user_app_session_id, start_time, device_info) VALUES ($1, $2, $3) " +
          "RETURNING id, user_app_session_id, start_time, end_time, device_info, closed_at",
        [input.userAppSessionId, input.startTime, JSON.stringify(input.deviceInfo)]
      );

      return {
        session: toTrackingSession(opened.rows[0]),
        closedIds: closed.rows.map((row) => row.id),
      };
    });
  }

  async closeTrackingSession(id: number, endTime: Date, now: Date): Promise<TrackingSession | null> {
    const result = await this.db.query<TrackingSessionRow>(
      "UPDATE tracking_sessions SET end_time = $2, closed_at = $3 WHERE id = $1 AND end_time IS NULL " +
        "RETURNING id, user_app_session_id, start_time, end_time, device_info, closed_at",
      [id, endTime, now]
    );
    const row = result.rows[0];
    return row ? toTrackingSession(row) : null;
  }

  async getTrackingSession(id: number): Promise<TrackingSession | null> {
    const result = await this.db.query<TrackingSessionRow>(
      "SELECT id, user_app_session_id, start_time, end_time, device_info, closed_at " +
        "FROM tracking_sessions WHERE id = $1",
      [id]
    );
    const row = result.rows[0];
    return row ? toTrackingSession(row) : null;
  }

  async appendTrackingEvent(event: NewTrackingEvent): Promise<TrackingEvent> {
    const result = await this.db.query<TrackingEventRow>(
      "INSERT INTO tracking_events (tracking_session_id, event_time, event_type, event_value) " +
        "VALUES ($1, $2, $3, $4) " +
        "RETURNING id, tracking_session_id, event_time, event_type, event_value",
      [
        event.trackingSessionId,
        event.eventTime,
        event.eventType,
        JSON.stringify(event.eventValue ?? null),
      ]
    );
    return toTrackingEvent(result.rows[0]);
  }

  async listTrackingEvents(trackingSessionId: number): Promise<TrackingEvent[]> {
    const result = await this.db.query<TrackingEventRow>(
      "SELECT id, tracking_session_id, event_time, event_type, event_value FROM tracking_events " +
        "WHERE tracking_session_id = $1 ORDER BY event_time, id",
      [trackingSessionId]
    );
    return result.rows.map(toTrackingEvent);
  }

  async createUserFeedback(feedback: NewUserFeedback): Promise<UserFeedback | null> {
    const result = await this.db.query<UserFeedbackRow>(
      "INSERT INTO user_feedback (user_app_session_id, tracking_session_id, content_section, score, text) " +
        "VALUES ($1, $2, $3, $4, $5) " +
        "ON CONFLICT (user_app_session_id, content_section) DO NOTHING " +
        "RETURNING id, user_app_session_id, tracking_session_id, content_section, score, text, created_at",
      [
        feedback.userAppSessionId,
        feedback.trackingSessionId,
        feedback.contentSection,
        feedback.score,
        feedback.text,
      ]
    );
    const row = result.rows[0];
    return row ? toUserFeedback(row) : null;
  }

  iterateExportRows<K extends ExportFileKind>(
    kind: K,
    filter: ExportFilter,
    batchSize: number
  ): AsyncIterable<ExportRowsByKind[K][]> {
    const query = EXPORT_QUERIES[kind];
    const where = buildExportWhere(filter, query.dateFilter);
    const limitIndex = where.params.length + 1;
    const sql = `${query.select} ${where.clause} ${query.orderBy} LIMIT $${limitIndex} OFFSET $${limitIndex + 1}`;

    return readInSnapshot(
      () => this.db.connect(),
      async function* (client) {
        for (let offset = 0; ; offset += batchSize) {
          const result = await client.query<ExportRowsByKind[K]>(sql, [...where.params, batchSize, offset]);
          if (result.rows.length > 0) yield result.rows;
          if (result.rows.length < batchSize) return;
        }
      }
    );
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
