/**
 * Application Constants
 * Centralized configuration values
 */

// ============================================
// API Configuration
// ============================================

export const API = {
  VERSION: "v1",
  PREFIX: "/api/v1",
} as const;

// ============================================
// Tokens & Codes
// ============================================

/**
 * Sizes (in random bytes) of generated codes. Codes are hex encoded, so the
 * resulting string is twice as long.
 */
export const TOKENS = {
  /** Public application session code (10 hex chars) */
  APP_SESSION_CODE_BYTES: 5,
  /** User application session code (32 hex chars) */
  USER_APP_SESSION_CODE_BYTES: 16,
  /** Bearer token (64 hex chars) */
  ACCESS_TOKEN_BYTES: 32,
  /** Accepted authorization header schemes */
  HEADER_SCHEMES: ["token", "bearer"],
  /** Number of characters shown when a token is logged */
  LOG_PREFIX_LENGTH: 6,
} as const;

export const USERS = {
  MIN_PASSWORD_LENGTH: 8,
  HASH_ALGORITHM: "sha512",
  HASH_SALT_LENGTH: 16,
  HASH_ITERATIONS: 10000,
} as const;

// ============================================
// Tracking Configuration
// ============================================

export const TRACKING = {
  /**
   * Events for a tracking session that was closed less than this long ago are
   * still accepted, as long as their event time is not after the session end.
   */
  LATE_EVENT_GRACE_MS: 30_000,

  /** Frame kinds of a mouse chunk that the replay viewer can render */
  REPLAY_FRAME_KINDS: ["m", "c", "s", "S", "i", "o"],

  /** Maximum accepted request body (mouse chunks can be large) */
  MAX_BODY_SIZE: "5mb",
} as const;

// ============================================
// Data Export Configuration
// ============================================

export const EXPORT = {
  /** The three CSV artifacts generated for every export request */
  FILE_KINDS: ["app_sessions", "tracking_sessions", "tracking_events"],

  /**
   * Valid export file names: no leading dot, exactly one dot, word chars and
   * dashes only. Anything else is treated as unknown.
   */
  FILENAME_PATTERN: /^[\w-]+\.csv$/,

  /** Rows fetched from the store per batch while generating a file */
  BATCH_SIZE: 500,

  /** Suggested client polling interval for GET /export/files */
  POLL_INTERVAL_MS: 2000,

  /** Most recent jobs whose file lists `poll(jobId)` can answer */
  MAX_TRACKED_JOBS: 100,

  DEFAULT_DIR: "./data/export",
} as const;

// ============================================
// Replay Configuration
// ============================================

export const REPLAY = {
  /** Delay before the embedded application is reloaded in live mode */
  RELOAD_DELAY_MS: 2000,

  /** Settled tracking sessions whose event timeline is kept in memory */
  CACHED_TIMELINES: 20,
} as const;

// ============================================
// Job Queue Configuration (pg-boss)
// ============================================

/**
 * pg-boss job queue configuration
 *
 * Export generation is dispatched through pg-boss so that jobs are persisted,
 * retried and expired by the database rather than by ad hoc timers.
 */
export const QUEUE = {
  /** Queue name for export file generation jobs */
  EXPORT_GENERATION: "export-generation",

  /** pg-boss schema (kept separate from app tables) */
  SCHEMA: "pgboss",

  RETRY: {
    MAX_ATTEMPTS: 2,
    BACKOFF_DELAY_MS: 5000,
  },

  /** Generation of a single file must not take longer than this */
  JOB_TIMEOUT_MS: 15 * 60 * 1000,
} as const;

// ============================================
// Error Codes
// ============================================

export const ERROR_CODES = {
  // Auth errors
  AUTH_REQUIRED: "AUTH_REQUIRED",
  AUTH_INVALID_TOKEN: "AUTH_INVALID_TOKEN",
  AUTH_MODE_MISMATCH: "AUTH_MODE_MISMATCH",
  AUTH_INVALID_CREDENTIALS: "AUTH_INVALID_CREDENTIALS",
  ADMIN_REQUIRED: "ADMIN_REQUIRED",

  // General errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
  NOT_FOUND: "NOT_FOUND",
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // Registration errors
  REGISTRATION_REJECTED: "REGISTRATION_REJECTED",

  // Tracking errors
  TRACKING_SESSION_CLOSED: "TRACKING_SESSION_CLOSED",
  TRACKING_EVENT_MALFORMED: "TRACKING_EVENT_MALFORMED",

  // Export errors
  EXPORT_NOT_READY: "EXPORT_NOT_READY",

  // Feedback errors
  FEEDBACK_EXISTS: "FEEDBACK_EXISTS",

  // Replay errors
  REPLAY_UNAVAILABLE: "REPLAY_UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
