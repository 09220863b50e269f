/**
 * Data Export Types
 */

import type { EXPORT } from "../config/constants.js";

export type ExportFileKind = (typeof EXPORT.FILE_KINDS)[number];

/**
 * Rows selected for an export. All criteria are optional and combined with AND;
 * the date range applies to tracking session start times.
 */
export interface ExportFilter {
  appSessCode?: string;
  applicationId?: number;
  configId?: number;
  from?: Date;
  to?: Date;
}

/**
 * Life cycle of one export file:
 *
 * ```
 * requested ──► generating ──► ready
 *                   │
 *                   └────────► failed
 * ```
 */
export type ExportFileStatus = "requested" | "generating" | "ready" | "failed";

export interface ExportFileState {
  filename: string;
  jobId: string;
  kind: ExportFileKind;
  status: ExportFileStatus;
  /** Set by delete(); a generation task must not publish a cancelled file */
  cancelled: boolean;
  error: string | null;
}

/** One entry of the poll response */
export interface ExportFileReport {
  filename: string;
  ready: boolean;
  status: ExportFileStatus;
  error?: string;
}

export interface ExportJob {
  jobId: string;
  files: { filename: string; kind: ExportFileKind }[];
}

/** Payload of one generation task (one task per file) */
export interface ExportFileTask {
  jobId: string;
  filename: string;
  kind: ExportFileKind;
  filter: SerializedExportFilter;
}

/** Export filter as carried through the job queue (JSON safe) */
export interface SerializedExportFilter {
  appSessCode?: string;
  applicationId?: number;
  configId?: number;
  from?: string;
  to?: string;
}

// ============================================
// CSV Row Types
// ============================================

export interface AppSessionExportRow {
  app_id: number;
  app_name: string;
  app_url: string;
  app_config_id: number;
  app_config_label: string;
  app_sess_code: string;
  app_sess_auth_mode: string;
}

export interface TrackingSessionExportRow {
  app_sess_code: string;
  user_app_sess_code: string;
  user_app_sess_user_id: number | null;
  track_sess_id: number | null;
  track_sess_start: Date | null;
  track_sess_end: Date | null;
  track_sess_device_info: unknown;
}

export interface TrackingEventExportRow {
  app_sess_code: string;
  user_app_sess_code: string;
  track_sess_id: number;
  event_time: Date;
  event_type: string;
  event_value: unknown;
}

export interface ExportRowsByKind {
  app_sessions: AppSessionExportRow;
  tracking_sessions: TrackingSessionExportRow;
  tracking_events: TrackingEventExportRow;
}
