/**
 * Export File Generator
 * Streams the rows of one export kind from the store into a CSV file.
 *
 * The file is written under a hidden temporary name in the export directory
 * and renamed into place only when complete, so a reader never sees a
 * partial file under its final name. The liveness callback is checked
 * between batches, before the rename and after it: a file deleted while it
 * was generated is never left behind.
 *
 * COLUMNS:
 * --------
 * app_sessions:      app_id, app_name, app_url, app_config_id,
 *                    app_config_label, app_sess_code, app_sess_auth_mode
 * tracking_sessions: app_sess_code, user_app_sess_code, user_app_sess_user_id,
 *                    track_sess_id, track_sess_start, track_sess_end,
 *                    track_sess_device_info (JSON)
 * tracking_events:   app_sess_code, user_app_sess_code, track_sess_id,
 *                    event_time, event_type, event_value (JSON)
 */

import { createWriteStream } from "node:fs";
import { rename, rm } from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { EXPORT } from "../config/constants.js";
import type { DataStore } from "../lib/store.js";
import { generateHexCode } from "../lib/codes.js";
import { toCsvLine, toJsonCell } from "../lib/csv.js";
import type { ExportFileKind, ExportFilter, ExportRowsByKind } from "../types/export.types.js";

// ============================================
// Column Layout
// ============================================

export const EXPORT_HEADERS: { [K in ExportFileKind]: readonly (keyof ExportRowsByKind[K])[] } = {
  app_sessions: [
    "app_id",
    "app_name",
    "app_url",
    "app_config_id",
    "app_config_label",
    "app_sess_code",
    "app_sess_auth_mode",
  ],
  tracking_sessions: [
    "app_sess_code",
    "user_app_sess_code",
    "user_app_sess_user_id",
    "track_sess_id",
    "track_sess_start",
    "track_sess_end",
    "track_sess_device_info",
  ],
  tracking_events: [
    "app_sess_code",
    "user_app_sess_code",
    "track_sess_id",
    "event_time",
    "event_type",
    "event_value",
  ],
};

const ROW_CELLS: { [K in ExportFileKind]: (row: ExportRowsByKind[K]) => unknown[] } = {
  app_sessions: (row) => [
    row.app_id,
    row.app_name,
    row.app_url,
    row.app_config_id,
    row.app_config_label,
    row.app_sess_code,
    row.app_sess_auth_mode,
  ],
  tracking_sessions: (row) => [
    row.app_sess_code,
    row.user_app_sess_code,
    row.user_app_sess_user_id,
    row.track_sess_id,
    row.track_sess_start,
    row.track_sess_end,
    toJsonCell(row.track_sess_device_info),
  ],
  tracking_events: (row) => [
    row.app_sess_code,
    row.user_app_sess_code,
    row.track_sess_id,
    row.event_time,
    row.event_type,
    toJsonCell(row.event_value),
  ],
};

// ============================================
// Generation
// ============================================

export interface GenerateExportFileOptions<K extends ExportFileKind> {
  store: DataStore;
  exportDir: string;
  filename: string;
  kind: K;
  filter: ExportFilter;
  /** Returns false once the file has been deleted */
  isLive: () => boolean;
  batchSize?: number;
}

/**
 * Write one export file.
 *
 * @returns true if the file was published, false if it was cancelled
 * @throws whatever the store or the file system throws; the temporary file
 *   is removed first
 */
export async function generateExportFile<K extends ExportFileKind>(
  options: GenerateExportFileOptions<K>
): Promise<boolean> {
  const { store, exportDir, filename, kind, filter, isLive } = options;
  const batchSize = options.batchSize ?? EXPORT.BATCH_SIZE;
  const target = path.join(exportDir, filename);
  const tmp = path.join(exportDir, `.${filename}.${generateHexCode(4)}.part`);

  const header = EXPORT_HEADERS[kind];
  const toCells = ROW_CELLS[kind];

  async function* csvChunks(): AsyncGenerator<string> {
    yield toCsvLine(header);
    for await (const batch of store.iterateExportRows(kind, filter, batchSize)) {
      if (!isLive()) return;
      yield batch.map((row) => toCsvLine(toCells(row))).join("");
    }
  }

  try {
    await pipeline(Readable.from(csvChunks()), createWriteStream(tmp, { encoding: "utf8" }));
  } catch (error) {
    await rm(tmp, { force: true });
    throw error;
  }

  if (!isLive()) {
    await rm(tmp, { force: true });
    return false;
  }

  try {
    await rename(tmp, target);
  } catch (error) {
    await rm(tmp, { force: true });
    throw error;
  }

  if (!isLive()) {
    // deleted while the rename was in flight
    await rm(target, { force: true });
    return false;
  }

  return true;
}
