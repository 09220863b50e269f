/**
 * Export Job Engine
 * Background generation of the three CSV files of a data export, with
 * polling, download and deletion.
 *
 * FILE LIFE CYCLE:
 * ----------------
 *
 * ```
 * startExport(filter)
 *        │  three files registered as "requested", one task dispatched per file
 *        ▼
 * ┌──────────────────┐      ┌──────────────────┐
 * │ runFileTask      │ ───► │ generating       │ ── error ──► failed (terminal)
 * └──────────────────┘      └────────┬─────────┘
 *                                    │ temp file renamed into place
 *                                    ▼
 *                                  ready
 * ```
 *
 * Tasks run either in this process (default) or through the pg-boss
 * `export-generation` queue; both end in `runFileTask`.
 *
 * CONCURRENCY:
 * ------------
 * - Every export gets fresh, uniquely named files (timestamp + random part),
 *   so two exports never share an output file.
 * - A task only runs for a file in the "requested" state and marks it as
 *   generating first, so at most one writer exists per file.
 * - `delete` marks the file cancelled before unlinking it; the generator
 *   checks that flag before and after publishing.
 *
 * Only requested, generating and failed files are held in memory. A ready
 * file is known by its presence in the export directory, so files already
 * there (for instance from before a restart) are reported as ready too.
 * The file lists of the last `EXPORT.MAX_TRACKED_JOBS` jobs are kept for
 * `poll(jobId)`; failed entries leave with their job.
 */

import { readdir, stat, unlink, mkdir } from "node:fs/promises";
import path from "node:path";
import { LRUCache } from "lru-cache";
import { z } from "zod";
import { EXPORT } from "../config/constants.js";
import type { DataStore } from "../lib/store.js";
import { NotFoundError, NotReadyError, ValidationError } from "../lib/errors.js";
import { generateHexCode } from "../lib/codes.js";
import { isoDateString } from "../lib/validation.js";
import { generateExportFile } from "./export-generator.service.js";
import type {
  ExportFileReport,
  ExportFileState,
  ExportFileTask,
  ExportFilter,
  ExportJob,
  SerializedExportFilter,
} from "../types/export.types.js";

// ============================================
// Filter Parsing
// ============================================

/**
 * Request body of POST /export/
 */
export const exportFilterSchema = z
  .object({
    app_sess_code: z.string().min(1).optional(),
    application_id: z.coerce.number().int().positive().optional(),
    config_id: z.coerce.number().int().positive().optional(),
    from: isoDateString.optional(),
    to: isoDateString.optional(),
  })
  .strict();

export type ExportFilterInput = z.infer<typeof exportFilterSchema>;

export function toExportFilter(input: ExportFilterInput): ExportFilter {
  return deserializeFilter({
    appSessCode: input.app_sess_code,
    applicationId: input.application_id,
    configId: input.config_id,
    from: input.from,
    to: input.to,
  });
}

export function serializeFilter(filter: ExportFilter): SerializedExportFilter {
  return {
    appSessCode: filter.appSessCode,
    applicationId: filter.applicationId,
    configId: filter.configId,
    from: filter.from?.toISOString(),
    to: filter.to?.toISOString(),
  };
}

export function deserializeFilter(filter: SerializedExportFilter): ExportFilter {
  const result: ExportFilter = {};
  if (filter.appSessCode !== undefined) result.appSessCode = filter.appSessCode;
  if (filter.applicationId !== undefined) result.applicationId = filter.applicationId;
  if (filter.configId !== undefined) result.configId = filter.configId;
  if (filter.from !== undefined) result.from = new Date(filter.from);
  if (filter.to !== undefined) result.to = new Date(filter.to);
  return result;
}

// ============================================
// File Naming
// ============================================

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** UTC `YYYY-MM-DD_HHMMSS` */
export function formatExportTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function exportScope(filter: ExportFilter): string {
  if (filter.appSessCode !== undefined) return filter.appSessCode.replace(/[^\w-]/g, "-");
  if (filter.configId !== undefined) return `config${filter.configId}`;
  if (filter.applicationId !== undefined) return `app${filter.applicationId}`;
  return "all";
}

export function isValidExportFilename(filename: string): boolean {
  return EXPORT.FILENAME_PATTERN.test(filename);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// ============================================
// Engine
// ============================================

/** Schedules one generation task */
export type ExportTaskDispatcher = (task: ExportFileTask) => Promise<void>;

export interface ExportJobEngineOptions {
  store: DataStore;
  exportDir: string;
  /** Defaults to running the task in this process */
  dispatch?: ExportTaskDispatcher;
  batchSize?: number;
}

export class ExportJobEngine {
  private readonly files = new Map<string, ExportFileState>();
  private readonly jobs = new LRUCache<string, string[]>({
    max: EXPORT.MAX_TRACKED_JOBS,
    dispose: (filenames) => {
      for (const filename of filenames) {
        if (this.files.get(filename)?.status === "failed") this.files.delete(filename);
      }
    },
  });
  private readonly inflight = new Set<Promise<void>>();
  private readonly dispatch: ExportTaskDispatcher;

  constructor(private readonly options: ExportJobEngineOptions) {
    this.dispatch = options.dispatch ?? ((task) => this.runInBackground(task));
  }

  get exportDir(): string {
    return this.options.exportDir;
  }

  /**
   * Register the three files of a new export and schedule their generation.
   * Returns immediately.
   *
   * @throws ValidationError if `from` lies after `to`
   */
  async startExport(filter: ExportFilter, now: Date = new Date()): Promise<ExportJob> {
    if (filter.from && filter.to && filter.from > filter.to) {
      throw new ValidationError("from must not be after to");
    }

    await mkdir(this.options.exportDir, { recursive: true });

    const jobId = generateHexCode(8);
    const prefix = `${formatExportTimestamp(now)}_${generateHexCode(3)}_${exportScope(filter)}`;
    const files = EXPORT.FILE_KINDS.map((kind) => ({ filename: `${prefix}_${kind}.csv`, kind }));

    // the oldest job beyond the limit is forgotten with its failed files
    this.jobs.set(jobId, files.map((file) => file.filename));
    for (const file of files) {
      this.files.set(file.filename, {
        filename: file.filename,
        jobId,
        kind: file.kind,
        status: "requested",
        cancelled: false,
        error: null,
      });
    }

    console.log(`[Export] Started export job ${jobId} (${prefix})`);

    for (const file of files) {
      try {
        await this.dispatch({ jobId, filename: file.filename, kind: file.kind, filter: serializeFilter(filter) });
      } catch (error) {
        this.markFailed(file.filename, error);
      }
    }

    return { jobId, files };
  }

  /**
   * Readiness of export files: of one job when `jobId` is given, otherwise of
   * every file in the export directory plus files still being generated or
   * failed in this process.
   *
   * @throws NotFoundError for an unknown job id
   */
  async poll(jobId?: string): Promise<ExportFileReport[]> {
    const published = new Set(await this.listPublishedFiles());

    if (jobId !== undefined) {
      const filenames = this.jobs.peek(jobId);
      if (!filenames) {
        throw new NotFoundError(`Export job ${jobId} not found`);
      }
      const reports: ExportFileReport[] = [];
      for (const filename of filenames) {
        const state = this.files.get(filename);
        if (state) reports.push(toReport(state));
        else if (published.has(filename)) reports.push(readyReport(filename));
      }
      return reports;
    }

    const reports = new Map<string, ExportFileReport>();
    for (const filename of published) {
      reports.set(filename, readyReport(filename));
    }
    for (const state of this.files.values()) {
      reports.set(state.filename, toReport(state));
    }

    return [...reports.values()].sort((a, b) => (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0));
  }

  /**
   * Absolute path of a ready export file.
   *
   * @throws NotReadyError while the file is requested or generating
   * @throws NotFoundError if the file is unknown, deleted or failed
   */
  async download(filename: string): Promise<string> {
    if (!isValidExportFilename(filename)) {
      throw new NotFoundError(`Export file ${filename} not found`);
    }

    const state = this.files.get(filename);
    if (state?.status === "failed") {
      throw new NotFoundError(`Export file ${filename} failed to generate`);
    }
    if (state && state.status !== "ready") {
      throw new NotReadyError(filename);
    }

    const filePath = path.resolve(this.options.exportDir, filename);
    try {
      await stat(filePath);
    } catch (error) {
      if (isMissingFile(error)) throw new NotFoundError(`Export file ${filename} not found`);
      throw error;
    }
    return filePath;
  }

  /**
   * Delete an export file. A generation still running for it is cancelled
   * and will not publish the file.
   *
   * @throws NotFoundError if the file is neither known nor on disk
   */
  async delete(filename: string): Promise<void> {
    if (!isValidExportFilename(filename)) {
      throw new NotFoundError(`Export file ${filename} not found`);
    }

    const state = this.files.get(filename);
    if (state) {
      state.cancelled = true;
      this.files.delete(filename);
    }

    let removed = false;
    try {
      await unlink(path.join(this.options.exportDir, filename));
      removed = true;
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }

    if (!state && !removed) {
      throw new NotFoundError(`Export file ${filename} not found`);
    }

    console.log(`[Export] Deleted ${filename}`);
  }

  /**
   * Generate one file. Never throws: failures end in the "failed" state.
   * Tasks for files that are unknown (deleted, or registered by a previous
   * process) or no longer in the "requested" state are skipped.
   */
  async runFileTask(task: ExportFileTask): Promise<void> {
    const state = this.files.get(task.filename);
    if (!state || state.cancelled || state.status !== "requested") {
      console.log(`[Export] Skipping task for ${task.filename}`);
      return;
    }

    state.status = "generating";

    try {
      const published = await generateExportFile({
        store: this.options.store,
        exportDir: this.options.exportDir,
        filename: task.filename,
        kind: task.kind,
        filter: deserializeFilter(task.filter),
        isLive: () => !state.cancelled,
        batchSize: this.options.batchSize,
      });

      if (published) {
        this.files.delete(task.filename);
        console.log(`[Export] ${task.filename} is ready`);
      } else {
        console.log(`[Export] ${task.filename} was deleted during generation`);
      }
    } catch (error) {
      this.markFailed(task.filename, error);
    }
  }

  /** Resolves once every in-process task has finished */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  private async runInBackground(task: ExportFileTask): Promise<void> {
    const run: Promise<void> = this.runFileTask(task).finally(() => {
      this.inflight.delete(run);
    });
    this.inflight.add(run);
  }

  private async listPublishedFiles(): Promise<string[]> {
    try {
      const entries = await readdir(this.options.exportDir);
      return entries.filter(isValidExportFilename);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }

  private markFailed(filename: string, error: unknown): void {
    const state = this.files.get(filename);
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Export] Generation of ${filename} failed: ${message}`);
    if (state) {
      state.status = "failed";
      state.error = message;
    }
  }
}

function readyReport(filename: string): ExportFileReport {
  return { filename, ready: true, status: "ready" };
}

function toReport(state: ExportFileState): ExportFileReport {
  const report: ExportFileReport = {
    filename: state.filename,
    ready: state.status === "ready",
    status: state.status,
  };
  if (state.status === "failed" && state.error !== null) {
    report.error = state.error;
  }
  return report;
}
