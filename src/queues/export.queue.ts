/**
 * Export Generation Queue
 * pg-boss queue carrying one job per export file.
 *
 * pg-boss keeps its jobs in PostgreSQL (schema `pgboss`), next to the
 * application tables, so no extra broker is needed.
 *
 * JOB LIFECYCLE:
 * --------------
 *
 * ```
 * POST /export/
 *        │
 *        ▼
 * ┌──────────────────────┐
 * │ 3 jobs sent          │  ← one per file, singletonKey = filename
 * └──────────────────────┘
 *        │
 *        ▼
 * [Respond { job_id, files }]
 *
 *        ... later (async) ...
 *
 * ┌──────────────────────┐
 * │ Worker picks up job  │
 * └──────────────────────┘
 *        │
 *        ▼
 * ┌──────────────────────┐
 * │ engine.runFileTask   │  ← writes the CSV, updates file status
 * └──────────────────────┘
 * ```
 *
 * The singleton key keeps a second job for the same file from being queued
 * while one is pending or active.
 *
 * @example
 * configureQueue(config.databaseUrl);
 * await addExportGenerationJob(task);
 */

import PgBoss from "pg-boss";
import { QUEUE } from "../config/constants.js";
import type { ExportFileTask } from "../types/export.types.js";

// ============================================
// Type Definitions
// ============================================

export interface ExportGenerationJob {
  id: string;
  data: unknown;
}

/** Called once per job; throwing makes pg-boss retry the job */
export type ExportJobHandler = (job: ExportGenerationJob) => Promise<void>;

// ============================================
// Queue Instance (Singleton)
// ============================================

let databaseUrl: string | null = null;
let boss: PgBoss | null = null;
let bossStartPromise: Promise<PgBoss> | null = null;

/**
 * Set the connection string used when the queue is first started.
 */
export function configureQueue(url: string): void {
  databaseUrl = url;
}

async function getBoss(): Promise<PgBoss> {
  if (boss) {
    return boss;
  }

  if (!bossStartPromise) {
    bossStartPromise = initializeBoss().catch((error: unknown) => {
      bossStartPromise = null;
      const message = error instanceof Error ? error.message : String(error);
      throw new QueueUnavailableError(`pg-boss failed to start: ${message}`);
    });
  }

  return bossStartPromise;
}

/**
 * Start pg-boss and create the export queue.
 * pg-boss creates its own tables on first run.
 */
async function initializeBoss(): Promise<PgBoss> {
  if (!databaseUrl) {
    throw new QueueUnavailableError("Queue is not configured");
  }

  console.log("[Queue] Initializing pg-boss queue...");

  const newBoss = new PgBoss({
    connectionString: databaseUrl,
    schema: QUEUE.SCHEMA,
    maintenanceIntervalSeconds: 60 * 5,
  });

  newBoss.on("error", (error: Error) => {
    console.error("[Queue] pg-boss error:", error.message);
  });

  await newBoss.start();
  await newBoss.createQueue(QUEUE.EXPORT_GENERATION);

  boss = newBoss;
  console.log("[Queue] pg-boss queue initialized successfully");

  return newBoss;
}

// ============================================
// Job Management
// ============================================

/**
 * Queue the generation of one export file.
 *
 * @returns the pg-boss job id, or null if a job for this file is already queued
 * @throws QueueUnavailableError if pg-boss cannot be started
 */
export async function addExportGenerationJob(task: ExportFileTask): Promise<string | null> {
  const bossInstance = await getBoss();

  const jobId = await bossInstance.send(QUEUE.EXPORT_GENERATION, task, {
    singletonKey: task.filename,
    expireInSeconds: QUEUE.JOB_TIMEOUT_MS / 1000,
    retryLimit: QUEUE.RETRY.MAX_ATTEMPTS,
    retryDelay: QUEUE.RETRY.BACKOFF_DELAY_MS / 1000,
    retryBackoff: true,
  });

  if (jobId) {
    console.log(`[Queue] Added export generation job: ${jobId} (${task.filename})`);
  } else {
    console.log(`[Queue] Job already queued for ${task.filename}`);
  }

  return jobId;
}

// ============================================
// Worker Registration
// ============================================

/**
 * Register the handler for export generation jobs.
 *
 * @returns pg-boss worker id
 */
export async function registerExportWorker(handler: ExportJobHandler): Promise<string> {
  const bossInstance = await getBoss();

  const workerId = await bossInstance.work<unknown>(
    QUEUE.EXPORT_GENERATION,
    { batchSize: 1, pollingIntervalSeconds: 1 },
    async (jobs) => {
      for (const job of jobs) {
        await handler({ id: job.id, data: job.data });
      }
    }
  );

  console.log(`[Queue] Export worker registered (worker: ${workerId})`);
  return workerId;
}

// ============================================
// Lifecycle
// ============================================

/**
 * Stop pg-boss, letting active jobs finish first.
 */
export async function closeQueue(): Promise<void> {
  if (boss) {
    await boss.stop({ graceful: true });
    boss = null;
    bossStartPromise = null;
    console.log("[Queue] pg-boss queue stopped");
  }
}

export function isQueueAvailable(): boolean {
  return boss !== null;
}

// ============================================
// Custom Error Class
// ============================================

export class QueueUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QueueUnavailableError";
  }
}
