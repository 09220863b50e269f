/**
 * Export Generation Worker
 * pg-boss worker that hands export generation jobs to the export engine.
 *
 * The worker runs inside the API process: file status lives in the engine's
 * registry, which `GET /export/files/` reads. Jobs left over from a previous
 * process find no registry entry and are skipped by the engine.
 *
 * ERROR HANDLING:
 * ---------------
 * - Malformed payloads: logged and completed (retrying cannot fix them)
 * - Generation errors: recorded as a "failed" file by the engine; the job
 *   itself completes
 *
 * @example
 * await startExportWorker(engine);
 */

import { z } from "zod";
import { EXPORT } from "../config/constants.js";
import { registerExportWorker, type ExportGenerationJob } from "../queues/export.queue.js";
import type { ExportJobEngine } from "../services/export.service.js";

const exportFileTaskSchema = z.object({
  jobId: z.string().min(1),
  filename: z.string().regex(EXPORT.FILENAME_PATTERN),
  kind: z.enum(EXPORT.FILE_KINDS),
  filter: z.object({
    appSessCode: z.string().optional(),
    applicationId: z.number().int().optional(),
    configId: z.number().int().optional(),
    from: z.string().optional(),
    to: z.string().optional(),
  }),
});

let workerId: string | undefined;

/**
 * Build the job handler for an engine.
 */
export function createExportJobHandler(engine: ExportJobEngine) {
  return async (job: ExportGenerationJob): Promise<void> => {
    const parsed = exportFileTaskSchema.safeParse(job.data);
    if (!parsed.success) {
      console.error(`[Worker] Skipping malformed export job ${job.id}: ${parsed.error.message}`);
      return;
    }

    console.log(`[Worker] Processing export job ${job.id} (${parsed.data.filename})`);
    await engine.runFileTask(parsed.data);
  };
}

/**
 * Start the export worker.
 *
 * @returns true if the worker started, false if it was already running
 */
export async function startExportWorker(engine: ExportJobEngine): Promise<boolean> {
  if (workerId) {
    console.log("[Worker] Export worker already running");
    return false;
  }

  workerId = await registerExportWorker(createExportJobHandler(engine));
  console.log(`[Worker] Export worker started (id: ${workerId})`);
  return true;
}

export function stopExportWorker(): void {
  // pg-boss drops the subscription when the queue is stopped
  workerId = undefined;
}
