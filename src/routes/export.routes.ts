/**
 * Export API Endpoints
 * Admin access to the CSV data export.
 *
 * ENDPOINTS OVERVIEW:
 * -------------------
 *
 * | Method | Path                         | Description                           |
 * |--------|------------------------------|---------------------------------------|
 * | POST   | /export                      | Start generating the three CSV files  |
 * | GET    | /export/files                | Poll readiness (optionally by job id) |
 * | GET    | /export/download/:filename   | Download a ready file                  |
 * | GET    | /export/delete/:filename     | Delete a file                         |
 * | DELETE | /export/files/:filename      | Delete a file                         |
 *
 * All endpoints require the `x-admin-key` header.
 *
 * CLIENT FLOW:
 * ------------
 * ```
 * POST /export ──► 202 { job_id, files }
 *        │
 *        ▼
 * GET /export/files?job_id=... (every poll_interval_ms until all ready)
 *        │
 *        ▼
 * GET /export/download/<filename>  (×3)
 * ```
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import { EXPORT } from "../config/constants.js";
import { parseInput } from "../lib/validation.js";
import { requireAdmin } from "../middleware/admin.middleware.js";
import { exportFilterSchema, toExportFilter } from "../services/export.service.js";

const router = Router();

router.use("/export", requireAdmin);

const startExportSchema = z.union([z.object({ filters: exportFilterSchema }).strict(), exportFilterSchema]);

const pollQuerySchema = z.object({
  job_id: z.string().min(1).optional(),
});

/**
 * @openapi
 * /export:
 *   post:
 *     summary: Start a data export
 *     description: |
 *       Registers three files (`app_sessions`, `tracking_sessions`,
 *       `tracking_events`) and generates them in the background. The filter
 *       may be sent flat or under `filters`; an empty body exports everything.
 *     tags: [Export]
 *     security:
 *       - AdminKey: []
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/ExportFilter'
 *     responses:
 *       202:
 *         description: Export started
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 job_id: { type: string }
 *                 files:
 *                   type: array
 *                   items:
 *                     type: object
 *                     properties:
 *                       filename: { type: string }
 *                       kind: { type: string }
 *                 poll_interval_ms: { type: integer }
 *       400:
 *         description: Invalid filter
 *       401:
 *         description: Missing admin key
 */
router.post("/export", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = parseInput(startExportSchema, req.body ?? {});
    const input = "filters" in body ? body.filters : body;

    const job = await req.ctx.exports.startExport(toExportFilter(input));
    res.status(202).json({
      job_id: job.jobId,
      files: job.files,
      poll_interval_ms: EXPORT.POLL_INTERVAL_MS,
    });
  } catch (error) {
    next(error);
  }
});

/**
 * @openapi
 * /export/files:
 *   get:
 *     summary: List export files and their readiness
 *     tags: [Export]
 *     security:
 *       - AdminKey: []
 *     parameters:
 *       - in: query
 *         name: job_id
 *         schema: { type: string }
 *         description: Restrict to the files of one export
 *     responses:
 *       200:
 *         description: File list
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 files:
 *                   type: array
 *                   items:
 *                     $ref: '#/components/schemas/ExportFile'
 *       404:
 *         description: Unknown job id
 */
router.get("/export/files", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const query = parseInput(pollQuerySchema, req.query);
    const files = await req.ctx.exports.poll(query.job_id);
    res.json({ files });
  } catch (error) {
    next(error);
  }
});

/**
 * @openapi
 * /export/download/{filename}:
 *   get:
 *     summary: Download a ready export file
 *     tags: [Export]
 *     security:
 *       - AdminKey: []
 *     parameters:
 *       - in: path
 *         name: filename
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: CSV file
 *         content:
 *           text/csv: {}
 *       404:
 *         description: Unknown, deleted or failed file
 *       409:
 *         description: File is still being generated
 */
router.get("/export/download/:filename", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const filename = req.params.filename;
    const filePath = await req.ctx.exports.download(filename);
    res.download(filePath, filename, (error) => {
      if (error && !res.headersSent) {
        next(error);
      } else if (error) {
        console.error(`[Export] Download of ${filename} aborted: ${error.message}`);
      }
    });
  } catch (error) {
    next(error);
  }
});

/**
 * @openapi
 * /export/delete/{filename}:
 *   get:
 *     summary: Delete an export file
 *     description: A generation still running for the file is cancelled.
 *     tags: [Export]
 *     security:
 *       - AdminKey: []
 *     parameters:
 *       - in: path
 *         name: filename
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Deleted
 *       404:
 *         description: Unknown file
 */
async function deleteExportFile(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const filename = req.params.filename;
    await req.ctx.exports.delete(filename);
    res.json({ success: true, filename });
  } catch (error) {
    next(error);
  }
}

router.get("/export/delete/:filename", deleteExportFile);
router.delete("/export/files/:filename", deleteExportFile);

export default router;
