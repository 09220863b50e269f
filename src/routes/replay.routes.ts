/**
 * Replay API Endpoints
 * Data source of the replay controller: session metadata and events by index.
 *
 * | Method | Path                                   | Description           |
 * |--------|----------------------------------------|-----------------------|
 * | GET    | /admin/replay/:trackingSessionId       | Replay session info   |
 * | GET    | /admin/replay/:trackingSessionId/chunk/:i | i-th event         |
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import { idSchema, parseInput } from "../lib/validation.js";
import { requireAdmin } from "../middleware/admin.middleware.js";
import { getReplayChunk, getReplaySession } from "../services/replay-data.service.js";

const router = Router();

router.use("/admin/replay", requireAdmin);

const sessionParamsSchema = z.object({ trackingSessionId: idSchema });
const chunkParamsSchema = sessionParamsSchema.extend({ i: z.coerce.number().int().nonnegative() });

/**
 * @openapi
 * /admin/replay/{trackingSessionId}:
 *   get:
 *     summary: Replay metadata of a tracking session
 *     tags: [Replay]
 *     security:
 *       - AdminKey: []
 *     parameters:
 *       - in: path
 *         name: trackingSessionId
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: Session info, config snapshot, allowed origin and chunk count
 *       404:
 *         description: Unknown tracking session
 */
router.get("/admin/replay/:trackingSessionId", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const params = parseInput(sessionParamsSchema, req.params);
    res.json(await getReplaySession(req.ctx.store, params.trackingSessionId));
  } catch (error) {
    next(error);
  }
});

/**
 * @openapi
 * /admin/replay/{trackingSessionId}/chunk/{i}:
 *   get:
 *     summary: The i-th event of a tracking session, in event time order
 *     tags: [Replay]
 *     security:
 *       - AdminKey: []
 *     parameters:
 *       - in: path
 *         name: trackingSessionId
 *         required: true
 *         schema: { type: integer }
 *       - in: path
 *         name: i
 *         required: true
 *         schema: { type: integer, minimum: 0 }
 *     responses:
 *       200:
 *         description: "`{ i, n_chunks, replaydata }`, or `{ i, n_chunks, done: true }` past the end"
 *       404:
 *         description: Unknown tracking session
 */
router.get(
  "/admin/replay/:trackingSessionId/chunk/:i",
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = parseInput(chunkParamsSchema, req.params);
      res.json(await getReplayChunk(req.ctx.store, params.trackingSessionId, params.i));
    } catch (error) {
      next(error);
    }
  }
);

export default router;
