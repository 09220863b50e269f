/**
 * Feedback API Endpoints
 *
 * | Method | Path           | Description                          | Auth  |
 * |--------|----------------|--------------------------------------|-------|
 * | POST   | /user_feedback | Score or comment on a content section | Token |
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import { UnauthorizedError } from "../lib/errors.js";
import { idSchema, parseInput } from "../lib/validation.js";
import { requireToken } from "../middleware/token.middleware.js";
import { submitFeedback } from "../services/feedback.service.js";

const router = Router();

/** A null score or text counts as not given */
const feedbackSchema = z
  .object({
    sess: z.string().optional(),
    tracking_session_id: idSchema.nullish(),
    content_section: z.string().min(1).max(1024),
    score: z.number().int().min(1).max(5).nullish(),
    text: z.string().nullish(),
  })
  .refine((body) => body.score != null || body.text != null, { message: "score or text is required" });

/**
 * @openapi
 * /user_feedback:
 *   post:
 *     summary: Give feedback on a content section
 *     description: One feedback per content section and user application session.
 *     tags: [Feedback]
 *     security:
 *       - TokenAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [content_section]
 *             properties:
 *               sess: { type: string, description: "Required for registered users" }
 *               tracking_session_id: { type: integer, nullable: true }
 *               content_section: { type: string, description: "XPath of the section" }
 *               score: { type: integer, minimum: 1, maximum: 5, nullable: true }
 *               text: { type: string, nullable: true }
 *     responses:
 *       201:
 *         description: Feedback stored
 *       400:
 *         description: Neither score nor text, or a foreign tracking session
 *       401:
 *         description: Missing or unknown token
 *       409:
 *         description: Feedback for this section was already given
 */
router.post("/user_feedback", requireToken, async (req: Request, res: Response, next: NextFunction) => {
  try {
    if (!req.identity) {
      throw new UnauthorizedError();
    }
    const body = parseInput(feedbackSchema, req.body ?? {});

    const feedback = await submitFeedback(req.ctx.store, req.identity.userAppSession, {
      trackingSessionId: body.tracking_session_id ?? undefined,
      contentSection: body.content_section,
      score: body.score ?? undefined,
      text: body.text ?? undefined,
    });
    res.status(201).json({ feedback_id: feedback.id });
  } catch (error) {
    next(error);
  }
});

export default router;
