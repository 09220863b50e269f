/**
 * Tracking API Endpoints
 * Ingestion of tracking sessions and interaction events.
 *
 * ENDPOINTS OVERVIEW:
 * -------------------
 *
 * | Method | Path                    | Alias            | Description            | Auth  |
 * |--------|-------------------------|------------------|------------------------|-------|
 * | POST   | /tracking_session       | /start_tracking  | Open a tracking session| Token |
 * | POST   | /tracking_session/stop  | /stop_tracking   | Close it               | Token |
 * | POST   | /tracking_event         | /track_event     | Append one event       | Token |
 *
 * Registered users add `sess` (body or query) so the token resolves to one
 * user application session.
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import { UnauthorizedError, ValidationError } from "../lib/errors.js";
import { idSchema, isoDate, parseInput } from "../lib/validation.js";
import { requireToken } from "../middleware/token.middleware.js";
import { appendEvent, closeTrackingSession, openTrackingSession } from "../services/tracking.service.js";
import { windowSizeSchema } from "../types/tracking.types.js";
import type { RequestIdentity } from "../services/identity.service.js";

const router = Router();

// ============================================
// Schemas
// ============================================

const deviceInfoSchema = z
  .object({
    user_agent: z.string().optional(),
    form_factor: z.string().optional(),
    window_size: windowSizeSchema.optional(),
  })
  .passthrough();

const startTrackingSchema = z.object({
  sess: z.string().optional(),
  start_time: isoDate.optional(),
  device_info: deviceInfoSchema.default({}),
});

const stopTrackingSchema = z.object({
  sess: z.string().optional(),
  tracking_session_id: idSchema,
  end_time: isoDate.optional(),
});

/**
 * Both the flat form and the nested `event` form of the browser tracker.
 */
const trackEventSchema = z.object({
  sess: z.string().optional(),
  tracking_session_id: idSchema,
  event_time: isoDate.optional(),
  event_type: z.string().min(1).optional(),
  event_value: z.unknown().optional(),
  event: z
    .object({
      time: isoDate.optional(),
      type: z.string().min(1).optional(),
      value: z.unknown().optional(),
    })
    .optional(),
});

function identityOf(req: Request): RequestIdentity {
  if (!req.identity) {
    throw new UnauthorizedError();
  }
  return req.identity;
}

// ============================================
// Tracking Sessions
// ============================================

/**
 * @openapi
 * /tracking_session:
 *   post:
 *     summary: Open a tracking session
 *     description: |
 *       Any tracking session still open for the same user application session
 *       is closed first. Alias: `POST /start_tracking`.
 *     tags: [Tracking]
 *     security:
 *       - TokenAuth: []
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               sess: { type: string, description: "Required for registered users" }
 *               start_time: { type: string, format: date-time }
 *               device_info:
 *                 $ref: '#/components/schemas/DeviceInfo'
 *     responses:
 *       201:
 *         description: Tracking session opened
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 tracking_session_id: { type: integer }
 *       401:
 *         description: Missing or unknown token
 */
async function startTracking(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { userAppSession } = identityOf(req);
    const body = parseInput(startTrackingSchema, req.body ?? {});
    const now = new Date();

    const session = await openTrackingSession(
      req.ctx.store,
      userAppSession,
      { startTime: body.start_time ?? now, deviceInfo: body.device_info },
      now
    );
    res.status(201).json({ tracking_session_id: session.id });
  } catch (error) {
    next(error);
  }
}

/**
 * @openapi
 * /tracking_session/stop:
 *   post:
 *     summary: Close a tracking session
 *     description: "Alias: `POST /stop_tracking`. `end_time` defaults to now."
 *     tags: [Tracking]
 *     security:
 *       - TokenAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [tracking_session_id]
 *             properties:
 *               tracking_session_id: { type: integer }
 *               end_time: { type: string, format: date-time }
 *     responses:
 *       200:
 *         description: Tracking session closed
 *       409:
 *         description: Unknown or already closed tracking session
 */
async function stopTracking(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { userAppSession } = identityOf(req);
    const body = parseInput(stopTrackingSchema, req.body ?? {});

    const session = await closeTrackingSession(req.ctx.store, userAppSession, body.tracking_session_id, body.end_time);
    res.status(200).json({ tracking_session_id: session.id });
  } catch (error) {
    next(error);
  }
}

// ============================================
// Events
// ============================================

/**
 * @openapi
 * /tracking_event:
 *   post:
 *     summary: Append one tracking event
 *     description: |
 *       Accepts `{ tracking_session_id, event_time, event_type, event_value }`
 *       or `{ tracking_session_id, event: { time, type, value } }`.
 *       Values of known event types are validated; unknown types are stored
 *       as they are. Alias: `POST /track_event`.
 *     tags: [Tracking]
 *     security:
 *       - TokenAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/TrackingEvent'
 *     responses:
 *       204:
 *         description: Event stored
 *       400:
 *         description: Malformed event value
 *       409:
 *         description: Tracking session unknown or closed
 */
async function trackEvent(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { userAppSession } = identityOf(req);
    const body = parseInput(trackEventSchema, req.body ?? {});

    const eventTime = body.event_time ?? body.event?.time;
    const eventType = body.event_type ?? body.event?.type;
    if (!eventTime || !eventType) {
      throw new ValidationError("event_time and event_type are required");
    }
    const eventValue = body.event_value !== undefined ? body.event_value : body.event?.value;

    await appendEvent(req.ctx.store, userAppSession, {
      trackingSessionId: body.tracking_session_id,
      eventTime,
      eventType,
      eventValue: eventValue ?? null,
    });
    res.status(204).end();
  } catch (error) {
    next(error);
  }
}

router.post(["/tracking_session", "/start_tracking"], requireToken, startTracking);
router.post(["/tracking_session/stop", "/stop_tracking"], requireToken, stopTracking);
router.post(["/tracking_event", "/track_event"], requireToken, trackEvent);

export default router;
