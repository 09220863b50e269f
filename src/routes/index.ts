/**
 * Route Aggregator
 * Combines all route modules and mounts them under /api/v1
 *
 * ROUTE MODULES:
 * --------------
 * | Module   | Paths                                           | Auth        |
 * |----------|-------------------------------------------------|-------------|
 * | session  | /session, /session_login, /register_user        | none        |
 * | session  | /gate/:code                                     | none        |
 * | tracking | /tracking_session, /tracking_event (+ aliases)  | token       |
 * | feedback | /user_feedback                                  | token       |
 * | export   | /export/*                                       | x-admin-key |
 * | replay   | /admin/replay/*                                 | x-admin-key |
 */

import { Router } from "express";
import sessionRoutes from "./session.routes.js";
import trackingRoutes from "./tracking.routes.js";
import feedbackRoutes from "./feedback.routes.js";
import exportRoutes from "./export.routes.js";
import replayRoutes from "./replay.routes.js";

const router = Router();

// Mount route modules
router.use(sessionRoutes);
router.use(trackingRoutes);
router.use(feedbackRoutes);
router.use(exportRoutes);
router.use(replayRoutes);

export default router;
