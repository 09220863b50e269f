/**
 * Express Application Factory
 *
 * ```
 * request ─► cors ─► json body ─► req.ctx ─► /docs | /api/v1 | /health ─► 404 ─► errorHandler
 * ```
 *
 * Built from an explicit `RequestContext` so that tests mount it against an
 * in-memory store and a temporary export directory.
 */

import express, { type Application, type Request, type Response } from "express";
import cors from "cors";
import routes from "./routes/index.js";
import docsRoutes from "./routes/docs.routes.js";
import { API, TRACKING } from "./config/constants.js";
import { attachContext, type RequestContext } from "./middleware/context.middleware.js";
import { errorHandler } from "./middleware/error.middleware.js";

export function createApp(context: RequestContext): Application {
  const app: Application = express();

  // Middleware
  app.use(
    cors({
      origin: context.config.corsOrigins.length > 0 ? context.config.corsOrigins : false,
      credentials: true,
    })
  );
  app.use(express.json({ limit: TRACKING.MAX_BODY_SIZE }));
  app.use(attachContext(context));

  // Documentation Routes (mounted before API for /docs prefix)
  app.use("/docs", docsRoutes);

  // API Routes
  app.use(API.PREFIX, routes);

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      environment: context.config.nodeEnv,
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: "Route not found",
      path: req.path,
    });
  });

  app.use(errorHandler);

  return app;
}
