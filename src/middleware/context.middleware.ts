/**
 * Request Context Middleware
 * Attaches the service dependencies to every request as `req.ctx`.
 *
 * Handlers reach the store, the export engine and the configuration only
 * through `req.ctx`, never through module state, so tests can mount the
 * app against an in-memory store.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { DataStore } from "../lib/store.js";
import type { ServerConfig } from "../config/env.js";
import type { ExportJobEngine } from "../services/export.service.js";
import type { RequestIdentity } from "../services/identity.service.js";

export interface RequestContext {
  store: DataStore;
  exports: ExportJobEngine;
  config: ServerConfig;
}

// Extend Express Request type globally
declare global {
  namespace Express {
    interface Request {
      ctx: RequestContext;
      /** Set by `requireToken` */
      identity?: RequestIdentity;
    }
  }
}

export function attachContext(context: RequestContext): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.ctx = context;
    next();
  };
}
