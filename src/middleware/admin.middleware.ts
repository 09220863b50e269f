/**
 * Admin Middleware
 * Guards the export and replay endpoints with the `x-admin-key` header.
 */

import { timingSafeEqual } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { ERROR_CODES } from "../config/constants.js";

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  const key = req.header("x-admin-key");

  if (!key || !sameKey(key, req.ctx.config.adminApiKey)) {
    console.warn(`[Admin] Rejected ${req.method} ${req.originalUrl}`);
    res.status(401).json({
      success: false,
      error: "Admin key required",
      code: ERROR_CODES.ADMIN_REQUIRED,
    });
    return;
  }

  next();
}
