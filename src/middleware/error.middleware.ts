/**
 * Error Middleware
 * Final handler turning thrown errors into `{ success: false, error, code }`.
 *
 * - `ApiError` subclasses: their own status and code
 * - `RegistrationError`: the rejection label as `error`, plus `message`
 * - malformed JSON bodies: 400 VALIDATION_ERROR
 * - anything else: 500 INTERNAL_ERROR, logged with its stack
 */

import type { Request, Response, NextFunction } from "express";
import { ERROR_CODES } from "../config/constants.js";
import { ApiError, RegistrationError } from "../lib/errors.js";

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof RegistrationError) {
    res.status(error.status).json({
      success: false,
      error: error.reason,
      message: error.message,
      code: error.code,
    });
    return;
  }

  if (error instanceof ApiError) {
    res.status(error.status).json({ success: false, error: error.message, code: error.code });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({
      success: false,
      error: "Malformed JSON body",
      code: ERROR_CODES.VALIDATION_ERROR,
    });
    return;
  }

  console.error(`[Server] Unhandled error on ${req.method} ${req.originalUrl}:`, error);
  res.status(500).json({
    success: false,
    error: "Internal server error",
    code: ERROR_CODES.INTERNAL_ERROR,
  });
}
