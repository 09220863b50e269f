/**
 * Token Middleware
 * Protects the tracking endpoints: every call must carry a bearer token.
 *
 * ```
 * Request arrives
 *       │
 *       ▼
 * ┌──────────────────────────────┐
 * │ Authorization: Token <token> │  ← "Bearer" is accepted too
 * └──────────────────────────────┘
 *       │
 *       ▼
 * ┌──────────────────────────────┐
 * │ Resolve token (+ sess code)  │
 * │ to a user app session        │
 * └──────────────────────────────┘
 *       │
 *       ▼
 * [req.identity set, continue]
 * ```
 *
 * A missing or unknown token is a 401, whatever the auth mode of the
 * application session, so every stored event is attributable.
 *
 * @module middleware/token
 */

import type { Request, Response, NextFunction } from "express";
import { TOKENS } from "../config/constants.js";
import { UnauthorizedError } from "../lib/errors.js";
import { authenticateToken } from "../services/identity.service.js";

const HEADER_SCHEMES: readonly string[] = TOKENS.HEADER_SCHEMES;

/**
 * Token from an `Authorization` header value, or null.
 *
 * @example
 * extractToken("Token 3fa85f64") // "3fa85f64"
 * extractToken("Basic dXNlcg==") // null
 */
export function extractToken(header: string | undefined): string | null {
  if (!header) return null;
  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2) return null;
  const [scheme, token] = parts;
  return HEADER_SCHEMES.includes(scheme.toLowerCase()) ? token : null;
}

/**
 * Application session code of a request: `sess` in the JSON body or the
 * query string.
 */
export function requestSessionCode(req: Request): string | undefined {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && "sess" in body && typeof body.sess === "string") {
    return body.sess;
  }
  return typeof req.query.sess === "string" ? req.query.sess : undefined;
}

export async function requireToken(req: Request, _res: Response, next: NextFunction): Promise<void> {
  try {
    const token = extractToken(req.headers.authorization);
    if (!token) {
      throw new UnauthorizedError();
    }

    req.identity = await authenticateToken(req.ctx.store, token, requestSessionCode(req));
    next();
  } catch (error) {
    next(error);
  }
}
