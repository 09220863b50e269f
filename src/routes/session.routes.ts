/**
 * Session API Endpoints
 * Identity bootstrap for client applications. These are the only client
 * endpoints that work without a token.
 *
 * ENDPOINTS OVERVIEW:
 * -------------------
 *
 * | Method   | Path             | Description                               | Auth |
 * |----------|------------------|-------------------------------------------|------|
 * | POST/GET | /session         | Issue or resolve a token for a session    | No   |
 * | GET      | /session         | Default session code for a referrer URL   | No   |
 * | POST     | /session_login   | Log a registered user into a session      | No   |
 * | POST     | /register_user   | Create a user account                     | No   |
 * | GET      | /gate/:code      | Redirect to the next session of a gate    | No   |
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import { ValidationError } from "../lib/errors.js";
import { parseInput } from "../lib/validation.js";
import { extractToken } from "../middleware/token.middleware.js";
import {
  issueOrResolve,
  loginToApplicationSession,
  toBootstrapResponse,
} from "../services/identity.service.js";
import { enterGate, findDefaultSessionCode } from "../services/session-registry.service.js";
import { registerUser } from "../services/user.service.js";

const router = Router();

// ============================================
// Schemas
// ============================================

const sessionCodeFields = {
  sess: z.string().min(1).optional(),
  application_session_code: z.string().min(1).optional(),
};

const bootstrapSchema = z.object(sessionCodeFields);

const credentialFields = {
  username: z.string().min(1).optional(),
  email: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
};

const loginSchema = z.object({
  ...sessionCodeFields,
  ...credentialFields,
  credentials: z.object(credentialFields).optional(),
});

const registerSchema = z.object(credentialFields);

// ============================================
// Identity Bootstrap
// ============================================

async function bootstrap(req: Request, res: Response, appSessionCode: string): Promise<void> {
  const result = await issueOrResolve(req.ctx.store, {
    token: extractToken(req.headers.authorization) ?? undefined,
    appSessionCode,
  });

  const status = result.status === "resolved" && result.created ? 201 : 200;
  res.status(status).json(toBootstrapResponse(result));
}

/**
 * @openapi
 * /session:
 *   post:
 *     summary: Issue or resolve a token for an application session
 *     description: |
 *       Without a token, an anonymous identity is minted for sessions with
 *       auth mode `none` (201). Sessions with auth mode `login` answer with
 *       `auth_mode: login` only; the client continues with `/session_login`.
 *       With a token, the existing identity is resolved (200).
 *     tags: [Session]
 *     parameters:
 *       - in: header
 *         name: Authorization
 *         schema: { type: string, example: "Token 3fa85f64..." }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               sess: { type: string, description: "Application session code" }
 *     responses:
 *       201:
 *         description: New anonymous identity
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/SessionBootstrapResponse'
 *       200:
 *         description: Existing identity, or login required
 *       401:
 *         description: Unknown token
 *       403:
 *         description: Token kind does not match the auth mode
 *       404:
 *         description: Unknown or disabled application session
 */
router.post("/session", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = parseInput(bootstrapSchema, req.body ?? {});
    const code = body.sess ?? body.application_session_code;
    if (!code) {
      throw new ValidationError("sess is required");
    }
    await bootstrap(req, res, code);
  } catch (error) {
    next(error);
  }
});

/**
 * @openapi
 * /session:
 *   get:
 *     summary: Bootstrap by query, or find the default session of a referrer
 *     description: |
 *       With `sess`, behaves like `POST /session`. Without it, the `referrer`
 *       parameter (or the `Referer` header) is matched against application
 *       URLs and the code of that application's default session is returned.
 *     tags: [Session]
 *     parameters:
 *       - in: query
 *         name: sess
 *         schema: { type: string }
 *       - in: query
 *         name: referrer
 *         schema: { type: string, format: uri }
 *     responses:
 *       200:
 *         description: Session code (and identity, when `sess` was given)
 *       400:
 *         description: No session code and no matching referrer
 */
router.get("/session", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const sess = typeof req.query.sess === "string" ? req.query.sess : "";
    if (sess) {
      await bootstrap(req, res, sess);
      return;
    }

    const referrer = typeof req.query.referrer === "string" ? req.query.referrer : req.get("referer");
    if (!referrer) {
      throw new ValidationError("sess or referrer is required");
    }

    const sessCode = await findDefaultSessionCode(req.ctx.store, referrer);
    res.status(200).json({ sess_code: sessCode });
  } catch (error) {
    next(error);
  }
});

// ============================================
// Login & Registration
// ============================================

/**
 * @openapi
 * /session_login:
 *   post:
 *     summary: Log a registered user into a login application session
 *     description: |
 *       Returns the user's token (created on first login, re-used afterwards)
 *       and the application config. Username and email may both be given;
 *       they must then belong to the same user.
 *     tags: [Session]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [sess, password]
 *             properties:
 *               sess: { type: string }
 *               username: { type: string }
 *               email: { type: string }
 *               password: { type: string }
 *     responses:
 *       201:
 *         description: Logged in
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/SessionBootstrapResponse'
 *       400:
 *         description: Missing fields
 *       401:
 *         description: Wrong password
 *       403:
 *         description: Application session does not use login
 *       404:
 *         description: Unknown session or user
 */
router.post("/session_login", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = parseInput(loginSchema, req.body ?? {});
    const code = body.sess ?? body.application_session_code;
    const credentials = body.credentials ?? body;

    if (!code || !(credentials.username || credentials.email) || !credentials.password) {
      throw new ValidationError("sess, username or email, and password are required");
    }

    const result = await loginToApplicationSession(req.ctx.store, code, {
      username: credentials.username,
      email: credentials.email,
      password: credentials.password,
    });
    res.status(201).json(toBootstrapResponse(result));
  } catch (error) {
    next(error);
  }
});

/**
 * @openapi
 * /register_user:
 *   post:
 *     summary: Register a user account
 *     description: |
 *       Rejections answer 403 with a short label in `error`:
 *       `invalid_email`, `pw_too_short`, `pw_same_as_user`,
 *       `pw_same_as_email` or `user_already_registered`.
 *     tags: [Session]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [password]
 *             properties:
 *               username: { type: string }
 *               email: { type: string }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: Account created
 *       400:
 *         description: Neither username nor email, or no password
 *       403:
 *         description: Rejected by an account rule
 */
router.post("/register_user", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = parseInput(registerSchema, req.body ?? {});
    if (!(body.username || body.email) || !body.password) {
      throw new ValidationError("username or email, and password are required");
    }

    const user = await registerUser(req.ctx.store, {
      username: body.username,
      email: body.email,
      password: body.password,
    });
    res.status(201).json({ success: true, username: user.username });
  } catch (error) {
    next(error);
  }
});

// ============================================
// Gates
// ============================================

/**
 * @openapi
 * /gate/{code}:
 *   get:
 *     summary: Send a visitor to one of the sessions bundled by a gate
 *     description: Active member sessions take turns, ordered by code.
 *     tags: [Session]
 *     parameters:
 *       - in: path
 *         name: code
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       302:
 *         description: Redirect to `<application url>/?sess=<code>`
 *       404:
 *         description: Unknown or inactive gate, or no active member session
 */
router.get("/gate/:code", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { url } = await enterGate(req.ctx.store, req.params.code);
    res.redirect(302, url);
  } catch (error) {
    next(error);
  }
});

export default router;
