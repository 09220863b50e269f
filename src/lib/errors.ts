/**
 * API Errors
 *
 * Every error a route can surface to a client extends `ApiError`, which
 * carries the HTTP status and machine-readable code. The error middleware
 * turns them into `{ success: false, error, code }` bodies.
 *
 * Export generation failures are deliberately absent: they are reported as a
 * per-file `failed` status by the export poll, never thrown to a caller.
 */

import { ERROR_CODES, type ErrorCode } from "../config/constants.js";

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/** Missing or unusable bearer token on a protected route */
export class UnauthorizedError extends ApiError {
  constructor(message = "Authentication required") {
    super(message, 401, ERROR_CODES.AUTH_REQUIRED);
    this.name = "UnauthorizedError";
  }
}

/** A token was presented to the identity bootstrap but is unknown */
export class InvalidTokenError extends ApiError {
  constructor(message = "Invalid token") {
    super(message, 401, ERROR_CODES.AUTH_INVALID_TOKEN);
    this.name = "InvalidTokenError";
  }
}

/** Token kind does not match the application session's auth mode */
export class AuthModeMismatchError extends ApiError {
  constructor(message = "Token does not match the authentication mode of this session") {
    super(message, 403, ERROR_CODES.AUTH_MODE_MISMATCH);
    this.name = "AuthModeMismatchError";
  }
}

export class InvalidCredentialsError extends ApiError {
  constructor() {
    super("Invalid credentials", 401, ERROR_CODES.AUTH_INVALID_CREDENTIALS);
    this.name = "InvalidCredentialsError";
  }
}

export class NotFoundError extends ApiError {
  constructor(message = "Not found") {
    super(message, 404, ERROR_CODES.NOT_FOUND);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends ApiError {
  constructor(message: string) {
    super(message, 400, ERROR_CODES.VALIDATION_ERROR);
    this.name = "ValidationError";
  }
}

/** Event posted to an unknown or already closed tracking session */
export class SessionClosedError extends ApiError {
  constructor(trackingSessionId: number) {
    super(
      `Tracking session ${trackingSessionId} is unknown or closed`,
      409,
      ERROR_CODES.TRACKING_SESSION_CLOSED
    );
    this.name = "SessionClosedError";
  }
}

/** Event value does not match the schema of its event type; nothing is stored */
export class MalformedEventError extends ApiError {
  constructor(
    public readonly eventType: string,
    public readonly issues: string[]
  ) {
    super(
      `Malformed "${eventType}" event: ${issues.join("; ")}`,
      400,
      ERROR_CODES.TRACKING_EVENT_MALFORMED
    );
    this.name = "MalformedEventError";
  }
}

/** Export file requested before its generation finished */
export class NotReadyError extends ApiError {
  constructor(filename: string) {
    super(`Export file ${filename} is not ready yet`, 409, ERROR_CODES.EXPORT_NOT_READY);
    this.name = "NotReadyError";
  }
}

/** Feedback for this content section was already given */
export class FeedbackExistsError extends ApiError {
  constructor(contentSection: string) {
    super(`Feedback for ${contentSection} was already given`, 409, ERROR_CODES.FEEDBACK_EXISTS);
    this.name = "FeedbackExistsError";
  }
}

/** The stored data of a tracking session cannot drive a replay */
export class ReplayUnavailableError extends ApiError {
  constructor(message: string) {
    super(message, 422, ERROR_CODES.REPLAY_UNAVAILABLE);
    this.name = "ReplayUnavailableError";
  }
}

/**
 * Registration rejected by one of the account checks.
 * `reason` is the short label returned to the client.
 */
export type RegistrationRejection =
  | "invalid_email"
  | "pw_too_short"
  | "pw_same_as_user"
  | "pw_same_as_email"
  | "user_already_registered";

export class RegistrationError extends ApiError {
  constructor(
    public readonly reason: RegistrationRejection,
    message: string
  ) {
    super(message, 403, ERROR_CODES.REGISTRATION_REJECTED);
    this.name = "RegistrationError";
  }
}
