/**
 * Event Validation Service
 * Turns a raw (event_type, event_value) pair into a typed event value.
 *
 * Known event types are validated against their schema in
 * `EVENT_VALUE_SCHEMAS`; unknown types pass through as opaque JSON so they
 * still reach the export.
 */

import { z } from "zod";
import { MalformedEventError } from "../lib/errors.js";
import {
  EVENT_VALUE_SCHEMAS,
  type KnownEventType,
  type TypedEventValue,
} from "../types/tracking.types.js";

type KnownEventParser<T extends KnownEventType> = (
  value: unknown
) => Extract<TypedEventValue, { type: T; known: true }>;

const PARSERS: { [T in KnownEventType]: KnownEventParser<T> } = {
  mouse: (value) => ({ type: "mouse", known: true, value: EVENT_VALUE_SCHEMAS.mouse.parse(value) }),
  device_info_update: (value) => ({
    type: "device_info_update",
    known: true,
    value: EVENT_VALUE_SCHEMAS.device_info_update.parse(value),
  }),
  visibility_change: (value) => ({
    type: "visibility_change",
    known: true,
    value: EVENT_VALUE_SCHEMAS.visibility_change.parse(value),
  }),
  chapter_change: (value) => ({
    type: "chapter_change",
    known: true,
    value: EVENT_VALUE_SCHEMAS.chapter_change.parse(value),
  }),
  summary_shown: (value) => ({
    type: "summary_shown",
    known: true,
    value: EVENT_VALUE_SCHEMAS.summary_shown.parse(value),
  }),
  exercise_hint: (value) => ({
    type: "exercise_hint",
    known: true,
    value: EVENT_VALUE_SCHEMAS.exercise_hint.parse(value),
  }),
  exercise_submitted: (value) => ({
    type: "exercise_submitted",
    known: true,
    value: EVENT_VALUE_SCHEMAS.exercise_submitted.parse(value),
  }),
  exercise_result: (value) => ({
    type: "exercise_result",
    known: true,
    value: EVENT_VALUE_SCHEMAS.exercise_result.parse(value),
  }),
  question_submission: (value) => ({
    type: "question_submission",
    known: true,
    value: EVENT_VALUE_SCHEMAS.question_submission.parse(value),
  }),
  video_progress: (value) => ({
    type: "video_progress",
    known: true,
    value: EVENT_VALUE_SCHEMAS.video_progress.parse(value),
  }),
};

export function isKnownEventType(eventType: string): eventType is KnownEventType {
  return Object.prototype.hasOwnProperty.call(PARSERS, eventType);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validate an event value against the schema of its type.
 *
 * @throws MalformedEventError if a known event type carries an invalid value
 *
 * @example
 * parseEventValue("visibility_change", { visible: false })
 * // { type: "visibility_change", known: true, value: { visible: false } }
 *
 * parseEventValue("custom_thing", [1, 2])
 * // { type: "custom_thing", known: false, value: [1, 2] }
 */
export function parseEventValue(eventType: string, value: unknown): TypedEventValue {
  if (!isKnownEventType(eventType)) {
    return { type: eventType, known: false, value };
  }

  try {
    return PARSERS[eventType](value);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new MalformedEventError(eventType, formatIssues(error));
    }
    throw error;
  }
}
