/**
 * Tracking Types
 * Tracking sessions, tracking events and the typed event payload variants
 */

import { z } from "zod";

// ============================================
// Stored Rows
// ============================================

/**
 * Device metadata recorded when a tracking session starts.
 * Unknown keys are preserved.
 */
export interface DeviceInfo {
  user_agent?: string;
  form_factor?: string;
  window_size?: [number, number];
  [key: string]: unknown;
}

export interface TrackingSession {
  id: number;
  userAppSessionId: number;
  startTime: Date;
  /** null while the session is open */
  endTime: Date | null;
  /** Snapshot taken at session start; never rewritten */
  deviceInfo: DeviceInfo;
  /** Server time at which the session was closed */
  closedAt: Date | null;
}

export interface TrackingEvent {
  /** Monotonic storage id; breaks ties between equal event times */
  id: number;
  trackingSessionId: number;
  eventTime: Date;
  eventType: string;
  eventValue: unknown;
}

export type NewTrackingEvent = Omit<TrackingEvent, "id">;

// ============================================
// Event Payload Schemas
// ============================================

/**
 * One mouse trace frame: `[kind, ...values, t]`, where `t` is the time
 * relative to the chunk start.
 */
const mouseFrameSchema = z
  .array(z.union([z.string(), z.number(), z.null()]))
  .min(2)
  .refine((frame) => typeof frame[0] === "string", "frame kind must be a string")
  .refine((frame) => typeof frame[frame.length - 1] === "number", "frame must end with its time");

export const windowSizeSchema = z.tuple([z.number().nonnegative(), z.number().nonnegative()]);

/**
 * Validated payload shape for every known event type. The map is the single
 * place a new event type is registered.
 */
export const EVENT_VALUE_SCHEMAS = {
  mouse: z
    .object({
      frames: z.array(mouseFrameSchema),
      timeElapsed: z.number().nonnegative(),
    })
    .passthrough(),
  device_info_update: z
    .object({
      window_size: windowSizeSchema,
      form_factor: z.string().optional(),
      user_agent: z.string().optional(),
    })
    .passthrough(),
  visibility_change: z.object({ visible: z.boolean() }).passthrough(),
  chapter_change: z.object({ chapter: z.string() }).passthrough(),
  summary_shown: z.object({}).passthrough().nullable(),
  exercise_hint: z
    .object({ id: z.string().optional(), label: z.string().optional() })
    .passthrough(),
  exercise_submitted: z
    .object({ id: z.string().optional(), label: z.string().optional() })
    .passthrough(),
  exercise_result: z
    .object({ id: z.string().optional(), label: z.string().optional() })
    .passthrough(),
  question_submission: z
    .object({ label: z.string(), answers: z.array(z.unknown()).optional() })
    .passthrough(),
  video_progress: z
    .object({
      src: z.string().optional(),
      time: z.number().nonnegative().optional(),
      percent: z.number().min(0).max(100).optional(),
    })
    .passthrough()
    .refine((value) => value.time !== undefined || value.percent !== undefined, {
      message: "either time or percent must be given",
    }),
} as const;

export type KnownEventType = keyof typeof EVENT_VALUE_SCHEMAS;

export type KnownEventValue<T extends KnownEventType> = z.infer<(typeof EVENT_VALUE_SCHEMAS)[T]>;

export type MouseChunk = KnownEventValue<"mouse">;

/**
 * A validated tracking event value, tagged by its event type. Event types
 * without a registered schema are kept as opaque JSON.
 */
export type TypedEventValue =
  | { [T in KnownEventType]: { type: T; known: true; value: KnownEventValue<T> } }[KnownEventType]
  | { type: string; known: false; value: unknown };

// ============================================
// Request Payloads
// ============================================

export interface OpenTrackingSessionInput {
  startTime: Date;
  deviceInfo: DeviceInfo;
}

export interface AppendEventInput {
  trackingSessionId: number;
  eventTime: Date;
  eventType: string;
  eventValue: unknown;
}
