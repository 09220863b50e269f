/**
 * Replay Data Service
 * Serves a recorded tracking session to the replay controller, one event
 * ("chunk") at a time, in event time order with storage order breaking ties.
 *
 * Mouse chunks are trimmed to the frame kinds the replay viewer can render
 * and their frames sorted by time. The logical window size at chunk `i`
 * starts at the session's `device_info.window_size` and follows every
 * `device_info_update` event up to and including `i`.
 *
 * The ordered events of a settled session (closed, and past the late-event
 * grace window) cannot change any more; they are loaded once and kept for
 * the following chunk requests. Open sessions are re-read every time.
 */

import { LRUCache } from "lru-cache";
import { REPLAY, TRACKING } from "../config/constants.js";
import type { DataStore } from "../lib/store.js";
import { NotFoundError, ReplayUnavailableError } from "../lib/errors.js";
import {
  EVENT_VALUE_SCHEMAS,
  windowSizeSchema,
  type MouseChunk,
  type TrackingEvent,
  type TrackingSession,
} from "../types/tracking.types.js";
import { isKnownEventType } from "./event-validation.service.js";
import { buildSessionUrl } from "./session-registry.service.js";
import type { AppConfigJson } from "../types/session.types.js";

// ============================================
// Types
// ============================================

export interface ReplaySessionInfo {
  tracking_session: {
    id: number;
    start_time: string;
    end_time: string | null;
    device_info: Record<string, unknown>;
  };
  /** Config snapshot of the user application session at record time */
  app_config: AppConfigJson;
  /** Only messages from this origin are accepted by the replay controller */
  allowed_origin: string;
  session_url: string;
  n_chunks: number;
}

export interface ReplayChunk {
  event_time: string;
  event_type: string;
  event_value: unknown;
  /** False for event types the replay viewer cannot interpret */
  interpretable: boolean;
  window_size: [number, number] | null;
}

export type ReplayChunkResponse =
  | { i: number; n_chunks: number; replaydata: ReplayChunk }
  | { i: number; n_chunks: number; done: true };

// ============================================
// Helpers
// ============================================

const REPLAY_FRAME_KINDS: readonly string[] = TRACKING.REPLAY_FRAME_KINDS;

/**
 * Keep replayable frames only, ordered by their trailing timestamp.
 */
export function prepareMouseChunk(chunk: MouseChunk): MouseChunk {
  const frames = chunk.frames
    .filter((frame) => typeof frame[0] === "string" && REPLAY_FRAME_KINDS.includes(frame[0]))
    .map((frame, index) => ({ frame, index, t: Number(frame[frame.length - 1]) }))
    .sort((a, b) => a.t - b.t || a.index - b.index)
    .map(({ frame }) => frame);

  return { ...chunk, frames };
}

function windowSizeOf(value: unknown): [number, number] | null {
  if (typeof value !== "object" || value === null || !("window_size" in value)) return null;
  const parsed = windowSizeSchema.safeParse(value.window_size);
  return parsed.success ? parsed.data : null;
}

function originOf(applicationUrl: string): string {
  try {
    return new URL(applicationUrl).origin;
  } catch {
    throw new ReplayUnavailableError(`Application URL ${applicationUrl} is not a valid URL`);
  }
}

// ============================================
// Event Timeline
// ============================================

interface ReplayTimeline {
  events: TrackingEvent[];
  /** Window size in effect at each event */
  windowSizes: ([number, number] | null)[];
}

const timelineCaches = new WeakMap<DataStore, LRUCache<number, ReplayTimeline>>();

function buildTimeline(trackingSession: TrackingSession, events: TrackingEvent[]): ReplayTimeline {
  let windowSize = windowSizeOf(trackingSession.deviceInfo);
  const windowSizes = events.map((event) => {
    if (event.eventType === "device_info_update") {
      windowSize = windowSizeOf(event.eventValue) ?? windowSize;
    }
    return windowSize;
  });
  return { events, windowSizes };
}

/** No event can be added to a settled session */
export function isSettledSession(session: TrackingSession, now: Date): boolean {
  if (session.endTime === null || session.closedAt === null) return false;
  return now.getTime() - session.closedAt.getTime() >= TRACKING.LATE_EVENT_GRACE_MS;
}

async function loadTimeline(
  store: DataStore,
  trackingSession: TrackingSession,
  now: Date
): Promise<ReplayTimeline> {
  let cache = timelineCaches.get(store);
  if (!cache) {
    cache = new LRUCache<number, ReplayTimeline>({ max: REPLAY.CACHED_TIMELINES });
    timelineCaches.set(store, cache);
  }

  const cached = cache.get(trackingSession.id);
  if (cached) return cached;

  const timeline = buildTimeline(trackingSession, await store.listTrackingEvents(trackingSession.id));
  if (isSettledSession(trackingSession, now)) {
    cache.set(trackingSession.id, timeline);
  }
  return timeline;
}

// ============================================
// Service
// ============================================

async function loadReplaySession(store: DataStore, trackingSessionId: number) {
  const trackingSession = await store.getTrackingSession(trackingSessionId);
  const userAppSession = trackingSession ? await store.getUserAppSession(trackingSession.userAppSessionId) : null;
  const resolved = userAppSession
    ? await store.getApplicationSession(userAppSession.applicationSessionCode)
    : null;

  if (!trackingSession || !userAppSession || !resolved) {
    throw new NotFoundError(`Tracking session ${trackingSessionId} not found`);
  }
  return { trackingSession, userAppSession, resolved };
}

/**
 * @throws NotFoundError for an unknown tracking session
 * @throws ReplayUnavailableError if the application URL is not a valid URL
 */
export async function getReplaySession(
  store: DataStore,
  trackingSessionId: number,
  now: Date = new Date()
): Promise<ReplaySessionInfo> {
  const { trackingSession, userAppSession, resolved } = await loadReplaySession(store, trackingSessionId);
  const { events } = await loadTimeline(store, trackingSession, now);

  return {
    tracking_session: {
      id: trackingSession.id,
      start_time: trackingSession.startTime.toISOString(),
      end_time: trackingSession.endTime?.toISOString() ?? null,
      device_info: trackingSession.deviceInfo,
    },
    app_config: userAppSession.configSnapshot,
    allowed_origin: originOf(resolved.application.url),
    session_url: buildSessionUrl(resolved.application.url, resolved.session.code),
    n_chunks: events.length,
  };
}

/**
 * The `i`-th event of a tracking session prepared for replay, or `done`
 * past the last one.
 */
export async function getReplayChunk(
  store: DataStore,
  trackingSessionId: number,
  i: number,
  now: Date = new Date()
): Promise<ReplayChunkResponse> {
  const { trackingSession } = await loadReplaySession(store, trackingSessionId);
  const { events, windowSizes } = await loadTimeline(store, trackingSession, now);
  const nChunks = events.length;

  const event = events[i];
  if (i < 0 || event === undefined) {
    return { i, n_chunks: nChunks, done: true };
  }

  return { i, n_chunks: nChunks, replaydata: toReplayChunk(event, windowSizes[i] ?? null) };
}

function toReplayChunk(event: TrackingEvent, windowSize: [number, number] | null): ReplayChunk {
  let value = event.eventValue;
  if (event.eventType === "mouse") {
    const parsed = EVENT_VALUE_SCHEMAS.mouse.safeParse(value);
    if (parsed.success) value = prepareMouseChunk(parsed.data);
  }

  return {
    event_time: event.eventTime.toISOString(),
    event_type: event.eventType,
    event_value: value,
    interpretable: isKnownEventType(event.eventType),
    window_size: windowSize,
  };
}
