/**
 * Tracking Service
 * Tracking session life cycle and event ingestion.
 *
 * RULES:
 * ------
 * - One open tracking session per user application session: opening a new
 *   one closes the previous one (end time = server time).
 * - Events are appended as they arrive; `event_time` is authoritative for
 *   ordering at read time, never arrival order.
 * - Mouse traces arrive in chunks, each stored as one `mouse` event.
 * - An event for a session closed less than `TRACKING.LATE_EVENT_GRACE_MS`
 *   ago is still accepted when its event time is not after the session end.
 * - `device_info_update` events never rewrite the stored `device_info`.
 */

import { TRACKING } from "../config/constants.js";
import type { DataStore } from "../lib/store.js";
import { SessionClosedError, ValidationError } from "../lib/errors.js";
import { parseEventValue } from "./event-validation.service.js";
import type { UserAppSession } from "../types/session.types.js";
import type {
  AppendEventInput,
  OpenTrackingSessionInput,
  TrackingEvent,
  TrackingSession,
} from "../types/tracking.types.js";

/**
 * Start a tracking session, closing any session still open for the same
 * user application session.
 */
export async function openTrackingSession(
  store: DataStore,
  userAppSession: UserAppSession,
  input: OpenTrackingSessionInput,
  now: Date = new Date()
): Promise<TrackingSession> {
  const { session, closedIds } = await store.openTrackingSession({
    userAppSessionId: userAppSession.id,
    startTime: input.startTime,
    deviceInfo: input.deviceInfo,
    now,
  });

  if (closedIds.length > 0) {
    console.log(`[Tracking] Closed previous tracking session(s) ${closedIds.join(", ")}`);
  }
  console.log(`[Tracking] Started tracking session ${session.id} for user app session ${userAppSession.id}`);

  return session;
}

/**
 * Load a tracking session owned by `userAppSession`.
 * Sessions of other users are reported as unknown.
 */
async function getOwnedTrackingSession(
  store: DataStore,
  userAppSession: UserAppSession,
  trackingSessionId: number
): Promise<TrackingSession> {
  const session = await store.getTrackingSession(trackingSessionId);
  if (!session || session.userAppSessionId !== userAppSession.id) {
    throw new SessionClosedError(trackingSessionId);
  }
  return session;
}

/**
 * Close an open tracking session.
 *
 * @throws SessionClosedError if the session is unknown, foreign or already closed
 * @throws ValidationError if `endTime` lies before the session start
 */
export async function closeTrackingSession(
  store: DataStore,
  userAppSession: UserAppSession,
  trackingSessionId: number,
  endTime: Date | undefined,
  now: Date = new Date()
): Promise<TrackingSession> {
  const session = await getOwnedTrackingSession(store, userAppSession, trackingSessionId);
  if (session.endTime !== null) {
    throw new SessionClosedError(trackingSessionId);
  }

  const end = endTime ?? now;
  if (end < session.startTime) {
    throw new ValidationError("end_time must not be before the session start");
  }

  const closed = await store.closeTrackingSession(trackingSessionId, end, now);
  if (!closed) {
    throw new SessionClosedError(trackingSessionId);
  }

  console.log(`[Tracking] Stopped tracking session ${trackingSessionId}`);
  return closed;
}

/**
 * Whether a closed session still takes an event with `eventTime`.
 */
export function acceptsLateEvent(session: TrackingSession, eventTime: Date, now: Date): boolean {
  if (session.endTime === null) return true;
  if (session.closedAt === null) return false;

  const sinceClose = now.getTime() - session.closedAt.getTime();
  return sinceClose < TRACKING.LATE_EVENT_GRACE_MS && eventTime <= session.endTime;
}

/**
 * Validate and append one event.
 *
 * @throws SessionClosedError if the session is unknown, foreign or closed
 *   beyond the grace window
 * @throws MalformedEventError if the value does not fit its event type;
 *   nothing is stored
 */
export async function appendEvent(
  store: DataStore,
  userAppSession: UserAppSession,
  input: AppendEventInput,
  now: Date = new Date()
): Promise<TrackingEvent> {
  const session = await getOwnedTrackingSession(store, userAppSession, input.trackingSessionId);
  if (!acceptsLateEvent(session, input.eventTime, now)) {
    throw new SessionClosedError(input.trackingSessionId);
  }

  const typed = parseEventValue(input.eventType, input.eventValue);

  return store.appendTrackingEvent({
    trackingSessionId: session.id,
    eventTime: input.eventTime,
    eventType: typed.type,
    eventValue: typed.value,
  });
}
