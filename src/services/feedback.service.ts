/**
 * Feedback Service
 * Scores and comments on content sections, given by the user of a user
 * application session. One entry per section; a repeated submission is
 * rejected, never merged.
 */

import type { DataStore } from "../lib/store.js";
import { FeedbackExistsError, ValidationError } from "../lib/errors.js";
import type { SubmitFeedbackInput, UserFeedback } from "../types/feedback.types.js";
import type { UserAppSession } from "../types/session.types.js";

/**
 * Store feedback on one content section, optionally linked to a tracking
 * session of the same user application session.
 *
 * @throws ValidationError without score and text, or for a tracking session
 *   of someone else
 * @throws FeedbackExistsError if this section already has feedback
 */
export async function submitFeedback(
  store: DataStore,
  userAppSession: UserAppSession,
  input: SubmitFeedbackInput
): Promise<UserFeedback> {
  if (input.score === undefined && input.text === undefined) {
    throw new ValidationError("score or text is required");
  }

  if (input.trackingSessionId !== undefined) {
    const session = await store.getTrackingSession(input.trackingSessionId);
    if (!session || session.userAppSessionId !== userAppSession.id) {
      throw new ValidationError(`Unknown tracking session ${input.trackingSessionId}`);
    }
  }

  const feedback = await store.createUserFeedback({
    userAppSessionId: userAppSession.id,
    trackingSessionId: input.trackingSessionId ?? null,
    contentSection: input.contentSection,
    score: input.score ?? null,
    text: input.text ?? null,
  });
  if (!feedback) {
    console.warn(`[Feedback] Repeated feedback on ${input.contentSection} from user app session ${userAppSession.id}`);
    throw new FeedbackExistsError(input.contentSection);
  }

  console.log(`[Feedback] Stored feedback ${feedback.id} from user app session ${userAppSession.id}`);
  return feedback;
}
