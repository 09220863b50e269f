/**
 * User Feedback Types
 * Scores and comments users give on content sections of an application
 */

/**
 * Feedback on one content section. At most one per user application
 * session and section; at least one of `score` and `text` is set.
 */
export interface UserFeedback {
  id: number;
  userAppSessionId: number;
  /** Tracking session the feedback was given in; null when not tracked */
  trackingSessionId: number | null;
  /** Identifier of the section, usually an XPath */
  contentSection: string;
  /** 1 to 5 */
  score: number | null;
  /** "" when the text box was shown but left empty */
  text: string | null;
  createdAt: Date;
}

export type NewUserFeedback = Omit<UserFeedback, "id" | "createdAt">;

export interface SubmitFeedbackInput {
  trackingSessionId?: number;
  contentSection: string;
  score?: number;
  text?: string;
}
