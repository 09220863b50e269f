/**
 * User feedback: service rules and POST /user_feedback
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import request from "supertest";
import { MemoryStore } from "../lib/memory-store.js";
import { FeedbackExistsError, ValidationError } from "../lib/errors.js";
import { issueOrResolve } from "../services/identity.service.js";
import { submitFeedback } from "../services/feedback.service.js";
import { openTrackingSession } from "../services/tracking.service.js";
import type { UserAppSession } from "../types/session.types.js";
import { ANON_CODE, createTestApp, removeDir, seedStore, type TestApp } from "./helpers.js";

const SECTION = "/html/body/section[2]";

// ============================================
// Service
// ============================================

describe("submitFeedback", () => {
  let store: MemoryStore;
  let uas: UserAppSession;

  async function anonymousUser(): Promise<UserAppSession> {
    const result = await issueOrResolve(store, { appSessionCode: ANON_CODE });
    if (result.status !== "resolved") throw new Error("expected identity");
    return result.userAppSession;
  }

  beforeEach(async () => {
    store = seedStore().store;
    uas = await anonymousUser();
  });

  it("stores a score without text", async () => {
    const feedback = await submitFeedback(store, uas, { contentSection: SECTION, score: 4 });

    expect(feedback).toMatchObject({
      userAppSessionId: uas.id,
      trackingSessionId: null,
      contentSection: SECTION,
      score: 4,
      text: null,
    });
  });

  it("keeps an empty text apart from no text", async () => {
    const feedback = await submitFeedback(store, uas, { contentSection: SECTION, score: 2, text: "" });

    expect(feedback.text).toBe("");
  });

  it("needs a score or a text", async () => {
    await expect(submitFeedback(store, uas, { contentSection: SECTION })).rejects.toBeInstanceOf(ValidationError);
  });

  it("links feedback to a tracking session of the same user only", async () => {
    const own = await openTrackingSession(store, uas, { startTime: new Date(), deviceInfo: {} });
    const other = await openTrackingSession(store, await anonymousUser(), { startTime: new Date(), deviceInfo: {} });

    const linked = await submitFeedback(store, uas, { contentSection: SECTION, text: "clear", trackingSessionId: own.id });

    expect(linked.trackingSessionId).toBe(own.id);
    await expect(
      submitFeedback(store, uas, { contentSection: "/html/body", text: "x", trackingSessionId: other.id })
    ).rejects.toThrow(`Unknown tracking session ${other.id}`);
  });

  it("accepts one feedback per section and user", async () => {
    const results = await Promise.allSettled([
      submitFeedback(store, uas, { contentSection: SECTION, score: 5 }),
      submitFeedback(store, uas, { contentSection: SECTION, score: 1 }),
    ]);

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    const reasons = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(FeedbackExistsError);

    const otherUser = await anonymousUser();
    await expect(submitFeedback(store, otherUser, { contentSection: SECTION, score: 3 })).resolves.toMatchObject({
      userAppSessionId: otherUser.id,
    });
  });
});

// ============================================
// Routes
// ============================================

describe("POST /api/v1/user_feedback", () => {
  let ctx: TestApp;
  let token: string;

  beforeEach(async () => {
    ctx = await createTestApp();
    const res = await request(ctx.app).post("/api/v1/session").send({ sess: ANON_CODE }).expect(201);
    token = res.body.token;
  });

  afterEach(async () => {
    await removeDir(ctx.exportDir);
  });

  function giveFeedback(body: object) {
    return request(ctx.app).post("/api/v1/user_feedback").set("Authorization", `Token ${token}`).send(body);
  }

  it("returns 401 without a token", async () => {
    await request(ctx.app).post("/api/v1/user_feedback").send({ content_section: SECTION, score: 3 }).expect(401);
  });

  it("stores feedback once per section", async () => {
    const first = await giveFeedback({ content_section: SECTION, score: 3, text: null }).expect(201);
    expect(first.body).toEqual({ feedback_id: 1 });

    const again = await giveFeedback({ content_section: SECTION, text: "second thoughts" }).expect(409);
    expect(again.body).toEqual({
      success: false,
      error: `Feedback for ${SECTION} was already given`,
      code: "FEEDBACK_EXISTS",
    });

    await giveFeedback({ content_section: "/html/body/section[3]", text: "" }).expect(201);
  });

  it("links feedback to the current tracking session", async () => {
    const tracking = await request(ctx.app)
      .post("/api/v1/tracking_session")
      .set("Authorization", `Token ${token}`)
      .send({})
      .expect(201);

    await giveFeedback({
      content_section: SECTION,
      score: 5,
      tracking_session_id: tracking.body.tracking_session_id,
    }).expect(201);
    const foreign = await giveFeedback({ content_section: "/html", score: 5, tracking_session_id: 999 }).expect(400);
    expect(foreign.body.error).toBe("Unknown tracking session 999");
  });

  it("returns 400 without score and text", async () => {
    const res = await giveFeedback({ content_section: SECTION, score: null }).expect(400);

    expect(res.body).toEqual({ success: false, error: "score or text is required", code: "VALIDATION_ERROR" });
  });

  it("returns 400 for a score outside 1 to 5", async () => {
    await giveFeedback({ content_section: SECTION, score: 6 }).expect(400);
    await giveFeedback({ content_section: SECTION, score: 0 }).expect(400);
    await giveFeedback({ content_section: "", score: 3 }).expect(400);
  });
});
