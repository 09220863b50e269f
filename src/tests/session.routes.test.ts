/**
 * Session routes: POST/GET /session, POST /session_login, POST /register_user, GET /gate/:code
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import request from "supertest";
import { ANON_CODE, APP_CONFIG, APP_URL, LOGIN_CODE, createTestApp, removeDir, type TestApp } from "./helpers.js";

let ctx: TestApp;

beforeEach(async () => {
  ctx = await createTestApp();
});

afterEach(async () => {
  await removeDir(ctx.exportDir);
});

function register(body: object) {
  return request(ctx.app).post("/api/v1/register_user").send(body);
}

describe("POST /api/v1/session", () => {
  it("returns 201 with a new anonymous identity", async () => {
    const res = await request(ctx.app).post("/api/v1/session/").send({ sess: ANON_CODE }).expect(201);

    expect(res.body.sess_code).toBe(ANON_CODE);
    expect(res.body.auth_mode).toBe("none");
    expect(res.body.token).toMatch(/^[0-9a-f]{64}$/);
    expect(res.body.user_code).toMatch(/^[0-9a-f]{32}$/);
    expect(res.body.config).toEqual(APP_CONFIG);
  });

  it("accepts application_session_code as the session field", async () => {
    const res = await request(ctx.app)
      .post("/api/v1/session")
      .send({ application_session_code: ANON_CODE })
      .expect(201);

    expect(res.body.sess_code).toBe(ANON_CODE);
  });

  it("returns 200 with the same identity when the token is presented", async () => {
    const first = await request(ctx.app).post("/api/v1/session").send({ sess: ANON_CODE }).expect(201);

    const again = await request(ctx.app)
      .post("/api/v1/session")
      .set("Authorization", `Token ${first.body.token}`)
      .send({ sess: ANON_CODE })
      .expect(200);

    expect(again.body.token).toBe(first.body.token);
    expect(again.body.user_code).toBe(first.body.user_code);
  });

  it("accepts the Bearer scheme", async () => {
    const first = await request(ctx.app).post("/api/v1/session").send({ sess: ANON_CODE }).expect(201);

    await request(ctx.app)
      .post("/api/v1/session")
      .set("Authorization", `Bearer ${first.body.token}`)
      .send({ sess: ANON_CODE })
      .expect(200);
  });

  it("returns login mode without a token for a login session", async () => {
    const res = await request(ctx.app).post("/api/v1/session").send({ sess: LOGIN_CODE }).expect(200);

    expect(res.body).toEqual({ sess_code: LOGIN_CODE, auth_mode: "login" });
  });

  it("returns 401 AUTH_INVALID_TOKEN for an unknown token", async () => {
    const res = await request(ctx.app)
      .post("/api/v1/session")
      .set("Authorization", "Token not-a-real-token")
      .send({ sess: ANON_CODE })
      .expect(401);

    expect(res.body).toEqual({ success: false, error: "Invalid token", code: "AUTH_INVALID_TOKEN" });
  });

  it("returns 403 AUTH_MODE_MISMATCH for an anonymous token on a login session", async () => {
    const anon = await request(ctx.app).post("/api/v1/session").send({ sess: ANON_CODE }).expect(201);

    const res = await request(ctx.app)
      .post("/api/v1/session")
      .set("Authorization", `Token ${anon.body.token}`)
      .send({ sess: LOGIN_CODE })
      .expect(403);

    expect(res.body.code).toBe("AUTH_MODE_MISMATCH");
  });

  it("returns 404 for an unknown session code", async () => {
    const res = await request(ctx.app).post("/api/v1/session").send({ sess: "unknown000" }).expect(404);

    expect(res.body.code).toBe("NOT_FOUND");
  });

  it("returns 400 without a session code", async () => {
    const res = await request(ctx.app).post("/api/v1/session").send({}).expect(400);

    expect(res.body).toEqual({ success: false, error: "sess is required", code: "VALIDATION_ERROR" });
  });

  it("returns 400 for a malformed JSON body", async () => {
    const res = await request(ctx.app)
      .post("/api/v1/session")
      .set("Content-Type", "application/json")
      .send("{not json")
      .expect(400);

    expect(res.body.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/session", () => {
  it("bootstraps from the sess query parameter", async () => {
    const res = await request(ctx.app).get(`/api/v1/session?sess=${ANON_CODE}`).expect(201);

    expect(res.body.sess_code).toBe(ANON_CODE);
    expect(res.body.token).toMatch(/^[0-9a-f]{64}$/);
  });

  it("returns the default session code of a referrer", async () => {
    const res = await request(ctx.app)
      .get("/api/v1/session")
      .query({ referrer: APP_URL })
      .expect(200);

    expect(res.body).toEqual({ sess_code: ANON_CODE });
  });

  it("tolerates a trailing slash on the referrer", async () => {
    const res = await request(ctx.app)
      .get("/api/v1/session")
      .query({ referrer: `${APP_URL}/` })
      .expect(200);

    expect(res.body).toEqual({ sess_code: ANON_CODE });
  });

  it("falls back to the Referer header", async () => {
    const res = await request(ctx.app).get("/api/v1/session").set("Referer", APP_URL).expect(200);

    expect(res.body).toEqual({ sess_code: ANON_CODE });
  });

  it("returns 400 for an unknown referrer", async () => {
    const res = await request(ctx.app)
      .get("/api/v1/session")
      .query({ referrer: "https://elsewhere.test/" })
      .expect(400);

    expect(res.body.error).toBe("No default application session for this referrer");
  });
});

describe("POST /api/v1/register_user", () => {
  it("returns 201 for a valid account", async () => {
    const res = await register({ username: "bob", email: "bob@example.org", password: "long-enough" }).expect(201);

    expect(res.body).toEqual({ success: true, username: "bob" });
  });

  it("uses the email as username when no username is given", async () => {
    const res = await register({ email: "carol@example.org", password: "long-enough" }).expect(201);

    expect(res.body.username).toBe("carol@example.org");
  });

  it.each([
    [{ username: "dave", email: "not-an-email", password: "long-enough" }, "invalid_email"],
    [{ username: "dave", password: "short" }, "pw_too_short"],
    [{ username: "dave-the-user", password: "dave-the-user" }, "pw_same_as_user"],
    [{ username: "dave", email: "dave@example.org", password: "dave@example.org" }, "pw_same_as_email"],
  ])("rejects %o with %s", async (body, reason) => {
    const res = await register(body).expect(403);

    expect(res.body.success).toBe(false);
    expect(res.body.error).toBe(reason);
    expect(res.body.code).toBe("REGISTRATION_REJECTED");
    expect(typeof res.body.message).toBe("string");
  });

  it("rejects a second registration of the same user", async () => {
    await register({ username: "erin", password: "long-enough" }).expect(201);

    const res = await register({ username: "erin", password: "other-password" }).expect(403);

    expect(res.body.error).toBe("user_already_registered");
  });

  it("returns 400 without username and email", async () => {
    await register({ password: "long-enough" }).expect(400);
  });
});

describe("POST /api/v1/session_login", () => {
  beforeEach(async () => {
    await register({ username: "frank", email: "frank@example.org", password: "frank-password" }).expect(201);
  });

  it("returns 201 with a user token and the config", async () => {
    const res = await request(ctx.app)
      .post("/api/v1/session_login")
      .send({ sess: LOGIN_CODE, username: "frank", password: "frank-password" })
      .expect(201);

    expect(res.body.sess_code).toBe(LOGIN_CODE);
    expect(res.body.auth_mode).toBe("login");
    expect(res.body.config).toEqual(APP_CONFIG);
    expect(res.body.token).toMatch(/^[0-9a-f]{64}$/);
  });

  it("accepts nested credentials and returns the same token again", async () => {
    const first = await request(ctx.app)
      .post("/api/v1/session_login")
      .send({ sess: LOGIN_CODE, username: "frank", password: "frank-password" })
      .expect(201);

    const second = await request(ctx.app)
      .post("/api/v1/session_login")
      .send({ application_session_code: LOGIN_CODE, credentials: { email: "frank@example.org", password: "frank-password" } })
      .expect(201);

    expect(second.body.token).toBe(first.body.token);
    expect(second.body.user_code).toBe(first.body.user_code);
  });

  it("returns 401 for a wrong password", async () => {
    const res = await request(ctx.app)
      .post("/api/v1/session_login")
      .send({ sess: LOGIN_CODE, username: "frank", password: "nope-nope" })
      .expect(401);

    expect(res.body.code).toBe("AUTH_INVALID_CREDENTIALS");
  });

  it("returns 404 for an unknown user", async () => {
    await request(ctx.app)
      .post("/api/v1/session_login")
      .send({ sess: LOGIN_CODE, username: "grace", password: "grace-password" })
      .expect(404);
  });

  it("returns 403 on an auth mode none session", async () => {
    const res = await request(ctx.app)
      .post("/api/v1/session_login")
      .send({ sess: ANON_CODE, username: "frank", password: "frank-password" })
      .expect(403);

    expect(res.body.code).toBe("AUTH_MODE_MISMATCH");
  });

  it("returns 400 when the password is missing", async () => {
    await request(ctx.app).post("/api/v1/session_login").send({ sess: LOGIN_CODE, username: "frank" }).expect(400);
  });
});

describe("GET /api/v1/gate/:code", () => {
  const GATE = "gate000001";

  beforeEach(() => {
    ctx.store.addApplicationSession({ configId: 1, authMode: "none", code: "anon000002" });
    ctx.store.addGate({ code: GATE, label: "Variants", appSessionCodes: ["login00001", ANON_CODE, "anon000002"] });
  });

  async function follow(code: string): Promise<string | undefined> {
    const res = await request(ctx.app).get(`/api/v1/gate/${code}`).expect(302);
    return res.headers.location;
  }

  it("sends visitors to the member sessions in turn, ordered by code", async () => {
    const targets = [await follow(GATE), await follow(GATE), await follow(GATE), await follow(GATE)];

    expect(targets).toEqual([
      `${APP_URL}/?sess=${ANON_CODE}`,
      `${APP_URL}/?sess=anon000002`,
      `${APP_URL}/?sess=${LOGIN_CODE}`,
      `${APP_URL}/?sess=${ANON_CODE}`,
    ]);
  });

  it("skips inactive member sessions", async () => {
    await follow(GATE);
    ctx.store.setApplicationSessionActive("anon000002", false);

    expect(await follow(GATE)).toBe(`${APP_URL}/?sess=${LOGIN_CODE}`);
  });

  it("returns 404 for unknown, inactive and empty gates", async () => {
    ctx.store.addGate({ code: "gate000002", label: "Closed", appSessionCodes: [ANON_CODE], isActive: false });
    ctx.store.addGate({ code: "gate000003", label: "Empty", appSessionCodes: [] });

    await request(ctx.app).get("/api/v1/gate/nogate0000").expect(404);
    await request(ctx.app).get("/api/v1/gate/gate000002").expect(404);
    await request(ctx.app).get("/api/v1/gate/gate000003").expect(404);
  });
});

describe("app shell", () => {
  it("reports health", async () => {
    const res = await request(ctx.app).get("/health").expect(200);

    expect(res.body.status).toBe("healthy");
    expect(res.body.environment).toBe("test");
  });

  it("returns 404 for unknown routes", async () => {
    const res = await request(ctx.app).get("/api/v1/nothing-here").expect(404);

    expect(res.body).toEqual({ error: "Route not found", path: "/api/v1/nothing-here" });
  });
});
