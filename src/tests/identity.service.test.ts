/**
 * Identity service: token issue/resolve, login and request authentication
 */
import { describe, it, expect, beforeEach } from "vitest";
import { MemoryStore } from "../lib/memory-store.js";
import {
  AuthModeMismatchError,
  InvalidCredentialsError,
  InvalidTokenError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from "../lib/errors.js";
import {
  authenticateToken,
  issueOrResolve,
  loginToApplicationSession,
  toBootstrapResponse,
} from "../services/identity.service.js";
import { registerUser } from "../services/user.service.js";
import { ANON_CODE, APP_CONFIG, LOGIN_CODE, seedStore } from "./helpers.js";

let store: MemoryStore;

beforeEach(() => {
  store = seedStore().store;
});

async function registerAlice() {
  return registerUser(store, { username: "alice", email: "alice@example.org", password: "correct-horse" });
}

describe("issueOrResolve", () => {
  it("mints an anonymous token for an auth mode none session", async () => {
    const result = await issueOrResolve(store, { appSessionCode: ANON_CODE });

    expect(result.status).toBe("resolved");
    if (result.status !== "resolved") return;
    expect(result.created).toBe(true);
    expect(result.token).toMatch(/^[0-9a-f]{64}$/);
    expect(result.identity).toEqual({ kind: "anonymous", userAppSessionId: result.userAppSession.id });
    expect(result.userAppSession.userId).toBeNull();
    expect(result.userAppSession.configSnapshot).toEqual(APP_CONFIG);
  });

  it("mints a distinct identity for every call without a token", async () => {
    const first = await issueOrResolve(store, { appSessionCode: ANON_CODE });
    const second = await issueOrResolve(store, { appSessionCode: ANON_CODE });

    if (first.status !== "resolved" || second.status !== "resolved") throw new Error("expected identities");
    expect(second.token).not.toBe(first.token);
    expect(second.userAppSession.id).not.toBe(first.userAppSession.id);
  });

  it("resolves an anonymous token to the same user application session", async () => {
    const first = await issueOrResolve(store, { appSessionCode: ANON_CODE });
    if (first.status !== "resolved") throw new Error("expected identity");

    const again = await issueOrResolve(store, { appSessionCode: ANON_CODE, token: first.token });

    if (again.status !== "resolved") throw new Error("expected identity");
    expect(again.created).toBe(false);
    expect(again.token).toBe(first.token);
    expect(again.userAppSession.id).toBe(first.userAppSession.id);
  });

  it("asks for login on a login session without a token", async () => {
    const result = await issueOrResolve(store, { appSessionCode: LOGIN_CODE });

    expect(result.status).toBe("login_required");
    expect(toBootstrapResponse(result)).toEqual({ sess_code: LOGIN_CODE, auth_mode: "login" });
  });

  it("rejects an unknown token", async () => {
    await expect(issueOrResolve(store, { appSessionCode: ANON_CODE, token: "no-such-token" })).rejects.toBeInstanceOf(
      InvalidTokenError
    );
  });

  it("rejects an anonymous token on a login session", async () => {
    const anon = await issueOrResolve(store, { appSessionCode: ANON_CODE });
    if (anon.status !== "resolved") throw new Error("expected identity");

    await expect(issueOrResolve(store, { appSessionCode: LOGIN_CODE, token: anon.token })).rejects.toBeInstanceOf(
      AuthModeMismatchError
    );
  });

  it("rejects a user token on an auth mode none session", async () => {
    await registerAlice();
    const login = await loginToApplicationSession(store, LOGIN_CODE, { username: "alice", password: "correct-horse" });

    await expect(issueOrResolve(store, { appSessionCode: ANON_CODE, token: login.token })).rejects.toBeInstanceOf(
      AuthModeMismatchError
    );
  });

  it("rejects an anonymous token bound to another application session", async () => {
    const config = store.addConfig({ applicationId: 1, label: "v2" });
    store.addApplicationSession({ configId: config.id, authMode: "none", code: "other00001" });
    const anon = await issueOrResolve(store, { appSessionCode: ANON_CODE });
    if (anon.status !== "resolved") throw new Error("expected identity");

    await expect(issueOrResolve(store, { appSessionCode: "other00001", token: anon.token })).rejects.toBeInstanceOf(
      InvalidTokenError
    );
  });

  it("rejects unknown and disabled application sessions", async () => {
    store.addApplicationSession({ configId: 1, authMode: "none", code: "disabled01", isActive: false });

    await expect(issueOrResolve(store, { appSessionCode: "missing001" })).rejects.toBeInstanceOf(NotFoundError);
    await expect(issueOrResolve(store, { appSessionCode: "disabled01" })).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("loginToApplicationSession", () => {
  it("creates the user token on first login and re-uses it", async () => {
    await registerAlice();

    const first = await loginToApplicationSession(store, LOGIN_CODE, { username: "alice", password: "correct-horse" });
    const second = await loginToApplicationSession(store, LOGIN_CODE, {
      email: "alice@example.org",
      password: "correct-horse",
    });

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.token).toBe(first.token);
    expect(second.userAppSession.id).toBe(first.userAppSession.id);
    expect(first.identity).toEqual({ kind: "user", userId: 1 });
  });

  it("creates one user application session for concurrent first logins", async () => {
    await registerAlice();
    const credentials = { username: "alice", password: "correct-horse" };

    const [first, second] = await Promise.all([
      loginToApplicationSession(store, LOGIN_CODE, credentials),
      loginToApplicationSession(store, LOGIN_CODE, credentials),
    ]);

    expect(second.userAppSession.id).toBe(first.userAppSession.id);
    expect([first.created, second.created].sort()).toEqual([false, true]);
    const auth = await authenticateToken(store, second.token, LOGIN_CODE);
    expect(auth.userAppSession.id).toBe(first.userAppSession.id);
  });

  it("lets the user token resolve the same user application session", async () => {
    await registerAlice();
    const login = await loginToApplicationSession(store, LOGIN_CODE, { username: "alice", password: "correct-horse" });

    const resolved = await issueOrResolve(store, { appSessionCode: LOGIN_CODE, token: login.token });

    if (resolved.status !== "resolved") throw new Error("expected identity");
    expect(resolved.userAppSession.id).toBe(login.userAppSession.id);
    expect(toBootstrapResponse(resolved)).toEqual({
      sess_code: LOGIN_CODE,
      auth_mode: "login",
      token: login.token,
      user_code: login.userAppSession.code,
      config: APP_CONFIG,
    });
  });

  it("rejects a wrong password", async () => {
    await registerAlice();

    await expect(
      loginToApplicationSession(store, LOGIN_CODE, { username: "alice", password: "wrong-password" })
    ).rejects.toBeInstanceOf(InvalidCredentialsError);
  });

  it("rejects an unknown user", async () => {
    await expect(
      loginToApplicationSession(store, LOGIN_CODE, { username: "nobody", password: "whatever1" })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("refuses login on an auth mode none session", async () => {
    await registerAlice();

    await expect(
      loginToApplicationSession(store, ANON_CODE, { username: "alice", password: "correct-horse" })
    ).rejects.toBeInstanceOf(AuthModeMismatchError);
  });
});

describe("authenticateToken", () => {
  it("resolves an anonymous token without a session code", async () => {
    const anon = await issueOrResolve(store, { appSessionCode: ANON_CODE });
    if (anon.status !== "resolved") throw new Error("expected identity");

    const identity = await authenticateToken(store, anon.token, undefined);

    expect(identity.userAppSession.id).toBe(anon.userAppSession.id);
  });

  it("rejects an anonymous token with a foreign session code", async () => {
    const anon = await issueOrResolve(store, { appSessionCode: ANON_CODE });
    if (anon.status !== "resolved") throw new Error("expected identity");

    await expect(authenticateToken(store, anon.token, LOGIN_CODE)).rejects.toBeInstanceOf(UnauthorizedError);
  });

  it("requires a session code for user tokens", async () => {
    await registerAlice();
    const login = await loginToApplicationSession(store, LOGIN_CODE, { username: "alice", password: "correct-horse" });

    await expect(authenticateToken(store, login.token, undefined)).rejects.toBeInstanceOf(ValidationError);
    const identity = await authenticateToken(store, login.token, LOGIN_CODE);
    expect(identity.identity).toEqual({ kind: "user", userId: 1 });
    expect(identity.userAppSession.id).toBe(login.userAppSession.id);
  });

  it("rejects unknown tokens", async () => {
    await expect(authenticateToken(store, "nope", ANON_CODE)).rejects.toBeInstanceOf(UnauthorizedError);
  });
});
