/**
 * Export routes: POST /export, GET /export/files, download and delete
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import request from "supertest";
import type { ExportFileTask } from "../types/export.types.js";
import { ADMIN_KEY, ANON_CODE, createTestApp, csvObjects, removeDir, type TestApp } from "./helpers.js";

let ctx: TestApp;

afterEach(async () => {
  await removeDir(ctx.exportDir);
});

describe("admin key", () => {
  beforeEach(async () => {
    ctx = await createTestApp();
  });

  it("returns 401 without the admin key", async () => {
    const res = await request(ctx.app).post("/api/v1/export").send({}).expect(401);

    expect(res.body).toEqual({ success: false, error: "Admin key required", code: "ADMIN_REQUIRED" });
  });

  it("returns 401 for a wrong admin key", async () => {
    await request(ctx.app).get("/api/v1/export/files").set("x-admin-key", "wrong-secret").expect(401);
  });
});

describe("export with in-process generation", () => {
  beforeEach(async () => {
    ctx = await createTestApp();
  });

  it("starts a job, reports it ready and serves the files", async () => {
    await request(ctx.app).post("/api/v1/session").send({ sess: ANON_CODE }).expect(201);

    const start = await request(ctx.app)
      .post("/api/v1/export/")
      .set("x-admin-key", ADMIN_KEY)
      .send({ filters: { app_sess_code: ANON_CODE } })
      .expect(202);

    expect(start.body.job_id).toMatch(/^[0-9a-f]{16}$/);
    expect(start.body.poll_interval_ms).toBe(2000);
    expect(start.body.files).toHaveLength(3);

    await ctx.engine.idle();

    const poll = await request(ctx.app)
      .get("/api/v1/export/files")
      .query({ job_id: start.body.job_id })
      .set("x-admin-key", ADMIN_KEY)
      .expect(200);
    expect(poll.body.files.map((f: { ready: boolean }) => f.ready)).toEqual([true, true, true]);

    const appSessionsFile = start.body.files[0].filename;
    const download = await request(ctx.app)
      .get(`/api/v1/export/download/${appSessionsFile}`)
      .set("x-admin-key", ADMIN_KEY)
      .expect(200);

    expect(download.headers["content-disposition"]).toBe(`attachment; filename="${appSessionsFile}"`);
    expect(csvObjects(download.text)).toEqual([
      {
        app_id: "1",
        app_name: "Course",
        app_url: "https://learn.test/course",
        app_config_id: "1",
        app_config_label: "v1",
        app_sess_code: ANON_CODE,
        app_sess_auth_mode: "none",
      },
    ]);
  });

  it("accepts the filter fields at the top level", async () => {
    const res = await request(ctx.app)
      .post("/api/v1/export")
      .set("x-admin-key", ADMIN_KEY)
      .send({ config_id: 1 })
      .expect(202);

    expect(res.body.files[0].filename).toMatch(/_config1_app_sessions\.csv$/);
    await ctx.engine.idle();
  });

  it("returns 400 for unknown filter fields", async () => {
    const res = await request(ctx.app)
      .post("/api/v1/export")
      .set("x-admin-key", ADMIN_KEY)
      .send({ user: "someone" })
      .expect(400);

    expect(res.body.code).toBe("VALIDATION_ERROR");
  });

  it("returns 400 for a reversed date range", async () => {
    const res = await request(ctx.app)
      .post("/api/v1/export")
      .set("x-admin-key", ADMIN_KEY)
      .send({ from: "2024-03-02T00:00:00Z", to: "2024-03-01T00:00:00Z" })
      .expect(400);

    expect(res.body.error).toBe("from must not be after to");
  });

  it("returns 404 for an unknown job", async () => {
    await request(ctx.app)
      .get("/api/v1/export/files")
      .query({ job_id: "0000000000000000" })
      .set("x-admin-key", ADMIN_KEY)
      .expect(404);
  });

  it("deletes through both routes", async () => {
    const start = await request(ctx.app).post("/api/v1/export").set("x-admin-key", ADMIN_KEY).send({}).expect(202);
    await ctx.engine.idle();
    const [first, second] = start.body.files;

    const viaGet = await request(ctx.app)
      .get(`/api/v1/export/delete/${first.filename}`)
      .set("x-admin-key", ADMIN_KEY)
      .expect(200);
    expect(viaGet.body).toEqual({ success: true, filename: first.filename });

    await request(ctx.app)
      .delete(`/api/v1/export/files/${second.filename}`)
      .set("x-admin-key", ADMIN_KEY)
      .expect(200);

    const poll = await request(ctx.app).get("/api/v1/export/files").set("x-admin-key", ADMIN_KEY).expect(200);
    expect(poll.body.files.map((f: { filename: string }) => f.filename)).toEqual([start.body.files[2].filename]);

    await request(ctx.app)
      .get(`/api/v1/export/download/${first.filename}`)
      .set("x-admin-key", ADMIN_KEY)
      .expect(404);
  });
});

describe("export before generation", () => {
  beforeEach(async () => {
    const tasks: ExportFileTask[] = [];
    ctx = await createTestApp({
      dispatch: async (task) => {
        tasks.push(task);
      },
    });
  });

  it("returns 409 EXPORT_NOT_READY for a requested file", async () => {
    const start = await request(ctx.app).post("/api/v1/export").set("x-admin-key", ADMIN_KEY).send({}).expect(202);

    const res = await request(ctx.app)
      .get(`/api/v1/export/download/${start.body.files[0].filename}`)
      .set("x-admin-key", ADMIN_KEY)
      .expect(409);

    expect(res.body.code).toBe("EXPORT_NOT_READY");
  });

  it("returns 404 for an invalid file name", async () => {
    await request(ctx.app).get("/api/v1/export/download/notes.txt").set("x-admin-key", ADMIN_KEY).expect(404);
    await request(ctx.app).delete("/api/v1/export/files/missing.csv").set("x-admin-key", ADMIN_KEY).expect(404);
  });
});
