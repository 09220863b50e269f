/**
 * Shared test fixtures: a seeded in-memory store, a temporary export
 * directory and an app mounted on both.
 */

import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Application } from "express";
import { createApp } from "../app.js";
import type { ServerConfig } from "../config/env.js";
import { MemoryStore } from "../lib/memory-store.js";
import { ExportJobEngine, type ExportJobEngineOptions } from "../services/export.service.js";

export const ADMIN_KEY = "test-secret";
export const APP_URL = "https://learn.test/course";
export const ANON_CODE = "anon000001";
export const LOGIN_CODE = "login00001";
export const APP_CONFIG = { theme: "dark", chapters: ["intro", "quiz"] };

export function testConfig(exportDir: string): ServerConfig {
  return {
    port: 0,
    nodeEnv: "test",
    storageDriver: "memory",
    databaseUrl: null,
    exportDir,
    adminApiKey: ADMIN_KEY,
    corsOrigins: [],
    queueEnabled: false,
  };
}

/**
 * One application with a config and two sessions: `ANON_CODE` (auth mode
 * none, the default session) and `LOGIN_CODE` (auth mode login).
 */
export function seedStore(store: MemoryStore = new MemoryStore()) {
  const application = store.addApplication({ name: "Course", url: APP_URL });
  const config = store.addConfig({ applicationId: application.id, label: "v1", config: APP_CONFIG });
  store.addApplicationSession({ configId: config.id, authMode: "none", code: ANON_CODE });
  store.addApplicationSession({ configId: config.id, authMode: "login", code: LOGIN_CODE });
  store.setDefaultAppSession(application.id, ANON_CODE);
  return { store, application, config };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "tracklab-export-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface TestApp {
  app: Application;
  store: MemoryStore;
  engine: ExportJobEngine;
  exportDir: string;
}

export async function createTestApp(
  engineOptions: Partial<Omit<ExportJobEngineOptions, "store" | "exportDir">> = {}
): Promise<TestApp> {
  const { store } = seedStore();
  const exportDir = await makeTempDir();
  const engine = new ExportJobEngine({ store, exportDir, ...engineOptions });
  const app = createApp({ store, exports: engine, config: testConfig(exportDir) });
  return { app, store, engine, exportDir };
}

/**
 * Minimal RFC 4180 reader for the files written by the export generator.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      record.push(field);
      field = "";
    } else if (char === "\n") {
      record.push(field);
      records.push(record);
      record = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records;
}

/** Records as objects keyed by the header line */
export function csvObjects(text: string): Record<string, string>[] {
  const [header, ...rows] = parseCsv(text);
  return rows.map((row) => Object.fromEntries(header.map((name, i) => [name, row[i] ?? ""])));
}
