// Load environment variables FIRST (before any other imports that might need them)
import "dotenv/config";

import type { Server } from "node:http";
import { createApp } from "./app.js";
import { loadServerConfig, type ServerConfig } from "./config/env.js";
import { getPool } from "./lib/db.js";
import { MemoryStore } from "./lib/memory-store.js";
import { PgStore } from "./lib/pg-store.js";
import type { DataStore } from "./lib/store.js";
import { ExportJobEngine } from "./services/export.service.js";
import { addExportGenerationJob, closeQueue, configureQueue } from "./queues/export.queue.js";
import { startExportWorker, stopExportWorker } from "./workers/export.worker.js";

/**
 * In-memory store with one demo application, for local runs without a
 * database.
 */
function createMemoryStore(): MemoryStore {
  const store = new MemoryStore();
  const application = store.addApplication({ name: "Demo", url: "http://localhost:5173" });
  const config = store.addConfig({ applicationId: application.id, label: "default" });
  const session = store.addApplicationSession({ configId: config.id, authMode: "none", description: "Demo session" });
  store.setDefaultAppSession(application.id, session.code);

  console.log(`[Server] Memory store seeded: application ${application.url}, session code ${session.code}`);
  return store;
}

function createStore(config: ServerConfig): DataStore {
  if (config.storageDriver === "memory") {
    return createMemoryStore();
  }
  return new PgStore(getPool(config.databaseUrl));
}

async function main(): Promise<void> {
  const config = loadServerConfig();
  const store = createStore(config);

  let engine: ExportJobEngine;
  if (config.queueEnabled && config.databaseUrl) {
    configureQueue(config.databaseUrl);
    engine = new ExportJobEngine({
      store,
      exportDir: config.exportDir,
      dispatch: async (task) => {
        await addExportGenerationJob(task);
      },
    });
    await startExportWorker(engine);
  } else {
    engine = new ExportJobEngine({ store, exportDir: config.exportDir });
  }

  const app = createApp({ store, exports: engine, config });

  const server: Server = app.listen(config.port, () => {
    console.log("[Server] TrackLab API is running");
    console.log(`[Server] Port: ${config.port}`);
    console.log(`[Server] Environment: ${config.nodeEnv}`);
    console.log(`[Server] Storage: ${config.storageDriver}, export queue: ${config.queueEnabled ? "pg-boss" : "in-process"}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] ${signal} received, shutting down`);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (config.queueEnabled) {
      stopExportWorker();
      await closeQueue();
    }
    await engine.idle();
    await store.close();
    console.log("[Server] Shutdown complete");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("[Server] Shutdown failed:", error);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  console.error("[Server] Failed to start:", error instanceof Error ? error.message : error);
  process.exit(1);
});
