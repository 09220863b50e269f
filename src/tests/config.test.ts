/**
 * Environment configuration loading
 */
import { describe, it, expect } from "vitest";
import { ConfigError, loadServerConfig } from "../config/env.js";
import { EXPORT } from "../config/constants.js";

describe("loadServerConfig", () => {
  it("applies defaults", () => {
    expect(loadServerConfig({ ADMIN_API_KEY: "test-secret", STORAGE_DRIVER: "memory" })).toEqual({
      port: 8000,
      nodeEnv: "development",
      storageDriver: "memory",
      databaseUrl: null,
      exportDir: EXPORT.DEFAULT_DIR,
      adminApiKey: "test-secret",
      corsOrigins: [],
      queueEnabled: false,
    });
  });

  it("enables the queue for postgres unless disabled", () => {
    const env = {
      ADMIN_API_KEY: "test-secret",
      DATABASE_URL: "postgres://localhost:5432/tracklab",
      PORT: "3000",
    };

    const config = loadServerConfig(env);
    expect(config.port).toBe(3000);
    expect(config.storageDriver).toBe("postgres");
    expect(config.queueEnabled).toBe(true);

    expect(loadServerConfig({ ...env, DISABLE_QUEUE: "1" }).queueEnabled).toBe(false);
  });

  it("splits the CORS origin list", () => {
    const config = loadServerConfig({
      ADMIN_API_KEY: "test-secret",
      STORAGE_DRIVER: "memory",
      CORS_ALLOWED_ORIGINS: "https://a.test, https://b.test,,",
    });

    expect(config.corsOrigins).toEqual(["https://a.test", "https://b.test"]);
  });

  it("requires a database URL for postgres storage", () => {
    expect(() => loadServerConfig({ ADMIN_API_KEY: "test-secret" })).toThrow(
      new ConfigError("Invalid configuration: DATABASE_URL: DATABASE_URL is required when STORAGE_DRIVER is postgres")
    );
  });

  it("rejects a short admin key", () => {
    expect(() => loadServerConfig({ ADMIN_API_KEY: "short", STORAGE_DRIVER: "memory" })).toThrow(
      "Invalid configuration: ADMIN_API_KEY: ADMIN_API_KEY must be at least 8 characters"
    );
  });

  it("lists every invalid variable", () => {
    try {
      loadServerConfig({ STORAGE_DRIVER: "sqlite", PORT: "0" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof Error)) return;
      expect(error.message).toContain("PORT:");
      expect(error.message).toContain("STORAGE_DRIVER:");
      expect(error.message).toContain("ADMIN_API_KEY:");
    }
  });
});
