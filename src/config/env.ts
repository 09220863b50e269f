/**
 * Server Configuration
 * Reads and validates environment variables once at start-up.
 *
 * Invalid values fail fast with a message listing every offending variable,
 * so a misconfigured deployment never starts serving requests.
 */

import { z } from "zod";
import { EXPORT } from "./constants.js";

// ============================================
// Schema
// ============================================

const booleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .optional()
  .transform((value) => value === "true" || value === "1");

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    STORAGE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: z.string().url().optional(),
    DATA_EXPORT_DIR: z.string().min(1).default(EXPORT.DEFAULT_DIR),
    ADMIN_API_KEY: z.string().min(8, "ADMIN_API_KEY must be at least 8 characters"),
    CORS_ALLOWED_ORIGINS: z.string().default(""),
    DISABLE_QUEUE: booleanFlag,
  })
  .refine((env) => env.STORAGE_DRIVER !== "postgres" || env.DATABASE_URL !== undefined, {
    message: "DATABASE_URL is required when STORAGE_DRIVER is postgres",
    path: ["DATABASE_URL"],
  });

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  nodeEnv: "development" | "production" | "test";
  storageDriver: "postgres" | "memory";
  databaseUrl: string | null;
  exportDir: string;
  adminApiKey: string;
  corsOrigins: string[];
  /** pg-boss dispatch; requires postgres storage */
  queueEnabled: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ============================================
// Loader
// ============================================

/**
 * Build the server configuration from an environment map.
 *
 * @throws ConfigError listing all invalid variables
 *
 * @example
 * const config = loadServerConfig(process.env);
 * app.listen(config.port);
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;

  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    storageDriver: values.STORAGE_DRIVER,
    databaseUrl: values.DATABASE_URL ?? null,
    exportDir: values.DATA_EXPORT_DIR,
    adminApiKey: values.ADMIN_API_KEY,
    corsOrigins: values.CORS_ALLOWED_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    queueEnabled: values.STORAGE_DRIVER === "postgres" && !values.DISABLE_QUEUE,
  };
}
