/**
 * OpenAPI/Swagger Configuration
 * API definition and reusable schemas. The paths are collected by
 * swagger-jsdoc from the `@openapi` blocks of the route modules and served by
 * swagger-ui-express at /docs/api.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import swaggerJsdoc from "swagger-jsdoc";
import { API, EXPORT } from "./constants.js";

const routesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "routes");

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: "3.1.0",
    info: {
      title: "TrackLab API",
      version: "1.0.0",
      description: `
# TrackLab API

Backend for interactive learning applications: it hands out session tokens,
records how learners interact with an application, exports the recordings as
CSV and feeds a replay viewer.

## Authentication

Client applications call \`POST /session\` with the code of an application
session and receive a token. Every tracking call then carries it:

\`\`\`bash
curl -H "Authorization: Token <token>" -X POST http://localhost:8000${API.PREFIX}/tracking_session
\`\`\`

Export and replay endpoints require the \`x-admin-key\` header.
      `,
      license: {
        name: "MIT",
      },
    },
    servers: [
      {
        url: `http://localhost:8000${API.PREFIX}`,
        description: "Development server",
      },
    ],
    tags: [
      { name: "Session", description: "Token bootstrap, login and registration" },
      { name: "Tracking", description: "Tracking sessions and interaction events" },
      { name: "Feedback", description: "Scores and comments on content sections" },
      { name: "Export", description: "CSV data export (admin)" },
      { name: "Replay", description: "Replay data source (admin)" },
    ],
    components: {
      securitySchemes: {
        TokenAuth: {
          type: "apiKey",
          in: "header",
          name: "Authorization",
          description: "`Token <token>` as returned by /session or /session_login",
        },
        AdminKey: {
          type: "apiKey",
          in: "header",
          name: "x-admin-key",
          description: "Value of ADMIN_API_KEY",
        },
      },
      schemas: {
        // ============================================
        // Common Schemas
        // ============================================

        ApiErrorResponse: {
          type: "object",
          properties: {
            success: { type: "boolean", example: false },
            error: { type: "string", example: "Tracking session 12 is closed or unknown" },
            code: { type: "string", example: "TRACKING_SESSION_CLOSED" },
          },
        },

        // ============================================
        // Session Schemas
        // ============================================

        SessionBootstrapResponse: {
          type: "object",
          properties: {
            sess_code: { type: "string", example: "a1b2c3d4e5" },
            auth_mode: { type: "string", enum: ["none", "login"] },
            token: { type: "string", description: "Absent while login is required" },
            user_code: { type: "string", description: "User application session code" },
            config: { type: "object", additionalProperties: true },
          },
        },

        // ============================================
        // Tracking Schemas
        // ============================================

        DeviceInfo: {
          type: "object",
          additionalProperties: true,
          properties: {
            user_agent: { type: "string" },
            form_factor: { type: "string", example: "desktop" },
            window_size: {
              type: "array",
              items: { type: "number" },
              minItems: 2,
              maxItems: 2,
              example: [1280, 800],
            },
          },
        },

        TrackingEvent: {
          type: "object",
          required: ["tracking_session_id"],
          properties: {
            tracking_session_id: { type: "integer" },
            event_time: { type: "string", format: "date-time" },
            event_type: { type: "string", example: "mouse" },
            event_value: { description: "Shape depends on event_type" },
            event: {
              type: "object",
              properties: {
                time: { type: "string", format: "date-time" },
                type: { type: "string" },
                value: {},
              },
            },
          },
        },

        // ============================================
        // Export Schemas
        // ============================================

        ExportFilter: {
          type: "object",
          properties: {
            app_sess_code: { type: "string" },
            application_id: { type: "integer" },
            config_id: { type: "integer" },
            from: { type: "string", format: "date-time", description: "Tracking session start, inclusive" },
            to: { type: "string", format: "date-time", description: "Tracking session start, inclusive" },
          },
        },

        ExportFile: {
          type: "object",
          properties: {
            filename: { type: "string", example: `2024-05-01_120000_0a1b2c_all_${EXPORT.FILE_KINDS[2]}.csv` },
            ready: { type: "boolean" },
            status: { type: "string", enum: ["requested", "generating", "ready", "failed"] },
            error: { type: "string" },
          },
        },
      },
    },
  },
  apis: [path.join(routesDir, "*.ts"), path.join(routesDir, "*.js")],
};

export const swaggerSpec = swaggerJsdoc(options);
