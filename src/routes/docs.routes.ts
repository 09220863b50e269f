/**
 * Documentation Routes
 * - API Reference via Swagger UI (/docs/api)
 * - Raw OpenAPI document (/docs/openapi.json)
 * - CSV export codebook (/docs/codebook)
 */

import { Router, type Request, type Response } from "express";
import swaggerUi from "swagger-ui-express";
import { marked, Renderer } from "marked";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ERROR_CODES } from "../config/constants.js";
import { swaggerSpec } from "../config/swagger.js";

const router = Router();

// ============================================
// Marked Configuration - heading IDs for in-page links
// ============================================

function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/<[^>]*>/g, "")
    .replace(/[^\w\s-]/g, "")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .trim();
}

const renderer = new Renderer();
renderer.heading = function ({ text, depth }: { text: string; depth: number }) {
  return `<h${depth} id="${slugify(text)}">${text}</h${depth}>`;
};

marked.use({ renderer });

const docsDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "docs");

// ============================================
// HTML Template Helpers
// ============================================

function wrapInHtml(title: string, content: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title} - TrackLab Docs</title>
  <style>
    body { font-family: system-ui, sans-serif; max-width: 56rem; margin: 2rem auto; padding: 0 1rem; color: #1f2937; line-height: 1.6; }
    code { background: #f3f4f6; padding: 2px 6px; border-radius: 4px; font-size: 0.875rem; }
    pre { background: #f3f4f6; padding: 1rem; border-radius: 0.5rem; overflow-x: auto; }
    pre code { padding: 0; }
    table { width: 100%; border-collapse: collapse; margin: 1rem 0; }
    th { text-align: left; padding: 0.5rem; border-bottom: 2px solid #d1d5db; }
    td { padding: 0.5rem; border-bottom: 1px solid #e5e7eb; vertical-align: top; }
  </style>
</head>
<body>
  <nav><a href="/docs/api">API Reference</a> · <a href="/docs/codebook">Export Codebook</a></nav>
  <main>
    ${content}
  </main>
</body>
</html>`;
}

/**
 * Read and render a markdown file from docs/
 */
function readMarkdownFile(filename: string): string | null {
  const filePath = path.join(docsDir, filename);
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return marked.parse(fs.readFileSync(filePath, "utf-8"), { async: false });
}

// ============================================
// API Reference
// ============================================

/**
 * GET /docs/openapi.json
 */
router.get("/openapi.json", (_req: Request, res: Response) => {
  res.json(swaggerSpec);
});

/**
 * GET /docs/api
 * Swagger UI for interactive API documentation
 */
router.use(
  "/api",
  swaggerUi.serve,
  swaggerUi.setup(swaggerSpec, {
    customCss: ".swagger-ui .topbar { display: none; }",
    customSiteTitle: "TrackLab API Reference",
  })
);

// ============================================
// Export Codebook
// ============================================

/**
 * GET /docs/codebook
 * Column reference of the three export CSV files
 */
router.get("/codebook", (_req: Request, res: Response) => {
  const content = readMarkdownFile("codebook.md");
  if (content === null) {
    res.status(404).json({ success: false, error: "Codebook not found", code: ERROR_CODES.NOT_FOUND });
    return;
  }
  res.type("html").send(wrapInHtml("Export Codebook", content));
});

export default router;
