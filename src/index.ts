import { Hono } from "hono";
import type { Context } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { HTTPException } from "hono/http-exception";
import { serveStatic } from "@hono/node-server/serve-static";
import type { z } from "zod";
import { bookFromFields, formatCitation } from "./formatters";
import { buildBibliography } from "./lib/bibliography";
import { checkCitations } from "./lib/checker";
import { DOCX_MIME_TYPE, renderBibliographyDocx } from "./lib/docx";
import {
  bibliographyRequestSchema,
  checkRequestSchema,
  citeRequestSchema,
  referenceFieldsSchema,
} from "./lib/schemas";

export interface AppOptions {
  allowedOrigins?: string[];
  // Directory holding the form; static serving is off when unset
  publicDir?: string;
  docxFooter?: string;
  log?: boolean;
}

class ValidationError extends HTTPException {
  constructor(
    message: string,
    readonly issues: z.ZodIssue[] = [],
    cause?: unknown
  ) {
    super(400, { message, cause });
  }
}

async function readBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (e) {
    throw new ValidationError("Request body must be JSON", [], e);
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError("Invalid request body", result.error.issues);
  }
  return result.data;
}

export function createApp(options: AppOptions = {}): Hono {
  const app = new Hono();
  const origins = options.allowedOrigins ?? ["*"];

  if (options.log ?? true) {
    app.use("*", logger());
  }
  app.use("/api/*", cors({ origin: origins.includes("*") ? "*" : origins }));

  app.get("/api/health", (c) => {
    return c.json({ status: "ok" });
  });

  app.post("/api/reference", async (c) => {
    const fields = await readBody(c, referenceFieldsSchema);
    const formatted = formatCitation(bookFromFields(fields));
    return c.json({ reference: formatted.text, markdown: formatted.markdown, html: formatted.html });
  });

  app.post("/api/cite", async (c) => {
    const { reference } = await readBody(c, citeRequestSchema);
    const { text, markdown, html } = formatCitation(reference);
    return c.json({ text, markdown, html });
  });

  app.post("/api/bibliography", async (c) => {
    const { references } = await readBody(c, bibliographyRequestSchema);
    return c.json({ entries: buildBibliography(references) });
  });

  app.post("/api/bibliography/docx", async (c) => {
    const { references } = await readBody(c, bibliographyRequestSchema);
    const bytes = await renderBibliographyDocx(buildBibliography(references), {
      footer: options.docxFooter,
    });

    c.header("Content-Type", DOCX_MIME_TYPE);
    c.header("Content-Disposition", 'attachment; filename="Reference_List.docx"');
    return c.body(bytes);
  });

  app.post("/api/check", async (c) => {
    const { text, references } = await readBody(c, checkRequestSchema);
    return c.json(checkCitations(text, references));
  });

  if (options.publicDir) {
    app.use("/*", serveStatic({ root: options.publicDir }));
  }

  app.notFound((c) => {
    return c.json({ error: "Not found" }, 404);
  });

  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, issues: err.issues }, 400);
    }
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }
    console.error("Reference error:", err);
    return c.json({ error: "Failed to generate reference" }, 500);
  });

  return app;
}
