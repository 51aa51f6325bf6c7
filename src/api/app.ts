/**
 * HTTP API — one StyleConfigStore per session, kept in memory.
 *
 * Edit errors (unknown template, invalid value) are answered on the edit
 * request itself; validation and render failures only surface on the
 * render request.
 */

import express, { type ErrorRequestHandler, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { TemplateCatalog } from "../style/catalog.js";
import { StyleConfigStore } from "../style/store.js";
import { validateConfig } from "../style/validator.js";
import {
  RenderTimeoutError,
  ValidationFailureError,
  errorMessage,
  isStyleError,
  type StyleErrorCode,
} from "../style/errors.js";
import type { FormatterGateway } from "../render/gateway.js";
import { DocxFormatter } from "../render/docx_formatter.js";
import { formatText, formatWithStore, type FormatResult } from "../service/format_service.js";
import type { AppConfig } from "../shared/app_config.js";
import { SessionRegistry } from "./sessions.js";

export interface AppDeps {
  config: AppConfig;
  catalog?: TemplateCatalog;
  gateway?: FormatterGateway;
  /** Request log sink; console.log when omitted. */
  log?: (line: string) => void;
  /** Clock for session expiry; Date.now when omitted. */
  now?: () => number;
}

const STATUS_BY_CODE: Record<StyleErrorCode, number> = {
  UNKNOWN_TEMPLATE: 404,
  INVALID_VALUE: 422,
  VALIDATION_FAILURE: 422,
  RENDER_FAILURE: 500,
  RENDER_TIMEOUT: 504,
};

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";
const ACCEPTED_UPLOADS = new Set([".docx", ".md", ".txt"]);

const TemplateBody = z.object({ name: z.string() });
const SettingBody = z.object({ key: z.string(), value: z.unknown() });
const TextBody = z.object({ text: z.string(), filename: z.string().optional() });

export function createApp(deps: AppDeps) {
  const catalog = deps.catalog ?? new TemplateCatalog();
  const gateway = deps.gateway ?? new DocxFormatter();
  const log = deps.log ?? ((line: string) => console.log(line));
  const sessions = new SessionRegistry({
    ttlMs: deps.config.sessionTtlMs,
    maxSessions: deps.config.maxSessions,
    now: deps.now,
  });

  const app = express();
  app.use(express.json());
  const upload = multer({ storage: multer.memoryStorage() });

  app.use((req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      log(`  [HTTP] ${req.method} ${req.originalUrl} → ${res.statusCode} (${Date.now() - started}ms)`);
    });
    next();
  });

  function sendError(res: Response, err: unknown) {
    if (isStyleError(err)) {
      const body: Record<string, unknown> = { error: err.message, code: err.code };
      if (err instanceof ValidationFailureError) body.violations = err.violations;
      res.status(STATUS_BY_CODE[err.code]).json(body);
      return;
    }
    log(`  [ERROR] ${errorMessage(err)}`);
    res.status(500).json({ error: errorMessage(err) });
  }

  function findSession(sessionId: string, res: Response): StyleConfigStore | undefined {
    const store = sessions.get(sessionId);
    if (!store) {
      res.status(404).json({ error: "Session not found" });
    }
    return store;
  }

  function sessionView(sessionId: string, store: StyleConfigStore) {
    return { sessionId, activeTemplate: store.activeTemplate, config: store.snapshot() };
  }

  // ── GET /health ──────────────────────────────────────────────────
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ── GET /v1/templates ────────────────────────────────────────────
  app.get("/v1/templates", (_req, res) => {
    res.json({ templates: catalog.list() });
  });

  // ── POST /v1/sessions ────────────────────────────────────────────
  app.post("/v1/sessions", (req, res) => {
    const parsed = z.object({ template: z.string().optional() }).safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json({ error: "template must be a string" });
    try {
      const store = new StyleConfigStore(catalog, parsed.data.template ?? deps.config.defaultTemplate);
      const sessionId = sessions.create(store);
      res.status(201).json(sessionView(sessionId, store));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/sessions/:sessionId ──────────────────────────────────
  app.get("/v1/sessions/:sessionId", (req, res) => {
    const store = findSession(req.params.sessionId, res);
    if (!store) return;
    res.json(sessionView(req.params.sessionId, store));
  });

  // ── DELETE /v1/sessions/:sessionId ───────────────────────────────
  app.delete("/v1/sessions/:sessionId", (req, res) => {
    if (!sessions.delete(req.params.sessionId)) {
      return res.status(404).json({ error: "Session not found" });
    }
    res.status(204).end();
  });

  // ── POST /v1/sessions/:sessionId/template ────────────────────────
  app.post("/v1/sessions/:sessionId/template", (req, res) => {
    const store = findSession(req.params.sessionId, res);
    if (!store) return;
    const parsed = TemplateBody.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "Body must be { name: string }" });
    try {
      store.loadTemplate(parsed.data.name);
      res.json(sessionView(req.params.sessionId, store));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/sessions/:sessionId/reset ───────────────────────────
  app.post("/v1/sessions/:sessionId/reset", (req, res) => {
    const store = findSession(req.params.sessionId, res);
    if (!store) return;
    store.reset();
    res.json(sessionView(req.params.sessionId, store));
  });

  // ── PATCH /v1/sessions/:sessionId/document ───────────────────────
  app.patch("/v1/sessions/:sessionId/document", (req, res) => {
    const store = findSession(req.params.sessionId, res);
    if (!store) return;
    const parsed = SettingBody.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "Body must be { key: string, value }" });
    try {
      store.setDocumentSetting(parsed.data.key, parsed.data.value);
      res.json(sessionView(req.params.sessionId, store));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── PATCH /v1/sessions/:sessionId/elements/:category ─────────────
  app.patch("/v1/sessions/:sessionId/elements/:category", (req, res) => {
    const store = findSession(req.params.sessionId, res);
    if (!store) return;
    const parsed = SettingBody.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "Body must be { key: string, value }" });
    try {
      store.setElementSetting(req.params.category, parsed.data.key, parsed.data.value);
      res.json(sessionView(req.params.sessionId, store));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/validate ────────────────────────────────────────────
  app.post("/v1/validate", (req, res) => {
    const outcome = validateConfig(req.body);
    if (outcome.ok) return res.json({ valid: true, violations: [] });
    res.status(422).json({ valid: false, violations: outcome.violations });
  });

  // ── POST /v1/sessions/:sessionId/render ──────────────────────────
  app.post("/v1/sessions/:sessionId/render", upload.single("file"), async (req, res) => {
    const store = findSession(req.params.sessionId, res);
    if (!store) return;

    let workDir: string | undefined;
    let abandoned: Promise<void> = Promise.resolve();
    try {
      workDir = await mkdtemp(path.join(os.tmpdir(), "docstyle-"));
      let result: FormatResult;
      let stem: string;

      if (req.file) {
        const ext = path.extname(req.file.originalname).toLowerCase();
        if (!ACCEPTED_UPLOADS.has(ext)) {
          return res.status(400).json({ error: `Unsupported file type: ${ext || "(none)"}` });
        }
        stem = path.basename(req.file.originalname, ext);
        const inputPath = path.join(workDir, `input${ext}`);
        await writeFile(inputPath, req.file.buffer);
        result = await formatWithStore(store, gateway, {
          inputPath,
          outputPath: path.join(workDir, "output.docx"),
          timeoutMs: deps.config.renderTimeoutMs,
        });
      } else {
        const parsed = TextBody.safeParse(req.body);
        if (!parsed.success) {
          return res.status(400).json({ error: "Upload a file or send { text: string }" });
        }
        stem = parsed.data.filename ?? "document";
        result = await formatText(store.snapshot(), gateway, {
          text: parsed.data.text,
          outputPath: path.join(workDir, "output.docx"),
          timeoutMs: deps.config.renderTimeoutMs,
        });
      }

      const docx = await readFile(result.outputPath);
      res.setHeader("Content-Type", DOCX_MIME);
      res.setHeader(
        "Content-Disposition",
        `attachment; filename*=UTF-8''${encodeURIComponent(`格式化_${stem}.docx`)}`,
      );
      res.setHeader("X-Config-Hash", result.configHash);
      res.send(docx);
    } catch (err) {
      if (err instanceof RenderTimeoutError) abandoned = err.abandoned;
      sendError(res, err);
    } finally {
      if (workDir) {
        // A timed-out render may still be writing into workDir.
        await abandoned.catch((err: unknown) =>
          log(`  [WARN] abandoned render output not removed: ${errorMessage(err)}`),
        );
        await rm(workDir, { recursive: true, force: true }).catch((err: unknown) =>
          log(`  [WARN] could not remove ${workDir}: ${errorMessage(err)}`),
        );
      }
    }
  });

  const handleUncaught: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) return next(err);
    if (typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed") {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    if (
      typeof err === "object" &&
      err !== null &&
      "status" in err &&
      typeof err.status === "number" &&
      err.status >= 400 &&
      err.status < 500
    ) {
      res.status(err.status).json({ error: errorMessage(err) });
      return;
    }
    sendError(res, err);
  };
  app.use(handleUncaught);

  return app;
}

