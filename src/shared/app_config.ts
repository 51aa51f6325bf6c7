/**
 * Application Configuration
 *
 * Read from environment variables (entry points load `.env` through
 * dotenv first):
 * - PORT:                        HTTP port for the API server
 * - DOCSTYLE_DEFAULT_TEMPLATE:   template new stores and sessions start from
 * - DOCSTYLE_RENDER_TIMEOUT_MS:  limit for a single render
 * - DOCSTYLE_OUT_DIR:            where the CLI writes when --output is a bare name
 * - DOCSTYLE_SESSION_TTL_MS:     idle time after which an API session is dropped
 * - DOCSTYLE_MAX_SESSIONS:       live API sessions kept before the least recent is evicted
 */

import { z } from "zod";
import { BUILTIN_TEMPLATE_NAMES, type BuiltinTemplateName } from "../style/builtins.js";

const AppConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  DOCSTYLE_DEFAULT_TEMPLATE: z.enum(BUILTIN_TEMPLATE_NAMES).default("default"),
  DOCSTYLE_RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  DOCSTYLE_OUT_DIR: z.string().min(1).default("out"),
  DOCSTYLE_SESSION_TTL_MS: z.coerce.number().int().positive().default(30 * 60_000),
  DOCSTYLE_MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
});

export interface AppConfig {
  port: number;
  defaultTemplate: BuiltinTemplateName;
  renderTimeoutMs: number;
  outDir: string;
  sessionTtlMs: number;
  maxSessions: number;
}

/**
 * Parse configuration from an environment map. Empty strings count as
 * unset. Throws with every offending variable listed.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = AppConfigSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }
  const cfg = parsed.data;
  return {
    port: cfg.PORT,
    defaultTemplate: cfg.DOCSTYLE_DEFAULT_TEMPLATE,
    renderTimeoutMs: cfg.DOCSTYLE_RENDER_TIMEOUT_MS,
    outDir: cfg.DOCSTYLE_OUT_DIR,
    sessionTtlMs: cfg.DOCSTYLE_SESSION_TTL_MS,
    maxSessions: cfg.DOCSTYLE_MAX_SESSIONS,
  };
}
