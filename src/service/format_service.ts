/**
 * Format Service — validate a configuration, pick the render path for the
 * input, and run the gateway under a timeout.
 *
 * The gateway is never called with a configuration that fails
 * validateConfig(). Rendering works on a snapshot; no store is touched
 * while it runs.
 */

import { readFile, rm } from "fs/promises";
import path from "path";
import { assertValidConfig } from "../style/validator.js";
import { RenderFailureError, RenderTimeoutError, errorMessage } from "../style/errors.js";
import type { StyleConfigStore } from "../style/store.js";
import { configFingerprint } from "../shared/hash.js";
import type { FormatterGateway, RenderOutcome } from "../render/gateway.js";

export type InputKind = "docx" | "text";

export interface FormatRequest {
  inputPath: string;
  outputPath: string;
  /** Abort waiting after this many milliseconds; no limit when omitted. */
  timeoutMs?: number;
}

export interface TextFormatRequest {
  text: string;
  outputPath: string;
  timeoutMs?: number;
}

export interface FormatResult {
  outputPath: string;
  inputKind: InputKind;
  /** SHA-256 of the configuration that was rendered. */
  configHash: string;
  elapsedMs: number;
}

/** .docx inputs are restyled in place; everything else is read as UTF-8 text. */
export function detectInputKind(inputPath: string): InputKind {
  return path.extname(inputPath).toLowerCase() === ".docx" ? "docx" : "text";
}

/**
 * Format a file with a configuration from any source. The configuration is
 * validated first; a ValidationFailureError is thrown before any I/O.
 */
export async function formatDocument(
  config: unknown,
  gateway: FormatterGateway,
  request: FormatRequest,
): Promise<FormatResult> {
  const valid = assertValidConfig(config);
  const startTime = Date.now();
  const inputKind = detectInputKind(request.inputPath);

  let pending: Promise<RenderOutcome>;
  if (inputKind === "docx") {
    pending = gateway.renderFromFile(valid, request.inputPath, request.outputPath);
  } else {
    let text: string;
    try {
      text = await readFile(request.inputPath, "utf-8");
    } catch (err) {
      throw new RenderFailureError(`source unreadable: ${errorMessage(err)}`);
    }
    pending = gateway.renderFromText(valid, text, request.outputPath);
  }

  const outcome = await withTimeout(pending, request.timeoutMs);
  if (!outcome.ok) throw new RenderFailureError(outcome.cause);

  return {
    outputPath: outcome.outputPath,
    inputKind,
    configHash: configFingerprint(valid),
    elapsedMs: Date.now() - startTime,
  };
}

/** Format text already held in memory (API request bodies). */
export async function formatText(
  config: unknown,
  gateway: FormatterGateway,
  request: TextFormatRequest,
): Promise<FormatResult> {
  const valid = assertValidConfig(config);
  const startTime = Date.now();

  const outcome = await withTimeout(
    gateway.renderFromText(valid, request.text, request.outputPath),
    request.timeoutMs,
  );
  if (!outcome.ok) throw new RenderFailureError(outcome.cause);

  return {
    outputPath: outcome.outputPath,
    inputKind: "text",
    configHash: configFingerprint(valid),
    elapsedMs: Date.now() - startTime,
  };
}

/** Format with the store's current configuration. */
export function formatWithStore(
  store: StyleConfigStore,
  gateway: FormatterGateway,
  request: FormatRequest,
): Promise<FormatResult> {
  return formatDocument(store.snapshot(), gateway, request);
}

/**
 * Race the render against the timeout. The gateway cannot be cancelled, so
 * on expiry the render keeps going; the error's `abandoned` promise removes
 * its output once it lands.
 */
async function withTimeout(
  pending: Promise<RenderOutcome>,
  timeoutMs: number | undefined,
): Promise<RenderOutcome> {
  if (timeoutMs === undefined) return pending;

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new RenderTimeoutError(timeoutMs, discardWhenSettled(pending))),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([pending, expired]);
  } finally {
    clearTimeout(timer);
  }
}

async function discardWhenSettled(pending: Promise<RenderOutcome>): Promise<void> {
  const outcome = await pending;
  if (outcome.ok) {
    await rm(outcome.outputPath, { force: true });
  }
}
