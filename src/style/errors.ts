/**
 * Error taxonomy for style editing, validation and rendering.
 *
 * Every error carries a stable `code` so the API and CLIs can map it
 * without matching on message text.
 */

import type { Violation } from "./validator.js";

export type StyleErrorCode =
  | "UNKNOWN_TEMPLATE"
  | "INVALID_VALUE"
  | "VALIDATION_FAILURE"
  | "RENDER_FAILURE"
  | "RENDER_TIMEOUT";

export abstract class StyleError extends Error {
  abstract readonly code: StyleErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownTemplateError extends StyleError {
  readonly code = "UNKNOWN_TEMPLATE";

  constructor(readonly templateName: string) {
    super(`Template not found: ${templateName}`);
  }
}

export class InvalidValueError extends StyleError {
  readonly code = "INVALID_VALUE";

  constructor(
    readonly path: string,
    readonly domain: string,
    message: string,
  ) {
    super(message);
  }
}

export class ValidationFailureError extends StyleError {
  readonly code = "VALIDATION_FAILURE";

  constructor(readonly violations: Violation[]) {
    super(
      `Configuration is invalid (${violations.length} violation${violations.length === 1 ? "" : "s"}):\n` +
        violations.map((v) => `  - ${v.message}`).join("\n"),
    );
  }
}

export class RenderFailureError extends StyleError {
  readonly code = "RENDER_FAILURE";

  constructor(readonly reason: string) {
    super(`Rendering failed: ${reason}`);
  }
}

export class RenderTimeoutError extends StyleError {
  readonly code = "RENDER_TIMEOUT";

  /**
   * @param abandoned settles once the render that was given up on has
   *   finished and anything it wrote has been removed. Rejects if that
   *   output could not be removed.
   */
  constructor(
    readonly timeoutMs: number,
    readonly abandoned: Promise<void> = Promise.resolve(),
  ) {
    super(`Rendering did not finish within ${timeoutMs}ms`);
  }
}

export function isStyleError(err: unknown): err is StyleError {
  return err instanceof StyleError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
