/**
 * Formatter Gateway — boundary to the document renderer.
 *
 * Callers must pass a configuration that has already been through
 * validateConfig(). Implementations report failures as a cause string
 * instead of throwing.
 */

import type { StyleConfiguration } from "../style/schema.js";

export type RenderOutcome =
  | { ok: true; outputPath: string }
  | { ok: false; cause: string };

export interface FormatterGateway {
  /** Input is already a rich document (.docx); the renderer restyles its paragraphs. */
  renderFromFile(
    config: StyleConfiguration,
    inputPath: string,
    outputPath: string,
  ): Promise<RenderOutcome>;

  /** Input is plain text or lightweight markup; the renderer infers structure. */
  renderFromText(
    config: StyleConfiguration,
    text: string,
    outputPath: string,
  ): Promise<RenderOutcome>;
}

export const OUTPUT_EXTENSION = ".docx";
