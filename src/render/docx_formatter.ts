/**
 * DOCX Formatter — the shipped FormatterGateway.
 *
 * Both entry points reduce the source to a list of categorized paragraphs
 * and rebuild the document with the `docx` library, applying page margins
 * and line spacing from the `document` record and run/paragraph styling
 * from each element's record.
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import {
  AlignmentType,
  Document,
  HeadingLevel,
  LineRuleType,
  Packer,
  Paragraph,
  TextRun,
} from "docx";
import type { ElementStyle, StyleConfiguration } from "../style/schema.js";
import { errorMessage } from "../style/errors.js";
import { OUTPUT_EXTENSION, type FormatterGateway, type RenderOutcome } from "./gateway.js";
import { readDocxParagraphs } from "./docx_reader.js";
import { inferStructure, splitLines, type StyledParagraph } from "./structure.js";
import {
  cmToTwips,
  indentCharsToTwips,
  lineSpacingToTwips,
  pointsToHalfPoints,
} from "./units.js";

const ALIGNMENT = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  right: AlignmentType.RIGHT,
  justify: AlignmentType.JUSTIFIED,
} as const;

const HEADING = {
  title: HeadingLevel.TITLE,
  heading1: HeadingLevel.HEADING_1,
  heading2: HeadingLevel.HEADING_2,
  body: undefined,
  signature: undefined,
} as const;

export class DocxFormatter implements FormatterGateway {
  async renderFromFile(
    config: StyleConfiguration,
    inputPath: string,
    outputPath: string,
  ): Promise<RenderOutcome> {
    const rejected = checkOutputPath(outputPath);
    if (rejected) return rejected;

    let paragraphs: StyledParagraph[];
    try {
      paragraphs = inferStructure(readDocxParagraphs(await readFile(inputPath)));
    } catch (err) {
      return { ok: false, cause: `source unreadable: ${errorMessage(err)}` };
    }
    return this.write(config, paragraphs, outputPath);
  }

  async renderFromText(
    config: StyleConfiguration,
    text: string,
    outputPath: string,
  ): Promise<RenderOutcome> {
    const rejected = checkOutputPath(outputPath);
    if (rejected) return rejected;

    return this.write(config, inferStructure(splitLines(text)), outputPath);
  }

  private async write(
    config: StyleConfiguration,
    paragraphs: StyledParagraph[],
    outputPath: string,
  ): Promise<RenderOutcome> {
    let buffer: Buffer;
    try {
      buffer = await Packer.toBuffer(buildStyledDocument(config, paragraphs));
    } catch (err) {
      return { ok: false, cause: `internal rendering error: ${errorMessage(err)}` };
    }

    try {
      await mkdir(path.dirname(outputPath), { recursive: true });
      await writeFile(outputPath, buffer);
    } catch (err) {
      return { ok: false, cause: `output path unwritable: ${errorMessage(err)}` };
    }
    return { ok: true, outputPath };
  }
}

/**
 * Build the docx Document for a list of categorized paragraphs.
 */
export function buildStyledDocument(
  config: StyleConfiguration,
  paragraphs: StyledParagraph[],
): Document {
  const { document: page } = config;
  const spacing = lineSpacingToTwips(page.line_spacing, page.line_spacing_fixed_pt);
  const spacingOptions = {
    line: spacing.line,
    lineRule: spacing.exact ? LineRuleType.EXACT : LineRuleType.AUTO,
  };

  const children = paragraphs.map((p) => {
    const style = config[p.category];
    return new Paragraph({
      heading: HEADING[p.category],
      alignment: ALIGNMENT[style.alignment],
      spacing: spacingOptions,
      indent:
        p.category === "body"
          ? { firstLine: indentCharsToTwips(config.body.first_line_indent, config.body.font_size) }
          : undefined,
      children: [
        new TextRun({
          text: p.text,
          font: style.font_family,
          size: pointsToHalfPoints(style.font_size),
          bold: style.bold,
        }),
      ],
    });
  });

  return new Document({
    styles: {
      default: {
        document: {
          run: {
            font: page.font_family,
            size: pointsToHalfPoints(page.font_size),
          },
        },
        // Replaces the library's built-in heading runs, which are coloured.
        title: { run: headingRun(config.title) },
        heading1: { run: headingRun(config.heading1) },
        heading2: { run: headingRun(config.heading2) },
      },
    },
    sections: [
      {
        properties: {
          page: {
            margin: {
              top: cmToTwips(page.margin_top),
              bottom: cmToTwips(page.margin_bottom),
              left: cmToTwips(page.margin_left),
              right: cmToTwips(page.margin_right),
            },
          },
        },
        children: children.length > 0 ? children : [new Paragraph({ children: [] })],
      },
    ],
  });
}

function headingRun(style: ElementStyle) {
  return {
    font: style.font_family,
    size: pointsToHalfPoints(style.font_size),
    bold: style.bold,
  };
}

function checkOutputPath(outputPath: string): RenderOutcome | null {
  if (path.extname(outputPath).toLowerCase() !== OUTPUT_EXTENSION) {
    return {
      ok: false,
      cause: `output path unwritable: ${outputPath} must end in ${OUTPUT_EXTENSION}`,
    };
  }
  return null;
}
