/**
 * DOCX paragraph reader — pulls paragraph text and heading hints out of
 * word/document.xml.
 *
 * Word splits text across many <w:r><w:t> runs; runs are joined per
 * paragraph before the text is handed on. Style ids are looked up in
 * word/styles.xml, since localized Word writes ids like "1" and "2" for
 * the built-in "heading 1" and "heading 2".
 */

import PizZip from "pizzip";
import type { StyledElement } from "../style/schema.js";
import type { SourceLine } from "./structure.js";

// Matches <w:p>…</w:p> and self-closing <w:p/>, but not <w:pPr>.
const PARAGRAPH_RE = /<w:p(?:\s[^>]*)?(?:\/>|>([\s\S]*?)<\/w:p>)/g;
const TEXT_RE = /<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>/g;
const STYLE_RE = /<w:pStyle\s+w:val="([^"]+)"/;
const STYLE_DEF_RE = /<w:style\b[^>]*\bw:styleId="([^"]+)"[^>]*>([\s\S]*?)<\/w:style>/g;
const STYLE_NAME_RE = /<w:name\s+w:val="([^"]+)"/;

const ENTITIES: Record<string, string> = {
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
  "&amp;": "&",
};

export function decodeXmlText(text: string): string {
  return text.replace(/&(?:lt|gt|quot|apos|amp);/g, (entity) => ENTITIES[entity] ?? entity);
}

/** Map a Word paragraph style id to an element category hint. */
export function styleHint(styleId: string): StyledElement | undefined {
  if (/^title$/i.test(styleId)) return "title";
  if (/^heading\s?1$/i.test(styleId)) return "heading1";
  if (/^heading\s?[2-9]$/i.test(styleId)) return "heading2";
  return undefined;
}

/** styleId → style name, from word/styles.xml. */
export function readStyleNames(stylesXml: string): Map<string, string> {
  const names = new Map<string, string>();
  for (const match of stylesXml.matchAll(STYLE_DEF_RE)) {
    const name = STYLE_NAME_RE.exec(match[2]);
    if (name) names.set(match[1], name[1]);
  }
  return names;
}

export function readDocxParagraphs(docxBuffer: Buffer): SourceLine[] {
  const zip = new PizZip(docxBuffer);
  const entry = zip.file("word/document.xml");
  if (!entry) {
    throw new Error("word/document.xml not found; not a Word document");
  }
  const xml = entry.asText();
  const styleNames = readStyleNames(zip.file("word/styles.xml")?.asText() ?? "");

  const hintFor = (styleId: string): StyledElement | undefined => {
    const name = styleNames.get(styleId);
    return styleHint(styleId) ?? (name === undefined ? undefined : styleHint(name));
  };

  const lines: SourceLine[] = [];
  for (const match of xml.matchAll(PARAGRAPH_RE)) {
    const inner = match[1] ?? "";
    const texts: string[] = [];
    for (const t of inner.matchAll(TEXT_RE)) {
      texts.push(t[1]);
    }

    const style = STYLE_RE.exec(inner);
    const hint = style ? hintFor(style[1]) : undefined;
    const text = decodeXmlText(texts.join(""));
    lines.push(hint ? { text, hint } : { text });
  }
  return lines;
}
