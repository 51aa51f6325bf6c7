/**
 * Structure inference — decide which element category each line of a
 * source document belongs to.
 *
 * Precedence: explicit hint (paragraph style of a .docx) → Markdown
 * heading marker → trailing signature block → first line as title →
 * numbered Chinese headings → body.
 */

import type { StyledElement } from "../style/schema.js";

export interface SourceLine {
  text: string;
  hint?: StyledElement;
}

export interface StyledParagraph {
  category: StyledElement;
  text: string;
}

const MARKDOWN_HEADING = /^(#{1,6})\s+(.*)$/;
// 一、 二、 … 十一、
const HEADING1_PATTERN = /^[一二三四五六七八九十百]+、/;
// （一） (二) …
const HEADING2_PATTERN = /^[（(][一二三四五六七八九十百]+[）)]/;
const DATE_PATTERNS = [
  /^\d{4}年\d{1,2}月\d{1,2}日$/,
  /^\d{4}[-/.]\d{1,2}[-/.]\d{1,2}$/,
  /^[〇零一二三四五六七八九]{4}年[一二三四五六七八九十]{1,2}月[一二三四五六七八九十]{1,3}日$/,
];
/** A line above the date longer than this is prose, not the signing party. */
const MAX_SIGNATORY_LENGTH = 20;

interface Pending {
  text: string;
  category: StyledElement | undefined;
}

export function splitLines(text: string): SourceLine[] {
  return text.split(/\r?\n/).map((line) => ({ text: line }));
}

export function isDateLine(text: string): boolean {
  return DATE_PATTERNS.some((re) => re.test(text));
}

export function inferStructure(lines: SourceLine[]): StyledParagraph[] {
  const items: Pending[] = lines
    .map((line) => ({ text: line.text.trim(), category: line.hint }))
    .filter((item) => item.text !== "");

  for (const item of items) {
    if (item.category) continue;
    const m = MARKDOWN_HEADING.exec(item.text);
    if (m) {
      item.category = markdownLevel(m[1].length);
      item.text = m[2].trim();
    }
  }

  const last = items.length - 1;
  if (last > 0 && !items[last].category && isDateLine(items[last].text)) {
    items[last].category = "signature";
    const signatory = items[last - 1];
    if (last - 1 > 0 && !signatory.category && signatory.text.length <= MAX_SIGNATORY_LENGTH) {
      signatory.category = "signature";
    }
  }

  if (!items.some((item) => item.category === "title")) {
    const first = items[0];
    if (first && !first.category && !isNumberedHeading(first.text)) {
      first.category = "title";
    }
  }

  return items.map((item) => ({
    category: item.category ?? classifyLine(item.text),
    text: item.text,
  }));
}

function markdownLevel(hashes: number): StyledElement {
  if (hashes === 1) return "title";
  if (hashes === 2) return "heading1";
  return "heading2";
}

function isNumberedHeading(text: string): boolean {
  return HEADING1_PATTERN.test(text) || HEADING2_PATTERN.test(text);
}

function classifyLine(text: string): StyledElement {
  if (HEADING1_PATTERN.test(text)) return "heading1";
  if (HEADING2_PATTERN.test(text)) return "heading2";
  return "body";
}
