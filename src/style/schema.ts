/**
 * Style Schema — element categories, attribute keys and value domains.
 *
 * Every attribute is described once here, as a zod schema plus a human
 * description. The store, the validator and the CLI argument parser all
 * read from this table.
 */

import { z } from "zod";

// ── Categories ──────────────────────────────────────────────────────

export const ELEMENT_CATEGORIES = [
  "document",
  "title",
  "heading1",
  "heading2",
  "body",
  "signature",
] as const;

export type ElementCategory = (typeof ELEMENT_CATEGORIES)[number];

/** Categories that carry an element style record (everything but `document`). */
export const STYLED_ELEMENTS = [
  "title",
  "heading1",
  "heading2",
  "body",
  "signature",
] as const;

export type StyledElement = (typeof STYLED_ELEMENTS)[number];

export const ALIGNMENTS = ["left", "center", "right", "justify"] as const;
export type Alignment = (typeof ALIGNMENTS)[number];

export const LINE_SPACING_MULTIPLES = [1, 1.5, 2] as const;
export const FIXED_LINE_SPACING = "fixed";

// ── Domains ─────────────────────────────────────────────────────────

export interface AttributeDomain {
  description: string;
  schema: z.ZodType<unknown>;
  /** Primitive kind used when parsing raw strings from the CLI or a form. */
  kind: "number" | "integer" | "boolean" | "string" | "lineSpacing";
}

function defineDomain<S extends z.ZodTypeAny>(
  description: string,
  kind: AttributeDomain["kind"],
  schema: S,
): { description: string; kind: AttributeDomain["kind"]; schema: S } {
  return { description, kind, schema };
}

export const Domains = {
  positiveLength: defineDomain("must be > 0", "number", z.number().finite().positive()),
  positivePoints: defineDomain("must be > 0", "number", z.number().finite().positive()),
  fontSize: defineDomain("must be a positive integer", "integer", z.number().int().positive()),
  indent: defineDomain("must be a non-negative integer", "integer", z.number().int().nonnegative()),
  fontFamily: defineDomain("must be a non-empty string", "string", z.string().regex(/\S/)),
  bold: defineDomain("must be a boolean", "boolean", z.boolean()),
  alignment: defineDomain(
    `must be one of ${ALIGNMENTS.join(", ")}`,
    "string",
    z.enum(ALIGNMENTS),
  ),
  lineSpacing: defineDomain(
    `must be one of ${LINE_SPACING_MULTIPLES.join(", ")}, "${FIXED_LINE_SPACING}"`,
    "lineSpacing",
    z.union([z.literal(1), z.literal(1.5), z.literal(2), z.literal(FIXED_LINE_SPACING)]),
  ),
};

// ── Record Schemas ──────────────────────────────────────────────────

export const DocumentSettingsSchema = z
  .object({
    margin_top: Domains.positiveLength.schema,
    margin_bottom: Domains.positiveLength.schema,
    margin_left: Domains.positiveLength.schema,
    margin_right: Domains.positiveLength.schema,
    line_spacing: Domains.lineSpacing.schema,
    /** Exact line height in points, used when line_spacing is "fixed". */
    line_spacing_fixed_pt: Domains.positivePoints.schema.optional(),
    font_family: Domains.fontFamily.schema,
    font_size: Domains.fontSize.schema,
  })
  .strict();

export const ElementStyleSchema = z
  .object({
    font_family: Domains.fontFamily.schema,
    font_size: Domains.fontSize.schema,
    bold: Domains.bold.schema,
    alignment: Domains.alignment.schema,
  })
  .strict();

export const BodyStyleSchema = ElementStyleSchema.extend({
  first_line_indent: Domains.indent.schema,
}).strict();

export const StyleConfigurationSchema = z
  .object({
    document: DocumentSettingsSchema,
    title: ElementStyleSchema,
    heading1: ElementStyleSchema,
    heading2: ElementStyleSchema,
    body: BodyStyleSchema,
    signature: ElementStyleSchema,
  })
  .strict();

export type DocumentSettings = z.infer<typeof DocumentSettingsSchema>;
export type ElementStyle = z.infer<typeof ElementStyleSchema>;
export type BodyStyle = z.infer<typeof BodyStyleSchema>;
export type StyleConfiguration = z.infer<typeof StyleConfigurationSchema>;
export type LineSpacing = DocumentSettings["line_spacing"];

export type DocumentSettingKey = keyof DocumentSettings;
export type ElementSettingKey = keyof BodyStyle;

// ── Attribute Table ─────────────────────────────────────────────────

export interface AttributeSpec {
  key: string;
  domain: AttributeDomain;
  required: boolean;
}

const DOCUMENT_ATTRIBUTES: readonly AttributeSpec[] = [
  { key: "margin_top", domain: Domains.positiveLength, required: true },
  { key: "margin_bottom", domain: Domains.positiveLength, required: true },
  { key: "margin_left", domain: Domains.positiveLength, required: true },
  { key: "margin_right", domain: Domains.positiveLength, required: true },
  { key: "line_spacing", domain: Domains.lineSpacing, required: true },
  { key: "line_spacing_fixed_pt", domain: Domains.positivePoints, required: false },
  { key: "font_family", domain: Domains.fontFamily, required: true },
  { key: "font_size", domain: Domains.fontSize, required: true },
];

const ELEMENT_ATTRIBUTES: readonly AttributeSpec[] = [
  { key: "font_family", domain: Domains.fontFamily, required: true },
  { key: "font_size", domain: Domains.fontSize, required: true },
  { key: "bold", domain: Domains.bold, required: true },
  { key: "alignment", domain: Domains.alignment, required: true },
];

const BODY_ATTRIBUTES: readonly AttributeSpec[] = [
  ...ELEMENT_ATTRIBUTES,
  { key: "first_line_indent", domain: Domains.indent, required: true },
];

export const DOCUMENT_SETTING_KEYS = DOCUMENT_ATTRIBUTES.map((a) => a.key);
export const ELEMENT_SETTING_KEYS = BODY_ATTRIBUTES.map((a) => a.key);

/** Legal attributes for a category, in display order. */
export function attributesFor(category: ElementCategory): readonly AttributeSpec[] {
  switch (category) {
    case "document":
      return DOCUMENT_ATTRIBUTES;
    case "body":
      return BODY_ATTRIBUTES;
    case "title":
    case "heading1":
    case "heading2":
    case "signature":
      return ELEMENT_ATTRIBUTES;
  }
}

export function findAttribute(
  category: ElementCategory,
  key: string,
): AttributeSpec | undefined {
  return attributesFor(category).find((a) => a.key === key);
}

// ── Guards ──────────────────────────────────────────────────────────

const CATEGORY_NAMES: readonly string[] = ELEMENT_CATEGORIES;
const STYLED_ELEMENT_NAMES: readonly string[] = STYLED_ELEMENTS;

export function isElementCategory(value: string): value is ElementCategory {
  return CATEGORY_NAMES.includes(value);
}

export function isStyledElement(value: string): value is StyledElement {
  return STYLED_ELEMENT_NAMES.includes(value);
}

export function isDocumentSettingKey(value: string): value is DocumentSettingKey {
  return DOCUMENT_SETTING_KEYS.includes(value);
}

export function isElementSettingKey(value: string): value is ElementSettingKey {
  return ELEMENT_SETTING_KEYS.includes(value);
}

// ── Raw Value Parsing ───────────────────────────────────────────────

/**
 * Convert a raw string (CLI flag, form field) into the domain's primitive
 * type. Strings that do not parse are returned as-is so that the domain
 * check rejects them with the original text in the message.
 */
export function parseAttributeValue(domain: AttributeDomain, raw: string): unknown {
  const trimmed = raw.trim();
  switch (domain.kind) {
    case "number":
    case "integer":
      return parseNumeric(trimmed);
    case "lineSpacing":
      return trimmed === FIXED_LINE_SPACING ? trimmed : parseNumeric(trimmed);
    case "boolean":
      if (trimmed === "true") return true;
      if (trimmed === "false") return false;
      return raw;
    case "string":
      return raw;
  }
}

function parseNumeric(raw: string): number | string {
  if (raw === "") return raw;
  const n = Number(raw);
  return Number.isNaN(n) ? raw : n;
}

/** Render a value for a diagnostic message. */
export function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (value === undefined) return "undefined";
  if (value === null) return "null";
  if (typeof value === "object") return Array.isArray(value) ? "array" : "object";
  return String(value);
}
