/**
 * Style Config Store — single owner of the live configuration.
 *
 * Other components only ever see snapshots. Every mutator validates
 * before writing and swaps the new record in with one assignment, so a
 * rejected edit leaves both the configuration and the active label as
 * they were. All methods are synchronous; none yields to the event loop
 * between reading and writing state.
 */

import { TemplateCatalog } from "./catalog.js";
import type { BuiltinTemplateName } from "./builtins.js";
import { InvalidValueError, UnknownTemplateError } from "./errors.js";
import {
  BodyStyleSchema,
  DocumentSettingsSchema,
  ElementStyleSchema,
  describeValue,
  findAttribute,
  isDocumentSettingKey,
  isStyledElement,
  type AttributeSpec,
  type StyleConfiguration,
} from "./schema.js";

/** Which template the live configuration reflects; "custom" after any edit. */
export type TemplateLabel = BuiltinTemplateName | "custom";

export class StyleConfigStore {
  private config: StyleConfiguration;
  private label: TemplateLabel;

  constructor(
    private readonly catalog: TemplateCatalog = new TemplateCatalog(),
    initialTemplate = "default",
  ) {
    if (!catalog.has(initialTemplate)) {
      throw new UnknownTemplateError(initialTemplate);
    }
    this.config = catalog.resolve(initialTemplate);
    this.label = initialTemplate;
  }

  get activeTemplate(): TemplateLabel {
    return this.label;
  }

  /** Replace the whole configuration with a builtin template. */
  loadTemplate(name: string): void {
    if (!this.catalog.has(name)) {
      throw new UnknownTemplateError(name);
    }
    this.config = this.catalog.resolve(name);
    this.label = name;
  }

  reset(): void {
    this.loadTemplate("default");
  }

  setDocumentSetting(key: string, value: unknown): void {
    if (!isDocumentSettingKey(key)) {
      throw unknownAttribute("document", key);
    }
    checkDomain(`document.${key}`, findAttribute("document", key), value);

    const document = DocumentSettingsSchema.parse({ ...this.config.document, [key]: value });
    this.config = { ...this.config, document };
    this.label = "custom";
  }

  setElementSetting(category: string, key: string, value: unknown): void {
    if (!isStyledElement(category)) {
      throw new InvalidValueError(
        category,
        "one of title, heading1, heading2, body, signature",
        `${category} is not a styled element category`,
      );
    }
    const spec = findAttribute(category, key);
    if (!spec) {
      throw key === "first_line_indent"
        ? new InvalidValueError(
            `${category}.${key}`,
            "only legal for body",
            `${category}.first_line_indent is only legal for body`,
          )
        : unknownAttribute(category, key);
    }
    checkDomain(`${category}.${key}`, spec, value);

    const next = { ...this.config };
    if (category === "body") {
      next.body = BodyStyleSchema.parse({ ...this.config.body, [key]: value });
    } else {
      next[category] = ElementStyleSchema.parse({ ...this.config[category], [key]: value });
    }
    this.config = next;
    this.label = "custom";
  }

  /** Deep copy of the live configuration. */
  snapshot(): StyleConfiguration {
    return structuredClone(this.config);
  }
}

function unknownAttribute(category: string, key: string): InvalidValueError {
  return new InvalidValueError(
    `${category}.${key}`,
    `not an attribute of ${category}`,
    `${category}.${key} is not an attribute of ${category}`,
  );
}

function checkDomain(path: string, spec: AttributeSpec | undefined, value: unknown): void {
  if (!spec) {
    throw new InvalidValueError(path, "unknown attribute", `${path} is not a known attribute`);
  }
  if (!spec.domain.schema.safeParse(value).success) {
    throw new InvalidValueError(
      path,
      spec.domain.description,
      `${path} ${spec.domain.description}, got ${describeValue(value)}`,
    );
  }
}
