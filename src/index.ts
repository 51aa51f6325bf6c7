/**
 * docstyle — Barrel Export
 */

export type {
  Alignment,
  AttributeDomain,
  AttributeSpec,
  BodyStyle,
  DocumentSettingKey,
  DocumentSettings,
  ElementCategory,
  ElementSettingKey,
  ElementStyle,
  LineSpacing,
  StyleConfiguration,
  StyledElement,
} from "./style/schema.js";
export {
  ALIGNMENTS,
  ELEMENT_CATEGORIES,
  STYLED_ELEMENTS,
  StyleConfigurationSchema,
  attributesFor,
  parseAttributeValue,
} from "./style/schema.js";

export type { BuiltinTemplateName, TemplateDefinition } from "./style/builtins.js";
export { BUILTIN_TEMPLATES, BUILTIN_TEMPLATE_NAMES } from "./style/builtins.js";
export { TemplateCatalog, isBuiltinTemplateName } from "./style/catalog.js";
export type { TemplateSummary } from "./style/catalog.js";
export { StyleConfigStore } from "./style/store.js";
export type { TemplateLabel } from "./style/store.js";
export { validateConfig, assertValidConfig } from "./style/validator.js";
export type { Violation, ValidationOutcome } from "./style/validator.js";
export {
  StyleError,
  UnknownTemplateError,
  InvalidValueError,
  ValidationFailureError,
  RenderFailureError,
  RenderTimeoutError,
  isStyleError,
} from "./style/errors.js";
export type { StyleErrorCode } from "./style/errors.js";

export type { FormatterGateway, RenderOutcome } from "./render/gateway.js";
export { DocxFormatter, buildStyledDocument } from "./render/docx_formatter.js";
export { inferStructure, splitLines } from "./render/structure.js";
export type { SourceLine, StyledParagraph } from "./render/structure.js";

export { formatDocument, formatText, formatWithStore } from "./service/format_service.js";
export type { FormatRequest, FormatResult, TextFormatRequest } from "./service/format_service.js";
export { configFingerprint } from "./shared/hash.js";
export { loadAppConfig } from "./shared/app_config.js";
export type { AppConfig } from "./shared/app_config.js";
export { createApp } from "./api/app.js";
export { SessionRegistry } from "./api/sessions.js";
