/**
 * Template Catalog — holds the builtin templates and hands out copies.
 *
 * Canonical values are deep-frozen; resolve() always returns a fresh
 * structured clone, so edits to a resolved configuration never reach the
 * catalog.
 */

import {
  BUILTIN_TEMPLATES,
  BUILTIN_TEMPLATE_NAMES,
  type BuiltinTemplateName,
  type TemplateDefinition,
} from "./builtins.js";
import { UnknownTemplateError } from "./errors.js";
import type { StyleConfiguration } from "./schema.js";

export interface TemplateSummary {
  name: BuiltinTemplateName;
  label: string;
  description: string;
}

const TEMPLATE_NAMES: readonly string[] = BUILTIN_TEMPLATE_NAMES;

export function isBuiltinTemplateName(name: string): name is BuiltinTemplateName {
  return TEMPLATE_NAMES.includes(name);
}

export class TemplateCatalog {
  private templates = new Map<BuiltinTemplateName, TemplateDefinition>();

  constructor(definitions: readonly TemplateDefinition[] = BUILTIN_TEMPLATES) {
    for (const def of definitions) {
      this.templates.set(def.name, deepFreeze(structuredClone(def)));
    }
  }

  // ── Public API ─────────────────────────────────────────────

  /**
   * Resolve a template name to an independent copy of its configuration.
   * Throws UnknownTemplateError for anything outside the builtin set.
   */
  resolve(name: string): StyleConfiguration {
    const def = isBuiltinTemplateName(name) ? this.templates.get(name) : undefined;
    if (!def) {
      throw new UnknownTemplateError(name);
    }
    return structuredClone(def.config);
  }

  has(name: string): name is BuiltinTemplateName {
    return isBuiltinTemplateName(name) && this.templates.has(name);
  }

  /** List templates in catalog order. */
  list(): TemplateSummary[] {
    return [...this.templates.values()].map(({ name, label, description }) => ({
      name,
      label,
      description,
    }));
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
