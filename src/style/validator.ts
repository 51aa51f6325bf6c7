/**
 * Config Validator — the trust boundary in front of the renderer.
 *
 * Reports every violation found, not only the first one, so a caller can
 * show a complete diagnostic. Configurations built through StyleConfigStore
 * are valid by construction; this exists for everything else (JSON files,
 * request bodies).
 */

import {
  ELEMENT_CATEGORIES,
  StyleConfigurationSchema,
  attributesFor,
  describeValue,
  isElementCategory,
  type StyleConfiguration,
} from "./schema.js";
import { ValidationFailureError } from "./errors.js";

export interface Violation {
  /** Dotted location, e.g. "document.margin_top" or "body". */
  path: string;
  category: string;
  /** null when the whole category is at fault. */
  key: string | null;
  domain: string;
  message: string;
}

export type ValidationOutcome =
  | { ok: true; config: StyleConfiguration }
  | { ok: false; violations: Violation[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validateConfig(value: unknown): ValidationOutcome {
  if (!isRecord(value)) {
    return {
      ok: false,
      violations: [
        {
          path: "config",
          category: "config",
          key: null,
          domain: "must be an object",
          message: `config must be an object, got ${describeValue(value)}`,
        },
      ],
    };
  }

  const violations: Violation[] = [];

  for (const category of ELEMENT_CATEGORIES) {
    const record = value[category];

    if (record === undefined) {
      violations.push({
        path: category,
        category,
        key: null,
        domain: "required category",
        message: `${category} is missing`,
      });
      continue;
    }
    if (!isRecord(record)) {
      violations.push({
        path: category,
        category,
        key: null,
        domain: "must be an object",
        message: `${category} must be an object, got ${describeValue(record)}`,
      });
      continue;
    }

    const specs = attributesFor(category);
    for (const spec of specs) {
      const path = `${category}.${spec.key}`;
      const attr = record[spec.key];

      if (attr === undefined) {
        if (spec.required) {
          violations.push({
            path,
            category,
            key: spec.key,
            domain: spec.domain.description,
            message: `${path} is required`,
          });
        }
        continue;
      }

      if (!spec.domain.schema.safeParse(attr).success) {
        violations.push({
          path,
          category,
          key: spec.key,
          domain: spec.domain.description,
          message: `${path} ${spec.domain.description}, got ${describeValue(attr)}`,
        });
      }
    }

    for (const key of Object.keys(record)) {
      if (specs.some((s) => s.key === key)) continue;
      violations.push({
        path: `${category}.${key}`,
        category,
        key,
        domain: `not an attribute of ${category}`,
        message: `${category}.${key} is not an attribute of ${category}`,
      });
    }
  }

  for (const key of Object.keys(value)) {
    if (isElementCategory(key)) continue;
    violations.push({
      path: key,
      category: key,
      key: null,
      domain: "not an element category",
      message: `${key} is not an element category`,
    });
  }

  if (violations.length > 0) return { ok: false, violations };

  const parsed = StyleConfigurationSchema.safeParse(value);
  if (parsed.success) return { ok: true, config: parsed.data };

  // The attribute table and the zod schemas describe the same rules; this
  // branch only fires if they drift apart.
  return {
    ok: false,
    violations: parsed.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return {
        path,
        category: String(issue.path[0] ?? "config"),
        key: issue.path.length > 1 ? String(issue.path[1]) : null,
        domain: issue.code,
        message: `${path} ${issue.message}`,
      };
    }),
  };
}

/** Validate, throwing ValidationFailureError with every violation on failure. */
export function assertValidConfig(value: unknown): StyleConfiguration {
  const outcome = validateConfig(value);
  if (!outcome.ok) throw new ValidationFailureError(outcome.violations);
  return outcome.config;
}
