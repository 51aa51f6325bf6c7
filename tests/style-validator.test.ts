import { describe, it, expect } from "vitest";
import { assertValidConfig, validateConfig } from "../src/style/validator.js";
import { TemplateCatalog } from "../src/style/catalog.js";
import { ValidationFailureError } from "../src/style/errors.js";

const catalog = new TemplateCatalog();

function violationsOf(value: unknown) {
  const outcome = validateConfig(value);
  return outcome.ok ? [] : outcome.violations;
}

describe("Config Validator", () => {
  it("passes every builtin template", () => {
    for (const { name } of catalog.list()) {
      const outcome = validateConfig(catalog.resolve(name));
      expect(outcome.ok).toBe(true);
    }
  });

  it("returns the typed configuration on success", () => {
    const input = catalog.resolve("academic");
    const outcome = validateConfig(input);
    expect(outcome).toEqual({ ok: true, config: input });
  });

  it("reports a missing body category exactly once", () => {
    const config: Record<string, unknown> = { ...catalog.resolve("default") };
    delete config.body;

    const violations = violationsOf(config);
    expect(violations).toHaveLength(1);
    expect(violations[0]).toEqual({
      path: "body",
      category: "body",
      key: null,
      domain: "required category",
      message: "body is missing",
    });
  });

  it("reports margin_left = 0 exactly once", () => {
    const config = catalog.resolve("default");
    config.document.margin_left = 0;

    const violations = violationsOf(config);
    expect(violations).toHaveLength(1);
    expect(violations[0].path).toBe("document.margin_left");
    expect(violations[0].message).toBe("document.margin_left must be > 0, got 0");
  });

  it("reports both defects together", () => {
    const base = catalog.resolve("default");
    base.document.margin_left = 0;
    const config: Record<string, unknown> = { ...base };
    delete config.body;

    expect(violationsOf(config).map((v) => v.path)).toEqual(["document.margin_left", "body"]);
  });

  it("reports every bad attribute within one category", () => {
    const base = catalog.resolve("formal");
    const config = {
      ...base,
      title: { ...base.title, font_size: 0, alignment: "diagonal" },
    };

    expect(violationsOf(config).map((v) => v.message)).toEqual([
      "title.font_size must be a positive integer, got 0",
      'title.alignment must be one of left, center, right, justify, got "diagonal"',
    ]);
  });

  it("reports missing attributes", () => {
    const base = catalog.resolve("default");
    const heading1: Record<string, unknown> = { ...base.heading1 };
    delete heading1.bold;

    expect(violationsOf({ ...base, heading1 }).map((v) => v.message)).toEqual([
      "heading1.bold is required",
    ]);
  });

  it("reports attributes that do not belong to a category", () => {
    const base = catalog.resolve("default");
    const config = { ...base, title: { ...base.title, first_line_indent: 2 } };

    const violations = violationsOf(config);
    expect(violations).toHaveLength(1);
    expect(violations[0].message).toBe("title.first_line_indent is not an attribute of title");
  });

  it("reports unknown categories", () => {
    const config = { ...catalog.resolve("default"), footer: { font_size: 9 } };
    expect(violationsOf(config).map((v) => v.message)).toEqual([
      "footer is not an element category",
    ]);
  });

  it("reports a category that is not an object", () => {
    const config = { ...catalog.resolve("default"), signature: "right" };
    expect(violationsOf(config).map((v) => v.message)).toEqual([
      'signature must be an object, got "right"',
    ]);
  });

  it("accepts fixed line spacing with an explicit height", () => {
    const config = catalog.resolve("default");
    config.document.line_spacing = "fixed";
    config.document.line_spacing_fixed_pt = 28;
    expect(validateConfig(config).ok).toBe(true);
  });

  it("rejects a non-positive fixed line height", () => {
    const config = catalog.resolve("default");
    config.document.line_spacing_fixed_pt = 0;
    expect(violationsOf(config).map((v) => v.path)).toEqual(["document.line_spacing_fixed_pt"]);
  });

  it("rejects values that are not objects at all", () => {
    for (const value of [null, "default", 42, []]) {
      const violations = violationsOf(value);
      expect(violations).toHaveLength(1);
      expect(violations[0].path).toBe("config");
    }
  });

  it("does not depend on key order", () => {
    const base = catalog.resolve("default");
    const reordered = {
      signature: base.signature,
      body: { first_line_indent: 2, alignment: "left", bold: false, font_size: 16, font_family: "仿宋_GB2312" },
      heading2: base.heading2,
      heading1: base.heading1,
      title: base.title,
      document: base.document,
    };
    expect(validateConfig(reordered)).toEqual({ ok: true, config: base });
  });

  describe("assertValidConfig()", () => {
    it("throws ValidationFailureError carrying all violations", () => {
      const base = catalog.resolve("default");
      base.document.margin_top = -1;
      base.body.font_size = 0;

      let caught: unknown;
      try {
        assertValidConfig(base);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ValidationFailureError);
      if (caught instanceof ValidationFailureError) {
        expect(caught.code).toBe("VALIDATION_FAILURE");
        expect(caught.violations.map((v) => v.path)).toEqual([
          "document.margin_top",
          "body.font_size",
        ]);
        expect(caught.message).toBe(
          "Configuration is invalid (2 violations):\n" +
            "  - document.margin_top must be > 0, got -1\n" +
            "  - body.font_size must be a positive integer, got 0",
        );
      }
    });
  });
});
