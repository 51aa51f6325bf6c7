import { describe, it, expect } from "vitest";
import {
  canonicalJsonStringify,
  configFingerprint,
  sha256String,
} from "../src/shared/hash.js";
import { TemplateCatalog } from "../src/style/catalog.js";

describe("SHA-256 Hashing", () => {
  it("sha256String hashes UTF-8 strings", () => {
    expect(sha256String("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
    expect(sha256String("test")).toBe(
      "9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08",
    );
  });

  it("canonicalJsonStringify sorts keys at every depth", () => {
    const a = { b: 2, a: { d: [3, { z: 1, y: 2 }], c: 1 } };
    expect(canonicalJsonStringify(a)).toBe('{"a":{"c":1,"d":[3,{"y":2,"z":1}]},"b":2}');
  });

  it("canonicalJsonStringify ignores insertion order", () => {
    expect(canonicalJsonStringify({ x: 1, y: 2 })).toBe(canonicalJsonStringify({ y: 2, x: 1 }));
  });
});

describe("configFingerprint", () => {
  const catalog = new TemplateCatalog();

  it("is stable across copies of the same template", () => {
    expect(configFingerprint(catalog.resolve("default"))).toBe(
      configFingerprint(catalog.resolve("default")),
    );
  });

  it("differs between templates and after an edit", () => {
    const base = catalog.resolve("default");
    const edited = catalog.resolve("default");
    edited.title.bold = false;

    expect(configFingerprint(base)).not.toBe(configFingerprint(catalog.resolve("formal")));
    expect(configFingerprint(base)).not.toBe(configFingerprint(edited));
  });
});
