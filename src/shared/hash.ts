import { createHash } from "crypto";
import type { StyleConfiguration } from "../style/schema.js";

/** SHA-256 of a UTF-8 string. */
export function sha256String(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/**
 * Canonical JSON stringify with deep-sorted keys.
 * Two configurations with the same values serialize identically
 * regardless of the order their keys were written in.
 */
export function canonicalJsonStringify(obj: unknown): string {
  return JSON.stringify(sortKeysDeep(obj));
}

function sortKeysDeep(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") return obj;
  if (Array.isArray(obj)) return obj.map(sortKeysDeep);
  const sorted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[key] = sortKeysDeep(value);
  }
  return sorted;
}

/** Stable fingerprint of a style configuration, reported with every render. */
export function configFingerprint(config: StyleConfiguration): string {
  return sha256String(canonicalJsonStringify(config));
}
