/**
 * Shared argument handling for the CLIs.
 *
 *   --template <name>          start from a builtin template
 *   --set <category.key=value> edit one attribute (repeatable)
 *   --config <file.json>       use a full configuration from disk instead
 *   --input / --output         source and destination files
 *   --timeout <ms>             render time limit
 */

import path from "path";
import {
  findAttribute,
  isElementCategory,
  parseAttributeValue,
} from "../style/schema.js";
import { StyleConfigStore } from "../style/store.js";
import type { TemplateCatalog } from "../style/catalog.js";

export interface Assignment {
  category: string;
  key: string;
  raw: string;
}

export interface CliArgs {
  template?: string;
  configPath?: string;
  input?: string;
  output?: string;
  timeoutMs?: number;
  sets: Assignment[];
}

export function parseAssignment(expr: string): Assignment {
  const m = /^([A-Za-z0-9_]+)\.([A-Za-z0-9_]+)=(.*)$/s.exec(expr);
  if (!m) {
    throw new Error(`Expected <category.key=value>, got "${expr}"`);
  }
  return { category: m[1], key: m[2], raw: m[3] };
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { sets: [] };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];
    const takesValue = ["--template", "--config", "--input", "--output", "--timeout", "--set"];
    if (!takesValue.includes(flag)) {
      if (flag.startsWith("--")) throw new Error(`Unknown option: ${flag}`);
      if (args.input === undefined) {
        args.input = flag;
        continue;
      }
      throw new Error(`Unexpected argument: ${flag}`);
    }
    if (value === undefined) {
      throw new Error(`Option ${flag} requires a value`);
    }
    i++;

    switch (flag) {
      case "--template":
        args.template = value;
        break;
      case "--config":
        args.configPath = value;
        break;
      case "--input":
        args.input = value;
        break;
      case "--output":
        args.output = value;
        break;
      case "--timeout": {
        const ms = Number(value);
        if (!Number.isInteger(ms) || ms <= 0) {
          throw new Error(`--timeout must be a positive integer, got "${value}"`);
        }
        args.timeoutMs = ms;
        break;
      }
      case "--set":
        args.sets.push(parseAssignment(value));
        break;
    }
  }

  if (args.configPath && (args.template || args.sets.length > 0)) {
    throw new Error("--config cannot be combined with --template or --set");
  }
  return args;
}

/** Default output: <outDir>/格式化_<stem>.docx */
export function defaultOutputPath(inputPath: string, outDir: string): string {
  const stem = path.basename(inputPath, path.extname(inputPath));
  return path.join(outDir, `格式化_${stem}.docx`);
}

/**
 * Apply --set assignments in order. Raw strings are parsed to the
 * attribute's primitive type; the store does the domain check.
 */
export function applyAssignments(store: StyleConfigStore, sets: Assignment[]): void {
  for (const { category, key, raw } of sets) {
    const spec = isElementCategory(category) ? findAttribute(category, key) : undefined;
    const value = spec ? parseAttributeValue(spec.domain, raw) : raw;
    if (category === "document") {
      store.setDocumentSetting(key, value);
    } else {
      store.setElementSetting(category, key, value);
    }
  }
}

export function buildStore(
  catalog: TemplateCatalog,
  args: CliArgs,
  defaultTemplate: string,
): StyleConfigStore {
  const store = new StyleConfigStore(catalog, args.template ?? defaultTemplate);
  applyAssignments(store, args.sets);
  return store;
}
